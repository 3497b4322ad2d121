/**
 * Knee detection
 * @module analysis/knee
 *
 * Maximum-curvature knee of a sampled curve. Both axes are normalized to
 * [0, 1]; derivatives are finite differences (central inside, one-sided at
 * the ends). No smoothing is applied, so very short sweeps are noisy.
 */

const EPSILON = 1e-10;

export const MIN_KNEE_POINTS = 3;

/**
 * Finite-difference gradient with unit spacing
 */
export function gradient(values: readonly number[]): number[] {
  const n = values.length;
  if (n < 2) {
    return values.map(() => 0);
  }
  const at = (i: number): number => values[i] ?? 0;
  return values.map((_, i) => {
    if (i === 0) return at(1) - at(0);
    if (i === n - 1) return at(n - 1) - at(n - 2);
    return (at(i + 1) - at(i - 1)) / 2;
  });
}

function normalize(values: readonly number[]): number[] {
  const min = Math.min(...values);
  const max = Math.max(...values);
  return values.map((v) => (v - min) / (max - min + EPSILON));
}

/**
 * Curvature |x'y'' - y'x''| / (x'^2 + y'^2)^1.5 at every point
 */
export function curvature(xs: readonly number[], ys: readonly number[]): number[] {
  const dx = gradient(normalize(xs));
  const dy = gradient(normalize(ys));
  const ddx = gradient(dx);
  const ddy = gradient(dy);

  return dx.map((dxi, i) => {
    const dyi = dy[i] ?? 0;
    const numerator = Math.abs(dxi * (ddy[i] ?? 0) - dyi * (ddx[i] ?? 0));
    return numerator / Math.pow(dxi * dxi + dyi * dyi + EPSILON, 1.5);
  });
}

export interface KneeIndex {
  index: number;
  curvature: number;
}

/**
 * Interior point of maximum curvature (first one on ties), or null for
 * fewer than three points or mismatched series
 */
export function findKneeIndex(xs: readonly number[], ys: readonly number[]): KneeIndex | null {
  if (xs.length < MIN_KNEE_POINTS || xs.length !== ys.length) {
    return null;
  }
  const k = curvature(xs, ys);
  let best: KneeIndex | null = null;
  for (let i = 1; i < k.length - 1; i++) {
    const value = k[i] ?? 0;
    if (!best || value > best.curvature) {
      best = { index: i, curvature: value };
    }
  }
  return best;
}
