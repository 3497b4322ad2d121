/**
 * Result Type Pattern
 * @module utils/result
 *
 * Ok/Err values for operations whose failure is an expected outcome,
 * such as a deployment the scheduler rejected.
 *
 * @example
 * ```typescript
 * const deployed = await manager.deployService(campaignId, spec);
 * if (isOk(deployed)) {
 *   logger.info({ jobId: deployed.value.jobId }, 'service up');
 * }
 * ```
 */

// ============================================================================
// Result Type Definition
// ============================================================================

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E = Error> = Ok<T> | Err<E>;

// ============================================================================
// Constructors
// ============================================================================

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

// ============================================================================
// Type Guards
// ============================================================================

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return !result.ok;
}
