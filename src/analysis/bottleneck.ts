/**
 * Bottleneck Classifier
 * @module analysis/bottleneck
 *
 * Every rule inspects the summary (and telemetry, when supplied) on its own
 * and returns weighted evidence. The classifier sums the weights per
 * category once, after all rules ran.
 */

import {
  BottleneckCategories,
  type BottleneckCategory,
  type BottleneckVerdict,
  type Classification,
  type Confidence,
  type Evidence,
  type GpuTelemetry,
  type JobTelemetry,
  type ResourceTelemetry,
  type Summary,
} from './types.js';

// ============================================================================
// Rules
// ============================================================================

export interface RuleInput {
  summary: Summary;
  gpu: GpuTelemetry | null;
  job: JobTelemetry | null;
  /** p99 / p50, 0 when p50 is 0 */
  latencySpread: number;
}

export interface BottleneckRule {
  name: string;
  evaluate(input: RuleInput): Evidence[];
}

function evidence(reason: string, ...weights: [BottleneckCategory, number][]): Evidence[] {
  return weights.map(([category, weight]) => ({ category, weight, reason }));
}

export const tailSpreadRule: BottleneckRule = {
  name: 'tail-spread',
  evaluate: ({ latencySpread }) =>
    latencySpread > 5
      ? evidence(`High latency spread: P99/P50 = ${latencySpread.toFixed(1)}x (queueing indicator)`, ['queueing', 3])
      : [],
};

export const successRateRule: BottleneckRule = {
  name: 'success-rate',
  evaluate: ({ summary }) =>
    summary.successRate < 95
      ? evidence(`Low success rate: ${summary.successRate.toFixed(1)}% indicates overload`, ['queueing', 2])
      : [],
};

export const timeoutErrorRule: BottleneckRule = {
  name: 'timeout-errors',
  evaluate: ({ summary }) => {
    const timeouts = Object.keys(summary.errorSummary).some((key) => key.toLowerCase().includes('timeout'));
    return summary.failedRequests > 0 && timeouts
      ? evidence(`Timeout errors detected (${summary.failedRequests} failures)`, ['queueing', 2])
      : [];
  },
};

export const gpuUtilizationRule: BottleneckRule = {
  name: 'gpu-utilization',
  evaluate: ({ gpu }) => {
    if (!gpu) return [];
    const util = gpu.utilizationPct ?? 0;
    if (util > 90) return evidence(`High GPU utilization: ${util.toFixed(0)}%`, ['gpu_bound', 3]);
    if (util > 70) return evidence(`Moderate GPU utilization: ${util.toFixed(0)}%`, ['gpu_bound', 1]);
    if (util < 30) {
      return evidence(`Low GPU utilization: ${util.toFixed(0)}% (not GPU-bound)`, ['cpu_bound', 1], ['network_io', 1]);
    }
    return [];
  },
};

export const gpuMemoryRule: BottleneckRule = {
  name: 'gpu-memory',
  evaluate: ({ gpu }) => {
    if (!gpu) return [];
    const total = gpu.memoryTotalMb ?? 1;
    const pct = total > 0 ? ((gpu.memoryUsedMb ?? 0) / total) * 100 : 0;
    return pct > 90 ? evidence(`High GPU memory usage: ${pct.toFixed(0)}%`, ['memory_bound', 2]) : [];
  },
};

export const cpuEfficiencyRule: BottleneckRule = {
  name: 'cpu-efficiency',
  evaluate: ({ job }) => {
    if (!job) return [];
    const elapsed = job.elapsedS ?? 1;
    const efficiency = elapsed > 0 ? ((job.cpuTimeS ?? 0) / elapsed) * 100 : 0;
    return efficiency > 90 ? evidence(`High CPU efficiency: ${efficiency.toFixed(0)}%`, ['cpu_bound', 2]) : [];
  },
};

/** Resident set above 8 GB */
export const RSS_LIMIT_MB = 8000;

export const peakRssRule: BottleneckRule = {
  name: 'peak-rss',
  evaluate: ({ job }) => {
    const rss = job?.maxRssMb ?? 0;
    return rss > RSS_LIMIT_MB ? evidence(`High memory usage: ${rss.toFixed(0)} MB RSS`, ['memory_bound', 2]) : [];
  },
};

/**
 * Latency shape as a stand-in for hardware telemetry; only applies when
 * no telemetry at all was supplied
 */
export const latencyShapeRule: BottleneckRule = {
  name: 'latency-shape',
  evaluate: ({ summary, gpu, job, latencySpread }) => {
    if (gpu || job) return [];
    const { p99, avg } = summary.latency;
    const found: Evidence[] = [];
    if (p99 > 2.0) {
      found.push(...evidence(`High tail latency: P99 = ${p99.toFixed(2)}s`, ['queueing', 2]));
    }
    if (latencySpread > 3) {
      found.push(...evidence(`Elevated latency spread: P99/P50 = ${latencySpread.toFixed(1)}x`, ['queueing', 1]));
    } else if (latencySpread < 1.5 && avg > 0.5) {
      found.push(
        ...evidence(
          `Consistent latency (${latencySpread.toFixed(1)}x spread) suggests compute-bound`,
          ['gpu_bound', 1],
          ['cpu_bound', 1]
        )
      );
    }
    return found;
  },
};

export const healthyRule: BottleneckRule = {
  name: 'healthy',
  evaluate: ({ summary, latencySpread }) =>
    summary.successRate >= 99 && latencySpread < 2 && summary.latency.p99 < 1.0
      ? evidence('System operating within normal parameters', ['healthy', 3])
      : [],
};

export const DEFAULT_RULES: readonly BottleneckRule[] = [
  tailSpreadRule,
  successRateRule,
  timeoutErrorRule,
  gpuUtilizationRule,
  gpuMemoryRule,
  cpuEfficiencyRule,
  peakRssRule,
  latencyShapeRule,
  healthyRule,
];

// ============================================================================
// Recommendations
// ============================================================================

const MAX_RECOMMENDATIONS = 5;

const RECOMMENDATIONS: Readonly<Record<Classification, readonly string[]>> = {
  gpu_bound: [
    'Consider using a smaller model or enabling quantization',
    'Increase batch size to improve GPU efficiency',
    'Enable tensor parallelism across multiple GPUs',
    'Check if model fits in GPU memory without swapping',
  ],
  cpu_bound: [
    'Profile CPU-intensive operations (tokenization, data loading)',
    'Consider using more CPU cores or faster processors',
    'Optimize data preprocessing pipeline',
    'Check for unnecessary CPU-GPU data transfers',
  ],
  memory_bound: [
    'Reduce batch size to lower memory pressure',
    'Use memory-efficient attention mechanisms',
    'Consider model quantization (INT8/FP16)',
    'Check for memory leaks in long-running services',
  ],
  queueing: [
    'Reduce concurrency or request rate',
    'Scale horizontally with more service replicas',
    'Apply backpressure to queued requests',
    'Increase service timeout limits',
    'Rate-limit requests at the client',
  ],
  network_io: [
    'Check network bandwidth between client and service',
    'Reduce payload sizes where possible',
    'Enable compression for large responses',
    'Place client and service on the same node',
  ],
  healthy: [
    'Test at a higher load',
    'Record the current configuration as a baseline',
    'Monitor for degradation over time',
  ],
  unknown: [
    'Collect GPU utilization and job CPU time',
    'Run additional tests with varying concurrency',
    'Enable verbose logging to identify slow operations',
  ],
};

const LABELS: Readonly<Record<Classification, string>> = {
  gpu_bound: 'GPU Compute',
  cpu_bound: 'CPU Compute',
  memory_bound: 'Memory',
  queueing: 'Service Queueing/Overload',
  network_io: 'Network/I/O',
  healthy: 'No Significant Bottleneck',
  unknown: 'Unable to Determine',
};

// ============================================================================
// Classifier
// ============================================================================

function isPresent<T extends object>(value: T | undefined): value is T {
  return value !== undefined && Object.keys(value).length > 0;
}

export function confidenceOf(scores: Record<BottleneckCategory, number>): Confidence {
  const sorted = Object.values(scores).sort((a, b) => b - a);
  const top = sorted[0] ?? 0;
  const gap = top - (sorted[1] ?? 0);
  if (top === 0) return 'low';
  if (gap >= 2) return 'high';
  if (gap >= 1) return 'medium';
  return 'low';
}

export function scoreEvidence(found: readonly Evidence[]): Record<BottleneckCategory, number> {
  const scores: Record<BottleneckCategory, number> = {
    gpu_bound: 0,
    cpu_bound: 0,
    memory_bound: 0,
    queueing: 0,
    network_io: 0,
    healthy: 0,
  };
  for (const { category, weight } of found) {
    scores[category] += weight;
  }
  return scores;
}

export class BottleneckClassifier {
  private readonly rules: BottleneckRule[];

  constructor(rules: readonly BottleneckRule[] = DEFAULT_RULES) {
    this.rules = [...rules];
  }

  register(rule: BottleneckRule): this {
    this.rules.push(rule);
    return this;
  }

  ruleNames(): string[] {
    return this.rules.map((r) => r.name);
  }

  classify(summary: Summary, telemetry: ResourceTelemetry = {}): BottleneckVerdict {
    const { p50, p99 } = summary.latency;
    const input: RuleInput = {
      summary,
      gpu: isPresent(telemetry.gpu) ? telemetry.gpu : null,
      job: isPresent(telemetry.job) ? telemetry.job : null,
      latencySpread: p50 > 0 ? p99 / p50 : 0,
    };

    const found = this.rules.flatMap((rule) => rule.evaluate(input));
    const scores = scoreEvidence(found);

    let classification: Classification = 'unknown';
    let best = 0;
    for (const category of BottleneckCategories) {
      if (scores[category] > best) {
        best = scores[category];
        classification = category;
      }
    }

    const reasons = [...new Set(found.map((e) => e.reason))];
    const label = LABELS[classification];
    const first = reasons[0];

    return {
      classification,
      confidence: confidenceOf(scores),
      scores,
      evidence: reasons,
      recommendations: RECOMMENDATIONS[classification].slice(0, MAX_RECOMMENDATIONS),
      summary: first
        ? `Most likely bottleneck: ${label}. Primary indicator: ${first}`
        : `Most likely bottleneck: ${label} (insufficient data for detailed analysis)`,
    };
  }
}

const defaultClassifier = new BottleneckClassifier();

export function classifyBottleneck(summary: Summary, telemetry?: ResourceTelemetry): BottleneckVerdict {
  return defaultClassifier.classify(summary, telemetry);
}
