/**
 * Analysis Types
 * @module analysis/types
 *
 * Summary, sweep and verdict shapes shared by the aggregator and the
 * analytical modules. Summaries are written as JSON artifacts, so every
 * field here is plain data.
 */

// ============================================================================
// Summary
// ============================================================================

export interface LatencyStats {
  avg: number;
  min: number;
  max: number;
  /** Sample standard deviation; 0 for fewer than two samples */
  stddev: number;
  p50: number;
  p90: number;
  p95: number;
  p99: number;
}

export interface OperationStats {
  count: number;
  avgLatency: number;
  minLatency: number;
  maxLatency: number;
  p50Latency: number;
  p95Latency: number;
  p99Latency: number;
  /** Operations of this type per second of effective duration */
  throughput: number;
}

/**
 * Fields contributed by a service extension, selected by `serviceType`
 */
export interface ServiceExtensionFields {
  tokensPerSecond?: number;
  avgOutputTokens?: number;
  avgInputTokens?: number;
  operations?: Record<string, OperationStats>;
  transactionsPerSecond?: number;
  avgPayloadSizeBytes?: number;
  payloadSizesUsed?: number[];
}

/**
 * Sweep parameters carried by the records of a campaign
 */
export interface ParametricFields {
  concurrency?: number;
  payloadSizeBytes?: number;
  promptLength?: number;
  maxTokens?: number;
  model?: string;
  pipeline?: number;
}

export interface Summary {
  campaignId: string;
  /** True for the all-zero summary of a campaign without usable records */
  empty: boolean;
  serviceType: string;
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  /** Percentage, 0 when there are no requests */
  successRate: number;
  latency: LatencyStats;
  /** Requests per second of effective duration */
  throughput: number;
  durationS: number;
  startTime: number | null;
  endTime: number | null;
  errorSummary: Record<string, number>;
  extensions: ServiceExtensionFields;
  parametric: ParametricFields;
  /** Records dropped because they lack an id or carry a placeholder campaign id */
  filteredRecords: number;
  /** Records that failed validation */
  skippedRecords: number;
}

// ============================================================================
// Saturation
// ============================================================================

export interface SweepPoint {
  x: number;
  summary: Summary;
}

export interface KneePoint {
  index: number;
  x: number;
  y: number;
  curvature: number;
}

export interface ThroughputSaturation {
  knee: KneePoint | null;
  /** Throughput per unit of x, one entry per point */
  efficiency: number[];
  maxThroughput: number;
  maxThroughputX: number;
}

export type SloLimit =
  | { met: true; threshold: number; maxX: number; p99: number; headroomPct: number }
  | { met: false; threshold: number; reason: string };

export type RecommendationBasis = 'slo' | 'latency_knee' | 'throughput_saturation' | 'none';

export interface SaturationReport {
  xs: number[];
  latencyKnee: KneePoint | null;
  throughputSaturation: ThroughputSaturation;
  sloLimit: SloLimit | null;
  recommendedX: number | null;
  recommendationBasis: RecommendationBasis;
  /** One line per signal considered, for printed reports */
  reasoning: string[];
}

// ============================================================================
// Bottleneck
// ============================================================================

export const BottleneckCategories = [
  'gpu_bound',
  'cpu_bound',
  'memory_bound',
  'queueing',
  'network_io',
  'healthy',
] as const;

export type BottleneckCategory = typeof BottleneckCategories[number];

export type Classification = BottleneckCategory | 'unknown';

export type Confidence = 'high' | 'medium' | 'low';

export interface Evidence {
  category: BottleneckCategory;
  weight: number;
  reason: string;
}

export interface GpuTelemetry {
  utilizationPct?: number;
  memoryUsedMb?: number;
  memoryTotalMb?: number;
}

export interface JobTelemetry {
  maxRssMb?: number;
  cpuTimeS?: number;
  elapsedS?: number;
}

export interface ResourceTelemetry {
  gpu?: GpuTelemetry;
  job?: JobTelemetry;
}

export interface BottleneckVerdict {
  classification: Classification;
  confidence: Confidence;
  scores: Record<BottleneckCategory, number>;
  evidence: string[];
  recommendations: string[];
  summary: string;
}

// ============================================================================
// Regression
// ============================================================================

export type MetricType = 'latency' | 'throughput' | 'success_rate';

export interface MetricComparison {
  label: string;
  type: MetricType;
  baseline: number;
  current: number;
  delta: number;
  percentChange: number;
  regression: boolean;
  improvement: boolean;
  threshold: number;
}

export interface MetricChange {
  metric: string;
  /** Signed percentage with one decimal, e.g. `-15.0%` */
  change: string;
  threshold: number;
}

export type Verdict = 'PASS' | 'FAIL';

export interface RegressionVerdict {
  baselineId: string;
  currentId: string;
  thresholds: {
    latencyPct: number;
    throughputPct: number;
    successRatePct: number;
  };
  metrics: Record<string, MetricComparison>;
  regressions: MetricChange[];
  improvements: MetricChange[];
  verdict: Verdict;
}
