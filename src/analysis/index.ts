/**
 * Analysis Module
 * @module analysis
 */

export * from './types.js';
export { percentile, percentileOfSorted, mean, sampleStdDev, latencyStats, ZERO_LATENCY } from './statistics.js';
export {
  RequestRecordSchema,
  isPlaceholderId,
  isCountableRecord,
  recordCampaignId,
  type RequestRecord,
} from './request-record.js';
export {
  registerServiceExtension,
  unregisterServiceExtension,
  getServiceExtension,
  generativeExtension,
  keyValueExtension,
  relationalExtension,
  type ServiceExtension,
  type ExtensionContext,
} from './service-extensions.js';
export { SummarySchema, parseSummary } from './summary-schema.js';
export {
  aggregate,
  aggregateRecords,
  validateRecords,
  createEmptySummary,
  MIN_DURATION_S,
  type AggregateOptions,
  type ValidatedRecords,
} from './aggregator.js';
export { gradient, curvature, findKneeIndex, MIN_KNEE_POINTS, type KneeIndex } from './knee.js';
export {
  findKneePoint,
  findLatencyKnee,
  findThroughputSaturation,
  findSloLimit,
  analyzeSaturation,
  toSweepPoints,
  MIN_SWEEP_POINTS,
  type NumericParameter,
} from './saturation.js';
export {
  BottleneckClassifier,
  classifyBottleneck,
  confidenceOf,
  scoreEvidence,
  DEFAULT_RULES,
  type BottleneckRule,
  type RuleInput,
} from './bottleneck.js';
export { compare, compareMetric, percentChange, resolveThresholds } from './regression.js';
