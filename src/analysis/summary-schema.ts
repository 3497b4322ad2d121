/**
 * Summary validation
 * @module analysis/summary-schema
 *
 * Summaries come back from disk or from callers of `compare`; both go
 * through this schema before analysis.
 */

import { z } from 'zod';
import type { Summary } from './types.js';
import { DataIntegrityError, DataIntegrityErrorCodes } from '../errors/index.js';

const num = z.number().finite();

const LatencyStatsSchema = z.object({
  avg: num,
  min: num,
  max: num,
  stddev: num,
  p50: num,
  p90: num,
  p95: num,
  p99: num,
});

const OperationStatsSchema = z.object({
  count: z.number().int().nonnegative(),
  avgLatency: num,
  minLatency: num,
  maxLatency: num,
  p50Latency: num,
  p95Latency: num,
  p99Latency: num,
  throughput: num,
});

export const SummarySchema = z.object({
  campaignId: z.string(),
  empty: z.boolean(),
  serviceType: z.string(),
  totalRequests: z.number().int().nonnegative(),
  successfulRequests: z.number().int().nonnegative(),
  failedRequests: z.number().int().nonnegative(),
  successRate: num,
  latency: LatencyStatsSchema,
  throughput: num,
  durationS: num,
  startTime: num.nullable(),
  endTime: num.nullable(),
  errorSummary: z.record(z.number().int().nonnegative()),
  extensions: z.object({
    tokensPerSecond: num.optional(),
    avgOutputTokens: num.optional(),
    avgInputTokens: num.optional(),
    operations: z.record(OperationStatsSchema).optional(),
    transactionsPerSecond: num.optional(),
    avgPayloadSizeBytes: num.optional(),
    payloadSizesUsed: z.array(num).optional(),
  }),
  parametric: z.object({
    concurrency: num.optional(),
    payloadSizeBytes: num.optional(),
    promptLength: num.optional(),
    maxTokens: num.optional(),
    model: z.string().optional(),
    pipeline: num.optional(),
  }),
  filteredRecords: z.number().int().nonnegative(),
  skippedRecords: z.number().int().nonnegative(),
});

/**
 * Validate an unknown value as a Summary
 */
export function parseSummary(value: unknown, source = 'summary'): Summary {
  const parsed = SummarySchema.safeParse(value);
  if (!parsed.success) {
    throw new DataIntegrityError(
      `Invalid summary in ${source}: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
      DataIntegrityErrorCodes.INVALID_ARTIFACT,
      { source }
    );
  }
  return parsed.data;
}
