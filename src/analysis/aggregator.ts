/**
 * Metrics Aggregator
 * @module analysis/aggregator
 *
 * Turns the raw request records of one campaign into a Summary.
 *
 * Records are validated one by one: a record of the wrong shape is skipped
 * with a warning and counted, never fatal. Timestamps are float seconds;
 * upstream clients write them at 1 s resolution or finer, so the effective
 * duration is floored at the largest single latency.
 */

import type { Summary, ParametricFields } from './types.js';
import { type RequestRecord, RequestRecordSchema, isCountableRecord } from './request-record.js';
import { getServiceExtension } from './service-extensions.js';
import { ZERO_LATENCY, latencyStats } from './statistics.js';
import type { RawRecord } from '../artifacts/results-repository.js';
import { ResultsRepository } from '../artifacts/results-repository.js';
import { DataIntegrityError, DataIntegrityErrorCodes } from '../errors/index.js';
import { createModuleLogger } from '../logging/index.js';
import { aggregationDuration, recordsProcessed } from '../logging/index.js';

const logger = createModuleLogger('aggregator');

/** Floor of the effective duration when no latency is known */
export const MIN_DURATION_S = 1e-6;

// ============================================================================
// Empty Summary
// ============================================================================

export function createEmptySummary(campaignId: string): Summary {
  return {
    campaignId,
    empty: true,
    serviceType: 'unknown',
    totalRequests: 0,
    successfulRequests: 0,
    failedRequests: 0,
    successRate: 0,
    latency: { ...ZERO_LATENCY },
    throughput: 0,
    durationS: 0,
    startTime: null,
    endTime: null,
    errorSummary: {},
    extensions: {},
    parametric: {},
    filteredRecords: 0,
    skippedRecords: 0,
  };
}

// ============================================================================
// Record Validation
// ============================================================================

export interface ValidatedRecords {
  records: RequestRecord[];
  skipped: number;
}

/**
 * Validate raw values against the request record schema. Invalid values
 * are logged as data-integrity warnings and dropped.
 */
export function validateRecords(raw: readonly RawRecord[]): ValidatedRecords {
  const result: ValidatedRecords = { records: [], skipped: 0 };

  for (const { value, source, line } of raw) {
    const parsed = RequestRecordSchema.safeParse(value);
    if (parsed.success) {
      result.records.push(parsed.data);
      continue;
    }
    const error = new DataIntegrityError(
      `Invalid request record: ${parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'} ${i.message}`).join('; ')}`,
      DataIntegrityErrorCodes.MALFORMED_RECORD,
      { source, line }
    );
    logger.recordSkipped(source, line, error.message);
    result.skipped += 1;
  }

  return result;
}

// ============================================================================
// Aggregation
// ============================================================================

function parametricFields(first: RequestRecord): ParametricFields {
  const fields: ParametricFields = {};
  const concurrency = first.concurrent_requests || first.num_clients;
  if (concurrency) fields.concurrency = concurrency;
  const payload = first.payload_size_bytes || first.data_size;
  if (payload) fields.payloadSizeBytes = payload;
  if (first.prompt_length) fields.promptLength = first.prompt_length;
  if (first.max_tokens) fields.maxTokens = first.max_tokens;
  if (first.model) fields.model = first.model;
  if (first.pipeline) fields.pipeline = first.pipeline;
  return fields;
}

/**
 * Aggregate parsed JSON values. The same input always yields the same Summary.
 */
export function aggregateRecords(campaignId: string, values: readonly unknown[]): Summary {
  return summarize(
    campaignId,
    values.map((value, index) => ({ value, source: 'input', line: index + 1 }))
  );
}

function summarize(campaignId: string, raw: readonly RawRecord[]): Summary {
  const { records, skipped } = validateRecords(raw);
  const countable = records.filter(isCountableRecord);
  const filtered = records.length - countable.length;

  recordsProcessed.inc({ outcome: 'accepted' }, countable.length);
  if (filtered > 0) recordsProcessed.inc({ outcome: 'filtered' }, filtered);
  if (skipped > 0) recordsProcessed.inc({ outcome: 'skipped' }, skipped);

  const first = countable[0];
  if (!first) {
    return { ...createEmptySummary(campaignId), filteredRecords: filtered, skippedRecords: skipped };
  }

  const successful = countable.filter((r) => r.success === true);
  const failed = countable.filter((r) => r.success !== true);
  const total = countable.length;

  const latencies = successful.map((r) => r.latency_s ?? 0).filter((latency) => latency > 0);
  const latency = latencyStats(latencies);

  const starts = countable.map((r) => r.timestamp_start ?? 0).filter((t) => t !== 0);
  const ends = countable.map((r) => r.timestamp_end || r.timestamp_start || 0).filter((t) => t !== 0);

  let durationS = 0;
  let startTime: number | null = null;
  let endTime: number | null = null;
  if (starts.length > 0 && ends.length > 0) {
    startTime = starts.reduce((a, b) => Math.min(a, b));
    endTime = ends.reduce((a, b) => Math.max(a, b));
    durationS = Math.max(endTime - startTime, latency.max, MIN_DURATION_S);
  }
  const throughput = durationS > 0 ? total / durationS : 0;

  const serviceType = first.service_type ?? 'unknown';
  const extension = getServiceExtension(serviceType);
  const extensions = extension ? extension({ successful, throughput, durationS }) : {};

  const errorSummary: Record<string, number> = {};
  for (const record of failed) {
    const key = record.error ?? 'unknown';
    errorSummary[key] = (errorSummary[key] ?? 0) + 1;
  }

  return {
    campaignId,
    empty: false,
    serviceType,
    totalRequests: total,
    successfulRequests: successful.length,
    failedRequests: failed.length,
    successRate: (successful.length / total) * 100,
    latency,
    throughput,
    durationS,
    startTime,
    endTime,
    errorSummary,
    extensions,
    parametric: parametricFields(first),
    filteredRecords: filtered,
    skippedRecords: skipped,
  };
}

export interface AggregateOptions {
  /** Repository holding the campaign's artifacts; defaults to `results/` */
  repository?: ResultsRepository;
  /** Write `summary.json`; on by default */
  write?: boolean;
}

/**
 * Read a campaign's request records, aggregate them and write the summary.
 * A campaign without record files yields the empty summary.
 */
export async function aggregate(campaignId: string, options: AggregateOptions = {}): Promise<Summary> {
  const repository = options.repository ?? new ResultsRepository('results');
  const stopTimer = aggregationDuration.startTimer();

  const batch = await repository.readRequestRecords(campaignId);
  if (!batch) {
    logger.warn({ campaignId }, 'No request records found');
  }

  const summary = summarize(campaignId, batch?.records ?? []);
  const withMalformed: Summary = { ...summary, skippedRecords: summary.skippedRecords + (batch?.malformedLines ?? 0) };
  stopTimer();

  if (options.write !== false) {
    await repository.writeSummary(withMalformed);
  }
  return withMalformed;
}
