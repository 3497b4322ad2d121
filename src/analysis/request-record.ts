/**
 * Request record schema
 * @module analysis/request-record
 *
 * One line of a client's `requests.jsonl`. Clients are external and write
 * snake_case keys; unknown keys are kept.
 */

import { z } from 'zod';

const optionalNumber = z.number().finite().nullish();
const optionalId = z.union([z.string(), z.number()]).nullish();

export const RequestRecordSchema = z
  .object({
    request_id: optionalId,
    operation_type: z.string().nullish(),
    campaign_id: optionalId,
    benchmark_id: optionalId,
    service_type: z.string().nullish(),
    timestamp_start: optionalNumber,
    timestamp_end: optionalNumber,
    latency_s: optionalNumber,
    success: z.boolean().nullish(),
    error: z.string().nullish(),
    input_tokens: optionalNumber,
    output_tokens: optionalNumber,
    payload_size_bytes: optionalNumber,
    data_size: optionalNumber,
    concurrent_requests: optionalNumber,
    num_clients: optionalNumber,
    prompt_length: optionalNumber,
    max_tokens: optionalNumber,
    model: z.string().nullish(),
    pipeline: optionalNumber,
  })
  .passthrough();

export type RequestRecord = z.infer<typeof RequestRecordSchema>;

const PLACEHOLDER_ID = /^\$(\{[^}]*\}|[A-Za-z_][A-Za-z0-9_]*)$/;

/**
 * True for campaign ids a job script failed to expand, e.g. `$BENCHMARK_ID`
 */
export function isPlaceholderId(value: string | number | null | undefined): boolean {
  return typeof value === 'string' && PLACEHOLDER_ID.test(value);
}

export function recordCampaignId(record: RequestRecord): string | null {
  const id = record.campaign_id ?? record.benchmark_id;
  return id === null || id === undefined ? null : String(id);
}

/**
 * A record counts as a request when it names a request id or an operation
 * type and its campaign id was expanded
 */
export function isCountableRecord(record: RequestRecord): boolean {
  const identified =
    (record.request_id !== undefined && record.request_id !== null) ||
    (record.operation_type !== undefined && record.operation_type !== null);
  return identified && !isPlaceholderId(record.campaign_id) && !isPlaceholderId(record.benchmark_id);
}
