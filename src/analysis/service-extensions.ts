/**
 * Service extensions
 * @module analysis/service-extensions
 *
 * Per-service summary fields, looked up by the `service_type` of the first
 * countable record. New service kinds are added with
 * `registerServiceExtension`.
 */

import type { RequestRecord } from './request-record.js';
import type { OperationStats, ServiceExtensionFields } from './types.js';
import { latencyStats, mean } from './statistics.js';

export interface ExtensionContext {
  successful: readonly RequestRecord[];
  /** Requests per second over the effective duration */
  throughput: number;
  durationS: number;
}

export type ServiceExtension = (context: ExtensionContext) => ServiceExtensionFields;

// ============================================================================
// Built-in Extensions
// ============================================================================

/**
 * Token rates of generative inference services
 */
export const generativeExtension: ServiceExtension = ({ successful, durationS }) => {
  if (successful.length === 0) {
    return {};
  }
  const output = successful.map((r) => r.output_tokens ?? 0);
  const input = successful.map((r) => r.input_tokens ?? 0);
  const totalOutput = output.reduce((a, b) => a + b, 0);
  return {
    tokensPerSecond: durationS > 0 ? totalOutput / durationS : 0,
    avgOutputTokens: mean(output),
    avgInputTokens: mean(input),
  };
};

function operationBreakdown(
  successful: readonly RequestRecord[],
  durationS: number,
  normalizeName: (name: string) => string
): Record<string, OperationStats> {
  const groups = new Map<string, { count: number; latencies: number[] }>();
  for (const record of successful) {
    const name = normalizeName(record.operation_type ?? 'unknown');
    const group = groups.get(name) ?? { count: 0, latencies: [] };
    group.count += 1;
    const latency = record.latency_s ?? 0;
    if (latency > 0) {
      group.latencies.push(latency);
    }
    groups.set(name, group);
  }

  const operations: Record<string, OperationStats> = {};
  for (const [name, { count, latencies }] of groups) {
    const stats = latencyStats(latencies);
    operations[name] = {
      count,
      avgLatency: stats.avg,
      minLatency: stats.min,
      maxLatency: stats.max,
      p50Latency: stats.p50,
      p95Latency: stats.p95,
      p99Latency: stats.p99,
      throughput: durationS > 0 ? count / durationS : 0,
    };
  }
  return operations;
}

function payloadStats(successful: readonly RequestRecord[]): ServiceExtensionFields {
  const sizes = successful.map((r) => r.payload_size_bytes ?? 0).filter((size) => size > 0);
  if (sizes.length === 0) {
    return {};
  }
  return {
    avgPayloadSizeBytes: mean(sizes),
    payloadSizesUsed: [...new Set(sizes)].sort((a, b) => a - b),
  };
}

/**
 * Key-value stores: upper-cased command names
 */
export const keyValueExtension: ServiceExtension = ({ successful, throughput, durationS }) => ({
  operations: operationBreakdown(successful, durationS, (name) => name.toUpperCase()),
  transactionsPerSecond: throughput,
  ...payloadStats(successful),
});

export const relationalExtension: ServiceExtension = ({ successful, throughput, durationS }) => ({
  operations: operationBreakdown(successful, durationS, (name) => name),
  transactionsPerSecond: throughput,
  ...payloadStats(successful),
});

// ============================================================================
// Registry
// ============================================================================

const registry = new Map<string, ServiceExtension>([
  ['vllm', generativeExtension],
  ['ollama', generativeExtension],
  ['redis', keyValueExtension],
  ['postgres', relationalExtension],
]);

export function registerServiceExtension(serviceType: string, extension: ServiceExtension): void {
  registry.set(serviceType, extension);
}

export function unregisterServiceExtension(serviceType: string): boolean {
  return registry.delete(serviceType);
}

export function getServiceExtension(serviceType: string): ServiceExtension | undefined {
  return registry.get(serviceType);
}
