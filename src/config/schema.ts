/**
 * Configuration Schema Definitions
 * @module config/schema
 *
 * Zod schemas for the orchestrator configuration.
 * Every field has a default, so an empty source set yields a usable config.
 */

import { z } from 'zod';

// ============================================================================
// Environment Enum
// ============================================================================

export const Environment = z.enum(['development', 'production', 'test']);
export type Environment = z.infer<typeof Environment>;

// ============================================================================
// Storage Configuration
// ============================================================================

/**
 * Entity store backend selection
 */
export const StorageConfigSchema = z.object({
  /** Backend kind */
  backend: z.enum(['file', 'postgres']).default('file'),
  /** Root directory of the file backend */
  rootDir: z.string().default('.bench/state'),
  /** Connection string of the postgres backend */
  connectionString: z.string().optional(),
  /** Table holding entity containers */
  table: z.string().regex(/^[a-z_][a-z0-9_]*$/).default('entity_containers'),
});

export type StorageConfig = z.infer<typeof StorageConfigSchema>;

// ============================================================================
// Remote Target Configuration
// ============================================================================

export const RemoteConfigSchema = z.object({
  /** Identifier of the cluster the executor talks to */
  target: z.string().default('localhost'),
  /** Working directory template; `{campaignId}` is substituted */
  workDirTemplate: z.string().default('~/benchmark_{campaignId}'),
});

export type RemoteConfig = z.infer<typeof RemoteConfigSchema>;

// ============================================================================
// Polling Configuration
// ============================================================================

/**
 * Wait-phase timings, all in milliseconds
 */
export const PollingConfigSchema = z.object({
  jobPollIntervalMs: z.coerce.number().int().positive().default(5000),
  jobStartTimeoutMs: z.coerce.number().int().positive().default(300_000),
  endpointInitialDelayMs: z.coerce.number().int().positive().default(1000),
  endpointMaxDelayMs: z.coerce.number().int().positive().default(10_000),
  endpointBackoffMultiplier: z.coerce.number().min(1).default(2),
  endpointTimeoutMs: z.coerce.number().int().positive().default(120_000),
  healthInitialDelayMs: z.coerce.number().int().positive().default(2000),
  healthMaxDelayMs: z.coerce.number().int().positive().default(15_000),
  healthBackoffMultiplier: z.coerce.number().min(1).default(1.5),
  healthTimeoutMs: z.coerce.number().int().positive().default(300_000),
});

export type PollingConfig = z.infer<typeof PollingConfigSchema>;

// ============================================================================
// Retry Configuration
// ============================================================================

/**
 * Retry policy for transient remote executor failures
 */
export const RetryConfigSchema = z.object({
  maxAttempts: z.coerce.number().int().min(1).default(3),
  delayMs: z.coerce.number().int().min(0).default(1000),
  backoffMultiplier: z.coerce.number().min(1).default(2),
  maxDelayMs: z.coerce.number().int().min(0).default(10_000),
});

export type RetryConfig = z.infer<typeof RetryConfigSchema>;

// ============================================================================
// Analysis Configuration
// ============================================================================

export const RegressionThresholdsSchema = z.object({
  latencyPct: z.number().finite().nonnegative().default(10),
  throughputPct: z.number().finite().nonnegative().default(10),
  successRatePct: z.number().finite().nonnegative().default(1),
});

export type RegressionThresholds = z.infer<typeof RegressionThresholdsSchema>;

export const AnalysisConfigSchema = z.object({
  /** Directory holding per-campaign result artifacts */
  resultsDir: z.string().default('results'),
  /** p99 latency ceiling in seconds used by saturation analysis */
  sloP99Seconds: z.coerce.number().positive().optional(),
  regression: RegressionThresholdsSchema.default({}),
});

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;

// ============================================================================
// Complete Configuration
// ============================================================================

export const OrchestratorConfigSchema = z.object({
  env: Environment.default('development'),
  storage: StorageConfigSchema.default({}),
  remote: RemoteConfigSchema.default({}),
  polling: PollingConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  analysis: AnalysisConfigSchema.default({}),
});

export type OrchestratorConfig = z.infer<typeof OrchestratorConfigSchema>;

/**
 * Shape accepted from a single source before defaults are applied
 */
export type PartialOrchestratorConfig = Record<string, unknown>;
