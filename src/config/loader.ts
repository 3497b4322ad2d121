/**
 * Configuration Loader
 * @module config/loader
 *
 * Multi-source configuration loading with validation and caching.
 * Sources merge in priority order: schema defaults, then a YAML/JSON
 * file, then `BENCH_*` environment variables.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { pino } from 'pino';
import { parse as parseYaml } from 'yaml';
import type { z } from 'zod';
import {
  type OrchestratorConfig,
  OrchestratorConfigSchema,
  type PartialOrchestratorConfig,
} from './schema.js';
import { ConfigurationError, ConfigurationErrorCodes, getErrorMessage } from '../errors/index.js';

const logger = pino({ name: 'config-loader', level: process.env.LOG_LEVEL ?? 'info' });

// ============================================================================
// Configuration Source Interface
// ============================================================================

/**
 * Sources are loaded in order of priority (lowest first, highest overrides)
 */
export interface ConfigSource {
  name: string;
  priority: number;
  load(): Promise<PartialOrchestratorConfig>;
  isAvailable(): boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Drop undefined leaves and any object left empty afterwards
 */
function filterUndefined(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (value === undefined) {
      continue;
    }
    if (isRecord(value)) {
      const nested = filterUndefined(value);
      if (Object.keys(nested).length > 0) {
        result[key] = nested;
      }
    } else {
      result[key] = value;
    }
  }
  return result;
}

// ============================================================================
// Environment Variable Configuration Source
// ============================================================================

/**
 * Maps `BENCH_*` environment variables onto the configuration structure.
 * Numeric values stay strings here; the schema coerces them.
 */
export class EnvironmentConfigSource implements ConfigSource {
  public readonly name = 'environment';
  public readonly priority = 10;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  isAvailable(): boolean {
    return true;
  }

  async load(): Promise<PartialOrchestratorConfig> {
    const env = this.env;
    const num = (value: string | undefined): number | undefined =>
      value === undefined || value === '' ? undefined : Number(value);

    return filterUndefined({
      env: env.BENCH_ENV,
      storage: {
        backend: env.BENCH_STORAGE_BACKEND,
        rootDir: env.BENCH_STORAGE_DIR,
        connectionString: env.BENCH_DATABASE_URL,
        table: env.BENCH_STORAGE_TABLE,
      },
      remote: {
        target: env.BENCH_TARGET,
        workDirTemplate: env.BENCH_WORKDIR_TEMPLATE,
      },
      polling: {
        jobPollIntervalMs: env.BENCH_JOB_POLL_INTERVAL_MS,
        jobStartTimeoutMs: env.BENCH_JOB_START_TIMEOUT_MS,
        endpointTimeoutMs: env.BENCH_ENDPOINT_TIMEOUT_MS,
        healthTimeoutMs: env.BENCH_HEALTH_TIMEOUT_MS,
      },
      retry: {
        maxAttempts: env.BENCH_RETRY_ATTEMPTS,
        delayMs: env.BENCH_RETRY_DELAY_MS,
      },
      analysis: {
        resultsDir: env.BENCH_RESULTS_DIR,
        sloP99Seconds: env.BENCH_SLO_P99_SECONDS,
        regression: {
          latencyPct: num(env.BENCH_REGRESSION_LATENCY_PCT),
          throughputPct: num(env.BENCH_REGRESSION_THROUGHPUT_PCT),
          successRatePct: num(env.BENCH_REGRESSION_SUCCESS_RATE_PCT),
        },
      },
    });
  }
}

// ============================================================================
// File Configuration Source
// ============================================================================

/**
 * YAML or JSON file configuration source
 */
export class FileConfigSource implements ConfigSource {
  public readonly name: string;
  public readonly priority: number;

  constructor(
    private readonly filePath: string,
    priority = 5
  ) {
    this.name = `file:${filePath}`;
    this.priority = priority;
  }

  isAvailable(): boolean {
    return existsSync(this.filePath);
  }

  async load(): Promise<PartialOrchestratorConfig> {
    if (!this.isAvailable()) {
      logger.debug({ filePath: this.filePath }, 'Config file not found, skipping');
      return {};
    }

    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(
        `Failed to load configuration file ${this.filePath}: ${getErrorMessage(error)}`,
        ConfigurationErrorCodes.CONFIG_FILE_ERROR,
        [],
        { cause: error, resource: this.filePath }
      );
    }

    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigurationError(
        `Configuration file ${this.filePath} must contain a mapping`,
        ConfigurationErrorCodes.CONFIG_FILE_ERROR,
        [],
        { resource: this.filePath }
      );
    }

    logger.debug({ filePath: this.filePath }, 'Loaded config from file');
    return parsed;
  }
}

// ============================================================================
// Configuration Loader
// ============================================================================

export interface ConfigLoaderOptions {
  /** Enable caching (default: true) */
  enableCache?: boolean;
  /** Custom config sources; replaces the defaults */
  sources?: ConfigSource[];
}

/**
 * Multi-source configuration loader with validation
 */
export class ConfigLoader {
  private sources: ConfigSource[] = [];
  private config: OrchestratorConfig | null = null;
  private readonly enableCache: boolean;

  constructor(options: ConfigLoaderOptions = {}) {
    this.enableCache = options.enableCache ?? true;

    if (options.sources) {
      this.sources = [...options.sources];
    } else {
      const configPath = process.env.BENCH_CONFIG ?? join(process.cwd(), 'bench.config.yaml');
      this.sources = [new FileConfigSource(configPath, 5), new EnvironmentConfigSource()];
    }

    this.sources.sort((a, b) => a.priority - b.priority);
  }

  addSource(source: ConfigSource): this {
    this.sources.push(source);
    this.sources.sort((a, b) => a.priority - b.priority);
    this.invalidateCache();
    return this;
  }

  /**
   * Load and validate configuration from all sources
   *
   * @throws ConfigurationError when a source cannot be read or the merged value is invalid
   */
  async load(): Promise<OrchestratorConfig> {
    if (this.enableCache && this.config) {
      return this.config;
    }

    const merged: Record<string, unknown> = {};

    for (const source of this.sources) {
      if (!source.isAvailable()) {
        continue;
      }
      const partial = await source.load();
      this.deepMerge(merged, partial);
      logger.debug({ source: source.name }, 'Loaded config from source');
    }

    const result = OrchestratorConfigSchema.safeParse(merged);

    if (!result.success) {
      const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
      logger.error({ issues }, 'Configuration validation failed');
      throw new ConfigurationError(
        `Configuration validation failed:\n${issues.map((i) => `  - ${i}`).join('\n')}`,
        ConfigurationErrorCodes.INVALID_CONFIG,
        issues
      );
    }

    this.config = result.data;
    return this.config;
  }

  /**
   * Get loaded configuration (throws if not loaded)
   */
  get(): OrchestratorConfig {
    if (!this.config) {
      throw new ConfigurationError(
        'Configuration not loaded. Call load() first.',
        ConfigurationErrorCodes.MISSING_REQUIRED
      );
    }
    return this.config;
  }

  isLoaded(): boolean {
    return this.config !== null;
  }

  invalidateCache(): void {
    this.config = null;
  }

  /**
   * Deep merge two objects, with source overwriting target
   */
  private deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): void {
    for (const key of Object.keys(source)) {
      const sourceValue = source[key];
      const targetValue = target[key];

      if (sourceValue === undefined) {
        continue;
      }

      if (isRecord(sourceValue) && isRecord(targetValue)) {
        this.deepMerge(targetValue, sourceValue);
      } else if (isRecord(sourceValue)) {
        const copy: Record<string, unknown> = {};
        this.deepMerge(copy, sourceValue);
        target[key] = copy;
      } else {
        target[key] = sourceValue;
      }
    }
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Load configuration with a single call
 */
export async function loadConfig(options?: ConfigLoaderOptions): Promise<OrchestratorConfig> {
  return new ConfigLoader(options).load();
}

/**
 * Validate a configuration value without loading sources
 */
export function validateConfig(config: unknown): z.SafeParseReturnType<unknown, OrchestratorConfig> {
  return OrchestratorConfigSchema.safeParse(config);
}
