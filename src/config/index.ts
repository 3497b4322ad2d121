/**
 * Configuration Module
 * @module config
 *
 * Typed configuration access with multi-source loading.
 *
 * @example
 * ```typescript
 * import { initConfig, getConfig } from './config/index.js';
 *
 * await initConfig();
 * const { polling } = getConfig();
 * ```
 */

import { ConfigLoader, type ConfigLoaderOptions } from './loader.js';
import type { OrchestratorConfig } from './schema.js';
import { ConfigurationError, ConfigurationErrorCodes } from '../errors/index.js';

// ============================================================================
// Cached Configuration
// ============================================================================

let loader: ConfigLoader | null = null;
let cachedConfig: OrchestratorConfig | null = null;

/**
 * Load configuration and cache it for `getConfig()`
 */
export async function initConfig(options: ConfigLoaderOptions = {}): Promise<OrchestratorConfig> {
  loader = new ConfigLoader(options);
  cachedConfig = await loader.load();
  return cachedConfig;
}

/**
 * Get the cached configuration (throws if `initConfig` has not run)
 */
export function getConfig(): OrchestratorConfig {
  if (!cachedConfig) {
    throw new ConfigurationError(
      'Configuration not initialized. Call initConfig() first.',
      ConfigurationErrorCodes.MISSING_REQUIRED
    );
  }
  return cachedConfig;
}

export function isConfigInitialized(): boolean {
  return cachedConfig !== null;
}

/**
 * Reset cached configuration (primarily for testing)
 */
export function resetConfig(): void {
  loader?.invalidateCache();
  loader = null;
  cachedConfig = null;
}

// ============================================================================
// Re-exports
// ============================================================================

export {
  ConfigLoader,
  EnvironmentConfigSource,
  FileConfigSource,
  loadConfig,
  validateConfig,
  type ConfigSource,
  type ConfigLoaderOptions,
} from './loader.js';

export {
  OrchestratorConfigSchema,
  StorageConfigSchema,
  RemoteConfigSchema,
  PollingConfigSchema,
  RetryConfigSchema,
  AnalysisConfigSchema,
  RegressionThresholdsSchema,
  Environment,
  type OrchestratorConfig,
  type StorageConfig,
  type RemoteConfig,
  type PollingConfig,
  type RetryConfig,
  type AnalysisConfig,
  type RegressionThresholds,
  type PartialOrchestratorConfig,
} from './schema.js';
