/**
 * Logging Module
 * @module logging
 */

export {
  createLogger,
  getLogger,
  resetLogger,
  createModuleLogger,
  withLogging,
  type StructuredLogger,
  type DomainLogMethods,
  type LogContext,
  type LoggerConfig,
} from './logger.js';

export {
  metricsRegistry,
  jobsSubmitted,
  jobStateTransitions,
  remoteRetries,
  waitDuration,
  activeServices,
  recordsProcessed,
  aggregationDuration,
  regressionsDetected,
  getMetrics,
  getMetricsContentType,
  resetMetrics,
} from './metrics.js';
