/**
 * Core Structured Logger
 * @module logging/logger
 *
 * Structured logging with Pino for the benchmark orchestrator.
 * Adds domain-specific methods for job lifecycle, deployment failures,
 * skipped telemetry and analysis output.
 */

import pino, { type Logger, type LoggerOptions, type DestinationStream } from 'pino';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Log context that can be attached to log entries
 */
export interface LogContext {
  campaignId?: string;
  jobId?: string;
  module?: string;
  operation?: string;
  [key: string]: unknown;
}

export interface LoggerConfig {
  level: string;
  pretty: boolean;
  redact: string[];
  service: string;
  version: string;
  environment: string;
}

/**
 * Domain-specific logging methods
 */
export interface DomainLogMethods {
  withContext(context: LogContext): StructuredLogger;

  // Job lifecycle
  jobSubmitted(jobId: string, kind: 'service' | 'client', name: string): void;
  jobStateChanged(jobId: string, from: string | null, to: string): void;
  deploymentFailed(name: string, step: string, error: Error): void;
  remoteRetry(operation: string, attempt: number, delayMs: number, error: unknown): void;

  // Telemetry and analysis
  recordSkipped(source: string, line: number, reason: string): void;
  summaryWritten(campaignId: string, path: string, totalRequests: number): void;
  regressionDetected(metric: string, changePct: number, threshold: number): void;

  performanceMetric(operation: string, duration: number, metadata?: Record<string, unknown>): void;
}

export type StructuredLogger = Logger & DomainLogMethods;

// ============================================================================
// Default Configuration
// ============================================================================

function defaultConfig(): LoggerConfig {
  return {
    level: process.env.LOG_LEVEL ?? 'info',
    pretty: process.env.LOG_PRETTY === 'true',
    redact: [
      'password',
      'token',
      'secret',
      'privateKey',
      'private_key',
      'connectionString',
      'storage.connectionString',
    ],
    service: process.env.SERVICE_NAME ?? 'hpc-bench-orchestrator',
    version: process.env.SERVICE_VERSION ?? '0.1.0',
    environment: process.env.NODE_ENV ?? 'development',
  };
}

// ============================================================================
// Redaction Utilities
// ============================================================================

function createRedactionPaths(paths: string[]): string[] {
  const expandedPaths: string[] = [];

  for (const path of paths) {
    expandedPaths.push(path);
    if (!path.includes('.')) {
      expandedPaths.push(`*.${path}`);
    }
  }

  return expandedPaths;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

// ============================================================================
// Domain Method Extensions
// ============================================================================

/**
 * Extends a Pino logger with domain-specific methods
 */
function extendWithDomainMethods(logger: Logger): StructuredLogger {
  const methods: DomainLogMethods = {
    withContext(context: LogContext): StructuredLogger {
      return extendWithDomainMethods(logger.child(context));
    },

    jobSubmitted(jobId, kind, name) {
      logger.info(
        { event: 'job_submitted', jobId, kind, name },
        `Submitted ${kind} ${name} as job ${jobId}`
      );
    },

    jobStateChanged(jobId, from, to) {
      logger.info(
        { event: 'job_state_changed', jobId, from, to },
        `Job ${jobId}: ${from ?? 'none'} -> ${to}`
      );
    },

    deploymentFailed(name, step, error) {
      logger.error(
        { event: 'deployment_failed', name, step, err: error, errorCode: errorCode(error) },
        `Deployment of ${name} failed at ${step}: ${error.message}`
      );
    },

    remoteRetry(operation, attempt, delayMs, error) {
      logger.warn(
        { event: 'remote_retry', operation, attempt, delayMs, errorCode: errorCode(error) },
        `Retrying ${operation} after attempt ${attempt}`
      );
    },

    recordSkipped(source, line, reason) {
      logger.warn(
        { event: 'record_skipped', source, line, reason },
        `Skipped malformed record at ${source}:${line}`
      );
    },

    summaryWritten(campaignId, path, totalRequests) {
      logger.info(
        { event: 'summary_written', campaignId, path, totalRequests },
        `Summary for ${campaignId} written to ${path}`
      );
    },

    regressionDetected(metric, changePct, threshold) {
      logger.warn(
        { event: 'regression_detected', metric, changePct, threshold },
        `Regression in ${metric}: ${changePct.toFixed(1)}% (threshold ${threshold}%)`
      );
    },

    performanceMetric(operation, duration, metadata) {
      logger.debug(
        { event: 'performance_metric', operation, durationMs: duration, ...metadata },
        `${operation}: ${duration}ms`
      );
    },
  };

  return Object.assign(logger, methods);
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Creates a new structured logger instance
 */
export function createLogger(name: string, baseContext?: LogContext): StructuredLogger {
  const config = defaultConfig();

  const options: LoggerOptions = {
    name,
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: createRedactionPaths(config.redact),
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: config.service,
      version: config.version,
      env: config.environment,
    },
  };

  let destination: DestinationStream | undefined;

  if (config.pretty && config.environment !== 'production') {
    destination = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    });
  }

  const baseLogger = destination ? pino(options, destination) : pino(options);
  const logger = baseContext ? baseLogger.child(baseContext) : baseLogger;

  return extendWithDomainMethods(logger);
}

// ============================================================================
// Singleton Root Logger
// ============================================================================

let rootLogger: StructuredLogger | null = null;

export function getLogger(): StructuredLogger {
  if (!rootLogger) {
    rootLogger = createLogger('hpc-bench-orchestrator');
  }
  return rootLogger;
}

/**
 * Resets the root logger (primarily for testing)
 */
export function resetLogger(): void {
  rootLogger = null;
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Creates a logger for a specific module/component
 */
export function createModuleLogger(moduleName: string): StructuredLogger {
  return getLogger().withContext({ module: moduleName });
}

/**
 * Wraps an async function with timing and logging
 */
export async function withLogging<T>(
  logger: StructuredLogger,
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  const startTime = Date.now();
  try {
    const result = await fn();
    logger.performanceMetric(operation, Date.now() - startTime, { status: 'success' });
    return result;
  } catch (error) {
    logger.performanceMetric(operation, Date.now() - startTime, { status: 'error' });
    throw error;
  }
}
