/**
 * Error Handling Module
 * @module errors
 *
 * Error classes and retry strategy for the benchmark orchestrator.
 *
 * @example
 * ```typescript
 * import { ConnectivityError, withRetry } from './errors/index.js';
 *
 * const state = await withRetry(() => executor.queryJobState(jobId), {
 *   maxAttempts: 3,
 * });
 * ```
 */

// ============================================================================
// Error Codes
// ============================================================================

export {
  GeneralErrorCodes,
  ConnectivityErrorCodes,
  DataIntegrityErrorCodes,
  ConfigurationErrorCodes,
  StateErrorCodes,
  DeploymentErrorCodes,
  StorageErrorCodes,
  ErrorCodes,
  isRetryableError,
  type ErrorCode,
  type GeneralErrorCode,
  type ConnectivityErrorCode,
  type DataIntegrityErrorCode,
  type ConfigurationErrorCode,
  type StateErrorCode,
  type DeploymentErrorCode,
  type StorageErrorCode,
} from './codes.js';

// ============================================================================
// Base Errors
// ============================================================================

export {
  BaseError,
  isBaseError,
  isOperationalError,
  hasErrorCode,
  wrapError,
  getErrorMessage,
  type ErrorContext,
  type SerializedError,
} from './base.js';

// ============================================================================
// Domain Errors
// ============================================================================

export {
  ConnectivityError,
  DataIntegrityError,
  ConfigurationError,
  StateError,
  EntityNotFoundError,
  ServiceNotRunningError,
  DeploymentError,
  SubmissionError,
  StorageError,
  LockHeldError,
} from './domain.js';

// ============================================================================
// Recovery
// ============================================================================

export {
  withRetry,
  computeBackoffDelay,
  DEFAULT_RETRY_OPTIONS,
  type RetryOptions,
} from './recovery.js';
