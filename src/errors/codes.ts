/**
 * Error Codes Enumeration
 * @module errors/codes
 *
 * Centralized error codes for the benchmark orchestrator.
 * Provides typed error codes for consistent error handling across the deployment,
 * storage and analysis layers.
 */

// ============================================================================
// Error Code Categories
// ============================================================================

/**
 * General error codes
 */
export const GeneralErrorCodes = {
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
  TIMEOUT: 'TIMEOUT',
} as const;

export type GeneralErrorCode = typeof GeneralErrorCodes[keyof typeof GeneralErrorCodes];

/**
 * Remote executor / connectivity error codes
 */
export const ConnectivityErrorCodes = {
  CONNECTION_FAILED: 'CONNECTION_FAILED',
  CONNECTION_TIMEOUT: 'CONNECTION_TIMEOUT',
  CONNECTION_LOST: 'CONNECTION_LOST',
  REMOTE_COMMAND_FAILED: 'REMOTE_COMMAND_FAILED',
  TRANSFER_FAILED: 'TRANSFER_FAILED',
} as const;

export type ConnectivityErrorCode =
  typeof ConnectivityErrorCodes[keyof typeof ConnectivityErrorCodes];

/**
 * Data integrity error codes (raw telemetry and persisted artifacts)
 */
export const DataIntegrityErrorCodes = {
  MALFORMED_RECORD: 'MALFORMED_RECORD',
  INVALID_JSON: 'INVALID_JSON',
  INVALID_ARTIFACT: 'INVALID_ARTIFACT',
} as const;

export type DataIntegrityErrorCode =
  typeof DataIntegrityErrorCodes[keyof typeof DataIntegrityErrorCodes];

/**
 * Configuration error codes
 */
export const ConfigurationErrorCodes = {
  INVALID_CONFIG: 'INVALID_CONFIG',
  MISSING_REQUIRED: 'MISSING_REQUIRED',
  INVALID_THRESHOLDS: 'INVALID_THRESHOLDS',
  INSUFFICIENT_DATA: 'INSUFFICIENT_DATA',
  CONFIG_FILE_ERROR: 'CONFIG_FILE_ERROR',
} as const;

export type ConfigurationErrorCode =
  typeof ConfigurationErrorCodes[keyof typeof ConfigurationErrorCodes];

/**
 * State error codes (references to unknown jobs or entities)
 */
export const StateErrorCodes = {
  ENTITY_NOT_FOUND: 'ENTITY_NOT_FOUND',
  JOB_NOT_FOUND: 'JOB_NOT_FOUND',
  SERVICE_NOT_RUNNING: 'SERVICE_NOT_RUNNING',
  ENDPOINT_UNAVAILABLE: 'ENDPOINT_UNAVAILABLE',
} as const;

export type StateErrorCode = typeof StateErrorCodes[keyof typeof StateErrorCodes];

/**
 * Deployment error codes
 */
export const DeploymentErrorCodes = {
  DEPLOYMENT_FAILED: 'DEPLOYMENT_FAILED',
  WORKDIR_SETUP_FAILED: 'WORKDIR_SETUP_FAILED',
  SCRIPT_UPLOAD_FAILED: 'SCRIPT_UPLOAD_FAILED',
  SUBMISSION_FAILED: 'SUBMISSION_FAILED',
  PERSISTENCE_FAILED: 'PERSISTENCE_FAILED',
} as const;

export type DeploymentErrorCode =
  typeof DeploymentErrorCodes[keyof typeof DeploymentErrorCodes];

/**
 * Storage error codes
 */
export const StorageErrorCodes = {
  STORAGE_READ_FAILED: 'STORAGE_READ_FAILED',
  STORAGE_WRITE_FAILED: 'STORAGE_WRITE_FAILED',
  LOCK_HELD: 'LOCK_HELD',
} as const;

export type StorageErrorCode = typeof StorageErrorCodes[keyof typeof StorageErrorCodes];

// ============================================================================
// Combined Error Codes
// ============================================================================

export const ErrorCodes = {
  ...GeneralErrorCodes,
  ...ConnectivityErrorCodes,
  ...DataIntegrityErrorCodes,
  ...ConfigurationErrorCodes,
  ...StateErrorCodes,
  ...DeploymentErrorCodes,
  ...StorageErrorCodes,
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

// ============================================================================
// Utilities
// ============================================================================

const retryableCodes: ReadonlySet<string> = new Set<string>([
  GeneralErrorCodes.TIMEOUT,
  ConnectivityErrorCodes.CONNECTION_FAILED,
  ConnectivityErrorCodes.CONNECTION_TIMEOUT,
  ConnectivityErrorCodes.CONNECTION_LOST,
  ConnectivityErrorCodes.TRANSFER_FAILED,
]);

/**
 * Check if an error code represents a transient failure worth retrying
 */
export function isRetryableError(code: string): boolean {
  return retryableCodes.has(code);
}
