/**
 * Domain Error Classes
 * @module errors/domain
 *
 * Error taxonomy for campaign orchestration: remote connectivity,
 * malformed telemetry, invalid configuration, unknown references
 * and deployment failures.
 */

import { BaseError, type ErrorContext } from './base.js';
import {
  type ErrorCode,
  ConnectivityErrorCodes,
  DataIntegrityErrorCodes,
  ConfigurationErrorCodes,
  StateErrorCodes,
  DeploymentErrorCodes,
  StorageErrorCodes,
} from './codes.js';

// ============================================================================
// Connectivity Errors
// ============================================================================

/**
 * Remote executor is unreachable or a transfer failed.
 * Transient, callers retry with backoff.
 */
export class ConnectivityError extends BaseError {
  public readonly host: string | undefined;

  constructor(
    message: string,
    code: ErrorCode = ConnectivityErrorCodes.CONNECTION_FAILED,
    context: ErrorContext & { host?: string } = {}
  ) {
    super(message, code, context, true);
    this.name = 'ConnectivityError';
    this.host = context.host;
  }
}

// ============================================================================
// Data Integrity Errors
// ============================================================================

/**
 * A telemetry record or persisted artifact could not be decoded.
 * Record-level occurrences are skipped with a warning, never fatal.
 */
export class DataIntegrityError extends BaseError {
  public readonly source: string | undefined;
  public readonly line: number | undefined;

  constructor(
    message: string,
    code: ErrorCode = DataIntegrityErrorCodes.MALFORMED_RECORD,
    context: ErrorContext & { source?: string; line?: number } = {}
  ) {
    super(message, code, context, true);
    this.name = 'DataIntegrityError';
    this.source = context.source;
    this.line = context.line;
  }

  toJSON() {
    return {
      ...super.toJSON(),
      source: this.source,
      line: this.line,
    };
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Invalid thresholds, settings, or analysis input
 */
export class ConfigurationError extends BaseError {
  public readonly issues: string[];

  constructor(
    message: string,
    code: ErrorCode = ConfigurationErrorCodes.INVALID_CONFIG,
    issues: string[] = [],
    context: ErrorContext = {}
  ) {
    super(message, code, context, true);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }

  toJSON() {
    return {
      ...super.toJSON(),
      issues: this.issues,
    };
  }
}

// ============================================================================
// State Errors
// ============================================================================

/**
 * Reference to an unknown job or entity, or an action on an entity
 * that is not in the required state
 */
export class StateError extends BaseError {
  constructor(
    message: string,
    code: ErrorCode = StateErrorCodes.ENTITY_NOT_FOUND,
    context: ErrorContext = {}
  ) {
    super(message, code, context, true);
    this.name = 'StateError';
  }
}

export class EntityNotFoundError extends StateError {
  public readonly entityKind: string;
  public readonly entityId: string;

  constructor(entityKind: string, entityId: string, context: ErrorContext = {}) {
    super(`${entityKind} '${entityId}' not found`, StateErrorCodes.ENTITY_NOT_FOUND, {
      ...context,
      resource: `${entityKind}/${entityId}`,
    });
    this.name = 'EntityNotFoundError';
    this.entityKind = entityKind;
    this.entityId = entityId;
  }
}

/**
 * A client deployment referenced a service that has no endpoint yet
 */
export class ServiceNotRunningError extends StateError {
  public readonly serviceId: string;

  constructor(serviceId: string, context: ErrorContext = {}) {
    super(
      `Service '${serviceId}' is not running or has no endpoint`,
      StateErrorCodes.SERVICE_NOT_RUNNING,
      context
    );
    this.name = 'ServiceNotRunningError';
    this.serviceId = serviceId;
  }
}

// ============================================================================
// Deployment Errors
// ============================================================================

/**
 * A deployment step failed (working directory, upload, submission, persistence)
 */
export class DeploymentError extends BaseError {
  public readonly step: string;

  constructor(
    message: string,
    step: string,
    code: ErrorCode = DeploymentErrorCodes.DEPLOYMENT_FAILED,
    context: ErrorContext = {}
  ) {
    super(message, code, { ...context, operation: context.operation ?? step }, true);
    this.name = 'DeploymentError';
    this.step = step;
  }
}

export class SubmissionError extends DeploymentError {
  constructor(name: string, context: ErrorContext = {}) {
    super(
      `Scheduler rejected submission for '${name}'`,
      'submit',
      DeploymentErrorCodes.SUBMISSION_FAILED,
      context
    );
    this.name = 'SubmissionError';
  }
}

// ============================================================================
// Storage Errors
// ============================================================================

/**
 * Persistence backend failure (entity store, results directory)
 */
export class StorageError extends BaseError {
  constructor(
    message: string,
    code: ErrorCode = StorageErrorCodes.STORAGE_WRITE_FAILED,
    context: ErrorContext = {}
  ) {
    super(message, code, context, false);
    this.name = 'StorageError';
  }
}

/**
 * Another collector holds the campaign's collection lock
 */
export class LockHeldError extends StorageError {
  public readonly lockPath: string;

  constructor(lockPath: string, context: ErrorContext = {}) {
    super(`Lock already held: ${lockPath}`, StorageErrorCodes.LOCK_HELD, context);
    this.name = 'LockHeldError';
    this.lockPath = lockPath;
  }
}
