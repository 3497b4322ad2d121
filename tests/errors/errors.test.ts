/**
 * Error Hierarchy Tests
 * @module tests/errors/errors
 */

import { describe, it, expect } from 'vitest';
import {
  BaseError,
  ConnectivityError,
  ConfigurationError,
  DataIntegrityError,
  DeploymentError,
  EntityNotFoundError,
  ErrorCodes,
  LockHeldError,
  ServiceNotRunningError,
  StateError,
  SubmissionError,
  getErrorMessage,
  hasErrorCode,
  isOperationalError,
  isRetryableError,
  wrapError,
} from '../../src/errors/index.js';

describe('error hierarchy', () => {
  it('keeps subclass identity and codes', () => {
    const error = new ServiceNotRunningError('vllm', { campaignId: 'c-001' });

    expect(error).toBeInstanceOf(StateError);
    expect(error).toBeInstanceOf(BaseError);
    expect(error.name).toBe('ServiceNotRunningError');
    expect(error.code).toBe(ErrorCodes.SERVICE_NOT_RUNNING);
    expect(error.message).toBe("Service 'vllm' is not running or has no endpoint");
  });

  it('names the missing entity', () => {
    const error = new EntityNotFoundError('service', 'redis');

    expect(error.message).toBe("service 'redis' not found");
    expect(error.context.resource).toBe('service/redis');
  });

  it('records the failing deployment step', () => {
    const error = new SubmissionError('client-1');

    expect(error).toBeInstanceOf(DeploymentError);
    expect(error.step).toBe('submit');
    expect(error.context.operation).toBe('submit');
    expect(error.code).toBe(ErrorCodes.SUBMISSION_FAILED);
  });

  it('serializes with source details', () => {
    const error = new DataIntegrityError('bad line', ErrorCodes.INVALID_JSON, {
      source: 'requests.jsonl',
      line: 7,
      campaignId: 'c-001',
    });
    const json = error.toJSON();

    expect(json.code).toBe('INVALID_JSON');
    expect(json.source).toBe('requests.jsonl');
    expect(json.line).toBe(7);
    expect(json.campaignId).toBe('c-001');
  });

  it('carries configuration issues', () => {
    const error = new ConfigurationError('invalid', ErrorCodes.INVALID_THRESHOLDS, ['latencyPct: negative']);

    expect(error.toJSON().issues).toEqual(['latencyPct: negative']);
  });

  it('walks the cause chain', () => {
    const root = new Error('socket closed');
    const error = new ConnectivityError('lost', ErrorCodes.CONNECTION_LOST, { cause: root });

    expect(error.getRootCause()).toBe(root);
    expect(error.getErrorChain()).toEqual([error, root]);
  });

  it('treats lock contention as non-operational storage failure', () => {
    const error = new LockHeldError('/tmp/results/c-001/.collecting');

    expect(error.code).toBe(ErrorCodes.LOCK_HELD);
    expect(isOperationalError(error)).toBe(false);
  });
});

describe('error utilities', () => {
  it('classifies retryable codes', () => {
    expect(isRetryableError(ErrorCodes.CONNECTION_FAILED)).toBe(true);
    expect(isRetryableError(ErrorCodes.TRANSFER_FAILED)).toBe(true);
    expect(isRetryableError(ErrorCodes.REMOTE_COMMAND_FAILED)).toBe(false);
    expect(isRetryableError(ErrorCodes.INVALID_CONFIG)).toBe(false);
  });

  it('wraps foreign errors once', () => {
    const plain = wrapError(new Error('boom'));
    const again = wrapError(plain);

    expect(plain).toBeInstanceOf(BaseError);
    expect(plain.code).toBe(ErrorCodes.INTERNAL_ERROR);
    expect(plain.isOperational).toBe(false);
    expect(again).toBe(plain);
    expect(wrapError('text').message).toBe('text');
  });

  it('matches codes and messages', () => {
    expect(hasErrorCode(new StateError('x'), ErrorCodes.ENTITY_NOT_FOUND)).toBe(true);
    expect(hasErrorCode(new Error('x'), ErrorCodes.ENTITY_NOT_FOUND)).toBe(false);
    expect(getErrorMessage(new Error('a'))).toBe('a');
    expect(getErrorMessage('b')).toBe('b');
    expect(getErrorMessage(42)).toBe('42');
  });
});
