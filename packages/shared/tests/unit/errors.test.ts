/**
 * Unit tests for error classes
 */

import { describe, it, expect } from 'vitest';

import {
  KubesimError,
  ErrorCode,
  ValidationError,
  NotFoundError,
  ConflictError,
  RuntimeError,
  isKubesimError,
  isConflictError,
  wrapError,
} from '../../src/errors';

describe('KubesimError', () => {
  it('should map error codes to HTTP status codes', () => {
    expect(new KubesimError('x', ErrorCode.INTERNAL_ERROR).statusCode).toBe(500);
    expect(new KubesimError('x', ErrorCode.OUT_OF_RANGE).statusCode).toBe(400);
    expect(new KubesimError('x', ErrorCode.NOT_FOUND).statusCode).toBe(404);
    expect(new KubesimError('x', ErrorCode.CONFLICT).statusCode).toBe(409);
    expect(new KubesimError('x', ErrorCode.INVALID_STATE).statusCode).toBe(409);
    expect(new KubesimError('x', ErrorCode.RUNTIME_ERROR).statusCode).toBe(502);
    expect(new KubesimError('x', ErrorCode.RUNTIME_UNAVAILABLE).statusCode).toBe(503);
    expect(new KubesimError('x', ErrorCode.RUNTIME_TIMEOUT).statusCode).toBe(504);
  });

  it('should expose the symbolic code name', () => {
    expect(new KubesimError('x', ErrorCode.CONFLICT).codeName).toBe('CONFLICT');
  });

  it('should serialize with correlation id', () => {
    const error = new KubesimError('boom', ErrorCode.INTERNAL_ERROR).withCorrelationId('abc');
    const json = error.toJSON();
    expect(json.error).toMatchObject({
      name: 'KubesimError',
      code: 'INTERNAL_ERROR',
      message: 'boom',
      correlationId: 'abc',
    });
  });

  it('should wrap unknown errors', () => {
    const cause = new Error('raw');
    const wrapped = wrapError(cause, ErrorCode.INTERNAL_ERROR);
    expect(isKubesimError(wrapped)).toBe(true);
    expect(wrapped.cause).toBe(cause);
    expect(wrapError('text').message).toBe('text');

    const original = NotFoundError.object('node', 'n1');
    expect(wrapError(original)).toBe(original);
  });
});

describe('ValidationError', () => {
  it('should carry field details', () => {
    const error = ValidationError.multiple([
      { field: 'name', message: 'bad' },
      { field: 'request.cpu', message: 'bad' },
    ]);
    expect(error.message).toBe('Validation failed for fields: name, request.cpu');
    expect(error.statusCode).toBe(400);
    expect(error.hasFieldError('name')).toBe(true);
  });

  it('should set specific codes from factories', () => {
    expect(ValidationError.required('name').codeName).toBe('MISSING_REQUIRED_FIELD');
    expect(ValidationError.outOfRange('port', 1, 65535, 0).details[0]?.expected).toBe('between 1 and 65535');
  });
});

describe('Store errors', () => {
  it('should build not-found messages', () => {
    const error = NotFoundError.object('workload', 'w1');
    expect(error.message).toBe("Workload 'w1' not found");
    expect(error.statusCode).toBe(404);
  });

  it('should distinguish revision conflicts from state conflicts', () => {
    const stale = ConflictError.revisionMismatch('node', 'n1', 2, 3);
    expect(stale.message).toBe("Node 'n1' is at revision 3, expected 2");
    expect(stale.isRevisionConflict()).toBe(true);

    const state = ConflictError.invalidState('workload', 'w1', 'Running', 'update');
    expect(state.message).toBe("Cannot update workload 'w1' in phase Running");
    expect(state.isRevisionConflict()).toBe(false);
    expect(isConflictError(state)).toBe(true);
  });
});

describe('RuntimeError', () => {
  it('should flag timeouts', () => {
    const error = RuntimeError.timeout('createEnvironment', 50);
    expect(error.isTimeout()).toBe(true);
    expect(error.statusCode).toBe(504);
    expect(error.message).toBe('Runtime createEnvironment timed out after 50ms');
  });

  it('should describe refusals', () => {
    const error = RuntimeError.refused('launchWorkload', 'no space');
    expect(error.isTimeout()).toBe(false);
    expect(error.operation).toBe('launchWorkload');
    expect(error.statusCode).toBe(502);
  });
});
