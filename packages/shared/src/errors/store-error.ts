/**
 * Object store errors
 * @module @kubesim/shared/errors/store-error
 */

import { KubesimError, ErrorCode, type ErrorMeta } from './base-error.js';

/**
 * Raised when an object does not exist
 */
export class NotFoundError extends KubesimError {
  constructor(message: string, meta: ErrorMeta = {}) {
    super(message, ErrorCode.NOT_FOUND, meta);
    this.name = 'NotFoundError';
  }

  /**
   * Create for a missing object
   */
  static object(kind: string, id: string): NotFoundError {
    return new NotFoundError(`${capitalize(kind)} '${id}' not found`, {
      resourceType: kind,
      resourceId: id,
    });
  }
}

/**
 * Raised on a stale revision, a duplicate id or an operation the object's
 * current phase does not allow
 */
export class ConflictError extends KubesimError {
  constructor(message: string, code: ErrorCode = ErrorCode.CONFLICT, meta: ErrorMeta = {}) {
    super(message, code, meta);
    this.name = 'ConflictError';
  }

  /**
   * Create for an expected revision that no longer matches
   */
  static revisionMismatch(kind: string, id: string, expected: number, actual: number): ConflictError {
    return new ConflictError(
      `${capitalize(kind)} '${id}' is at revision ${actual}, expected ${expected}`,
      ErrorCode.CONFLICT,
      { resourceType: kind, resourceId: id, expectedRevision: expected, actualRevision: actual },
    );
  }

  /**
   * Create for a duplicate id or name
   */
  static alreadyExists(kind: string, key: string): ConflictError {
    return new ConflictError(
      `${capitalize(kind)} '${key}' already exists`,
      ErrorCode.ALREADY_EXISTS,
      { resourceType: kind, resourceId: key },
    );
  }

  /**
   * Create for an operation not allowed in the current phase
   */
  static invalidState(kind: string, id: string, phase: string, operation: string): ConflictError {
    return new ConflictError(
      `Cannot ${operation} ${kind} '${id}' in phase ${phase}`,
      ErrorCode.INVALID_STATE,
      { resourceType: kind, resourceId: id, phase, operation },
    );
  }

  /**
   * Whether the conflict came from a revision check
   */
  isRevisionConflict(): boolean {
    return this.code === ErrorCode.CONFLICT;
  }
}

/**
 * Check if an error is a ConflictError
 */
export function isConflictError(error: unknown): error is ConflictError {
  return error instanceof ConflictError;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
