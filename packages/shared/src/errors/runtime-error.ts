/**
 * Container runtime errors
 * @module @kubesim/shared/errors/runtime-error
 */

import { KubesimError, ErrorCode, type ErrorMeta } from './base-error.js';

/**
 * Raised when the container runtime refuses, fails or times out
 */
export class RuntimeError extends KubesimError {
  /** Runtime operation that failed */
  public readonly operation: string;

  constructor(
    message: string,
    operation: string,
    code: ErrorCode = ErrorCode.RUNTIME_ERROR,
    meta: ErrorMeta = {},
    cause?: Error,
  ) {
    super(message, code, { ...meta, operation }, cause);
    this.name = 'RuntimeError';
    this.operation = operation;
  }

  /**
   * Create for a refused or failed runtime call
   */
  static refused(operation: string, reason: string, meta: ErrorMeta = {}, cause?: Error): RuntimeError {
    return new RuntimeError(`Runtime ${operation} failed: ${reason}`, operation, ErrorCode.RUNTIME_ERROR, meta, cause);
  }

  /**
   * Create for a runtime call that did not answer in time
   */
  static timeout(operation: string, timeoutMs: number, meta: ErrorMeta = {}): RuntimeError {
    return new RuntimeError(
      `Runtime ${operation} timed out after ${timeoutMs}ms`,
      operation,
      ErrorCode.RUNTIME_TIMEOUT,
      { ...meta, timeoutMs },
    );
  }

  /**
   * Create for a runtime that cannot be reached at all
   */
  static unavailable(runtime: string, reason: string, cause?: Error): RuntimeError {
    return new RuntimeError(
      `Runtime ${runtime} is unavailable: ${reason}`,
      'connect',
      ErrorCode.RUNTIME_UNAVAILABLE,
      { runtime },
      cause,
    );
  }

  /**
   * Whether the failure was a timeout
   */
  isTimeout(): boolean {
    return this.code === ErrorCode.RUNTIME_TIMEOUT;
  }
}

/**
 * Check if an error is a RuntimeError
 */
export function isRuntimeError(error: unknown): error is RuntimeError {
  return error instanceof RuntimeError;
}
