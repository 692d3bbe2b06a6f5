/**
 * Response envelope and request helpers shared by the API handlers
 * @module @kubesim/server/api/responses
 */

import type { Request, Response } from 'express';
import type { FieldValidationError, Logger } from '@kubesim/shared';
import {
  ValidationError,
  generateCorrelationId,
  isKubesimError,
  isValidationError,
  validateExpectedRevision,
  validateUUID,
} from '@kubesim/shared';

/**
 * API success response
 */
export interface ApiSuccessResponse<T> {
  success: true;
  data: T;
}

/**
 * API error response
 */
export interface ApiErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export type ApiResponse<T> = ApiSuccessResponse<T> | ApiErrorResponse;

/**
 * Helper to send success response
 */
export function sendSuccess<T>(res: Response, data: T, statusCode = 200): void {
  const response: ApiSuccessResponse<T> = { success: true, data };
  res.status(statusCode).json(response);
}

/**
 * Helper to send error response
 */
export function sendError(
  res: Response,
  code: string,
  message: string,
  statusCode: number,
  details?: Record<string, unknown>,
): void {
  const response: ApiErrorResponse = {
    success: false,
    error: { code, message, ...(details && { details }) },
  };
  res.status(statusCode).json(response);
}

/**
 * Send a 400 built from field validation errors
 */
export function sendValidationError(res: Response, errors: FieldValidationError[]): void {
  const details: Record<string, { code: string; message: string }> = {};
  for (const error of errors) {
    details[error.field] = { code: error.code, message: error.message };
  }
  sendError(res, 'VALIDATION_ERROR', 'Validation failed', 400, details);
}

/**
 * Map a thrown error to the envelope: KubesimError keeps its status and code,
 * anything else is a 500
 */
export function sendFailure(res: Response, error: unknown, logger: Logger, context: Record<string, unknown> = {}): void {
  if (isValidationError(error)) {
    const details: Record<string, { code: string; message: string }> = {};
    for (const detail of error.details) {
      details[detail.field] = { code: detail.rule ?? error.codeName, message: detail.message };
    }
    sendError(res, 'VALIDATION_ERROR', error.message, 400, details);
    return;
  }

  if (isKubesimError(error)) {
    if (error.isServerError()) {
      logger.error('Request failed', error, context);
    } else {
      logger.info('Request rejected', { ...context, code: error.codeName, reason: error.message });
    }
    sendError(
      res,
      error.codeName,
      error.message,
      error.statusCode,
      Object.keys(error.meta).length > 0 ? { ...error.meta } : undefined,
    );
    return;
  }

  logger.error('Unexpected error', error instanceof Error ? error : undefined, context);
  sendError(res, 'INTERNAL_ERROR', 'An unexpected error occurred', 500);
}

/**
 * Correlation id of the request; the logging middleware sets one when the
 * client did not
 */
export function getCorrelationId(req: Request): string {
  const header = req.headers['x-correlation-id'];
  if (typeof header === 'string' && header.length > 0) {
    return header;
  }
  return generateCorrelationId();
}

/**
 * Validate the `:id` path parameter
 */
export function readIdParam(req: Request): string {
  const id = req.params.id;
  if (validateUUID(id)) {
    throw ValidationError.invalidFormat('id', 'a UUID', id);
  }
  return id;
}

/**
 * Expected revision of a write: body `expectedRevision`, then `?expectedRevision=`,
 * then the `If-Match` header (`3`, `"3"` or `W/"3"`)
 */
export function readExpectedRevision(req: Request): number | undefined {
  const body: unknown = req.body;
  if (typeof body === 'object' && body !== null && 'expectedRevision' in body) {
    const value = body.expectedRevision;
    const error = validateExpectedRevision(value);
    if (error) {
      throw ValidationError.field(error.field, error.message, error.code);
    }
    if (typeof value === 'number') {
      return value;
    }
  }

  const query = req.query.expectedRevision;
  if (typeof query === 'string') {
    return parseRevision(query, 'expectedRevision');
  }

  const ifMatch = req.headers['if-match'];
  if (typeof ifMatch === 'string' && ifMatch.length > 0) {
    return parseRevision(ifMatch.replace(/^W\//, '').replace(/"/g, ''), 'If-Match');
  }

  return undefined;
}

function parseRevision(raw: string, field: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed) || Number.parseInt(trimmed, 10) < 1) {
    throw ValidationError.field(field, `${field} must be a positive integer`, 'INVALID_VALUE');
  }
  return Number.parseInt(trimmed, 10);
}
