/**
 * API Error Classes
 *
 * Typed errors raised by the core services and mapped to HTTP responses by
 * the error handler middleware:
 *
 * - BadRequestError   → 400 (malformed input, invalid field name, invalid date)
 * - UnauthorizedError → 401 (bad, missing or expired credentials)
 * - NotFoundError     → 404 (absent, or not owned by the caller)
 * - ConflictError     → 409 (duplicate unique field on creation)
 * - PersistenceError  → 503 (transient storage failure)
 */

import { ZodError } from 'zod';
import { ImageProcessingError } from '../utils/image.js';
import { AvatarStorageError } from '../packages/adapters/avatar/S3AvatarStorage.js';

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base API error with HTTP status code
 */
export class ApiError extends Error {
  public readonly statusCode: number;
  public readonly errorCode: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number,
    errorCode: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.errorCode = errorCode;
    this.details = details;
  }

  toJSON() {
    return {
      error: this.errorCode,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

// =============================================================================
// 4xx Client Errors
// =============================================================================

/**
 * 400 Bad Request
 */
export class BadRequestError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'BAD_REQUEST', details);
    this.name = 'BadRequestError';
  }

  /**
   * Collect zod issues into a per-field map
   */
  static fromZodError(error: ZodError): BadRequestError {
    const fields: Record<string, string[]> = {};
    for (const issue of error.issues) {
      const path = issue.path.join('.') || '_root';
      const messages = fields[path] ?? [];
      messages.push(issue.message);
      fields[path] = messages;
    }
    return new BadRequestError('Validation failed', { fields });
  }
}

/**
 * 401 Unauthorized
 */
export class UnauthorizedError extends ApiError {
  constructor(message: string = 'Not authenticated') {
    super(message, 401, 'UNAUTHORIZED');
    this.name = 'UnauthorizedError';
  }
}

/**
 * 401 for any token that fails verification.
 *
 * The message is fixed: callers never learn whether the signature, the
 * expiry or the token type was at fault.
 */
export class InvalidTokenError extends UnauthorizedError {
  constructor() {
    super('Could not validate credentials');
    this.name = 'InvalidTokenError';
  }
}

/**
 * 404 Not Found
 */
export class NotFoundError extends ApiError {
  constructor(resource: string = 'Resource', id?: string | number) {
    const message = id !== undefined ? `${resource} '${id}' not found` : 'Not Found';
    super(message, 404, 'NOT_FOUND', id !== undefined ? { resource, id } : undefined);
    this.name = 'NotFoundError';
  }
}

/**
 * 409 Conflict
 */
export class ConflictError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 409, 'CONFLICT', details);
    this.name = 'ConflictError';
  }
}

// =============================================================================
// 5xx Server Errors
// =============================================================================

/**
 * 500 Internal Server Error
 */
export class InternalServerError extends ApiError {
  constructor(message: string = 'An unexpected error occurred') {
    super(message, 500, 'INTERNAL_ERROR');
    this.name = 'InternalServerError';
  }
}

/**
 * 503 for storage failures (connectivity, unexpected constraint violations).
 * The surrounding transaction has already been rolled back when this is seen.
 */
export class PersistenceError extends ApiError {
  constructor(message: string = 'Storage temporarily unavailable') {
    super(message, 503, 'PERSISTENCE_ERROR');
    this.name = 'PersistenceError';
  }
}

/**
 * 503 Service Unavailable
 */
export class ServiceUnavailableError extends ApiError {
  constructor(message: string = 'Service temporarily unavailable') {
    super(message, 503, 'SERVICE_UNAVAILABLE');
    this.name = 'ServiceUnavailableError';
  }
}

// =============================================================================
// Error Handler Utility
// =============================================================================

/**
 * Check if an error is an ApiError
 */
export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

/**
 * Errors raised by body-parser carry an HTTP status and an `expose` flag
 */
function hasClientStatus(error: Error): error is Error & { status: number } {
  return (
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  );
}

/**
 * Convert any error to an ApiError for consistent response format
 */
export function toApiError(error: unknown): ApiError {
  if (isApiError(error)) {
    return error;
  }

  if (error instanceof ZodError) {
    return BadRequestError.fromZodError(error);
  }

  if (error instanceof ImageProcessingError) {
    return new BadRequestError(error.message, { reason: error.code });
  }

  if (error instanceof AvatarStorageError) {
    return new ServiceUnavailableError('Avatar storage unavailable');
  }

  if (error instanceof Error) {
    if (error.name === 'SqliteError') {
      return new PersistenceError();
    }

    if (hasClientStatus(error)) {
      return new ApiError(
        error.status === 400 ? 'Malformed request body' : error.message,
        error.status,
        'BAD_REQUEST'
      );
    }
  }

  return new InternalServerError();
}
