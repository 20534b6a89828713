import type { Request, Response, NextFunction } from 'express';
import { formatLogWithCorrelation, getCorrelationId } from '@/api/middleware/request-context.middleware.js';

/**
 * API error types for centralized error handling
 */
export enum ApiErrorCode {
  // Local validation errors (never reach upstream)
  INVALID_FILTER = 'INVALID_FILTER',
  INVALID_TENANT = 'INVALID_TENANT',

  // Credential rejected
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',

  NOT_FOUND = 'NOT_FOUND',

  // Upstream failures
  UPSTREAM_ERROR = 'UPSTREAM_ERROR',
  UPSTREAM_UNAVAILABLE = 'UPSTREAM_UNAVAILABLE',
  UPSTREAM_TIMEOUT = 'UPSTREAM_TIMEOUT',
  STREAM_INTERRUPTED = 'STREAM_INTERRUPTED',

  // Caller went away before the response was ready
  REQUEST_CANCELLED = 'REQUEST_CANCELLED',

  RATE_LIMITED = 'RATE_LIMITED',
  INTERNAL_ERROR = 'INTERNAL_ERROR'
}

/**
 * Standard API error class
 */
export class ApiError extends Error {
  constructor(
    public readonly code: ApiErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly retryable: boolean = false,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiError';
  }

  /**
   * Convert error to JSON response format
   */
  toJSON(): Record<string, unknown> {
    return {
      error: {
        code: this.code,
        message: this.message,
        retryable: this.retryable,
        ...(this.details && { details: this.details })
      }
    };
  }

  /**
   * A filter parameter failed validation.
   * Details always carry the accepted values so callers can self-correct.
   */
  static invalidFilter(
    parameter: string,
    message: string,
    invalidValues: readonly string[],
    acceptedValues: readonly string[]
  ): ApiError {
    return new ApiError(
      ApiErrorCode.INVALID_FILTER,
      message,
      400,
      false,
      {
        parameter,
        invalid_values: [...invalidValues],
        accepted_values: [...acceptedValues]
      }
    );
  }

  static invalidTenant(tenantId: unknown, jobId?: string): ApiError {
    const shown = typeof tenantId === 'string' ? `'${tenantId}'` : String(tenantId);
    return new ApiError(
      ApiErrorCode.INVALID_TENANT,
      `Tenant id ${shown} is empty or malformed; file operations require the job's own tenant`,
      400,
      false,
      jobId ? { job_id: jobId } : undefined
    );
  }

  static unauthorized(message: string = 'Authorization token not found. Provide Bearer token in Authorization header.'): ApiError {
    return new ApiError(ApiErrorCode.UNAUTHORIZED, message, 401, false);
  }

  static forbidden(message: string): ApiError {
    return new ApiError(ApiErrorCode.FORBIDDEN, message, 403, false);
  }

  static notFound(message: string, details?: Record<string, unknown>): ApiError {
    return new ApiError(ApiErrorCode.NOT_FOUND, message, 404, false, details);
  }

  static upstreamError(message: string, upstreamStatus?: number, details?: Record<string, unknown>): ApiError {
    return new ApiError(
      ApiErrorCode.UPSTREAM_ERROR,
      message,
      502,
      false,
      { ...details, ...(upstreamStatus !== undefined && { upstream_status: upstreamStatus }) }
    );
  }

  static upstreamUnavailable(message: string, upstreamStatus?: number, details?: Record<string, unknown>): ApiError {
    return new ApiError(
      ApiErrorCode.UPSTREAM_UNAVAILABLE,
      message,
      502,
      true,
      { ...details, ...(upstreamStatus !== undefined && { upstream_status: upstreamStatus }) }
    );
  }

  static upstreamTimeout(message: string, details?: Record<string, unknown>): ApiError {
    return new ApiError(ApiErrorCode.UPSTREAM_TIMEOUT, message, 504, true, details);
  }

  /**
   * Raised on a download stream after bytes have already reached the caller.
   * Never retried: the response is committed.
   */
  static streamInterrupted(message: string, details?: Record<string, unknown>): ApiError {
    return new ApiError(ApiErrorCode.STREAM_INTERRUPTED, message, 502, false, details);
  }

  static requestCancelled(): ApiError {
    return new ApiError(
      ApiErrorCode.REQUEST_CANCELLED,
      'Request cancelled by caller',
      499,
      false
    );
  }

  static rateLimited(): ApiError {
    return new ApiError(
      ApiErrorCode.RATE_LIMITED,
      'Too many requests. Please slow down.',
      429,
      true
    );
  }
}

/**
 * Convert anything thrown into an ApiError
 */
export function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) {
    return error;
  }

  return new ApiError(
    ApiErrorCode.INTERNAL_ERROR,
    error instanceof Error ? error.message : 'Unknown error occurred',
    500,
    false,
    { originalError: error instanceof Error ? error.name : typeof error }
  );
}

/**
 * Log error with structured format
 */
export function logError(error: Error, context: string, metadata?: Record<string, unknown>): void {
  const logEntry = {
    timestamp: new Date().toISOString(),
    context,
    error: {
      name: error.name,
      message: error.message,
      ...(error instanceof ApiError && { code: error.code })
    },
    ...(metadata && { metadata })
  };

  console.error('[Error]', JSON.stringify(logEntry));
}

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  const error = ApiError.notFound(`Cannot ${req.method} ${req.path}`);
  res.status(error.statusCode).json(error.toJSON());
}

/**
 * Express error middleware
 *
 * Renders every ApiError in the standard `{ error: {...} }` envelope.
 * A cancelled request has nobody to answer, and a committed response
 * (a download that already started) can only be cut off.
 */
export function errorMiddleware(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const apiError = toApiError(err);

  if (apiError.code === ApiErrorCode.REQUEST_CANCELLED) {
    console.log(formatLogWithCorrelation(req, `[Gateway] ${req.method} ${req.path} cancelled by caller`));
    if (!res.headersSent) {
      res.status(apiError.statusCode).end();
    }
    return;
  }

  if (apiError.statusCode >= 500) {
    logError(apiError, `${req.method} ${req.path}`, { correlationId: getCorrelationId(req) });
  } else {
    console.warn(formatLogWithCorrelation(req, `[Gateway] ${apiError.code}: ${apiError.message}`));
  }

  if (res.headersSent) {
    res.destroy(apiError);
    return;
  }

  res.status(apiError.statusCode).json(apiError.toJSON());
}
