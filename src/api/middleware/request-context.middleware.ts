import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

/**
 * Extend Express Request with the per-request context
 */
declare global {
  namespace Express {
    interface Request {
      correlationId?: string;
      abortSignal?: AbortSignal;
    }
  }
}

/**
 * Correlation ID header name
 */
export const CORRELATION_HEADER = 'x-request-id';

/**
 * Extract correlation ID from request headers
 * Returns the existing correlation ID if present, null otherwise
 */
function extractCorrelationId(req: Request): string | null {
  const headerValue = req.headers[CORRELATION_HEADER];

  if (typeof headerValue === 'string' && headerValue.length > 0 && headerValue.length <= 200) {
    return headerValue;
  }

  if (Array.isArray(headerValue) && headerValue.length > 0 && headerValue[0].length > 0) {
    return headerValue[0];
  }

  return null;
}

/**
 * Middleware that sets up the context every outbound call of this request uses
 *
 * This middleware:
 * 1. Reuses the caller's x-request-id or generates a UUID v4
 * 2. Echoes the correlation ID on the response
 * 3. Creates an AbortSignal that fires when the caller disconnects before
 *    the response is finished, so in-flight upstream calls are released
 *
 * Usage:
 * ```typescript
 * import { requestContextMiddleware } from '@/api/middleware/request-context.middleware.js';
 * app.use(requestContextMiddleware);
 * ```
 */
export function requestContextMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const correlationId = extractCorrelationId(req) || randomUUID();

  req.correlationId = correlationId;
  req.headers[CORRELATION_HEADER] = correlationId;
  res.setHeader(CORRELATION_HEADER, correlationId);

  const controller = new AbortController();
  req.abortSignal = controller.signal;

  // 'close' also fires after a normal finish; only an unfinished response means the caller left
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });

  next();
}

/**
 * Helper function to get correlation ID from request
 * Returns the correlation ID or 'unknown' if not set
 */
export function getCorrelationId(req: Request): string {
  return req.correlationId || 'unknown';
}

/**
 * Helper function to add correlation ID to log messages
 */
export function formatLogWithCorrelation(req: Request, message: string): string {
  return `[${getCorrelationId(req)}] ${message}`;
}
