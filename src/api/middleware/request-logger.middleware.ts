import { Request, Response, NextFunction } from 'express';
import { formatLogWithCorrelation } from '@/api/middleware/request-context.middleware.js';

/**
 * Request log entry structure
 */
export interface RequestLogEntry {
  correlationId: string;
  subject?: string;
  method: string;
  path: string;
  statusCode: number;
  duration: number;
  aborted: boolean;
  timestamp: string;
}

/**
 * Format log entry as JSON string for structured logging
 */
export function formatLogEntry(entry: RequestLogEntry): string {
  return JSON.stringify(entry);
}

/**
 * Async log writer that doesn't block the request/response cycle
 */
function asyncLog(entry: RequestLogEntry): void {
  setImmediate(() => {
    console.log(`[RequestLog] ${formatLogEntry(entry)}`);
  });
}

/**
 * Request logging middleware
 *
 * Logs one line on arrival and one JSON entry when the response closes.
 *
 * SECURITY:
 * - Does not log query parameters (continuation tokens, owners)
 * - Does not log the Authorization header or any credential
 * - Subject comes from the unverified token payload and is informational only
 *
 * INTEGRATION NOTES:
 * - Must be applied AFTER requestContextMiddleware
 * - The subject is read at close time, so it may run before requireBearerToken
 */
export function requestLoggerMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const startTime = Date.now();
  // Captured before routers rewrite req.url
  const path = req.path;

  console.log(formatLogWithCorrelation(req, `${req.method} ${path}`));

  res.on('close', () => {
    asyncLog({
      correlationId: req.correlationId || 'unknown',
      subject: req.callerSubject,
      method: req.method,
      path,
      statusCode: res.statusCode,
      duration: Date.now() - startTime,
      aborted: !res.writableFinished,
      timestamp: new Date().toISOString()
    });
  });

  next();
}
