import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { ApiError } from '@/api/middleware/error.handler.js';

/**
 * Extended Express Request carrying the caller's credential
 *
 * The credential lives only on the request object: it is never copied onto
 * a client, the shared HTTP pool or anything else that outlives the request.
 */
declare global {
  namespace Express {
    interface Request {
      credential?: string;
      callerSubject?: string;
    }
  }
}

const MAX_TOKEN_LENGTH = 8192;

/**
 * Extract bearer token from request
 * SECURITY: Only accepts the Bearer scheme from the Authorization header
 */
export function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader || authHeader.length === 0) {
    return null;
  }

  const parts = authHeader.split(' ');

  if (parts.length !== 2 || parts[0] !== 'Bearer') {
    return null;
  }

  const token = parts[1];

  if (token.length === 0 || token.length > MAX_TOKEN_LENGTH) {
    return null;
  }

  return token;
}

/**
 * Best-effort subject for request logs.
 *
 * The gateway cannot verify the token (the job service does that), so the
 * payload is only decoded, never trusted for authorization.
 */
export function describeCaller(token: string): string | undefined {
  const decoded = jwt.decode(token);

  if (decoded && typeof decoded === 'object' && typeof decoded.sub === 'string') {
    return decoded.sub;
  }

  return undefined;
}

/**
 * Express middleware requiring `Authorization: Bearer <token>`
 *
 * Rejects with UNAUTHORIZED before any upstream call when the header is
 * missing or malformed. The token itself is passed through untouched.
 */
export function requireBearerToken(req: Request, _res: Response, next: NextFunction): void {
  const token = extractBearerToken(req.headers.authorization);

  if (!token) {
    next(ApiError.unauthorized(
      req.headers.authorization
        ? "Invalid authorization header format. Expected 'Bearer <token>'"
        : undefined
    ));
    return;
  }

  req.credential = token;
  req.callerSubject = describeCaller(token);

  next();
}

/**
 * Read the credential attached by requireBearerToken
 */
export function getCredential(req: Request): string {
  if (!req.credential) {
    throw ApiError.unauthorized();
  }
  return req.credential;
}
