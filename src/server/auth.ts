import { createHash, timingSafeEqual } from 'crypto';
import type { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Parse an `Authorization` header into scheme and credentials.
 */
export function parseAuthorization(header: string | undefined): { scheme: string; credentials: string } | null {
  if (!header) return null;

  const match = /^(\S+)\s+(.+)$/.exec(header.trim());
  if (!match) return null;

  return { scheme: match[1], credentials: match[2].trim() };
}

/**
 * Compare two secrets without leaking their length or contents through timing.
 */
export function tokensMatch(provided: string, expected: string): boolean {
  const a = createHash('sha256').update(provided).digest();
  const b = createHash('sha256').update(expected).digest();
  return timingSafeEqual(a, b);
}

/**
 * Require `Authorization: Bearer <token>` matching the configured API token.
 *
 * A missing header or another scheme gets 403; a wrong token gets 401.
 */
export function requireBearerToken(expectedToken: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const auth = parseAuthorization(req.get('Authorization'));

    if (!auth || auth.scheme.toLowerCase() !== 'bearer') {
      res.status(403).json({ detail: 'Not authenticated' });
      return;
    }

    if (auth.scheme !== 'Bearer' || !tokensMatch(auth.credentials, expectedToken)) {
      console.warn(`[Auth] Rejected request to ${req.method} ${req.originalUrl} from ${req.ip}`);
      res
        .status(401)
        .set('WWW-Authenticate', 'Bearer')
        .json({ detail: 'Invalid or missing authentication token' });
      return;
    }

    next();
  };
}
