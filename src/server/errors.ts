import type { ErrorRequestHandler, Request, RequestHandler, Response } from 'express';
import type { ZodError } from 'zod';
import { AppError, errorMessage } from '../errors.js';

export interface ValidationDetail {
  loc: Array<string | number>;
  msg: string;
  type: string;
}

/**
 * Convert zod issues to the `detail` list returned with 422 responses.
 */
export function toValidationDetails(error: ZodError): ValidationDetail[] {
  return error.issues.map((issue) => ({
    loc: ['body', ...issue.path],
    msg: issue.message,
    type: issue.code,
  }));
}

/**
 * Status set by body-parser and other express middleware on their errors.
 */
function middlewareStatus(error: unknown): number | undefined {
  if (!error || typeof error !== 'object' || !('status' in error)) return undefined;
  const status = error.status;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export const notFoundHandler: RequestHandler = (_req: Request, res: Response) => {
  res.status(404).json({ detail: 'Not Found' });
};

/**
 * Final error handler: known errors keep their status and detail, anything else is a 500.
 */
export const errorHandler: ErrorRequestHandler = (error: unknown, req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (error instanceof AppError) {
    const log = error.status >= 500 ? console.error : console.warn;
    log(`[Server] ${req.method} ${req.originalUrl} failed (${error.status}): ${error.message}`);
    res.status(error.status).json({ detail: error.detail });
    return;
  }

  const clientStatus = middlewareStatus(error);
  if (clientStatus !== undefined) {
    console.warn(`[Server] ${req.method} ${req.originalUrl} rejected (${clientStatus}): ${errorMessage(error)}`);
    res.status(clientStatus).json({ detail: errorMessage(error) });
    return;
  }

  console.error(`[Server] Unexpected error on ${req.method} ${req.originalUrl}:`, error);
  res.status(500).json({ detail: `An internal error occurred: ${errorMessage(error)}` });
};
