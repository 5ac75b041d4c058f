/**
 * Lookup Server Middleware
 *
 * Bearer authentication, error responses and the unknown-route handler.
 * Every error response has the shape `{ ok: false, error, details? }`.
 *
 * @module lookup/middleware
 */

import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import { silentLogger, type Logger } from '../pipeline/types.js';
import { NotFoundError } from './corpus.js';

// ============================================================================
// ApiError
// ============================================================================

/**
 * Error carrying the HTTP status to respond with.
 */
export class ApiError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'ApiError';
  }

  static unauthorized(): ApiError {
    return new ApiError(401, 'Unauthorized');
  }
}

interface ErrorResponse {
  ok: false;
  error: string;
  details?: unknown;
}

export function formatZodError(error: ZodError): { field: string; message: string }[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));
}

// ============================================================================
// Authentication
// ============================================================================

/**
 * Require `Authorization: Bearer <token>` on every request.
 * Without a configured token all requests pass.
 */
export function requireBearer(token: string | undefined): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!token || req.get('authorization') === `Bearer ${token}`) {
      next();
      return;
    }
    next(ApiError.unauthorized());
  };
}

// ============================================================================
// Handlers
// ============================================================================

export function createErrorHandler(logger: Logger = silentLogger): ErrorRequestHandler {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof ZodError) {
      const response: ErrorResponse = {
        ok: false,
        error: 'Validation failed',
        details: formatZodError(err),
      };
      res.status(400).json(response);
      return;
    }

    if (err instanceof ApiError) {
      const response: ErrorResponse = { ok: false, error: err.message };
      res.status(err.statusCode).json(response);
      return;
    }

    if (err instanceof NotFoundError) {
      const response: ErrorResponse = { ok: false, error: err.message };
      res.status(404).json(response);
      return;
    }

    const message = err instanceof Error ? err.message : 'Internal server error';
    logger.error(`Unhandled error: ${message}`);

    const response: ErrorResponse = { ok: false, error: message };
    res.status(500).json(response);
  };
}

export const notFoundHandler = (_req: Request, res: Response): void => {
  const response: ErrorResponse = {
    ok: false,
    error: 'Route not found',
  };
  res.status(404).json(response);
};
