import { NextFunction, Request, Response } from 'express';
import { logger } from '../lib/logger.js';
import { AppError, PreconditionError, ValidationError } from '../utils/errors.js';

/** Writes the JSON body for a failed request. Unknown errors become a generic 500. */
export function sendError(res: Response, err: unknown, fallback = 'Something went wrong'): Response {
  if (err instanceof ValidationError) {
    return res.status(err.status).json({ error: err.message, errors: err.errors, data: err.data });
  }
  if (err instanceof PreconditionError) {
    return res.status(err.status).json({ error: err.message, redirectTo: err.redirectTo });
  }
  if (err instanceof AppError) {
    return res.status(err.status).json({ error: err.message });
  }

  logger.error({ err }, fallback);
  return res.status(500).json({ error: fallback });
}

export function notFound(_req: Request, res: Response) {
  res.status(404).json({ error: 'Route not found' });
}

// Express recognises error handlers by their four parameters
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof SyntaxError) {
    return res.status(400).json({ error: 'Malformed request body' });
  }
  return sendError(res, err);
}
