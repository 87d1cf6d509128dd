import { NextFunction, Request, Response } from 'express';
import { ZodTypeAny } from 'zod';
import { formatZodIssues } from '../utils/validation.js';

/** Replaces `req.body` with the parsed value, or answers 400 with every issue. */
export function validateBody(schema: ZodTypeAny) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      return res.status(400).json({ error: 'Validation failed', errors: formatZodIssues(result.error) });
    }
    req.body = result.data;
    return next();
  };
}
