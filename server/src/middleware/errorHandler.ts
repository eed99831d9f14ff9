import { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { isGameError } from '../lib/errors';

function isJsonSyntaxError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export function notFoundHandler(_req: Request, res: Response) {
  res.status(404).json({ error: 'NotFound', message: 'Route not found' });
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (isGameError(err)) {
    return res.status(err.status).json({ error: err.kind, message: err.message });
  }
  if (err instanceof ZodError) {
    return res.status(400).json({ error: 'invalid_input', details: err.issues });
  }
  if (isJsonSyntaxError(err)) {
    return res.status(400).json({ error: 'invalid_json' });
  }
  console.error(`[http] ${req.method} ${req.originalUrl} failed`, err);
  return res.status(500).json({ error: 'internal_error' });
}
