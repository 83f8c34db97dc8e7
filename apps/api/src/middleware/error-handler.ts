import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { IngestError } from '../services/ingest/errors.js';

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'validation_error', details: err.errors });
    return;
  }
  if (err instanceof IngestError) {
    res.status(err.status).json({ error: err.code, message: err.message });
    return;
  }
  if (err instanceof Error) {
    // body-parser errors carry their HTTP status
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    res.status(status).json({ error: err.message });
    return;
  }
  res.status(500).json({ error: 'Internal server error' });
}
