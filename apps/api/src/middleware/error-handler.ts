import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import {
  ModelNotReadyError,
  SchemaValidationError,
  isPipelineError,
} from '@transit-pulse/domain';

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
  if (err instanceof ModelNotReadyError) {
    res.status(err.status).json({ error: err.code, status: err.loadState, message: err.message });
    return;
  }
  if (err instanceof SchemaValidationError) {
    res.status(err.status).json({ error: err.code, message: err.message, details: err.issues });
    return;
  }
  if (isPipelineError(err)) {
    if (err.status >= 500) console.error(`[api] ${err.code}`, err);
    res.status(err.status).json({ error: err.code, message: err.message });
    return;
  }
  // express.json() parse failures carry a 4xx status
  if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status < 500) {
    res.status(err.status).json({ error: err.message });
    return;
  }
  console.error('[api] unhandled error', err);
  res.status(500).json({ error: 'Internal server error' });
}
