import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { createLogger, describeError } from '@telemetry-relay/adapters';

const log = createLogger('http');

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

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
  if (err instanceof HttpError) {
    res.status(err.status).json({ error: err.message });
    return;
  }
  log.error(`unhandled request error: ${describeError(err)}`);
  res.status(500).json({ error: 'Internal server error' });
}
