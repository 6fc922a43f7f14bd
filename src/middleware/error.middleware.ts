import { randomUUID } from 'crypto';

import type { NextFunction, Request, Response } from 'express';

import { BaseError, ValidationError } from '@core/errors/index.js';
import { errorMeta, logger } from '@utils/logger.js';

interface ErrorPayload {
  message: string;
  traceId: string;
  code?: string;
  data?: unknown;
}

export const errorMiddleware = (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
  const traceId = randomUUID();
  const status = err instanceof BaseError ? err.status : 500;

  const payload: ErrorPayload = {
    message: err instanceof Error ? err.message : 'Internal error',
    traceId,
  };
  if (err instanceof BaseError) payload.code = err.code;
  if (err instanceof ValidationError && err.data !== undefined) payload.data = err.data;

  if (status >= 500) {
    logger.error('[http] unhandled error', { traceId, path: req.path, ...errorMeta(err) });
  } else {
    logger.warn('[http] request rejected', { traceId, path: req.path, status, message: payload.message });
  }

  res.status(status).json(payload);
};
