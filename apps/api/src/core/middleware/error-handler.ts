import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';

import { logger } from '../logger/index.js';
import { HttpError } from '../../shared/errors.js';

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) {
    return next(err);
  }

  if (err instanceof ZodError) {
    return res.status(400).json({
      message: 'Validation failed',
      issues: err.issues,
    });
  }

  // User-actionable errors carry their message back to the caller
  if (err instanceof HttpError && err.status < 500) {
    logger.warn({ err, status: err.status, path: req.path, method: req.method }, 'HttpError (user-actionable)');
    return res.status(err.status).json({
      message: err.message,
      requestId: req.id,
      details: err.details,
    });
  }

  if (err instanceof HttpError) {
    logger.error({ err, status: err.status, path: req.path, method: req.method }, 'HttpError (server error)');
    return res.status(err.status).json({
      message: err.message,
      requestId: req.id,
      details: err.details,
    });
  }

  const status =
    typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number' ? err.status : 500;

  logger.error(
    {
      err,
      status,
      path: req.path,
      method: req.method,
    },
    'Unhandled error',
  );

  res.status(status).json({
    message: status >= 500 || !(err instanceof Error) ? 'Internal server error' : err.message,
    requestId: req.id,
  });
};
