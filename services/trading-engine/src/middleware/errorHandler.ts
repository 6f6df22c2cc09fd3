import type { ErrorRequestHandler, NextFunction, Request, Response } from 'express';
import { isTradingError } from '@tiered/errors';
import { createServiceLogger } from '@tiered/logger';
import { ZodError } from 'zod';

const logger = createServiceLogger('http');

/** Status set by express's body parser on malformed or oversized payloads. */
function parserStatus(err: Error): number | undefined {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return undefined;
}

export const errorHandler: ErrorRequestHandler = (err: Error, req, res, _next) => {
  if (isTradingError(err)) {
    if (err.statusCode >= 500) {
      logger.error({ method: req.method, path: req.path, code: err.code, error: err.message }, 'Request failed');
    }
    res.status(err.statusCode).json(err.toJSON());
    return;
  }

  if (err instanceof ZodError) {
    res.status(400).json({
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid request data',
        details: err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      },
    });
    return;
  }

  const status = parserStatus(err);
  if (status !== undefined) {
    res.status(status).json({ error: { code: 'BAD_REQUEST', message: err.message } });
    return;
  }

  logger.error({ method: req.method, path: req.path, error: err.message, stack: err.stack }, 'Unhandled error');

  res.status(500).json({
    error: {
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    },
  });
};

export function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<void>) {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res, next).catch(next);
  };
}
