/**
 * Global Error Handler Middleware
 * Layer: Interfaces (HTTP)
 *
 * Registered last. Express 5 forwards rejected promises from async handlers
 * here, so controllers just throw.
 *
 *   - Operational (AppError): logged at "warn", answered with the error's
 *     statusCode and `{ error: message }`.
 *   - Anything else: logged at "error", answered with a generic 500.
 *
 * A body that express.json() could not parse arrives as a SyntaxError
 * carrying the raw `body`; that is the client's fault and gets a 400. Other
 * body-parser rejections (413 too large, 415 unsupported charset) carry a
 * 4xx `status` and `expose: true`, and are answered with that status.
 *
 * Also exports `notFoundHandler` for requests that matched no route.
 *
 * Express recognises an error handler by its four parameters.
 */
import { logger } from '@core/logger';
import { AppError, NotFoundError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError('Route', `${req.method} ${req.path}`));
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError) {
    logger.warn({ statusCode: err.statusCode, message: err.message }, 'Operational error');
    res.status(err.statusCode).json({ error: err.message });
    return;
  }

  if (err instanceof SyntaxError && 'body' in err) {
    logger.warn({ message: err.message }, 'Malformed JSON body');
    res.status(400).json({ error: 'Malformed JSON in request body' });
    return;
  }

  if (isExposedClientError(err)) {
    logger.warn({ statusCode: err.status, message: err.message }, 'Rejected request');
    res.status(err.status).json({ error: err.message });
    return;
  }

  logger.error({ err }, 'Unhandled error');
  res.status(500).json({ error: 'Internal server error' });
}

function isExposedClientError(err: Error): err is Error & { status: number; expose: true } {
  return (
    'expose' in err &&
    err.expose === true &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  );
}
