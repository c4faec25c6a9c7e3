/**
 * API middleware: request logging and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { apiError, errorMessage, getHttpStatus, internalError, isRenderServiceError } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';

/** Log one line per finished request. */
export function requestLogger(log: Logger = rootLogger) {
  const httpLog = log.child({ module: 'http' });
  return (req: Request, res: Response, next: NextFunction) => {
    const startedAt = Date.now();
    res.on('finish', () => {
      httpLog.debug('Request completed', {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - startedAt,
      });
    });
    next();
  };
}

/** Body-parser failures carry an HTTP status of their own. */
function statusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

/** Global error handling middleware. */
export function errorHandler(log: Logger = rootLogger) {
  // Express recognises error middleware by its four parameters.
  return (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isRenderServiceError(err)) {
      const status = getHttpStatus(err.typedError);
      log.warn('Request error', { code: err.typedError.code, status });
      res.status(status).json(apiError(err.typedError));
      return;
    }

    const status = statusOf(err);
    if (status !== undefined && status >= 400 && status < 500) {
      const message = errorMessage(err);
      log.warn('Rejected request', { status, message });
      res.status(status).json(apiError({ code: 'VALIDATION.REQUEST', message, retryable: false }));
      return;
    }

    const message = errorMessage(err);
    log.error('Unhandled request error', { err });
    res.status(500).json(apiError(internalError(message)));
  };
}
