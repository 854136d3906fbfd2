/**
 * Global Error Handler Middleware
 * Layer: Interfaces (HTTP)
 *
 * Registered last. Express 5 forwards rejected promises from async handlers
 * here, so controllers simply throw.
 *
 *   - AppError (operational): logged at warn with its status code; the
 *     caller gets that status and the error message. Upstream failures
 *     (TransportError, UnexpectedStatusError, DecodeError) arrive as 502/504.
 *   - Anything else: logged at error; the caller gets a generic 500.
 *
 * Four parameters are required for Express to treat this as an error handler.
 */
import { logger } from '@core/logger';
import { AppError, UnexpectedStatusError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';

export function errorHandler(err: Error, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof AppError) {
    logger.warn(
      {
        statusCode: err.statusCode,
        error: err.name,
        message: err.message,
        ...(err instanceof UnexpectedStatusError && { upstreamStatus: err.status }),
      },
      'Operational error',
    );
    res.status(err.statusCode).json({
      status: 'error',
      message: err.message,
    });
    return;
  }

  logger.error({ err }, 'Unhandled error');
  res.status(500).json({
    status: 'error',
    message: 'Internal server error',
  });
}
