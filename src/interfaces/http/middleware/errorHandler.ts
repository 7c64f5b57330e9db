/**
 * Global Error Handler Middleware
 * Layer: Interfaces (HTTP)
 *
 * Sits at the very end of the middleware chain. Express 5 forwards rejected
 * promises from async handlers here, so controllers just throw.
 *
 *   - Operational AppErrors (404 no match, 400 bad query, 422 malformed
 *     record, 503 no index yet) are logged at warn and returned with their
 *     status and message.
 *   - Everything else, including non-operational AppErrors such as a
 *     LayoutError, is logged at error and answered with a generic 500.
 *
 * Express recognizes an error handler by its four parameters.
 */
import { logger } from '@core/logger';
import { AppError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError && err.isOperational) {
    logger.warn({ statusCode: err.statusCode, message: err.message }, 'Operational error');
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
