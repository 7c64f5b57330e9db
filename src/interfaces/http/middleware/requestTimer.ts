/**
 * Request Timer Middleware
 * Layer: Interfaces (HTTP)
 *
 * Stamps the moment a request enters the pipeline; controllers report
 * totalTimeMs from it. Registered first so the measurement starts early.
 *
 * The Request augmentation lives here, next to the only code that sets the
 * field, and reaches every file that imports this module.
 */
import type { NextFunction, Request, Response } from 'express';

declare global {
  namespace Express {
    interface Request {
      /** Set by requestTimer; used to compute totalTimeMs in responses. */
      requestStartTime?: number;
    }
  }
}

export function requestTimer(req: Request, _res: Response, next: NextFunction): void {
  req.requestStartTime = Date.now();
  next();
}

/** Milliseconds since requestTimer saw this request, if it did. */
export function totalTimeMs(req: Request): number | undefined {
  return req.requestStartTime != null ? Math.round(Date.now() - req.requestStartTime) : undefined;
}
