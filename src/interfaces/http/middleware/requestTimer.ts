/**
 * Request Timer Middleware
 * Layer: Interfaces (HTTP)
 *
 * Stamps req.requestStartTime as the request enters the pipeline; the
 * catalog controller reports totalTimeMs from it next to upstreamTimeMs.
 * Registered first so body parsing and logging are inside the measurement.
 */
import type { NextFunction, Request, Response } from 'express';

export function requestTimer(req: Request, _res: Response, next: NextFunction): void {
  req.requestStartTime = Date.now();
  next();
}
