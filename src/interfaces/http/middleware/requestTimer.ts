/**
 * Request Timer Middleware
 * Layer: Interfaces (HTTP)
 *
 * Stamps req.requestStartTime when the request enters the pipeline so the
 * lookup controller can report meta.totalTimeMs. Registered first.
 */
/// <reference path="../../../shared/express.d.ts" />
import type { NextFunction, Request, Response } from 'express';

export function requestTimer(req: Request, _res: Response, next: NextFunction): void {
  req.requestStartTime = Date.now();
  next();
}
