/**
 * Express Request Augmentation
 * Layer: Shared (type declarations)
 *
 * requestStartTime is set by the requestTimer middleware and read by the
 * lookup controller to compute meta.totalTimeMs.
 */
declare global {
  namespace Express {
    interface Request {
      requestStartTime?: number;
    }
  }
}

export {};
