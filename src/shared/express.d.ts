/**
 * Express Request Augmentation
 * Layer: Shared (type declarations)
 *
 * requestStartTime is stamped by the requestTimer middleware and read by the
 * catalog controller to report totalTimeMs.
 */
declare global {
  namespace Express {
    interface Request {
      requestStartTime?: number;
    }
  }
}

export {};
