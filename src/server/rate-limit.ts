import { RateLimitError } from "../lib/errors.js";

import type { SlidingWindowLimiter } from "../lib/rate-limiter.js";
import type { NextFunction, Request, RequestHandler, Response } from "express";

/**
 * Express middleware charging each request against `bucket`, keyed by caller address
 */
export function rateLimit(limiter: SlidingWindowLimiter, bucket: string): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const decision = limiter.check(req.ip ?? "unknown", bucket);
    if (decision.allowed) {
      next();
      return;
    }
    next(new RateLimitError(bucket, decision.retryAfterSeconds));
  };
}
