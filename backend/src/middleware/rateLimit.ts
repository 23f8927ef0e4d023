// backend/src/middleware/rateLimit.ts

import type { NextFunction, Request, Response } from "express";
import { sendError } from "../http/sendError";

type Bucket = { count: number; resetAt: number };

export type RateLimitOptions = {
  max: number;
  windowMs: number;
  now?: () => number;
};

function keyForReq(req: Request): string {
  return String(req.ip || req.socket?.remoteAddress || "unknown");
}

/** Fixed-window limiter per client IP. Buckets live in process memory. */
export function createRateLimitMiddleware({ max, windowMs, now = Date.now }: RateLimitOptions) {
  const buckets = new Map<string, Bucket>();

  function maybePrune(t: number) {
    if (buckets.size < 5000) return;
    for (const [k, b] of buckets) {
      if (b.resetAt <= t) buckets.delete(k);
    }
  }

  return function rateLimitMiddleware(req: Request, res: Response, next: NextFunction) {
    const key = keyForReq(req);
    const t = now();
    maybePrune(t);

    const b = buckets.get(key);
    if (!b || b.resetAt <= t) {
      buckets.set(key, { count: 1, resetAt: t + windowMs });
      res.setHeader("x-rate-limit-limit", String(max));
      res.setHeader("x-rate-limit-remaining", String(max - 1));
      return next();
    }

    b.count += 1;

    const remaining = Math.max(0, max - b.count);
    res.setHeader("x-rate-limit-limit", String(max));
    res.setHeader("x-rate-limit-remaining", String(remaining));
    res.setHeader("x-rate-limit-reset", String(Math.ceil((b.resetAt - t) / 1000)));

    if (b.count > max) {
      return sendError(res, 429, "Too many requests. Please slow down and try again.", "RATE_LIMITED");
    }

    return next();
  };
}
