// backend/src/middleware/rateLimit.ts

import type { NextFunction, Request, Response } from "express";
import type { PipelineConfig } from "../config/pipelineConfig";
import { sendError } from "../http/sendError";

type Bucket = { count: number; resetAt: number };

function keyForReq(req: Request): string {
  return String(req.ip || req.socket?.remoteAddress || "unknown");
}

/** Fixed window per client IP, held in process memory. */
export function createRateLimitMiddleware(
  limits: PipelineConfig["rateLimit"],
  now: () => number = () => Date.now()
) {
  const buckets = new Map<string, Bucket>();

  function maybePrune(at: number) {
    if (buckets.size < 5000) return;
    for (const [k, b] of buckets) {
      if (b.resetAt <= at) buckets.delete(k);
    }
  }

  return function rateLimitMiddleware(req: Request, res: Response, next: NextFunction) {
    const key = keyForReq(req);
    const at = now();
    maybePrune(at);

    const b = buckets.get(key);
    if (!b || b.resetAt <= at) {
      buckets.set(key, { count: 1, resetAt: at + limits.windowMs });
      res.setHeader("x-rate-limit-limit", String(limits.max));
      res.setHeader("x-rate-limit-remaining", String(limits.max - 1));
      return next();
    }

    b.count += 1;

    res.setHeader("x-rate-limit-limit", String(limits.max));
    res.setHeader("x-rate-limit-remaining", String(Math.max(0, limits.max - b.count)));
    res.setHeader("x-rate-limit-reset", String(Math.ceil((b.resetAt - at) / 1000)));

    if (b.count > limits.max) {
      return sendError(res, 429, "Too many requests. Please slow down and try again.", "RATE_LIMITED");
    }

    return next();
  };
}
