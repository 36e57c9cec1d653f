import type { NextFunction, Request, Response } from "express";

export type RateBucket = { count: number; resetAtMs: number };

export type RateLimitOptions = {
  windowMs: number;
  max: number;
  keyPrefix: string;
  buckets?: Map<string, RateBucket>;
  now?: () => number;
};

/** Fixed-window limiter keyed by client IP. Expired buckets are swept once per window. */
export function rateLimit(opts: RateLimitOptions) {
  const buckets = opts.buckets ?? new Map<string, RateBucket>();
  const now = opts.now ?? Date.now;
  let nextSweepMs = 0;

  return (req: Request, res: Response, next: NextFunction) => {
    const at = now();
    if (at >= nextSweepMs) {
      for (const [key, bucket] of buckets) {
        if (bucket.resetAtMs <= at) buckets.delete(key);
      }
      nextSweepMs = at + opts.windowMs;
    }

    const key = `${opts.keyPrefix}:${req.ip || "unknown"}`;
    const existing = buckets.get(key);
    const bucket: RateBucket = existing && existing.resetAtMs > at ? existing : { count: 0, resetAtMs: at + opts.windowMs };

    bucket.count += 1;
    buckets.set(key, bucket);

    res.setHeader("x-ratelimit-limit", String(opts.max));
    res.setHeader("x-ratelimit-remaining", String(Math.max(0, opts.max - bucket.count)));
    res.setHeader("x-ratelimit-reset", String(Math.floor(bucket.resetAtMs / 1000)));

    if (bucket.count > opts.max) {
      res.status(429).json({ ok: false, error: "Too many requests" });
      return;
    }

    next();
  };
}
