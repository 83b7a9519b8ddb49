// server/src/middlewares/rateLimit.ts
/** In-memory IP rate limiters: a fixed window for the whole API, a sliding window for auth routes. */

import type { RequestHandler } from "express";

type Bucket = { count: number; resetAt: number };

/** `tracked()` reports how many client keys are held in memory. */
export type Limiter = RequestHandler & { tracked(): number };

export const rateLimit = (opts?: { windowMs?: number; max?: number; now?: () => number }): Limiter => {
  const windowMs = opts?.windowMs ?? 15_000; // 15s window
  const max = opts?.max ?? 100; // 100 reqs per window
  const now = opts?.now ?? Date.now;
  const buckets = new Map<string, Bucket>();
  let prunedAt = 0;

  const handler: RequestHandler = (req, res, next) => {
    const key = req.ip || "unknown";
    const t = now();
    // at most one full scan per window
    if (t - prunedAt >= windowMs) {
      prunedAt = t;
      for (const [k, bucket] of buckets) if (bucket.resetAt < t) buckets.delete(k);
    }
    let b = buckets.get(key);
    if (!b || b.resetAt < t) {
      b = { count: 0, resetAt: t + windowMs };
      buckets.set(key, b);
    }
    b.count += 1;
    res.setHeader("x-ratelimit-limit", String(max));
    res.setHeader("x-ratelimit-remaining", String(Math.max(0, max - b.count)));
    res.setHeader("x-ratelimit-reset", String(Math.floor(b.resetAt / 1000)));
    if (b.count > max) {
      return res.status(429).json({ error: { code: "RATE_LIMITED", message: "Too many requests" } });
    }
    next();
  };
  return Object.assign(handler, { tracked: () => buckets.size });
};

/** Sliding window per IP, for login/refresh/logout. */
export function rateLimitIP(opts: { windowMs: number; max: number; message?: string; now?: () => number }): Limiter {
  const now = opts.now ?? Date.now;
  const hits = new Map<string, number[]>();
  let prunedAt = 0;

  const handler: RequestHandler = (req, res, next) => {
    const key = req.ip || "unknown";
    const t = now();
    const windowStart = t - opts.windowMs;

    if (t - prunedAt >= opts.windowMs) {
      prunedAt = t;
      for (const [k, stamps] of hits) {
        if (stamps[stamps.length - 1] <= windowStart) hits.delete(k);
      }
    }

    // drop old timestamps
    const recent = (hits.get(key) ?? []).filter((ts) => ts > windowStart);
    recent.push(t);
    hits.set(key, recent);

    if (recent.length > opts.max) {
      const retrySec = Math.ceil((recent[0] + opts.windowMs - t) / 1000);
      return res.status(429).json({
        error: {
          code: "RATE_LIMIT",
          message: opts.message || "Too many attempts, try again later.",
          retryAfterSeconds: Math.max(retrySec, 1),
        },
      });
    }
    next();
  };
  return Object.assign(handler, { tracked: () => hits.size });
}
