/**
 * Party Registry API — Rate Limiting Middleware
 *
 * Fixed-window in-memory limiter.  Requests are counted per client IP;
 * the X-Identity header is client-asserted and never part of the key.
 *
 * @module api/middleware/rate-limiter
 * @license AGPL-3.0-or-later
 */

import { Request, Response, NextFunction, RequestHandler } from "express";

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

export interface RateLimiterConfig {
  /** Maximum number of requests in the window */
  maxRequests: number;
  /** Window size in milliseconds */
  windowMs: number;
  /** Only count requests with these methods (default: all) */
  methods?: string[];
}

function clientKey(req: Request): string {
  return req.ip || req.socket.remoteAddress || "unknown";
}

/**
 * Creates a rate limiter middleware.
 *
 * @example
 * ```typescript
 * // 10 party creations per hour
 * router.use(createRateLimiter({ maxRequests: 10, windowMs: 3600000, methods: ["POST"] }));
 * ```
 */
export function createRateLimiter(config: RateLimiterConfig): RequestHandler {
  const store = new Map<string, RateLimitEntry>();

  const cleanupInterval = setInterval(() => {
    const now = Date.now();
    for (const [key, entry] of store.entries()) {
      if (entry.resetAt <= now) {
        store.delete(key);
      }
    }
  }, 5 * 60 * 1000);
  cleanupInterval.unref();

  return (req: Request, res: Response, next: NextFunction): void => {
    if (config.methods && !config.methods.includes(req.method)) {
      next();
      return;
    }

    const key = clientKey(req);
    const now = Date.now();

    let entry = store.get(key);
    if (!entry || entry.resetAt <= now) {
      entry = { count: 0, resetAt: now + config.windowMs };
      store.set(key, entry);
    }

    entry.count++;

    const remaining = Math.max(0, config.maxRequests - entry.count);
    res.setHeader("X-RateLimit-Limit", config.maxRequests);
    res.setHeader("X-RateLimit-Remaining", remaining);
    res.setHeader("X-RateLimit-Reset", Math.ceil(entry.resetAt / 1000));

    if (entry.count > config.maxRequests) {
      res.status(429).json({
        error: "RATE_LIMITED",
        message: "Too many requests. Please try again later.",
        details: {
          retry_after_ms: entry.resetAt - now,
        },
      });
      return;
    }

    next();
  };
}

/**
 * Builds the limiter set used by the app.  A fresh set per app keeps
 * separate app instances from sharing counters.
 */
export function createRateLimiters() {
  return {
    /** Reads: 120 requests per minute */
    read: createRateLimiter({ maxRequests: 120, windowMs: 60 * 1000, methods: ["GET"] }),

    /** State changes: 30 requests per minute */
    write: createRateLimiter({
      maxRequests: 30,
      windowMs: 60 * 1000,
      methods: ["POST", "PATCH", "PUT", "DELETE"],
    }),

    /** Votes: 5 requests per minute */
    vote: createRateLimiter({ maxRequests: 5, windowMs: 60 * 1000, methods: ["POST", "DELETE"] }),
  };
}
