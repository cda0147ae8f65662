/**
 * Rate Limiting Middleware
 *
 * Fixed-window request counting per client IP.
 */

import { HttpRequest } from '../http/request.ts';
import { HttpResponse } from '../http/response.ts';
import type { RequestSource } from '../http/types.ts';
import type { ListenerMiddleware } from './registry.ts';

export interface RateLimitOptions {
  /** Time window in milliseconds */
  windowMs?: number;
  /** Max requests per window; 0 or less disables limiting */
  max?: number;
  keyGenerator?: (req: RequestSource) => string;
  /** Send X-RateLimit-* headers */
  headers?: boolean;
  /** Clock, in milliseconds */
  now?: () => number;
}

const DEFAULT_OPTIONS: Required<RateLimitOptions> = {
  windowMs: 1000,
  max: 100,
  keyGenerator: (req) => new HttpRequest(req).ip,
  headers: true,
  now: () => Date.now(),
};

interface RateLimitEntry {
  count: number;
  resetTime: number;
}

/**
 * In-memory rate limit store
 */
export class RateLimitStore {
  private store = new Map<string, RateLimitEntry>();
  private cleanupInterval: NodeJS.Timeout;
  private readonly now: () => number;

  constructor(windowMs: number, now: () => number = Date.now) {
    this.now = now;
    // Clean up expired entries periodically
    this.cleanupInterval = setInterval(() => {
      this.cleanup();
    }, windowMs);
    this.cleanupInterval.unref();
  }

  get size(): number {
    return this.store.size;
  }

  increment(key: string, windowMs: number): RateLimitEntry {
    const now = this.now();
    const existing = this.store.get(key);

    if (existing && existing.resetTime > now) {
      existing.count++;
      return existing;
    }

    const entry: RateLimitEntry = {
      count: 1,
      resetTime: now + windowMs,
    };
    this.store.set(key, entry);
    return entry;
  }

  cleanup(): void {
    const now = this.now();
    for (const [key, entry] of this.store.entries()) {
      if (entry.resetTime <= now) {
        this.store.delete(key);
      }
    }
  }

  destroy(): void {
    clearInterval(this.cleanupInterval);
    this.store.clear();
  }
}

/**
 * Create rate limiting middleware
 */
export function rateLimitMiddleware(options: RateLimitOptions = {}): ListenerMiddleware {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  if (opts.max <= 0) {
    return (next) => next;
  }

  const store = new RateLimitStore(opts.windowMs, opts.now);

  return (next) => async (req, res) => {
    const entry = store.increment(opts.keyGenerator(req), opts.windowMs);
    const remaining = Math.max(0, opts.max - entry.count);
    const response = new HttpResponse(res, new HttpRequest(req).path);

    if (opts.headers) {
      response
        .header('X-RateLimit-Limit', String(opts.max))
        .header('X-RateLimit-Remaining', String(remaining))
        .header('X-RateLimit-Reset', String(Math.ceil(entry.resetTime / 1000)));
    }

    if (entry.count > opts.max) {
      const retryAfter = Math.max(1, Math.ceil((entry.resetTime - opts.now()) / 1000));
      response.status(429).header('Retry-After', String(retryAfter)).json({ error: 'Too Many Requests' });
      return;
    }

    await next(req, res);
  };
}
