import type { MiddlewareHandler } from 'hono';
import type { OAuthContext, OAuthEnv, RateLimitInfo } from '../types/hono.js';
import { OAuthError } from '../errors/oauth-error.js';
import { componentLogger } from '../logging/logger.js';

export interface RateLimiterOptions {
  windowMs: number; // Time window in milliseconds
  maxRequests: number; // Maximum requests per window
  keyGenerator?: (c: OAuthContext) => string;
}

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

/**
 * Client address from proxy headers, falling back to 'unknown'
 */
function clientAddress(c: OAuthContext): string {
  return c.req.header('x-forwarded-for')?.split(',')[0]?.trim() ?? c.req.header('x-real-ip') ?? 'unknown';
}

/**
 * Default key: tenant plus client address
 */
export function defaultKeyGenerator(c: OAuthContext): string {
  // Mounted before tenant resolution at the app level, so the slug comes from the path
  const tenantSlug = c.req.path.split('/')[1] || 'global';
  return `${tenantSlug}:${clientAddress(c)}`;
}

/**
 * Fixed-window in-memory rate limiter. Single instance only.
 */
export function rateLimiter(options: RateLimiterOptions): MiddlewareHandler<OAuthEnv> {
  const { windowMs, maxRequests, keyGenerator = defaultKeyGenerator } = options;
  const store = new Map<string, RateLimitEntry>();

  const cleanupInterval = setInterval(() => {
    const now = Date.now();
    for (const [key, entry] of store) {
      if (entry.resetAt <= now) {
        store.delete(key);
      }
    }
  }, windowMs);
  cleanupInterval.unref();

  return async (c, next) => {
    const key = keyGenerator(c);
    const now = Date.now();

    let entry = store.get(key);
    if (!entry || entry.resetAt <= now) {
      entry = { count: 0, resetAt: now + windowMs };
      store.set(key, entry);
    }

    const info: RateLimitInfo = {
      total: maxRequests,
      remaining: Math.max(0, maxRequests - entry.count - 1),
      reset: Math.ceil(entry.resetAt / 1000),
    };

    if (entry.count >= maxRequests) {
      const retryAfter = Math.ceil((entry.resetAt - now) / 1000);
      componentLogger('rate-limit').warn({ key, retryAfter }, 'Rate limit exceeded');
      throw new OAuthError('temporarily_unavailable', `Rate limit exceeded. Try again in ${retryAfter} seconds.`, {
        headers: {
          'Retry-After': String(retryAfter),
          'X-RateLimit-Limit': String(info.total),
          'X-RateLimit-Remaining': '0',
          'X-RateLimit-Reset': String(info.reset),
        },
      });
    }

    entry.count++;

    c.header('X-RateLimit-Limit', String(info.total));
    c.header('X-RateLimit-Remaining', String(info.remaining));
    c.header('X-RateLimit-Reset', String(info.reset));

    await next();
  };
}
