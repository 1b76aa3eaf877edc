import type { ErrorHandler, MiddlewareHandler } from 'hono';
import { ZodError } from 'zod';
import type { OAuthEnv } from '../types/hono.js';
import { OAuthError } from '../errors/oauth-error.js';
import { ERROR_INVALID_REQUEST } from '../errors/error-codes.js';
import { componentLogger } from '../logging/logger.js';
import { getConfig } from '../config/index.js';
import { TOKEN_CACHE_CONTROL, TOKEN_PRAGMA, HEADER_CACHE_CONTROL, HEADER_PRAGMA } from '../config/constants.js';

/**
 * Global error handler
 *
 * Transforms errors into RFC 6749 Section 5.2 error responses
 */
export const oauthErrorHandler: ErrorHandler<OAuthEnv> = (err, c) => {
  const log = componentLogger('http');

  c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
  c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

  if (err instanceof OAuthError) {
    if (err.statusCode >= 500) {
      log.error({ err, path: c.req.path }, err.description);
    } else {
      log.debug({ error: err.code, description: err.description, path: c.req.path }, 'Protocol error');
    }
    for (const [name, value] of Object.entries(err.headers)) {
      c.header(name, value);
    }
    return c.json(err.toJSON(), err.statusCode);
  }

  if (err instanceof ZodError) {
    const messages = err.errors.map((issue) => issue.message).join(', ');
    return c.json({ error: ERROR_INVALID_REQUEST, error_description: messages || 'Validation failed' }, 400);
  }

  log.error({ err, method: c.req.method, path: c.req.path }, 'Unhandled error');

  // Internal messages stay in the log
  return c.json(OAuthError.serverError('An unexpected error occurred').toJSON(), 500);
};

/**
 * Security headers middleware
 */
export function securityHeaders(): MiddlewareHandler<OAuthEnv> {
  return async (c, next) => {
    await next();

    c.header('X-Frame-Options', 'DENY');
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('Referrer-Policy', 'strict-origin-when-cross-origin');

    if (c.req.path.includes('/authorize')) {
      c.header('Content-Security-Policy', "default-src 'self'; frame-ancestors 'none'; form-action 'self'");
    }

    if (getConfig().server.nodeEnv === 'production') {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}

/**
 * Request logging middleware. Never logs query strings or bodies.
 */
export function requestLogger(): MiddlewareHandler<OAuthEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    componentLogger('http').info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration: Date.now() - start,
        tenant: c.get('tenant')?.slug,
        endpoint: c.get('protocolContext')?.endpointType,
      },
      'Request completed'
    );
  };
}
