import { Hono } from 'hono';
import type { OAuthEnv } from '../../types/hono.js';
import type { AuthorizeHandlers } from '../../grants/authorization-code/authorize.js';

export interface AuthorizeRouteOptions {
  handlers: AuthorizeHandlers;
}

/**
 * Create authorization endpoint routes
 *
 * GET/POST /:tenant/connect/authorize
 */
export function createAuthorizeRoutes(options: AuthorizeRouteOptions) {
  const { handlers } = options;

  const router = new Hono<OAuthEnv>();

  router.get('/', (c) => handlers.authorize(c));
  router.post('/', (c) => handlers.authorize(c));

  return router;
}
