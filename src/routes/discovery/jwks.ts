import { Hono } from 'hono';
import type { OAuthEnv } from '../../types/hono.js';
import type { ISigningKeyStorage } from '../../storage/interfaces/index.js';
import { HEADER_CACHE_CONTROL } from '../../config/constants.js';

export interface JwksRouteOptions {
  signingKeys: ISigningKeyStorage;
}

/**
 * Create JWKS endpoint
 *
 * GET /:tenant/.well-known/jwks
 *
 * Publishes every unexpired key so tokens signed before a rotation keep
 * verifying.
 */
export function createJwksRoutes(options: JwksRouteOptions) {
  const { signingKeys } = options;

  const router = new Hono<OAuthEnv>();

  router.get('/', async (c) => {
    const tenant = c.get('tenant');
    const keys = await signingKeys.getValidationKeys(tenant.id);

    c.header(HEADER_CACHE_CONTROL, 'public, max-age=3600');
    return c.json({ keys });
  });

  return router;
}
