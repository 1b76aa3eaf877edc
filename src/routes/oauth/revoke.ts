import { Hono } from 'hono';
import type { OAuthEnv } from '../../types/hono.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { AccessTokenVerifier } from '../../services/access-token-verifier.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { clientAuthenticator } from '../../middleware/client-authenticator.js';
import { readFormParams, splitParams } from '../../protocol/request-params.js';
import { componentLogger } from '../../logging/logger.js';

export interface RevokeRouteOptions {
  storage: IStorage;
  verifier: AccessTokenVerifier;
}

/**
 * Create token revocation endpoint routes
 *
 * POST /:tenant/connect/revocation (RFC 7009)
 */
export function createRevokeRoutes(options: RevokeRouteOptions) {
  const { storage, verifier } = options;

  const router = new Hono<OAuthEnv>();

  router.post('/', clientAuthenticator({ clientStorage: storage.clients }), async (c) => {
    const tenant = c.get('tenant');
    const client = c.get('client');
    if (!client) {
      throw OAuthError.invalidClient('Client authentication required');
    }

    const { form } = splitParams(await readFormParams(c));
    const token = form['token'];
    const hint = form['token_type_hint'];
    if (!token) {
      throw OAuthError.invalidRequest('token is required');
    }

    const log = componentLogger('revocation');

    // Unknown, invalid and foreign tokens all answer 200 so tokens cannot be probed
    if (hint !== 'access_token') {
      const refreshToken = await storage.refreshTokens.findByValue(tenant.id, token);
      if (refreshToken) {
        if (refreshToken.clientId === client.clientId) {
          await storage.refreshTokens.revoke(refreshToken.id);
          log.info({ tenant: tenant.slug, clientId: client.clientId }, 'Refresh token revoked');
        }
        return c.body(null, 200);
      }
    }

    const check = await verifier.verify(token, tenant);
    if (check.valid && check.payload.client_id === client.clientId) {
      await storage.revokedTokens.revoke(tenant.id, check.payload.jti, 'access_token', new Date(check.payload.exp * 1000));
      log.info({ tenant: tenant.slug, clientId: client.clientId, jti: check.payload.jti }, 'Access token revoked');
    }

    return c.body(null, 200);
  });

  return router;
}
