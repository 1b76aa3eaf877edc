import { Hono } from 'hono';
import type { OAuthEnv } from '../../types/hono.js';
import type { IntrospectionResponse } from '../../types/oauth.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { AccessTokenVerifier } from '../../services/access-token-verifier.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { clientAuthenticator } from '../../middleware/client-authenticator.js';
import { readFormParams, splitParams } from '../../protocol/request-params.js';
import { TOKEN_TYPE_BEARER, TOKEN_TYPE_DPOP } from '../../config/constants.js';

export interface IntrospectRouteOptions {
  storage: IStorage;
  verifier: AccessTokenVerifier;
}

const INACTIVE: IntrospectionResponse = { active: false };

/**
 * Create token introspection endpoint routes
 *
 * POST /:tenant/connect/introspect (RFC 7662)
 */
export function createIntrospectRoutes(options: IntrospectRouteOptions) {
  const { storage, verifier } = options;

  const router = new Hono<OAuthEnv>();

  router.post(
    '/',
    // Introspection is for resource servers, which hold credentials
    clientAuthenticator({ clientStorage: storage.clients, allowPublicClients: false }),
    async (c) => {
      const tenant = c.get('tenant');

      const { form } = splitParams(await readFormParams(c));
      const token = form['token'];
      const hint = form['token_type_hint'];
      if (!token) {
        throw OAuthError.invalidRequest('token is required');
      }

      const usernameOf = async (userId: string | undefined): Promise<string | undefined> => {
        if (!userId) return undefined;
        const user = await storage.users.findById(tenant.id, userId);
        return user?.username;
      };

      if (hint !== 'access_token') {
        const refreshToken = await storage.refreshTokens.findByValue(tenant.id, token);
        if (refreshToken) {
          if (refreshToken.revokedAt || refreshToken.expiresAt <= new Date()) {
            return c.json(INACTIVE);
          }

          const response: IntrospectionResponse = {
            active: true,
            client_id: refreshToken.clientId,
            scope: refreshToken.scope,
            sub: refreshToken.userId,
            username: await usernameOf(refreshToken.userId),
            exp: Math.floor(refreshToken.expiresAt.getTime() / 1000),
            iat: Math.floor(refreshToken.issuedAt.getTime() / 1000),
            iss: tenant.issuer,
            cnf: refreshToken.dpopJkt ? { jkt: refreshToken.dpopJkt } : undefined,
          };
          return c.json(response);
        }
      }

      const check = await verifier.verify(token, tenant);
      if (!check.valid) {
        return c.json(INACTIVE);
      }
      const { payload } = check;

      const response: IntrospectionResponse = {
        active: true,
        scope: payload.scope,
        client_id: payload.client_id,
        username: await usernameOf(payload.sub),
        token_type: payload.cnf ? TOKEN_TYPE_DPOP : TOKEN_TYPE_BEARER,
        exp: payload.exp,
        iat: payload.iat,
        nbf: payload.nbf,
        sub: payload.sub,
        aud: payload.aud,
        iss: payload.iss,
        jti: payload.jti,
        cnf: payload.cnf,
      };

      return c.json(response);
    }
  );

  return router;
}
