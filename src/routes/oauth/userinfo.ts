import { Hono } from 'hono';
import type { OAuthEnv, OAuthContext } from '../../types/hono.js';
import type { UserInfoResponse } from '../../types/user.js';
import type { IUserStore } from '../../storage/interfaces/index.js';
import type { AccessTokenVerifier } from '../../services/access-token-verifier.js';
import type { DPoPProofValidator } from '../../dpop/proof-validator.js';
import type { AuditSink } from '../../events/audit-events.js';
import { bearerAuth } from '../../middleware/bearer-auth.js';
import { buildUserClaims } from '../../services/token-service.js';
import { scopeService } from '../../services/scope-service.js';
import { OAuthError } from '../../errors/oauth-error.js';
import {
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  OPENID_SCOPE,
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
} from '../../config/constants.js';

export interface UserInfoRoutesOptions {
  users: IUserStore;
  verifier: AccessTokenVerifier;
  dpopValidator: DPoPProofValidator;
  audit?: AuditSink;
}

/**
 * Create UserInfo endpoint
 *
 * GET/POST /:tenant/connect/userinfo
 *
 * Returns claims about the token's subject, filtered by the granted
 * scopes. DPoP-bound tokens need a matching proof.
 *
 * OpenID Connect Core 1.0 Section 5.3
 */
export function createUserInfoRoutes(options: UserInfoRoutesOptions) {
  const { users, verifier, dpopValidator, audit } = options;

  const router = new Hono<OAuthEnv>();

  const handleUserInfo = async (c: OAuthContext) => {
    const tenant = c.get('tenant');
    const token = c.get('accessToken');
    if (!token) {
      throw OAuthError.invalidToken('Access token is required');
    }

    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    const user = await users.findById(tenant.id, token.sub);
    if (!user) {
      // Tokens from client credentials or exchange may name no user
      return c.json({ sub: token.sub });
    }

    const response: UserInfoResponse = {
      sub: user.id,
      ...buildUserClaims(user, scopeService.parseScopes(token.scope)),
    };
    return c.json(response);
  };

  const auth = bearerAuth({ verifier, dpopValidator, audit, requiredScopes: [OPENID_SCOPE] });

  // GET and POST both allowed
  router.get('/', auth, handleUserInfo);
  router.post('/', auth, handleUserInfo);

  return router;
}
