import type { JWTPayload } from 'jose';
import type { OAuthContext } from '../../types/hono.js';
import type { TokenResponse } from '../../types/oauth.js';
import type { TokenRequest } from '../../types/token-request.js';
import type { ActorClaim } from '../../types/token.js';
import type { Tenant } from '../../types/tenant.js';
import type { IRevokedTokenStorage, ISigningKeyStorage, IUserStore } from '../../storage/interfaces/index.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { tokenService } from '../../services/token-service.js';
import { scopeService } from '../../services/scope-service.js';
import { verifyJwt } from '../../crypto/jwt.js';
import { componentLogger } from '../../logging/logger.js';
import { parseActorClaim } from '../../services/access-token-verifier.js';
import { SUPPORTED_SUBJECT_TOKEN_TYPES, TOKEN_TYPE_ID_ACCESS_TOKEN } from '../../config/constants.js';

export interface TokenExchangeHandlerOptions {
  signingKeys: ISigningKeyStorage;
  revokedTokens: IRevokedTokenStorage;
  users: IUserStore;
}

function isSupportedTokenType(value: string): boolean {
  return (SUPPORTED_SUBJECT_TOKEN_TYPES as readonly string[]).includes(value);
}

/**
 * Handle token exchange (delegation and impersonation)
 *
 * RFC 8693 Section 2
 */
export function createTokenExchangeHandler(options: TokenExchangeHandlerOptions) {
  const { signingKeys, revokedTokens, users } = options;

  async function verifyToken(token: string, tenant: Tenant, parameter: string): Promise<JWTPayload & { sub: string }> {
    const keys = await signingKeys.getValidationKeys(tenant.id);

    let payload: JWTPayload;
    try {
      payload = await verifyJwt(token, { keys }, { issuer: tenant.issuer });
    } catch (error) {
      componentLogger('grant').debug({ err: error, parameter }, 'Token exchange input rejected');
      throw OAuthError.invalidGrant(`Invalid ${parameter}`);
    }

    const { sub, jti } = payload;
    if (!sub) {
      throw OAuthError.invalidGrant(`${parameter} has no subject`);
    }
    if (jti && (await revokedTokens.isRevoked(tenant.id, jti))) {
      throw OAuthError.invalidGrant(`${parameter} has been revoked`);
    }

    return { ...payload, sub };
  }

  return async (c: OAuthContext, request: TokenRequest): Promise<TokenResponse> => {
    const tenant = c.get('tenant');
    const signingKey = c.get('signingKey');
    const { client } = request;

    if (!request.subjectToken || !request.subjectTokenType) {
      throw OAuthError.invalidRequest('subject_token and subject_token_type are required');
    }
    if (!isSupportedTokenType(request.subjectTokenType)) {
      throw OAuthError.invalidRequest(`Unsupported subject_token_type: ${request.subjectTokenType}`);
    }
    if (request.requestedTokenType && request.requestedTokenType !== TOKEN_TYPE_ID_ACCESS_TOKEN) {
      throw OAuthError.invalidRequest(`Unsupported requested_token_type: ${request.requestedTokenType}`);
    }
    if (request.actorToken && !request.actorTokenType) {
      throw OAuthError.invalidRequest('actor_token_type is required with actor_token');
    }
    if (request.actorTokenType && !request.actorToken) {
      throw OAuthError.invalidRequest('actor_token_type must not be sent without actor_token');
    }
    if (request.actorTokenType && !isSupportedTokenType(request.actorTokenType)) {
      throw OAuthError.invalidRequest(`Unsupported actor_token_type: ${request.actorTokenType}`);
    }

    const subject = await verifyToken(request.subjectToken, tenant, 'subject_token');

    let act: ActorClaim | undefined;
    if (request.actorToken) {
      const actor = await verifyToken(request.actorToken, tenant, 'actor_token');
      const prior = parseActorClaim(subject['act']);
      act = prior ? { sub: actor.sub, act: prior } : { sub: actor.sub };
    }

    const subjectScopes = scopeService.parseScopes(typeof subject['scope'] === 'string' ? subject['scope'] : undefined);
    let scopes = subjectScopes;
    if (request.requestedScopes.length > 0) {
      if (!scopeService.isSubset(request.requestedScopes, subjectScopes)) {
        throw OAuthError.invalidScope('Requested scopes exceed those of the subject_token');
      }
      scopes = request.requestedScopes;
    }

    const user = (await users.findById(tenant.id, subject.sub)) ?? undefined;

    componentLogger('grant').info(
      { clientId: client.clientId, sub: subject.sub, actor: act?.sub },
      'Token exchanged'
    );

    // No refresh or ID token: the result is a narrower access token only
    return tokenService.issue({
      tenant,
      signingKey,
      client,
      subjectId: subject.sub,
      scopes,
      resources: request.resource,
      sessionId: typeof subject['sid'] === 'string' ? subject['sid'] : undefined,
      authTime: user?.authTime,
      dpopJkt: request.dpopKeyThumbprint,
      act,
      issuedTokenType: TOKEN_TYPE_ID_ACCESS_TOKEN,
    });
  };
}
