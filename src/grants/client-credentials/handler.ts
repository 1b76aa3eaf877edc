import type { OAuthContext } from '../../types/hono.js';
import type { TokenResponse } from '../../types/oauth.js';
import type { TokenRequest } from '../../types/token-request.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { tokenService } from '../../services/token-service.js';
import { scopeService } from '../../services/scope-service.js';

/**
 * Handle client credentials token request
 *
 * RFC 6749 Section 4.4
 */
export function createClientCredentialsHandler() {
  return async (c: OAuthContext, request: TokenRequest): Promise<TokenResponse> => {
    const tenant = c.get('tenant');
    const signingKey = c.get('signingKey');
    const { client } = request;

    if (client.clientType !== 'confidential') {
      throw OAuthError.unauthorizedClient('Client credentials grant requires a confidential client');
    }

    // No end-user here, so identity scopes (openid, offline_access, ...) never apply
    const requested = request.requestedScopes.length > 0 ? request.requestedScopes : client.allowedScopes;
    const scopes = requested.filter((scope) => !scopeService.isIdentityScope(scope));

    return tokenService.issue({
      tenant,
      signingKey,
      client,
      subjectId: client.clientId,
      scopes,
      resources: request.resource,
      dpopJkt: request.dpopKeyThumbprint,
    });
  };
}
