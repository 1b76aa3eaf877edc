import type { OAuthContext } from '../../types/hono.js';
import type { TokenResponse } from '../../types/oauth.js';
import type { TokenRequest } from '../../types/token-request.js';
import type { IAuthorizationCodeStorage, IRefreshTokenStorage, IUserStore } from '../../storage/interfaces/index.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { tokenService } from '../../services/token-service.js';
import { pkceValidator } from '../../validation/pkce-validator.js';
import { toOAuthError } from '../../validation/validation-result.js';
import { componentLogger } from '../../logging/logger.js';

export interface AuthorizationCodeHandlerOptions {
  authorizationCodeStorage: IAuthorizationCodeStorage;
  refreshTokenStorage: IRefreshTokenStorage;
  users: IUserStore;
}

/**
 * Handle authorization code token exchange
 *
 * RFC 6749 Section 4.1.3, RFC 7636 Section 4.6, RFC 9449 Section 10
 */
export function createAuthorizationCodeHandler(options: AuthorizationCodeHandlerOptions) {
  const { authorizationCodeStorage, refreshTokenStorage, users } = options;

  return async (c: OAuthContext, request: TokenRequest): Promise<TokenResponse> => {
    const tenant = c.get('tenant');
    const signingKey = c.get('signingKey');
    const { client } = request;

    if (!request.code) {
      throw OAuthError.invalidRequest('code is required');
    }

    // Consume first so a replayed code is burned even when later checks fail
    const authCode = await authorizationCodeStorage.consume(tenant.id, request.code);
    if (!authCode) {
      throw OAuthError.invalidGrant('Invalid or expired authorization code');
    }

    if (authCode.clientId !== client.clientId) {
      componentLogger('grant').warn(
        { clientId: client.clientId, codeClientId: authCode.clientId },
        'Authorization code presented by another client'
      );
      throw OAuthError.invalidGrant('Authorization code was issued to a different client');
    }

    // Only required when the authorization request carried one; if sent anyway it must match
    if ((authCode.redirectUriSent || request.redirectUri !== undefined) && authCode.redirectUri !== request.redirectUri) {
      throw OAuthError.invalidGrant('redirect_uri does not match');
    }

    if (authCode.codeChallenge) {
      const verified = pkceValidator.validateCodeVerifier(
        request.codeVerifier,
        authCode.codeChallenge,
        authCode.codeChallengeMethod
      );
      if (!verified.ok) {
        throw toOAuthError(verified.error);
      }
    } else if (client.requirePkce || request.codeVerifier) {
      throw OAuthError.invalidGrant('No code_challenge was sent with the authorization request');
    }

    if (authCode.dpopJkt && authCode.dpopJkt !== request.dpopKeyThumbprint) {
      throw OAuthError.invalidGrant('DPoP key does not match the key bound to the authorization code');
    }

    const user = (await users.findById(tenant.id, authCode.subjectId)) ?? undefined;

    return tokenService.issue({
      tenant,
      signingKey,
      client,
      subjectId: authCode.subjectId,
      user,
      scopes: authCode.grantedScopes,
      resources: request.resource,
      nonce: authCode.nonce,
      authTime: authCode.authTime,
      acr: authCode.acr,
      amr: authCode.amr,
      sessionId: authCode.sessionId,
      dpopJkt: request.dpopKeyThumbprint,
      extraClaims: authCode.claims,
      refreshTokenStorage,
    });
  };
}
