import type { OAuthContext } from '../../types/hono.js';
import type { TokenResponse } from '../../types/oauth.js';
import type { TokenRequest } from '../../types/token-request.js';
import type { IRefreshTokenStorage, IUserStore } from '../../storage/interfaces/index.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { tokenService } from '../../services/token-service.js';
import { scopeService } from '../../services/scope-service.js';
import { componentLogger } from '../../logging/logger.js';

export interface RefreshTokenHandlerOptions {
  refreshTokenStorage: IRefreshTokenStorage;
  users: IUserStore;
}

/**
 * Handle refresh token grant
 *
 * RFC 6749 Section 6
 *
 * Implements refresh token rotation with replay detection:
 * - Each refresh token can only be used once
 * - A new refresh token is issued with each refresh
 * - If a revoked token is used, the entire token family is revoked
 * - A DPoP-bound token needs a proof from the same key (RFC 9449 Section 5)
 */
export function createRefreshTokenHandler(options: RefreshTokenHandlerOptions) {
  const { refreshTokenStorage, users } = options;

  return async (c: OAuthContext, request: TokenRequest): Promise<TokenResponse> => {
    const tenant = c.get('tenant');
    const signingKey = c.get('signingKey');
    const { client } = request;

    if (!request.refreshToken) {
      throw OAuthError.invalidRequest('refresh_token is required');
    }

    const refreshToken = await refreshTokenStorage.findByValue(tenant.id, request.refreshToken);
    if (!refreshToken) {
      throw OAuthError.invalidGrant('Invalid refresh token');
    }

    if (refreshToken.clientId !== client.clientId) {
      throw OAuthError.invalidGrant('Refresh token was issued to a different client');
    }

    if (refreshToken.revokedAt) {
      // Replay of a rotated token: treat the whole family as compromised
      const revoked = await refreshTokenStorage.revokeFamily(tenant.id, refreshToken.familyId);
      componentLogger('grant').warn(
        { clientId: client.clientId, familyId: refreshToken.familyId, revoked },
        'Refresh token replay detected, family revoked'
      );
      throw OAuthError.invalidGrant('Refresh token has been revoked');
    }

    if (refreshToken.expiresAt < new Date()) {
      throw OAuthError.invalidGrant('Refresh token has expired');
    }

    if (refreshToken.dpopJkt && refreshToken.dpopJkt !== request.dpopKeyThumbprint) {
      throw OAuthError.invalidGrant('Refresh token is bound to a different DPoP key');
    }

    const originalScopes = scopeService.parseScopes(refreshToken.scope);
    let scopes = originalScopes;

    if (request.requestedScopes.length > 0) {
      const widened = request.requestedScopes.filter((scope) => !originalScopes.includes(scope));
      if (widened.length > 0) {
        throw OAuthError.invalidScope(`Cannot request scopes not in original grant: ${widened.join(', ')}`);
      }
      scopes = request.requestedScopes;
    }

    // Rotate
    await refreshTokenStorage.revoke(refreshToken.id);

    const user = refreshToken.userId ? ((await users.findById(tenant.id, refreshToken.userId)) ?? undefined) : undefined;

    return tokenService.issue({
      tenant,
      signingKey,
      client,
      subjectId: refreshToken.userId,
      user,
      scopes,
      resources: request.resource,
      sessionId: refreshToken.sessionId,
      dpopJkt: refreshToken.dpopJkt ?? request.dpopKeyThumbprint,
      refreshTokenStorage,
      parentRefreshTokenId: refreshToken.id,
      familyId: refreshToken.familyId,
    });
  };
}
