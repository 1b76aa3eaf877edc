import type { OAuthContext } from '../../types/hono.js';
import type { TokenResponse } from '../../types/oauth.js';
import type { TokenRequest } from '../../types/token-request.js';
import type { IRefreshTokenStorage, IUserStore } from '../../storage/interfaces/index.js';
import type { CibaService } from '../../ciba/ciba-service.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { tokenService } from '../../services/token-service.js';

export interface CibaHandlerOptions {
  cibaService: CibaService;
  refreshTokenStorage: IRefreshTokenStorage;
  users: IUserStore;
}

/**
 * Handle the CIBA grant (poll mode token request)
 *
 * OpenID CIBA Core Sections 10.1 and 11
 */
export function createCibaHandler(options: CibaHandlerOptions) {
  const { cibaService, refreshTokenStorage, users } = options;

  return async (c: OAuthContext, request: TokenRequest): Promise<TokenResponse> => {
    const tenant = c.get('tenant');
    const signingKey = c.get('signingKey');
    const { client } = request;

    if (!request.authReqId) {
      throw OAuthError.invalidRequest('auth_req_id is required');
    }

    const status = await cibaService.getStatus(request.authReqId, client.clientId);

    switch (status.status) {
      case 'pending': {
        const withinInterval = await cibaService.recordPoll(request.authReqId);
        if (!withinInterval) {
          throw OAuthError.slowDown();
        }
        throw OAuthError.authorizationPending('The user has not yet completed authentication');
      }
      case 'denied':
        throw OAuthError.accessDenied(status.errorDescription ?? 'The user denied the authentication request');
      case 'expired':
        throw OAuthError.expiredToken(status.errorDescription ?? 'The auth_req_id has expired');
      case 'consumed':
        throw OAuthError.invalidGrant('The auth_req_id has already been used');
      case 'approved':
        break;
    }

    // Two pollers can both see approved; only one wins the consume
    const consumed = await cibaService.consumeApproved(request.authReqId);
    if (!consumed) {
      throw OAuthError.invalidGrant('The auth_req_id has already been used');
    }

    const user = (await users.findById(tenant.id, consumed.subjectId)) ?? undefined;

    return tokenService.issue({
      tenant,
      signingKey,
      client,
      subjectId: consumed.subjectId,
      user,
      scopes: consumed.requestedScopes,
      resources: request.resource,
      acr: consumed.acrValues,
      sessionId: consumed.sessionId,
      authTime: consumed.completedAt ? Math.floor(consumed.completedAt.getTime() / 1000) : undefined,
      dpopJkt: request.dpopKeyThumbprint,
      refreshTokenStorage,
    });
  };
}
