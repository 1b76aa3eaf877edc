import type { OAuthContext } from '../../types/hono.js';
import type { TokenResponse } from '../../types/oauth.js';
import type { TokenRequest } from '../../types/token-request.js';
import type { IDeviceCodeStorage, IRefreshTokenStorage, IUserStore } from '../../storage/interfaces/index.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { tokenService } from '../../services/token-service.js';
import { scopeService } from '../../services/scope-service.js';

export interface DeviceCodeHandlerOptions {
  deviceCodeStorage: IDeviceCodeStorage;
  refreshTokenStorage: IRefreshTokenStorage;
  users: IUserStore;
}

/**
 * Handle device code token request (polling)
 *
 * RFC 8628 Section 3.4-3.5
 */
export function createDeviceCodeHandler(options: DeviceCodeHandlerOptions) {
  const { deviceCodeStorage, refreshTokenStorage, users } = options;

  return async (c: OAuthContext, request: TokenRequest): Promise<TokenResponse> => {
    const tenant = c.get('tenant');
    const signingKey = c.get('signingKey');
    const { client } = request;

    if (!request.deviceCode) {
      throw OAuthError.invalidRequest('device_code is required');
    }

    const deviceCode = await deviceCodeStorage.findByValue(tenant.id, request.deviceCode);
    if (!deviceCode) {
      throw OAuthError.invalidGrant('Invalid device code');
    }

    if (deviceCode.clientId !== client.clientId) {
      throw OAuthError.invalidGrant('Device code was issued to a different client');
    }

    if (deviceCode.expiresAt < new Date()) {
      await deviceCodeStorage.consume(deviceCode.id);
      throw OAuthError.expiredToken();
    }

    const canPoll = await deviceCodeStorage.updateLastPolled(deviceCode.id);
    if (!canPoll) {
      throw OAuthError.slowDown();
    }

    switch (deviceCode.status) {
      case 'pending':
        throw OAuthError.authorizationPending();
      case 'denied':
        await deviceCodeStorage.consume(deviceCode.id);
        throw OAuthError.accessDenied('User denied authorization');
      case 'expired':
        await deviceCodeStorage.consume(deviceCode.id);
        throw OAuthError.expiredToken();
      case 'authorized':
        break;
    }

    if (!deviceCode.userId) {
      throw OAuthError.serverError('Device code authorized but no user recorded');
    }

    // Single use
    await deviceCodeStorage.consume(deviceCode.id);

    const user = (await users.findById(tenant.id, deviceCode.userId)) ?? undefined;

    return tokenService.issue({
      tenant,
      signingKey,
      client,
      subjectId: deviceCode.userId,
      user,
      scopes: scopeService.parseScopes(deviceCode.scope),
      resources: request.resource,
      dpopJkt: request.dpopKeyThumbprint,
      refreshTokenStorage,
    });
  };
}
