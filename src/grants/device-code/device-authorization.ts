import type { OAuthContext } from '../../types/hono.js';
import type { DeviceAuthorizationResponse } from '../../types/oauth.js';
import type { ValidatedClient } from '../../types/client.js';
import type { IDeviceCodeStorage } from '../../storage/interfaces/index.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { scopeService } from '../../services/scope-service.js';
import { scopeValidator } from '../../validation/scope-validator.js';
import { toOAuthError } from '../../validation/validation-result.js';
import { GRANT_TYPE_DEVICE_CODE } from '../../config/constants.js';

export interface DeviceAuthorizationHandlerOptions {
  deviceCodeStorage: IDeviceCodeStorage;
  /** Where users enter the code, e.g. https://id.example.com/device */
  verificationUri: string;
}

/**
 * Handle device authorization request (POST /:tenant/connect/deviceauthorization)
 *
 * RFC 8628 Section 3.1-3.2
 */
export function createDeviceAuthorizationHandler(options: DeviceAuthorizationHandlerOptions) {
  const { deviceCodeStorage, verificationUri } = options;

  return async (
    c: OAuthContext,
    client: ValidatedClient,
    scope: string | undefined
  ): Promise<DeviceAuthorizationResponse> => {
    const tenant = c.get('tenant');

    if (!client.allowedGrantTypes.includes(GRANT_TYPE_DEVICE_CODE)) {
      throw OAuthError.unauthorizedClient('Client is not authorized for device code grant');
    }

    const requestedScopes = scopeService.parseScopes(scope);
    const validated = scopeValidator.validate(requestedScopes, client.allowedScopes, tenant.allowedScopes);
    if (!validated.ok) {
      throw toOAuthError(validated.error);
    }

    const interval = tenant.deviceCodeInterval;
    const { deviceCodeValue, userCode } = await deviceCodeStorage.create({
      tenantId: tenant.id,
      clientId: client.clientId,
      scope: scopeService.formatScopes(validated.value.scopes),
      expiresAt: new Date(Date.now() + client.deviceCodeLifetime * 1000),
      interval,
    });

    const complete = new URL(verificationUri);
    complete.searchParams.set('user_code', userCode);

    return {
      device_code: deviceCodeValue,
      user_code: userCode,
      verification_uri: verificationUri,
      verification_uri_complete: complete.toString(),
      expires_in: client.deviceCodeLifetime,
      interval,
    };
  };
}
