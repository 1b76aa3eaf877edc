import type { OAuthContext } from '../types/hono.js';
import type { GrantType, TokenResponse } from '../types/oauth.js';
import type { TokenRequest } from '../types/token-request.js';
import type { IStorage } from '../storage/interfaces/index.js';
import type { CibaService } from '../ciba/ciba-service.js';
import { createAuthorizationCodeHandler } from './authorization-code/handler.js';
import { createClientCredentialsHandler } from './client-credentials/handler.js';
import { createRefreshTokenHandler } from './refresh-token/handler.js';
import { createDeviceCodeHandler } from './device-code/handler.js';
import { createCibaHandler } from './ciba/handler.js';
import { createTokenExchangeHandler } from './token-exchange/handler.js';
import {
  GRANT_TYPE_AUTHORIZATION_CODE,
  GRANT_TYPE_CIBA,
  GRANT_TYPE_CLIENT_CREDENTIALS,
  GRANT_TYPE_DEVICE_CODE,
  GRANT_TYPE_REFRESH_TOKEN,
  GRANT_TYPE_TOKEN_EXCHANGE,
} from '../config/constants.js';

export type GrantHandler = (c: OAuthContext, request: TokenRequest) => Promise<TokenResponse>;

export interface GrantHandlersOptions {
  storage: IStorage;
  cibaService: CibaService;
}

/**
 * One handler per supported grant type
 */
export function createGrantHandlers(options: GrantHandlersOptions): Record<GrantType, GrantHandler> {
  const { storage, cibaService } = options;

  return {
    [GRANT_TYPE_AUTHORIZATION_CODE]: createAuthorizationCodeHandler({
      authorizationCodeStorage: storage.authorizationCodes,
      refreshTokenStorage: storage.refreshTokens,
      users: storage.users,
    }),
    [GRANT_TYPE_CLIENT_CREDENTIALS]: createClientCredentialsHandler(),
    [GRANT_TYPE_REFRESH_TOKEN]: createRefreshTokenHandler({
      refreshTokenStorage: storage.refreshTokens,
      users: storage.users,
    }),
    [GRANT_TYPE_DEVICE_CODE]: createDeviceCodeHandler({
      deviceCodeStorage: storage.deviceCodes,
      refreshTokenStorage: storage.refreshTokens,
      users: storage.users,
    }),
    [GRANT_TYPE_CIBA]: createCibaHandler({
      cibaService,
      refreshTokenStorage: storage.refreshTokens,
      users: storage.users,
    }),
    [GRANT_TYPE_TOKEN_EXCHANGE]: createTokenExchangeHandler({
      signingKeys: storage.signingKeys,
      revokedTokens: storage.revokedTokens,
      users: storage.users,
    }),
  };
}
