import { Hono } from 'hono';
import type { OAuthEnv } from '../../types/hono.js';
import type { BackchannelAuthenticationResponse } from '../../types/oauth.js';
import type { CibaAuthenticationRequest } from '../../types/ciba.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { CibaService } from '../../ciba/ciba-service.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { clientAuthenticator } from '../../middleware/client-authenticator.js';
import { readFormParams, splitParams } from '../../protocol/request-params.js';
import {
  GRANT_TYPE_CIBA,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
} from '../../config/constants.js';

export interface CibaRouteOptions {
  storage: IStorage;
  cibaService: CibaService;
}

function parseRequestedExpiry(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value) || Number(value) <= 0) {
    throw OAuthError.invalidRequest('requested_expiry must be a positive integer');
  }
  return Number(value);
}

/**
 * Read the backchannel authentication parameters from the form
 */
export function parseCibaRequest(form: Readonly<Record<string, string>>): CibaAuthenticationRequest {
  return {
    scope: form['scope'],
    loginHint: form['login_hint'],
    loginHintToken: form['login_hint_token'],
    idTokenHint: form['id_token_hint'],
    bindingMessage: form['binding_message'],
    userCode: form['user_code'],
    acrValues: form['acr_values'],
    requestedExpiry: parseRequestedExpiry(form['requested_expiry']),
    clientNotificationToken: form['client_notification_token'],
  };
}

/**
 * Create backchannel authentication endpoint routes
 *
 * POST /:tenant/connect/ciba (OpenID CIBA Core Section 7)
 */
export function createCibaRoutes(options: CibaRouteOptions) {
  const { storage, cibaService } = options;

  const router = new Hono<OAuthEnv>();

  router.post(
    '/',
    clientAuthenticator({ clientStorage: storage.clients, allowPublicClients: false }),
    async (c) => {
      c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
      c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

      const tenant = c.get('tenant');
      const client = c.get('client');
      if (!client) {
        throw OAuthError.invalidClient('Client authentication required');
      }

      if (!client.cibaEnabled || !client.allowedGrantTypes.includes(GRANT_TYPE_CIBA)) {
        throw OAuthError.unauthorizedClient('Client is not authorized for backchannel authentication');
      }

      const { form } = splitParams(await readFormParams(c));
      const result = await cibaService.authenticate(parseCibaRequest(form), client, tenant);
      if (!result.success) {
        throw new OAuthError(result.error, result.errorDescription);
      }

      const response: BackchannelAuthenticationResponse = {
        auth_req_id: result.authReqId,
        expires_in: result.expiresIn,
        interval: result.interval,
      };
      return c.json(response);
    }
  );

  return router;
}
