import { Hono } from 'hono';
import type { OAuthEnv } from '../../types/hono.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { clientAuthenticator } from '../../middleware/client-authenticator.js';
import { createDeviceAuthorizationHandler } from '../../grants/device-code/device-authorization.js';
import { readFormParams, splitParams } from '../../protocol/request-params.js';
import {
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
} from '../../config/constants.js';

export interface DeviceAuthorizationRouteOptions {
  storage: IStorage;
  verificationUri: string;
}

/**
 * Create device authorization endpoint routes
 *
 * POST /:tenant/connect/deviceauthorization (RFC 8628)
 */
export function createDeviceAuthorizationRoutes(options: DeviceAuthorizationRouteOptions) {
  const { storage, verificationUri } = options;

  const router = new Hono<OAuthEnv>();

  const handler = createDeviceAuthorizationHandler({
    deviceCodeStorage: storage.deviceCodes,
    verificationUri,
  });

  router.post('/', clientAuthenticator({ clientStorage: storage.clients }), async (c) => {
    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    const client = c.get('client');
    if (!client) {
      throw OAuthError.invalidClient('Client authentication required');
    }

    const { form } = splitParams(await readFormParams(c));
    return c.json(await handler(c, client, form['scope']));
  });

  return router;
}
