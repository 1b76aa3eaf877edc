import { Hono } from 'hono';
import type { OAuthEnv } from '../../types/hono.js';
import type { PushedAuthorizationResponse } from '../../types/oauth.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { AuthorizeRequestValidator } from '../../validation/authorize-request-validator.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { toOAuthError } from '../../validation/validation-result.js';
import { clientAuthenticator } from '../../middleware/client-authenticator.js';
import { readFormParams } from '../../protocol/request-params.js';
import { getConfig } from '../../config/index.js';
import { componentLogger } from '../../logging/logger.js';
import { HEADER_CACHE_CONTROL, HEADER_PRAGMA, TOKEN_CACHE_CONTROL, TOKEN_PRAGMA } from '../../config/constants.js';

export interface PushedAuthorizationRouteOptions {
  storage: IStorage;
  validator: AuthorizeRequestValidator;
}

/** Client authentication parameters are not part of the stored request */
const CREDENTIAL_PARAMETERS = ['client_secret', 'client_assertion', 'client_assertion_type'];

/**
 * Create pushed authorization request routes
 *
 * POST /:tenant/connect/par (RFC 9126)
 */
export function createPushedAuthorizationRoutes(options: PushedAuthorizationRouteOptions) {
  const { storage, validator } = options;

  const router = new Hono<OAuthEnv>();

  router.post('/', clientAuthenticator({ clientStorage: storage.clients }), async (c) => {
    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    const tenant = c.get('tenant');
    const client = c.get('client');
    if (!client) {
      throw OAuthError.invalidClient('Client authentication required');
    }

    const params = await readFormParams(c);
    for (const name of CREDENTIAL_PARAMETERS) {
      delete params[name];
    }
    // Basic-authenticated clients may leave client_id out of the body
    if (params['client_id'] === undefined) params['client_id'] = client.clientId;

    if (params['client_id'] !== client.clientId) {
      throw OAuthError.invalidRequest('client_id does not match the authenticated client');
    }

    const result = await validator.validate(params, tenant, { pushing: true });
    if (!result.ok) {
      throw toOAuthError(result.error);
    }
    const { request, parameters } = result.value;

    const stored: Record<string, string> = { ...parameters };
    delete stored['resource'];
    if (request.resource.length > 0) {
      stored['resource'] = request.resource.join(' ');
    }

    const ttl = getConfig().defaults.parTtl;
    const pushed = await storage.pushedAuthorizations.store(tenant.id, client.clientId, stored, ttl);

    componentLogger('par').info({ tenant: tenant.slug, clientId: client.clientId }, 'Authorization request pushed');

    const response: PushedAuthorizationResponse = { request_uri: pushed.requestUri, expires_in: ttl };
    return c.json(response, 201);
  });

  return router;
}
