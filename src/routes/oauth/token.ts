import { Hono } from 'hono';
import type { OAuthEnv } from '../../types/hono.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { AuditSink } from '../../events/audit-events.js';
import type { GrantHandler } from '../../grants/index.js';
import type { GrantType, TokenResponse } from '../../types/oauth.js';
import type { TokenRequestValidator } from '../../validation/token-request-validator.js';
import { auditEvent } from '../../events/audit-events.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { toOAuthError } from '../../validation/validation-result.js';
import { clientAuthenticator } from '../../middleware/client-authenticator.js';
import { readFormParams, splitParams } from '../../protocol/request-params.js';
import { EndpointType, createProtocolContext } from '../../protocol/context.js';
import { decodeJwt } from '../../crypto/jwt.js';
import { componentLogger } from '../../logging/logger.js';
import {
  HEADER_CACHE_CONTROL,
  HEADER_DPOP,
  HEADER_PRAGMA,
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
} from '../../config/constants.js';

export interface TokenRouteOptions {
  storage: IStorage;
  validator: TokenRequestValidator;
  grantHandlers: Record<GrantType, GrantHandler>;
  audit: AuditSink;
}

/**
 * Every DPoP header value; repeated headers arrive comma-joined and a
 * compact JWS never contains a comma
 */
export function readDPoPProofs(header: string | null): string[] {
  if (header === null) return [];
  return header
    .split(',')
    .map((proof) => proof.trim())
    .filter((proof) => proof.length > 0);
}

/**
 * Create token endpoint routes
 *
 * POST /:tenant/connect/token (RFC 6749 Section 3.2)
 */
export function createTokenRoutes(options: TokenRouteOptions) {
  const { storage, validator, grantHandlers, audit } = options;

  const router = new Hono<OAuthEnv>();

  router.post(
    '/',
    // Public clients are allowed for the code grant with PKCE
    clientAuthenticator({ clientStorage: storage.clients, allowPublicClients: true }),
    async (c) => {
      c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
      c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

      const tenant = c.get('tenant');
      const client = c.get('client');
      if (!client) {
        throw OAuthError.invalidClient('Client authentication required');
      }

      const { form, resources } = splitParams(await readFormParams(c));
      const grantType = form['grant_type'] ?? '';

      c.set(
        'protocolContext',
        createProtocolContext({ endpointType: EndpointType.Token, tenant, client, parameters: form })
      );

      const failed = (error: OAuthError): OAuthError => {
        audit.emit(
          auditEvent({
            type: 'token.failed',
            tenantId: tenant.id,
            clientId: client.clientId,
            grantType,
            error: error.code,
            errorDescription: error.description,
          })
        );
        return error;
      };

      const validation = await validator.validate(form, resources, client, tenant, {
        proofs: readDPoPProofs(c.req.raw.headers.get(HEADER_DPOP)),
        httpMethod: c.req.method,
        httpUri: c.req.url,
      });
      if (!validation.ok) {
        throw failed(toOAuthError(validation.error));
      }
      const request = validation.value;

      let response: TokenResponse;
      try {
        response = await grantHandlers[request.grantType](c, request);
      } catch (error) {
        if (error instanceof OAuthError) throw failed(error);
        throw error;
      }

      const issued = decodeJwt(response.access_token);
      componentLogger('token').info(
        { tenant: tenant.slug, clientId: client.clientId, grantType, tokenType: response.token_type },
        'Token issued'
      );
      audit.emit(
        auditEvent({
          type: 'token.issued',
          tenantId: tenant.id,
          clientId: client.clientId,
          grantType,
          subjectId: typeof issued?.sub === 'string' ? issued.sub : undefined,
          scopes: response.scope ? response.scope.split(' ') : [],
          tokenType: response.token_type,
        })
      );

      return c.json(response);
    }
  );

  return router;
}
