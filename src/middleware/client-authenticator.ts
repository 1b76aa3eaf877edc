import type { MiddlewareHandler } from 'hono';
import type { OAuthContext, OAuthEnv } from '../types/hono.js';
import type { OAuthClient, ClientAuthMethod, ValidatedClient } from '../types/client.js';
import type { Tenant } from '../types/tenant.js';
import type { IClientStorage } from '../storage/interfaces/index.js';
import { toValidatedClient } from '../types/client.js';
import { OAuthError } from '../errors/oauth-error.js';
import { verifyClientAssertion } from '../crypto/jwt.js';
import { componentLogger } from '../logging/logger.js';
import {
  CLIENT_AUTH_BASIC,
  CLIENT_AUTH_POST,
  CLIENT_AUTH_PRIVATE_KEY_JWT,
  CLIENT_AUTH_NONE,
  CLIENT_ASSERTION_TYPE_JWT_BEARER,
  CONTENT_TYPE_FORM,
  HEADER_AUTHORIZATION,
  HEADER_CONTENT_TYPE,
} from '../config/constants.js';

export interface ClientAuthenticatorOptions {
  clientStorage: IClientStorage;
  allowPublicClients?: boolean; // Allow clients with auth_method='none'
}

interface PostCredentials {
  clientId: string;
  clientSecret?: string;
  clientAssertion?: string;
  clientAssertionType?: string;
}

/**
 * Extract client credentials from a Basic auth header (RFC 6749 Section 2.3.1)
 */
export function extractBasicAuth(authHeader: string): { clientId: string; clientSecret: string } | null {
  if (!authHeader.startsWith('Basic ')) {
    return null;
  }

  const decoded = Buffer.from(authHeader.slice(6), 'base64').toString('utf-8');
  const colonIndex = decoded.indexOf(':');
  if (colonIndex === -1) {
    return null;
  }

  try {
    return {
      clientId: decodeURIComponent(decoded.slice(0, colonIndex)),
      clientSecret: decodeURIComponent(decoded.slice(colonIndex + 1)),
    };
  } catch {
    // Malformed percent-encoding
    return null;
  }
}

function formField(body: Record<string, unknown>, name: string): string | undefined {
  const value = body[name];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

async function extractPostAuth(c: OAuthContext): Promise<PostCredentials | null> {
  if (!c.req.header(HEADER_CONTENT_TYPE)?.includes(CONTENT_TYPE_FORM)) {
    return null;
  }

  // Parsed with `all` like every other reader: Hono caches the first parse
  const body = await c.req.parseBody({ all: true });
  const clientId = formField(body, 'client_id');
  if (!clientId) {
    return null;
  }

  return {
    clientId,
    clientSecret: formField(body, 'client_secret'),
    clientAssertion: formField(body, 'client_assertion'),
    clientAssertionType: formField(body, 'client_assertion_type'),
  };
}

async function authenticateWithAssertion(
  client: OAuthClient,
  assertion: string,
  tenant: Tenant
): Promise<void> {
  if (client.authMethod !== CLIENT_AUTH_PRIVATE_KEY_JWT) {
    throw OAuthError.invalidClient('Client is not configured for JWT authentication');
  }
  if (!client.jwks) {
    throw OAuthError.invalidClient('Client has no JWKS configured');
  }

  try {
    await verifyClientAssertion(assertion, client.jwks, {
      issuer: client.clientId,
      audience: [`${tenant.issuer}/connect/token`, tenant.issuer],
    });
  } catch (error) {
    componentLogger('client-auth').debug({ err: error, clientId: client.clientId }, 'Client assertion rejected');
    throw OAuthError.invalidClient('Invalid client assertion');
  }
}

/**
 * Authenticate the calling client and build its request snapshot.
 *
 * Supports:
 * - client_secret_basic: HTTP Basic authentication
 * - client_secret_post: Credentials in POST body
 * - private_key_jwt: JWT assertion signed with client's private key
 * - none: Public clients (no authentication)
 */
export async function authenticateClient(
  c: OAuthContext,
  options: ClientAuthenticatorOptions
): Promise<ValidatedClient> {
  const { clientStorage, allowPublicClients = true } = options;
  const tenant = c.get('tenant');

  let client: OAuthClient | null = null;
  let authMethod: ClientAuthMethod | null = null;

  const basic = extractBasicAuth(c.req.header(HEADER_AUTHORIZATION) ?? '');
  if (basic) {
    const known = await clientStorage.findByClientId(tenant.id, basic.clientId);
    if (!known) {
      throw OAuthError.invalidClient('Unknown client');
    }
    if (known.authMethod !== CLIENT_AUTH_BASIC) {
      throw OAuthError.invalidClient('Client is not configured for Basic authentication');
    }

    client = await clientStorage.verifyCredentials(tenant.id, basic.clientId, basic.clientSecret);
    if (!client) {
      throw OAuthError.invalidClient('Invalid client credentials');
    }
    authMethod = CLIENT_AUTH_BASIC;
  }

  if (!client) {
    const post = await extractPostAuth(c);

    if (post) {
      const known = await clientStorage.findByClientId(tenant.id, post.clientId);
      if (!known) {
        throw OAuthError.invalidClient('Unknown client');
      }

      if (post.clientAssertion && post.clientAssertionType === CLIENT_ASSERTION_TYPE_JWT_BEARER) {
        await authenticateWithAssertion(known, post.clientAssertion, tenant);
        client = known;
        authMethod = CLIENT_AUTH_PRIVATE_KEY_JWT;
      } else if (post.clientAssertion) {
        throw OAuthError.invalidClient('Unsupported client_assertion_type');
      } else if (post.clientSecret) {
        if (known.authMethod !== CLIENT_AUTH_POST) {
          throw OAuthError.invalidClient('Client is not configured for POST authentication');
        }
        client = await clientStorage.verifyCredentials(tenant.id, post.clientId, post.clientSecret);
        if (!client) {
          throw OAuthError.invalidClient('Invalid client credentials');
        }
        authMethod = CLIENT_AUTH_POST;
      } else if (known.authMethod === CLIENT_AUTH_NONE) {
        if (!allowPublicClients) {
          throw OAuthError.invalidClient('Public clients are not allowed');
        }
        client = known;
        authMethod = CLIENT_AUTH_NONE;
      } else {
        throw OAuthError.invalidClient('Client credentials required');
      }
    }
  }

  if (!client || !authMethod) {
    throw OAuthError.invalidClient('Client authentication required');
  }

  return toValidatedClient(client, tenant, authMethod);
}

/**
 * Middleware that authenticates the client and sets `client` in context
 * variables
 */
export function clientAuthenticator(options: ClientAuthenticatorOptions): MiddlewareHandler<OAuthEnv> {
  return async (c, next) => {
    c.set('client', await authenticateClient(c, options));
    await next();
  };
}
