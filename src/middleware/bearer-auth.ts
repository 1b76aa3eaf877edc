import type { MiddlewareHandler } from 'hono';
import type { OAuthEnv } from '../types/hono.js';
import type { Tenant } from '../types/tenant.js';
import type { AccessTokenVerifier } from '../services/access-token-verifier.js';
import type { DPoPProofValidator } from '../dpop/proof-validator.js';
import type { AuditSink } from '../events/audit-events.js';
import { auditEvent } from '../events/audit-events.js';
import { computeAccessTokenHash } from '../dpop/proof-validator.js';
import { OAuthError } from '../errors/oauth-error.js';
import {
  ERROR_INSUFFICIENT_SCOPE,
  ERROR_INVALID_DPOP_PROOF,
  ERROR_INVALID_TOKEN,
  ERROR_USE_DPOP_NONCE,
} from '../errors/error-codes.js';
import { getConfig } from '../config/index.js';
import {
  DPOP_SUPPORTED_ALGORITHMS,
  HEADER_AUTHORIZATION,
  HEADER_DPOP,
  HEADER_DPOP_NONCE,
  HEADER_WWW_AUTHENTICATE,
  TOKEN_TYPE_BEARER,
  TOKEN_TYPE_DPOP,
} from '../config/constants.js';

export interface BearerAuthOptions {
  verifier: AccessTokenVerifier;
  dpopValidator: DPoPProofValidator;
  audit?: AuditSink;
  requiredScopes?: string[];
}

type Scheme = typeof TOKEN_TYPE_BEARER | typeof TOKEN_TYPE_DPOP;

/**
 * Split an Authorization header into scheme and token (scheme is
 * case-insensitive, RFC 9110 Section 11.1)
 */
export function parseAuthorizationHeader(header: string): { scheme: Scheme; token: string } | null {
  const space = header.indexOf(' ');
  if (space === -1) return null;

  const scheme = header.slice(0, space).toLowerCase();
  const token = header.slice(space + 1).trim();
  if (!token) return null;

  if (scheme === 'bearer') return { scheme: TOKEN_TYPE_BEARER, token };
  if (scheme === 'dpop') return { scheme: TOKEN_TYPE_DPOP, token };
  return null;
}

function challenge(tenant: Tenant, scheme: Scheme, error?: string, extra = ''): string {
  const params = [`realm="${tenant.slug}"`];
  if (error) params.push(`error="${error}"`);
  if (scheme === TOKEN_TYPE_DPOP) params.push(`algs="${DPOP_SUPPORTED_ALGORITHMS.join(' ')}"`);
  return `${scheme} ${params.join(', ')}${extra}`;
}

function unauthorized(
  tenant: Tenant,
  scheme: Scheme,
  description: string,
  error: typeof ERROR_INVALID_TOKEN | typeof ERROR_INVALID_DPOP_PROOF = ERROR_INVALID_TOKEN
): OAuthError {
  return new OAuthError(error, description, {
    status: 401,
    headers: { [HEADER_WWW_AUTHENTICATE]: challenge(tenant, scheme, error) },
  });
}

/**
 * Middleware to validate access tokens on protected resources
 *
 * `Bearer` tokens follow RFC 6750. `DPoP` tokens (RFC 9449 Section 7) also
 * need a proof whose `ath` matches the token and whose key matches
 * `cnf.jkt`. A DPoP-bound token sent with the Bearer scheme is refused.
 *
 * Sets `accessToken` in context variables on success
 */
export function bearerAuth(options: BearerAuthOptions): MiddlewareHandler<OAuthEnv> {
  const { verifier, dpopValidator, audit, requiredScopes } = options;

  return async (c, next) => {
    const tenant = c.get('tenant');

    const authHeader = c.req.header(HEADER_AUTHORIZATION);
    if (!authHeader) {
      throw new OAuthError(ERROR_INVALID_TOKEN, 'Missing authorization header', {
        headers: { [HEADER_WWW_AUTHENTICATE]: challenge(tenant, TOKEN_TYPE_BEARER) },
      });
    }

    const credentials = parseAuthorizationHeader(authHeader);
    if (!credentials) {
      throw OAuthError.invalidRequest('Invalid authorization header format');
    }
    const { scheme, token } = credentials;

    const check = await verifier.verify(token, tenant);
    if (!check.valid) {
      throw unauthorized(tenant, scheme, check.reason === 'revoked' ? 'Token has been revoked' : 'Invalid access token');
    }
    const payload = check.payload;
    const boundJkt = payload.cnf?.jkt;

    if (scheme === TOKEN_TYPE_BEARER && boundJkt) {
      throw unauthorized(tenant, TOKEN_TYPE_DPOP, 'DPoP-bound token must be sent with the DPoP scheme');
    }

    if (scheme === TOKEN_TYPE_DPOP) {
      if (!boundJkt) {
        throw unauthorized(tenant, TOKEN_TYPE_DPOP, 'Token is not DPoP-bound');
      }

      const proofs = c.req.raw.headers.get(HEADER_DPOP);
      if (!proofs || proofs.includes(',')) {
        throw unauthorized(tenant, TOKEN_TYPE_DPOP, 'Exactly one DPoP proof is required', ERROR_INVALID_DPOP_PROOF);
      }

      const result = await dpopValidator.validate({
        proof: proofs,
        httpMethod: c.req.method,
        httpUri: c.req.url,
        expectedAccessTokenHash: computeAccessTokenHash(token),
        expectedJwkThumbprint: boundJkt,
        requireNonce: getConfig().dpop.requireNonce,
        clientId: payload.client_id,
      });

      if (!result.isValid) {
        audit?.emit(
          auditEvent({
            type: 'dpop.rejected',
            tenantId: tenant.id,
            clientId: payload.client_id,
            error: result.error,
            reason: result.errorDescription,
          })
        );

        if (result.requiresNonce) {
          throw new OAuthError(ERROR_USE_DPOP_NONCE, result.errorDescription, {
            status: 401,
            headers: {
              [HEADER_WWW_AUTHENTICATE]: challenge(tenant, TOKEN_TYPE_DPOP, ERROR_USE_DPOP_NONCE),
              [HEADER_DPOP_NONCE]: result.serverNonce,
            },
          });
        }
        throw unauthorized(tenant, TOKEN_TYPE_DPOP, result.errorDescription, ERROR_INVALID_DPOP_PROOF);
      }
    }

    if (requiredScopes && requiredScopes.length > 0) {
      const tokenScopes = payload.scope?.split(' ') ?? [];
      if (!requiredScopes.every((scope) => tokenScopes.includes(scope))) {
        throw new OAuthError(ERROR_INSUFFICIENT_SCOPE, `Required scopes: ${requiredScopes.join(' ')}`, {
          headers: {
            [HEADER_WWW_AUTHENTICATE]: challenge(
              tenant,
              scheme,
              ERROR_INSUFFICIENT_SCOPE,
              `, scope="${requiredScopes.join(' ')}"`
            ),
          },
        });
      }
    }

    c.set('accessToken', payload);

    await next();
  };
}
