import type { JWTPayload } from 'jose';
import type { Tenant } from '../types/tenant.js';
import type { AccessTokenPayload, ActorClaim } from '../types/token.js';
import type { IRevokedTokenStorage, ISigningKeyStorage } from '../storage/interfaces/index.js';
import { verifyJwt } from '../crypto/jwt.js';
import { componentLogger } from '../logging/logger.js';

/**
 * Read an `act` claim back out of a verified payload
 */
export function parseActorClaim(value: unknown): ActorClaim | undefined {
  if (typeof value !== 'object' || value === null || !('sub' in value) || typeof value.sub !== 'string') {
    return undefined;
  }
  const nested = 'act' in value ? parseActorClaim(value.act) : undefined;
  return nested ? { sub: value.sub, act: nested } : { sub: value.sub };
}

function parseConfirmation(value: unknown): { jkt: string } | undefined {
  if (typeof value !== 'object' || value === null || !('jkt' in value) || typeof value.jkt !== 'string') {
    return undefined;
  }
  return { jkt: value.jkt };
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function optionalStrings(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const strings = value.filter((item): item is string => typeof item === 'string');
  return strings.length === value.length ? strings : undefined;
}

/**
 * Narrow a verified JWT payload to the access token shape we issue. Null
 * when a required claim is missing, e.g. an ID token presented as an
 * access token.
 */
export function toAccessTokenPayload(payload: JWTPayload): AccessTokenPayload | null {
  const { iss, sub, aud, exp, iat, jti } = payload;
  const clientId = payload['client_id'];
  const tenantId = payload['tenant_id'];

  if (
    typeof iss !== 'string' ||
    typeof sub !== 'string' ||
    aud === undefined ||
    typeof exp !== 'number' ||
    typeof iat !== 'number' ||
    typeof jti !== 'string' ||
    typeof clientId !== 'string' ||
    typeof tenantId !== 'string'
  ) {
    return null;
  }

  return {
    iss,
    sub,
    aud,
    exp,
    iat,
    jti,
    nbf: optionalNumber(payload.nbf),
    client_id: clientId,
    tenant_id: tenantId,
    scope: optionalString(payload['scope']),
    sid: optionalString(payload['sid']),
    acr: optionalString(payload['acr']),
    amr: optionalStrings(payload['amr']),
    auth_time: optionalNumber(payload['auth_time']),
    cnf: parseConfirmation(payload['cnf']),
    act: parseActorClaim(payload['act']),
  };
}

export interface AccessTokenVerifierOptions {
  signingKeys: ISigningKeyStorage;
  revokedTokens: IRevokedTokenStorage;
}

export type AccessTokenCheck =
  | { valid: true; payload: AccessTokenPayload }
  | { valid: false; reason: 'malformed' | 'invalid' | 'wrong_tenant' | 'revoked' };

/**
 * Verifies access tokens this tenant issued: signature against the
 * tenant's keys, issuer, lifetime, tenant binding and revocation
 */
export class AccessTokenVerifier {
  private readonly signingKeys: ISigningKeyStorage;
  private readonly revokedTokens: IRevokedTokenStorage;

  constructor(options: AccessTokenVerifierOptions) {
    this.signingKeys = options.signingKeys;
    this.revokedTokens = options.revokedTokens;
  }

  async verify(token: string, tenant: Tenant): Promise<AccessTokenCheck> {
    const keys = await this.signingKeys.getValidationKeys(tenant.id);

    let verified: JWTPayload;
    try {
      verified = await verifyJwt(token, { keys }, { issuer: tenant.issuer });
    } catch (error) {
      componentLogger('token').debug({ err: error, tenant: tenant.slug }, 'Access token verification failed');
      return { valid: false, reason: 'invalid' };
    }

    const payload = toAccessTokenPayload(verified);
    if (!payload) {
      return { valid: false, reason: 'malformed' };
    }
    if (payload.tenant_id !== tenant.id) {
      return { valid: false, reason: 'wrong_tenant' };
    }
    if (await this.revokedTokens.isRevoked(tenant.id, payload.jti)) {
      return { valid: false, reason: 'revoked' };
    }

    return { valid: true, payload };
  }
}
