import * as jose from 'jose';
import { z } from 'zod';
import type { DPoPValidationContext, DPoPValidationResult } from '../types/dpop.js';
import { dpopFailure, dpopNonceRequired, dpopSuccess } from '../types/dpop.js';
import type { IDPoPNonceStore } from '../storage/interfaces/dpop-nonce-store.js';
import { DPOP_JWT_TYPE, DPOP_SUPPORTED_ALGORITHMS } from '../config/constants.js';
import { getConfig } from '../config/index.js';
import { sha256Base64Url } from '../crypto/hash.js';
import { componentLogger } from '../logging/logger.js';

/** JWK members that only appear in private keys */
const PRIVATE_JWK_MEMBERS = ['d', 'p', 'q', 'dp', 'dq', 'qi', 'k'] as const;

const proofClaimsSchema = z.object({
  jti: z.string().min(1).optional(),
  htm: z.string().optional(),
  htu: z.string().optional(),
  iat: z.number().optional(),
  ath: z.string().optional(),
  nonce: z.string().optional(),
});

/**
 * base64url(SHA-256(access token)), the `ath` claim of a proof
 */
export function computeAccessTokenHash(accessToken: string): string {
  return sha256Base64Url(accessToken);
}

function isSupportedAlgorithm(alg: string): boolean {
  return (DPOP_SUPPORTED_ALGORITHMS as readonly string[]).includes(alg);
}

/**
 * `htu` matches on scheme, host, port and path (path case-insensitive);
 * query and fragment are ignored
 */
export function matchesHttpUri(htu: string, requestUri: string): boolean {
  let claimed: URL;
  let actual: URL;
  try {
    claimed = new URL(htu);
    actual = new URL(requestUri);
  } catch {
    return false;
  }

  return (
    claimed.protocol === actual.protocol &&
    claimed.hostname === actual.hostname &&
    claimed.port === actual.port &&
    claimed.pathname.toLowerCase() === actual.pathname.toLowerCase()
  );
}

export interface DPoPProofValidatorOptions {
  nonceStore: IDPoPNonceStore;
  proofLifetimeSeconds?: number;
  clockSkewSeconds?: number;
}

/**
 * DPoP proof validation (RFC 9449 Section 4.3)
 */
export class DPoPProofValidator {
  private readonly nonceStore: IDPoPNonceStore;
  private readonly proofLifetimeSeconds: number;
  private readonly clockSkewSeconds: number;

  constructor(options: DPoPProofValidatorOptions) {
    const { dpop } = getConfig();
    this.nonceStore = options.nonceStore;
    this.proofLifetimeSeconds = options.proofLifetimeSeconds ?? dpop.proofLifetimeSeconds;
    this.clockSkewSeconds = options.clockSkewSeconds ?? dpop.clockSkewSeconds;
  }

  async validate(context: DPoPValidationContext): Promise<DPoPValidationResult> {
    try {
      return await this.validateProof(context);
    } catch (error) {
      componentLogger('dpop').error({ err: error }, 'Unexpected error validating DPoP proof');
      return dpopFailure('Failed to validate DPoP proof');
    }
  }

  private async validateProof(context: DPoPValidationContext): Promise<DPoPValidationResult> {
    const log = componentLogger('dpop');

    let header: jose.ProtectedHeaderParameters;
    try {
      if (context.proof.split('.').length !== 3) {
        return dpopFailure('Invalid JWT format');
      }
      header = jose.decodeProtectedHeader(context.proof);
    } catch {
      return dpopFailure('Invalid JWT format');
    }

    if (header.typ?.toLowerCase() !== DPOP_JWT_TYPE) {
      return dpopFailure(`Invalid typ header, expected ${DPOP_JWT_TYPE}`);
    }

    if (!header.alg || !isSupportedAlgorithm(header.alg)) {
      return dpopFailure(`Unsupported algorithm: ${header.alg ?? 'none'}`);
    }

    const jwk = header.jwk;
    if (!jwk || typeof jwk !== 'object') {
      return dpopFailure('Missing jwk header');
    }
    if (typeof jwk.kty !== 'string') {
      return dpopFailure('Invalid jwk header');
    }
    if (PRIVATE_JWK_MEMBERS.some((member) => Object.hasOwn(jwk, member))) {
      return dpopFailure('jwk header must not contain private key material');
    }

    let payload: Uint8Array;
    try {
      ({ payload } = await jose.compactVerify(context.proof, jose.EmbeddedJWK, {
        algorithms: [...DPOP_SUPPORTED_ALGORITHMS],
      }));
    } catch (error) {
      if (error instanceof jose.errors.JWSSignatureVerificationFailed) {
        return dpopFailure('Invalid DPoP proof signature');
      }
      log.debug({ err: error }, 'DPoP proof key rejected');
      return dpopFailure('Invalid jwk header');
    }

    let rawClaims: unknown;
    try {
      rawClaims = JSON.parse(new TextDecoder().decode(payload));
    } catch {
      return dpopFailure('Invalid JWT format');
    }
    const parsedClaims = proofClaimsSchema.safeParse(rawClaims);
    if (!parsedClaims.success) {
      return dpopFailure('Invalid DPoP proof claims');
    }
    const claims = parsedClaims.data;

    if (!claims.jti) {
      return dpopFailure('Missing jti claim');
    }

    if (!claims.htm || claims.htm.toUpperCase() !== context.httpMethod.toUpperCase()) {
      return dpopFailure('htm does not match the request method');
    }

    if (!claims.htu || !matchesHttpUri(claims.htu, context.httpUri)) {
      return dpopFailure('htu does not match the request URI');
    }

    if (claims.iat === undefined) {
      return dpopFailure('Missing iat claim');
    }
    const now = Math.floor(Date.now() / 1000);
    if (claims.iat > now + this.clockSkewSeconds) {
      return dpopFailure('Proof iat is in the future');
    }
    if (claims.iat < now - this.proofLifetimeSeconds - this.clockSkewSeconds) {
      return dpopFailure('Proof has expired');
    }

    const nonceRequired = context.requireNonce === true || (await this.nonceStore.isNonceRequired(context.clientId));
    if (nonceRequired) {
      const nonceValid =
        claims.nonce !== undefined && (await this.nonceStore.validateNonce(claims.nonce, context.clientId));
      if (!nonceValid) {
        log.debug({ clientId: context.clientId, hadNonce: claims.nonce !== undefined }, 'DPoP nonce required');
        return dpopNonceRequired(await this.nonceStore.generateNonce(context.clientId));
      }
    }

    const fresh = await this.nonceStore.validateJti(claims.jti, this.proofLifetimeSeconds + 2 * this.clockSkewSeconds);
    if (!fresh) {
      log.warn({ clientId: context.clientId }, 'DPoP proof replay detected');
      return dpopFailure('Proof has already been used (jti)');
    }

    if (context.expectedAccessTokenHash !== undefined && claims.ath !== context.expectedAccessTokenHash) {
      return dpopFailure('Access token hash (ath) does not match');
    }

    const jwkThumbprint = await jose.calculateJwkThumbprint(jwk, 'sha256');
    if (context.expectedJwkThumbprint !== undefined && jwkThumbprint !== context.expectedJwkThumbprint) {
      return dpopFailure('DPoP key does not match bound key');
    }

    return dpopSuccess(jwkThumbprint, { ...jwk });
  }
}
