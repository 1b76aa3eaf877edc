import type { JWK } from 'jose';
import { ERROR_INVALID_DPOP_PROOF, ERROR_USE_DPOP_NONCE } from '../errors/error-codes.js';

/**
 * Inputs for validating one DPoP proof (RFC 9449 Section 4.3)
 */
export interface DPoPValidationContext {
  proof: string;
  httpMethod: string;
  httpUri: string;
  /** base64url(SHA-256(access token)), checked against `ath` when set */
  expectedAccessTokenHash?: string;
  /** Thumbprint of an already-bound key, checked against the proof key when set */
  expectedJwkThumbprint?: string;
  requireNonce?: boolean;
  clientId?: string;
}

export type DPoPValidationResult =
  | { isValid: true; jwkThumbprint: string; jsonWebKey: JWK }
  | { isValid: false; requiresNonce: false; error: string; errorDescription: string }
  | {
      isValid: false;
      requiresNonce: true;
      error: typeof ERROR_USE_DPOP_NONCE;
      errorDescription: string;
      serverNonce: string;
    };

export function dpopSuccess(jwkThumbprint: string, jsonWebKey: JWK): DPoPValidationResult {
  return { isValid: true, jwkThumbprint, jsonWebKey };
}

export function dpopFailure(
  errorDescription: string,
  error: string = ERROR_INVALID_DPOP_PROOF
): DPoPValidationResult {
  return { isValid: false, requiresNonce: false, error, errorDescription };
}

export function dpopNonceRequired(serverNonce: string): DPoPValidationResult {
  return {
    isValid: false,
    requiresNonce: true,
    error: ERROR_USE_DPOP_NONCE,
    errorDescription: 'Authorization server requires nonce in DPoP proof',
    serverNonce,
  };
}
