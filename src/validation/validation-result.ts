import type { OAuthErrorCode } from '../errors/error-codes.js';
import { OAuthError } from '../errors/oauth-error.js';
import type { ResponseMode } from '../types/oauth.js';
import { err, type Result } from '../types/result.js';

/**
 * A validation failure. Once the redirect URI has been checked, failures
 * of an authorize request are reported to the client by redirect rather
 * than shown to the user.
 */
export interface ProtocolError {
  error: OAuthErrorCode;
  errorDescription: string;
  redirectUriValidated: boolean;
  redirectUri?: string;
  state?: string;
  responseMode?: ResponseMode;
  /** Extra response headers, e.g. DPoP-Nonce */
  headers?: Record<string, string>;
}

export type ValidationResult<T> = Result<T, ProtocolError>;

export function invalid(
  error: OAuthErrorCode,
  errorDescription: string,
  extra: Partial<Omit<ProtocolError, 'error' | 'errorDescription'>> = {}
): { ok: false; error: ProtocolError } {
  return err({ redirectUriValidated: false, ...extra, error, errorDescription });
}

export function toOAuthError(failure: ProtocolError): OAuthError {
  return new OAuthError(failure.error, failure.errorDescription, {
    state: failure.state,
    headers: failure.headers,
  });
}
