import type { CodeChallengeMethod } from '../types/oauth.js';
import { ok } from '../types/result.js';
import { constantTimeCompare, sha256Base64Url } from '../crypto/hash.js';
import { PKCE_CHARSET_PATTERN } from '../crypto/pkce.js';
import {
  CODE_CHALLENGE_METHOD_PLAIN,
  CODE_CHALLENGE_METHOD_S256,
  PKCE_MAX_LENGTH,
  PKCE_MIN_LENGTH,
} from '../config/constants.js';
import { ERROR_INVALID_GRANT, ERROR_INVALID_REQUEST } from '../errors/error-codes.js';
import { invalid, type ValidationResult } from './validation-result.js';

export interface ValidatedChallenge {
  codeChallenge?: string;
  codeChallengeMethod?: CodeChallengeMethod;
}

/**
 * Proof Key for Code Exchange (RFC 7636)
 */
export class PkceValidator {
  /**
   * Check the challenge sent to the authorization endpoint. The method
   * defaults to `plain`, which is refused unless the client allows it.
   */
  validateCodeChallenge(
    codeChallenge: string | undefined,
    method: string | undefined,
    required: boolean,
    allowPlain: boolean
  ): ValidationResult<ValidatedChallenge> {
    if (!codeChallenge) {
      if (required) {
        return invalid(ERROR_INVALID_REQUEST, 'code_challenge is required');
      }
      return ok({});
    }

    if (codeChallenge.length < PKCE_MIN_LENGTH || codeChallenge.length > PKCE_MAX_LENGTH) {
      return invalid(
        ERROR_INVALID_REQUEST,
        `code_challenge must be between ${PKCE_MIN_LENGTH} and ${PKCE_MAX_LENGTH} characters`
      );
    }

    if (!PKCE_CHARSET_PATTERN.test(codeChallenge)) {
      return invalid(ERROR_INVALID_REQUEST, 'code_challenge contains invalid characters');
    }

    const codeChallengeMethod = method ?? CODE_CHALLENGE_METHOD_PLAIN;
    if (codeChallengeMethod !== CODE_CHALLENGE_METHOD_PLAIN && codeChallengeMethod !== CODE_CHALLENGE_METHOD_S256) {
      return invalid(ERROR_INVALID_REQUEST, `Unsupported code_challenge_method: ${codeChallengeMethod}`);
    }

    if (codeChallengeMethod === CODE_CHALLENGE_METHOD_PLAIN && !allowPlain) {
      return invalid(ERROR_INVALID_REQUEST, 'Plain code_challenge_method is not allowed for this client');
    }

    return ok({ codeChallenge, codeChallengeMethod });
  }

  /**
   * Check the verifier sent to the token endpoint against the stored challenge
   */
  validateCodeVerifier(
    codeVerifier: string | undefined,
    storedChallenge: string,
    storedMethod: CodeChallengeMethod = CODE_CHALLENGE_METHOD_PLAIN
  ): ValidationResult<void> {
    if (!codeVerifier) {
      return invalid(ERROR_INVALID_GRANT, 'code_verifier is required');
    }

    if (codeVerifier.length < PKCE_MIN_LENGTH || codeVerifier.length > PKCE_MAX_LENGTH) {
      return invalid(
        ERROR_INVALID_GRANT,
        `code_verifier must be between ${PKCE_MIN_LENGTH} and ${PKCE_MAX_LENGTH} characters`
      );
    }

    if (!PKCE_CHARSET_PATTERN.test(codeVerifier)) {
      return invalid(ERROR_INVALID_GRANT, 'code_verifier contains invalid characters');
    }

    const computed = storedMethod === CODE_CHALLENGE_METHOD_S256 ? sha256Base64Url(codeVerifier) : codeVerifier;
    if (!constantTimeCompare(computed, storedChallenge)) {
      return invalid(ERROR_INVALID_GRANT, 'code_verifier does not match code_challenge');
    }

    return ok(undefined);
  }
}

export const pkceValidator = new PkceValidator();
