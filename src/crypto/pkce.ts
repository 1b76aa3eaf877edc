import type { CodeChallengeMethod } from '../types/oauth.js';
import { CODE_CHALLENGE_METHOD_S256 } from '../config/constants.js';
import { sha256Base64Url } from './hash.js';

/**
 * Derive a code challenge from a code verifier
 * RFC 7636 Section 4.2
 *
 * S256: code_challenge = BASE64URL(SHA256(code_verifier))
 * plain: code_challenge = code_verifier
 */
export function generateCodeChallenge(
  codeVerifier: string,
  method: CodeChallengeMethod = CODE_CHALLENGE_METHOD_S256
): string {
  return method === CODE_CHALLENGE_METHOD_S256 ? sha256Base64Url(codeVerifier) : codeVerifier;
}

/**
 * RFC 7636 unreserved characters: [A-Z] / [a-z] / [0-9] / "-" / "." / "_" / "~"
 */
export const PKCE_CHARSET_PATTERN = /^[A-Za-z0-9\-._~]+$/;
