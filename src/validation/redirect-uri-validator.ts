import { ok } from '../types/result.js';
import { ERROR_INVALID_REQUEST } from '../errors/error-codes.js';
import { invalid, type ValidationResult } from './validation-result.js';

const LOOPBACK_HOSTS = new Set(['127.0.0.1', '[::1]']);

function parseUrl(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

/**
 * Native apps listen on an ephemeral port, so loopback redirect URIs match
 * regardless of port (RFC 8252 Section 7.3)
 */
function matchesLoopback(requested: URL, registered: string): boolean {
  const candidate = parseUrl(registered);
  if (!candidate || !LOOPBACK_HOSTS.has(candidate.hostname) || candidate.hostname !== requested.hostname) {
    return false;
  }
  return (
    candidate.protocol === requested.protocol &&
    candidate.pathname === requested.pathname &&
    candidate.search === requested.search
  );
}

export class RedirectUriValidator {
  /**
   * Resolve the redirect URI for a request: exact match against the
   * registered URIs, or the only registered URI when none was sent.
   */
  validate(redirectUri: string | undefined, registered: readonly string[]): ValidationResult<string> {
    if (!redirectUri) {
      const [only] = registered;
      if (registered.length === 1 && only !== undefined) {
        return ok(only);
      }
      return invalid(ERROR_INVALID_REQUEST, 'redirect_uri is required');
    }

    const parsed = parseUrl(redirectUri);
    if (!parsed) {
      return invalid(ERROR_INVALID_REQUEST, 'redirect_uri must be an absolute URI');
    }

    if (redirectUri.includes('#')) {
      return invalid(ERROR_INVALID_REQUEST, 'redirect_uri must not contain a fragment');
    }

    if (registered.includes(redirectUri)) {
      return ok(redirectUri);
    }

    if (LOOPBACK_HOSTS.has(parsed.hostname) && registered.some((uri) => matchesLoopback(parsed, uri))) {
      return ok(redirectUri);
    }

    return invalid(ERROR_INVALID_REQUEST, 'redirect_uri is not registered for this client');
  }
}

export const redirectUriValidator = new RedirectUriValidator();
