import {
  type OAuthErrorCode,
  type ErrorStatusCode,
  ERROR_STATUS_CODES,
  ERROR_DESCRIPTIONS,
  ERROR_INVALID_REQUEST,
  ERROR_INVALID_CLIENT,
  ERROR_INVALID_GRANT,
  ERROR_UNAUTHORIZED_CLIENT,
  ERROR_ACCESS_DENIED,
  ERROR_UNSUPPORTED_RESPONSE_TYPE,
  ERROR_INVALID_SCOPE,
  ERROR_UNSUPPORTED_GRANT_TYPE,
  ERROR_SERVER_ERROR,
  ERROR_TEMPORARILY_UNAVAILABLE,
  ERROR_AUTHORIZATION_PENDING,
  ERROR_SLOW_DOWN,
  ERROR_EXPIRED_TOKEN,
  ERROR_INVALID_TOKEN,
  ERROR_INSUFFICIENT_SCOPE,
  ERROR_INVALID_TARGET,
  ERROR_INVALID_DPOP_PROOF,
  ERROR_USE_DPOP_NONCE,
  ERROR_INVALID_REQUEST_URI,
} from './error-codes.js';
import { HEADER_DPOP_NONCE } from '../config/constants.js';

/**
 * Error response body
 * RFC 6749 Section 5.2
 */
export interface OAuthErrorResponse {
  error: OAuthErrorCode;
  error_description?: string;
  error_uri?: string;
  state?: string;
}

export interface OAuthErrorOptions {
  errorUri?: string;
  state?: string;
  cause?: unknown;
  /** Extra response headers, e.g. DPoP-Nonce or WWW-Authenticate */
  headers?: Record<string, string>;
  /** Overrides the status for the code; resource servers answer 401 where the token endpoint answers 400 */
  status?: ErrorStatusCode;
}

/**
 * RFC-compliant protocol error. Thrown by route and grant handlers and
 * rendered by the global error handler.
 */
export class OAuthError extends Error {
  public readonly code: OAuthErrorCode;
  public readonly statusCode: ErrorStatusCode;
  public readonly description: string;
  public readonly errorUri?: string;
  public readonly state?: string;
  public readonly headers: Record<string, string>;

  constructor(code: OAuthErrorCode, description?: string, options?: OAuthErrorOptions) {
    const desc = description ?? ERROR_DESCRIPTIONS[code];
    super(desc, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'OAuthError';
    this.code = code;
    this.statusCode = options?.status ?? ERROR_STATUS_CODES[code];
    this.description = desc;
    this.headers = { ...options?.headers };

    if (options?.errorUri) {
      this.errorUri = options.errorUri;
    }
    if (options?.state) {
      this.state = options.state;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * JSON response body
   */
  toJSON(): OAuthErrorResponse {
    const response: OAuthErrorResponse = {
      error: this.code,
    };

    if (this.description) {
      response.error_description = this.description;
    }

    if (this.errorUri) {
      response.error_uri = this.errorUri;
    }

    if (this.state) {
      response.state = this.state;
    }

    return response;
  }

  /**
   * Query string for redirect errors
   */
  toQueryString(): string {
    const params = new URLSearchParams();
    params.set('error', this.code);

    if (this.description) {
      params.set('error_description', this.description);
    }

    if (this.errorUri) {
      params.set('error_uri', this.errorUri);
    }

    if (this.state) {
      params.set('state', this.state);
    }

    return params.toString();
  }

  /** Copy of this error carrying the authorization request state */
  withState(state: string | undefined): OAuthError {
    if (!state) return this;
    return new OAuthError(this.code, this.description, {
      errorUri: this.errorUri,
      state,
      cause: this.cause,
      headers: this.headers,
      status: this.statusCode,
    });
  }

  static invalidRequest(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_REQUEST, description, { state });
  }

  static invalidClient(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_CLIENT, description);
  }

  static invalidGrant(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_GRANT, description);
  }

  static unauthorizedClient(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_UNAUTHORIZED_CLIENT, description, { state });
  }

  static accessDenied(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_ACCESS_DENIED, description, { state });
  }

  static unsupportedResponseType(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_UNSUPPORTED_RESPONSE_TYPE, description, { state });
  }

  static invalidScope(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_SCOPE, description, { state });
  }

  static invalidTarget(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_TARGET, description);
  }

  static invalidRequestUri(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_REQUEST_URI, description);
  }

  static unsupportedGrantType(description?: string): OAuthError {
    return new OAuthError(ERROR_UNSUPPORTED_GRANT_TYPE, description);
  }

  static serverError(description?: string, cause?: unknown): OAuthError {
    return new OAuthError(ERROR_SERVER_ERROR, description, { cause });
  }

  static temporarilyUnavailable(description?: string): OAuthError {
    return new OAuthError(ERROR_TEMPORARILY_UNAVAILABLE, description);
  }

  static authorizationPending(description?: string): OAuthError {
    return new OAuthError(ERROR_AUTHORIZATION_PENDING, description);
  }

  static slowDown(description?: string): OAuthError {
    return new OAuthError(ERROR_SLOW_DOWN, description);
  }

  static expiredToken(description?: string): OAuthError {
    return new OAuthError(ERROR_EXPIRED_TOKEN, description);
  }

  static invalidToken(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_TOKEN, description);
  }

  static insufficientScope(description?: string): OAuthError {
    return new OAuthError(ERROR_INSUFFICIENT_SCOPE, description);
  }

  static invalidDPoPProof(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_DPOP_PROOF, description);
  }

  static useDPoPNonce(nonce: string, description?: string): OAuthError {
    return new OAuthError(ERROR_USE_DPOP_NONCE, description, {
      headers: { [HEADER_DPOP_NONCE]: nonce },
    });
  }
}
