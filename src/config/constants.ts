/**
 * Protocol constants
 */

// Grant types
export const GRANT_TYPE_AUTHORIZATION_CODE = 'authorization_code' as const;
export const GRANT_TYPE_CLIENT_CREDENTIALS = 'client_credentials' as const;
export const GRANT_TYPE_REFRESH_TOKEN = 'refresh_token' as const;
export const GRANT_TYPE_DEVICE_CODE = 'urn:ietf:params:oauth:grant-type:device_code' as const;
export const GRANT_TYPE_CIBA = 'urn:openid:params:grant-type:ciba' as const;
export const GRANT_TYPE_TOKEN_EXCHANGE = 'urn:ietf:params:oauth:grant-type:token-exchange' as const;

export const SUPPORTED_GRANT_TYPES = [
  GRANT_TYPE_AUTHORIZATION_CODE,
  GRANT_TYPE_CLIENT_CREDENTIALS,
  GRANT_TYPE_REFRESH_TOKEN,
  GRANT_TYPE_DEVICE_CODE,
  GRANT_TYPE_CIBA,
  GRANT_TYPE_TOKEN_EXCHANGE,
] as const;

// Response types
export const RESPONSE_TYPE_CODE = 'code' as const;
export const RESPONSE_TYPE_ID_TOKEN = 'id_token' as const;
export const RESPONSE_TYPE_TOKEN = 'token' as const;
export const SUPPORTED_RESPONSE_TYPES = [RESPONSE_TYPE_CODE] as const;

// Response modes
export const RESPONSE_MODE_QUERY = 'query' as const;
export const RESPONSE_MODE_FRAGMENT = 'fragment' as const;
export const RESPONSE_MODE_FORM_POST = 'form_post' as const;
export const SUPPORTED_RESPONSE_MODES = [
  RESPONSE_MODE_QUERY,
  RESPONSE_MODE_FRAGMENT,
  RESPONSE_MODE_FORM_POST,
] as const;

// Prompt values (OpenID Connect Core Section 3.1.2.1, Initiating User Registration)
export const PROMPT_NONE = 'none' as const;
export const PROMPT_LOGIN = 'login' as const;
export const PROMPT_CONSENT = 'consent' as const;
export const PROMPT_SELECT_ACCOUNT = 'select_account' as const;
export const PROMPT_CREATE = 'create' as const;
export const SUPPORTED_PROMPT_MODES = [
  PROMPT_NONE,
  PROMPT_LOGIN,
  PROMPT_CONSENT,
  PROMPT_SELECT_ACCOUNT,
  PROMPT_CREATE,
] as const;

// Code challenge methods (RFC 7636)
export const CODE_CHALLENGE_METHOD_PLAIN = 'plain' as const;
export const CODE_CHALLENGE_METHOD_S256 = 'S256' as const;
export const SUPPORTED_CODE_CHALLENGE_METHODS = [
  CODE_CHALLENGE_METHOD_PLAIN,
  CODE_CHALLENGE_METHOD_S256,
] as const;
export const PKCE_MIN_LENGTH = 43;
export const PKCE_MAX_LENGTH = 128;

// Token types
export const TOKEN_TYPE_BEARER = 'Bearer' as const;
export const TOKEN_TYPE_DPOP = 'DPoP' as const;

// Token type identifiers (RFC 8693 Section 3)
export const TOKEN_TYPE_ID_ACCESS_TOKEN = 'urn:ietf:params:oauth:token-type:access_token' as const;
export const TOKEN_TYPE_ID_REFRESH_TOKEN = 'urn:ietf:params:oauth:token-type:refresh_token' as const;
export const TOKEN_TYPE_ID_ID_TOKEN = 'urn:ietf:params:oauth:token-type:id_token' as const;
export const TOKEN_TYPE_ID_JWT = 'urn:ietf:params:oauth:token-type:jwt' as const;
export const SUPPORTED_SUBJECT_TOKEN_TYPES = [
  TOKEN_TYPE_ID_ACCESS_TOKEN,
  TOKEN_TYPE_ID_ID_TOKEN,
  TOKEN_TYPE_ID_JWT,
] as const;

// Client authentication methods
export const CLIENT_AUTH_BASIC = 'client_secret_basic' as const;
export const CLIENT_AUTH_POST = 'client_secret_post' as const;
export const CLIENT_AUTH_PRIVATE_KEY_JWT = 'private_key_jwt' as const;
export const CLIENT_AUTH_NONE = 'none' as const;
export const CLIENT_ASSERTION_TYPE_JWT_BEARER = 'urn:ietf:params:oauth:client-assertion-type:jwt-bearer';

export const SUPPORTED_CLIENT_AUTH_METHODS = [
  CLIENT_AUTH_BASIC,
  CLIENT_AUTH_POST,
  CLIENT_AUTH_PRIVATE_KEY_JWT,
  CLIENT_AUTH_NONE,
] as const;

// Signing algorithms
export const SUPPORTED_SIGNING_ALGORITHMS = [
  'RS256',
  'RS384',
  'RS512',
  'ES256',
  'ES384',
  'ES512',
] as const;

// DPoP (RFC 9449)
export const DPOP_JWT_TYPE = 'dpop+jwt';
export const DPOP_SUPPORTED_ALGORITHMS = [
  'RS256',
  'RS384',
  'RS512',
  'ES256',
  'ES384',
  'ES512',
  'PS256',
  'PS384',
  'PS512',
] as const;
export const DEFAULT_DPOP_PROOF_LIFETIME = 60; // seconds
export const DEFAULT_DPOP_CLOCK_SKEW = 5; // seconds
export const DEFAULT_DPOP_NONCE_LIFETIME = 300; // seconds

// CIBA (OpenID CIBA Core 1.0)
export const CIBA_DELIVERY_MODE_POLL = 'poll' as const;
export const CIBA_DELIVERY_MODE_PING = 'ping' as const;
export const CIBA_DELIVERY_MODE_PUSH = 'push' as const;
export const SUPPORTED_CIBA_DELIVERY_MODES = [
  CIBA_DELIVERY_MODE_POLL,
  CIBA_DELIVERY_MODE_PING,
  CIBA_DELIVERY_MODE_PUSH,
] as const;
export const DEFAULT_CIBA_REQUEST_LIFETIME = 120; // seconds
export const DEFAULT_CIBA_POLLING_INTERVAL = 5; // seconds
export const CIBA_AUTH_REQ_ID_LENGTH = 32; // bytes
export const CIBA_MAX_BINDING_MESSAGE_LENGTH = 64;
export const DEFAULT_LOGIN_HINT_TOKEN_CLOCK_SKEW = 300; // seconds

// Default TTLs (in seconds)
export const DEFAULT_ACCESS_TOKEN_TTL = 3600; // 1 hour
export const DEFAULT_ID_TOKEN_TTL = 3600; // 1 hour
export const DEFAULT_REFRESH_TOKEN_TTL = 2592000; // 30 days
export const DEFAULT_AUTHORIZATION_CODE_TTL = 300; // 5 minutes
export const DEFAULT_DEVICE_CODE_TTL = 300; // 5 minutes
export const DEFAULT_DEVICE_CODE_INTERVAL = 5;
export const DEFAULT_PAR_TTL = 60;
export const DEFAULT_JOURNEY_DURATION_MINUTES = 30;

// Token/code lengths
export const AUTHORIZATION_CODE_LENGTH = 32; // bytes
export const REFRESH_TOKEN_LENGTH = 32; // bytes
export const DEVICE_CODE_LENGTH = 32; // bytes
export const USER_CODE_LENGTH = 8; // characters (e.g., BCDF-GHJK)
export const CLIENT_ID_LENGTH = 16; // bytes
export const CLIENT_SECRET_LENGTH = 32; // bytes

// User code charset (no vowels, no 0/O, no 1/I)
export const USER_CODE_CHARSET = 'BCDFGHJKLMNPQRSTVWXZ';

// PAR (RFC 9126)
export const PAR_REQUEST_URI_PREFIX = 'urn:ietf:params:oauth:request_uri:';

// Rate limiting defaults
export const DEFAULT_RATE_LIMIT_WINDOW_MS = 60000;
export const DEFAULT_RATE_LIMIT_MAX_REQUESTS = 100;

// OpenID Connect scopes
export const OPENID_SCOPE = 'openid' as const;
export const PROFILE_SCOPE = 'profile' as const;
export const EMAIL_SCOPE = 'email' as const;
export const ADDRESS_SCOPE = 'address' as const;
export const PHONE_SCOPE = 'phone' as const;
export const OFFLINE_ACCESS_SCOPE = 'offline_access' as const;

export const IDENTITY_SCOPES = [
  OPENID_SCOPE,
  PROFILE_SCOPE,
  EMAIL_SCOPE,
  ADDRESS_SCOPE,
  PHONE_SCOPE,
  OFFLINE_ACCESS_SCOPE,
] as const;

// HTTP headers
export const HEADER_AUTHORIZATION = 'Authorization';
export const HEADER_CONTENT_TYPE = 'Content-Type';
export const HEADER_WWW_AUTHENTICATE = 'WWW-Authenticate';
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const HEADER_PRAGMA = 'Pragma';
export const HEADER_DPOP = 'DPoP';
export const HEADER_DPOP_NONCE = 'DPoP-Nonce';

// Content types
export const CONTENT_TYPE_JSON = 'application/json';
export const CONTENT_TYPE_FORM = 'application/x-www-form-urlencoded';

// Cache control for token responses
export const TOKEN_CACHE_CONTROL = 'no-store';
export const TOKEN_PRAGMA = 'no-cache';
