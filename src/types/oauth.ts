import type {
  GRANT_TYPE_AUTHORIZATION_CODE,
  GRANT_TYPE_CLIENT_CREDENTIALS,
  GRANT_TYPE_REFRESH_TOKEN,
  GRANT_TYPE_DEVICE_CODE,
  GRANT_TYPE_CIBA,
  GRANT_TYPE_TOKEN_EXCHANGE,
  SUPPORTED_CODE_CHALLENGE_METHODS,
  SUPPORTED_RESPONSE_MODES,
  SUPPORTED_PROMPT_MODES,
  SUPPORTED_CIBA_DELIVERY_MODES,
  TOKEN_TYPE_BEARER,
  TOKEN_TYPE_DPOP,
} from '../config/constants.js';

/**
 * Grant types
 * RFC 6749, RFC 8628, RFC 8693, OpenID CIBA Core
 */
export type GrantType =
  | typeof GRANT_TYPE_AUTHORIZATION_CODE
  | typeof GRANT_TYPE_CLIENT_CREDENTIALS
  | typeof GRANT_TYPE_REFRESH_TOKEN
  | typeof GRANT_TYPE_DEVICE_CODE
  | typeof GRANT_TYPE_CIBA
  | typeof GRANT_TYPE_TOKEN_EXCHANGE;

export type ResponseMode = (typeof SUPPORTED_RESPONSE_MODES)[number];

export type PromptMode = (typeof SUPPORTED_PROMPT_MODES)[number];

/**
 * PKCE code challenge methods (RFC 7636)
 */
export type CodeChallengeMethod = (typeof SUPPORTED_CODE_CHALLENGE_METHODS)[number];

export type CibaDeliveryMode = (typeof SUPPORTED_CIBA_DELIVERY_MODES)[number];

export type TokenType = typeof TOKEN_TYPE_BEARER | typeof TOKEN_TYPE_DPOP;

/**
 * Token Response
 * RFC 6749 Section 5.1, RFC 8693 Section 2.2.1
 */
export interface TokenResponse {
  access_token: string;
  token_type: TokenType | 'N_A';
  expires_in: number;
  refresh_token?: string;
  scope?: string;
  id_token?: string;
  issued_token_type?: string;
}

/**
 * Device Authorization Response
 * RFC 8628 Section 3.2
 */
export interface DeviceAuthorizationResponse {
  device_code: string;
  user_code: string;
  verification_uri: string;
  verification_uri_complete?: string;
  expires_in: number;
  interval: number;
}

/**
 * Pushed Authorization Response
 * RFC 9126 Section 2.2
 */
export interface PushedAuthorizationResponse {
  request_uri: string;
  expires_in: number;
}

/**
 * Backchannel Authentication Response
 * OpenID CIBA Core Section 7.3
 */
export interface BackchannelAuthenticationResponse {
  auth_req_id: string;
  expires_in: number;
  interval: number;
}

/**
 * Token Introspection Response
 * RFC 7662 Section 2.2
 */
export interface IntrospectionResponse {
  active: boolean;
  scope?: string;
  client_id?: string;
  username?: string;
  token_type?: TokenType;
  exp?: number;
  iat?: number;
  nbf?: number;
  sub?: string;
  aud?: string | string[];
  iss?: string;
  jti?: string;
  cnf?: { jkt: string };
}

/**
 * OpenID Connect Discovery 1.0 metadata
 */
export interface OpenIDConfiguration {
  issuer: string;
  authorization_endpoint: string;
  token_endpoint: string;
  userinfo_endpoint: string;
  revocation_endpoint: string;
  introspection_endpoint: string;
  device_authorization_endpoint: string;
  pushed_authorization_request_endpoint: string;
  backchannel_authentication_endpoint: string;
  jwks_uri: string;
  response_types_supported: string[];
  response_modes_supported: string[];
  grant_types_supported: string[];
  subject_types_supported: string[];
  id_token_signing_alg_values_supported: string[];
  token_endpoint_auth_methods_supported: string[];
  code_challenge_methods_supported: string[];
  dpop_signing_alg_values_supported: string[];
  backchannel_token_delivery_modes_supported: string[];
  backchannel_user_code_parameter_supported: boolean;
  require_pushed_authorization_requests: boolean;
  authorization_response_iss_parameter_supported: boolean;
  prompt_values_supported: string[];
  scopes_supported: string[];
  claims_supported: string[];
}
