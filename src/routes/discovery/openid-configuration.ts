import { Hono } from 'hono';
import type { OAuthEnv } from '../../types/hono.js';
import type { OpenIDConfiguration } from '../../types/oauth.js';
import {
  DPOP_SUPPORTED_ALGORITHMS,
  HEADER_CACHE_CONTROL,
  SUPPORTED_CIBA_DELIVERY_MODES,
  SUPPORTED_CLIENT_AUTH_METHODS,
  SUPPORTED_PROMPT_MODES,
  SUPPORTED_RESPONSE_MODES,
  SUPPORTED_RESPONSE_TYPES,
  SUPPORTED_SIGNING_ALGORITHMS,
} from '../../config/constants.js';

const CLAIMS_SUPPORTED = [
  'iss',
  'sub',
  'aud',
  'exp',
  'iat',
  'auth_time',
  'nonce',
  'acr',
  'amr',
  'azp',
  'sid',
  'name',
  'given_name',
  'family_name',
  'nickname',
  'preferred_username',
  'picture',
  'locale',
  'updated_at',
  'email',
  'email_verified',
  'address',
  'phone_number',
  'phone_number_verified',
];

/**
 * Create OpenID Connect discovery endpoint
 *
 * GET /:tenant/.well-known/openid-configuration
 */
export function createOpenIDConfigurationRoutes() {
  const router = new Hono<OAuthEnv>();

  router.get('/', (c) => {
    const tenant = c.get('tenant');
    const endpoint = (path: string) => `${tenant.issuer}${path}`;

    const config: OpenIDConfiguration = {
      issuer: tenant.issuer,
      authorization_endpoint: endpoint('/connect/authorize'),
      token_endpoint: endpoint('/connect/token'),
      userinfo_endpoint: endpoint('/connect/userinfo'),
      jwks_uri: endpoint('/.well-known/jwks'),
      revocation_endpoint: endpoint('/connect/revocation'),
      introspection_endpoint: endpoint('/connect/introspect'),
      device_authorization_endpoint: endpoint('/connect/deviceauthorization'),
      pushed_authorization_request_endpoint: endpoint('/connect/par'),
      backchannel_authentication_endpoint: endpoint('/connect/ciba'),

      response_types_supported: [...SUPPORTED_RESPONSE_TYPES],
      response_modes_supported: [...SUPPORTED_RESPONSE_MODES],
      grant_types_supported: tenant.allowedGrants,
      subject_types_supported: ['public'],
      id_token_signing_alg_values_supported: [...SUPPORTED_SIGNING_ALGORITHMS],
      token_endpoint_auth_methods_supported: [...SUPPORTED_CLIENT_AUTH_METHODS],
      // plain is accepted only from clients that opt in
      code_challenge_methods_supported: ['S256'],
      dpop_signing_alg_values_supported: [...DPOP_SUPPORTED_ALGORITHMS],
      backchannel_token_delivery_modes_supported: [...SUPPORTED_CIBA_DELIVERY_MODES],
      backchannel_user_code_parameter_supported: true,
      require_pushed_authorization_requests: false,
      authorization_response_iss_parameter_supported: true,
      prompt_values_supported: [...SUPPORTED_PROMPT_MODES],

      scopes_supported: tenant.allowedScopes,
      claims_supported: CLAIMS_SUPPORTED,
    };

    c.header(HEADER_CACHE_CONTROL, 'public, max-age=3600');

    return c.json(config);
  });

  return router;
}
