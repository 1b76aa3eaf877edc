import type { Tenant } from '../types/tenant.js';
import type { ValidatedClient } from '../types/client.js';
import type { GrantType } from '../types/oauth.js';
import type { TokenRequest } from '../types/token-request.js';
import { ok } from '../types/result.js';
import {
  GRANT_TYPE_AUTHORIZATION_CODE,
  GRANT_TYPE_CIBA,
  GRANT_TYPE_DEVICE_CODE,
  GRANT_TYPE_REFRESH_TOKEN,
  GRANT_TYPE_TOKEN_EXCHANGE,
  HEADER_DPOP_NONCE,
  SUPPORTED_GRANT_TYPES,
} from '../config/constants.js';
import { getConfig } from '../config/index.js';
import {
  ERROR_INVALID_REQUEST,
  ERROR_INVALID_TARGET,
  ERROR_UNAUTHORIZED_CLIENT,
  ERROR_UNSUPPORTED_GRANT_TYPE,
} from '../errors/error-codes.js';
import type { DPoPProofValidator } from '../dpop/proof-validator.js';
import { invalid, type ValidationResult } from './validation-result.js';
import { scopeValidator } from './scope-validator.js';

/**
 * The DPoP header(s) of the token request and the URL it was sent to
 */
export interface TokenRequestDPoP {
  proofs: readonly string[];
  httpMethod: string;
  httpUri: string;
}

/** Parameters each grant cannot do without */
const REQUIRED_PARAMETERS: Partial<Record<GrantType, readonly string[]>> = {
  [GRANT_TYPE_AUTHORIZATION_CODE]: ['code'],
  [GRANT_TYPE_REFRESH_TOKEN]: ['refresh_token'],
  [GRANT_TYPE_DEVICE_CODE]: ['device_code'],
  [GRANT_TYPE_CIBA]: ['auth_req_id'],
  [GRANT_TYPE_TOKEN_EXCHANGE]: ['subject_token', 'subject_token_type'],
};

function isGrantType(value: string): value is GrantType {
  return (SUPPORTED_GRANT_TYPES as readonly string[]).includes(value);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

export interface TokenRequestValidatorOptions {
  dpopValidator: DPoPProofValidator;
}

/**
 * Validates token endpoint requests after client authentication
 */
export class TokenRequestValidator {
  private readonly dpopValidator: DPoPProofValidator;

  constructor(options: TokenRequestValidatorOptions) {
    this.dpopValidator = options.dpopValidator;
  }

  async validate(
    form: Readonly<Record<string, string>>,
    resources: readonly string[],
    client: ValidatedClient,
    tenant: Tenant,
    dpop: TokenRequestDPoP
  ): Promise<ValidationResult<TokenRequest>> {
    const grantType = nonEmpty(form['grant_type']);
    if (!grantType) {
      return invalid(ERROR_INVALID_REQUEST, 'grant_type is required');
    }
    if (!isGrantType(grantType)) {
      return invalid(ERROR_UNSUPPORTED_GRANT_TYPE, `Unsupported grant_type: ${grantType}`);
    }
    if (!client.allowedGrantTypes.includes(grantType)) {
      return invalid(ERROR_UNAUTHORIZED_CLIENT, `Client is not authorized for grant type: ${grantType}`);
    }

    for (const parameter of REQUIRED_PARAMETERS[grantType] ?? []) {
      if (!nonEmpty(form[parameter])) {
        return invalid(ERROR_INVALID_REQUEST, `${parameter} is required`);
      }
    }

    const requestedScopes = scopeValidator.parseScopes(form['scope']);
    if (requestedScopes.length > 0) {
      const scopes = scopeValidator.validate(requestedScopes, client.allowedScopes, tenant.allowedScopes);
      if (!scopes.ok) return scopes;
    }

    for (const resource of resources) {
      try {
        new URL(resource);
      } catch {
        return invalid(ERROR_INVALID_TARGET, `Invalid resource indicator: ${resource}`);
      }
    }

    const binding = await this.validateDPoP(client, dpop);
    if (!binding.ok) return binding;

    return ok({
      grantType,
      client,
      code: nonEmpty(form['code']),
      redirectUri: nonEmpty(form['redirect_uri']),
      codeVerifier: nonEmpty(form['code_verifier']),
      refreshToken: nonEmpty(form['refresh_token']),
      deviceCode: nonEmpty(form['device_code']),
      authReqId: nonEmpty(form['auth_req_id']),
      subjectToken: nonEmpty(form['subject_token']),
      subjectTokenType: nonEmpty(form['subject_token_type']),
      actorToken: nonEmpty(form['actor_token']),
      actorTokenType: nonEmpty(form['actor_token_type']),
      requestedTokenType: nonEmpty(form['requested_token_type']),
      scope: nonEmpty(form['scope']),
      requestedScopes,
      resource: [...resources],
      dpopProof: binding.value?.proof,
      dpopKeyThumbprint: binding.value?.thumbprint,
      raw: Object.freeze({ ...form }),
    });
  }

  private async validateDPoP(
    client: ValidatedClient,
    dpop: TokenRequestDPoP
  ): Promise<ValidationResult<{ proof: string; thumbprint: string } | undefined>> {
    if (dpop.proofs.length > 1) {
      return invalid(ERROR_INVALID_REQUEST, 'Only one DPoP proof may be sent');
    }

    const [proof] = dpop.proofs;
    if (proof === undefined) {
      if (client.requireDPoP) {
        return invalid(ERROR_INVALID_REQUEST, 'DPoP proof is required for this client');
      }
      return ok(undefined);
    }

    const result = await this.dpopValidator.validate({
      proof,
      httpMethod: dpop.httpMethod,
      httpUri: dpop.httpUri,
      requireNonce: client.requireDPoP || getConfig().dpop.requireNonce,
      clientId: client.clientId,
    });

    if (!result.isValid) {
      return invalid(
        result.error === 'use_dpop_nonce' ? 'use_dpop_nonce' : 'invalid_dpop_proof',
        result.errorDescription,
        result.requiresNonce ? { headers: { [HEADER_DPOP_NONCE]: result.serverNonce } } : {}
      );
    }

    return ok({ proof, thumbprint: result.jwkThumbprint });
  }
}
