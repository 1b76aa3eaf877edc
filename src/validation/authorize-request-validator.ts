import type { Tenant } from '../types/tenant.js';
import type { ValidatedClient } from '../types/client.js';
import { toValidatedClient } from '../types/client.js';
import type { PromptMode } from '../types/oauth.js';
import { parseAuthorizeRequest, splitSpaceDelimited, type AuthorizeRequest, type RequestParams } from '../types/authorize-request.js';
import { ok } from '../types/result.js';
import type { IClientStorage } from '../storage/interfaces/client-storage.js';
import type { IPushedAuthorizationStorage } from '../storage/interfaces/par-storage.js';
import {
  GRANT_TYPE_AUTHORIZATION_CODE,
  PAR_REQUEST_URI_PREFIX,
  PROMPT_NONE,
  RESPONSE_TYPE_CODE,
  RESPONSE_TYPE_ID_TOKEN,
  SUPPORTED_PROMPT_MODES,
} from '../config/constants.js';
import {
  ERROR_INVALID_REQUEST,
  ERROR_INVALID_REQUEST_OBJECT,
  ERROR_INVALID_REQUEST_URI,
  ERROR_INVALID_TARGET,
  ERROR_UNAUTHORIZED_CLIENT,
  ERROR_UNSUPPORTED_RESPONSE_TYPE,
  type OAuthErrorCode,
} from '../errors/error-codes.js';
import { componentLogger } from '../logging/logger.js';
import { invalid, type ValidationResult } from './validation-result.js';
import { redirectUriValidator } from './redirect-uri-validator.js';
import { scopeValidator } from './scope-validator.js';
import { pkceValidator } from './pkce-validator.js';

export interface ValidatedAuthorizeRequest {
  request: AuthorizeRequest;
  client: ValidatedClient;
  redirectUri: string;
  /** Effective parameters, after any pushed request was expanded */
  parameters: Record<string, string>;
  /** Whether the parameters came from a pushed authorization request */
  pushed: boolean;
}

export interface AuthorizeRequestValidatorOptions {
  clients: IClientStorage;
  pushedAuthorizations: IPushedAuthorizationStorage;
}

function isPromptMode(value: string): value is PromptMode {
  return (SUPPORTED_PROMPT_MODES as readonly string[]).includes(value);
}

function isAbsoluteUri(value: string): boolean {
  try {
    new URL(value);
    return !value.includes('#');
  } catch {
    return false;
  }
}

/**
 * Validates authorization requests (RFC 6749 Section 4.1.1, OIDC Core
 * Section 3.1.2.2, RFC 9126, RFC 8707)
 */
export class AuthorizeRequestValidator {
  private readonly clients: IClientStorage;
  private readonly pushedAuthorizations: IPushedAuthorizationStorage;

  constructor(options: AuthorizeRequestValidatorOptions) {
    this.clients = options.clients;
    this.pushedAuthorizations = options.pushedAuthorizations;
  }

  /**
   * `pushing` is set when validating the body of a pushed authorization
   * request, which must not itself carry a request_uri
   */
  async validate(
    params: RequestParams,
    tenant: Tenant,
    options: { pushing?: boolean } = {}
  ): Promise<ValidationResult<ValidatedAuthorizeRequest>> {
    let request = parseAuthorizeRequest(params);

    if (!request.clientId) {
      return invalid(ERROR_INVALID_REQUEST, 'client_id is required');
    }

    const stored = await this.clients.findByClientId(tenant.id, request.clientId);
    if (!stored) {
      return invalid(ERROR_INVALID_REQUEST, 'Unknown client_id');
    }
    const client = toValidatedClient(stored, tenant);

    let pushed = false;
    if (options.pushing) {
      if (request.requestUri) {
        return invalid(ERROR_INVALID_REQUEST, 'request_uri cannot be used in a pushed authorization request');
      }
    } else if (request.requestUri) {
      const expanded = await this.expandPushedRequest(request, tenant);
      if (!expanded.ok) return expanded;
      request = expanded.value;
      pushed = true;
    } else if (client.requirePushedAuthorization) {
      return invalid(ERROR_INVALID_REQUEST, 'Pushed authorization request is required for this client');
    }

    if (request.requestedResponseTypes.length === 0) {
      return invalid(ERROR_INVALID_REQUEST, 'response_type is required');
    }
    if (request.responseType !== RESPONSE_TYPE_CODE) {
      return invalid(ERROR_UNSUPPORTED_RESPONSE_TYPE, `Unsupported response_type: ${request.responseType}`);
    }

    if (!client.allowedGrantTypes.includes(GRANT_TYPE_AUTHORIZATION_CODE)) {
      return invalid(ERROR_UNAUTHORIZED_CLIENT, 'Client is not authorized for the authorization code grant');
    }

    const redirect = redirectUriValidator.validate(request.redirectUri, client.redirectUris);
    if (!redirect.ok) return redirect;
    const redirectUri = redirect.value;

    // From here on failures go back to the client by redirect
    const fail = (error: OAuthErrorCode, description: string) =>
      invalid(error, description, {
        redirectUriValidated: true,
        redirectUri,
        state: request.state,
        responseMode: request.responseMode,
      });

    if (request.request) {
      return fail(ERROR_INVALID_REQUEST_OBJECT, 'Request objects are not supported');
    }

    const scopes = scopeValidator.validate(request.requestedScopes, client.allowedScopes, tenant.allowedScopes);
    if (!scopes.ok) return fail(scopes.error.error, scopes.error.errorDescription);

    const pkce = pkceValidator.validateCodeChallenge(
      request.codeChallenge,
      request.raw['code_challenge_method'],
      client.requirePkce,
      client.allowPlainTextPkce
    );
    if (!pkce.ok) return fail(pkce.error.error, pkce.error.errorDescription);

    if (request.requestedResponseTypes.includes(RESPONSE_TYPE_ID_TOKEN) && !request.nonce) {
      return fail(ERROR_INVALID_REQUEST, 'nonce is required when response_type includes id_token');
    }

    const promptModes: PromptMode[] = [];
    for (const prompt of splitSpaceDelimited(request.prompt)) {
      if (!isPromptMode(prompt)) {
        return fail(ERROR_INVALID_REQUEST, `Unsupported prompt value: ${prompt}`);
      }
      promptModes.push(prompt);
    }
    if (promptModes.includes(PROMPT_NONE) && promptModes.length > 1) {
      return fail(ERROR_INVALID_REQUEST, 'prompt=none cannot be combined with other values');
    }

    const maxAgeRaw = request.raw['max_age'];
    if (maxAgeRaw !== undefined && !/^\d+$/.test(maxAgeRaw)) {
      return fail(ERROR_INVALID_REQUEST, 'max_age must be a non-negative integer');
    }

    const badResource = request.resource.find((resource) => !isAbsoluteUri(resource));
    if (badResource !== undefined) {
      return fail(ERROR_INVALID_TARGET, `Invalid resource indicator: ${badResource}`);
    }

    return ok({
      request: {
        ...request,
        redirectUri,
        codeChallenge: pkce.value.codeChallenge,
        codeChallengeMethod: pkce.value.codeChallengeMethod,
        requestedScopes: scopes.value.scopes,
        promptModes,
      },
      client,
      redirectUri,
      parameters: { ...request.raw },
      pushed,
    });
  }

  /**
   * Replace the front-channel parameters with the pushed ones. The
   * request_uri is single use.
   */
  private async expandPushedRequest(
    request: AuthorizeRequest,
    tenant: Tenant
  ): Promise<ValidationResult<AuthorizeRequest>> {
    const requestUri = request.requestUri ?? '';
    if (!requestUri.startsWith(PAR_REQUEST_URI_PREFIX)) {
      return invalid(ERROR_INVALID_REQUEST_URI, 'request_uri was not issued by this server');
    }

    const pushedRequest = await this.pushedAuthorizations.consume(tenant.id, requestUri);
    if (!pushedRequest) {
      componentLogger('authorize').debug({ clientId: request.clientId }, 'Pushed request unknown, expired or used');
      return invalid(ERROR_INVALID_REQUEST_URI, 'request_uri is invalid, expired or already used');
    }

    if (pushedRequest.clientId !== request.clientId) {
      return invalid(ERROR_INVALID_REQUEST_URI, 'request_uri was issued to a different client');
    }

    const { parameters } = pushedRequest;
    return ok(
      parseAuthorizeRequest({
        ...parameters,
        resource: splitSpaceDelimited(parameters['resource']),
        client_id: pushedRequest.clientId,
      })
    );
  }
}
