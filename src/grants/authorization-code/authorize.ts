import type { OAuthContext } from '../../types/hono.js';
import type { AuthorizeRequest } from '../../types/authorize-request.js';
import type { Tenant } from '../../types/tenant.js';
import type {
  IAuthorizationCodeStorage,
  IClientStorage,
  IJourneyPolicyStore,
  IJourneyStateStore,
  IProtocolStateStore,
  IUserAuthenticator,
  ProtocolCompletion,
  ProtocolState,
} from '../../storage/interfaces/index.js';
import type { AuthorizeRequestValidator, ValidatedAuthorizeRequest } from '../../validation/authorize-request-validator.js';
import type { JourneyOrchestrator } from '../../journeys/orchestrator.js';
import type { JourneyCompletion, JourneyPolicy, JourneyResult, JourneyStepInput, JourneyType } from '../../journeys/types.js';
import { parseAuthorizeRequest, splitSpaceDelimited } from '../../types/authorize-request.js';
import { toValidatedClient } from '../../types/client.js';
import { OAuthError } from '../../errors/oauth-error.js';
import {
  ERROR_ACCESS_DENIED,
  ERROR_INVALID_REQUEST,
  ERROR_LOGIN_REQUIRED,
  ERROR_SERVER_ERROR,
  type OAuthErrorCode,
} from '../../errors/error-codes.js';
import { invalid } from '../../validation/validation-result.js';
import { sendAuthorizationError, sendAuthorizationResponse } from '../../protocol/authorization-response.js';
import { EndpointType, UiMode, createProtocolContext } from '../../protocol/context.js';
import { GRANTED_SCOPES_KEY } from '../../journeys/steps/consent-step.js';
import { generateId } from '../../crypto/random.js';
import { getConfig } from '../../config/index.js';
import { componentLogger } from '../../logging/logger.js';
import { PROMPT_CREATE, PROMPT_NONE } from '../../config/constants.js';
import { readRequestParams } from '../../protocol/request-params.js';

export interface AuthorizeHandlerOptions {
  validator: AuthorizeRequestValidator;
  clients: IClientStorage;
  authorizationCodes: IAuthorizationCodeStorage;
  protocolStates: IProtocolStateStore;
  journeyPolicies: IJourneyPolicyStore;
  journeyStates: IJourneyStateStore;
  orchestrator: JourneyOrchestrator;
  /** Authenticates users outside journeys (Standalone and Headless modes) */
  userAuthenticator?: IUserAuthenticator;
}

/**
 * Journey data that drives the journey itself and never becomes a token claim
 */
const JOURNEY_INTERNAL_KEYS = new Set([
  'sub',
  'auth_time',
  'amr',
  'acr',
  'username',
  'email',
  'name',
  'password',
  'loginHint',
  'acrValues',
  'scopes',
  'client_id',
  'correlation_id',
  GRANTED_SCOPES_KEY,
  'lastError',
  'lastErrorDescription',
  'failedStepId',
]);

/**
 * The parameters needed to finish the request later, normalized by the
 * validator (resolved redirect URI, deduplicated scopes)
 */
export function pendingParameters(validated: ValidatedAuthorizeRequest): Record<string, string> {
  const { request } = validated;
  const candidates: Record<string, string | undefined> = {
    client_id: request.clientId,
    response_type: request.responseType,
    redirect_uri: validated.redirectUri,
    response_mode: request.responseMode,
    scope: request.requestedScopes.join(' '),
    state: request.state,
    nonce: request.nonce,
    code_challenge: request.codeChallenge,
    code_challenge_method: request.codeChallengeMethod,
    dpop_jkt: request.dpopKeyThumbprint,
    acr_values: request.acrValues,
    resource: request.resource.length > 0 ? request.resource.join(' ') : undefined,
  };

  const parameters: Record<string, string> = {};
  for (const [key, value] of Object.entries(candidates)) {
    if (value !== undefined && value !== '') parameters[key] = value;
  }
  return parameters;
}

export function restoreRequest(parameters: Readonly<Record<string, string>>, redirectUriSent = true): AuthorizeRequest {
  return {
    ...parseAuthorizeRequest({ ...parameters, resource: splitSpaceDelimited(parameters['resource']) }),
    redirectUriSent,
  };
}

/**
 * Map a finished journey onto the authorization it was started for
 */
export function completionFromJourney(completion: JourneyCompletion, now = Math.floor(Date.now() / 1000)): ProtocolCompletion {
  const { claims } = completion;
  const authTime = Number(claims['auth_time']);
  const granted = claims[GRANTED_SCOPES_KEY];

  const extra: Record<string, string> = {};
  for (const [key, value] of Object.entries(claims)) {
    if (!JOURNEY_INTERNAL_KEYS.has(key) && !key.startsWith('_')) extra[key] = value;
  }

  return {
    userId: completion.userId,
    sessionId: completion.sessionId,
    authTime: Number.isInteger(authTime) && authTime > 0 ? authTime : now,
    amr: claims['amr'] ? splitSpaceDelimited(claims['amr']) : undefined,
    acr: claims['acr'] || undefined,
    claims: extra,
    grantedScopes: granted !== undefined ? splitSpaceDelimited(granted) : undefined,
  };
}

function journeyTypeFor(request: AuthorizeRequest): JourneyType {
  return request.promptModes.includes(PROMPT_CREATE) ? 'SignUp' : 'SignIn';
}

function journeyResponse(result: JourneyResult, correlationId: string) {
  const step = result.currentStep;
  return {
    journey_id: result.journeyId,
    correlation_id: correlationId,
    status: result.status,
    current_step: step && {
      step_id: step.stepId,
      step_type: step.stepType,
      display_name: step.displayName,
      view_name: step.viewName,
      view_data: step.viewData,
      error: step.error,
    },
    error: result.error,
    error_description: result.errorDescription,
  };
}

/**
 * Authorization endpoint (GET/POST /:tenant/connect/authorize) and journey
 * continuation (POST /:tenant/connect/journey/:journeyId)
 *
 * RFC 6749 Section 4.1, OpenID Connect Core 1.0 Section 3.1.2, RFC 9207
 */
export function createAuthorizeHandlers(options: AuthorizeHandlerOptions) {
  const { validator, clients, authorizationCodes, protocolStates, journeyPolicies, journeyStates, orchestrator } =
    options;

  async function issueCode(
    c: OAuthContext,
    request: AuthorizeRequest,
    lifetimeSeconds: number,
    subject: ProtocolCompletion
  ): Promise<Response> {
    const tenant = c.get('tenant');
    const redirectUri = request.redirectUri ?? '';

    const grantedScopes = subject.grantedScopes
      ? request.requestedScopes.filter((scope) => subject.grantedScopes?.includes(scope))
      : request.requestedScopes;

    const { value } = await authorizationCodes.create({
      tenantId: tenant.id,
      clientId: request.clientId,
      subjectId: subject.userId,
      sessionId: subject.sessionId ?? generateId(),
      redirectUri,
      redirectUriSent: request.redirectUriSent,
      codeChallenge: request.codeChallenge,
      codeChallengeMethod: request.codeChallengeMethod,
      dpopJkt: request.dpopKeyThumbprint,
      nonce: request.nonce,
      requestedScopes: request.requestedScopes,
      grantedScopes,
      authTime: subject.authTime,
      amr: subject.amr,
      acr: subject.acr,
      claims: Object.keys(subject.claims).length > 0 ? subject.claims : undefined,
      expiresAt: new Date(Date.now() + lifetimeSeconds * 1000),
    });

    componentLogger('authorize').info(
      { tenant: tenant.slug, clientId: request.clientId, sub: subject.userId, scopes: grantedScopes },
      'Authorization code issued'
    );

    return sendAuthorizationResponse(c, redirectUri, { code: value, state: request.state }, request.responseMode);
  }

  function redirectError(c: OAuthContext, request: AuthorizeRequest, error: OAuthErrorCode, description: string) {
    return sendAuthorizationError(
      c,
      invalid(error, description, {
        redirectUriValidated: true,
        redirectUri: request.redirectUri,
        state: request.state,
        responseMode: request.responseMode,
      }).error
    );
  }

  /**
   * Code for a completed journey that signed a user in, an error redirect
   * for anything else
   */
  async function finishJourney(
    c: OAuthContext,
    request: AuthorizeRequest,
    lifetimeSeconds: number,
    result: JourneyResult
  ): Promise<Response> {
    if (result.status !== 'completed' || !result.completion) {
      return redirectError(c, request, ERROR_ACCESS_DENIED, result.errorDescription ?? 'Authentication failed');
    }
    if (!result.completion.userId) {
      return redirectError(c, request, ERROR_ACCESS_DENIED, 'Journey completed without signing in a user');
    }
    return issueCode(c, request, lifetimeSeconds, completionFromJourney(result.completion));
  }

  async function resolvePolicy(
    tenant: Tenant,
    validated: ValidatedAuthorizeRequest,
    policyId: string | undefined
  ): Promise<JourneyPolicy | null> {
    const { request } = validated;
    const type = journeyTypeFor(request);

    if (policyId) {
      const policy = await journeyPolicies.getById(policyId);
      if (!policy || !policy.enabled || policy.type !== type) return null;
      return policy.tenantId === undefined || policy.tenantId === tenant.id ? policy : null;
    }

    return journeyPolicies.findMatching({
      tenantId: tenant.id,
      clientId: request.clientId,
      type,
      scopes: request.requestedScopes,
      acrValues: request.acrValues,
      additionalParameters: validated.parameters,
    });
  }

  async function startJourney(c: OAuthContext, validated: ValidatedAuthorizeRequest): Promise<Response> {
    const tenant = c.get('tenant');
    const context = c.get('protocolContext');
    const { request, client } = validated;
    const correlationId = context?.correlationId ?? generateId();

    if (request.promptModes.includes(PROMPT_NONE)) {
      return redirectError(c, request, ERROR_LOGIN_REQUIRED, 'User interaction is required');
    }

    const policy = await resolvePolicy(tenant, validated, context?.policyId);
    if (!policy) {
      componentLogger('authorize').warn(
        { tenant: tenant.slug, clientId: client.clientId, policyId: context?.policyId },
        'No journey policy for authorization request'
      );
      return context?.policyId
        ? redirectError(c, request, ERROR_INVALID_REQUEST, `Unknown journey policy: ${context.policyId}`)
        : redirectError(c, request, ERROR_SERVER_ERROR, 'No sign-in journey is configured');
    }

    const result = await orchestrator.start(policy, {
      tenantId: tenant.id,
      clientId: client.clientId,
      correlationId,
      callbackUrl: `${tenant.issuer}/connect/authorize?correlation_id=${encodeURIComponent(correlationId)}`,
      loginHint: request.loginHint,
      acrValues: request.acrValues,
      requestedScopes: request.requestedScopes,
      properties: { correlation_id: correlationId },
    });

    if (result.status !== 'in_progress') {
      return finishJourney(c, request, client.authorizationCodeLifetime, result);
    }

    const now = new Date();
    const state: ProtocolState = {
      correlationId,
      tenantId: tenant.id,
      clientId: client.clientId,
      parameters: pendingParameters(validated),
      redirectUriSent: request.redirectUriSent,
      journeyId: result.journeyId,
      createdAt: now,
      expiresAt: new Date(now.getTime() + getConfig().journeys.stateLifetimeMinutes * 60_000),
    };
    await protocolStates.save(state);

    return c.json(journeyResponse(result, correlationId));
  }

  async function authenticateDirectly(
    c: OAuthContext,
    validated: ValidatedAuthorizeRequest,
    uiMode: UiMode
  ): Promise<Response> {
    const { request, client } = validated;

    if (!options.userAuthenticator) {
      return redirectError(c, request, ERROR_SERVER_ERROR, 'No user authenticator is configured');
    }

    const auth = await options.userAuthenticator.authenticate(c);
    if (!auth.authenticated) {
      if (request.promptModes.includes(PROMPT_NONE) || uiMode === UiMode.Headless) {
        return redirectError(c, request, ERROR_LOGIN_REQUIRED, 'User is not authenticated');
      }
      return c.redirect(auth.redirectTo);
    }

    return issueCode(c, request, client.authorizationCodeLifetime, {
      userId: auth.user.id,
      sessionId: auth.sessionId,
      authTime: Math.floor(Date.now() / 1000),
      claims: {},
    });
  }

  async function authorize(c: OAuthContext): Promise<Response> {
    const tenant = c.get('tenant');
    const params = await readRequestParams(c);

    const result = await validator.validate(params, tenant);
    if (!result.ok) {
      componentLogger('authorize').info(
        { tenant: tenant.slug, error: result.error.error, description: result.error.errorDescription },
        'Authorization request rejected'
      );
      return sendAuthorizationError(c, result.error);
    }
    const validated = result.value;

    const context = createProtocolContext({
      endpointType: EndpointType.Authorize,
      tenant,
      client: validated.client,
      parameters: validated.parameters,
    });
    c.set('protocolContext', context);

    return context.uiMode === UiMode.Journey
      ? startJourney(c, validated)
      : authenticateDirectly(c, validated, context.uiMode);
  }

  async function continueJourney(c: OAuthContext, journeyId: string, input: JourneyStepInput): Promise<Response> {
    const tenant = c.get('tenant');
    const log = componentLogger('authorize');

    const journey = await journeyStates.get(journeyId);
    if (!journey || journey.tenantId !== tenant.id || !journey.correlationId) {
      throw OAuthError.invalidRequest('Journey not found or expired');
    }
    const correlationId = journey.correlationId;

    const result = await orchestrator.continue(journeyId, input);
    if (result.status === 'in_progress') {
      return c.json(journeyResponse(result, correlationId));
    }

    const state = await protocolStates.consume(correlationId);
    if (!state || state.tenantId !== tenant.id || state.journeyId !== journeyId) {
      log.warn({ tenant: tenant.slug, journeyId, correlationId }, 'Protocol state missing for journey');
      throw OAuthError.invalidRequest('Authorization request not found or expired');
    }
    const request = restoreRequest(state.parameters, state.redirectUriSent);

    if (result.status !== 'completed') {
      return finishJourney(c, request, 0, result);
    }

    const stored = await clients.findByClientId(tenant.id, state.clientId);
    if (!stored) {
      return redirectError(c, request, ERROR_ACCESS_DENIED, 'Client is no longer available');
    }
    const client = toValidatedClient(stored, tenant);

    return finishJourney(c, request, client.authorizationCodeLifetime, result);
  }

  return { authorize, continueJourney };
}

export type AuthorizeHandlers = ReturnType<typeof createAuthorizeHandlers>;
