import type { CodeChallengeMethod, PromptMode, ResponseMode } from './oauth.js';
import { OPENID_SCOPE } from '../config/constants.js';

/**
 * Authorization request
 * RFC 6749 Section 4.1.1, OpenID Connect Core 1.0 Section 3.1.2.1
 */
export interface AuthorizeRequest {
  clientId: string;
  responseType: string;
  redirectUri?: string;
  /** False when the client left redirect_uri out and the registered one was used */
  redirectUriSent: boolean;
  scope?: string;
  state?: string;
  nonce?: string;
  codeChallenge?: string;
  codeChallengeMethod?: CodeChallengeMethod;
  responseMode?: ResponseMode;
  display?: string;
  prompt?: string;
  maxAge?: number;
  uiLocales?: string;
  idTokenHint?: string;
  loginHint?: string;
  acrValues?: string;
  domainHint?: string;
  request?: string;
  requestUri?: string;
  uiMode?: string;
  policy?: string;
  resource: string[];
  dpopKeyThumbprint?: string;
  requestedScopes: string[];
  requestedResponseTypes: string[];
  promptModes: PromptMode[];
  /** Every parameter as received, for journey conditions */
  raw: Readonly<Record<string, string>>;
}

export type RequestParams = Record<string, string | string[] | undefined>;

function first(value: string | string[] | undefined): string | undefined {
  const v = Array.isArray(value) ? value[0] : value;
  return v === undefined || v === '' ? undefined : v;
}

function all(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  return (Array.isArray(value) ? value : [value]).filter((v) => v.length > 0);
}

export function splitSpaceDelimited(value: string | undefined): string[] {
  if (!value) return [];
  return [...new Set(value.split(' ').map((s) => s.trim()).filter((s) => s.length > 0))];
}

/**
 * Build the request model from query or form parameters. No validation
 * happens here beyond shape; see AuthorizeRequestValidator.
 */
export function parseAuthorizeRequest(params: RequestParams): AuthorizeRequest {
  const scope = first(params['scope']);
  const responseType = first(params['response_type']) ?? '';
  const maxAgeRaw = first(params['max_age']);
  const maxAge = maxAgeRaw !== undefined ? Number(maxAgeRaw) : undefined;
  const method = first(params['code_challenge_method']);
  const responseMode = first(params['response_mode']);

  const raw: Record<string, string> = {};
  for (const [key, value] of Object.entries(params)) {
    const v = first(value);
    if (v !== undefined) raw[key] = v;
  }

  return {
    clientId: first(params['client_id']) ?? '',
    responseType,
    redirectUri: first(params['redirect_uri']),
    redirectUriSent: first(params['redirect_uri']) !== undefined,
    scope,
    state: first(params['state']),
    nonce: first(params['nonce']),
    codeChallenge: first(params['code_challenge']),
    codeChallengeMethod: method === 'plain' || method === 'S256' ? method : undefined,
    responseMode:
      responseMode === 'query' || responseMode === 'fragment' || responseMode === 'form_post'
        ? responseMode
        : undefined,
    display: first(params['display']),
    prompt: first(params['prompt']),
    maxAge: maxAge !== undefined && Number.isFinite(maxAge) ? maxAge : undefined,
    uiLocales: first(params['ui_locales']),
    idTokenHint: first(params['id_token_hint']),
    loginHint: first(params['login_hint']),
    acrValues: first(params['acr_values']),
    domainHint: first(params['domain_hint']),
    request: first(params['request']),
    requestUri: first(params['request_uri']),
    uiMode: first(params['ui_mode']),
    policy: first(params['policy']) ?? first(params['p']),
    resource: all(params['resource']),
    dpopKeyThumbprint: first(params['dpop_jkt']),
    requestedScopes: splitSpaceDelimited(scope),
    requestedResponseTypes: splitSpaceDelimited(responseType),
    promptModes: [],
    raw: Object.freeze(raw),
  };
}

export function isOpenIdRequest(request: Pick<AuthorizeRequest, 'requestedScopes'>): boolean {
  return request.requestedScopes.includes(OPENID_SCOPE);
}
