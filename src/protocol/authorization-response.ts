import type { OAuthContext } from '../types/hono.js';
import type { ResponseMode } from '../types/oauth.js';
import type { ProtocolError } from '../validation/validation-result.js';
import { toOAuthError } from '../validation/validation-result.js';
import {
  HEADER_CACHE_CONTROL,
  HEADER_CONTENT_TYPE,
  HEADER_PRAGMA,
  RESPONSE_MODE_FORM_POST,
  RESPONSE_MODE_FRAGMENT,
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
} from '../config/constants.js';

export type AuthorizationResponseParams = Record<string, string | undefined>;

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

function definedEntries(params: AuthorizationResponseParams): [string, string][] {
  return Object.entries(params).filter((entry): entry is [string, string] => entry[1] !== undefined);
}

/**
 * Redirect URL carrying the response in the query or the fragment
 */
export function buildRedirectUrl(
  redirectUri: string,
  params: AuthorizationResponseParams,
  responseMode: ResponseMode | undefined
): string {
  const url = new URL(redirectUri);

  if (responseMode === RESPONSE_MODE_FRAGMENT) {
    url.hash = new URLSearchParams(definedEntries(params)).toString();
  } else {
    for (const [key, value] of definedEntries(params)) {
      url.searchParams.set(key, value);
    }
  }

  return url.toString();
}

/**
 * Auto-submitting form (OAuth 2.0 Form Post Response Mode)
 */
export function renderFormPost(redirectUri: string, params: AuthorizationResponseParams): string {
  const inputs = definedEntries(params)
    .map(([key, value]) => `<input type="hidden" name="${escapeHtml(key)}" value="${escapeHtml(value)}"/>`)
    .join('');

  return (
    '<!DOCTYPE html><html><head><title>Submit</title></head>' +
    '<body onload="document.forms[0].submit()">' +
    `<form method="post" action="${escapeHtml(redirectUri)}">${inputs}` +
    '<noscript><button type="submit">Continue</button></noscript></form></body></html>'
  );
}

/**
 * Deliver an authorization response to the client. The issuer is always
 * included (RFC 9207).
 */
export function sendAuthorizationResponse(
  c: OAuthContext,
  redirectUri: string,
  params: AuthorizationResponseParams,
  responseMode: ResponseMode | undefined
): Response {
  const withIssuer = { ...params, iss: c.get('tenant').issuer };

  if (responseMode === RESPONSE_MODE_FORM_POST) {
    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);
    c.header(HEADER_CONTENT_TYPE, 'text/html; charset=UTF-8');
    return c.body(renderFormPost(redirectUri, withIssuer));
  }

  return c.redirect(buildRedirectUrl(redirectUri, withIssuer, responseMode));
}

/**
 * Failures before the redirect URI is trusted are shown to the user agent;
 * later ones go back to the client
 */
export function sendAuthorizationError(c: OAuthContext, failure: ProtocolError): Response {
  if (!failure.redirectUriValidated || !failure.redirectUri) {
    throw toOAuthError(failure);
  }

  return sendAuthorizationResponse(
    c,
    failure.redirectUri,
    { error: failure.error, error_description: failure.errorDescription, state: failure.state },
    failure.responseMode
  );
}
