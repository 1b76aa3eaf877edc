import type { MiddlewareHandler } from 'hono';
import type { OAuthEnv } from '../types/hono.js';
import type { Tenant } from '../types/tenant.js';
import type { ValidatedClient } from '../types/client.js';
import { generateId } from '../crypto/random.js';

export const EndpointType = {
  Authorize: 'Authorize',
  Token: 'Token',
  Metadata: 'Metadata',
  UserInfo: 'UserInfo',
  Logout: 'Logout',
  Introspection: 'Introspection',
  Revocation: 'Revocation',
  DeviceAuthorization: 'DeviceAuthorization',
  PushedAuthorization: 'PushedAuthorization',
  BackchannelAuthentication: 'BackchannelAuthentication',
} as const;

export type EndpointType = (typeof EndpointType)[keyof typeof EndpointType];

export const UiMode = {
  Journey: 'Journey',
  Standalone: 'Standalone',
  Headless: 'Headless',
} as const;

export type UiMode = (typeof UiMode)[keyof typeof UiMode];

/**
 * Per-request protocol facts, resolved once and read by endpoint handlers
 */
export interface ProtocolContext {
  readonly endpointType: EndpointType;
  readonly tenantId: string;
  readonly clientId?: string;
  readonly uiMode: UiMode;
  readonly policyId?: string;
  /** Survives the user-agent round trip through journeys */
  readonly correlationId: string;
  readonly properties: Readonly<Record<string, string>>;
}

/**
 * Tenant-relative paths of every protocol endpoint
 */
export const ENDPOINT_PATHS: Readonly<Record<string, EndpointType>> = {
  '/connect/authorize': EndpointType.Authorize,
  '/connect/token': EndpointType.Token,
  '/connect/userinfo': EndpointType.UserInfo,
  '/connect/revocation': EndpointType.Revocation,
  '/connect/introspect': EndpointType.Introspection,
  '/connect/endsession': EndpointType.Logout,
  '/connect/deviceauthorization': EndpointType.DeviceAuthorization,
  '/connect/par': EndpointType.PushedAuthorization,
  '/connect/ciba': EndpointType.BackchannelAuthentication,
  '/.well-known/openid-configuration': EndpointType.Metadata,
  '/.well-known/jwks': EndpointType.Metadata,
};

export function resolveEndpointType(path: string): EndpointType | null {
  const normalized = path.length > 1 && path.endsWith('/') ? path.slice(0, -1) : path;
  return ENDPOINT_PATHS[normalized.toLowerCase()] ?? null;
}

/**
 * Parse a `ui_mode` value, case-insensitively
 */
export function parseUiMode(value: string | undefined): UiMode | null {
  if (!value) return null;
  const lower = value.toLowerCase();
  return Object.values(UiMode).find((mode) => mode.toLowerCase() === lower) ?? null;
}

/**
 * Tenant and client settings win over the request; journeys are the default
 */
export function resolveUiMode(
  tenant: Pick<Tenant, 'journeysEnabled'>,
  client: Pick<ValidatedClient, 'useJourneyFlow'> | undefined,
  parameters: Readonly<Record<string, string | undefined>>
): UiMode {
  if (!tenant.journeysEnabled) return UiMode.Standalone;
  if (client?.useJourneyFlow === false) return UiMode.Standalone;
  return parseUiMode(parameters['ui_mode']) ?? UiMode.Journey;
}

export function resolvePolicyId(parameters: Readonly<Record<string, string | undefined>>): string | undefined {
  return parameters['policy'] || parameters['p'] || undefined;
}

export function resolveCorrelationId(parameters: Readonly<Record<string, string | undefined>>): string {
  return parameters['correlation_id'] || generateId();
}

export interface ProtocolContextInput {
  endpointType: EndpointType;
  tenant: Tenant;
  client?: ValidatedClient;
  parameters: Readonly<Record<string, string | undefined>>;
  properties?: Readonly<Record<string, string>>;
}

export function createProtocolContext(input: ProtocolContextInput): ProtocolContext {
  const { endpointType, tenant, client, parameters } = input;

  return Object.freeze({
    endpointType,
    tenantId: tenant.id,
    clientId: client?.clientId ?? (parameters['client_id'] || undefined),
    uiMode: resolveUiMode(tenant, client, parameters),
    policyId: resolvePolicyId(parameters),
    correlationId: resolveCorrelationId(parameters),
    properties: Object.freeze({ ...input.properties }),
  });
}

/**
 * Sets `protocolContext` for requests to known endpoints. Must run after
 * tenant resolution. Only query parameters are read here; handlers that
 * take form posts refine the context once they have parsed the body.
 */
export function protocolContext(): MiddlewareHandler<OAuthEnv> {
  return async (c, next) => {
    const tenant = c.get('tenant');
    const prefix = `/${tenant.slug}`;
    const path = c.req.path.startsWith(prefix) ? c.req.path.slice(prefix.length) : c.req.path;

    const endpointType = resolveEndpointType(path || '/');
    if (endpointType) {
      c.set('protocolContext', createProtocolContext({ endpointType, tenant, parameters: c.req.query() }));
    }

    await next();
  };
}
