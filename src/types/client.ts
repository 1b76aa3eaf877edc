import type { JWK } from 'jose';
import type { GrantType, CibaDeliveryMode } from './oauth.js';
import type { Tenant } from './tenant.js';
import { CIBA_DELIVERY_MODE_POLL } from '../config/constants.js';
import { getConfig } from '../config/index.js';

/**
 * Client types
 * RFC 6749 Section 2.1
 */
export type ClientType = 'confidential' | 'public';

/**
 * Client authentication methods
 * RFC 6749 Section 2.3, OpenID Connect Core Section 9
 */
export type ClientAuthMethod =
  | 'client_secret_basic'
  | 'client_secret_post'
  | 'private_key_jwt'
  | 'none';

export interface JsonWebKeySet {
  keys: JWK[];
}

/**
 * Registered client (as stored)
 */
export interface OAuthClient {
  id: string;
  tenantId: string;
  clientId: string;
  clientSecretHash?: string;
  clientType: ClientType;
  authMethod: ClientAuthMethod;
  name: string;
  redirectUris: string[]; // exact match
  allowedGrants: GrantType[];
  allowedScopes: string[];
  jwks?: JsonWebKeySet; // private_key_jwt
  accessTokenTtl?: number; // overrides the tenant default
  idTokenTtl?: number;
  refreshTokenTtl?: number;
  authorizationCodeTtl?: number;
  deviceCodeTtl?: number;
  requirePkce: boolean;
  allowPlainTextPkce: boolean;
  allowOfflineAccess: boolean;
  requireDPoP: boolean;
  requirePushedAuthorization: boolean;
  /** `false` opts the client out of journeys; unset follows the tenant */
  useJourneyFlow?: boolean;
  cibaEnabled: boolean;
  cibaTokenDeliveryMode?: CibaDeliveryMode;
  cibaClientNotificationEndpoint?: string;
  cibaRequestLifetime?: number;
  cibaPollingInterval?: number;
  cibaRequireUserCode: boolean;
  properties?: Record<string, string>;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateClientInput {
  tenantId: string;
  /** Fixed public identifier; generated when absent */
  clientId?: string;
  /** Fixed secret for confidential clients; generated when absent */
  clientSecret?: string;
  clientType: ClientType;
  authMethod: ClientAuthMethod;
  name: string;
  redirectUris: string[];
  allowedGrants: GrantType[];
  allowedScopes: string[];
  jwks?: JsonWebKeySet;
  accessTokenTtl?: number;
  idTokenTtl?: number;
  refreshTokenTtl?: number;
  authorizationCodeTtl?: number;
  deviceCodeTtl?: number;
  requirePkce?: boolean;
  allowPlainTextPkce?: boolean;
  allowOfflineAccess?: boolean;
  requireDPoP?: boolean;
  requirePushedAuthorization?: boolean;
  useJourneyFlow?: boolean;
  cibaEnabled?: boolean;
  cibaTokenDeliveryMode?: CibaDeliveryMode;
  cibaClientNotificationEndpoint?: string;
  cibaRequestLifetime?: number;
  cibaPollingInterval?: number;
  cibaRequireUserCode?: boolean;
  properties?: Record<string, string>;
}

/**
 * Immutable, fully-resolved snapshot of a client, built once per request
 * after authentication. Tenant defaults are already applied.
 */
export interface ValidatedClient {
  readonly clientId: string;
  readonly clientName: string;
  readonly clientType: ClientType;
  readonly authenticationMethod: ClientAuthMethod;
  readonly allowedGrantTypes: readonly GrantType[];
  readonly allowedScopes: readonly string[];
  readonly redirectUris: readonly string[];
  readonly requirePkce: boolean;
  readonly allowPlainTextPkce: boolean;
  readonly allowOfflineAccess: boolean;
  readonly accessTokenLifetime: number;
  readonly identityTokenLifetime: number;
  readonly refreshTokenLifetime: number;
  readonly authorizationCodeLifetime: number;
  readonly deviceCodeLifetime: number;
  readonly requireDPoP: boolean;
  readonly requirePushedAuthorization: boolean;
  readonly useJourneyFlow: boolean | undefined;
  readonly cibaEnabled: boolean;
  readonly cibaTokenDeliveryMode: CibaDeliveryMode;
  readonly cibaClientNotificationEndpoint: string | undefined;
  readonly cibaRequestLifetime: number;
  readonly cibaPollingInterval: number;
  readonly cibaRequireUserCode: boolean;
  readonly properties: Readonly<Record<string, string>>;
}

export function toValidatedClient(
  client: OAuthClient,
  tenant: Tenant,
  authenticationMethod: ClientAuthMethod = client.authMethod
): ValidatedClient {
  const { ciba } = getConfig();

  return Object.freeze({
    clientId: client.clientId,
    clientName: client.name,
    clientType: client.clientType,
    authenticationMethod,
    allowedGrantTypes: Object.freeze([...client.allowedGrants]),
    allowedScopes: Object.freeze([...client.allowedScopes]),
    redirectUris: Object.freeze([...client.redirectUris]),
    requirePkce: client.requirePkce,
    allowPlainTextPkce: client.allowPlainTextPkce,
    allowOfflineAccess: client.allowOfflineAccess,
    accessTokenLifetime: client.accessTokenTtl ?? tenant.accessTokenTtl,
    identityTokenLifetime: client.idTokenTtl ?? tenant.idTokenTtl,
    refreshTokenLifetime: client.refreshTokenTtl ?? tenant.refreshTokenTtl,
    authorizationCodeLifetime: client.authorizationCodeTtl ?? tenant.authorizationCodeTtl,
    deviceCodeLifetime: client.deviceCodeTtl ?? tenant.deviceCodeTtl,
    requireDPoP: client.requireDPoP,
    requirePushedAuthorization: client.requirePushedAuthorization,
    useJourneyFlow: client.useJourneyFlow,
    cibaEnabled: client.cibaEnabled,
    cibaTokenDeliveryMode: client.cibaTokenDeliveryMode ?? CIBA_DELIVERY_MODE_POLL,
    cibaClientNotificationEndpoint: client.cibaClientNotificationEndpoint,
    cibaRequestLifetime: client.cibaRequestLifetime ?? ciba.defaultRequestLifetime,
    cibaPollingInterval: client.cibaPollingInterval ?? ciba.defaultPollingInterval,
    cibaRequireUserCode: client.cibaRequireUserCode,
    properties: Object.freeze({ ...client.properties }),
  });
}
