import type { Context } from 'hono';
import type { Tenant, SigningKey } from './tenant.js';
import type { ValidatedClient } from './client.js';
import type { AccessTokenPayload } from './token.js';
import type { ProtocolContext } from '../protocol/context.js';

/**
 * Hono context variables shared by tenant routes
 */
export interface OAuthVariables {
  tenant: Tenant;
  signingKey: SigningKey;
  client?: ValidatedClient;
  protocolContext?: ProtocolContext;
  accessToken?: AccessTokenPayload;
}

export interface OAuthEnv {
  Variables: OAuthVariables;
}

export type OAuthContext = Context<OAuthEnv>;

/**
 * Rate limit info
 */
export interface RateLimitInfo {
  remaining: number;
  reset: number;
  total: number;
}
