import type { JWTPayload } from 'jose';
import type { CodeChallengeMethod } from './oauth.js';
import type { AddressClaim } from './user.js';

/**
 * Actor claim (RFC 8693 Section 4.1). Nested for delegation chains.
 */
export interface ActorClaim {
  sub: string;
  act?: ActorClaim;
}

/**
 * JWT access token payload (RFC 9068)
 */
export interface AccessTokenPayload extends JWTPayload {
  iss: string;
  sub: string;
  aud: string | string[];
  exp: number;
  iat: number;
  jti: string;
  client_id: string;
  scope?: string;
  tenant_id: string;
  sid?: string;
  acr?: string;
  amr?: string[];
  auth_time?: number;
  /** DPoP binding (RFC 9449 Section 6) */
  cnf?: { jkt: string };
  act?: ActorClaim;
}

/**
 * ID token payload (OpenID Connect Core 1.0 Section 2)
 */
export interface IdTokenPayload extends JWTPayload {
  iss: string;
  sub: string;
  aud: string | string[];
  exp: number;
  iat: number;
  auth_time?: number;
  nonce?: string;
  acr?: string;
  amr?: string[];
  azp?: string;
  sid?: string;
  at_hash?: string;

  name?: string;
  given_name?: string;
  family_name?: string;
  nickname?: string;
  preferred_username?: string;
  picture?: string;
  locale?: string;
  updated_at?: number;
  email?: string;
  email_verified?: boolean;
  address?: AddressClaim;
  phone_number?: string;
  phone_number_verified?: boolean;
}

/**
 * Refresh token (stored)
 */
export interface RefreshToken {
  id: string;
  tenantId: string;
  clientId: string;
  userId?: string;
  tokenHash: string;
  scope?: string;
  expiresAt: Date;
  issuedAt: Date;
  revokedAt?: Date;
  parentTokenId?: string;
  familyId: string; // rotation family, revoked as a whole on replay
  sessionId?: string;
  /** Thumbprint of the DPoP key the token is bound to */
  dpopJkt?: string;
}

export interface CreateRefreshTokenInput {
  tenantId: string;
  clientId: string;
  userId?: string;
  scope?: string;
  expiresAt: Date;
  parentTokenId?: string;
  familyId?: string;
  sessionId?: string;
  dpopJkt?: string;
}

/**
 * Authorization code data (stored, one-time use)
 */
export interface AuthorizationCode {
  id: string;
  tenantId: string;
  clientId: string;
  subjectId: string;
  sessionId?: string;
  codeHash: string;
  redirectUri: string;
  /** Whether the token request must repeat redirect_uri (RFC 6749 Section 4.1.3) */
  redirectUriSent: boolean;
  codeChallenge?: string;
  codeChallengeMethod?: CodeChallengeMethod;
  dpopJkt?: string;
  nonce?: string;
  requestedScopes: string[];
  grantedScopes: string[];
  authTime: number;
  amr?: string[];
  acr?: string;
  /** Extra claims gathered during the journey, copied into issued tokens */
  claims?: Record<string, string>;
  expiresAt: Date;
  issuedAt: Date;
  usedAt?: Date;
}

export type CreateAuthorizationCodeInput = Omit<AuthorizationCode, 'id' | 'codeHash' | 'issuedAt' | 'usedAt'>;

export type DeviceCodeStatus = 'pending' | 'authorized' | 'denied' | 'expired';

/**
 * Device code (stored)
 * RFC 8628
 */
export interface DeviceCode {
  id: string;
  tenantId: string;
  clientId: string;
  deviceCodeHash: string;
  userCode: string;
  scope?: string;
  userId?: string;
  status: DeviceCodeStatus;
  expiresAt: Date;
  interval: number;
  lastPolledAt?: Date;
  issuedAt: Date;
}

export interface CreateDeviceCodeInput {
  tenantId: string;
  clientId: string;
  scope?: string;
  expiresAt: Date;
  interval: number;
}

/**
 * Revoked JWT record (access tokens are stateless)
 */
export interface RevokedToken {
  id: string;
  tenantId: string;
  tokenId: string; // jti
  tokenType: 'access_token' | 'refresh_token';
  expiresAt: Date;
  revokedAt: Date;
}
