import type { GrantType } from './oauth.js';

export type SigningAlgorithm = 'RS256' | 'RS384' | 'RS512' | 'ES256' | 'ES384' | 'ES512';

/**
 * Tenant configuration
 */
export interface Tenant {
  id: string;
  name: string;
  slug: string; // URL-safe identifier used in paths
  issuer: string; // e.g. https://auth.example.com/acme
  allowedGrants: GrantType[];
  allowedScopes: string[];
  accessTokenTtl: number; // seconds
  idTokenTtl: number;
  refreshTokenTtl: number;
  authorizationCodeTtl: number;
  deviceCodeTtl: number;
  deviceCodeInterval: number; // seconds between polls
  /** Policy-driven journeys for interactive flows; off means standalone UI */
  journeysEnabled: boolean;
  metadata?: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateTenantInput {
  name: string;
  slug: string;
  issuer?: string;
  allowedGrants?: GrantType[];
  allowedScopes?: string[];
  accessTokenTtl?: number;
  idTokenTtl?: number;
  refreshTokenTtl?: number;
  authorizationCodeTtl?: number;
  deviceCodeTtl?: number;
  deviceCodeInterval?: number;
  journeysEnabled?: boolean;
  metadata?: Record<string, unknown>;
}

export type UpdateTenantInput = Partial<Omit<CreateTenantInput, 'slug'>>;

/**
 * Signing key for a tenant
 */
export interface SigningKey {
  id: string;
  tenantId: string;
  kid: string;
  algorithm: SigningAlgorithm;
  publicKey: string; // PEM (SPKI)
  privateKey: string; // PEM (PKCS#8)
  isPrimary: boolean;
  expiresAt?: Date;
  createdAt: Date;
}

export interface CreateSigningKeyInput {
  tenantId: string;
  algorithm?: SigningAlgorithm;
  isPrimary?: boolean;
  expiresAt?: Date;
}
