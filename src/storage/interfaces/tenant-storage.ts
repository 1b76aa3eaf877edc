import type { JWK } from 'jose';
import type { Tenant, CreateTenantInput, UpdateTenantInput, SigningKey, CreateSigningKeyInput } from '../../types/tenant.js';

/**
 * Storage interface for tenant management
 */
export interface ITenantStorage {
  create(input: CreateTenantInput): Promise<Tenant>;

  findById(id: string): Promise<Tenant | null>;

  /**
   * Find a tenant by slug (the first path segment of every tenant route)
   */
  findBySlug(slug: string): Promise<Tenant | null>;

  update(id: string, input: UpdateTenantInput): Promise<Tenant>;

  list(options?: { limit?: number; offset?: number }): Promise<Tenant[]>;
}

/**
 * Storage interface for signing key management
 */
export interface ISigningKeyStorage {
  /**
   * Create a new signing key, generating the key pair
   */
  create(input: CreateSigningKeyInput): Promise<SigningKey>;

  findByKid(tenantId: string, kid: string): Promise<SigningKey | null>;

  /**
   * Get the primary signing key for a tenant
   */
  getPrimary(tenantId: string): Promise<SigningKey | null>;

  listByTenant(tenantId: string): Promise<SigningKey[]>;

  /**
   * Public JWKs of every non-expired key, for verifying tokens this
   * tenant issued (access tokens, ID token hints, login hint tokens)
   */
  getValidationKeys(tenantId: string): Promise<JWK[]>;

  deleteExpired(tenantId: string): Promise<number>;
}
