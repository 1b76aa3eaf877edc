import type { JWK } from 'jose';
import type {
  Tenant,
  CreateTenantInput,
  UpdateTenantInput,
  SigningKey,
  SigningAlgorithm,
  CreateSigningKeyInput,
} from '../../types/tenant.js';
import type { ITenantStorage, ISigningKeyStorage } from '../interfaces/tenant-storage.js';
import { generateId, generateKid, generateRsaKeyPair, generateEcKeyPair, publicKeyToJwk } from '../../crypto/index.js';
import { getConfig } from '../../config/index.js';
import { IDENTITY_SCOPES, SUPPORTED_GRANT_TYPES } from '../../config/constants.js';

/**
 * In-memory tenant storage implementation
 */
export class MemoryTenantStorage implements ITenantStorage {
  private tenants = new Map<string, Tenant>();
  private slugIndex = new Map<string, string>(); // slug -> id

  async create(input: CreateTenantInput): Promise<Tenant> {
    if (this.slugIndex.has(input.slug)) {
      throw new Error(`Tenant slug already in use: ${input.slug}`);
    }

    const config = getConfig();
    const id = generateId();
    const now = new Date();

    const tenant: Tenant = {
      id,
      name: input.name,
      slug: input.slug,
      issuer: input.issuer ?? `${config.server.baseUrl}/${input.slug}`,
      allowedGrants: input.allowedGrants ?? [...SUPPORTED_GRANT_TYPES],
      allowedScopes: input.allowedScopes ?? [...IDENTITY_SCOPES],
      accessTokenTtl: input.accessTokenTtl ?? config.defaults.accessTokenTtl,
      idTokenTtl: input.idTokenTtl ?? config.defaults.idTokenTtl,
      refreshTokenTtl: input.refreshTokenTtl ?? config.defaults.refreshTokenTtl,
      authorizationCodeTtl: input.authorizationCodeTtl ?? config.defaults.authorizationCodeTtl,
      deviceCodeTtl: input.deviceCodeTtl ?? config.defaults.deviceCodeTtl,
      deviceCodeInterval: input.deviceCodeInterval ?? config.defaults.deviceCodeInterval,
      journeysEnabled: input.journeysEnabled ?? true,
      metadata: input.metadata,
      createdAt: now,
      updatedAt: now,
    };

    this.tenants.set(id, tenant);
    this.slugIndex.set(input.slug, id);

    return tenant;
  }

  async findById(id: string): Promise<Tenant | null> {
    return this.tenants.get(id) ?? null;
  }

  async findBySlug(slug: string): Promise<Tenant | null> {
    const id = this.slugIndex.get(slug);
    if (!id) return null;
    return this.tenants.get(id) ?? null;
  }

  async update(id: string, input: UpdateTenantInput): Promise<Tenant> {
    const tenant = this.tenants.get(id);
    if (!tenant) {
      throw new Error(`Tenant not found: ${id}`);
    }

    const updated: Tenant = {
      ...tenant,
      ...input,
      updatedAt: new Date(),
    };

    this.tenants.set(id, updated);
    return updated;
  }

  async list(options?: { limit?: number; offset?: number }): Promise<Tenant[]> {
    const all = Array.from(this.tenants.values());
    const offset = options?.offset ?? 0;
    const limit = options?.limit ?? all.length;
    return all.slice(offset, offset + limit);
  }
}

async function generateKeyPair(algorithm: SigningAlgorithm): Promise<{ publicKey: string; privateKey: string }> {
  switch (algorithm) {
    case 'RS256':
    case 'RS384':
    case 'RS512':
      return generateRsaKeyPair(algorithm);
    case 'ES256':
    case 'ES384':
    case 'ES512':
      return generateEcKeyPair(algorithm);
  }
}

/**
 * In-memory signing key storage implementation
 */
export class MemorySigningKeyStorage implements ISigningKeyStorage {
  private keys = new Map<string, SigningKey>();
  private tenantKeys = new Map<string, Set<string>>(); // tenantId -> Set<keyId>

  async create(input: CreateSigningKeyInput): Promise<SigningKey> {
    const id = generateId();
    const algorithm = input.algorithm ?? 'RS256';
    const keyPair = await generateKeyPair(algorithm);

    const signingKey: SigningKey = {
      id,
      tenantId: input.tenantId,
      kid: generateKid(),
      algorithm,
      publicKey: keyPair.publicKey,
      privateKey: keyPair.privateKey,
      isPrimary: input.isPrimary ?? false,
      expiresAt: input.expiresAt,
      createdAt: new Date(),
    };

    let tenantKeyIds = this.tenantKeys.get(input.tenantId);
    if (!tenantKeyIds) {
      tenantKeyIds = new Set();
      this.tenantKeys.set(input.tenantId, tenantKeyIds);
    }

    // Only one primary key per tenant
    if (signingKey.isPrimary) {
      for (const keyId of tenantKeyIds) {
        const key = this.keys.get(keyId);
        if (key?.isPrimary) {
          this.keys.set(keyId, { ...key, isPrimary: false });
        }
      }
    }

    this.keys.set(id, signingKey);
    tenantKeyIds.add(id);

    return signingKey;
  }

  async findByKid(tenantId: string, kid: string): Promise<SigningKey | null> {
    const keys = await this.listByTenant(tenantId);
    return keys.find((key) => key.kid === kid) ?? null;
  }

  async getPrimary(tenantId: string): Promise<SigningKey | null> {
    const keys = await this.listByTenant(tenantId);
    return keys.find((key) => key.isPrimary) ?? null;
  }

  async listByTenant(tenantId: string): Promise<SigningKey[]> {
    const tenantKeyIds = this.tenantKeys.get(tenantId);
    if (!tenantKeyIds) return [];

    const keys: SigningKey[] = [];
    for (const keyId of tenantKeyIds) {
      const key = this.keys.get(keyId);
      if (key) {
        keys.push(key);
      }
    }
    return keys;
  }

  async getValidationKeys(tenantId: string): Promise<JWK[]> {
    const now = Date.now();
    const active = (await this.listByTenant(tenantId)).filter(
      (key) => !key.expiresAt || key.expiresAt.getTime() > now
    );
    return Promise.all(active.map((key) => publicKeyToJwk(key.publicKey, key.kid, key.algorithm)));
  }

  async deleteExpired(tenantId: string): Promise<number> {
    const tenantKeyIds = this.tenantKeys.get(tenantId);
    if (!tenantKeyIds) return 0;

    const now = new Date();
    let deleted = 0;

    for (const keyId of Array.from(tenantKeyIds)) {
      const key = this.keys.get(keyId);
      if (key?.expiresAt && key.expiresAt < now) {
        tenantKeyIds.delete(keyId);
        this.keys.delete(keyId);
        deleted++;
      }
    }

    return deleted;
  }
}
