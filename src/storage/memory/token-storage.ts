import type { RefreshToken, CreateRefreshTokenInput, RevokedToken } from '../../types/token.js';
import type { IRefreshTokenStorage, IRevokedTokenStorage } from '../interfaces/token-storage.js';
import { generateId, generateRefreshToken, generateFamilyId, hashToken } from '../../crypto/index.js';

/**
 * In-memory refresh token storage implementation
 */
export class MemoryRefreshTokenStorage implements IRefreshTokenStorage {
  private tokens = new Map<string, RefreshToken>();
  private hashIndex = new Map<string, string>(); // `${tenantId}:${hash}` -> id
  private familyIndex = new Map<string, Set<string>>(); // `${tenantId}:${familyId}` -> Set<id>

  async create(input: CreateRefreshTokenInput): Promise<{ token: RefreshToken; value: string }> {
    const id = generateId();
    const tokenValue = generateRefreshToken();
    const tokenHash = hashToken(tokenValue);
    const familyId = input.familyId ?? generateFamilyId();

    const token: RefreshToken = {
      id,
      tenantId: input.tenantId,
      clientId: input.clientId,
      userId: input.userId,
      tokenHash,
      scope: input.scope,
      expiresAt: input.expiresAt,
      issuedAt: new Date(),
      parentTokenId: input.parentTokenId,
      familyId,
      sessionId: input.sessionId,
      dpopJkt: input.dpopJkt,
    };

    this.tokens.set(id, token);
    this.hashIndex.set(`${input.tenantId}:${tokenHash}`, id);

    const familyKey = `${input.tenantId}:${familyId}`;
    let family = this.familyIndex.get(familyKey);
    if (!family) {
      family = new Set();
      this.familyIndex.set(familyKey, family);
    }
    family.add(id);

    return { token, value: tokenValue };
  }

  async findByValue(tenantId: string, tokenValue: string): Promise<RefreshToken | null> {
    const id = this.hashIndex.get(`${tenantId}:${hashToken(tokenValue)}`);
    if (!id) return null;
    return this.tokens.get(id) ?? null;
  }

  async revoke(id: string): Promise<void> {
    const token = this.tokens.get(id);
    if (token && !token.revokedAt) {
      this.tokens.set(id, { ...token, revokedAt: new Date() });
    }
  }

  async revokeFamily(tenantId: string, familyId: string): Promise<number> {
    const tokenIds = this.familyIndex.get(`${tenantId}:${familyId}`);
    if (!tokenIds) return 0;

    let count = 0;
    const now = new Date();
    for (const id of tokenIds) {
      const token = this.tokens.get(id);
      if (token && !token.revokedAt) {
        this.tokens.set(id, { ...token, revokedAt: now });
        count++;
      }
    }
    return count;
  }

  async deleteExpired(tenantId: string): Promise<number> {
    const now = new Date();
    let deleted = 0;

    for (const [id, token] of this.tokens) {
      if (token.tenantId === tenantId && token.expiresAt < now) {
        this.hashIndex.delete(`${token.tenantId}:${token.tokenHash}`);
        this.familyIndex.get(`${token.tenantId}:${token.familyId}`)?.delete(id);
        this.tokens.delete(id);
        deleted++;
      }
    }

    return deleted;
  }
}

/**
 * In-memory revoked token storage implementation
 * For tracking revoked JWTs
 */
export class MemoryRevokedTokenStorage implements IRevokedTokenStorage {
  private revokedTokens = new Map<string, RevokedToken>(); // `${tenantId}:${jti}` -> record

  async revoke(
    tenantId: string,
    tokenId: string,
    tokenType: 'access_token' | 'refresh_token',
    expiresAt: Date
  ): Promise<RevokedToken> {
    const revokedToken: RevokedToken = {
      id: generateId(),
      tenantId,
      tokenId,
      tokenType,
      expiresAt,
      revokedAt: new Date(),
    };

    this.revokedTokens.set(`${tenantId}:${tokenId}`, revokedToken);
    return revokedToken;
  }

  async isRevoked(tenantId: string, tokenId: string): Promise<boolean> {
    return this.revokedTokens.has(`${tenantId}:${tokenId}`);
  }

  async deleteExpired(tenantId: string): Promise<number> {
    const now = new Date();
    let deleted = 0;

    for (const [key, token] of this.revokedTokens) {
      if (token.tenantId === tenantId && token.expiresAt < now) {
        this.revokedTokens.delete(key);
        deleted++;
      }
    }

    return deleted;
  }
}
