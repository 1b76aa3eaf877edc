import type { AuthorizationCode, CreateAuthorizationCodeInput } from '../../types/token.js';
import type { IAuthorizationCodeStorage } from '../interfaces/authorization-code-storage.js';
import { generateId, generateAuthorizationCode, hashToken } from '../../crypto/index.js';

/**
 * In-memory authorization code storage implementation
 */
export class MemoryAuthorizationCodeStorage implements IAuthorizationCodeStorage {
  private codes = new Map<string, AuthorizationCode>();
  private hashIndex = new Map<string, string>(); // `${tenantId}:${hash}` -> id

  async create(input: CreateAuthorizationCodeInput): Promise<{ code: AuthorizationCode; value: string }> {
    const id = generateId();
    const codeValue = generateAuthorizationCode();
    const codeHash = hashToken(codeValue);

    const code: AuthorizationCode = {
      ...input,
      requestedScopes: [...input.requestedScopes],
      grantedScopes: [...input.grantedScopes],
      id,
      codeHash,
      issuedAt: new Date(),
    };

    this.codes.set(id, code);
    this.hashIndex.set(`${input.tenantId}:${codeHash}`, id);

    return { code, value: codeValue };
  }

  async consume(tenantId: string, codeValue: string): Promise<AuthorizationCode | null> {
    const id = this.hashIndex.get(`${tenantId}:${hashToken(codeValue)}`);
    if (!id) return null;

    const code = this.codes.get(id);
    if (!code || code.usedAt || code.expiresAt < new Date()) {
      return null;
    }

    // Check and mark happen without an await in between
    const usedCode: AuthorizationCode = { ...code, usedAt: new Date() };
    this.codes.set(id, usedCode);

    return usedCode;
  }

  async deleteExpired(tenantId: string): Promise<number> {
    const now = new Date();
    let deleted = 0;

    for (const [id, code] of this.codes) {
      if (code.tenantId === tenantId && code.expiresAt < now) {
        this.hashIndex.delete(`${code.tenantId}:${code.codeHash}`);
        this.codes.delete(id);
        deleted++;
      }
    }

    return deleted;
  }
}
