import type { DeviceCode, CreateDeviceCodeInput, DeviceCodeStatus } from '../../types/token.js';
import type { IDeviceCodeStorage } from '../interfaces/device-code-storage.js';
import { generateId, generateDeviceCode, generateUserCode, hashToken } from '../../crypto/index.js';

/**
 * Canonical XXXX-XXXX form of a user-entered code
 */
export function normalizeUserCode(userCode: string): string {
  const compact = userCode.replace(/[\s-]/g, '').toUpperCase();
  return compact.length > 4 ? `${compact.slice(0, 4)}-${compact.slice(4)}` : compact;
}

/**
 * In-memory device code storage implementation
 */
export class MemoryDeviceCodeStorage implements IDeviceCodeStorage {
  private codes = new Map<string, DeviceCode>();
  private hashIndex = new Map<string, string>(); // `${tenantId}:${hash}` -> id
  private userCodeIndex = new Map<string, string>(); // `${tenantId}:${userCode}` -> id

  async create(input: CreateDeviceCodeInput): Promise<{
    deviceCode: DeviceCode;
    deviceCodeValue: string;
    userCode: string;
  }> {
    const id = generateId();
    const deviceCodeValue = generateDeviceCode();
    const deviceCodeHash = hashToken(deviceCodeValue);

    let userCode = generateUserCode();
    while (this.userCodeIndex.has(`${input.tenantId}:${userCode}`)) {
      userCode = generateUserCode();
    }

    const deviceCode: DeviceCode = {
      id,
      tenantId: input.tenantId,
      clientId: input.clientId,
      deviceCodeHash,
      userCode,
      scope: input.scope,
      expiresAt: input.expiresAt,
      interval: input.interval,
      issuedAt: new Date(),
      status: 'pending',
    };

    this.codes.set(id, deviceCode);
    this.hashIndex.set(`${input.tenantId}:${deviceCodeHash}`, id);
    this.userCodeIndex.set(`${input.tenantId}:${userCode}`, id);

    return { deviceCode, deviceCodeValue, userCode };
  }

  async findByValue(tenantId: string, deviceCodeValue: string): Promise<DeviceCode | null> {
    const id = this.hashIndex.get(`${tenantId}:${hashToken(deviceCodeValue)}`);
    if (!id) return null;
    return this.codes.get(id) ?? null;
  }

  async findByUserCode(tenantId: string, userCode: string): Promise<DeviceCode | null> {
    const id = this.userCodeIndex.get(`${tenantId}:${normalizeUserCode(userCode)}`);
    if (!id) return null;
    return this.codes.get(id) ?? null;
  }

  async updateLastPolled(id: string): Promise<boolean> {
    const code = this.codes.get(id);
    if (!code) return false;

    const now = new Date();
    const tooFast =
      code.lastPolledAt !== undefined && now.getTime() - code.lastPolledAt.getTime() < code.interval * 1000;

    // Recorded either way so a client hammering the endpoint stays throttled
    this.codes.set(id, { ...code, lastPolledAt: now });
    return !tooFast;
  }

  async authorize(id: string, userId: string): Promise<DeviceCode> {
    return this.transition(id, 'authorized', userId);
  }

  async deny(id: string): Promise<DeviceCode> {
    return this.transition(id, 'denied');
  }

  async consume(id: string): Promise<void> {
    const code = this.codes.get(id);
    if (code) {
      this.hashIndex.delete(`${code.tenantId}:${code.deviceCodeHash}`);
      this.userCodeIndex.delete(`${code.tenantId}:${code.userCode}`);
      this.codes.delete(id);
    }
  }

  async deleteExpired(tenantId: string): Promise<number> {
    const now = new Date();
    let deleted = 0;

    for (const [id, code] of this.codes) {
      if (code.tenantId === tenantId && code.expiresAt < now) {
        await this.consume(id);
        deleted++;
      }
    }

    return deleted;
  }

  private transition(id: string, status: DeviceCodeStatus, userId?: string): DeviceCode {
    const code = this.codes.get(id);
    if (!code) {
      throw new Error(`Device code not found: ${id}`);
    }
    if (code.status !== 'pending') {
      throw new Error(`Device code is already ${code.status}`);
    }

    const updated: DeviceCode = { ...code, status, userId: userId ?? code.userId };
    this.codes.set(id, updated);
    return updated;
  }
}
