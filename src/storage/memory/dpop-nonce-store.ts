import type { IDPoPNonceStore } from '../interfaces/dpop-nonce-store.js';
import { generateRandomBase64Url } from '../../crypto/index.js';
import { DEFAULT_DPOP_NONCE_LIFETIME } from '../../config/constants.js';

export interface MemoryDPoPNonceStoreOptions {
  /** Demand a server nonce from every client */
  requireNonce?: boolean;
  nonceLifetimeSeconds?: number;
}

/**
 * In-memory DPoP nonce and proof `jti` tracking. Both expire.
 */
export class MemoryDPoPNonceStore implements IDPoPNonceStore {
  private nonces = new Map<string, number>(); // `${clientId}:${nonce}` -> expiry (ms)
  private jtis = new Map<string, number>(); // jti -> expiry (ms)
  private readonly requireNonce: boolean;
  private readonly nonceLifetimeMs: number;

  constructor(options: MemoryDPoPNonceStoreOptions = {}) {
    this.requireNonce = options.requireNonce ?? false;
    this.nonceLifetimeMs = (options.nonceLifetimeSeconds ?? DEFAULT_DPOP_NONCE_LIFETIME) * 1000;
  }

  async isNonceRequired(_clientId?: string): Promise<boolean> {
    return this.requireNonce;
  }

  async generateNonce(clientId?: string): Promise<string> {
    this.prune(this.nonces);
    const nonce = generateRandomBase64Url(16);
    this.nonces.set(`${clientId ?? ''}:${nonce}`, Date.now() + this.nonceLifetimeMs);
    return nonce;
  }

  async validateNonce(nonce: string, clientId?: string): Promise<boolean> {
    const expiresAt = this.nonces.get(`${clientId ?? ''}:${nonce}`);
    return expiresAt !== undefined && expiresAt > Date.now();
  }

  async validateJti(jti: string, lifetimeSeconds: number): Promise<boolean> {
    const now = Date.now();
    const expiresAt = this.jtis.get(jti);
    if (expiresAt !== undefined && expiresAt > now) {
      return false;
    }

    this.jtis.set(jti, now + lifetimeSeconds * 1000);
    this.prune(this.jtis);
    return true;
  }

  private prune(entries: Map<string, number>): void {
    const now = Date.now();
    for (const [key, expiresAt] of entries) {
      if (expiresAt <= now) entries.delete(key);
    }
  }
}
