import type { IPushedAuthorizationStorage, PushedAuthorizationRequest } from '../interfaces/par-storage.js';
import { generateRandomBase64Url } from '../../crypto/index.js';
import { PAR_REQUEST_URI_PREFIX } from '../../config/constants.js';

/**
 * In-memory pushed authorization request storage (RFC 9126)
 */
export class MemoryPushedAuthorizationStorage implements IPushedAuthorizationStorage {
  private requests = new Map<string, PushedAuthorizationRequest>(); // `${tenantId}:${requestUri}` -> request

  async store(
    tenantId: string,
    clientId: string,
    parameters: Record<string, string>,
    ttlSeconds: number
  ): Promise<PushedAuthorizationRequest> {
    const request: PushedAuthorizationRequest = {
      requestUri: `${PAR_REQUEST_URI_PREFIX}${generateRandomBase64Url(32)}`,
      tenantId,
      clientId,
      parameters: { ...parameters },
      expiresAt: new Date(Date.now() + ttlSeconds * 1000),
    };

    this.requests.set(`${tenantId}:${request.requestUri}`, request);
    return request;
  }

  async consume(tenantId: string, requestUri: string): Promise<PushedAuthorizationRequest | null> {
    const key = `${tenantId}:${requestUri}`;
    const request = this.requests.get(key);
    if (!request) return null;

    this.requests.delete(key);
    return request.expiresAt < new Date() ? null : request;
  }

  async deleteExpired(tenantId: string): Promise<number> {
    const now = new Date();
    let deleted = 0;

    for (const [key, request] of this.requests) {
      if (request.tenantId === tenantId && request.expiresAt < now) {
        this.requests.delete(key);
        deleted++;
      }
    }

    return deleted;
  }
}
