import type { CibaRequest, CibaRequestStatus } from '../../types/ciba.js';
import type { CibaStatusChange, ICibaStore } from '../interfaces/ciba-store.js';

/**
 * In-memory backchannel authentication request store
 */
export class MemoryCibaStore implements ICibaStore {
  private requests = new Map<string, CibaRequest>();

  async storeRequest(request: CibaRequest): Promise<void> {
    this.requests.set(request.authReqId, { ...request });
  }

  async getByAuthReqId(authReqId: string): Promise<CibaRequest | null> {
    const request = this.requests.get(authReqId);
    return request ? { ...request } : null;
  }

  async getPendingBySubject(tenantId: string, subjectId: string): Promise<CibaRequest[]> {
    const now = new Date();
    return Array.from(this.requests.values())
      .filter(
        (request) =>
          request.tenantId === tenantId &&
          request.subjectId === subjectId &&
          request.status === 'pending' &&
          request.expiresAt > now
      )
      .map((request) => ({ ...request }));
  }

  async updateRequest(request: CibaRequest): Promise<void> {
    if (!this.requests.has(request.authReqId)) {
      throw new Error(`CIBA request not found: ${request.authReqId}`);
    }
    this.requests.set(request.authReqId, { ...request });
  }

  async transitionStatus(
    authReqId: string,
    from: readonly CibaRequestStatus[],
    change: CibaStatusChange
  ): Promise<CibaRequest | null> {
    const request = this.requests.get(authReqId);
    if (!request || !from.includes(request.status)) {
      return null;
    }

    const updated: CibaRequest = { ...request, ...change };
    this.requests.set(authReqId, updated);
    return { ...updated };
  }

  async updateLastPolled(authReqId: string): Promise<boolean> {
    const request = this.requests.get(authReqId);
    if (!request) return false;

    const now = new Date();
    const tooFast =
      request.lastPolledAt !== undefined && now.getTime() - request.lastPolledAt.getTime() < request.interval * 1000;

    this.requests.set(authReqId, { ...request, lastPolledAt: now });
    return !tooFast;
  }

  async removeRequest(authReqId: string): Promise<void> {
    this.requests.delete(authReqId);
  }

  async removeExpiredRequests(): Promise<number> {
    const now = new Date();
    let removed = 0;

    for (const [authReqId, request] of this.requests) {
      if (request.expiresAt < now) {
        this.requests.delete(authReqId);
        removed++;
      }
    }

    return removed;
  }

  async consumeApproved(authReqId: string): Promise<CibaRequest | null> {
    const request = this.requests.get(authReqId);
    if (request?.status !== 'approved' || request.expiresAt.getTime() < Date.now()) {
      return null;
    }

    this.requests.set(authReqId, { ...request, status: 'consumed' });
    return { ...request };
  }
}
