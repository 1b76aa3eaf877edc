import type { CibaRequest, CibaRequestStatus } from '../../types/ciba.js';

/**
 * Fields a status transition may set
 */
export type CibaStatusChange = Pick<CibaRequest, 'status'> &
  Partial<Pick<CibaRequest, 'completedAt' | 'sessionId' | 'error' | 'errorDescription'>>;

/**
 * Persistence for backchannel authentication requests
 *
 * Implementations backed by a shared store must make `transitionStatus`
 * and `consumeApproved` compare-and-swap operations so two concurrent
 * callers cannot both win.
 */
export interface ICibaStore {
  storeRequest(request: CibaRequest): Promise<void>;

  getByAuthReqId(authReqId: string): Promise<CibaRequest | null>;

  /**
   * Pending, unexpired requests for a user (for an approval UI)
   */
  getPendingBySubject(tenantId: string, subjectId: string): Promise<CibaRequest[]>;

  updateRequest(request: CibaRequest): Promise<void>;

  /**
   * Apply `change` only when the stored status is one of `from`. Returns the
   * updated request, or null when the request is missing or has moved on.
   */
  transitionStatus(
    authReqId: string,
    from: readonly CibaRequestStatus[],
    change: CibaStatusChange
  ): Promise<CibaRequest | null>;

  /**
   * Record a token poll. Returns false when the previous poll was less than
   * `interval` seconds ago. Status is left untouched.
   */
  updateLastPolled(authReqId: string): Promise<boolean>;

  removeRequest(authReqId: string): Promise<void>;

  removeExpiredRequests(): Promise<number>;

  /**
   * Move an approved, unexpired request to consumed. Returns the request as
   * it was before the swap, or null when it was not approved or has lapsed.
   */
  consumeApproved(authReqId: string): Promise<CibaRequest | null>;
}
