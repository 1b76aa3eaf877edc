/**
 * Pushed authorization request (stored)
 * RFC 9126
 */
export interface PushedAuthorizationRequest {
  requestUri: string;
  tenantId: string;
  clientId: string;
  parameters: Record<string, string>;
  expiresAt: Date;
}

export interface IPushedAuthorizationStorage {
  /**
   * Store request parameters and mint a `request_uri` for them
   */
  store(
    tenantId: string,
    clientId: string,
    parameters: Record<string, string>,
    ttlSeconds: number
  ): Promise<PushedAuthorizationRequest>;

  /**
   * Fetch and delete atomically. Null when unknown, expired or already used.
   */
  consume(tenantId: string, requestUri: string): Promise<PushedAuthorizationRequest | null>;

  deleteExpired(tenantId: string): Promise<number>;
}
