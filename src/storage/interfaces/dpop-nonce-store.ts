/**
 * Server nonces and proof replay tracking for DPoP (RFC 9449 Sections 8 and 11.1)
 */
export interface IDPoPNonceStore {
  /**
   * Whether the server currently demands a nonce from this client
   */
  isNonceRequired(clientId?: string): Promise<boolean>;

  generateNonce(clientId?: string): Promise<string>;

  validateNonce(nonce: string, clientId?: string): Promise<boolean>;

  /**
   * Record a proof `jti`. Insert-if-absent: false when already seen
   * within `lifetimeSeconds`.
   */
  validateJti(jti: string, lifetimeSeconds: number): Promise<boolean>;
}
