import type { RefreshToken, CreateRefreshTokenInput, RevokedToken } from '../../types/token.js';

/**
 * Storage interface for refresh token management
 */
export interface IRefreshTokenStorage {
  /**
   * Create a new refresh token
   * Returns the token record and the plaintext token value
   */
  create(input: CreateRefreshTokenInput): Promise<{ token: RefreshToken; value: string }>;

  /**
   * Find a refresh token by plaintext value
   */
  findByValue(tenantId: string, tokenValue: string): Promise<RefreshToken | null>;

  /**
   * Revoke one token by ID. Used by rotation and by the revocation endpoint;
   * the rest of the family stays valid.
   */
  revoke(id: string): Promise<void>;

  /**
   * Revoke all tokens in a family (for replay detection)
   */
  revokeFamily(tenantId: string, familyId: string): Promise<number>;

  /**
   * Delete expired tokens (cleanup)
   */
  deleteExpired(tenantId: string): Promise<number>;
}

/**
 * Storage interface for JWT revocation tracking
 * Used for access tokens since they're stateless JWTs
 */
export interface IRevokedTokenStorage {
  /**
   * Deny-list an access token by `jti` until it would have expired anyway
   */
  revoke(
    tenantId: string,
    tokenId: string, // jti claim
    tokenType: 'access_token' | 'refresh_token',
    expiresAt: Date
  ): Promise<RevokedToken>;

  /**
   * Checked by access token verification and token exchange
   */
  isRevoked(tenantId: string, tokenId: string): Promise<boolean>;

  /**
   * Drop records whose token has expired (cleanup)
   */
  deleteExpired(tenantId: string): Promise<number>;
}
