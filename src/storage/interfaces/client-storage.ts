import type { OAuthClient, CreateClientInput } from '../../types/client.js';

/**
 * Storage interface for OAuth client management
 */
export interface IClientStorage {
  /**
   * Create a new OAuth client
   * Returns the client and, for confidential clients, the plaintext secret
   */
  create(input: CreateClientInput): Promise<{ client: OAuthClient; clientSecret?: string }>;

  /**
   * Find a client by client_id (public identifier)
   */
  findByClientId(tenantId: string, clientId: string): Promise<OAuthClient | null>;

  /**
   * Verify client credentials
   * Returns the client if credentials are valid, null otherwise
   */
  verifyCredentials(tenantId: string, clientId: string, clientSecret: string): Promise<OAuthClient | null>;
}
