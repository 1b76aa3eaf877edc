import type { OAuthClient, CreateClientInput } from '../../types/client.js';
import type { IClientStorage } from '../interfaces/client-storage.js';
import { generateId, generateClientId, generateClientSecret, hashSecret, verifySecret } from '../../crypto/index.js';

/**
 * In-memory OAuth client storage implementation
 */
export class MemoryClientStorage implements IClientStorage {
  private clients = new Map<string, OAuthClient>();
  private clientIdIndex = new Map<string, string>(); // `${tenantId}:${clientId}` -> id

  async create(input: CreateClientInput): Promise<{ client: OAuthClient; clientSecret?: string }> {
    const id = generateId();
    const clientId = input.clientId ?? generateClientId();
    const now = new Date();

    if (this.clientIdIndex.has(`${input.tenantId}:${clientId}`)) {
      throw new Error(`Client already exists: ${clientId}`);
    }

    let clientSecretHash: string | undefined;
    let clientSecret: string | undefined;

    // Confidential clients authenticating with a shared secret
    if (input.clientType === 'confidential' && input.authMethod !== 'private_key_jwt') {
      clientSecret = input.clientSecret ?? generateClientSecret();
      clientSecretHash = await hashSecret(clientSecret);
    }

    const client: OAuthClient = {
      id,
      tenantId: input.tenantId,
      clientId,
      clientSecretHash,
      clientType: input.clientType,
      authMethod: input.authMethod,
      name: input.name,
      redirectUris: input.redirectUris,
      allowedGrants: input.allowedGrants,
      allowedScopes: input.allowedScopes,
      jwks: input.jwks,
      accessTokenTtl: input.accessTokenTtl,
      idTokenTtl: input.idTokenTtl,
      refreshTokenTtl: input.refreshTokenTtl,
      authorizationCodeTtl: input.authorizationCodeTtl,
      deviceCodeTtl: input.deviceCodeTtl,
      // Public clients always use PKCE
      requirePkce: input.requirePkce ?? input.clientType === 'public',
      allowPlainTextPkce: input.allowPlainTextPkce ?? false,
      allowOfflineAccess: input.allowOfflineAccess ?? true,
      requireDPoP: input.requireDPoP ?? false,
      requirePushedAuthorization: input.requirePushedAuthorization ?? false,
      useJourneyFlow: input.useJourneyFlow,
      cibaEnabled: input.cibaEnabled ?? false,
      cibaTokenDeliveryMode: input.cibaTokenDeliveryMode,
      cibaClientNotificationEndpoint: input.cibaClientNotificationEndpoint,
      cibaRequestLifetime: input.cibaRequestLifetime,
      cibaPollingInterval: input.cibaPollingInterval,
      cibaRequireUserCode: input.cibaRequireUserCode ?? false,
      properties: input.properties,
      createdAt: now,
      updatedAt: now,
    };

    this.clients.set(id, client);
    this.clientIdIndex.set(`${input.tenantId}:${clientId}`, id);

    return { client, clientSecret };
  }

  async findByClientId(tenantId: string, clientId: string): Promise<OAuthClient | null> {
    const id = this.clientIdIndex.get(`${tenantId}:${clientId}`);
    if (!id) return null;
    return this.clients.get(id) ?? null;
  }

  async verifyCredentials(tenantId: string, clientId: string, clientSecret: string): Promise<OAuthClient | null> {
    const client = await this.findByClientId(tenantId, clientId);
    if (!client?.clientSecretHash) {
      // Unknown, public or private_key_jwt client
      return null;
    }

    const isValid = await verifySecret(clientSecret, client.clientSecretHash);
    return isValid ? client : null;
  }
}
