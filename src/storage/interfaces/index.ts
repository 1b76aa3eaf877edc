export * from './tenant-storage.js';
export * from './client-storage.js';
export * from './token-storage.js';
export * from './authorization-code-storage.js';
export * from './device-code-storage.js';
export * from './user-storage.js';
export * from './par-storage.js';
export * from './ciba-store.js';
export * from './dpop-nonce-store.js';
export * from './journey-state-store.js';
export * from './journey-policy-store.js';
export * from './protocol-state-store.js';

import type { ITenantStorage, ISigningKeyStorage } from './tenant-storage.js';
import type { IClientStorage } from './client-storage.js';
import type { IRefreshTokenStorage, IRevokedTokenStorage } from './token-storage.js';
import type { IAuthorizationCodeStorage } from './authorization-code-storage.js';
import type { IDeviceCodeStorage } from './device-code-storage.js';
import type { IUserStore } from './user-storage.js';
import type { IPushedAuthorizationStorage } from './par-storage.js';
import type { ICibaStore } from './ciba-store.js';
import type { IDPoPNonceStore } from './dpop-nonce-store.js';
import type { IJourneyStateStore } from './journey-state-store.js';
import type { IJourneyPolicyStore } from './journey-policy-store.js';
import type { IProtocolStateStore } from './protocol-state-store.js';

/**
 * Complete storage interface for the identity server
 */
export interface IStorage {
  tenants: ITenantStorage;
  signingKeys: ISigningKeyStorage;
  clients: IClientStorage;
  users: IUserStore;
  refreshTokens: IRefreshTokenStorage;
  revokedTokens: IRevokedTokenStorage;
  authorizationCodes: IAuthorizationCodeStorage;
  deviceCodes: IDeviceCodeStorage;
  pushedAuthorizations: IPushedAuthorizationStorage;
  cibaRequests: ICibaStore;
  dpopNonces: IDPoPNonceStore;
  journeyStates: IJourneyStateStore;
  journeyPolicies: IJourneyPolicyStore;
  protocolStates: IProtocolStateStore;
}
