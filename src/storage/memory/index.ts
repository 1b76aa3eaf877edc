import type { IStorage } from '../interfaces/index.js';
import type { JourneyPolicy } from '../../journeys/types.js';
import { loadJourneyPolicies } from '../../journeys/default-policies.js';
import { MemoryTenantStorage, MemorySigningKeyStorage } from './tenant-storage.js';
import { MemoryClientStorage } from './client-storage.js';
import { MemoryUserStore } from './user-storage.js';
import { MemoryRefreshTokenStorage, MemoryRevokedTokenStorage } from './token-storage.js';
import { MemoryAuthorizationCodeStorage } from './authorization-code-storage.js';
import { MemoryDeviceCodeStorage } from './device-code-storage.js';
import { MemoryPushedAuthorizationStorage } from './par-storage.js';
import { MemoryCibaStore } from './ciba-store.js';
import { MemoryDPoPNonceStore, type MemoryDPoPNonceStoreOptions } from './dpop-nonce-store.js';
import { MemoryJourneyStateStore } from './journey-state-store.js';
import { MemoryJourneyPolicyStore } from './journey-policy-store.js';
import { MemoryProtocolStateStore } from './protocol-state-store.js';

export { MemoryTenantStorage, MemorySigningKeyStorage } from './tenant-storage.js';
export { MemoryClientStorage } from './client-storage.js';
export { MemoryUserStore } from './user-storage.js';
export { MemoryRefreshTokenStorage, MemoryRevokedTokenStorage } from './token-storage.js';
export { MemoryAuthorizationCodeStorage } from './authorization-code-storage.js';
export { MemoryDeviceCodeStorage, normalizeUserCode } from './device-code-storage.js';
export { MemoryPushedAuthorizationStorage } from './par-storage.js';
export { MemoryCibaStore } from './ciba-store.js';
export { MemoryDPoPNonceStore } from './dpop-nonce-store.js';
export { MemoryJourneyStateStore } from './journey-state-store.js';
export { MemoryJourneyPolicyStore } from './journey-policy-store.js';
export { MemoryProtocolStateStore } from './protocol-state-store.js';

export interface MemoryStorageOptions {
  /** Journey policies to seed; the bundled defaults when absent */
  journeyPolicies?: readonly JourneyPolicy[];
  dpop?: MemoryDPoPNonceStoreOptions;
}

/**
 * Create a complete in-memory storage implementation
 */
export function createMemoryStorage(options: MemoryStorageOptions = {}): IStorage {
  return {
    tenants: new MemoryTenantStorage(),
    signingKeys: new MemorySigningKeyStorage(),
    clients: new MemoryClientStorage(),
    users: new MemoryUserStore(),
    refreshTokens: new MemoryRefreshTokenStorage(),
    revokedTokens: new MemoryRevokedTokenStorage(),
    authorizationCodes: new MemoryAuthorizationCodeStorage(),
    deviceCodes: new MemoryDeviceCodeStorage(),
    pushedAuthorizations: new MemoryPushedAuthorizationStorage(),
    cibaRequests: new MemoryCibaStore(),
    dpopNonces: new MemoryDPoPNonceStore(options.dpop),
    journeyStates: new MemoryJourneyStateStore(),
    journeyPolicies: new MemoryJourneyPolicyStore(options.journeyPolicies ?? loadJourneyPolicies()),
    protocolStates: new MemoryProtocolStateStore(),
  };
}
