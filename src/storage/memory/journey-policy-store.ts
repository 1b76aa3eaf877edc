import type { JourneyPolicy, JourneyType, PolicyMatchContext } from '../../journeys/types.js';
import type { IJourneyPolicyStore } from '../interfaces/journey-policy-store.js';
import { findMatchingPolicy } from '../../journeys/policy-matcher.js';

/**
 * In-memory journey policy store
 */
export class MemoryJourneyPolicyStore implements IJourneyPolicyStore {
  private policies = new Map<string, JourneyPolicy>();

  constructor(seed: readonly JourneyPolicy[] = []) {
    for (const policy of seed) {
      this.policies.set(policy.id, structuredClone(policy));
    }
  }

  async getById(id: string): Promise<JourneyPolicy | null> {
    const policy = this.policies.get(id);
    return policy ? structuredClone(policy) : null;
  }

  async getByType(type: JourneyType, tenantId?: string): Promise<JourneyPolicy[]> {
    return this.all().filter(
      (p) => p.type === type && (tenantId === undefined || p.tenantId === undefined || p.tenantId === tenantId)
    );
  }

  async getByTenant(tenantId: string): Promise<JourneyPolicy[]> {
    return this.all().filter((p) => p.tenantId === undefined || p.tenantId === tenantId);
  }

  async findMatching(context: PolicyMatchContext): Promise<JourneyPolicy | null> {
    return findMatchingPolicy(this.all(), context);
  }

  async save(policy: JourneyPolicy): Promise<void> {
    this.policies.set(policy.id, structuredClone(policy));
  }

  async delete(id: string): Promise<void> {
    this.policies.delete(id);
  }

  private all(): JourneyPolicy[] {
    return Array.from(this.policies.values(), (p) => structuredClone(p));
  }
}
