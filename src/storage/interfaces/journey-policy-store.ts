import type { JourneyPolicy, JourneyType, PolicyMatchContext } from '../../journeys/types.js';

export interface IJourneyPolicyStore {
  getById(id: string): Promise<JourneyPolicy | null>;

  getByType(type: JourneyType, tenantId?: string): Promise<JourneyPolicy[]>;

  /**
   * Tenant policies plus global ones
   */
  getByTenant(tenantId: string): Promise<JourneyPolicy[]>;

  /**
   * Best enabled policy for the context, or null
   */
  findMatching(context: PolicyMatchContext): Promise<JourneyPolicy | null>;

  save(policy: JourneyPolicy): Promise<void>;

  delete(id: string): Promise<void>;
}
