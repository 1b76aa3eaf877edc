import type { JourneyState } from '../../journeys/types.js';

export interface IJourneyStateStore {
  /**
   * Null when unknown or past `expiresAt`
   */
  get(journeyId: string): Promise<JourneyState | null>;

  save(state: JourneyState): Promise<void>;

  delete(journeyId: string): Promise<void>;

  getByUser(tenantId: string, userId: string): Promise<JourneyState[]>;

  cleanupExpired(): Promise<number>;
}
