import type { JourneyState } from '../../journeys/types.js';
import type { IJourneyStateStore } from '../interfaces/journey-state-store.js';

/**
 * Expired states stay readable this long so callers can tell an expired
 * journey from an unknown one
 */
const EXPIRY_GRACE_MS = 5 * 60_000;

/**
 * In-memory journey state store. States are deep-copied in and out.
 */
export class MemoryJourneyStateStore implements IJourneyStateStore {
  private states = new Map<string, JourneyState>();

  async get(journeyId: string): Promise<JourneyState | null> {
    const state = this.states.get(journeyId);
    if (!state) return null;

    if (state.expiresAt.getTime() + EXPIRY_GRACE_MS < Date.now()) {
      this.states.delete(journeyId);
      return null;
    }

    return structuredClone(state);
  }

  async save(state: JourneyState): Promise<void> {
    this.states.set(state.id, structuredClone(state));
  }

  async delete(journeyId: string): Promise<void> {
    this.states.delete(journeyId);
  }

  async getByUser(tenantId: string, userId: string): Promise<JourneyState[]> {
    const now = Date.now();
    return Array.from(this.states.values())
      .filter((s) => s.tenantId === tenantId && s.userId === userId && s.expiresAt.getTime() > now)
      .map((s) => structuredClone(s));
  }

  async cleanupExpired(): Promise<number> {
    const now = Date.now();
    let removed = 0;

    for (const [id, state] of this.states) {
      if (state.expiresAt.getTime() < now) {
        this.states.delete(id);
        removed++;
      }
    }

    return removed;
  }
}
