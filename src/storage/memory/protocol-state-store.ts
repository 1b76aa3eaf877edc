import type { IProtocolStateStore, ProtocolState } from '../interfaces/protocol-state-store.js';

/**
 * In-memory store for authorization requests parked behind a journey
 */
export class MemoryProtocolStateStore implements IProtocolStateStore {
  private states = new Map<string, ProtocolState>();

  async save(state: ProtocolState): Promise<void> {
    this.states.set(state.correlationId, structuredClone(state));
  }

  async get(correlationId: string): Promise<ProtocolState | null> {
    const state = this.states.get(correlationId);
    if (!state) return null;

    if (state.expiresAt < new Date()) {
      this.states.delete(correlationId);
      return null;
    }

    return structuredClone(state);
  }

  async consume(correlationId: string): Promise<ProtocolState | null> {
    const state = this.states.get(correlationId);
    this.states.delete(correlationId);
    if (!state || state.expiresAt < new Date()) return null;
    return state;
  }

  async remove(correlationId: string): Promise<void> {
    this.states.delete(correlationId);
  }
}
