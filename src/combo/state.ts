export interface ComboState {
  lastSignal: string;
  streakCount: number;
  lastTimestamp: number;
}

function pairKey(initiatorId: string, targetId: string): string {
  return `${initiatorId}\u0000${targetId}`;
}

/**
 * Streak state per (initiator, target). Entries are created on first contact and kept
 * for the life of the process; stale ones are reset lazily when the next signal arrives.
 */
export class ComboStateTable {
  private readonly states = new Map<string, ComboState>();

  get(initiatorId: string, targetId: string): ComboState | undefined {
    return this.states.get(pairKey(initiatorId, targetId));
  }

  getOrCreate(initiatorId: string, targetId: string, init: () => ComboState): { state: ComboState; created: boolean } {
    const key = pairKey(initiatorId, targetId);
    const existing = this.states.get(key);
    if (existing) return { state: existing, created: false };
    const state = init();
    this.states.set(key, state);
    return { state, created: true };
  }

  get size(): number {
    return this.states.size;
  }
}
