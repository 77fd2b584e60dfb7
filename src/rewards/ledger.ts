/** Targets each initiator has already been rewarded for during the current day. */
export class RewardLedger {
  private readonly rewarded = new Map<string, Set<string>>();

  has(initiatorId: string, targetId: string): boolean {
    return this.rewarded.get(initiatorId)?.has(targetId) ?? false;
  }

  /** Returns false when the pair was already recorded today. */
  add(initiatorId: string, targetId: string): boolean {
    let targets = this.rewarded.get(initiatorId);
    if (!targets) {
      targets = new Set();
      this.rewarded.set(initiatorId, targets);
    }
    if (targets.has(targetId)) return false;
    targets.add(targetId);
    return true;
  }

  clear(): void {
    this.rewarded.clear();
  }
}
