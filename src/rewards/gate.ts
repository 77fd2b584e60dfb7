import type { RewardsConfig } from "../config/types.js";
import type { InitiatorProfile, NotificationPort, RelationshipPort } from "../engine/ports.js";
import type { Logger } from "../logging/logger.js";
import type { TargetFacts } from "../rules/facts.js";
import { RewardLedger } from "./ledger.js";

export interface RewardGateDeps {
  relationships: RelationshipPort;
  config: RewardsConfig;
  logger: Logger;
  ledger?: RewardLedger;
  notifications?: NotificationPort;
}

export class RewardGate {
  private readonly relationships: RelationshipPort;
  private readonly config: RewardsConfig;
  private readonly logger: Logger;
  private readonly ledger: RewardLedger;
  private readonly notifications: NotificationPort | undefined;

  constructor(deps: RewardGateDeps) {
    this.relationships = deps.relationships;
    this.config = deps.config;
    this.logger = deps.logger;
    this.ledger = deps.ledger ?? new RewardLedger();
    this.notifications = deps.notifications;
  }

  get amount(): number {
    return this.config.amount;
  }

  /**
   * Grants `amount` relationship points at most once per (initiator, target) per day.
   * Pets are exempt from needing an existing relationship record. A failing
   * relationship port throws and leaves the pair unrewarded.
   */
  tryGrant(initiator: InitiatorProfile, target: TargetFacts, amount: number = this.config.amount): boolean {
    if (amount <= 0) return false;
    if (!target.isCharacter) return false;
    if (target.actorType !== "pet" && this.relationships.get(initiator.id, target.id) === undefined) return false;
    if (this.ledger.has(initiator.id, target.id)) return false;

    this.relationships.grant(initiator.id, target.id, amount);
    this.ledger.add(initiator.id, target.id);

    if (this.config.notify && initiator.isLocal && this.notifications) {
      this.notifications.notify(initiator.id, `+${amount} ${target.displayName}`);
    }
    return true;
  }

  startDay(): void {
    this.ledger.clear();
    this.logger.debug("Daily reward ledger cleared");
  }
}
