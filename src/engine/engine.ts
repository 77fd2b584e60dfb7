import { ComboStateMachine } from "../combo/machine.js";
import { ComboStateTable } from "../combo/state.js";
import type { ReactorConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import {
  ActionExecutor,
  type ReactionOutcome,
  type ReactionRequest,
  type ReactionSource,
  type Sleep,
} from "../reaction/executor.js";
import { RewardGate } from "../rewards/gate.js";
import { RewardLedger } from "../rewards/ledger.js";
import type { RandomSource } from "../rules/choice.js";
import { findFirstMatch } from "../rules/matcher.js";
import type { RuleSource, SignalRules } from "../rules/types.js";
import { TypedEventEmitter } from "../utils/typed-emitter.js";
import { inspectSignal, type InspectReport } from "./inspect.js";
import type { FactProvider, InitiatorProfile, ReactionPorts } from "./ports.js";

export interface DispatchedReaction {
  readonly targetId: string;
  readonly source: ReactionSource;
}

export interface SignalReport {
  readonly signal: string;
  readonly dispatched: readonly DispatchedReaction[];
}

export type ReactionEngineEvents = {
  dispatched: [initiatorId: string, signal: string, reaction: DispatchedReaction];
  reacted: [outcome: ReactionOutcome];
  dropped: [request: ReactionRequest];
};

export interface ReactionEngineDeps {
  config: ReactorConfig;
  rules: RuleSource;
  facts: FactProvider;
  ports: ReactionPorts;
  logger: Logger;
  comboStates?: ComboStateTable;
  ledger?: RewardLedger;
  random?: RandomSource;
  sleep?: Sleep;
  now?: () => number;
}

/**
 * Turns an initiator's signal into reactions from nearby targets. Per target, a combo that
 * reaches its threshold wins; otherwise the first matching immediate rule runs.
 * Reactions run as background tasks; `idle()` waits for them. A target that is still
 * reacting drops the new request and is left out of the report.
 */
export class ReactionEngine extends TypedEventEmitter<ReactionEngineEvents> {
  private readonly config: ReactorConfig;
  private readonly rules: RuleSource;
  private readonly facts: FactProvider;
  private readonly logger: Logger;
  private readonly combos: ComboStateMachine;
  private readonly rewards: RewardGate;
  private readonly executor: ActionExecutor;
  private readonly pending = new Set<Promise<void>>();

  constructor(deps: ReactionEngineDeps) {
    super((err, event) => deps.logger.error({ err, event }, "Engine listener failed"));
    this.config = deps.config;
    this.rules = deps.rules;
    this.facts = deps.facts;
    this.logger = deps.logger;

    this.combos = new ComboStateMachine({
      config: deps.config.combo,
      toggles: deps.config.conditions,
      logger: deps.logger,
      table: deps.comboStates ?? new ComboStateTable(),
      ...(deps.now ? { now: deps.now } : {}),
    });
    this.rewards = new RewardGate({
      relationships: deps.ports.relationships,
      config: deps.config.rewards,
      logger: deps.logger,
      ledger: deps.ledger ?? new RewardLedger(),
      ...(deps.ports.notifications ? { notifications: deps.ports.notifications } : {}),
    });
    this.executor = new ActionExecutor({
      config: deps.config.reaction,
      ports: deps.ports,
      rewards: this.rewards,
      logger: deps.logger,
      ...(deps.random ? { random: deps.random } : {}),
      ...(deps.sleep ? { sleep: deps.sleep } : {}),
    });

    this.executor.on("reacted", (outcome) => this.emit("reacted", outcome));
    this.executor.on("dropped", (request) => this.emit("dropped", request));
  }

  get comboMachine(): ComboStateMachine {
    return this.combos;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  handleSignal(initiator: InitiatorProfile, signal: string, targetIds: readonly string[]): SignalReport {
    const dispatched: DispatchedReaction[] = [];
    const signalRules = this.rules.get(signal);
    if (!signalRules) {
      this.logger.debug({ signal }, "No rules for signal");
      return { signal, dispatched };
    }

    for (const targetId of new Set(targetIds)) {
      if (targetId === initiator.id) continue;

      let reaction: DispatchedReaction | null;
      try {
        reaction = this.reactFor(initiator, signal, targetId, signalRules);
      } catch (err) {
        this.logger.error({ err, targetId, signal }, "Failed to evaluate reaction");
        continue;
      }
      if (reaction) {
        dispatched.push(reaction);
        this.emit("dispatched", initiator.id, signal, reaction);
      }
    }

    if (dispatched.length === 0) {
      this.logger.debug({ signal }, "No one in range or no matching reaction");
    }
    return { signal, dispatched };
  }

  inspect(initiatorId: string, targetId: string, signal: string): InspectReport | null {
    const facts = this.facts.getFacts(initiatorId, targetId);
    if (!facts) return null;
    return inspectSignal(this.rules, signal, facts, this.config);
  }

  /** Day boundary: every pair may be rewarded again. */
  startDay(): void {
    this.rewards.startDay();
  }

  async reloadRules(): Promise<void> {
    await this.rules.reload?.();
  }

  async idle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private reactFor(
    initiator: InitiatorProfile,
    signal: string,
    targetId: string,
    signalRules: SignalRules,
  ): DispatchedReaction | null {
    const facts = this.facts.getFacts(initiator.id, targetId);
    if (!facts) return null;
    if (facts.distance !== undefined && facts.distance > this.config.reaction.eventDistance) return null;

    const decision = this.combos.process(initiator.id, targetId, signal, signalRules.combos, facts);
    if (decision.phase === "triggered" && decision.rule) {
      const accepted = this.dispatch({ initiator, target: facts.target, action: decision.rule.action, signal, source: "combo" });
      return accepted ? { targetId, source: "combo" } : null;
    }

    const rule = findFirstMatch(signalRules.reactions, facts, this.config.conditions);
    if (!rule) return null;

    const accepted = this.dispatch({ initiator, target: facts.target, action: rule.action, signal, source: "immediate" });
    return accepted ? { targetId, source: "immediate" } : null;
  }

  /** Returns false when the target is still busy; the executor then drops the request. */
  private dispatch(request: ReactionRequest): boolean {
    const accepted = !this.executor.isBusy(request.target.id);
    const task: Promise<void> = this.executor
      .execute(request)
      .catch((err: unknown) => {
        this.logger.error({ err, targetId: request.target.id }, "Reaction task failed");
      })
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
    return accepted;
  }
}
