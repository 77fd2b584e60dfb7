import type { ComboConfig, ConditionToggles } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { FactSnapshot } from "../rules/facts.js";
import { findFirstMatch } from "../rules/matcher.js";
import type { ComboRule } from "../rules/types.js";
import { ComboStateTable, type ComboState } from "./state.js";

export type ComboPhase = "idle" | "streaking" | "triggered";

export interface ComboDecision {
  readonly phase: ComboPhase;
  readonly streakCount: number;
  readonly rule: ComboRule | null;
  readonly threshold: number | null;
}

/** Repeats needed before a combo rule fires: the global target in "fixed" mode, else the rule's own count. */
export function comboThreshold(rule: ComboRule, config: ComboConfig): number {
  if (config.countMode === "fixed") return config.globalTarget;
  return rule.triggerCount ?? config.globalTarget;
}

export interface ComboStateMachineDeps {
  config: ComboConfig;
  toggles: ConditionToggles;
  logger: Logger;
  table?: ComboStateTable;
  now?: () => number;
}

export class ComboStateMachine {
  private readonly config: ComboConfig;
  private readonly toggles: ConditionToggles;
  private readonly logger: Logger;
  private readonly table: ComboStateTable;
  private readonly now: () => number;

  constructor(deps: ComboStateMachineDeps) {
    this.config = deps.config;
    this.toggles = deps.toggles;
    this.logger = deps.logger;
    this.table = deps.table ?? new ComboStateTable();
    this.now = deps.now ?? Date.now;
  }

  get states(): ComboStateTable {
    return this.table;
  }

  /** Number of repeats a rule needs before it fires. */
  thresholdFor(rule: ComboRule): number {
    return comboThreshold(rule, this.config);
  }

  /** Advances the streak for a pair: start, continue, or reset on a new signal or an expired window. */
  record(initiatorId: string, targetId: string, signal: string): ComboState {
    const now = this.now();
    const { state, created } = this.table.getOrCreate(initiatorId, targetId, () => ({
      lastSignal: signal,
      streakCount: 1,
      lastTimestamp: now,
    }));
    if (created) return state;

    if (state.lastSignal !== signal || now - state.lastTimestamp > this.config.timeoutMs) {
      state.lastSignal = signal;
      state.streakCount = 1;
    } else {
      state.streakCount += 1;
    }
    state.lastTimestamp = now;
    return state;
  }

  /**
   * Records the signal, then checks the signal's combo rules. When the streak reaches the
   * matched rule's threshold the decision is "triggered" and the streak drops to 0.
   */
  process(
    initiatorId: string,
    targetId: string,
    signal: string,
    rules: readonly ComboRule[],
    facts: FactSnapshot,
  ): ComboDecision {
    if (!this.config.enabled) {
      return { phase: "idle", streakCount: 0, rule: null, threshold: null };
    }

    const state = this.record(initiatorId, targetId, signal);
    const count = state.streakCount;

    const rule = findFirstMatch(rules, facts, this.toggles);
    if (!rule) {
      return { phase: "streaking", streakCount: count, rule: null, threshold: null };
    }

    const threshold = this.thresholdFor(rule);
    if (count < threshold) {
      return { phase: "streaking", streakCount: count, rule, threshold };
    }

    state.streakCount = 0;
    this.logger.debug({ initiatorId, targetId, signal, count, threshold }, "Combo threshold reached");
    return { phase: "triggered", streakCount: count, rule, threshold };
  }
}
