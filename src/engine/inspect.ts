import type { ComboConfig, ConditionToggles } from "../config/types.js";
import { comboThreshold } from "../combo/machine.js";
import type { FactSnapshot } from "../rules/facts.js";
import { findFirstMatch } from "../rules/matcher.js";
import { choiceValues } from "../rules/choice.js";
import type { Action, ComboRule, Rule, RuleSource } from "../rules/types.js";

export interface InspectReport {
  readonly signal: string;
  readonly hasRules: boolean;
  readonly immediate: Rule | null;
  readonly combo: { readonly rule: ComboRule; readonly threshold: number } | null;
}

/** Predicts, without touching any state, what a signal would do to a target. */
export function inspectSignal(
  rules: RuleSource,
  signal: string,
  facts: FactSnapshot,
  config: { combo: ComboConfig; conditions: ConditionToggles },
): InspectReport {
  const signalRules = rules.get(signal);
  if (!signalRules) return { signal, hasRules: false, immediate: null, combo: null };

  const immediate = findFirstMatch(signalRules.reactions, facts, config.conditions);
  const comboRule = config.combo.enabled ? findFirstMatch(signalRules.combos, facts, config.conditions) : null;

  return {
    signal,
    hasRules: true,
    immediate,
    combo: comboRule ? { rule: comboRule, threshold: comboThreshold(comboRule, config.combo) } : null,
  };
}

export function describeAction(action: Action): string {
  const reply = choiceValues(action.primaryChoices);
  const text = choiceValues(action.textChoices);
  if (reply.length === 0 && text.length === 0) return "(nothing)";
  return `reply=[${reply.join(", ")}] text=[${text.join(", ")}]`;
}
