import type { ConditionToggles } from "../config/types.js";
import type { FactSnapshot } from "./facts.js";
import { ruleMatches } from "./evaluator.js";
import type { Rule } from "./types.js";

/**
 * First rule, in authored order, whose condition holds. There is no scoring:
 * a more specific rule must be listed before a more general one.
 */
export function findFirstMatch<R extends Rule>(
  rules: readonly R[],
  facts: FactSnapshot,
  toggles?: ConditionToggles,
): R | null {
  for (const rule of rules) {
    if (ruleMatches(rule, facts, toggles)) return rule;
  }
  return null;
}
