import type { ConditionToggles } from "../config/types.js";
import type { FactSnapshot } from "./facts.js";
import { includesChoice } from "./choice.js";
import type { Condition, Rule } from "./types.js";

const NOT_A_PET = "NotAPet";

export const ALL_CONDITIONS: ConditionToggles = { weather: true, season: true, friendship: true };

function sameIgnoringCase(a: string, b: string): boolean {
  return a.toUpperCase() === b.toUpperCase();
}

function referencesCharacterFacts(condition: Condition): boolean {
  return (
    condition.name !== undefined ||
    condition.isSpouse !== undefined ||
    condition.isDateable !== undefined ||
    condition.friendshipGreaterThanOrEqualTo !== undefined ||
    condition.friendshipLessThan !== undefined
  );
}

/**
 * AND over every field the condition sets; an unset field imposes nothing.
 * Season, weather and relationship bounds are skipped entirely when their toggle is off.
 */
export function evaluateCondition(
  condition: Condition | null,
  facts: FactSnapshot,
  toggles: ConditionToggles = ALL_CONDITIONS,
): boolean {
  if (condition === null) return true;

  const { target, relationship, world } = facts;

  if (condition.actorType && !includesChoice(condition.actorType, target.actorType)) return false;

  if (condition.petType !== undefined && (target.petType ?? NOT_A_PET) !== condition.petType) return false;

  if (target.isCharacter) {
    if (condition.name !== undefined && target.name !== condition.name) return false;
    if (condition.isSpouse !== undefined && relationship.isSpouse !== condition.isSpouse) return false;
    if (condition.isDateable !== undefined && target.isDateable !== condition.isDateable) return false;

    if (toggles.friendship) {
      const score = relationship.score ?? 0;
      if (condition.friendshipGreaterThanOrEqualTo !== undefined && score < condition.friendshipGreaterThanOrEqualTo) {
        return false;
      }
      if (condition.friendshipLessThan !== undefined && score >= condition.friendshipLessThan) return false;
    }
  } else if (referencesCharacterFacts(condition)) {
    return false;
  }

  if (condition.isBaby !== undefined && (target.actorType === "baby") !== condition.isBaby) return false;

  if (toggles.season && condition.season !== undefined && !sameIgnoringCase(world.season, condition.season)) {
    return false;
  }
  if (toggles.weather && condition.weather !== undefined && !sameIgnoringCase(world.weather, condition.weather)) {
    return false;
  }

  return true;
}

export function ruleMatches(rule: Rule, facts: FactSnapshot, toggles?: ConditionToggles): boolean {
  if (rule.defect !== undefined) return false;
  return evaluateCondition(rule.condition, facts, toggles);
}
