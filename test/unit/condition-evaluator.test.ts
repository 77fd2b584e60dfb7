import { describe, it, expect } from "vitest";
import { evaluateCondition, ruleMatches } from "../../src/rules/evaluator.js";
import type { Condition, Rule } from "../../src/rules/types.js";
import { makeFacts } from "../helpers/fixtures.js";

const ALL_OFF = { weather: false, season: false, friendship: false };

describe("evaluateCondition", () => {
  it("treats a missing condition as a match", () => {
    expect(evaluateCondition(null, makeFacts())).toBe(true);
  });

  it("treats an empty condition as a match", () => {
    expect(evaluateCondition({}, makeFacts())).toBe(true);
  });

  it("matches name exactly and case-sensitively", () => {
    expect(evaluateCondition({ name: "Abigail" }, makeFacts())).toBe(true);
    expect(evaluateCondition({ name: "abigail" }, makeFacts())).toBe(false);
  });

  it("compares spouse, dateable and baby flags", () => {
    const spouse = makeFacts({ relationship: { isSpouse: true } });
    expect(evaluateCondition({ isSpouse: true }, spouse)).toBe(true);
    expect(evaluateCondition({ isSpouse: false }, spouse)).toBe(false);
    expect(evaluateCondition({ isDateable: true }, makeFacts())).toBe(true);
    expect(evaluateCondition({ isDateable: false }, makeFacts())).toBe(false);
    expect(evaluateCondition({ isBaby: false }, makeFacts())).toBe(true);
    expect(evaluateCondition({ isBaby: true }, makeFacts({ target: { actorType: "baby" } }))).toBe(true);
  });

  it("uses an inclusive lower and exclusive upper relationship bound", () => {
    const facts = makeFacts({ relationship: { score: 2000 } });
    expect(evaluateCondition({ friendshipGreaterThanOrEqualTo: 2000 }, facts)).toBe(true);
    expect(evaluateCondition({ friendshipGreaterThanOrEqualTo: 2001 }, facts)).toBe(false);
    expect(evaluateCondition({ friendshipLessThan: 2001 }, facts)).toBe(true);
    expect(evaluateCondition({ friendshipLessThan: 2000 }, facts)).toBe(false);
  });

  it("counts a missing relationship record as score 0", () => {
    const facts = makeFacts({ relationship: { score: undefined } });
    expect(evaluateCondition({ friendshipLessThan: 1 }, facts)).toBe(true);
    expect(evaluateCondition({ friendshipGreaterThanOrEqualTo: 1 }, facts)).toBe(false);
  });

  it("checks actor type against one value or a set", () => {
    const pet = makeFacts({ target: { actorType: "pet", petType: "Cat" } });
    const one: Condition = { actorType: { kind: "one", value: "pet" } };
    const many: Condition = { actorType: { kind: "many", values: ["farm-animal", "pet"] } };
    const other: Condition = { actorType: { kind: "one", value: "villager" } };
    expect(evaluateCondition(one, pet)).toBe(true);
    expect(evaluateCondition(many, pet)).toBe(true);
    expect(evaluateCondition(other, pet)).toBe(false);
  });

  it("matches pet subtype, and non-pets never match a pet type", () => {
    const dog = makeFacts({ target: { actorType: "pet", petType: "Dog" } });
    expect(evaluateCondition({ petType: "Dog" }, dog)).toBe(true);
    expect(evaluateCondition({ petType: "Cat" }, dog)).toBe(false);
    expect(evaluateCondition({ petType: "Dog" }, makeFacts())).toBe(false);
  });

  it("compares season and weather ignoring case", () => {
    const facts = makeFacts({ world: { season: "summer", weather: "Rainy" } });
    expect(evaluateCondition({ season: "SUMMER", weather: "rainy" }, facts)).toBe(true);
    expect(evaluateCondition({ season: "fall" }, facts)).toBe(false);
    expect(evaluateCondition({ weather: "Sunny" }, facts)).toBe(false);
  });

  it("ignores season, weather and relationship bounds when their toggles are off", () => {
    const facts = makeFacts({ relationship: { score: 0 }, world: { season: "winter", weather: "Snowy" } });
    const condition: Condition = { season: "spring", weather: "Sunny", friendshipGreaterThanOrEqualTo: 500 };
    expect(evaluateCondition(condition, facts)).toBe(false);
    expect(evaluateCondition(condition, facts, ALL_OFF)).toBe(true);
  });

  it("fails character-only fields for non-character targets", () => {
    const cow = makeFacts({ target: { isCharacter: false, actorType: "farm-animal", name: "Daisy" } });
    expect(evaluateCondition({ actorType: { kind: "one", value: "farm-animal" } }, cow)).toBe(true);
    expect(evaluateCondition({ name: "Daisy" }, cow)).toBe(false);
    expect(evaluateCondition({ isSpouse: false }, cow)).toBe(false);
    expect(evaluateCondition({ friendshipLessThan: 9999 }, cow)).toBe(false);
  });

  it("returns the same answer when evaluated twice", () => {
    const condition: Condition = { friendshipGreaterThanOrEqualTo: 500, season: "spring" };
    const facts = makeFacts();
    expect(evaluateCondition(condition, facts)).toBe(evaluateCondition(condition, facts));
  });
});

describe("ruleMatches", () => {
  it("never matches a rule that failed to parse", () => {
    const broken: Rule = {
      condition: null,
      action: { primaryChoices: { kind: "none" }, textChoices: { kind: "none" } },
      defect: "conditions.mood: Unrecognized key",
    };
    expect(ruleMatches(broken, makeFacts())).toBe(false);
  });
});
