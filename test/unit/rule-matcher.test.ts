import { describe, it, expect } from "vitest";
import { findFirstMatch } from "../../src/rules/matcher.js";
import type { Action, Rule } from "../../src/rules/types.js";
import { makeFacts } from "../helpers/fixtures.js";

const reply = (value: string): Action => ({
  primaryChoices: { kind: "one", value },
  textChoices: { kind: "none" },
});

describe("findFirstMatch", () => {
  it("returns null for an empty list", () => {
    expect(findFirstMatch([], makeFacts())).toBeNull();
  });

  it("returns null when nothing matches", () => {
    const rules: Rule[] = [{ condition: { name: "Sam" }, action: reply("wave") }];
    expect(findFirstMatch(rules, makeFacts())).toBeNull();
  });

  it("picks the first matching rule in authored order", () => {
    const rules: Rule[] = [
      { condition: { friendshipGreaterThanOrEqualTo: 2000 }, action: reply("heart-back") },
      { condition: null, action: reply("question") },
    ];
    const close = findFirstMatch(rules, makeFacts({ relationship: { score: 2200 } }));
    const distant = findFirstMatch(rules, makeFacts({ relationship: { score: 100 } }));
    expect(close).toBe(rules[0]);
    expect(distant).toBe(rules[1]);
  });

  it("does not rank a more specific rule above an earlier general one", () => {
    const rules: Rule[] = [
      { condition: null, action: reply("question") },
      { condition: { name: "Abigail", friendshipGreaterThanOrEqualTo: 500 }, action: reply("heart") },
    ];
    expect(findFirstMatch(rules, makeFacts())).toBe(rules[0]);
  });

  it("skips malformed rules and keeps scanning", () => {
    const rules: Rule[] = [
      { condition: null, action: reply("never"), defect: "action: Required" },
      { condition: { season: "spring" }, action: reply("flower") },
    ];
    expect(findFirstMatch(rules, makeFacts())).toBe(rules[1]);
  });

  it("applies condition toggles", () => {
    const rules: Rule[] = [
      { condition: { weather: "Rainy" }, action: reply("umbrella") },
      { condition: null, action: reply("wave") },
    ];
    const facts = makeFacts({ world: { weather: "Sunny" } });
    expect(findFirstMatch(rules, facts)).toBe(rules[1]);
    expect(findFirstMatch(rules, facts, { weather: false, season: true, friendship: true })).toBe(rules[0]);
  });
});
