import { describe, it, expect } from "vitest";
import { choiceValues, includesChoice, oneOrMany, resolveChoice } from "../../src/rules/choice.js";

describe("oneOrMany", () => {
  it("maps absent values to none", () => {
    expect(oneOrMany(undefined)).toEqual({ kind: "none" });
    expect(oneOrMany(null)).toEqual({ kind: "none" });
    expect(oneOrMany([])).toEqual({ kind: "none" });
  });

  it("maps a single value or single-item list to one", () => {
    expect(oneOrMany("heart")).toEqual({ kind: "one", value: "heart" });
    expect(oneOrMany(["heart"])).toEqual({ kind: "one", value: "heart" });
  });

  it("maps several values to many", () => {
    expect(oneOrMany(["a", "b"])).toEqual({ kind: "many", values: ["a", "b"] });
  });
});

describe("resolveChoice", () => {
  it("resolves none to undefined", () => {
    expect(resolveChoice({ kind: "none" })).toBeUndefined();
  });

  it("resolves one to its value without drawing", () => {
    let draws = 0;
    const random = () => {
      draws++;
      return 0.9;
    };
    expect(resolveChoice({ kind: "one", value: "x" }, random)).toBe("x");
    expect(draws).toBe(0);
  });

  it("picks uniformly by the random draw", () => {
    const choice = { kind: "many", values: ["a", "b", "c", "d"] } as const;
    expect(resolveChoice(choice, () => 0)).toBe("a");
    expect(resolveChoice(choice, () => 0.26)).toBe("b");
    expect(resolveChoice(choice, () => 0.5)).toBe("c");
    expect(resolveChoice(choice, () => 0.999)).toBe("d");
  });
});

describe("includesChoice", () => {
  it("treats none as unconstrained", () => {
    expect(includesChoice({ kind: "none" }, "pet")).toBe(true);
  });

  it("checks membership", () => {
    expect(includesChoice({ kind: "many", values: ["pet", "baby"] }, "baby")).toBe(true);
    expect(includesChoice({ kind: "one", value: "pet" }, "baby")).toBe(false);
  });
});

describe("choiceValues", () => {
  it("lists every alternative", () => {
    expect(choiceValues({ kind: "none" })).toEqual([]);
    expect(choiceValues({ kind: "one", value: "a" })).toEqual(["a"]);
    expect(choiceValues({ kind: "many", values: ["a", "b"] })).toEqual(["a", "b"]);
  });
});
