import type { OneOrMany } from "./types.js";

export type RandomSource = () => number;

export const none = <T>(): OneOrMany<T> => ({ kind: "none" });

function isList<T>(value: T | readonly T[]): value is readonly T[] {
  return Array.isArray(value);
}

export function oneOrMany<T>(value: T | readonly T[] | null | undefined): OneOrMany<T> {
  if (value === null || value === undefined) return { kind: "none" };
  if (!isList<T>(value)) return { kind: "one", value };
  const [first] = value;
  if (first === undefined) return { kind: "none" };
  if (value.length === 1) return { kind: "one", value: first };
  return { kind: "many", values: value };
}

export function resolveChoice<T>(choice: OneOrMany<T>, random: RandomSource = Math.random): T | undefined {
  switch (choice.kind) {
    case "none":
      return undefined;
    case "one":
      return choice.value;
    case "many":
      return choice.values[Math.floor(random() * choice.values.length)];
  }
}

export function includesChoice<T>(choice: OneOrMany<T>, candidate: T): boolean {
  switch (choice.kind) {
    case "none":
      return true;
    case "one":
      return choice.value === candidate;
    case "many":
      return choice.values.includes(candidate);
  }
}

export function choiceValues<T>(choice: OneOrMany<T>): readonly T[] {
  switch (choice.kind) {
    case "none":
      return [];
    case "one":
      return [choice.value];
    case "many":
      return choice.values;
  }
}
