export const ACTOR_TYPES = ["villager", "pet", "farm-animal", "baby", "other"] as const;

export type ActorType = (typeof ACTOR_TYPES)[number];

/** A field that may hold no value, a single value, or a set of alternatives. */
export type OneOrMany<T> =
  | { readonly kind: "none" }
  | { readonly kind: "one"; readonly value: T }
  | { readonly kind: "many"; readonly values: readonly T[] };

export interface Condition {
  readonly name?: string;
  readonly isSpouse?: boolean;
  readonly isDateable?: boolean;
  readonly isBaby?: boolean;
  /** Inclusive lower bound on the initiator-target relationship score. */
  readonly friendshipGreaterThanOrEqualTo?: number;
  /** Exclusive upper bound on the initiator-target relationship score. */
  readonly friendshipLessThan?: number;
  readonly actorType?: OneOrMany<ActorType>;
  readonly petType?: string;
  readonly season?: string;
  readonly weather?: string;
}

export interface Action {
  readonly primaryChoices: OneOrMany<string>;
  readonly textChoices: OneOrMany<string>;
}

export interface Rule {
  /** `null` matches every target. */
  readonly condition: Condition | null;
  readonly action: Action;
  /** Set when the authored rule could not be parsed; such a rule never matches. */
  readonly defect?: string;
}

export interface ComboRule extends Rule {
  readonly triggerCount?: number;
}

export interface SignalRules {
  readonly reactions: readonly Rule[];
  readonly combos: readonly ComboRule[];
}

export type RuleList = "reactions" | "combos";

export interface RuleDefect {
  readonly signal: string;
  readonly list: RuleList;
  /** Position in the authored list; absent when the whole signal entry is malformed. */
  readonly index?: number;
  readonly reason: string;
}

export interface RuleSource {
  get(signal: string): SignalRules | undefined;
  reload?(): Promise<unknown>;
}
