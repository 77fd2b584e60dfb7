import { z } from "zod";
import { none, oneOrMany } from "./choice.js";
import { ACTOR_TYPES, type Action, type ActorType, type ComboRule, type Condition, type Rule } from "./types.js";

const choiceSchema = z.union([z.string().min(1), z.array(z.string().min(1))]).nullish();

const actorTypeSchema = z.enum(ACTOR_TYPES);

export const conditionSchema = z.object({
  name: z.string().nullish(),
  isSpouse: z.boolean().nullish(),
  isDateable: z.boolean().nullish(),
  isBaby: z.boolean().nullish(),
  season: z.string().nullish(),
  weather: z.string().nullish(),
  characterType: z.union([actorTypeSchema, z.array(actorTypeSchema)]).nullish(),
  petType: z.string().nullish(),
  friendshipGreaterThanOrEqualTo: z.number().int().nullish(),
  friendshipLessThan: z.number().int().nullish(),
}).strict();

export const actionObjectSchema = z.object({
  emote: choiceSchema,
  displayText: choiceSchema,
}).strict();

export const reactionRuleSchema = z.object({
  conditions: conditionSchema.nullish(),
  action: z.union([z.string().min(1), actionObjectSchema]),
}).strict();

export const comboRuleSchema = z.object({
  conditions: conditionSchema.nullish(),
  triggerCount: z.number().int().min(1).nullish(),
  action: actionObjectSchema,
}).strict();

export const reactionsEntrySchema = z.object({
  reactions: z.array(z.unknown()).default([]),
});

export const combosEntrySchema = z.object({
  comboReactions: z.array(z.unknown()).default([]),
});

export const ruleFileSchema = z.record(z.string(), z.unknown());

export type RawCondition = z.infer<typeof conditionSchema>;
export type RawActionObject = z.infer<typeof actionObjectSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export function toCondition(raw: RawCondition | null | undefined): Condition | null {
  if (!raw) return null;
  return {
    ...(raw.name != null ? { name: raw.name } : {}),
    ...(raw.isSpouse != null ? { isSpouse: raw.isSpouse } : {}),
    ...(raw.isDateable != null ? { isDateable: raw.isDateable } : {}),
    ...(raw.isBaby != null ? { isBaby: raw.isBaby } : {}),
    ...(raw.season != null ? { season: raw.season } : {}),
    ...(raw.weather != null ? { weather: raw.weather } : {}),
    ...(raw.characterType != null ? { actorType: oneOrMany<ActorType>(raw.characterType) } : {}),
    ...(raw.petType != null ? { petType: raw.petType } : {}),
    ...(raw.friendshipGreaterThanOrEqualTo != null
      ? { friendshipGreaterThanOrEqualTo: raw.friendshipGreaterThanOrEqualTo }
      : {}),
    ...(raw.friendshipLessThan != null ? { friendshipLessThan: raw.friendshipLessThan } : {}),
  };
}

export function toAction(raw: string | RawActionObject): Action {
  if (typeof raw === "string") {
    return { primaryChoices: { kind: "one", value: raw }, textChoices: none() };
  }
  return { primaryChoices: oneOrMany<string>(raw.emote), textChoices: oneOrMany<string>(raw.displayText) };
}

const MALFORMED_ACTION: Action = { primaryChoices: none(), textChoices: none() };

export function parseReactionRule(raw: unknown): Rule {
  const result = reactionRuleSchema.safeParse(raw);
  if (!result.success) {
    return { condition: null, action: MALFORMED_ACTION, defect: formatIssues(result.error) };
  }
  return { condition: toCondition(result.data.conditions), action: toAction(result.data.action) };
}

export function parseComboRule(raw: unknown): ComboRule {
  const result = comboRuleSchema.safeParse(raw);
  if (!result.success) {
    return { condition: null, action: MALFORMED_ACTION, defect: formatIssues(result.error) };
  }
  const { conditions, triggerCount, action } = result.data;
  return {
    condition: toCondition(conditions),
    action: toAction(action),
    ...(triggerCount != null ? { triggerCount } : {}),
  };
}
