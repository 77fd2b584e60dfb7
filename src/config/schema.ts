import { z } from "zod";
import type { ReactorConfig } from "./types.js";

const reactionSchema = z.object({
  delayMs: z.number().int().min(0).max(5_000).default(700),
  jitterMs: z.number().int().min(0).default(300),
  signalTextPauseMs: z.number().int().min(0).default(1_200),
  fragmentPauseMs: z.number().int().min(0).default(1_800),
  fragmentSplitter: z.string().min(1).default("|"),
  animationPrefix: z.string().min(1).default("anim_"),
  eventDistance: z.number().positive().max(15).default(3),
  replySound: z.boolean().default(true),
  replySoundId: z.string().min(1).default("pickUpItem"),
});

const rewardsSchema = z.object({
  amount: z.number().int().min(0).max(250).default(10),
  notify: z.boolean().default(true),
});

const comboSchema = z.object({
  enabled: z.boolean().default(true),
  countMode: z.enum(["per-rule", "fixed"]).default("per-rule"),
  globalTarget: z.number().int().min(2).max(10).default(3),
  timeoutMs: z.number().int().positive().default(35_000),
});

const conditionTogglesSchema = z.object({
  weather: z.boolean().default(true),
  season: z.boolean().default(true),
  friendship: z.boolean().default(true),
});

const loggingSchema = z.object({
  level: z.enum(["trace", "debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

export const reactorConfigSchema = z.object({
  reaction: reactionSchema.default({}),
  rewards: rewardsSchema.default({}),
  combo: comboSchema.default({}),
  conditions: conditionTogglesSchema.default({}),
  rules: z.object({
    dir: z.string().min(1).optional(),
  }).default({}),
  localization: z.object({
    dir: z.string().min(1).optional(),
    locale: z.string().min(1).default("default"),
  }).default({}),
  logging: loggingSchema.default({}),
});

export function parseConfig(raw: unknown): ReactorConfig {
  return reactorConfigSchema.parse(raw);
}
