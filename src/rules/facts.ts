import { z } from "zod";
import { ACTOR_TYPES, type ActorType } from "./types.js";

export interface TargetFacts {
  readonly id: string;
  readonly name: string;
  readonly displayName: string;
  /** False for creatures that can neither speak nor hold a relationship (farm animals). */
  readonly isCharacter: boolean;
  readonly actorType: ActorType;
  /** Subtype for pets ("Dog", "Cat", "Horse", ...). */
  readonly petType?: string;
  readonly isDateable: boolean;
  /** Display name of the target's own partner, used by the `%spouse` token. */
  readonly partnerName?: string;
}

export interface RelationshipFacts {
  /** Undefined when the initiator has no relationship record with the target. */
  readonly score?: number;
  readonly isSpouse: boolean;
}

export interface WorldFacts {
  readonly season: string;
  readonly weather: string;
}

/** Read-only bundle of resolved world and actor facts for one (initiator, target) pair. */
export interface FactSnapshot {
  readonly target: TargetFacts;
  readonly relationship: RelationshipFacts;
  readonly world: WorldFacts;
  /** Distance in tiles between initiator and target, when known. */
  readonly distance?: number;
}

export const factSnapshotSchema = z.object({
  target: z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    displayName: z.string().min(1),
    isCharacter: z.boolean().default(true),
    actorType: z.enum(ACTOR_TYPES),
    petType: z.string().optional(),
    isDateable: z.boolean().default(false),
    partnerName: z.string().optional(),
  }),
  relationship: z.object({
    score: z.number().int().optional(),
    isSpouse: z.boolean().default(false),
  }).default({}),
  world: z.object({
    season: z.string().min(1),
    weather: z.string().min(1),
  }),
  distance: z.number().min(0).optional(),
});

export function parseFactSnapshot(raw: unknown): FactSnapshot {
  return factSnapshotSchema.parse(raw);
}
