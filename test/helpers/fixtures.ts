import { vi } from "vitest";
import { parseConfig } from "../../src/config/schema.js";
import type { ReactorConfig } from "../../src/config/types.js";
import type {
  AnimationPort,
  FactProvider,
  InitiatorProfile,
  Localization,
  NotificationPort,
  RelationshipPort,
  SignalPort,
  SoundPort,
  TextPort,
} from "../../src/engine/ports.js";
import type { Logger } from "../../src/logging/logger.js";
import type { FactSnapshot, TargetFacts } from "../../src/rules/facts.js";

export function makeLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn().mockReturnThis(),
    level: "info",
  } as unknown as Logger;
}

/** Config with zero latency so timed tests only wait on the pauses they care about. */
export function makeConfig(
  overrides: { reaction?: Record<string, unknown>; [section: string]: unknown } = {},
): ReactorConfig {
  const { reaction, ...rest } = overrides;
  return parseConfig({ ...rest, reaction: { delayMs: 0, jitterMs: 0, ...reaction } });
}

export function makeInitiator(overrides: Partial<InitiatorProfile> = {}): InitiatorProfile {
  return {
    id: "player-1",
    name: "Robin",
    teamName: "Willow",
    favoriteThing: "Pancakes",
    companionName: "Biscuit",
    gender: "male",
    isLocal: true,
    ...overrides,
  };
}

export function makeTarget(overrides: Partial<TargetFacts> = {}): TargetFacts {
  return {
    id: "npc-abigail",
    name: "Abigail",
    displayName: "Abigail",
    isCharacter: true,
    actorType: "villager",
    isDateable: true,
    ...overrides,
  };
}

export interface FactOverrides {
  target?: Partial<TargetFacts>;
  relationship?: Partial<FactSnapshot["relationship"]>;
  world?: Partial<FactSnapshot["world"]>;
  distance?: number;
}

export function makeFacts(overrides: FactOverrides = {}): FactSnapshot {
  return {
    target: makeTarget(overrides.target),
    relationship: { score: 1000, isSpouse: false, ...overrides.relationship },
    world: { season: "spring", weather: "Sunny", ...overrides.world },
    ...(overrides.distance !== undefined ? { distance: overrides.distance } : {}),
  };
}

export function staticFacts(byTarget: Record<string, FactSnapshot>): FactProvider {
  return { getFacts: (_initiatorId, targetId) => byTarget[targetId] };
}

export interface FakePorts {
  signals: SignalPort & { perform: ReturnType<typeof vi.fn> };
  animations: AnimationPort & { performNamed: ReturnType<typeof vi.fn> };
  text: TextPort & { show: ReturnType<typeof vi.fn> };
  sound: SoundPort & { play: ReturnType<typeof vi.fn> };
  notifications: NotificationPort & { notify: ReturnType<typeof vi.fn> };
  relationships: RelationshipPort & { get: ReturnType<typeof vi.fn>; grant: ReturnType<typeof vi.fn> };
  localization: Localization & { resolve: ReturnType<typeof vi.fn> };
}

export function makePorts(texts: Record<string, string> = {}, scores: Record<string, number> = {}): FakePorts {
  return {
    signals: { perform: vi.fn().mockReturnValue(true) },
    animations: { performNamed: vi.fn() },
    text: { show: vi.fn() },
    sound: { play: vi.fn() },
    notifications: { notify: vi.fn() },
    relationships: {
      get: vi.fn((_initiatorId: string, targetId: string) => scores[targetId]),
      grant: vi.fn(),
    },
    localization: { resolve: vi.fn((key: string) => texts[key]) },
  };
}
