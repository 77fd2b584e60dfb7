import type { FactSnapshot } from "../rules/facts.js";

export type Gender = "male" | "female";

/** The actor whose signal starts a reaction. */
export interface InitiatorProfile {
  readonly id: string;
  readonly name: string;
  /** Team, farm or organisation name used by the `%farm` token. */
  readonly teamName: string;
  readonly favoriteThing: string;
  readonly companionName?: string;
  readonly gender: Gender;
  /** Whether notifications for this initiator are shown on this machine. */
  readonly isLocal: boolean;
}

export interface FactProvider {
  /** Undefined when the target is gone or its facts cannot be resolved. */
  getFacts(initiatorId: string, targetId: string): FactSnapshot | undefined;
}

export interface SignalPort {
  /** Returns false when the signal is unknown and nothing was rendered. */
  perform(targetId: string, signal: string): boolean;
}

export interface AnimationPort {
  performNamed(targetId: string, animationName: string): void;
}

export interface TextPort {
  show(targetId: string, text: string): void;
}

export interface RelationshipPort {
  /** Undefined when the initiator has no relationship record with the target. */
  get(initiatorId: string, targetId: string): number | undefined;
  grant(initiatorId: string, targetId: string, amount: number): void;
}

export interface SoundPort {
  play(effectId: string): void;
}

export interface NotificationPort {
  notify(initiatorId: string, message: string): void;
}

export interface Localization {
  resolve(textKey: string): string | undefined;
}

export interface ReactionPorts {
  readonly signals: SignalPort;
  readonly localization: Localization;
  readonly relationships: RelationshipPort;
  readonly animations?: AnimationPort;
  readonly text?: TextPort;
  readonly sound?: SoundPort;
  readonly notifications?: NotificationPort;
}
