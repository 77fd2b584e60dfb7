import type { ReactionConfig } from "../config/types.js";
import type { InitiatorProfile, ReactionPorts } from "../engine/ports.js";
import type { Logger } from "../logging/logger.js";
import type { RewardGate } from "../rewards/gate.js";
import { resolveChoice, type RandomSource } from "../rules/choice.js";
import type { TargetFacts } from "../rules/facts.js";
import type { Action } from "../rules/types.js";
import { TypedEventEmitter } from "../utils/typed-emitter.js";
import { applyTokens, splitFragments } from "./tokens.js";

export type ReactionSource = "immediate" | "combo";

export interface ReactionRequest {
  readonly initiator: InitiatorProfile;
  readonly target: TargetFacts;
  readonly action: Action;
  /** Signal the initiator sent. */
  readonly signal: string;
  readonly source: ReactionSource;
}

export interface ReactionOutcome {
  readonly targetId: string;
  readonly initiatorId: string;
  readonly source: ReactionSource;
  /** Signal or animation the target answered with, if one was rendered. */
  readonly reply?: string;
  /** Text fragments as shown, in order. */
  readonly fragments: readonly string[];
  /** Relationship points granted; 0 when the reward gate declined. */
  readonly reward: number;
}

export type ExecutorEvents = {
  reacted: [outcome: ReactionOutcome];
  dropped: [request: ReactionRequest];
};

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export interface ActionExecutorDeps {
  config: ReactionConfig;
  ports: ReactionPorts;
  rewards: RewardGate;
  logger: Logger;
  random?: RandomSource;
  sleep?: Sleep;
}

/**
 * Runs one reaction as a timed sequence: latency, reply signal, pause, text fragments,
 * then reward, with the reply sound only when points were granted. A target already
 * reacting drops any further request.
 */
export class ActionExecutor extends TypedEventEmitter<ExecutorEvents> {
  private readonly config: ReactionConfig;
  private readonly ports: ReactionPorts;
  private readonly rewards: RewardGate;
  private readonly logger: Logger;
  private readonly random: RandomSource;
  private readonly sleep: Sleep;
  private readonly busy = new Set<string>();

  constructor(deps: ActionExecutorDeps) {
    super((err, event) => deps.logger.error({ err, event }, "Reaction listener failed"));
    this.config = deps.config;
    this.ports = deps.ports;
    this.rewards = deps.rewards;
    this.logger = deps.logger;
    this.random = deps.random ?? Math.random;
    this.sleep = deps.sleep ?? sleep;
  }

  isBusy(targetId: string): boolean {
    return this.busy.has(targetId);
  }

  get busyCount(): number {
    return this.busy.size;
  }

  async execute(request: ReactionRequest): Promise<void> {
    const targetId = request.target.id;
    if (this.busy.has(targetId)) {
      this.logger.debug({ targetId, source: request.source }, "Target busy, reaction dropped");
      this.emit("dropped", request);
      return;
    }

    this.busy.add(targetId);
    try {
      await this.run(request);
    } finally {
      this.busy.delete(targetId);
    }
  }

  private async run(request: ReactionRequest): Promise<void> {
    const { initiator, target, action } = request;

    await this.sleep(this.config.delayMs + Math.floor(this.random() * this.config.jitterMs));

    const reply = resolveChoice(action.primaryChoices, this.random);
    const performed = reply !== undefined && this.performReply(target, reply);

    const textKey = resolveChoice(action.textChoices, this.random);
    if (reply !== undefined && textKey !== undefined) {
      await this.sleep(this.config.signalTextPauseMs);
    }

    const fragments = textKey !== undefined ? await this.showText(initiator, target, textKey) : [];

    if (!performed && fragments.length === 0) {
      this.logger.debug({ targetId: target.id, signal: request.signal }, "Reaction produced no output");
      return;
    }

    const reward = this.grantReward(initiator, target);
    if (reward > 0) this.playReplySound();

    const outcome: ReactionOutcome = {
      targetId: target.id,
      initiatorId: initiator.id,
      source: request.source,
      ...(performed ? { reply } : {}),
      fragments,
      reward,
    };
    this.logger.debug(
      {
        targetId: target.id,
        source: request.source,
        signal: performed ? reply : undefined,
        text: fragments.length > 0 ? fragments.join(" ") : undefined,
        reward,
      },
      "Reaction performed",
    );
    this.emit("reacted", outcome);
  }

  private performReply(target: TargetFacts, reply: string): boolean {
    const prefix = this.config.animationPrefix;
    try {
      if (reply.startsWith(prefix)) {
        if (!target.isCharacter || !this.ports.animations) return false;
        this.ports.animations.performNamed(target.id, reply.slice(prefix.length));
        return true;
      }
      return this.ports.signals.perform(target.id, reply);
    } catch (err) {
      this.logger.warn({ err, targetId: target.id, reply }, "Reply signal failed");
      return false;
    }
  }

  private async showText(initiator: InitiatorProfile, target: TargetFacts, textKey: string): Promise<string[]> {
    const textPort = this.ports.text;
    if (!target.isCharacter || !textPort) return [];

    let raw: string | undefined;
    try {
      raw = this.ports.localization.resolve(textKey);
    } catch (err) {
      this.logger.warn({ err, targetId: target.id, textKey }, "Text lookup failed");
      return [];
    }
    if (raw === undefined) {
      this.logger.debug({ targetId: target.id, textKey }, "No localized text for key");
      return [];
    }

    const ctx = {
      initiator,
      ...(target.partnerName !== undefined ? { speakerPartnerName: target.partnerName } : {}),
    };
    const parts = splitFragments(raw, this.config.fragmentSplitter);
    const shown: string[] = [];

    for (const [i, part] of parts.entries()) {
      const text = applyTokens(part, ctx);
      try {
        textPort.show(target.id, text);
        shown.push(text);
      } catch (err) {
        this.logger.warn({ err, targetId: target.id, textKey }, "Text display failed");
      }
      if (i < parts.length - 1) await this.sleep(this.config.fragmentPauseMs);
    }
    return shown;
  }

  private grantReward(initiator: InitiatorProfile, target: TargetFacts): number {
    try {
      return this.rewards.tryGrant(initiator, target) ? this.rewards.amount : 0;
    } catch (err) {
      this.logger.warn({ err, initiatorId: initiator.id, targetId: target.id }, "Reward grant failed");
      return 0;
    }
  }

  private playReplySound(): void {
    if (!this.config.replySound || !this.ports.sound) return;
    try {
      this.ports.sound.play(this.config.replySoundId);
    } catch (err) {
      this.logger.warn({ err, effectId: this.config.replySoundId }, "Reply sound failed");
    }
  }
}
