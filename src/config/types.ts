export type ComboCountMode = "per-rule" | "fixed";

export interface ReactorConfig {
  readonly reaction: ReactionConfig;
  readonly rewards: RewardsConfig;
  readonly combo: ComboConfig;
  readonly conditions: ConditionToggles;
  readonly rules: RulesConfig;
  readonly localization: LocalizationConfig;
  readonly logging: LoggingConfig;
}

export interface ReactionConfig {
  /** Base latency before a target starts reacting. */
  readonly delayMs: number;
  /** Upper (exclusive) bound of the random latency added to `delayMs`. */
  readonly jitterMs: number;
  /** Pause between a performed signal and the first text fragment. */
  readonly signalTextPauseMs: number;
  /** Pause between consecutive text fragments. */
  readonly fragmentPauseMs: number;
  readonly fragmentSplitter: string;
  readonly animationPrefix: string;
  /** Max distance (tiles) a target may be from the initiator. */
  readonly eventDistance: number;
  readonly replySound: boolean;
  readonly replySoundId: string;
}

export interface RewardsConfig {
  readonly amount: number;
  readonly notify: boolean;
}

export interface ComboConfig {
  readonly enabled: boolean;
  readonly countMode: ComboCountMode;
  readonly globalTarget: number;
  readonly timeoutMs: number;
}

export interface ConditionToggles {
  readonly weather: boolean;
  readonly season: boolean;
  readonly friendship: boolean;
}

export interface RulesConfig {
  readonly dir?: string;
}

export interface LocalizationConfig {
  readonly dir?: string;
  readonly locale: string;
}

export interface LoggingConfig {
  readonly level: "trace" | "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}
