export { ReactionEngine } from "./engine/engine.js";
export type { DispatchedReaction, ReactionEngineDeps, ReactionEngineEvents, SignalReport } from "./engine/engine.js";
export { inspectSignal } from "./engine/inspect.js";
export type { InspectReport } from "./engine/inspect.js";
export { startReactor, stopReactor } from "./engine/lifecycle.js";
export type { HostPorts, ReactorContext, ReactorHost, StartReactorOptions } from "./engine/lifecycle.js";
export type * from "./engine/ports.js";

export { ActionExecutor } from "./reaction/executor.js";
export type { ReactionOutcome, ReactionRequest, ReactionSource } from "./reaction/executor.js";
export { LocaleCatalog } from "./reaction/locale.js";
export { applyTokens } from "./reaction/tokens.js";

export { ComboStateMachine, comboThreshold } from "./combo/machine.js";
export type { ComboDecision, ComboPhase } from "./combo/machine.js";
export { ComboStateTable } from "./combo/state.js";
export type { ComboState } from "./combo/state.js";

export { RewardGate } from "./rewards/gate.js";
export { RewardLedger } from "./rewards/ledger.js";

export { evaluateCondition } from "./rules/evaluator.js";
export { findFirstMatch } from "./rules/matcher.js";
export { resolveChoice, oneOrMany } from "./rules/choice.js";
export { compileRuleSet, RuleSet } from "./rules/ruleset.js";
export { RuleStore } from "./rules/store.js";
export { parseFactSnapshot } from "./rules/facts.js";
export type { FactSnapshot, RelationshipFacts, TargetFacts, WorldFacts } from "./rules/facts.js";
export type * from "./rules/types.js";

export { loadConfig } from "./config/loader.js";
export { parseConfig } from "./config/schema.js";
export type * from "./config/types.js";
export { createLogger } from "./logging/logger.js";
export type { Logger } from "./logging/logger.js";
