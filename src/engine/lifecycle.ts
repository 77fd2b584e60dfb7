import { loadConfig } from "../config/loader.js";
import { getDefaultRulesDir } from "../config/paths.js";
import type { ReactorConfig } from "../config/types.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { LocaleCatalog } from "../reaction/locale.js";
import { RuleStore } from "../rules/store.js";
import { ReactionEngine } from "./engine.js";
import type { FactProvider, Localization, ReactionPorts } from "./ports.js";

/** Ports the host supplies; localization falls back to the configured catalog. */
export type HostPorts = Omit<ReactionPorts, "localization"> & { readonly localization?: Localization };

export interface ReactorHost {
  readonly facts: FactProvider;
  readonly ports: HostPorts;
}

export interface ReactorContext {
  config: ReactorConfig;
  logger: Logger;
  rules: RuleStore;
  localization: Localization;
  engine: ReactionEngine;
}

export interface StartReactorOptions {
  configPath?: string;
  /** Already-parsed config; skips reading `configPath`. */
  config?: ReactorConfig;
  logger?: Logger;
}

export async function startReactor(host: ReactorHost, opts: StartReactorOptions = {}): Promise<ReactorContext> {
  // 1. Load config
  const config = opts.config ?? loadConfig(opts.configPath);

  // 2. Create logger
  const logger = opts.logger ?? createLogger(config.logging);
  logger.info("Starting emote reactor...");

  // 3. Load rule files
  const rules = new RuleStore(config.rules.dir ?? getDefaultRulesDir(), logger);
  await rules.load();

  // 4. Resolve localization
  const localization = host.ports.localization ?? (await loadCatalog(config, logger));

  // 5. Build the engine
  const engine = new ReactionEngine({
    config,
    rules,
    facts: host.facts,
    ports: { ...host.ports, localization },
    logger,
  });

  logger.info({ signals: rules.rules.signals().length }, "Emote reactor started");
  return { config, logger, rules, localization, engine };
}

/** Waits for in-flight reactions, then detaches every engine listener. */
export async function stopReactor(ctx: ReactorContext): Promise<void> {
  ctx.logger.info("Stopping emote reactor...");
  await ctx.engine.idle();
  ctx.engine.removeAllListeners();
  ctx.logger.info("Emote reactor stopped");
}

async function loadCatalog(config: ReactorConfig, logger: Logger): Promise<LocaleCatalog> {
  const { dir, locale } = config.localization;
  if (!dir) {
    logger.debug("No localization directory configured, text keys will not resolve");
    return new LocaleCatalog({}, locale);
  }
  return LocaleCatalog.load(dir, locale, logger);
}
