import { homedir } from "node:os";
import { join } from "node:path";

export function getStateDir(): string {
  return process.env["EMOTE_REACTOR_STATE_DIR"] ?? join(homedir(), ".emote-reactor");
}

export function getConfigPath(): string {
  return process.env["EMOTE_REACTOR_CONFIG_PATH"] ?? "reactor.config.json";
}

export function getDefaultRulesDir(): string {
  return join(getStateDir(), "rules");
}

