import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { ReactorConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { reactorConfigSchema } from "./schema.js";
import { formatIssues } from "../rules/schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

export type ConfigFileResult =
  | { status: "valid"; path: string; config: ReactorConfig }
  | { status: "missing"; path: string }
  | { status: "invalid"; path: string; reason: string };

/** Reads and checks one config file without falling back to defaults. */
export function readConfigFile(path?: string): ConfigFileResult {
  const configPath = resolve(path ?? getConfigPath());

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return { status: "missing", path: configPath };
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(substituteEnv(content));
  } catch (err) {
    return { status: "invalid", path: configPath, reason: err instanceof Error ? err.message : String(err) };
  }

  const parsed = reactorConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return { status: "invalid", path: configPath, reason: formatIssues(parsed.error) };
  }
  return { status: "valid", path: configPath, config: parsed.data };
}

/** Effective config for `path`; a missing file yields the defaults. */
export function loadConfig(path?: string): ReactorConfig {
  const result = readConfigFile(path);
  switch (result.status) {
    case "valid":
      return result.config;
    case "missing":
      return reactorConfigSchema.parse({});
    case "invalid":
      throw new Error(`Invalid config ${result.path}: ${result.reason}`);
  }
}
