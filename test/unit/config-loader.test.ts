import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { loadConfig, readConfigFile, substituteEnv } from "../../src/config/loader.js";
import { parseConfig } from "../../src/config/schema.js";

describe("substituteEnv", () => {
  beforeEach(() => {
    process.env["TEST_RULES_DIR"] = "/srv/rules";
    process.env["TEST_LOCALE"] = "fr";
  });

  afterEach(() => {
    delete process.env["TEST_RULES_DIR"];
    delete process.env["TEST_LOCALE"];
  });

  it("substitutes env vars in text", () => {
    expect(substituteEnv('"dir": "${env:TEST_RULES_DIR}"')).toBe('"dir": "/srv/rules"');
  });

  it("substitutes multiple env vars", () => {
    expect(substituteEnv("${env:TEST_RULES_DIR}:${env:TEST_LOCALE}")).toBe("/srv/rules:fr");
  });

  it("throws for a missing env var", () => {
    expect(() => substituteEnv("${env:MISSING_VAR}")).toThrow("Missing environment variable: MISSING_VAR");
  });

  it("only matches uppercase var names", () => {
    const text = "${env:lowercase}";
    expect(substituteEnv(text)).toBe(text);
  });
});

describe("parseConfig", () => {
  it("fills every section with defaults", () => {
    const config = parseConfig({});
    expect(config.reaction).toEqual({
      delayMs: 700,
      jitterMs: 300,
      signalTextPauseMs: 1_200,
      fragmentPauseMs: 1_800,
      fragmentSplitter: "|",
      animationPrefix: "anim_",
      eventDistance: 3,
      replySound: true,
      replySoundId: "pickUpItem",
    });
    expect(config.rewards).toEqual({ amount: 10, notify: true });
    expect(config.combo).toEqual({ enabled: true, countMode: "per-rule", globalTarget: 3, timeoutMs: 35_000 });
    expect(config.conditions).toEqual({ weather: true, season: true, friendship: true });
    expect(config.localization.locale).toBe("default");
    expect(config.logging.level).toBe("info");
  });

  it("keeps overrides", () => {
    const config = parseConfig({ combo: { countMode: "fixed", globalTarget: 5 }, rewards: { amount: 0 } });
    expect(config.combo.countMode).toBe("fixed");
    expect(config.combo.globalTarget).toBe(5);
    expect(config.combo.enabled).toBe(true);
    expect(config.rewards.amount).toBe(0);
  });

  it("rejects an unknown count mode", () => {
    expect(() => parseConfig({ combo: { countMode: "sometimes" } })).toThrow();
  });

  it("rejects a combo target below two", () => {
    expect(() => parseConfig({ combo: { globalTarget: 1 } })).toThrow();
  });

  it("rejects an empty fragment splitter", () => {
    expect(() => parseConfig({ reaction: { fragmentSplitter: "" } })).toThrow();
  });
});

describe("loadConfig", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "emote-config-"));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
    delete process.env["TEST_RULES_DIR"];
  });

  it("returns defaults when the file does not exist", () => {
    const config = loadConfig(join(tempDir, "missing.json"));
    expect(config.rewards.amount).toBe(10);
  });

  it("reads the file with env substitution", () => {
    process.env["TEST_RULES_DIR"] = "/srv/rules";
    const path = join(tempDir, "reactor.config.json");
    writeFileSync(path, JSON.stringify({ rules: { dir: "${env:TEST_RULES_DIR}" }, reaction: { eventDistance: 5 } }));

    const config = loadConfig(path);

    expect(config.rules.dir).toBe("/srv/rules");
    expect(config.reaction.eventDistance).toBe(5);
  });

  it("throws on invalid JSON", () => {
    const path = join(tempDir, "broken.json");
    writeFileSync(path, "{ nope");
    expect(() => loadConfig(path)).toThrow();
  });

  it("names the offending fields of an invalid file", () => {
    const path = join(tempDir, "reactor.config.json");
    writeFileSync(path, JSON.stringify({ rewards: { amount: -1 } }));
    expect(() => loadConfig(path)).toThrow(
      `Invalid config ${path}: rewards.amount: Number must be greater than or equal to 0`,
    );
  });
});

describe("readConfigFile", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "emote-config-"));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("reports a missing file instead of defaults", () => {
    const path = join(tempDir, "missing.json");
    expect(readConfigFile(path)).toEqual({ status: "missing", path });
  });

  it("collects every schema issue", () => {
    const path = join(tempDir, "reactor.config.json");
    writeFileSync(path, JSON.stringify({ combo: { countMode: "sometimes", globalTarget: 1 } }));

    const result = readConfigFile(path);

    expect(result.status).toBe("invalid");
    if (result.status !== "invalid") return;
    expect(result.reason).toBe(
      "combo.countMode: Invalid enum value. Expected 'per-rule' | 'fixed', received 'sometimes'; " +
        "combo.globalTarget: Number must be greater than or equal to 2",
    );
  });

  it("reports an unset env var as invalid", () => {
    const path = join(tempDir, "reactor.config.json");
    writeFileSync(path, '{ "rules": { "dir": "${env:EMOTE_UNSET_DIR}" } }');

    const result = readConfigFile(path);

    expect(result).toEqual({
      status: "invalid",
      path,
      reason: "Missing environment variable: EMOTE_UNSET_DIR (referenced as ${env:EMOTE_UNSET_DIR})",
    });
  });

  it("returns the parsed config for a valid file", () => {
    const path = join(tempDir, "reactor.config.json");
    writeFileSync(path, JSON.stringify({ rewards: { amount: 25 } }));

    const result = readConfigFile(path);

    expect(result.status).toBe("valid");
    if (result.status !== "valid") return;
    expect(result.config.rewards.amount).toBe(25);
    expect(result.config.combo.globalTarget).toBe(3);
  });
});
