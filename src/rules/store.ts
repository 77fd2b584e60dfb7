import { readFile, writeFile } from "node:fs/promises";
import { mkdirSync } from "node:fs";
import { join } from "node:path";
import type { Logger } from "../logging/logger.js";
import { withFileLock } from "../utils/file-lock.js";
import { compileRuleSet, RuleSet } from "./ruleset.js";
import type { RuleSource, SignalRules } from "./types.js";

export const REACTIONS_FILE = "reactions.json";
export const COMBOS_FILE = "combos.json";

/**
 * Owns the rule files on disk and the rule set currently in force.
 * Reloading swaps the rule set only; combo streaks and busy targets live elsewhere.
 */
export class RuleStore implements RuleSource {
  private readonly reactionsPath: string;
  private readonly combosPath: string;
  private readonly logger: Logger;
  private current: RuleSet = RuleSet.empty();

  constructor(rulesDir: string, logger: Logger) {
    mkdirSync(rulesDir, { recursive: true });
    this.reactionsPath = join(rulesDir, REACTIONS_FILE);
    this.combosPath = join(rulesDir, COMBOS_FILE);
    this.logger = logger;
  }

  get rules(): RuleSet {
    return this.current;
  }

  get(signal: string): SignalRules | undefined {
    return this.current.get(signal);
  }

  async load(): Promise<RuleSet> {
    const [reactions, combos] = await Promise.all([
      withFileLock(this.reactionsPath, () => this.readRuleFile(this.reactionsPath)),
      withFileLock(this.combosPath, () => this.readRuleFile(this.combosPath)),
    ]);

    const ruleSet = compileRuleSet(reactions, combos);
    for (const defect of ruleSet.defects) {
      this.logger.warn(defect, "Malformed rule ignored");
    }

    this.current = ruleSet;
    this.logger.info(ruleSet.counts(), "Reaction rules loaded");
    return ruleSet;
  }

  async reload(): Promise<RuleSet> {
    return this.load();
  }

  async reset(): Promise<RuleSet> {
    await Promise.all([
      withFileLock(this.reactionsPath, () => this.writeEmpty(this.reactionsPath)),
      withFileLock(this.combosPath, () => this.writeEmpty(this.combosPath)),
    ]);
    this.logger.info("Reaction rule files reset");
    return this.load();
  }

  private async readRuleFile(filePath: string): Promise<unknown> {
    let content: string;
    try {
      content = await readFile(filePath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") {
        this.logger.warn({ filePath }, "Rule file missing, creating an empty one");
        await this.writeEmpty(filePath);
        return {};
      }
      throw err;
    }

    try {
      return JSON.parse(content) as unknown;
    } catch (err) {
      this.logger.warn({ err, filePath }, "Rule file is not valid JSON, treating as empty");
      return {};
    }
  }

  private async writeEmpty(filePath: string): Promise<void> {
    await writeFile(filePath, "{}\n", "utf-8");
  }
}

export interface RuleFileReport {
  ruleSet: RuleSet;
  /** Rule files that do not exist. */
  missing: string[];
  unparsable: { filePath: string; reason: string }[];
}

/** Compiles the rule files in `rulesDir` without locking, creating or rewriting any of them. */
export async function checkRuleFiles(rulesDir: string): Promise<RuleFileReport> {
  const report: RuleFileReport = { ruleSet: RuleSet.empty(), missing: [], unparsable: [] };

  const read = async (filePath: string): Promise<unknown> => {
    let content: string;
    try {
      content = await readFile(filePath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") {
        report.missing.push(filePath);
        return {};
      }
      throw err;
    }
    try {
      return JSON.parse(content) as unknown;
    } catch (err) {
      report.unparsable.push({ filePath, reason: err instanceof Error ? err.message : String(err) });
      return {};
    }
  };

  const reactions = await read(join(rulesDir, REACTIONS_FILE));
  const combos = await read(join(rulesDir, COMBOS_FILE));
  report.ruleSet = compileRuleSet(reactions, combos);
  return report;
}
