import { Command, Option } from "clipanion";
import { readFileSync } from "node:fs";
import { loadConfig } from "../../config/loader.js";
import { getDefaultRulesDir } from "../../config/paths.js";
import type { ReactorConfig } from "../../config/types.js";
import { describeAction, inspectSignal } from "../../engine/inspect.js";
import { createSilentLogger } from "../../logging/logger.js";
import { parseFactSnapshot, type FactSnapshot } from "../../rules/facts.js";
import { checkRuleFiles, RuleStore } from "../../rules/store.js";

const POINTS_PER_HEART = 250;

function rulesDirFor(dir: string | undefined, config: ReactorConfig): string {
  return dir ?? config.rules.dir ?? getDefaultRulesDir();
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class RulesValidateCommand extends Command {
  static override paths = [["rules", "validate"]];

  static override usage = Command.Usage({
    description: "Parse the reaction and combo rule files and list missing files and malformed rules",
    examples: [
      ["Validate the configured rules", "emote-reactor rules validate"],
      ["Validate a directory", "emote-reactor rules validate --dir ./assets"],
    ],
  });

  dir = Option.String("--dir", { description: "Directory holding reactions.json and combos.json" });
  configFile = Option.String("--config", { description: "Configuration file" });

  async execute(): Promise<void> {
    const rulesDir = rulesDirFor(this.dir, loadConfig(this.configFile));
    const { ruleSet, missing, unparsable } = await checkRuleFiles(rulesDir);
    const counts = ruleSet.counts();

    this.context.stdout.write(
      `Signals: ${counts.signals}, reactions: ${counts.reactions}, combos: ${counts.combos}\n`,
    );

    if (missing.length === 0 && unparsable.length === 0 && ruleSet.defects.length === 0) {
      this.context.stdout.write("All rules are valid\n");
      return;
    }

    for (const filePath of missing) {
      this.context.stdout.write(`Missing rule file: ${filePath}\n`);
    }
    for (const { filePath, reason } of unparsable) {
      this.context.stdout.write(`[INVALID] ${filePath}: ${reason}\n`);
    }
    for (const defect of ruleSet.defects) {
      const position = defect.index !== undefined ? `[${defect.index}]` : "";
      this.context.stdout.write(`[INVALID] ${defect.signal} ${defect.list}${position}: ${defect.reason}\n`);
    }
    process.exitCode = 1;
  }
}

export class RulesResetCommand extends Command {
  static override paths = [["rules", "reset"]];

  static override usage = Command.Usage({
    description: "Replace both rule files with empty rule sets",
    examples: [["Reset the configured rules", "emote-reactor rules reset"]],
  });

  dir = Option.String("--dir", { description: "Directory holding reactions.json and combos.json" });
  configFile = Option.String("--config", { description: "Configuration file" });

  async execute(): Promise<void> {
    const rulesDir = rulesDirFor(this.dir, loadConfig(this.configFile));
    const store = new RuleStore(rulesDir, createSilentLogger());
    await store.reset();
    this.context.stdout.write(`Rule files reset in ${rulesDir}\n`);
  }
}

export class RulesInspectCommand extends Command {
  static override paths = [["rules", "inspect"]];

  static override usage = Command.Usage({
    description: "Predict how a target described by a facts file would react to a signal",
    examples: [["Inspect a wave", "emote-reactor rules inspect wave --facts ./abigail.json"]],
  });

  signal = Option.String({ name: "signal" });
  factsFile = Option.String("--facts", { required: true, description: "JSON file with the target's facts" });
  dir = Option.String("--dir", { description: "Directory holding reactions.json and combos.json" });
  configFile = Option.String("--config", { description: "Configuration file" });

  async execute(): Promise<void> {
    const config = loadConfig(this.configFile);

    let facts: FactSnapshot;
    try {
      facts = parseFactSnapshot(JSON.parse(readFileSync(this.factsFile, "utf-8")));
    } catch (err) {
      this.context.stdout.write(`Invalid facts file: ${this.factsFile}\n  ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }

    const { ruleSet } = await checkRuleFiles(rulesDirFor(this.dir, config));

    const out = this.context.stdout;
    const { target, relationship } = facts;
    const score = relationship.score ?? 0;

    out.write("----------------------------------------\n");
    out.write(`Inspecting: ${target.displayName} (${target.id})\n`);
    out.write(`- Actor type: ${target.actorType}\n`);
    if (target.isCharacter) {
      out.write(`- Relationship: ${score} (${Math.floor(score / POINTS_PER_HEART)} hearts)\n`);
      out.write(`- Is spouse: ${relationship.isSpouse}\n`);
      out.write(`- Is dateable: ${target.isDateable}\n`);
    }
    out.write("----------------------------------------\n");

    const report = inspectSignal(ruleSet, this.signal, facts, config);
    if (!report.hasRules) {
      out.write(`No rules found for signal '${this.signal}'\n`);
      return;
    }

    out.write(
      report.immediate
        ? `[MATCH] Immediate reaction: ${describeAction(report.immediate.action)}\n`
        : "[NO MATCH] No immediate reaction rule matched\n",
    );
    out.write(
      report.combo
        ? `[MATCH] Combo armed after ${report.combo.threshold} repeats: ${describeAction(report.combo.rule.action)}\n`
        : "[NO MATCH] No combo reaction rule matched\n",
    );
  }
}
