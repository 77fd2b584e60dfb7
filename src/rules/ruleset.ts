import {
  combosEntrySchema,
  formatIssues,
  parseComboRule,
  parseReactionRule,
  reactionsEntrySchema,
  ruleFileSchema,
} from "./schema.js";
import type { ComboRule, Rule, RuleDefect, RuleList, RuleSource, SignalRules } from "./types.js";

const EMPTY_RULES: SignalRules = { reactions: [], combos: [] };

/** Immutable, per-signal view over both rule files. Replaced wholesale on reload. */
export class RuleSet implements RuleSource {
  private readonly bySignal: ReadonlyMap<string, SignalRules>;
  readonly defects: readonly RuleDefect[];

  constructor(bySignal: ReadonlyMap<string, SignalRules>, defects: readonly RuleDefect[] = []) {
    this.bySignal = bySignal;
    this.defects = defects;
  }

  static empty(): RuleSet {
    return new RuleSet(new Map());
  }

  get(signal: string): SignalRules | undefined {
    return this.bySignal.get(signal);
  }

  signals(): string[] {
    return [...this.bySignal.keys()];
  }

  counts(): { signals: number; reactions: number; combos: number } {
    let reactions = 0;
    let combos = 0;
    for (const rules of this.bySignal.values()) {
      reactions += rules.reactions.length;
      combos += rules.combos.length;
    }
    return { signals: this.bySignal.size, reactions, combos };
  }
}

function parseList<R extends Rule>(
  signal: string,
  list: RuleList,
  rawRules: readonly unknown[],
  parse: (raw: unknown) => R,
  defects: RuleDefect[],
): R[] {
  return rawRules.map((raw, index) => {
    const rule = parse(raw);
    if (rule.defect !== undefined) defects.push({ signal, list, index, reason: rule.defect });
    return rule;
  });
}

/**
 * Merges the raw contents of the immediate-reaction file and the combo file.
 * Malformed rules keep their position (so authored order is preserved) but never match.
 */
export function compileRuleSet(rawReactions: unknown, rawCombos: unknown): RuleSet {
  const defects: RuleDefect[] = [];
  const reactions = new Map<string, Rule[]>();
  const combos = new Map<string, ComboRule[]>();

  const reactionsFile = ruleFileSchema.safeParse(rawReactions ?? {});
  if (reactionsFile.success) {
    for (const [signal, entry] of Object.entries(reactionsFile.data)) {
      const parsed = reactionsEntrySchema.safeParse(entry);
      if (!parsed.success) {
        defects.push({ signal, list: "reactions", reason: formatIssues(parsed.error) });
        continue;
      }
      reactions.set(signal, parseList(signal, "reactions", parsed.data.reactions, parseReactionRule, defects));
    }
  } else {
    defects.push({ signal: "*", list: "reactions", reason: formatIssues(reactionsFile.error) });
  }

  const combosFile = ruleFileSchema.safeParse(rawCombos ?? {});
  if (combosFile.success) {
    for (const [signal, entry] of Object.entries(combosFile.data)) {
      const parsed = combosEntrySchema.safeParse(entry);
      if (!parsed.success) {
        defects.push({ signal, list: "combos", reason: formatIssues(parsed.error) });
        continue;
      }
      combos.set(signal, parseList(signal, "combos", parsed.data.comboReactions, parseComboRule, defects));
    }
  } else {
    defects.push({ signal: "*", list: "combos", reason: formatIssues(combosFile.error) });
  }

  const bySignal = new Map<string, SignalRules>();
  for (const signal of new Set([...reactions.keys(), ...combos.keys()])) {
    bySignal.set(signal, {
      reactions: reactions.get(signal) ?? EMPTY_RULES.reactions,
      combos: combos.get(signal) ?? EMPTY_RULES.combos,
    });
  }

  return new RuleSet(bySignal, defects);
}
