import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import type { Localization } from "../engine/ports.js";
import type { Logger } from "../logging/logger.js";

export const DEFAULT_LOCALE = "default";

const catalogSchema = z.record(z.string(), z.string());

/** Flat key → string catalog; a locale file overlays `default.json`. */
export class LocaleCatalog implements Localization {
  private readonly entries: ReadonlyMap<string, string>;
  readonly locale: string;

  constructor(entries: Record<string, string>, locale: string = DEFAULT_LOCALE) {
    this.entries = new Map(Object.entries(entries));
    this.locale = locale;
  }

  static async load(dir: string, locale: string, logger: Logger): Promise<LocaleCatalog> {
    const base = await readCatalog(join(dir, `${DEFAULT_LOCALE}.json`), logger);
    const overlay = locale === DEFAULT_LOCALE ? {} : await readCatalog(join(dir, `${locale}.json`), logger);
    const catalog = new LocaleCatalog({ ...base, ...overlay }, locale);
    logger.info({ locale, keys: catalog.size }, "Locale catalog loaded");
    return catalog;
  }

  get size(): number {
    return this.entries.size;
  }

  resolve(textKey: string): string | undefined {
    return this.entries.get(textKey);
  }
}

async function readCatalog(filePath: string, logger: Logger): Promise<Record<string, string>> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      logger.debug({ filePath }, "Locale file not found");
      return {};
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    logger.warn({ err, filePath }, "Locale file is not valid JSON, ignoring it");
    return {};
  }

  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn({ filePath, issues: parsed.error.issues.length }, "Locale file ignored: expected a flat string map");
    return {};
  }
  return parsed.data;
}
