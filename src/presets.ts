// src/presets.ts
import { readFileSync } from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import { isNotFound } from "./errors.js";
import { NullLogger, logFailure, type Logger } from "./logger.js";

/** Category name -> extensions, in file order. */
export type PresetCategories = Map<string, string[]>;

export const DEFAULT_PRESETS_FILE = path.resolve(
  __dirname,
  "..",
  "presets",
  "file-type-presets.json",
);

export const DEFAULT_CATEGORY = "Slackware Packages";

let defaults: PresetCategories | null = null;

export function loadDefaultPresets(): PresetCategories {
  if (defaults == null) {
    const parsed: unknown = JSON.parse(readFileSync(DEFAULT_PRESETS_FILE, "utf8"));
    defaults = categoriesFromJson(parsed);
  }
  return new Map(Array.from(defaults, ([k, v]) => [k, [...v]]));
}

function categoriesFromJson(value: unknown): PresetCategories {
  const out: PresetCategories = new Map();
  if (typeof value !== "object" || value === null || !("categories" in value)) {
    throw new Error(`${DEFAULT_PRESETS_FILE}: missing "categories"`);
  }
  const { categories } = value;
  if (typeof categories !== "object" || categories === null) {
    throw new Error(`${DEFAULT_PRESETS_FILE}: "categories" must be an object`);
  }
  for (const [name, exts] of Object.entries(categories)) {
    if (!Array.isArray(exts)) continue;
    out.set(
      name,
      exts.filter((e): e is string => typeof e === "string"),
    );
  }
  return out;
}

/**
 * Parse the user categories file: one `Name,.ext1,.ext2` line per category,
 * `#` comments and blank lines ignored. Lines without a name or without any
 * `.`-prefixed extension are skipped with a warning; a repeated name
 * replaces the earlier one.
 */
export function parsePresetsText(
  text: string,
  logger: Logger = new NullLogger(),
  source = "categories file",
): PresetCategories {
  const out: PresetCategories = new Map();
  const lines = text.split(/\r?\n/);
  lines.forEach((raw, idx) => {
    const line = raw.trim();
    const lineNum = idx + 1;
    if (!line || line.startsWith("#")) return;
    const comma = line.indexOf(",");
    if (comma < 0) {
      logger.warn("malformed category line", { source, line: lineNum });
      return;
    }
    const name = line.slice(0, comma).trim();
    if (!name) {
      logger.warn("category line has no name", { source, line: lineNum });
      return;
    }
    const exts = line
      .slice(comma + 1)
      .split(",")
      .map((e) => e.trim())
      .filter((e) => e.startsWith(".") && e.length > 1);
    if (!exts.length) {
      logger.warn("category has no valid extensions", {
        source,
        line: lineNum,
        category: name,
      });
      return;
    }
    if (out.has(name)) {
      logger.warn("duplicate category; later line wins", {
        source,
        line: lineNum,
        category: name,
      });
    }
    out.set(name, exts);
  });
  return out;
}

export function formatPresets(categories: PresetCategories): string {
  const lines = [
    "# File type categories",
    "# Format: Category Name,.ext1,.ext2,...",
  ];
  for (const [name, exts] of categories) {
    lines.push(`${name},${exts.join(",")}`);
  }
  return lines.join("\n") + "\n";
}

export async function savePresets(
  file: string,
  categories: PresetCategories,
): Promise<void> {
  await fsp.mkdir(path.dirname(file), { recursive: true });
  await fsp.writeFile(file, formatPresets(categories), "utf8");
}

/**
 * Load categories from `file`, falling back to the bundled defaults when no
 * file is given, it does not exist, cannot be read, or holds no valid lines.
 */
export async function loadPresets(
  file: string | undefined,
  logger: Logger = new NullLogger(),
): Promise<PresetCategories> {
  if (!file) return loadDefaultPresets();
  let text: string;
  try {
    text = await fsp.readFile(file, "utf8");
  } catch (err) {
    if (isNotFound(err)) {
      logger.info("categories file not found; using defaults", { path: file });
    } else {
      logFailure(logger, "error", "could not read categories file; using defaults", {
        path: file,
        op: "read",
        err,
      });
    }
    return loadDefaultPresets();
  }
  const parsed = parsePresetsText(text, logger, file);
  if (parsed.size === 0) {
    logger.warn("no valid categories in file; using defaults", { path: file });
    return loadDefaultPresets();
  }
  return parsed;
}

/** Case-insensitive category lookup. */
export function expandCategories(
  names: readonly string[],
  categories: PresetCategories,
): { extensions: string[]; unknown: string[] } {
  const byLower = new Map(
    Array.from(categories, ([k, v]) => [k.toLowerCase(), v] as const),
  );
  const extensions: string[] = [];
  const unknown: string[] = [];
  for (const name of names) {
    const exts = byLower.get(name.trim().toLowerCase());
    if (!exts) {
      unknown.push(name);
      continue;
    }
    for (const e of exts) {
      if (!extensions.includes(e)) extensions.push(e);
    }
  }
  return { extensions, unknown };
}
