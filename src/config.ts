// src/config.ts
import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { parse as parseIni } from "ini";
import { ConfigError } from "./errors.js";
import { normalizeHashAlg, type HashAlg } from "./hash.js";
import { NullLogger, type Logger } from "./logger.js";
import {
  DEFAULT_CATEGORY,
  expandCategories,
  loadPresets,
} from "./presets.js";

export type LedgerFlush = "cycle" | "shutdown";
export const LEDGER_FLUSH_POLICIES: LedgerFlush[] = ["cycle", "shutdown"];

export interface MonitorConfig {
  monitorDir: string;
  destBaseDir: string;
  destSubdirName: string;
  fileExtensions: string[];
  checkIntervalSeconds: number;
  stableThresholdSeconds: number;
  ledgerPath: string;
  hashAlgorithm: HashAlg;
  ledgerFlush: LedgerFlush;
}

/**
 * One configuration source (INI file, environment, CLI flags). Values are
 * parsed but not validated; anything left undefined falls through to the
 * next source down.
 */
export interface ConfigInput {
  monitorDir?: string;
  destBaseDir?: string;
  destSubdirName?: string;
  fileExtensions?: string[];
  categories?: string[];
  categoriesFile?: string;
  checkIntervalSeconds?: number;
  stableThresholdSeconds?: number;
  ledgerPath?: string;
  hashAlgorithm?: string;
  ledgerFlush?: string;
}

export const DEFAULT_LEDGER_PATH = path.resolve(
  __dirname,
  "..",
  "data",
  "backup_state.sqlite",
);

export const DEFAULTS = {
  monitorDir: "/tmp",
  destBaseDir: "/opt/stor0",
  destSubdirName: "SavedCachedFiles",
  checkIntervalSeconds: 5 * 60,
  stableThresholdSeconds: 2 * 60,
  ledgerFlush: "cycle",
} as const;

export function destDir(config: MonitorConfig): string {
  return path.join(config.destBaseDir, config.destSubdirName);
}

export function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

function resolvePath(
  p: string | undefined,
  baseDir: string,
): string | undefined {
  if (p == null || p.trim() === "") return undefined;
  return path.resolve(baseDir, expandHome(p.trim()));
}

export function parseList(raw: string | undefined): string[] | undefined {
  if (raw == null) return undefined;
  return raw
    .split(/[,\s]+/)
    .map((s) => s.trim())
    .filter(Boolean);
}

function parseNumber(raw: string | undefined): number | undefined {
  if (raw == null || raw.trim() === "") return undefined;
  return Number(raw);
}

// ---------- INI ----------

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function section(doc: Record<string, unknown>, name: string) {
  const key = Object.keys(doc).find((k) => k.toLowerCase() === name.toLowerCase());
  const value = key === undefined ? undefined : doc[key];
  return isRecord(value) ? value : {};
}

function pick(sec: Record<string, unknown>, name: string): string | undefined {
  const key = Object.keys(sec).find((k) => k.toLowerCase() === name);
  if (key === undefined) return undefined;
  const value = sec[key];
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return undefined;
}

function minutesOrSeconds(
  sec: Record<string, unknown>,
  stem: string,
): number | undefined {
  const seconds = parseNumber(pick(sec, `${stem}_seconds`));
  if (seconds !== undefined) return seconds;
  const minutes = parseNumber(pick(sec, `${stem}_minutes`));
  return minutes === undefined ? undefined : minutes * 60;
}

/**
 * Parse INI text. Relative paths are resolved against `baseDir` (the
 * directory holding the file).
 *
 *   [Paths]    monitor_dir, dest_base_dir, dest_subdir_name
 *   [Settings] file_extensions, categories,
 *              check_interval_minutes|seconds, stable_threshold_minutes|seconds
 *   [Presets]  categories_file
 *   [Ledger]   path, hash, flush
 */
export function parseIniConfig(text: string, baseDir: string): ConfigInput {
  const doc: Record<string, unknown> = parseIni(text);
  const paths = section(doc, "Paths");
  const settings = section(doc, "Settings");
  const presets = section(doc, "Presets");
  const ledger = section(doc, "Ledger");
  const categories = pick(settings, "categories");
  return {
    monitorDir: resolvePath(pick(paths, "monitor_dir"), baseDir),
    destBaseDir: resolvePath(pick(paths, "dest_base_dir"), baseDir),
    destSubdirName: pick(paths, "dest_subdir_name")?.trim(),
    fileExtensions: parseList(pick(settings, "file_extensions")),
    categories: categories?.split(",").map((c) => c.trim()).filter(Boolean),
    categoriesFile: resolvePath(pick(presets, "categories_file"), baseDir),
    checkIntervalSeconds: minutesOrSeconds(settings, "check_interval"),
    stableThresholdSeconds: minutesOrSeconds(settings, "stable_threshold"),
    ledgerPath: resolvePath(pick(ledger, "path"), baseDir),
    hashAlgorithm: pick(ledger, "hash")?.trim(),
    ledgerFlush: pick(ledger, "flush")?.trim(),
  };
}

export async function readIniConfig(file: string): Promise<ConfigInput> {
  const text = await fsp.readFile(file, "utf8");
  return parseIniConfig(text, path.dirname(path.resolve(file)));
}

// ---------- environment ----------

export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  cwd = process.cwd(),
): ConfigInput {
  return {
    monitorDir: resolvePath(env.STABLECOPY_MONITOR_DIR, cwd),
    destBaseDir: resolvePath(env.STABLECOPY_DEST_BASE_DIR, cwd),
    destSubdirName: env.STABLECOPY_DEST_SUBDIR?.trim() || undefined,
    fileExtensions: parseList(env.STABLECOPY_EXTENSIONS),
    categories: env.STABLECOPY_CATEGORIES?.split(",")
      .map((c) => c.trim())
      .filter(Boolean),
    categoriesFile: resolvePath(env.STABLECOPY_CATEGORIES_FILE, cwd),
    checkIntervalSeconds: parseNumber(env.STABLECOPY_INTERVAL_SECONDS),
    stableThresholdSeconds: parseNumber(env.STABLECOPY_STABLE_SECONDS),
    ledgerPath: resolvePath(env.STABLECOPY_LEDGER, cwd),
    hashAlgorithm: env.STABLECOPY_HASH?.trim() || undefined,
    ledgerFlush: env.STABLECOPY_LEDGER_FLUSH?.trim() || undefined,
  };
}

// ---------- merge + validate ----------

/** Later sources win, field by field. */
export function mergeConfigInputs(...sources: ConfigInput[]): ConfigInput {
  const out: ConfigInput = {};
  for (const src of sources) {
    for (const [key, value] of Object.entries(src)) {
      if (value !== undefined) Object.assign(out, { [key]: value });
    }
  }
  return out;
}

function isInteger(n: number | undefined): n is number {
  return n !== undefined && Number.isInteger(n);
}

function isLedgerFlush(v: string): v is LedgerFlush {
  return LEDGER_FLUSH_POLICIES.some((p) => p === v);
}

/**
 * Turn a merged input plus the extensions expanded from its categories into
 * a MonitorConfig, reporting every problem at once.
 */
export function validateConfig(
  input: ConfigInput,
  categoryExtensions: readonly string[] = [],
): MonitorConfig {
  const problems: string[] = [];

  const monitorDir = input.monitorDir ?? DEFAULTS.monitorDir;
  if (!monitorDir.trim()) problems.push("monitor directory must not be empty");
  const destBaseDir = input.destBaseDir ?? DEFAULTS.destBaseDir;
  if (!destBaseDir.trim()) {
    problems.push("destination base directory must not be empty");
  }
  const destSubdirName = input.destSubdirName ?? DEFAULTS.destSubdirName;
  if (!destSubdirName.trim()) {
    problems.push("destination subdirectory name must not be empty");
  }

  const fileExtensions: string[] = [];
  for (const ext of [...(input.fileExtensions ?? []), ...categoryExtensions]) {
    if (!fileExtensions.includes(ext)) fileExtensions.push(ext);
  }
  if (!fileExtensions.length) {
    problems.push("at least one file extension is required");
  }
  for (const ext of fileExtensions) {
    if (!ext.startsWith(".") || ext.length < 2) {
      problems.push(`file extension "${ext}" must start with "." and name a suffix`);
    }
  }

  const checkIntervalSeconds =
    input.checkIntervalSeconds ?? DEFAULTS.checkIntervalSeconds;
  if (!isInteger(checkIntervalSeconds) || checkIntervalSeconds <= 0) {
    problems.push(
      `check interval must be a positive whole number of seconds (got ${checkIntervalSeconds})`,
    );
  }
  const stableThresholdSeconds =
    input.stableThresholdSeconds ?? DEFAULTS.stableThresholdSeconds;
  if (!isInteger(stableThresholdSeconds) || stableThresholdSeconds < 0) {
    problems.push(
      `stable threshold must be a non-negative whole number of seconds (got ${stableThresholdSeconds})`,
    );
  }

  let hashAlgorithm: HashAlg = normalizeHashAlg();
  try {
    hashAlgorithm = normalizeHashAlg(input.hashAlgorithm);
  } catch (err) {
    problems.push(err instanceof Error ? err.message : String(err));
  }

  const flush = input.ledgerFlush ?? DEFAULTS.ledgerFlush;
  let ledgerFlush: LedgerFlush = DEFAULTS.ledgerFlush;
  if (isLedgerFlush(flush)) {
    ledgerFlush = flush;
  } else {
    problems.push(
      `ledger flush must be one of ${LEDGER_FLUSH_POLICIES.join(", ")} (got "${flush}")`,
    );
  }

  if (problems.length) throw new ConfigError(problems);

  return {
    monitorDir,
    destBaseDir,
    destSubdirName,
    fileExtensions,
    checkIntervalSeconds,
    stableThresholdSeconds,
    ledgerPath: input.ledgerPath ?? DEFAULT_LEDGER_PATH,
    hashAlgorithm,
    ledgerFlush,
  };
}

export interface ResolveConfigOptions {
  configFile?: string;
  cli?: ConfigInput;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

/**
 * defaults < INI file < environment < CLI flags. With no extensions and no
 * categories anywhere, the default category supplies the extensions.
 */
export async function resolveConfig({
  configFile,
  cli = {},
  env = process.env,
  logger = new NullLogger(),
}: ResolveConfigOptions = {}): Promise<MonitorConfig> {
  const iniPath = configFile ?? env.STABLECOPY_CONFIG;
  const fromIni = iniPath ? await readIniConfig(iniPath) : {};
  if (iniPath) logger.debug("read configuration file", { path: iniPath });
  const merged = mergeConfigInputs(fromIni, configFromEnv(env), cli);

  let categories = merged.categories ?? [];
  if (!merged.fileExtensions?.length && !categories.length) {
    categories = [DEFAULT_CATEGORY];
  }
  let categoryExtensions: string[] = [];
  if (categories.length) {
    const presets = await loadPresets(merged.categoriesFile, logger);
    const { extensions, unknown } = expandCategories(categories, presets);
    if (unknown.length) {
      throw new ConfigError(
        unknown.map(
          (name) =>
            `unknown category "${name}" (known: ${Array.from(presets.keys()).join(", ")})`,
        ),
      );
    }
    categoryExtensions = extensions;
  }
  return validateConfig(merged, categoryExtensions);
}
