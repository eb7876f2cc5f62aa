import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { MonitorConfig } from "../config.js";
import { StructuredLogger, type LogEntry } from "../logger.js";

export async function mkTmp(prefix: string): Promise<string> {
  return fsp.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}

export async function fileExists(p: string) {
  try {
    await fsp.stat(p);
    return true;
  } catch {
    return false;
  }
}

/** Logger that keeps every entry for assertions instead of printing. */
export function memoryLogger() {
  const entries: LogEntry[] = [];
  const logger = new StructuredLogger({ sink: (e) => entries.push(e) });
  return {
    logger,
    entries,
    messages: (level?: LogEntry["level"]) =>
      entries.filter((e) => !level || e.level === level).map((e) => e.message),
  };
}

export type Layout = {
  root: string;
  monitorDir: string;
  destBaseDir: string;
  destDir: string;
  ledgerPath: string;
};

export async function mkLayout(tmp: string, name: string): Promise<Layout> {
  const root = path.join(tmp, name);
  const monitorDir = path.join(root, "incoming");
  const destBaseDir = path.join(root, "backup");
  await fsp.mkdir(monitorDir, { recursive: true });
  return {
    root,
    monitorDir,
    destBaseDir,
    destDir: path.join(destBaseDir, "saved"),
    ledgerPath: path.join(root, "state", "ledger.sqlite"),
  };
}

export function configFor(
  layout: Layout,
  overrides: Partial<MonitorConfig> = {},
): MonitorConfig {
  return {
    monitorDir: layout.monitorDir,
    destBaseDir: layout.destBaseDir,
    destSubdirName: "saved",
    fileExtensions: [".tgz"],
    checkIntervalSeconds: 1,
    stableThresholdSeconds: 2,
    ledgerPath: layout.ledgerPath,
    hashAlgorithm: "md5",
    ledgerFlush: "cycle",
    ...overrides,
  };
}
