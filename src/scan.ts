// src/scan.ts
import fsp from "node:fs/promises";
import path from "node:path";
import type { Dirent } from "node:fs";
import { isNotFound } from "./errors.js";
import { logFailure, type Logger } from "./logger.js";
import { hasExtension } from "./path-rel.js";
import type { Observations } from "./stability.js";

/**
 * List candidate files directly under `dir`: regular files (symlinks are
 * followed) whose name ends in one of `extensions`, mapped to their size.
 *
 * A listing failure yields an empty set; an entry whose stat fails maps to
 * null so tracking can treat it as temporarily unavailable.
 */
export async function scanCandidates(
  dir: string,
  extensions: readonly string[],
  logger: Logger,
): Promise<Observations> {
  const out = new Map<string, number | null>();
  let entries: Dirent[];
  try {
    entries = await fsp.readdir(dir, { withFileTypes: true });
  } catch (err) {
    logFailure(logger, "error", "error listing monitored directory", {
      path: dir,
      op: "list",
      err,
    });
    return out;
  }

  for (const entry of entries) {
    if (!hasExtension(entry.name, extensions)) continue;
    if (!entry.isFile() && !entry.isSymbolicLink()) continue;
    const abs = path.resolve(dir, entry.name);
    try {
      // stat, not lstat: a link to a regular file counts as one
      const st = await fsp.stat(abs);
      if (!st.isFile()) continue;
      out.set(abs, st.size);
    } catch (err) {
      if (isNotFound(err) && entry.isSymbolicLink()) {
        logger.debug("skipping dangling symlink", { path: abs });
        continue;
      }
      logFailure(logger, "warn", "could not read size", {
        path: abs,
        op: "stat",
        err,
      });
      out.set(abs, null);
    }
  }
  return out;
}
