// src/path-rel.ts
import path from "node:path";

/**
 * Path of `abs` relative to the monitored root, always with "/" separators,
 * so ledger keys stay the same wherever the destination lives.
 */
export function toRel(abs: string, root: string): string {
  const rel = path.relative(path.resolve(root), path.resolve(abs));
  return rel.split(path.sep).join("/");
}

export function hasExtension(name: string, extensions: readonly string[]) {
  // a bare ".tgz" is a dotfile, not a file with that extension
  return extensions.some((ext) => name.length > ext.length && name.endsWith(ext));
}
