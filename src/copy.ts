// src/copy.ts
import fsp from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "./errors.js";

let tmpSeq = 0;

export type CopyResult = {
  dest: string;
  bytes: number;
};

/**
 * Copy `src` into `destDir` under its own base name, carrying over the mode
 * bits and access/modification times.
 *
 * Bytes land in a hidden temp file inside `destDir` that is renamed onto the
 * final name, so the destination never holds a half-written copy. An
 * existing file of the same name is replaced.
 */
export async function copyWithMetadata(
  src: string,
  destDir: string,
): Promise<CopyResult> {
  const dest = path.join(destDir, path.basename(src));
  const tmp = path.join(
    destDir,
    `.${path.basename(src)}.partial-${process.pid}-${++tmpSeq}`,
  );
  try {
    await fsp.copyFile(src, tmp);
    const st = await fsp.stat(src);
    await fsp.chmod(tmp, st.mode & 0o7777);
    await fsp.utimes(tmp, st.atime, st.mtime);
    await fsp.rename(tmp, dest);
    return { dest, bytes: st.size };
  } catch (err) {
    await fsp.rm(tmp, { force: true }).catch((rmErr: unknown) => {
      // the copy error is what the caller needs; keep this one attached
      if (err instanceof Error) {
        err.message += ` (temp cleanup failed: ${errorMessage(rmErr)})`;
      }
    });
    throw err;
  }
}
