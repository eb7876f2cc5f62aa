// src/hash.ts
import { createReadStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import { createHash, getHashes } from "node:crypto";
import { HashError } from "./errors.js";

export const HASH_CHUNK_BYTES = 8 * 1024;

const ENCODING = "hex";

// md5 is plenty for noticing changed content; nothing here relies on
// collision resistance.
export const CURATED_HASH_ALGOS = [
  "md5",
  "sha1",
  "sha256",
  "sha512",
  "blake2b512",
] as const;

export type HashAlg = (typeof CURATED_HASH_ALGOS)[number];

export function defaultHashAlg(): HashAlg {
  return "md5";
}

let supportedHashes: HashAlg[] | null = null;
export function listSupportedHashes(): HashAlg[] {
  if (supportedHashes == null) {
    const avail = new Set(getHashes().map((s) => s.toLowerCase()));
    supportedHashes = CURATED_HASH_ALGOS.filter((a) => avail.has(a));
  }
  return supportedHashes;
}

/**
 * Normalize/validate requested algorithm against runtime support.
 * Accepts the shorthand "blake2b" for blake2b512.
 */
export function normalizeHashAlg(requested?: string): HashAlg {
  const list = listSupportedHashes();
  if (!requested) return defaultHashAlg();
  const low = requested.trim().toLowerCase();
  const exact = list.find((h) => h === low);
  if (exact) return exact;
  if (low === "blake2b" && list.includes("blake2b512")) {
    return "blake2b512";
  }
  throw new Error(
    `Unknown/unsupported hash algorithm "${requested}". Try one of: ${list.join(", ")}`,
  );
}

/**
 * Stream a file through the digest in fixed-size chunks so memory stays
 * flat regardless of file size. Any read failure becomes a HashError.
 */
export async function fileDigest(alg: HashAlg, path: string): Promise<string> {
  const h = createHash(alg);
  try {
    const rs = createReadStream(path, { highWaterMark: HASH_CHUNK_BYTES });
    await pipeline(rs, async (src: AsyncIterable<Buffer>) => {
      for await (const chunk of src) {
        h.update(chunk);
      }
    });
  } catch (err) {
    throw new HashError(path, err);
  }
  return h.digest(ENCODING);
}
