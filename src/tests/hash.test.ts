import { createHash } from "node:crypto";
import fsp from "node:fs/promises";
import path from "node:path";
import { HashError } from "../errors.js";
import {
  HASH_CHUNK_BYTES,
  defaultHashAlg,
  fileDigest,
  normalizeHashAlg,
} from "../hash.js";
import { mkTmp } from "./util.js";

describe("fileDigest", () => {
  let tmp: string;

  beforeAll(async () => {
    tmp = await mkTmp("hash");
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("md5 hex digest of a small file", async () => {
    const file = path.join(tmp, "hello.tgz");
    await fsp.writeFile(file, "hello");
    expect(await fileDigest("md5", file)).toBe(
      "5d41402abc4b2a76b9719d911017c592",
    );
  });

  test("sha256 hex digest", async () => {
    const file = path.join(tmp, "hello256.tgz");
    await fsp.writeFile(file, "hello");
    expect(await fileDigest("sha256", file)).toBe(
      "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824",
    );
  });

  test("files spanning many chunks hash the same as a one-shot digest", async () => {
    const file = path.join(tmp, "big.tgz");
    const buf = Buffer.alloc(HASH_CHUNK_BYTES * 5 + 123);
    for (let i = 0; i < buf.length; i++) buf[i] = i % 251;
    await fsp.writeFile(file, buf);
    const expected = createHash("md5").update(buf).digest("hex");
    expect(await fileDigest("md5", file)).toBe(expected);
  });

  test("empty file", async () => {
    const file = path.join(tmp, "empty.tgz");
    await fsp.writeFile(file, "");
    expect(await fileDigest("md5", file)).toBe(
      "d41d8cd98f00b204e9800998ecf8427e",
    );
  });

  test("missing file rejects with HashError carrying the path", async () => {
    const file = path.join(tmp, "nope.tgz");
    const err = await fileDigest("md5", file).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(HashError);
    expect(err instanceof HashError && err.path).toBe(file);
  });

  test("a directory cannot be hashed", async () => {
    await expect(fileDigest("md5", tmp)).rejects.toBeInstanceOf(HashError);
  });
});

describe("normalizeHashAlg", () => {
  test("defaults to md5", () => {
    expect(defaultHashAlg()).toBe("md5");
    expect(normalizeHashAlg()).toBe("md5");
    expect(normalizeHashAlg("")).toBe("md5");
  });

  test("is case-insensitive", () => {
    expect(normalizeHashAlg("SHA256")).toBe("sha256");
  });

  test("accepts the blake2b shorthand", () => {
    expect(normalizeHashAlg("blake2b")).toBe("blake2b512");
  });

  test("rejects unknown names", () => {
    expect(() => normalizeHashAlg("crc32")).toThrow(
      /Unknown\/unsupported hash algorithm "crc32"/,
    );
  });
});
