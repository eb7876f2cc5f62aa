import fsp from "node:fs/promises";
import path from "node:path";
import { hasExtension, toRel } from "../path-rel.js";
import { scanCandidates } from "../scan.js";
import { memoryLogger, mkTmp } from "./util.js";

describe("scanCandidates", () => {
  let tmp: string;

  beforeAll(async () => {
    tmp = await mkTmp("scan");
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("keeps regular files with a matching extension, following symlinks", async () => {
    const dir = path.join(tmp, "mixed");
    await fsp.mkdir(dir);
    await fsp.writeFile(path.join(dir, "a.tgz"), "0123456789");
    await fsp.writeFile(path.join(dir, "b.txt"), "ignored");
    await fsp.writeFile(path.join(dir, "c.txz"), "abc");
    await fsp.writeFile(path.join(dir, ".tgz"), "dotfile");
    await fsp.mkdir(path.join(dir, "folder.tgz"));
    await fsp.mkdir(path.join(dir, "nested"));
    await fsp.writeFile(path.join(dir, "nested", "deep.tgz"), "not top level");
    await fsp.symlink(path.join(dir, "a.tgz"), path.join(dir, "link.tgz"));
    await fsp.symlink(path.join(dir, "gone"), path.join(dir, "dangling.tgz"));

    const { logger, entries } = memoryLogger();
    const found = await scanCandidates(dir, [".tgz", ".txz"], logger);

    expect(Object.fromEntries(found)).toEqual({
      [path.join(dir, "a.tgz")]: 10,
      [path.join(dir, "c.txz")]: 3,
      [path.join(dir, "link.tgz")]: 10,
    });
    expect(entries.filter((e) => e.level !== "debug")).toEqual([]);
  });

  test("a directory that cannot be listed yields no candidates and an error record", async () => {
    const missing = path.join(tmp, "does-not-exist");
    const { logger, entries } = memoryLogger();
    const found = await scanCandidates(missing, [".tgz"], logger);
    expect(found.size).toBe(0);
    expect(entries).toHaveLength(1);
    expect(entries[0].level).toBe("error");
    expect(entries[0].meta).toEqual({
      path: missing,
      op: "list",
      error: expect.stringContaining("ENOENT"),
      code: "ENOENT",
    });
  });
});

describe("path helpers", () => {
  test("hasExtension matches suffixes, including multi-part ones", () => {
    expect(hasExtension("pkg.tgz", [".tgz"])).toBe(true);
    expect(hasExtension("pkg.tar.gz", [".tar.gz"])).toBe(true);
    expect(hasExtension("pkg.TGZ", [".tgz"])).toBe(false);
    expect(hasExtension(".tgz", [".tgz"])).toBe(false);
    expect(hasExtension("pkg.tgz.part", [".tgz"])).toBe(false);
  });

  test("toRel is relative to the root with forward slashes", () => {
    expect(toRel("/srv/in/a.tgz", "/srv/in")).toBe("a.tgz");
    expect(toRel("/srv/in/sub/a.tgz", "/srv/in/")).toBe("sub/a.tgz");
  });
});
