import {
  StructuredLogger,
  levelAtOrAbove,
  logFailure,
  loggerFromLevel,
  parseLogLevel,
  type LogEntry,
} from "../logger.js";

function collecting(minLevel?: "debug" | "info" | "warn" | "error") {
  const entries: LogEntry[] = [];
  const logger = new StructuredLogger({
    sink: (e) => entries.push(e),
    clock: () => 1_700_000_000_000,
    minLevel,
  });
  return { logger, entries };
}

describe("StructuredLogger", () => {
  test("child scopes nest with dots and share the sink", () => {
    const { logger, entries } = collecting();
    logger.child("monitor").child("scan").info("hello", { n: 1 });
    expect(entries).toEqual([
      {
        ts: 1_700_000_000_000,
        level: "info",
        scope: "monitor.scan",
        message: "hello",
        meta: { n: 1 },
      },
    ]);
  });

  test("entries below the minimum level are dropped", () => {
    const { logger, entries } = collecting("warn");
    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.child("x").error("e");
    expect(entries.map((e) => e.message)).toEqual(["w", "e"]);
    expect(logger.isLevelEnabled("info")).toBe(false);
  });

  test("empty meta is omitted", () => {
    const { logger, entries } = collecting();
    logger.info("plain", {});
    expect(entries[0].meta).toBeUndefined();
  });

  test("echo writes at or above its own level", () => {
    const echoed: string[] = [];
    const logger = new StructuredLogger({
      echo: { minLevel: "warn", writer: (e) => echoed.push(e.message) },
    });
    logger.info("quiet");
    logger.error("loud");
    expect(echoed).toEqual(["loud"]);
  });
});

describe("logFailure", () => {
  test("records path, operation, message and errno code", () => {
    const { logger, entries } = collecting();
    const err = Object.assign(new Error("EACCES: permission denied"), {
      code: "EACCES",
    });
    logFailure(logger, "warn", "could not read size", {
      path: "/w/a.tgz",
      op: "stat",
      err,
    });
    expect(entries[0].level).toBe("warn");
    expect(entries[0].meta).toEqual({
      path: "/w/a.tgz",
      op: "stat",
      error: "EACCES: permission denied",
      code: "EACCES",
    });
  });

  test("omits the code and path when there are none", () => {
    const { logger, entries } = collecting();
    logFailure(logger, "error", "boom", { op: "cycle", err: "plain string" });
    expect(entries[0].meta).toEqual({ op: "cycle", error: "plain string" });
  });
});

describe("levels", () => {
  test("parseLogLevel accepts known names and falls back otherwise", () => {
    expect(parseLogLevel(" DEBUG ")).toBe("debug");
    expect(parseLogLevel("verbose")).toBe("info");
    expect(parseLogLevel(undefined, "warn")).toBe("warn");
  });

  test("loggerFromLevel uses the given level, then STABLECOPY_LOG_LEVEL", () => {
    const saved = process.env.STABLECOPY_LOG_LEVEL;
    try {
      process.env.STABLECOPY_LOG_LEVEL = "error";
      expect(loggerFromLevel("debug").isLevelEnabled("debug")).toBe(true);
      const fromEnv = loggerFromLevel();
      expect(fromEnv.isLevelEnabled("warn")).toBe(false);
      expect(fromEnv.isLevelEnabled("error")).toBe(true);
    } finally {
      if (saved === undefined) delete process.env.STABLECOPY_LOG_LEVEL;
      else process.env.STABLECOPY_LOG_LEVEL = saved;
    }
  });

  test("levelAtOrAbove orders debug < info < warn < error", () => {
    expect(levelAtOrAbove("info", "warn")).toBe(true);
    expect(levelAtOrAbove("info", "info")).toBe(true);
    expect(levelAtOrAbove("warn", "info")).toBe(false);
  });
});
