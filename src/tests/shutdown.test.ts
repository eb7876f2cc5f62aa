import { createShutdownSignal } from "../shutdown.js";
import { MAX_TIMER_MS, plural, secondsToMs, wait } from "../util.js";
import { memoryLogger } from "./util.js";

describe("wait", () => {
  test("resolves false after the full delay", async () => {
    await expect(wait(5)).resolves.toBe(false);
  });

  test("resolves true as soon as the signal aborts", async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = wait(60_000, controller.signal);
    controller.abort();
    await expect(pending).resolves.toBe(true);
    expect(Date.now() - started).toBeLessThan(1000);
  });

  describe("delays longer than one timer can hold", () => {
    const fortyDays = 40 * 24 * 3600 * 1000;

    beforeEach(() => {
      jest.useFakeTimers();
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    test("sleep the whole delay", async () => {
      let result: boolean | undefined;
      void wait(fortyDays).then((r) => {
        result = r;
      });
      await jest.advanceTimersByTimeAsync(MAX_TIMER_MS);
      expect(result).toBeUndefined();
      await jest.advanceTimersByTimeAsync(fortyDays - MAX_TIMER_MS - 1);
      expect(result).toBeUndefined();
      await jest.advanceTimersByTimeAsync(1);
      expect(result).toBe(false);
    });

    test("still wake on abort during a later chunk", async () => {
      const controller = new AbortController();
      let result: boolean | undefined;
      void wait(fortyDays, controller.signal).then((r) => {
        result = r;
      });
      await jest.advanceTimersByTimeAsync(MAX_TIMER_MS + 1000);
      controller.abort();
      await jest.advanceTimersByTimeAsync(0);
      expect(result).toBe(true);
      expect(jest.getTimerCount()).toBe(0);
    });
  });

  test("an already aborted signal does not sleep", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(wait(60_000, controller.signal)).resolves.toBe(true);
  });
});

describe("helpers", () => {
  test("secondsToMs and plural", () => {
    expect(secondsToMs(1.5)).toBe(1500);
    expect(plural(1, "second")).toBe("1 second");
    expect(plural(300, "second")).toBe("300 seconds");
  });
});

describe("createShutdownSignal", () => {
  test("a process signal aborts once and is logged", () => {
    const { logger, entries } = memoryLogger();
    const shutdown = createShutdownSignal({ signals: ["SIGUSR2"], logger });
    try {
      process.emit("SIGUSR2", "SIGUSR2");
      expect(shutdown.signal.aborted).toBe(true);
      expect(shutdown.signal.reason).toBe("SIGUSR2");
      shutdown.trigger("again");
      expect(entries.map((e) => e.message)).toEqual([
        "shutdown requested; finishing current step",
      ]);
    } finally {
      shutdown.dispose();
    }
  });

  test("trigger aborts without a process signal", () => {
    const shutdown = createShutdownSignal({ signals: ["SIGUSR2"] });
    try {
      shutdown.trigger();
      expect(shutdown.signal.reason).toBe("shutdown requested");
    } finally {
      shutdown.dispose();
    }
  });

  test("dispose removes the process listeners", () => {
    const before = process.listenerCount("SIGUSR2");
    const shutdown = createShutdownSignal({ signals: ["SIGUSR2"] });
    expect(process.listenerCount("SIGUSR2")).toBe(before + 1);
    shutdown.dispose();
    expect(process.listenerCount("SIGUSR2")).toBe(before);
  });
});
