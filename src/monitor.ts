// src/monitor.ts
import fsp from "node:fs/promises";
import { copyWithMetadata } from "./copy.js";
import { destDir as resolveDestDir, type MonitorConfig } from "./config.js";
import { MonitorStartupError, errorMessage } from "./errors.js";
import { fileDigest } from "./hash.js";
import { BackupLedger, type LedgerResult } from "./ledger.js";
import { ConsoleLogger, logFailure, type Logger } from "./logger.js";
import { toRel } from "./path-rel.js";
import { scanCandidates } from "./scan.js";
import {
  StabilityTracker,
  type EligibleFile,
  type StabilityUpdate,
} from "./stability.js";
import { plural, secondsToMs, wait } from "./util.js";

export type CopyOutcome =
  | {
      status: "copied";
      path: string;
      relativePath: string;
      hash: string;
      dest: string;
      bytes: number;
    }
  | { status: "duplicate"; path: string; relativePath: string; hash: string }
  | { status: "hash-failed"; path: string; error: string }
  | {
      status: "copy-failed";
      path: string;
      relativePath: string;
      hash: string;
      error: string;
    }
  // shutdown arrived before this file's turn; it is rediscovered next run
  | { status: "deferred"; path: string };

export type CycleReport = {
  candidates: number;
  tracked: number;
  update: StabilityUpdate;
  outcomes: CopyOutcome[];
  copied: number;
  duplicates: number;
  failures: number;
};

export interface BackupMonitorOptions {
  logger?: Logger;
  ledger?: BackupLedger;
}

export interface RunOptions {
  /** Stop after this many cycles instead of waiting for the signal. */
  maxCycles?: number;
}

/**
 * Scan, track, copy, sleep. One sequential control flow owns the tracking
 * table and the ledger; the only external input is the abort signal.
 */
export class BackupMonitor {
  readonly config: MonitorConfig;
  readonly destDir: string;
  readonly ledger: BackupLedger;
  readonly tracker: StabilityTracker;
  private readonly logger: Logger;
  private started = false;

  constructor(config: MonitorConfig, { logger, ledger }: BackupMonitorOptions = {}) {
    this.config = config;
    this.logger = logger ?? new ConsoleLogger().child("monitor");
    this.destDir = resolveDestDir(config);
    this.ledger =
      ledger ??
      new BackupLedger({
        storePath: config.ledgerPath,
        logger: this.logger.child("ledger"),
      });
    this.tracker = new StabilityTracker({
      intervalMs: secondsToMs(config.checkIntervalSeconds),
      thresholdMs: secondsToMs(config.stableThresholdSeconds),
    });
  }

  /**
   * Verify the monitored directory, create the destination, load the
   * ledger. Throws MonitorStartupError when the run cannot proceed; a ledger
   * that fails to load only costs possible re-copies.
   */
  async start(): Promise<void> {
    if (this.started) return;
    const { monitorDir } = this.config;
    let isDir = false;
    try {
      isDir = (await fsp.stat(monitorDir)).isDirectory();
    } catch (err) {
      throw new MonitorStartupError(
        `monitored directory ${monitorDir} is not accessible: ${errorMessage(err)}`,
        err,
      );
    }
    if (!isDir) {
      throw new MonitorStartupError(
        `monitored path ${monitorDir} is not a directory`,
      );
    }

    try {
      await fsp.mkdir(this.destDir, { recursive: true });
    } catch (err) {
      logFailure(this.logger, "error", "could not create destination directory", {
        path: this.destDir,
        op: "mkdir",
        err,
      });
      throw new MonitorStartupError(
        `could not create destination directory ${this.destDir}: ${errorMessage(err)}`,
        err,
      );
    }
    this.logger.info("ensured destination directory exists", {
      path: this.destDir,
    });

    await this.ledger.loadFromDisk();
    this.started = true;
    this.logger.info(
      `monitoring ${monitorDir} for ${this.config.fileExtensions.join(", ")} files`,
      {
        intervalSeconds: this.config.checkIntervalSeconds,
        stableThresholdSeconds: this.config.stableThresholdSeconds,
        hash: this.config.hashAlgorithm,
      },
    );
  }

  async runCycle(signal?: AbortSignal): Promise<CycleReport> {
    if (!this.started) {
      throw new Error("BackupMonitor.start() must complete before runCycle()");
    }
    this.logger.debug("scanning directory", { path: this.config.monitorDir });
    const observations = await scanCandidates(
      this.config.monitorDir,
      this.config.fileExtensions,
      this.logger.child("scan"),
    );
    const update = this.tracker.update(observations);
    this.logUpdate(update, observations);

    const outcomes: CopyOutcome[] = [];
    for (const file of update.eligible) {
      if (signal?.aborted) {
        outcomes.push({ status: "deferred", path: file.path });
        continue;
      }
      outcomes.push(await this.copyEligible(file));
    }
    if (outcomes.some((o) => o.status === "deferred")) {
      this.logger.info("shutdown pending; stable files left for the next run", {
        deferred: outcomes.filter((o) => o.status === "deferred").length,
      });
    }

    return {
      candidates: observations.size,
      tracked: this.tracker.size,
      update,
      outcomes,
      copied: outcomes.filter((o) => o.status === "copied").length,
      duplicates: outcomes.filter((o) => o.status === "duplicate").length,
      failures: outcomes.filter(
        (o) => o.status === "hash-failed" || o.status === "copy-failed",
      ).length,
    };
  }

  /**
   * Hash, dedup check, copy, record. The file has already left the tracking
   * table; a failure here is logged and not retried until the file is
   * rediscovered as a new candidate.
   */
  async copyEligible(file: EligibleFile): Promise<CopyOutcome> {
    const { path } = file;
    let hash: string;
    try {
      hash = await fileDigest(this.config.hashAlgorithm, path);
    } catch (err) {
      logFailure(this.logger, "error", "could not hash stable file; not copying", {
        path,
        op: "hash",
        err,
      });
      return { status: "hash-failed", path, error: errorMessage(err) };
    }

    const relativePath = toRel(path, this.config.monitorDir);
    if (this.ledger.isAlreadyBackedUp(relativePath, hash)) {
      this.logger.info("skipped; already backed up with same content", {
        path,
        hash,
      });
      return { status: "duplicate", path, relativePath, hash };
    }

    try {
      const { dest, bytes } = await copyWithMetadata(path, this.destDir);
      this.ledger.record(relativePath, hash);
      this.logger.info("copied stable file", { path, dest, bytes, hash });
      return { status: "copied", path, relativePath, hash, dest, bytes };
    } catch (err) {
      logFailure(this.logger, "error", "error copying file", {
        path,
        op: "copy",
        err,
      });
      return {
        status: "copy-failed",
        path,
        relativePath,
        hash,
        error: errorMessage(err),
      };
    }
  }

  /**
   * Run until `signal` aborts (or `maxCycles` cycles complete). The ledger is
   * saved after the last cycle on every exit path, including a cycle that
   * threw; only startup failures propagate.
   */
  async run(signal: AbortSignal, { maxCycles }: RunOptions = {}): Promise<void> {
    await this.start();
    const intervalMs = secondsToMs(this.config.checkIntervalSeconds);
    let cycles = 0;
    try {
      while (!signal.aborted) {
        try {
          const report = await this.runCycle(signal);
          if (this.config.ledgerFlush === "cycle" && report.copied > 0) {
            await this.ledger.saveToDisk();
          }
        } catch (err) {
          logFailure(this.logger, "error", "unexpected error during scan cycle", {
            path: this.config.monitorDir,
            op: "cycle",
            err,
          });
        }
        cycles++;
        if (maxCycles !== undefined && cycles >= maxCycles) break;
        if (signal.aborted) break;
        this.logger.debug(`sleeping ${plural(this.config.checkIntervalSeconds, "second")}`);
        await wait(intervalMs, signal);
      }
    } finally {
      await this.close();
    }
  }

  /** Flush the ledger. Safe to call more than once. */
  async close(): Promise<LedgerResult> {
    const result = await this.ledger.saveToDisk();
    this.logger.info("monitor shutting down", {
      tracked: this.tracker.size,
      ledgerEntries: this.ledger.size,
      ledgerSaved: result.ok,
    });
    return result;
  }

  private logUpdate(
    update: StabilityUpdate,
    observations: ReadonlyMap<string, number | null>,
  ) {
    for (const path of update.admitted) {
      this.logger.info("detected new file; starting monitoring", {
        path,
        size: observations.get(path),
      });
    }
    for (const path of update.reset) {
      this.logger.info("size changed; resetting checks", {
        path,
        size: observations.get(path),
      });
    }
    for (const { path, reason } of update.dropped) {
      this.logger.warn(
        reason === "missing"
          ? "tracked file disappeared; removing from tracking"
          : "could not get size of tracked file; removing from tracking",
        { path },
      );
    }
    for (const path of update.skipped) {
      this.logger.warn("detected new file but could not get size; skipping for now", {
        path,
      });
    }
    if (this.logger.isLevelEnabled("debug")) {
      for (const path of this.tracker.paths()) {
        const state = this.tracker.get(path);
        if (state && state.stableCount > 0) {
          this.logger.debug("size stable", {
            path,
            size: state.lastSize,
            stableCount: state.stableCount,
          });
        }
      }
    }
    for (const { path, stableCount } of update.eligible) {
      this.logger.debug("file is stable; copying", {
        path,
        stableSeconds: this.tracker.stableMs(stableCount) / 1000,
      });
    }
  }
}

export async function runMonitor(
  config: MonitorConfig,
  {
    signal,
    logger,
    maxCycles,
  }: { signal: AbortSignal; logger?: Logger; maxCycles?: number },
): Promise<void> {
  const monitor = new BackupMonitor(config, { logger });
  await monitor.run(signal, { maxCycles });
}
