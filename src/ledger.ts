// src/ledger.ts
import fsp from "node:fs/promises";
import { dirname } from "node:path";
import type Database from "better-sqlite3";
import {
  createLedgerDb,
  openLedgerDbReadonly,
  readLedgerRows,
  type LedgerRow,
} from "./db.js";
import { errorMessage, isNotFound } from "./errors.js";
import { NullLogger, logFailure, type Logger } from "./logger.js";

export interface LedgerEntry {
  relativePath: string;
  hash: string;
  recordedAt: Date;
}

export type LedgerResult =
  | { ok: true; entries: number }
  | { ok: false; error: string };

export interface BackupLedgerOptions {
  storePath: string;
  logger?: Logger;
  clock?: () => Date;
}

const ZONE_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Timestamps from older stores were written without a zone and always
 * meant UTC; read them that way rather than as local time.
 */
export function parseRecordedAt(raw: string): Date {
  const text = raw.trim();
  return new Date(ZONE_SUFFIX.test(text) ? text : `${text}Z`);
}

/**
 * Record of which (relative path, content hash) pairs have been copied.
 *
 * The in-memory table is the source of truth while running. It is written
 * to disk only by saveToDisk(), which builds a complete snapshot in a temp
 * file next to the store and renames it into place, so an interrupted save
 * leaves the previous store untouched.
 */
export class BackupLedger {
  readonly storePath: string;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  // relativePath -> hash -> recordedAt
  private readonly table = new Map<string, Map<string, Date>>();
  private tmpSeq = 0;
  private unsaved = 0;

  constructor({ storePath, logger, clock }: BackupLedgerOptions) {
    this.storePath = storePath;
    this.logger = logger ?? new NullLogger();
    this.clock = clock ?? (() => new Date());
  }

  isAlreadyBackedUp(relativePath: string, hash: string): boolean {
    return this.table.get(relativePath)?.has(hash) ?? false;
  }

  record(relativePath: string, hash: string): void {
    let hashes = this.table.get(relativePath);
    if (!hashes) {
      hashes = new Map();
      this.table.set(relativePath, hashes);
    }
    hashes.set(hash, this.clock());
    this.unsaved++;
  }

  get size(): number {
    let n = 0;
    for (const hashes of this.table.values()) n += hashes.size;
    return n;
  }

  /** Number of record() calls since the last successful load or save. */
  get unsavedChanges(): number {
    return this.unsaved;
  }

  entries(): LedgerEntry[] {
    const out: LedgerEntry[] = [];
    for (const [relativePath, hashes] of this.table) {
      for (const [hash, recordedAt] of hashes) {
        out.push({ relativePath, hash, recordedAt });
      }
    }
    out.sort(
      (a, b) =>
        a.relativePath.localeCompare(b.relativePath) ||
        a.recordedAt.getTime() - b.recordedAt.getTime(),
    );
    return out;
  }

  async loadFromDisk(): Promise<LedgerResult> {
    try {
      await fsp.stat(this.storePath);
    } catch (err) {
      if (isNotFound(err)) {
        this.logger.info("no ledger on disk yet; it will be created on first save", {
          path: this.storePath,
        });
        this.table.clear();
        this.unsaved = 0;
        return { ok: true, entries: 0 };
      }
      return this.loadFailed(err);
    }

    let rows: LedgerRow[];
    let db: Database.Database | null = null;
    try {
      db = openLedgerDbReadonly(this.storePath);
      rows = readLedgerRows(db);
    } catch (err) {
      return this.loadFailed(err);
    } finally {
      db?.close();
    }

    this.table.clear();
    let skipped = 0;
    for (const row of rows) {
      const recordedAt = parseRecordedAt(row.backed_up_at);
      if (Number.isNaN(recordedAt.getTime())) {
        skipped++;
        continue;
      }
      let hashes = this.table.get(row.path);
      if (!hashes) {
        hashes = new Map();
        this.table.set(row.path, hashes);
      }
      hashes.set(row.hash, recordedAt);
    }
    if (skipped) {
      this.logger.warn("ignored ledger rows with unreadable timestamps", {
        path: this.storePath,
        skipped,
      });
    }
    this.unsaved = 0;
    const entries = this.size;
    this.logger.info("loaded ledger from disk", { path: this.storePath, entries });
    return { ok: true, entries };
  }

  async saveToDisk(): Promise<LedgerResult> {
    const tmp = `${this.storePath}.tmp-${process.pid}-${++this.tmpSeq}`;
    const snapshot = this.entries();
    let db: Database.Database | null = null;
    try {
      await fsp.mkdir(dirname(this.storePath), { recursive: true });
      db = createLedgerDb(tmp);
      const insert = db.prepare(
        `INSERT OR REPLACE INTO backed_up_files (path, hash, backed_up_at) VALUES (?, ?, ?)`,
      );
      const insertAll = db.transaction((rows: LedgerEntry[]) => {
        for (const e of rows) {
          insert.run(e.relativePath, e.hash, e.recordedAt.toISOString());
        }
      });
      insertAll(snapshot);
      db.close();
      db = null;
      await fsp.rename(tmp, this.storePath);
      this.unsaved = 0;
      this.logger.info("saved ledger to disk", {
        path: this.storePath,
        entries: snapshot.length,
      });
      return { ok: true, entries: snapshot.length };
    } catch (err) {
      logFailure(this.logger, "error", "failed to save ledger; keeping it in memory", {
        path: this.storePath,
        op: "ledger-save",
        err,
      });
      return { ok: false, error: errorMessage(err) };
    } finally {
      if (db?.open) db.close();
      await this.removeTemp(tmp);
      await this.removeTemp(`${tmp}-journal`);
    }
  }

  private loadFailed(err: unknown): LedgerResult {
    logFailure(this.logger, "error", "failed to load ledger; starting empty", {
      path: this.storePath,
      op: "ledger-load",
      err,
    });
    this.table.clear();
    this.unsaved = 0;
    return { ok: false, error: errorMessage(err) };
  }

  private async removeTemp(path: string): Promise<void> {
    try {
      await fsp.rm(path, { force: true });
    } catch (err) {
      logFailure(this.logger, "warn", "could not remove temporary ledger file", {
        path,
        op: "ledger-cleanup",
        err,
      });
    }
  }
}
