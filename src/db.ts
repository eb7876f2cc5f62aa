// src/db.ts
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

export const LEDGER_SCHEMA_VERSION = 1;

export interface LedgerRow {
  path: string;
  hash: string;
  backed_up_at: string;
}

// Snapshot files are written once and renamed into place, so a rollback
// journal (not WAL) keeps everything inside the single file being renamed.
const SNAPSHOT_PRAGMAS = ["journal_mode = DELETE", "synchronous = FULL"];

function createSchema(db: Database.Database) {
  db.exec(`
  CREATE TABLE IF NOT EXISTS backed_up_files (
    path         TEXT NOT NULL,
    hash         TEXT NOT NULL,
    backed_up_at TEXT NOT NULL,
    PRIMARY KEY (path, hash)
  );
  CREATE TABLE IF NOT EXISTS meta (
    key   TEXT PRIMARY KEY NOT NULL,
    value TEXT
  );
`);
}

/** Create a fresh ledger database at `dbPath` ready for a bulk insert. */
export function createLedgerDb(dbPath: string): Database.Database {
  mkdirSync(dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  for (const pragma of SNAPSHOT_PRAGMAS) {
    db.pragma(pragma);
  }
  createSchema(db);
  db.prepare(`INSERT OR REPLACE INTO meta (key, value) VALUES (?, ?)`).run(
    "schema_version",
    String(LEDGER_SCHEMA_VERSION),
  );
  return db;
}

export function openLedgerDbReadonly(dbPath: string): Database.Database {
  return new Database(dbPath, { readonly: true, fileMustExist: true });
}

/**
 * Read every ledger row. Stores written by the earlier release keyed the
 * digest column as `md5`; those are read transparently.
 */
export function readLedgerRows(db: Database.Database): LedgerRow[] {
  const info = db.pragma("table_info(backed_up_files)");
  const columns: unknown[] = Array.isArray(info) ? info : [];
  const names = new Set(
    columns.flatMap((c) =>
      isRecord(c) && typeof c.name === "string" ? [c.name] : [],
    ),
  );
  if (names.size === 0) {
    throw new Error("ledger store has no backed_up_files table");
  }
  const hashColumn = names.has("hash")
    ? "hash"
    : names.has("md5")
      ? "md5"
      : null;
  if (hashColumn == null) {
    throw new Error("ledger store has no hash column");
  }
  const rows: unknown[] = db
    .prepare(
      `SELECT path, ${hashColumn} AS hash, backed_up_at FROM backed_up_files`,
    )
    .all();
  return rows.filter(isLedgerRow);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function isLedgerRow(v: unknown): v is LedgerRow {
  return (
    isRecord(v) &&
    typeof v.path === "string" &&
    typeof v.hash === "string" &&
    typeof v.backed_up_at === "string"
  );
}
