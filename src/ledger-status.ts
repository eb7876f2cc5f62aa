// src/ledger-status.ts
import { AsciiTable3, AlignmentEnum } from "ascii-table3";
import type { LedgerEntry } from "./ledger.js";

const rtf = new Intl.RelativeTimeFormat("en", { numeric: "auto" });

export function fmtAgo(input: Date | number, now = Date.now()): string {
  const t = typeof input === "number" ? input : input.getTime();
  const diff = t - now; // negative for past
  const units: [Intl.RelativeTimeFormatUnit, number][] = [
    ["year", 365 * 24 * 60 * 60 * 1000],
    ["month", 30 * 24 * 60 * 60 * 1000],
    ["week", 7 * 24 * 60 * 60 * 1000],
    ["day", 24 * 60 * 60 * 1000],
    ["hour", 60 * 60 * 1000],
    ["minute", 60 * 1000],
    ["second", 1000],
  ];
  for (const [unit, ms] of units) {
    const val = Math.trunc(diff / ms);
    if (Math.abs(val) >= 1) return rtf.format(val, unit);
  }
  return rtf.format(0, "second");
}

export function filterEntries(
  entries: LedgerEntry[],
  pathFilter?: string,
): LedgerEntry[] {
  if (!pathFilter) return entries;
  return entries.filter((e) => e.relativePath === pathFilter);
}

export function renderLedgerTable(
  entries: LedgerEntry[],
  { title = "Ledger", now = Date.now() }: { title?: string; now?: number } = {},
): string {
  const table = new AsciiTable3(`${title} (${entries.length})`)
    .setHeading("Path", "Hash", "Recorded", "Age")
    .setStyle("unicode-round");
  table.setAlign(1, AlignmentEnum.LEFT);
  for (const e of entries) {
    table.addRow(
      e.relativePath,
      e.hash,
      e.recordedAt.toISOString(),
      fmtAgo(e.recordedAt, now),
    );
  }
  return table.toString();
}

export function ledgerEntriesAsJson(entries: LedgerEntry[]): string[] {
  return entries.map((e) =>
    JSON.stringify({
      path: e.relativePath,
      hash: e.hash,
      recordedAt: e.recordedAt.toISOString(),
    }),
  );
}
