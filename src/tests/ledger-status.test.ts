import {
  filterEntries,
  fmtAgo,
  ledgerEntriesAsJson,
  renderLedgerTable,
} from "../ledger-status.js";
import type { LedgerEntry } from "../ledger.js";

const now = Date.parse("2024-06-01T12:00:00.000Z");

const entries: LedgerEntry[] = [
  {
    relativePath: "a.tgz",
    hash: "0cc175b9c0f1b6a831c399e269772661",
    recordedAt: new Date("2024-06-01T11:58:30.000Z"),
  },
  {
    relativePath: "b.tgz",
    hash: "92eb5ffee6ae2fec3ad71c777531578f",
    recordedAt: new Date("2024-05-29T12:00:00.000Z"),
  },
];

describe("ledger status", () => {
  test("fmtAgo picks the largest whole unit", () => {
    expect(fmtAgo(now - 90_000, now)).toBe("1 minute ago");
    expect(fmtAgo(entries[1].recordedAt, now)).toBe("3 days ago");
    expect(fmtAgo(now, now)).toBe("now");
  });

  test("filterEntries matches the relative path exactly", () => {
    expect(filterEntries(entries, "a.tgz")).toEqual([entries[0]]);
    expect(filterEntries(entries, "a")).toEqual([]);
    expect(filterEntries(entries)).toBe(entries);
  });

  test("the table lists every entry with its age", () => {
    const table = renderLedgerTable(entries, { title: "ledger.sqlite", now });
    expect(table).toContain("ledger.sqlite (2)");
    const lines = table.split("\n");
    expect(lines.some((l) => l.includes("a.tgz") && l.includes("1 minute ago"))).toBe(
      true,
    );
    expect(
      lines.some(
        (l) => l.includes("b.tgz") && l.includes("2024-05-29T12:00:00.000Z"),
      ),
    ).toBe(true);
  });

  test("JSON output is one object per entry", () => {
    expect(ledgerEntriesAsJson(entries)).toEqual([
      '{"path":"a.tgz","hash":"0cc175b9c0f1b6a831c399e269772661","recordedAt":"2024-06-01T11:58:30.000Z"}',
      '{"path":"b.tgz","hash":"92eb5ffee6ae2fec3ad71c777531578f","recordedAt":"2024-05-29T12:00:00.000Z"}',
    ]);
  });
});
