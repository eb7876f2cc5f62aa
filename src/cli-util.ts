// src/cli-util.ts
import {
  Command,
  InvalidArgumentError,
  type OptionValues,
} from "commander";

/**
 * Minimal CLI bootstrap:
 * - If `mod` is the process entry module, parse argv and call `run(opts)`
 * - If imported, do nothing (so caller can call run() directly)
 *
 * Usage:
 *   export function buildProgram(): Command { ... }
 *   cliEntrypoint(module, buildProgram, {label: "stablecopy"});
 */
export function cliEntrypoint(
  mod: NodeJS.Module,
  buildProgram: () => Command,
  opts?: { label?: string },
): void {
  if (require.main !== mod) return;

  const program = buildProgram();
  program.parseAsync(process.argv).catch((err: unknown) => {
    const label = opts?.label || program.name() || "command";
    const msg = err instanceof Error ? (err.stack ?? err.message) : String(err);
    console.error(`${label} fatal:\n${msg}`);
    process.exitCode = 1;
  });
}

/** Handy for tests: run a program with custom argv without process.exit */
export async function parseAndRun(
  buildProgram: () => Command,
  argv: string[],
): Promise<Command> {
  const program = buildProgram();
  throwInsteadOfExit(program);
  return program.parseAsync(argv, { from: "user" });
}

// exitOverride() is copied onto subcommands only when they are created, so
// a finished program needs it applied to every command in the tree.
function throwInsteadOfExit(command: Command): void {
  command.exitOverride();
  for (const sub of command.commands) {
    throwInsteadOfExit(sub);
  }
}

/** Collect repeatable, possibly comma-separated option values. */
export function collectListOption(value: string, previous: string[] = []) {
  const parts = value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return [...previous, ...parts];
}

export function parseIntOption(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new InvalidArgumentError(`expected a whole number, got "${value}"`);
  }
  return n;
}

export function optString(opts: OptionValues, key: string): string | undefined {
  const v: unknown = opts[key];
  return typeof v === "string" && v.trim() !== "" ? v : undefined;
}

export function optNumber(opts: OptionValues, key: string): number | undefined {
  const v: unknown = opts[key];
  return typeof v === "number" ? v : undefined;
}

export function optList(opts: OptionValues, key: string): string[] | undefined {
  const v: unknown = opts[key];
  if (!Array.isArray(v)) return undefined;
  const items = v.filter((s): s is string => typeof s === "string");
  return items.length ? items : undefined;
}
