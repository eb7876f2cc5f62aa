// src/errors.ts

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err ?? "unknown error");
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) {
    return undefined;
  }
  const { code } = err;
  return typeof code === "string" ? code : undefined;
}

export function isNotFound(err: unknown): boolean {
  return errorCode(err) === "ENOENT";
}

/** Reading a file for its digest failed; the file's identity is unknown. */
export class HashError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`cannot hash ${path}: ${errorMessage(cause)}`, { cause });
    this.name = "HashError";
    this.path = path;
  }
}

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`invalid configuration:\n  ${problems.join("\n  ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

// Raised before the first scan; nothing can run without a destination.
export class MonitorStartupError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "MonitorStartupError";
  }
}
