import { readFileSync } from "node:fs";
import path from "node:path";

export const CLI_NAME = "stablecopy";

let version: string | null = null;
export function packageVersion(): string {
  if (version == null) {
    const raw: unknown = JSON.parse(
      readFileSync(path.resolve(__dirname, "..", "package.json"), "utf8"),
    );
    version =
      typeof raw === "object" &&
      raw !== null &&
      "version" in raw &&
      typeof raw.version === "string"
        ? raw.version
        : "0.0.0";
  }
  return version;
}
