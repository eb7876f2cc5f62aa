export {
  BackupMonitor,
  runMonitor,
  type BackupMonitorOptions,
  type CopyOutcome,
  type CycleReport,
  type RunOptions,
} from "./monitor.js";

export {
  StabilityTracker,
  type EligibleFile,
  type Observations,
  type StabilityOptions,
  type StabilityUpdate,
  type TrackedFile,
} from "./stability.js";

export {
  BackupLedger,
  type BackupLedgerOptions,
  type LedgerEntry,
  type LedgerResult,
} from "./ledger.js";

export {
  fileDigest,
  defaultHashAlg,
  listSupportedHashes,
  normalizeHashAlg,
  type HashAlg,
} from "./hash.js";

export {
  resolveConfig,
  validateConfig,
  parseIniConfig,
  configFromEnv,
  destDir,
  type ConfigInput,
  type LedgerFlush,
  type MonitorConfig,
} from "./config.js";

export {
  loadPresets,
  parsePresetsText,
  expandCategories,
  type PresetCategories,
} from "./presets.js";

export { scanCandidates } from "./scan.js";
export { copyWithMetadata } from "./copy.js";
export { createShutdownSignal, type ShutdownHandle } from "./shutdown.js";

export { ConfigError, HashError, MonitorStartupError } from "./errors.js";

export {
  ConsoleLogger,
  NullLogger,
  StructuredLogger,
  parseLogLevel,
  type LogEntry,
  type Logger,
  type LogLevel,
} from "./logger.js";
