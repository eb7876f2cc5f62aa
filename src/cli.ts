#!/usr/bin/env node
// src/cli.ts
import fs from "node:fs";
import path from "node:path";
import { Command, Option, type OptionValues } from "commander";
import {
  cliEntrypoint,
  collectListOption,
  optList,
  optNumber,
  optString,
  parseIntOption,
} from "./cli-util.js";
import {
  LEDGER_FLUSH_POLICIES,
  destDir,
  resolveConfig,
  type ConfigInput,
} from "./config.js";
import { CLI_NAME, packageVersion } from "./constants.js";
import { listSupportedHashes } from "./hash.js";
import { BackupLedger } from "./ledger.js";
import {
  filterEntries,
  ledgerEntriesAsJson,
  renderLedgerTable,
} from "./ledger-status.js";
import { LOG_LEVELS, loggerFromLevel, type Logger } from "./logger.js";
import { runMonitor } from "./monitor.js";
import { loadDefaultPresets, loadPresets, savePresets } from "./presets.js";
import { createShutdownSignal } from "./shutdown.js";

function loggerFor(command: Command): Logger {
  const globals: OptionValues = command.optsWithGlobals();
  return loggerFromLevel(optString(globals, "logLevel"));
}

function resolveFromCwd(p: string | undefined): string | undefined {
  return p === undefined ? undefined : path.resolve(p);
}

export function cliOptsToConfigInput(opts: OptionValues): ConfigInput {
  return {
    monitorDir: resolveFromCwd(optString(opts, "monitorDir")),
    destBaseDir: resolveFromCwd(optString(opts, "destBaseDir")),
    destSubdirName: optString(opts, "destSubdir"),
    fileExtensions: optList(opts, "ext"),
    categories: optList(opts, "category"),
    categoriesFile: resolveFromCwd(optString(opts, "categoriesFile")),
    checkIntervalSeconds: optNumber(opts, "interval"),
    stableThresholdSeconds: optNumber(opts, "stable"),
    ledgerPath: resolveFromCwd(optString(opts, "ledger")),
    hashAlgorithm: optString(opts, "hash"),
    ledgerFlush: optString(opts, "ledgerFlush"),
  };
}

export function configureMonitorOptions(command: Command): Command {
  return command
    .option("-c, --config <file>", "INI configuration file")
    .option("--monitor-dir <path>", "directory to watch")
    .option("--dest-base-dir <path>", "base directory for backups")
    .option("--dest-subdir <name>", "subdirectory of the base that receives copies")
    .option(
      "-e, --ext <ext>",
      "file extension to back up, e.g. .tgz (repeat or comma-separated)",
      collectListOption,
    )
    .option(
      "--category <name>",
      "add a file type category's extensions (repeat or comma-separated)",
      collectListOption,
    )
    .option("--categories-file <file>", "file type categories definition")
    .option("--interval <seconds>", "seconds between scans", parseIntOption)
    .option(
      "--stable <seconds>",
      "seconds a file's size must hold before it is copied",
      parseIntOption,
    )
    .option("--ledger <file>", "path to the backup ledger store")
    .addOption(
      new Option("--hash <algorithm>", "content hash algorithm").choices(
        listSupportedHashes(),
      ),
    )
    .addOption(
      new Option("--ledger-flush <policy>", "when to write the ledger to disk").choices(
        LEDGER_FLUSH_POLICIES,
      ),
    );
}

async function configFor(opts: OptionValues, logger: Logger) {
  return resolveConfig({
    configFile: resolveFromCwd(optString(opts, "config")),
    cli: cliOptsToConfigInput(opts),
    logger: logger.child("config"),
  });
}

export function buildProgram(): Command {
  const program = new Command()
    .name(CLI_NAME)
    .description(
      "Copy files out of a watched directory once their size settles, skipping content already backed up",
    )
    .version(packageVersion())
    .option(
      "--log-level <level>",
      `log verbosity (${LOG_LEVELS.join(", ")})`,
    );

  configureMonitorOptions(
    program.command("watch").description("watch the directory until interrupted"),
  ).action(async (opts: OptionValues, command: Command) => {
    const logger = loggerFor(command);
    const config = await configFor(opts, logger);
    const shutdown = createShutdownSignal({ logger });
    try {
      await runMonitor(config, {
        signal: shutdown.signal,
        logger: logger.child("monitor"),
      });
    } finally {
      shutdown.dispose();
    }
  });

  configureMonitorOptions(
    program
      .command("once")
      .description("run a fixed number of scan cycles and exit")
      .option("--cycles <n>", "number of scan cycles", parseIntOption, 1),
  ).action(async (opts: OptionValues, command: Command) => {
    const logger = loggerFor(command);
    const cycles = optNumber(opts, "cycles") ?? 1;
    if (cycles < 1) {
      command.error("--cycles must be at least 1");
    }
    const config = await configFor(opts, logger);
    const shutdown = createShutdownSignal({ logger });
    try {
      await runMonitor(config, {
        signal: shutdown.signal,
        logger: logger.child("monitor"),
        maxCycles: cycles,
      });
    } finally {
      shutdown.dispose();
    }
  });

  configureMonitorOptions(
    program.command("config").description("print the resolved configuration"),
  ).action(async (opts: OptionValues, command: Command) => {
    const logger = loggerFor(command);
    const config = await configFor(opts, logger);
    console.log(JSON.stringify({ ...config, destDir: destDir(config) }, null, 2));
  });

  program
    .command("ledger")
    .description("list what has been backed up")
    .option("-c, --config <file>", "INI configuration file")
    .option("--ledger <file>", "path to the backup ledger store")
    .option("--path <relative>", "only entries for this relative path")
    .option("--json", "one JSON object per line", false)
    .action(async (opts: OptionValues, command: Command) => {
      const logger = loggerFor(command);
      const storePath =
        resolveFromCwd(optString(opts, "ledger")) ??
        (await configFor(opts, logger)).ledgerPath;
      const ledger = new BackupLedger({
        storePath,
        logger: logger.child("ledger"),
      });
      const loaded = await ledger.loadFromDisk();
      if (!loaded.ok) {
        process.exitCode = 1;
        return;
      }
      const entries = filterEntries(ledger.entries(), optString(opts, "path"));
      if (opts.json === true) {
        for (const line of ledgerEntriesAsJson(entries)) console.log(line);
      } else {
        console.log(renderLedgerTable(entries, { title: storePath }));
      }
    });

  program
    .command("presets")
    .description("list file type categories")
    .option("--categories-file <file>", "file type categories definition")
    .option("--init <file>", "write the default categories to <file>")
    .option("--force", "overwrite an existing file with --init", false)
    .action(async (opts: OptionValues, command: Command) => {
      const logger = loggerFor(command);
      const target = resolveFromCwd(optString(opts, "init"));
      if (target) {
        if (fs.existsSync(target) && opts.force !== true) {
          command.error(`${target} exists; pass --force to overwrite`);
        }
        await savePresets(target, loadDefaultPresets());
        logger.info("wrote default categories", { path: target });
        return;
      }
      const presets = await loadPresets(
        resolveFromCwd(optString(opts, "categoriesFile")),
        logger.child("presets"),
      );
      for (const [name, exts] of presets) {
        console.log(`${name}: ${exts.join(" ")}`);
      }
    });

  return program;
}

cliEntrypoint(module, buildProgram, { label: CLI_NAME });
