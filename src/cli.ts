#!/usr/bin/env node
/**
 * phosflow CLI.
 *
 * Modes:
 *   phosflow run    [options]   poll until stopped (or auto-exit)
 *   phosflow cycle  [options]   run a single cycle and exit
 *   phosflow status [options]   print the status table
 */
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { IntervalTicker, runLoop } from "./batch/scheduler.js";
import { StatusStore, UnitStatus } from "./batch/status-store.js";
import type { UnitStatusRecord } from "./batch/status-store.js";
import { formatDuration } from "./config/duration.js";
import { loadConfig } from "./config/loader.js";
import { isLogLevel } from "./core/observability.js";
import type { LogLevel } from "./core/observability.js";
import { createRuntime } from "./runtime.js";
import { errorMessage } from "./types/index.js";

// ── Argument parsing ──────────────────────────────────────────────

type Command = "run" | "cycle" | "status";

export interface CliOptions {
  command: Command | null;
  config: string | undefined;
  logLevel: LogLevel | undefined;
  help: boolean;
  version: boolean;
}

const HELP_TEXT = `
phosflow: batch driver for the phosphorescence calculation pipeline

USAGE
  phosflow run    [options]    Poll the source directory until stopped
  phosflow cycle  [options]    Run one scheduling cycle and exit
  phosflow status [options]    Print the status table

OPTIONS
  --config, -c <file>     YAML configuration file              (optional)
  --log-level <level>     debug|info|warn|error|fatal          (default: info)
  --help, -h              Show this help message
  --version, -v           Show version

ENVIRONMENT
  PHOSFLOW_SOURCE_DIR, PHOSFLOW_RESULTS_DIR, PHOSFLOW_STATUS_FILE,
  PHOSFLOW_MAX_CONCURRENT, PHOSFLOW_POLL_INTERVAL, PHOSFLOW_STALL_TIMEOUT,
  PHOSFLOW_AUTO_EXIT, PHOSFLOW_IDLE_CYCLES, PHOSFLOW_WEBHOOK_URL,
  PHOSFLOW_LOG_LEVEL override the configuration file.
`.trim();

const VERSION = "0.1.0";

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const opts: CliOptions = {
    command: null,
    config: undefined,
    logLevel: undefined,
    help: false,
    version: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    const next = (): string => {
      i++;
      const val = argv[i];
      if (val === undefined) throw new CliUsageError(`${arg} requires a value`);
      return val;
    };

    if (arg === "--help" || arg === "-h") { opts.help = true; continue; }
    if (arg === "--version" || arg === "-v") { opts.version = true; continue; }
    if (arg === "--config" || arg === "-c") { opts.config = next(); continue; }
    if (arg === "--log-level") {
      const level = next();
      if (!isLogLevel(level)) {
        throw new CliUsageError(`invalid log level "${level}". Must be one of: debug, info, warn, error, fatal`);
      }
      opts.logLevel = level;
      continue;
    }
    if (arg.startsWith("-")) throw new CliUsageError(`unknown option "${arg}"`);
    if (opts.command !== null) throw new CliUsageError(`unexpected argument "${arg}"`);
    if (arg !== "run" && arg !== "cycle" && arg !== "status") {
      throw new CliUsageError(`unknown command "${arg}"`);
    }
    opts.command = arg;
  }
  return opts;
}

// ── Status output ─────────────────────────────────────────────────

export function renderStatusSummary(records: readonly UnitStatusRecord[]): string {
  if (records.length === 0) return "No units recorded.";
  const counts = Object.values(UnitStatus)
    .map((s) => `${s}: ${records.filter((r) => r.status === s).length}`)
    .join("  ");
  const width = Math.max(4, ...records.map((r) => r.name.length));
  const rows = records.map(
    (r) => `${r.name.padEnd(width)}  ${r.status.padEnd(9)}  ${r.currentStage.padEnd(22)}  ${r.remark}`,
  );
  return [counts, "", ...rows].join("\n");
}

// ── Commands ──────────────────────────────────────────────────────

async function execute(opts: CliOptions): Promise<number> {
  const config = await loadConfig({ path: opts.config, logLevel: opts.logLevel });

  if (opts.command === "status") {
    const records = await new StatusStore(config.statusFile).load();
    process.stdout.write(renderStatusSummary(records) + "\n");
    return 0;
  }

  const { controller, logger } = createRuntime(config);

  if (opts.command === "cycle") {
    const outcome = await controller.runCycle();
    logger.info("Cycle complete", { ...outcome });
    return 0;
  }

  // Fail fast on an unreadable status table before entering the loop.
  await controller.snapshot();

  const abort = new AbortController();
  const stop = (signal: string) => {
    logger.info(`Shutting down: ${signal}`);
    abort.abort();
  };
  process.on("SIGTERM", () => stop("SIGTERM"));
  process.on("SIGINT", () => stop("SIGINT"));

  logger.info("phosflow started", {
    sourceDir: config.sourceDir,
    resultsDir: config.resultsDir,
    maxConcurrent: config.maxConcurrent,
    pollInterval: formatDuration(config.pollIntervalMs),
    webhook: config.alert.webhookUrl !== null,
  });
  const end = await runLoop(controller, new IntervalTicker(config.pollIntervalMs), abort.signal, logger);
  logger.info("phosflow stopped", { reason: end });
  return end === "halted" ? 1 : 0;
}

export async function main(argv: readonly string[]): Promise<number> {
  let opts: CliOptions;
  try {
    opts = parseCliArgs(argv);
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\nRun 'phosflow --help' for usage.\n`);
    return 1;
  }
  if (opts.version && !opts.help) {
    process.stdout.write(`phosflow ${VERSION}\n`);
    return 0;
  }
  if (opts.help || opts.command === null) {
    process.stdout.write(HELP_TEXT + "\n");
    return opts.help ? 0 : 1;
  }
  try {
    return await execute(opts);
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`);
    return 1;
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (script === undefined) return false;
  try {
    return realpathSync(script) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2)).then(
    (code) => process.exit(code),
    (err: unknown) => {
      process.stderr.write(`Error: ${errorMessage(err)}\n`);
      process.exit(1);
    },
  );
}
