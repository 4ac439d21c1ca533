import { readFile } from "node:fs/promises";
import { isLogLevel } from "../core/observability.js";
import type { LogLevel } from "../core/observability.js";
import { errorMessage } from "../types/index.js";
import { parseDuration } from "./duration.js";
import { ConfigParseError, parsePipelineConfig } from "./parser.js";
import type { Environment } from "./parser.js";
import type { PipelineConfig } from "./types.js";

export const ENV_PREFIX = "PHOSFLOW_";

function envInteger(env: Environment, name: string, min: number): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigParseError(`${name} must be an integer >= ${min} (got "${raw}")`);
  }
  return value;
}

function envDuration(env: Environment, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  try {
    return parseDuration(raw);
  } catch {
    throw new ConfigParseError(`${name} is not a valid duration: "${raw}"`);
  }
}

function envBoolean(env: Environment, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === "") return undefined;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  throw new ConfigParseError(`${name} must be a boolean (got "${env[name] ?? ""}")`);
}

function envString(env: Environment, name: string): string | undefined {
  const raw = env[name];
  return raw === undefined || raw === "" ? undefined : raw;
}

/** `PHOSFLOW_*` variables take precedence over the file. */
export function applyEnvOverrides(config: PipelineConfig, env: Environment): PipelineConfig {
  const logLevel = envString(env, `${ENV_PREFIX}LOG_LEVEL`);
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new ConfigParseError(`${ENV_PREFIX}LOG_LEVEL must be one of: debug, info, warn, error, fatal`);
  }
  return {
    ...config,
    sourceDir: envString(env, `${ENV_PREFIX}SOURCE_DIR`) ?? config.sourceDir,
    resultsDir: envString(env, `${ENV_PREFIX}RESULTS_DIR`) ?? config.resultsDir,
    statusFile: envString(env, `${ENV_PREFIX}STATUS_FILE`) ?? config.statusFile,
    maxConcurrent: envInteger(env, `${ENV_PREFIX}MAX_CONCURRENT`, 1) ?? config.maxConcurrent,
    pollIntervalMs: envDuration(env, `${ENV_PREFIX}POLL_INTERVAL`) ?? config.pollIntervalMs,
    stallTimeoutMs: envDuration(env, `${ENV_PREFIX}STALL_TIMEOUT`) ?? config.stallTimeoutMs,
    autoExit: {
      enabled: envBoolean(env, `${ENV_PREFIX}AUTO_EXIT`) ?? config.autoExit.enabled,
      idleCycles: envInteger(env, `${ENV_PREFIX}IDLE_CYCLES`, 1) ?? config.autoExit.idleCycles,
    },
    alert: {
      ...config.alert,
      webhookUrl: envString(env, `${ENV_PREFIX}WEBHOOK_URL`) ?? config.alert.webhookUrl,
    },
    logLevel: logLevel ?? config.logLevel,
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export interface LoadConfigOptions {
  /** YAML file; when omitted only defaults and the environment apply. */
  path?: string;
  env?: Environment;
  /** Command-line level; wins over the file and the environment. */
  logLevel?: LogLevel;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<PipelineConfig> {
  const env = options.env ?? process.env;
  let yaml = "";
  if (options.path !== undefined) {
    try {
      yaml = await readFile(options.path, "utf-8");
    } catch (err) {
      throw new ConfigParseError(`Cannot read config ${options.path}: ${errorMessage(err)}`);
    }
  }
  const config = applyEnvOverrides(parsePipelineConfig(yaml, env), env);
  return deepFreeze(
    options.logLevel === undefined ? config : { ...config, logLevel: options.logLevel },
  );
}
