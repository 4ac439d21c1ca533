import YAML from "yaml";
import { isLogLevel } from "../core/observability.js";
import type { LogLevel } from "../core/observability.js";
import { GEOMETRY_PAIRS } from "../pipeline/types.js";
import type { GeometryStageId } from "../pipeline/types.js";
import { DEFAULT_CONFIG } from "./defaults.js";
import { parseDuration } from "./duration.js";
import type {
  AlertConfig,
  AutoExitConfig,
  GaussianJobConfig,
  JobsConfig,
  MomapJobConfig,
  MomapParams,
  MomapValue,
  OrcaJobConfig,
  PipelineConfig,
  RecoveryConfig,
} from "./types.js";

const MAX_YAML_SIZE = 256 * 1024;

export type Environment = Readonly<Record<string, string | undefined>>;

export class ConfigParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigParseError";
  }
}

// ---------------------------------------------------------------------------
// Field helpers
// ---------------------------------------------------------------------------

type Section = Record<string, unknown>;

function assertObject(value: unknown, field: string): asserts value is Section {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new ConfigParseError(`"${field}" must be an object`);
  }
}

function section(parent: Section, key: string, prefix: string): Section {
  const value = parent[key];
  if (value === undefined || value === null) return {};
  assertObject(value, `${prefix}${key}`);
  return value;
}

function stringField(obj: Section, key: string, field: string, fallback: string): string {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== "string" || value === "") {
    throw new ConfigParseError(`"${field}" must be a non-empty string`);
  }
  return value;
}

function numberField(
  obj: Section,
  key: string,
  field: string,
  fallback: number,
  opts: { integer?: boolean; min?: number } = {},
): number {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigParseError(`"${field}" must be a number`);
  }
  if (opts.integer && !Number.isInteger(value)) {
    throw new ConfigParseError(`"${field}" must be an integer (got ${value})`);
  }
  if (opts.min !== undefined && value < opts.min) {
    throw new ConfigParseError(`"${field}" must be >= ${opts.min} (got ${value})`);
  }
  return value;
}

function booleanField(obj: Section, key: string, field: string, fallback: boolean): boolean {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== "boolean") {
    throw new ConfigParseError(`"${field}" must be a boolean`);
  }
  return value;
}

/** Accepts `"48h"`-style strings or a number of milliseconds. */
function durationField(obj: Section, key: string, field: string, fallback: number): number {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value === "number" && Number.isFinite(value) && value > 0) return value;
  if (typeof value === "string") {
    try {
      return parseDuration(value);
    } catch {
      throw new ConfigParseError(`"${field}" is not a valid duration: "${value}"`);
    }
  }
  throw new ConfigParseError(`"${field}" must be a duration like "5m" or "48h"`);
}

function stringListField(
  obj: Section,
  key: string,
  field: string,
  fallback: readonly string[],
): readonly string[] {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (!Array.isArray(value)) {
    throw new ConfigParseError(`"${field}" must be an array of strings`);
  }
  const out: string[] = [];
  for (const item of value) {
    if (typeof item !== "string") {
      throw new ConfigParseError(`"${field}" must contain only strings`);
    }
    out.push(item);
  }
  return out;
}

export function expandEnvString(value: string, field: string, env: Environment): string {
  return value.replace(/\$\{([A-Z0-9_]+)\}/g, (_m, name: string) => {
    const v = env[name];
    if (v === undefined) {
      throw new ConfigParseError(`Env var \${${name}} referenced in ${field} is not set`);
    }
    return v;
  });
}

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

function parseAutoExit(doc: Section): AutoExitConfig {
  const obj = section(doc, "auto_exit", "");
  const base = DEFAULT_CONFIG.autoExit;
  return {
    enabled: booleanField(obj, "enabled", "auto_exit.enabled", base.enabled),
    idleCycles: numberField(obj, "idle_cycles", "auto_exit.idle_cycles", base.idleCycles, {
      integer: true,
      min: 1,
    }),
  };
}

function parseAlert(doc: Section, env: Environment): AlertConfig {
  const obj = section(doc, "alert", "");
  const base = DEFAULT_CONFIG.alert;
  const url = obj["webhook_url"];
  let webhookUrl = base.webhookUrl;
  if (url !== undefined && url !== null && url !== "") {
    if (typeof url !== "string") {
      throw new ConfigParseError(`"alert.webhook_url" must be a string`);
    }
    webhookUrl = expandEnvString(url, "alert.webhook_url", env);
  }
  return {
    webhookUrl,
    timeoutMs: durationField(obj, "timeout", "alert.timeout", base.timeoutMs),
  };
}

function parseRecovery(doc: Section): RecoveryConfig {
  const obj = section(doc, "recovery", "");
  const base = DEFAULT_CONFIG.recovery;
  return {
    geometryRetryBudgetMs: durationField(
      obj,
      "geometry_retry_budget",
      "recovery.geometry_retry_budget",
      base.geometryRetryBudgetMs,
    ),
    reorganizationThreshold: numberField(
      obj,
      "reorganization_threshold",
      "recovery.reorganization_threshold",
      base.reorganizationThreshold,
      { min: 0 },
    ),
    maxErrorRetries: numberField(
      obj,
      "max_error_retries",
      "recovery.max_error_retries",
      base.maxErrorRetries,
      { integer: true, min: 0 },
    ),
  };
}

const GEOMETRY_STAGE_IDS: readonly GeometryStageId[] = GEOMETRY_PAIRS.flatMap((p) => [
  p.opt,
  p.freq,
]);

function parseGaussian(jobs: Section, env: Environment): GaussianJobConfig {
  const obj = section(jobs, "gaussian", "jobs.");
  const base = DEFAULT_CONFIG.jobs.gaussian;
  const routesObj = section(obj, "routes", "jobs.gaussian.");
  const routes: Record<GeometryStageId, string> = { ...base.routes };
  for (const id of GEOMETRY_STAGE_IDS) {
    routes[id] = stringField(routesObj, id, `jobs.gaussian.routes.${id}`, base.routes[id]);
  }
  for (const key of Object.keys(routesObj)) {
    if (!GEOMETRY_STAGE_IDS.some((id) => id === key)) {
      throw new ConfigParseError(
        `"jobs.gaussian.routes.${key}" is not a geometry stage. Valid stages: ${GEOMETRY_STAGE_IDS.join(", ")}`,
      );
    }
  }
  return {
    memory: stringField(obj, "memory", "jobs.gaussian.memory", base.memory),
    scratch: expandEnvString(
      stringField(obj, "scratch", "jobs.gaussian.scratch", base.scratch),
      "jobs.gaussian.scratch",
      env,
    ),
    environment: stringField(obj, "environment", "jobs.gaussian.environment", base.environment),
    routes,
  };
}

function parseOrca(jobs: Section, env: Environment): OrcaJobConfig {
  const obj = section(jobs, "orca", "jobs.");
  const base = DEFAULT_CONFIG.jobs.orca;
  return {
    executable: expandEnvString(
      stringField(obj, "executable", "jobs.orca.executable", base.executable),
      "jobs.orca.executable",
      env,
    ),
    scratch: expandEnvString(
      stringField(obj, "scratch", "jobs.orca.scratch", base.scratch),
      "jobs.orca.scratch",
      env,
    ),
    environment: stringField(obj, "environment", "jobs.orca.environment", base.environment),
    keywords: stringField(obj, "keywords", "jobs.orca.keywords", base.keywords),
    maxcore: numberField(obj, "maxcore", "jobs.orca.maxcore", base.maxcore, {
      integer: true,
      min: 1,
    }),
    heavyMetals: stringListField(obj, "heavy_metals", "jobs.orca.heavy_metals", base.heavyMetals),
    heavyMetalBasis: stringField(
      obj,
      "heavy_metal_basis",
      "jobs.orca.heavy_metal_basis",
      base.heavyMetalBasis,
    ),
  };
}

/** Keys given in the file are laid over the defaults, key by key. */
function parseMomapParams(obj: Section, key: string, base: MomapParams): MomapParams {
  const layer = section(obj, key, "jobs.momap.");
  const merged: Record<string, MomapValue> = { ...base };
  for (const [name, value] of Object.entries(layer)) {
    if (typeof value === "string" || (typeof value === "number" && Number.isFinite(value))) {
      merged[name] = value;
    } else if (typeof value === "boolean") {
      merged[name] = value ? ".t." : ".f.";
    } else {
      throw new ConfigParseError(`"jobs.momap.${key}.${name}" must be a string, number or boolean`);
    }
  }
  return merged;
}

function parseMomap(jobs: Section): MomapJobConfig {
  const obj = section(jobs, "momap", "jobs.");
  const base = DEFAULT_CONFIG.jobs.momap;
  return {
    environment: stringField(obj, "environment", "jobs.momap.environment", base.environment),
    common: parseMomapParams(obj, "common", base.common),
    kr: parseMomapParams(obj, "kr", base.kr),
    kisc: parseMomapParams(obj, "kisc", base.kisc),
    kic: parseMomapParams(obj, "kic", base.kic),
  };
}

function parseJobs(doc: Section, env: Environment): JobsConfig {
  const obj = section(doc, "jobs", "");
  const base = DEFAULT_CONFIG.jobs;
  return {
    partition: stringField(obj, "partition", "jobs.partition", base.partition),
    nproc: numberField(obj, "nproc", "jobs.nproc", base.nproc, { integer: true, min: 1 }),
    submitCommand: stringField(obj, "submit_command", "jobs.submit_command", base.submitCommand),
    submitTimeoutMs: durationField(obj, "submit_timeout", "jobs.submit_timeout", base.submitTimeoutMs),
    gaussian: parseGaussian(obj, env),
    orca: parseOrca(obj, env),
    momap: parseMomap(obj),
  };
}

function parseLogLevel(doc: Section): LogLevel {
  const value = doc["log_level"];
  if (value === undefined) return DEFAULT_CONFIG.logLevel;
  if (typeof value !== "string" || !isLogLevel(value)) {
    throw new ConfigParseError(
      `"log_level" must be one of: debug, info, warn, error, fatal (got "${String(value)}")`,
    );
  }
  return value;
}

function pathField(doc: Section, key: string, fallback: string, env: Environment): string {
  return expandEnvString(stringField(doc, key, key, fallback), key, env);
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/**
 * Parse YAML content into a validated PipelineConfig. Absent keys take
 * their defaults; `${VAR}` in path fields is expanded from `env`.
 */
export function parsePipelineConfig(
  yamlContent: string,
  env: Environment = process.env,
): PipelineConfig {
  if (yamlContent.length > MAX_YAML_SIZE) {
    throw new ConfigParseError(
      `YAML content too large: ${yamlContent.length} bytes (max ${MAX_YAML_SIZE})`,
    );
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(yamlContent);
  } catch (e) {
    throw new ConfigParseError(`Invalid YAML: ${e instanceof Error ? e.message : String(e)}`);
  }

  // an empty file means "all defaults"
  if (parsed === null || parsed === undefined) parsed = {};
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigParseError("Config YAML must be an object");
  }
  const doc: Section = { ...parsed };
  const base = DEFAULT_CONFIG;

  return {
    sourceDir: pathField(doc, "source_dir", base.sourceDir, env),
    resultsDir: pathField(doc, "results_dir", base.resultsDir, env),
    statusFile: pathField(doc, "status_file", base.statusFile, env),
    maxConcurrent: numberField(doc, "max_concurrent", "max_concurrent", base.maxConcurrent, {
      integer: true,
      min: 1,
    }),
    pollIntervalMs: durationField(doc, "poll_interval", "poll_interval", base.pollIntervalMs),
    stallTimeoutMs: durationField(doc, "stall_timeout", "stall_timeout", base.stallTimeoutMs),
    autoExit: parseAutoExit(doc),
    alert: parseAlert(doc, env),
    recovery: parseRecovery(doc),
    temperature: numberField(doc, "temperature", "temperature", base.temperature, { min: 1 }),
    logLevel: parseLogLevel(doc),
    jobs: parseJobs(doc, env),
  };
}
