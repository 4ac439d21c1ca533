import type { LogLevel } from "../core/observability.js";
import type { GeometryStageId } from "../pipeline/types.js";

export type MomapValue = string | number;
export type MomapParams = Readonly<Record<string, MomapValue>>;

export interface GaussianJobConfig {
  readonly memory: string;
  readonly scratch: string;
  /** Shell lines run before g16, e.g. `module load gaussian/16`. */
  readonly environment: string;
  readonly routes: Readonly<Record<GeometryStageId, string>>;
}

export interface OrcaJobConfig {
  readonly executable: string;
  readonly scratch: string;
  readonly environment: string;
  readonly keywords: string;
  /** MB per process. */
  readonly maxcore: number;
  readonly heavyMetals: readonly string[];
  readonly heavyMetalBasis: string;
}

export interface MomapJobConfig {
  readonly environment: string;
  readonly common: MomapParams;
  readonly kr: MomapParams;
  readonly kisc: MomapParams;
  readonly kic: MomapParams;
}

export interface JobsConfig {
  readonly partition: string;
  readonly nproc: number;
  readonly submitCommand: string;
  readonly submitTimeoutMs: number;
  readonly gaussian: GaussianJobConfig;
  readonly orca: OrcaJobConfig;
  readonly momap: MomapJobConfig;
}

export interface AutoExitConfig {
  readonly enabled: boolean;
  readonly idleCycles: number;
}

export interface AlertConfig {
  readonly webhookUrl: string | null;
  readonly timeoutMs: number;
}

export interface RecoveryConfig {
  /** Wall-clock budget under which a rejected geometry is retried. */
  readonly geometryRetryBudgetMs: number;
  /** cm-1; either reorganization energy above this rejects the overlap. */
  readonly reorganizationThreshold: number;
  readonly maxErrorRetries: number;
}

export interface PipelineConfig {
  readonly sourceDir: string;
  readonly resultsDir: string;
  readonly statusFile: string;
  readonly maxConcurrent: number;
  readonly pollIntervalMs: number;
  readonly stallTimeoutMs: number;
  readonly autoExit: AutoExitConfig;
  readonly alert: AlertConfig;
  readonly recovery: RecoveryConfig;
  /** Kelvin, used by the yield analysis. */
  readonly temperature: number;
  readonly logLevel: LogLevel;
  readonly jobs: JobsConfig;
}
