// Configuration
export { DEFAULT_CONFIG } from "./config/defaults.js";
export { ConfigParseError, parsePipelineConfig } from "./config/parser.js";
export { applyEnvOverrides, loadConfig } from "./config/loader.js";
export { formatDuration, parseDuration } from "./config/duration.js";
export type * from "./config/types.js";

// Pipeline
export { PipelineEngine } from "./pipeline/engine.js";
export type { EngineSettings, PipelineEngineOptions } from "./pipeline/engine.js";
export { FsArtifactProbe } from "./pipeline/artifact-probe.js";
export type { ArtifactProbe, ReorganizationReading } from "./pipeline/artifact-probe.js";
export { UnitLayout } from "./pipeline/layout.js";
export { FatalErrorLog } from "./pipeline/fatal-log.js";
export { StageGate, STAGE_DEPENDENCIES } from "./pipeline/stage-gate.js";
export { UnitStateStore, initialUnitState } from "./pipeline/unit-state-store.js";
export { analyzeUnit, computeYield, renderReport } from "./pipeline/analysis.js";
export type { AnalysisResult, YieldResult } from "./pipeline/analysis.js";
export * from "./pipeline/types.js";

// Jobs
export { SlurmJobAdapter, renderSlurmScript } from "./jobs/slurm-adapter.js";
export { JobSubmissionError } from "./jobs/job-adapter.js";
export type { ExternalJobAdapter, JobSpec } from "./jobs/job-adapter.js";

// Batch
export { BatchController } from "./batch/controller.js";
export type { CycleOutcome, DriverFactory, UnitDriver } from "./batch/controller.js";
export { StatusStore, UnitStatus } from "./batch/status-store.js";
export type { UnitStatusRecord } from "./batch/status-store.js";
export { LogAlertSink, WebhookAlertSink, createAlertSink } from "./batch/alert-sink.js";
export type { Alert, AlertSink } from "./batch/alert-sink.js";
export { IntervalTicker, ManualTicker, runLoop } from "./batch/scheduler.js";
export type { Ticker } from "./batch/scheduler.js";

// Runtime
export { createRuntime } from "./runtime.js";
export { Logger, silentLogger } from "./core/observability.js";
