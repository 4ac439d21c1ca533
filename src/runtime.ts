import { Logger } from "./core/observability.js";
import type { LogWriter } from "./core/observability.js";
import type { PipelineConfig } from "./config/types.js";
import type { ExternalJobAdapter } from "./jobs/job-adapter.js";
import { SlurmJobAdapter } from "./jobs/slurm-adapter.js";
import { FsArtifactProbe } from "./pipeline/artifact-probe.js";
import type { ArtifactProbe } from "./pipeline/artifact-probe.js";
import { PipelineEngine } from "./pipeline/engine.js";
import { createAlertSink } from "./batch/alert-sink.js";
import type { AlertSink } from "./batch/alert-sink.js";
import { BatchController } from "./batch/controller.js";
import { StatusStore } from "./batch/status-store.js";
import type { Clock } from "./types/index.js";

export interface RuntimeOverrides {
  jobs?: ExternalJobAdapter;
  alerts?: AlertSink;
  probe?: ArtifactProbe;
  clock?: Clock;
  logWriter?: LogWriter;
}

export interface Runtime {
  config: PipelineConfig;
  logger: Logger;
  store: StatusStore;
  controller: BatchController;
}

/** Wire the production collaborators; tests replace any of them. */
export function createRuntime(config: PipelineConfig, overrides: RuntimeOverrides = {}): Runtime {
  const logger = new Logger("phosflow", config.logLevel, overrides.logWriter);
  const probe = overrides.probe ?? new FsArtifactProbe();
  const jobs =
    overrides.jobs ??
    new SlurmJobAdapter({ config: config.jobs, logger: logger.child("slurm") });
  const alerts = overrides.alerts ?? createAlertSink(config.alert, logger.child("alert"));
  const store = new StatusStore(config.statusFile);
  const engineLogger = logger.child("pipeline");

  const controller = new BatchController({
    settings: config,
    store,
    probe,
    alerts,
    logger: logger.child("batch"),
    clock: overrides.clock,
    createDriver: (layout) =>
      new PipelineEngine({
        layout,
        probe,
        jobs,
        settings: config,
        logger: engineLogger,
        clock: overrides.clock,
      }),
  });

  return { config, logger, store, controller };
}
