import { execFile } from "node:child_process";
import { mkdir, unlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { Effect } from "effect";
import { runEffectPromise, withTimeout } from "../core/effect-concurrency.js";
import type { Logger } from "../core/observability.js";
import type { JobsConfig } from "../config/types.js";
import { MARKERS } from "../pipeline/types.js";
import { errorMessage } from "../types/index.js";
import { JobSubmissionError } from "./job-adapter.js";
import type { ExternalJobAdapter, JobSpec } from "./job-adapter.js";
import { renderTemplate } from "./template.js";

/** Scheduler script for a job; its presence in the stage directory is the submission record. */
export function renderSlurmScript(spec: JobSpec, config: JobsConfig): Promise<string> {
  const common = {
    job_name: spec.jobName,
    input_file: spec.inputFile,
    nproc: String(config.nproc),
    partition: config.partition,
  };
  switch (spec.program) {
    case "gaussian":
      return renderTemplate("gaussian.slurm", {
        ...common,
        environment: config.gaussian.environment,
        scratch_root: config.gaussian.scratch,
      });
    case "orca":
      return renderTemplate("orca.slurm", {
        ...common,
        environment: config.orca.environment,
        scratch_root: config.orca.scratch,
        orca_executable: config.orca.executable,
      });
    case "momap":
      return renderTemplate("momap.slurm", {
        ...common,
        environment: config.momap.environment,
      });
  }
}

function runCommand(
  command: string,
  args: readonly string[],
  cwd: string,
  jobName: string,
): Effect.Effect<string, JobSubmissionError> {
  return Effect.async<string, JobSubmissionError>((resume) => {
    const child = execFile(command, [...args], { cwd }, (err, stdout, stderr) => {
      if (err) {
        const detail = stderr.trim() || err.message;
        resume(
          Effect.fail(
            new JobSubmissionError(`${command} failed for ${jobName}: ${detail}`, jobName, {
              cause: err,
            }),
          ),
        );
        return;
      }
      resume(Effect.succeed(stdout));
    });
    return Effect.sync(() => {
      child.kill();
    });
  });
}

/** The submit command outlived its timeout; the job may or may not be queued. */
class SubmissionTimeout extends Error {
  constructor(readonly timeoutMs: number) {
    super(`submit command timed out after ${timeoutMs}ms`);
    this.name = "SubmissionTimeout";
  }
}

export interface SlurmJobAdapterOptions {
  config: JobsConfig;
  logger: Logger;
}

/**
 * Writes the job input and `run.slurm` into the stage directory and calls
 * the submit command (`sbatch` by default) from there. When the command
 * fails the script is removed again so the stage is not mistaken for a
 * queued one. A timeout leaves it in place: the job may already be queued,
 * and a second submission would duplicate it.
 */
export class SlurmJobAdapter implements ExternalJobAdapter {
  private readonly config: JobsConfig;
  private readonly logger: Logger;

  constructor(options: SlurmJobAdapterOptions) {
    this.config = options.config;
    this.logger = options.logger;
  }

  async submit(spec: JobSpec): Promise<void> {
    await mkdir(spec.directory, { recursive: true });
    await writeFile(join(spec.directory, spec.inputFile), spec.input, "utf-8");

    const scriptPath = join(spec.directory, MARKERS.submission);
    await writeFile(scriptPath, await renderSlurmScript(spec, this.config), "utf-8");

    const [command, ...args] = this.config.submitCommand.trim().split(/\s+/);
    if (command === undefined || command === "") {
      await unlink(scriptPath).catch(() => undefined);
      throw new JobSubmissionError("submit command is empty", spec.jobName);
    }

    try {
      const output = await runEffectPromise(
        withTimeout(
          runCommand(command, [...args, MARKERS.submission], spec.directory, spec.jobName),
          this.config.submitTimeoutMs,
          () => new SubmissionTimeout(this.config.submitTimeoutMs),
        ),
      );
      this.logger.info("Job submitted", {
        unit: spec.unit,
        stage: spec.stage,
        step: spec.step,
        job: spec.jobName,
        output: output.trim(),
      });
    } catch (err) {
      if (err instanceof SubmissionTimeout) {
        this.logger.warn("Submit command timed out, treating the job as submitted", {
          unit: spec.unit,
          stage: spec.stage,
          job: spec.jobName,
          timeoutMs: err.timeoutMs,
        });
        return;
      }
      await unlink(scriptPath).catch(() => undefined);
      if (err instanceof JobSubmissionError) throw err;
      throw new JobSubmissionError(
        `Submission of ${spec.jobName} failed: ${errorMessage(err)}`,
        spec.jobName,
        { cause: err },
      );
    }
  }
}
