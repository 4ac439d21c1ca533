import type { StageId } from "../pipeline/types.js";

export type JobProgram = "gaussian" | "orca" | "momap";

/** Which sub-job of a stage is being submitted. */
export type JobStep = "opt" | "freq" | "soc" | "overlap" | "rate";

export interface JobSpec {
  unit: string;
  stage: StageId;
  step: JobStep;
  program: JobProgram;
  /** Stage directory; the job runs with it as working directory. */
  directory: string;
  jobName: string;
  /** Input file name inside `directory`. */
  inputFile: string;
  input: string;
}

/**
 * Renders the scheduler script for a job and hands it to the cluster.
 * Fire-and-forget: completion is observed later through marker files.
 */
export interface ExternalJobAdapter {
  submit(spec: JobSpec): Promise<void>;
}

export class JobSubmissionError extends Error {
  constructor(
    message: string,
    readonly jobName: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "JobSubmissionError";
  }
}
