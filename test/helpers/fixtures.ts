import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { Alert, AlertSink } from "../../src/batch/alert-sink.js";
import { Logger } from "../../src/core/observability.js";
import type { LogEntry, LogLevel } from "../../src/core/observability.js";
import type { ExternalJobAdapter, JobSpec } from "../../src/jobs/job-adapter.js";
import { MARKERS } from "../../src/pipeline/types.js";
import type { Clock } from "../../src/types/index.js";

// ---------------------------------------------------------------------------
// Filesystem
// ---------------------------------------------------------------------------

export async function makeTempDir(prefix = "phosflow-test-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Write a file, creating parent directories. */
export async function put(path: string, content = ""): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, "utf-8");
}

/** Mark a job in `dir` as finished, the way the scheduler scripts do. */
export async function finishJob(dir: string): Promise<void> {
  await put(join(dir, MARKERS.completion));
}

// ---------------------------------------------------------------------------
// Program output builders
// ---------------------------------------------------------------------------

export type Coords = Array<[number, number, number]>;

export const SOURCE_XYZ = ["2", "test molecule", "C 0.0 0.0 0.0", "H 0.0 0.0 1.09", ""].join("\n");

export const OPTIMIZED_COORDS: Coords = [
  [0.0, 0.0, 0.0],
  [0.0, 0.0, 1.1],
];

export interface GaussianLogOptions {
  coords?: Coords;
  frequencies?: number[];
  energy?: number;
  /** Elapsed hours, written as one "Elapsed time" line. */
  hours?: number;
  terminated?: "normal" | "error";
}

export function gaussianLog(opts: GaussianLogOptions = {}): string {
  const lines = [" Entering Gaussian System, Link 0=g16"];
  lines.push(
    ` SCF Done:  E(RTPSSh) =  ${(opts.energy ?? -100.5).toFixed(8)}     A.U. after   11 cycles`,
  );
  lines.push(
    "                         Standard orientation:",
    " ---------------------------------------------------------------------",
    " Center     Atomic      Atomic             Coordinates (Angstroms)",
    " Number     Number       Type             X           Y           Z",
    " ---------------------------------------------------------------------",
  );
  (opts.coords ?? OPTIMIZED_COORDS).forEach(([x, y, z], i) => {
    lines.push(
      `      ${i + 1}          6           0        ${x.toFixed(6)}    ${y.toFixed(6)}    ${z.toFixed(6)}`,
    );
  });
  lines.push(" ---------------------------------------------------------------------");
  if (opts.frequencies) {
    lines.push(` Frequencies --  ${opts.frequencies.map((f) => f.toFixed(4)).join("  ")}`);
  }
  lines.push(` Elapsed time:       0 days  ${opts.hours ?? 1} hours  0 minutes  0.0 seconds.`);
  lines.push(
    opts.terminated === "error"
      ? " Error termination via Lnk1e in /opt/g16/l9999.exe"
      : " Normal termination of Gaussian 16 at Mon Jan  1 00:00:00 2024.",
  );
  return lines.join("\n") + "\n";
}

export function reorganizationText(a: number, b: number): string {
  return ` Total reorganization energy      (cm-1):     ${a.toFixed(2)}     ${b.toFixed(2)}\n`;
}

// ---------------------------------------------------------------------------
// Fakes
// ---------------------------------------------------------------------------

/**
 * Records every job and writes its input and `run.slurm`, so the next
 * cycle sees a submitted job.
 */
export class FakeJobAdapter implements ExternalJobAdapter {
  readonly specs: JobSpec[] = [];
  failWith: Error | null = null;

  async submit(spec: JobSpec): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.specs.push(spec);
    await put(join(spec.directory, spec.inputFile), spec.input);
    await put(join(spec.directory, MARKERS.submission), "#!/bin/bash\n");
  }

  last(): JobSpec | undefined {
    return this.specs[this.specs.length - 1];
  }
}

export class RecordingAlertSink implements AlertSink {
  readonly alerts: Alert[] = [];
  failWith: Error | null = null;

  async send(alert: Alert): Promise<void> {
    this.alerts.push(alert);
    if (this.failWith) throw this.failWith;
  }
}

export interface CapturedLogger {
  logger: Logger;
  lines: string[];
  entries(): LogEntry[];
}

export function captureLogger(component = "test", level: LogLevel = "debug"): CapturedLogger {
  const lines: string[] = [];
  const logger = new Logger(component, level, (line) => {
    lines.push(line);
  });
  return {
    logger,
    lines,
    entries: () =>
      lines.map((line) => {
        const entry: LogEntry = JSON.parse(line);
        return entry;
      }),
  };
}

/** A clock the test moves by hand. */
export class ManualClock {
  constructor(public current: number) {}

  readonly now: Clock = () => this.current;

  advanceHours(hours: number): void {
    this.current += hours * 3_600_000;
  }
}

/** 2024-01-01 00:00:00 local time. */
export const T0 = new Date(2024, 0, 1, 0, 0, 0).getTime();
