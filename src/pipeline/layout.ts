import { join } from "node:path";
import {
  FATAL_LOG_FILE,
  REPORT_FILE,
  UNIT_STATE_FILE,
  stageDefinition,
} from "./types.js";
import type { StageId } from "./types.js";

/** File locations for one unit's working tree. */
export class UnitLayout {
  readonly root: string;

  constructor(
    readonly unit: string,
    resultsDir: string,
    readonly sourcePath: string,
  ) {
    this.root = join(resultsDir, unit);
  }

  stageDir(id: StageId): string {
    return join(this.root, stageDefinition(id).directory);
  }

  /** `<unit>_<stage>`; the job name and the stem of its input and log. */
  jobName(id: StageId): string {
    return `${this.unit}_${id}`;
  }

  stageFile(id: StageId, ext: string): string {
    return join(this.stageDir(id), `${this.jobName(id)}.${ext}`);
  }

  gaussianLog(id: StageId): string {
    return this.stageFile(id, "log");
  }

  checkpoint(id: StageId): string {
    return this.stageFile(id, "chk");
  }

  formattedCheckpoint(id: StageId): string {
    return this.stageFile(id, "fchk");
  }

  socOutput(): string {
    return this.stageFile("soc", "out");
  }

  get fatalLog(): string {
    return join(this.root, FATAL_LOG_FILE);
  }

  get report(): string {
    return join(this.root, REPORT_FILE);
  }

  get stateFile(): string {
    return join(this.root, UNIT_STATE_FILE);
  }
}
