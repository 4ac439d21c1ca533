import { join } from "node:path";
import { writeFileAtomic } from "../core/atomic-write.js";
import type { Logger } from "../core/observability.js";
import type { PipelineConfig } from "../config/types.js";
import {
  frequencyRoute,
  renderGaussianInput,
  renderOrcaInput,
  renderOverlapInput,
  renderRateInput,
  strictConvergenceRoute,
} from "../jobs/inputs.js";
import type { RateInput } from "../jobs/inputs.js";
import type { ExternalJobAdapter, JobSpec } from "../jobs/job-adapter.js";
import { errorMessage, now } from "../types/index.js";
import type { Clock } from "../types/index.js";
import { analyzeUnit, renderReport } from "./analysis.js";
import type { ArtifactProbe } from "./artifact-probe.js";
import { FatalErrorLog } from "./fatal-log.js";
import type { UnitLayout } from "./layout.js";
import {
  finalCoordinates,
  mergeGeometry,
  orcaSocConstant,
  orcaTransitionDipole,
  parseXyz,
} from "./log-parsers.js";
import type { Atom } from "./log-parsers.js";
import { MarkerWriter } from "./markers.js";
import { StageGate } from "./stage-gate.js";
import {
  classifyJob,
  classifyOverlap,
  evaluateReorganization,
  nextJobTransition,
  nextOverlapTransition,
} from "./transitions.js";
import type { JobAction, JobEvent, JobObservation, Transition } from "./transitions.js";
import {
  BRANCH_IDS,
  GEOMETRY_PAIRS,
  MARKERS,
  OVERLAP_ERROR_LOG,
  OverlapState,
  RATE_LOGS,
  STAGE_IDS,
  StageState,
  geometryPairOf,
  isBranch,
  labelForRank,
  stageDefinition,
} from "./types.js";
import type {
  AdvanceResult,
  BranchId,
  GeometryPair,
  GeometryStageId,
  StageId,
  UnitState,
} from "./types.js";
import { UnitStateStore, initialUnitState } from "./unit-state-store.js";

export type EngineSettings = Pick<PipelineConfig, "jobs" | "recovery" | "temperature">;

export interface PipelineEngineOptions {
  layout: UnitLayout;
  probe: ArtifactProbe;
  jobs: ExternalJobAdapter;
  settings: EngineSettings;
  logger: Logger;
  clock?: Clock;
  stateStore?: UnitStateStore;
  markers?: MarkerWriter;
  gate?: StageGate;
  fatalLog?: FatalErrorLog;
}

interface Cycle {
  state: UnitState;
  halted: boolean;
}

/** kic's rate job always reads the Cartesian artifact. */
const KIC_OVERLAP_ARTIFACT = "evc.cart.dat";
const OVERLAP_INPUT = "momap.inp";

/** Label rank reached once the given stage is READY. */
const MILESTONES: ReadonlyArray<[StageId, number]> = [
  ["s0_freq", 1],
  ["s1_freq", 2],
  ["t1_freq", 3],
  ["soc", 4],
  ["kr", 5],
  ["kisc", 6],
  ["kic", 7],
];
const REPORT_RANK = 8;

/**
 * Per-unit stage machine. Each call to {@link advance} observes the unit's
 * artifacts, looks the observation up in the transition tables and performs
 * at most one action per stage. Calling it again without new artifacts
 * changes nothing.
 */
export class PipelineEngine {
  readonly layout: UnitLayout;
  readonly fatalLog: FatalErrorLog;
  private readonly probe: ArtifactProbe;
  private readonly jobs: ExternalJobAdapter;
  private readonly settings: EngineSettings;
  private readonly logger: Logger;
  private readonly stateStore: UnitStateStore;
  private readonly markers: MarkerWriter;
  private readonly gate: StageGate;

  constructor(options: PipelineEngineOptions) {
    this.layout = options.layout;
    this.probe = options.probe;
    this.jobs = options.jobs;
    this.settings = options.settings;
    this.logger = options.logger.forUnit(options.layout.unit);
    this.stateStore = options.stateStore ?? new UnitStateStore();
    this.markers = options.markers ?? new MarkerWriter();
    this.gate = options.gate ?? new StageGate();
    this.fatalLog =
      options.fatalLog ?? new FatalErrorLog(options.layout.fatalLog, options.clock ?? now);
  }

  async advance(): Promise<AdvanceResult> {
    if (await this.fatalLog.exists()) {
      const saved = await this.stateStore.load(this.layout.stateFile, this.layout.unit);
      return { stageLabel: labelForRank(saved?.labelRank ?? 0), terminal: "fatal" };
    }

    const state = await this.loadState();
    const before = JSON.stringify(state);
    const cycle: Cycle = { state, halted: false };
    let reportExists = false;

    try {
      for (const id of STAGE_IDS) {
        if (cycle.halted) break;
        const rec = state.stages[id];
        if (rec.state === StageState.READY || rec.state === StageState.FATAL) continue;
        if (!this.gate.isEligible(id, (dep) => state.stages[dep].state)) continue;
        await this.step(cycle, id);
      }

      reportExists = await this.probe.exists(this.layout.report);
      if (!cycle.halted && !reportExists && this.allBranchesReady(state)) {
        await this.writeReport();
        reportExists = true;
      }

      state.labelRank = Math.max(state.labelRank, this.computeRank(state, reportExists));
    } finally {
      if (JSON.stringify(state) !== before) {
        await this.stateStore.save(this.layout.stateFile, state);
      }
    }

    let terminal: AdvanceResult["terminal"] = null;
    if (cycle.halted) terminal = "fatal";
    else if (reportExists) terminal = "completed";
    return { stageLabel: labelForRank(state.labelRank), terminal };
  }

  // ---------------------------------------------------------------------------
  // State reconciliation
  // ---------------------------------------------------------------------------

  /**
   * Load the typed state, or rebuild it from the marker files when the
   * state file is missing. Retry markers and overlap acceptance are folded
   * in either way.
   */
  private async loadState(): Promise<UnitState> {
    const state =
      (await this.stateStore.load(this.layout.stateFile, this.layout.unit)) ??
      initialUnitState(this.layout.unit);

    for (const pair of GEOMETRY_PAIRS) {
      if (await this.probe.hasGeometryRetry(this.layout.stageDir(pair.opt))) {
        state.stages[pair.opt].retried = true;
        state.stages[pair.freq].retried = true;
      }
    }
    for (const id of BRANCH_IDS) {
      const dir = this.layout.stageDir(id);
      const overlap = state.overlap[id];
      if (await this.probe.hasOverlapRetry(dir)) overlap.retried = true;
      if (overlap.state !== OverlapState.READY) {
        const accepted = await this.probe.acceptedOverlap(dir);
        if (accepted !== null) {
          overlap.state = OverlapState.READY;
          overlap.artifact = accepted;
        }
      }
    }
    return state;
  }

  private allBranchesReady(state: UnitState): boolean {
    return BRANCH_IDS.every((id) => state.stages[id].state === StageState.READY);
  }

  private computeRank(state: UnitState, reportExists: boolean): number {
    if (reportExists) return REPORT_RANK;
    let rank = 0;
    for (const [id, milestone] of MILESTONES) {
      if (state.stages[id].state === StageState.READY) rank = Math.max(rank, milestone);
    }
    return rank;
  }

  // ---------------------------------------------------------------------------
  // Dispatch
  // ---------------------------------------------------------------------------

  private async step(cycle: Cycle, id: StageId): Promise<void> {
    if (id === "soc") return this.stepSoc(cycle);
    if (isBranch(id)) return this.stepBranch(cycle, id);
    if (stageDefinition(id).kind === "opt") return this.stepOpt(cycle, id);
    return this.stepFreq(cycle, id);
  }

  private async fail(cycle: Cycle, stage: StageId, message: string): Promise<void> {
    cycle.halted = true;
    this.logger.error("Stage failed fatally", { stage, message });
    await this.fatalLog.append(message);
  }

  /**
   * Apply a job-stage transition. SUBMIT runs `submit`, which may itself
   * halt the cycle (e.g. when coordinates cannot be extracted).
   */
  private async applyJob(
    cycle: Cycle,
    id: StageId,
    transition: Transition<StageState, JobAction>,
    handlers: {
      submit: () => Promise<void>;
      fatalMessage: () => string;
      reset?: () => Promise<void>;
    },
  ): Promise<void> {
    const rec = cycle.state.stages[id];
    switch (transition.action) {
      case "NONE":
        rec.state = transition.next;
        return;
      case "SUBMIT":
        await handlers.submit();
        if (!cycle.halted) rec.state = transition.next;
        return;
      case "ACCEPT":
        this.logger.info("Stage accepted", { stage: id });
        rec.state = transition.next;
        return;
      case "RESET_FOR_RETRY":
        rec.state = transition.next;
        if (handlers.reset) await handlers.reset();
        return;
      case "MARK_FATAL":
        // The state only records FATAL once the fatal log is on disk.
        await this.fail(cycle, id, handlers.fatalMessage());
        rec.state = transition.next;
        return;
    }
  }

  private async observeJob(
    dir: string,
    inputsReady: () => Promise<boolean>,
    terminatedNormally: () => Promise<boolean>,
  ): Promise<JobObservation> {
    const completed = await this.probe.hasCompletion(dir);
    const submitted = completed ? true : await this.probe.hasSubmission(dir);
    return {
      completed,
      submitted,
      inputsReady: completed || submitted ? true : await inputsReady(),
      terminatedNormally: completed ? await terminatedNormally() : false,
    };
  }

  // ---------------------------------------------------------------------------
  // Geometry pairs
  // ---------------------------------------------------------------------------

  private async stepOpt(cycle: Cycle, id: GeometryStageId): Promise<void> {
    const pair = geometryPairOf(id);
    const log = this.layout.gaussianLog(id);
    const obs = await this.observeJob(
      this.layout.stageDir(id),
      () => this.optInputsReady(pair),
      () => this.probe.gaussianTerminatedNormally(log),
    );
    const event = classifyJob(obs);
    await this.applyJob(cycle, id, nextJobTransition(cycle.state.stages[id].state, event), {
      submit: () => this.submitOpt(cycle, pair),
      fatalMessage: () => `${id} terminated abnormally. Check log: ${log}`,
    });
  }

  private async optInputsReady(pair: GeometryPair): Promise<boolean> {
    if (pair.state === "s0") return this.probe.exists(this.layout.sourcePath);
    return this.probe.exists(this.layout.gaussianLog("s0_opt"));
  }

  private async submitOpt(cycle: Cycle, pair: GeometryPair): Promise<void> {
    const id = pair.opt;
    const atoms =
      pair.state === "s0"
        ? await this.sourceAtoms(cycle, id)
        : await this.optimizedAtoms(cycle, id, "s0_opt");
    if (atoms === null) return;

    const retried = cycle.state.stages[id].retried;
    const baseRoute = this.settings.jobs.gaussian.routes[id];
    const route = retried ? strictConvergenceRoute(baseRoute) : baseRoute;
    if (retried) this.logger.warn("Resubmitting with strict convergence", { stage: id, route });

    await this.submitGaussian(id, "opt", route, pair, atoms);
  }

  private async stepFreq(cycle: Cycle, id: GeometryStageId): Promise<void> {
    const pair = geometryPairOf(id);
    const rec = cycle.state.stages[id];
    const log = this.layout.gaussianLog(id);
    const obs = await this.observeJob(
      this.layout.stageDir(id),
      async () =>
        (await this.probe.exists(this.layout.checkpoint(pair.opt))) &&
        (await this.probe.exists(this.layout.gaussianLog(pair.opt))),
      () => this.probe.gaussianTerminatedNormally(log),
    );

    if (obs.completed && obs.terminatedNormally) {
      obs.validation = {
        imaginaryFrequencies: await this.probe.imaginaryFrequencies(log),
        retried: rec.retried,
        elapsedHours: await this.probe.elapsedHours(log),
        budgetHours: this.settings.recovery.geometryRetryBudgetMs / 3_600_000,
      };
    }
    const event = classifyJob(obs);
    if (obs.validation && obs.validation.imaginaryFrequencies.length > 0) {
      this.logger.warn("Imaginary frequencies found", {
        stage: id,
        frequencies: obs.validation.imaginaryFrequencies,
        elapsedHours: obs.validation.elapsedHours,
      });
    }

    await this.applyJob(cycle, id, nextJobTransition(rec.state, event), {
      submit: () => this.submitFreq(cycle, pair),
      fatalMessage: () => this.freqFatalMessage(pair, event, log, rec.retried),
      reset: () => this.retryGeometry(cycle, pair),
    });
  }

  private freqFatalMessage(
    pair: GeometryPair,
    event: JobEvent,
    log: string,
    retried: boolean,
  ): string {
    if (event === "ABNORMAL_TERMINATION") {
      return `${pair.freq} terminated abnormally. Check log: ${log}`;
    }
    const label = pair.state.toUpperCase();
    if (retried) {
      return `${label} failed convergence (imaginary frequency after retry).`;
    }
    const hours = this.settings.recovery.geometryRetryBudgetMs / 3_600_000;
    return `${label} imaginary frequency (time > ${hours}h).`;
  }

  private async submitFreq(cycle: Cycle, pair: GeometryPair): Promise<void> {
    const id = pair.freq;
    const atoms = await this.optimizedAtoms(cycle, id, pair.opt);
    if (atoms === null) return;
    await this.markers.copy(this.layout.checkpoint(pair.opt), this.layout.checkpoint(id));
    const route = frequencyRoute(this.settings.jobs.gaussian.routes[id]);
    await this.submitGaussian(id, "freq", route, pair, atoms);
  }

  /**
   * Reject the pair's result and start over with strict convergence: set the
   * retry marker, clear both stages' markers, move the logs aside, drop the
   * checkpoints, and resubmit the optimization right away.
   */
  private async retryGeometry(cycle: Cycle, pair: GeometryPair): Promise<void> {
    const optDir = this.layout.stageDir(pair.opt);
    await this.markers.touch(optDir, MARKERS.geometryRetry);
    for (const id of [pair.opt, pair.freq]) {
      const dir = this.layout.stageDir(id);
      await this.markers.clearJob(dir);
      await this.markers.backupLogs(dir, `${this.layout.unit}_`);
      await this.markers.deleteCheckpoints(dir);
      cycle.state.stages[id].retried = true;
      cycle.state.stages[id].state = StageState.VALIDATION_FAILED;
    }
    this.logger.warn("Geometry rejected, retrying once with strict convergence", {
      state: pair.state,
    });
    await this.stepOpt(cycle, pair.opt);
  }

  private async submitGaussian(
    id: GeometryStageId,
    step: "opt" | "freq",
    route: string,
    pair: GeometryPair,
    atoms: Atom[],
  ): Promise<void> {
    const jobName = this.layout.jobName(id);
    const { gaussian, nproc } = this.settings.jobs;
    await this.submit({
      stage: id,
      step,
      program: "gaussian",
      jobName,
      inputFile: `${jobName}.gjf`,
      input: renderGaussianInput({
        jobName,
        nproc,
        memory: gaussian.memory,
        route,
        charge: pair.charge,
        multiplicity: pair.multiplicity,
        atoms,
      }),
    });
  }

  private async sourceAtoms(cycle: Cycle, stage: StageId): Promise<Atom[] | null> {
    try {
      const text = await this.probe.readText(this.layout.sourcePath);
      if (text === null) throw new Error(`source structure not found: ${this.layout.sourcePath}`);
      return parseXyz(text);
    } catch (err) {
      await this.fail(cycle, stage, `Failed to extract coordinates for ${stage}: ${errorMessage(err)}`);
      return null;
    }
  }

  /** Source element symbols with the final coordinates of `from`'s log. */
  private async optimizedAtoms(
    cycle: Cycle,
    stage: StageId,
    from: GeometryStageId,
  ): Promise<Atom[] | null> {
    const source = await this.sourceAtoms(cycle, stage);
    if (source === null) return null;
    try {
      const log = await this.probe.readText(this.layout.gaussianLog(from));
      if (log === null) throw new Error(`log not found: ${this.layout.gaussianLog(from)}`);
      return mergeGeometry(source, finalCoordinates(log));
    } catch (err) {
      await this.fail(cycle, stage, `Failed to extract coordinates for ${stage}: ${errorMessage(err)}`);
      return null;
    }
  }

  // ---------------------------------------------------------------------------
  // Spin-orbit coupling
  // ---------------------------------------------------------------------------

  private async stepSoc(cycle: Cycle): Promise<void> {
    const output = this.layout.socOutput();
    const obs = await this.observeJob(
      this.layout.stageDir("soc"),
      () => this.probe.exists(this.layout.gaussianLog("t1_opt")),
      () => this.probe.orcaTerminatedNormally(output),
    );
    await this.applyJob(cycle, "soc", nextJobTransition(cycle.state.stages.soc.state, classifyJob(obs)), {
      submit: () => this.submitSoc(cycle),
      fatalMessage: () => `soc terminated abnormally. Check log: ${output}`,
    });
  }

  private async submitSoc(cycle: Cycle): Promise<void> {
    const atoms = await this.optimizedAtoms(cycle, "soc", "t1_opt");
    if (atoms === null) return;
    const jobName = this.layout.jobName("soc");
    await this.submit({
      stage: "soc",
      step: "soc",
      program: "orca",
      jobName,
      inputFile: `${jobName}.inp`,
      input: renderOrcaInput(atoms, this.settings.jobs.orca),
    });
  }

  // ---------------------------------------------------------------------------
  // Rate branches
  // ---------------------------------------------------------------------------

  private partnerOf(branch: BranchId): { stage: GeometryStageId; file: string } {
    return branch === "kic"
      ? { stage: "s1_freq", file: "s1.log" }
      : { stage: "t1_freq", file: "t1.log" };
  }

  private async stepBranch(cycle: Cycle, id: BranchId): Promise<void> {
    if (cycle.state.overlap[id].state !== OverlapState.READY) {
      await this.stepOverlap(cycle, id);
      if (cycle.halted || cycle.state.overlap[id].state !== OverlapState.READY) return;
    }
    await this.stepRate(cycle, id);
  }

  private async stepOverlap(cycle: Cycle, id: BranchId): Promise<void> {
    const dir = this.layout.stageDir(id);
    const overlap = cycle.state.overlap[id];
    const partner = this.partnerOf(id);

    const accepted = await this.probe.acceptedOverlap(dir);
    const completed = await this.probe.hasCompletion(dir);
    const submitted = await this.probe.hasSubmission(dir);
    const verdict = completed
      ? evaluateReorganization(
          await this.probe.reorganization(dir),
          this.settings.recovery.reorganizationThreshold,
          id === "kic" ? KIC_OVERLAP_ARTIFACT : undefined,
        )
      : undefined;
    const event = classifyOverlap({
      accepted: accepted !== null,
      errorSignature: accepted === null ? await this.probe.overlapErrorSignature(dir) : null,
      retried: overlap.retried,
      completed,
      submitted,
      inputsReady:
        (await this.probe.exists(this.layout.gaussianLog("s0_freq"))) &&
        (await this.probe.exists(this.layout.gaussianLog(partner.stage))),
      verdict,
    });
    const transition = nextOverlapTransition(overlap.state, event);

    switch (transition.action) {
      case "NONE":
        overlap.state = transition.next;
        return;
      case "RECORD_ACCEPTED":
        overlap.artifact = accepted;
        overlap.state = transition.next;
        return;
      case "SUBMIT":
        await this.submitOverlap(id, overlap.retried);
        overlap.state = transition.next;
        return;
      case "RETRY_CARTESIAN":
        this.logger.warn("Overlap coordinate error, retrying with Cartesian coordinates", {
          stage: id,
        });
        await this.markers.touch(dir, MARKERS.overlapRetry);
        await this.markers.clearJob(dir);
        await this.markers.backupFile(dir, OVERLAP_ERROR_LOG);
        overlap.retried = true;
        await this.submitOverlap(id, true);
        overlap.state = transition.next;
        return;
      case "ACCEPT": {
        if (verdict?.kind !== "passed") return;
        const best = verdict.best;
        await this.markers.recordOverlapChoice(dir, best);
        await this.markers.clearJob(dir);
        overlap.artifact = best;
        overlap.state = transition.next;
        this.logger.info("Overlap accepted", { stage: id, artifact: best });
        return;
      }
      case "MARK_FATAL":
        await this.fail(cycle, id, this.overlapFatalMessage(id, event, dir));
        overlap.state = transition.next;
        cycle.state.stages[id].state = StageState.FATAL;
        return;
    }
  }

  private overlapFatalMessage(id: BranchId, event: string, dir: string): string {
    switch (event) {
      case "COORDINATE_ERROR_AFTER_RETRY":
        return `${id} overlap step failed even with Cartesian coordinates.`;
      case "CRASHED":
        return `${id} overlap step crashed. Check log: ${join(dir, OVERLAP_ERROR_LOG)}`;
      case "REORGANIZATION_TOO_HIGH":
        return `${id} overlap reorganization energy too high.`;
      default:
        return `${id} overlap produced no usable reorganization energy.`;
    }
  }

  private async submitOverlap(id: BranchId, cartesian: boolean): Promise<void> {
    const dir = this.layout.stageDir(id);
    const partner = this.partnerOf(id);
    await this.markers.copy(this.layout.gaussianLog("s0_freq"), join(dir, "s0.log"));
    await this.markers.copy(this.layout.gaussianLog(partner.stage), join(dir, partner.file));
    await this.markers.copyIfPresent(this.layout.formattedCheckpoint("s0_freq"), join(dir, "s0.fchk"));
    await this.markers.copyIfPresent(
      this.layout.formattedCheckpoint(partner.stage),
      join(dir, partner.file.replace(/\.log$/, ".fchk")),
    );

    await this.submit({
      stage: id,
      step: "overlap",
      program: "momap",
      jobName: `${this.layout.jobName(id)}_evc`,
      inputFile: OVERLAP_INPUT,
      input: await renderOverlapInput({ ground: "s0.log", excited: partner.file, cartesian }),
    });
  }

  private async stepRate(cycle: Cycle, id: BranchId): Promise<void> {
    const dir = this.layout.stageDir(id);
    const rateLog = join(dir, RATE_LOGS[id]);
    const obs = await this.observeJob(
      dir,
      async () => id === "kic" || (await this.probe.exists(this.layout.socOutput())),
      () => this.probe.exists(rateLog),
    );
    await this.applyJob(cycle, id, nextJobTransition(cycle.state.stages[id].state, classifyJob(obs)), {
      submit: () => this.submitRate(cycle, id),
      fatalMessage: () => `${id} rate job finished without ${rateLog}.`,
    });
  }

  private async submitRate(cycle: Cycle, id: BranchId): Promise<void> {
    const dir = this.layout.stageDir(id);
    const partner = this.partnerOf(id);
    const ground = await this.probe.energy(join(dir, "s0.log"));
    const excited = await this.probe.energy(join(dir, partner.file));
    const input: RateInput = {
      ead: Math.abs(excited - ground),
      dsFile: cycle.state.overlap[id].artifact ?? KIC_OVERLAP_ARTIFACT,
    };
    if (id !== "kic") {
      const soc = (await this.probe.readText(this.layout.socOutput())) ?? "";
      if (id === "kr") input.edme = orcaTransitionDipole(soc);
      else input.hso = orcaSocConstant(soc);
    }

    await this.submit({
      stage: id,
      step: "rate",
      program: "momap",
      jobName: this.layout.jobName(id),
      inputFile: OVERLAP_INPUT,
      input: await renderRateInput(id, this.settings.jobs.momap, input),
    });
  }

  // ---------------------------------------------------------------------------
  // Shared
  // ---------------------------------------------------------------------------

  private async submit(spec: Omit<JobSpec, "unit" | "directory">): Promise<void> {
    this.logger.info("Submitting job", { stage: spec.stage, step: spec.step, job: spec.jobName });
    await this.jobs.submit({
      ...spec,
      unit: this.layout.unit,
      directory: this.layout.stageDir(spec.stage),
    });
  }

  private async writeReport(): Promise<void> {
    const result = await analyzeUnit(this.layout, this.probe, this.settings.temperature);
    await writeFileAtomic(this.layout.report, renderReport(result));
    this.logger.info("Report written", { path: this.layout.report, plqy: result.plqy });
  }
}
