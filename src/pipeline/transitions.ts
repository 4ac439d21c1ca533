import { OverlapState, StageState } from "./types.js";
import type { ReorganizationReading } from "./artifact-probe.js";
import type { OverlapErrorSignature } from "./log-parsers.js";

// ---------------------------------------------------------------------------
// Job stages (opt, freq, soc, rate)
// ---------------------------------------------------------------------------

export type JobEvent =
  | "INPUTS_MISSING"
  | "NO_SUBMISSION"
  | "SUBMITTED"
  | "COMPLETED"
  | "ABNORMAL_TERMINATION"
  | "VALIDATION_PASSED"
  | "VALIDATION_REJECTED"
  | "VALIDATION_REJECTED_FINAL";

export type JobAction = "NONE" | "SUBMIT" | "ACCEPT" | "RESET_FOR_RETRY" | "MARK_FATAL";

export interface Transition<S, A> {
  action: A;
  next: S;
}

type JobRow = Record<JobEvent, Transition<StageState, JobAction>>;

const stay = (state: StageState): Transition<StageState, JobAction> => ({
  action: "NONE",
  next: state,
});

const ON_COMPLETION = {
  COMPLETED: { action: "ACCEPT", next: StageState.READY },
  ABNORMAL_TERMINATION: { action: "MARK_FATAL", next: StageState.FATAL },
  VALIDATION_PASSED: { action: "ACCEPT", next: StageState.READY },
  VALIDATION_REJECTED: { action: "RESET_FOR_RETRY", next: StageState.VALIDATION_FAILED },
  VALIDATION_REJECTED_FINAL: { action: "MARK_FATAL", next: StageState.FATAL },
} as const satisfies Partial<JobRow>;

const terminalRow = (state: StageState): JobRow => ({
  INPUTS_MISSING: stay(state),
  NO_SUBMISSION: stay(state),
  SUBMITTED: stay(state),
  COMPLETED: stay(state),
  ABNORMAL_TERMINATION: stay(state),
  VALIDATION_PASSED: stay(state),
  VALIDATION_REJECTED: stay(state),
  VALIDATION_REJECTED_FINAL: stay(state),
});

export const JOB_TRANSITIONS: Readonly<Record<StageState, JobRow>> = {
  [StageState.NOT_STARTED]: {
    INPUTS_MISSING: stay(StageState.NOT_STARTED),
    NO_SUBMISSION: { action: "SUBMIT", next: StageState.AWAITING_COMPLETION },
    SUBMITTED: stay(StageState.AWAITING_COMPLETION),
    ...ON_COMPLETION,
  },
  [StageState.AWAITING_COMPLETION]: {
    INPUTS_MISSING: stay(StageState.NOT_STARTED),
    NO_SUBMISSION: { action: "SUBMIT", next: StageState.AWAITING_COMPLETION },
    SUBMITTED: stay(StageState.AWAITING_COMPLETION),
    ...ON_COMPLETION,
  },
  [StageState.VALIDATION_FAILED]: {
    INPUTS_MISSING: stay(StageState.VALIDATION_FAILED),
    NO_SUBMISSION: { action: "SUBMIT", next: StageState.AWAITING_COMPLETION },
    SUBMITTED: stay(StageState.AWAITING_COMPLETION),
    ...ON_COMPLETION,
  },
  [StageState.READY]: terminalRow(StageState.READY),
  [StageState.FATAL]: terminalRow(StageState.FATAL),
};

export function nextJobTransition(
  state: StageState,
  event: JobEvent,
): Transition<StageState, JobAction> {
  return JOB_TRANSITIONS[state][event];
}

export interface JobObservation {
  completed: boolean;
  submitted: boolean;
  inputsReady: boolean;
  /** Only consulted when completed. */
  terminatedNormally: boolean;
  /** Present for stages whose output must pass a check before acceptance. */
  validation?: ValidationObservation;
}

export interface ValidationObservation {
  imaginaryFrequencies: readonly number[];
  retried: boolean;
  elapsedHours: number;
  budgetHours: number;
}

export function classifyValidation(v: ValidationObservation): JobEvent {
  if (v.imaginaryFrequencies.length === 0) return "VALIDATION_PASSED";
  if (v.retried) return "VALIDATION_REJECTED_FINAL";
  if (v.elapsedHours >= v.budgetHours) return "VALIDATION_REJECTED_FINAL";
  return "VALIDATION_REJECTED";
}

/** Completion evidence beats submission evidence, which beats inputs. */
export function classifyJob(obs: JobObservation): JobEvent {
  if (obs.completed) {
    if (!obs.terminatedNormally) return "ABNORMAL_TERMINATION";
    return obs.validation ? classifyValidation(obs.validation) : "COMPLETED";
  }
  if (obs.submitted) return "SUBMITTED";
  if (!obs.inputsReady) return "INPUTS_MISSING";
  return "NO_SUBMISSION";
}

// ---------------------------------------------------------------------------
// Overlap sub-stage of the rate branches
// ---------------------------------------------------------------------------

export type OverlapEvent =
  | "ACCEPTED"
  | "COORDINATE_ERROR"
  | "COORDINATE_ERROR_AFTER_RETRY"
  | "CRASHED"
  | "REORGANIZATION_PASSED"
  | "REORGANIZATION_TOO_HIGH"
  | "REORGANIZATION_MISSING"
  | "SUBMITTED"
  | "NO_SUBMISSION"
  | "INPUTS_MISSING";

export type OverlapAction =
  | "NONE"
  | "SUBMIT"
  | "RETRY_CARTESIAN"
  | "ACCEPT"
  | "RECORD_ACCEPTED"
  | "MARK_FATAL";

type OverlapRow = Record<OverlapEvent, Transition<OverlapState, OverlapAction>>;

const overlapStay = (state: OverlapState): Transition<OverlapState, OverlapAction> => ({
  action: "NONE",
  next: state,
});

const OVERLAP_ACTIVE: Omit<OverlapRow, "INPUTS_MISSING"> = {
  ACCEPTED: { action: "RECORD_ACCEPTED", next: OverlapState.READY },
  COORDINATE_ERROR: { action: "RETRY_CARTESIAN", next: OverlapState.AWAITING_COMPLETION },
  COORDINATE_ERROR_AFTER_RETRY: { action: "MARK_FATAL", next: OverlapState.FATAL },
  CRASHED: { action: "MARK_FATAL", next: OverlapState.FATAL },
  REORGANIZATION_PASSED: { action: "ACCEPT", next: OverlapState.READY },
  REORGANIZATION_TOO_HIGH: { action: "MARK_FATAL", next: OverlapState.FATAL },
  REORGANIZATION_MISSING: { action: "MARK_FATAL", next: OverlapState.FATAL },
  SUBMITTED: overlapStay(OverlapState.AWAITING_COMPLETION),
  NO_SUBMISSION: { action: "SUBMIT", next: OverlapState.AWAITING_COMPLETION },
};

const overlapTerminal = (state: OverlapState): OverlapRow => ({
  ACCEPTED: overlapStay(state),
  COORDINATE_ERROR: overlapStay(state),
  COORDINATE_ERROR_AFTER_RETRY: overlapStay(state),
  CRASHED: overlapStay(state),
  REORGANIZATION_PASSED: overlapStay(state),
  REORGANIZATION_TOO_HIGH: overlapStay(state),
  REORGANIZATION_MISSING: overlapStay(state),
  SUBMITTED: overlapStay(state),
  NO_SUBMISSION: overlapStay(state),
  INPUTS_MISSING: overlapStay(state),
});

export const OVERLAP_TRANSITIONS: Readonly<Record<OverlapState, OverlapRow>> = {
  [OverlapState.NOT_STARTED]: {
    ...OVERLAP_ACTIVE,
    INPUTS_MISSING: overlapStay(OverlapState.NOT_STARTED),
  },
  [OverlapState.AWAITING_COMPLETION]: {
    ...OVERLAP_ACTIVE,
    INPUTS_MISSING: overlapStay(OverlapState.NOT_STARTED),
  },
  [OverlapState.READY]: overlapTerminal(OverlapState.READY),
  [OverlapState.FATAL]: overlapTerminal(OverlapState.FATAL),
};

export function nextOverlapTransition(
  state: OverlapState,
  event: OverlapEvent,
): Transition<OverlapState, OverlapAction> {
  return OVERLAP_TRANSITIONS[state][event];
}

export type ReorganizationVerdict =
  | { kind: "passed"; best: string; means: Record<string, number> }
  | { kind: "too_high"; file: string; energies: [number, number] }
  | { kind: "missing" };

/**
 * Reject when any artifact exceeds the threshold; otherwise pick the one
 * with the lowest mean. `fixedChoice` overrides the pick but not the check.
 */
export function evaluateReorganization(
  readings: readonly ReorganizationReading[],
  threshold: number,
  fixedChoice?: string,
): ReorganizationVerdict {
  const means: Record<string, number> = {};
  let best: string | null = null;
  for (const { file, energies } of readings) {
    if (energies === null) continue;
    const [a, b] = energies;
    if (a > threshold || b > threshold) {
      return { kind: "too_high", file, energies };
    }
    const mean = (a + b) / 2;
    means[file] = mean;
    if (best === null || mean < (means[best] ?? Infinity)) best = file;
  }
  if (best === null) return { kind: "missing" };
  return { kind: "passed", best: fixedChoice ?? best, means };
}

export interface OverlapObservation {
  accepted: boolean;
  errorSignature: OverlapErrorSignature | null;
  retried: boolean;
  completed: boolean;
  submitted: boolean;
  inputsReady: boolean;
  /** Only consulted when completed. */
  verdict?: ReorganizationVerdict;
}

export function classifyOverlap(obs: OverlapObservation): OverlapEvent {
  if (obs.accepted) return "ACCEPTED";
  if (obs.errorSignature === "coordinate") {
    return obs.retried ? "COORDINATE_ERROR_AFTER_RETRY" : "COORDINATE_ERROR";
  }
  if (obs.errorSignature === "fatal") return "CRASHED";
  if (obs.completed) {
    switch (obs.verdict?.kind) {
      case "passed":
        return "REORGANIZATION_PASSED";
      case "too_high":
        return "REORGANIZATION_TOO_HIGH";
      default:
        return "REORGANIZATION_MISSING";
    }
  }
  if (obs.submitted) return "SUBMITTED";
  if (!obs.inputsReady) return "INPUTS_MISSING";
  return "NO_SUBMISSION";
}
