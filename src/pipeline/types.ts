// ---------------------------------------------------------------------------
// Stages
// ---------------------------------------------------------------------------

export type GeometryStateId = "s0" | "s1" | "t1";
export type GeometryStageId = "s0_opt" | "s0_freq" | "s1_opt" | "s1_freq" | "t1_opt" | "t1_freq";
export type BranchId = "kr" | "kisc" | "kic";
export type StageId = GeometryStageId | "soc" | BranchId;

export type StageKind = "opt" | "freq" | "soc" | "branch";

export interface StageDefinition {
  readonly id: StageId;
  readonly directory: string;
  readonly kind: StageKind;
}

export const STAGES: readonly StageDefinition[] = [
  { id: "s0_opt", directory: "01_S0_Opt", kind: "opt" },
  { id: "s0_freq", directory: "02_S0_Freq", kind: "freq" },
  { id: "s1_opt", directory: "03_S1_Opt", kind: "opt" },
  { id: "s1_freq", directory: "04_S1_Freq", kind: "freq" },
  { id: "t1_opt", directory: "05_T1_Opt", kind: "opt" },
  { id: "t1_freq", directory: "06_T1_Freq", kind: "freq" },
  { id: "soc", directory: "07_ORCA_SOC", kind: "soc" },
  { id: "kr", directory: "08_MOMAP_Kr", kind: "branch" },
  { id: "kisc", directory: "09_MOMAP_Kisc", kind: "branch" },
  { id: "kic", directory: "10_MOMAP_Kic", kind: "branch" },
];

export const STAGE_IDS: readonly StageId[] = STAGES.map((s) => s.id);

export const BRANCH_IDS: readonly BranchId[] = ["kr", "kisc", "kic"];

export interface GeometryPair {
  readonly state: GeometryStateId;
  readonly opt: GeometryStageId;
  readonly freq: GeometryStageId;
  readonly charge: number;
  readonly multiplicity: number;
}

export const GEOMETRY_PAIRS: readonly GeometryPair[] = [
  { state: "s0", opt: "s0_opt", freq: "s0_freq", charge: 0, multiplicity: 1 },
  { state: "s1", opt: "s1_opt", freq: "s1_freq", charge: 0, multiplicity: 1 },
  { state: "t1", opt: "t1_opt", freq: "t1_freq", charge: 0, multiplicity: 3 },
];

export function stageDefinition(id: StageId): StageDefinition {
  const def = STAGES.find((s) => s.id === id);
  if (!def) throw new Error(`Unknown stage: ${id}`);
  return def;
}

export function geometryPairOf(id: GeometryStageId): GeometryPair {
  const pair = GEOMETRY_PAIRS.find((p) => p.opt === id || p.freq === id);
  if (!pair) throw new Error(`Unknown geometry stage: ${id}`);
  return pair;
}

export function isBranch(id: StageId): id is BranchId {
  return id === "kr" || id === "kisc" || id === "kic";
}

// ---------------------------------------------------------------------------
// Typed state
// ---------------------------------------------------------------------------

export enum StageState {
  NOT_STARTED = "NOT_STARTED",
  AWAITING_COMPLETION = "AWAITING_COMPLETION",
  VALIDATION_FAILED = "VALIDATION_FAILED",
  READY = "READY",
  FATAL = "FATAL",
}

export enum OverlapState {
  NOT_STARTED = "NOT_STARTED",
  AWAITING_COMPLETION = "AWAITING_COMPLETION",
  READY = "READY",
  FATAL = "FATAL",
}

export interface StageRecord {
  state: StageState;
  /** Geometry stages: strict-convergence retry consumed. */
  retried: boolean;
}

export interface OverlapRecord {
  state: OverlapState;
  /** Cartesian-coordinate retry consumed. */
  retried: boolean;
  /** Accepted overlap artifact, e.g. "evc.cart.dat". */
  artifact: string | null;
}

export interface UnitState {
  version: 1;
  unit: string;
  stages: Record<StageId, StageRecord>;
  overlap: Record<BranchId, OverlapRecord>;
  /** Highest label rank ever reported; labels never move backwards. */
  labelRank: number;
}

// ---------------------------------------------------------------------------
// Labels
// ---------------------------------------------------------------------------

export const STAGE_LABELS = [
  "Starting / In Progress",
  "Gaussian S0 Done",
  "Gaussian S1 Done",
  "Gaussian T1 Done",
  "ORCA Done",
  "MOMAP Kr Done",
  "MOMAP Kisc Done",
  "MOMAP Kic Done",
  "Analysis Done",
] as const;

export type StageLabel = (typeof STAGE_LABELS)[number];

export function labelForRank(rank: number): StageLabel {
  const clamped = Math.max(0, Math.min(STAGE_LABELS.length - 1, Math.trunc(rank)));
  return STAGE_LABELS[clamped] ?? "Starting / In Progress";
}

export type Terminal = "fatal" | "completed" | null;

export interface AdvanceResult {
  stageLabel: StageLabel;
  terminal: Terminal;
}

// ---------------------------------------------------------------------------
// Boundary markers and well-known files
// ---------------------------------------------------------------------------

export const MARKERS = {
  completion: "job.done",
  submission: "run.slurm",
  geometryRetry: "RETRY_CALCALL",
  overlapRetry: "RETRY_CART",
  overlapAccepted: "evc.done",
} as const;

export const FATAL_LOG_FILE = "FATAL_ERROR.txt";
export const REPORT_FILE = "REPORT_PLQY.txt";
export const UNIT_STATE_FILE = "unit-state.json";

export const OVERLAP_ARTIFACTS = ["evc.dint.dat", "evc.cart.dat"] as const;
export const OVERLAP_ERROR_LOG = "momap.err";

/** Rate-job output log per branch. */
export const RATE_LOGS: Record<BranchId, string> = {
  kr: "spec.tvcf.log",
  kisc: "isc.tvcf.log",
  kic: "ic.tvcf.log",
};

export const SPECTRUM_FILE = "spec.tvcf.spec.dat";
