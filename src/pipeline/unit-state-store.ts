import { readJsonFile, writeJsonAtomic } from "../core/atomic-write.js";
import {
  BRANCH_IDS,
  OverlapState,
  STAGE_IDS,
  STAGE_LABELS,
  StageState,
} from "./types.js";
import type { BranchId, OverlapRecord, StageId, StageRecord, UnitState } from "./types.js";

function freshStage(): StageRecord {
  return { state: StageState.NOT_STARTED, retried: false };
}

function freshOverlap(): OverlapRecord {
  return { state: OverlapState.NOT_STARTED, retried: false, artifact: null };
}

export function initialUnitState(unit: string): UnitState {
  const stages: Record<StageId, StageRecord> = {
    s0_opt: freshStage(),
    s0_freq: freshStage(),
    s1_opt: freshStage(),
    s1_freq: freshStage(),
    t1_opt: freshStage(),
    t1_freq: freshStage(),
    soc: freshStage(),
    kr: freshStage(),
    kisc: freshStage(),
    kic: freshStage(),
  };
  const overlap: Record<BranchId, OverlapRecord> = {
    kr: freshOverlap(),
    kisc: freshOverlap(),
    kic: freshOverlap(),
  };
  return { version: 1, unit, stages, overlap, labelRank: 0 };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStageState(value: unknown): value is StageState {
  return typeof value === "string" && Object.values<string>(StageState).includes(value);
}

function isOverlapState(value: unknown): value is OverlapState {
  return typeof value === "string" && Object.values<string>(OverlapState).includes(value);
}

/**
 * Validate a parsed state file. Returns null when anything is off; the
 * engine then rebuilds the state from the marker files.
 */
export function decodeUnitState(raw: unknown, unit: string): UnitState | null {
  if (!isRecord(raw) || raw["version"] !== 1 || raw["unit"] !== unit) return null;
  const rawStages = raw["stages"];
  const rawOverlap = raw["overlap"];
  const labelRank = raw["labelRank"];
  if (!isRecord(rawStages) || !isRecord(rawOverlap)) return null;
  if (typeof labelRank !== "number" || labelRank < 0 || labelRank >= STAGE_LABELS.length) {
    return null;
  }

  const state = initialUnitState(unit);
  for (const id of STAGE_IDS) {
    const rec = rawStages[id];
    if (!isRecord(rec)) return null;
    const stageState = rec["state"];
    const retried = rec["retried"];
    if (!isStageState(stageState) || typeof retried !== "boolean") return null;
    state.stages[id] = { state: stageState, retried };
  }
  for (const id of BRANCH_IDS) {
    const rec = rawOverlap[id];
    if (!isRecord(rec)) return null;
    const overlapState = rec["state"];
    const retried = rec["retried"];
    const rawArtifact = rec["artifact"];
    const artifact = typeof rawArtifact === "string" ? rawArtifact : null;
    if (!isOverlapState(overlapState) || typeof retried !== "boolean") return null;
    if (rawArtifact !== null && artifact === null) return null;
    state.overlap[id] = { state: overlapState, retried, artifact };
  }
  state.labelRank = labelRank;
  return state;
}

/** Typed per-unit state, one JSON file per unit, written atomically. */
export class UnitStateStore {
  async load(path: string, unit: string): Promise<UnitState | null> {
    return decodeUnitState(await readJsonFile(path), unit);
  }

  async save(path: string, state: UnitState): Promise<void> {
    await writeJsonAtomic(path, state);
  }
}
