import { STAGE_IDS, StageState } from "./types.js";
import type { StageId } from "./types.js";

/**
 * Fixed dependency graph. A stage is eligible once every stage it lists is
 * READY. T1 follows S1 so the geometry pairs run one after another.
 */
export const STAGE_DEPENDENCIES: Readonly<Record<StageId, readonly StageId[]>> = {
  s0_opt: [],
  s0_freq: ["s0_opt"],
  s1_opt: ["s0_freq"],
  s1_freq: ["s1_opt"],
  t1_opt: ["s1_freq"],
  t1_freq: ["t1_opt"],
  soc: ["s1_freq", "t1_freq"],
  kr: ["s0_freq", "t1_freq", "soc"],
  kisc: ["s0_freq", "t1_freq", "soc"],
  kic: ["s0_freq", "s1_freq"],
};

export class StageGate {
  constructor(
    private readonly dependencies: Readonly<Record<StageId, readonly StageId[]>> = STAGE_DEPENDENCIES,
  ) {}

  isEligible(stage: StageId, stateOf: (id: StageId) => StageState): boolean {
    return this.dependencies[stage].every((dep) => stateOf(dep) === StageState.READY);
  }

  /** Stages whose dependencies are all READY and that are not READY themselves. */
  eligible(stateOf: (id: StageId) => StageState): StageId[] {
    return STAGE_IDS.filter(
      (id) => stateOf(id) !== StageState.READY && this.isEligible(id, stateOf),
    );
  }
}
