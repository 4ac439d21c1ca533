import { formatAtoms } from "../pipeline/log-parsers.js";
import type { Atom } from "../pipeline/log-parsers.js";
import type { BranchId } from "../pipeline/types.js";
import type { MomapJobConfig, MomapParams, MomapValue, OrcaJobConfig } from "../config/types.js";
import { renderTemplate } from "./template.js";

// ---------------------------------------------------------------------------
// Gaussian
// ---------------------------------------------------------------------------

export interface GaussianInput {
  jobName: string;
  nproc: number;
  memory: string;
  route: string;
  charge: number;
  multiplicity: number;
  atoms: readonly Atom[];
}

export function renderGaussianInput(input: GaussianInput): string {
  return [
    `%nprocshared=${input.nproc}`,
    `%mem=${input.memory}`,
    `%chk=${input.jobName}.chk`,
    input.route,
    "",
    input.jobName,
    "",
    `${input.charge} ${input.multiplicity}`,
    formatAtoms(input.atoms),
    "",
    "",
  ].join("\n");
}

/**
 * Route for the strict-convergence retry: force-constant evaluation at
 * every optimization step.
 */
export function strictConvergenceRoute(route: string): string {
  if (/\bopt=calcall\b|\bcalcall\b/i.test(route)) return route;
  const grouped = /\bopt=\(([^)]*)\)/i;
  if (grouped.test(route)) {
    return route.replace(grouped, (_m, opts: string) => `opt=(calcall,${opts})`);
  }
  const single = /\bopt=([^\s()]+)/i;
  if (single.test(route)) {
    return route.replace(single, (_m, opt: string) => `opt=(calcall,${opt})`);
  }
  return route.replace(/\bopt\b/i, "opt=calcall");
}

/** Frequency jobs take coordinates from the input, never the checkpoint. */
export function frequencyRoute(route: string): string {
  return route
    .replace(/\s*\bgeom=(all)?check\b/gi, "")
    .replace(/\s{2,}/g, " ")
    .trim();
}

// ---------------------------------------------------------------------------
// ORCA
// ---------------------------------------------------------------------------

export function renderOrcaInput(atoms: readonly Atom[], config: OrcaJobConfig): string {
  const present = new Set(atoms.map((a) => a.symbol));
  const heavy = config.heavyMetals.filter((m) => present.has(m));

  const lines = [`! ${config.keywords}`, "", `%maxcore ${config.maxcore}`, ""];
  if (heavy.length > 0) {
    lines.push("%basis");
    for (const metal of heavy) {
      lines.push(`NewGTO ${metal} "${config.heavyMetalBasis}" end`);
    }
    lines.push("end", "");
  }
  lines.push(
    "%tddft",
    "nroots      50",
    "DoSOC       true",
    "PrintLevel  3",
    "TDA         false",
    "triplets    true",
    "end",
    "",
    "* xyz 0 1",
    formatAtoms(atoms),
    "*",
    "",
  );
  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// MOMAP
// ---------------------------------------------------------------------------

export interface OverlapInput {
  /** Ground-state frequency log, relative to the branch directory. */
  ground: string;
  /** Excited-state frequency log. */
  excited: string;
  cartesian: boolean;
}

export function renderOverlapInput(input: OverlapInput): Promise<string> {
  return renderTemplate("momap-evc.inp", {
    ffreq1: input.ground,
    ffreq2: input.excited,
    extra: input.cartesian ? " set_cart = .t.\n" : "",
  });
}

export interface RateInput {
  /** Adiabatic energy gap, Hartree. */
  ead: number;
  /** Overlap artifact the rate job reads. */
  dsFile: string;
  /** Transition dipole (kr), Debye. */
  edme?: number;
  /** Spin-orbit coupling (kisc), cm-1. */
  hso?: number;
}

function formatValue(value: MomapValue): string {
  return typeof value === "number" ? String(value) : value;
}

/** Common parameters, then branch parameters, then per-run values. */
export function rateParameters(
  branch: BranchId,
  config: MomapJobConfig,
  input: RateInput,
): Record<string, string> {
  const merged: Record<string, string> = {};
  const layers: MomapParams[] = [config.common, config[branch]];
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      merged[key] = formatValue(value);
    }
  }
  merged["Ead"] = input.ead.toFixed(8);
  merged["DSFile"] = input.dsFile;
  if (input.edme !== undefined) merged["EDME"] = input.edme.toFixed(8);
  if (input.hso !== undefined) merged["Hso"] = input.hso.toFixed(5);
  if (branch === "kic") merged["CoulFile"] ??= "evc.cart.nac";
  return merged;
}

export function renderRateInput(
  branch: BranchId,
  config: MomapJobConfig,
  input: RateInput,
): Promise<string> {
  return renderTemplate(`momap-${branch}.inp`, rateParameters(branch, config, input));
}
