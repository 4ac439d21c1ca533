import { join } from "node:path";
import type { ArtifactProbe } from "./artifact-probe.js";
import type { UnitLayout } from "./layout.js";
import {
  internalConversionRate,
  intersystemCrossingRate,
  radiativeRate,
  spectrumSummary,
} from "./log-parsers.js";
import { RATE_LOGS, SPECTRUM_FILE } from "./types.js";

/** Boltzmann constant, Hartree per Kelvin. */
export const KB_HARTREE = 3.1668114e-6;
export const EV_PER_HARTREE = 27.2114;

export interface YieldResult {
  plqy: number;
  /** Thermal population ratio n(S1)/n(T1). */
  ratio: number;
}

/**
 * PLQY = kr / (kr + kisc + kic * exp(-dE / kT)), with dE = E(S1) - E(T1)
 * in Hartree. A zero denominator yields 0.
 */
export function computeYield(
  kr: number,
  kisc: number,
  kic: number,
  deltaE: number,
  temperature: number,
): YieldResult {
  let ratio = Math.exp(-deltaE / (KB_HARTREE * temperature));
  if (!Number.isFinite(ratio)) ratio = 0;
  const total = kr + kisc + kic * ratio;
  return { plqy: total === 0 ? 0 : kr / total, ratio };
}

export interface AnalysisResult {
  name: string;
  energyS1: number;
  energyT1: number;
  deltaE: number;
  ratio: number;
  temperature: number;
  kr: number;
  kisc: number;
  kic: number;
  plqy: number;
  peakWavelength: number;
  fwhm: number;
}

export async function analyzeUnit(
  layout: UnitLayout,
  probe: ArtifactProbe,
  temperature: number,
): Promise<AnalysisResult> {
  const read = async (path: string): Promise<string> => (await probe.readText(path)) ?? "";

  const kr = radiativeRate(await read(join(layout.stageDir("kr"), RATE_LOGS.kr)));
  const kisc = intersystemCrossingRate(await read(join(layout.stageDir("kisc"), RATE_LOGS.kisc)));
  const kic = internalConversionRate(await read(join(layout.stageDir("kic"), RATE_LOGS.kic)));

  const energyS1 = await probe.energy(layout.gaussianLog("s1_freq"));
  const energyT1 = await probe.energy(layout.gaussianLog("t1_freq"));
  const deltaE = energyS1 - energyT1;
  const { plqy, ratio } = computeYield(kr, kisc, kic, deltaE, temperature);

  const spectrumText = await probe.readText(join(layout.stageDir("kr"), SPECTRUM_FILE));
  const spectrum = spectrumText === null ? null : spectrumSummary(spectrumText);

  return {
    name: layout.unit,
    energyS1,
    energyT1,
    deltaE,
    ratio,
    temperature,
    kr,
    kisc,
    kic,
    plqy,
    peakWavelength: spectrum?.peakWavelength ?? 0,
    fwhm: spectrum?.fwhm ?? 0,
  };
}

/** `1.2346e+04`: four decimals, signed two-digit exponent. */
export function formatExponential(value: number, digits = 4): string {
  if (!Number.isFinite(value)) return String(value);
  return value
    .toExponential(digits)
    .replace(/e([+-])(\d)$/, (_m, sign: string, exp: string) => `e${sign}0${exp}`);
}

const RULE = "=".repeat(50);

export function renderReport(r: AnalysisResult): string {
  return [
    RULE,
    `Analysis Report for ${r.name}`,
    RULE,
    "1. Energies (Hartree)",
    `   E(S1): ${r.energyS1.toFixed(6)}`,
    `   E(T1): ${r.energyT1.toFixed(6)}`,
    `   dE(S1-T1): ${r.deltaE.toFixed(6)} Ha (${(r.deltaE * EV_PER_HARTREE).toFixed(3)} eV)`,
    `   Boltzmann Ratio n(S1)/n(T1): ${formatExponential(r.ratio)} (at ${r.temperature} K)`,
    "",
    "2. Rates (s^-1)",
    `   Kr   (Rad): ${formatExponential(r.kr)}`,
    `   Kisc (ISC): ${formatExponential(r.kisc)}`,
    `   Kic  (IC) : ${formatExponential(r.kic)}`,
    "",
    "3. PLQY Calculation",
    "   Formula: Kr / (Kr + Kisc + Kic * Ratio)",
    `   PLQY: ${(r.plqy * 100).toFixed(2)}% (${r.plqy.toFixed(4)})`,
    "",
    "4. Spectrum Properties",
    `   Peak Wavelength: ${r.peakWavelength.toFixed(1)} nm`,
    `   FWHM: ${r.fwhm.toFixed(1)} nm`,
    RULE,
  ].join("\n");
}
