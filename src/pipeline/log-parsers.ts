/**
 * Pure text parsers for the outputs of the external programs. Nothing here
 * touches the filesystem; {@link FsArtifactProbe} reads the files and hands
 * their contents over.
 */

export interface Atom {
  symbol: string;
  x: number;
  y: number;
  z: number;
}

export type OverlapErrorSignature = "coordinate" | "fatal";

export interface SpectrumSummary {
  peakWavelength: number;
  fwhm: number;
}

export class GeometryParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GeometryParseError";
  }
}

/** Number() that rejects empty strings and non-finite results. */
export function toNumber(text: string | undefined): number | null {
  if (text === undefined || text.trim() === "") return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

// ---------------------------------------------------------------------------
// Gaussian
// ---------------------------------------------------------------------------

/** True when the last termination line in the log is a normal one. */
export function gaussianTerminatedNormally(text: string): boolean {
  const normal = text.lastIndexOf("Normal termination");
  if (normal < 0) return false;
  return normal > text.lastIndexOf("Error termination");
}

/** All negative (imaginary) harmonic frequencies reported in the log. */
export function imaginaryFrequencies(text: string): number[] {
  const result: number[] = [];
  for (const line of text.split("\n")) {
    const idx = line.indexOf("Frequencies --");
    if (idx < 0) continue;
    for (const token of line.slice(idx + "Frequencies --".length).trim().split(/\s+/)) {
      const value = toNumber(token);
      if (value !== null && value < 0) result.push(value);
    }
  }
  return result;
}

const ELAPSED_RE =
  /Elapsed time:\s+(\d+)\s+days?\s+(\d+)\s+hours?\s+(\d+)\s+minutes?\s+([\d.]+)\s+seconds?/g;

/**
 * Wall-clock hours of the run, summed over every link that reported an
 * elapsed time. 0 when the log carries none.
 */
export function elapsedHours(text: string): number {
  let seconds = 0;
  for (const m of text.matchAll(ELAPSED_RE)) {
    const days = toNumber(m[1]) ?? 0;
    const hours = toNumber(m[2]) ?? 0;
    const minutes = toNumber(m[3]) ?? 0;
    const secs = toNumber(m[4]) ?? 0;
    seconds += days * 86_400 + hours * 3600 + minutes * 60 + secs;
  }
  return seconds / 3600;
}

/**
 * Final electronic energy in Hartree. A "Total Energy" line wins over the
 * last "SCF Done" line; 0 when neither is present.
 */
export function gaussianEnergy(text: string): number {
  let scf = 0;
  let total = 0;
  for (const line of text.split("\n")) {
    if (line.includes("SCF Done")) {
      // " SCF Done:  E(RTPSSh) =  -1342.39281928     A.U. after   11 cycles"
      const value = toNumber(line.trim().split(/\s+/)[4]);
      if (value !== null) scf = value;
    }
    if (line.includes("Total Energy")) {
      const parts = line.trim().split(/\s+/);
      const value = toNumber(parts[parts.length - 1]);
      if (value !== null) total = value;
    }
  }
  if (total !== 0) return total;
  return scf;
}

const ORIENTATION_HEADERS = ["Standard orientation:", "Input orientation:"];

/**
 * Cartesian coordinates (Angstrom) of the last orientation block in a
 * Gaussian log, in atom order.
 */
export function finalCoordinates(text: string): Array<[number, number, number]> {
  let start = -1;
  for (const header of ORIENTATION_HEADERS) {
    start = Math.max(start, text.lastIndexOf(header));
  }
  if (start < 0) {
    throw new GeometryParseError("no orientation block found in log");
  }

  const lines = text.slice(start).split("\n");
  // header, dashes, two title lines, dashes, then rows until the closing dashes
  const coords: Array<[number, number, number]> = [];
  for (const line of lines.slice(5)) {
    if (line.trim().startsWith("---")) break;
    const parts = line.trim().split(/\s+/);
    const x = toNumber(parts[3]);
    const y = toNumber(parts[4]);
    const z = toNumber(parts[5]);
    if (parts.length < 6 || x === null || y === null || z === null) {
      throw new GeometryParseError(`malformed orientation row: "${line.trim()}"`);
    }
    coords.push([x, y, z]);
  }
  if (coords.length === 0) {
    throw new GeometryParseError("orientation block is empty");
  }
  return coords;
}

// ---------------------------------------------------------------------------
// XYZ
// ---------------------------------------------------------------------------

export function parseXyz(text: string): Atom[] {
  const lines = text.split(/\r?\n/);
  const count = toNumber(lines[0]);
  if (count === null || !Number.isInteger(count) || count <= 0) {
    throw new GeometryParseError("first line of an XYZ file must be the atom count");
  }
  const atoms: Atom[] = [];
  for (const line of lines.slice(2)) {
    if (atoms.length === count) break;
    if (line.trim() === "") continue;
    const [symbol, xs, ys, zs] = line.trim().split(/\s+/);
    const x = toNumber(xs);
    const y = toNumber(ys);
    const z = toNumber(zs);
    if (symbol === undefined || x === null || y === null || z === null) {
      throw new GeometryParseError(`malformed XYZ row: "${line.trim()}"`);
    }
    atoms.push({ symbol, x, y, z });
  }
  if (atoms.length !== count) {
    throw new GeometryParseError(`expected ${count} atoms, found ${atoms.length}`);
  }
  return atoms;
}

/**
 * Pair optimized coordinates with the element symbols of the source
 * structure. Gaussian keeps the input atom order under `nosymm`.
 */
export function mergeGeometry(
  source: readonly Atom[],
  coords: ReadonlyArray<readonly [number, number, number]>,
): Atom[] {
  if (source.length !== coords.length) {
    throw new GeometryParseError(
      `atom count mismatch: source has ${source.length}, log has ${coords.length}`,
    );
  }
  return source.map((atom, i) => {
    const [x, y, z] = coords[i] ?? [atom.x, atom.y, atom.z];
    return { symbol: atom.symbol, x, y, z };
  });
}

export function formatAtoms(atoms: readonly Atom[]): string {
  return atoms
    .map(
      (a) =>
        `${a.symbol.padEnd(2)} ${a.x.toFixed(8).padStart(16)} ${a.y.toFixed(8).padStart(16)} ${a.z
          .toFixed(8)
          .padStart(16)}`,
    )
    .join("\n");
}

// ---------------------------------------------------------------------------
// ORCA
// ---------------------------------------------------------------------------

export function orcaTerminatedNormally(text: string): boolean {
  return text.includes("ORCA TERMINATED NORMALLY");
}

const EDME_HEADER = "SOC CORRECTED ABSORPTION SPECTRUM VIA TRANSITION ELECTRIC DIPOLE MOMENTS";
const DEBYE_PER_AU = 2.5417;

/**
 * Electric transition dipole (Debye) from the D2 column of the first three
 * SOC-corrected transitions out of the ground state. 1.0 when absent.
 */
export function orcaTransitionDipole(text: string): number {
  const blocks = text.split(EDME_HEADER).slice(1).reverse();
  const block = blocks.find((b) => b.includes("0-1.0A") && b.includes("D2"));
  if (block === undefined) return 1.0;

  const d2: number[] = [];
  for (const line of block.split("\n")) {
    if (!line.includes("->") || !line.includes("0-1.0A")) continue;
    // 0-1.0A  ->  1-3.0A  eV  cm-1  nm  fosc  D2 ...
    const value = toNumber(line.trim().split(/\s+/)[7]);
    if (value === null) continue;
    d2.push(value);
    if (d2.length === 3) break;
  }
  if (d2.length === 0) return 1.0;

  const mean = d2.reduce((a, b) => a + b, 0) / d2.length;
  return Math.sqrt(mean) * DEBYE_PER_AU;
}

const SOC_HEADER = "CALCULATED SOCME BETWEEN TRIPLETS AND SINGLETS";
const COMPLEX = String.raw`\(\s*([-\d.]+)\s*,\s*([-\d.]+)\s*\)`;
const SOC_ROW_RE = new RegExp(
  String.raw`^\s*1\s+0\s+` + COMPLEX + String.raw`\s+` + COMPLEX + String.raw`\s+` + COMPLEX,
  "m",
);

/**
 * RMS spin-orbit coupling (cm-1) between T1 and S0 from the X/Y/Z SOCME
 * table. 0 when absent.
 */
export function orcaSocConstant(text: string): number {
  const block = text
    .split(SOC_HEADER)
    .slice(1)
    .find((b) => {
      const head = b.split("\n").slice(0, 10).join("");
      return head.includes("X") && head.includes("Y") && head.includes("Z");
    });
  if (block === undefined) return 0;

  const m = SOC_ROW_RE.exec(block);
  if (!m) return 0;
  let sumSq = 0;
  for (const group of m.slice(1)) {
    const value = toNumber(group);
    if (value === null) return 0;
    sumSq += value * value;
  }
  return Math.sqrt(sumSq / 3);
}

// ---------------------------------------------------------------------------
// MOMAP
// ---------------------------------------------------------------------------

const COORDINATE_ERROR_RE = /internal coordinate|redundant coordinate|set_cart/i;
const FATAL_ERROR_RE = /\berror\b|traceback|segmentation fault|\bkilled\b|core dumped/i;

/**
 * Classify the overlap step's error log. The coordinate signature is checked
 * first because it also matches the generic one.
 */
export function overlapErrorSignature(text: string): OverlapErrorSignature | null {
  if (COORDINATE_ERROR_RE.test(text)) return "coordinate";
  if (FATAL_ERROR_RE.test(text)) return "fatal";
  return null;
}

const REORGANIZATION_RE = /Total reorganization energy.*:\s+([\d.]+)\s+([\d.]+)/;

/** The two reorganization energies (cm-1) of an overlap artifact. */
export function reorganizationEnergies(text: string): [number, number] | null {
  const m = REORGANIZATION_RE.exec(text);
  if (!m) return null;
  const a = toNumber(m[1]);
  const b = toNumber(m[2]);
  if (a === null || b === null) return null;
  return [a, b];
}

const RADIATIVE_RATE_RE = /radiative rate\s+\(\d+\):.*?([\d.E+-]+)\s+\/s/;
const ISC_RATE_RE = /Intersystem crossing Ead is.*?rate is\s+([\d.E+-]+)\s+s-1/;

export function radiativeRate(text: string): number {
  return toNumber(RADIATIVE_RATE_RE.exec(text)?.[1]) ?? 0;
}

export function intersystemCrossingRate(text: string): number {
  return toNumber(ISC_RATE_RE.exec(text)?.[1]) ?? 0;
}

/**
 * Internal-conversion rate: sixth column of the first numeric row after the
 * "1Energy ... 6kic" table header.
 */
export function internalConversionRate(text: string): number {
  let inTable = false;
  for (const raw of text.split("\n")) {
    const line = raw.trim();
    if (line === "") continue;
    if (!inTable) {
      inTable = line.includes("1Energy") && line.includes("6kic");
      continue;
    }
    if (line.startsWith("#") || line.startsWith("-")) continue;
    const parts = line.split(/\s+/);
    if (parts.length < 6 || toNumber(parts[0]) === null) continue;
    const kic = toNumber(parts[5]);
    if (kic !== null) return kic;
  }
  return 0;
}

/**
 * Emission peak and full width at half maximum (nm) from a spectrum table.
 * Columns: wavelength is the 4th, emission the 6th; two header lines.
 * Null when the table is empty or unreadable.
 */
export function spectrumSummary(text: string): SpectrumSummary | null {
  const wavelengths: number[] = [];
  const emission: number[] = [];
  for (const line of text.split("\n").slice(2)) {
    if (line.trim() === "") continue;
    const cols = line.trim().split(/\s+/).map(toNumber);
    const wl = cols[3];
    const emi = cols[5];
    if (cols.some((c) => c === null) || wl === undefined || wl === null || emi === undefined || emi === null) {
      return null;
    }
    wavelengths.push(wl);
    emission.push(emi);
  }
  if (emission.length === 0) return null;

  let peakIdx = 0;
  emission.forEach((v, i) => {
    if (v > (emission[peakIdx] ?? v)) peakIdx = i;
  });
  const max = emission[peakIdx] ?? 0;
  if (max === 0) return { peakWavelength: 0, fwhm: 0 };

  const half = max / 2;
  const above = emission.flatMap((v, i) => (v > half ? [i] : []));
  const first = above[0];
  const last = above[above.length - 1];
  const fwhm =
    first === undefined || last === undefined
      ? 0
      : Math.abs((wavelengths[first] ?? 0) - (wavelengths[last] ?? 0));
  return { peakWavelength: wavelengths[peakIdx] ?? 0, fwhm };
}
