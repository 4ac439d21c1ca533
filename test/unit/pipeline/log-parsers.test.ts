import { describe, expect, test } from "vitest";
import {
  GeometryParseError,
  elapsedHours,
  finalCoordinates,
  gaussianEnergy,
  gaussianTerminatedNormally,
  imaginaryFrequencies,
  internalConversionRate,
  intersystemCrossingRate,
  mergeGeometry,
  orcaSocConstant,
  orcaTerminatedNormally,
  orcaTransitionDipole,
  overlapErrorSignature,
  parseXyz,
  radiativeRate,
  reorganizationEnergies,
  spectrumSummary,
} from "../../../src/pipeline/log-parsers.js";
import { SOURCE_XYZ, gaussianLog } from "../../helpers/fixtures.js";

describe("Gaussian logs", () => {
  test("normal termination must come after the last error termination", () => {
    expect(gaussianTerminatedNormally(gaussianLog())).toBe(true);
    expect(gaussianTerminatedNormally(gaussianLog({ terminated: "error" }))).toBe(false);
    expect(
      gaussianTerminatedNormally(" Normal termination of link\n Error termination via Lnk1e\n"),
    ).toBe(false);
    expect(gaussianTerminatedNormally("")).toBe(false);
  });

  test("imaginary frequencies are the negative ones", () => {
    const log = gaussianLog({ frequencies: [-52.5, 10, 120.25] }) +
      " Frequencies --   -3.1000   200.0000   300.0000\n";
    expect(imaginaryFrequencies(log)).toEqual([-52.5, -3.1]);
    expect(imaginaryFrequencies(gaussianLog({ frequencies: [15, 30] }))).toEqual([]);
  });

  test("elapsed hours are summed over every link", () => {
    const log =
      " Elapsed time:       0 days  2 hours 30 minutes  0.0 seconds.\n" +
      " Elapsed time:       1 days  0 hours  0 minutes 36.0 seconds.\n";
    expect(elapsedHours(log)).toBeCloseTo(26.51, 6);
    expect(elapsedHours("no timing here")).toBe(0);
  });

  test("energy prefers a Total Energy line over SCF Done", () => {
    expect(gaussianEnergy(gaussianLog({ energy: -1342.25 }))).toBe(-1342.25);
    const td = gaussianLog({ energy: -1342.25 }) + " Total Energy, E(TD-HF/TD-DFT) =  -1342.125\n";
    expect(gaussianEnergy(td)).toBe(-1342.125);
    expect(gaussianEnergy("")).toBe(0);
  });

  test("final coordinates come from the last orientation block", () => {
    const log =
      gaussianLog({ coords: [[1, 1, 1], [2, 2, 2]] }) +
      gaussianLog({ coords: [[0.5, -0.25, 0], [0, 0, 1.2]] });
    expect(finalCoordinates(log)).toEqual([
      [0.5, -0.25, 0],
      [0, 0, 1.2],
    ]);
  });

  test("a log without an orientation block is a parse error", () => {
    expect(() => finalCoordinates(" Normal termination\n")).toThrow(GeometryParseError);
  });
});

describe("XYZ geometry", () => {
  test("parses symbols and coordinates", () => {
    expect(parseXyz(SOURCE_XYZ)).toEqual([
      { symbol: "C", x: 0, y: 0, z: 0 },
      { symbol: "H", x: 0, y: 0, z: 1.09 },
    ]);
  });

  test("rejects a count that does not match the rows", () => {
    expect(() => parseXyz("3\ncomment\nC 0 0 0\n")).toThrow("expected 3 atoms, found 1");
    expect(() => parseXyz("x\n")).toThrow(GeometryParseError);
  });

  test("mergeGeometry keeps symbols and takes new coordinates", () => {
    const merged = mergeGeometry(parseXyz(SOURCE_XYZ), [
      [0, 0, 0.1],
      [0, 0, 1.2],
    ]);
    expect(merged).toEqual([
      { symbol: "C", x: 0, y: 0, z: 0.1 },
      { symbol: "H", x: 0, y: 0, z: 1.2 },
    ]);
    expect(() => mergeGeometry(parseXyz(SOURCE_XYZ), [[0, 0, 0]])).toThrow(
      "atom count mismatch: source has 2, log has 1",
    );
  });
});

describe("ORCA output", () => {
  test("termination marker", () => {
    expect(orcaTerminatedNormally("****ORCA TERMINATED NORMALLY****")).toBe(true);
    expect(orcaTerminatedNormally("aborting the run")).toBe(false);
  });

  test("transition dipole from the first three D2 values", () => {
    const out = [
      "SOC CORRECTED ABSORPTION SPECTRUM VIA TRANSITION ELECTRIC DIPOLE MOMENTS",
      "     Transition      Energy  Energy  Wavelength  fosc  D2  DX DY DZ",
      "  0-1.0A  ->  1-3.0A    2.5   20000   500   0.0001   0.04   0 0 0",
      "  0-1.0A  ->  2-3.0A    2.5   20000   500   0.0001   0.09   0 0 0",
      "  0-1.0A  ->  3-3.0A    2.5   20000   500   0.0001   0.14   0 0 0",
      "  0-1.0A  ->  4-1.0A    3.0   24000   410   0.1      9.00   0 0 0",
      "",
    ].join("\n");
    // mean D2 = 0.09, sqrt = 0.3
    expect(orcaTransitionDipole(out)).toBeCloseTo(0.3 * 2.5417, 10);
    expect(orcaTransitionDipole("nothing")).toBe(1.0);
  });

  test("SOC constant is the RMS of the T1-S0 matrix elements", () => {
    const out = [
      "CALCULATED SOCME BETWEEN TRIPLETS AND SINGLETS",
      "      Root                          <T|HSO|S>  (Re, Im) cm-1",
      "   T      S           Z                     X                     Y",
      "-----------------------------------------------------------------------",
      "   1      0    (   3.00 ,  0.00)    (   0.00 , 4.00)    (  12.00 ,  0.00)",
      "",
    ].join("\n");
    // squares of the captured parts: 9 + 0 + 0 + 16 + 144 + 0 = 169 over 3
    expect(orcaSocConstant(out)).toBeCloseTo(Math.sqrt(169 / 3), 10);
    expect(orcaSocConstant("")).toBe(0);
  });
});

describe("MOMAP output", () => {
  test("coordinate errors are recognised before generic failures", () => {
    expect(overlapErrorSignature("ERROR: failed to build redundant coordinate system")).toBe(
      "coordinate",
    );
    expect(overlapErrorSignature("Traceback (most recent call last):")).toBe("fatal");
    expect(overlapErrorSignature("Segmentation fault (core dumped)")).toBe("fatal");
    expect(overlapErrorSignature("evc finished\nall good\n")).toBeNull();
  });

  test("reorganization energies", () => {
    expect(
      reorganizationEnergies(" Total reorganization energy      (cm-1):     1234.50     2345.75\n"),
    ).toEqual([1234.5, 2345.75]);
    expect(reorganizationEnergies("no summary")).toBeNull();
  });

  test("radiative and intersystem crossing rates", () => {
    expect(
      radiativeRate(" radiative rate     (0):     1.23456789E+06 /s,   8.10E-07 s\n"),
    ).toBe(1.23456789e6);
    expect(
      intersystemCrossingRate(" Intersystem crossing Ead is 0.1 au, rate is  4.5E+04 s-1\n"),
    ).toBe(4.5e4);
    expect(radiativeRate("")).toBe(0);
    expect(intersystemCrossingRate("")).toBe(0);
  });

  test("internal conversion rate from the table after the header", () => {
    const log = [
      "#   1Energy   2Energy   3tau   4Intensity   5Ead   6kic",
      "# ------------------------------------------------------",
      "   0.10000   2.72114   0.0   1.0   0.1   3.25E+08",
      "   0.20000   5.44228   0.0   1.0   0.1   9.99E+09",
    ].join("\n");
    expect(internalConversionRate(log)).toBe(3.25e8);
    expect(internalConversionRate("no table")).toBe(0);
  });

  test("spectrum peak and width at half maximum", () => {
    const rows = [
      [500, 400, 0.1],
      [450, 450, 0.6],
      [420, 480, 1.0],
      [400, 500, 0.7],
      [380, 520, 0.2],
    ];
    const text = [
      "# spectrum",
      "# E(au) E(eV) cm-1 nm abs emi",
      ...rows.map(([cm, nm, emi]) => `0.1 2.0 ${cm} ${nm} 0.0 ${emi}`),
    ].join("\n");
    // above half (0.5): 450, 480, 500
    expect(spectrumSummary(text)).toEqual({ peakWavelength: 480, fwhm: 50 });
    expect(spectrumSummary("h1\nh2\n")).toBeNull();
    expect(spectrumSummary("h1\nh2\n0.1 2.0 x 480 0.0 1.0\n")).toBeNull();
  });
});
