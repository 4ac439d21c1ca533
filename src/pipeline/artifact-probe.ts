import { access, readFile } from "node:fs/promises";
import { join } from "node:path";
import {
  elapsedHours,
  gaussianEnergy,
  gaussianTerminatedNormally,
  imaginaryFrequencies,
  orcaTerminatedNormally,
  overlapErrorSignature,
  reorganizationEnergies,
} from "./log-parsers.js";
import type { OverlapErrorSignature } from "./log-parsers.js";
import { MARKERS, OVERLAP_ARTIFACTS, OVERLAP_ERROR_LOG } from "./types.js";

export interface ReorganizationReading {
  file: string;
  /** Null when the artifact is missing or carries no energy line. */
  energies: [number, number] | null;
}

/**
 * Read-only view of the evidence jobs leave behind. The engine never reads
 * the filesystem except through this interface.
 */
export interface ArtifactProbe {
  exists(path: string): Promise<boolean>;
  readText(path: string): Promise<string | null>;

  hasCompletion(dir: string): Promise<boolean>;
  hasSubmission(dir: string): Promise<boolean>;
  hasGeometryRetry(dir: string): Promise<boolean>;
  hasOverlapRetry(dir: string): Promise<boolean>;
  /** Content of the overlap acceptance marker, or null when absent. */
  acceptedOverlap(dir: string): Promise<string | null>;

  gaussianTerminatedNormally(log: string): Promise<boolean>;
  imaginaryFrequencies(log: string): Promise<number[]>;
  elapsedHours(log: string): Promise<number>;
  energy(log: string): Promise<number>;
  orcaTerminatedNormally(output: string): Promise<boolean>;

  overlapErrorSignature(dir: string): Promise<OverlapErrorSignature | null>;
  reorganization(dir: string): Promise<ReorganizationReading[]>;
}

export class FsArtifactProbe implements ArtifactProbe {
  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }

  async readText(path: string): Promise<string | null> {
    try {
      return await readFile(path, "utf-8");
    } catch {
      return null;
    }
  }

  hasCompletion(dir: string): Promise<boolean> {
    return this.exists(join(dir, MARKERS.completion));
  }

  hasSubmission(dir: string): Promise<boolean> {
    return this.exists(join(dir, MARKERS.submission));
  }

  hasGeometryRetry(dir: string): Promise<boolean> {
    return this.exists(join(dir, MARKERS.geometryRetry));
  }

  hasOverlapRetry(dir: string): Promise<boolean> {
    return this.exists(join(dir, MARKERS.overlapRetry));
  }

  async acceptedOverlap(dir: string): Promise<string | null> {
    const text = await this.readText(join(dir, MARKERS.overlapAccepted));
    if (text === null) return null;
    const name = text.trim();
    return name === "" ? null : name;
  }

  async gaussianTerminatedNormally(log: string): Promise<boolean> {
    const text = await this.readText(log);
    return text !== null && gaussianTerminatedNormally(text);
  }

  async imaginaryFrequencies(log: string): Promise<number[]> {
    const text = await this.readText(log);
    return text === null ? [] : imaginaryFrequencies(text);
  }

  async elapsedHours(log: string): Promise<number> {
    const text = await this.readText(log);
    return text === null ? 0 : elapsedHours(text);
  }

  async energy(log: string): Promise<number> {
    const text = await this.readText(log);
    return text === null ? 0 : gaussianEnergy(text);
  }

  async orcaTerminatedNormally(output: string): Promise<boolean> {
    const text = await this.readText(output);
    return text !== null && orcaTerminatedNormally(text);
  }

  async overlapErrorSignature(dir: string): Promise<OverlapErrorSignature | null> {
    const text = await this.readText(join(dir, OVERLAP_ERROR_LOG));
    return text === null ? null : overlapErrorSignature(text);
  }

  async reorganization(dir: string): Promise<ReorganizationReading[]> {
    const readings: ReorganizationReading[] = [];
    for (const file of OVERLAP_ARTIFACTS) {
      const text = await this.readText(join(dir, file));
      readings.push({ file, energies: text === null ? null : reorganizationEnergies(text) });
    }
    return readings;
  }
}
