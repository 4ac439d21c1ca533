import { copyFile, mkdir, readdir, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { MARKERS } from "./types.js";

type MarkerName = (typeof MARKERS)[keyof typeof MARKERS];

/**
 * Mutations of the marker files inside a unit's stage directories. These
 * files are the contract with the job scripts, so every write goes through
 * here.
 */
export class MarkerWriter {
  async touch(dir: string, marker: MarkerName): Promise<void> {
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, marker), "", "utf-8");
  }

  /** Remove the completion marker and submission record so the stage can run again. */
  async clearJob(dir: string): Promise<void> {
    await rm(join(dir, MARKERS.completion), { force: true });
    await rm(join(dir, MARKERS.submission), { force: true });
  }

  async recordOverlapChoice(dir: string, artifact: string): Promise<void> {
    await writeFile(join(dir, MARKERS.overlapAccepted), artifact, "utf-8");
  }

  /** Rename `<prefix>*.log` to `*.log.bak`; returns the renamed names. */
  async backupLogs(dir: string, prefix: string): Promise<string[]> {
    const renamed: string[] = [];
    for (const name of await this.list(dir)) {
      if (name.startsWith(prefix) && name.endsWith(".log")) {
        await rename(join(dir, name), join(dir, `${name}.bak`));
        renamed.push(name);
      }
    }
    return renamed;
  }

  async deleteCheckpoints(dir: string): Promise<void> {
    for (const name of await this.list(dir)) {
      if (name.endsWith(".chk")) {
        await rm(join(dir, name), { force: true });
      }
    }
  }

  /** Move `name` aside as `name.bak` when present. */
  async backupFile(dir: string, name: string): Promise<void> {
    try {
      await rename(join(dir, name), join(dir, `${name}.bak`));
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }
  }

  async copy(from: string, to: string): Promise<void> {
    await mkdir(dirname(to), { recursive: true });
    await copyFile(from, to);
  }

  /** Copy when the source exists; returns whether it did. */
  async copyIfPresent(from: string, to: string): Promise<boolean> {
    try {
      await mkdir(dirname(to), { recursive: true });
      await copyFile(from, to);
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  private async list(dir: string): Promise<string[]> {
    try {
      return await readdir(dir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
