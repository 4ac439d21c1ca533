import { appendFile, mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";
import { formatTimestamp, now } from "../types/index.js";
import type { Clock } from "../types/index.js";

/**
 * Append-only record of unrecoverable failures for one unit. Once the file
 * exists the unit is finished for good; nothing in the system clears it.
 */
export class FatalErrorLog {
  constructor(
    readonly path: string,
    private readonly clock: Clock = now,
  ) {}

  async exists(): Promise<boolean> {
    return (await this.read()) !== null;
  }

  async append(message: string): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const entry = `[${formatTimestamp(this.clock())}] FATAL ERROR:\n${message}\n`;
    await appendFile(this.path, entry, "utf-8");
  }

  async read(): Promise<string | null> {
    try {
      return await readFile(this.path, "utf-8");
    } catch {
      return null;
    }
  }

  /** The last `chars` characters, for alert bodies. */
  async tail(chars = 200): Promise<string> {
    const text = (await this.read()) ?? "";
    return text.length > chars ? text.slice(-chars) : text;
  }
}
