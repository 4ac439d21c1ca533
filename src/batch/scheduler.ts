import type { Logger } from "../core/observability.js";
import { errorMessage } from "../types/index.js";
import type { CycleOutcome } from "./controller.js";
import { StatusStoreError } from "./status-store.js";

/** A source of cycle ticks; iteration ends when `signal` aborts. */
export interface Ticker {
  ticks(signal: AbortSignal): AsyncIterable<number>;
}

/**
 * Wait for the given number of milliseconds, or resolve early if the
 * AbortSignal fires. Returns true if aborted, false if the timer expired.
 */
export function waitOrAbort(ms: number, signal: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve(true);
      return;
    }
    let timer: ReturnType<typeof setTimeout> | undefined;
    const onAbort = () => {
      if (timer !== undefined) clearTimeout(timer);
      resolve(true);
    };
    timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve(false);
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/** Ticks immediately, then every `intervalMs`. */
export class IntervalTicker implements Ticker {
  constructor(private readonly intervalMs: number) {}

  async *ticks(signal: AbortSignal): AsyncGenerator<number> {
    let n = 0;
    while (!signal.aborted) {
      yield n++;
      const aborted = await waitOrAbort(this.intervalMs, signal);
      if (aborted) break;
    }
  }
}

/** Exactly `count` ticks with no delay between them. */
export class ManualTicker implements Ticker {
  constructor(private readonly count: number) {}

  async *ticks(signal: AbortSignal): AsyncGenerator<number> {
    for (let n = 0; n < this.count && !signal.aborted; n++) {
      yield n;
    }
  }
}

export interface CycleRunner {
  runCycle(): Promise<CycleOutcome>;
}

export type LoopEnd = "exit" | "aborted" | "ticks_exhausted" | "halted";

/**
 * One cycle per tick until the controller asks to exit, the signal aborts
 * or the ticker runs dry. A cycle that throws is logged and the loop waits
 * for the next tick, except for an unreadable status table, which would
 * fail the same way on every tick and halts the loop.
 */
export async function runLoop(
  controller: CycleRunner,
  ticker: Ticker,
  signal: AbortSignal,
  logger?: Logger,
): Promise<LoopEnd> {
  for await (const tick of ticker.ticks(signal)) {
    let outcome: CycleOutcome;
    try {
      outcome = await controller.runCycle();
    } catch (err) {
      if (err instanceof StatusStoreError) {
        logger?.fatal("Status table unreadable, stopping", { tick, error: err.message });
        return "halted";
      }
      logger?.error("Cycle failed", { tick, error: errorMessage(err) });
      continue;
    }
    logger?.debug("Cycle finished", { tick, ...outcome });
    if (outcome.exit) return "exit";
    if (signal.aborted) return "aborted";
  }
  return signal.aborted ? "aborted" : "ticks_exhausted";
}
