import { describe, expect, test } from "vitest";
import { Effect } from "effect";
import {
  EffectInterruptedError,
  runEffectPromise,
  withTimeout,
} from "../../../src/core/effect-concurrency.js";

describe("runEffectPromise", () => {
  test("resolves with the success value", async () => {
    expect(await runEffectPromise(Effect.succeed(3))).toBe(3);
  });

  test("rejects with the typed failure itself", async () => {
    const failure = new Error("typed");
    await expect(runEffectPromise(Effect.fail(failure))).rejects.toBe(failure);
  });

  test("surfaces defects", async () => {
    await expect(runEffectPromise(Effect.die(new Error("boom")))).rejects.toThrow("boom");
  });

  test("an aborted signal interrupts the effect", async () => {
    const ac = new AbortController();
    setTimeout(() => ac.abort("stop"), 5);
    const run = runEffectPromise(Effect.never, { signal: ac.signal });
    await expect(run).rejects.toBeInstanceOf(EffectInterruptedError);
    await expect(run).rejects.toThrow("Effect execution interrupted: stop");
  });
});

describe("withTimeout", () => {
  test("fails with the timeout error when the effect is too slow", async () => {
    await expect(
      runEffectPromise(withTimeout(Effect.never, 10, () => new Error("too slow"))),
    ).rejects.toThrow("too slow");
  });

  test("passes a fast result through", async () => {
    expect(await runEffectPromise(withTimeout(Effect.succeed("ok"), 1_000, () => new Error("x")))).toBe(
      "ok",
    );
  });
});
