import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { rm } from "node:fs/promises";
import { join } from "node:path";
import { BatchController } from "../../../src/batch/controller.js";
import type { ControllerSettings, UnitDriver } from "../../../src/batch/controller.js";
import { StatusStore, UnitStatus } from "../../../src/batch/status-store.js";
import { DEFAULT_CONFIG } from "../../../src/config/defaults.js";
import { FsArtifactProbe } from "../../../src/pipeline/artifact-probe.js";
import type { AdvanceResult } from "../../../src/pipeline/types.js";
import {
  ManualClock,
  RecordingAlertSink,
  SOURCE_XYZ,
  T0,
  captureLogger,
  makeTempDir,
  put,
  removeDir,
} from "../../helpers/fixtures.js";
import type { CapturedLogger } from "../../helpers/fixtures.js";

const IN_PROGRESS: AdvanceResult = { stageLabel: "Starting / In Progress", terminal: null };

describe("BatchController", () => {
  let dir: string;
  let sourceDir: string;
  let resultsDir: string;
  let store: StatusStore;
  let alerts: RecordingAlertSink;
  let clock: ManualClock;
  let log: CapturedLogger;
  /** Units whose driver was asked to advance, in call order. */
  let advanced: string[];
  let behaviour: Map<string, () => Promise<AdvanceResult>>;

  beforeEach(async () => {
    dir = await makeTempDir();
    sourceDir = join(dir, "xyz");
    resultsDir = join(dir, "results");
    store = new StatusStore(join(dir, "job_status.csv"));
    alerts = new RecordingAlertSink();
    clock = new ManualClock(T0);
    log = captureLogger("batch");
    advanced = [];
    behaviour = new Map();
    await put(join(sourceDir, "README.txt"), "not a structure");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  function controller(overrides: Partial<ControllerSettings> = {}): BatchController {
    return new BatchController({
      settings: {
        sourceDir,
        resultsDir,
        maxConcurrent: 2,
        stallTimeoutMs: 48 * 3_600_000,
        autoExit: { enabled: false, idleCycles: 3 },
        recovery: DEFAULT_CONFIG.recovery,
        ...overrides,
      },
      store,
      probe: new FsArtifactProbe(),
      alerts,
      createDriver: (layout): UnitDriver => ({
        advance: async () => {
          advanced.push(layout.unit);
          const next = behaviour.get(layout.unit);
          return next ? next() : IN_PROGRESS;
        },
      }),
      logger: log.logger,
      clock: clock.now,
    });
  }

  const addSource = (name: string): Promise<void> => put(join(sourceDir, `${name}.xyz`), SOURCE_XYZ);

  async function statusOf(c: BatchController, name: string): Promise<UnitStatus | undefined> {
    return (await c.snapshot()).find((r) => r.name === name)?.status;
  }

  test("new sources are discovered and admitted up to the cap", async () => {
    await addSource("c");
    await addSource("a");
    await addSource("b");
    const c = controller();

    expect(await c.runCycle()).toEqual({ exit: false, running: 2, pending: 1 });
    expect(advanced).toEqual(["a", "b"]);

    const records = await c.snapshot();
    expect(records.map((r) => [r.name, r.status])).toEqual([
      ["a", UnitStatus.RUNNING],
      ["b", UnitStatus.RUNNING],
      ["c", UnitStatus.PENDING],
    ]);
    expect(records[0]).toEqual({
      name: "a",
      status: UnitStatus.RUNNING,
      currentStage: "Starting / In Progress",
      lastUpdated: "2024-01-01 00:00:00",
      remark: "Processing",
      startTime: "2024-01-01 00:00:00",
    });
    expect(records[2]?.remark).toBe("Newly added");
    expect((await store.load()).map((r) => r.status)).toEqual([
      UnitStatus.RUNNING,
      UnitStatus.RUNNING,
      UnitStatus.PENDING,
    ]);
  });

  test("a completed unit frees its slot on the following cycle", async () => {
    await addSource("a");
    await addSource("b");
    const c = controller({ maxConcurrent: 1 });
    await c.runCycle();

    await put(join(resultsDir, "a", "REPORT_PLQY.txt"), "report");
    expect(await c.runCycle()).toEqual({ exit: false, running: 0, pending: 1 });
    const [a] = await c.snapshot();
    expect(a?.status).toBe(UnitStatus.COMPLETED);
    expect(a?.currentStage).toBe("Finished");
    expect(a?.remark).toBe("PLQY Report Generated");

    await c.runCycle();
    expect(await statusOf(c, "b")).toBe(UnitStatus.RUNNING);
    expect(advanced).toEqual(["a", "b"]);
  });

  test("a fatal log fails the unit with one alert", async () => {
    await addSource("a");
    await put(join(resultsDir, "a", "FATAL_ERROR.txt"), "[2024-01-01 00:00:00] FATAL ERROR:\nboom\n");
    const c = controller();

    await c.runCycle();
    await c.runCycle();
    expect(await statusOf(c, "a")).toBe(UnitStatus.FAILED);
    expect((await c.snapshot())[0]?.remark).toBe("Fatal Error");
    expect(advanced).toEqual([]);
    expect(alerts.alerts).toEqual([
      {
        title: "Calculation failed: a",
        body: "Reason: [2024-01-01 00:00:00] FATAL ERROR:\nboom",
      },
    ]);
  });

  test("a vanished source fails the unit", async () => {
    await addSource("a");
    const c = controller();
    await c.runCycle();
    await rm(join(sourceDir, "a.xyz"));

    await c.runCycle();
    const [a] = await c.snapshot();
    expect(a?.status).toBe(UnitStatus.FAILED);
    expect(a?.remark).toBe("XYZ Missing");
    expect(alerts.alerts).toEqual([{ title: "Source file missing", body: "Source file missing: a.xyz" }]);
  });

  test("a stalled unit raises exactly one timeout alert", async () => {
    await addSource("a");
    const c = controller();
    await c.runCycle();

    clock.advanceHours(49);
    await c.runCycle();
    let [a] = await c.snapshot();
    expect(a?.remark).toBe("Processing [Timeout Alert Sent]");
    expect(a?.lastUpdated).toBe("2024-01-01 00:00:00");
    expect(alerts.alerts).toEqual([
      {
        title: "Unit stalled (timeout)",
        body: "a has not progressed for 49.0 hours.\nCurrent stage: Starting / In Progress",
      },
    ]);

    clock.advanceHours(1);
    await c.runCycle();
    expect(alerts.alerts).toHaveLength(1);

    behaviour.set("a", async () => ({ stageLabel: "Gaussian S0 Done", terminal: null }));
    await c.runCycle();
    [a] = await c.snapshot();
    expect(a?.currentStage).toBe("Gaussian S0 Done");
    expect(a?.remark).toBe("Processing");
    expect(a?.lastUpdated).toBe("2024-01-03 02:00:00");
    expect(alerts.alerts).toHaveLength(1);
  });

  test("errors are retried first and fail the unit past the bound", async () => {
    await addSource("a");
    await addSource("b");
    behaviour.set("a", async () => {
      throw new Error("disk full");
    });
    const c = controller({ maxConcurrent: 1 });

    expect(await c.runCycle()).toEqual({ exit: false, running: 0, pending: 1 });
    let [a] = await c.snapshot();
    expect(a?.status).toBe(UnitStatus.ERROR);
    expect(a?.remark).toBe("disk full");

    await c.runCycle();
    await c.runCycle();
    expect(advanced).toEqual(["a", "a", "a"]);
    expect(await statusOf(c, "b")).toBe(UnitStatus.PENDING);

    await c.runCycle();
    [a] = await c.snapshot();
    expect(a?.status).toBe(UnitStatus.FAILED);
    expect(a?.remark).toBe("Repeated errors");
    expect(alerts.alerts.map((x) => x.title)).toEqual([
      "Unhandled exception: a",
      "Unhandled exception: a",
      "Unhandled exception: a",
      "Repeated errors: a",
    ]);
    expect(alerts.alerts[3]?.body).toBe("Failed 4 consecutive cycles. Last error: disk full");

    await c.runCycle();
    expect(await statusOf(c, "b")).toBe(UnitStatus.RUNNING);
  });

  test("an error remark keeps the first 50 characters whole", async () => {
    await addSource("a");
    const message = `${"x".repeat(49)}\u{1F600} while reading the log`;
    behaviour.set("a", async () => {
      throw new Error(message);
    });
    await controller().runCycle();

    const [a] = await store.load();
    expect(a?.remark).toBe(`${"x".repeat(49)}\u{1F600}`);
    expect(alerts.alerts[0]?.body).toContain(message);
  });

  test("a failing alert sink does not stop the cycle", async () => {
    await addSource("a");
    await put(join(resultsDir, "a", "FATAL_ERROR.txt"), "boom\n");
    alerts.failWith = new Error("hook down");
    const c = controller();

    await c.runCycle();
    expect((await store.load())[0]?.status).toBe(UnitStatus.FAILED);
    expect(log.entries().filter((e) => e.message === "Alert delivery failed")).toEqual([
      expect.objectContaining({
        level: "error",
        data: { title: "Calculation failed: a", error: "hook down" },
      }),
    ]);
  });

  test("auto-exit after the configured number of idle cycles", async () => {
    const c = controller({ autoExit: { enabled: true, idleCycles: 2 } });

    expect((await c.runCycle()).exit).toBe(false);
    expect((await c.runCycle()).exit).toBe(true);
    const idle = log.entries().filter((e) => e.message === "No active units; waiting for new sources");
    expect(idle).toHaveLength(1);
  });

  test("without auto-exit an idle controller keeps going", async () => {
    const c = controller();
    for (let i = 0; i < 5; i++) {
      expect((await c.runCycle()).exit).toBe(false);
    }
  });

  test("an unreadable source directory is only a warning", async () => {
    const c = controller({ sourceDir: join(dir, "missing") });
    expect(await c.runCycle()).toEqual({ exit: false, running: 0, pending: 0 });
    expect(log.entries().some((e) => e.level === "warn" && e.message === "Source directory unreadable")).toBe(
      true,
    );
  });

  test("a restarted controller resumes from the status table", async () => {
    await addSource("a");
    await addSource("b");
    await controller({ maxConcurrent: 1 }).runCycle();

    const restarted = controller({ maxConcurrent: 1 });
    expect((await restarted.snapshot()).map((r) => r.status)).toEqual([
      UnitStatus.RUNNING,
      UnitStatus.PENDING,
    ]);
    await restarted.runCycle();
    expect(advanced).toEqual(["a", "a"]);
  });
});
