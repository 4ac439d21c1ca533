import { readdir } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import type { Logger } from "../core/observability.js";
import type { PipelineConfig } from "../config/types.js";
import type { ArtifactProbe } from "../pipeline/artifact-probe.js";
import { FatalErrorLog } from "../pipeline/fatal-log.js";
import { UnitLayout } from "../pipeline/layout.js";
import type { AdvanceResult } from "../pipeline/types.js";
import { errorMessage, formatTimestamp, now, parseTimestamp } from "../types/index.js";
import type { Clock } from "../types/index.js";
import type { Alert, AlertSink } from "./alert-sink.js";
import { StatusStore, UnitStatus } from "./status-store.js";
import type { UnitStatusRecord } from "./status-store.js";

/** What the controller needs from a unit's state machine. */
export interface UnitDriver {
  advance(): Promise<AdvanceResult>;
}

export type DriverFactory = (layout: UnitLayout) => UnitDriver;

export type ControllerSettings = Pick<
  PipelineConfig,
  "sourceDir" | "resultsDir" | "maxConcurrent" | "stallTimeoutMs" | "autoExit" | "recovery"
>;

export interface BatchControllerOptions {
  settings: ControllerSettings;
  store: StatusStore;
  probe: ArtifactProbe;
  alerts: AlertSink;
  createDriver: DriverFactory;
  logger: Logger;
  clock?: Clock;
}

export interface CycleOutcome {
  /** True once auto-exit has seen enough consecutive idle cycles. */
  exit: boolean;
  running: number;
  pending: number;
}

export const TIMEOUT_MARKER = "[Timeout Alert Sent]";
const SOURCE_EXT = ".xyz";

/**
 * The outer loop. Each `runCycle()` discovers new units, fills free slots,
 * drives every running unit one step and persists the status table.
 * Persistence and alert failures are logged; they never end a cycle.
 */
export class BatchController {
  private readonly settings: ControllerSettings;
  private readonly store: StatusStore;
  private readonly probe: ArtifactProbe;
  private readonly alerts: AlertSink;
  private readonly createDriver: DriverFactory;
  private readonly logger: Logger;
  private readonly clock: Clock;

  /** Insertion order is discovery order. */
  private records: Map<string, UnitStatusRecord> | null = null;
  private readonly errorCounts = new Map<string, number>();
  private idleCycles = 0;
  private idleLogged = false;

  constructor(options: BatchControllerOptions) {
    this.settings = options.settings;
    this.store = options.store;
    this.probe = options.probe;
    this.alerts = options.alerts;
    this.createDriver = options.createDriver;
    this.logger = options.logger;
    this.clock = options.clock ?? now;
  }

  /** Current records in discovery order. */
  async snapshot(): Promise<UnitStatusRecord[]> {
    const records = await this.loadRecords();
    return [...records.values()].map((r) => ({ ...r }));
  }

  async runCycle(): Promise<CycleOutcome> {
    const records = await this.loadRecords();
    this.logger.debug("Cycle started");

    if (await this.discover(records)) {
      await this.persist(records);
    }
    this.admit(records);

    const running = this.withStatus(records, UnitStatus.RUNNING);
    if (running.length === 0) {
      return this.idle(records);
    }
    this.idleCycles = 0;
    this.idleLogged = false;

    for (const record of running.sort(byName)) {
      await this.processUnit(record);
    }

    await this.persist(records);
    if (await this.watchdog(records)) {
      await this.persist(records);
    }

    return this.outcome(records, false);
  }

  // ---------------------------------------------------------------------------
  // Discovery and admission
  // ---------------------------------------------------------------------------

  private async loadRecords(): Promise<Map<string, UnitStatusRecord>> {
    if (this.records === null) {
      const loaded = await this.store.load();
      this.records = new Map(loaded.map((r) => [r.name, r]));
    }
    return this.records;
  }

  private async discover(records: Map<string, UnitStatusRecord>): Promise<boolean> {
    let entries: string[];
    try {
      entries = await readdir(this.settings.sourceDir);
    } catch (err) {
      this.logger.warn("Source directory unreadable", {
        dir: this.settings.sourceDir,
        error: errorMessage(err),
      });
      return false;
    }

    const found = entries
      .filter((name) => extname(name) === SOURCE_EXT)
      .map((name) => basename(name, SOURCE_EXT))
      .filter((unit) => unit !== "" && !records.has(unit))
      .sort();

    const stamp = this.timestamp();
    for (const name of found) {
      records.set(name, {
        name,
        status: UnitStatus.PENDING,
        currentStage: "Init",
        lastUpdated: stamp,
        remark: "Newly added",
        startTime: "",
      });
    }
    if (found.length > 0) {
      this.logger.info("New units found", { count: found.length, units: found });
    }
    return found.length > 0;
  }

  /** ERROR units get their slot back first, then PENDING ones in discovery order. */
  private admit(records: Map<string, UnitStatusRecord>): void {
    let free = this.settings.maxConcurrent - this.withStatus(records, UnitStatus.RUNNING).length;
    const candidates = [
      ...this.withStatus(records, UnitStatus.ERROR),
      ...this.withStatus(records, UnitStatus.PENDING),
    ];
    for (const record of candidates) {
      if (free <= 0) break;
      const retrying = record.status === UnitStatus.ERROR;
      record.status = UnitStatus.RUNNING;
      record.remark = retrying ? "Retrying after error" : "Activated";
      if (record.startTime === "") record.startTime = this.timestamp();
      free--;
      this.logger.info(retrying ? "Unit re-admitted after error" : "Unit activated", {
        unit: record.name,
      });
    }
  }

  private async idle(records: Map<string, UnitStatusRecord>): Promise<CycleOutcome> {
    if (!this.idleLogged) {
      this.logger.info("No active units; waiting for new sources");
      this.idleLogged = true;
    }
    const { autoExit } = this.settings;
    if (!autoExit.enabled) {
      return this.outcome(records, false);
    }
    this.idleCycles++;
    if (this.idleCycles < autoExit.idleCycles) {
      this.logger.debug("Idle cycle", { count: this.idleCycles, limit: autoExit.idleCycles });
      return this.outcome(records, false);
    }
    this.logger.info("Idle limit reached; exiting", { cycles: this.idleCycles });
    await this.persist(records);
    return this.outcome(records, true);
  }

  // ---------------------------------------------------------------------------
  // Per-unit outcome classification
  // ---------------------------------------------------------------------------

  private async processUnit(record: UnitStatusRecord): Promise<void> {
    const log = this.logger.forUnit(record.name);
    const sourcePath = join(this.settings.sourceDir, `${record.name}${SOURCE_EXT}`);
    const layout = new UnitLayout(record.name, this.settings.resultsDir, sourcePath);
    const before = { status: record.status, stage: record.currentStage, remark: record.remark };

    try {
      if (!(await this.probe.exists(sourcePath))) {
        record.status = UnitStatus.FAILED;
        record.remark = "XYZ Missing";
        log.warn("Source file missing", { path: sourcePath });
        await this.alert({ title: "Source file missing", body: `Source file missing: ${record.name}${SOURCE_EXT}` });
      } else if (await this.probe.exists(layout.fatalLog)) {
        record.status = UnitStatus.FAILED;
        record.remark = "Fatal Error";
        const fatal = new FatalErrorLog(layout.fatalLog, this.clock);
        const tail = (await fatal.tail(200)).trim();
        log.error("Unit failed", { reason: tail });
        await this.alert({
          title: `Calculation failed: ${record.name}`,
          body: `Reason: ${tail === "" ? "Unknown fatal error" : tail}`,
        });
      } else if (await this.probe.exists(layout.report)) {
        record.status = UnitStatus.COMPLETED;
        record.currentStage = "Finished";
        record.remark = "PLQY Report Generated";
        log.info("Unit completed");
      } else {
        const result = await this.createDriver(layout).advance();
        this.errorCounts.delete(record.name);
        // An unchanged stage keeps its remark, so a sent timeout alert is remembered.
        if (result.stageLabel !== record.currentStage || !record.remark.startsWith("Processing")) {
          record.currentStage = result.stageLabel;
          record.remark = "Processing";
        }
        log.debug("Unit advanced", { stage: result.stageLabel, terminal: result.terminal });
      }
    } catch (err) {
      await this.recordError(record, err);
    }

    if (
      record.status !== before.status ||
      record.currentStage !== before.stage ||
      record.remark !== before.remark
    ) {
      record.lastUpdated = this.timestamp();
    }
  }

  private async recordError(record: UnitStatusRecord, err: unknown): Promise<void> {
    const message = errorMessage(err);
    const count = (this.errorCounts.get(record.name) ?? 0) + 1;
    this.errorCounts.set(record.name, count);
    const log = this.logger.forUnit(record.name);

    if (count > this.settings.recovery.maxErrorRetries) {
      record.status = UnitStatus.FAILED;
      record.remark = "Repeated errors";
      this.errorCounts.delete(record.name);
      log.error("Unit failed after repeated errors", { count, error: message });
      await this.alert({
        title: `Repeated errors: ${record.name}`,
        body: `Failed ${count} consecutive cycles. Last error: ${message}`,
      });
      return;
    }

    record.status = UnitStatus.ERROR;
    // Code points, so a surrogate pair is never split.
    record.remark = [...message].slice(0, 50).join("");
    log.error("Unhandled exception while advancing", { count, error: message });
    await this.alert({
      title: `Unhandled exception: ${record.name}`,
      body: `Unhandled exception: ${message}`,
    });
  }

  // ---------------------------------------------------------------------------
  // Watchdog
  // ---------------------------------------------------------------------------

  /** Returns whether any remark changed. */
  private async watchdog(records: Map<string, UnitStatusRecord>): Promise<boolean> {
    const current = this.clock();
    let changed = false;
    for (const record of this.withStatus(records, UnitStatus.RUNNING)) {
      const last = parseTimestamp(record.lastUpdated);
      if (last === null) continue;
      const elapsed = current - last;
      if (elapsed <= this.settings.stallTimeoutMs || record.remark.includes(TIMEOUT_MARKER)) {
        continue;
      }
      record.remark = `${record.remark} ${TIMEOUT_MARKER}`;
      changed = true;
      const hours = (elapsed / 3_600_000).toFixed(1);
      this.logger.forUnit(record.name).warn("Unit stalled", { hours, stage: record.currentStage });
      await this.alert({
        title: "Unit stalled (timeout)",
        body: `${record.name} has not progressed for ${hours} hours.\nCurrent stage: ${record.currentStage}`,
      });
    }
    return changed;
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private async alert(alert: Alert): Promise<void> {
    try {
      await this.alerts.send(alert);
    } catch (err) {
      this.logger.error("Alert delivery failed", { title: alert.title, error: errorMessage(err) });
    }
  }

  private async persist(records: Map<string, UnitStatusRecord>): Promise<void> {
    try {
      await this.store.save(records.values());
    } catch (err) {
      this.logger.error("Status table save failed", {
        path: this.store.path,
        error: errorMessage(err),
      });
    }
  }

  private withStatus(
    records: Map<string, UnitStatusRecord>,
    status: UnitStatus,
  ): UnitStatusRecord[] {
    return [...records.values()].filter((r) => r.status === status);
  }

  private outcome(records: Map<string, UnitStatusRecord>, exit: boolean): CycleOutcome {
    return {
      exit,
      running: this.withStatus(records, UnitStatus.RUNNING).length,
      pending: this.withStatus(records, UnitStatus.PENDING).length,
    };
  }

  private timestamp(): string {
    return formatTimestamp(this.clock());
  }
}

function byName(a: UnitStatusRecord, b: UnitStatusRecord): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}
