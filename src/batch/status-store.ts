import { readFile } from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { writeFileAtomic } from "../core/atomic-write.js";
import { errorMessage } from "../types/index.js";

export enum UnitStatus {
  PENDING = "PENDING",
  RUNNING = "RUNNING",
  COMPLETED = "COMPLETED",
  FAILED = "FAILED",
  ERROR = "ERROR",
}

const UNIT_STATUSES: ReadonlySet<string> = new Set(Object.values(UnitStatus));

function isUnitStatus(value: string): value is UnitStatus {
  return UNIT_STATUSES.has(value);
}

export interface UnitStatusRecord {
  name: string;
  status: UnitStatus;
  /** Stage label shown to operators. */
  currentStage: string;
  /** `YYYY-MM-DD HH:MM:SS`, local time. */
  lastUpdated: string;
  remark: string;
  startTime: string;
}

export const STATUS_COLUMNS = [
  "Name",
  "Status",
  "Current_Stage",
  "Last_Updated",
  "Remark",
  "Start_Time",
] as const;

export class StatusStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StatusStoreError";
  }
}

function cell(row: Record<string, unknown>, column: string): string {
  const value = row[column];
  return typeof value === "string" ? value : "";
}

function decodeRow(raw: unknown, index: number): UnitStatusRecord {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new StatusStoreError(`row ${index + 1}: expected a record`);
  }
  const row: Record<string, unknown> = { ...raw };
  const name = cell(row, "Name").trim();
  if (name === "") {
    throw new StatusStoreError(`row ${index + 1}: "Name" is empty`);
  }
  const status = cell(row, "Status").trim();
  if (!isUnitStatus(status)) {
    throw new StatusStoreError(`row ${index + 1}: unknown status "${status}" for ${name}`);
  }
  return {
    name,
    status,
    currentStage: cell(row, "Current_Stage"),
    lastUpdated: cell(row, "Last_Updated"),
    remark: cell(row, "Remark"),
    startTime: cell(row, "Start_Time"),
  };
}

/**
 * Parse the status table. A missing `Start_Time` column reads as empty
 * strings; rows come back sorted by name.
 */
export function parseStatusTable(text: string): UnitStatusRecord[] {
  let rows: unknown;
  try {
    rows = parse(text, {
      columns: true,
      skip_empty_lines: true,
      relax_column_count: true,
      bom: true,
    });
  } catch (err) {
    throw new StatusStoreError(`Invalid status table: ${errorMessage(err)}`, { cause: err });
  }
  if (!Array.isArray(rows)) {
    throw new StatusStoreError("Invalid status table: expected rows");
  }
  return sortByName(rows.map((row, i) => decodeRow(row, i)));
}

export function renderStatusTable(records: Iterable<UnitStatusRecord>): string {
  const rows = sortByName([...records]).map((r) => [
    r.name,
    r.status,
    r.currentStage,
    r.lastUpdated,
    r.remark,
    r.startTime,
  ]);
  return stringify(rows, { header: true, columns: [...STATUS_COLUMNS] });
}

function sortByName(records: UnitStatusRecord[]): UnitStatusRecord[] {
  return records.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

/** The CSV progress table shared with operators. */
export class StatusStore {
  constructor(readonly path: string) {}

  /** Empty when the file does not exist yet. */
  async load(): Promise<UnitStatusRecord[]> {
    let text: string;
    try {
      text = await readFile(this.path, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
      throw new StatusStoreError(`Cannot read ${this.path}: ${errorMessage(err)}`, { cause: err });
    }
    return parseStatusTable(text);
  }

  async save(records: Iterable<UnitStatusRecord>): Promise<void> {
    await writeFileAtomic(this.path, renderStatusTable(records));
  }
}
