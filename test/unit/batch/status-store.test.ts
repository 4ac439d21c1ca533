import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import {
  StatusStore,
  StatusStoreError,
  UnitStatus,
  parseStatusTable,
  renderStatusTable,
} from "../../../src/batch/status-store.js";
import type { UnitStatusRecord } from "../../../src/batch/status-store.js";
import { makeTempDir, put, removeDir } from "../../helpers/fixtures.js";

const HEADER = "Name,Status,Current_Stage,Last_Updated,Remark,Start_Time";

const records: UnitStatusRecord[] = [
  {
    name: "beta",
    status: UnitStatus.PENDING,
    currentStage: "Init",
    lastUpdated: "2024-01-01 00:00:00",
    remark: "Newly added",
    startTime: "",
  },
  {
    name: "alpha",
    status: UnitStatus.RUNNING,
    currentStage: "Gaussian S0 Done",
    lastUpdated: "2024-01-01 02:00:00",
    remark: "Processing, slow",
    startTime: "2024-01-01 00:05:00",
  },
];

describe("renderStatusTable", () => {
  test("writes a header and rows sorted by name", () => {
    expect(renderStatusTable(records)).toBe(
      [
        HEADER,
        'alpha,RUNNING,Gaussian S0 Done,2024-01-01 02:00:00,"Processing, slow",2024-01-01 00:05:00',
        "beta,PENDING,Init,2024-01-01 00:00:00,Newly added,",
        "",
      ].join("\n"),
    );
  });

  test("an empty table is just the header", () => {
    expect(renderStatusTable([])).toBe(`${HEADER}\n`);
  });
});

describe("parseStatusTable", () => {
  test("reads back what was written", () => {
    expect(parseStatusTable(renderStatusTable(records))).toEqual([records[1], records[0]]);
  });

  test("a table without Start_Time reads it as empty", () => {
    const text = "\ufeffName,Status,Current_Stage,Last_Updated,Remark\nmol,FAILED,Gaussian S1 Done,2024-01-02 10:00:00,Fatal Error\n";
    expect(parseStatusTable(text)).toEqual([
      {
        name: "mol",
        status: UnitStatus.FAILED,
        currentStage: "Gaussian S1 Done",
        lastUpdated: "2024-01-02 10:00:00",
        remark: "Fatal Error",
        startTime: "",
      },
    ]);
  });

  test("rejects unknown statuses and empty names", () => {
    expect(() => parseStatusTable("Name,Status\nmol,DONE\n")).toThrow(
      'row 1: unknown status "DONE" for mol',
    );
    expect(() => parseStatusTable("Name,Status\n ,PENDING\n")).toThrow(StatusStoreError);
  });

  test("blank lines are skipped", () => {
    expect(parseStatusTable("Name,Status\n\nmol,PENDING\n\n")).toHaveLength(1);
  });
});

describe("StatusStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  test("a missing file is an empty table", async () => {
    expect(await new StatusStore(join(dir, "job_status.csv")).load()).toEqual([]);
  });

  test("save writes the table and load reads it", async () => {
    const store = new StatusStore(join(dir, "state", "job_status.csv"));
    await store.save(records);
    expect((await readFile(store.path, "utf-8")).split("\n")[0]).toBe(HEADER);
    expect((await store.load()).map((r) => r.name)).toEqual(["alpha", "beta"]);
  });

  test("a corrupt file is an error", async () => {
    const path = join(dir, "job_status.csv");
    await put(path, "Name,Status\nmol,\"unterminated\n");
    await expect(new StatusStore(path).load()).rejects.toThrow(StatusStoreError);
  });
});
