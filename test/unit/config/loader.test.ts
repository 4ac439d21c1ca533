import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { join } from "node:path";
import { DEFAULT_CONFIG } from "../../../src/config/defaults.js";
import { applyEnvOverrides, loadConfig } from "../../../src/config/loader.js";
import { ConfigParseError } from "../../../src/config/parser.js";
import { makeTempDir, put, removeDir } from "../../helpers/fixtures.js";

describe("applyEnvOverrides", () => {
  test("variables replace file values", () => {
    const config = applyEnvOverrides(DEFAULT_CONFIG, {
      PHOSFLOW_SOURCE_DIR: "/in",
      PHOSFLOW_MAX_CONCURRENT: "3",
      PHOSFLOW_POLL_INTERVAL: "10s",
      PHOSFLOW_AUTO_EXIT: "Yes",
      PHOSFLOW_IDLE_CYCLES: "2",
      PHOSFLOW_WEBHOOK_URL: "http://hooks.test",
      PHOSFLOW_LOG_LEVEL: "warn",
    });
    expect(config.sourceDir).toBe("/in");
    expect(config.resultsDir).toBe("./results");
    expect(config.maxConcurrent).toBe(3);
    expect(config.pollIntervalMs).toBe(10_000);
    expect(config.autoExit).toEqual({ enabled: true, idleCycles: 2 });
    expect(config.alert).toEqual({ webhookUrl: "http://hooks.test", timeoutMs: 10_000 });
    expect(config.logLevel).toBe("warn");
  });

  test("empty variables are ignored", () => {
    expect(applyEnvOverrides(DEFAULT_CONFIG, { PHOSFLOW_MAX_CONCURRENT: "", PHOSFLOW_AUTO_EXIT: " " })).toEqual(
      DEFAULT_CONFIG,
    );
  });

  test("invalid values are rejected", () => {
    expect(() => applyEnvOverrides(DEFAULT_CONFIG, { PHOSFLOW_MAX_CONCURRENT: "0" })).toThrow(
      'PHOSFLOW_MAX_CONCURRENT must be an integer >= 1 (got "0")',
    );
    expect(() => applyEnvOverrides(DEFAULT_CONFIG, { PHOSFLOW_AUTO_EXIT: "maybe" })).toThrow(
      'PHOSFLOW_AUTO_EXIT must be a boolean (got "maybe")',
    );
    expect(() => applyEnvOverrides(DEFAULT_CONFIG, { PHOSFLOW_STALL_TIMEOUT: "2d" })).toThrow(
      ConfigParseError,
    );
    expect(() => applyEnvOverrides(DEFAULT_CONFIG, { PHOSFLOW_LOG_LEVEL: "trace" })).toThrow(
      "PHOSFLOW_LOG_LEVEL must be one of",
    );
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  test("reads the file and applies the environment on top", async () => {
    const path = join(dir, "phosflow.yaml");
    await put(path, "max_concurrent: 6\nresults_dir: /from-file\n");
    const config = await loadConfig({ path, env: { PHOSFLOW_RESULTS_DIR: "/from-env" } });
    expect(config.maxConcurrent).toBe(6);
    expect(config.resultsDir).toBe("/from-env");
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.jobs.gaussian.routes)).toBe(true);
  });

  test("a command-line log level wins and the result stays frozen", async () => {
    const config = await loadConfig({ env: { PHOSFLOW_LOG_LEVEL: "warn" }, logLevel: "debug" });
    expect(config.logLevel).toBe("debug");
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.alert)).toBe(true);
  });

  test("without a path only defaults and the environment apply", async () => {
    const config = await loadConfig({ env: {} });
    expect(config.maxConcurrent).toBe(DEFAULT_CONFIG.maxConcurrent);
  });

  test("a missing file is a config error", async () => {
    await expect(loadConfig({ path: join(dir, "absent.yaml"), env: {} })).rejects.toThrow(
      `Cannot read config ${join(dir, "absent.yaml")}`,
    );
  });
});
