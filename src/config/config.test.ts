/**
 * Orchestrator Configuration — Unit Tests
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ValidationError } from "../errors.js";
import { DEFAULT_CONFIG_FILE, applyEnvOverrides, getDefaultConfig, loadConfig, validateConfig } from "./config.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "orchestrate-config-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function writeConfig(name: string, value: unknown): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, typeof value === "string" ? value : JSON.stringify(value), "utf-8");
  return file;
}

function captureError(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error("expected a ValidationError");
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("getDefaultConfig", () => {
  it("fills every section", () => {
    const config = getDefaultConfig();
    expect(config.state).toEqual({ type: "jsonl", path: ".orchestrate/state.jsonl" });
    expect(config.execution).toEqual({
      parallelism: 1,
      gracePeriodMs: 10_000,
      defaultStepTimeoutMs: 1_800_000,
      backoff: { baseMs: 2_000, maxMs: 60_000, jitterFactor: 0 },
    });
    expect(config.provider).toEqual({
      type: "gcloud",
      binaries: { gcloud: "gcloud", kubectl: "kubectl", docker: "docker" },
    });
    expect(config.logging).toEqual({ level: "info", destinations: [{ type: "console" }], redactPatterns: [] });
    expect(config.targetsDir).toBe("targets");
  });
});

describe("validateConfig", () => {
  it("keeps given values and defaults the rest", () => {
    const config = validateConfig({ state: { type: "sqlite", path: "state.db" }, execution: { parallelism: 4 } });
    expect(config.state).toEqual({ type: "sqlite", path: "state.db" });
    expect(config.execution.parallelism).toBe(4);
    expect(config.execution.backoff.baseMs).toBe(2_000);
  });

  it("reports every invalid field with its path", () => {
    const error = captureError(() =>
      validateConfig({ execution: { parallelism: 0 }, state: { type: "redis" } }, "test config"),
    );
    expect(error.code).toBe("INVALID_CONFIG");
    expect(error.message.startsWith("Invalid test config: ")).toBe(true);
    expect(error.details.map((d) => d.split(":")[0]).sort()).toEqual(["execution.parallelism", "state.type"]);
  });

  it("caps the default step timeout at the longest timer delay", () => {
    const error = captureError(() => validateConfig({ execution: { defaultStepTimeoutMs: 2_592_000_000 } }));
    expect(error.details.map((d) => d.split(":")[0])).toEqual(["execution.defaultStepTimeoutMs"]);
    expect(validateConfig({ execution: { defaultStepTimeoutMs: 2_147_483_647 } }).execution.defaultStepTimeoutMs).toBe(
      2_147_483_647,
    );
  });

  it("validates log destinations by type", () => {
    expect(() => validateConfig({ logging: { destinations: [{ type: "file" }] } })).toThrow(ValidationError);
    expect(
      validateConfig({ logging: { destinations: [{ type: "file", path: "run.log", minLevel: "debug" }] } }).logging
        .destinations,
    ).toEqual([{ type: "file", path: "run.log", minLevel: "debug" }]);
  });
});

describe("applyEnvOverrides", () => {
  it("layers environment variables over file values", () => {
    const merged = applyEnvOverrides(
      { state: { type: "jsonl", path: "a.jsonl" }, execution: { gracePeriodMs: 5 } },
      {
        ORCHESTRATE_STATE_PATH: "b.jsonl",
        ORCHESTRATE_PARALLELISM: "3",
        ORCHESTRATE_LOG_LEVEL: "debug",
      },
    );
    expect(merged).toEqual({
      state: { type: "jsonl", path: "b.jsonl" },
      execution: { gracePeriodMs: 5, parallelism: 3 },
      logging: { level: "debug" },
    });
  });

  it("leaves the input untouched", () => {
    const raw = { state: { type: "jsonl" } };
    applyEnvOverrides(raw, { ORCHESTRATE_STATE_TYPE: "sqlite" });
    expect(raw).toEqual({ state: { type: "jsonl" } });
  });
});

describe("loadConfig", () => {
  it("uses defaults when no config file exists", () => {
    expect(loadConfig({ cwd: dir, env: {} })).toEqual(getDefaultConfig());
  });

  it("reads the config file from the working directory", () => {
    writeConfig(DEFAULT_CONFIG_FILE, { provider: { type: "memory" }, targetsDir: "deploy" });
    const config = loadConfig({ cwd: dir, env: {} });
    expect(config.provider.type).toBe("memory");
    expect(config.targetsDir).toBe("deploy");
  });

  it("prefers an explicit path, then ORCHESTRATE_CONFIG", () => {
    writeConfig("a.json", { targetsDir: "from-option" });
    writeConfig("b.json", { targetsDir: "from-env" });

    expect(loadConfig({ cwd: dir, path: "a.json", env: { ORCHESTRATE_CONFIG: "b.json" } }).targetsDir).toBe("from-option");
    expect(loadConfig({ cwd: dir, env: { ORCHESTRATE_CONFIG: "b.json" } }).targetsDir).toBe("from-env");
  });

  it("fails on a missing explicit file", () => {
    const error = captureError(() => loadConfig({ cwd: dir, path: "missing.json", env: {} }));
    expect(error.code).toBe("INVALID_CONFIG");
    expect(error.message.startsWith(`Cannot read config file ${path.join(dir, "missing.json")}`)).toBe(true);
  });

  it("fails on malformed JSON", () => {
    writeConfig(DEFAULT_CONFIG_FILE, "{ nope");
    const error = captureError(() => loadConfig({ cwd: dir, env: {} }));
    expect(error.message.startsWith(`Config file ${path.join(dir, DEFAULT_CONFIG_FILE)} is not valid JSON`)).toBe(true);
  });

  it("rejects an invalid environment override", () => {
    const error = captureError(() => loadConfig({ cwd: dir, env: { ORCHESTRATE_PARALLELISM: "many" } }));
    expect(error.details[0]?.startsWith("execution.parallelism:")).toBe(true);
  });
});
