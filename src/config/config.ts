/**
 * Orchestrator Configuration
 *
 * Schema-based validation of `orchestrate.config.json` using Zod, with
 * defaults for every field and a few environment overrides.
 */

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ValidationError, formatErrorMessage } from "../errors.js";
import { MAX_STEP_TIMEOUT_MS } from "../orchestration/types.js";

export const DEFAULT_CONFIG_FILE = "orchestrate.config.json";

// =============================================================================
// Zod Schemas
// =============================================================================

const logLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

/**
 * State store schema
 */
export const stateConfigSchema = z.object({
  type: z.enum(["jsonl", "sqlite", "memory"]).default("jsonl"),
  path: z.string().min(1).default(".orchestrate/state.jsonl"),
});

/**
 * Executor schema
 */
export const executionConfigSchema = z.object({
  parallelism: z.number().int().positive().default(1),
  gracePeriodMs: z.number().int().nonnegative().default(10_000),
  defaultStepTimeoutMs: z.number().int().positive().max(MAX_STEP_TIMEOUT_MS).default(30 * 60_000),
  backoff: z
    .object({
      baseMs: z.number().int().positive().default(2_000),
      maxMs: z.number().int().positive().default(60_000),
      jitterFactor: z.number().min(0).max(1).default(0),
    })
    .default({}),
});

/**
 * Provider schema
 */
export const providerConfigSchema = z.object({
  type: z.enum(["gcloud", "memory"]).default("gcloud"),
  region: z.string().optional(),
  binaries: z
    .object({
      gcloud: z.string().min(1).default("gcloud"),
      kubectl: z.string().min(1).default("kubectl"),
      docker: z.string().min(1).default("docker"),
    })
    .default({}),
});

/**
 * Log destination schema
 */
export const logDestinationSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("console"), minLevel: logLevelSchema.optional() }),
  z.object({ type: z.literal("file"), path: z.string().min(1), minLevel: logLevelSchema.optional() }),
]);

/**
 * Logging schema
 */
export const loggingConfigSchema = z.object({
  level: logLevelSchema.default("info"),
  destinations: z.array(logDestinationSchema).default([{ type: "console" }]),
  redactPatterns: z.array(z.string()).default([]),
});

/**
 * Full orchestrator config schema
 */
export const orchestrateConfigSchema = z.object({
  state: stateConfigSchema.default({}),
  execution: executionConfigSchema.default({}),
  provider: providerConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
  targetsDir: z.string().min(1).default("targets"),
});

export type OrchestrateConfig = z.infer<typeof orchestrateConfigSchema>;

// =============================================================================
// Loading
// =============================================================================

export type LoadConfigOptions = {
  /** Explicit config file; a missing file is an error. */
  path?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

/**
 * Get the default configuration.
 */
export function getDefaultConfig(): OrchestrateConfig {
  return orchestrateConfigSchema.parse({});
}

/**
 * Load, merge and validate configuration. Precedence: environment
 * overrides, then the config file, then defaults.
 */
export function loadConfig(options: LoadConfigOptions = {}): OrchestrateConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const explicit = options.path ?? env.ORCHESTRATE_CONFIG;
  const file = explicit ? path.resolve(cwd, explicit) : path.join(cwd, DEFAULT_CONFIG_FILE);
  const raw = explicit || fs.existsSync(file) ? readConfigFile(file) : {};

  return validateConfig(applyEnvOverrides(raw, env), file);
}

/**
 * Validate a raw configuration object.
 */
export function validateConfig(raw: unknown, source = "configuration"): OrchestrateConfig {
  const parsed = orchestrateConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ValidationError("INVALID_CONFIG", `Invalid ${source}: ${details.join("; ")}`, details);
  }
  return parsed.data;
}

function readConfigFile(file: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(file, "utf-8");
  } catch (err: unknown) {
    throw new ValidationError("INVALID_CONFIG", `Cannot read config file ${file}: ${formatErrorMessage(err)}`);
  }
  try {
    return JSON.parse(text);
  } catch (err: unknown) {
    throw new ValidationError("INVALID_CONFIG", `Config file ${file} is not valid JSON: ${formatErrorMessage(err)}`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? { ...value } : {};
}

/**
 * Layer ORCHESTRATE_* environment variables over the raw file contents.
 * Values are validated together with the file.
 */
export function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  if (!isRecord(raw)) return raw;
  const merged: Record<string, unknown> = { ...raw };

  if (env.ORCHESTRATE_STATE_TYPE || env.ORCHESTRATE_STATE_PATH) {
    const state = section(raw, "state");
    if (env.ORCHESTRATE_STATE_TYPE) state.type = env.ORCHESTRATE_STATE_TYPE;
    if (env.ORCHESTRATE_STATE_PATH) state.path = env.ORCHESTRATE_STATE_PATH;
    merged.state = state;
  }
  if (env.ORCHESTRATE_PARALLELISM) {
    const execution = section(raw, "execution");
    execution.parallelism = Number(env.ORCHESTRATE_PARALLELISM);
    merged.execution = execution;
  }
  if (env.ORCHESTRATE_LOG_LEVEL) {
    const logging = section(raw, "logging");
    logging.level = env.ORCHESTRATE_LOG_LEVEL;
    merged.logging = logging;
  }
  return merged;
}
