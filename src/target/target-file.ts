/**
 * Target Files — YAML step definitions for one deployment target.
 *
 * Loads the YAML with js-yaml, validates its shape with Zod, normalizes
 * action spellings and substitutes `${NAME}` / `${NAME:-default}` variables.
 */

import fs from "node:fs/promises";
import path from "node:path";
import * as yaml from "js-yaml";
import { z } from "zod";
import { ValidationError, formatErrorMessage } from "../errors.js";
import { MAX_STEP_TIMEOUT_MS, isStepAction, type JsonObject, type JsonValue, type StepAction, type StepSpec } from "../orchestration/types.js";
import { jsonObjectSchema } from "../state/schema.js";

// =============================================================================
// Schema
// =============================================================================

const varValueSchema = z.union([z.string(), z.number(), z.boolean()]);

const stepEntrySchema = z.object({
  name: z.string().min(1),
  action: z.string().min(1),
  resource_id: z.string().min(1).optional(),
  depends_on: z.array(z.string()).default([]),
  params: jsonObjectSchema.default({}),
  max_attempts: z.number().int().positive().optional(),
  timeout_seconds: z
    .number()
    .positive()
    .finite()
    .max(Math.floor(MAX_STEP_TIMEOUT_MS / 1000))
    .optional(),
});

export const targetFileSchema = z.object({
  target: z.string().min(1),
  vars: z.record(z.string(), varValueSchema).default({}),
  steps: z.array(stepEntrySchema).min(1),
});

export type TargetFile = z.infer<typeof targetFileSchema>;

export type TargetDefinition = {
  target: string;
  steps: StepSpec[];
  /** File the definition came from, when loaded from disk. */
  source?: string;
};

export type TargetLoadOptions = {
  /** `--var` overrides; highest precedence. */
  vars?: Record<string, string>;
  env?: NodeJS.ProcessEnv;
  source?: string;
};

// =============================================================================
// Actions
// =============================================================================

/**
 * Accept `create-cluster`, `CreateCluster` and `create_cluster`.
 */
export function normalizeAction(raw: string): StepAction | undefined {
  const kebab = raw
    .trim()
    .replace(/([a-z0-9])([A-Z])/g, "$1-$2")
    .replace(/_/g, "-")
    .toLowerCase();
  return isStepAction(kebab) ? kebab : undefined;
}

// =============================================================================
// Variables
// =============================================================================

const VARIABLE_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

type VariableScope = {
  lookup(name: string): string | undefined;
  missing: Set<string>;
};

function createScope(fileVars: TargetFile["vars"], options: TargetLoadOptions): VariableScope {
  const env = options.env ?? process.env;
  return {
    lookup(name) {
      const override = options.vars?.[name];
      if (override !== undefined) return override;
      const declared = fileVars[name];
      if (declared !== undefined) return String(declared);
      return env[name];
    },
    missing: new Set(),
  };
}

function interpolateString(value: string, scope: VariableScope): string {
  return value.replace(VARIABLE_PATTERN, (match: string, name: string, fallback: string | undefined) => {
    const resolved = scope.lookup(name) ?? fallback;
    if (resolved === undefined) {
      scope.missing.add(name);
      return match;
    }
    return resolved;
  });
}

function interpolateValue(value: JsonValue, scope: VariableScope): JsonValue {
  if (typeof value === "string") return interpolateString(value, scope);
  if (Array.isArray(value)) return value.map((item) => interpolateValue(item, scope));
  if (value !== null && typeof value === "object") return interpolateObject(value, scope);
  return value;
}

function interpolateObject(obj: JsonObject, scope: VariableScope): JsonObject {
  const out: JsonObject = {};
  for (const [key, value] of Object.entries(obj)) out[key] = interpolateValue(value, scope);
  return out;
}

/**
 * Parse `NAME=value` assignments from the command line.
 */
export function parseAssignments(assignments: readonly string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const assignment of assignments) {
    const eq = assignment.indexOf("=");
    const name = eq > 0 ? assignment.slice(0, eq).trim() : "";
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
      throw new ValidationError("UNRESOLVED_VARIABLE", `Invalid assignment "${assignment}": expected NAME=value`);
    }
    out[name] = assignment.slice(eq + 1);
  }
  return out;
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse target-file YAML into step specs ready for buildPlan().
 */
export function parseTargetFile(text: string, options: TargetLoadOptions = {}): TargetDefinition {
  const where = options.source ?? "target file";

  let document: unknown;
  try {
    document = yaml.load(text, { schema: yaml.CORE_SCHEMA, filename: options.source });
  } catch (err: unknown) {
    throw new ValidationError("INVALID_TARGET", `Cannot parse ${where}: ${formatErrorMessage(err)}`);
  }

  const parsed = targetFileSchema.safeParse(document);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ValidationError("INVALID_TARGET", `Invalid ${where}: ${details.join("; ")}`, details);
  }

  const file = parsed.data;
  const scope = createScope(file.vars, options);
  const target = interpolateString(file.target, scope);

  const steps = file.steps.map((entry): StepSpec => {
    const action = normalizeAction(entry.action);
    if (!action) {
      throw new ValidationError("INVALID_STEP", `Step "${entry.name}" has unknown action "${entry.action}"`);
    }
    const spec: StepSpec = {
      name: entry.name,
      action,
      dependsOn: entry.depends_on,
      params: interpolateObject(entry.params, scope),
    };
    if (entry.resource_id !== undefined) spec.resourceId = interpolateString(entry.resource_id, scope);
    if (entry.max_attempts !== undefined) spec.maxAttempts = entry.max_attempts;
    if (entry.timeout_seconds !== undefined) spec.timeoutMs = Math.round(entry.timeout_seconds * 1000);
    return spec;
  });

  if (scope.missing.size > 0) {
    const names = [...scope.missing].sort();
    throw new ValidationError(
      "UNRESOLVED_VARIABLE",
      `Unresolved variable(s) in ${where}: ${names.join(", ")}`,
      names,
    );
  }

  return options.source ? { target, steps, source: options.source } : { target, steps };
}

/**
 * Read and parse a target file from disk.
 */
export async function loadTargetFile(filePath: string, options: Omit<TargetLoadOptions, "source"> = {}): Promise<TargetDefinition> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf-8");
  } catch (err: unknown) {
    throw new ValidationError("INVALID_TARGET", `Cannot read target file ${filePath}: ${formatErrorMessage(err)}`);
  }
  return parseTargetFile(text, { ...options, source: filePath });
}

async function isFile(candidate: string): Promise<boolean> {
  try {
    return (await fs.stat(candidate)).isFile();
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR")) return false;
    throw err;
  }
}

/**
 * Find a target file: `ref` itself when it is a file, else
 * `<targetsDir>/<ref>.yaml` or `.yml`.
 */
export async function findTargetFile(ref: string, targetsDir: string, cwd = process.cwd()): Promise<string | undefined> {
  const direct = path.resolve(cwd, ref);
  if (await isFile(direct)) return direct;

  for (const ext of [".yaml", ".yml"]) {
    const candidate = path.resolve(cwd, targetsDir, `${ref}${ext}`);
    if (await isFile(candidate)) return candidate;
  }
  return undefined;
}

/**
 * Like findTargetFile(), but a missing target is a validation error.
 */
export async function resolveTargetPath(ref: string, targetsDir: string, cwd = process.cwd()): Promise<string> {
  const found = await findTargetFile(ref, targetsDir, cwd);
  if (!found) {
    throw new ValidationError("INVALID_TARGET", `Target "${ref}" not found (looked for a file or ${targetsDir}/${ref}.yaml)`);
  }
  return found;
}
