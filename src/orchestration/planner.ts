/**
 * Orchestrator — Plan Builder & Dependency Resolver
 *
 * Validates step specs, derives implicit dependencies from output
 * references, orders steps with Kahn's algorithm and resolves
 * references against completed step outputs at run time.
 */

import { ValidationError } from "../errors.js";
import {
  MAX_STEP_TIMEOUT_MS,
  type JsonObject,
  type OutputRef,
  type Plan,
  type PlanStatus,
  type PlanStep,
  type StepResult,
  type StepSpec,
} from "./types.js";

export const DEFAULT_STEP_TIMEOUT_MS = 30 * 60_000;

// =============================================================================
// Output Reference Parsing
// =============================================================================

const OUTPUT_REF_REGEX = /^\$step\.([a-zA-Z0-9_-]+)\.([a-zA-Z0-9_]+)$/;

/** Check if a value is a step output reference ($step.X.Y). */
export function isOutputRef(value: unknown): value is string {
  return typeof value === "string" && OUTPUT_REF_REGEX.test(value);
}

export function parseOutputRef(ref: string): { step: string; output: string } | null {
  const match = OUTPUT_REF_REGEX.exec(ref);
  if (!match) return null;
  return { step: match[1], output: match[2] };
}

function collectOutputRefs(params: JsonObject): OutputRef[] {
  const refs: OutputRef[] = [];
  for (const [param, value] of Object.entries(params)) {
    if (!isOutputRef(value)) continue;
    const parsed = parseOutputRef(value);
    if (parsed) refs.push({ param, ...parsed });
  }
  return refs;
}

// =============================================================================
// Plan Construction
// =============================================================================

export type BuildPlanOptions = {
  /** Timeout applied to steps that declare none. */
  defaultTimeoutMs?: number;
};

/**
 * Validate step specs and return a topologically ordered plan.
 *
 * Ties are broken by input order, so identical input always yields the
 * same plan. Throws a ValidationError and leaves `specs` untouched on
 * failure.
 */
export function buildPlan(target: string, specs: readonly StepSpec[], options?: BuildPlanOptions): Plan {
  if (!target.trim()) {
    throw new ValidationError("INVALID_TARGET", "Target name must not be empty");
  }

  const defaultTimeoutMs = options?.defaultTimeoutMs ?? DEFAULT_STEP_TIMEOUT_MS;
  const steps = specs.map((spec) => normalizeStep(spec, defaultTimeoutMs));

  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const step of steps) {
    if (seen.has(step.name)) duplicates.push(step.name);
    seen.add(step.name);
  }
  if (duplicates.length > 0) {
    throw new ValidationError(
      "DUPLICATE_STEP",
      `Duplicate step name(s): ${[...new Set(duplicates)].join(", ")}`,
      duplicates,
    );
  }

  const unknown: string[] = [];
  for (const step of steps) {
    for (const dep of step.dependsOn) {
      if (!seen.has(dep)) unknown.push(`Step "${step.name}" depends on unknown step "${dep}"`);
    }
  }
  if (unknown.length > 0) {
    throw new ValidationError("UNKNOWN_DEPENDENCY", unknown[0], unknown);
  }

  return {
    target,
    steps: topologicalSort(steps),
    createdAt: new Date().toISOString(),
  };
}

function normalizeStep(spec: StepSpec, defaultTimeoutMs: number): PlanStep {
  if (!spec.name || !spec.name.trim()) {
    throw new ValidationError("INVALID_STEP", "Every step needs a non-empty name");
  }
  const maxAttempts = spec.maxAttempts ?? 1;
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new ValidationError("INVALID_STEP", `Step "${spec.name}": maxAttempts must be an integer >= 1`);
  }
  const timeoutMs = spec.timeoutMs ?? defaultTimeoutMs;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_STEP_TIMEOUT_MS) {
    throw new ValidationError(
      "INVALID_STEP",
      `Step "${spec.name}": timeout must be positive and at most ${MAX_STEP_TIMEOUT_MS}ms`,
    );
  }

  const params: JsonObject = { ...(spec.params ?? {}) };
  const inputs = collectOutputRefs(params);

  // Output references imply a dependency on the producing step.
  const dependsOn = [...(spec.dependsOn ?? [])];
  for (const ref of inputs) {
    if (!dependsOn.includes(ref.step)) dependsOn.push(ref.step);
  }

  return {
    name: spec.name,
    action: spec.action,
    resourceId: spec.resourceId ?? spec.name,
    dependsOn: [...new Set(dependsOn)],
    params: Object.freeze(params),
    inputs,
    maxAttempts,
    timeoutMs,
  };
}

// =============================================================================
// Topological Sort (Kahn's Algorithm)
// =============================================================================

/**
 * Order steps so every step follows its dependencies. Among steps that
 * are ready at the same time, the one declared first goes first.
 */
export function topologicalSort(steps: readonly PlanStep[]): PlanStep[] {
  const indexOf = new Map(steps.map((s, i) => [s.name, i]));
  const inDegree = steps.map((s) => s.dependsOn.length);
  const dependents: number[][] = steps.map(() => []);

  steps.forEach((step, i) => {
    for (const dep of step.dependsOn) {
      const depIndex = indexOf.get(dep);
      if (depIndex !== undefined) dependents[depIndex].push(i);
    }
  });

  const ready: number[] = [];
  inDegree.forEach((deg, i) => {
    if (deg === 0) ready.push(i);
  });

  const sorted: PlanStep[] = [];
  while (ready.length > 0) {
    // `ready` stays ascending, so the head is the earliest declared step.
    const next = ready.shift();
    if (next === undefined) break;
    sorted.push(steps[next]);

    for (const dependent of dependents[next]) {
      inDegree[dependent] -= 1;
      if (inDegree[dependent] === 0) insertSorted(ready, dependent);
    }
  }

  if (sorted.length < steps.length) {
    const remaining = steps.filter((_, i) => inDegree[i] > 0).map((s) => s.name);
    throw new ValidationError(
      "CYCLIC_DEPENDENCY",
      `Cyclic dependency among steps: ${remaining.join(", ")}`,
      remaining,
    );
  }

  return sorted;
}

function insertSorted(list: number[], value: number): void {
  let i = list.length;
  while (i > 0 && list[i - 1] > value) i--;
  list.splice(i, 0, value);
}

// =============================================================================
// Graph Queries
// =============================================================================

/**
 * Names of every step that transitively depends on `stepName`.
 */
export function transitiveDependents(plan: Plan, stepName: string): Set<string> {
  const result = new Set<string>();
  // Plan order guarantees dependencies are visited before dependents.
  for (const step of plan.steps) {
    if (step.dependsOn.some((dep) => dep === stepName || result.has(dep))) {
      result.add(step.name);
    }
  }
  return result;
}

// =============================================================================
// Output Reference Resolution
// =============================================================================

/**
 * Substitute `$step.X.Y` references in a step's params with the values
 * produced by completed steps.
 */
export function resolveStepParams(step: PlanStep, outputs: ReadonlyMap<string, JsonObject>): JsonObject {
  const resolved: JsonObject = { ...step.params };

  for (const ref of step.inputs) {
    const stepOutputs = outputs.get(ref.step);
    if (!stepOutputs) {
      throw new ValidationError(
        "UNRESOLVED_INPUT",
        `Cannot resolve "$step.${ref.step}.${ref.output}": step "${ref.step}" has no outputs`,
      );
    }
    const value = stepOutputs[ref.output];
    if (value === undefined) {
      throw new ValidationError(
        "UNRESOLVED_INPUT",
        `Cannot resolve "$step.${ref.step}.${ref.output}": output "${ref.output}" not found in step "${ref.step}"`,
      );
    }
    resolved[ref.param] = value;
  }

  return resolved;
}

// =============================================================================
// Plan Status
// =============================================================================

/**
 * Derive the overall plan status from its step results.
 */
export function derivePlanStatus(results: readonly StepResult[]): PlanStatus {
  let allDone = true;
  for (const result of results) {
    if (result.status === "failed") return "failed";
    if (result.status === "skipped" && result.skipReason === "dependency-failed") return "failed";
    const done =
      result.status === "succeeded" ||
      (result.status === "skipped" && result.skipReason === "already-succeeded");
    if (!done) allDone = false;
  }
  return allDone ? "succeeded" : "in-progress";
}
