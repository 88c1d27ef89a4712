/**
 * Orchestrator — Core Types
 *
 * Steps, plans and the results the executor records for them.
 */

import type { StepError } from "../errors.js";

// =============================================================================
// Values
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

// =============================================================================
// Actions
// =============================================================================

export const STEP_ACTIONS = [
  "create-cluster",
  "bind-identity",
  "build-image",
  "push-image",
  "deploy",
  "wait-ready",
  "grant-access",
] as const;

export type StepAction = (typeof STEP_ACTIONS)[number];

export function isStepAction(value: string): value is StepAction {
  return STEP_ACTIONS.some((action) => action === value);
}

// =============================================================================
// Step Definitions
// =============================================================================

/** Longest per-step timeout a Node timer can hold (2^31 - 1 ms). */
export const MAX_STEP_TIMEOUT_MS = 2_147_483_647;

/**
 * A step as declared by the caller, before validation and ordering.
 */
export type StepSpec = {
  name: string;
  action: StepAction;
  /** Resource the step acts on. Defaults to the step name. */
  resourceId?: string;
  dependsOn?: string[];
  /** Values or output references (`$step.<name>.<output>`). */
  params?: JsonObject;
  /** Default 1. */
  maxAttempts?: number;
  /** Wall-clock budget for the step, across all attempts. */
  timeoutMs?: number;
};

/**
 * A reference from one step's parameter to another step's output.
 */
export type OutputRef = {
  param: string;
  step: string;
  output: string;
};

/**
 * A validated step inside a plan.
 */
export type PlanStep = {
  name: string;
  action: StepAction;
  resourceId: string;
  /** Explicit dependencies followed by implicit ones from output references. */
  dependsOn: string[];
  params: Readonly<JsonObject>;
  inputs: OutputRef[];
  maxAttempts: number;
  timeoutMs: number;
};

/**
 * An ordered, validated graph of steps for one deployment target.
 */
export type Plan = {
  target: string;
  /** Topologically sorted; ties keep input order. */
  steps: PlanStep[];
  createdAt: string;
};

// =============================================================================
// Results
// =============================================================================

export type StepStatus = "pending" | "running" | "succeeded" | "failed" | "skipped";

export type SkipReason = "already-succeeded" | "dependency-failed";

export type StepResult = {
  stepName: string;
  action: StepAction;
  status: StepStatus;
  skipReason?: SkipReason;
  idempotencyKey: string;
  /** Provider invocations made during the run that produced this result. */
  attempts: number;
  startedAt?: string;
  endedAt?: string;
  error: StepError | null;
  outputs: JsonObject;
};

export type PlanStatus = "succeeded" | "failed" | "in-progress";

export type PlanResult = {
  target: string;
  status: PlanStatus;
  cancelled: boolean;
  steps: StepResult[];
  outputs: Record<string, JsonObject>;
  firstError: (StepError & { step: string }) | null;
  fatalError: StepError | null;
  startedAt: string;
  endedAt: string;
  durationMs: number;
};

// =============================================================================
// Events
// =============================================================================

export type OrchestrationEventType =
  | "plan:start"
  | "plan:complete"
  | "step:start"
  | "step:retry"
  | "step:succeeded"
  | "step:failed"
  | "step:skipped";

export type OrchestrationEvent = {
  type: OrchestrationEventType;
  target: string;
  step?: string;
  attempt?: number;
  timestamp: string;
  message: string;
};

export type OrchestrationEventListener = (event: OrchestrationEvent) => void;
