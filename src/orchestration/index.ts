/**
 * Orchestrator — Public API
 */

// Types
export type {
  JsonValue,
  JsonObject,
  StepAction,
  StepSpec,
  OutputRef,
  PlanStep,
  Plan,
  StepStatus,
  SkipReason,
  StepResult,
  PlanStatus,
  PlanResult,
  OrchestrationEventType,
  OrchestrationEvent,
  OrchestrationEventListener,
} from "./types.js";
export { STEP_ACTIONS, isStepAction } from "./types.js";

// Planner
export {
  DEFAULT_STEP_TIMEOUT_MS,
  buildPlan,
  topologicalSort,
  transitiveDependents,
  resolveStepParams,
  derivePlanStatus,
  isOutputRef,
  parseOutputRef,
} from "./planner.js";
export type { BuildPlanOptions } from "./planner.js";

// Idempotency
export { canonicalJson, computeIdempotencyKey } from "./idempotency.js";
export type { IdempotencyInput } from "./idempotency.js";

// Retry
export { DEFAULT_BACKOFF, computeBackoffDelay, sleep, anySignal } from "./retry.js";
export type { BackoffOptions } from "./retry.js";

// Engine
export { Executor } from "./engine.js";
export type { ExecutorOptions } from "./engine.js";
