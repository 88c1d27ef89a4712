/**
 * Orchestrator — Execution Engine
 *
 * Runs a validated plan against a provider and a state store:
 * - Dispatches ready steps in plan order, up to the parallelism limit
 * - Reuses results the store already holds for the same idempotency key
 * - Persists `running` before each provider call and the outcome after it
 * - Retries retryable provider failures with exponential backoff
 * - Enforces a per-step wall-clock budget across attempts
 * - Skips dependents of failed steps; independent branches keep going
 * - Honors cancellation with a grace period for in-flight calls
 * - Emits lifecycle events
 */

import {
  CancelledError,
  OrchestratorError,
  StateStoreError,
  TimeoutError,
  formatErrorMessage,
  isRetryable,
  toOrchestratorError,
} from "../errors.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";
import { executeStepAction } from "../providers/dispatch.js";
import type { ProviderClient } from "../providers/types.js";
import type { StateStore } from "../state/types.js";
import { computeIdempotencyKey } from "./idempotency.js";
import { derivePlanStatus, resolveStepParams } from "./planner.js";
import { DEFAULT_BACKOFF, anySignal, computeBackoffDelay, sleep, type BackoffOptions } from "./retry.js";
import type {
  JsonObject,
  OrchestrationEvent,
  OrchestrationEventListener,
  Plan,
  PlanResult,
  PlanStep,
  StepResult,
} from "./types.js";

// =============================================================================
// Options
// =============================================================================

export type ExecutorOptions = {
  /** Maximum number of steps in flight at once. */
  parallelism: number;
  /** Time in-flight provider calls get to return after cancellation. */
  gracePeriodMs: number;
  backoff: BackoffOptions;
  /** Aborting cancels the run. */
  signal?: AbortSignal;
  logger: Logger;
  /** Source of randomness for backoff jitter. */
  random: () => number;
};

const DEFAULT_OPTIONS: ExecutorOptions = {
  parallelism: 1,
  gracePeriodMs: 10_000,
  backoff: DEFAULT_BACKOFF,
  logger: createSilentLogger("executor"),
  random: Math.random,
};

type RunContext = {
  plan: Plan;
  provider: ProviderClient;
  store: StateStore;
  options: ExecutorOptions;
  logger: Logger;
  results: Map<string, StepResult>;
  outputs: Map<string, JsonObject>;
  /** Aborted on cancellation or on a fatal store failure. */
  stop: AbortController;
  fatal: StateStoreError | null;
};

// =============================================================================
// Executor
// =============================================================================

export class Executor {
  private options: ExecutorOptions;
  private listeners: OrchestrationEventListener[] = [];

  constructor(options?: Partial<ExecutorOptions>) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /** Subscribe to lifecycle events. Returns an unsubscribe function. */
  on(listener: OrchestrationEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  /**
   * Execute `plan`. Step failures are recorded in the result, never thrown.
   */
  async run(
    plan: Plan,
    provider: ProviderClient,
    store: StateStore,
    overrides?: Partial<ExecutorOptions>,
  ): Promise<PlanResult> {
    const options: ExecutorOptions = { ...this.options, ...overrides };
    const started = Date.now();
    const run: RunContext = {
      plan,
      provider,
      store,
      options,
      logger: options.logger.withContext({ target: plan.target }),
      results: new Map(plan.steps.map((step) => [step.name, pendingResult(step)])),
      outputs: new Map(),
      stop: new AbortController(),
      fatal: null,
    };

    const onCancel = () => {
      run.logger.warn("run cancelled; waiting for in-flight steps");
      run.stop.abort(new CancelledError("Run was cancelled"));
    };
    if (options.signal?.aborted) onCancel();
    else options.signal?.addEventListener("abort", onCancel, { once: true });

    this.emit(run, "plan:start", `Starting plan "${plan.target}" with ${plan.steps.length} steps`);

    try {
      await this.schedule(run);
    } finally {
      options.signal?.removeEventListener("abort", onCancel);
    }

    const steps = plan.steps.map((step) => run.results.get(step.name) ?? pendingResult(step));
    const failed = steps.find((r) => r.status === "failed" && r.error);
    const status = run.fatal ? "failed" : derivePlanStatus(steps);

    this.emit(run, "plan:complete", `Plan "${plan.target}" finished: ${status} in ${Date.now() - started}ms`);

    return {
      target: plan.target,
      status,
      cancelled: options.signal?.aborted ?? false,
      steps,
      outputs: Object.fromEntries(run.outputs),
      firstError: failed?.error ? { ...failed.error, step: failed.stepName } : null,
      fatalError: run.fatal ? run.fatal.toStepError() : null,
      startedAt: new Date(started).toISOString(),
      endedAt: new Date().toISOString(),
      durationMs: Date.now() - started,
    };
  }

  // ---------------------------------------------------------------------------
  // Scheduling
  // ---------------------------------------------------------------------------

  private async schedule(run: RunContext): Promise<void> {
    const parallelism = Math.max(1, Math.floor(run.options.parallelism));
    const ancestors = collectAncestors(run.plan);
    const dispatched = new Set<string>();
    const inFlight = new Map<string, Promise<void>>();

    for (;;) {
      if (!run.stop.signal.aborted) {
        for (const step of run.plan.steps) {
          if (dispatched.has(step.name)) continue;
          const deps = step.dependsOn.map((dep) => run.results.get(dep));

          if (deps.some((dep) => dep && isBlocking(dep))) {
            dispatched.add(step.name);
            await this.markDependencyFailed(run, step);
            if (run.stop.signal.aborted) break;
            continue;
          }

          if (!deps.every((dep) => dep && isDone(dep))) continue;
          if (inFlight.size >= parallelism) continue;
          // Only independent branches overlap.
          if ([...inFlight.keys()].some((other) => sharesAncestor(ancestors, step.name, other))) continue;

          dispatched.add(step.name);
          const task = this.executeStep(run, step).finally(() => inFlight.delete(step.name));
          inFlight.set(step.name, task);
        }
      }

      if (inFlight.size === 0) return;
      await Promise.race(inFlight.values());
    }
  }

  private async markDependencyFailed(run: RunContext, step: PlanStep): Promise<void> {
    const result: StepResult = {
      ...pendingResult(step),
      status: "skipped",
      skipReason: "dependency-failed",
      endedAt: new Date().toISOString(),
    };
    run.results.set(step.name, result);
    // Inputs never resolved, so there is no idempotency key.
    await this.persist(run, step, "", result);
    this.emit(run, "step:skipped", `Step "${step.name}" skipped: a dependency failed`, step.name);
  }

  // ---------------------------------------------------------------------------
  // Step Execution
  // ---------------------------------------------------------------------------

  private async executeStep(run: RunContext, step: PlanStep): Promise<void> {
    const logger = run.logger.withContext({ step: step.name });
    const startedAt = new Date().toISOString();

    let params: JsonObject;
    try {
      params = resolveStepParams(step, run.outputs);
    } catch (err: unknown) {
      await this.finishFailed(run, step, "", { ...pendingResult(step), startedAt }, toOrchestratorError(err), logger);
      return;
    }

    const inputs: Record<string, JsonObject> = {};
    for (const dep of step.dependsOn) inputs[dep] = run.outputs.get(dep) ?? {};
    const key = computeIdempotencyKey({ action: step.action, resourceId: step.resourceId, params, inputs });

    let existing: StepResult | undefined;
    try {
      existing = await run.store.get(run.plan.target, step.name, key);
    } catch (err: unknown) {
      this.fail(run, err, logger);
      return;
    }

    if (existing?.status === "succeeded") {
      const reused: StepResult = {
        ...pendingResult(step),
        status: "skipped",
        skipReason: "already-succeeded",
        idempotencyKey: key,
        outputs: existing.outputs,
        startedAt,
        endedAt: new Date().toISOString(),
      };
      run.results.set(step.name, reused);
      run.outputs.set(step.name, existing.outputs);
      logger.info("already succeeded; reusing recorded outputs");
      this.emit(run, "step:skipped", `Step "${step.name}" already succeeded`, step.name);
      return;
    }

    const result: StepResult = { ...pendingResult(step), status: "running", idempotencyKey: key, startedAt };
    run.results.set(step.name, result);
    if (!(await this.persist(run, step, key, result))) {
      run.results.set(step.name, { ...result, status: "failed", endedAt: new Date().toISOString(), error: stateError(run) });
      return;
    }
    this.emit(run, "step:start", `Starting step "${step.name}" (${step.action})`, step.name);

    const timeout = new AbortController();
    const timer = setTimeout(() => timeout.abort(new TimeoutError(step.name, step.timeoutMs)), step.timeoutMs);
    const signal = anySignal([timeout.signal, run.stop.signal]);

    try {
      for (let attempt = 1; ; attempt++) {
        const attemptLogger = logger.withContext({ attempt });
        result.attempts = attempt;
        try {
          const work = executeStepAction(run.provider, step, {
            signal,
            logger: attemptLogger,
            target: run.plan.target,
            stepName: step.name,
            params,
            dependencyOutputs: inputs,
          });
          const outputs = await settleWithin(work, timeout.signal, run.stop.signal, run.options.gracePeriodMs);
          await this.finishSucceeded(run, step, key, result, outputs, attemptLogger);
          return;
        } catch (err: unknown) {
          const error = timeout.signal.aborted ? new TimeoutError(step.name, step.timeoutMs) : toOrchestratorError(err);
          if (!isRetryable(error) || attempt >= step.maxAttempts || signal.aborted) {
            await this.finishFailed(run, step, key, result, error, attemptLogger);
            return;
          }

          const delay = computeBackoffDelay(attempt, run.options.backoff, run.options.random);
          attemptLogger.warn(`attempt ${attempt}/${step.maxAttempts} failed, retrying in ${delay}ms: ${error.message}`);
          this.emit(run, "step:retry", `Retrying step "${step.name}" (attempt ${attempt + 1}/${step.maxAttempts})`, step.name, attempt + 1);

          try {
            await sleep(delay, signal);
          } catch (sleepErr: unknown) {
            const reason = timeout.signal.aborted ? new TimeoutError(step.name, step.timeoutMs) : toOrchestratorError(sleepErr);
            await this.finishFailed(run, step, key, result, reason, attemptLogger);
            return;
          }
        }
      }
    } finally {
      clearTimeout(timer);
    }
  }

  private async finishSucceeded(
    run: RunContext,
    step: PlanStep,
    key: string,
    result: StepResult,
    outputs: JsonObject,
    logger: Logger,
  ): Promise<void> {
    const done: StepResult = { ...result, status: "succeeded", outputs, endedAt: new Date().toISOString() };
    run.results.set(step.name, done);
    if (!(await this.persist(run, step, key, done))) {
      // The provider call happened but its outcome could not be recorded.
      run.results.set(step.name, { ...done, status: "failed", error: stateError(run) });
      return;
    }
    run.outputs.set(step.name, outputs);
    logger.info(`succeeded after ${result.attempts} attempt(s)`);
    this.emit(run, "step:succeeded", `Step "${step.name}" succeeded`, step.name, result.attempts);
  }

  private async finishFailed(
    run: RunContext,
    step: PlanStep,
    key: string,
    result: StepResult,
    error: OrchestratorError,
    logger: Logger,
  ): Promise<void> {
    const failed: StepResult = {
      ...result,
      status: "failed",
      idempotencyKey: key,
      error: error.toStepError(),
      endedAt: new Date().toISOString(),
    };
    run.results.set(step.name, failed);
    logger.error(`failed: ${error.message}`, { kind: error.kind });
    await this.persist(run, step, key, failed);
    this.emit(run, "step:failed", `Step "${step.name}" failed: ${error.message}`, step.name, result.attempts);
  }

  // ---------------------------------------------------------------------------
  // Persistence & Events
  // ---------------------------------------------------------------------------

  /** Write a result; a store failure becomes fatal for the run. Returns false on failure. */
  private async persist(run: RunContext, step: PlanStep, key: string, result: StepResult): Promise<boolean> {
    try {
      await run.store.put(run.plan.target, step.name, key, result);
      return true;
    } catch (err: unknown) {
      this.fail(run, err, run.logger.withContext({ step: step.name }));
      return false;
    }
  }

  private fail(run: RunContext, err: unknown, logger: Logger): void {
    const error =
      err instanceof StateStoreError
        ? err
        : new StateStoreError(`State store failed: ${formatErrorMessage(err)}`, { cause: err });
    logger.fatal(error.message);
    if (run.fatal) return;
    run.fatal = error;
    run.stop.abort(new CancelledError(`Run aborted: ${error.message}`));
  }

  private emit(run: RunContext, type: OrchestrationEvent["type"], message: string, step?: string, attempt?: number): void {
    const event: OrchestrationEvent = { type, target: run.plan.target, timestamp: new Date().toISOString(), message };
    if (step !== undefined) event.step = step;
    if (attempt !== undefined) event.attempt = attempt;
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err: unknown) {
        run.logger.warn(`event listener threw on ${type}: ${formatErrorMessage(err)}`);
      }
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

/** Transitive dependencies of every step; plan order puts dependencies first. */
function collectAncestors(plan: Plan): Map<string, Set<string>> {
  const ancestors = new Map<string, Set<string>>();
  for (const step of plan.steps) {
    const own = new Set<string>();
    for (const dep of step.dependsOn) {
      own.add(dep);
      for (const inherited of ancestors.get(dep) ?? []) own.add(inherited);
    }
    ancestors.set(step.name, own);
  }
  return ancestors;
}

function sharesAncestor(ancestors: Map<string, Set<string>>, a: string, b: string): boolean {
  const left = ancestors.get(a) ?? new Set<string>();
  const right = ancestors.get(b) ?? new Set<string>();
  if (left.has(b) || right.has(a)) return true;
  for (const name of left) {
    if (right.has(name)) return true;
  }
  return false;
}

function pendingResult(step: PlanStep): StepResult {
  return {
    stepName: step.name,
    action: step.action,
    status: "pending",
    idempotencyKey: "",
    attempts: 0,
    error: null,
    outputs: {},
  };
}

/** Dependency reached a successful terminal state. */
function isDone(result: StepResult): boolean {
  return result.status === "succeeded" || (result.status === "skipped" && result.skipReason === "already-succeeded");
}

/** Dependency can never succeed in this run. */
function isBlocking(result: StepResult): boolean {
  return result.status === "failed" || (result.status === "skipped" && result.skipReason === "dependency-failed");
}

function stateError(run: RunContext): StepResult["error"] {
  return (run.fatal ?? new StateStoreError("State store failed")).toStepError();
}

/**
 * Wait for `work`, but reject as soon as `timeout` aborts, or `grace` ms
 * after `stop` aborts. A late result is dropped.
 */
function settleWithin<T>(work: Promise<T>, timeout: AbortSignal, stop: AbortSignal, grace: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let graceTimer: ReturnType<typeof setTimeout> | undefined;

    const cleanup = () => {
      timeout.removeEventListener("abort", onTimeout);
      stop.removeEventListener("abort", onStop);
      if (graceTimer) clearTimeout(graceTimer);
    };
    const onTimeout = () => {
      cleanup();
      reject(timeout.reason);
    };
    const onStop = () => {
      graceTimer = setTimeout(() => {
        cleanup();
        reject(stop.reason);
      }, grace);
    };

    work.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      },
    );

    if (timeout.aborted) {
      onTimeout();
      return;
    }
    timeout.addEventListener("abort", onTimeout, { once: true });
    if (stop.aborted) onStop();
    else stop.addEventListener("abort", onStop, { once: true });
  });
}
