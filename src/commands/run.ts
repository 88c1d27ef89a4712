/**
 * `orchestrate run` — execute a target's plan against the configured
 * provider, persisting each step's outcome.
 *
 * Without `--resume` a run refuses to start while the store still holds
 * `running` records for the target: a previous run crashed or is active.
 * `--dry-run` executes against the in-memory provider and store, touching
 * neither the cloud nor the persisted state.
 */

import { formatResultTable } from "../cli/format.js";
import { ValidationError } from "../errors.js";
import { Executor } from "../orchestration/engine.js";
import type { OrchestrationEvent, Plan } from "../orchestration/types.js";
import { InMemoryProviderClient } from "../providers/memory-provider.js";
import type { ProviderClient } from "../providers/types.js";
import { InMemoryStateStore } from "../state/memory-store.js";
import { latestPerStep, type StateStore } from "../state/types.js";
import { ExitCode, exitCodeForResult, openProvider, openStateStore, type CommandContext, type ExitCodeValue } from "./context.js";
import { loadPlan } from "./plan.js";

export type RunCommandOptions = {
  target: string;
  resume?: boolean;
  parallelism?: number;
  vars?: Record<string, string>;
  dryRun?: boolean;
  json?: boolean;
};

async function assertNoRunInProgress(plan: Plan, store: StateStore): Promise<void> {
  const running = latestPerStep(await store.list(plan.target)).filter((r) => r.result.status === "running");
  if (running.length > 0) {
    const steps = running.map((r) => r.step);
    throw new ValidationError(
      "RUN_IN_PROGRESS",
      `Target "${plan.target}" has steps still marked running (${steps.join(", ")}); pass --resume to continue`,
      steps,
    );
  }
}

export async function runCommand(opts: RunCommandOptions, ctx: CommandContext): Promise<ExitCodeValue> {
  const plan = await loadPlan(opts.target, ctx, opts.vars);
  const logger = ctx.logger.child("run");

  let store: StateStore;
  let provider: ProviderClient;
  if (opts.dryRun) {
    store = new InMemoryStateStore();
    await store.initialize();
    provider = new InMemoryProviderClient();
    logger.info("dry run: using in-memory provider and state");
  } else {
    store = await openStateStore(ctx);
    provider = openProvider(ctx);
  }

  try {
    if (!opts.resume) await assertNoRunInProgress(plan, store);

    const executor = new Executor({ logger: logger.child("executor") });
    executor.on((event: OrchestrationEvent) => {
      const level = event.type === "step:failed" ? "warn" : event.type === "step:retry" ? "info" : "debug";
      logger[level](event.message, { event: event.type });
    });

    const execution = ctx.config.execution;
    const result = await executor.run(plan, provider, store, {
      parallelism: opts.parallelism ?? execution.parallelism,
      gracePeriodMs: execution.gracePeriodMs,
      backoff: execution.backoff,
      signal: ctx.signal,
    });

    if (opts.json) {
      ctx.runtime.log(JSON.stringify(result, null, 2));
    } else {
      const flags = [result.cancelled ? "cancelled" : "", opts.dryRun ? "dry run" : ""].filter(Boolean);
      const suffix = flags.length > 0 ? ` (${flags.join(", ")})` : "";
      ctx.runtime.log(`Target: ${result.target}  Status: ${result.status}${suffix}  Duration: ${result.durationMs}ms`);
      ctx.runtime.log(formatResultTable(result.steps));
      if (result.fatalError) ctx.runtime.error(`State store failure: ${result.fatalError.message}`);
    }

    const code = exitCodeForResult(result);
    if (code !== ExitCode.Success) logger.warn(`run finished with exit code ${code}`, { target: plan.target });
    return code;
  } finally {
    await store.close();
  }
}
