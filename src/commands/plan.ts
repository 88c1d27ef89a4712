/**
 * `orchestrate plan` — validate a target file and print the ordered steps.
 */

import { formatPlan } from "../cli/format.js";
import { buildPlan } from "../orchestration/planner.js";
import type { Plan } from "../orchestration/types.js";
import { loadTargetFile, resolveTargetPath } from "../target/target-file.js";
import { ExitCode, type CommandContext, type ExitCodeValue } from "./context.js";

export type PlanCommandOptions = {
  target: string;
  vars?: Record<string, string>;
  json?: boolean;
};

/**
 * Load a target and turn it into a plan. Throws ValidationError.
 */
export async function loadPlan(ref: string, ctx: CommandContext, vars: Record<string, string> = {}): Promise<Plan> {
  const file = await resolveTargetPath(ref, ctx.config.targetsDir, ctx.cwd);
  const definition = await loadTargetFile(file, { vars, env: ctx.env });
  return buildPlan(definition.target, definition.steps, {
    defaultTimeoutMs: ctx.config.execution.defaultStepTimeoutMs,
  });
}

export async function planCommand(opts: PlanCommandOptions, ctx: CommandContext): Promise<ExitCodeValue> {
  const plan = await loadPlan(opts.target, ctx, opts.vars);
  ctx.logger.debug(`plan for ${plan.target}: ${plan.steps.map((s) => s.name).join(" -> ")}`);

  if (opts.json) {
    ctx.runtime.log(JSON.stringify(plan, null, 2));
  } else {
    ctx.runtime.log(formatPlan(plan));
  }
  return ExitCode.Success;
}
