/**
 * `orchestrate status` — latest stored result per step. Read-only.
 */

import { formatStatusTable } from "../cli/format.js";
import { latestPerStep } from "../state/types.js";
import { ExitCode, resolveTargetName, withStateStore, type CommandContext, type ExitCodeValue } from "./context.js";

export type StatusCommandOptions = {
  target: string;
  vars?: Record<string, string>;
  json?: boolean;
};

export async function statusCommand(opts: StatusCommandOptions, ctx: CommandContext): Promise<ExitCodeValue> {
  const target = await resolveTargetName(opts.target, ctx, opts.vars);
  const records = await withStateStore(ctx, async (store) => latestPerStep(await store.list(target)));

  if (opts.json) {
    ctx.runtime.log(JSON.stringify({ target, steps: records }, null, 2));
    return ExitCode.Success;
  }
  if (records.length === 0) {
    ctx.runtime.log(`No recorded steps for target "${target}".`);
    return ExitCode.Success;
  }
  ctx.runtime.log(`Target: ${target}`);
  ctx.runtime.log(formatStatusTable(records));
  return ExitCode.Success;
}
