/**
 * `orchestrate purge` — delete every stored record of a target.
 */

import { ExitCode, resolveTargetName, withStateStore, type CommandContext, type ExitCodeValue } from "./context.js";

export type PurgeCommandOptions = {
  target: string;
  vars?: Record<string, string>;
};

export async function purgeCommand(opts: PurgeCommandOptions, ctx: CommandContext): Promise<ExitCodeValue> {
  const target = await resolveTargetName(opts.target, ctx, opts.vars);
  const removed = await withStateStore(ctx, (store) => store.purge(target));
  ctx.logger.info(`purged ${removed} record(s)`, { target });
  ctx.runtime.log(`Purged ${removed} record(s) for target "${target}".`);
  return ExitCode.Success;
}
