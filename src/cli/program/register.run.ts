import type { Command } from "commander";

import { runCommand } from "../../commands/run.js";
import { parseAssignments } from "../../target/target-file.js";
import {
  collect,
  parsePositiveInt,
  runCommandWithRuntime,
  stringListOpt,
  withInterruptSignal,
  type GlobalOptions,
  type ProgramDeps,
} from "../cli-utils.js";

export function registerRunCommand(program: Command, deps: ProgramDeps, globals: () => GlobalOptions) {
  program
    .command("run")
    .description("Execute a target's plan, skipping steps that already succeeded")
    .argument("<target>", "Target file, or a name under the targets directory")
    .option("--resume", "Continue even if a previous run left steps marked running")
    .option("--parallelism <n>", "Maximum steps in flight at once", parsePositiveInt)
    .option("--var <name=value>", "Override a variable (repeatable)", collect, [])
    .option("--dry-run", "Execute against the in-memory provider without touching stored state")
    .option("--json", "Print the run result as JSON")
    .action(async (target: string, opts: Record<string, unknown>) => {
      await runCommandWithRuntime(deps, globals(), async (ctx) =>
        withInterruptSignal((signal) =>
          runCommand(
            {
              target,
              resume: Boolean(opts.resume),
              parallelism: typeof opts.parallelism === "number" ? opts.parallelism : undefined,
              vars: parseAssignments(stringListOpt(opts.var)),
              dryRun: Boolean(opts.dryRun),
              json: Boolean(opts.json),
            },
            { ...ctx, signal },
          ),
        ),
      );
    });
}
