import type { Command } from "commander";

import { purgeCommand } from "../../commands/purge.js";
import { statusCommand } from "../../commands/status.js";
import { parseAssignments } from "../../target/target-file.js";
import { collect, runCommandWithRuntime, stringListOpt, type GlobalOptions, type ProgramDeps } from "../cli-utils.js";

export function registerStatusCommands(program: Command, deps: ProgramDeps, globals: () => GlobalOptions) {
  program
    .command("status")
    .description("Show the latest recorded result of every step of a target")
    .argument("<target>", "Target name, or its target file")
    .option("--var <name=value>", "Variable used when reading the target file (repeatable)", collect, [])
    .option("--json", "Print records as JSON")
    .action(async (target: string, opts: Record<string, unknown>) => {
      await runCommandWithRuntime(deps, globals(), async (ctx) =>
        statusCommand({ target, vars: parseAssignments(stringListOpt(opts.var)), json: Boolean(opts.json) }, ctx),
      );
    });

  program
    .command("purge")
    .description("Delete all recorded results of a target")
    .argument("<target>", "Target name, or its target file")
    .option("--var <name=value>", "Variable used when reading the target file (repeatable)", collect, [])
    .action(async (target: string, opts: Record<string, unknown>) => {
      await runCommandWithRuntime(deps, globals(), async (ctx) =>
        purgeCommand({ target, vars: parseAssignments(stringListOpt(opts.var)) }, ctx),
      );
    });
}
