import type { Command } from "commander";

import { planCommand } from "../../commands/plan.js";
import { parseAssignments } from "../../target/target-file.js";
import { collect, runCommandWithRuntime, stringListOpt, type GlobalOptions, type ProgramDeps } from "../cli-utils.js";

export function registerPlanCommand(program: Command, deps: ProgramDeps, globals: () => GlobalOptions) {
  program
    .command("plan")
    .description("Validate a target file and print its steps in execution order")
    .argument("<target>", "Target file, or a name under the targets directory")
    .option("--var <name=value>", "Override a variable (repeatable)", collect, [])
    .option("--json", "Print the plan as JSON")
    .action(async (target: string, opts: Record<string, unknown>) => {
      await runCommandWithRuntime(deps, globals(), async (ctx) =>
        planCommand({ target, vars: parseAssignments(stringListOpt(opts.var)), json: Boolean(opts.json) }, ctx),
      );
    });
}
