import type { Command } from "commander";

import { blueprintListCommand, blueprintRenderCommand } from "../../commands/blueprint.js";
import { parseAssignments } from "../../target/target-file.js";
import { collect, runCommandWithRuntime, stringListOpt, type GlobalOptions, type ProgramDeps } from "../cli-utils.js";

export function registerBlueprintCommands(program: Command, deps: ProgramDeps, globals: () => GlobalOptions) {
  const blueprint = program.command("blueprint").description("Built-in target templates");

  blueprint
    .command("list")
    .description("List available blueprints and their parameters")
    .option("--json", "Print as JSON")
    .action(async (opts: Record<string, unknown>) => {
      await runCommandWithRuntime(deps, globals(), async (ctx) => blueprintListCommand({ json: Boolean(opts.json) }, ctx));
    });

  blueprint
    .command("render")
    .description("Render a blueprint as a target file")
    .argument("<id>", "Blueprint id")
    .option("--set <name=value>", "Blueprint parameter (repeatable)", collect, [])
    .action(async (id: string, opts: Record<string, unknown>) => {
      await runCommandWithRuntime(deps, globals(), async (ctx) =>
        blueprintRenderCommand({ id, params: parseAssignments(stringListOpt(opts.set)) }, ctx),
      );
    });
}
