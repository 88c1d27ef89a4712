/**
 * The `orchestrate` command tree.
 */

import { Command } from "commander";
import { VERSION } from "../version.js";
import { defaultProgramDeps, stringOpt, type GlobalOptions, type ProgramDeps } from "./cli-utils.js";
import { registerBlueprintCommands } from "./program/register.blueprint.js";
import { registerPlanCommand } from "./program/register.plan.js";
import { registerRunCommand } from "./program/register.run.js";
import { registerStatusCommands } from "./program/register.status.js";

export function buildProgram(deps: ProgramDeps = defaultProgramDeps()): Command {
  const program = new Command();
  program
    .name("orchestrate")
    .description("Dependency-ordered, resumable cloud deployments")
    .version(VERSION)
    .option("--config <path>", "Config file (default: ./orchestrate.config.json)")
    .option("--log-level <level>", "trace | debug | info | warn | error | fatal");

  const globals = (): GlobalOptions => {
    const opts = program.opts();
    return { config: stringOpt(opts.config), logLevel: stringOpt(opts.logLevel) };
  };

  registerPlanCommand(program, deps, globals);
  registerRunCommand(program, deps, globals);
  registerStatusCommands(program, deps, globals);
  registerBlueprintCommands(program, deps, globals);
  return program;
}
