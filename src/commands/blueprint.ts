/**
 * `orchestrate blueprint` — list built-in templates or render one as YAML.
 */

import { listBlueprints, renderBlueprint } from "../blueprints/blueprints.js";
import { renderTable } from "../cli/format.js";
import { ExitCode, type CommandContext, type ExitCodeValue } from "./context.js";

export async function blueprintListCommand(opts: { json?: boolean }, ctx: CommandContext): Promise<ExitCodeValue> {
  const blueprints = listBlueprints();
  if (opts.json) {
    ctx.runtime.log(
      JSON.stringify(
        blueprints.map(({ id, name, description, parameters }) => ({ id, name, description, parameters })),
        null,
        2,
      ),
    );
    return ExitCode.Success;
  }

  ctx.runtime.log(renderTable(["ID", "NAME", "DESCRIPTION"], blueprints.map((b) => [b.id, b.name, b.description])));
  for (const blueprint of blueprints) {
    ctx.runtime.log("");
    ctx.runtime.log(`${blueprint.id} parameters:`);
    for (const param of blueprint.parameters) {
      const suffix = param.required ? " (required)" : param.default !== undefined ? ` (default: ${param.default})` : "";
      ctx.runtime.log(`  ${param.name.padEnd(16)} ${param.description}${suffix}`);
    }
  }
  return ExitCode.Success;
}

export async function blueprintRenderCommand(
  opts: { id: string; params: Record<string, string> },
  ctx: CommandContext,
): Promise<ExitCodeValue> {
  ctx.runtime.log(renderBlueprint(opts.id, opts.params).trimEnd());
  return ExitCode.Success;
}
