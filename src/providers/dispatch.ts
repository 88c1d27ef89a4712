/**
 * Provider Boundary — Action Dispatch
 *
 * Maps a step's action onto the matching ProviderClient call. Inputs a
 * call needs beyond the parameter map (image digest, deployment id,
 * resource, principal) come from the step's parameters first and from
 * its dependencies' outputs second.
 */

import { ValidationError } from "../errors.js";
import type { JsonObject, PlanStep } from "../orchestration/types.js";
import type { ProviderCallContext, ProviderClient } from "./types.js";

/**
 * Find a string input by name in the step parameters, then in the
 * outputs of its dependencies (in dependency order).
 */
export function lookupInput(names: readonly string[], ctx: ProviderCallContext): string | undefined {
  for (const name of names) {
    const value = ctx.params[name];
    if (typeof value === "string" && value) return value;
  }
  for (const outputs of Object.values(ctx.dependencyOutputs)) {
    for (const name of names) {
      const value = outputs[name];
      if (typeof value === "string" && value) return value;
    }
  }
  return undefined;
}

function requireInput(step: PlanStep, names: readonly string[], ctx: ProviderCallContext): string {
  const value = lookupInput(names, ctx);
  if (value === undefined) {
    throw new ValidationError(
      "UNRESOLVED_INPUT",
      `Step "${step.name}" (${step.action}) needs "${names[0]}" from its params or a dependency's outputs`,
    );
  }
  return value;
}

/**
 * Run one provider call for `step` and return its outputs.
 */
export async function executeStepAction(
  provider: ProviderClient,
  step: PlanStep,
  ctx: ProviderCallContext,
): Promise<JsonObject> {
  switch (step.action) {
    case "create-cluster":
      return provider.createCluster(ctx.params, ctx);
    case "bind-identity":
      return provider.bindIdentity(ctx.params, ctx);
    case "build-image":
      return provider.buildImage(ctx.params, ctx);
    case "push-image":
      return provider.pushImage(ctx.params, ctx);
    case "deploy":
      return provider.deploy(ctx.params, requireInput(step, ["imageDigest"], ctx), ctx);
    case "wait-ready": {
      const seconds = ctx.params.timeoutSeconds;
      const timeoutMs = typeof seconds === "number" && seconds > 0 ? seconds * 1000 : step.timeoutMs;
      return provider.waitReady(requireInput(step, ["deploymentId"], ctx), timeoutMs, ctx);
    }
    case "grant-access": {
      const resourceId = lookupInput(["resourceId", "backendService", "deploymentId"], ctx) ?? step.resourceId;
      return provider.grantAccess(resourceId, requireInput(step, ["principal", "member"], ctx), ctx);
    }
  }
}
