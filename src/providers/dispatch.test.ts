/**
 * Provider action dispatch — Unit Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ValidationError } from "../errors.js";
import { createSilentLogger } from "../logging/logger.js";
import { buildPlan } from "../orchestration/planner.js";
import type { JsonObject, PlanStep, StepSpec } from "../orchestration/types.js";
import { executeStepAction, lookupInput } from "./dispatch.js";
import { InMemoryProviderClient } from "./memory-provider.js";
import type { ProviderCallContext } from "./types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function planStep(spec: StepSpec): PlanStep {
  return buildPlan("t", [spec]).steps[0];
}

function context(step: PlanStep, params: JsonObject, dependencyOutputs: Record<string, JsonObject> = {}): ProviderCallContext {
  return {
    signal: new AbortController().signal,
    logger: createSilentLogger("test"),
    target: "t",
    stepName: step.name,
    params,
    dependencyOutputs,
  };
}

async function captureValidationError(promise: Promise<unknown>): Promise<ValidationError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error("expected a ValidationError");
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("lookupInput", () => {
  it("prefers params over dependency outputs", () => {
    const step = planStep({ name: "deploy", action: "deploy" });
    const ctx = context(step, { imageDigest: "from-params" }, { push: { imageDigest: "from-push" } });
    expect(lookupInput(["imageDigest"], ctx)).toBe("from-params");
  });

  it("searches dependencies in order and ignores empty or non-string values", () => {
    const step = planStep({ name: "deploy", action: "deploy" });
    const ctx = context(step, { imageDigest: "" }, { build: { imageDigest: 7 }, push: { imageDigest: "from-push" } });
    expect(lookupInput(["imageDigest"], ctx)).toBe("from-push");
    expect(lookupInput(["missing"], ctx)).toBeUndefined();
  });
});

describe("executeStepAction", () => {
  let provider: InMemoryProviderClient;

  beforeEach(() => {
    provider = new InMemoryProviderClient();
  });

  it("passes the dependency's image digest to deploy", async () => {
    const step = planStep({ name: "deploy", action: "deploy", params: { name: "web" } });

    const outputs = await executeStepAction(provider, step, context(step, { name: "web" }, { push: { imageDigest: "repo@sha256:abc" } }));

    expect(outputs).toEqual({ deploymentId: "default/web" });
    expect(provider.calls[0].args).toEqual({ name: "web", imageDigest: "repo@sha256:abc" });
  });

  it("fails deploy without an image digest", async () => {
    const step = planStep({ name: "deploy", action: "deploy" });

    const error = await captureValidationError(executeStepAction(provider, step, context(step, {})));

    expect(error.code).toBe("UNRESOLVED_INPUT");
    expect(error.message).toBe('Step "deploy" (deploy) needs "imageDigest" from its params or a dependency\'s outputs');
    expect(provider.calls).toHaveLength(0);
  });

  it("uses timeoutSeconds for wait-ready, else the step timeout", async () => {
    const explicit = planStep({ name: "ready", action: "wait-ready", params: { timeoutSeconds: 90 } });
    await executeStepAction(provider, explicit, context(explicit, { timeoutSeconds: 90, deploymentId: "prod/web" }));

    const implicit = planStep({ name: "ready", action: "wait-ready", timeoutMs: 45_000 });
    await executeStepAction(provider, implicit, context(implicit, {}, { deploy: { deploymentId: "prod/web" } }));

    expect(provider.calls.map((c) => c.args)).toEqual([
      { deploymentId: "prod/web", timeoutMs: 90_000 },
      { deploymentId: "prod/web", timeoutMs: 45_000 },
    ]);
  });

  it("grants access on the step resource when no resource input is given", async () => {
    const step = planStep({ name: "access", action: "grant-access", resourceId: "web-backend" });

    await executeStepAction(provider, step, context(step, { member: "group:devs@example.com" }));

    expect(provider.calls[0].args).toEqual({ resourceId: "web-backend", principal: "group:devs@example.com" });
  });

  it("takes the resource from a dependency's deployment id", async () => {
    const step = planStep({ name: "access", action: "grant-access" });

    await executeStepAction(provider, step, context(step, { principal: "alice@example.com" }, { deploy: { deploymentId: "cloud-run:us-east1/api" } }));

    expect(provider.calls[0].args).toEqual({ resourceId: "cloud-run:us-east1/api", principal: "alice@example.com" });
  });

  it("requires a principal for grant-access", async () => {
    const step = planStep({ name: "access", action: "grant-access" });
    const error = await captureValidationError(executeStepAction(provider, step, context(step, {})));
    expect(error.code).toBe("UNRESOLVED_INPUT");
  });
});
