/**
 * In-memory provider — Unit Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { CancelledError, ProviderError } from "../errors.js";
import { createSilentLogger } from "../logging/logger.js";
import type { JsonObject } from "../orchestration/types.js";
import { InMemoryProviderClient } from "./memory-provider.js";
import type { ProviderCallContext } from "./types.js";

function context(stepName: string, params: JsonObject = {}, signal = new AbortController().signal): ProviderCallContext {
  return { signal, logger: createSilentLogger("test"), target: "t", stepName, params, dependencyOutputs: {} };
}

describe("InMemoryProviderClient", () => {
  let provider: InMemoryProviderClient;

  beforeEach(() => {
    provider = new InMemoryProviderClient();
  });

  it("derives cluster outputs from the params", async () => {
    const params = { project: "demo-proj", region: "europe-west1", cluster: "main" };

    const outputs = await provider.createCluster(params, context("cluster", params));

    expect(outputs.clusterId).toBe("projects/demo-proj/locations/europe-west1/clusters/main");
    expect(outputs.endpoint).toMatch(/^https:\/\/[0-9a-f]{8}\.main\.cluster\.local$/);
  });

  it("returns the same outputs for the same inputs", async () => {
    const first = await provider.buildImage({ image: "app", tag: "v1" }, context("build"));
    const second = await provider.buildImage({ tag: "v1", image: "app" }, context("build"));
    const other = await provider.buildImage({ image: "app", tag: "v2" }, context("build"));

    expect(second).toEqual(first);
    expect(other.imageDigest).not.toBe(first.imageDigest);
    expect(first.image).toBe("app:v1");
  });

  it("falls back to the step name and local defaults", async () => {
    expect(await provider.bindIdentity({}, context("identity"))).toEqual({
      serviceAccountId: "identity@local-project.iam.gserviceaccount.com",
    });
    expect(await provider.deploy({}, "app@sha256:abc", context("web"))).toEqual({ deploymentId: "default/web" });
  });

  it("reports a documentation-range address when ready", async () => {
    const outputs = await provider.waitReady("default/web", 1_000, context("ready"));
    expect(outputs.ready).toBe(true);
    expect(outputs.externalIP).toMatch(/^203\.0\.113\.\d{1,3}$/);
  });

  it("records every call", async () => {
    await provider.grantAccess("web-backend", "alice@example.com", context("access"));

    expect(provider.calls).toHaveLength(1);
    expect(provider.calls[0]).toMatchObject({
      action: "grant-access",
      stepName: "access",
      args: { resourceId: "web-backend", principal: "alice@example.com" },
    });
    expect(provider.callsFor("grant-access")).toHaveLength(1);
    expect(provider.callsFor("other")).toHaveLength(0);
  });

  it("throws queued errors one call at a time, step name first", async () => {
    const byStep = new ProviderError("step error", { retryable: true });
    const byAction = new ProviderError("action error");
    provider.queueError("build", byStep);
    provider.queueError("build-image", byAction);

    await expect(provider.buildImage({}, context("build"))).rejects.toBe(byStep);
    await expect(provider.buildImage({}, context("build"))).rejects.toBe(byAction);
    await expect(provider.buildImage({}, context("build"))).resolves.toMatchObject({ image: "build:latest" });
    expect(provider.calls).toHaveLength(3);
  });

  it("merges handler results over the default outputs", async () => {
    provider.setHandler("deploy", (call) => ({ deploymentId: `custom/${call.stepName}`, revision: 3 }));

    expect(await provider.deploy({}, "app@sha256:abc", context("web"))).toEqual({ deploymentId: "custom/web", revision: 3 });
  });

  it("aborts simulated latency", async () => {
    const slow = new InMemoryProviderClient({ latencyMs: 10_000 });
    const controller = new AbortController();
    const pending = slow.buildImage({}, context("build", {}, controller.signal));

    controller.abort(new CancelledError("stop"));

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });
});
