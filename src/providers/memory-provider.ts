/**
 * Provider Boundary — In-Memory Provider
 *
 * Deterministic stand-in for the cloud: outputs are derived from a hash of
 * each call's inputs, every call is recorded, and tests can queue errors or
 * replace the behavior of a step or action. Backs `--dry-run`.
 */

import crypto from "node:crypto";
import { canonicalJson } from "../orchestration/idempotency.js";
import { sleep } from "../orchestration/retry.js";
import type { JsonObject, JsonValue, StepAction } from "../orchestration/types.js";
import type {
  BuildOutputs,
  ClusterOutputs,
  DeployOutputs,
  IdentityOutputs,
  ProviderCallContext,
  ProviderClient,
  PushOutputs,
  ReadyOutputs,
} from "./types.js";

// =============================================================================
// Types
// =============================================================================

export type ProviderCall = {
  action: StepAction;
  stepName: string;
  /** Positional inputs of the call (image digest, deployment id, ...) merged over the params. */
  args: JsonObject;
  signal: AbortSignal;
};

/** Replacement behavior for a step or action. The result is merged over the default outputs. */
export type ProviderHandler = (call: ProviderCall) => Promise<JsonObject> | JsonObject;

export type InMemoryProviderOptions = {
  /** Simulated latency per call (abortable). */
  latencyMs?: number;
};

// =============================================================================
// Helpers
// =============================================================================

function hashOf(value: JsonValue): string {
  return crypto.createHash("sha256").update(canonicalJson(value)).digest("hex");
}

function str(value: JsonValue | undefined, fallback: string): string {
  return typeof value === "string" && value ? value : fallback;
}

// =============================================================================
// Provider
// =============================================================================

export class InMemoryProviderClient implements ProviderClient {
  readonly name = "memory";
  readonly calls: ProviderCall[] = [];
  private queuedErrors = new Map<string, unknown[]>();
  private handlers = new Map<string, ProviderHandler>();
  private latencyMs: number;

  constructor(options?: InMemoryProviderOptions) {
    this.latencyMs = options?.latencyMs ?? 0;
  }

  /**
   * Make the next call(s) for a step name or action throw these errors,
   * one per call, before falling back to normal behavior.
   */
  queueError(selector: string, ...errors: unknown[]): void {
    const queue = this.queuedErrors.get(selector) ?? [];
    queue.push(...errors);
    this.queuedErrors.set(selector, queue);
  }

  /** Replace the behavior of every call for a step name or action. */
  setHandler(selector: string, handler: ProviderHandler): void {
    this.handlers.set(selector, handler);
  }

  callsFor(selector: string): ProviderCall[] {
    return this.calls.filter((c) => c.stepName === selector || c.action === selector);
  }

  // ---------------------------------------------------------------------------
  // ProviderClient
  // ---------------------------------------------------------------------------

  async createCluster(params: JsonObject, ctx: ProviderCallContext): Promise<ClusterOutputs & JsonObject> {
    const name = str(params.cluster ?? params.name, ctx.stepName);
    const project = str(params.project, "local-project");
    const region = str(params.region, "us-central1");
    return this.invoke("create-cluster", ctx, params, {
      endpoint: `https://${hashOf(params).slice(0, 8)}.${name}.cluster.local`,
      clusterId: `projects/${project}/locations/${region}/clusters/${name}`,
    });
  }

  async bindIdentity(params: JsonObject, ctx: ProviderCallContext): Promise<IdentityOutputs & JsonObject> {
    const account = str(params.serviceAccount, ctx.stepName);
    const project = str(params.project, "local-project");
    return this.invoke("bind-identity", ctx, params, {
      serviceAccountId: `${account}@${project}.iam.gserviceaccount.com`,
    });
  }

  async buildImage(params: JsonObject, ctx: ProviderCallContext): Promise<BuildOutputs & JsonObject> {
    const image = `${str(params.image, ctx.stepName)}:${str(params.tag, "latest")}`;
    return this.invoke("build-image", ctx, params, {
      imageDigest: `sha256:${hashOf(params)}`,
      image,
    });
  }

  async pushImage(params: JsonObject, ctx: ProviderCallContext): Promise<PushOutputs & JsonObject> {
    const image = str(params.image, ctx.stepName);
    const imageUrl = `${image}:${str(params.tag, "latest")}`;
    return this.invoke("push-image", ctx, params, {
      imageDigest: `${image}@sha256:${hashOf({ params, inputs: ctx.dependencyOutputs })}`,
      imageUrl,
    });
  }

  async deploy(params: JsonObject, imageDigest: string, ctx: ProviderCallContext): Promise<DeployOutputs & JsonObject> {
    const namespace = str(params.namespace, "default");
    const name = str(params.name, ctx.stepName);
    return this.invoke("deploy", ctx, { ...params, imageDigest }, {
      deploymentId: `${namespace}/${name}`,
    });
  }

  async waitReady(deploymentId: string, timeoutMs: number, ctx: ProviderCallContext): Promise<ReadyOutputs & JsonObject> {
    const octet = Number.parseInt(hashOf(deploymentId).slice(0, 2), 16) % 254 + 1;
    return this.invoke("wait-ready", ctx, { deploymentId, timeoutMs }, {
      ready: true,
      externalIP: `203.0.113.${octet}`,
    });
  }

  async grantAccess(resourceId: string, principal: string, ctx: ProviderCallContext): Promise<JsonObject> {
    return this.invoke("grant-access", ctx, { resourceId, principal }, {});
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async invoke<T extends JsonObject>(
    action: StepAction,
    ctx: ProviderCallContext,
    args: JsonObject,
    defaults: T,
  ): Promise<T> {
    const call: ProviderCall = { action, stepName: ctx.stepName, args, signal: ctx.signal };
    this.calls.push(call);
    ctx.logger.debug(`memory provider: ${action}`, { step: ctx.stepName });

    const queued = this.takeQueuedError(ctx.stepName) ?? this.takeQueuedError(action);
    if (queued) throw queued.error;

    if (this.latencyMs > 0) await sleep(this.latencyMs, ctx.signal);

    const handler = this.handlers.get(ctx.stepName) ?? this.handlers.get(action);
    if (!handler) return defaults;
    const override = await handler(call);
    return Object.assign({}, defaults, override);
  }

  private takeQueuedError(selector: string): { error: unknown } | undefined {
    const queue = this.queuedErrors.get(selector);
    if (!queue || queue.length === 0) return undefined;
    return { error: queue.shift() };
  }
}
