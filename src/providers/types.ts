/**
 * Provider Boundary — Types
 *
 * The orchestrator reaches clusters, registries and IAM only through a
 * ProviderClient. Implementations must return the same outputs for the
 * same inputs, report failures as ProviderErrors with an explicit
 * retryable flag, and stop work when the context signal aborts.
 */

import type { Logger } from "../logging/logger.js";
import type { JsonObject } from "../orchestration/types.js";

/** Context passed to every provider call. */
export type ProviderCallContext = {
  /** Aborts on step timeout or run cancellation. */
  signal: AbortSignal;
  logger: Logger;
  target: string;
  stepName: string;
  /** The step's resolved parameters. */
  params: JsonObject;
  /** Outputs of the step's direct dependencies, keyed by step name. */
  dependencyOutputs: Record<string, JsonObject>;
};

export type ClusterOutputs = { endpoint: string; clusterId: string };
export type IdentityOutputs = { serviceAccountId: string };
export type BuildOutputs = { imageDigest: string; image: string };
export type PushOutputs = { imageDigest: string; imageUrl: string };
export type DeployOutputs = { deploymentId: string };
export type ReadyOutputs = { ready: boolean; externalIP: string };

export interface ProviderClient {
  readonly name: string;

  createCluster(params: JsonObject, ctx: ProviderCallContext): Promise<ClusterOutputs & JsonObject>;
  bindIdentity(params: JsonObject, ctx: ProviderCallContext): Promise<IdentityOutputs & JsonObject>;
  buildImage(params: JsonObject, ctx: ProviderCallContext): Promise<BuildOutputs & JsonObject>;
  pushImage(params: JsonObject, ctx: ProviderCallContext): Promise<PushOutputs & JsonObject>;
  deploy(params: JsonObject, imageDigest: string, ctx: ProviderCallContext): Promise<DeployOutputs & JsonObject>;
  waitReady(deploymentId: string, timeoutMs: number, ctx: ProviderCallContext): Promise<ReadyOutputs & JsonObject>;
  grantAccess(resourceId: string, principal: string, ctx: ProviderCallContext): Promise<JsonObject>;
}

export type ProviderType = "gcloud" | "memory";
