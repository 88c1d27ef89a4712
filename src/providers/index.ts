/**
 * Provider Boundary — Public API
 */

import type { Logger } from "../logging/logger.js";
import { CliRunner, type CliBinaries } from "./cli-runner.js";
import { GcloudProviderClient } from "./gcloud-provider.js";
import { InMemoryProviderClient } from "./memory-provider.js";
import type { ProviderClient, ProviderType } from "./types.js";

export { CliRunner, DEFAULT_BINARIES, isAlreadyExists, isTransientFailure, toProviderError } from "./cli-runner.js";
export type { CliBinaries, CliRunOptions, CliTool } from "./cli-runner.js";
export { executeStepAction, lookupInput } from "./dispatch.js";
export { GcloudProviderClient } from "./gcloud-provider.js";
export type { GcloudProviderOptions } from "./gcloud-provider.js";
export { renderWorkloadManifest } from "./manifests.js";
export type { WorkloadSpec } from "./manifests.js";
export { InMemoryProviderClient } from "./memory-provider.js";
export type { InMemoryProviderOptions, ProviderCall, ProviderHandler } from "./memory-provider.js";
export type {
  BuildOutputs,
  ClusterOutputs,
  DeployOutputs,
  IdentityOutputs,
  ProviderCallContext,
  ProviderClient,
  ProviderType,
  PushOutputs,
  ReadyOutputs,
} from "./types.js";

export type ProviderOptions = {
  type: ProviderType;
  binaries: CliBinaries;
  region?: string;
};

/**
 * Create the configured provider client.
 */
export function createProvider(options: ProviderOptions, logger: Logger): ProviderClient {
  switch (options.type) {
    case "memory":
      logger.debug("using in-memory provider");
      return new InMemoryProviderClient();
    case "gcloud":
      return new GcloudProviderClient(new CliRunner(options.binaries), { defaultRegion: options.region });
  }
}
