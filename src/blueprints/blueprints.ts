/**
 * Built-in Blueprints
 *
 * Parameterized templates that generate target files for common
 * deployments. Rendered as YAML by `orchestrate blueprint render`.
 */

import * as yaml from "js-yaml";
import { ValidationError } from "../errors.js";
import type { JsonObject } from "../orchestration/types.js";
import type { TargetFile } from "../target/target-file.js";

// =============================================================================
// Types
// =============================================================================

export type BlueprintParameter = {
  name: string;
  description: string;
  required: boolean;
  default?: string;
};

export type Blueprint = {
  id: string;
  name: string;
  description: string;
  parameters: BlueprintParameter[];
  generate(params: Record<string, string>): TargetFile;
};

type StepEntry = TargetFile["steps"][number];

// =============================================================================
// Helpers
// =============================================================================

function bp(name: string, description: string, required = true, defaultVal?: string): BlueprintParameter {
  return defaultVal === undefined ? { name, description, required } : { name, description, required, default: defaultVal };
}

function step(
  name: string,
  action: StepEntry["action"],
  params: JsonObject,
  dependsOn: string[] = [],
  extra: Pick<StepEntry, "max_attempts" | "timeout_seconds" | "resource_id"> = {},
): StepEntry {
  return { name, action, depends_on: dependsOn, params, ...extra };
}

function port(params: Record<string, string>): number {
  const value = Number(params.port ?? "8080");
  if (!Number.isInteger(value) || value <= 0 || value > 65535) {
    throw new ValidationError("INVALID_TARGET", `Blueprint parameter "port" must be a TCP port, got "${params.port}"`);
  }
  return value;
}

function slug(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9-]/g, "-");
}

// =============================================================================
// Blueprint: GKE Workload
// =============================================================================

export const gkeWorkloadBlueprint: Blueprint = {
  id: "gke-workload",
  name: "GKE Workload",
  description:
    "Autopilot cluster, workload identity, container image, Deployment + LoadBalancer Service, optional IAP access",
  parameters: [
    bp("project", "Google Cloud project id"),
    bp("region", "Cluster region", false, "us-central1"),
    bp("cluster", "Cluster name"),
    bp("name", "Workload name"),
    bp("image", "Image repository (e.g. us-docker.pkg.dev/<project>/<repo>/<name>)"),
    bp("tag", "Image tag", false, "latest"),
    bp("context", "Docker build context", false, "."),
    bp("namespace", "Kubernetes namespace", false, "default"),
    bp("port", "Container port", false, "8080"),
    bp("principal", "Member granted IAP access (user:..., group:...)", false),
    bp("backendService", "IAP backend service to grant access on", false),
  ],

  generate(params) {
    const name = slug(params.name ?? "app");
    const namespace = params.namespace ?? "default";
    const steps: StepEntry[] = [
      step("cluster", "create-cluster", { cluster: params.cluster ?? name, project: "${PROJECT}", region: "${REGION}" }, [], {
        max_attempts: 3,
        timeout_seconds: 1800,
      }),
      step("identity", "bind-identity", {
        project: "${PROJECT}",
        serviceAccount: `${name}-sa`,
        roles: ["roles/logging.logWriter", "roles/monitoring.metricWriter"],
        kubernetesServiceAccount: name,
        namespace,
        cluster: params.cluster ?? name,
        region: "${REGION}",
      }, ["cluster"], { max_attempts: 3 }),
      step("build", "build-image", {
        image: params.image ?? name,
        tag: params.tag ?? "latest",
        context: params.context ?? ".",
      }, [], { max_attempts: 2, timeout_seconds: 1200 }),
      step("push", "push-image", {}, ["build"], { max_attempts: 3 }),
      step("deploy", "deploy", {
        name,
        namespace,
        port: port(params),
        cluster: params.cluster ?? name,
        region: "${REGION}",
        project: "${PROJECT}",
        kubernetesServiceAccount: name,
        imageDigest: "$step.push.imageDigest",
      }, ["identity"], { max_attempts: 2 }),
      step("ready", "wait-ready", { deploymentId: "$step.deploy.deploymentId", timeoutSeconds: 600 }, [], {
        max_attempts: 3,
        timeout_seconds: 900,
      }),
    ];

    if (params.principal) {
      steps.push(
        step("access", "grant-access", { principal: params.principal, project: "${PROJECT}" }, ["ready"], {
          resource_id: params.backendService ?? name,
        }),
      );
    }

    return {
      target: name,
      vars: { PROJECT: params.project ?? "", REGION: params.region ?? "us-central1" },
      steps,
    };
  },
};

// =============================================================================
// Blueprint: Cloud Run Service
// =============================================================================

export const cloudRunServiceBlueprint: Blueprint = {
  id: "cloud-run-service",
  name: "Cloud Run Service",
  description: "Container image deployed as a private Cloud Run service, optional invoker grant",
  parameters: [
    bp("project", "Google Cloud project id"),
    bp("region", "Cloud Run region", false, "us-central1"),
    bp("name", "Service name"),
    bp("image", "Image repository"),
    bp("tag", "Image tag", false, "latest"),
    bp("context", "Docker build context", false, "."),
    bp("port", "Container port", false, "8080"),
    bp("serviceAccount", "Runtime service account email", false),
    bp("principal", "Member granted roles/run.invoker", false),
  ],

  generate(params) {
    const name = slug(params.name ?? "service");
    const deployParams: JsonObject = {
      platform: "cloud-run",
      name,
      region: "${REGION}",
      project: "${PROJECT}",
      port: port(params),
      imageDigest: "$step.push.imageDigest",
    };
    if (params.serviceAccount) deployParams.serviceAccount = params.serviceAccount;

    const steps: StepEntry[] = [
      step("build", "build-image", {
        image: params.image ?? name,
        tag: params.tag ?? "latest",
        context: params.context ?? ".",
      }, [], { max_attempts: 2, timeout_seconds: 1200 }),
      step("push", "push-image", {}, ["build"], { max_attempts: 3 }),
      step("deploy", "deploy", deployParams, [], { max_attempts: 2 }),
      step("ready", "wait-ready", { deploymentId: "$step.deploy.deploymentId" }, [], { max_attempts: 5, timeout_seconds: 600 }),
    ];

    if (params.principal) {
      steps.push(
        step("access", "grant-access", {
          principal: params.principal,
          project: "${PROJECT}",
          resourceId: "$step.deploy.deploymentId",
        }, ["ready"]),
      );
    }

    return {
      target: name,
      vars: { PROJECT: params.project ?? "", REGION: params.region ?? "us-central1" },
      steps,
    };
  },
};

// =============================================================================
// Blueprint Registry
// =============================================================================

const blueprintRegistry = new Map<string, Blueprint>(
  [gkeWorkloadBlueprint, cloudRunServiceBlueprint].map((b) => [b.id, b]),
);

/**
 * Get a blueprint by ID.
 */
export function getBlueprint(id: string): Blueprint | undefined {
  return blueprintRegistry.get(id);
}

/**
 * List all registered blueprints.
 */
export function listBlueprints(): Blueprint[] {
  return [...blueprintRegistry.values()];
}

/**
 * Fill defaults, check required parameters and generate the target file.
 */
export function instantiateBlueprint(id: string, params: Record<string, string>): TargetFile {
  const blueprint = getBlueprint(id);
  if (!blueprint) {
    const known = listBlueprints().map((b) => b.id).join(", ");
    throw new ValidationError("INVALID_TARGET", `Unknown blueprint "${id}" (available: ${known})`);
  }

  const resolved: Record<string, string> = {};
  const missing: string[] = [];
  for (const param of blueprint.parameters) {
    const value = params[param.name] ?? param.default;
    if (value !== undefined && value !== "") resolved[param.name] = value;
    else if (param.required) missing.push(param.name);
  }
  if (missing.length > 0) {
    throw new ValidationError(
      "INVALID_TARGET",
      `Blueprint "${id}" requires parameter(s): ${missing.join(", ")}`,
      missing,
    );
  }

  return blueprint.generate(resolved);
}

/**
 * Render a blueprint as target-file YAML.
 */
export function renderBlueprint(id: string, params: Record<string, string>): string {
  return yaml.dump(instantiateBlueprint(id, params), { lineWidth: 120, noRefs: true });
}
