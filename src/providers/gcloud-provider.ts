/**
 * Provider Boundary — Google Cloud Provider
 *
 * Implements every provider operation with the `gcloud`, `kubectl` and
 * `docker` CLIs. Creation commands tolerate "already exists" so a step
 * whose earlier attempt created the resource converges on retry.
 *
 * Deployment ids are `<namespace>/<name>` for GKE workloads and
 * `cloud-run:<region>/<name>` for Cloud Run services.
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { ProviderError } from "../errors.js";
import { sleep } from "../orchestration/retry.js";
import type { JsonObject, JsonValue } from "../orchestration/types.js";
import { CliRunner } from "./cli-runner.js";
import { lookupInput } from "./dispatch.js";
import { isServiceType, renderWorkloadManifest } from "./manifests.js";
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
// Options & Output Schemas
// =============================================================================

export type GcloudProviderOptions = {
  /** Interval between load-balancer checks in waitReady. */
  pollIntervalMs?: number;
  /** Region used when a step gives none. */
  defaultRegion?: string;
};

const clusterDescribeSchema = z.object({
  endpoint: z.string(),
  selfLink: z.string().optional(),
});

const serviceSchema = z.object({
  status: z
    .object({
      loadBalancer: z
        .object({
          ingress: z.array(z.object({ ip: z.string().optional(), hostname: z.string().optional() })).optional(),
        })
        .optional(),
    })
    .optional(),
});

const runServiceSchema = z.object({
  status: z
    .object({
      url: z.string().optional(),
      conditions: z.array(z.object({ type: z.string(), status: z.string(), message: z.string().optional() })).optional(),
    })
    .optional(),
});

const CLOUD_RUN_PREFIX = "cloud-run:";

// =============================================================================
// Param Helpers
// =============================================================================

function optionalString(params: JsonObject, key: string): string | undefined {
  const value = params[key];
  return typeof value === "string" && value ? value : undefined;
}

function requiredString(params: JsonObject, key: string, ctx: ProviderCallContext): string {
  const value = optionalString(params, key);
  if (!value) {
    throw new ProviderError(`Step "${ctx.stepName}" is missing required param "${key}"`, { retryable: false });
  }
  return value;
}

function numberParam(params: JsonObject, key: string, fallback: number): number {
  const value = params[key];
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function stringList(value: JsonValue | undefined): string[] {
  if (typeof value === "string") return [value];
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === "string");
}

function stringRecord(value: JsonValue | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  if (typeof value !== "object" || value === null || Array.isArray(value)) return out;
  for (const [key, item] of Object.entries(value)) {
    if (typeof item === "string" || typeof item === "number" || typeof item === "boolean") out[key] = String(item);
  }
  return out;
}

function projectArgs(params: JsonObject): string[] {
  const project = optionalString(params, "project");
  return project ? ["--project", project] : [];
}

function asMember(principal: string): string {
  return principal.includes(":") ? principal : `user:${principal}`;
}

function parseOutput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ProviderError(`Unexpected ${what} output: ${parsed.error.issues[0]?.message ?? "invalid"}`, {
      retryable: false,
    });
  }
  return parsed.data;
}

// =============================================================================
// Provider
// =============================================================================

export class GcloudProviderClient implements ProviderClient {
  readonly name = "gcloud";
  private readonly pollIntervalMs: number;
  private readonly defaultRegion: string;

  constructor(
    private readonly cli: CliRunner = new CliRunner(),
    options: GcloudProviderOptions = {},
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? 5_000;
    this.defaultRegion = options.defaultRegion ?? "us-central1";
  }

  // ---------------------------------------------------------------------------
  // Cluster
  // ---------------------------------------------------------------------------

  async createCluster(params: JsonObject, ctx: ProviderCallContext): Promise<ClusterOutputs & JsonObject> {
    const name = optionalString(params, "cluster") ?? optionalString(params, "name") ?? ctx.stepName;
    const project = requiredString(params, "project", ctx);
    const region = optionalString(params, "region") ?? this.defaultRegion;
    const location = ["--region", region, "--project", project];
    const opts = { signal: ctx.signal };

    if (optionalString(params, "mode") === "standard") {
      await this.cli.runIdempotent(
        "gcloud",
        [
          "container", "clusters", "create", name, ...location,
          "--num-nodes", String(numberParam(params, "nodeCount", 3)),
          "--machine-type", optionalString(params, "machineType") ?? "e2-standard-4",
          `--workload-pool=${project}.svc.id.goog`,
          "--quiet",
        ],
        ctx.logger,
        opts,
      );
    } else {
      await this.cli.runIdempotent("gcloud", ["container", "clusters", "create-auto", name, ...location, "--quiet"], ctx.logger, opts);
    }

    const described = parseOutput(
      clusterDescribeSchema,
      await this.cli.runJson("gcloud", ["container", "clusters", "describe", name, ...location, "--format", "json"], ctx.logger, opts),
      "cluster describe",
    );
    await this.cli.run("gcloud", ["container", "clusters", "get-credentials", name, ...location], ctx.logger, opts);

    return {
      endpoint: described.endpoint,
      clusterId: `projects/${project}/locations/${region}/clusters/${name}`,
    };
  }

  // ---------------------------------------------------------------------------
  // Identity
  // ---------------------------------------------------------------------------

  async bindIdentity(params: JsonObject, ctx: ProviderCallContext): Promise<IdentityOutputs & JsonObject> {
    const account = requiredString(params, "serviceAccount", ctx);
    const project = requiredString(params, "project", ctx);
    const email = account.includes("@") ? account : `${account}@${project}.iam.gserviceaccount.com`;
    const opts = { signal: ctx.signal };

    if (!account.includes("@")) {
      await this.cli.runIdempotent(
        "gcloud",
        ["iam", "service-accounts", "create", account, "--project", project, "--display-name", `${ctx.target} workload`],
        ctx.logger,
        opts,
      );
    }

    for (const role of stringList(params.roles)) {
      await this.cli.run(
        "gcloud",
        ["projects", "add-iam-policy-binding", project, "--member", `serviceAccount:${email}`, "--role", role, "--condition", "None", "--quiet"],
        ctx.logger,
        opts,
      );
    }

    // Workload identity: let the Kubernetes service account act as the cloud one.
    const ksa = optionalString(params, "kubernetesServiceAccount");
    if (ksa) {
      const namespace = optionalString(params, "namespace") ?? "default";
      await this.cli.run(
        "gcloud",
        [
          "iam", "service-accounts", "add-iam-policy-binding", email,
          "--project", project,
          "--role", "roles/iam.workloadIdentityUser",
          "--member", `serviceAccount:${project}.svc.id.goog[${namespace}/${ksa}]`,
          "--quiet",
        ],
        ctx.logger,
        opts,
      );
      const cluster = optionalString(params, "cluster");
      if (cluster) {
        const region = optionalString(params, "region") ?? this.defaultRegion;
        await this.cli.run(
          "gcloud",
          ["container", "clusters", "get-credentials", cluster, "--region", region, "--project", project],
          ctx.logger,
          opts,
        );
      }
      await this.cli.runIdempotent("kubectl", ["create", "namespace", namespace], ctx.logger, opts);
      await this.cli.runIdempotent("kubectl", ["create", "serviceaccount", ksa, "-n", namespace], ctx.logger, opts);
      await this.cli.run(
        "kubectl",
        ["annotate", "serviceaccount", ksa, "-n", namespace, `iam.gke.io/gcp-service-account=${email}`, "--overwrite"],
        ctx.logger,
        opts,
      );
    }

    return { serviceAccountId: email };
  }

  // ---------------------------------------------------------------------------
  // Images
  // ---------------------------------------------------------------------------

  async buildImage(params: JsonObject, ctx: ProviderCallContext): Promise<BuildOutputs & JsonObject> {
    const image = `${requiredString(params, "image", ctx)}:${optionalString(params, "tag") ?? "latest"}`;
    const args = ["build", "-t", image];
    const dockerfile = optionalString(params, "dockerfile");
    if (dockerfile) args.push("-f", dockerfile);
    // GKE and Cloud Run nodes run amd64.
    args.push("--platform", optionalString(params, "platform") ?? "linux/amd64");
    for (const [key, value] of Object.entries(stringRecord(params.buildArgs))) {
      args.push("--build-arg", `${key}=${value}`);
    }
    args.push(optionalString(params, "context") ?? ".");

    await this.cli.run("docker", args, ctx.logger, { signal: ctx.signal });
    const id = await this.cli.run("docker", ["image", "inspect", image, "--format", "{{.Id}}"], ctx.logger, {
      signal: ctx.signal,
    });
    return { imageDigest: id.trim(), image };
  }

  async pushImage(params: JsonObject, ctx: ProviderCallContext): Promise<PushOutputs & JsonObject> {
    const repository = optionalString(params, "image");
    const image = repository
      ? `${repository}:${optionalString(params, "tag") ?? "latest"}`
      : lookupInput(["image"], ctx);
    if (!image) {
      throw new ProviderError(`Step "${ctx.stepName}" needs "image" from its params or a build step`, {
        retryable: false,
      });
    }
    const opts = { signal: ctx.signal };

    const registry = image.split("/")[0] ?? "";
    if (registry.endsWith(".pkg.dev") || registry.endsWith("gcr.io")) {
      await this.cli.run("gcloud", ["auth", "configure-docker", registry, "--quiet"], ctx.logger, opts);
    }
    await this.cli.run("docker", ["push", image], ctx.logger, opts);
    const repoDigest = await this.cli.run(
      "docker",
      ["image", "inspect", image, "--format", "{{index .RepoDigests 0}}"],
      ctx.logger,
      opts,
    );
    return { imageDigest: repoDigest.trim(), imageUrl: image };
  }

  // ---------------------------------------------------------------------------
  // Workloads
  // ---------------------------------------------------------------------------

  async deploy(params: JsonObject, imageDigest: string, ctx: ProviderCallContext): Promise<DeployOutputs & JsonObject> {
    const name = optionalString(params, "name") ?? ctx.stepName;
    if (optionalString(params, "platform") === "cloud-run") {
      return this.deployCloudRun(name, params, imageDigest, ctx);
    }

    const namespace = optionalString(params, "namespace") ?? "default";
    const opts = { signal: ctx.signal };
    const cluster = optionalString(params, "cluster");
    if (cluster) {
      const region = optionalString(params, "region") ?? this.defaultRegion;
      await this.cli.run(
        "gcloud",
        ["container", "clusters", "get-credentials", cluster, "--region", region, ...projectArgs(params)],
        ctx.logger,
        opts,
      );
    }

    const serviceType = optionalString(params, "serviceType");
    const manifest = renderWorkloadManifest({
      name,
      namespace,
      image: imageDigest,
      containerPort: numberParam(params, "port", 8080),
      replicas: numberParam(params, "replicas", 1),
      healthPath: optionalString(params, "healthPath") ?? "/healthz",
      serviceAccount: optionalString(params, "kubernetesServiceAccount"),
      env: stringRecord(params.env),
      resources: { cpu: optionalString(params, "cpu"), memory: optionalString(params, "memory") },
      serviceType: serviceType && isServiceType(serviceType) ? serviceType : undefined,
    });

    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "orchestrate-"));
    try {
      const file = path.join(dir, `${name}.json`);
      await fs.writeFile(file, JSON.stringify(manifest, null, 2), "utf-8");
      await this.cli.run("kubectl", ["apply", "-f", file, "-n", namespace], ctx.logger, opts);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }

    return { deploymentId: `${namespace}/${name}` };
  }

  private async deployCloudRun(
    name: string,
    params: JsonObject,
    imageDigest: string,
    ctx: ProviderCallContext,
  ): Promise<DeployOutputs & JsonObject> {
    const region = optionalString(params, "region") ?? this.defaultRegion;
    const args = [
      "run", "deploy", name,
      "--image", imageDigest,
      "--region", region,
      "--port", String(numberParam(params, "port", 8080)),
      "--no-allow-unauthenticated",
      ...projectArgs(params),
      "--quiet",
    ];
    const account = optionalString(params, "serviceAccount");
    if (account) args.push("--service-account", account);
    const env = Object.entries(stringRecord(params.env));
    if (env.length > 0) args.push("--set-env-vars", env.map(([k, v]) => `${k}=${v}`).join(","));

    await this.cli.run("gcloud", args, ctx.logger, { signal: ctx.signal });
    return { deploymentId: `${CLOUD_RUN_PREFIX}${region}/${name}` };
  }

  async waitReady(deploymentId: string, timeoutMs: number, ctx: ProviderCallContext): Promise<ReadyOutputs & JsonObject> {
    if (deploymentId.startsWith(CLOUD_RUN_PREFIX)) {
      return this.waitCloudRunReady(deploymentId.slice(CLOUD_RUN_PREFIX.length), ctx);
    }

    const [namespace, name] = splitId(deploymentId, "default");
    const deadline = Date.now() + timeoutMs;
    const opts = { signal: ctx.signal };

    await this.cli.run(
      "kubectl",
      ["rollout", "status", `deployment/${name}`, "-n", namespace, `--timeout=${Math.max(1, Math.ceil(timeoutMs / 1000))}s`],
      ctx.logger,
      opts,
    );

    for (;;) {
      const service = parseOutput(
        serviceSchema,
        await this.cli.runJson("kubectl", ["get", "service", name, "-n", namespace, "-o", "json"], ctx.logger, opts),
        "service",
      );
      const ingress = service.status?.loadBalancer?.ingress?.[0];
      const address = ingress?.ip ?? ingress?.hostname;
      if (address) return { ready: true, externalIP: address };

      if (Date.now() + this.pollIntervalMs > deadline) {
        throw new ProviderError(`Service ${namespace}/${name} has no external address yet`, { retryable: true });
      }
      ctx.logger.debug(`waiting for load balancer on ${namespace}/${name}`);
      await sleep(this.pollIntervalMs, ctx.signal);
    }
  }

  private async waitCloudRunReady(id: string, ctx: ProviderCallContext): Promise<ReadyOutputs & JsonObject> {
    const [region, name] = splitId(id, this.defaultRegion);
    const described = parseOutput(
      runServiceSchema,
      await this.cli.runJson(
        "gcloud",
        ["run", "services", "describe", name, "--region", region, "--format", "json"],
        ctx.logger,
        { signal: ctx.signal },
      ),
      "run service",
    );
    const ready = described.status?.conditions?.find((c) => c.type === "Ready");
    if (ready?.status !== "True" || !described.status?.url) {
      throw new ProviderError(`Cloud Run service ${name} is not ready: ${ready?.message ?? "no Ready condition"}`, {
        retryable: true,
      });
    }
    return { ready: true, externalIP: new URL(described.status.url).hostname };
  }

  // ---------------------------------------------------------------------------
  // Access
  // ---------------------------------------------------------------------------

  async grantAccess(resourceId: string, principal: string, ctx: ProviderCallContext): Promise<JsonObject> {
    const member = asMember(principal);
    const opts = { signal: ctx.signal };

    if (resourceId.startsWith(CLOUD_RUN_PREFIX)) {
      const [region, name] = splitId(resourceId.slice(CLOUD_RUN_PREFIX.length), this.defaultRegion);
      await this.cli.run(
        "gcloud",
        ["run", "services", "add-iam-policy-binding", name, "--region", region, "--member", member, "--role", "roles/run.invoker", ...projectArgs(ctx.params), "--quiet"],
        ctx.logger,
        opts,
      );
      return {};
    }

    // Anything else is an IAP-protected backend service.
    const service = resourceId.includes("/") ? resourceId.slice(resourceId.lastIndexOf("/") + 1) : resourceId;
    await this.cli.run(
      "gcloud",
      [
        "iap", "web", "add-iam-policy-binding",
        "--resource-type=backend-services",
        "--service", service,
        "--member", member,
        "--role", "roles/iap.httpsResourceAccessor",
        ...projectArgs(ctx.params),
        "--quiet",
      ],
      ctx.logger,
      opts,
    );
    return {};
  }
}

function splitId(id: string, fallbackScope: string): [string, string] {
  const slash = id.indexOf("/");
  if (slash < 0) return [fallbackScope, id];
  return [id.slice(0, slash), id.slice(slash + 1)];
}
