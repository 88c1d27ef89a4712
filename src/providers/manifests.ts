/**
 * Workload manifests — the Deployment + Service pair applied for a GKE deploy.
 * Rendered as a kubectl `List` in JSON so no YAML emitter is involved.
 */

import type { JsonObject } from "../orchestration/types.js";

export type WorkloadSpec = {
  name: string;
  namespace: string;
  /** Pullable image reference, preferably `repo@sha256:...`. */
  image: string;
  containerPort: number;
  replicas: number;
  healthPath: string;
  /** Kubernetes service account bound to a cloud identity. */
  serviceAccount?: string;
  env?: Record<string, string>;
  /** Container requests, e.g. `{ cpu: "250m", memory: "512Mi" }`. */
  resources?: { cpu?: string; memory?: string };
  serviceType?: ServiceType;
};

export type ServiceType = "LoadBalancer" | "ClusterIP" | "NodePort";

export function isServiceType(value: string): value is ServiceType {
  return value === "LoadBalancer" || value === "ClusterIP" || value === "NodePort";
}

export function renderWorkloadManifest(spec: WorkloadSpec): JsonObject {
  const labels = { app: spec.name };
  const probe = {
    httpGet: { path: spec.healthPath, port: spec.containerPort },
    initialDelaySeconds: 5,
    periodSeconds: 10,
  };

  const container: JsonObject = {
    name: spec.name,
    image: spec.image,
    ports: [{ containerPort: spec.containerPort }],
    readinessProbe: probe,
    livenessProbe: { ...probe, initialDelaySeconds: 15 },
  };
  const env = Object.entries(spec.env ?? {}).sort(([a], [b]) => a.localeCompare(b));
  if (env.length > 0) {
    container.env = env.map(([name, value]) => ({ name, value }));
  }
  const requests: JsonObject = {};
  if (spec.resources?.cpu) requests.cpu = spec.resources.cpu;
  if (spec.resources?.memory) requests.memory = spec.resources.memory;
  if (Object.keys(requests).length > 0) container.resources = { requests };

  const podSpec: JsonObject = { containers: [container] };
  if (spec.serviceAccount) podSpec.serviceAccountName = spec.serviceAccount;

  return {
    apiVersion: "v1",
    kind: "List",
    items: [
      {
        apiVersion: "apps/v1",
        kind: "Deployment",
        metadata: { name: spec.name, namespace: spec.namespace, labels },
        spec: {
          replicas: spec.replicas,
          selector: { matchLabels: labels },
          template: { metadata: { labels }, spec: podSpec },
        },
      },
      {
        apiVersion: "v1",
        kind: "Service",
        metadata: { name: spec.name, namespace: spec.namespace, labels },
        spec: {
          type: spec.serviceType ?? "LoadBalancer",
          selector: labels,
          ports: [{ port: 80, targetPort: spec.containerPort, protocol: "TCP" }],
        },
      },
    ],
  };
}
