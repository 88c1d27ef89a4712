/**
 * Workload manifests — Unit Tests
 */

import { describe, it, expect } from "vitest";
import { isServiceType, renderWorkloadManifest } from "./manifests.js";

describe("renderWorkloadManifest", () => {
  it("renders a minimal Deployment and LoadBalancer Service", () => {
    const manifest = renderWorkloadManifest({
      name: "web",
      namespace: "prod",
      image: "repo/web@sha256:abc",
      containerPort: 8080,
      replicas: 1,
      healthPath: "/healthz",
    });

    const probe = { httpGet: { path: "/healthz", port: 8080 }, initialDelaySeconds: 5, periodSeconds: 10 };
    expect(manifest).toEqual({
      apiVersion: "v1",
      kind: "List",
      items: [
        {
          apiVersion: "apps/v1",
          kind: "Deployment",
          metadata: { name: "web", namespace: "prod", labels: { app: "web" } },
          spec: {
            replicas: 1,
            selector: { matchLabels: { app: "web" } },
            template: {
              metadata: { labels: { app: "web" } },
              spec: {
                containers: [
                  {
                    name: "web",
                    image: "repo/web@sha256:abc",
                    ports: [{ containerPort: 8080 }],
                    readinessProbe: probe,
                    livenessProbe: { ...probe, initialDelaySeconds: 15 },
                  },
                ],
              },
            },
          },
        },
        {
          apiVersion: "v1",
          kind: "Service",
          metadata: { name: "web", namespace: "prod", labels: { app: "web" } },
          spec: {
            type: "LoadBalancer",
            selector: { app: "web" },
            ports: [{ port: 80, targetPort: 8080, protocol: "TCP" }],
          },
        },
      ],
    });
  });

  it("adds optional settings", () => {
    const manifest = renderWorkloadManifest({
      name: "api",
      namespace: "default",
      image: "repo/api@sha256:def",
      containerPort: 3000,
      replicas: 3,
      healthPath: "/ready",
      serviceAccount: "api-ksa",
      env: { LOG_LEVEL: "debug", API_MODE: "strict" },
      resources: { cpu: "250m" },
      serviceType: "ClusterIP",
    });

    expect(manifest).toMatchObject({
      items: [
        {
          spec: {
            template: {
              spec: {
                serviceAccountName: "api-ksa",
                containers: [
                  {
                    env: [
                      { name: "API_MODE", value: "strict" },
                      { name: "LOG_LEVEL", value: "debug" },
                    ],
                    resources: { requests: { cpu: "250m" } },
                  },
                ],
              },
            },
          },
        },
        { spec: { type: "ClusterIP" } },
      ],
    });
  });
});

describe("isServiceType", () => {
  it("accepts Kubernetes service types only", () => {
    expect(isServiceType("NodePort")).toBe(true);
    expect(isServiceType("ExternalName")).toBe(false);
  });
});
