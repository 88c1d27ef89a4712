/**
 * Orchestrator Idempotency Keys — Unit Tests
 */

import { describe, it, expect } from "vitest";
import { canonicalJson, computeIdempotencyKey, type IdempotencyInput } from "./idempotency.js";

const base: IdempotencyInput = {
  action: "deploy",
  resourceId: "app",
  params: { name: "app", replicas: 2 },
  inputs: { push: { imageDigest: "repo@sha256:abc" } },
};

describe("canonicalJson", () => {
  it("sorts object keys at every depth", () => {
    expect(canonicalJson({ b: 1, a: { d: [1, { z: true, y: null }], c: "x" } })).toBe(
      '{"a":{"c":"x","d":[1,{"y":null,"z":true}]},"b":1}',
    );
  });

  it("keeps array order", () => {
    expect(canonicalJson([3, 1, 2])).toBe("[3,1,2]");
  });
});

describe("computeIdempotencyKey", () => {
  it("is a sha256 hex digest", () => {
    expect(computeIdempotencyKey(base)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("ignores key order", () => {
    const reordered: IdempotencyInput = {
      inputs: { push: { imageDigest: "repo@sha256:abc" } },
      params: { replicas: 2, name: "app" },
      resourceId: "app",
      action: "deploy",
    };
    expect(computeIdempotencyKey(reordered)).toBe(computeIdempotencyKey(base));
  });

  it("changes with any input", () => {
    const key = computeIdempotencyKey(base);
    expect(computeIdempotencyKey({ ...base, action: "build-image" })).not.toBe(key);
    expect(computeIdempotencyKey({ ...base, resourceId: "other" })).not.toBe(key);
    expect(computeIdempotencyKey({ ...base, params: { name: "app", replicas: 3 } })).not.toBe(key);
    expect(computeIdempotencyKey({ ...base, inputs: { push: { imageDigest: "repo@sha256:def" } } })).not.toBe(key);
  });
});
