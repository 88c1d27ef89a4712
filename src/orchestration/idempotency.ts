/**
 * Orchestrator — Idempotency Keys
 *
 * A step's key is a SHA-256 over a canonical JSON rendering of everything
 * that determines what the provider would do: the action, the resource,
 * the resolved parameters and the outputs of its direct dependencies.
 */

import crypto from "node:crypto";
import type { JsonObject, JsonValue, StepAction } from "./types.js";

export type IdempotencyInput = {
  action: StepAction;
  resourceId: string;
  params: JsonObject;
  /** Outputs of the step's direct dependencies, keyed by step name. */
  inputs: Record<string, JsonObject>;
};

/**
 * JSON with object keys sorted at every depth, so logically equal values
 * always serialize identically.
 */
export function canonicalJson(value: JsonValue): string {
  if (value === null || typeof value !== "object") return JSON.stringify(value);
  if (Array.isArray(value)) return `[${value.map(canonicalJson).join(",")}]`;
  const keys = Object.keys(value).sort();
  return `{${keys.map((k) => `${JSON.stringify(k)}:${canonicalJson(value[k])}`).join(",")}}`;
}

export function computeIdempotencyKey(input: IdempotencyInput): string {
  const payload: JsonObject = {
    action: input.action,
    resourceId: input.resourceId,
    params: input.params,
    inputs: input.inputs,
  };
  return crypto.createHash("sha256").update(canonicalJson(payload)).digest("hex");
}
