/**
 * Orchestrator State — Record Schemas
 *
 * Zod schemas for reading persisted step results back from disk.
 */

import { z } from "zod";
import type { JsonObject, JsonValue, StepResult } from "../orchestration/types.js";
import { STEP_ACTIONS } from "../orchestration/types.js";
import type { StateRecord } from "./types.js";

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ]),
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(z.string(), jsonValueSchema);

export const stepErrorSchema = z.object({
  kind: z.enum(["validation", "provider", "timeout", "state-store", "cancelled"]),
  message: z.string(),
  retryable: z.boolean(),
  code: z.string().optional(),
});

export const stepResultSchema: z.ZodType<StepResult> = z.object({
  stepName: z.string(),
  action: z.enum(STEP_ACTIONS),
  status: z.enum(["pending", "running", "succeeded", "failed", "skipped"]),
  skipReason: z.enum(["already-succeeded", "dependency-failed"]).optional(),
  idempotencyKey: z.string(),
  attempts: z.number().int().nonnegative(),
  startedAt: z.string().optional(),
  endedAt: z.string().optional(),
  error: stepErrorSchema.nullable(),
  outputs: jsonObjectSchema,
});

export const stateRecordSchema: z.ZodType<StateRecord> = z.object({
  target: z.string(),
  step: z.string(),
  key: z.string(),
  result: stepResultSchema,
  updatedAt: z.string(),
});
