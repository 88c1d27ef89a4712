/**
 * Orchestrator State — Storage Interface
 *
 * Durable record of step outcomes keyed by (target, step, idempotency key).
 * The executor is the only writer; status queries only read.
 */

import type { StepResult } from "../orchestration/types.js";

export type StateRecord = {
  target: string;
  step: string;
  key: string;
  result: StepResult;
  updatedAt: string;
};

export interface StateStore {
  initialize(): Promise<void>;
  get(target: string, step: string, key: string): Promise<StepResult | undefined>;
  /** Last writer wins for a given (target, step, key). */
  put(target: string, step: string, key: string, result: StepResult): Promise<void>;
  /** All records of a target, oldest update first. */
  list(target: string): Promise<StateRecord[]>;
  /** Delete every record of a target; returns how many were removed. */
  purge(target: string): Promise<number>;
  close(): Promise<void>;
}

export type StateStoreType = "jsonl" | "sqlite" | "memory";

export function recordId(target: string, step: string, key: string): string {
  return JSON.stringify([target, step, key]);
}

/**
 * Latest record per step, in the order the steps were first updated.
 */
export function latestPerStep(records: readonly StateRecord[]): StateRecord[] {
  const latest = new Map<string, StateRecord>();
  for (const record of records) {
    const current = latest.get(record.step);
    if (!current || record.updatedAt >= current.updatedAt) latest.set(record.step, record);
  }
  return [...latest.values()].sort((a, b) => a.updatedAt.localeCompare(b.updatedAt));
}
