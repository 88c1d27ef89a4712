/**
 * Orchestrator State — In-Memory Storage
 *
 * Lightweight implementation for tests and dry runs.
 */

import type { StepResult } from "../orchestration/types.js";
import { recordId, type StateRecord, type StateStore } from "./types.js";

export class InMemoryStateStore implements StateStore {
  private records = new Map<string, StateRecord>();

  async initialize(): Promise<void> {
    // No-op for in-memory
  }

  async get(target: string, step: string, key: string): Promise<StepResult | undefined> {
    const record = this.records.get(recordId(target, step, key));
    return record ? structuredClone(record.result) : undefined;
  }

  async put(target: string, step: string, key: string, result: StepResult): Promise<void> {
    this.records.set(recordId(target, step, key), {
      target,
      step,
      key,
      result: structuredClone(result),
      updatedAt: new Date().toISOString(),
    });
  }

  async list(target: string): Promise<StateRecord[]> {
    return [...this.records.values()]
      .filter((r) => r.target === target)
      .sort((a, b) => a.updatedAt.localeCompare(b.updatedAt))
      .map((r) => structuredClone(r));
  }

  async purge(target: string): Promise<number> {
    let removed = 0;
    for (const [id, record] of this.records) {
      if (record.target !== target) continue;
      this.records.delete(id);
      removed++;
    }
    return removed;
  }

  async close(): Promise<void> {
    this.records.clear();
  }
}
