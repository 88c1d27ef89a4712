/**
 * Orchestrator State — JSON Lines Storage
 *
 * Append-only file of one JSON record per line. Later lines win, so a
 * crashed run leaves every write it made readable, and the file can be
 * inspected or repaired by hand. Purge rewrites the file through a
 * temporary sibling and a rename.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { StateStoreError, formatErrorMessage } from "../errors.js";
import type { StepResult } from "../orchestration/types.js";
import { stateRecordSchema } from "./schema.js";
import { recordId, type StateRecord, type StateStore } from "./types.js";

export class JsonLinesStateStore implements StateStore {
  private records = new Map<string, StateRecord>();
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  async initialize(): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      this.records = await this.readAll();
    } catch (err: unknown) {
      throw this.wrap("open", err);
    }
  }

  async get(target: string, step: string, key: string): Promise<StepResult | undefined> {
    const record = this.records.get(recordId(target, step, key));
    return record ? structuredClone(record.result) : undefined;
  }

  async put(target: string, step: string, key: string, result: StepResult): Promise<void> {
    const record: StateRecord = { target, step, key, result: structuredClone(result), updatedAt: new Date().toISOString() };
    await this.enqueue(async () => {
      await fs.appendFile(this.filePath, `${JSON.stringify(record)}\n`, "utf8");
      this.records.set(recordId(target, step, key), record);
    }, "write");
  }

  async list(target: string): Promise<StateRecord[]> {
    // Re-read so status queries see writes made by other processes.
    let records: Map<string, StateRecord>;
    try {
      records = await this.readAll();
    } catch (err: unknown) {
      throw this.wrap("read", err);
    }
    return [...records.values()]
      .filter((r) => r.target === target)
      .sort((a, b) => a.updatedAt.localeCompare(b.updatedAt));
  }

  async purge(target: string): Promise<number> {
    let removed = 0;
    await this.enqueue(async () => {
      const all = await this.readAll();
      const kept: StateRecord[] = [];
      for (const record of all.values()) {
        if (record.target === target) removed++;
        else kept.push(record);
      }
      const tmpPath = `${this.filePath}.${process.pid}.tmp`;
      const body = kept.map((r) => JSON.stringify(r)).join("\n");
      await fs.writeFile(tmpPath, kept.length > 0 ? `${body}\n` : "", "utf8");
      await fs.rename(tmpPath, this.filePath);
      this.records = new Map(kept.map((r) => [recordId(r.target, r.step, r.key), r]));
    }, "purge");
    return removed;
  }

  async close(): Promise<void> {
    await this.writeChain;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  /** Serialize file mutations made through this instance. */
  private enqueue(task: () => Promise<void>, operation: string): Promise<void> {
    const run = this.writeChain.then(task).catch((err: unknown) => {
      throw this.wrap(operation, err);
    });
    // Keep the chain alive after a failure; the caller still sees the error.
    this.writeChain = run.catch(() => undefined);
    return run;
  }

  private async readAll(): Promise<Map<string, StateRecord>> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, "utf8");
    } catch (err: unknown) {
      if (isNotFound(err)) return new Map();
      throw err;
    }

    const records = new Map<string, StateRecord>();
    const lines = text.split("\n");
    lines.forEach((line, index) => {
      if (!line.trim()) return;
      const parsed = stateRecordSchema.safeParse(safeJsonParse(line));
      if (!parsed.success) {
        throw new StateStoreError(`${this.filePath}:${index + 1}: malformed state record`);
      }
      const record = parsed.data;
      records.set(recordId(record.target, record.step, record.key), record);
    });
    return records;
  }

  private wrap(operation: string, err: unknown): StateStoreError {
    if (err instanceof StateStoreError) return err;
    return new StateStoreError(`State store ${operation} failed (${this.filePath}): ${formatErrorMessage(err)}`, {
      cause: err,
    });
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

function safeJsonParse(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}
