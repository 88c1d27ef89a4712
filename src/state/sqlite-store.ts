/**
 * Orchestrator State — SQLite Storage
 *
 * WAL-mode SQLite table keyed by (target, step, idempotency key). Several
 * orchestrator processes may share one database file.
 */

import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { StateStoreError, formatErrorMessage } from "../errors.js";
import type { StepResult } from "../orchestration/types.js";
import { stepResultSchema } from "./schema.js";
import type { StateRecord, StateStore } from "./types.js";

const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS step_results (
  target TEXT NOT NULL,
  step TEXT NOT NULL,
  idem_key TEXT NOT NULL,
  status TEXT NOT NULL,
  result TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  PRIMARY KEY (target, step, idem_key)
);

CREATE INDEX IF NOT EXISTS idx_step_results_target ON step_results(target, updated_at);
`;

type StepResultRow = {
  target: string;
  step: string;
  idem_key: string;
  result: string;
  updated_at: string;
};

export class SqliteStateStore implements StateStore {
  private db: Database.Database | null = null;

  constructor(private readonly dbPath: string) {}

  async initialize(): Promise<void> {
    this.guard("open", () => {
      if (this.dbPath !== ":memory:") fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
      const db = new Database(this.dbPath);
      db.pragma("journal_mode = WAL");
      db.pragma("synchronous = NORMAL");
      db.pragma("busy_timeout = 5000");
      db.exec(SCHEMA_DDL);
      this.db = db;
    });
  }

  async get(target: string, step: string, key: string): Promise<StepResult | undefined> {
    return this.guard("read", () => {
      const row = this.connection()
        .prepare<[string, string, string], StepResultRow>(
          "SELECT * FROM step_results WHERE target = ? AND step = ? AND idem_key = ?",
        )
        .get(target, step, key);
      return row ? this.rowToRecord(row).result : undefined;
    });
  }

  async put(target: string, step: string, key: string, result: StepResult): Promise<void> {
    this.guard("write", () => {
      this.connection()
        .prepare(
          `INSERT OR REPLACE INTO step_results (target, step, idem_key, status, result, updated_at)
           VALUES (@target, @step, @key, @status, @result, @updatedAt)`,
        )
        .run({
          target,
          step,
          key,
          status: result.status,
          result: JSON.stringify(result),
          updatedAt: new Date().toISOString(),
        });
    });
  }

  async list(target: string): Promise<StateRecord[]> {
    return this.guard("read", () => {
      const rows = this.connection()
        .prepare<[string], StepResultRow>("SELECT * FROM step_results WHERE target = ? ORDER BY updated_at ASC")
        .all(target);
      return rows.map((row) => this.rowToRecord(row));
    });
  }

  async purge(target: string): Promise<number> {
    return this.guard("purge", () => {
      return this.connection().prepare("DELETE FROM step_results WHERE target = ?").run(target).changes;
    });
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private connection(): Database.Database {
    if (!this.db) throw new StateStoreError("State store used before initialize()");
    return this.db;
  }

  private rowToRecord(row: StepResultRow): StateRecord {
    const parsed = stepResultSchema.safeParse(JSON.parse(row.result));
    if (!parsed.success) {
      throw new StateStoreError(`Malformed state record for ${row.target}/${row.step}`);
    }
    return { target: row.target, step: row.step, key: row.idem_key, result: parsed.data, updatedAt: row.updated_at };
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err: unknown) {
      if (err instanceof StateStoreError) throw err;
      throw new StateStoreError(`State store ${operation} failed (${this.dbPath}): ${formatErrorMessage(err)}`, {
        cause: err,
      });
    }
  }
}
