/**
 * Orchestrator State — Public API
 */

import { InMemoryStateStore } from "./memory-store.js";
import { JsonLinesStateStore } from "./jsonl-store.js";
import { SqliteStateStore } from "./sqlite-store.js";
import type { StateStore, StateStoreType } from "./types.js";

export { InMemoryStateStore } from "./memory-store.js";
export { JsonLinesStateStore } from "./jsonl-store.js";
export { SqliteStateStore } from "./sqlite-store.js";
export { latestPerStep, recordId } from "./types.js";
export type { StateRecord, StateStore, StateStoreType } from "./types.js";

export type StateStoreOptions = {
  type: StateStoreType;
  path: string;
};

/**
 * Create (but do not initialize) the configured state store.
 */
export function createStateStore(options: StateStoreOptions): StateStore {
  switch (options.type) {
    case "memory":
      return new InMemoryStateStore();
    case "sqlite":
      return new SqliteStateStore(options.path);
    case "jsonl":
      return new JsonLinesStateStore(options.path);
  }
}
