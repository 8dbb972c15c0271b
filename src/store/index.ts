import type { CrawlerConfig } from "../config";
import { InMemoryRunStore } from "./memoryStore";
import { SqliteRunStore } from "./sqliteStore";
import type { RunStore } from "./types";

export function createStore(config: Pick<CrawlerConfig, "storePath">, persistent = true): RunStore {
  return persistent ? new SqliteRunStore(config.storePath) : new InMemoryRunStore();
}

export * from "./memoryStore";
export * from "./sqliteStore";
export * from "./types";
