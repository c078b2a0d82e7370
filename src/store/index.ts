import type { AppConfig } from "../config/types";
import { SqliteStore } from "./sqliteStore";
import type { ResultStore } from "./types";

export function createStore(config: Pick<AppConfig, "storePath">): ResultStore {
  return new SqliteStore(config.storePath);
}

export * from "./memoryStore";
export * from "./sqliteStore";
export * from "./types";
