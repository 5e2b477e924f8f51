import { isAbsolute, resolve } from "node:path";
import type { StorageConfig } from "../types.js";
import { MemoryAdapter } from "./memory.js";
import { SqliteAdapter } from "./sqlite.js";
import type { EventStoreAdapter } from "./types.js";

export const DEFAULT_DB_PATH = "./.causeway/events.sqlite";

/**
 * Create the event store named by the `storage:` section of a policy file.
 * Relative SQLite paths resolve against `baseDir`.
 */
export function createAdapter(config?: StorageConfig, baseDir: string = process.cwd()): EventStoreAdapter {
  if (!config) return new MemoryAdapter();

  switch (config.adapter) {
    case "memory":
      return new MemoryAdapter();

    case "sqlite": {
      const path = config.path ?? DEFAULT_DB_PATH;
      if (typeof path !== "string") {
        throw new Error(`SqliteAdapter 'path' must be a string, got: ${typeof path}`);
      }
      return new SqliteAdapter(path === ":memory:" || isAbsolute(path) ? path : resolve(baseDir, path));
    }

    default:
      throw new Error(`Unknown storage adapter: ${config.adapter}. Must be one of: memory, sqlite`);
  }
}
