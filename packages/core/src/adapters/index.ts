export type { EventStoreAdapter, EventDraft } from "./types.js";
export { MemoryAdapter } from "./memory.js";
export { SqliteAdapter } from "./sqlite.js";
export { verifyEvents, verifyScopeRoot, computeStats } from "./chain-integrity.js";
export { createAdapter, DEFAULT_DB_PATH } from "./factory.js";
