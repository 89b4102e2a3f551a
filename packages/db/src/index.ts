export { createDb } from "./client.js";
export type { Database } from "./client.js";

// Re-export schema for convenience
export * from "./schema/index.js";

export { createDrizzleStore, toRow, fromRow } from "./store.js";
export type { RowParseResult, DrizzleStoreOptions } from "./store.js";
