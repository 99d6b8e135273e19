export { createSqliteHistoryStore } from "./sqlite-store";
export { createMemoryHistoryStore } from "./memory-store";
export type { HistoryStore } from "./types";
