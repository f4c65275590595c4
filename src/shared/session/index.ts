export type { ArchivedSession, ArchivedSessionSummary } from "./types.js";
export { summarize } from "./types.js";
export type { SessionArchive } from "./store.js";
export { createInMemorySessionArchive } from "./in-memory.js";
export { createSqliteSessionArchive } from "./sqlite.js";
