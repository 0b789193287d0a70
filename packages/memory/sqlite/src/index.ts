// @wayfarer/memory-sqlite: SQLite implementations of the session and memory stores
// Uses better-sqlite3 for an embedded database

export { openDatabase } from "./database";
export { SchemaManager, MIGRATIONS_DIR, type Migration } from "./schema";
export { SqliteSessionStore } from "./session-store";
export { SqliteMemoryStore } from "./memory-store";
