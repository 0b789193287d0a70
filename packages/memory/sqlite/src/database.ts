// Opens the SQLite file and brings its schema up to date

import Database from "better-sqlite3";
import type { Database as SqliteDatabase } from "better-sqlite3";
import type { Logger } from "@wayfarer/core";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { SchemaManager } from "./schema";

export async function openDatabase(path: string, logger: Logger): Promise<SqliteDatabase> {
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");

  await new SchemaManager(db, logger.child({ component: "SchemaManager" })).migrate();
  return db;
}
