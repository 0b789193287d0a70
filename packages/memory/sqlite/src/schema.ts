// Schema manager: reads and applies SQL migrations in order

import type { Database } from "better-sqlite3";
import type { Logger } from "@wayfarer/core";
import { errorMessage } from "@wayfarer/core";
import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

export const MIGRATIONS_DIR = fileURLToPath(new URL("./migrations", import.meta.url));

export interface Migration {
  readonly version: number;
  readonly name: string;
  readonly sql: string;
}

export class SchemaManager {
  constructor(
    private readonly db: Database,
    private readonly logger: Logger,
    private readonly migrationsDir: string = MIGRATIONS_DIR,
  ) {}

  /**
   * Apply all pending migrations from the migrations directory.
   * Migrations are numbered SQL files (e.g., 001_initial.sql); each one
   * runs in its own transaction together with its schema_version row.
   */
  async migrate(): Promise<void> {
    this.db.exec(
      "CREATE TABLE IF NOT EXISTS schema_version (version INTEGER PRIMARY KEY, applied_at INTEGER NOT NULL)",
    );

    const currentVersion = this.getCurrentVersion();
    const migrations = await this.loadMigrations();
    const pending = migrations.filter((m) => m.version > currentVersion);

    if (pending.length === 0) {
      this.logger.debug("Schema is up to date", { version: currentVersion });
      return;
    }

    this.logger.info("Applying migrations", { from: currentVersion, count: pending.length });

    const record = this.db.prepare<[number, number]>(
      "INSERT INTO schema_version (version, applied_at) VALUES (?, ?)",
    );

    for (const migration of pending) {
      const apply = this.db.transaction(() => {
        this.db.exec(migration.sql);
        record.run(migration.version, Date.now());
      });

      try {
        apply();
        this.logger.info("Migration applied", { version: migration.version, name: migration.name });
      } catch (e) {
        this.logger.error("Migration failed", { version: migration.version, error: errorMessage(e) });
        throw e;
      }
    }
  }

  getCurrentVersion(): number {
    const row = this.db
      .prepare<[], { version: number | null }>("SELECT MAX(version) AS version FROM schema_version")
      .get();
    return row?.version ?? 0;
  }

  private async loadMigrations(): Promise<Migration[]> {
    let files: string[];
    try {
      files = await readdir(this.migrationsDir);
    } catch {
      this.logger.warn("No migrations directory found", { path: this.migrationsDir });
      return [];
    }

    const migrations: Migration[] = [];
    for (const file of files.filter((f) => f.endsWith(".sql")).sort()) {
      const match = /^(\d+)_/.exec(file);
      if (!match?.[1]) continue;

      const sql = await readFile(join(this.migrationsDir, file), "utf-8");
      migrations.push({ version: parseInt(match[1], 10), name: file, sql });
    }
    return migrations;
  }
}
