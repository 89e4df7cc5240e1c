import type Database from "better-sqlite3";

const SCHEMA_VERSION_KEY = "schema_version";

/** Key/value bookkeeping for the store itself. */
export class MetaRepository {
  constructor(private db: Database.Database) {}

  ensureTable() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
    `);
  }

  getSchemaVersion(): number {
    const row = this.db.prepare("SELECT value FROM meta WHERE key = ?").get(SCHEMA_VERSION_KEY) as
      | { value: string }
      | undefined;
    const version = Number(row?.value ?? "0");
    return Number.isInteger(version) ? version : 0;
  }

  setSchemaVersion(version: number) {
    this.db
      .prepare("INSERT INTO meta (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value")
      .run(SCHEMA_VERSION_KEY, String(version));
  }
}
