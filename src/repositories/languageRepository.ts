import type Database from "better-sqlite3";
import type { SupportedLanguage } from "../types.js";

export class LanguageRepository {
  constructor(private db: Database.Database) {}

  list(): SupportedLanguage[] {
    return this.db.prepare("SELECT id, name FROM supported_languages ORDER BY name").all() as SupportedLanguage[];
  }

  /** Inserts the language unless a case-insensitive match already exists. */
  ensure(name: string): SupportedLanguage {
    const trimmed = name.trim();
    this.db.prepare("INSERT OR IGNORE INTO supported_languages (name) VALUES (?)").run(trimmed);
    const row = this.db
      .prepare("SELECT id, name FROM supported_languages WHERE name = ?")
      .get(trimmed) as SupportedLanguage | undefined;
    if (!row) {
      throw new Error(`Supported language "${trimmed}" could not be stored.`);
    }
    return row;
  }
}
