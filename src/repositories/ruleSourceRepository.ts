import type Database from "better-sqlite3";
import { RuleRepositoryExistsError } from "../errors/rules.errors.js";
import type { RuleRepository } from "../types.js";

const COLUMNS = "id, name, uri, last_update_on as lastUpdateOn";

/** Rows of `rule_repositories`: the external sources rule files are cloned from. */
export class RuleSourceRepository {
  constructor(private db: Database.Database) {}

  insert(params: { name: string; uri: string }): RuleRepository {
    if (this.getByName(params.name)) {
      throw new RuleRepositoryExistsError(params.name);
    }
    const result = this.db
      .prepare("INSERT INTO rule_repositories (name, uri, last_update_on) VALUES (?, ?, NULL)")
      .run(params.name, params.uri);
    return { id: Number(result.lastInsertRowid), name: params.name, uri: params.uri, lastUpdateOn: null };
  }

  getByName(name: string): RuleRepository | null {
    const row = this.db
      .prepare(`SELECT ${COLUMNS} FROM rule_repositories WHERE name = ?`)
      .get(name) as RuleRepository | undefined;
    return row ?? null;
  }

  list(): RuleRepository[] {
    return this.db.prepare(`SELECT ${COLUMNS} FROM rule_repositories ORDER BY name`).all() as RuleRepository[];
  }

  markUpdated(repositoryId: number, at: string) {
    this.db.prepare("UPDATE rule_repositories SET last_update_on = ? WHERE id = ?").run(at, repositoryId);
  }

  /** Deletes the repository together with all of its rules. */
  delete(repositoryId: number): boolean {
    const result = this.db.prepare("DELETE FROM rule_repositories WHERE id = ?").run(repositoryId);
    return result.changes > 0;
  }
}
