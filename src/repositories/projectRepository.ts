import type Database from "better-sqlite3";
import type { Project } from "../types.js";
import { nowIso, placeholders } from "./rowMapping.js";

const PROJECT_COLUMNS =
  "id, name, source_path as sourcePath, archive_sha256 as archiveSha256, created_at as createdAt";

export class ProjectRepository {
  constructor(private db: Database.Database) {}

  insert(params: { name: string; sourcePath?: string; archiveSha256?: string | null }): Project {
    const createdAt = nowIso();
    const result = this.db
      .prepare("INSERT INTO projects (name, source_path, archive_sha256, created_at) VALUES (?, ?, ?, ?)")
      .run(params.name, params.sourcePath ?? "", params.archiveSha256 ?? null, createdAt);
    return {
      id: Number(result.lastInsertRowid),
      name: params.name,
      sourcePath: params.sourcePath ?? "",
      archiveSha256: params.archiveSha256 ?? null,
      createdAt
    };
  }

  updateSourcePath(projectId: number, sourcePath: string) {
    this.db.prepare("UPDATE projects SET source_path = ? WHERE id = ?").run(sourcePath, projectId);
  }

  getById(projectId: number): Project | null {
    const row = this.db
      .prepare(`SELECT ${PROJECT_COLUMNS} FROM projects WHERE id = ?`)
      .get(projectId) as Project | undefined;
    return row ?? null;
  }

  getByIds(projectIds: number[]): Project[] {
    if (!projectIds.length) return [];
    return this.db
      .prepare(`SELECT ${PROJECT_COLUMNS} FROM projects WHERE id IN (${placeholders(projectIds.length)}) ORDER BY id`)
      .all(...projectIds) as Project[];
  }

  findByArchiveSha256(sha256: string): Project | null {
    const row = this.db
      .prepare(`SELECT ${PROJECT_COLUMNS} FROM projects WHERE archive_sha256 = ? ORDER BY id LIMIT 1`)
      .get(sha256) as Project | undefined;
    return row ?? null;
  }

  list(): Project[] {
    return this.db.prepare(`SELECT ${PROJECT_COLUMNS} FROM projects ORDER BY id`).all() as Project[];
  }

  /** Deletes the project; its analysis, line counts and team links go with it. */
  delete(projectId: number): boolean {
    const result = this.db.prepare("DELETE FROM projects WHERE id = ?").run(projectId);
    return result.changes > 0;
  }
}
