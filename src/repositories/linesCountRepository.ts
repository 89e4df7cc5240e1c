import type Database from "better-sqlite3";
import type { LanguageLinesCount, LinesCounters, ProjectLinesCount } from "../types.js";

type TotalsRow = LinesCounters & { id: number };

export class LinesCountRepository {
  constructor(private db: Database.Database) {}

  replaceForProject(projectId: number, linesCount: ProjectLinesCount) {
    const insertTotals = this.db.prepare(
      "INSERT INTO project_lines_counts (project_id, total_file_count, total_line_count, total_blank_count, total_comment_count, total_code_count, total_complexity_count) VALUES (?, ?, ?, ?, ?, ?, ?)"
    );
    const insertLanguage = this.db.prepare(
      "INSERT INTO language_lines_counts (project_lines_count_id, position, language, file_count, line_count, blank_count, comment_count, code_count, complexity_count) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)"
    );

    const tx = this.db.transaction(() => {
      this.db.prepare("DELETE FROM project_lines_counts WHERE project_id = ?").run(projectId);
      const { totals } = linesCount;
      const result = insertTotals.run(
        projectId,
        totals.fileCount,
        totals.lineCount,
        totals.blankCount,
        totals.commentCount,
        totals.codeCount,
        totals.complexityCount
      );
      const linesCountId = Number(result.lastInsertRowid);
      linesCount.languages.forEach((language, position) => {
        insertLanguage.run(
          linesCountId,
          position,
          language.language,
          language.fileCount,
          language.lineCount,
          language.blankCount,
          language.commentCount,
          language.codeCount,
          language.complexityCount
        );
      });
    });

    tx();
  }

  getForProject(projectId: number): ProjectLinesCount | null {
    const totals = this.db
      .prepare(
        "SELECT id, total_file_count as fileCount, total_line_count as lineCount, total_blank_count as blankCount, total_comment_count as commentCount, total_code_count as codeCount, total_complexity_count as complexityCount FROM project_lines_counts WHERE project_id = ?"
      )
      .get(projectId) as TotalsRow | undefined;
    if (!totals) return null;

    const languages = this.db
      .prepare(
        "SELECT language, file_count as fileCount, line_count as lineCount, blank_count as blankCount, comment_count as commentCount, code_count as codeCount, complexity_count as complexityCount FROM language_lines_counts WHERE project_lines_count_id = ? ORDER BY position"
      )
      .all(totals.id) as LanguageLinesCount[];

    const { id: _id, ...counters } = totals;
    return { totals: counters, languages };
  }
}
