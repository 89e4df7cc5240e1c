import type Database from "better-sqlite3";
import type { Rule, SeverityTier, SupportedLanguage } from "../types.js";
import { placeholders, toSeverity } from "./rowMapping.js";

export interface RuleDraft {
  title: string;
  filePath: string;
  repositoryId: number;
  category: string;
  cwe: string | null;
  owasp: string | null;
  severity: SeverityTier;
}

export interface RuleQuery {
  repositoryId?: number;
  severity?: SeverityTier;
  language?: string;
}

type RuleRow = Omit<Rule, "severity" | "languages"> & { severity: string };
type RuleLanguageRow = SupportedLanguage & { ruleId: number };

const RULE_COLUMNS =
  "r.id, r.title, r.file_path as filePath, r.repository_id as repositoryId, r.category, r.cwe, r.owasp, r.severity";

export class RuleRecordRepository {
  constructor(private db: Database.Database) {}

  getByFilePath(filePath: string): Rule | null {
    const row = this.db
      .prepare(`SELECT ${RULE_COLUMNS} FROM rules r WHERE r.file_path = ?`)
      .get(filePath) as RuleRow | undefined;
    if (!row) return null;
    return this.hydrate([row])[0] ?? null;
  }

  insert(draft: RuleDraft): number {
    const result = this.db
      .prepare(
        "INSERT INTO rules (title, file_path, repository_id, category, cwe, owasp, severity) VALUES (?, ?, ?, ?, ?, ?, ?)"
      )
      .run(draft.title, draft.filePath, draft.repositoryId, draft.category, draft.cwe, draft.owasp, draft.severity);
    return Number(result.lastInsertRowid);
  }

  update(ruleId: number, draft: RuleDraft) {
    this.db
      .prepare(
        "UPDATE rules SET title = ?, file_path = ?, repository_id = ?, category = ?, cwe = ?, owasp = ?, severity = ? WHERE id = ?"
      )
      .run(
        draft.title,
        draft.filePath,
        draft.repositoryId,
        draft.category,
        draft.cwe,
        draft.owasp,
        draft.severity,
        ruleId
      );
  }

  /** Makes `languageIds` the rule's exact language set. */
  setLanguages(ruleId: number, languageIds: number[]) {
    this.db.prepare("DELETE FROM rule_languages WHERE rule_id = ?").run(ruleId);
    const insert = this.db.prepare("INSERT OR IGNORE INTO rule_languages (rule_id, language_id) VALUES (?, ?)");
    for (const languageId of languageIds) {
      insert.run(ruleId, languageId);
    }
  }

  list(query: RuleQuery = {}): Rule[] {
    const clauses: string[] = [];
    const params: Array<string | number> = [];
    if (query.repositoryId != null) {
      clauses.push("r.repository_id = ?");
      params.push(query.repositoryId);
    }
    if (query.severity) {
      clauses.push("r.severity = ?");
      params.push(query.severity);
    }
    if (query.language) {
      clauses.push(
        "EXISTS (SELECT 1 FROM rule_languages rl JOIN supported_languages sl ON sl.id = rl.language_id WHERE rl.rule_id = r.id AND sl.name = ? COLLATE NOCASE)"
      );
      params.push(query.language);
    }
    const where = clauses.length ? `WHERE ${clauses.join(" AND ")}` : "";
    const rows = this.db
      .prepare(`SELECT ${RULE_COLUMNS} FROM rules r ${where} ORDER BY r.file_path`)
      .all(...params) as RuleRow[];
    return this.hydrate(rows);
  }

  private hydrate(rows: RuleRow[]): Rule[] {
    if (!rows.length) return [];
    const ids = rows.map((row) => row.id);
    const languageRows = this.db
      .prepare(
        `SELECT rl.rule_id as ruleId, sl.id, sl.name FROM rule_languages rl JOIN supported_languages sl ON sl.id = rl.language_id WHERE rl.rule_id IN (${placeholders(ids.length)}) ORDER BY sl.name`
      )
      .all(...ids) as RuleLanguageRow[];

    const languagesByRule = new Map<number, SupportedLanguage[]>();
    for (const { ruleId, ...language } of languageRows) {
      const list = languagesByRule.get(ruleId) ?? [];
      list.push(language);
      languagesByRule.set(ruleId, list);
    }

    return rows.map((row) => ({
      ...row,
      severity: toSeverity(row.severity, `rule #${row.id}`),
      languages: languagesByRule.get(row.id) ?? []
    }));
  }
}
