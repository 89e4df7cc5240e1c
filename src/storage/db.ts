import path from "node:path";
import { mkdirSync } from "node:fs";
import Database from "better-sqlite3";
import { AnalysisRepository } from "../repositories/analysisRepository.js";
import { LanguageRepository } from "../repositories/languageRepository.js";
import { LinesCountRepository } from "../repositories/linesCountRepository.js";
import { MetaRepository } from "../repositories/metaRepository.js";
import { ProjectRepository } from "../repositories/projectRepository.js";
import { RuleRecordRepository } from "../repositories/ruleRecordRepository.js";
import { RuleSourceRepository } from "../repositories/ruleSourceRepository.js";
import { TeamRepository } from "../repositories/teamRepository.js";
import { UserRepository } from "../repositories/userRepository.js";

const CURRENT_SCHEMA_VERSION = 1;

export const IN_MEMORY_DATABASE = ":memory:";

export interface DbOptions {
  /** Database file, or `:memory:` for a throwaway store. */
  filename: string;
  logger?: (message: string) => void;
}

export class ScanledgerDb {
  readonly projects: ProjectRepository;
  readonly analyses: AnalysisRepository;
  readonly linesCounts: LinesCountRepository;
  readonly languages: LanguageRepository;
  readonly ruleRepositories: RuleSourceRepository;
  readonly rules: RuleRecordRepository;
  readonly teams: TeamRepository;
  readonly users: UserRepository;
  readonly meta: MetaRepository;

  private db: Database.Database;

  constructor(private options: DbOptions) {
    if (options.filename !== IN_MEMORY_DATABASE) {
      mkdirSync(path.dirname(options.filename), { recursive: true });
    }
    this.db = new Database(options.filename);
    this.meta = new MetaRepository(this.db);
    this.init();

    this.projects = new ProjectRepository(this.db);
    this.analyses = new AnalysisRepository(this.db);
    this.linesCounts = new LinesCountRepository(this.db);
    this.languages = new LanguageRepository(this.db);
    this.ruleRepositories = new RuleSourceRepository(this.db);
    this.rules = new RuleRecordRepository(this.db);
    this.teams = new TeamRepository(this.db);
    this.users = new UserRepository(this.db);
  }

  /**
   * Runs `fn` inside one SQLite transaction. Nested calls become savepoints;
   * a thrown error rolls back everything `fn` wrote.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close() {
    this.db.close();
  }

  private init() {
    if (this.options.filename !== IN_MEMORY_DATABASE) {
      this.db.pragma("journal_mode = WAL");
    }
    this.db.pragma("foreign_keys = ON");
    this.meta.ensureTable();

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS projects (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        source_path TEXT NOT NULL DEFAULT '',
        archive_sha256 TEXT,
        created_at TEXT NOT NULL
      );
    `);
    this.db.exec("CREATE INDEX IF NOT EXISTS idx_projects_archive ON projects(archive_sha256);");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS analyses (
        id INTEGER PRIMARY KEY,
        project_id INTEGER NOT NULL UNIQUE REFERENCES projects(id) ON DELETE CASCADE,
        started_on TEXT,
        finished_on TEXT
      );
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS vulnerabilities (
        id INTEGER PRIMARY KEY,
        analysis_id INTEGER NOT NULL REFERENCES analyses(id) ON DELETE CASCADE,
        title TEXT NOT NULL,
        severity TEXT NOT NULL,
        cwe TEXT,
        owasp TEXT,
        description TEXT
      );
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS vulnerability_occurrences (
        id INTEGER PRIMARY KEY,
        vulnerability_id INTEGER NOT NULL REFERENCES vulnerabilities(id) ON DELETE CASCADE,
        file_path TEXT NOT NULL,
        start_line INTEGER NOT NULL,
        end_line INTEGER NOT NULL
      );
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS vulnerable_dependencies (
        id INTEGER PRIMARY KEY,
        analysis_id INTEGER NOT NULL REFERENCES analyses(id) ON DELETE CASCADE,
        package_name TEXT NOT NULL,
        version TEXT,
        ecosystem TEXT,
        advisory_id TEXT,
        severity TEXT NOT NULL,
        summary TEXT
      );
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS dependency_occurrences (
        id INTEGER PRIMARY KEY,
        dependency_id INTEGER NOT NULL REFERENCES vulnerable_dependencies(id) ON DELETE CASCADE,
        file_path TEXT NOT NULL,
        start_line INTEGER NOT NULL,
        end_line INTEGER NOT NULL
      );
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS project_lines_counts (
        id INTEGER PRIMARY KEY,
        project_id INTEGER NOT NULL UNIQUE REFERENCES projects(id) ON DELETE CASCADE,
        total_file_count INTEGER NOT NULL,
        total_line_count INTEGER NOT NULL,
        total_blank_count INTEGER NOT NULL,
        total_comment_count INTEGER NOT NULL,
        total_code_count INTEGER NOT NULL,
        total_complexity_count INTEGER NOT NULL
      );
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS language_lines_counts (
        id INTEGER PRIMARY KEY,
        project_lines_count_id INTEGER NOT NULL REFERENCES project_lines_counts(id) ON DELETE CASCADE,
        position INTEGER NOT NULL,
        language TEXT NOT NULL,
        file_count INTEGER NOT NULL,
        line_count INTEGER NOT NULL,
        blank_count INTEGER NOT NULL,
        comment_count INTEGER NOT NULL,
        code_count INTEGER NOT NULL,
        complexity_count INTEGER NOT NULL
      );
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS supported_languages (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL UNIQUE COLLATE NOCASE
      );
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS rule_repositories (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL UNIQUE,
        uri TEXT NOT NULL,
        last_update_on TEXT
      );
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS rules (
        id INTEGER PRIMARY KEY,
        title TEXT NOT NULL,
        file_path TEXT NOT NULL UNIQUE,
        repository_id INTEGER NOT NULL REFERENCES rule_repositories(id) ON DELETE CASCADE,
        category TEXT NOT NULL,
        cwe TEXT,
        owasp TEXT,
        severity TEXT NOT NULL
      );
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS rule_languages (
        rule_id INTEGER NOT NULL REFERENCES rules(id) ON DELETE CASCADE,
        language_id INTEGER NOT NULL REFERENCES supported_languages(id) ON DELETE CASCADE,
        PRIMARY KEY (rule_id, language_id)
      );
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS users (
        id INTEGER PRIMARY KEY,
        username TEXT NOT NULL UNIQUE,
        role TEXT NOT NULL
      );
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS teams (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL UNIQUE
      );
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS team_members (
        team_id INTEGER NOT NULL REFERENCES teams(id) ON DELETE CASCADE,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        PRIMARY KEY (team_id, user_id)
      );
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS team_projects (
        team_id INTEGER NOT NULL REFERENCES teams(id) ON DELETE CASCADE,
        project_id INTEGER NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
        PRIMARY KEY (team_id, project_id)
      );
    `);

    if (this.meta.getSchemaVersion() < CURRENT_SCHEMA_VERSION) {
      this.meta.setSchemaVersion(CURRENT_SCHEMA_VERSION);
      this.options.logger?.(`Database schema initialized at version ${CURRENT_SCHEMA_VERSION}.`);
    }
  }
}
