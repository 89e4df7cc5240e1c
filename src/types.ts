import type { SeverityTier } from "./types/domain/severity.js";
import type { Role, Team, User } from "./types/domain/access.js";

export type { SeverityTier, Role, Team, User };

export interface Project {
  id: number;
  name: string;
  sourcePath: string;
  archiveSha256: string | null;
  createdAt: string;
}

export interface Occurrence {
  filePath: string;
  startLine: number;
  endLine: number;
}

export interface Vulnerability {
  id: number;
  title: string;
  severity: SeverityTier;
  cwe: string | null;
  owasp: string | null;
  description: string | null;
  occurrences: Occurrence[];
}

export interface VulnerableDependency {
  id: number;
  packageName: string;
  version: string | null;
  ecosystem: string | null;
  advisoryId: string | null;
  severity: SeverityTier;
  summary: string | null;
  occurrences: Occurrence[];
}

export interface Analysis {
  id: number;
  projectId: number;
  startedOn: string | null;
  finishedOn: string | null;
  vulnerabilities: Vulnerability[];
  vulnerableDependencies: VulnerableDependency[];
}

export interface LinesCounters {
  fileCount: number;
  lineCount: number;
  blankCount: number;
  commentCount: number;
  codeCount: number;
  complexityCount: number;
}

export interface LanguageLinesCount extends LinesCounters {
  language: string;
}

export interface ProjectLinesCount {
  totals: LinesCounters;
  languages: LanguageLinesCount[];
}

/** One entry of `scc -f json` output. */
export interface SccLanguageEntry {
  Name: string;
  Count: number;
  Lines: number;
  Blank: number;
  Comment: number;
  Code: number;
  Complexity: number;
}

export interface SupportedLanguage {
  id: number;
  name: string;
}

export interface RuleRepository {
  id: number;
  name: string;
  uri: string;
  lastUpdateOn: string | null;
}

export interface Rule {
  id: number;
  title: string;
  filePath: string;
  repositoryId: number;
  category: string;
  cwe: string | null;
  owasp: string | null;
  severity: SeverityTier;
  languages: SupportedLanguage[];
}

export interface RuleSyncSummary {
  repository: string;
  files: number;
  created: number;
  updated: number;
  rules: number;
  durationMs: number;
}
