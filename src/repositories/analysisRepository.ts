import type Database from "better-sqlite3";
import type { Analysis, Occurrence, Vulnerability, VulnerableDependency } from "../types.js";
import { placeholders, toSeverity } from "./rowMapping.js";

export type NewVulnerability = Omit<Vulnerability, "id">;
export type NewVulnerableDependency = Omit<VulnerableDependency, "id">;

export interface AnalysisInput {
  startedOn?: string | null;
  finishedOn?: string | null;
  vulnerabilities: NewVulnerability[];
  vulnerableDependencies: NewVulnerableDependency[];
}

type AnalysisRow = {
  id: number;
  projectId: number;
  startedOn: string | null;
  finishedOn: string | null;
};

type VulnerabilityRow = Omit<Vulnerability, "severity" | "occurrences"> & { severity: string };
type DependencyRow = Omit<VulnerableDependency, "severity" | "occurrences"> & { severity: string };
type OccurrenceRow = Occurrence & { ownerId: number };

function groupOccurrences(rows: OccurrenceRow[]): Map<number, Occurrence[]> {
  const grouped = new Map<number, Occurrence[]>();
  for (const { ownerId, ...occurrence } of rows) {
    const list = grouped.get(ownerId) ?? [];
    list.push(occurrence);
    grouped.set(ownerId, list);
  }
  return grouped;
}

export class AnalysisRepository {
  constructor(private db: Database.Database) {}

  /** Replaces the project's analysis (and every finding under it) with `input`. */
  replaceForProject(projectId: number, input: AnalysisInput): Analysis {
    const insertAnalysis = this.db.prepare(
      "INSERT INTO analyses (project_id, started_on, finished_on) VALUES (?, ?, ?)"
    );
    const insertVulnerability = this.db.prepare(
      "INSERT INTO vulnerabilities (analysis_id, title, severity, cwe, owasp, description) VALUES (?, ?, ?, ?, ?, ?)"
    );
    const insertVulnerabilityOccurrence = this.db.prepare(
      "INSERT INTO vulnerability_occurrences (vulnerability_id, file_path, start_line, end_line) VALUES (?, ?, ?, ?)"
    );
    const insertDependency = this.db.prepare(
      "INSERT INTO vulnerable_dependencies (analysis_id, package_name, version, ecosystem, advisory_id, severity, summary) VALUES (?, ?, ?, ?, ?, ?, ?)"
    );
    const insertDependencyOccurrence = this.db.prepare(
      "INSERT INTO dependency_occurrences (dependency_id, file_path, start_line, end_line) VALUES (?, ?, ?, ?)"
    );

    const tx = this.db.transaction((): Analysis => {
      this.db.prepare("DELETE FROM analyses WHERE project_id = ?").run(projectId);
      const analysisId = Number(
        insertAnalysis.run(projectId, input.startedOn ?? null, input.finishedOn ?? null).lastInsertRowid
      );

      const vulnerabilities = input.vulnerabilities.map((vuln): Vulnerability => {
        const id = Number(
          insertVulnerability.run(analysisId, vuln.title, vuln.severity, vuln.cwe, vuln.owasp, vuln.description)
            .lastInsertRowid
        );
        for (const occurrence of vuln.occurrences) {
          insertVulnerabilityOccurrence.run(id, occurrence.filePath, occurrence.startLine, occurrence.endLine);
        }
        return { ...vuln, id };
      });

      const vulnerableDependencies = input.vulnerableDependencies.map((dep): VulnerableDependency => {
        const id = Number(
          insertDependency.run(
            analysisId,
            dep.packageName,
            dep.version,
            dep.ecosystem,
            dep.advisoryId,
            dep.severity,
            dep.summary
          ).lastInsertRowid
        );
        for (const occurrence of dep.occurrences) {
          insertDependencyOccurrence.run(id, occurrence.filePath, occurrence.startLine, occurrence.endLine);
        }
        return { ...dep, id };
      });

      return {
        id: analysisId,
        projectId,
        startedOn: input.startedOn ?? null,
        finishedOn: input.finishedOn ?? null,
        vulnerabilities,
        vulnerableDependencies
      };
    });

    return tx();
  }

  getForProject(projectId: number): Analysis | null {
    const analysis = this.db
      .prepare(
        "SELECT id, project_id as projectId, started_on as startedOn, finished_on as finishedOn FROM analyses WHERE project_id = ?"
      )
      .get(projectId) as AnalysisRow | undefined;
    if (!analysis) return null;

    const vulnRows = this.db
      .prepare(
        "SELECT id, title, severity, cwe, owasp, description FROM vulnerabilities WHERE analysis_id = ? ORDER BY id"
      )
      .all(analysis.id) as VulnerabilityRow[];
    const depRows = this.db
      .prepare(
        "SELECT id, package_name as packageName, version, ecosystem, advisory_id as advisoryId, severity, summary FROM vulnerable_dependencies WHERE analysis_id = ? ORDER BY id"
      )
      .all(analysis.id) as DependencyRow[];

    const vulnOccurrences = this.loadOccurrences(
      "vulnerability_occurrences",
      "vulnerability_id",
      vulnRows.map((row) => row.id)
    );
    const depOccurrences = this.loadOccurrences(
      "dependency_occurrences",
      "dependency_id",
      depRows.map((row) => row.id)
    );

    return {
      ...analysis,
      vulnerabilities: vulnRows.map((row) => ({
        ...row,
        severity: toSeverity(row.severity, `vulnerability #${row.id}`),
        occurrences: vulnOccurrences.get(row.id) ?? []
      })),
      vulnerableDependencies: depRows.map((row) => ({
        ...row,
        severity: toSeverity(row.severity, `vulnerable dependency #${row.id}`),
        occurrences: depOccurrences.get(row.id) ?? []
      }))
    };
  }

  private loadOccurrences(
    table: "vulnerability_occurrences" | "dependency_occurrences",
    ownerColumn: "vulnerability_id" | "dependency_id",
    ownerIds: number[]
  ): Map<number, Occurrence[]> {
    if (!ownerIds.length) return new Map();
    const rows = this.db
      .prepare(
        `SELECT ${ownerColumn} as ownerId, file_path as filePath, start_line as startLine, end_line as endLine FROM ${table} WHERE ${ownerColumn} IN (${placeholders(ownerIds.length)}) ORDER BY id`
      )
      .all(...ownerIds) as OccurrenceRow[];
    return groupOccurrences(rows);
  }
}
