import { readFile } from "node:fs/promises";
import { FindingsImportError } from "../errors/findings.errors.js";
import { ProjectNotFoundError } from "../errors/storage.errors.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import type {
  AnalysisInput,
  NewVulnerability,
  NewVulnerableDependency
} from "../repositories/analysisRepository.js";
import { classifyCwe } from "../scoring/severityClassifier.js";
import type { ScanledgerDb } from "../storage/db.js";
import type { Analysis, Occurrence } from "../types.js";
import { parseSeverityTier } from "../types/domain/severity.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function optionalString(record: Record<string, unknown>, key: string, where: string): string | null {
  const value = record[key];
  if (value === undefined || value === null) return null;
  if (typeof value !== "string") {
    throw new FindingsImportError(`${where}.${key} must be a string.`);
  }
  return value;
}

function requiredString(record: Record<string, unknown>, key: string, where: string): string {
  const value = optionalString(record, key, where);
  if (!value || !value.trim()) {
    throw new FindingsImportError(`${where}.${key} is required.`);
  }
  return value;
}

function lineNumber(value: unknown, where: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new FindingsImportError(`${where} must be a non-negative integer.`);
  }
  return value;
}

function readOccurrences(raw: unknown, where: string): Occurrence[] {
  if (raw === undefined || raw === null) return [];
  if (!Array.isArray(raw)) {
    throw new FindingsImportError(`${where}.occurrences must be a list.`);
  }
  return raw.map((item: unknown, index) => {
    const at = `${where}.occurrences[${index}]`;
    if (!isRecord(item)) throw new FindingsImportError(`${at} must be an object.`);
    const startLine = lineNumber(item.startLine, `${at}.startLine`);
    const endLine = item.endLine === undefined ? startLine : lineNumber(item.endLine, `${at}.endLine`);
    if (endLine < startLine) {
      throw new FindingsImportError(`${at} ends before it starts.`);
    }
    return { filePath: requiredString(item, "filePath", at), startLine, endLine };
  });
}

function readList(doc: Record<string, unknown>, key: string): unknown[] {
  const value = doc[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new FindingsImportError(`${key} must be a list.`);
  }
  return value;
}

function readVulnerability(raw: unknown, index: number): NewVulnerability {
  const where = `vulnerabilities[${index}]`;
  if (!isRecord(raw)) throw new FindingsImportError(`${where} must be an object.`);
  const cwe = optionalString(raw, "cwe", where);
  let severity = classifyCwe(cwe);
  if (raw.severity !== undefined && raw.severity !== null) {
    const parsed = parseSeverityTier(raw.severity);
    if (!parsed) throw new FindingsImportError(`${where}.severity is not a known severity.`);
    severity = parsed;
  }
  return {
    title: requiredString(raw, "title", where),
    severity,
    cwe,
    owasp: optionalString(raw, "owasp", where),
    description: optionalString(raw, "description", where),
    occurrences: readOccurrences(raw.occurrences, where)
  };
}

function readDependency(raw: unknown, index: number): NewVulnerableDependency {
  const where = `vulnerableDependencies[${index}]`;
  if (!isRecord(raw)) throw new FindingsImportError(`${where} must be an object.`);
  const severity = parseSeverityTier(raw.severity);
  if (!severity) throw new FindingsImportError(`${where}.severity is not a known severity.`);
  return {
    packageName: requiredString(raw, "packageName", where),
    version: optionalString(raw, "version", where),
    ecosystem: optionalString(raw, "ecosystem", where),
    advisoryId: optionalString(raw, "advisoryId", where),
    severity,
    summary: optionalString(raw, "summary", where),
    occurrences: readOccurrences(raw.occurrences, where)
  };
}

/**
 * Validates a findings document. A vulnerability without an explicit severity
 * is classified from its CWE; a vulnerable dependency must carry one.
 */
export function parseFindingsDocument(doc: unknown): AnalysisInput {
  if (!isRecord(doc)) {
    throw new FindingsImportError("top level must be an object.");
  }
  return {
    startedOn: optionalString(doc, "startedOn", "document"),
    finishedOn: optionalString(doc, "finishedOn", "document"),
    vulnerabilities: readList(doc, "vulnerabilities").map(readVulnerability),
    vulnerableDependencies: readList(doc, "vulnerableDependencies").map(readDependency)
  };
}

export interface ImportFindingsParams {
  db: ScanledgerDb;
  projectId: number;
  findingsPath: string;
  logger?: Logger;
}

/** Replaces the project's analysis with the findings read from a JSON file. */
export async function importFindings(params: ImportFindingsParams): Promise<Analysis> {
  const logger = params.logger ?? noopLogger;
  if (!params.db.projects.getById(params.projectId)) {
    throw new ProjectNotFoundError(params.projectId);
  }
  const raw = await readFile(params.findingsPath, "utf-8");
  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new FindingsImportError(message);
  }
  const input = parseFindingsDocument(doc);
  const analysis = params.db.analyses.replaceForProject(params.projectId, input);
  logger.info("Findings imported", {
    projectId: params.projectId,
    vulnerabilities: analysis.vulnerabilities.length,
    vulnerableDependencies: analysis.vulnerableDependencies.length
  });
  return analysis;
}
