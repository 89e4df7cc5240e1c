import path from "node:path";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { SeverityTier, parseSeverityTier } from "../types/domain/severity.js";

export type CweSeverityTable = ReadonlyMap<string, SeverityTier>;

const PACKAGE_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../..");
const TOP40_TABLE_PATH = path.join(PACKAGE_ROOT, "data", "top40-cwe-severities.json");
const CWE_PATTERN = /CWE-(\d+)/i;

let top40Table: CweSeverityTable | null = null;

/**
 * Severities of the Top 40 most prevalent CWEs, each an average of the CVSS
 * scores of the CVEs mapped to that weakness.
 */
export function loadTop40CweSeverities(): CweSeverityTable {
  if (top40Table) return top40Table;
  const raw: unknown = JSON.parse(readFileSync(TOP40_TABLE_PATH, "utf-8"));
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    throw new Error(`Expected a JSON object in ${TOP40_TABLE_PATH}.`);
  }
  const table = new Map<string, SeverityTier>();
  for (const [cweId, value] of Object.entries(raw)) {
    const tier = parseSeverityTier(value);
    if (!tier) {
      throw new Error(`Invalid severity "${String(value)}" for ${cweId} in ${TOP40_TABLE_PATH}.`);
    }
    table.set(cweId.toUpperCase(), tier);
  }
  top40Table = table;
  return table;
}

/** Extracts the normalized `CWE-<n>` id from free text such as "CWE-79: Improper Neutralization...". */
export function extractCweId(text: string | null | undefined): string | null {
  if (!text) return null;
  const match = CWE_PATTERN.exec(text);
  return match ? `CWE-${match[1]}` : null;
}

export function classifyCwe(
  cwe: string | null | undefined,
  table: CweSeverityTable = loadTop40CweSeverities()
): SeverityTier {
  const cweId = extractCweId(cwe);
  if (!cweId) return SeverityTier.Low;
  return table.get(cweId) ?? SeverityTier.Medium;
}
