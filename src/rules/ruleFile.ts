import { parse } from "yaml";
import { RuleFileParseError } from "../errors/rules.errors.js";

/** One entry of a rule file's `rules` list, reduced to what the catalog stores. */
export interface RuleEntry {
  id: string;
  languages: string[];
  /** `undefined` when the entry carries no CWE metadata. */
  cwe: string | undefined;
  owasp: string | undefined;
}

export interface ParsedRuleFile {
  /** Path relative to the rules root, `/`-separated. */
  filePath: string;
  rules: RuleEntry[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function readStringList(value: unknown, field: string, filePath: string): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new RuleFileParseError(filePath, `"${field}" must be a list.`);
  }
  return value.map((item) => {
    if (typeof item !== "string") {
      throw new RuleFileParseError(filePath, `"${field}" must only contain strings.`);
    }
    return item;
  });
}

/** Accepts a string or a list of strings and keeps the first value. */
function readFirstValue(value: unknown, field: string, filePath: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string") return value;
  return readStringList(value, field, filePath)[0];
}

function readEntry(raw: unknown, index: number, filePath: string): RuleEntry {
  if (!isRecord(raw)) {
    throw new RuleFileParseError(filePath, `rule #${index + 1} is not a mapping.`);
  }
  const id = raw.id;
  if (typeof id !== "string" || !id.trim()) {
    throw new RuleFileParseError(filePath, `rule #${index + 1} has no id.`);
  }
  const metadata = raw.metadata ?? null;
  if (metadata !== null && !isRecord(metadata)) {
    throw new RuleFileParseError(filePath, `rule "${id}" has a metadata field that is not a mapping.`);
  }
  return {
    id: id.trim(),
    languages: readStringList(raw.languages, "languages", filePath),
    cwe: metadata ? readFirstValue(metadata.cwe, "metadata.cwe", filePath) : undefined,
    owasp: metadata ? readFirstValue(metadata.owasp, "metadata.owasp", filePath) : undefined
  };
}

/**
 * Parses a YAML rule file. An empty document, or one without a `rules` key,
 * holds no rules; anything else that does not have the expected shape throws
 * RuleFileParseError.
 */
export function parseRuleFile(text: string, filePath: string): ParsedRuleFile {
  let doc: unknown;
  try {
    doc = parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new RuleFileParseError(filePath, message);
  }

  if (doc === null || doc === undefined) {
    return { filePath, rules: [] };
  }
  if (!isRecord(doc)) {
    throw new RuleFileParseError(filePath, "top level must be a mapping.");
  }
  const rules = doc.rules;
  if (rules === undefined || rules === null) {
    return { filePath, rules: [] };
  }
  if (!Array.isArray(rules)) {
    throw new RuleFileParseError(filePath, `"rules" must be a list.`);
  }
  return { filePath, rules: rules.map((entry, index) => readEntry(entry, index, filePath)) };
}
