import path from "node:path";
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { discoverFiles } from "../fs/discover.js";
import { DEFAULT_RULE_EXCLUDES, DEFAULT_RULE_EXTENSIONS } from "../config/defaults.js";
import { RuleFileParseError, RuleRepositoryNotFoundError } from "../errors/rules.errors.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import type { RuleDraft } from "../repositories/ruleRecordRepository.js";
import { classifyCwe } from "../scoring/severityClassifier.js";
import type { ScanledgerDb } from "../storage/db.js";
import type { RuleRepository, RuleSyncSummary, SupportedLanguage } from "../types.js";
import { parseRuleFile, type ParsedRuleFile } from "./ruleFile.js";
import { defaultRuleSyncLock, type RuleSyncLock } from "./ruleSyncLock.js";

export interface SyncRulesParams {
  db: ScanledgerDb;
  rulesRoot: string;
  repositoryName: string;
  extensions?: string[];
  exclude?: string[];
  logger?: Logger;
  /** `null` when the caller already holds the repository's lock. */
  lock?: RuleSyncLock | null;
}

export interface RuleLocation {
  repositoryName: string;
  category: string;
}

/** Splits `<repository>/<dir>/<dir>/<file>` into its repository and dotted category. */
export function locateRuleFile(filePath: string): RuleLocation {
  const segments = filePath.split("/").filter(Boolean);
  return {
    repositoryName: segments[0] ?? "",
    category: segments.slice(1, -1).join(".")
  };
}

function toLogicalPath(rulesRoot: string, file: string): string {
  return path.relative(rulesRoot, file).split(path.sep).join("/");
}

async function readRuleFiles(rulesRoot: string, files: string[], logger: Logger): Promise<ParsedRuleFile[]> {
  const parsed: ParsedRuleFile[] = [];
  for (const file of files) {
    const filePath = toLogicalPath(rulesRoot, file);
    try {
      parsed.push(parseRuleFile(await readFile(file, "utf-8"), filePath));
    } catch (err) {
      if (err instanceof RuleFileParseError) {
        logger.error("Rule file rejected", { filePath, error: err.message });
      }
      throw err;
    }
  }
  return parsed;
}

function matchLanguages(tokens: string[], supported: SupportedLanguage[]): number[] {
  const byName = new Map(supported.map((language) => [language.name.toLowerCase(), language.id]));
  const ids = new Set<number>();
  for (const token of tokens) {
    const id = byName.get(token.trim().toLowerCase());
    if (id !== undefined) ids.add(id);
  }
  return [...ids].sort((a, b) => a - b);
}

type ApplyOutcome = "created" | "updated" | "skipped";

function applyRuleFile(
  db: ScanledgerDb,
  file: ParsedRuleFile,
  repository: RuleRepository,
  supported: SupportedLanguage[]
): ApplyOutcome {
  if (!file.rules.length) return "skipped";

  const existing = db.rules.getByFilePath(file.filePath);
  const { category } = locateRuleFile(file.filePath);
  let cwe = existing?.cwe ?? null;
  let owasp = existing?.owasp ?? null;
  let title = existing?.title ?? "";
  const tokens: string[] = [];

  for (const entry of file.rules) {
    title = entry.id;
    if (entry.cwe !== undefined) cwe = entry.cwe;
    if (entry.owasp !== undefined) owasp = entry.owasp;
    tokens.push(...entry.languages);
  }

  const draft: RuleDraft = {
    title,
    filePath: file.filePath,
    repositoryId: repository.id,
    category,
    cwe,
    owasp,
    severity: classifyCwe(cwe)
  };

  let ruleId: number;
  if (existing) {
    db.rules.update(existing.id, draft);
    ruleId = existing.id;
  } else {
    ruleId = db.rules.insert(draft);
  }
  db.rules.setLanguages(ruleId, matchLanguages(tokens, supported));
  return existing ? "updated" : "created";
}

async function syncUnlocked(params: SyncRulesParams, logger: Logger): Promise<RuleSyncSummary> {
  const start = Date.now();
  const { db, rulesRoot, repositoryName } = params;
  const repository = db.ruleRepositories.getByName(repositoryName);
  if (!repository) {
    throw new RuleRepositoryNotFoundError(repositoryName);
  }

  const files = await discoverFiles({
    root: path.join(rulesRoot, repositoryName),
    includeExtensions: params.extensions ?? DEFAULT_RULE_EXTENSIONS,
    exclude: params.exclude ?? DEFAULT_RULE_EXCLUDES
  });
  logger.debug("Rule files discovered", { repository: repositoryName, files: files.length });

  // Every file is parsed before the first write.
  const parsed = await readRuleFiles(rulesRoot, files, logger);

  const repositories = new Map<string, RuleRepository>([[repository.name, repository]]);
  for (const file of parsed) {
    const { repositoryName: owner } = locateRuleFile(file.filePath);
    if (repositories.has(owner)) continue;
    const found = db.ruleRepositories.getByName(owner);
    if (!found) throw new RuleRepositoryNotFoundError(owner);
    repositories.set(owner, found);
  }

  const supported = db.languages.list();
  let created = 0;
  let updated = 0;
  let rules = 0;
  for (const file of parsed) {
    const owner = repositories.get(locateRuleFile(file.filePath).repositoryName) ?? repository;
    const outcome = db.transaction(() => applyRuleFile(db, file, owner, supported));
    if (outcome === "created") created += 1;
    if (outcome === "updated") updated += 1;
    rules += file.rules.length;
  }

  const summary: RuleSyncSummary = {
    repository: repositoryName,
    files: parsed.length,
    created,
    updated,
    rules,
    durationMs: Date.now() - start
  };
  logger.info("Rules synchronized", { ...summary });
  return summary;
}

/**
 * Upserts the catalog from the rule files of one repository checkout.
 * A rule keeps its id across runs as long as its file path does not change.
 */
export async function syncRules(params: SyncRulesParams): Promise<RuleSyncSummary> {
  const logger = params.logger ?? noopLogger;
  const lock = params.lock === undefined ? defaultRuleSyncLock : params.lock;
  if (!lock) {
    return syncUnlocked(params, logger);
  }
  return lock.runExclusive(params.repositoryName, () => syncUnlocked(params, logger));
}

/** Syncs every registered repository that has a checkout under `rulesRoot`. */
export async function syncAllRules(params: Omit<SyncRulesParams, "repositoryName">): Promise<RuleSyncSummary[]> {
  const logger = params.logger ?? noopLogger;
  const summaries: RuleSyncSummary[] = [];
  for (const repository of params.db.ruleRepositories.list()) {
    if (!existsSync(path.join(params.rulesRoot, repository.name))) {
      logger.warn("Rule repository has no checkout", { repository: repository.name });
      continue;
    }
    summaries.push(await syncRules({ ...params, repositoryName: repository.name }));
  }
  return summaries;
}
