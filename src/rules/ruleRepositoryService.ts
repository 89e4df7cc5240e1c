import path from "node:path";
import { existsSync } from "node:fs";
import { mkdir, rm } from "node:fs/promises";
import { RuleRepositoryNotFoundError } from "../errors/rules.errors.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import { nowIso } from "../repositories/rowMapping.js";
import type { ScanledgerDb } from "../storage/db.js";
import { runTool, type ToolSettings } from "../tools/runCommand.js";
import type { RuleRepository, RuleSyncSummary } from "../types.js";
import { defaultRuleSyncLock, type RuleSyncLock } from "./ruleSyncLock.js";
import { syncRules } from "./syncRules.js";

export interface RuleRepositoryContext {
  db: ScanledgerDb;
  rulesRoot: string;
  git?: ToolSettings;
  extensions?: string[];
  exclude?: string[];
  logger?: Logger;
  lock?: RuleSyncLock;
}

const REPOSITORY_NAME = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

function requireRepository(db: ScanledgerDb, name: string): RuleRepository {
  const repository = db.ruleRepositories.getByName(name);
  if (!repository) throw new RuleRepositoryNotFoundError(name);
  return repository;
}

export function checkoutPath(rulesRoot: string, name: string): string {
  return path.join(rulesRoot, name);
}

/** Registers a repository; its name becomes the checkout directory under the rules root. */
export function addRuleRepository(db: ScanledgerDb, params: { name: string; uri: string }): RuleRepository {
  const name = params.name.trim();
  if (!REPOSITORY_NAME.test(name) || name.includes("..")) {
    throw new Error(`Invalid rule repository name: "${params.name}"`);
  }
  const uri = params.uri.trim();
  if (!uri) {
    throw new Error("A rule repository needs a clone URI.");
  }
  return db.ruleRepositories.insert({ name, uri });
}

export async function cloneRuleRepository(ctx: RuleRepositoryContext, name: string): Promise<RuleRepository> {
  const logger = ctx.logger ?? noopLogger;
  const repository = requireRepository(ctx.db, name);
  const target = checkoutPath(ctx.rulesRoot, repository.name);
  await mkdir(ctx.rulesRoot, { recursive: true });
  logger.info("Cloning rule repository", { repository: repository.name, uri: repository.uri });
  await runTool("git", ["clone", repository.uri, target], ctx.git);
  const lastUpdateOn = nowIso();
  ctx.db.ruleRepositories.markUpdated(repository.id, lastUpdateOn);
  return { ...repository, lastUpdateOn };
}

export async function pullRuleRepository(ctx: RuleRepositoryContext, name: string): Promise<RuleRepository> {
  const logger = ctx.logger ?? noopLogger;
  const repository = requireRepository(ctx.db, name);
  const target = checkoutPath(ctx.rulesRoot, repository.name);
  logger.info("Pulling rule repository", { repository: repository.name });
  await runTool("git", ["-C", target, "pull", "--ff-only"], ctx.git);
  const lastUpdateOn = nowIso();
  ctx.db.ruleRepositories.markUpdated(repository.id, lastUpdateOn);
  return { ...repository, lastUpdateOn };
}

/** Deletes the checkout and the repository row; its rules cascade. */
export async function removeRuleRepository(ctx: RuleRepositoryContext, name: string): Promise<void> {
  const logger = ctx.logger ?? noopLogger;
  const lock = ctx.lock ?? defaultRuleSyncLock;
  await lock.runExclusive(name, async () => {
    const repository = requireRepository(ctx.db, name);
    await rm(checkoutPath(ctx.rulesRoot, repository.name), { recursive: true, force: true });
    ctx.db.ruleRepositories.delete(repository.id);
    logger.info("Rule repository removed", { repository: repository.name });
  });
}

/** Clones the repository (or pulls an existing checkout), then syncs its rules, all under its lock. */
export async function refreshRuleRepository(ctx: RuleRepositoryContext, name: string): Promise<RuleSyncSummary> {
  const lock = ctx.lock ?? defaultRuleSyncLock;
  return lock.runExclusive(name, async () => {
    if (existsSync(checkoutPath(ctx.rulesRoot, name))) {
      await pullRuleRepository(ctx, name);
    } else {
      await cloneRuleRepository(ctx, name);
    }
    return syncRules({
      db: ctx.db,
      rulesRoot: ctx.rulesRoot,
      repositoryName: name,
      extensions: ctx.extensions,
      exclude: ctx.exclude,
      logger: ctx.logger,
      lock: null
    });
  });
}
