import assert from "node:assert/strict";
import os from "node:os";
import path from "node:path";
import { existsSync } from "node:fs";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { test, type TestContext } from "node:test";
import { RuleRepositoryExistsError, RuleRepositoryNotFoundError } from "../../errors/rules.errors.js";
import { ExternalToolError } from "../../errors/tool.errors.js";
import { IN_MEMORY_DATABASE, ScanledgerDb } from "../../storage/db.js";
import type { CommandRunner, RunResult } from "../../tools/runCommand.js";
import {
  addRuleRepository,
  checkoutPath,
  pullRuleRepository,
  refreshRuleRepository,
  removeRuleRepository,
  type RuleRepositoryContext
} from "../ruleRepositoryService.js";

const ok = (): RunResult => ({ exitCode: 0, signal: null, stdout: "", stderr: "", durationMs: 1, timedOut: false });

/** Stands in for git: `clone` materialises a checkout holding one rule file. */
function fakeGit(calls: string[][]): CommandRunner {
  return async (_command, args) => {
    calls.push(args);
    if (args[0] === "clone") {
      const target = args[2] ?? "";
      await mkdir(path.join(target, "java"), { recursive: true });
      await writeFile(
        path.join(target, "java", "xxe.yaml"),
        "rules:\n  - id: java-xxe\n    languages: [java]\n    metadata:\n      cwe: 'CWE-611'\n",
        "utf-8"
      );
    }
    return ok();
  };
}

async function setup(t: TestContext, runner: CommandRunner) {
  const rulesRoot = await mkdtemp(path.join(os.tmpdir(), "scanledger-repos-"));
  const db = new ScanledgerDb({ filename: IN_MEMORY_DATABASE });
  t.after(async () => {
    db.close();
    await rm(rulesRoot, { recursive: true, force: true });
  });
  db.languages.ensure("Java");
  const ctx: RuleRepositoryContext = { db, rulesRoot, git: { runner } };
  return { db, rulesRoot, ctx };
}

test("addRuleRepository validates names and rejects duplicates", async (t) => {
  const { db } = await setup(t, fakeGit([]));
  const repository = addRuleRepository(db, { name: " java-rules ", uri: "https://example.com/java-rules.git" });
  assert.equal(repository.name, "java-rules");
  assert.equal(repository.lastUpdateOn, null);
  assert.throws(() => addRuleRepository(db, { name: "java-rules", uri: "https://example.com/x.git" }), RuleRepositoryExistsError);
  assert.throws(() => addRuleRepository(db, { name: "../escape", uri: "https://example.com/x.git" }), /Invalid rule repository name/);
});

test("refreshRuleRepository clones a missing checkout, then pulls it", async (t) => {
  const calls: string[][] = [];
  const { db, rulesRoot, ctx } = await setup(t, fakeGit(calls));
  addRuleRepository(db, { name: "java-rules", uri: "https://example.com/java-rules.git" });
  const target = checkoutPath(rulesRoot, "java-rules");

  const first = await refreshRuleRepository(ctx, "java-rules");
  assert.deepEqual(calls[0], ["clone", "https://example.com/java-rules.git", target]);
  assert.equal(first.created, 1);
  const rule = db.rules.getByFilePath("java-rules/java/xxe.yaml");
  assert.equal(rule?.severity, "high");
  assert.deepEqual(rule?.languages.map((language) => language.name), ["Java"]);
  assert.notEqual(db.ruleRepositories.getByName("java-rules")?.lastUpdateOn, null);

  const second = await refreshRuleRepository(ctx, "java-rules");
  assert.deepEqual(calls[1], ["-C", target, "pull", "--ff-only"]);
  assert.equal(second.created, 0);
  assert.equal(second.updated, 1);
});

test("pullRuleRepository surfaces git failures and leaves the timestamp alone", async (t) => {
  const failing: CommandRunner = async () => ({ ...ok(), exitCode: 1, stderr: "fatal: not a git repository" });
  const { db, ctx } = await setup(t, failing);
  addRuleRepository(db, { name: "java-rules", uri: "https://example.com/java-rules.git" });

  await assert.rejects(pullRuleRepository(ctx, "java-rules"), ExternalToolError);
  assert.equal(db.ruleRepositories.getByName("java-rules")?.lastUpdateOn, null);
  await assert.rejects(pullRuleRepository(ctx, "nope"), RuleRepositoryNotFoundError);
});

test("removeRuleRepository deletes the checkout and its rules", async (t) => {
  const { db, rulesRoot, ctx } = await setup(t, fakeGit([]));
  addRuleRepository(db, { name: "java-rules", uri: "https://example.com/java-rules.git" });
  await refreshRuleRepository(ctx, "java-rules");
  assert.equal(db.rules.list().length, 1);

  await removeRuleRepository(ctx, "java-rules");
  assert.equal(existsSync(checkoutPath(rulesRoot, "java-rules")), false);
  assert.equal(db.ruleRepositories.getByName("java-rules"), null);
  assert.deepEqual(db.rules.list(), []);
});
