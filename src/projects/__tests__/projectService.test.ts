import assert from "node:assert/strict";
import os from "node:os";
import path from "node:path";
import { existsSync } from "node:fs";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { test, type TestContext } from "node:test";
import AdmZip from "adm-zip";
import { ArchiveDuplicateError, ArchiveInvalidError } from "../../errors/archive.errors.js";
import { ProjectNotFoundError } from "../../errors/storage.errors.js";
import { ExternalToolError } from "../../errors/tool.errors.js";
import { IN_MEMORY_DATABASE, ScanledgerDb } from "../../storage/db.js";
import type { CommandRunner, RunResult } from "../../tools/runCommand.js";
import { sha256File } from "../archive.js";
import {
  countProjectLines,
  createProjectFromArchive,
  findProjectByArchiveDigest,
  getProjectOverview,
  projectDir,
  removeProject,
  runProjectPipeline,
  type ProjectContext
} from "../projectService.js";

const SCC_OUTPUT = JSON.stringify([
  { Name: "Python", Count: 2, Lines: 30, Blank: 4, Comment: 6, Code: 20, Complexity: 3 }
]);

const run = (overrides: Partial<RunResult> = {}): RunResult => ({
  exitCode: 0,
  signal: null,
  stdout: SCC_OUTPUT,
  stderr: "",
  durationMs: 1,
  timedOut: false,
  ...overrides
});

async function setup(t: TestContext, runner: CommandRunner = async () => run()) {
  const workDir = await mkdtemp(path.join(os.tmpdir(), "scanledger-projects-"));
  const db = new ScanledgerDb({ filename: IN_MEMORY_DATABASE });
  t.after(async () => {
    db.close();
    await rm(workDir, { recursive: true, force: true });
  });

  const zip = new AdmZip();
  zip.addFile("app/main.py", Buffer.from("import os\nprint(os.name)\n", "utf-8"));
  const archivePath = path.join(workDir, "upload.zip");
  await writeFile(archivePath, zip.toBuffer());

  const ctx: ProjectContext = {
    db,
    projectsDir: path.join(workDir, "projects"),
    scc: { runner },
    checkDuplicates: true
  };
  return { db, ctx, archivePath, workDir };
}

test("createProjectFromArchive stores the digest and unpacks the sources", async (t) => {
  const { db, ctx, archivePath } = await setup(t);
  const project = await createProjectFromArchive(ctx, { name: "billing", archivePath });

  const dir = projectDir(ctx.projectsDir, project.id);
  assert.equal(project.sourcePath, path.join(dir, "extract"));
  assert.equal(project.archiveSha256, await sha256File(archivePath));
  assert.equal(await readFile(path.join(project.sourcePath, "app", "main.py"), "utf-8"), "import os\nprint(os.name)\n");
  assert.equal(existsSync(path.join(dir, "source.zip")), true);
  assert.deepEqual(db.projects.getById(project.id), project);
  assert.equal(findProjectByArchiveDigest(db, project.archiveSha256 ?? "")?.id, project.id);
});

test("createProjectFromArchive rejects an archive uploaded before", async (t) => {
  const { db, ctx, archivePath } = await setup(t);
  const first = await createProjectFromArchive(ctx, { name: "billing", archivePath });
  await assert.rejects(
    createProjectFromArchive(ctx, { name: "billing-copy", archivePath }),
    (err: unknown) => err instanceof ArchiveDuplicateError && err.existingProjectId === first.id
  );
  assert.equal(db.projects.list().length, 1);

  const second = await createProjectFromArchive({ ...ctx, checkDuplicates: false }, { name: "billing-copy", archivePath });
  assert.notEqual(second.id, first.id);
});

test("createProjectFromArchive rejects invalid archives before storing anything", async (t) => {
  const { db, ctx, workDir } = await setup(t);
  const archivePath = path.join(workDir, "broken.zip");
  await writeFile(archivePath, "not a zip", "utf-8");
  await assert.rejects(createProjectFromArchive(ctx, { name: "broken", archivePath }), ArchiveInvalidError);
  assert.deepEqual(db.projects.list(), []);
});

test("runProjectPipeline creates the project and stores its line counts", async (t) => {
  const calls: string[][] = [];
  const { db, ctx, archivePath } = await setup(t, async (_command, args) => {
    calls.push(args);
    return run();
  });
  const { project, linesCount } = await runProjectPipeline(ctx, { name: "billing", archivePath });

  assert.deepEqual(calls, [[project.sourcePath, "-f", "json"]]);
  assert.equal(linesCount.totals.codeCount, 20);
  assert.deepEqual(db.linesCounts.getForProject(project.id), linesCount);
});

test("countProjectLines keeps the previous counts when scc fails", async (t) => {
  let fail = false;
  const { db, ctx, archivePath } = await setup(t, async () => (fail ? run({ exitCode: 1, stdout: "" }) : run()));
  const { project, linesCount } = await runProjectPipeline(ctx, { name: "billing", archivePath });

  fail = true;
  await assert.rejects(countProjectLines(ctx, project.id), ExternalToolError);
  assert.deepEqual(db.linesCounts.getForProject(project.id), linesCount);
  await assert.rejects(countProjectLines(ctx, 999), ProjectNotFoundError);
});

test("getProjectOverview scores the stored analysis", async (t) => {
  const { db, ctx, archivePath } = await setup(t);
  const { project } = await runProjectPipeline(ctx, { name: "billing", archivePath });
  assert.equal(getProjectOverview(db, project.id).riskLevel, 0);

  db.analyses.replaceForProject(project.id, {
    vulnerabilities: [
      {
        title: "SQL injection",
        severity: "high",
        cwe: "CWE-89",
        owasp: null,
        description: null,
        occurrences: [
          { filePath: "app/main.py", startLine: 1, endLine: 1 },
          { filePath: "app/main.py", startLine: 2, endLine: 2 }
        ]
      }
    ],
    vulnerableDependencies: [
      {
        packageName: "requests",
        version: "2.0.0",
        ecosystem: "PyPI",
        advisoryId: null,
        severity: "medium",
        summary: null,
        occurrences: []
      }
    ]
  });
  const overview = getProjectOverview(db, project.id);
  assert.equal(overview.riskLevel, 65);
  assert.equal(overview.occurrences, 2);
});

test("removeProject deletes the directory and every stored result", async (t) => {
  const { db, ctx, archivePath } = await setup(t);
  const { project } = await runProjectPipeline(ctx, { name: "billing", archivePath });
  const team = db.teams.create("red");
  db.teams.addProject(team.id, project.id);

  await removeProject(ctx, project.id);
  assert.equal(existsSync(projectDir(ctx.projectsDir, project.id)), false);
  assert.equal(db.projects.getById(project.id), null);
  assert.equal(db.linesCounts.getForProject(project.id), null);
  assert.deepEqual(db.teams.listTeamIdsForProject(project.id), []);
  await assert.rejects(removeProject(ctx, project.id), ProjectNotFoundError);
});
