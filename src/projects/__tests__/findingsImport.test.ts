import assert from "node:assert/strict";
import os from "node:os";
import path from "node:path";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { test } from "node:test";
import { FindingsImportError } from "../../errors/findings.errors.js";
import { ProjectNotFoundError } from "../../errors/storage.errors.js";
import { IN_MEMORY_DATABASE, ScanledgerDb } from "../../storage/db.js";
import { importFindings, parseFindingsDocument } from "../findingsImport.js";

const DOCUMENT = {
  startedOn: "2024-05-01T10:00:00.000Z",
  finishedOn: "2024-05-01T10:05:00.000Z",
  vulnerabilities: [
    {
      title: "Command injection",
      cwe: "CWE-78: OS Command Injection",
      occurrences: [{ filePath: "app/run.py", startLine: 12, endLine: 14 }]
    },
    {
      title: "Debug mode",
      severity: "LOW",
      cwe: "CWE-489",
      occurrences: [{ filePath: "app/main.py", startLine: 3 }]
    }
  ],
  vulnerableDependencies: [
    { packageName: "jinja2", version: "2.10", ecosystem: "PyPI", severity: "critical" }
  ]
};

test("parseFindingsDocument classifies vulnerabilities without a severity", () => {
  const input = parseFindingsDocument(DOCUMENT);
  assert.equal(input.vulnerabilities[0]?.severity, "high");
  assert.equal(input.vulnerabilities[1]?.severity, "low");
  assert.deepEqual(input.vulnerabilities[1]?.occurrences, [{ filePath: "app/main.py", startLine: 3, endLine: 3 }]);
  assert.deepEqual(input.vulnerableDependencies, [
    {
      packageName: "jinja2",
      version: "2.10",
      ecosystem: "PyPI",
      advisoryId: null,
      severity: "critical",
      summary: null,
      occurrences: []
    }
  ]);
});

test("parseFindingsDocument rejects malformed documents", () => {
  assert.throws(() => parseFindingsDocument([]), FindingsImportError);
  assert.throws(() => parseFindingsDocument({ vulnerabilities: {} }), /vulnerabilities must be a list/);
  assert.throws(
    () => parseFindingsDocument({ vulnerabilities: [{ cwe: "CWE-79" }] }),
    /vulnerabilities\[0\]\.title is required/
  );
  assert.throws(
    () => parseFindingsDocument({ vulnerableDependencies: [{ packageName: "x" }] }),
    /vulnerableDependencies\[0\]\.severity is not a known severity/
  );
  assert.throws(
    () =>
      parseFindingsDocument({
        vulnerabilities: [{ title: "x", occurrences: [{ filePath: "a.py", startLine: 5, endLine: 2 }] }]
      }),
    /ends before it starts/
  );
});

test("importFindings replaces the project's analysis", async (t) => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "scanledger-findings-"));
  const db = new ScanledgerDb({ filename: IN_MEMORY_DATABASE });
  t.after(async () => {
    db.close();
    await rm(dir, { recursive: true, force: true });
  });
  const project = db.projects.insert({ name: "billing" });
  const findingsPath = path.join(dir, "findings.json");
  await writeFile(findingsPath, JSON.stringify(DOCUMENT), "utf-8");

  await importFindings({ db, projectId: project.id, findingsPath });
  const analysis = await importFindings({ db, projectId: project.id, findingsPath });

  const stored = db.analyses.getForProject(project.id);
  assert.deepEqual(stored, analysis);
  assert.equal(stored?.vulnerabilities.length, 2);
  assert.equal(stored?.startedOn, "2024-05-01T10:00:00.000Z");

  await writeFile(findingsPath, "{ broken", "utf-8");
  await assert.rejects(importFindings({ db, projectId: project.id, findingsPath }), FindingsImportError);
  assert.deepEqual(db.analyses.getForProject(project.id), analysis);
  await assert.rejects(importFindings({ db, projectId: 404, findingsPath }), ProjectNotFoundError);
});
