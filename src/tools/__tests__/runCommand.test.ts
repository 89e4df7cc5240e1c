import assert from "node:assert/strict";
import os from "node:os";
import path from "node:path";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { test } from "node:test";
import { ExternalToolError, ExternalToolMissingError } from "../../errors/tool.errors.js";
import { findOnPath, resolveToolPath, runCommand, runTool, type CommandRunner } from "../runCommand.js";

test("runCommand captures output and the exit code", async () => {
  const result = await runCommand(process.execPath, [
    "-e",
    "process.stdout.write('out'); process.stderr.write('err'); process.exit(3)"
  ]);
  assert.equal(result.stdout, "out");
  assert.equal(result.stderr, "err");
  assert.equal(result.exitCode, 3);
  assert.equal(result.timedOut, false);
});

test("runCommand kills a process that outlives its timeout", async () => {
  const result = await runCommand(process.execPath, ["-e", "setTimeout(() => {}, 10000)"], { timeoutMs: 100 });
  assert.equal(result.timedOut, true);
  assert.equal(result.signal, "SIGKILL");
});

test("findOnPath and resolveToolPath look up executables", async (t) => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "scanledger-path-"));
  const previousPath = process.env.PATH;
  t.after(async () => {
    process.env.PATH = previousPath;
    await rm(dir, { recursive: true, force: true });
  });
  const tool = path.join(dir, "scc");
  await writeFile(tool, "#!/bin/sh\n", "utf-8");
  process.env.PATH = dir;

  assert.equal(findOnPath("scc"), tool);
  assert.equal(findOnPath("git"), null);
  assert.equal(resolveToolPath("scc"), tool);
  assert.equal(resolveToolPath("scc", tool), tool);
  assert.throws(() => resolveToolPath("git"), ExternalToolMissingError);
  assert.throws(() => resolveToolPath("scc", path.join(dir, "nope")), ExternalToolMissingError);
});

test("runTool passes the configured command and timeout to the runner", async () => {
  const seen: Array<{ command: string; args: string[]; timeoutMs: number | null | undefined }> = [];
  const runner: CommandRunner = async (command, args, options) => {
    seen.push({ command, args, timeoutMs: options?.timeoutMs });
    return { exitCode: 0, signal: null, stdout: "ok", stderr: "", durationMs: 1, timedOut: false };
  };
  const result = await runTool("git", ["status"], { runner, timeoutSeconds: 2 });
  assert.equal(result.stdout, "ok");
  assert.deepEqual(seen, [{ command: "git", args: ["status"], timeoutMs: 2000 }]);
});

test("runTool turns failures into ExternalToolError", async () => {
  const runner: CommandRunner = async () => ({
    exitCode: null,
    signal: "SIGTERM",
    stdout: "",
    stderr: "",
    durationMs: 1,
    timedOut: false
  });
  await assert.rejects(runTool("git", ["pull"], { runner }), (err: unknown) => {
    assert.ok(err instanceof ExternalToolError);
    assert.equal(err.message, "git was killed by SIGTERM");
    return true;
  });
});
