import path from "node:path";
import { existsSync } from "node:fs";
import { spawn } from "node:child_process";
import { ExternalToolError, ExternalToolMissingError } from "../errors/tool.errors.js";

export type RunResult = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
};

export type RunOptions = {
  cwd?: string;
  timeoutMs?: number | null;
};

export type CommandRunner = (command: string, args: string[], options?: RunOptions) => Promise<RunResult>;

export function findOnPath(command: string): string | null {
  const pathEnv = process.env.PATH || "";
  const parts = pathEnv.split(path.delimiter).filter(Boolean);
  const extList = process.platform === "win32" ? [".exe", ".cmd", ".bat", ""] : [""];

  for (const dir of parts) {
    for (const ext of extList) {
      const candidate = path.join(dir, `${command}${ext}`);
      if (existsSync(candidate)) {
        return candidate;
      }
    }
  }
  return null;
}

export function resolveToolPath(tool: string, override?: string | null): string {
  if (override) {
    if (existsSync(override)) return override;
    throw new ExternalToolMissingError(`${tool} (${override})`);
  }
  const onPath = findOnPath(tool);
  if (!onPath) throw new ExternalToolMissingError(tool);
  return onPath;
}

function shouldUseShell(command: string): boolean {
  if (process.platform !== "win32") return false;
  return command.toLowerCase().endsWith(".cmd") || command.toLowerCase().endsWith(".bat");
}

export const runCommand: CommandRunner = (command, args, options) => {
  return new Promise((resolve, reject) => {
    const start = Date.now();
    const proc = spawn(command, args, {
      cwd: options?.cwd,
      stdio: ["ignore", "pipe", "pipe"],
      shell: shouldUseShell(command)
    });
    let stdout = "";
    let stderr = "";
    let timedOut = false;
    const timeoutMs = options?.timeoutMs ?? null;
    const timer =
      timeoutMs && timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            proc.kill("SIGKILL");
          }, timeoutMs)
        : null;
    proc.stdout.on("data", (chunk) => {
      stdout += chunk.toString();
    });
    proc.stderr.on("data", (chunk) => {
      stderr += chunk.toString();
    });
    proc.on("error", (err) => {
      if (timer) clearTimeout(timer);
      reject(err);
    });
    proc.on("close", (code, signal) => {
      if (timer) clearTimeout(timer);
      resolve({
        exitCode: code,
        signal,
        stdout,
        stderr,
        durationMs: Date.now() - start,
        timedOut
      });
    });
  });
};

export type ToolSettings = {
  path?: string | null;
  timeoutSeconds?: number | null;
  /** Replaces process spawning; the command is then passed through unresolved. */
  runner?: CommandRunner;
};

/** Runs a tool and rejects with ExternalToolError unless it exits cleanly. */
export async function runTool(
  tool: string,
  args: string[],
  settings: ToolSettings & { cwd?: string } = {}
): Promise<RunResult> {
  const runner = settings.runner ?? runCommand;
  const command = settings.runner ? settings.path ?? tool : resolveToolPath(tool, settings.path);
  const timeoutMs = settings.timeoutSeconds && settings.timeoutSeconds > 0 ? settings.timeoutSeconds * 1000 : null;
  const result = await runner(command, args, { cwd: settings.cwd, timeoutMs });
  if (result.timedOut || result.exitCode !== 0) {
    throw new ExternalToolError({
      tool,
      exitCode: result.exitCode,
      signal: result.signal,
      timedOut: result.timedOut,
      stderr: result.stderr
    });
  }
  return result;
}
