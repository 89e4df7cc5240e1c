export class ExternalToolMissingError extends Error {
  constructor(tool: string) {
    super(`Missing required external tool: ${tool}. Install it or set its path in scanledger.config.json.`);
    this.name = "ExternalToolMissingError";
  }
}

export class ExternalToolError extends Error {
  tool: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  stderr: string;

  constructor(params: {
    tool: string;
    exitCode: number | null;
    signal?: NodeJS.Signals | null;
    timedOut?: boolean;
    stderr?: string;
  }) {
    const timedOut = params.timedOut ?? false;
    const status = timedOut
      ? "timed out"
      : params.signal
        ? `was killed by ${params.signal}`
        : `exited with ${params.exitCode}`;
    const stderr = (params.stderr ?? "").trim();
    super(`${params.tool} ${status}${stderr ? `: ${stderr}` : ""}`);
    this.name = "ExternalToolError";
    this.tool = params.tool;
    this.exitCode = params.exitCode;
    this.signal = params.signal ?? null;
    this.timedOut = timedOut;
    this.stderr = stderr;
  }
}

export class LinesCountOutputError extends Error {
  constructor(message: string) {
    super(`Malformed line counter output: ${message}`);
    this.name = "LinesCountOutputError";
  }
}
