import path from "node:path";
import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
};

export type AppLogger = Logger & {
  path: string;
  close: () => Promise<void>;
};

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function parseLogLevel(raw: string | null | undefined): LogLevel | null {
  const value = (raw ?? "").trim().toLowerCase();
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return null;
}

type AppLoggerParams = {
  stateDir: string;
  label?: string;
  level?: LogLevel;
};

/** JSONL log file under `<stateDir>/logs`, one file per command run. */
export async function createAppLogger(params: AppLoggerParams): Promise<AppLogger> {
  const dir = path.join(params.stateDir, "logs");
  await mkdir(dir, { recursive: true });
  const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
  const label = params.label ?? "scanledger";
  const minLevel = LEVEL_ORDER[params.level ?? "info"];
  const filePath = path.join(dir, `${label}-${timestamp}.jsonl`);
  const stream = createWriteStream(filePath, { flags: "a" });
  let closed = false;

  const write = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (closed || LEVEL_ORDER[level] < minLevel) return;
    const payload = {
      timestamp: new Date().toISOString(),
      level,
      message,
      meta: meta ?? undefined
    };
    try {
      stream.write(`${JSON.stringify(payload)}\n`);
    } catch {
      closed = true;
    }
  };

  stream.on("error", () => {
    closed = true;
  });

  const close = async () => {
    if (closed) return;
    closed = true;
    await new Promise<void>((resolve) => stream.end(resolve));
  };

  return {
    path: filePath,
    close,
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta)
  };
}

/** Fans each record out to several loggers. */
export function combineLoggers(...loggers: Logger[]): Logger {
  return {
    debug: (message, meta) => loggers.forEach((logger) => logger.debug(message, meta)),
    info: (message, meta) => loggers.forEach((logger) => logger.info(message, meta)),
    warn: (message, meta) => loggers.forEach((logger) => logger.warn(message, meta)),
    error: (message, meta) => loggers.forEach((logger) => logger.error(message, meta))
  };
}
