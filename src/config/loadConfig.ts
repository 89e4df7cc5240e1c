import path from "node:path";
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { readEnv, readEnvList, readEnvNumber, readFirstEnv } from "./env.js";
import {
  CONFIG_FILE_CANDIDATES,
  DATABASE_FILE_NAME,
  DEFAULT_RULE_EXCLUDES,
  DEFAULT_RULE_EXTENSIONS,
  DEFAULT_TOOL_TIMEOUTS,
  PROJECTS_DIR_NAME,
  RULES_DIR_NAME,
  STATE_DIR_NAME
} from "./defaults.js";
import { ConfigInvalidError } from "../errors/config.errors.js";
import { parseLogLevel, type LogLevel } from "../logging/logger.js";

export interface ScanledgerConfig {
  projectRoot: string;
  stateDir: string;
  databasePath: string;
  projectsDir: string;
  rulesDir: string;
  tools: {
    scc: {
      path?: string | null;
      timeoutSeconds: number;
    };
    git: {
      path?: string | null;
      timeoutSeconds: number;
    };
  };
  rules: {
    extensions: string[];
    exclude: string[];
  };
  logging: {
    level: LogLevel;
  };
}

type ConfigFile = {
  stateDir?: string;
  databasePath?: string;
  projectsDir?: string;
  rulesDir?: string;
  tools?: {
    scc?: { path?: string | null; timeoutSeconds?: number };
    git?: { path?: string | null; timeoutSeconds?: number };
  };
  rules?: {
    extensions?: string[];
    exclude?: string[];
  };
  logging?: {
    level?: string;
  };
};

export interface LoadConfigParams {
  projectRoot: string;
  configPath?: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

async function loadConfigFile(projectRoot: string, configPath?: string | null): Promise<ConfigFile> {
  const candidates = configPath
    ? [path.resolve(projectRoot, configPath)]
    : CONFIG_FILE_CANDIDATES.map((name) => path.resolve(projectRoot, name));

  for (const candidate of candidates) {
    if (!existsSync(candidate)) continue;
    const raw = await readFile(candidate, "utf-8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigInvalidError(candidate, message);
    }
    if (!isRecord(parsed)) {
      throw new ConfigInvalidError(candidate, "expected a JSON object.");
    }
    return parsed as ConfigFile;
  }

  return {};
}

function normalizeExtensions(values: string[]): string[] {
  return values
    .map((ext) => ext.trim().toLowerCase())
    .filter(Boolean)
    .map((ext) => (ext.startsWith(".") ? ext : `.${ext}`));
}

export async function loadConfig(params: LoadConfigParams): Promise<ScanledgerConfig> {
  const projectRoot = path.resolve(params.projectRoot);
  const configFile = await loadConfigFile(projectRoot, params.configPath);
  const resolvePath = (value: string) => path.resolve(projectRoot, value);

  const stateDir = resolvePath(readEnv("SCANLEDGER_STATE_DIR") || configFile.stateDir || STATE_DIR_NAME);
  const databaseOverride = readEnv("SCANLEDGER_DB_PATH") || configFile.databasePath;
  const databasePath = databaseOverride
    ? resolvePath(databaseOverride)
    : path.join(stateDir, DATABASE_FILE_NAME);
  const projectsOverride = readEnv("SCANLEDGER_PROJECTS_DIR") || configFile.projectsDir;
  const projectsDir = projectsOverride ? resolvePath(projectsOverride) : path.join(stateDir, PROJECTS_DIR_NAME);
  const rulesOverride = readEnv("SCANLEDGER_RULES_DIR") || configFile.rulesDir;
  const rulesDir = rulesOverride ? resolvePath(rulesOverride) : path.join(stateDir, RULES_DIR_NAME);

  const level =
    parseLogLevel(readFirstEnv(["SCANLEDGER_LOG_LEVEL", "LOG_LEVEL"])) ??
    parseLogLevel(configFile.logging?.level) ??
    "info";

  return {
    projectRoot,
    stateDir,
    databasePath,
    projectsDir,
    rulesDir,
    tools: {
      scc: {
        path: readEnv("SCANLEDGER_SCC_PATH") || configFile.tools?.scc?.path || null,
        timeoutSeconds:
          readEnvNumber("SCANLEDGER_SCC_TIMEOUT") ??
          configFile.tools?.scc?.timeoutSeconds ??
          DEFAULT_TOOL_TIMEOUTS.sccSeconds
      },
      git: {
        path: readEnv("SCANLEDGER_GIT_PATH") || configFile.tools?.git?.path || null,
        timeoutSeconds:
          readEnvNumber("SCANLEDGER_GIT_TIMEOUT") ??
          configFile.tools?.git?.timeoutSeconds ??
          DEFAULT_TOOL_TIMEOUTS.gitSeconds
      }
    },
    rules: {
      extensions: normalizeExtensions(
        readEnvList("SCANLEDGER_RULE_EXTENSIONS") ?? configFile.rules?.extensions ?? DEFAULT_RULE_EXTENSIONS
      ),
      exclude: configFile.rules?.exclude ?? DEFAULT_RULE_EXCLUDES
    },
    logging: {
      level
    }
  };
}
