export const STATE_DIR_NAME = ".scanledger";
export const DATABASE_FILE_NAME = "scanledger.db";
export const PROJECTS_DIR_NAME = "projects";
export const RULES_DIR_NAME = "rules";
export const EXTRACT_FOLDER_NAME = "extract";
export const ARCHIVE_FILE_NAME = "source.zip";

export const CONFIG_FILE_CANDIDATES = ["scanledger.config.json", ".scanledgerrc.json"];

export const DEFAULT_RULE_EXTENSIONS = [".yml", ".yaml"];

export const DEFAULT_RULE_EXCLUDES = ["**/.git/**", "**/.github/**"];

export const DEFAULT_SUPPORTED_LANGUAGES = [
  "Python",
  "JavaScript",
  "TypeScript",
  "Java",
  "Kotlin",
  "Go",
  "PHP",
  "C",
  "C++",
  "C#",
  "Ruby",
  "Rust",
  "Swift",
  "Scala",
  "Dart",
  "Solidity",
  "Bash",
  "HTML",
  "YAML",
  "JSON"
];

export const DEFAULT_TOOL_TIMEOUTS = {
  sccSeconds: 300,
  gitSeconds: 600
} as const;
