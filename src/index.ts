export * from "./types.js";
export {
  SeverityTier,
  SEVERITY_TIERS_DESC,
  compareSeverity,
  isSeverityTier,
  parseSeverityTier
} from "./types/domain/severity.js";
export { Role, parseRole } from "./types/domain/access.js";
export * from "./config/loadConfig.js";
export * from "./logging/logger.js";
export * from "./storage/db.js";
export * from "./scoring/severityClassifier.js";
export * from "./scoring/riskScorer.js";
export * from "./linesCount/aggregate.js";
export * from "./linesCount/scc.js";
export * from "./rules/ruleFile.js";
export * from "./rules/ruleSyncLock.js";
export * from "./rules/syncRules.js";
export * from "./rules/ruleRepositoryService.js";
export * from "./access/accessResolver.js";
export * from "./languages/supportedLanguages.js";
export * from "./projects/archive.js";
export * from "./projects/findingsImport.js";
export * from "./projects/projectService.js";
export * from "./report/formatters.js";
export * from "./errors/archive.errors.js";
export * from "./errors/config.errors.js";
export * from "./errors/findings.errors.js";
export * from "./errors/rules.errors.js";
export * from "./errors/storage.errors.js";
export * from "./errors/tool.errors.js";
