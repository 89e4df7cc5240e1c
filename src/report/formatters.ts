import pc from "picocolors";
import { topLanguages } from "../linesCount/aggregate.js";
import { compareSeverity } from "../types/domain/severity.js";
import type { ProjectOverview } from "../projects/projectService.js";
import type {
  Project,
  ProjectLinesCount,
  Rule,
  RuleRepository,
  RuleSyncSummary,
  SeverityTier,
  SupportedLanguage
} from "../types.js";

export function severityLabel(severity: SeverityTier): string {
  switch (severity) {
    case "critical":
      return pc.bgRed(pc.white(" CRITICAL "));
    case "high":
      return pc.red("HIGH");
    case "medium":
      return pc.yellow("MEDIUM");
    case "low":
    default:
      return pc.green("LOW");
  }
}

function riskLabel(level: number): string {
  if (level >= 75) return pc.red(String(level));
  if (level >= 40) return pc.yellow(String(level));
  return pc.green(String(level));
}

export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export function formatProjectList(projects: Project[]): string {
  if (!projects.length) return "No projects.";
  return projects.map((project) => `#${project.id} ${project.name} (created ${project.createdAt})`).join("\n");
}

export function formatLinesCount(linesCount: ProjectLinesCount | null, top = 5): string {
  if (!linesCount) return "Lines: not counted";
  const { totals } = linesCount;
  const lines = [`Lines: ${totals.codeCount} code, ${totals.commentCount} comment, ${totals.blankCount} blank in ${totals.fileCount} files`];
  for (const language of topLanguages(linesCount, top)) {
    lines.push(`  ${language.language}: ${language.codeCount} code (${language.fileCount} files)`);
  }
  return lines.join("\n");
}

export function formatProjectOverview(overview: ProjectOverview): string {
  const { project, analysis } = overview;
  const lines = [
    pc.bold(`#${project.id} ${project.name}`),
    `Archive SHA-256: ${project.archiveSha256 ?? "-"}`,
    `Risk level: ${riskLabel(overview.riskLevel)}`,
    formatLinesCount(overview.linesCount)
  ];
  if (!analysis) {
    lines.push("Analysis: none");
    return lines.join("\n");
  }
  lines.push(
    `Analysis: ${analysis.vulnerabilities.length} vulnerabilities (${overview.occurrences} occurrences), ${analysis.vulnerableDependencies.length} vulnerable dependencies`
  );
  const bySeverity = <T extends { severity: SeverityTier }>(items: T[]) =>
    [...items].sort((a, b) => compareSeverity(b.severity, a.severity));
  for (const vuln of bySeverity(analysis.vulnerabilities)) {
    lines.push(`  ${severityLabel(vuln.severity)} ${vuln.title}${vuln.cwe ? ` [${vuln.cwe}]` : ""}`);
  }
  for (const dep of bySeverity(analysis.vulnerableDependencies)) {
    lines.push(`  ${severityLabel(dep.severity)} ${dep.packageName}${dep.version ? `@${dep.version}` : ""}`);
  }
  return lines.join("\n");
}

export function formatRuleSyncSummary(summary: RuleSyncSummary): string {
  return `${summary.repository}: ${summary.files} files, ${summary.rules} rules (${summary.created} created, ${summary.updated} updated) in ${summary.durationMs}ms`;
}

export function formatRuleRepositories(repositories: RuleRepository[]): string {
  if (!repositories.length) return "No rule repositories.";
  return repositories
    .map((repository) => `${repository.name} ${pc.dim(repository.uri)} (updated ${repository.lastUpdateOn ?? "never"})`)
    .join("\n");
}

export function formatRuleList(rules: Rule[]): string {
  if (!rules.length) return "No rules.";
  return rules
    .map((rule) => {
      const languages = rule.languages.map((language) => language.name).join(", ");
      return `${severityLabel(rule.severity)} ${rule.title} ${pc.dim(rule.filePath)}${languages ? ` [${languages}]` : ""}`;
    })
    .join("\n");
}

export function formatLanguages(languages: SupportedLanguage[]): string {
  if (!languages.length) return "No supported languages.";
  return languages.map((language) => language.name).join("\n");
}
