import { SEVERITY_TIERS_DESC, type SeverityTier } from "../types/domain/severity.js";
import type { Analysis, ProjectLinesCount } from "../types.js";

const BASE_RISK_BY_SEVERITY: Record<SeverityTier, number> = {
  critical: 75,
  high: 60,
  medium: 40,
  low: 20
};

const DEPENDENCY_ADJUSTMENT_BY_SEVERITY: Record<SeverityTier, number> = {
  critical: 10,
  high: 8,
  medium: 5,
  low: 2
};

export interface RiskInputs {
  analysis: Pick<Analysis, "vulnerabilities" | "vulnerableDependencies"> | null;
  linesCount: Pick<ProjectLinesCount, "totals"> | null;
}

function highestPresentTier(items: ReadonlyArray<{ severity: SeverityTier }>): SeverityTier | null {
  const present = new Set(items.map((item) => item.severity));
  for (const tier of SEVERITY_TIERS_DESC) {
    if (present.has(tier)) return tier;
  }
  return null;
}

/**
 * Risk level (0 - 100) of a project: a base level from the most severe SAST
 * finding, raised by the most severe SCA finding. Projects without an
 * analysis or without any line of code score 0.
 */
export function computeRiskLevel(inputs: RiskInputs): number {
  const { analysis, linesCount } = inputs;
  if (!analysis) return 0;
  const codeCount = linesCount?.totals.codeCount ?? 0;
  if (!(codeCount > 0)) return 0;

  const vulnTier = highestPresentTier(analysis.vulnerabilities);
  const base = vulnTier ? BASE_RISK_BY_SEVERITY[vulnTier] : 0;

  const depTier = highestPresentTier(analysis.vulnerableDependencies);
  const adjustment = depTier ? DEPENDENCY_ADJUSTMENT_BY_SEVERITY[depTier] : 0;

  return base + adjustment;
}

export function countOccurrences(analysis: Pick<Analysis, "vulnerabilities"> | null): number {
  if (!analysis) return 0;
  return analysis.vulnerabilities.reduce((sum, vuln) => sum + vuln.occurrences.length, 0);
}
