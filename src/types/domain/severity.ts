export const SeverityTier = {
  Low: "low",
  Medium: "medium",
  High: "high",
  Critical: "critical"
} as const;

export type SeverityTier = (typeof SeverityTier)[keyof typeof SeverityTier];

/** Highest tier first; scans that stop at the first match rely on this order. */
export const SEVERITY_TIERS_DESC: readonly SeverityTier[] = [
  SeverityTier.Critical,
  SeverityTier.High,
  SeverityTier.Medium,
  SeverityTier.Low
];

const SEVERITY_RANK: Record<SeverityTier, number> = {
  low: 1,
  medium: 2,
  high: 3,
  critical: 4
};

export function compareSeverity(a: SeverityTier, b: SeverityTier): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

export function isSeverityTier(value: unknown): value is SeverityTier {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(SEVERITY_RANK, value);
}

export function parseSeverityTier(raw: unknown): SeverityTier | null {
  if (typeof raw !== "string") return null;
  const normalized = raw.trim().toLowerCase();
  return isSeverityTier(normalized) ? normalized : null;
}
