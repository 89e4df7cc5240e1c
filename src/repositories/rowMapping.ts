import { parseSeverityTier, type SeverityTier } from "../types/domain/severity.js";

export function toSeverity(raw: string, context: string): SeverityTier {
  const tier = parseSeverityTier(raw);
  if (!tier) {
    throw new Error(`Stored severity "${raw}" is not a known tier (${context}).`);
  }
  return tier;
}

export function placeholders(count: number): string {
  return Array.from({ length: count }, () => "?").join(",");
}

export function nowIso(): string {
  return new Date().toISOString();
}
