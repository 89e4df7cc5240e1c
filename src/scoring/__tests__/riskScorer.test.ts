import assert from "node:assert/strict";
import { test } from "node:test";
import type { Occurrence, SeverityTier, Vulnerability, VulnerableDependency } from "../../types.js";
import { computeRiskLevel, countOccurrences } from "../riskScorer.js";

const occurrence = (line: number): Occurrence => ({ filePath: "app/main.py", startLine: line, endLine: line });

const vuln = (severity: SeverityTier, occurrences: Occurrence[] = [occurrence(1)]): Vulnerability => ({
  id: 0,
  title: `${severity} finding`,
  severity,
  cwe: null,
  owasp: null,
  description: null,
  occurrences
});

const dep = (severity: SeverityTier): VulnerableDependency => ({
  id: 0,
  packageName: "left-pad",
  version: "1.0.0",
  ecosystem: "npm",
  advisoryId: null,
  severity,
  summary: null,
  occurrences: []
});

const linesCount = (codeCount: number) => ({
  totals: { fileCount: 1, lineCount: codeCount, blankCount: 0, commentCount: 0, codeCount, complexityCount: 0 }
});

test("computeRiskLevel is 0 without an analysis", () => {
  assert.equal(computeRiskLevel({ analysis: null, linesCount: linesCount(100) }), 0);
});

test("computeRiskLevel is 0 without code lines", () => {
  const analysis = { vulnerabilities: [vuln("critical")], vulnerableDependencies: [] };
  assert.equal(computeRiskLevel({ analysis, linesCount: linesCount(0) }), 0);
  assert.equal(computeRiskLevel({ analysis, linesCount: null }), 0);
});

test("computeRiskLevel takes the base from the most severe vulnerability", () => {
  const analysis = { vulnerabilities: [vuln("low"), vuln("critical"), vuln("medium")], vulnerableDependencies: [] };
  assert.equal(computeRiskLevel({ analysis, linesCount: linesCount(10) }), 75);
});

test("computeRiskLevel adds only the most severe dependency adjustment", () => {
  const analysis = {
    vulnerabilities: [vuln("critical")],
    vulnerableDependencies: [dep("low"), dep("high"), dep("medium")]
  };
  assert.equal(computeRiskLevel({ analysis, linesCount: linesCount(10) }), 83);
});

test("computeRiskLevel combines low tiers", () => {
  const analysis = { vulnerabilities: [vuln("low")], vulnerableDependencies: [dep("low")] };
  assert.equal(computeRiskLevel({ analysis, linesCount: linesCount(10) }), 22);
});

test("computeRiskLevel scores dependencies alone", () => {
  const analysis = { vulnerabilities: [], vulnerableDependencies: [dep("critical")] };
  assert.equal(computeRiskLevel({ analysis, linesCount: linesCount(10) }), 10);
});

test("computeRiskLevel peaks at 85", () => {
  const analysis = { vulnerabilities: [vuln("critical")], vulnerableDependencies: [dep("critical")] };
  assert.equal(computeRiskLevel({ analysis, linesCount: linesCount(10) }), 85);
});

test("countOccurrences sums occurrences across vulnerabilities", () => {
  const analysis = { vulnerabilities: [vuln("high", [occurrence(1), occurrence(4)]), vuln("low", [occurrence(9)])] };
  assert.equal(countOccurrences(analysis), 3);
  assert.equal(countOccurrences(null), 0);
});
