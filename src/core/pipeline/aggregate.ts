/**
 * Merging and filtering of check findings
 */

import { UNGATED_CODES } from "../findings/codes.js";
import { compareSeverity, isBlocking } from "../findings/finding.js";

import type { CheckRegistry } from "../config/check-registry.js";
import type { Finding } from "../findings/finding.js";

import type { SeverityCounts } from "./types.js";

function compareOptionalPath(a: string | undefined, b: string | undefined): number {
  if (a === b) return 0;
  // Findings without a location sort after located ones
  if (a === undefined) return 1;
  if (b === undefined) return -1;
  return a < b ? -1 : 1;
}

/**
 * Total order: severity (error first), file path, line, code
 */
export function compareFindings(a: Finding, b: Finding): number {
  return (
    compareSeverity(a.severity, b.severity) ||
    compareOptionalPath(a.filePath, b.filePath) ||
    (a.lineNumber ?? 0) - (b.lineNumber ?? 0) ||
    (a.code < b.code ? -1 : a.code > b.code ? 1 : 0)
  );
}

/**
 * Merge per-task finding lists into one sorted list (stable)
 */
export function mergeFindings(groups: ReadonlyArray<readonly Finding[]>): Finding[] {
  return groups.flat().sort(compareFindings);
}

export interface FilterResult {
  kept: Finding[];
  suppressed: number;
}

/**
 * Drop findings whose code is disabled. Ungated codes always survive.
 */
export function filterFindings(findings: readonly Finding[], registry: CheckRegistry): FilterResult {
  const kept = findings.filter((f) => UNGATED_CODES.has(f.code) || registry.isEnabled(f.code));
  return { kept, suppressed: findings.length - kept.length };
}

export function countBySeverity(findings: readonly Finding[]): SeverityCounts {
  const counts: SeverityCounts = { error: 0, warning: 0, note: 0 };
  for (const finding of findings) {
    counts[finding.severity] += 1;
  }
  return counts;
}

export function hasBlockingFindings(findings: readonly Finding[]): boolean {
  return findings.some((f) => isBlocking(f.severity));
}
