/**
 * Finding model - the common output unit of every check
 */

import { z } from "zod";

export const SEVERITIES = ["error", "warning", "note"] as const;

export const SeveritySchema = z.enum(SEVERITIES);
export type Severity = z.infer<typeof SeveritySchema>;

/**
 * Severity rank, highest first
 */
const SEVERITY_ORDER: Record<Severity, number> = {
  error: 3,
  warning: 2,
  note: 1,
};

export interface Finding {
  readonly code: string;
  readonly message: string;
  readonly severity: Severity;
  /** Project-relative path, when the finding has a location */
  readonly filePath?: string;
  /** 1-indexed line number */
  readonly lineNumber?: number;
}

export function createFinding(
  code: string,
  message: string,
  severity: Severity,
  filePath?: string
): Finding {
  const finding: Finding = filePath === undefined
    ? { code, message, severity }
    : { code, message, severity, filePath };
  return Object.freeze(finding);
}

/**
 * Copy of a finding with a line number attached
 */
export function withLine(finding: Finding, lineNumber: number): Finding {
  return Object.freeze({ ...finding, lineNumber });
}

/**
 * Errors and warnings fail a run; notes are informational
 */
export function isBlocking(severity: Severity): boolean {
  return severity === "error" || severity === "warning";
}

/**
 * Comparator ordering the more severe first
 */
export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_ORDER[b] - SEVERITY_ORDER[a];
}
