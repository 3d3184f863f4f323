/**
 * Check code catalog
 *
 * Codes are stable across releases: configuration files and CI
 * pipelines refer to them by value.
 */

import type { Severity } from "./finding.js";

export const CHECK_CODES = {
  UNSAFE_FALLIBLE_CALL: "CODE001",
  FALLBACK_WITH_MESSAGE: "CODE002",
  DEBUG_OUTPUT: "CODE003",
  PENDING_WORK_COMMENT: "CODE004",
  IO_FILE_READ: "IO001",
  MISSING_DESCRIPTION: "MD001",
  MISSING_LICENSE: "MD002",
  MISSING_REPOSITORY: "MD003",
  README_FIELD: "MD004",
  MISSING_PACKAGE_SECTION: "MD005",
  WILDCARD_VERSION: "DP001",
  OUTDATED_DEPENDENCY: "DP002",
  DEPENDENCY_GRAPH_UNAVAILABLE: "DP003",
  OUTDATED_EDITION: "ED001",
  MISSING_EDITION: "ED002",
  MISSING_TARGETS: "STRUCT001",
  MISSING_README_FILE: "STRUCT002",
  MISSING_LICENSE_FILE: "STRUCT003",
  MISSING_DENY_WARNINGS: "LINT001",
  API_FETCH_FAILED: "API001",
  AUDIT_FAILED: "AUD001",
  AUDIT_AMBIGUOUS: "AUD002",
  AUDIT_UNPARSEABLE: "AUD003",
  AUDIT_UNAVAILABLE: "AUD004",
  VULNERABILITY: "SEC001",
} as const;

export type CheckCode = (typeof CHECK_CODES)[keyof typeof CHECK_CODES];

export interface CheckDescription {
  code: CheckCode;
  severity: Severity;
  description: string;
}

export const CHECK_CATALOG: readonly CheckDescription[] = [
  { code: "CODE001", severity: "warning", description: "`.unwrap()` called in library code" },
  { code: "CODE002", severity: "note", description: "`.expect()` called in library code" },
  { code: "CODE003", severity: "note", description: "`println!` or `dbg!` left in library code" },
  { code: "CODE004", severity: "note", description: "TODO, FIXME or XXX comment" },
  { code: "IO001", severity: "warning", description: "Source file could not be read" },
  { code: "MD001", severity: "warning", description: "Missing `description` in [package]" },
  { code: "MD002", severity: "warning", description: "Missing `license` in [package]" },
  { code: "MD003", severity: "note", description: "Missing `repository` in [package]" },
  { code: "MD004", severity: "note", description: "Missing or malformed `readme` in [package]" },
  { code: "MD005", severity: "error", description: "Cargo.toml has no [package] section" },
  { code: "DP001", severity: "warning", description: "Dependency uses the wildcard version \"*\"" },
  { code: "DP002", severity: "note", description: "Direct dependency is behind the latest crates.io release" },
  { code: "DP003", severity: "note", description: "Dependency graph could not be resolved" },
  { code: "ED001", severity: "note", description: "Edition is older than the latest stable edition" },
  { code: "ED002", severity: "note", description: "No edition declared (implicitly 2015)" },
  { code: "STRUCT001", severity: "warning", description: "No library root, entry point or src/bin directory" },
  { code: "STRUCT002", severity: "note", description: "No README file in the project root" },
  { code: "STRUCT003", severity: "warning", description: "No LICENSE file and no declared license" },
  { code: "LINT001", severity: "note", description: "Crate root lacks `#![deny(warnings)]`" },
  { code: "API001", severity: "warning", description: "crates.io lookup failed" },
  { code: "AUD001", severity: "warning", description: "cargo audit failed to run the scan" },
  { code: "AUD002", severity: "warning", description: "cargo audit failed but reported no vulnerabilities" },
  { code: "AUD003", severity: "warning", description: "cargo audit output could not be parsed" },
  { code: "AUD004", severity: "warning", description: "cargo audit is not installed" },
  { code: "SEC001", severity: "error", description: "Known vulnerability in a dependency" },
];

/**
 * Codes that configuration cannot disable
 */
export const UNGATED_CODES: ReadonlySet<string> = new Set<string>([CHECK_CODES.MISSING_PACKAGE_SECTION]);

const KNOWN_CODES: ReadonlySet<string> = new Set<string>(Object.values(CHECK_CODES));

export function isKnownCheckCode(code: string): code is CheckCode {
  return KNOWN_CODES.has(code);
}
