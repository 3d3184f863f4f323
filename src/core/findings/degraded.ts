/**
 * Degraded-check errors
 *
 * A check that cannot complete (network down, tool missing, unreadable
 * file) fails with one of these. Every one converts to a Finding, so the
 * orchestrator only ever receives findings from its tasks.
 */

import { VitalsError } from "../../lib/errors.js";

import { CHECK_CODES } from "./codes.js";
import { createFinding } from "./finding.js";

import type { Finding } from "./finding.js";

export abstract class DegradedCheckError extends VitalsError {
  abstract toFinding(): Finding;
}

/**
 * A source file could not be read
 */
export class FileReadError extends DegradedCheckError {
  constructor(public readonly filePath: string, cause: string) {
    super(`Failed to read file ${filePath}: ${cause}`, "FILE_READ_FAILED", { filePath, cause });
    this.name = "FileReadError";
  }

  toFinding(): Finding {
    return createFinding(CHECK_CODES.IO_FILE_READ, this.message, "warning", this.filePath);
  }
}

/**
 * crates.io did not answer with a usable version for a crate
 */
export class RegistryFetchError extends DegradedCheckError {
  constructor(
    public readonly crateName: string,
    reason: string,
    public readonly status?: number
  ) {
    super(`Failed to fetch latest version for dependency '${crateName}': ${reason}`, "REGISTRY_FETCH_FAILED", {
      crateName,
      status,
    });
    this.name = "RegistryFetchError";
  }

  toFinding(): Finding {
    return createFinding(CHECK_CODES.API_FETCH_FAILED, this.message, "warning");
  }
}

type AuditFailureCode =
  | typeof CHECK_CODES.AUDIT_FAILED
  | typeof CHECK_CODES.AUDIT_UNPARSEABLE
  | typeof CHECK_CODES.AUDIT_UNAVAILABLE;

/**
 * cargo audit could not produce a usable report
 */
export class AuditError extends DegradedCheckError {
  constructor(
    public readonly findingCode: AuditFailureCode,
    message: string,
    public readonly filePath?: string
  ) {
    super(message, "AUDIT_FAILED", { findingCode });
    this.name = "AuditError";
  }

  toFinding(): Finding {
    return createFinding(this.findingCode, this.message, "warning", this.filePath);
  }
}

/**
 * Neither Cargo.lock nor `cargo metadata` yielded a dependency graph
 */
export class DependencyGraphError extends DegradedCheckError {
  constructor(reason: string) {
    super(
      `Could not resolve the dependency graph, outdated-dependency check skipped: ${reason}`,
      "DEPENDENCY_GRAPH_UNAVAILABLE",
      { reason }
    );
    this.name = "DependencyGraphError";
  }

  toFinding(): Finding {
    return createFinding(CHECK_CODES.DEPENDENCY_GRAPH_UNAVAILABLE, this.message, "note", "Cargo.toml");
  }
}
