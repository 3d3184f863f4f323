/**
 * Vulnerability scan via `cargo audit`
 *
 * Runs the audit subprocess and maps every outcome, including the tool being
 * absent or producing garbage, to findings.
 */

import { z } from "zod";

import { runCommand } from "../../lib/command.js";
import { logger } from "../../lib/logger.js";
import { err, ok, tryCatch } from "../../lib/result.js";
import { CHECK_CODES } from "../findings/codes.js";
import { AuditError } from "../findings/degraded.js";
import { createFinding } from "../findings/finding.js";

import type { CommandOutput, CommandSpawnError } from "../../lib/command.js";
import type { Result } from "../../lib/result.js";
import type { Finding } from "../findings/finding.js";

export const AUDIT_TIMEOUT_MS = 10 * 60 * 1000;

/** Longest stderr line or stdout excerpt quoted in a finding */
export const EXCERPT_LENGTH = 200;

const LOCKFILE = "Cargo.lock";

export type AuditRunner = (projectRoot: string) => Promise<Result<CommandOutput, CommandSpawnError>>;

export const AuditReportSchema = z.object({
  vulnerabilities: z.object({
    list: z.array(
      z.object({
        advisory: z.object({ id: z.string(), title: z.string() }),
        package: z.object({ name: z.string() }),
        versions: z.object({ patched: z.array(z.string()).default([]) }),
      })
    ),
  }),
});

export type AuditReport = z.infer<typeof AuditReportSchema>;

const log = logger.child("Audit");

export const defaultAuditRunner: AuditRunner = (projectRoot) =>
  runCommand("cargo", ["audit", "--json", "--quiet"], projectRoot, AUDIT_TIMEOUT_MS);

function excerpt(text: string): string {
  return text.length > EXCERPT_LENGTH ? `${text.slice(0, EXCERPT_LENGTH)}...` : text;
}

function firstLine(text: string): string | undefined {
  return text.split(/\r?\n/).find((line) => line.trim() !== "")?.trim();
}

export function parseAuditReport(stdout: string): Result<AuditReport, Error> {
  const json = tryCatch((): unknown => JSON.parse(stdout));
  if (!json.success) {
    return json;
  }
  const parsed = AuditReportSchema.safeParse(json.data);
  if (!parsed.success) {
    return err(new Error("report does not contain a vulnerabilities list"));
  }
  return ok(parsed.data);
}

/**
 * Run `cargo audit` in the project root and convert its report to findings
 */
export async function checkVulnerabilities(
  projectRoot: string,
  runner: AuditRunner = defaultAuditRunner
): Promise<Finding[]> {
  const result = await runner(projectRoot);

  if (!result.success) {
    const error = new AuditError(
      CHECK_CODES.AUDIT_UNAVAILABLE,
      `Failed to execute 'cargo audit'. Is it installed and in PATH? Error: ${result.error.message}`
    );
    log.warn(error.message);
    return [error.toFinding()];
  }

  const { stdout, stderr, exitCode, timedOut } = result.data;
  const report = parseAuditReport(stdout);

  if (!report.success) {
    if (exitCode === 0) {
      log.warn(`cargo audit exited cleanly but its output could not be parsed: ${report.error.message}`);
      return [];
    }

    if (stdout.trim() === "") {
      const reason = timedOut
        ? `timed out after ${AUDIT_TIMEOUT_MS / 60000} minutes`
        : excerpt(firstLine(stderr) ?? "Unknown error");
      return [new AuditError(CHECK_CODES.AUDIT_FAILED, `cargo-audit execution failed: ${reason}`, LOCKFILE).toFinding()];
    }

    return [
      new AuditError(
        CHECK_CODES.AUDIT_UNPARSEABLE,
        `Failed to parse cargo-audit JSON output: ${report.error.message}. Output: ${excerpt(stdout.trim())}`,
        LOCKFILE
      ).toFinding(),
    ];
  }

  const vulnerabilities = report.data.vulnerabilities.list;
  log.debug(`cargo audit reported ${vulnerabilities.length} vulnerabilities`);

  if (vulnerabilities.length === 0) {
    if (exitCode === 0) return [];
    const detail = excerpt(firstLine(stderr) ?? `exit code ${exitCode}`);
    return [
      createFinding(
        CHECK_CODES.AUDIT_AMBIGUOUS,
        `cargo-audit indicated an issue but no vulnerabilities found in JSON: ${detail}`,
        "warning",
        LOCKFILE
      ),
    ];
  }

  return vulnerabilities.map((vuln) => {
    const patched = vuln.versions.patched.length > 0 ? vuln.versions.patched.join(", ") : "no patched release";
    return createFinding(
      CHECK_CODES.VULNERABILITY,
      `Vulnerability found in '${vuln.package.name}': ${vuln.advisory.title} (ID: ${vuln.advisory.id}). Patched in: ${patched}.`,
      "error",
      LOCKFILE
    );
  });
}
