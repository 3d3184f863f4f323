import { describe, it, expect } from "vitest";

import { checkVulnerabilities, parseAuditReport } from "@/core/dependencies/audit.js";
import { CommandSpawnError } from "@/lib/command.js";
import { ok, err } from "@/lib/result.js";

import type { AuditRunner } from "@/core/dependencies/audit.js";
import type { CommandOutput } from "@/lib/command.js";

function runnerReturning(output: Partial<CommandOutput>): AuditRunner {
  return async () => ok({ stdout: "", stderr: "", exitCode: 0, timedOut: false, ...output });
}

const REPORT = {
  database: { "advisory-count": 1 },
  vulnerabilities: {
    found: true,
    count: 2,
    list: [
      {
        advisory: { id: "RUSTSEC-0000-0001", title: "Sample memory corruption", url: "https://example.com/a" },
        package: { name: "sample-zip", version: "0.5.0" },
        versions: { patched: [">=0.5.2", "^0.4.9"], unaffected: [] },
      },
      {
        advisory: { id: "RUSTSEC-0000-0002", title: "Sample unsoundness" },
        package: { name: "sample-cell" },
        versions: { patched: [] },
      },
    ],
  },
};

describe("checkVulnerabilities", () => {
  it("reports one SEC001 error per vulnerability", async () => {
    const findings = await checkVulnerabilities("/work/app", runnerReturning({ stdout: JSON.stringify(REPORT), exitCode: 1 }));
    expect(findings).toEqual([
      {
        code: "SEC001",
        message:
          "Vulnerability found in 'sample-zip': Sample memory corruption (ID: RUSTSEC-0000-0001). Patched in: >=0.5.2, ^0.4.9.",
        severity: "error",
        filePath: "Cargo.lock",
      },
      {
        code: "SEC001",
        message:
          "Vulnerability found in 'sample-cell': Sample unsoundness (ID: RUSTSEC-0000-0002). Patched in: no patched release.",
        severity: "error",
        filePath: "Cargo.lock",
      },
    ]);
  });

  it("reports nothing for a clean audit", async () => {
    const clean = JSON.stringify({ vulnerabilities: { found: false, count: 0, list: [] } });
    expect(await checkVulnerabilities("/work/app", runnerReturning({ stdout: clean }))).toEqual([]);
  });

  it("reports AUD002 when the audit fails without listing vulnerabilities", async () => {
    const clean = JSON.stringify({ vulnerabilities: { list: [] } });
    const findings = await checkVulnerabilities(
      "/work/app",
      runnerReturning({ stdout: clean, stderr: "error: yanked crate found\n", exitCode: 1 })
    );
    expect(findings).toEqual([
      {
        code: "AUD002",
        message: "cargo-audit indicated an issue but no vulnerabilities found in JSON: error: yanked crate found",
        severity: "warning",
        filePath: "Cargo.lock",
      },
    ]);
  });

  it("reports AUD001 with the first stderr line when the audit produced no output", async () => {
    const findings = await checkVulnerabilities(
      "/work/app",
      runnerReturning({ stderr: "error: couldn't load Cargo.lock\ncaused by: missing\n", exitCode: 1 })
    );
    expect(findings).toEqual([
      {
        code: "AUD001",
        message: "cargo-audit execution failed: error: couldn't load Cargo.lock",
        severity: "warning",
        filePath: "Cargo.lock",
      },
    ]);
  });

  it("truncates long stderr lines", async () => {
    const findings = await checkVulnerabilities("/work/app", runnerReturning({ stderr: "e".repeat(300), exitCode: 1 }));
    expect(findings[0]?.message).toBe(`cargo-audit execution failed: ${"e".repeat(200)}...`);
  });

  it("reports AUD001 for a timeout", async () => {
    const findings = await checkVulnerabilities("/work/app", runnerReturning({ exitCode: 1, timedOut: true }));
    expect(findings[0]?.message).toBe("cargo-audit execution failed: timed out after 10 minutes");
  });

  it("reports AUD003 when failing output cannot be parsed", async () => {
    const findings = await checkVulnerabilities("/work/app", runnerReturning({ stdout: "not json", exitCode: 2 }));
    expect(findings).toHaveLength(1);
    expect(findings[0]?.code).toBe("AUD003");
    expect(findings[0]?.severity).toBe("warning");
    expect(findings[0]?.message).toMatch(/^Failed to parse cargo-audit JSON output: .+\. Output: not json$/);
  });

  it("reports nothing when successful output cannot be parsed", async () => {
    expect(await checkVulnerabilities("/work/app", runnerReturning({ stdout: "not json", exitCode: 0 }))).toEqual([]);
  });

  it("reports AUD004 when cargo audit cannot be started", async () => {
    const runner: AuditRunner = async () => err(new CommandSpawnError("cargo audit --json --quiet", "spawn cargo ENOENT"));
    const findings = await checkVulnerabilities("/work/app", runner);
    expect(findings).toEqual([
      {
        code: "AUD004",
        message:
          "Failed to execute 'cargo audit'. Is it installed and in PATH? Error: Failed to start 'cargo audit --json --quiet': spawn cargo ENOENT",
        severity: "warning",
      },
    ]);
  });
});

describe("parseAuditReport", () => {
  it("rejects JSON without a vulnerabilities list", () => {
    const result = parseAuditReport(JSON.stringify({ database: {} }));
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe("report does not contain a vulnerabilities list");
    }
  });
});
