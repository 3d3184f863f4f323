import { resolve } from "path";

import { Command } from "commander";
import { describe, it, expect } from "vitest";

import { parseCheckOptions, registerCheckCommand } from "@/cli/commands/check.js";

describe("check command", () => {
  it("registers as the default command with its alias", () => {
    const program = new Command();
    registerCheckCommand(program);

    const check = program.commands.find((c) => c.name() === "check");
    expect(check).toBeDefined();
    expect(check?.aliases()).toEqual(["vitals"]);
    expect(check?.options.map((o) => o.long)).toEqual([
      "--project-path",
      "--format",
      "--offline",
      "--no-audit",
      "--registry-url",
      "--verbose",
      "--quiet",
    ]);
  });

  describe("parseCheckOptions", () => {
    it("applies defaults", () => {
      const result = parseCheckOptions({ format: "human", projectPath: ".", audit: true }, "/work");
      expect(result).toEqual({
        success: true,
        data: {
          projectPath: resolve("/work", "."),
          format: "human",
          skipRegistry: false,
          skipAudit: false,
          verbose: false,
          quiet: false,
        },
      });
    });

    it("maps --offline and --no-audit to skip flags", () => {
      const result = parseCheckOptions({ offline: true, audit: false, projectPath: "crates/core" }, "/work");
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.skipRegistry).toBe(true);
        expect(result.data.skipAudit).toBe(true);
        expect(result.data.projectPath).toBe(resolve("/work", "crates/core"));
      }
    });

    it("rejects unknown output formats", () => {
      const result = parseCheckOptions({ format: "sarif" }, "/work");
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe("VALIDATION_ERROR");
        expect(result.error.message).toBe("Invalid output format: sarif. Use: human, json");
      }
    });

    it("accepts a registry URL", () => {
      const result = parseCheckOptions({ registryUrl: "http://localhost:8080/api/v1/crates" }, "/work");
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.registryUrl).toBe("http://localhost:8080/api/v1/crates");
      }
    });

    it("rejects a malformed registry URL", () => {
      const result = parseCheckOptions({ registryUrl: "not a url" }, "/work");
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe("Invalid registry URL: not a url");
      }
    });
  });
});
