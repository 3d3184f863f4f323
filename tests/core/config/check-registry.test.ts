import { mkdtemp, mkdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import {
  CheckRegistry,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG_TEMPLATE,
  loadCheckRegistry,
  parseConfig,
} from "@/core/config/check-registry.js";

describe("CheckRegistry", () => {
  it("enables unlisted codes", () => {
    const registry = new CheckRegistry();
    expect(registry.isEnabled("CODE001")).toBe(true);
    expect(registry.disabledCodes()).toEqual([]);
  });

  it("honors explicit switches", () => {
    const registry = CheckRegistry.fromRecord({ MD001: false, CODE004: true });
    expect(registry.isEnabled("MD001")).toBe(false);
    expect(registry.isEnabled("CODE004")).toBe(true);
    expect(registry.disabledCodes()).toEqual(["MD001"]);
  });
});

describe("parseConfig", () => {
  it("reads the checks table", () => {
    const result = parseConfig("[general]\n\n[checks]\nenabled = { MD001 = false, CODE004 = true }\n");
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.isEnabled("MD001")).toBe(false);
      expect(result.data.isEnabled("CODE004")).toBe(true);
    }
  });

  it("accepts an empty file", () => {
    const result = parseConfig("");
    expect(result.success).toBe(true);
  });

  it("accepts the init template", () => {
    const result = parseConfig(DEFAULT_CONFIG_TEMPLATE);
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.disabledCodes()).toEqual([]);
    }
  });

  it("rejects unknown keys", () => {
    const result = parseConfig("[checks]\ndisabled = [\"MD001\"]\n", "test.toml");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toContain("Invalid config file test.toml");
      expect(result.error.message).toContain("checks");
    }
  });

  it("rejects non-boolean switches", () => {
    const result = parseConfig("[checks]\nenabled = { MD001 = \"off\" }\n");
    expect(result.success).toBe(false);
  });

  it("reports TOML syntax errors", () => {
    const result = parseConfig("[checks\n", "broken.toml");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toMatch(/^Failed to parse config file broken\.toml: /);
    }
  });
});

describe("loadCheckRegistry", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "vitals-config-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("defaults to everything enabled without a file", async () => {
    const result = await loadCheckRegistry(root);
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.disabledCodes()).toEqual([]);
    }
  });

  it("loads the project file", async () => {
    await writeFile(join(root, CONFIG_FILE_NAME), "[checks]\nenabled = { LINT001 = false }\n");
    const result = await loadCheckRegistry(root);
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.isEnabled("LINT001")).toBe(false);
    }
  });

  it("fails when the config path cannot be read", async () => {
    await mkdir(join(root, CONFIG_FILE_NAME));
    const result = await loadCheckRegistry(root);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toContain("Failed to read config file");
    }
  });
});
