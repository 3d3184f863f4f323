/**
 * Check Registry
 *
 * Per-check enable/disable switches loaded from `.cargo-vitals.toml`.
 * A code that is not listed is enabled.
 *
 * @example
 * ```toml
 * [general]
 *
 * [checks]
 * enabled = { MD001 = false, CODE004 = true }
 * ```
 */

import { readFile, stat } from "fs/promises";
import { join } from "path";

import { parse as parseToml } from "smol-toml";
import { z } from "zod";

import { ConfigError } from "../../lib/errors.js";
import { ok, err, tryCatch, tryCatchAsync } from "../../lib/result.js";

import type { Result } from "../../lib/result.js";

export const CONFIG_FILE_NAME = ".cargo-vitals.toml";

/**
 * Configuration file schema; unknown keys are rejected at every level
 */
export const ConfigFileSchema = z
  .object({
    general: z.object({}).strict().default({}),
    checks: z
      .object({
        enabled: z.record(z.string(), z.boolean()).default({}),
      })
      .strict()
      .default({}),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export class CheckRegistry {
  private readonly switches: ReadonlyMap<string, boolean>;

  constructor(switches: Iterable<readonly [string, boolean]> = []) {
    this.switches = new Map(switches);
  }

  static fromRecord(enabled: Record<string, boolean>): CheckRegistry {
    return new CheckRegistry(Object.entries(enabled));
  }

  /**
   * Whether a check runs and its findings are reported; defaults to true
   */
  isEnabled(code: string): boolean {
    return this.switches.get(code) ?? true;
  }

  disabledCodes(): string[] {
    return [...this.switches].filter(([, enabled]) => !enabled).map(([code]) => code);
  }
}

/**
 * Parse configuration file content
 */
export function parseConfig(content: string, source: string = CONFIG_FILE_NAME): Result<CheckRegistry, ConfigError> {
  const tomlResult = tryCatch(() => parseToml(content));
  if (!tomlResult.success) {
    return err(new ConfigError(`Failed to parse config file ${source}: ${tomlResult.error.message}`, { source }));
  }

  const parsed = ConfigFileSchema.safeParse(tomlResult.data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`);
    return err(new ConfigError(`Invalid config file ${source}: ${issues.join("; ")}`, { source, issues }));
  }

  return ok(CheckRegistry.fromRecord(parsed.data.checks.enabled));
}

/**
 * Load the registry from the project root. A missing file yields the
 * default (everything enabled).
 */
export async function loadCheckRegistry(projectRoot: string): Promise<Result<CheckRegistry, ConfigError>> {
  const configPath = join(projectRoot, CONFIG_FILE_NAME);

  const statResult = await tryCatchAsync(() => stat(configPath));
  if (!statResult.success) {
    return ok(new CheckRegistry());
  }

  const contentResult = await tryCatchAsync(() => readFile(configPath, "utf-8"));
  if (!contentResult.success) {
    return err(
      new ConfigError(`Failed to read config file ${configPath}: ${contentResult.error.message}`, {
        source: configPath,
      })
    );
  }

  return parseConfig(contentResult.data, configPath);
}

/**
 * Starter configuration written by `cargo-vitals init`
 */
export const DEFAULT_CONFIG_TEMPLATE = `# cargo-vitals configuration
# Every check is enabled unless switched off here.
# Run \`cargo-vitals codes\` for the list of check codes.

[general]

[checks]
enabled = { }
`;
