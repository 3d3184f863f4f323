/**
 * Init command - write a starter configuration file
 */

import { writeFile } from "fs/promises";
import { join, resolve } from "path";

import chalk from "chalk";

import { CONFIG_FILE_NAME, DEFAULT_CONFIG_TEMPLATE } from "../../core/config/check-registry.js";
import { ConfigError } from "../../lib/errors.js";
import { ok, err, tryCatchAsync } from "../../lib/result.js";
import { formatError, formatSuccess, formatWarning } from "../formatters.js";

import type { Command } from "commander";
import type { Result } from "../../lib/result.js";

export interface InitOutcome {
  configPath: string;
  /** False when the file existed and was left untouched */
  written: boolean;
}

/**
 * Write `.cargo-vitals.toml` into a directory. An existing file is only
 * replaced when `force` is set.
 */
export async function writeConfigFile(directory: string, force: boolean): Promise<Result<InitOutcome, ConfigError>> {
  const configPath = join(directory, CONFIG_FILE_NAME);
  const result = await tryCatchAsync(() =>
    writeFile(configPath, DEFAULT_CONFIG_TEMPLATE, { encoding: "utf-8", flag: force ? "w" : "wx" })
  );

  if (result.success) {
    return ok({ configPath, written: true });
  }

  if ("code" in result.error && result.error.code === "EEXIST") {
    return ok({ configPath, written: false });
  }

  return err(new ConfigError(`Failed to write ${configPath}: ${result.error.message}`, { configPath }));
}

export function registerInitCommand(program: Command): void {
  program
    .command("init [path]")
    .description(`Create a starter ${CONFIG_FILE_NAME} in the project`)
    .option("--force", "Overwrite existing configuration")
    .action(async (targetPath: string | undefined, options: Record<string, unknown>) => {
      const directory = resolve(targetPath ?? process.cwd());
      const result = await writeConfigFile(directory, Boolean(options["force"]));

      if (!result.success) {
        console.error(formatError(result.error));
        process.exitCode = 1;
        return;
      }

      if (!result.data.written) {
        console.log(formatWarning(`Configuration file already exists at ${result.data.configPath}`));
        console.log(chalk.gray("Use --force to overwrite."));
        return;
      }

      console.log(formatSuccess(`Created ${result.data.configPath}`));
    });
}
