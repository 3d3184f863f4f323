/**
 * Check command - run every health check against a Cargo project
 */

import { resolve } from "path";

import ora from "ora";

import { createCratesIoClient } from "../../core/dependencies/registry-client.js";
import { createPipeline } from "../../core/pipeline/orchestrator.js";
import { ValidationError } from "../../lib/errors.js";
import { logger } from "../../lib/logger.js";
import { ok, err } from "../../lib/result.js";
import { formatError, formatReport, isValidOutputFormat } from "../formatters.js";

import type { Command } from "commander";
import type { PipelineState } from "../../core/pipeline/types.js";
import type { Result } from "../../lib/result.js";
import type { OutputFormat } from "../formatters.js";

/** Exit status when the project cannot be analyzed at all */
export const EXIT_ENVIRONMENT_ERROR = 2;

export interface CheckSettings {
  projectPath: string;
  format: OutputFormat;
  skipRegistry: boolean;
  skipAudit: boolean;
  registryUrl?: string;
  verbose: boolean;
  quiet: boolean;
}

const STATE_MESSAGES: Partial<Record<PipelineState, string>> = {
  collecting: "Reading Cargo.toml and collecting sources...",
  scanning: "Running checks...",
  merging: "Merging findings...",
  filtering: "Applying configuration...",
};

/**
 * Validate raw commander options
 */
export function parseCheckOptions(
  options: Record<string, unknown>,
  cwd: string = process.cwd()
): Result<CheckSettings, ValidationError> {
  const format = String(options["format"] ?? "human");
  if (!isValidOutputFormat(format)) {
    return err(new ValidationError(`Invalid output format: ${format}. Use: human, json`, { format }));
  }

  const rawPath = options["projectPath"];
  const settings: CheckSettings = {
    projectPath: resolve(cwd, typeof rawPath === "string" ? rawPath : "."),
    format,
    skipRegistry: Boolean(options["offline"]),
    skipAudit: options["audit"] === false,
    verbose: Boolean(options["verbose"]),
    quiet: Boolean(options["quiet"]),
  };

  const registryUrl = options["registryUrl"];
  if (typeof registryUrl === "string") {
    if (!URL.canParse(registryUrl)) {
      return err(new ValidationError(`Invalid registry URL: ${registryUrl}`, { registryUrl }));
    }
    settings.registryUrl = registryUrl;
  }

  return ok(settings);
}

export function registerCheckCommand(program: Command): void {
  program
    .command("check", { isDefault: true })
    .alias("vitals")
    .description("Check a Rust project for quality, structure, dependency and security issues")
    .option("-p, --project-path <path>", "Path to the Cargo project", ".")
    .option("-f, --format <format>", "Output format: human, json", "human")
    .option("--offline", "Skip the crates.io freshness check")
    .option("--no-audit", "Skip the cargo audit vulnerability scan")
    .option("--registry-url <url>", "crates.io API base URL (default: $CARGO_VITALS_REGISTRY_URL or crates.io)")
    .option("-v, --verbose", "Verbose output")
    .option("-q, --quiet", "Quiet mode (errors only)")
    .action(async (options: Record<string, unknown>) => {
      const settingsResult = parseCheckOptions(options);
      if (!settingsResult.success) {
        console.error(formatError(settingsResult.error));
        process.exitCode = EXIT_ENVIRONMENT_ERROR;
        return;
      }
      const settings = settingsResult.data;

      // stdout carries only the report in JSON mode
      if (settings.quiet || settings.format === "json") {
        logger.configure({ level: "error" });
      } else if (settings.verbose) {
        logger.configure({ level: "debug" });
      } else {
        logger.configure({ level: "warn" });
      }

      const showSpinner = settings.format === "human" && !settings.quiet && !settings.verbose;
      const spinner = showSpinner ? ora("Resolving project...").start() : null;

      const registryClient = settings.skipRegistry
        ? undefined
        : createCratesIoClient(settings.registryUrl === undefined ? {} : { baseUrl: settings.registryUrl });

      const pipeline = createPipeline({
        skipRegistry: settings.skipRegistry,
        skipAudit: settings.skipAudit,
        ...(registryClient ? { registryClient } : {}),
        onStateChange: (state) => {
          const message = STATE_MESSAGES[state];
          if (spinner && message) {
            spinner.text = message;
          }
        },
      });

      const result = await pipeline.run(settings.projectPath);

      if (!result.success) {
        spinner?.fail("Analysis failed");
        console.error(formatError(result.error));
        process.exitCode = EXIT_ENVIRONMENT_ERROR;
        return;
      }

      spinner?.stop();
      console.log(formatReport(result.data, settings.format));
      process.exitCode = result.data.exitCode;
    });
}
