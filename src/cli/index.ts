#!/usr/bin/env node
/**
 * cargo-vitals CLI entry point
 *
 * Commands:
 * - check (default, alias `vitals`) - Analyze a Cargo project
 * - init                           - Write a starter .cargo-vitals.toml
 * - codes                          - List check codes
 *
 * Installed on PATH as `cargo-vitals`, it also runs as `cargo vitals`.
 */

import { Command } from "commander";

import { VERSION } from "../core/version.js";

import { registerCheckCommand } from "./commands/check.js";
import { registerCodesCommand } from "./commands/codes.js";
import { registerInitCommand } from "./commands/init.js";
import { formatError } from "./formatters.js";

const program = new Command();

program
  .name("cargo-vitals")
  .description("Health checks for Rust projects: code patterns, manifest metadata, dependencies and advisories")
  .version(VERSION);

registerCheckCommand(program);
registerInitCommand(program);
registerCodesCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(formatError(error instanceof Error ? error : new Error(String(error))));
  process.exit(1);
});
