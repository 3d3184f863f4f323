/**
 * Codes command - list every check code
 */

import { CHECK_CATALOG } from "../../core/findings/codes.js";
import { formatCodes, formatError, isValidOutputFormat } from "../formatters.js";

import { EXIT_ENVIRONMENT_ERROR } from "./check.js";

import type { Command } from "commander";

export function registerCodesCommand(program: Command): void {
  program
    .command("codes")
    .description("List check codes with their default severity")
    .option("-f, --format <format>", "Output format: human, json", "human")
    .action((options: Record<string, unknown>) => {
      const format = String(options["format"] ?? "human");
      if (!isValidOutputFormat(format)) {
        console.error(formatError(new Error(`Invalid output format: ${format}. Use: human, json`)));
        process.exitCode = EXIT_ENVIRONMENT_ERROR;
        return;
      }
      console.log(formatCodes(CHECK_CATALOG, format));
    });
}
