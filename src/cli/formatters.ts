import chalk from "chalk";

import type { AnalysisReport } from "../core/pipeline/types.js";
import type { CheckDescription } from "../core/findings/codes.js";
import type { Finding, Severity } from "../core/findings/finding.js";

/**
 * Output format types
 */
export type OutputFormat = "human" | "json";

const OUTPUT_FORMATS: readonly OutputFormat[] = ["human", "json"];

/**
 * Severity colors for terminal output
 */
const SEVERITY_COLORS: Record<Severity, (text: string) => string> = {
  error: chalk.red.bold,
  warning: chalk.yellow,
  note: chalk.cyan,
};

function formatLocation(finding: Finding): string {
  if (finding.filePath === undefined) {
    return "";
  }
  const line = finding.lineNumber === undefined ? "" : `:${finding.lineNumber}`;
  return ` ${chalk.gray(`[${finding.filePath}${line}]`)}`;
}

/**
 * `[SEVERITY] (CODE): message [file:line]`
 */
export function formatFindingLine(finding: Finding): string {
  const label = SEVERITY_COLORS[finding.severity](`[${finding.severity.toUpperCase()}]`);
  return `${label} (${finding.code}): ${finding.message}${formatLocation(finding)}`;
}

/**
 * Format a report for the terminal: one line per finding, then a summary
 */
export function formatHuman(report: AnalysisReport): string {
  const lines: string[] = [];

  if (report.findings.length === 0) {
    lines.push(chalk.green("✓ No issues found"));
  } else {
    for (const finding of report.findings) {
      lines.push(formatFindingLine(finding));
    }
    lines.push("");
    lines.push(chalk.bold(`Found ${report.findings.length} issues`));

    const { error, warning, note } = report.counts;
    lines.push(chalk.gray(`${error} errors, ${warning} warnings, ${note} notes`));
  }

  if (report.suppressed > 0) {
    lines.push(chalk.gray(`${report.suppressed} suppressed by configuration`));
  }

  return lines.join("\n");
}

/**
 * Format the filtered findings as a JSON array
 */
export function formatJson(report: AnalysisReport): string {
  return JSON.stringify(report.findings, null, 2);
}

export function formatReport(report: AnalysisReport, format: OutputFormat): string {
  switch (format) {
    case "json":
      return formatJson(report);
    case "human":
    default:
      return formatHuman(report);
  }
}

/**
 * Format the check code catalog
 */
export function formatCodes(catalog: readonly CheckDescription[], format: OutputFormat): string {
  if (format === "json") {
    return JSON.stringify(catalog, null, 2);
  }

  const codeWidth = Math.max(...catalog.map((entry) => entry.code.length));
  return catalog
    .map((entry) => {
      const severity = SEVERITY_COLORS[entry.severity](entry.severity.padEnd(7));
      return `${chalk.bold(entry.code.padEnd(codeWidth))}  ${severity}  ${entry.description}`;
    })
    .join("\n");
}

/**
 * Validate output format string
 */
export function isValidOutputFormat(format: string): format is OutputFormat {
  return OUTPUT_FORMATS.some((candidate) => candidate === format);
}

/**
 * Format an error for terminal output
 */
export function formatError(error: Error): string {
  return chalk.red(`Error: ${error.message}`);
}

/**
 * Format a warning for terminal output
 */
export function formatWarning(message: string): string {
  return chalk.yellow(`Warning: ${message}`);
}

/**
 * Format a success message for terminal output
 */
export function formatSuccess(message: string): string {
  return chalk.green(`✓ ${message}`);
}
