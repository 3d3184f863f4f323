import { readFile } from "fs/promises";

import { DEFAULT_CONCURRENCY, mapWithConcurrency } from "../../lib/concurrency.js";
import { logger } from "../../lib/logger.js";
import { mapErr, tryCatchAsync } from "../../lib/result.js";
import { FileReadError } from "../findings/degraded.js";
import { createFinding, withLine } from "../findings/finding.js";

import { classifyFile, toProjectPath } from "./file-context.js";
import { renderMessage, ruleApplies } from "./rules.js";

import type { Result } from "../../lib/result.js";
import type { Finding } from "../findings/finding.js";
import type { FileContext } from "./file-context.js";
import type { PatternRule } from "./rules.js";

export interface PatternScannerOptions {
  /** Maximum files read and scanned at once */
  concurrency?: number;
}

/**
 * PatternScanner - line-level rule matching over Rust sources
 *
 * Files are independent: each one is read and scanned on its own, with
 * findings in ascending line order (rule order within a line).
 *
 * @example
 * ```typescript
 * const rules = unwrap(await loadPatternRules());
 * const scanner = new PatternScanner(rules, { concurrency: 4 });
 * const findings = await scanner.scanFiles(files, projectRoot);
 * ```
 */
export class PatternScanner {
  private readonly rules: readonly PatternRule[];
  private readonly concurrency: number;
  private readonly log = logger.child("PatternScanner");

  constructor(rules: readonly PatternRule[], options: PatternScannerOptions = {}) {
    this.rules = rules;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  }

  /**
   * Match every line of already-read content
   */
  scanContent(content: string, projectPath: string, context: FileContext = classifyFile(projectPath)): Finding[] {
    const applicable = this.rules.filter((rule) => ruleApplies(rule, context));
    if (applicable.length === 0) {
      return [];
    }

    const findings: Finding[] = [];
    const lines = content.split(/\r?\n/);

    lines.forEach((line, index) => {
      for (const rule of applicable) {
        const match = rule.regex.exec(line);
        if (match) {
          const finding = createFinding(rule.code, renderMessage(rule.message, match), rule.severity, projectPath);
          findings.push(withLine(finding, index + 1));
        }
      }
    });

    return findings;
  }

  /**
   * Read and scan one file. A read failure yields its IO001 finding and
   * no line findings.
   */
  async scanFile(filePath: string, projectRoot: string): Promise<Finding[]> {
    const projectPath = toProjectPath(projectRoot, filePath);
    const contentResult = await this.readSource(filePath, projectPath);

    if (!contentResult.success) {
      this.log.warn(contentResult.error.message);
      return [contentResult.error.toFinding()];
    }

    return this.scanContent(contentResult.data, projectPath);
  }

  /**
   * Scan files on a bounded worker pool; results keep input order
   */
  async scanFiles(files: readonly string[], projectRoot: string): Promise<Finding[]> {
    this.log.debug(`Scanning ${files.length} files with ${this.rules.length} rules`);
    const perFile = await mapWithConcurrency(files, this.concurrency, (file) => this.scanFile(file, projectRoot));
    return perFile.flat();
  }

  private async readSource(filePath: string, projectPath: string): Promise<Result<string, FileReadError>> {
    const result = await tryCatchAsync(() => readFile(filePath, "utf-8"));
    return mapErr(result, (error) => new FileReadError(projectPath, error.message));
  }
}

/**
 * Create a PatternScanner instance
 */
export function createPatternScanner(rules: readonly PatternRule[], options?: PatternScannerOptions): PatternScanner {
  return new PatternScanner(rules, options);
}
