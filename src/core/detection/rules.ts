/**
 * Pattern rule definitions
 *
 * Rules are data: they are loaded from `definitions/code-patterns.yaml`,
 * validated, and compiled once per run.
 */

import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { dirname, resolve } from "path";
import { fileURLToPath } from "url";

import YAML from "yaml";
import { z } from "zod";

import { ValidationError } from "../../lib/errors.js";
import { ok, err, tryCatch, tryCatchAsync } from "../../lib/result.js";
import { SeveritySchema } from "../findings/finding.js";

import type { Result } from "../../lib/result.js";
import type { FileContext } from "./file-context.js";

const MODULE_DIR = dirname(fileURLToPath(import.meta.url));

const ID_PATTERN = /^[a-z][a-z0-9-]*$/;

export const RuleContextSchema = z.enum(["library", "any"]);

export const PatternRuleDefinitionSchema = z.object({
  id: z.string().regex(ID_PATTERN, "ID must be lowercase letters, numbers and hyphens"),
  code: z.string().regex(/^[A-Z]+[0-9]{3}$/, "Code must look like CODE001"),
  severity: SeveritySchema,
  context: RuleContextSchema,
  /** Regular expression source, matched against one line at a time */
  pattern: z.string().min(1, "Pattern is required"),
  message: z.string().min(1, "Message is required"),
});

export const RuleFileSchema = z.object({
  rules: z.array(PatternRuleDefinitionSchema).min(1),
});

export type RuleContext = z.infer<typeof RuleContextSchema>;
export type PatternRuleDefinition = z.infer<typeof PatternRuleDefinitionSchema>;

export interface PatternRule extends PatternRuleDefinition {
  regex: RegExp;
}

/**
 * Locate the bundled rule file, from sources or from a build under dist/
 */
export function getDefaultRulesPath(): string {
  const candidates = [
    resolve(MODULE_DIR, "definitions/code-patterns.yaml"),
    resolve(MODULE_DIR, "../../../../src/core/detection/definitions/code-patterns.yaml"),
  ];

  for (const candidate of candidates) {
    if (existsSync(candidate)) {
      return candidate;
    }
  }

  return candidates[0] ?? "";
}

/**
 * Validate and compile rule definitions
 */
export function compileRules(input: unknown, source: string = "<inline>"): Result<PatternRule[], ValidationError> {
  const parsed = RuleFileSchema.safeParse(input);
  if (!parsed.success) {
    return err(
      new ValidationError(`Invalid rule definitions in ${source}`, {
        issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      })
    );
  }

  const rules: PatternRule[] = [];
  for (const definition of parsed.data.rules) {
    const regex = tryCatch(() => new RegExp(definition.pattern));
    if (!regex.success) {
      return err(
        new ValidationError(`Invalid pattern for rule ${definition.id}: ${regex.error.message}`, {
          source,
          ruleId: definition.id,
        })
      );
    }
    rules.push({ ...definition, regex: regex.data });
  }

  return ok(rules);
}

/**
 * Load rules from a YAML file (defaults to the bundled definitions)
 */
export async function loadPatternRules(filePath: string = getDefaultRulesPath()): Promise<Result<PatternRule[], ValidationError>> {
  const contentResult = await tryCatchAsync(async () => {
    const content = await readFile(filePath, "utf-8");
    const parsed: unknown = YAML.parse(content);
    return parsed;
  });

  if (!contentResult.success) {
    return err(
      new ValidationError(`Failed to load rule definitions from ${filePath}: ${contentResult.error.message}`, {
        filePath,
      })
    );
  }

  return compileRules(contentResult.data, filePath);
}

/**
 * Whether a rule applies to a file of the given context
 */
export function ruleApplies(rule: PatternRule, context: FileContext): boolean {
  return rule.context === "any" || context === "library";
}

/**
 * Render a rule message, substituting `{n}` with capture group n
 */
export function renderMessage(template: string, match: RegExpExecArray): string {
  return template.replace(/\{(\d+)\}/g, (placeholder, index: string) => match[Number(index)] ?? placeholder);
}
