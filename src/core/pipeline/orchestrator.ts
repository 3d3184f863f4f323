/**
 * AnalysisPipeline - runs every check against a Cargo project
 *
 * Collects the read-only inputs, forks the three independent check groups
 * (source patterns, manifest, dependencies), then merges, filters and
 * reports their findings.
 *
 * @example
 * ```typescript
 * const pipeline = new AnalysisPipeline({ skipAudit: true });
 * const result = await pipeline.run("./my-crate");
 *
 * if (result.success) {
 *   console.log(`${result.data.findings.length} findings`);
 *   process.exitCode = result.data.exitCode;
 * }
 * ```
 */

import { realpath, stat } from "fs/promises";
import { join } from "path";

import { DEFAULT_CONCURRENCY } from "../../lib/concurrency.js";
import { AnalysisError, NotCargoProjectError, ProjectPathError } from "../../lib/errors.js";
import { logger } from "../../lib/logger.js";
import { ok, err, tryCatchAsync } from "../../lib/result.js";
import { loadCheckRegistry, CheckRegistry } from "../config/check-registry.js";
import { checkVulnerabilities, defaultAuditRunner } from "../dependencies/audit.js";
import { checkOutdatedDependencies } from "../dependencies/freshness.js";
import { loadDependencyGraph } from "../dependencies/graph.js";
import { CratesIoClient } from "../dependencies/registry-client.js";
import { collectSourceFiles } from "../detection/file-collector.js";
import { PatternScanner } from "../detection/pattern-scanner.js";
import { loadPatternRules } from "../detection/rules.js";
import { CHECK_CODES } from "../findings/codes.js";
import { loadManifest, MANIFEST_FILE_NAME } from "../manifest/loader.js";
import { checkDependencyVersions, checkEdition, checkMissingMetadata } from "../manifest/validator.js";
import { checkDeniedLints, checkProjectStructure } from "../structure/project-structure.js";

import { countBySeverity, filterFindings, hasBlockingFindings, mergeFindings } from "./aggregate.js";
import { PIPELINE_STATES } from "./types.js";

import type { VitalsError } from "../../lib/errors.js";
import type { Result } from "../../lib/result.js";
import type { PatternRule } from "../detection/rules.js";
import type { Finding } from "../findings/finding.js";

import type { AnalysisReport, CollectedInputs, PipelineOptions, PipelineState } from "./types.js";

/** Codes the registry branch can emit */
const REGISTRY_BRANCH_CODES = [
  CHECK_CODES.OUTDATED_DEPENDENCY,
  CHECK_CODES.DEPENDENCY_GRAPH_UNAVAILABLE,
  CHECK_CODES.API_FETCH_FAILED,
] as const;

/** Codes the audit branch can emit */
const AUDIT_BRANCH_CODES = [
  CHECK_CODES.VULNERABILITY,
  CHECK_CODES.AUDIT_FAILED,
  CHECK_CODES.AUDIT_AMBIGUOUS,
  CHECK_CODES.AUDIT_UNPARSEABLE,
  CHECK_CODES.AUDIT_UNAVAILABLE,
] as const;

const DEFAULT_OPTIONS: PipelineOptions = {
  concurrency: DEFAULT_CONCURRENCY,
  skipRegistry: false,
  skipAudit: false,
};

/**
 * Forward-only state tracker for a single run
 */
export class PipelineStateMachine {
  private index = 0;

  constructor(private readonly onChange?: (state: PipelineState) => void) {
    this.onChange?.(PIPELINE_STATES[0]);
  }

  get current(): PipelineState {
    return PIPELINE_STATES[this.index] ?? "terminal";
  }

  /**
   * Enter a later state. States may be skipped but never re-entered.
   *
   * @throws AnalysisError on a backwards or repeated transition
   */
  advance(next: PipelineState): void {
    const nextIndex = PIPELINE_STATES.indexOf(next);
    if (nextIndex <= this.index) {
      throw new AnalysisError(`Invalid pipeline transition: ${this.current} -> ${next}`, {
        from: this.current,
        to: next,
      });
    }
    this.index = nextIndex;
    this.onChange?.(next);
  }
}

export class AnalysisPipeline {
  private readonly options: PipelineOptions;
  private readonly log = logger.child("Pipeline");

  constructor(options: Partial<PipelineOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Analyze the project at `projectPath`.
   *
   * Only environment errors (unresolvable path, missing or broken
   * Cargo.toml, unloadable rules) fail the result; every check failure
   * arrives as a finding.
   */
  async run(projectPath: string): Promise<Result<AnalysisReport, VitalsError>> {
    const startedAt = Date.now();
    const machine = new PipelineStateMachine(this.options.onStateChange);

    const rootResult = await tryCatchAsync(() => realpath(projectPath));
    if (!rootResult.success) {
      return this.abort(machine, new ProjectPathError(projectPath, rootResult.error.message));
    }
    const projectRoot = rootResult.data;
    this.log.info(`Analyzing ${projectRoot}`);

    machine.advance("collecting");
    const inputsResult = await this.collect(projectRoot);
    if (!inputsResult.success) {
      return this.abort(machine, inputsResult.error);
    }
    const { inputs, rules } = inputsResult.data;

    machine.advance("scanning");
    const groups = await Promise.all([
      this.scanSources(inputs, rules),
      this.checkManifest(inputs),
      this.checkDependencies(inputs),
    ]);

    machine.advance("merging");
    const merged = mergeFindings(groups);

    machine.advance("filtering");
    const { kept, suppressed } = filterFindings(merged, inputs.registry);
    if (suppressed > 0) {
      this.log.debug(`Suppressed ${suppressed} findings disabled by configuration`);
    }

    machine.advance("reported");
    const report: AnalysisReport = {
      projectRoot,
      findings: kept,
      suppressed,
      counts: countBySeverity(kept),
      durationMs: Date.now() - startedAt,
      exitCode: hasBlockingFindings(kept) ? 1 : 0,
    };

    machine.advance("terminal");
    this.log.info(`Analysis complete: ${kept.length} findings in ${report.durationMs}ms`);
    return ok(report);
  }

  private abort(machine: PipelineStateMachine, error: VitalsError): Result<never, VitalsError> {
    machine.advance("terminal");
    return err(error);
  }

  private async collect(
    projectRoot: string
  ): Promise<Result<{ inputs: CollectedInputs; rules: readonly PatternRule[] }, VitalsError>> {
    const manifestStat = await tryCatchAsync(() => stat(join(projectRoot, MANIFEST_FILE_NAME)));
    if (!manifestStat.success || !manifestStat.data.isFile()) {
      return err(new NotCargoProjectError(projectRoot));
    }

    const registryResult = await loadCheckRegistry(projectRoot);
    let registry: CheckRegistry;
    if (registryResult.success) {
      registry = registryResult.data;
    } else {
      this.log.warn(`${registryResult.error.message}. Using default configuration.`);
      registry = new CheckRegistry();
    }

    const manifestResult = await loadManifest(projectRoot);
    if (!manifestResult.success) {
      return manifestResult;
    }

    let rules = this.options.rules;
    if (rules === undefined) {
      const rulesResult = await loadPatternRules();
      if (!rulesResult.success) {
        return rulesResult;
      }
      rules = rulesResult.data;
    }

    const files = await collectSourceFiles(projectRoot);
    this.log.debug(`Collected ${files.length} source files`);

    return ok({
      inputs: { projectRoot, registry, manifest: manifestResult.data, files },
      rules,
    });
  }

  private async scanSources(inputs: CollectedInputs, rules: readonly PatternRule[]): Promise<Finding[]> {
    const enabledRules = rules.filter((rule) => inputs.registry.isEnabled(rule.code));
    const scanner = new PatternScanner(enabledRules, { concurrency: this.options.concurrency });
    return scanner.scanFiles(inputs.files, inputs.projectRoot);
  }

  private async checkManifest(inputs: CollectedInputs): Promise<Finding[]> {
    const { projectRoot, manifest, registry } = inputs;
    const [structure, lints] = await Promise.all([
      checkProjectStructure(projectRoot, manifest),
      checkDeniedLints(projectRoot, registry),
    ]);

    return [
      ...checkMissingMetadata(manifest, registry),
      ...checkDependencyVersions(manifest, registry),
      ...checkEdition(manifest),
      ...structure,
      ...lints,
    ];
  }

  private async checkDependencies(inputs: CollectedInputs): Promise<Finding[]> {
    const { projectRoot, registry, manifest } = inputs;
    const findings: Finding[] = [];
    // A branch is skipped only when nothing it could report would survive filtering
    const anyEnabled = (codes: readonly string[]): boolean => codes.some((code) => registry.isEnabled(code));

    if (!this.options.skipRegistry && anyEnabled(REGISTRY_BRANCH_CODES)) {
      const loadGraph = this.options.loadDependencyGraph ?? loadDependencyGraph;
      const graph = await loadGraph(projectRoot, manifest);
      if (graph.success) {
        const client = this.options.registryClient ?? new CratesIoClient();
        findings.push(...(await checkOutdatedDependencies(graph.data, client)));
      } else {
        this.log.warn(graph.error.message);
        findings.push(graph.error.toFinding());
      }
    }

    if (!this.options.skipAudit && anyEnabled(AUDIT_BRANCH_CODES)) {
      findings.push(...(await checkVulnerabilities(projectRoot, this.options.auditRunner ?? defaultAuditRunner)));
    }

    return findings;
  }
}

export function createPipeline(options?: Partial<PipelineOptions>): AnalysisPipeline {
  return new AnalysisPipeline(options);
}

/**
 * Run a one-off analysis with a fresh pipeline
 */
export async function analyzeProject(
  projectPath: string,
  options?: Partial<PipelineOptions>
): Promise<Result<AnalysisReport, VitalsError>> {
  return createPipeline(options).run(projectPath);
}
