/**
 * Pipeline types
 */

import type { CheckRegistry } from "../config/check-registry.js";
import type { AuditRunner } from "../dependencies/audit.js";
import type { DependencyGraphLoader } from "../dependencies/graph.js";
import type { RegistryClient } from "../dependencies/registry-client.js";
import type { PatternRule } from "../detection/rules.js";
import type { Finding, Severity } from "../findings/finding.js";
import type { CargoManifest } from "../manifest/schema.js";

/**
 * Run states, in the only order they may be entered
 */
export const PIPELINE_STATES = [
  "init",
  "collecting",
  "scanning",
  "merging",
  "filtering",
  "reported",
  "terminal",
] as const;

export type PipelineState = (typeof PIPELINE_STATES)[number];

export type SeverityCounts = Record<Severity, number>;

export interface AnalysisReport {
  /** Canonical project root */
  projectRoot: string;
  /** Enabled findings, sorted */
  findings: Finding[];
  /** Number of findings removed by configuration */
  suppressed: number;
  counts: SeverityCounts;
  durationMs: number;
  /** 1 when any error or warning remains, else 0 */
  exitCode: 0 | 1;
}

export interface PipelineOptions {
  /** Files scanned at once (default: 8) */
  concurrency: number;
  /** crates.io lookups (default: CratesIoClient) */
  registryClient?: RegistryClient;
  /** `cargo audit` invocation (default: spawn) */
  auditRunner?: AuditRunner;
  /** Resolved dependency graph (default: Cargo.lock, then cargo metadata) */
  loadDependencyGraph?: DependencyGraphLoader;
  /** Pattern rules (default: bundled code-patterns.yaml) */
  rules?: readonly PatternRule[];
  /** Skip the registry freshness check */
  skipRegistry: boolean;
  /** Skip the cargo audit subprocess */
  skipAudit: boolean;
  /** Observer for every state transition */
  onStateChange?: (state: PipelineState) => void;
}

/**
 * Inputs built while collecting, shared read-only by the scanning tasks
 */
export interface CollectedInputs {
  projectRoot: string;
  registry: CheckRegistry;
  manifest: CargoManifest;
  files: string[];
}
