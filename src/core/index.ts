/**
 * Core analysis engine
 *
 * This module contains:
 * - findings/     - Finding model, check codes, degraded-check errors
 * - config/       - Per-check enable/disable registry
 * - manifest/     - Cargo.toml model and validation
 * - detection/    - Source file collection and pattern scanning
 * - structure/    - Project layout and lint configuration checks
 * - dependencies/ - Dependency graph, crates.io freshness, cargo audit
 * - pipeline/     - Orchestration of all checks into one report
 */

export { VERSION } from "./version.js";

// Findings
export {
  SEVERITIES,
  SeveritySchema,
  createFinding,
  withLine,
  isBlocking,
  compareSeverity,
  type Finding,
  type Severity,
} from "./findings/finding.js";
export {
  CHECK_CODES,
  CHECK_CATALOG,
  UNGATED_CODES,
  isKnownCheckCode,
  type CheckCode,
  type CheckDescription,
} from "./findings/codes.js";
export {
  DegradedCheckError,
  FileReadError,
  RegistryFetchError,
  AuditError,
  DependencyGraphError,
} from "./findings/degraded.js";

// Configuration
export {
  CheckRegistry,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG_TEMPLATE,
  ConfigFileSchema,
  loadCheckRegistry,
  parseConfig,
  type ConfigFile,
} from "./config/check-registry.js";

// Manifest
export {
  CargoManifestSchema,
  isLocalDependency,
  dependencyVersion,
  type CargoManifest,
  type Dependency,
  type Package,
} from "./manifest/schema.js";
export { loadManifest, parseManifest, MANIFEST_FILE_NAME } from "./manifest/loader.js";
export {
  checkMissingMetadata,
  checkDependencyVersions,
  checkEdition,
  LATEST_STABLE_EDITION,
} from "./manifest/validator.js";

// Detection
export { collectSourceFiles, SOURCE_ROOTS } from "./detection/file-collector.js";
export { classifyFile, type FileContext } from "./detection/file-context.js";
export { loadPatternRules, compileRules, type PatternRule } from "./detection/rules.js";
export {
  PatternScanner,
  createPatternScanner,
  type PatternScannerOptions,
} from "./detection/pattern-scanner.js";

// Structure
export { checkProjectStructure, checkDeniedLints } from "./structure/project-structure.js";

// Dependencies
export {
  loadDependencyGraph,
  graphFromLockfile,
  graphFromMetadata,
  resolveWorkspaceMemberNames,
  type DependencyGraph,
  type DependencyGraphLoader,
  type WorkspaceMember,
  type ResolvedDependency,
  type DependencySource,
} from "./dependencies/graph.js";
export {
  CratesIoClient,
  createCratesIoClient,
  DEFAULT_REGISTRY_URL,
  REGISTRY_URL_ENV,
  type RegistryClient,
  type CratesIoClientConfig,
} from "./dependencies/registry-client.js";
export { checkOutdatedDependencies } from "./dependencies/freshness.js";
export { checkVulnerabilities, defaultAuditRunner, type AuditRunner } from "./dependencies/audit.js";

// Pipeline
export {
  AnalysisPipeline,
  PipelineStateMachine,
  createPipeline,
  analyzeProject,
} from "./pipeline/orchestrator.js";
export { filterFindings, mergeFindings, compareFindings, countBySeverity } from "./pipeline/aggregate.js";
export {
  PIPELINE_STATES,
  type PipelineState,
  type PipelineOptions,
  type AnalysisReport,
  type SeverityCounts,
} from "./pipeline/types.js";
