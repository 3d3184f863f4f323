/**
 * cargo-vitals - health checks for Rust (Cargo) projects
 *
 * @packageDocumentation
 */

// Library utilities
export {
  // Errors
  VitalsError,
  ValidationError,
  ConfigError,
  AnalysisError,
  ProjectPathError,
  NotCargoProjectError,
  ManifestError,
  // Result utilities
  ok,
  err,
  unwrap,
  unwrapOr,
  mapErr,
  tryCatch,
  tryCatchAsync,
  // Logger
  logger,
} from "./lib/index.js";

export type { Result, LogLevel } from "./lib/index.js";

// Core exports
export * from "./core/index.js";
