// Error classes
export {
  VitalsError,
  ValidationError,
  ConfigError,
  AnalysisError,
  ProjectPathError,
  NotCargoProjectError,
  ManifestError,
} from "./errors.js";

// Result type and utilities
export { ok, err, unwrap, unwrapOr, mapErr, tryCatch, tryCatchAsync } from "./result.js";
export type { Result } from "./result.js";

// Logger
export { logger } from "./logger.js";
export type { LogLevel } from "./logger.js";

// Subprocesses and concurrency
export { runCommand, CommandSpawnError } from "./command.js";
export type { CommandOutput } from "./command.js";
export { mapWithConcurrency, DEFAULT_CONCURRENCY } from "./concurrency.js";
