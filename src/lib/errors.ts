/**
 * Base error class for all cargo-vitals errors
 */
export class VitalsError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "VitalsError";
    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or JSON output
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Error for schema validation failures
 */
export class ValidationError extends VitalsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * Error for configuration issues
 */
export class ConfigError extends VitalsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}

/**
 * Error during project analysis
 */
export class AnalysisError extends VitalsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "ANALYSIS_ERROR", context);
    this.name = "AnalysisError";
  }
}

/**
 * The project path does not exist or cannot be canonicalized
 */
export class ProjectPathError extends VitalsError {
  constructor(projectPath: string, cause?: string) {
    super(`Could not resolve project path: ${projectPath}`, "UNRESOLVABLE_PROJECT_PATH", {
      projectPath,
      cause,
    });
    this.name = "ProjectPathError";
  }
}

/**
 * The project directory has no Cargo.toml
 */
export class NotCargoProjectError extends VitalsError {
  constructor(projectRoot: string) {
    super(`Not a Rust project (no Cargo.toml found in ${projectRoot})`, "NOT_CARGO_PROJECT", {
      projectRoot,
    });
    this.name = "NotCargoProjectError";
  }
}

/**
 * Cargo.toml could not be read or does not match the manifest schema
 */
export class ManifestError extends VitalsError {
  constructor(message: string, public readonly manifestPath: string, context?: Record<string, unknown>) {
    super(message, "MANIFEST_ERROR", { ...context, manifestPath });
    this.name = "ManifestError";
  }
}
