/**
 * Library vs. application classification of source files
 *
 * Pure path-shape heuristic, no I/O. Application files (binaries, the
 * build script, tests, examples, benches) are exempt from the
 * library-only pattern rules.
 */

import { relative, sep } from "path";

export type FileContext = "library" | "application";

/** Library root; exempt so binary-only crates can keep their logic there */
export const LIBRARY_ROOT = "src/lib.rs";
export const ENTRY_POINT_NAME = "main.rs";
export const BINARIES_SEGMENT = "bin";
export const BUILD_SCRIPT = "build.rs";

/**
 * Project-relative, forward-slash path for a file under the project root
 */
export function toProjectPath(projectRoot: string, filePath: string): string {
  return relative(projectRoot, filePath).split(sep).join("/");
}

/**
 * Classify a project-relative path (forward or back slashes)
 */
export function classifyFile(projectPath: string): FileContext {
  const normalized = projectPath.replace(/\\/g, "/").replace(/^\.\//, "");
  const segments = normalized.split("/");
  const fileName = segments[segments.length - 1];

  if (normalized === BUILD_SCRIPT) return "application";
  if (segments[0] !== "src") return "application";
  if (normalized === LIBRARY_ROOT) return "application";
  if (fileName === ENTRY_POINT_NAME) return "application";
  if (segments.slice(1, -1).includes(BINARIES_SEGMENT)) return "application";

  return "library";
}
