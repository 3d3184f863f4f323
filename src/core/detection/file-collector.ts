import { stat } from "fs/promises";
import { join } from "path";

import { glob } from "glob";

import { logger } from "../../lib/logger.js";
import { tryCatchAsync } from "../../lib/result.js";

/**
 * Project subdirectories that hold Rust sources
 */
export const SOURCE_ROOTS = ["src", "tests", "examples", "benches"] as const;

export const SOURCE_EXTENSION = ".rs";

const log = logger.child("Collector");

/**
 * Enumerate Rust source files under the recognized subdirectories.
 *
 * Best effort: missing roots are skipped and a root that cannot be walked
 * is logged and skipped. Returns absolute paths, deduplicated and sorted.
 */
export async function collectSourceFiles(projectRoot: string): Promise<string[]> {
  const files = new Set<string>();

  for (const root of SOURCE_ROOTS) {
    const rootPath = join(projectRoot, root);

    const statResult = await tryCatchAsync(() => stat(rootPath));
    if (!statResult.success || !statResult.data.isDirectory()) {
      continue;
    }

    const walkResult = await tryCatchAsync(() =>
      glob(`**/*${SOURCE_EXTENSION}`, {
        cwd: rootPath,
        absolute: true,
        nodir: true,
        dot: false,
        follow: false,
      })
    );

    if (!walkResult.success) {
      log.debug(`Skipping ${rootPath}: ${walkResult.error.message}`);
      continue;
    }

    for (const file of walkResult.data) {
      files.add(file);
    }
  }

  const collected = [...files].sort();
  log.debug(`Collected ${collected.length} source files`);
  return collected;
}
