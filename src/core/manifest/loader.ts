import { readFile } from "fs/promises";
import { join } from "path";

import { parse as parseToml } from "smol-toml";

import { ManifestError } from "../../lib/errors.js";
import { ok, err, tryCatch, tryCatchAsync } from "../../lib/result.js";

import { CargoManifestSchema } from "./schema.js";

import type { CargoManifest } from "./schema.js";
import type { Result } from "../../lib/result.js";

export const MANIFEST_FILE_NAME = "Cargo.toml";

/**
 * Parse Cargo.toml content into the manifest model
 */
export function parseManifest(content: string, manifestPath: string = MANIFEST_FILE_NAME): Result<CargoManifest, ManifestError> {
  const tomlResult = tryCatch(() => parseToml(content));
  if (!tomlResult.success) {
    return err(new ManifestError(`Failed to parse ${manifestPath}: ${tomlResult.error.message}`, manifestPath));
  }

  const parsed = CargoManifestSchema.safeParse(tomlResult.data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    return err(new ManifestError(`Invalid manifest ${manifestPath}: ${issues.join("; ")}`, manifestPath, { issues }));
  }

  return ok(parsed.data);
}

/**
 * Read and parse `Cargo.toml` from a project root
 */
export async function loadManifest(projectRoot: string): Promise<Result<CargoManifest, ManifestError>> {
  const manifestPath = join(projectRoot, MANIFEST_FILE_NAME);
  const contentResult = await tryCatchAsync(() => readFile(manifestPath, "utf-8"));
  if (!contentResult.success) {
    return err(new ManifestError(`Failed to read ${manifestPath}: ${contentResult.error.message}`, manifestPath));
  }
  return parseManifest(contentResult.data, manifestPath);
}
