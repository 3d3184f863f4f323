/**
 * Project structure and lint-configuration checks
 *
 * These look at the filesystem directly rather than at manifest content.
 */

import { readdir, readFile, stat } from "fs/promises";
import { join } from "path";

import { logger } from "../../lib/logger.js";
import { tryCatchAsync } from "../../lib/result.js";
import { CHECK_CODES } from "../findings/codes.js";
import { createFinding } from "../findings/finding.js";
import { hasFieldValue } from "../manifest/schema.js";

import type { CheckRegistry } from "../config/check-registry.js";
import type { Finding } from "../findings/finding.js";
import type { CargoManifest } from "../manifest/schema.js";

export const README_FILES = ["README.md", "README.rst", "README"] as const;

export const LICENSE_FILES = [
  "LICENSE",
  "LICENSE.txt",
  "LICENSE.md",
  "LICENSE-MIT",
  "LICENSE-APACHE",
  "COPYING",
  "UNLICENSE",
] as const;

/** Lints every crate root is expected to deny */
export const RECOMMENDED_DENIALS = ["warnings"] as const;

const DENY_ATTRIBUTE = /#!\[deny\(([^)]+)\)\]/g;

const log = logger.child("Structure");

async function isFile(path: string): Promise<boolean> {
  const result = await tryCatchAsync(() => stat(path));
  return result.success && result.data.isFile();
}

async function isDirectory(path: string): Promise<boolean> {
  const result = await tryCatchAsync(() => stat(path));
  return result.success && result.data.isDirectory();
}

async function listRootEntries(projectRoot: string): Promise<string[]> {
  const result = await tryCatchAsync(() => readdir(projectRoot));
  return result.success ? result.data : [];
}

async function hasLibraryTarget(projectRoot: string, manifest: CargoManifest, packageName: string): Promise<boolean> {
  const candidates = [join(projectRoot, "src", "lib.rs"), join(projectRoot, "src", `${packageName.replace(/-/g, "_")}.rs`)];
  if (manifest.lib?.path !== undefined) {
    candidates.unshift(join(projectRoot, manifest.lib.path));
  }
  for (const candidate of candidates) {
    if (await isFile(candidate)) return true;
  }
  return false;
}

async function hasBinaryTarget(projectRoot: string, manifest: CargoManifest): Promise<boolean> {
  if (await isFile(join(projectRoot, "src", "main.rs"))) return true;
  if (await isDirectory(join(projectRoot, "src", "bin"))) return true;
  for (const bin of manifest.bin ?? []) {
    if (bin.path !== undefined && (await isFile(join(projectRoot, bin.path)))) return true;
  }
  return false;
}

/**
 * README is not expected when the manifest opts out (`readme = false`)
 * or points at a file that exists
 */
async function readmeCoveredByManifest(projectRoot: string, readme: unknown): Promise<boolean> {
  if (readme === false) return true;
  if (typeof readme === "string" && readme.trim() !== "") {
    return isFile(join(projectRoot, readme));
  }
  return false;
}

/**
 * Check targets, README and LICENSE presence. Applies only to manifests
 * with a [package] section.
 */
export async function checkProjectStructure(projectRoot: string, manifest: CargoManifest): Promise<Finding[]> {
  const pkg = manifest.package;
  if (!pkg) return [];

  const findings: Finding[] = [];

  const [hasLib, hasBin] = await Promise.all([
    hasLibraryTarget(projectRoot, manifest, pkg.name),
    hasBinaryTarget(projectRoot, manifest),
  ]);

  if (!hasLib && !hasBin) {
    findings.push(
      createFinding(
        CHECK_CODES.MISSING_TARGETS,
        "Project has neither src/lib.rs, src/main.rs, nor a src/bin/ directory. Is it a virtual workspace or missing source files?",
        "warning",
        "Cargo.toml"
      )
    );
  }

  const entries = await listRootEntries(projectRoot);
  const fileEntries = new Set<string>();
  for (const entry of entries) {
    if (await isFile(join(projectRoot, entry))) {
      fileEntries.add(entry);
    }
  }

  const hasReadme = README_FILES.some((name) => fileEntries.has(name));
  if (!hasReadme && !(await readmeCoveredByManifest(projectRoot, pkg.readme))) {
    findings.push(
      createFinding(
        CHECK_CODES.MISSING_README_FILE,
        "Missing README.md file in project root. Consider adding one.",
        "note",
        "README.md"
      )
    );
  }

  const licenseNames = new Set<string>(LICENSE_FILES.map((name) => name.toLowerCase()));
  const hasLicenseFile = [...fileEntries].some((entry) => licenseNames.has(entry.toLowerCase()));
  if (!hasLicenseFile && !hasFieldValue(pkg.license)) {
    findings.push(
      createFinding(
        CHECK_CODES.MISSING_LICENSE_FILE,
        "Missing LICENSE file in project root. Consider adding one (e.g., LICENSE-MIT or LICENSE-APACHE).",
        "warning"
      )
    );
  }

  return findings;
}

/**
 * Lints named in every `#![deny(...)]` attribute of a file
 */
export function collectDeniedLints(content: string): Set<string> {
  const denied = new Set<string>();
  for (const match of content.matchAll(DENY_ATTRIBUTE)) {
    for (const lint of (match[1] ?? "").split(",")) {
      const name = lint.trim();
      if (name) denied.add(name);
    }
  }
  return denied;
}

/**
 * Recommend `#![deny(warnings)]` in the library root and entry point
 */
export async function checkDeniedLints(projectRoot: string, registry: CheckRegistry): Promise<Finding[]> {
  if (!registry.isEnabled(CHECK_CODES.MISSING_DENY_WARNINGS)) {
    return [];
  }

  const findings: Finding[] = [];

  for (const crateRoot of ["src/lib.rs", "src/main.rs"]) {
    const filePath = join(projectRoot, crateRoot);
    if (!(await isFile(filePath))) continue;

    const contentResult = await tryCatchAsync(() => readFile(filePath, "utf-8"));
    if (!contentResult.success) {
      log.warn(`Skipping lint check for ${crateRoot}: ${contentResult.error.message}`);
      continue;
    }

    const denied = collectDeniedLints(contentResult.data);
    for (const lint of RECOMMENDED_DENIALS) {
      if (!denied.has(lint)) {
        findings.push(
          createFinding(
            CHECK_CODES.MISSING_DENY_WARNINGS,
            `Consider adding \`#![deny(${lint})]\` to the top of ${crateRoot} for stricter linting.`,
            "note",
            crateRoot
          )
        );
      }
    }
  }

  return findings;
}
