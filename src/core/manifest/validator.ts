/**
 * Manifest Validator - metadata, dependency version and edition checks
 * on the parsed Cargo.toml
 */

import { CHECK_CODES } from "../findings/codes.js";
import { createFinding } from "../findings/finding.js";

import {
  DEPENDENCY_TABLES,
  dependencyVersion,
  hasFieldValue,
  isLocalDependency,
  WorkspaceInheritedSchema,
} from "./schema.js";

import type { CheckRegistry } from "../config/check-registry.js";
import type { Finding } from "../findings/finding.js";
import type { CargoManifest } from "./schema.js";

export const LATEST_STABLE_EDITION = "2024";

/** Edition Cargo assumes when none is declared */
export const IMPLICIT_EDITION = "2015";

const MANIFEST = "Cargo.toml";

/**
 * A readme entry is valid as a non-empty path, `false`, or inherited from
 * the workspace
 */
export function isValidReadmeValue(value: unknown): boolean {
  if (typeof value === "string") return value.trim() !== "";
  return value === false || WorkspaceInheritedSchema.safeParse(value).success;
}

function describeValue(value: unknown): string {
  if (typeof value === "string") return `"${value}"`;
  if (typeof value === "object" && value !== null) return JSON.stringify(value);
  return String(value);
}

/**
 * Check the [package] metadata fields. Without a [package] section only
 * MD005 is reported.
 */
export function checkMissingMetadata(manifest: CargoManifest, registry: CheckRegistry): Finding[] {
  const findings: Finding[] = [];
  const pkg = manifest.package;

  if (!pkg) {
    findings.push(
      createFinding(CHECK_CODES.MISSING_PACKAGE_SECTION, "Missing section [package] in Cargo.toml.", "error", MANIFEST)
    );
    return findings;
  }

  if (registry.isEnabled(CHECK_CODES.MISSING_DESCRIPTION) && !hasFieldValue(pkg.description)) {
    findings.push(
      createFinding(
        CHECK_CODES.MISSING_DESCRIPTION,
        "Missing 'description' in [package] section of Cargo.toml.",
        "warning",
        MANIFEST
      )
    );
  }

  if (
    registry.isEnabled(CHECK_CODES.MISSING_LICENSE) &&
    !hasFieldValue(pkg.license) &&
    !hasFieldValue(pkg["license-file"])
  ) {
    findings.push(
      createFinding(
        CHECK_CODES.MISSING_LICENSE,
        "Missing 'license' (or 'license-file') in [package] section of Cargo.toml.",
        "warning",
        MANIFEST
      )
    );
  }

  if (registry.isEnabled(CHECK_CODES.MISSING_REPOSITORY) && !hasFieldValue(pkg.repository)) {
    findings.push(
      createFinding(
        CHECK_CODES.MISSING_REPOSITORY,
        "Missing 'repository' in [package] section of Cargo.toml.",
        "note",
        MANIFEST
      )
    );
  }

  if (registry.isEnabled(CHECK_CODES.README_FIELD)) {
    if (pkg.readme === undefined) {
      findings.push(
        createFinding(
          CHECK_CODES.README_FIELD,
          "Missing 'readme' field in [package] section of Cargo.toml. Consider adding `readme = \"README.md\"` or `readme = false`.",
          "note",
          MANIFEST
        )
      );
    } else if (!isValidReadmeValue(pkg.readme)) {
      findings.push(
        createFinding(
          CHECK_CODES.README_FIELD,
          `The 'readme' field in Cargo.toml has an unexpected value (${describeValue(pkg.readme)}). Expected a file path string (e.g. "README.md") or \`false\`.`,
          "warning",
          MANIFEST
        )
      );
    }
  }

  return findings;
}

/**
 * Flag wildcard version requirements in runtime, dev and build dependencies,
 * in declaration order
 */
export function checkDependencyVersions(manifest: CargoManifest, registry: CheckRegistry): Finding[] {
  const findings: Finding[] = [];
  if (!registry.isEnabled(CHECK_CODES.WILDCARD_VERSION)) {
    return findings;
  }

  for (const { key, role } of DEPENDENCY_TABLES) {
    const deps = manifest[key];
    if (!deps) continue;

    for (const [name, dep] of Object.entries(deps)) {
      if (isLocalDependency(dep)) continue;
      if (dependencyVersion(dep) === "*") {
        findings.push(
          createFinding(
            CHECK_CODES.WILDCARD_VERSION,
            `Wildcard version "*" used for ${role} dependency '${name}'. Specify a version range.`,
            "warning",
            MANIFEST
          )
        );
      }
    }
  }

  return findings;
}

/**
 * Compare the declared edition with the latest stable one
 */
export function checkEdition(manifest: CargoManifest): Finding[] {
  const pkg = manifest.package;
  if (!pkg) return [];

  const edition = pkg.edition;
  if (edition === undefined) {
    return [
      createFinding(
        CHECK_CODES.MISSING_EDITION,
        `Project does not specify a Rust edition (implicitly ${IMPLICIT_EDITION}), consider specifying and updating to '${LATEST_STABLE_EDITION}'.`,
        "note",
        MANIFEST
      ),
    ];
  }

  // Inherited from the workspace root, which is checked on its own
  if (typeof edition !== "string") return [];

  if (edition !== LATEST_STABLE_EDITION) {
    return [
      createFinding(
        CHECK_CODES.OUTDATED_EDITION,
        `Project uses Rust edition '${edition}', consider updating to '${LATEST_STABLE_EDITION}'.`,
        "note",
        MANIFEST
      ),
    ];
  }

  return [];
}
