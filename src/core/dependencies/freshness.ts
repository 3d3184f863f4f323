/**
 * Registry freshness check
 *
 * Compares each workspace member's direct registry dependencies against the
 * latest stable release on crates.io.
 */

import semver from "semver";

import { logger } from "../../lib/logger.js";
import { CHECK_CODES } from "../findings/codes.js";
import { createFinding } from "../findings/finding.js";

import type { Result } from "../../lib/result.js";
import type { RegistryFetchError } from "../findings/degraded.js";
import type { Finding } from "../findings/finding.js";

import type { DependencyGraph } from "./graph.js";
import type { RegistryClient } from "./registry-client.js";

const log = logger.child("Freshness");

/**
 * Lookups run one at a time and are cached per crate name. A dependency
 * shared by several members is reported once per resolved version.
 */
export async function checkOutdatedDependencies(
  graph: DependencyGraph,
  client: RegistryClient
): Promise<Finding[]> {
  const findings: Finding[] = [];
  const latestByName = new Map<string, Result<string, RegistryFetchError>>();
  const reported = new Set<string>();

  for (const member of graph.members) {
    for (const dep of member.dependencies) {
      if (dep.source !== "registry") continue;

      const key = `${dep.name}@${dep.version}`;
      if (reported.has(key)) continue;
      reported.add(key);

      let latest = latestByName.get(dep.name);
      if (latest === undefined) {
        latest = await client.getLatestVersion(dep.name);
        latestByName.set(dep.name, latest);

        if (!latest.success) {
          log.warn(latest.error.message);
          findings.push(latest.error.toFinding());
        }
      }

      if (!latest.success) continue;

      const current = semver.valid(dep.version);
      const newest = semver.valid(latest.data);
      if (current === null || newest === null) {
        log.warn(`Skipping '${dep.name}': cannot compare versions '${dep.version}' and '${latest.data}'`);
        continue;
      }

      if (semver.lt(current, newest)) {
        findings.push(
          createFinding(
            CHECK_CODES.OUTDATED_DEPENDENCY,
            `Direct dependency '${dep.name}' is outdated. Current: ${current}, Latest: ${newest}`,
            "note",
            "Cargo.toml"
          )
        );
      }
    }
  }

  return findings;
}
