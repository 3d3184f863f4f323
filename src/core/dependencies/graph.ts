/**
 * Resolved dependency graph
 *
 * Maps each workspace member to its direct dependencies and the concrete
 * versions selected for them. Read from Cargo.lock when present, otherwise
 * from `cargo metadata`.
 */

import { readFile } from "fs/promises";
import { join } from "path";

import { glob } from "glob";
import { parse as parseToml } from "smol-toml";
import { z } from "zod";

import { runCommand } from "../../lib/command.js";
import { logger } from "../../lib/logger.js";
import { ok, err, tryCatch, tryCatchAsync } from "../../lib/result.js";
import { DependencyGraphError } from "../findings/degraded.js";
import { loadManifest } from "../manifest/loader.js";

import type { CommandOutput, CommandSpawnError } from "../../lib/command.js";
import type { Result } from "../../lib/result.js";
import type { CargoManifest } from "../manifest/schema.js";

/** `registry` is crates.io; other registries are `alternate-registry` */
export type DependencySource = "registry" | "alternate-registry" | "local" | "git" | "other";

export interface ResolvedDependency {
  name: string;
  /** Concrete version selected by the resolver */
  version: string;
  source: DependencySource;
}

export interface WorkspaceMember {
  name: string;
  version: string;
  dependencies: ResolvedDependency[];
}

export interface DependencyGraph {
  members: WorkspaceMember[];
}

export type DependencyGraphLoader = (
  projectRoot: string,
  manifest: CargoManifest
) => Promise<Result<DependencyGraph, DependencyGraphError>>;

export type MetadataRunner = (projectRoot: string) => Promise<Result<CommandOutput, CommandSpawnError>>;

const METADATA_TIMEOUT_MS = 2 * 60 * 1000;

const log = logger.child("DependencyGraph");

/** Source ids of the crates.io index, git and sparse protocols */
export const CRATES_IO_SOURCES: ReadonlySet<string> = new Set([
  "registry+https://github.com/rust-lang/crates.io-index",
  "sparse+https://index.crates.io",
]);

/**
 * Classify a Cargo source id (`registry+https://...`, `git+https://...`, null)
 */
export function classifySource(source: string | null | undefined): DependencySource {
  if (source === null || source === undefined) return "local";
  if (source.startsWith("registry+") || source.startsWith("sparse+")) {
    return CRATES_IO_SOURCES.has(source.replace(/\/+$/, "")) ? "registry" : "alternate-registry";
  }
  if (source.startsWith("git+")) return "git";
  return "other";
}

// ============================================================
// Cargo.lock
// ============================================================

const LockPackageSchema = z.object({
  name: z.string(),
  version: z.string(),
  source: z.string().optional(),
  dependencies: z.array(z.string()).optional(),
});

const LockFileSchema = z.object({
  version: z.number().optional(),
  package: z.array(LockPackageSchema).default([]),
});

type LockPackage = z.infer<typeof LockPackageSchema>;

/**
 * Parse a lock dependency reference: `name`, `name version` or
 * `name version (source)`
 */
export function parseLockReference(reference: string): { name: string; version?: string } {
  const [name = "", version] = reference.trim().split(/\s+/);
  return version === undefined ? { name } : { name, version };
}

/**
 * Build the graph from Cargo.lock content. Members are the sourceless
 * packages named in `memberNames`; without names every sourceless package
 * counts as a member.
 */
export function graphFromLockfile(
  content: string,
  memberNames?: ReadonlySet<string>
): Result<DependencyGraph, DependencyGraphError> {
  const tomlResult = tryCatch(() => parseToml(content));
  if (!tomlResult.success) {
    return err(new DependencyGraphError(`Cargo.lock is not valid TOML: ${tomlResult.error.message}`));
  }

  const parsed = LockFileSchema.safeParse(tomlResult.data);
  if (!parsed.success) {
    return err(new DependencyGraphError("Cargo.lock does not have the expected [[package]] layout"));
  }

  const packages = parsed.data.package;
  const byName = new Map<string, LockPackage[]>();
  for (const pkg of packages) {
    const list = byName.get(pkg.name) ?? [];
    list.push(pkg);
    byName.set(pkg.name, list);
  }

  const lookup = (reference: string): LockPackage | undefined => {
    const { name, version } = parseLockReference(reference);
    const candidates = byName.get(name) ?? [];
    if (version !== undefined) {
      return candidates.find((c) => c.version === version);
    }
    return candidates.length === 1 ? candidates[0] : undefined;
  };

  const members: WorkspaceMember[] = packages
    .filter((pkg) => pkg.source === undefined && (memberNames === undefined || memberNames.has(pkg.name)))
    .map((pkg) => {
      const dependencies: ResolvedDependency[] = [];
      for (const reference of pkg.dependencies ?? []) {
        const resolved = lookup(reference);
        if (!resolved) {
          log.debug(`Unresolvable lock reference '${reference}' in ${pkg.name}`);
          continue;
        }
        dependencies.push({
          name: resolved.name,
          version: resolved.version,
          source: classifySource(resolved.source),
        });
      }
      return { name: pkg.name, version: pkg.version, dependencies };
    });

  return ok({ members });
}

// ============================================================
// cargo metadata
// ============================================================

const MetadataSchema = z.object({
  packages: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      version: z.string(),
      source: z.string().nullable(),
    })
  ),
  workspace_members: z.array(z.string()),
  resolve: z
    .object({
      nodes: z.array(
        z.object({
          id: z.string(),
          deps: z.array(z.object({ name: z.string(), pkg: z.string() })).default([]),
        })
      ),
    })
    .nullable(),
});

/**
 * Build the graph from `cargo metadata --format-version 1` output
 */
export function graphFromMetadata(json: string): Result<DependencyGraph, DependencyGraphError> {
  const jsonResult = tryCatch((): unknown => JSON.parse(json));
  if (!jsonResult.success) {
    return err(new DependencyGraphError(`cargo metadata output is not JSON: ${jsonResult.error.message}`));
  }

  const parsed = MetadataSchema.safeParse(jsonResult.data);
  if (!parsed.success) {
    return err(new DependencyGraphError("cargo metadata output does not match format version 1"));
  }

  const metadata = parsed.data;
  if (metadata.resolve === null) {
    return err(new DependencyGraphError("cargo metadata returned no resolve graph"));
  }

  const packagesById = new Map(metadata.packages.map((pkg) => [pkg.id, pkg]));
  const nodesById = new Map(metadata.resolve.nodes.map((node) => [node.id, node]));

  const members: WorkspaceMember[] = [];
  for (const memberId of metadata.workspace_members) {
    const pkg = packagesById.get(memberId);
    if (!pkg) continue;

    const seen = new Set<string>();
    const dependencies: ResolvedDependency[] = [];
    for (const dep of nodesById.get(memberId)?.deps ?? []) {
      const resolved = packagesById.get(dep.pkg);
      if (!resolved || seen.has(resolved.id)) continue;
      seen.add(resolved.id);
      dependencies.push({
        name: resolved.name,
        version: resolved.version,
        source: classifySource(resolved.source),
      });
    }

    members.push({ name: pkg.name, version: pkg.version, dependencies });
  }

  return ok({ members });
}

const defaultMetadataRunner: MetadataRunner = (projectRoot) =>
  runCommand("cargo", ["metadata", "--format-version", "1"], projectRoot, METADATA_TIMEOUT_MS);

/**
 * Package names of the root package and of every `workspace.members`
 * directory not listed in `workspace.exclude`
 */
export async function resolveWorkspaceMemberNames(projectRoot: string, manifest: CargoManifest): Promise<Set<string>> {
  const names = new Set<string>();
  if (manifest.package) {
    names.add(manifest.package.name);
  }

  const patterns = manifest.workspace?.members ?? [];
  if (patterns.length === 0) {
    return names;
  }

  const dirs = await tryCatchAsync(() =>
    glob(patterns, { cwd: projectRoot, absolute: true, ignore: manifest.workspace?.exclude ?? [] })
  );
  if (!dirs.success) {
    log.debug(`Cannot expand workspace members: ${dirs.error.message}`);
    return names;
  }

  for (const dir of dirs.data.sort()) {
    const member = await loadManifest(dir);
    if (member.success && member.data.package) {
      names.add(member.data.package.name);
    } else if (!member.success) {
      log.debug(`Skipping workspace member ${dir}: ${member.error.message}`);
    }
  }

  return names;
}

/**
 * Load the graph: Cargo.lock first, `cargo metadata` as the fallback
 */
export async function loadDependencyGraph(
  projectRoot: string,
  manifest: CargoManifest,
  runMetadata: MetadataRunner = defaultMetadataRunner
): Promise<Result<DependencyGraph, DependencyGraphError>> {
  const lockResult = await tryCatchAsync(() => readFile(join(projectRoot, "Cargo.lock"), "utf-8"));
  if (lockResult.success) {
    log.debug("Resolving dependencies from Cargo.lock");
    const memberNames = await resolveWorkspaceMemberNames(projectRoot, manifest);
    return graphFromLockfile(lockResult.data, memberNames.size > 0 ? memberNames : undefined);
  }

  log.debug("No Cargo.lock, running cargo metadata");
  const output = await runMetadata(projectRoot);
  if (!output.success) {
    return err(new DependencyGraphError(output.error.message));
  }
  if (output.data.exitCode !== 0) {
    const firstLine = output.data.stderr.split("\n").find((line) => line.trim() !== "") ?? "unknown error";
    return err(new DependencyGraphError(`cargo metadata failed: ${firstLine.trim()}`));
  }

  return graphFromMetadata(output.data.stdout);
}
