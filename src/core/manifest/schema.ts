/**
 * Cargo.toml manifest model
 *
 * Only the keys the checks read are modelled; everything else in the
 * manifest passes through untouched.
 */

import { z } from "zod";

export const DetailedDependencySchema = z
  .object({
    version: z.string().optional(),
    path: z.string().optional(),
    git: z.string().optional(),
    features: z.array(z.string()).optional(),
    workspace: z.boolean().optional(),
  })
  .passthrough();

export const DependencySchema = z.union([z.string(), DetailedDependencySchema]);

export const DependencyMapSchema = z.record(z.string(), DependencySchema);

/**
 * `key.workspace = true` takes the value from the workspace root manifest
 */
export const WorkspaceInheritedSchema = z.object({ workspace: z.literal(true) });

const InheritableString = z.union([z.string(), WorkspaceInheritedSchema]);

export const PackageSchema = z
  .object({
    name: z.string(),
    version: InheritableString.optional(),
    edition: InheritableString.optional(),
    description: InheritableString.optional(),
    license: InheritableString.optional(),
    "license-file": InheritableString.optional(),
    // Cargo accepts a path or a boolean; anything else is reported, not rejected
    readme: z.unknown().optional(),
    repository: InheritableString.optional(),
  })
  .passthrough();

export const TargetSchema = z
  .object({
    name: z.string().optional(),
    path: z.string().optional(),
  })
  .passthrough();

export const CargoManifestSchema = z
  .object({
    package: PackageSchema.optional(),
    lib: TargetSchema.optional(),
    bin: z.array(TargetSchema).optional(),
    workspace: z
      .object({
        members: z.array(z.string()).optional(),
        exclude: z.array(z.string()).optional(),
      })
      .passthrough()
      .optional(),
    dependencies: DependencyMapSchema.optional(),
    "dev-dependencies": DependencyMapSchema.optional(),
    "build-dependencies": DependencyMapSchema.optional(),
  })
  .passthrough();

export type InheritableField = z.infer<typeof InheritableString>;
export type DetailedDependency = z.infer<typeof DetailedDependencySchema>;
export type Dependency = z.infer<typeof DependencySchema>;
export type DependencyMap = z.infer<typeof DependencyMapSchema>;
export type Package = z.infer<typeof PackageSchema>;
export type CargoManifest = z.infer<typeof CargoManifestSchema>;

/**
 * Whether a package field carries a value, locally or inherited from the workspace
 */
export function hasFieldValue(value: InheritableField | undefined): boolean {
  if (value === undefined) return false;
  return typeof value === "string" ? value.trim() !== "" : true;
}

/**
 * Role a dependency plays, by the table it is declared in
 */
export type DependencyRole = "runtime" | "dev" | "build";

export const DEPENDENCY_TABLES: ReadonlyArray<{
  key: "dependencies" | "dev-dependencies" | "build-dependencies";
  role: DependencyRole;
}> = [
  { key: "dependencies", role: "runtime" },
  { key: "dev-dependencies", role: "dev" },
  { key: "build-dependencies", role: "build" },
];

/**
 * Declared version requirement, if any
 */
export function dependencyVersion(dep: Dependency): string | undefined {
  return typeof dep === "string" ? dep : dep.version;
}

/**
 * A path dependency without a version never comes from a registry
 */
export function isLocalDependency(dep: Dependency): boolean {
  return typeof dep !== "string" && dep.path !== undefined && dep.version === undefined;
}
