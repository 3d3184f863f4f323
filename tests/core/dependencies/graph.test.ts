import { describe, it, expect, afterEach } from "vitest";

import {
  classifySource,
  graphFromLockfile,
  graphFromMetadata,
  loadDependencyGraph,
  parseLockReference,
  resolveWorkspaceMemberNames,
} from "@/core/dependencies/graph.js";
import { parseManifest } from "@/core/manifest/loader.js";
import { CommandSpawnError } from "@/lib/command.js";
import { ok, err, unwrap } from "@/lib/result.js";

import { createTempProject, removeTempProject } from "../../helpers/project.js";

import type { MetadataRunner } from "@/core/dependencies/graph.js";

const APP_MANIFEST = unwrap(parseManifest('[package]\nname = "app"\nversion = "0.1.0"\n'));

const REGISTRY = "registry+https://github.com/rust-lang/crates.io-index";

const LOCKFILE = `# This file is automatically @generated by Cargo.
version = 3

[[package]]
name = "app"
version = "0.1.0"
dependencies = [
 "helper",
 "serde 1.0.100",
 "rand",
 "forked",
]

[[package]]
name = "helper"
version = "0.2.0"

[[package]]
name = "serde"
version = "1.0.100"
source = "${REGISTRY}"

[[package]]
name = "serde"
version = "0.9.15"
source = "${REGISTRY}"

[[package]]
name = "rand"
version = "0.8.5"
source = "sparse+https://index.crates.io/"

[[package]]
name = "forked"
version = "0.1.0"
source = "git+https://example.com/forked.git#abc123"
`;

describe("classifySource", () => {
  it("maps Cargo source ids", () => {
    expect(classifySource(undefined)).toBe("local");
    expect(classifySource(null)).toBe("local");
    expect(classifySource(REGISTRY)).toBe("registry");
    expect(classifySource("sparse+https://index.crates.io/")).toBe("registry");
    expect(classifySource("git+https://example.com/x.git")).toBe("git");
    expect(classifySource("path+file:///tmp/x")).toBe("other");
  });

  it("keeps crates from other registries off crates.io", () => {
    expect(classifySource("sparse+https://index.crates.io")).toBe("registry");
    expect(classifySource("registry+https://registry.example.com/index")).toBe("alternate-registry");
    expect(classifySource("sparse+https://cargo.example.com/api/v1/crates/")).toBe("alternate-registry");
  });
});

describe("parseLockReference", () => {
  it("reads every reference form", () => {
    expect(parseLockReference("serde")).toEqual({ name: "serde" });
    expect(parseLockReference("serde 1.0.100")).toEqual({ name: "serde", version: "1.0.100" });
    expect(parseLockReference(`serde 1.0.100 (${REGISTRY})`)).toEqual({ name: "serde", version: "1.0.100" });
  });
});

describe("graphFromLockfile", () => {
  it("treats sourceless packages as members and resolves their dependencies", () => {
    const result = graphFromLockfile(LOCKFILE);
    expect(result.success).toBe(true);
    if (!result.success) return;

    const app = result.data.members.find((m) => m.name === "app");
    expect(result.data.members.map((m) => m.name)).toEqual(["app", "helper"]);
    expect(app?.dependencies).toEqual([
      { name: "helper", version: "0.2.0", source: "local" },
      { name: "serde", version: "1.0.100", source: "registry" },
      { name: "rand", version: "0.8.5", source: "registry" },
      { name: "forked", version: "0.1.0", source: "git" },
    ]);
  });

  it("limits members to the given package names", () => {
    const result = graphFromLockfile(LOCKFILE, new Set(["app"]));
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.members.map((m) => m.name)).toEqual(["app"]);
    }
  });

  it("skips an ambiguous bare reference", () => {
    const lock = LOCKFILE.replace('"serde 1.0.100"', '"serde"');
    const result = graphFromLockfile(lock);
    expect(result.success).toBe(true);
    if (result.success) {
      const names = result.data.members[0]?.dependencies.map((d) => d.name);
      expect(names).toEqual(["helper", "rand", "forked"]);
    }
  });

  it("fails on invalid TOML", () => {
    const result = graphFromLockfile("[[package]\n");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toContain("Cargo.lock is not valid TOML");
    }
  });
});

describe("graphFromMetadata", () => {
  const metadata = {
    packages: [
      { id: "app 0.1.0 (path+file:///work/app)", name: "app", version: "0.1.0", source: null },
      { id: "serde 1.0.100 (registry+x)", name: "serde", version: "1.0.100", source: REGISTRY },
      { id: "util 0.3.0 (path+file:///work/util)", name: "util", version: "0.3.0", source: null },
    ],
    workspace_members: ["app 0.1.0 (path+file:///work/app)"],
    resolve: {
      nodes: [
        {
          id: "app 0.1.0 (path+file:///work/app)",
          deps: [
            { name: "serde", pkg: "serde 1.0.100 (registry+x)" },
            { name: "util", pkg: "util 0.3.0 (path+file:///work/util)" },
          ],
        },
        { id: "serde 1.0.100 (registry+x)", deps: [] },
      ],
    },
  };

  it("walks workspace members to their resolved dependencies", () => {
    const result = graphFromMetadata(JSON.stringify(metadata));
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({
        members: [
          {
            name: "app",
            version: "0.1.0",
            dependencies: [
              { name: "serde", version: "1.0.100", source: "registry" },
              { name: "util", version: "0.3.0", source: "local" },
            ],
          },
        ],
      });
    }
  });

  it("fails without a resolve graph", () => {
    const result = graphFromMetadata(JSON.stringify({ ...metadata, resolve: null }));
    expect(result.success).toBe(false);
  });

  it("fails on non-JSON output", () => {
    const result = graphFromMetadata("error: could not find Cargo.toml");
    expect(result.success).toBe(false);
  });
});

describe("loadDependencyGraph", () => {
  let root = "";

  afterEach(async () => {
    if (root) await removeTempProject(root);
  });

  it("prefers Cargo.lock and never runs cargo metadata", async () => {
    root = await createTempProject({ "Cargo.lock": LOCKFILE });
    const runner: MetadataRunner = async () => {
      throw new Error("cargo metadata should not run");
    };
    const result = await loadDependencyGraph(root, APP_MANIFEST, runner);
    expect(result.success).toBe(true);
  });

  it("leaves path dependencies outside the workspace out of the members", async () => {
    root = await createTempProject({ "Cargo.lock": LOCKFILE });
    const result = await loadDependencyGraph(root, APP_MANIFEST, async () => {
      throw new Error("cargo metadata should not run");
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.members.map((m) => m.name)).toEqual(["app"]);
    }
  });

  it("falls back to cargo metadata without a lock file", async () => {
    root = await createTempProject({});
    const runner: MetadataRunner = async () =>
      ok({
        stdout: JSON.stringify({ packages: [], workspace_members: [], resolve: { nodes: [] } }),
        stderr: "",
        exitCode: 0,
        timedOut: false,
      });
    const result = await loadDependencyGraph(root, APP_MANIFEST, runner);
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.members).toEqual([]);
    }
  });

  it("reports the first stderr line when cargo metadata fails", async () => {
    root = await createTempProject({});
    const runner: MetadataRunner = async () =>
      ok({ stdout: "", stderr: "\nerror: failed to load manifest\ndetails\n", exitCode: 101, timedOut: false });
    const result = await loadDependencyGraph(root, APP_MANIFEST, runner);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.toFinding().message).toBe(
        "Could not resolve the dependency graph, outdated-dependency check skipped: cargo metadata failed: error: failed to load manifest"
      );
    }
  });

  it("reports a missing cargo binary", async () => {
    root = await createTempProject({});
    const runner: MetadataRunner = async () => err(new CommandSpawnError("cargo metadata", "spawn cargo ENOENT"));
    const result = await loadDependencyGraph(root, APP_MANIFEST, runner);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toContain("Failed to start 'cargo metadata': spawn cargo ENOENT");
    }
  });
});

describe("resolveWorkspaceMemberNames", () => {
  let root = "";

  afterEach(async () => {
    if (root) await removeTempProject(root);
  });

  it("collects the root package and matching member packages", async () => {
    root = await createTempProject({
      "Cargo.toml": "",
      "crates/core/Cargo.toml": '[package]\nname = "app-core"\n',
      "crates/cli/Cargo.toml": '[package]\nname = "app-cli"\n',
      "crates/scratch/Cargo.toml": '[package]\nname = "scratch"\n',
      "crates/notes.txt": "not a crate\n",
    });
    const manifest = unwrap(
      parseManifest(
        '[package]\nname = "app"\n\n[workspace]\nmembers = ["crates/*"]\nexclude = ["crates/scratch"]\n'
      )
    );

    const names = await resolveWorkspaceMemberNames(root, manifest);
    expect([...names].sort()).toEqual(["app", "app-cli", "app-core"]);
  });

  it("is empty for a virtual manifest without members", async () => {
    root = await createTempProject({ "Cargo.toml": "" });
    const names = await resolveWorkspaceMemberNames(root, unwrap(parseManifest("[workspace]\n")));
    expect(names.size).toBe(0);
  });
});
