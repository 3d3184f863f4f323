import { join } from "path";

import { describe, it, expect, afterEach } from "vitest";

import { collectSourceFiles } from "@/core/detection/file-collector.js";

import { createTempProject, removeTempProject } from "../../helpers/project.js";

describe("collectSourceFiles", () => {
  let root = "";

  afterEach(async () => {
    if (root) await removeTempProject(root);
  });

  it("collects .rs files under the recognized roots, sorted", async () => {
    root = await createTempProject({
      "src/lib.rs": "",
      "src/model/user.rs": "",
      "tests/it.rs": "",
      "examples/demo.rs": "",
      "benches/speed.rs": "",
      "src/notes.md": "",
      "target/debug/build.rs": "",
      "build.rs": "",
    });

    const files = await collectSourceFiles(root);
    expect(files).toEqual(
      [
        join(root, "benches/speed.rs"),
        join(root, "examples/demo.rs"),
        join(root, "src/lib.rs"),
        join(root, "src/model/user.rs"),
        join(root, "tests/it.rs"),
      ].sort()
    );
  });

  it("skips missing roots", async () => {
    root = await createTempProject({ "src/main.rs": "fn main() {}\n" });
    expect(await collectSourceFiles(root)).toEqual([join(root, "src/main.rs")]);
  });

  it("ignores dot directories", async () => {
    root = await createTempProject({ "src/.hidden/x.rs": "", "src/a.rs": "" });
    expect(await collectSourceFiles(root)).toEqual([join(root, "src/a.rs")]);
  });

  it("returns nothing for a project without sources", async () => {
    root = await createTempProject({ "Cargo.toml": "" });
    expect(await collectSourceFiles(root)).toEqual([]);
  });
});
