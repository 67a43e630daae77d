/**
 * Tests for the tree walk
 */
import { describe, expect, it } from "vitest";
import { walkTree } from "./walkTree";
import { TreeWalkError, createDefaultConfig, type Config, type Unit } from "../../domain/entities";
import { createParserForFile } from "../../infrastructure/parsing";
import { MemoryFileSystem } from "../../tests/fakes";

function paths(unit: Unit): string[] {
  return unit.type === "file" ? [unit.path] : [`${unit.path}/`, ...unit.children.flatMap(paths)];
}

function walk(fs: MemoryFileSystem, config: Config = createDefaultConfig()) {
  return walkTree("/proj", { fileSystem: fs, parserFor: createParserForFile }, { config });
}

describe("walkTree", () => {
  it("should list supported files in name order and omit empty directories", async () => {
    const fs = new MemoryFileSystem({
      "/proj/z.py": "",
      "/proj/a.py": "",
      "/proj/pkg/mod.pyw": "",
      "/proj/docs/readme.md": "",
    });

    const { root, skipped } = await walk(fs);

    expect(paths(root)).toEqual(["./", "a.py", "pkg/", "pkg/mod.pyw", "z.py"]);
    expect(root.name).toBe("proj");
    expect(skipped).toEqual([]);
  });

  it("should skip ignored names and paths", async () => {
    const fs = new MemoryFileSystem({
      "/proj/a.py": "",
      "/proj/node_modules/x.py": "",
      "/proj/.docsync/b.py": "",
      "/proj/gen/out.py": "",
      "/proj/lib/gen/keep.py": "",
    });
    const config = { ...createDefaultConfig(), ignorePaths: ["node_modules", "gen/out.py"] };

    const { root } = await walk(fs, config);

    expect(paths(root)).toEqual(["./", "a.py", "lib/", "lib/gen/", "lib/gen/keep.py"]);
  });

  it("should carry each file's text and parsed module", async () => {
    const fs = new MemoryFileSystem({ "/proj/pkg/util.py": "def f():\n    pass\n" });

    const { root } = await walk(fs);
    const pkg = root.children[0];
    const file = pkg.type === "directory" ? pkg.children[0] : undefined;

    expect(file?.type).toBe("file");
    if (file?.type !== "file") return;
    expect(file.absolutePath).toBe("/proj/pkg/util.py");
    expect(file.rawText).toBe("def f():\n    pass\n");
    expect(file.rootNode.qualifiedName).toBe("pkg.util");
    expect(file.rootNode.children.map((node) => node.qualifiedName)).toEqual(["pkg.util.f"]);
  });

  it("should report unparsable files as skipped, sorted by path", async () => {
    const fs = new MemoryFileSystem({
      "/proj/ok.py": "x = 1\n",
      "/proj/z.py": "def f(:\n",
      "/proj/b.py": "x = 1\n    y = 2\n",
    });

    const { root, skipped } = await walk(fs);

    expect(paths(root)).toEqual(["./", "ok.py"]);
    expect(skipped.map((warning) => warning.path)).toEqual(["b.py", "z.py"]);
    expect(skipped[0]).toEqual({
      kind: "ParseError",
      path: "b.py",
      message: "unexpected indent (line 2)",
    });
  });

  it("should follow symbolic links that do not loop", async () => {
    const fs = new MemoryFileSystem({ "/shared/util.py": "" });
    fs.addDir("/proj");
    fs.addSymlink("/proj/linked", "/shared");

    const { root } = await walk(fs);

    expect(paths(root)).toEqual(["./", "linked/", "linked/util.py"]);
  });

  it("should reject a symbolic link back into an ancestor", async () => {
    const fs = new MemoryFileSystem({ "/proj/a/b.py": "" });
    fs.addSymlink("/proj/a/up", "/proj");

    const error = await walk(fs).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TreeWalkError);
    if (!(error instanceof TreeWalkError)) return;
    expect(error.message).toBe("Symbolic link cycle: a/up points back to /proj");
    expect(error.path).toBe("a/up");
  });

  it("should fail when the root does not exist", async () => {
    await expect(walk(new MemoryFileSystem())).rejects.toThrow(
      "Project root does not exist: /proj"
    );
  });
});
