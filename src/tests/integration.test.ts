/**
 * Integration Tests for docsync
 *
 * Runs the SDK against a real temporary project on disk, with a stub
 * summarization provider in place of the language model.
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import docsync, { createSilentLogger, loadConfig, saveConfig } from "../index";
import { createDefaultConfig } from "../domain/entities";
import { StubSummarizationProvider } from "./fakes";

const MAIN_PY = "import sys\n\n\ndef main():\n    print(sys.argv)\n";
const SHAPES_PY = "class Square:\n    def area(self):\n        return self.side ** 2\n";
const CRLF_PY = "def f():\r\n    return 1\r\n";

let projectDir: string;
let provider: StubSummarizationProvider;

async function writeProject(files: Record<string, string>): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(projectDir, relative);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  }
}

function read(relative: string): Promise<string> {
  return fs.readFile(path.join(projectDir, relative), "utf-8");
}

function sync(docstrings = false) {
  return docsync.sync(projectDir, {
    docstrings,
    logger: createSilentLogger(),
    services: { provider },
  });
}

beforeEach(async () => {
  projectDir = await fs.mkdtemp(path.join(os.tmpdir(), "docsync-"));
  provider = new StubSummarizationProvider();
  await writeProject({
    "main.py": MAIN_PY,
    "crlf.py": CRLF_PY,
    "pkg/__init__.py": "",
    "pkg/shapes.py": SHAPES_PY,
    "build/generated.py": "def skip():\n    pass\n",
  });
  await saveConfig(projectDir, { ...createDefaultConfig(), docstringTargets: ["function"] });
});

afterEach(async () => {
  await fs.rm(projectDir, { recursive: true, force: true });
});

describe("docsync", () => {
  test("loads the project's saved configuration", async () => {
    const config = await loadConfig(projectDir);

    expect(config.docstringTargets).toEqual(["function"]);
    expect(config.summaryFile).toBe("docs.md");
  });

  test("writes the summary document and the cache", async () => {
    const report = await sync();

    expect(report.status).toBe("success");
    expect(report.processedFiles).toEqual(["crlf.py", "main.py", "pkg/__init__.py", "pkg/shapes.py"]);
    expect(report.summaryPath).toBe(path.join(projectDir, "docs.md"));

    const docs = await read("docs.md");
    expect(docs.startsWith(`# ${path.basename(projectDir)}\n`)).toBe(true);
    expect(docs).toContain("## `pkg/shapes.py`\n\nSummary of module pkg.shapes\n");

    const cache: unknown = JSON.parse(await read(".docsync/cache.json"));
    expect(cache).toMatchObject({ version: "1.0.0" });
  });

  test("inserts function docstrings and keeps line endings", async () => {
    const report = await sync(true);

    expect(report.rewrittenFiles).toEqual(["crlf.py", "main.py", "pkg/shapes.py"]);
    expect(await read("main.py")).toBe(
      'import sys\n\n\ndef main():\n    """Docstring for main.main."""\n    print(sys.argv)\n'
    );
    expect(await read("pkg/shapes.py")).toBe(
      'class Square:\n    def area(self):\n        """Docstring for pkg.shapes.Square.area."""\n' +
        "        return self.side ** 2\n"
    );
    expect(await read("crlf.py")).toBe(
      'def f():\r\n    """Docstring for crlf.f."""\r\n    return 1\r\n'
    );
    expect(await read("build/generated.py")).toBe("def skip():\n    pass\n");
  });

  test("keeps the bytes of a file in a legacy encoding", async () => {
    const latin1 = Buffer.from("def legacy():\n    return 'é'\n", "latin1");
    await fs.writeFile(path.join(projectDir, "legacy.py"), latin1);

    const report = await sync(true);

    expect(report.status).toBe("partial");
    expect(report.skippedFiles).toEqual(["legacy.py"]);
    expect(report.rewrittenFiles).toEqual(["crlf.py", "main.py", "pkg/shapes.py"]);
    expect((await fs.readFile(path.join(projectDir, "legacy.py"))).equals(latin1)).toBe(true);
  });

  test("a second run is a no-op", async () => {
    await sync(true);
    const before = {
      docs: await read("docs.md"),
      cache: await read(".docsync/cache.json"),
      main: await read("main.py"),
    };
    provider.reset();

    const report = await sync(true);

    expect(provider.calls).toEqual([]);
    expect(report.rewrittenFiles).toEqual([]);
    expect(await read("docs.md")).toBe(before.docs);
    expect(await read(".docsync/cache.json")).toBe(before.cache);
    expect(await read("main.py")).toBe(before.main);
  });

  test("reports status and docstrings after a run", async () => {
    await sync(true);

    const status = await docsync.status(projectDir);
    const listing = await docsync.docstrings(projectDir, "main.py");

    expect(status.exists).toBe(true);
    expect(status.hasSummary).toBe(true);
    expect(status.trackedFiles).toBe(4);
    expect(listing.docstrings).toEqual({ main: null, "main.main": "Docstring for main.main." });
  });

  test("renders the directory tree", async () => {
    const tree = await docsync.tree(projectDir);

    expect(tree).toBe(
      [
        `${path.basename(projectDir)}/`,
        "├── crlf.py",
        "├── main.py",
        "└── pkg/",
        "    ├── __init__.py",
        "    └── shapes.py",
      ].join("\n")
    );
  });
});
