/**
 * Tests for bottom-up aggregation
 */
import { describe, expect, it } from "vitest";
import { SUMMARY_UNAVAILABLE, TreeAggregator, outlineText } from "./treeAggregator";
import { NodeSummarizer } from "./nodeSummarizer";
import { fingerprint } from "./fingerprint";
import { InMemorySummaryCache } from "../../infrastructure/storage/summaryCache";
import { PythonParser } from "../../infrastructure/parsing/pythonParser";
import { StubSummarizationProvider } from "../../tests/fakes";
import type { DirectoryUnit, FileUnit, NodeLineage, Unit } from "../entities";

const parser = new PythonParser();

function file(path: string, rawText: string): FileUnit {
  return {
    type: "file",
    path,
    absolutePath: `/proj/${path}`,
    rawText,
    rootNode: parser.parse(rawText, path),
    fingerprint: fingerprint(rawText),
  };
}

function dir(path: string, children: Unit[]): DirectoryUnit {
  const name = path === "." ? "proj" : path.slice(path.lastIndexOf("/") + 1);
  return {
    type: "directory",
    path,
    absolutePath: path === "." ? "/proj" : `/proj/${path}`,
    name,
    children,
  };
}

function setup(previousLineage: NodeLineage = {}, cache = new InMemorySummaryCache()) {
  const provider = new StubSummarizationProvider();
  const summarizer = new NodeSummarizer(provider, cache, {
    maxRetries: 0,
    maxChunkChars: 10_000,
    concurrency: 4,
  });
  const aggregator = new TreeAggregator({ summarizer, cache, previousLineage });
  return { provider, cache, aggregator };
}

const FOO = "def foo():\n    return 1\n";
const BAR = "def bar():\n    return 2\n";

describe("TreeAggregator", () => {
  it("should summarize children before their parents", async () => {
    const { provider, aggregator } = setup();
    provider.delayMs = (context) => (context.scope === "function" ? 5 : 0);
    const tree = dir(".", [file("a.py", FOO), dir("sub", [file("sub/b.py", BAR)])]);

    const root = await aggregator.aggregate(tree);

    const order = provider.events;
    const before = (first: string, second: string) =>
      expect(order.indexOf(`end:${first}`)).toBeLessThan(order.indexOf(`start:${second}`));
    before("a.foo", "a");
    before("sub.b.bar", "sub.b");
    before("sub.b", "sub");
    before("a", "proj");
    before("sub", "proj");

    expect(root.summary).toBe("Summary of project proj");
    expect(root.degraded).toBe(false);
    expect(provider.summarized("function").sort()).toEqual(["a.foo", "sub.b.bar"]);
    expect(provider.summarized("directory")).toEqual(["sub"]);
  });

  it("should send directories their children's summaries", async () => {
    const { provider, aggregator } = setup();
    const tree = dir(".", [file("a.py", FOO), dir("sub", [file("sub/b.py", BAR)])]);

    await aggregator.aggregate(tree);

    const project = provider.calls.find((call) => call.scope === "project");
    expect(project?.text).toBe(
      "a.py:\nSummary of module a\n\nsub/:\nSummary of directory sub"
    );
    expect(project?.context?.children).toEqual([
      { name: "a.py", scope: "module", summary: "Summary of module a" },
      { name: "sub/", scope: "directory", summary: "Summary of directory sub" },
    ]);
  });

  it("should make no calls when nothing changed", async () => {
    const first = setup();
    const tree = dir(".", [file("a.py", FOO)]);
    await first.aggregator.aggregate(tree);

    const second = setup(first.aggregator.lineage, first.cache);
    const root = await second.aggregator.aggregate(dir(".", [file("a.py", FOO)]));

    expect(second.provider.calls).toHaveLength(0);
    expect(root.summary).toBe("Summary of project proj");
    expect(second.aggregator.liveFingerprints.size).toBe(3);
  });

  it("should record lineage for every node and directory", async () => {
    const { aggregator } = setup();

    await aggregator.aggregate(dir(".", [file("a.py", FOO)]));

    expect(Object.keys(aggregator.lineage).sort()).toEqual([
      "a.py::a",
      "a.py::a.foo",
      "dir::.",
    ]);
  });

  it("should keep the previous summary when summarizing a changed node fails", async () => {
    const first = setup();
    await first.aggregator.aggregate(dir(".", [file("a.py", FOO)]));

    const second = setup(first.aggregator.lineage, first.cache);
    second.provider.failing.add("a.foo");
    const changed = file("a.py", FOO.replace("return 1", "return 10"));
    const root = await second.aggregator.aggregate(dir(".", [changed]));

    expect(second.aggregator.warnings).toEqual([
      {
        kind: "SummarizationError",
        path: "a.py",
        node: "a.foo",
        message:
          "Summarization failed after 1 attempt: provider unavailable for a.foo; kept previous summary",
      },
    ]);
    const [foo, module] = second.aggregator.nodeRecords("a.py");
    expect(foo.summary).toBe("Summary of function a.foo");
    expect(foo.degraded).toBe(true);
    expect(module.degraded).toBe(true);
    expect(root.degraded).toBe(true);

    // Parents of a degraded node are summarized but not cached
    expect(second.cache.get(module.fingerprint)).toBeUndefined();
    expect(second.aggregator.lineage["a.py::a.foo"]).toBe(first.aggregator.lineage["a.py::a.foo"]);
  });

  it("should use a placeholder when no previous summary exists", async () => {
    const { provider, aggregator } = setup();
    provider.failing.add("a.foo");

    await aggregator.aggregate(dir(".", [file("a.py", FOO)]));

    const [foo] = aggregator.nodeRecords("a.py");
    expect(foo.summary).toBe(SUMMARY_UNAVAILABLE);
    expect(aggregator.warnings[0].message).toBe(
      "Summarization failed after 1 attempt: provider unavailable for a.foo; summary unavailable"
    );
    expect(aggregator.lineage["a.py::a.foo"]).toBeUndefined();
  });

  it("should give an empty project an empty summary without calls", async () => {
    const { provider, aggregator } = setup();

    const root = await aggregator.aggregate(dir(".", []));

    expect(root.summary).toBe("");
    expect(provider.calls).toHaveLength(0);
  });

  it("should summarize each file once when aggregated twice", async () => {
    const { provider, aggregator } = setup();
    const unit = file("a.py", FOO);

    await Promise.all([aggregator.summarizeFile(unit), aggregator.summarizeFile(unit)]);

    expect(provider.summarized("module")).toEqual(["a"]);
  });
});

describe("outlineText", () => {
  it("should reduce children to their headers", () => {
    const unit = file("a.py", "import os\n\n" + FOO);

    expect(outlineText(unit.rootNode, unit.rawText)).toBe("import os\n\ndef foo(): ...\n");
  });
});
