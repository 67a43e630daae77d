/**
 * Tests for change detection
 */
import { describe, expect, it } from "vitest";
import {
  classify,
  directoryFingerprint,
  docstringKey,
  fingerprint,
  fingerprintNodes,
  nodeOwnText,
} from "./fingerprint";
import { PythonParser } from "../../infrastructure/parsing/pythonParser";
import { InMemorySummaryCache } from "../../infrastructure/storage/summaryCache";

const parser = new PythonParser();

function fingerprintsOf(source: string, filepath = "m.py"): Map<string, string> {
  return fingerprintNodes(parser.parse(source, filepath), source);
}

const ORIGINAL = [
  "def foo():",
  "    return 1",
  "",
  "",
  "def bar():",
  "    return 2",
  "",
].join("\n");

const EDITED_BAR = ORIGINAL.replace("return 2", "return 3");

describe("fingerprint", () => {
  it("should be stable for the same content", () => {
    expect(fingerprint("def foo(): pass")).toBe(fingerprint("def foo(): pass"));
  });

  it("should differ for different content", () => {
    const inputs = ["", "a", "b", "a\n", "def foo(): pass", "def foo():  pass"];
    const values = new Set(inputs.map(fingerprint));
    expect(values.size).toBe(inputs.length);
  });

  it("should be a sha256 hex digest", () => {
    expect(fingerprint("")).toBe(
      "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855"
    );
  });
});

describe("fingerprintNodes", () => {
  it("should propagate an inner change to ancestors only", () => {
    const before = fingerprintsOf(ORIGINAL);
    const after = fingerprintsOf(EDITED_BAR);

    expect(after.get("m.bar")).not.toBe(before.get("m.bar"));
    expect(after.get("m")).not.toBe(before.get("m"));
    expect(after.get("m.foo")).toBe(before.get("m.foo"));
  });

  it("should propagate a change into the directory fingerprint", () => {
    const before = directoryFingerprint("directory", [
      { name: "m.py", fingerprint: fingerprintsOf(ORIGINAL).get("m") ?? "" },
    ]);
    const after = directoryFingerprint("directory", [
      { name: "m.py", fingerprint: fingerprintsOf(EDITED_BAR).get("m") ?? "" },
    ]);

    expect(after).not.toBe(before);
  });

  it("should propagate through nested scopes", () => {
    const source = [
      "class A:",
      "    def inner(self):",
      "        return 1",
      "",
      "    def other(self):",
      "        return 2",
      "",
    ].join("\n");
    const before = fingerprintsOf(source);
    const after = fingerprintsOf(source.replace("return 1", "return 10"));

    expect(after.get("m.A.inner")).not.toBe(before.get("m.A.inner"));
    expect(after.get("m.A")).not.toBe(before.get("m.A"));
    expect(after.get("m")).not.toBe(before.get("m"));
    expect(after.get("m.A.other")).toBe(before.get("m.A.other"));
  });

  it("should ignore inserted docstrings", () => {
    const documented = [
      '"""Module doc."""',
      "",
      "def foo():",
      '    """Returns one."""',
      "    return 1",
      "",
      "",
      "def bar():",
      "    return 2",
      "",
    ].join("\n");

    expect(fingerprintsOf(documented)).toEqual(fingerprintsOf(ORIGINAL));
  });

  it("should ignore an inline body moved below a new docstring", () => {
    const inline = "def foo(): pass\n";
    const block = 'def foo():\n    """Does nothing."""\n    pass\n';

    expect(fingerprintsOf(block)).toEqual(fingerprintsOf(inline));
  });

  it("should keep comments after the header significant", () => {
    const plain = "def foo():\n    return 1\n";
    const commented = "def foo():\n    # one\n    return 1\n";

    expect(fingerprintsOf(commented).get("m.foo")).not.toBe(
      fingerprintsOf(plain).get("m.foo")
    );
  });

  it("should not depend on the file path", () => {
    const a = fingerprintsOf("def foo():\n    return 1\n", "a.py");
    const b = fingerprintsOf("def foo():\n    return 1\n", "b.py");

    expect(a.get("a")).toBe(b.get("b"));
  });
});

describe("nodeOwnText", () => {
  it("should replace child spans and the body gap with markers", () => {
    const source = "import os\n\ndef foo():\n    return 1\n";
    const root = parser.parse(source, "m.py");

    expect(nodeOwnText(root, source)).toBe("\u0001import os\n\n\u0000\n");
    expect(nodeOwnText(root.children[0], source)).toBe("def foo():\u0001return 1");
  });
});

describe("directoryFingerprint", () => {
  it("should depend on child names and scope", () => {
    const children = [{ name: "a.py", fingerprint: fingerprint("a") }];

    expect(directoryFingerprint("directory", children)).not.toBe(
      directoryFingerprint("directory", [{ name: "b.py", fingerprint: fingerprint("a") }])
    );
    expect(directoryFingerprint("directory", children)).not.toBe(
      directoryFingerprint("project", children)
    );
  });
});

describe("classify", () => {
  it("should classify against the cache and lineage", () => {
    const cache = new InMemorySummaryCache();
    cache.put("fp-1", "cached");
    const lineage = { "m.py::m.foo": "fp-0" };

    expect(classify("fp-1", "m.py::m.foo", cache, lineage)).toBe("unchanged");
    expect(classify("fp-2", "m.py::m.foo", cache, lineage)).toBe("changed");
    expect(classify("fp-2", "m.py::m.bar", cache, lineage)).toBe("new");
  });
});

describe("docstringKey", () => {
  it("should not collide with the node fingerprint", () => {
    const value = fingerprint("node");
    expect(docstringKey(value)).not.toBe(value);
    expect(docstringKey(value)).toBe(docstringKey(value));
  });
});
