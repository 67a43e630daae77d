/**
 * Tests for reading a file's docstrings
 */
import { describe, expect, it } from "vitest";
import { readDocstrings } from "./readDocstrings";
import { DocSyncError, TreeWalkError } from "../../domain/entities";
import { createParserForFile } from "../../infrastructure/parsing";
import { MemoryFileSystem } from "../../tests/fakes";

const SOURCE = [
  '"""Shapes."""',
  "",
  "class Circle:",
  '    """A circle."""',
  "",
  "    def area(self):",
  "        return 3.14 * self.r ** 2",
  "",
].join("\n");

const fs = new MemoryFileSystem({ "/proj/geo/shapes.py": SOURCE, "/proj/notes.txt": "hi" });
const deps = { fileSystem: fs, parserFor: createParserForFile };

describe("readDocstrings", () => {
  it("should key every node's docstring by qualified name", async () => {
    const listing = await readDocstrings("/proj", "geo/shapes.py", deps);

    expect(listing).toEqual({
      path: "geo/shapes.py",
      moduleDocstring: "Shapes.",
      docstrings: {
        "geo.shapes": "Shapes.",
        "geo.shapes.Circle": "A circle.",
        "geo.shapes.Circle.area": null,
      },
    });
  });

  it("should accept absolute paths inside the project", async () => {
    const listing = await readDocstrings("/proj", "/proj/geo/shapes.py", deps);

    expect(listing.path).toBe("geo/shapes.py");
  });

  it("should refuse paths outside the project", async () => {
    await expect(readDocstrings("/proj", "../etc/passwd.py", deps)).rejects.toBeInstanceOf(
      TreeWalkError
    );
    await expect(readDocstrings("/proj/geo", "/proj/notes.txt", deps)).rejects.toThrow(
      "Path is outside the project: /proj/notes.txt"
    );
  });

  it("should refuse unsupported files", async () => {
    const error = await readDocstrings("/proj", "notes.txt", deps).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DocSyncError);
    if (!(error instanceof DocSyncError)) return;
    expect(error.kind).toBe("ParseError");
    expect(error.message).toBe("Unsupported file type: notes.txt");
  });

  it("should report a missing file as a walk error", async () => {
    await expect(readDocstrings("/proj", "gone.py", deps)).rejects.toThrow(/^Cannot read file: ENOENT/);
  });
});
