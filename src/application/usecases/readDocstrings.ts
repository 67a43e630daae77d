/**
 * Read Docstrings Use Case
 *
 * Returns the docstrings a source file currently carries, keyed by
 * qualified name.
 */

import type { SourceNode } from "../../domain/entities";
import { DocSyncError, TreeWalkError, describeError, flattenNodes } from "../../domain/entities";
import type { FileSystem, IParser } from "../../domain/ports";

export interface ReadDocstringsDependencies {
  fileSystem: FileSystem;
  parserFor: (filepath: string) => IParser | null;
}

export interface DocstringListing {
  /** Project-relative path with forward slashes */
  path: string;

  /** Module docstring, if the file has one */
  moduleDocstring?: string;

  /** Every node's docstring (null when missing), in source order */
  docstrings: Record<string, string | null>;
}

/**
 * Read the docstrings of one file inside a project.
 *
 * @throws TreeWalkError when the path leaves the project root or the file
 * cannot be read
 * @throws DocSyncError when the file's language is not supported
 * @throws ParseError when the file does not parse
 */
export async function readDocstrings(
  rootDir: string,
  filepath: string,
  deps: ReadDocstringsDependencies
): Promise<DocstringListing> {
  const { fileSystem, parserFor } = deps;
  const root = fileSystem.resolve(rootDir);
  const absolute = fileSystem.resolve(root, filepath);
  const relative = fileSystem.relative(root, absolute).split("\\").join("/");

  if (relative === "" || relative === ".." || relative.startsWith("../") || /^(\/|[A-Za-z]:)/.test(relative)) {
    throw new TreeWalkError(`Path is outside the project: ${filepath}`, filepath);
  }

  const parser = parserFor(relative);
  if (!parser) {
    throw new DocSyncError("ParseError", `Unsupported file type: ${relative}`, { path: relative });
  }

  let text: string;
  try {
    text = await fileSystem.readFile(absolute);
  } catch (error) {
    throw new TreeWalkError(`Cannot read file: ${describeError(error)}`, relative, error);
  }

  const moduleNode = parser.parse(text, relative);
  const docstrings: Record<string, string | null> = {};
  for (const node of flattenNodes(moduleNode)) {
    docstrings[node.qualifiedName] = docstringOf(node);
  }

  return {
    path: relative,
    moduleDocstring: moduleNode.existingDocstring?.text,
    docstrings,
  };
}

function docstringOf(node: SourceNode): string | null {
  return node.existingDocstring?.text ?? null;
}
