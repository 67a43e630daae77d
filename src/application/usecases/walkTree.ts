/**
 * Walk Tree Use Case
 *
 * Builds the unit tree of a project: one DirectoryUnit per directory that
 * (recursively) holds supported files, one FileUnit per parsed file.
 * Children are sorted by name, so the same file system state always yields
 * the same tree.
 */

import { minimatch } from "minimatch";
import type { Config, DirectoryUnit, FileUnit, SyncWarning, Unit } from "../../domain/entities";
import { ParseError, TreeWalkError, describeError, throwIfCancelled } from "../../domain/entities";
import type { DirectoryEntry, FileSystem, IParser, Logger } from "../../domain/ports";
import { fingerprint, parallelMap } from "../../domain/services";

/**
 * Dependencies required by this use case
 */
export interface WalkTreeDependencies {
  /** Filesystem abstraction */
  fileSystem: FileSystem;
  /** Parser for a file, or null when its language is not supported */
  parserFor: (filepath: string) => IParser | null;
  logger?: Logger;
}

export interface WalkTreeOptions {
  config: Config;
  /** Files read and parsed at once */
  concurrency?: number;
  signal?: AbortSignal;
}

export interface WalkTreeResult {
  root: DirectoryUnit;
  /** Files that were found but could not be parsed */
  skipped: SyncWarning[];
}

/**
 * Walk a project directory.
 *
 * @throws TreeWalkError when a directory or file cannot be read, or a
 * symbolic link leads back into one of its own ancestors
 */
export async function walkTree(
  rootDir: string,
  deps: WalkTreeDependencies,
  options: WalkTreeOptions
): Promise<WalkTreeResult> {
  const { fileSystem, parserFor, logger } = deps;
  const { config, signal, concurrency = 8 } = options;

  const absoluteRoot = fileSystem.resolve(rootDir);
  if (!(await fileSystem.exists(absoluteRoot))) {
    throw new TreeWalkError(`Project root does not exist: ${absoluteRoot}`, ".");
  }

  const ignorePatterns = [...config.ignorePaths, config.indexDir];
  const extensions = new Set(config.extensions.map((ext) => ext.toLowerCase()));
  const skipped: SyncWarning[] = [];

  const isIgnored = (name: string, relPath: string): boolean =>
    ignorePatterns.some(
      (pattern) =>
        minimatch(name, pattern, { dot: true }) || minimatch(relPath, pattern, { dot: true })
    );

  const isSupported = (entry: DirectoryEntry): boolean =>
    extensions.has(fileSystem.extname(entry.name).toLowerCase()) &&
    parserFor(entry.name) !== null;

  const readUnit = async (entry: DirectoryEntry, relPath: string): Promise<FileUnit | null> => {
    const parser = parserFor(entry.name);
    if (!parser) {
      return null;
    }

    let rawText: string;
    try {
      rawText = await fileSystem.readFile(entry.path);
    } catch (error) {
      throw new TreeWalkError(`Cannot read file: ${describeError(error)}`, relPath, error);
    }

    try {
      const rootNode = parser.parse(rawText, relPath);
      return {
        type: "file",
        path: relPath,
        absolutePath: entry.path,
        rawText,
        rootNode,
        fingerprint: fingerprint(rawText),
      };
    } catch (error) {
      if (!(error instanceof ParseError)) {
        throw error;
      }
      skipped.push({ kind: "ParseError", path: relPath, message: error.message });
      logger?.warn(`  Skipped ${relPath}: ${error.message}`);
      return null;
    }
  };

  const visit = async (
    absPath: string,
    relPath: string,
    ancestors: ReadonlySet<string>
  ): Promise<DirectoryUnit> => {
    throwIfCancelled(signal);

    let entries: DirectoryEntry[];
    try {
      entries = await fileSystem.listChildren(absPath);
    } catch (error) {
      throw new TreeWalkError(`Cannot read directory: ${describeError(error)}`, relPath, error);
    }

    const children: Array<Unit | null> = [];
    const files: Array<{ entry: DirectoryEntry; relPath: string; slot: number }> = [];
    const dirs: Array<{ entry: DirectoryEntry; relPath: string; real: string; slot: number }> = [];

    for (const entry of entries) {
      const childRel = relPath === "." ? entry.name : `${relPath}/${entry.name}`;
      if (isIgnored(entry.name, childRel)) {
        logger?.debug(`  Ignored ${childRel}`);
        continue;
      }

      if (entry.type === "directory") {
        const real = await realpathOf(fileSystem, entry.path, childRel);
        if (ancestors.has(real)) {
          throw new TreeWalkError(`Symbolic link cycle: ${childRel} points back to ${real}`, childRel);
        }
        dirs.push({ entry, relPath: childRel, real, slot: children.length });
        children.push(null);
      } else if (entry.type === "file" && isSupported(entry)) {
        files.push({ entry, relPath: childRel, slot: children.length });
        children.push(null);
      }
    }

    const parsed = await parallelMap(files, (file) => readUnit(file.entry, file.relPath), concurrency);
    parsed.forEach((result, index) => {
      if (!result.success) {
        throw result.error;
      }
      children[files[index].slot] = result.value;
    });

    const subdirs = await Promise.all(
      dirs.map((dir) => visit(dir.entry.path, dir.relPath, new Set([...ancestors, dir.real])))
    );
    subdirs.forEach((unit, index) => {
      children[dirs[index].slot] = unit.children.length > 0 ? unit : null;
    });

    return {
      type: "directory",
      path: relPath,
      absolutePath: absPath,
      name: fileSystem.basename(absPath),
      children: children.filter((unit): unit is Unit => unit !== null),
    };
  };

  const realRoot = await realpathOf(fileSystem, absoluteRoot, ".");
  const root = await visit(absoluteRoot, ".", new Set([realRoot]));
  skipped.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  return { root, skipped };
}

async function realpathOf(fileSystem: FileSystem, absPath: string, relPath: string): Promise<string> {
  try {
    return await fileSystem.realpath(absPath);
  } catch (error) {
    throw new TreeWalkError(`Cannot resolve path: ${describeError(error)}`, relPath, error);
  }
}
