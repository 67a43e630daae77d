/**
 * Project tree units
 *
 * The tree walk produces one `DirectoryUnit` per directory holding supported
 * files and one `FileUnit` per parsed source file. Units are built once per
 * synchronization pass and are read-only afterwards.
 */

import type { SourceNode } from "./sourceNode";

/**
 * One parsed source file.
 */
export interface FileUnit {
  type: "file";

  /** Path relative to the project root, always with forward slashes */
  path: string;

  /** Absolute path on disk */
  absolutePath: string;

  /** Text exactly as read */
  rawText: string;

  /** Module node covering the whole file */
  rootNode: SourceNode;

  /** Content hash of `rawText` */
  fingerprint: string;
}

/**
 * One directory. Children are sorted by name.
 */
export interface DirectoryUnit {
  type: "directory";

  /** Path relative to the project root (`.` for the root) */
  path: string;

  /** Absolute path on disk */
  absolutePath: string;

  /** Base name, or the root directory's own name */
  name: string;

  children: Unit[];
}

export type Unit = FileUnit | DirectoryUnit;

/**
 * Result of aggregating a unit: the unit's summary plus everything the
 * summary document needs, mirroring the unit tree.
 */
export interface AggregatedUnit {
  unit: Unit;

  /** Summary text (a placeholder when no summary could be produced) */
  summary: string;

  /** Fingerprint the summary belongs to */
  fingerprint: string;

  /** True when this summary or any summary below it is stale or missing */
  degraded: boolean;

  children: AggregatedUnit[];
}

/**
 * Base name of a relative path.
 */
export function unitName(unit: Unit): string {
  if (unit.type === "directory") {
    return unit.name;
  }
  const slash = unit.path.lastIndexOf("/");
  return slash === -1 ? unit.path : unit.path.slice(slash + 1);
}

/**
 * Collect every file below a directory in tree order.
 */
export function collectFiles(unit: Unit): FileUnit[] {
  if (unit.type === "file") {
    return [unit];
  }
  return unit.children.flatMap(collectFiles);
}
