/**
 * Cache Entities
 *
 * Persisted summary cache. Entries are keyed by content fingerprint so
 * identical content, even after a move or rename, reuses its summary.
 *
 * Stored as JSON in: <project>/.docsync/cache.json
 */

/**
 * A cached summary (or generated docstring) for one fingerprint.
 */
export interface CacheEntry {
  /** Summary text */
  summary: string;

  /** ISO timestamp of when the entry was generated */
  generatedAt: string;
}

/**
 * Last fingerprint whose summary was used for each tracked unit.
 *
 * Keys are `<relative path>::<qualified name>` for source nodes and
 * `dir::<relative path>` for directories. Used to find a previous summary
 * when summarizing a changed unit fails.
 */
export type NodeLineage = Record<string, string>;

/**
 * On-disk shape of the cache file.
 */
export interface CacheSnapshot {
  /** Schema version */
  version: string;

  /** Entries keyed by fingerprint, in sorted key order */
  entries: Record<string, CacheEntry>;

  /** Lineage of tracked units, in sorted key order */
  nodes: NodeLineage;
}

/** Current cache schema version */
export const CACHE_SCHEMA_VERSION = "1.0.0";

/**
 * Create an empty cache snapshot.
 */
export function createEmptySnapshot(): CacheSnapshot {
  return { version: CACHE_SCHEMA_VERSION, entries: {}, nodes: {} };
}

/**
 * Lineage key for a source node.
 */
export function nodeLineageKey(filepath: string, qualifiedName: string): string {
  return `${filepath}::${qualifiedName}`;
}

/**
 * Lineage key for a directory.
 */
export function directoryLineageKey(dirpath: string): string {
  return `dir::${dirpath}`;
}
