/**
 * Summary Cache Port
 *
 * Fingerprint-keyed store of generated text, injected into the sync driver.
 * Entries are never updated in place: content changes produce new
 * fingerprints, and `prune` drops entries no longer reachable.
 */

import type { CacheEntry, CacheSnapshot, NodeLineage } from "../entities/cache";

export interface SummaryCache {
  /**
   * Cached text for a fingerprint
   */
  get(fingerprint: string): string | undefined;

  /**
   * Store text for a fingerprint. Writing the same value again is a no-op.
   *
   * @throws CacheConsistencyError when a different value is already stored
   */
  put(fingerprint: string, summary: string): void;

  /**
   * Remove every entry whose key is not in the live set.
   *
   * @returns Number of entries removed
   */
  prune(liveFingerprints: ReadonlySet<string>): number;

  /**
   * All entries in sorted key order
   */
  entries(): Array<[string, CacheEntry]>;

  /**
   * Number of entries
   */
  readonly size: number;

  /**
   * Serializable form of the cache plus the lineage of tracked units
   */
  toSnapshot(lineage: NodeLineage): CacheSnapshot;
}

/**
 * Durable storage of a project's cache and summary document.
 * Writes are atomic per artifact.
 */
export interface SummaryStore {
  /** Stored snapshot, or an empty one */
  load(): Promise<CacheSnapshot>;

  /**
   * @returns Path written
   * @throws PersistError
   */
  saveCache(snapshot: CacheSnapshot): Promise<string>;

  /**
   * @returns Path written
   * @throws PersistError
   */
  saveSummary(markdown: string): Promise<string>;

  hasSummary(): Promise<boolean>;
}
