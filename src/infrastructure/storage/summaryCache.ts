/**
 * In-Memory Summary Cache
 *
 * Implements the SummaryCache port over a Map. Loaded from and converted back
 * to a CacheSnapshot by the cache storage adapter.
 *
 * Writes are synchronous and therefore serialized: concurrent summarization
 * tasks only ever interleave at their `await` points, never inside `put`.
 */

import type { CacheEntry, CacheSnapshot, NodeLineage } from "../../domain/entities";
import { CACHE_SCHEMA_VERSION, CacheConsistencyError } from "../../domain/entities";
import type { SummaryCache } from "../../domain/ports";

export interface SummaryCacheOptions {
  /** Clock used for `generatedAt` (defaults to the system clock) */
  now?: () => Date;
}

export class InMemorySummaryCache implements SummaryCache {
  private entriesByKey = new Map<string, CacheEntry>();
  private now: () => Date;

  constructor(options: SummaryCacheOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Create a cache holding a snapshot's entries.
   */
  static fromSnapshot(
    snapshot: CacheSnapshot,
    options: SummaryCacheOptions = {}
  ): InMemorySummaryCache {
    const cache = new InMemorySummaryCache(options);
    for (const [key, entry] of Object.entries(snapshot.entries)) {
      cache.entriesByKey.set(key, { ...entry });
    }
    return cache;
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  get(fingerprint: string): string | undefined {
    return this.entriesByKey.get(fingerprint)?.summary;
  }

  put(fingerprint: string, summary: string): void {
    const existing = this.entriesByKey.get(fingerprint);
    if (existing) {
      if (existing.summary !== summary) {
        throw new CacheConsistencyError(fingerprint);
      }
      return;
    }
    this.entriesByKey.set(fingerprint, {
      summary,
      generatedAt: this.now().toISOString(),
    });
  }

  prune(liveFingerprints: ReadonlySet<string>): number {
    let removed = 0;
    for (const key of [...this.entriesByKey.keys()]) {
      if (!liveFingerprints.has(key)) {
        this.entriesByKey.delete(key);
        removed++;
      }
    }
    return removed;
  }

  entries(): Array<[string, CacheEntry]> {
    return [...this.entriesByKey.entries()].sort(([a], [b]) =>
      a < b ? -1 : a > b ? 1 : 0
    );
  }

  /**
   * Snapshot of the cache plus the given lineage, keys sorted.
   */
  toSnapshot(lineage: NodeLineage): CacheSnapshot {
    const entries: Record<string, CacheEntry> = {};
    for (const [key, entry] of this.entries()) {
      entries[key] = { summary: entry.summary, generatedAt: entry.generatedAt };
    }

    const nodes: NodeLineage = {};
    for (const key of Object.keys(lineage).sort()) {
      nodes[key] = lineage[key];
    }

    return { version: CACHE_SCHEMA_VERSION, entries, nodes };
  }
}
