/**
 * Cache Storage Adapter
 *
 * Loads and persists the summary cache and the summary document.
 *
 * Structure:
 * <project>/
 * ├── docs.md            (summary document)
 * └── .docsync/
 *     ├── config.json
 *     └── cache.json     (entries + node lineage)
 */

import type { CacheEntry, CacheSnapshot, Config, NodeLineage } from "../../domain/entities";
import {
  CACHE_SCHEMA_VERSION,
  PersistError,
  createEmptySnapshot,
  describeError,
} from "../../domain/entities";
import type { FileSystem, Logger, SummaryStore } from "../../domain/ports";

export class CacheStorage implements SummaryStore {
  private fs: FileSystem;
  private rootDir: string;
  private config: Config;
  private logger?: Logger;

  constructor(fs: FileSystem, rootDir: string, config: Config, logger?: Logger) {
    this.fs = fs;
    this.rootDir = fs.resolve(rootDir);
    this.config = config;
    this.logger = logger;
  }

  // ============================================================================
  // Path Helpers
  // ============================================================================

  getIndexPath(): string {
    return this.fs.join(this.rootDir, this.config.indexDir);
  }

  getCachePath(): string {
    return this.fs.join(this.getIndexPath(), this.config.cacheFile);
  }

  getSummaryPath(): string {
    return this.fs.join(this.rootDir, this.config.summaryFile);
  }

  // ============================================================================
  // Cache
  // ============================================================================

  /**
   * Load the cache snapshot, or an empty one when there is none yet.
   * A file that is not a readable snapshot is treated as empty, with a warning.
   */
  async load(): Promise<CacheSnapshot> {
    const cachePath = this.getCachePath();
    if (!(await this.fs.exists(cachePath))) {
      return createEmptySnapshot();
    }

    try {
      const content = await this.fs.readFile(cachePath);
      return parseSnapshot(JSON.parse(content));
    } catch (error) {
      this.logger?.warn(`Discarded unreadable cache ${cachePath}: ${describeError(error)}`);
      return createEmptySnapshot();
    }
  }

  /**
   * Write the cache snapshot.
   *
   * @throws PersistError when the write fails
   */
  async saveCache(snapshot: CacheSnapshot): Promise<string> {
    const cachePath = this.getCachePath();
    try {
      await this.fs.writeFile(cachePath, JSON.stringify(snapshot, null, 2) + "\n");
    } catch (error) {
      throw new PersistError(
        `Failed to write cache: ${describeError(error)}`,
        cachePath,
        error
      );
    }
    return cachePath;
  }

  // ============================================================================
  // Summary document
  // ============================================================================

  /**
   * Write the summary document.
   *
   * @throws PersistError when the write fails
   */
  async saveSummary(markdown: string): Promise<string> {
    const summaryPath = this.getSummaryPath();
    try {
      await this.fs.writeFile(summaryPath, markdown);
    } catch (error) {
      throw new PersistError(
        `Failed to write summary document: ${describeError(error)}`,
        summaryPath,
        error
      );
    }
    return summaryPath;
  }

  async hasSummary(): Promise<boolean> {
    return this.fs.exists(this.getSummaryPath());
  }
}

/**
 * Validate a parsed cache file, dropping malformed entries.
 */
export function parseSnapshot(value: unknown): CacheSnapshot {
  if (!isRecord(value) || value.version !== CACHE_SCHEMA_VERSION) {
    return createEmptySnapshot();
  }

  const entries: Record<string, CacheEntry> = {};
  if (isRecord(value.entries)) {
    for (const [key, entry] of Object.entries(value.entries)) {
      if (
        isRecord(entry) &&
        typeof entry.summary === "string" &&
        typeof entry.generatedAt === "string"
      ) {
        entries[key] = { summary: entry.summary, generatedAt: entry.generatedAt };
      }
    }
  }

  const nodes: NodeLineage = {};
  if (isRecord(value.nodes)) {
    for (const [key, fingerprint] of Object.entries(value.nodes)) {
      if (typeof fingerprint === "string") {
        nodes[key] = fingerprint;
      }
    }
  }

  return { version: CACHE_SCHEMA_VERSION, entries, nodes };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
