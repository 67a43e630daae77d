/**
 * Get Sync Status Use Case
 *
 * Reports what the last synchronization left on disk.
 */

import type { CacheSnapshot, Config } from "../../domain/entities";
import type { FileSystem, SummaryStore } from "../../domain/ports";

export interface SyncStatusDependencies {
  fileSystem: FileSystem;
  loadConfig: (rootDir: string) => Promise<Config>;
  openStore: (rootDir: string, config: Config) => SummaryStore;
}

export interface ProjectStatus {
  rootDir: string;
  /** Whether a cache file with entries exists */
  exists: boolean;
  /** Cached summaries and docstrings */
  cacheEntries: number;
  /** Files with tracked nodes */
  trackedFiles: number;
  /** Tracked nodes and directories */
  trackedUnits: number;
  /** Whether the summary document exists */
  hasSummary: boolean;
  /** Newest `generatedAt` among cache entries */
  lastGeneratedAt?: string;
}

export async function getSyncStatus(
  rootDir: string,
  deps: SyncStatusDependencies
): Promise<ProjectStatus> {
  const root = deps.fileSystem.resolve(rootDir);
  const config = await deps.loadConfig(root);
  const store = deps.openStore(root, config);
  const snapshot: CacheSnapshot = await store.load();

  const entries = Object.values(snapshot.entries);
  const lineageKeys = Object.keys(snapshot.nodes);
  const files = new Set(
    lineageKeys
      .filter((key) => !key.startsWith("dir::"))
      .map((key) => key.slice(0, key.indexOf("::")))
  );
  const lastGeneratedAt = entries
    .map((entry) => entry.generatedAt)
    .sort()
    .pop();

  return {
    rootDir: root,
    exists: entries.length > 0,
    cacheEntries: entries.length,
    trackedFiles: files.size,
    trackedUnits: lineageKeys.length,
    hasSummary: await store.hasSummary(),
    lastGeneratedAt,
  };
}
