/**
 * File watcher for incremental synchronization
 *
 * - Debouncing: batches rapid file changes (IDE saves, git operations)
 * - Queuing: one synchronization at a time
 * - Filtering: only source files outside ignored paths
 * - Error recovery: keeps watching after a failed run
 */

import { watch, type FSWatcher } from "chokidar";
import * as path from "path";
import { minimatch } from "minimatch";
import type { SyncReport } from "../../domain/entities";
import { describeError } from "../../domain/entities";
import { loadConfig } from "../../infrastructure/config";
import { syncDirectory, type SyncOptions } from "./index";

/** Default debounce delay in milliseconds */
const DEFAULT_DEBOUNCE_MS = 300;

/** Maximum changes to batch before forcing a run */
const MAX_BATCH_SIZE = 100;

type ChangeEvent = "add" | "change" | "unlink";

export interface WatchOptions extends SyncOptions {
  /** Debounce delay in milliseconds (default: 300) */
  debounceMs?: number;
  /** Callback when a run starts */
  onSyncStart?: (files: string[]) => void;
  /** Callback when a run completes */
  onSyncComplete?: (report: SyncReport) => void;
  /** Callback when a file change is detected */
  onFileChange?: (event: ChangeEvent, filepath: string) => void;
  /** Callback for errors */
  onError?: (error: Error) => void;
}

export interface FileWatcher {
  /** Stop watching and clean up */
  stop: () => Promise<void>;
  /** Whether the watcher is currently running */
  isRunning: () => boolean;
}

/**
 * Start watching a directory and re-synchronize after source changes.
 */
export async function watchDirectory(
  rootDir: string,
  options: WatchOptions = {}
): Promise<FileWatcher> {
  const {
    debounceMs = DEFAULT_DEBOUNCE_MS,
    onSyncStart,
    onSyncComplete,
    onFileChange,
    onError,
    ...syncOptions
  } = options;

  rootDir = path.resolve(rootDir);
  const readConfig = options.services?.loadConfig ?? loadConfig;
  const config = { ...(await readConfig(rootDir)), ...options.config };

  const validExtensions = new Set(config.extensions.map((ext) => ext.toLowerCase()));
  const ignorePatterns = [...config.ignorePaths, config.indexDir];

  function isIgnored(relativePath: string): boolean {
    const segments = relativePath.split(path.sep);
    return ignorePatterns.some(
      (pattern) =>
        minimatch(relativePath, pattern, { dot: true }) ||
        segments.some((segment) => minimatch(segment, pattern, { dot: true }))
    );
  }

  // State management
  let running = true;
  let syncing = false;
  const pendingChanges = new Map<string, ChangeEvent>();
  let debounceTimer: ReturnType<typeof setTimeout> | null = null;

  const fail = (error: unknown): void => {
    const err = error instanceof Error ? error : new Error(String(error));
    syncOptions.logger?.error(`[Watch] ${err.message}`);
    onError?.(err);
  };

  async function processPendingChanges(): Promise<void> {
    if (!running || syncing || pendingChanges.size === 0) {
      return;
    }

    syncing = true;
    const files = [...pendingChanges.keys()].sort();
    pendingChanges.clear();

    try {
      onSyncStart?.(files);
      const report = await syncDirectory(rootDir, syncOptions);
      onSyncComplete?.(report);
    } catch (error) {
      fail(new Error(`Synchronization failed: ${describeError(error)}`));
    } finally {
      syncing = false;

      // Changes that arrived during the run
      if (pendingChanges.size > 0) {
        scheduleProcessing();
      }
    }
  }

  function scheduleProcessing(): void {
    if (debounceTimer) {
      clearTimeout(debounceTimer);
    }

    if (pendingChanges.size >= MAX_BATCH_SIZE) {
      debounceTimer = null;
      processPendingChanges().catch(fail);
      return;
    }

    debounceTimer = setTimeout(() => {
      debounceTimer = null;
      processPendingChanges().catch(fail);
    }, debounceMs);
  }

  function handleFileEvent(event: ChangeEvent, filepath: string): void {
    if (!running) return;

    const relativePath = path.relative(rootDir, filepath);
    if (!validExtensions.has(path.extname(filepath).toLowerCase()) || isIgnored(relativePath)) {
      return;
    }

    onFileChange?.(event, relativePath);
    syncOptions.logger?.debug(
      `[Watch] ${event === "add" ? "+" : event === "unlink" ? "-" : "~"} ${relativePath}`
    );

    // Later events override earlier ones for the same file
    pendingChanges.set(relativePath, event);
    scheduleProcessing();
  }

  const watcher: FSWatcher = watch(rootDir, {
    ignored: (filepath: string) => {
      const relativePath = path.relative(rootDir, filepath);
      return relativePath !== "" && isIgnored(relativePath);
    },
    persistent: true,
    ignoreInitial: true,
    awaitWriteFinish: {
      stabilityThreshold: 100,
      pollInterval: 50,
    },
    atomic: true,
  });

  watcher.on("add", (filepath: string) => handleFileEvent("add", filepath));
  watcher.on("change", (filepath: string) => handleFileEvent("change", filepath));
  watcher.on("unlink", (filepath: string) => handleFileEvent("unlink", filepath));
  watcher.on("error", (error: unknown) => fail(error));

  await new Promise<void>((resolve) => {
    watcher.on("ready", () => resolve());
  });

  return {
    stop: async () => {
      running = false;

      if (debounceTimer) {
        clearTimeout(debounceTimer);
        debounceTimer = null;
      }

      await watcher.close();
    },
    isRunning: () => running,
  };
}
