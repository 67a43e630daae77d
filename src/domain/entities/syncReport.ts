/**
 * SyncReport Entity
 *
 * What a synchronization run reports back to its caller.
 */

import type { DocSyncErrorKind } from "./errors";

/**
 * Driver states, in the order a run moves through them.
 */
export type SyncState =
  | "idle"
  | "walking"
  | "summarizing"
  | "aggregating"
  | "rewriting"
  | "persisting";

/**
 * Overall outcome. Hard failures are thrown instead of reported.
 */
export type SyncStatus = "success" | "partial" | "cancelled";

/**
 * Classification of a unit relative to the cache.
 * `changed` and `new` are handled identically downstream.
 */
export type ChangeStatus = "unchanged" | "changed" | "new";

/**
 * A file or node that was skipped or degraded during the run.
 */
export interface SyncWarning {
  kind: DocSyncErrorKind;

  /** Project-relative path */
  path: string;

  /** Qualified name of the affected node, when the warning is node-level */
  node?: string;

  message: string;
}

export interface SyncReport {
  status: SyncStatus;

  /** Files that were parsed and summarized */
  processedFiles: string[];

  /** Files left out of the run (unparsable, rewrite failures) */
  skippedFiles: string[];

  warnings: SyncWarning[];

  /** Summarized nodes and directories by change status */
  changes: Record<ChangeStatus, number>;

  /** Calls made to the summarization capability */
  summarizeCalls: number;

  /** Calls made to the docstring capability */
  docstringCalls: number;

  /** Files whose docstrings were rewritten on disk */
  rewrittenFiles: string[];

  /** Whether the cache and summary document were written */
  persisted: boolean;

  /** Root-level project summary ("" when the project has no source files) */
  rootSummary: string;

  /** Absolute path of the summary document, when persisted */
  summaryPath?: string;

  /** Absolute path of the cache file, when persisted */
  cachePath?: string;

  /** Wall-clock duration of the run */
  durationMs: number;
}
