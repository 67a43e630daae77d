/**
 * docsync - Incremental documentation for Python codebases
 *
 * Keeps a hierarchical Markdown summary of a project, and optionally the
 * docstrings in its source files, in step with the source tree. Only nodes
 * whose content changed since the last run are sent to the language model.
 *
 * @example
 * ```ts
 * import docsync from 'docsync';
 *
 * // Summarize a project into docs.md
 * const report = await docsync.sync('/path/to/project');
 *
 * // Also write generated docstrings into the source files
 * await docsync.sync('/path/to/project', { docstrings: true });
 *
 * // Inspect what the last run left on disk
 * const status = await docsync.status('/path/to/project');
 * ```
 *
 * @example With custom logger
 * ```ts
 * import docsync, { createInlineLogger } from 'docsync';
 *
 * const logger = createInlineLogger({ verbose: false });
 * await docsync.sync('/path/to/project', { logger });
 * ```
 */

import {
  getDirectoryTree,
  getDocstrings,
  getStatus,
  syncDirectory,
  watchDirectory,
} from "./app/sync";
import type {
  FileWatcher,
  ProjectOptions,
  SyncOptions,
  WatchOptions,
} from "./app/sync";
import type { DocstringListing, ProjectStatus } from "./application";
import type { SyncReport } from "./domain/entities";
import {
  ConsoleLogger,
  InlineProgressLogger,
  RecordingLogger,
  SilentLogger,
  createLogger,
  createInlineLogger,
  createSilentLogger,
} from "./infrastructure/logger";

// Re-export types
export type {
  FileWatcher,
  ProjectOptions,
  SyncOptions,
  WatchOptions,
} from "./app/sync";
export type { DocstringListing, ProjectStatus } from "./application";
export type {
  Config,
  LlmConfig,
  NodeKind,
  SourceNode,
  SyncReport,
  SyncState,
  SyncStatus,
  SyncWarning,
} from "./domain/entities";
export type {
  ChatClient,
  ChatMessage,
  Logger,
  LoggerFactory,
  SummarizationProvider,
} from "./domain/ports";
export type { ServiceOverrides } from "./composition";

// Errors
export {
  DocSyncError,
  ParseError,
  TreeWalkError,
  CacheConsistencyError,
  SummarizationError,
  RewriteConflictError,
  PersistError,
  ConfigError,
} from "./domain/entities";

// Configuration
export { loadConfig, saveConfig } from "./infrastructure/config";

// Re-export logger implementations and factories
export {
  ConsoleLogger,
  InlineProgressLogger,
  RecordingLogger,
  SilentLogger,
  createLogger,
  createInlineLogger,
  createSilentLogger,
};

/**
 * Synchronize a project's summary document, and its docstrings when
 * `docstrings` is set.
 *
 * Writes `docs.md` at the project root and the cache under `.docsync/`.
 * A second run over an unchanged tree makes no language-model calls and
 * leaves every file byte-identical.
 *
 * @example
 * ```ts
 * const report = await docsync.sync('./my-project', { concurrency: 4 });
 * if (report.status === 'partial') {
 *   console.warn(report.warnings);
 * }
 * ```
 */
export async function sync(directory: string, options: SyncOptions = {}): Promise<SyncReport> {
  return syncDirectory(directory, options);
}

/**
 * Report what the last synchronization left on disk.
 */
export async function status(
  directory: string,
  options: ProjectOptions = {}
): Promise<ProjectStatus> {
  return getStatus(directory, options);
}

/**
 * Docstrings currently present in one file, keyed by qualified name.
 *
 * @throws TreeWalkError when the file lies outside the project
 */
export async function docstrings(
  directory: string,
  filepath: string,
  options: ProjectOptions = {}
): Promise<DocstringListing> {
  return getDocstrings(directory, filepath, options);
}

/**
 * Directory tree of the project's documented files.
 */
export async function tree(directory: string, options: ProjectOptions = {}): Promise<string> {
  return getDirectoryTree(directory, options);
}

/**
 * Re-synchronize whenever source files change.
 */
export async function watch(directory: string, options: WatchOptions = {}): Promise<FileWatcher> {
  return watchDirectory(directory, options);
}

// Default export for convenient importing
const docsync = {
  sync,
  status,
  docstrings,
  tree,
  watch,
};

export default docsync;
