/**
 * Domain Entities
 *
 * Core data structures with no external dependencies.
 */

// Source structure
export type {
  NodeKind,
  Span,
  DocstringSlot,
  ExistingDocstring,
  SourceNode,
} from "./sourceNode";
export { walkNodes, flattenNodes } from "./sourceNode";

// Project tree
export type { FileUnit, DirectoryUnit, Unit, AggregatedUnit } from "./units";
export { unitName, collectFiles } from "./units";

// Cache
export type { CacheEntry, CacheSnapshot, NodeLineage } from "./cache";
export {
  CACHE_SCHEMA_VERSION,
  createEmptySnapshot,
  nodeLineageKey,
  directoryLineageKey,
} from "./cache";

// Config
export type { Config, LlmConfig } from "./config";
export {
  DEFAULT_IGNORE_PATHS,
  DEFAULT_EXTENSIONS,
  DEFAULT_MAX_CHUNK_CHARS,
  createDefaultConfig,
} from "./config";

// Run results
export type {
  ChangeStatus,
  SyncState,
  SyncStatus,
  SyncWarning,
  SyncReport,
} from "./syncReport";

// Errors
export type { DocSyncErrorKind } from "./errors";
export {
  DocSyncError,
  ParseError,
  TreeWalkError,
  CacheConsistencyError,
  SummarizationError,
  RewriteConflictError,
  PersistError,
  ConfigError,
  SyncCancelledError,
  throwIfCancelled,
  describeError,
} from "./errors";
