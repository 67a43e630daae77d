/**
 * Error taxonomy
 *
 * Node- and file-level errors (`ParseError`, `SummarizationError`,
 * `RewriteConflictError`) are caught by the sync driver and reported as
 * warnings. Tree-level and consistency errors (`TreeWalkError`,
 * `CacheConsistencyError`, `ConfigError`) abort the run before anything is
 * persisted.
 */

export type DocSyncErrorKind =
  | "ParseError"
  | "TreeWalkError"
  | "CacheConsistencyError"
  | "SummarizationError"
  | "RewriteConflictError"
  | "PersistError"
  | "ConfigError"
  | "SyncCancelledError";

/**
 * Base class for every error raised by docsync.
 */
export class DocSyncError extends Error {
  readonly kind: DocSyncErrorKind;
  /** Project-relative path the error concerns, when there is one */
  readonly path?: string;

  constructor(
    kind: DocSyncErrorKind,
    message: string,
    options: { path?: string; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = kind;
    this.kind = kind;
    this.path = options.path;
  }
}

/**
 * Source text is not valid for the file's language.
 */
export class ParseError extends DocSyncError {
  /** 1-based line where parsing failed */
  readonly line: number;

  constructor(message: string, line: number, path?: string) {
    super("ParseError", `${message} (line ${line})`, { path });
    this.line = line;
  }
}

/**
 * A path could not be walked: unreadable, permission denied or a symlink cycle.
 */
export class TreeWalkError extends DocSyncError {
  constructor(message: string, path: string, cause?: unknown) {
    super("TreeWalkError", message, { path, cause });
  }
}

/**
 * A fingerprint was written twice with different values.
 */
export class CacheConsistencyError extends DocSyncError {
  readonly fingerprint: string;

  constructor(fingerprint: string) {
    super(
      "CacheConsistencyError",
      `Cache already holds a different value for fingerprint ${fingerprint}`
    );
    this.fingerprint = fingerprint;
  }
}

/**
 * The summarization collaborator failed or returned an unusable response.
 */
export class SummarizationError extends DocSyncError {
  /** Number of attempts made before giving up */
  readonly attempts: number;

  constructor(message: string, attempts: number, cause?: unknown) {
    super("SummarizationError", message, { cause });
    this.attempts = attempts;
  }
}

/**
 * Docstring edits for one file overlap, or the rewritten file no longer
 * has the structure of the original.
 */
export class RewriteConflictError extends DocSyncError {
  constructor(message: string, path?: string) {
    super("RewriteConflictError", message, { path });
  }
}

/**
 * Writing the cache or the summary document failed.
 */
export class PersistError extends DocSyncError {
  constructor(message: string, path: string, cause?: unknown) {
    super("PersistError", message, { path, cause });
  }
}

/**
 * Configuration is invalid or a required setting is missing.
 */
export class ConfigError extends DocSyncError {
  constructor(message: string) {
    super("ConfigError", message);
  }
}

/**
 * Raised inside a run once cancellation has been observed.
 */
export class SyncCancelledError extends DocSyncError {
  constructor() {
    super("SyncCancelledError", "Synchronization was cancelled");
  }
}

/**
 * Throw `SyncCancelledError` if the signal has been aborted.
 */
export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new SyncCancelledError();
  }
}

/**
 * Human-readable message of any thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
