/**
 * Sync Documentation Use Case
 *
 * Orchestrates one synchronization run:
 *
 *   idle → walking → summarizing → aggregating → (rewriting) → persisting → idle
 *
 * Walking is all-or-nothing. Summarizing, aggregating and rewriting degrade
 * per node or file and report warnings. Persisting writes the cache and the
 * summary document, each atomically, and is skipped when the run was
 * cancelled.
 */

import type {
  CacheSnapshot,
  Config,
  FileUnit,
  SyncReport,
  SyncState,
  SyncWarning,
} from "../../domain/entities";
import {
  ConfigError,
  PersistError,
  ParseError,
  RewriteConflictError,
  SummarizationError,
  SyncCancelledError,
  collectFiles,
  describeError,
  throwIfCancelled,
} from "../../domain/entities";
import type {
  FileSystem,
  IParser,
  Logger,
  SummarizationProvider,
  SummaryCache,
  SummaryStore,
} from "../../domain/ports";
import {
  NodeSummarizer,
  TreeAggregator,
  docstringKey,
  fingerprint,
  formatValidationIssues,
  renderSummaryDocument,
  rewriteDocstrings,
  validateConfig,
  verifyRewrite,
  type NodeRecord,
} from "../../domain/services";
import { walkTree } from "./walkTree";

/**
 * Options for the sync documentation use case
 */
export interface SyncDocumentationOptions {
  /** Override configuration */
  config?: Partial<Config>;
  /** Also rewrite docstrings in source files */
  docstrings?: boolean;
  /** Cooperative cancellation */
  signal?: AbortSignal;
  /** Called on every state transition */
  onStateChange?: (state: SyncState) => void;
}

/**
 * Dependencies required by this use case
 */
export interface SyncDocumentationDependencies {
  /** Filesystem abstraction */
  fileSystem: FileSystem;
  /** Load configuration */
  loadConfig: (rootDir: string) => Promise<Config>;
  /** Parser for a file, or null when its language is not supported */
  parserFor: (filepath: string) => IParser | null;
  /** Summarization and docstring capabilities */
  provider: SummarizationProvider;
  /** Storage for the cache and summary document */
  openStore: (rootDir: string, config: Config) => SummaryStore;
  /** Cache populated from a stored snapshot */
  openCache: (snapshot: CacheSnapshot) => SummaryCache;
  logger?: Logger;
}

/**
 * Synchronize a project's summary document (and optionally its docstrings)
 * with its source tree.
 *
 * @throws ConfigError when the configuration is invalid
 * @throws TreeWalkError when the tree cannot be walked
 * @throws CacheConsistencyError when the cache holds conflicting entries
 */
export async function syncDocumentation(
  rootDir: string,
  deps: SyncDocumentationDependencies,
  options: SyncDocumentationOptions = {}
): Promise<SyncReport> {
  const { fileSystem, parserFor, provider, logger } = deps;
  const { signal, docstrings = false } = options;
  const startedAt = Date.now();

  let state: SyncState = "idle";
  const enter = (next: SyncState): void => {
    state = next;
    logger?.debug(`State: ${next}`);
    options.onStateChange?.(next);
  };

  rootDir = fileSystem.resolve(rootDir);
  const config: Config = { ...(await deps.loadConfig(rootDir)), ...options.config };

  const validation = validateConfig(config);
  if (!validation.valid) {
    throw new ConfigError(formatValidationIssues(validation.getErrors()));
  }
  for (const issue of validation.getWarnings()) {
    logger?.warn(`Config: ${issue.path}: ${issue.message}`);
  }

  const store = deps.openStore(rootDir, config);
  const snapshot = await store.load();
  const cache = deps.openCache(snapshot);

  const summarizer = new NodeSummarizer(provider, cache, {
    maxRetries: config.maxRetries,
    maxChunkChars: config.maxChunkChars,
    concurrency: config.concurrency,
    signal,
  });
  const aggregator = new TreeAggregator({
    summarizer,
    cache,
    previousLineage: snapshot.nodes,
    logger,
  });

  const warnings: SyncWarning[] = [];
  const skippedFiles: string[] = [];
  const rewrittenFiles: string[] = [];
  const docstringKeys = new Set<string>();
  let processedFiles: string[] = [];

  const report = (status: SyncReport["status"], extra: Partial<SyncReport> = {}): SyncReport => ({
    status,
    processedFiles,
    skippedFiles: [...new Set(skippedFiles)].sort(),
    warnings: sortWarnings([...warnings, ...aggregator.warnings]),
    changes: { ...aggregator.changes },
    summarizeCalls: summarizer.summarizeCalls,
    docstringCalls: summarizer.docstringCalls,
    rewrittenFiles,
    persisted: false,
    rootSummary: "",
    durationMs: Date.now() - startedAt,
    ...extra,
  });

  try {
    // Walking
    enter("walking");
    logger?.info(`Synchronizing documentation: ${rootDir}`);
    const walk = await walkTree(
      rootDir,
      { fileSystem, parserFor, logger },
      { config, signal, concurrency: config.concurrency }
    );
    warnings.push(...walk.skipped);
    skippedFiles.push(...walk.skipped.map((warning) => warning.path));

    const files = collectFiles(walk.root);
    processedFiles = files.map((file) => file.path);
    logger?.info(`Found ${files.length} source files`);

    // Summarizing: every file's nodes, bottom-up, files concurrently
    enter("summarizing");
    let done = 0;
    await Promise.all(
      files.map(async (file) => {
        await aggregator.summarizeFile(file);
        logger?.progress(`  Summarized ${++done}/${files.length} files`);
      })
    );
    logger?.clearProgress();

    // Aggregating: directories, after all of their children
    enter("aggregating");
    const root = await aggregator.aggregate(walk.root);

    for (const file of files) {
      for (const record of aggregator.nodeRecords(file.path)) {
        const key = docstringKey(record.fingerprint);
        if (cache.get(key) !== undefined) {
          docstringKeys.add(key);
        }
      }
    }

    if (docstrings) {
      enter("rewriting");
      for (const file of files) {
        throwIfCancelled(signal);
        await syncFileDocstrings(file, aggregator.nodeRecords(file.path));
      }
    }

    throwIfCancelled(signal);

    // Persisting
    enter("persisting");
    const live = new Set([...aggregator.liveFingerprints, ...docstringKeys]);
    const lineage = { ...aggregator.lineage };
    for (const path of walk.skipped.map((warning) => warning.path)) {
      keepSkippedFile(path, snapshot.nodes, lineage, live, cache);
    }

    const pruned = cache.prune(live);
    logger?.debug(`Pruned ${pruned} stale cache entries`);

    let persisted = false;
    let cachePath: string | undefined;
    let summaryPath: string | undefined;
    try {
      cachePath = await store.saveCache(cache.toSnapshot(lineage));
      summaryPath = await store.saveSummary(renderSummaryDocument(walk.root, root));
      persisted = true;
    } catch (error) {
      if (!(error instanceof PersistError)) {
        throw error;
      }
      warnings.push({ kind: "PersistError", path: error.path ?? rootDir, message: error.message });
      logger?.error(error.message);
    }

    const result = report(
      warnings.length + aggregator.warnings.length > 0 ? "partial" : "success",
      { persisted, cachePath, summaryPath, rootSummary: root.summary }
    );
    logger?.info(
      `Synchronized ${files.length} files: ${result.summarizeCalls} summarization calls, ` +
        `${result.docstringCalls} docstring calls, ${result.warnings.length} warnings`
    );
    return result;
  } catch (error) {
    if (error instanceof SyncCancelledError) {
      logger?.clearProgress();
      logger?.warn(`Synchronization cancelled while ${state}; nothing was persisted`);
      return report("cancelled");
    }
    throw error;
  } finally {
    enter("idle");
  }

  /**
   * Generate docstrings for a file's target nodes and write the file back.
   * Nodes whose docstring key is cached and which already carry a docstring
   * are left as they are.
   */
  async function syncFileDocstrings(file: FileUnit, records: NodeRecord[]): Promise<void> {
    const parser = parserFor(file.path);
    if (!parser) {
      return;
    }

    const targets = records.filter((record) => config.docstringTargets.includes(record.node.kind));
    const replacements = new Map<string, string>();

    await Promise.all(
      targets.map(async ({ node, fingerprint: nodeFingerprint }) => {
        const key = docstringKey(nodeFingerprint);
        const cached = cache.get(key);
        if (cached !== undefined && node.existingDocstring) {
          docstringKeys.add(key);
          return;
        }

        try {
          const text =
            cached ??
            (await summarizer.generateDocstring(key, {
              kind: node.kind,
              qualifiedName: node.qualifiedName,
              signature: node.header,
              body: file.rawText.slice(node.span.start, node.span.end),
              existingDocstring: node.existingDocstring?.text,
            }));
          docstringKeys.add(key);
          replacements.set(node.qualifiedName, text);
        } catch (error) {
          if (!(error instanceof SummarizationError)) {
            throw error;
          }
          warnings.push({
            kind: "SummarizationError",
            path: file.path,
            node: node.qualifiedName,
            message: error.message,
          });
          logger?.warn(`  Docstring failed for ${node.qualifiedName}: ${error.message}`);
        }
      })
    );

    if (replacements.size === 0) {
      return;
    }

    let rewritten: string;
    try {
      rewritten = rewriteDocstrings(file, replacements, (text, indent, eol) =>
        parser.formatDocstring(text, indent, eol)
      );
      if (rewritten === file.rawText) {
        return;
      }
      verifyRewrite(file.rootNode, reparse(parser, rewritten, file.path), file.path);
      await checkUnchangedOnDisk(file);
    } catch (error) {
      if (!(error instanceof RewriteConflictError)) {
        throw error;
      }
      warnings.push({ kind: "RewriteConflictError", path: file.path, message: error.message });
      skippedFiles.push(file.path);
      logger?.warn(`  Skipped rewriting ${file.path}: ${error.message}`);
      return;
    }

    try {
      await fileSystem.writeFile(file.absolutePath, rewritten);
    } catch (error) {
      warnings.push({
        kind: "PersistError",
        path: file.path,
        message: `Failed to write ${file.path}: ${describeError(error)}`,
      });
      skippedFiles.push(file.path);
      logger?.warn(`  Failed to write ${file.path}: ${describeError(error)}`);
      return;
    }

    rewrittenFiles.push(file.path);
    logger?.info(`  Updated docstrings in ${file.path} (${replacements.size} nodes)`);
  }

  /**
   * The bytes on disk must still be the text that was parsed, and that text
   * must round-trip through UTF-8 so writing it back changes nothing else.
   */
  async function checkUnchangedOnDisk(file: FileUnit): Promise<void> {
    let bytes: Uint8Array;
    try {
      bytes = await fileSystem.readBytes(file.absolutePath);
    } catch (error) {
      throw new RewriteConflictError(`Cannot re-read file: ${describeError(error)}`, file.path);
    }

    const text = new TextDecoder("utf-8", { ignoreBOM: true }).decode(bytes);
    if (Buffer.compare(new TextEncoder().encode(text), bytes) !== 0) {
      throw new RewriteConflictError("File is not valid UTF-8; docstrings left unchanged", file.path);
    }
    if (fingerprint(text) !== file.fingerprint) {
      throw new RewriteConflictError("File changed on disk during synchronization", file.path);
    }
  }
}

function sortWarnings(warnings: SyncWarning[]): SyncWarning[] {
  const order = (w: SyncWarning) => `${w.path}\u0000${w.node ?? ""}\u0000${w.kind}`;
  return warnings.sort((a, b) => (order(a) < order(b) ? -1 : order(a) > order(b) ? 1 : 0));
}

function reparse(parser: IParser, text: string, path: string): ReturnType<IParser["parse"]> {
  try {
    return parser.parse(text, path);
  } catch (error) {
    if (error instanceof ParseError) {
      throw new RewriteConflictError(`Rewritten file no longer parses: ${error.message}`, path);
    }
    throw error;
  }
}

/**
 * Carry a skipped file's lineage and cache entries over to the next run, so
 * a temporary syntax error does not discard its summaries.
 */
function keepSkippedFile(
  path: string,
  previous: Record<string, string>,
  lineage: Record<string, string>,
  live: Set<string>,
  cache: SummaryCache
): void {
  const prefix = `${path}::`;
  for (const [key, value] of Object.entries(previous)) {
    if (key.startsWith(prefix) && cache.get(value) !== undefined) {
      lineage[key] = value;
      live.add(value);
    }
  }
}
