/**
 * Composition Root
 *
 * This is the single place where all dependencies are wired together.
 * The composition root creates concrete implementations and injects them
 * into use cases.
 *
 * This is the only file that knows about concrete implementations.
 * Everything else depends only on interfaces (ports).
 */

import type { CacheSnapshot, Config } from "./domain/entities";
import { ConfigError } from "./domain/entities";
import type {
  FileSystem,
  IParser,
  Logger,
  SummarizationProvider,
  SummaryCache,
  SummaryStore,
} from "./domain/ports";
import type {
  ReadDocstringsDependencies,
  SyncDocumentationDependencies,
  SyncStatusDependencies,
} from "./application";

// Infrastructure implementations
import {
  CacheStorage,
  InMemorySummaryCache,
  LlmSummarizationProvider,
  OpenAIChatClient,
  createParserForFile,
  createSilentLogger,
  loadConfig,
  nodeFileSystem,
} from "./infrastructure";

// ============================================================================
// Service Container
// ============================================================================

/**
 * Replacements for the default adapters (tests, embedding applications).
 */
export interface ServiceOverrides {
  fileSystem?: FileSystem;
  /** Used instead of the OpenAI-backed provider */
  provider?: SummarizationProvider;
  logger?: Logger;
  loadConfig?: (rootDir: string) => Promise<Config>;
  /** OpenAI API key (defaults to the OPENAI_API_KEY environment variable) */
  apiKey?: string;
}

/**
 * Container for all application services.
 * Created once and passed to use cases.
 */
export interface ServiceContainer {
  fileSystem: FileSystem;
  logger: Logger;
  loadConfig: (rootDir: string) => Promise<Config>;
  parserFor: (filepath: string) => IParser | null;
  openStore: (rootDir: string, config: Config) => SummaryStore;
  openCache: (snapshot: CacheSnapshot) => SummaryCache;

  /**
   * Summarization provider for a configuration.
   *
   * @throws ConfigError when no provider was supplied and no API key is set
   */
  getProvider: (config: Config) => SummarizationProvider;
}

export function createServiceContainer(overrides: ServiceOverrides = {}): ServiceContainer {
  const fileSystem = overrides.fileSystem ?? nodeFileSystem;
  const logger = overrides.logger ?? createSilentLogger();

  return {
    fileSystem,
    logger,
    loadConfig: overrides.loadConfig ?? loadConfig,
    parserFor: createParserForFile,
    openStore: (rootDir, config) => new CacheStorage(fileSystem, rootDir, config, logger),
    openCache: (snapshot) => InMemorySummaryCache.fromSnapshot(snapshot),

    getProvider: (config) => {
      if (overrides.provider) {
        return overrides.provider;
      }
      const apiKey = overrides.apiKey ?? process.env.OPENAI_API_KEY;
      if (!apiKey) {
        throw new ConfigError(
          "OPENAI_API_KEY is not set. Export it to let docsync call the language model."
        );
      }
      return new LlmSummarizationProvider(new OpenAIChatClient({ ...config.llm, apiKey }));
    },
  };
}

// ============================================================================
// Use Case Dependencies
// ============================================================================

/**
 * Create dependencies for the syncDocumentation use case with a resolved
 * configuration.
 */
export function createSyncDependencies(
  container: ServiceContainer,
  config: Config
): SyncDocumentationDependencies {
  return {
    fileSystem: container.fileSystem,
    loadConfig: async () => config,
    parserFor: container.parserFor,
    provider: container.getProvider(config),
    openStore: container.openStore,
    openCache: container.openCache,
    logger: container.logger,
  };
}

/**
 * Create dependencies for the readDocstrings use case.
 */
export function createReadDependencies(container: ServiceContainer): ReadDocstringsDependencies {
  return {
    fileSystem: container.fileSystem,
    parserFor: container.parserFor,
  };
}

/**
 * Create dependencies for the getSyncStatus use case.
 */
export function createStatusDependencies(container: ServiceContainer): SyncStatusDependencies {
  return {
    fileSystem: container.fileSystem,
    loadConfig: container.loadConfig,
    openStore: container.openStore,
  };
}
