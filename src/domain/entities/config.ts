/**
 * Config Entity
 *
 * Configuration for documentation synchronization.
 */

import type { NodeKind } from "./sourceNode";

/**
 * Settings for the language-model collaborator.
 */
export interface LlmConfig {
  /** Chat model used for summaries and docstrings */
  model: string;

  /** Override for the API base URL (proxies, compatible servers) */
  baseURL?: string;

  /** Per-request timeout in milliseconds */
  timeoutMs: number;

  /** Sampling temperature */
  temperature: number;
}

/**
 * Main docsync configuration.
 */
export interface Config {
  /** docsync config version */
  version: string;

  /** Directory name for cache and config storage (default: '.docsync') */
  indexDir: string;

  /** Source file extensions to document (e.g., ['.py']) */
  extensions: string[];

  /** Directory or file name globs to skip while walking */
  ignorePaths: string[];

  /** Summary document written at the project root */
  summaryFile: string;

  /** Cache file name inside the index directory */
  cacheFile: string;

  /** Maximum number of concurrent summarization calls */
  concurrency: number;

  /** Retries after a failed summarization call (0 means a single attempt) */
  maxRetries: number;

  /** Texts longer than this are summarized in chunks and then combined */
  maxChunkChars: number;

  /** Node kinds that receive docstrings in docstring mode */
  docstringTargets: NodeKind[];

  /** Language-model settings */
  llm: LlmConfig;
}

/**
 * Default paths to ignore while walking.
 */
export const DEFAULT_IGNORE_PATHS = [
  // Package managers & dependencies
  "node_modules",
  "vendor",
  "site-packages",

  // Version control
  ".git",
  ".hg",
  ".svn",

  // Build outputs
  "dist",
  "build",
  "*.egg-info",

  // Caches
  ".cache",
  "__pycache__",
  ".pytest_cache",
  ".mypy_cache",
  ".ruff_cache",
  ".tox",
  ".nox",

  // Python environments
  ".venv",
  "venv",
  "env",

  // IDE & editor
  ".idea",
  ".vscode",

  // docsync storage
  ".docsync",
];

/**
 * Default source extensions.
 */
export const DEFAULT_EXTENSIONS = [".py", ".pyw"];

/** Default chunk threshold: roughly 32k tokens at 4 characters per token */
export const DEFAULT_MAX_CHUNK_CHARS = 128_000;

/**
 * Create a default configuration.
 */
export function createDefaultConfig(): Config {
  return {
    version: "0.1.0",
    indexDir: ".docsync",
    extensions: [...DEFAULT_EXTENSIONS],
    ignorePaths: [...DEFAULT_IGNORE_PATHS],
    summaryFile: "docs.md",
    cacheFile: "cache.json",
    concurrency: 4,
    maxRetries: 2,
    maxChunkChars: DEFAULT_MAX_CHUNK_CHARS,
    docstringTargets: ["module", "class", "function"],
    llm: {
      model: "gpt-4o-mini",
      timeoutMs: 60_000,
      temperature: 0.2,
    },
  };
}
