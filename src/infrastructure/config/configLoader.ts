/**
 * Configuration Loader
 *
 * Infrastructure adapter for loading and saving docsync configuration.
 * Handles file I/O operations for configuration management.
 */

import * as path from "path";
import * as fs from "fs/promises";
import type { Config, LlmConfig, NodeKind } from "../../domain/entities";
import { ConfigError, createDefaultConfig, describeError } from "../../domain/entities";

// ============================================================================
// Constants
// ============================================================================

/** Default configuration instance */
export const DEFAULT_CONFIG: Config = createDefaultConfig();

/** Name of the config file inside the index directory */
export const CONFIG_FILE = "config.json";

const DOCSTRING_TARGETS: readonly NodeKind[] = ["module", "class", "function"];

// ============================================================================
// Path Utilities (pure functions)
// ============================================================================

/**
 * Get the index directory of a project.
 *
 * Structure: {rootDir}/.docsync/
 */
export function getDocsyncDir(rootDir: string, config: Config = DEFAULT_CONFIG): string {
  return path.join(path.resolve(rootDir), config.indexDir);
}

/**
 * Get the config file path.
 */
export function getConfigPath(rootDir: string, config: Config = DEFAULT_CONFIG): string {
  return path.join(getDocsyncDir(rootDir, config), CONFIG_FILE);
}

// ============================================================================
// Config I/O (infrastructure)
// ============================================================================

/**
 * Load config from file or return defaults.
 *
 * @throws ConfigError when the file exists but is not valid JSON or holds
 * values of the wrong type
 */
export async function loadConfig(rootDir: string): Promise<Config> {
  const configPath = getConfigPath(rootDir);

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch {
    return createDefaultConfig();
  }

  let saved: unknown;
  try {
    saved = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${configPath}: ${describeError(error)}`);
  }
  return mergeConfig(createDefaultConfig(), saved);
}

/**
 * Save config to file
 */
export async function saveConfig(rootDir: string, config: Config): Promise<void> {
  const configPath = getConfigPath(rootDir, config);
  await fs.mkdir(path.dirname(configPath), { recursive: true });
  await fs.writeFile(configPath, JSON.stringify(config, null, 2) + "\n");
}

// ============================================================================
// Config Utilities (pure functions)
// ============================================================================

/**
 * Overlay saved settings on a base config. Top-level keys replace the base's,
 * `llm` is merged key by key. Unknown keys are ignored.
 *
 * @throws ConfigError when a known key has a value of the wrong type
 */
export function mergeConfig(base: Config, saved: unknown): Config {
  if (!isRecord(saved)) {
    throw new ConfigError("Configuration must be a JSON object");
  }

  const config: Config = { ...base, llm: { ...base.llm } };

  if (saved.version !== undefined) config.version = readString(saved, "version");
  if (saved.indexDir !== undefined) config.indexDir = readString(saved, "indexDir");
  if (saved.summaryFile !== undefined) config.summaryFile = readString(saved, "summaryFile");
  if (saved.cacheFile !== undefined) config.cacheFile = readString(saved, "cacheFile");
  if (saved.extensions !== undefined) config.extensions = readStrings(saved, "extensions");
  if (saved.ignorePaths !== undefined) config.ignorePaths = readStrings(saved, "ignorePaths");
  if (saved.concurrency !== undefined) config.concurrency = readNumber(saved, "concurrency");
  if (saved.maxRetries !== undefined) config.maxRetries = readNumber(saved, "maxRetries");
  if (saved.maxChunkChars !== undefined) {
    config.maxChunkChars = readNumber(saved, "maxChunkChars");
  }
  if (saved.docstringTargets !== undefined) {
    config.docstringTargets = readStrings(saved, "docstringTargets").map(toDocstringTarget);
  }

  if (saved.llm !== undefined) {
    if (!isRecord(saved.llm)) {
      throw new ConfigError("'llm' must be an object");
    }
    config.llm = mergeLlm(config.llm, saved.llm);
  }

  return config;
}

function mergeLlm(base: LlmConfig, saved: Record<string, unknown>): LlmConfig {
  const llm: LlmConfig = { ...base };
  if (saved.model !== undefined) llm.model = readString(saved, "model", "llm.");
  if (saved.baseURL !== undefined) llm.baseURL = readString(saved, "baseURL", "llm.");
  if (saved.timeoutMs !== undefined) llm.timeoutMs = readNumber(saved, "timeoutMs", "llm.");
  if (saved.temperature !== undefined) {
    llm.temperature = readNumber(saved, "temperature", "llm.");
  }
  return llm;
}

function toDocstringTarget(value: string): NodeKind {
  const target = DOCSTRING_TARGETS.find((kind) => kind === value);
  if (!target) {
    throw new ConfigError(`Unknown docstring target: '${value}'`);
  }
  return target;
}

function readString(record: Record<string, unknown>, key: string, prefix = ""): string {
  const value = record[key];
  if (typeof value !== "string") {
    throw new ConfigError(`'${prefix}${key}' must be a string`);
  }
  return value;
}

function readNumber(record: Record<string, unknown>, key: string, prefix = ""): number {
  const value = record[key];
  if (typeof value !== "number") {
    throw new ConfigError(`'${prefix}${key}' must be a number`);
  }
  return value;
}

function readStrings(record: Record<string, unknown>, key: string): string[] {
  const value = record[key];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new ConfigError(`'${key}' must be an array of strings`);
  }
  return [...value];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
