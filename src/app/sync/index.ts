/**
 * Synchronization entry points used by the CLI and the SDK.
 *
 * Resolves configuration, wires the default adapters and runs the use cases.
 */

import type { Config, SyncReport, SyncState } from "../../domain/entities";
import type { Logger } from "../../domain/ports";
import {
  getSyncStatus,
  readDocstrings,
  syncDocumentation,
  walkTree,
  type DocstringListing,
  type ProjectStatus,
} from "../../application";
import {
  createReadDependencies,
  createServiceContainer,
  createStatusDependencies,
  createSyncDependencies,
  type ServiceOverrides,
} from "../../composition";
import { renderDirectoryTree } from "../../domain/services";
import { createLogger } from "../../infrastructure/logger";

export interface SyncOptions {
  /** Also rewrite docstrings in source files (default: false) */
  docstrings?: boolean;
  /** Maximum concurrent language-model calls */
  concurrency?: number;
  /** Show debug output */
  verbose?: boolean;
  /** Configuration overrides applied on top of the project's config */
  config?: Partial<Config>;
  /** Logger (default: console) */
  logger?: Logger;
  /** Cooperative cancellation */
  signal?: AbortSignal;
  /** Called on every driver state transition */
  onStateChange?: (state: SyncState) => void;
  /** Adapters replacing the defaults */
  services?: ServiceOverrides;
}

export interface ProjectOptions {
  logger?: Logger;
  services?: ServiceOverrides;
}

function containerFor(options: { logger?: Logger; verbose?: boolean; services?: ServiceOverrides }) {
  return createServiceContainer({
    ...options.services,
    logger: options.logger ?? options.services?.logger ?? createLogger({ verbose: options.verbose }),
  });
}

/**
 * Synchronize a project's documentation with its source tree.
 */
export async function syncDirectory(rootDir: string, options: SyncOptions = {}): Promise<SyncReport> {
  const container = containerFor(options);
  const root = container.fileSystem.resolve(rootDir);

  const config: Config = {
    ...(await container.loadConfig(root)),
    ...options.config,
    ...(options.concurrency !== undefined ? { concurrency: options.concurrency } : {}),
  };

  return syncDocumentation(root, createSyncDependencies(container, config), {
    docstrings: options.docstrings,
    signal: options.signal,
    onStateChange: options.onStateChange,
  });
}

/**
 * What the last synchronization left on disk.
 */
export async function getStatus(rootDir: string, options: ProjectOptions = {}): Promise<ProjectStatus> {
  return getSyncStatus(rootDir, createStatusDependencies(containerFor(options)));
}

/**
 * Docstrings currently in one file of a project.
 */
export async function getDocstrings(
  rootDir: string,
  filepath: string,
  options: ProjectOptions = {}
): Promise<DocstringListing> {
  return readDocstrings(rootDir, filepath, createReadDependencies(containerFor(options)));
}

/**
 * Directory tree of the project's documented files.
 */
export async function getDirectoryTree(rootDir: string, options: ProjectOptions = {}): Promise<string> {
  const container = containerFor(options);
  const root = container.fileSystem.resolve(rootDir);
  const config = await container.loadConfig(root);

  const { root: tree } = await walkTree(
    root,
    { fileSystem: container.fileSystem, parserFor: container.parserFor, logger: container.logger },
    { config }
  );
  return renderDirectoryTree(tree);
}

export { watchDirectory, type WatchOptions, type FileWatcher } from "./watcher";
