/**
 * Configuration Infrastructure
 *
 * Handles loading and saving docsync configuration from the filesystem.
 */

export {
  // Constants
  DEFAULT_CONFIG,
  CONFIG_FILE,
  // Path utilities
  getDocsyncDir,
  getConfigPath,
  // I/O operations
  loadConfig,
  saveConfig,
  // Config utilities
  mergeConfig,
} from "./configLoader";
