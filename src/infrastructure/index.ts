/**
 * Infrastructure Layer
 *
 * Contains adapters that implement domain ports.
 * These connect the domain to external systems (filesystem, language models, etc.)
 */

// FileSystem
export { NodeFileSystem, nodeFileSystem } from "./filesystem";

// Storage
export { InMemorySummaryCache, CacheStorage, parseSnapshot } from "./storage";

// Config
export {
  DEFAULT_CONFIG,
  CONFIG_FILE,
  getDocsyncDir,
  getConfigPath,
  loadConfig,
  saveConfig,
  mergeConfig,
} from "./config";

// Logger
export {
  ConsoleLogger,
  InlineProgressLogger,
  RecordingLogger,
  SilentLogger,
  createLogger,
  createInlineLogger,
  createSilentLogger,
} from "./logger";

// Parsing
export {
  PythonParser,
  createParserForFile,
  createParserForLanguage,
  detectLanguage,
  isFileSupported,
} from "./parsing";

// Language models
export { OpenAIChatClient, LlmSummarizationProvider } from "./llm";
