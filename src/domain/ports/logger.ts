/**
 * Logger Port
 *
 * Abstract interface for logging progress and messages.
 * This allows the domain and application layers to remain independent
 * of the actual logging implementation (console, file, etc.).
 */

/**
 * Abstract logger interface.
 *
 * Implementations might:
 * - Log to console (ConsoleLogger)
 * - Log to console with inline replacement for progress (InlineProgressLogger)
 * - Keep entries in memory (RecordingLogger)
 * - Be silent (SilentLogger)
 */
export interface Logger {
  /**
   * Log an info message (general progress updates)
   */
  info(message: string): void;

  /**
   * Log a warning message (skipped files, degraded summaries)
   */
  warn(message: string): void;

  /**
   * Log an error message
   */
  error(message: string): void;

  /**
   * Log a debug message (only shown in verbose mode)
   */
  debug(message: string): void;

  /**
   * Log a progress update that can replace the current line.
   *
   * In terminal environments, this may overwrite the current line.
   * Elsewhere it may just log normally.
   */
  progress(message: string): void;

  /**
   * Clear any inline progress output.
   * Call this before switching from progress() to info/warn/error.
   */
  clearProgress(): void;
}

/**
 * Factory function type for creating loggers
 */
export type LoggerFactory = (options?: { verbose?: boolean }) => Logger;
