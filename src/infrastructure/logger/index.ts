/**
 * Logger Infrastructure
 *
 * Implements the Logger port with various logging strategies.
 */

export {
  ConsoleLogger,
  InlineProgressLogger,
  RecordingLogger,
  SilentLogger,
  createLogger,
  createInlineLogger,
  createSilentLogger,
} from "./loggers";
export type { LoggerOptions, LogEntry } from "./loggers";
