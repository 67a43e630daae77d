/**
 * Logger Implementations
 *
 * ConsoleLogger prints one line per message and suits embedding.
 * InlineProgressLogger rewrites a single status line while a run is going,
 * which is what the CLI wants on a terminal. RecordingLogger and
 * SilentLogger never touch the console.
 */

import type { Logger } from "../../domain/ports";

export interface LoggerOptions {
  /** Print debug messages */
  verbose?: boolean;
}

type Stream = "stdout" | "stderr";

/**
 * Line-per-message console logger. Warnings and errors go to stderr.
 */
export class ConsoleLogger implements Logger {
  protected readonly verbose: boolean;

  constructor(options?: LoggerOptions) {
    this.verbose = options?.verbose ?? false;
  }

  info(message: string): void {
    this.emit("stdout", message);
  }

  warn(message: string): void {
    this.emit("stderr", message);
  }

  error(message: string): void {
    this.emit("stderr", message);
  }

  debug(message: string): void {
    if (this.verbose) {
      this.emit("stdout", message);
    }
  }

  progress(message: string): void {
    this.emit("stdout", message);
  }

  clearProgress(): void {}

  protected emit(stream: Stream, message: string): void {
    if (stream === "stderr") {
      console.error(message);
    } else {
      console.log(message);
    }
  }
}

/**
 * Console logger whose progress messages overwrite each other on a TTY.
 * Any other message first wipes the pending progress line.
 */
export class InlineProgressLogger extends ConsoleLogger {
  private progressWidth = 0;

  progress(message: string): void {
    if (!process.stdout.isTTY) {
      super.progress(message);
      return;
    }
    const trailing = " ".repeat(Math.max(0, this.progressWidth - message.length));
    process.stdout.write(`\r${message}${trailing}`);
    this.progressWidth = message.length;
  }

  clearProgress(): void {
    if (this.progressWidth > 0) {
      process.stdout.write(`\r${" ".repeat(this.progressWidth)}\r`);
      this.progressWidth = 0;
    }
  }

  protected emit(stream: Stream, message: string): void {
    this.clearProgress();
    super.emit(stream, message);
  }
}

export interface LogEntry {
  level: "info" | "warn" | "error" | "debug" | "progress";
  message: string;
}

/**
 * Keeps every entry in memory, debug included.
 */
export class RecordingLogger implements Logger {
  readonly entries: LogEntry[] = [];

  info(message: string): void {
    this.record("info", message);
  }

  warn(message: string): void {
    this.record("warn", message);
  }

  error(message: string): void {
    this.record("error", message);
  }

  debug(message: string): void {
    this.record("debug", message);
  }

  progress(message: string): void {
    this.record("progress", message);
  }

  clearProgress(): void {}

  /** Messages of one level, oldest first */
  messages(level: LogEntry["level"]): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }

  private record(level: LogEntry["level"], message: string): void {
    this.entries.push({ level, message });
  }
}

export class SilentLogger implements Logger {
  info(): void {}
  warn(): void {}
  error(): void {}
  debug(): void {}
  progress(): void {}
  clearProgress(): void {}
}

export function createLogger(options?: LoggerOptions): Logger {
  return new ConsoleLogger(options);
}

/** Logger for interactive CLI runs */
export function createInlineLogger(options?: LoggerOptions): Logger {
  return new InlineProgressLogger(options);
}

export function createSilentLogger(): Logger {
  return new SilentLogger();
}
