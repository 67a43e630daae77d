// Argument parsing and error formatting for the docsync CLI

import { DocSyncError, describeError } from "../../domain/entities";

/**
 * Parsed CLI flags from command line arguments
 */
export interface ParsedFlags {
  /** Rewrite docstrings in source files */
  docstrings: boolean;
  /** Watch mode for continuous synchronization */
  watch: boolean;
  /** Maximum concurrent language-model calls */
  concurrency?: number;
  /** Show help message */
  help: boolean;
  /** Show detailed progress */
  verbose: boolean;
  /** Only print warnings and errors */
  quiet: boolean;
  /** Remaining positional arguments */
  remaining: string[];
}

/**
 * Parse CLI flags from command line arguments (excluding the command name).
 *
 * @throws Error on an invalid flag value
 */
export function parseFlags(args: string[]): ParsedFlags {
  const flags: ParsedFlags = {
    docstrings: false,
    watch: false,
    help: false,
    verbose: false,
    quiet: false,
    remaining: [],
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      flags.help = true;
    } else if (arg === "--verbose" || arg === "-v") {
      flags.verbose = true;
    } else if (arg === "--quiet" || arg === "-q") {
      flags.quiet = true;
    } else if (arg === "--watch" || arg === "-w") {
      flags.watch = true;
    } else if (arg === "--docstrings" || arg === "-d") {
      flags.docstrings = true;
    } else if (arg === "--concurrency" || arg === "-c") {
      const value = args[++i];
      const c = Number(value);
      if (!Number.isInteger(c) || c <= 0) {
        throw new Error(`Invalid concurrency: ${value}. Must be a positive integer.`);
      }
      flags.concurrency = c;
    } else if (arg.startsWith("-")) {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      flags.remaining.push(arg);
    }
  }

  return flags;
}

export function formatFailure(error: unknown): string {
  if (error instanceof DocSyncError) {
    return error.path ? `${error.kind}: ${error.path}: ${error.message}` : `${error.kind}: ${error.message}`;
  }
  return `Error: ${describeError(error)}`;
}

/**
 * Format a date as a human-readable "time ago" string
 */
export function formatTimeAgo(date: Date, now: Date = new Date()): string {
  const diffMs = now.getTime() - date.getTime();
  const diffSecs = Math.floor(diffMs / 1000);
  const diffMins = Math.floor(diffSecs / 60);
  const diffHours = Math.floor(diffMins / 60);
  const diffDays = Math.floor(diffHours / 24);

  if (diffSecs < 60) return "just now";
  if (diffMins < 60) return `${diffMins}m ago`;
  if (diffHours < 24) return `${diffHours}h ago`;
  if (diffDays < 7) return `${diffDays}d ago`;

  // For older dates, show the actual date
  return date.toLocaleDateString();
}
