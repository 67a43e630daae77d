#!/usr/bin/env node
// Main CLI entry point for docsync

import * as fs from "fs";
import * as path from "path";
import type { SyncReport } from "../../domain/entities";
import { describeError } from "../../domain/entities";
import type { Logger } from "../../domain/ports";
import { createInlineLogger, createSilentLogger } from "../../infrastructure/logger";
import { formatFailure, formatTimeAgo, parseFlags, type ParsedFlags } from "./flags";

/** Exit codes */
const EXIT_OK = 0;
const EXIT_FAILURE = 1;
const EXIT_CANCELLED = 130;

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(
      fs.readFileSync(path.join(__dirname, "../../../package.json"), "utf-8")
    );
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  } catch {
    // Running from an unusual layout
  }
  return "unknown";
}

function printReport(report: SyncReport, logger: Logger): void {
  const seconds = (report.durationMs / 1000).toFixed(1);
  logger.info("");
  logger.info("================");
  logger.info(`Status: ${report.status} (${seconds}s)`);
  logger.info(
    `  ${report.processedFiles.length} files, ${report.summarizeCalls} summaries, ` +
      `${report.docstringCalls} docstrings generated`
  );
  const { changes } = report;
  logger.info(
    `  ${changes.new} new, ${changes.changed} changed, ${changes.unchanged} unchanged`
  );
  if (report.rewrittenFiles.length > 0) {
    logger.info(`  Docstrings updated in ${report.rewrittenFiles.length} files`);
  }
  if (report.summaryPath) {
    logger.info(`  Summary: ${report.summaryPath}`);
  }
  for (const warning of report.warnings) {
    const where = warning.node ? `${warning.path} (${warning.node})` : warning.path;
    logger.warn(`  ! ${warning.kind}: ${where}: ${warning.message}`);
  }
}

const HELP = {
  sync: `
docsync sync - Synchronize summaries (and docstrings) with the source tree

Usage:
  docsync sync [directory] [options]

Options:
  -d, --docstrings         Also write generated docstrings into source files
  -w, --watch              Watch for file changes and re-synchronize automatically
  -c, --concurrency <n>    Maximum concurrent language-model calls
  -v, --verbose            Show detailed progress
  -q, --quiet              Only print warnings and errors
  -h, --help               Show this help message

Environment:
  OPENAI_API_KEY           Key for the language-model service

Examples:
  docsync sync
  docsync sync --docstrings
  docsync sync src --watch
`,
  status: `
docsync status - Show what the last synchronization left on disk

Usage:
  docsync status [directory]
`,
  tree: `
docsync tree - Print the directory tree of documented files

Usage:
  docsync tree [directory]
`,
  docstring: `
docsync docstring - Print the docstrings of one file

Usage:
  docsync docstring <file> [directory]

Examples:
  docsync docstring pkg/models.py
`,
} as const;

function usage(version: string): string {
  return `
docsync v${version} - Incremental documentation for Python codebases

Usage:
  docsync <command> [options]

Commands:
  sync       Summarize the project and (optionally) update docstrings
  status     Show the state of the summary cache
  tree       Print the directory tree of documented files
  docstring  Print the docstrings of one file

Options:
  -h, --help     Show help for a command
  --version      Show version number

Run 'docsync <command> --help' for more information.
`;
}

/**
 * Run the CLI and resolve to its exit code.
 */
export async function main(argv: string[]): Promise<number> {
  const command = argv[0];
  const version = readVersion();

  if (command === "--version") {
    console.log(`docsync v${version}`);
    return EXIT_OK;
  }

  let flags: ParsedFlags;
  try {
    flags = parseFlags(argv.slice(1));
  } catch (error) {
    console.error(describeError(error));
    return EXIT_FAILURE;
  }

  // Loaded lazily so --help and --version stay fast
  const sync = await import("../sync");

  switch (command) {
    case "sync": {
      if (flags.help) {
        console.log(HELP.sync);
        return EXIT_OK;
      }

      const rootDir = path.resolve(flags.remaining[0] ?? process.cwd());
      const logger = flags.quiet
        ? quietLogger()
        : createInlineLogger({ verbose: flags.verbose });

      const controller = new AbortController();
      const onSigint = (): void => controller.abort();
      process.once("SIGINT", onSigint);

      let report: SyncReport;
      try {
        report = await sync.syncDirectory(rootDir, {
          docstrings: flags.docstrings,
          concurrency: flags.concurrency,
          verbose: flags.verbose,
          logger,
          signal: controller.signal,
        });
      } catch (error) {
        logger.error(formatFailure(error));
        return EXIT_FAILURE;
      } finally {
        process.removeListener("SIGINT", onSigint);
      }

      printReport(report, logger);
      if (report.status === "cancelled") {
        return EXIT_CANCELLED;
      }
      if (!flags.watch) {
        return EXIT_OK;
      }

      logger.info("\nWatching for changes... (Ctrl+C to stop)\n");
      const watcher = await sync.watchDirectory(rootDir, {
        docstrings: flags.docstrings,
        concurrency: flags.concurrency,
        verbose: flags.verbose,
        logger,
        onSyncStart: (files) => logger.info(`Changed: ${files.join(", ")}`),
        onSyncComplete: (result) => printReport(result, logger),
      });

      await new Promise<void>((resolve) => process.once("SIGINT", () => resolve()));
      logger.info("\nStopping watcher...");
      await watcher.stop();
      return EXIT_OK;
    }

    case "status": {
      if (flags.help) {
        console.log(HELP.status);
        return EXIT_OK;
      }

      try {
        const status = await sync.getStatus(path.resolve(flags.remaining[0] ?? process.cwd()));
        if (!status.exists) {
          console.log(`
  ○ Not synchronized

  Directory: ${status.rootDir}

  Run "docsync sync" to generate summaries.
`);
          return EXIT_OK;
        }

        const updated = status.lastGeneratedAt
          ? formatTimeAgo(new Date(status.lastGeneratedAt))
          : "unknown";
        console.log(`
  ● Synchronized

  Files:    ${status.trackedFiles.toString().padEnd(10)} Updated: ${updated}
  Units:    ${status.trackedUnits}
  Cached:   ${status.cacheEntries} entries
  Summary:  ${status.hasSummary ? "present" : "missing"}
  Directory: ${status.rootDir}
`);
        return EXIT_OK;
      } catch (error) {
        console.error(formatFailure(error));
        return EXIT_FAILURE;
      }
    }

    case "tree": {
      if (flags.help) {
        console.log(HELP.tree);
        return EXIT_OK;
      }

      try {
        const tree = await sync.getDirectoryTree(
          path.resolve(flags.remaining[0] ?? process.cwd()),
          { logger: createSilentLogger() }
        );
        console.log(tree);
        return EXIT_OK;
      } catch (error) {
        console.error(formatFailure(error));
        return EXIT_FAILURE;
      }
    }

    case "docstring": {
      const file = flags.remaining[0];
      if (flags.help || !file) {
        console.log(HELP.docstring);
        return flags.help ? EXIT_OK : EXIT_FAILURE;
      }

      const rootDir = path.resolve(flags.remaining[1] ?? process.cwd());
      try {
        const listing = await sync.getDocstrings(rootDir, path.resolve(file));
        for (const [name, docstring] of Object.entries(listing.docstrings)) {
          console.log(`${name}:`);
          console.log(docstring === null ? "  (none)" : indent(docstring));
          console.log("");
        }
        return EXIT_OK;
      } catch (error) {
        console.error(formatFailure(error));
        return EXIT_FAILURE;
      }
    }

    default:
      console.log(usage(version));
      if (command && command !== "--help" && command !== "-h") {
        console.error(`Unknown command: ${command}`);
        return EXIT_FAILURE;
      }
      return EXIT_OK;
  }
}

function indent(text: string): string {
  return text
    .split("\n")
    .map((line) => (line ? `  ${line}` : line))
    .join("\n");
}

function quietLogger(): Logger {
  return {
    info: () => {},
    debug: () => {},
    progress: () => {},
    clearProgress: () => {},
    warn: (message) => console.warn(message),
    error: (message) => console.error(message),
  };
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => process.exit(code),
    (error: unknown) => {
      console.error(formatFailure(error));
      process.exit(EXIT_FAILURE);
    }
  );
}
