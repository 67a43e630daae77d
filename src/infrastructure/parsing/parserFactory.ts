/**
 * Parser Factory
 *
 * Creates the appropriate parser for a given file or language.
 * Implements the strategy pattern for parser selection.
 */

import * as path from "path";
import type { IParser, ParserLanguage } from "../../domain/ports";
import { PythonParser } from "./pythonParser";

/**
 * Map from file extension to language.
 */
const EXTENSION_LANGUAGE_MAP: Record<string, ParserLanguage> = {
  ".py": "python",
  ".pyw": "python",
};

// Singleton parser instances
let pythonParserInstance: PythonParser | null = null;

/**
 * Get or create the Python parser singleton.
 */
function getPythonParser(): PythonParser {
  if (!pythonParserInstance) {
    pythonParserInstance = new PythonParser();
  }
  return pythonParserInstance;
}

/**
 * Create a parser for the given language.
 */
export function createParserForLanguage(language: ParserLanguage): IParser {
  switch (language) {
    case "python":
      return getPythonParser();
  }
}

/**
 * Create a parser for the given file.
 *
 * @param filepath - The file path to get a parser for
 * @returns The appropriate parser, or null if no parser supports the file
 */
export function createParserForFile(filepath: string): IParser | null {
  const language = detectLanguage(filepath);
  return language ? createParserForLanguage(language) : null;
}

/**
 * Detect the language from a file path.
 *
 * @returns The detected language, or null if unknown
 */
export function detectLanguage(filepath: string): ParserLanguage | null {
  const ext = path.extname(filepath).toLowerCase();
  return EXTENSION_LANGUAGE_MAP[ext] ?? null;
}

/**
 * Check if a file is supported by any parser.
 */
export function isFileSupported(filepath: string): boolean {
  return detectLanguage(filepath) !== null;
}

