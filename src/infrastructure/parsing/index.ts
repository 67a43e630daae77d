/**
 * Parsing Infrastructure
 *
 * Provides parser implementations for supported languages.
 *
 * Exports:
 * - PythonParser: Indentation-aware structural parser for Python
 * - Parser factory functions for automatic parser selection
 */

// Parser implementations
export {
  PythonParser,
  cleanDocstring,
  moduleDocstringOffset,
  moduleQualifiedName,
} from "./pythonParser";

// Parser factory
export {
  createParserForFile,
  createParserForLanguage,
  detectLanguage,
  isFileSupported,
} from "./parserFactory";
