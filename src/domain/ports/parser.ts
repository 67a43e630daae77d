/**
 * Parser Port
 *
 * Structural parsers turn one file's text into a tree of documentable
 * nodes. Parsing is deterministic: the same text always yields the same
 * tree, with children in lexical order and identical spans.
 */

import type { SourceNode } from "../entities/sourceNode";

/**
 * Supported languages for parsing.
 */
export type ParserLanguage = "python";

/**
 * Parser interface for extracting the structure of source code.
 *
 * Implementations:
 * - PythonParser: indentation-aware scanner for Python
 */
export interface IParser {
  /**
   * Language handled by this parser.
   */
  readonly language: ParserLanguage;

  /**
   * Parse a file into its module node.
   *
   * @param content - The source code content
   * @param filepath - Project-relative path (used for the module's qualified name)
   * @throws ParseError when the text is not valid source
   */
  parse(content: string, filepath: string): SourceNode;

  /**
   * Render a docstring as a literal in the language's conventional syntax.
   *
   * @param text - Docstring text without quotes
   * @param indent - Indentation for continuation lines
   * @param eol - Line break used by the file (default `\n`)
   */
  formatDocstring(text: string, indent: string, eol?: string): string;

  /**
   * Check if the parser can handle a specific file.
   */
  canParse(filepath: string): boolean;
}
