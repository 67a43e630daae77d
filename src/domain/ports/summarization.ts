/**
 * Summarization Port
 *
 * The language-model capabilities the core consumes. Both are opaque: the
 * core decides what to ask and when, never what the answer says.
 * `summarize` must give the same answer for the same `(text, context)` for
 * the fingerprint cache to stay correct.
 */

import type { NodeKind } from "../entities/sourceNode";

/**
 * Level of the project a summary describes.
 */
export type SummaryScope = NodeKind | "directory" | "project";

/**
 * Already-produced summary of a child unit, passed up as context.
 */
export interface ChildSummary {
  name: string;
  scope: SummaryScope;
  summary: string;
}

/**
 * Structural context of a summarization request.
 */
export interface SummaryContext {
  scope: SummaryScope;

  /** Qualified name (nodes) or relative path (directories) */
  name: string;

  /** Project-relative path of the owning file or directory */
  path: string;

  /** Parameters or bases, for functions and classes */
  signature?: string[];

  /** Summaries of direct children, in tree order */
  children: ChildSummary[];

  /**
   * Set when the text is one part of a text too large for a single request
   * (`chunk`), or when it is the joined partial summaries (`combine`).
   */
  part?: { stage: "chunk" | "combine"; index: number; total: number };
}

/**
 * Input for docstring generation.
 */
export interface DocstringRequest {
  kind: NodeKind;
  qualifiedName: string;

  /** Declaration text, e.g. `def load(path, *, strict=False):` */
  signature: string;

  /** Full source text of the node */
  body: string;

  /** Docstring currently in the source, if any */
  existingDocstring?: string;
}

/**
 * Summarization and docstring capabilities.
 */
export interface SummarizationProvider {
  /**
   * Summarize a unit's own text given its children's summaries.
   */
  summarize(
    text: string,
    context: SummaryContext,
    signal?: AbortSignal
  ): Promise<string>;

  /**
   * Produce replacement docstring text (without quotes).
   */
  generateDocstring(
    request: DocstringRequest,
    signal?: AbortSignal
  ): Promise<string>;
}
