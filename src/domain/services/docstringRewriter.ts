/**
 * Docstring Rewriter
 *
 * Rewrites a file's text so that selected nodes carry new docstrings.
 * Existing docstrings are replaced in place; missing ones are inserted right
 * after the node's header. Every byte outside the edited spans is preserved.
 */

import type { FileUnit, SourceNode } from "../entities";
import { RewriteConflictError, flattenNodes } from "../entities";

/**
 * One text replacement. Insertions have `start === end`.
 */
export interface TextEdit {
  start: number;
  end: number;
  text: string;

  /** Qualified name of the node the edit belongs to */
  node: string;
}

/**
 * Renders docstring text as a literal in the file's language.
 */
export type DocstringFormatter = (text: string, indent: string, eol: string) => string;

/**
 * Line break style of a text.
 */
export function detectEol(text: string): string {
  const match = /\r\n|\r|\n/.exec(text);
  return match ? match[0] : "\n";
}

/**
 * Build the edits that give each named node its new docstring.
 * Names without a node in the file are ignored.
 */
export function planDocstringEdits(
  file: FileUnit,
  docstrings: ReadonlyMap<string, string>,
  format: DocstringFormatter
): TextEdit[] {
  const text = file.rawText;
  const eol = detectEol(text);
  const edits: TextEdit[] = [];

  for (const node of flattenNodes(file.rootNode)) {
    const docstring = docstrings.get(node.qualifiedName);
    if (docstring === undefined) {
      continue;
    }
    const edit = editFor(node, text, format(docstring, node.docstringSlot.indent, eol), eol);
    if (text.slice(edit.start, edit.end) !== edit.text) {
      edits.push(edit);
    }
  }

  return edits;
}

function editFor(node: SourceNode, text: string, literal: string, eol: string): TextEdit {
  const slot = node.docstringSlot;
  const name = node.qualifiedName;

  if (node.existingDocstring) {
    const { start, end } = node.existingDocstring.span;
    return { start, end, text: literal, node: name };
  }

  if (node.kind === "module") {
    const before = slot.offset > 0 && !/[\r\n]$/.test(text.slice(0, slot.offset)) ? eol : "";
    const rest = text.slice(slot.offset);
    const after = rest.length === 0 || /^[\r\n]/.test(rest) ? eol : eol + eol;
    return { start: slot.offset, end: slot.offset, text: before + literal + after, node: name };
  }

  if (slot.inlineGap) {
    return {
      start: slot.inlineGap.start,
      end: slot.inlineGap.end,
      text: eol + slot.indent + literal + eol + slot.indent,
      node: name,
    };
  }

  return { start: slot.offset, end: slot.offset, text: eol + slot.indent + literal, node: name };
}

/**
 * Apply edits in one pass from the last span to the first, so earlier
 * offsets stay valid.
 *
 * @throws RewriteConflictError when two edits overlap
 */
export function applyEdits(text: string, edits: TextEdit[], path?: string): string {
  const ordered = [...edits].sort((a, b) => b.start - a.start || b.end - a.end);

  for (let i = 1; i < ordered.length; i++) {
    const later = ordered[i - 1];
    const earlier = ordered[i];
    if (earlier.end > later.start || earlier.start === later.start) {
      throw new RewriteConflictError(
        `Docstring edits for ${earlier.node} and ${later.node} overlap`,
        path
      );
    }
  }

  let result = text;
  for (const edit of ordered) {
    result = result.slice(0, edit.start) + edit.text + result.slice(edit.end);
  }
  return result;
}

/**
 * New text of a file with the given docstrings applied.
 */
export function rewriteDocstrings(
  file: FileUnit,
  docstrings: ReadonlyMap<string, string>,
  format: DocstringFormatter
): string {
  return applyEdits(file.rawText, planDocstringEdits(file, docstrings, format), file.path);
}

/**
 * Check that a rewritten file still has the original's structure: the same
 * nodes, in the same order, with the same signatures.
 *
 * @throws RewriteConflictError when it does not
 */
export function verifyRewrite(original: SourceNode, rewritten: SourceNode, path?: string): void {
  const before = flattenNodes(original);
  const after = flattenNodes(rewritten);

  if (before.length !== after.length) {
    throw new RewriteConflictError(
      `Rewritten file has ${after.length} nodes, expected ${before.length}`,
      path
    );
  }

  for (let i = 0; i < before.length; i++) {
    const a = before[i];
    const b = after[i];
    if (
      a.kind !== b.kind ||
      a.qualifiedName !== b.qualifiedName ||
      a.signature.join("\u0000") !== b.signature.join("\u0000")
    ) {
      throw new RewriteConflictError(
        `Rewritten file changed the structure of ${a.qualifiedName}`,
        path
      );
    }
  }
}
