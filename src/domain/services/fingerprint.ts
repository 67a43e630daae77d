/**
 * Change Detection
 *
 * Content fingerprints for files, source nodes and directories, and the
 * classification of a unit against the summary cache.
 *
 * Node fingerprints are Merkle-style: a node hashes its own text with every
 * child span cut out, followed by the fingerprints of its children. A change
 * inside one function therefore invalidates that function and its
 * ancestors, never its siblings.
 */

import * as crypto from "crypto";
import type { ChangeStatus, NodeLineage, SourceNode } from "../entities";
import type { SummaryCache } from "../ports";

/** Stands in for a child's span inside its parent's own text */
const CHILD_MARKER = "\u0000";

/** Stands in for the gap between a header and its body, docstring included */
const BODY_MARKER = "\u0001";

/**
 * SHA-256 hex digest of a string's UTF-8 bytes.
 */
export function fingerprint(content: string): string {
  return crypto.createHash("sha256").update(content, "utf-8").digest("hex");
}

/**
 * The text a node is fingerprinted by: its span with child spans replaced by
 * a marker, and the stretch from the docstring slot through the docstring and
 * any following whitespace replaced by another. Inserting or replacing a docstring,
 * or moving an inline body onto its own line, leaves this text unchanged.
 */
export function nodeOwnText(node: SourceNode, text: string): string {
  const regions: Array<{ start: number; end: number; marker: string }> =
    node.children.map((child) => ({
      start: child.span.start,
      end: child.span.end,
      marker: CHILD_MARKER,
    }));

  const gapStart = node.docstringSlot.offset;
  const gapEnd = skipWhitespace(
    text,
    node.existingDocstring ? node.existingDocstring.span.end : gapStart,
    node.span.end
  );
  regions.push({ start: gapStart, end: gapEnd, marker: BODY_MARKER });

  regions.sort((a, b) => a.start - b.start || a.end - b.end);

  let result = "";
  let cursor = node.span.start;
  for (const region of regions) {
    result += text.slice(cursor, region.start) + region.marker;
    cursor = region.end;
  }
  return result + text.slice(cursor, node.span.end);
}

function skipWhitespace(text: string, from: number, limit: number): number {
  let offset = from;
  while (offset < limit && /\s/.test(text[offset])) {
    offset++;
  }
  return offset;
}

/**
 * Fingerprint every node of a file, keyed by qualified name.
 * Children are fingerprinted before their parents.
 */
export function fingerprintNodes(root: SourceNode, text: string): Map<string, string> {
  const fingerprints = new Map<string, string>();

  const visit = (node: SourceNode): string => {
    const childFingerprints = node.children.map(visit);
    const value = fingerprint(
      [node.kind, nodeOwnText(node, text), ...childFingerprints].join(CHILD_MARKER)
    );
    fingerprints.set(node.qualifiedName, value);
    return value;
  };

  visit(root);
  return fingerprints;
}

/**
 * Fingerprint of a directory from its children's names and fingerprints,
 * in the directory's child order.
 */
export function directoryFingerprint(
  scope: "directory" | "project",
  children: Array<{ name: string; fingerprint: string }>
): string {
  const parts: string[] = [scope];
  for (const child of children) {
    parts.push(child.name, child.fingerprint);
  }
  return fingerprint(parts.join(CHILD_MARKER));
}

/**
 * Cache key of the docstring generated for a node.
 */
export function docstringKey(nodeFingerprint: string): string {
  return fingerprint(`docstring${CHILD_MARKER}${nodeFingerprint}`);
}

/**
 * Classify a unit: `unchanged` iff its fingerprint is cached, otherwise
 * `changed` when the unit was seen before under another fingerprint and
 * `new` when it was not.
 */
export function classify(
  value: string,
  lineageKey: string,
  cache: SummaryCache,
  lineage: NodeLineage
): ChangeStatus {
  if (cache.get(value) !== undefined) {
    return "unchanged";
  }
  return lineage[lineageKey] === undefined ? "new" : "changed";
}
