/**
 * SourceNode Entity
 *
 * The structural representation of one documentable unit of a source file:
 * a module, a class, or a function. Nodes mirror lexical nesting, so a
 * node's children always lie inside its span and never overlap each other.
 */

/**
 * Kinds of documentable units.
 */
export type NodeKind = "module" | "class" | "function";

/**
 * Half-open character range `[start, end)` within the owning file's text.
 */
export interface Span {
  start: number;
  end: number;
}

/**
 * Where a new docstring goes when a node does not have one yet.
 */
export interface DocstringSlot {
  /** Offset at which the docstring is inserted */
  offset: number;

  /** Indentation used for the docstring's lines (the node's body indentation) */
  indent: string;

  /**
   * Whitespace between the header colon and a body written on the same line
   * (`def f(): pass`). Present only for such inline bodies; the rewriter
   * replaces this gap with a line break, the docstring and the body indent.
   */
  inlineGap?: Span;
}

/**
 * An existing docstring as found in the source.
 */
export interface ExistingDocstring {
  /** Docstring text with quotes removed and indentation cleaned */
  text: string;

  /** Span of the whole string literal, quotes and prefix included */
  span: Span;
}

/**
 * One documentable unit of source structure.
 */
export interface SourceNode {
  kind: NodeKind;

  /** Short name (`foo`, `Parser`; the dotted module path for modules) */
  name: string;

  /** Fully qualified dotted name, unique within the project */
  qualifiedName: string;

  /**
   * Parameters for functions, base classes for classes, empty for modules.
   * Each entry is the parameter's source text with whitespace collapsed.
   */
  signature: string[];

  /** Declaration line(s) with whitespace collapsed, e.g. `def foo(a, b=1):` */
  header: string;

  /** Extent of the node, decorators included */
  span: Span;

  /** 1-based line of the declaration (1 for modules) */
  startLine: number;

  /** 1-based last line of the node */
  endLine: number;

  /** Docstring currently present in the source, if any */
  existingDocstring?: ExistingDocstring;

  /** Insertion point for a docstring when none exists */
  docstringSlot: DocstringSlot;

  /** Nested classes and functions in lexical order */
  children: SourceNode[];
}

/**
 * Visit a node and all of its descendants in pre-order.
 */
export function walkNodes(
  node: SourceNode,
  visit: (node: SourceNode, parent: SourceNode | null) => void,
  parent: SourceNode | null = null
): void {
  visit(node, parent);
  for (const child of node.children) {
    walkNodes(child, visit, node);
  }
}

/**
 * Flatten a node tree into pre-order.
 */
export function flattenNodes(root: SourceNode): SourceNode[] {
  const nodes: SourceNode[] = [];
  walkNodes(root, (node) => nodes.push(node));
  return nodes;
}
