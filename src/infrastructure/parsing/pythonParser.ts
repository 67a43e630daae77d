/**
 * Python Parser
 *
 * Indentation-aware structural parser for Python. Produces the module node
 * of a file with its classes and functions nested as children, their exact
 * spans, existing docstrings and the insertion point for new docstrings.
 *
 * Only structure is recovered; statements other than `def`, `async def`,
 * `class` and decorators are checked for balanced brackets, closed strings
 * and consistent indentation, nothing more.
 */

import * as path from "path";
import type {
  DocstringSlot,
  ExistingDocstring,
  NodeKind,
  SourceNode,
} from "../../domain/entities";
import { ParseError } from "../../domain/entities";
import type { IParser, ParserLanguage } from "../../domain/ports";
import {
  joinTokens,
  stringBody,
  stringPrefix,
  tokenizeLogicalLines,
  type LogicalLine,
  type Token,
} from "./pythonLexer";

const PYTHON_EXTENSIONS = [".py", ".pyw"];

/** Matches a PEP 263 encoding declaration */
const CODING_PATTERN = /^[ \t\f]*#.*?coding[:=][ \t]*[-\w.]+/;

/**
 * A logical line with its indentation level resolved.
 */
interface Line extends LogicalLine {
  level: number;
}

interface Header {
  kind: Exclude<NodeKind, "module">;
  name: string;
  colon: Token;
  headerTokens: Token[];
  signature: string[];
}

export class PythonParser implements IParser {
  readonly language: ParserLanguage = "python";

  canParse(filepath: string): boolean {
    return PYTHON_EXTENSIONS.includes(path.extname(filepath).toLowerCase());
  }

  parse(content: string, filepath: string): SourceNode {
    try {
      return this.parseModule(content, filepath);
    } catch (error) {
      if (error instanceof ParseError && error.path === undefined) {
        throw new ParseError(error.message.replace(/ \(line \d+\)$/, ""), error.line, filepath);
      }
      throw error;
    }
  }

  formatDocstring(text: string, indent: string, eol = "\n"): string {
    let body = text.trim();
    if (/^("""|''')[\s\S]*\1$/.test(body) && body.length >= 6) {
      body = body.slice(3, -3).trim();
    }
    body = body
      .replace(/\\/g, "\\\\")
      .replace(/"""/g, "'''")
      .replace(/"$/, '\\"');

    const lines = body.split(/\r\n|\r|\n/).map((line) => line.trimEnd());
    if (lines.length === 1) {
      return `"""${lines[0]}"""`;
    }

    const rest = lines
      .slice(1)
      .map((line) => (line === "" ? "" : indent + line));
    return `"""${lines[0]}${eol}${rest.join(eol)}${eol}${indent}"""`;
  }

  private parseModule(content: string, filepath: string): SourceNode {
    const lines = resolveLevels(tokenizeLogicalLines(content));
    const moduleName = moduleQualifiedName(filepath);
    const physicalLines = content.split(/\r\n|\r|\n/);
    if (physicalLines.length > 1 && physicalLines[physicalLines.length - 1] === "") {
      physicalLines.pop();
    }

    const module: SourceNode = {
      kind: "module",
      name: moduleName,
      qualifiedName: moduleName,
      signature: [],
      header: "",
      span: { start: 0, end: content.length },
      startLine: 1,
      endLine: physicalLines.length,
      existingDocstring: lines.length > 0 ? findDocstring(lines[0]) : undefined,
      docstringSlot: { offset: moduleDocstringOffset(content), indent: "" },
      children: [],
    };

    module.children = this.parseBody(lines, 0, lines.length, moduleName);
    return module;
  }

  /**
   * Collect class and function definitions in `lines[from, to)`.
   * Definitions nested in other compound statements belong to the
   * enclosing scope.
   */
  private parseBody(
    lines: Line[],
    from: number,
    to: number,
    scope: string
  ): SourceNode[] {
    const nodes: SourceNode[] = [];
    const seen = new Map<string, number>();
    let i = from;

    while (i < to) {
      let headerIndex = i;
      while (headerIndex < to && isDecorator(lines[headerIndex])) {
        headerIndex++;
      }

      const header = headerIndex < to ? readHeader(lines[headerIndex]) : null;
      if (!header) {
        if (headerIndex > i) {
          throw new ParseError("decorator must be followed by a definition", lines[i].startLine);
        }
        i++;
        continue;
      }

      const line = lines[headerIndex];
      let bodyEnd = headerIndex + 1;
      const inline = header.colon !== line.tokens[line.tokens.length - 1];
      if (!inline) {
        while (bodyEnd < to && lines[bodyEnd].level > line.level) {
          bodyEnd++;
        }
      }
      const lastLine = lines[bodyEnd - 1];

      const occurrence = (seen.get(header.name) ?? 0) + 1;
      seen.set(header.name, occurrence);
      const name = occurrence === 1 ? header.name : `${header.name}@${occurrence}`;
      const qualifiedName = `${scope}.${name}`;

      let existingDocstring: ExistingDocstring | undefined;
      let docstringSlot: DocstringSlot;

      if (inline) {
        const afterColon = line.tokens.indexOf(header.colon) + 1;
        const bodyTokens = line.tokens.slice(afterColon);
        existingDocstring = findDocstringTokens(bodyTokens, true);
        docstringSlot = {
          offset: header.colon.end,
          indent: line.indent + (line.indent.includes("\t") ? "\t" : "    "),
          inlineGap: { start: header.colon.end, end: bodyTokens[0].start },
        };
      } else {
        const firstBody = lines[headerIndex + 1];
        existingDocstring = findDocstring(firstBody);
        docstringSlot = { offset: line.lineEnd, indent: firstBody.indent };
      }

      nodes.push({
        kind: header.kind,
        name,
        qualifiedName,
        signature: header.signature,
        header: joinTokens(header.headerTokens),
        span: { start: lines[i].start, end: lastLine.lineEnd },
        startLine: line.startLine,
        endLine: lastLine.endLine,
        existingDocstring,
        docstringSlot,
        children: inline ? [] : this.parseBody(lines, headerIndex + 1, bodyEnd, qualifiedName),
      });

      i = bodyEnd;
    }

    return nodes;
  }
}

/**
 * Assign indentation levels and check block structure.
 */
function resolveLevels(logicalLines: LogicalLine[]): Line[] {
  const stack: string[] = [""];
  const lines: Line[] = [];

  for (let i = 0; i < logicalLines.length; i++) {
    const line = logicalLines[i];
    const top = stack[stack.length - 1];
    const previous = lines[i - 1];
    const opensBlock = previous !== undefined && endsWithColon(previous);

    if (line.indent === top) {
      if (opensBlock) {
        throw new ParseError("expected an indented block", line.startLine);
      }
    } else if (line.indent.startsWith(top)) {
      if (!opensBlock) {
        throw new ParseError("unexpected indent", line.startLine);
      }
      stack.push(line.indent);
    } else {
      if (opensBlock) {
        throw new ParseError("expected an indented block", line.startLine);
      }
      const target = stack.lastIndexOf(line.indent);
      if (target === -1) {
        throw new ParseError(
          "unindent does not match any outer indentation level",
          line.startLine
        );
      }
      stack.length = target + 1;
    }

    lines.push({ ...line, level: stack.length - 1 });
  }

  const last = lines[lines.length - 1];
  if (last && endsWithColon(last)) {
    throw new ParseError("expected an indented block", last.endLine);
  }

  return lines;
}

function endsWithColon(line: LogicalLine): boolean {
  const last = line.tokens[line.tokens.length - 1];
  return last.type === "op" && last.text === ":" && last.depth === 0;
}

function isDecorator(line: Line): boolean {
  return line.tokens[0].type === "op" && line.tokens[0].text === "@";
}

/**
 * Recognise a `def`, `async def` or `class` header line.
 */
function readHeader(line: Line): Header | null {
  const tokens = line.tokens;
  let index = 0;
  if (tokens[0].type === "name" && tokens[0].text === "async") {
    index = 1;
  }
  const keyword = tokens[index];
  if (!keyword || keyword.type !== "name") {
    return null;
  }
  if (keyword.text !== "def" && keyword.text !== "class") {
    return null;
  }
  if (index === 1 && keyword.text !== "def") {
    return null;
  }

  const nameToken = tokens[index + 1];
  if (!nameToken || nameToken.type !== "name") {
    throw new ParseError("invalid syntax", keyword.line);
  }

  const colonIndex = tokens.findIndex(
    (token, i) => i > index + 1 && token.text === ":" && token.type === "op" && token.depth === 0
  );
  if (colonIndex === -1) {
    throw new ParseError("expected ':'", nameToken.line);
  }
  const openIndex = skipTypeParameters(tokens, index + 2);
  const open = tokens[openIndex];
  const hasParens = open !== undefined && open.text === "(" && open.type === "op";
  if (keyword.text === "def" && !hasParens) {
    throw new ParseError("expected '('", nameToken.line);
  }

  const signature = hasParens
    ? splitArguments(tokens, openIndex)
    : [];

  return {
    kind: keyword.text === "def" ? "function" : "class",
    name: nameToken.text,
    colon: tokens[colonIndex],
    headerTokens: tokens.slice(0, colonIndex + 1),
    signature,
  };
}

/**
 * Step over a `[T, ...]` type parameter list after a definition's name.
 */
function skipTypeParameters(tokens: Token[], index: number): number {
  const bracket = tokens[index];
  if (!bracket || bracket.text !== "[" || bracket.type !== "op") {
    return index;
  }
  for (let i = index + 1; i < tokens.length; i++) {
    if (tokens[i].depth === bracket.depth) {
      // tokens[i] is the closing "]"
      return i + 1;
    }
  }
  return tokens.length;
}

/**
 * Split the bracketed list opening at `openIndex` on top-level commas.
 */
function splitArguments(tokens: Token[], openIndex: number): string[] {
  const depth = tokens[openIndex].depth + 1;
  const args: string[] = [];
  let currentArg: Token[] = [];

  for (let i = openIndex + 1; i < tokens.length; i++) {
    const token = tokens[i];
    if (token.depth < depth) {
      break;
    }
    if (token.depth === depth && token.type === "op" && token.text === ",") {
      if (currentArg.length > 0) {
        args.push(joinTokens(currentArg));
      }
      currentArg = [];
      continue;
    }
    currentArg.push(token);
  }
  if (currentArg.length > 0) {
    args.push(joinTokens(currentArg));
  }

  return args;
}

/**
 * Docstring of a block whose first statement is `line`.
 */
function findDocstring(line: Line): ExistingDocstring | undefined {
  return findDocstringTokens(line.tokens, false);
}

/**
 * A statement made of string literals only. Inline bodies may continue
 * after a `;`.
 */
function findDocstringTokens(
  tokens: Token[],
  allowTrailing: boolean
): ExistingDocstring | undefined {
  let count = 0;
  while (count < tokens.length && tokens[count].type === "string") {
    count++;
  }
  if (count === 0) {
    return undefined;
  }
  const next = tokens[count];
  if (next && !(allowTrailing && next.type === "op" && next.text === ";")) {
    return undefined;
  }

  const strings = tokens.slice(0, count);
  if (strings.some((token) => /[bf]/.test(stringPrefix(token)))) {
    return undefined;
  }

  return {
    text: cleanDocstring(strings.map(stringBody).join("")),
    span: { start: strings[0].start, end: strings[count - 1].end },
  };
}

/**
 * Strip the uniform indentation of a docstring's continuation lines and
 * its leading and trailing blank lines.
 */
export function cleanDocstring(raw: string): string {
  const lines = raw.replace(/\t/g, "        ").split(/\r\n|\r|\n/);
  let margin = Infinity;
  for (const line of lines.slice(1)) {
    const content = line.trimStart();
    if (content.length > 0) {
      margin = Math.min(margin, line.length - content.length);
    }
  }

  const cleaned = [lines[0].trimStart()];
  for (const line of lines.slice(1)) {
    cleaned.push(margin === Infinity ? line : line.slice(margin));
  }
  while (cleaned.length > 0 && cleaned[0].trim() === "") {
    cleaned.shift();
  }
  while (cleaned.length > 0 && cleaned[cleaned.length - 1].trim() === "") {
    cleaned.pop();
  }
  return cleaned.join("\n");
}

/**
 * Offset of the first line after a shebang and an encoding declaration.
 */
export function moduleDocstringOffset(content: string): number {
  let offset = content.charCodeAt(0) === 0xfeff ? 1 : 0;

  for (let lineNumber = 1; lineNumber <= 2 && offset < content.length; lineNumber++) {
    const match = /\r\n|\r|\n/.exec(content.slice(offset));
    const lineEnd = match ? offset + match.index : content.length;
    const line = content.slice(offset, lineEnd);
    const isShebang = lineNumber === 1 && line.startsWith("#!");
    if (!isShebang && !CODING_PATTERN.test(line)) {
      break;
    }
    offset = match ? lineEnd + match[0].length : content.length;
  }

  return offset;
}

/**
 * Dotted module name of a project-relative path: `pkg/io/reader.py` is
 * `pkg.io.reader`, and a package's `__init__.py` is the package itself.
 */
export function moduleQualifiedName(filepath: string): string {
  const posix = filepath.split(path.sep).join("/");
  const parts = posix.replace(/\.[^./]+$/, "").split("/").filter((part) => part && part !== ".");
  if (parts.length > 1 && parts[parts.length - 1] === "__init__") {
    parts.pop();
  }
  return parts.join(".");
}

