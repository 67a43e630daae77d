/**
 * Python Lexer
 *
 * Splits Python source into logical lines of coarse tokens. Only what the
 * structural parser needs is recognised: names, strings, brackets and
 * single-character operators. Bracket nesting, backslash continuations and
 * multi-line strings are folded into one logical line, the way the Python
 * tokenizer does it, and offsets always refer to the original text.
 */

import { ParseError } from "../../domain/entities";

export type TokenType = "name" | "string" | "number" | "op";

export interface Token {
  type: TokenType;
  text: string;
  start: number;
  end: number;

  /** Bracket depth outside the token (an opening bracket sits at the outer depth) */
  depth: number;

  /** 1-based physical line of the token's start */
  line: number;
}

export interface LogicalLine {
  tokens: Token[];

  /** Whitespace before the first token */
  indent: string;

  /** Offset where the first physical line begins */
  lineStart: number;

  /** Offset of the first token */
  start: number;

  /** Offset just past the last token */
  end: number;

  /** Offset of the terminating line break (or the end of text) */
  lineEnd: number;

  startLine: number;
  endLine: number;
}

const STRING_PREFIXES = new Set([
  "r", "u", "b", "f", "br", "rb", "fr", "rf",
]);

const CLOSING: Record<string, string> = { ")": "(", "]": "[", "}": "{" };

function isNameStart(code: number): boolean {
  return (
    (code >= 65 && code <= 90) ||
    (code >= 97 && code <= 122) ||
    code === 95 ||
    code > 127
  );
}

function isNameChar(code: number): boolean {
  return isNameStart(code) || (code >= 48 && code <= 57);
}

function isDigit(code: number): boolean {
  return code >= 48 && code <= 57;
}

/**
 * Tokenize source text into logical lines.
 * Blank and comment-only lines produce no logical line.
 *
 * @throws ParseError on unterminated strings and unbalanced brackets
 */
export function tokenizeLogicalLines(text: string): LogicalLine[] {
  const lines: LogicalLine[] = [];
  const brackets: Token[] = [];
  const length = text.length;

  let pos = text.charCodeAt(0) === 0xfeff ? 1 : 0;
  let line = 1;
  let current: LogicalLine | null = null;
  let physicalLineStart = pos;

  const finishLine = (lineEnd: number): void => {
    if (current && current.tokens.length > 0) {
      const last = current.tokens[current.tokens.length - 1];
      current.end = last.end;
      current.lineEnd = lineEnd;
      lines.push(current);
    }
    current = null;
  };

  const pushToken = (token: Token): void => {
    if (!current) {
      current = {
        tokens: [],
        indent: text.slice(physicalLineStart, token.start),
        lineStart: physicalLineStart,
        start: token.start,
        end: token.end,
        lineEnd: token.end,
        startLine: token.line,
        endLine: token.line,
      };
    }
    current.tokens.push(token);
    current.endLine = line;
  };

  while (pos < length) {
    const ch = text[pos];
    const code = text.charCodeAt(pos);

    if (ch === " " || ch === "\t" || ch === "\f") {
      pos++;
      continue;
    }

    if (ch === "#") {
      while (pos < length && text[pos] !== "\n" && text[pos] !== "\r") {
        pos++;
      }
      continue;
    }

    if (ch === "\n" || ch === "\r") {
      const breakStart = pos;
      pos += ch === "\r" && text[pos + 1] === "\n" ? 2 : 1;
      line++;
      if (brackets.length === 0) {
        finishLine(breakStart);
        physicalLineStart = pos;
      }
      continue;
    }

    if (ch === "\\") {
      const next = text[pos + 1];
      if (next === "\n" || next === "\r") {
        pos += next === "\r" && text[pos + 2] === "\n" ? 3 : 2;
        line++;
        if (pos >= length) {
          throw new ParseError("unexpected end of file after line continuation", line - 1);
        }
        continue;
      }
      throw new ParseError("unexpected character after line continuation", line);
    }

    if (isNameStart(code)) {
      const start = pos;
      while (pos < length && isNameChar(text.charCodeAt(pos))) {
        pos++;
      }
      const word = text.slice(start, pos);
      if (
        (text[pos] === '"' || text[pos] === "'") &&
        STRING_PREFIXES.has(word.toLowerCase())
      ) {
        pushToken(readString(start, pos));
      } else {
        pushToken({ type: "name", text: word, start, end: pos, depth: brackets.length, line });
      }
      continue;
    }

    if (ch === '"' || ch === "'") {
      pushToken(readString(pos, pos));
      continue;
    }

    if (isDigit(code) || (ch === "." && isDigit(text.charCodeAt(pos + 1)))) {
      const start = pos;
      while (
        pos < length &&
        (isNameChar(text.charCodeAt(pos)) || text[pos] === ".")
      ) {
        pos++;
      }
      pushToken({ type: "number", text: text.slice(start, pos), start, end: pos, depth: brackets.length, line });
      continue;
    }

    if (ch === "(" || ch === "[" || ch === "{") {
      const token: Token = { type: "op", text: ch, start: pos, end: pos + 1, depth: brackets.length, line };
      pushToken(token);
      brackets.push(token);
      pos++;
      continue;
    }

    if (ch === ")" || ch === "]" || ch === "}") {
      const open = brackets.pop();
      if (!open) {
        throw new ParseError(`unmatched '${ch}'`, line);
      }
      if (open.text !== CLOSING[ch]) {
        throw new ParseError(
          `closing parenthesis '${ch}' does not match opening parenthesis '${open.text}' on line ${open.line}`,
          line
        );
      }
      pushToken({ type: "op", text: ch, start: pos, end: pos + 1, depth: brackets.length, line });
      pos++;
      continue;
    }

    pushToken({ type: "op", text: ch, start: pos, end: pos + 1, depth: brackets.length, line });
    pos++;
  }

  const unclosed = brackets[brackets.length - 1];
  if (unclosed) {
    throw new ParseError(`'${unclosed.text}' was never closed`, unclosed.line);
  }
  finishLine(length);

  return lines;

  function readString(start: number, quoteStart: number): Token {
    const quote = text[quoteStart];
    const triple = text.startsWith(quote.repeat(3), quoteStart);
    const startLine = line;
    let i = quoteStart + (triple ? 3 : 1);

    for (;;) {
      if (i >= length) {
        throw new ParseError(
          triple ? "unterminated triple-quoted string literal" : "unterminated string literal",
          startLine
        );
      }
      const c = text[i];
      if (c === "\\") {
        const next = text[i + 1];
        if (next === "\r" && text[i + 2] === "\n") {
          i += 3;
          line++;
        } else {
          if (next === "\n" || next === "\r") {
            line++;
          }
          i += 2;
        }
        continue;
      }
      if (c === "\n" || c === "\r") {
        if (!triple) {
          throw new ParseError("unterminated string literal", startLine);
        }
        i += c === "\r" && text[i + 1] === "\n" ? 2 : 1;
        line++;
        continue;
      }
      if (triple ? text.startsWith(quote.repeat(3), i) : c === quote) {
        i += triple ? 3 : 1;
        break;
      }
      i++;
    }

    pos = i;
    return {
      type: "string",
      text: text.slice(start, i),
      start,
      end: i,
      depth: brackets.length,
      line: startLine,
    };
  }
}

/**
 * Prefix letters of a string token, lower-cased.
 */
export function stringPrefix(token: Token): string {
  const quote = token.text.search(/["']/);
  return token.text.slice(0, quote).toLowerCase();
}

/**
 * Body of a string token without prefix and quotes.
 */
export function stringBody(token: Token): string {
  const literal = token.text.slice(stringPrefix(token).length);
  const quoteLength = /^("""|''')/.test(literal) ? 3 : 1;
  return literal.slice(quoteLength, literal.length - quoteLength);
}

/**
 * Render tokens as text, collapsing any whitespace, comments or
 * continuations between them to a single space.
 */
export function joinTokens(tokens: Token[]): string {
  let result = "";
  for (let i = 0; i < tokens.length; i++) {
    if (i > 0 && tokens[i].start > tokens[i - 1].end) {
      result += " ";
    }
    result += tokens[i].text.replace(/\s+/g, " ");
  }
  return result;
}
