import type { Location } from '../utils/types.js';

export interface SourceSpan {
  line: number;
  col: number;
  offset: number;
  endLine: number;
  endCol: number;
  endOffset: number;
  sourceFile?: string;
}

/** Base of every error raised while reading Python source. */
export class SourceError extends Error {
  public line: number;
  public col: number;
  public offset: number;
  public endLine: number;
  public endCol: number;
  public endOffset: number;
  public sourceFile?: string;
  public contextLine?: string;
  public suggestion?: string;

  constructor(message: string, span: SourceSpan, contextLine?: string, suggestion?: string) {
    super(message);
    this.name = 'SourceError';
    this.line = span.line;
    this.col = span.col;
    this.offset = span.offset;
    this.endLine = span.endLine;
    this.endCol = span.endCol;
    this.endOffset = span.endOffset;
    this.sourceFile = span.sourceFile;
    this.contextLine = contextLine;
    this.suggestion = suggestion;
  }

  get location(): Location {
    return {
      start: { line: this.line, column: this.col, offset: this.offset },
      end: { line: this.endLine, column: this.endCol, offset: this.endOffset },
    };
  }

  toString(): string {
    const location = this.sourceFile ? `${this.sourceFile}:${this.line}:${this.col}` : `${this.line}:${this.col}`;
    let output = `${this.name} at ${location}: ${this.message}`;

    if (this.contextLine !== undefined) {
      output += `\n\n  ${this.line} | ${this.contextLine}\n`;
      output += `  ${' '.repeat(String(this.line).length)} | ${' '.repeat(Math.max(0, this.col - 1))}^`;
    }
    if (this.suggestion) {
      output += `\n\n  Suggestion: ${this.suggestion}`;
    }
    return output;
  }
}

export type TokenizeErrorKind =
  | 'indentation-mismatch'
  | 'unterminated-literal'
  | 'invalid-character'
  | 'invalid-number'
  | 'invalid-escape';

export class TokenizeError extends SourceError {
  public kind: TokenizeErrorKind;

  constructor(kind: TokenizeErrorKind, message: string, span: SourceSpan, contextLine?: string, suggestion?: string) {
    super(message, span, contextLine, suggestion);
    this.name = 'TokenizeError';
    this.kind = kind;
  }
}

export interface ParseErrorDetails {
  expected: string[];
  found: string;
  suggestion?: string;
  contextLine?: string;
  input?: string;
}

export class ParseError extends SourceError {
  public expected: string[];
  public found: string;
  public input?: string;

  constructor(message: string, span: SourceSpan, details: ParseErrorDetails) {
    super(message, span, details.contextLine, details.suggestion);
    this.name = 'ParseError';
    this.expected = details.expected;
    this.found = details.found;
    this.input = details.input;
  }
}

export function isSourceError(err: unknown): err is SourceError {
  return err instanceof SourceError;
}

/** The 1-based `line` of `source`, without its line terminator. */
export function sourceLineAt(source: string, line: number): string | undefined {
  const lines = source.split(/\r\n|\r|\n/);
  return line >= 1 && line <= lines.length ? lines[line - 1] : undefined;
}
