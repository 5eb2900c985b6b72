import moo from 'moo';
import { TokenizeError, type TokenizeErrorKind } from './errors.js';
import { LiteralEscapeError, decodeBytes, decodeStr, parseNumberLiteral } from './literals.js';
import {
  hardKeywords,
  openingBrackets,
  closingBrackets,
  operators,
  type FStringFieldPart,
  type FStringPart,
  type Token,
} from './tokens.js';
import type { Conversion } from './ast.js';

export interface TokenizeOptions {
  sourceFile?: string;
}

type RawType =
  | 'ws'
  | 'continuation'
  | 'comment'
  | 'newline'
  | 'string'
  | 'number'
  | 'name'
  | 'keyword'
  | 'op'
  | 'error';

interface RawToken {
  type: RawType;
  text: string;
  offset: number;
}

const rawTypes: ReadonlySet<string> = new Set<RawType>([
  'ws', 'continuation', 'comment', 'newline', 'string', 'number', 'name', 'keyword', 'op', 'error',
]);

function isRawType(type: string | undefined): type is RawType {
  return type !== undefined && rawTypes.has(type);
}

function toRawToken(token: moo.Token, baseOffset: number): RawToken {
  const type = isRawType(token.type) ? token.type : 'error';
  return { type, text: token.text, offset: token.offset + baseOffset };
}

const STRING_PREFIX = '(?:[rR][bBfF]?|[bBfF][rR]?|[uU])?';
const DIGITS = '[0-9](?:_?[0-9])*';

// Rule order matters: moo takes the first alternative that matches. Two quotes
// followed by a third always open a triple-quoted literal.
const rules: moo.Rules = {
  ws: /[ \t\f]+/,
  continuation: { match: /\\\n/, lineBreaks: true },
  comment: /#[^\n]*/,
  newline: { match: /\n/, lineBreaks: true },
  string: [
    { match: new RegExp(`${STRING_PREFIX}'''(?:[^'\\\\]|\\\\[\\s\\S]|'(?!''))*'''`), lineBreaks: true },
    { match: new RegExp(`${STRING_PREFIX}"""(?:[^"\\\\]|\\\\[\\s\\S]|"(?!""))*"""`), lineBreaks: true },
    { match: new RegExp(`${STRING_PREFIX}'(?!'')(?:[^'\\\\\\n]|\\\\[\\s\\S])*'`), lineBreaks: true },
    { match: new RegExp(`${STRING_PREFIX}"(?!"")(?:[^"\\\\\\n]|\\\\[\\s\\S])*"`), lineBreaks: true },
  ],
  number: [
    /0[xX](?:_?[0-9a-fA-F])+/,
    /0[oO](?:_?[0-7])+/,
    /0[bB](?:_?[01])+/,
    new RegExp(`(?:${DIGITS}(?:\\.(?:${DIGITS})?)?|\\.${DIGITS})(?:[eE][+-]?${DIGITS})?[jJ]?`),
  ],
  name: {
    match: /[A-Za-z_\u00aa-\uffff][A-Za-z0-9_\u00aa-\uffff]*/,
    type: moo.keywords({ keyword: hardKeywords }),
  },
  op: operators,
  error: moo.error,
};

// The raw name rule accepts any non-ASCII text; this decides which of it is an identifier.
const identifierPattern = /^[\p{L}\p{Nl}_][\p{L}\p{Nl}\p{Mn}\p{Mc}\p{Nd}\p{Pc}]*$/u;

const TAB_SIZE = 8;

/**
 * Convert Python source into a fully materialised token list ending with an
 * `endmarker`. Line endings are normalised to `\n` first, so offsets refer to
 * the normalised text.
 */
export function tokenize(source: string, options: TokenizeOptions = {}): Token[] {
  return new Tokenizer(source, options).run();
}

/** Python reads `\r\n` and lone `\r` as line breaks; the tokenizer only sees `\n`. */
export function normalizeNewlines(source: string): string {
  return source.replace(/\r\n?/g, '\n');
}

class Tokenizer {
  private readonly source: string;
  private readonly sourceFile?: string;
  private readonly lineStarts: number[] = [0];
  private readonly lexer: moo.Lexer;

  constructor(source: string, options: TokenizeOptions) {
    this.source = normalizeNewlines(source);
    this.sourceFile = options.sourceFile;
    for (let i = 0; i < this.source.length; i += 1) {
      if (this.source[i] === '\n') this.lineStarts.push(i + 1);
    }
    this.lexer = moo.compile(rules);
  }

  run(): Token[] {
    const tokens: Token[] = [];
    const indents = [0];
    const brackets: string[] = [];
    let atLineStart = true;
    let width = 0;
    let previous: RawToken | null = null;

    this.lexer.reset(this.source);
    for (const token of this.lexer) {
      const raw = toRawToken(token, 0);
      switch (raw.type) {
        case 'ws':
          if (atLineStart) width = measureIndent(raw.text, width);
          continue;
        case 'comment':
        case 'continuation':
          continue;
        case 'newline':
          if (brackets.length > 0) continue;
          if (!atLineStart) {
            tokens.push(this.make('newline', raw.offset, raw.offset + 1, raw.text));
          }
          atLineStart = true;
          width = 0;
          continue;
        case 'error':
          throw this.lexicalError(raw);
        default:
          break;
      }

      if (atLineStart && brackets.length === 0) {
        this.indent(tokens, indents, width, raw.offset);
      }
      atLineStart = false;

      this.checkNumberBoundary(previous, raw);
      if (raw.type === 'op') {
        this.trackBrackets(brackets, raw.text);
      }
      tokens.push(this.convert(raw, false));
      previous = raw;
    }

    const end = this.source.length;
    if (!atLineStart) {
      tokens.push(this.make('newline', end, end, ''));
    }
    for (let i = indents.length - 1; i > 0; i -= 1) {
      tokens.push(this.make('dedent', end, end, ''));
    }
    tokens.push(this.make('endmarker', end, end, ''));
    return tokens;
  }

  /** Tokenize an f-string replacement field as if it sat inside brackets. */
  private runFragment(text: string, baseOffset: number): Token[] {
    const tokens: Token[] = [];
    const lexer = this.lexer.clone();
    let previous: RawToken | null = null;
    lexer.reset(text);
    for (const token of lexer) {
      const raw = toRawToken(token, baseOffset);
      if (raw.type === 'ws' || raw.type === 'comment' || raw.type === 'continuation' || raw.type === 'newline') {
        continue;
      }
      if (raw.type === 'error') {
        throw this.lexicalError(raw);
      }
      this.checkNumberBoundary(previous, raw);
      tokens.push(this.convert(raw, true));
      previous = raw;
    }
    const end = baseOffset + text.length;
    tokens.push(this.make('endmarker', end, end, ''));
    return tokens;
  }

  private indent(tokens: Token[], indents: number[], width: number, offset: number): void {
    const lineStart = this.lineStarts[this.lineIndex(offset)];
    const top = indents[indents.length - 1];
    if (width > top) {
      indents.push(width);
      tokens.push(this.make('indent', lineStart, offset, this.source.slice(lineStart, offset)));
      return;
    }
    while (width < indents[indents.length - 1]) {
      indents.pop();
      tokens.push(this.make('dedent', offset, offset, ''));
    }
    if (width !== indents[indents.length - 1]) {
      throw this.error(
        'indentation-mismatch',
        'unindent does not match any outer indentation level',
        offset,
        offset,
        'Indent this line to the same column as an enclosing block'
      );
    }
  }

  private trackBrackets(brackets: string[], text: string): void {
    if (text in openingBrackets) {
      brackets.push(text);
    } else if (text in closingBrackets && brackets.length > 0) {
      // A mismatched closer is left for the parser to report.
      brackets.pop();
    }
  }

  private checkNumberBoundary(previous: RawToken | null, raw: RawToken): void {
    if (!previous || previous.type !== 'number') return;
    const adjacent = previous.offset + previous.text.length === raw.offset;
    if (adjacent && (raw.type === 'name' || raw.type === 'number')) {
      throw this.error(
        'invalid-number',
        'invalid decimal literal',
        previous.offset,
        raw.offset + raw.text.length
      );
    }
  }

  private convert(raw: RawToken, inFragment: boolean): Token {
    const start = raw.offset;
    const end = raw.offset + raw.text.length;
    switch (raw.type) {
      case 'number': {
        if (/^0[0-9_]*[1-9][0-9_]*$/.test(raw.text)) {
          throw this.error(
            'invalid-number',
            'leading zeros in decimal integer literals are not permitted',
            start,
            end,
            'Use an 0o prefix for octal integers'
          );
        }
        return { ...this.position(start, end), type: 'number', text: raw.text, value: parseNumberLiteral(raw.text) };
      }
      case 'string':
        return this.convertString(raw.text, start, end, inFragment);
      case 'name':
        if (!identifierPattern.test(raw.text)) throw this.invalidIdentifier(raw);
        return { ...this.position(start, end), type: 'name', text: raw.text };
      case 'keyword':
        return { ...this.position(start, end), type: 'keyword', text: raw.text };
      default:
        return { ...this.position(start, end), type: 'op', text: raw.text };
    }
  }

  private convertString(text: string, start: number, end: number, inFragment: boolean): Token {
    const prefix = (text.match(/^[a-zA-Z]*/)?.[0] ?? '').toLowerCase();
    const rest = text.slice(prefix.length);
    const quoteLength = rest.startsWith("'''") || rest.startsWith('"""') ? 3 : 1;
    const bodyOffset = start + prefix.length + quoteLength;
    const body = text.slice(prefix.length + quoteLength, text.length - quoteLength);
    const raw = prefix.includes('r');

    if (prefix.includes('f')) {
      const scanned = this.scanParts(body, 0, bodyOffset, raw, false);
      return { ...this.position(start, end), type: 'fstring', text, prefix, parts: scanned.parts };
    }

    try {
      if (prefix.includes('b')) {
        return {
          ...this.position(start, end),
          type: 'string',
          text,
          prefix,
          value: { kind: 'bytes', value: decodeBytes(body, raw) },
        };
      }
      return {
        ...this.position(start, end),
        type: 'string',
        text,
        prefix,
        value: { kind: 'str', value: raw ? body : decodeStr(body) },
      };
    } catch (err: unknown) {
      if (err instanceof LiteralEscapeError) {
        const at = bodyOffset + err.index;
        throw this.error('invalid-escape', `${inFragment ? 'f-string: ' : ''}${err.message}`, at, at + 1);
      }
      throw err;
    }
  }

  /**
   * Split an f-string body (or a format spec, when `inSpec`) into literal runs
   * and replacement fields. Returns the index where scanning stopped: the end
   * of the body, or the `}` closing a format spec.
   */
  private scanParts(
    body: string,
    from: number,
    bodyOffset: number,
    raw: boolean,
    inSpec: boolean
  ): { parts: FStringPart[]; end: number } {
    const parts: FStringPart[] = [];
    let buffer = '';
    let bufferStart = from;
    let i = from;

    const flush = () => {
      if (buffer.length === 0) return;
      let value = buffer;
      if (!raw) {
        try {
          value = decodeStr(buffer);
        } catch (err: unknown) {
          if (err instanceof LiteralEscapeError) {
            const at = bodyOffset + bufferStart;
            throw this.error('invalid-escape', `f-string: ${err.message}`, at, at + 1);
          }
          throw err;
        }
      }
      parts.push({ kind: 'literal', value });
      buffer = '';
    };

    while (i < body.length) {
      const ch = body[i];
      if (ch === '{') {
        if (!inSpec && body[i + 1] === '{') {
          buffer += '{';
          i += 2;
          continue;
        }
        flush();
        const field = this.scanField(body, i, bodyOffset, raw);
        parts.push(field.part);
        i = field.end;
        bufferStart = i;
        continue;
      }
      if (ch === '}') {
        if (inSpec) break;
        if (body[i + 1] === '}') {
          buffer += '}';
          i += 2;
          continue;
        }
        throw this.error(
          'unterminated-literal',
          "f-string: single '}' is not allowed",
          bodyOffset + i,
          bodyOffset + i + 1,
          "Double the brace ('}}') to include it literally"
        );
      }
      if (ch === '\\' && !raw) {
        const next = body[i + 1];
        if (next === 'N' && body[i + 2] === '{') {
          const close = body.indexOf('}', i + 3);
          const stop = close === -1 ? body.length : close + 1;
          buffer += body.slice(i, stop);
          i = stop;
          continue;
        }
        if (next === '{' || next === '}' || next === undefined) {
          buffer += ch;
          i += 1;
          continue;
        }
        buffer += ch + next;
        i += 2;
        continue;
      }
      buffer += ch;
      i += 1;
    }
    flush();
    return { parts, end: i };
  }

  private scanField(body: string, open: number, bodyOffset: number, raw: boolean): { part: FStringFieldPart; end: number } {
    const unterminated = () =>
      this.error(
        'unterminated-literal',
        "f-string: expecting '}'",
        bodyOffset + open,
        bodyOffset + open + 1,
        "Close the replacement field with '}'"
      );

    const exprStart = open + 1;
    let i = exprStart;
    let depth = 0;
    let exprEnd = -1;
    let debugText: string | null = null;

    while (exprEnd === -1) {
      const ch = body[i];
      if (ch === undefined) throw unterminated();
      if (ch === "'" || ch === '"') {
        i = skipQuoted(body, i);
        if (i === -1) throw unterminated();
        continue;
      }
      if (ch in openingBrackets) {
        depth += 1;
      } else if (ch in closingBrackets) {
        if (depth === 0) {
          if (ch !== '}') throw unterminated();
          exprEnd = i;
          break;
        }
        depth -= 1;
      } else if (depth === 0) {
        const next = body[i + 1];
        if ((ch === '=' || ch === '!' || ch === '<' || ch === '>') && next === '=') {
          i += 2;
          continue;
        }
        if (ch === '!' || ch === ':') {
          exprEnd = i;
          break;
        }
        if (ch === '=') {
          let j = i + 1;
          while (body[j] === ' ' || body[j] === '\t') j += 1;
          if (body[j] === '!' || body[j] === ':' || body[j] === '}') {
            exprEnd = i;
            debugText = body.slice(exprStart, j);
            i = j;
            break;
          }
        }
      }
      i += 1;
    }

    const expression = body.slice(exprStart, exprEnd);
    const tokens = this.runFragment(expression, bodyOffset + exprStart);

    let conversion: Conversion = -1;
    if (body[i] === '!') {
      const flag = body[i + 1];
      if (flag === 's') conversion = 115;
      else if (flag === 'r') conversion = 114;
      else if (flag === 'a') conversion = 97;
      else {
        throw this.error(
          'unterminated-literal',
          "f-string: invalid conversion character: expected 's', 'r', or 'a'",
          bodyOffset + i + 1,
          bodyOffset + i + 2
        );
      }
      i += 2;
    }

    let formatSpec: FStringPart[] | null = null;
    if (body[i] === ':') {
      const spec = this.scanParts(body, i + 1, bodyOffset, raw, true);
      formatSpec = spec.parts;
      i = spec.end;
    }

    if (body[i] !== '}') throw unterminated();
    const end = i + 1;
    const span = this.position(bodyOffset + open, bodyOffset + end);
    return {
      part: {
        kind: 'field',
        tokens,
        expression,
        debugText,
        conversion,
        formatSpec,
        offset: span.offset,
        line: span.line,
        col: span.col,
        endLine: span.endLine,
        endCol: span.endCol,
      },
      end,
    };
  }

  private lexicalError(raw: RawToken): TokenizeError {
    const rest = raw.text;
    const literal = rest.match(/^[rRbBuUfF]{0,2}('''|"""|'|")/);
    if (literal) {
      const triple = literal[1].length === 3;
      return this.error(
        'unterminated-literal',
        triple ? 'unterminated triple-quoted string literal' : 'unterminated string literal',
        raw.offset,
        raw.offset + literal[0].length,
        `Close the literal with ${literal[1]}`
      );
    }
    const char = String.fromCodePoint(rest.codePointAt(0) ?? 0);
    const code = (char.codePointAt(0) ?? 0).toString(16).toUpperCase().padStart(4, '0');
    const suggestion = char === '!' ? "Use 'not' for boolean negation" : undefined;
    return this.error(
      'invalid-character',
      `invalid character '${char}' (U+${code})`,
      raw.offset,
      raw.offset + char.length,
      suggestion
    );
  }

  private invalidIdentifier(raw: RawToken): TokenizeError {
    let index = 0;
    for (const char of raw.text) {
      const valid = index === 0 ? /^[\p{L}\p{Nl}_]$/u : /^[\p{L}\p{Nl}\p{Mn}\p{Mc}\p{Nd}\p{Pc}]$/u;
      if (!valid.test(char)) {
        const code = (char.codePointAt(0) ?? 0).toString(16).toUpperCase().padStart(4, '0');
        const at = raw.offset + index;
        return this.error('invalid-character', `invalid character '${char}' (U+${code})`, at, at + char.length);
      }
      index += char.length;
    }
    return this.error('invalid-character', `invalid identifier '${raw.text}'`, raw.offset, raw.offset + raw.text.length);
  }

  private error(
    kind: TokenizeErrorKind,
    message: string,
    start: number,
    end: number,
    suggestion?: string
  ): TokenizeError {
    const span = this.position(start, end);
    const contextLine = this.lineText(span.line);
    return new TokenizeError(
      kind,
      message,
      { ...span, endOffset: end, sourceFile: this.sourceFile },
      contextLine,
      suggestion
    );
  }

  private make(
    type: 'newline' | 'indent' | 'dedent' | 'endmarker',
    start: number,
    end: number,
    text: string
  ): Token {
    const position = this.position(start, end);
    switch (type) {
      case 'newline':
        // Ends on its own line, one column past the break.
        return { ...position, endLine: position.line, endCol: position.col + text.length, type: 'newline', text };
      case 'indent':
        return { ...position, type: 'indent', text };
      case 'dedent':
        return { ...position, type: 'dedent', text };
      default:
        return { ...position, type: 'endmarker', text };
    }
  }

  private position(start: number, end: number) {
    const startLine = this.lineIndex(start);
    const endLine = this.lineIndex(end);
    return {
      offset: start,
      line: startLine + 1,
      col: start - this.lineStarts[startLine] + 1,
      endLine: endLine + 1,
      endCol: end - this.lineStarts[endLine] + 1,
    };
  }

  private lineIndex(offset: number): number {
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.lineStarts[mid] <= offset) low = mid;
      else high = mid - 1;
    }
    return low;
  }

  private lineText(line: number): string {
    const start = this.lineStarts[line - 1] ?? 0;
    const next = this.lineStarts[line];
    return this.source.slice(start, next === undefined ? this.source.length : next - 1);
  }
}

function measureIndent(text: string, width: number): number {
  let result = width;
  for (const ch of text) {
    if (ch === ' ') result += 1;
    else if (ch === '\t') result = (Math.floor(result / TAB_SIZE) + 1) * TAB_SIZE;
    else result = 0;
  }
  return result;
}

/** Index just past the string literal opening at `start`, or -1 when unterminated. */
function skipQuoted(text: string, start: number): number {
  const quote = text[start];
  const triple = text.startsWith(quote.repeat(3), start);
  const delimiter = triple ? quote.repeat(3) : quote;
  let i = start + delimiter.length;
  while (i < text.length) {
    if (text[i] === '\\') {
      i += 2;
      continue;
    }
    if (text.startsWith(delimiter, i)) return i + delimiter.length;
    if (!triple && text[i] === '\n') return -1;
    i += 1;
  }
  return -1;
}
