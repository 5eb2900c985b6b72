import { parseExpression, structurallyEqual, tokenize, TokenizeError, type Token } from '../src/index.js';

const types = (source: string) => tokenize(source).map((token) => token.type);
const texts = (source: string) => tokenize(source).map((token) => token.text);

const tokenizeError = (source: string): TokenizeError => {
  try {
    tokenize(source);
  } catch (err: unknown) {
    if (err instanceof TokenizeError) return err;
    throw err;
  }
  throw new Error('expected a TokenizeError');
};

const numberValue = (source: string) => {
  const [token] = tokenize(source);
  if (token.type !== 'number') throw new Error(`expected a number token, got ${token.type}`);
  return token.value;
};

const stringValue = (source: string) => {
  const [token] = tokenize(source);
  if (token.type !== 'string') throw new Error(`expected a string token, got ${token.type}`);
  return token.value;
};

const fstringParts = (source: string) => {
  const [token] = tokenize(source);
  if (token.type !== 'fstring') throw new Error(`expected an f-string token, got ${token.type}`);
  return token.parts;
};

describe('Tokenizer layout', () => {
  test('emits indent and dedent around a block', () => {
    expect(types('if x:\n    y = 1\n')).toEqual([
      'keyword', 'name', 'op', 'newline',
      'indent', 'name', 'op', 'number', 'newline',
      'dedent', 'endmarker',
    ]);
  });

  test('terminates an unterminated last line with a newline', () => {
    const tokens = tokenize('x = 1');
    expect(tokens.map((token) => token.type)).toEqual(['name', 'op', 'number', 'newline', 'endmarker']);
    expect(tokens[3].text).toBe('');
  });

  test('blank and comment-only lines produce nothing', () => {
    expect(types('if a:\n\n    # note\n    b\n')).toEqual([
      'keyword', 'name', 'op', 'newline', 'indent', 'name', 'newline', 'dedent', 'endmarker',
    ]);
  });

  test('suppresses newlines and indentation inside brackets', () => {
    expect(texts('x = (1,\n     2)\n')).toEqual(['x', '=', '(', '1', ',', '2', ')', '\n', '']);
  });

  test('joins lines ending with a backslash', () => {
    expect(texts('x = 1 + \\\n    2\n')).toEqual(['x', '=', '1', '+', '2', '\n', '']);
  });

  test('closes every open block at end of input', () => {
    const tokens = tokenize('def f():\n    if a:\n        return 1');
    const indents = tokens.filter((token) => token.type === 'indent').length;
    const dedents = tokens.filter((token) => token.type === 'dedent').length;
    expect(indents).toBe(2);
    expect(dedents).toBe(2);
    expect(tokens.slice(-4).map((token) => token.type)).toEqual(['newline', 'dedent', 'dedent', 'endmarker']);
  });

  test('a tab advances to the next multiple of eight', () => {
    const tokens = tokenize('if a:\n\tb\n        c\n');
    expect(tokens.filter((token) => token.type === 'indent')).toHaveLength(1);
    expect(tokens.filter((token) => token.type === 'dedent')).toHaveLength(1);
  });

  test('reports an unindent that matches no outer level', () => {
    const err = tokenizeError('if a:\n    b\n  c\n');
    expect(err.kind).toBe('indentation-mismatch');
    expect(err.message).toBe('unindent does not match any outer indentation level');
    expect(err.line).toBe(3);
    expect(err.col).toBe(3);
    expect(err.contextLine).toBe('  c');
  });

  test('normalizes CRLF line endings', () => {
    expect(types('a\r\nb\r\n')).toEqual(['name', 'newline', 'name', 'newline', 'endmarker']);
  });

  test('records 1-based positions', () => {
    const tokens = tokenize('a = 1\nbb = 2\n');
    const bb: Token = tokens[4];
    expect(bb).toMatchObject({ type: 'name', text: 'bb', line: 2, col: 1, endLine: 2, endCol: 3, offset: 6 });
  });
});

describe('Tokenizer literals', () => {
  test('keeps soft keywords as names', () => {
    const tokens = tokenize('match case type _ if');
    expect(tokens.slice(0, 5).map((token) => token.type)).toEqual(['name', 'name', 'name', 'name', 'keyword']);
  });

  test('decodes integers in every base', () => {
    expect(numberValue('0x_ff')).toEqual({ kind: 'int', value: 255n });
    expect(numberValue('0o17')).toEqual({ kind: 'int', value: 15n });
    expect(numberValue('0b101')).toEqual({ kind: 'int', value: 5n });
    expect(numberValue('1_000')).toEqual({ kind: 'int', value: 1000n });
    expect(numberValue('00')).toEqual({ kind: 'int', value: 0n });
  });

  test('decodes floats and imaginary numbers', () => {
    expect(numberValue('1.5e3')).toEqual({ kind: 'float', value: 1500 });
    expect(numberValue('.5')).toEqual({ kind: 'float', value: 0.5 });
    expect(numberValue('3j')).toEqual({ kind: 'complex', value: { real: 0, imag: 3 } });
  });

  test('rejects leading zeros and glued identifiers', () => {
    const leading = tokenizeError('x = 0123');
    expect(leading.kind).toBe('invalid-number');
    expect(leading.message).toBe('leading zeros in decimal integer literals are not permitted');
    expect(leading.suggestion).toBe('Use an 0o prefix for octal integers');

    const glued = tokenizeError('12abc');
    expect(glued.kind).toBe('invalid-number');
    expect(glued.message).toBe('invalid decimal literal');
    expect(tokenizeError('1_').kind).toBe('invalid-number');
  });

  test('decodes escapes in plain strings', () => {
    expect(stringValue("'a\\tb\\x41\\101'")).toEqual({ kind: 'str', value: 'a\tbAA' });
    expect(stringValue("'\\q'")).toEqual({ kind: 'str', value: '\\q' });
  });

  test('resolves named character escapes', () => {
    expect(stringValue("'\\N{BULLET} \\N{greek small letter alpha}'")).toEqual({ kind: 'str', value: '\u2022 \u03b1' });
    expect(stringValue("'\\N{LINE FEED}'")).toEqual({ kind: 'str', value: '\n' });
    expect(stringValue("'\\N{CJK UNIFIED IDEOGRAPH-4E2D}'")).toEqual({ kind: 'str', value: '\u4e2d' });
    expect(stringValue("'\\\\N{BULLET}'")).toEqual({ kind: 'str', value: '\\N{BULLET}' });
    expect(structurallyEqual(parseExpression("'\\N{BULLET}'"), parseExpression("'\\\\N{BULLET}'"))).toBe(false);
  });

  test('rejects unknown or malformed character names', () => {
    const unknown = tokenizeError("'\\N{NO SUCH CHARACTER}'");
    expect(unknown.kind).toBe('invalid-escape');
    expect(unknown.message).toBe('unknown Unicode character name');
    expect(tokenizeError("'\\N{CJK UNIFIED IDEOGRAPH-0041}'").message).toBe('unknown Unicode character name');
    expect(tokenizeError("'\\N{}'").message).toBe('malformed \\N character escape');
  });

  test('leaves raw strings undecoded', () => {
    const [token] = tokenize("R'a\\tb'");
    expect(token).toMatchObject({ type: 'string', prefix: 'r', value: { kind: 'str', value: 'a\\tb' } });
  });

  test('decodes bytes', () => {
    expect(stringValue("b'A\\x00\\xff'")).toEqual({ kind: 'bytes', value: Uint8Array.from([0x41, 0x00, 0xff]) });
    expect(stringValue("b'\\101\\7\\q'")).toEqual({ kind: 'bytes', value: Uint8Array.from([0x41, 0x07, 0x5c, 0x71]) });
  });

  test('reads triple-quoted strings across lines', () => {
    const tokens = tokenize('x = """one\ntwo"""\ny\n');
    expect(tokens[2]).toMatchObject({ type: 'string', value: { kind: 'str', value: 'one\ntwo' }, line: 1, endLine: 2 });
    expect(tokens[4]).toMatchObject({ type: 'name', text: 'y', line: 3 });
  });

  test('reports a truncated escape', () => {
    const err = tokenizeError("'\\x4'");
    expect(err.kind).toBe('invalid-escape');
    expect(err.message).toBe('truncated \\xXX escape');
  });

  test('reports unterminated strings', () => {
    const single = tokenizeError("x = 'abc\n");
    expect(single.kind).toBe('unterminated-literal');
    expect(single.message).toBe('unterminated string literal');
    expect(single.line).toBe(1);
    expect(single.col).toBe(5);

    const triple = tokenizeError('"""never closed\n');
    expect(triple.message).toBe('unterminated triple-quoted string literal');
  });

  test('reports invalid characters', () => {
    const dollar = tokenizeError('a = $b');
    expect(dollar.kind).toBe('invalid-character');
    expect(dollar.message).toBe("invalid character '$' (U+0024)");
    expect(dollar.col).toBe(5);

    const bang = tokenizeError('!x');
    expect(bang.message).toBe("invalid character '!' (U+0021)");
    expect(bang.suggestion).toBe("Use 'not' for boolean negation");
  });

  test('accepts non-ASCII identifiers', () => {
    const [token] = tokenize('größe = 1');
    expect(token).toMatchObject({ type: 'name', text: 'größe' });
  });

  test('carries the source file into errors', () => {
    try {
      tokenize('a = $', { sourceFile: 'demo.py' });
      throw new Error('expected a TokenizeError');
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(TokenizeError);
      if (err instanceof TokenizeError) {
        expect(err.sourceFile).toBe('demo.py');
        expect(err.toString().split('\n')[0]).toBe("TokenizeError at demo.py:1:5: invalid character '$' (U+0024)");
      }
    }
  });
});

describe('Tokenizer f-strings', () => {
  test('splits literal runs and fields', () => {
    const parts = fstringParts('f"a{{b}} {x} c"');
    expect(parts).toHaveLength(3);
    expect(parts[0]).toEqual({ kind: 'literal', value: 'a{b} ' });
    expect(parts[1]).toMatchObject({ kind: 'field', expression: 'x', conversion: -1, formatSpec: null, debugText: null });
    expect(parts[2]).toEqual({ kind: 'literal', value: ' c' });
  });

  test('reads conversions and nested format specs', () => {
    const [field] = fstringParts('f"{x!r:>{w}}"');
    if (field.kind !== 'field') throw new Error('expected a field');
    expect(field.conversion).toBe(114);
    expect(field.formatSpec).toHaveLength(2);
    expect(field.formatSpec?.[0]).toEqual({ kind: 'literal', value: '>' });
    expect(field.formatSpec?.[1]).toMatchObject({ kind: 'field', expression: 'w' });
  });

  test('tokenizes field expressions with positions in the enclosing source', () => {
    const [field] = fstringParts('f"{a + b}"');
    if (field.kind !== 'field') throw new Error('expected a field');
    expect(field.tokens.map((token) => token.text)).toEqual(['a', '+', 'b', '']);
    expect(field.tokens[2]).toMatchObject({ line: 1, col: 8 });
  });

  test('recognises self-documenting fields', () => {
    const [field] = fstringParts('f"{a = }"');
    expect(field).toMatchObject({ kind: 'field', expression: 'a ', debugText: 'a = ' });
  });

  test('does not treat comparisons as conversions or debug markers', () => {
    const [field] = fstringParts('f"{a != b}"');
    expect(field).toMatchObject({ kind: 'field', expression: 'a != b', conversion: -1, debugText: null });
  });

  test('skips quoted text inside a field', () => {
    const [field] = fstringParts("f\"{d['}']}\"");
    expect(field).toMatchObject({ kind: 'field', expression: "d['}']" });
  });

  test('tokenizes every field of consecutive f-strings independently', () => {
    const tokens = tokenize('f"{a}" f"{b.c} {d[0]}"\n');
    const fields = tokens.flatMap((token) =>
      token.type === 'fstring' ? token.parts.filter((part) => part.kind === 'field') : []
    );
    expect(fields.map((field) => (field.kind === 'field' ? field.tokens.map((token) => token.text) : []))).toEqual([
      ['a', ''],
      ['b', '.', 'c', ''],
      ['d', '[', '0', ']', ''],
    ]);
    expect(tokens.map((token) => token.type)).toEqual(['fstring', 'fstring', 'newline', 'endmarker']);
  });

  test('resolves a named escape in literal text', () => {
    const parts = fstringParts('f"\\N{BULLET} {x}"');
    expect(parts[0]).toEqual({ kind: 'literal', value: '• ' });
    expect(parts[1]).toMatchObject({ kind: 'field', expression: 'x' });
  });

  test('rejects a lone closing brace', () => {
    const err = tokenizeError('f"a}"');
    expect(err.kind).toBe('unterminated-literal');
    expect(err.message).toBe("f-string: single '}' is not allowed");
  });

  test('rejects an unclosed field', () => {
    const err = tokenizeError('f"{a"');
    expect(err.kind).toBe('unterminated-literal');
    expect(err.message).toBe("f-string: expecting '}'");
  });

  test('rejects an unknown conversion', () => {
    const err = tokenizeError('f"{a!x}"');
    expect(err.message).toBe("f-string: invalid conversion character: expected 's', 'r', or 'a'");
  });
});
