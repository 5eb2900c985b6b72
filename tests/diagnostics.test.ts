import { parse, tokenize, toDiagnostic, diagnosticCode, ParseError, TokenizeError } from '../src/index.js';

const thrown = (run: () => unknown): unknown => {
  try {
    run();
  } catch (err: unknown) {
    return err;
  }
  throw new Error('expected an error');
};

describe('toDiagnostic', () => {
  const source = 'if x > 3\n    print(x)\n';

  test('describes a parse error with a context excerpt', () => {
    const err = thrown(() => parse(source));
    expect(err).toBeInstanceOf(ParseError);
    expect(toDiagnostic(err, source)).toEqual({
      code: 'PY-SYNTAX',
      severity: 'error',
      message: "expected ':'",
      range: { start: { line: 1, column: 9 }, end: { line: 1, column: 10 } },
      sourceFile: 'inline',
      context: `  1 | if x > 3\n    | ${' '.repeat(8)}^`,
      suggestion: 'Did you mean: if x > 3:',
    });
  });

  test('prefers an explicit file name, then the one the error carries', () => {
    const err = thrown(() => parse(source, { sourceFile: 'cond.py' }));
    expect(toDiagnostic(err, source).sourceFile).toBe('cond.py');
    expect(toDiagnostic(err, source, 'other.py').sourceFile).toBe('other.py');
  });

  test('codes tokenizer errors by kind', () => {
    const err = thrown(() => tokenize('a = $b'));
    expect(err).toBeInstanceOf(TokenizeError);
    const diagnostic = toDiagnostic(err, 'a = $b');
    expect(diagnostic.code).toBe('PY-LEX-INVALID-CHARACTER');
    expect(diagnostic.range.start).toEqual({ line: 1, column: 5 });
    expect(diagnostic.suggestion).toBeUndefined();
  });

  test('falls back to the first line for unknown errors', () => {
    const diagnostic = toDiagnostic(new Error('boom'), 'x = 1\n');
    expect(diagnostic.code).toBe('PY-INTERNAL');
    expect(diagnostic.message).toBe('boom');
    expect(diagnostic.range).toEqual({ start: { line: 1, column: 1 }, end: { line: 1, column: 1 } });
    expect(diagnostic.context).toBe('  1 | x = 1\n    | ^');
  });

  test('stringifies thrown non-errors', () => {
    expect(toDiagnostic('odd', '').message).toBe('odd');
  });
});

describe('diagnosticCode', () => {
  test('maps each error family', () => {
    expect(diagnosticCode(thrown(() => tokenize('x = "open\n')))).toBe('PY-LEX-UNTERMINATED-LITERAL');
    expect(diagnosticCode(thrown(() => tokenize('if a:\n    b\n  c\n')))).toBe('PY-LEX-INDENTATION-MISMATCH');
    expect(diagnosticCode(thrown(() => parse('(1, 2\n')))).toBe('PY-SYNTAX');
    expect(diagnosticCode(new TypeError('x'))).toBe('PY-INTERNAL');
  });
});
