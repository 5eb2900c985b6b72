import { formatLocation, formatSourceError, highlightSnippet, parse, tokenize } from '../src/index.js';

const thrown = (run: () => unknown): unknown => {
  try {
    run();
  } catch (err: unknown) {
    return err;
  }
  throw new Error('expected an error');
};

const location = (line: number, column: number, endLine: number, endColumn: number) => ({
  start: { line, column, offset: 0 },
  end: { line: endLine, column: endColumn, offset: 0 },
});

describe('formatLocation', () => {
  test('collapses an empty span', () => {
    expect(formatLocation(location(2, 4, 2, 4))).toBe('Line 2, Col 4');
  });

  test('shows both ends of a span', () => {
    expect(formatLocation(location(1, 9, 1, 10))).toBe('Line 1, Col 9 → Line 1, Col 10');
  });
});

describe('highlightSnippet', () => {
  test('shows the neighbouring lines and a caret under the span', () => {
    const input = 'a = 1\nb = call(x\nc = 3';
    expect(highlightSnippet(input, location(2, 5, 2, 9), false)).toBe(
      ['1: a = 1', '2: b = call(x', '       ^^^^', '3: c = 3'].join('\n')
    );
  });

  test('returns nothing for a line outside the input', () => {
    expect(highlightSnippet('x', location(5, 1, 5, 2), false)).toBe('');
  });
});

describe('formatSourceError', () => {
  test('reports a parse error in full', () => {
    const err = thrown(() => parse('if x > 3\n    print(x)\n'));
    expect(formatSourceError(err, { useColors: false })).toBe(
      [
        "❌ ParseError: expected ':'",
        '↪ at Line 1, Col 9 → Line 1, Col 10',
        "Expected: ':'",
        'Found: "newline"',
        '',
        '--- Snippet ---',
        '1: if x > 3',
        `${' '.repeat(11)}^`,
        '2:     print(x)',
        '',
        '💡 Suggestion: Did you mean: if x > 3:',
      ].join('\n')
    );
  });

  test('names the file when the error carries one', () => {
    const err = thrown(() => tokenize('a = $b', { sourceFile: 'calc.py' }));
    const [, where] = formatSourceError(err, { useColors: false }).split('\n');
    expect(where).toBe('↪ at calc.py, Line 1, Col 5 → Line 1, Col 6');
  });

  test('uses the source option for tokenizer snippets', () => {
    const err = thrown(() => tokenize('a = $b'));
    const report = formatSourceError(err, { useColors: false, source: 'a = $b' });
    expect(report).toContain('--- Snippet ---\n1: a = $b\n       ^');
  });

  test('falls back to the message for other errors', () => {
    expect(formatSourceError(new Error('disk full'), { useColors: false })).toBe('❌ Error: disk full');
  });
});
