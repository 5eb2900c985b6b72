import { generate, generateExpression, generateStatement, parse, parseExpression, structurallyEqual } from '../src/index.js';
import type { CodegenOptions, PyExpression, PyModule } from '../src/index.js';
import { floatRepr, escapeString } from '../src/python/codegen.js';

const regen = (source: string, options: Partial<CodegenOptions> = {}) => generate(parse(source), options);
const regenExpr = (source: string) => generateExpression(parseExpression(source));

describe('generate', () => {
  test('renders statements with a trailing newline', () => {
    expect(regen('x = 1')).toBe('x = 1\n');
    expect(regen('')).toBe('');
  });

  test('normalizes spacing', () => {
    expect(regen('x=foo( a,b )[ 1 ]')).toBe('x = foo(a, b)[1]\n');
  });

  test('drops comments and blank lines', () => {
    expect(regen('# note\n\nx = 1  # trailing\n\n\ny = 2\n')).toBe('x = 1\ny = 2\n');
  });

  test('collapses else-if into elif', () => {
    const source = 'if a:\n    x\nelif b:\n    y\nelse:\n    z\n';
    expect(regen(source)).toBe(source);
    expect(regen('if a:\n    x\nelse:\n    if b:\n        y\n')).toBe('if a:\n    x\nelif b:\n    y\n');
  });

  test('keeps an else block holding more than one statement', () => {
    const source = 'if a:\n    x\nelse:\n    if b:\n        y\n    z\n';
    expect(regen(source)).toBe(source);
  });

  test('renders loops, try and with', () => {
    const source = [
      'for k, v in items:',
      '    continue',
      'else:',
      '    pass',
      'while (line := read()):',
      '    break',
      'try:',
      '    run()',
      'except (KeyError, ValueError) as err:',
      '    raise RuntimeError() from err',
      'except:',
      '    raise',
      'else:',
      '    done()',
      'finally:',
      '    close()',
      'async def main():',
      '    async with lock as held, open(p) as f:',
      '        async for item in stream:',
      '            await item',
      '',
    ].join('\n');
    expect(regen(source)).toBe(source.replace('while (line := read()):', 'while line := read():'));
  });

  test('renders definitions with every parameter kind', () => {
    const source = [
      '@register',
      '@route("/items", methods=["GET"])',
      'def handler[T](a, b=2, /, c: int = 3, *args: T, d, e=5, **kw) -> list[T]:',
      '    return [a]',
      'class Box(Base, metaclass=Meta):',
      '    size: int = 0',
      'def keyword_only(*, flag):',
      '    pass',
      '',
    ].join('\n');
    expect(regen(source)).toBe(source);
  });

  test('renders imports and simple statements', () => {
    const source = [
      'import os.path as p, sys',
      'from ..pkg import a as b, c',
      'from . import *',
      'global counter',
      'del items[0], cache',
      'assert ok, "message"',
      'type Alias[T: int] = dict[str, T]',
      'x += 1',
      '(y): int',
      '',
    ].join('\n');
    expect(regen(source)).toBe(source);
  });

  test('writes pass for an empty body', () => {
    const module = parse('def f():\n    return 1\n');
    const [definition] = module.type === 'Module' ? module.body : [];
    if (definition?.type !== 'FunctionDef') throw new Error('expected a function definition');
    definition.body = [];
    expect(generate(module)).toBe('def f():\n    pass\n');
  });

  test('renders blank-line markers', () => {
    const module: PyModule = {
      type: 'Module',
      body: [
        { type: 'Pass', line: 1, column: 1 },
        { type: 'Blank', count: 2, line: 2, column: 1 },
        { type: 'Pass', line: 4, column: 1 },
      ],
    };
    expect(generate(module)).toBe('pass\n\n\npass\n');
  });

  test('renders the other module kinds', () => {
    expect(generate(parse('a  +  b', { mode: 'eval' }))).toBe('a + b\n');
    expect(generate(parse('x = 1', { mode: 'single' }))).toBe('x = 1\n');
    expect(generate(parse('(int, str) -> bool', { mode: 'func_type' }))).toBe('(int, str) -> bool\n');
  });

  test('honours indentWidth', () => {
    expect(regen('if a:\n    if b:\n        c\n', { indentWidth: 2 })).toBe('if a:\n  if b:\n    c\n');
  });

  test('rejects invalid options', () => {
    expect(() => regen('x', { indentWidth: 0 })).toThrow(RangeError);
  });
});

describe('generateStatement and generateExpression', () => {
  test('renders a statement without a trailing newline', () => {
    const module = parse('while x:\n    pass\n');
    if (module.type !== 'Module') throw new Error('expected a module');
    expect(generateStatement(module.body[0])).toBe('while x:\n    pass');
  });

  test('renders an expression without outer parentheses', () => {
    expect(regenExpr('(y := 1)')).toBe('y := 1');
    expect(regenExpr('(a + b)')).toBe('a + b');
  });

  test('renders an empty set as a call', () => {
    const empty: PyExpression = { type: 'Set', elts: [], line: 1, column: 1 };
    expect(generateExpression(empty)).toBe('set()');
  });
});

describe('parentheses', () => {
  test('adds only the parentheses precedence requires', () => {
    expect(regenExpr('(a + b) * c')).toBe('(a + b) * c');
    expect(regenExpr('a + (b * c)')).toBe('a + b * c');
    expect(regenExpr('(a + b) + c')).toBe('a + b + c');
    expect(regenExpr('a + (b + c)')).toBe('a + (b + c)');
    expect(regenExpr('a - (b - c)')).toBe('a - (b - c)');
  });

  test('handles power associativity and unary operands', () => {
    expect(regenExpr('2 ** 3 ** 2')).toBe('2 ** 3 ** 2');
    expect(regenExpr('(2 ** 3) ** 2')).toBe('(2 ** 3) ** 2');
    expect(regenExpr('-2 ** 2')).toBe('-2 ** 2');
    expect(regenExpr('(-2) ** 2')).toBe('(-2) ** 2');
    expect(regenExpr('2 ** -1')).toBe('2 ** -1');
    expect(regenExpr('-(-x)')).toBe('--x');
  });

  test('handles boolean and comparison operands', () => {
    expect(regenExpr('not (a and b)')).toBe('not (a and b)');
    expect(regenExpr('(a or b) and c')).toBe('(a or b) and c');
    expect(regenExpr('a or (b and c)')).toBe('a or b and c');
    expect(regenExpr('(a < b) == c')).toBe('(a < b) == c');
    expect(regenExpr('not x in y')).toBe('not x in y');
  });

  test('wraps lambdas, conditionals and yields where they would leak', () => {
    expect(regenExpr('(lambda: 1)()')).toBe('(lambda: 1)()');
    expect(regenExpr('(lambda: a) if b else c')).toBe('(lambda: a) if b else c');
    expect(regenExpr('(a if b else c) + 1')).toBe('(a if b else c) + 1');
    expect(regen('def g():\n    f((yield))\n    x = yield y\n')).toBe('def g():\n    f((yield))\n    x = yield y\n');
    expect(regen('x = (y := 1)')).toBe('x = (y := 1)\n');
  });

  test('parenthesizes attribute access on numbers', () => {
    expect(regenExpr('(1).real')).toBe('(1).real');
    expect(regenExpr('x.real')).toBe('x.real');
  });

  test('parenthesizes await operands that are not atoms', () => {
    expect(regen('async def f():\n    await (a + b)\n')).toBe('async def f():\n    await (a + b)\n');
  });

  test('keeps a sole generator argument bare', () => {
    expect(regenExpr('sum((x for x in xs))')).toBe('sum(x for x in xs)');
    expect(regenExpr('f((x for x in xs), 1)')).toBe('f((x for x in xs), 1)');
  });
});

describe('tuples', () => {
  test('always parenthesizes tuple values', () => {
    expect(regen('x = 1, 2')).toBe('x = (1, 2)\n');
    expect(regen('a, b = b, a')).toBe('a, b = (b, a)\n');
    expect(regen('t = 1,')).toBe('t = (1,)\n');
    expect(regen('e = ()')).toBe('e = ()\n');
  });

  test('leaves targets and subscripts bare', () => {
    expect(regen('for k, v in pairs:\n    pass\n')).toBe('for k, v in pairs:\n    pass\n');
    expect(regen('x, = y')).toBe('x, = y\n');
    expect(regenExpr('m[1, 2]')).toBe('m[1, 2]');
    expect(regenExpr('m[1:2, ::3]')).toBe('m[1:2, ::3]');
    expect(regenExpr('m[i,]')).toBe('m[i,]');
    expect(regenExpr('[y for x, y in pairs]')).toBe('[y for x, y in pairs]');
  });

  test('doubles parentheses around a tuple with-item', () => {
    expect(regen('with (a, b) as c:\n    pass\n')).toBe('with ((a, b)) as c:\n    pass\n');
    expect(regen('with ctx() as (a, b):\n    pass\n')).toBe('with ctx() as (a, b):\n    pass\n');
  });
});

describe('literals', () => {
  test('picks the quote that avoids escapes', () => {
    expect(regen("x = 'plain'")).toBe('x = "plain"\n');
    expect(regen("x = 'it\\'s'")).toBe('x = "it\'s"\n');
    expect(regen('x = \'say "hi"\'')).toBe('x = \'say "hi"\'\n');
    expect(regen("x = 'a\"b\\'c'")).toBe('x = "a\\"b\'c"\n');
    expect(regen('x = "plain"', { quoteStyle: 'single' })).toBe("x = 'plain'\n");
  });

  test('escapes control and separator characters', () => {
    expect(regen("x = '\\t\\x00é\\u2028'")).toBe('x = "\\t\\x00é\\u2028"\n');
    expect(regen("x = 'a\\\\b'")).toBe('x = "a\\\\b"\n');
    expect(regen('x = """one\ntwo"""')).toBe('x = "one\\ntwo"\n');
  });

  test('renders bytes with hex escapes', () => {
    expect(regen("x = b'\\x00ab\\xff'")).toBe('x = b"\\x00ab\\xff"\n');
  });

  test('renders numbers canonically', () => {
    expect(regen('x = 0x10 + 1_000')).toBe('x = 16 + 1000\n');
    expect(regen('x = 1.0 + 2. + .5')).toBe('x = 1.0 + 2.0 + 0.5\n');
    expect(regen('x = 2j + 1.5j')).toBe('x = 2j + 1.5j\n');
    expect(regen('x = 1e309')).toBe('x = 1e309\n');
  });

  test('renders constants', () => {
    expect(regen('x = None, True, False, ...')).toBe('x = (None, True, False, ...)\n');
  });
});

describe('floatRepr', () => {
  test('uses fixed notation in the middle range', () => {
    expect(floatRepr(1)).toBe('1.0');
    expect(floatRepr(100)).toBe('100.0');
    expect(floatRepr(123.456)).toBe('123.456');
    expect(floatRepr(0.1)).toBe('0.1');
    expect(floatRepr(0.0001)).toBe('0.0001');
    expect(floatRepr(-0)).toBe('-0.0');
  });

  test('switches to exponent notation at the edges', () => {
    expect(floatRepr(1e16)).toBe('1e+16');
    expect(floatRepr(1e22)).toBe('1e+22');
    expect(floatRepr(1.5e-7)).toBe('1.5e-07');
    expect(floatRepr(0.00001)).toBe('1e-05');
  });

  test('spells non-finite values as expressions', () => {
    expect(floatRepr(Infinity)).toBe('1e309');
    expect(floatRepr(-Infinity)).toBe('-1e309');
    expect(floatRepr(NaN)).toBe('(1e309 - 1e309)');
  });

  test('renders complex constants with a real part', () => {
    const value: PyExpression = {
      type: 'Constant',
      value: { kind: 'complex', value: { real: 1, imag: -2 } },
      line: 1,
      column: 1,
    };
    expect(generateExpression(value)).toBe('(1.0 - 2j)');
  });
});

describe('escapeString', () => {
  test('escapes only the given quotes', () => {
    expect(escapeString('a\'b"c', ['"'])).toBe('a\'b\\"c');
    expect(escapeString('a\'b"c', ['"', "'"])).toBe('a\\\'b\\"c');
  });

  test('uses the shortest escape for each code point', () => {
    expect(escapeString('\u0007\u200b\u{e0001}', ['"'])).toBe('\\x07\\u200b\\U000e0001');
    expect(escapeString('a b', ['"'])).toBe('a b');
  });
});

describe('f-strings', () => {
  test('renders conversions and format specs', () => {
    expect(regenExpr('f"{x!r:>10}"')).toBe('f"{x!r:>10}"');
    expect(regenExpr("f'{n:>{width}} done'")).toBe('f"{n:>{width}} done"');
  });

  test('doubles literal braces', () => {
    expect(regenExpr('f"{{literal}} {x}"')).toBe('f"{{literal}} {x}"');
  });

  test('expands self-documenting fields', () => {
    expect(regenExpr('f"{a=}"')).toBe('f"a={a!r}"');
  });

  test('keeps nested strings off the enclosing quote', () => {
    expect(regenExpr("f\"{d['k']}\"")).toBe("f\"{d['k']}\"");
    expect(regenExpr('f\'{d["k"]}\'')).toBe("f\"{d['k']}\"");
    expect(generateExpression(parseExpression('f\'{d["k"]}\''), { quoteStyle: 'single' })).toBe('f\'{d["k"]}\'');
  });

  test('switches quotes when the literal text needs it', () => {
    expect(regenExpr('f\'say "{x}"\'')).toBe('f\'say "{x}"\'');
  });

  test('spaces a field that opens with a brace', () => {
    expect(regenExpr('f"{ {1} }"')).toBe('f"{ {1}}"');
  });

  test('moves to triple quotes when nesting runs out of single quotes', () => {
    const source = "x = f'''{f\"{f'{y}'}\"}'''\n";
    const code = regen(source);
    expect(code).toBe("x = f\"{f'''{f'{y}'}'''}\"\n");
    expect(structurallyEqual(parse(code), parse(source))).toBe(true);
  });

  test('nests four levels deep starting from a triple quote', () => {
    const source = 'f"""{f\'\'\'{f"{f\'{z}\'}"}\'\'\'}"""';
    const code = regenExpr(source);
    expect(code).toBe('f"""{f"{f\'\'\'{f\'{z}\'}\'\'\'}"}"""');
    expect(structurallyEqual(parseExpression(code), parseExpression(source))).toBe(true);
  });
});

describe('line explosion', () => {
  test('explodes an overlong display one element per line', () => {
    expect(regen('x = [aaaa, bbbb, cccc]', { maxLineLength: 10 })).toBe(
      'x = [\n    aaaa,\n    bbbb,\n    cccc,\n]\n'
    );
  });

  test('omits the trailing comma when disabled', () => {
    expect(regen('x = [aaaa, bbbb, cccc]', { maxLineLength: 10, trailingCommas: false })).toBe(
      'x = [\n    aaaa,\n    bbbb,\n    cccc\n]\n'
    );
  });

  test('keeps the comma of a one-element tuple', () => {
    expect(regen('x = (aaaaaaaaaa,)', { maxLineLength: 10, trailingCommas: false })).toBe(
      'x = (\n    aaaaaaaaaa,\n)\n'
    );
  });

  test('explodes the widest call inside a nested block', () => {
    const source = 'def f():\n    return compute(first_argument, [1, 2, 3], second=value)\n';
    expect(regen(source, { maxLineLength: 40 })).toBe(
      [
        'def f():',
        '    return compute(',
        '        first_argument,',
        '        [1, 2, 3],',
        '        second=value,',
        '    )',
        '',
      ].join('\n')
    );
  });

  test('leaves a long line without a candidate alone', () => {
    const source = 'result = first_operand_name + second_operand_name\n';
    expect(regen(source, { maxLineLength: 20 })).toBe(source);
  });

  test('does not explode short lines', () => {
    expect(regen('x = [1, 2]', { maxLineLength: 88 })).toBe('x = [1, 2]\n');
  });
});
