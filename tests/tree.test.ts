import { expressionChildren, nodeLocation, parse, parseExpression, stripPositions, walkStatements } from '../src/index.js';

const moduleBody = (source: string) => {
  const module = parse(source);
  if (module.type !== 'Module') throw new Error('expected a module');
  return module.body;
};

describe('stripPositions', () => {
  test('drops positions and keeps literal payloads', () => {
    const [statement] = moduleBody('x = b"\\x01"\n');
    expect(stripPositions(statement)).toEqual({
      type: 'Assign',
      targets: [{ type: 'Name', id: 'x', ctx: 'Store' }],
      value: { type: 'Constant', value: { kind: 'bytes', value: Uint8Array.from([1]) } },
    });
  });

  test('maps undefined to null', () => {
    expect(stripPositions(undefined)).toBeNull();
    expect(stripPositions([1n, 'a', undefined])).toEqual([1n, 'a', null]);
  });
});

describe('nodeLocation', () => {
  test('spans a compound statement with offsets from the source', () => {
    const source = 'a = 1\nif b:\n    c = 2\n';
    const [, statement] = moduleBody(source);
    expect(nodeLocation(statement, source)).toEqual({
      start: { line: 2, column: 1, offset: 6 },
      end: { line: 3, column: 10, offset: 21 },
    });
  });

  test('reports -1 offsets without a source', () => {
    const [statement] = moduleBody('pass\n');
    expect(nodeLocation(statement)).toEqual({
      start: { line: 1, column: 1, offset: -1 },
      end: { line: 1, column: 5, offset: -1 },
    });
  });
});

describe('walkStatements', () => {
  test('visits nested statements in source order', () => {
    const body = moduleBody('def f():\n    if a:\n        return 1\n    return 2\nx = 3\n');
    expect([...walkStatements(body)].map((statement) => statement.type)).toEqual([
      'FunctionDef',
      'If',
      'Return',
      'Return',
      'Assign',
    ]);
  });

  test('descends into handlers and match cases', () => {
    const body = moduleBody(
      'try:\n    a\nexcept E:\n    b\nfinally:\n    c\nmatch v:\n    case 1:\n        d\n'
    );
    expect([...walkStatements(body)].map((statement) => statement.type)).toEqual([
      'Try',
      'Expr',
      'Expr',
      'Expr',
      'Match',
      'Expr',
    ]);
  });
});

describe('expressionChildren', () => {
  test('lists direct children left to right', () => {
    const expr = parseExpression('f(a, *b, k=c)');
    expect(expressionChildren(expr).map((child) => (child.type === 'Name' ? child.id : child.type))).toEqual([
      'f',
      'a',
      'Starred',
      'c',
    ]);
  });

  test('skips empty slice parts', () => {
    const expr = parseExpression('x[::2]');
    if (expr.type !== 'Subscript') throw new Error('expected a subscript');
    expect(expressionChildren(expr.slice)).toHaveLength(1);
  });
});
