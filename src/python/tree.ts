import type { PyExpression, PyNode, PyStatement } from './ast.js';
import type { Location } from '../utils/types.js';

const positionKeys = new Set(['line', 'column', 'endLine', 'endColumn']);

export type PlainValue =
  | null
  | boolean
  | number
  | string
  | bigint
  | Uint8Array
  | PlainValue[]
  | { [key: string]: PlainValue };

/** Deep copy of a tree with every position field dropped. */
export function stripPositions(value: unknown): PlainValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string' || typeof value === 'bigint') {
    return value;
  }
  if (value instanceof Uint8Array) return Uint8Array.from(value);
  if (Array.isArray(value)) return value.map((item: unknown) => stripPositions(item));
  if (typeof value === 'object') {
    const copy: { [key: string]: PlainValue } = {};
    for (const [key, item] of Object.entries(value)) {
      if (positionKeys.has(key) || item === undefined) continue;
      copy[key] = stripPositions(item);
    }
    return copy;
  }
  return null;
}

/** Deep equality that ignores source positions. */
export function structurallyEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (typeof a === 'number' && typeof b === 'number') return Object.is(a, b);
  if (a instanceof Uint8Array || b instanceof Uint8Array) {
    if (!(a instanceof Uint8Array && b instanceof Uint8Array) || a.length !== b.length) return false;
    return a.every((byte, index) => byte === b[index]);
  }
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item: unknown, index) => structurallyEqual(item, b[index]));
  }
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) return false;

  const left = Object.entries(a).filter(([key, item]) => !positionKeys.has(key) && item !== undefined);
  const right = new Map(Object.entries(b).filter(([key, item]) => !positionKeys.has(key) && item !== undefined));
  if (left.length !== right.size) return false;
  return left.every(([key, item]) => right.has(key) && structurallyEqual(item, right.get(key)));
}

/**
 * The span of a node. Offsets are computed from `source` when given and are
 * -1 otherwise; a node without an end position ends where it starts.
 */
export function nodeLocation(node: PyNode, source?: string): Location {
  const lineStarts = source === undefined ? null : computeLineStarts(source);
  const offset = (line: number, column: number) => {
    if (!lineStarts) return -1;
    const start = lineStarts[line - 1];
    return start === undefined ? -1 : start + column - 1;
  };
  const endLine = node.endLine ?? node.line;
  const endColumn = node.endColumn ?? node.column;
  return {
    start: { line: node.line, column: node.column, offset: offset(node.line, node.column) },
    end: { line: endLine, column: endColumn, offset: offset(endLine, endColumn) },
  };
}

function computeLineStarts(source: string): number[] {
  const starts = [0];
  const pattern = /\r\n|\r|\n/g;
  for (let match = pattern.exec(source); match; match = pattern.exec(source)) {
    starts.push(match.index + match[0].length);
  }
  return starts;
}

/** Pre-order iteration over `body` and every statement nested in it. */
export function* walkStatements(body: readonly PyStatement[]): Generator<PyStatement> {
  for (const statement of body) {
    yield statement;
    for (const nested of childBodies(statement)) {
      yield* walkStatements(nested);
    }
  }
}

function childBodies(statement: PyStatement): PyStatement[][] {
  switch (statement.type) {
    case 'FunctionDef':
    case 'AsyncFunctionDef':
    case 'ClassDef':
    case 'With':
    case 'AsyncWith':
      return [statement.body];
    case 'For':
    case 'AsyncFor':
    case 'While':
    case 'If':
      return [statement.body, statement.orelse];
    case 'Try':
    case 'TryStar':
      return [statement.body, ...statement.handlers.map((handler) => handler.body), statement.orelse, statement.finalbody];
    case 'Match':
      return statement.cases.map((matchCase) => matchCase.body);
    default:
      return [];
  }
}

/** Direct sub-expressions of `expr`, left to right. */
export function expressionChildren(expr: PyExpression): PyExpression[] {
  switch (expr.type) {
    case 'BoolOp':
      return expr.values;
    case 'NamedExpr':
      return [expr.target, expr.value];
    case 'BinOp':
      return [expr.left, expr.right];
    case 'UnaryOp':
      return [expr.operand];
    case 'Lambda':
      return [
        ...expr.args.defaults,
        ...expr.args.kwDefaults.filter((value): value is PyExpression => value !== null),
        expr.body,
      ];
    case 'IfExp':
      return [expr.body, expr.test, expr.orelse];
    case 'Dict':
      return expr.keys.flatMap((key, index) => (key ? [key, expr.values[index]] : [expr.values[index]]));
    case 'Set':
    case 'List':
    case 'Tuple':
      return expr.elts;
    case 'ListComp':
    case 'SetComp':
    case 'GeneratorExp':
      return [expr.elt, ...expr.generators.flatMap((gen) => [gen.target, gen.iter, ...gen.ifs])];
    case 'DictComp':
      return [expr.key, expr.value, ...expr.generators.flatMap((gen) => [gen.target, gen.iter, ...gen.ifs])];
    case 'Await':
    case 'YieldFrom':
    case 'Starred':
    case 'Attribute':
      return [expr.value];
    case 'Yield':
      return expr.value ? [expr.value] : [];
    case 'Compare':
      return [expr.left, ...expr.comparators];
    case 'Call':
      return [expr.func, ...expr.args, ...expr.keywords.map((keyword) => keyword.value)];
    case 'FormattedValue':
      return expr.formatSpec ? [expr.value, expr.formatSpec] : [expr.value];
    case 'JoinedStr':
      return expr.values;
    case 'Subscript':
      return [expr.value, expr.slice];
    case 'Slice':
      return [expr.lower, expr.upper, expr.step].filter((part): part is PyExpression => part !== null);
    case 'Constant':
    case 'Name':
      return [];
  }
}
