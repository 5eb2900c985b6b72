import type { BinaryOperator, BoolOperator, CompareOperator, ExprContext, UnaryOperator } from './operators.js';

export type { BinaryOperator, BoolOperator, CompareOperator, ExprContext, UnaryOperator } from './operators.js';

/**
 * Source span carried by every located node. Lines and columns are 1-based;
 * the end column points one past the last character.
 */
export interface PyNode {
  line: number;
  column: number;
  endLine?: number;
  endColumn?: number;
}

// ---------------------------------------------------------------------------
// Modules

export interface PyModuleBody {
  type: 'Module';
  body: PyStatement[];
}

export interface PyInteractive {
  type: 'Interactive';
  body: PyStatement[];
}

export interface PyExpressionModule {
  type: 'Expression';
  body: PyExpression;
}

/** Signature written in a `# type:` comment: `(int, str) -> bool`. */
export interface PyFunctionType {
  type: 'FunctionType';
  argtypes: PyExpression[];
  returns: PyExpression;
}

export type PyModule = PyModuleBody | PyInteractive | PyExpressionModule | PyFunctionType;

// ---------------------------------------------------------------------------
// Helper types

export interface PyArg extends PyNode {
  type: 'arg';
  arg: string;
  annotation: PyExpression | null;
}

export interface PyArguments {
  type: 'arguments';
  posonlyargs: PyArg[];
  args: PyArg[];
  vararg: PyArg | null;
  kwonlyargs: PyArg[];
  /** One entry per keyword-only parameter; `null` when it has no default. */
  kwDefaults: Array<PyExpression | null>;
  kwarg: PyArg | null;
  /** Defaults of the last `defaults.length` positional parameters. */
  defaults: PyExpression[];
}

export interface PyKeyword extends PyNode {
  type: 'keyword';
  /** `null` for `**mapping` unpacking. */
  arg: string | null;
  value: PyExpression;
}

export interface PyAlias extends PyNode {
  type: 'alias';
  name: string;
  asname: string | null;
}

export interface PyWithItem {
  type: 'withitem';
  contextExpr: PyExpression;
  optionalVars: PyExpression | null;
}

export interface PyMatchCase {
  type: 'match_case';
  pattern: PyPattern;
  guard: PyExpression | null;
  body: PyStatement[];
}

export interface PyExceptHandler extends PyNode {
  type: 'ExceptHandler';
  exceptionType: PyExpression | null;
  name: string | null;
  body: PyStatement[];
}

export interface PyComprehension {
  type: 'comprehension';
  target: PyExpression;
  iter: PyExpression;
  ifs: PyExpression[];
  isAsync: boolean;
}

export interface PyTypeVar extends PyNode {
  type: 'TypeVar';
  name: string;
  bound: PyExpression | null;
  defaultValue: PyExpression | null;
}

export interface PyParamSpec extends PyNode {
  type: 'ParamSpec';
  name: string;
  defaultValue: PyExpression | null;
}

export interface PyTypeVarTuple extends PyNode {
  type: 'TypeVarTuple';
  name: string;
  defaultValue: PyExpression | null;
}

export type PyTypeParam = PyTypeVar | PyParamSpec | PyTypeVarTuple;

// ---------------------------------------------------------------------------
// Statements

export interface PyFunctionDef extends PyNode {
  type: 'FunctionDef';
  name: string;
  args: PyArguments;
  body: PyStatement[];
  decoratorList: PyExpression[];
  returns: PyExpression | null;
  typeParams: PyTypeParam[];
}

export interface PyAsyncFunctionDef extends PyNode {
  type: 'AsyncFunctionDef';
  name: string;
  args: PyArguments;
  body: PyStatement[];
  decoratorList: PyExpression[];
  returns: PyExpression | null;
  typeParams: PyTypeParam[];
}

export interface PyClassDef extends PyNode {
  type: 'ClassDef';
  name: string;
  bases: PyExpression[];
  keywords: PyKeyword[];
  body: PyStatement[];
  decoratorList: PyExpression[];
  typeParams: PyTypeParam[];
}

export interface PyReturn extends PyNode {
  type: 'Return';
  value: PyExpression | null;
}

export interface PyDelete extends PyNode {
  type: 'Delete';
  targets: PyExpression[];
}

export interface PyAssign extends PyNode {
  type: 'Assign';
  targets: PyExpression[];
  value: PyExpression;
}

export interface PyAugAssign extends PyNode {
  type: 'AugAssign';
  target: PyExpression;
  op: BinaryOperator;
  value: PyExpression;
}

export interface PyAnnAssign extends PyNode {
  type: 'AnnAssign';
  target: PyExpression;
  annotation: PyExpression;
  value: PyExpression | null;
  /** True when the target is a bare, unparenthesized name. */
  simple: boolean;
}

export interface PyFor extends PyNode {
  type: 'For';
  target: PyExpression;
  iter: PyExpression;
  body: PyStatement[];
  orelse: PyStatement[];
}

export interface PyAsyncFor extends PyNode {
  type: 'AsyncFor';
  target: PyExpression;
  iter: PyExpression;
  body: PyStatement[];
  orelse: PyStatement[];
}

export interface PyWhile extends PyNode {
  type: 'While';
  test: PyExpression;
  body: PyStatement[];
  orelse: PyStatement[];
}

/** `elif` is an `If` that is the only statement of its parent's `orelse`. */
export interface PyIf extends PyNode {
  type: 'If';
  test: PyExpression;
  body: PyStatement[];
  orelse: PyStatement[];
}

export interface PyWith extends PyNode {
  type: 'With';
  items: PyWithItem[];
  body: PyStatement[];
}

export interface PyAsyncWith extends PyNode {
  type: 'AsyncWith';
  items: PyWithItem[];
  body: PyStatement[];
}

export interface PyMatch extends PyNode {
  type: 'Match';
  subject: PyExpression;
  cases: PyMatchCase[];
}

export interface PyRaise extends PyNode {
  type: 'Raise';
  exc: PyExpression | null;
  cause: PyExpression | null;
}

export interface PyTry extends PyNode {
  type: 'Try';
  body: PyStatement[];
  handlers: PyExceptHandler[];
  orelse: PyStatement[];
  finalbody: PyStatement[];
}

export interface PyTryStar extends PyNode {
  type: 'TryStar';
  body: PyStatement[];
  handlers: PyExceptHandler[];
  orelse: PyStatement[];
  finalbody: PyStatement[];
}

export interface PyAssert extends PyNode {
  type: 'Assert';
  test: PyExpression;
  msg: PyExpression | null;
}

export interface PyImport extends PyNode {
  type: 'Import';
  names: PyAlias[];
}

export interface PyImportFrom extends PyNode {
  type: 'ImportFrom';
  module: string | null;
  names: PyAlias[];
  /** Number of leading dots of a relative import. */
  level: number;
}

export interface PyGlobal extends PyNode {
  type: 'Global';
  names: string[];
}

export interface PyNonlocal extends PyNode {
  type: 'Nonlocal';
  names: string[];
}

export interface PyExpr extends PyNode {
  type: 'Expr';
  value: PyExpression;
}

export interface PyPass extends PyNode {
  type: 'Pass';
}

export interface PyBreak extends PyNode {
  type: 'Break';
}

export interface PyContinue extends PyNode {
  type: 'Continue';
}

export interface PyTypeAlias extends PyNode {
  type: 'TypeAlias';
  name: PyName;
  typeParams: PyTypeParam[];
  value: PyExpression;
}

/**
 * Formatting marker inserted by formatters; renders as `count` empty lines.
 * The parser never produces it.
 */
export interface PyBlank extends PyNode {
  type: 'Blank';
  count: number;
}

export type PyStatement =
  | PyFunctionDef
  | PyAsyncFunctionDef
  | PyClassDef
  | PyReturn
  | PyDelete
  | PyAssign
  | PyAugAssign
  | PyAnnAssign
  | PyFor
  | PyAsyncFor
  | PyWhile
  | PyIf
  | PyWith
  | PyAsyncWith
  | PyMatch
  | PyRaise
  | PyTry
  | PyTryStar
  | PyAssert
  | PyImport
  | PyImportFrom
  | PyGlobal
  | PyNonlocal
  | PyExpr
  | PyPass
  | PyBreak
  | PyContinue
  | PyTypeAlias
  | PyBlank;

// ---------------------------------------------------------------------------
// Expressions

export interface PyBoolOp extends PyNode {
  type: 'BoolOp';
  op: BoolOperator;
  values: PyExpression[];
}

export interface PyNamedExpr extends PyNode {
  type: 'NamedExpr';
  target: PyName;
  value: PyExpression;
}

export interface PyBinOp extends PyNode {
  type: 'BinOp';
  left: PyExpression;
  op: BinaryOperator;
  right: PyExpression;
}

export interface PyUnaryOp extends PyNode {
  type: 'UnaryOp';
  op: UnaryOperator;
  operand: PyExpression;
}

export interface PyLambda extends PyNode {
  type: 'Lambda';
  args: PyArguments;
  body: PyExpression;
}

export interface PyIfExp extends PyNode {
  type: 'IfExp';
  test: PyExpression;
  body: PyExpression;
  orelse: PyExpression;
}

export interface PyDict extends PyNode {
  type: 'Dict';
  /** `null` marks a `**mapping` entry whose mapping is the matching value. */
  keys: Array<PyExpression | null>;
  values: PyExpression[];
}

export interface PySet extends PyNode {
  type: 'Set';
  elts: PyExpression[];
}

export interface PyListComp extends PyNode {
  type: 'ListComp';
  elt: PyExpression;
  generators: PyComprehension[];
}

export interface PySetComp extends PyNode {
  type: 'SetComp';
  elt: PyExpression;
  generators: PyComprehension[];
}

export interface PyDictComp extends PyNode {
  type: 'DictComp';
  key: PyExpression;
  value: PyExpression;
  generators: PyComprehension[];
}

export interface PyGeneratorExp extends PyNode {
  type: 'GeneratorExp';
  elt: PyExpression;
  generators: PyComprehension[];
}

export interface PyAwait extends PyNode {
  type: 'Await';
  value: PyExpression;
}

export interface PyYield extends PyNode {
  type: 'Yield';
  value: PyExpression | null;
}

export interface PyYieldFrom extends PyNode {
  type: 'YieldFrom';
  value: PyExpression;
}

/** `a < b <= c` keeps one `left` and parallel `ops`/`comparators`. */
export interface PyCompare extends PyNode {
  type: 'Compare';
  left: PyExpression;
  ops: CompareOperator[];
  comparators: PyExpression[];
}

export interface PyCall extends PyNode {
  type: 'Call';
  func: PyExpression;
  args: PyExpression[];
  keywords: PyKeyword[];
}

/** Conversion flags of an f-string field, as their character codes. */
export type Conversion = -1 | 97 | 114 | 115;

export interface PyFormattedValue extends PyNode {
  type: 'FormattedValue';
  value: PyExpression;
  /** -1 none, 115 `!s`, 114 `!r`, 97 `!a`. */
  conversion: Conversion;
  formatSpec: PyJoinedStr | null;
}

export interface PyJoinedStr extends PyNode {
  type: 'JoinedStr';
  values: Array<PyConstant | PyFormattedValue>;
}

export interface PyComplex {
  real: number;
  imag: number;
}

export type ConstantValue =
  | { kind: 'None' }
  | { kind: 'bool'; value: boolean }
  | { kind: 'int'; value: bigint }
  | { kind: 'float'; value: number }
  | { kind: 'complex'; value: PyComplex }
  | { kind: 'str'; value: string }
  | { kind: 'bytes'; value: Uint8Array }
  | { kind: 'Ellipsis' };

export interface PyConstant extends PyNode {
  type: 'Constant';
  value: ConstantValue;
}

export interface PyAttribute extends PyNode {
  type: 'Attribute';
  value: PyExpression;
  attr: string;
  ctx: ExprContext;
}

export interface PySubscript extends PyNode {
  type: 'Subscript';
  value: PyExpression;
  slice: PyExpression;
  ctx: ExprContext;
}

export interface PyStarred extends PyNode {
  type: 'Starred';
  value: PyExpression;
  ctx: ExprContext;
}

export interface PyName extends PyNode {
  type: 'Name';
  id: string;
  ctx: ExprContext;
}

export interface PyList extends PyNode {
  type: 'List';
  elts: PyExpression[];
  ctx: ExprContext;
}

export interface PyTuple extends PyNode {
  type: 'Tuple';
  elts: PyExpression[];
  ctx: ExprContext;
}

/** Only valid directly inside a subscript, possibly within a tuple. */
export interface PySlice extends PyNode {
  type: 'Slice';
  lower: PyExpression | null;
  upper: PyExpression | null;
  step: PyExpression | null;
}

export type PyExpression =
  | PyBoolOp
  | PyNamedExpr
  | PyBinOp
  | PyUnaryOp
  | PyLambda
  | PyIfExp
  | PyDict
  | PySet
  | PyListComp
  | PySetComp
  | PyDictComp
  | PyGeneratorExp
  | PyAwait
  | PyYield
  | PyYieldFrom
  | PyCompare
  | PyCall
  | PyFormattedValue
  | PyJoinedStr
  | PyConstant
  | PyAttribute
  | PySubscript
  | PyStarred
  | PyName
  | PyList
  | PyTuple
  | PySlice;

// ---------------------------------------------------------------------------
// Patterns

export interface PyMatchValue extends PyNode {
  type: 'MatchValue';
  value: PyExpression;
}

export interface PyMatchSingleton extends PyNode {
  type: 'MatchSingleton';
  value: null | boolean;
}

export interface PyMatchSequence extends PyNode {
  type: 'MatchSequence';
  patterns: PyPattern[];
}

export interface PyMatchMapping extends PyNode {
  type: 'MatchMapping';
  keys: PyExpression[];
  patterns: PyPattern[];
  rest: string | null;
}

export interface PyMatchClass extends PyNode {
  type: 'MatchClass';
  cls: PyExpression;
  patterns: PyPattern[];
  kwdAttrs: string[];
  kwdPatterns: PyPattern[];
}

/** `*name` inside a sequence pattern; `name` is null for `*_`. */
export interface PyMatchStar extends PyNode {
  type: 'MatchStar';
  name: string | null;
}

/** Capture (`x`), wildcard (`_`, both null) or `pattern as name`. */
export interface PyMatchAs extends PyNode {
  type: 'MatchAs';
  pattern: PyPattern | null;
  name: string | null;
}

export interface PyMatchOr extends PyNode {
  type: 'MatchOr';
  patterns: PyPattern[];
}

export type PyPattern =
  | PyMatchValue
  | PyMatchSingleton
  | PyMatchSequence
  | PyMatchMapping
  | PyMatchClass
  | PyMatchStar
  | PyMatchAs
  | PyMatchOr;

export type PyStatementType = PyStatement['type'];
export type PyExpressionType = PyExpression['type'];
