import { ParseError } from './errors.js';
import { tokenize } from './lexer.js';
import {
  augmentedAssignOperators,
  type BinaryOperator,
  type CompareOperator,
  type ExprContext,
  type UnaryOperator,
} from './operators.js';
import { describeToken, isKeyword, isOp, type FStringFieldPart, type FStringPart, type Token } from './tokens.js';
import type { ParserTracer, TraceEventType } from './tracer.js';
import type {
  PyAlias,
  PyArg,
  PyArguments,
  PyComprehension,
  PyConstant,
  PyExceptHandler,
  PyExpression,
  PyFormattedValue,
  PyJoinedStr,
  PyKeyword,
  PyMatchCase,
  PyModule,
  PyName,
  PyNode,
  PyPattern,
  PyStatement,
  PyTypeParam,
  PyWithItem,
} from './ast.js';
import type { Location } from '../utils/types.js';

export type ParseMode = 'exec' | 'single' | 'eval' | 'func_type';

export interface ParseOptions {
  mode?: ParseMode;
  sourceFile?: string;
  tracer?: ParserTracer;
}

export interface ParseTokensOptions extends ParseOptions {
  /** Text the tokens were read from; enables context lines in errors. */
  source?: string;
}

interface Start {
  line: number;
  column: number;
}

interface Span {
  line: number;
  column: number;
  endLine: number;
  endColumn: number;
}

interface End {
  line: number;
  col: number;
}

const termOperators = new Map<string, BinaryOperator>([
  ['*', 'Mult'],
  ['/', 'Div'],
  ['//', 'FloorDiv'],
  ['%', 'Mod'],
  ['@', 'MatMult'],
]);
const arithOperators = new Map<string, BinaryOperator>([
  ['+', 'Add'],
  ['-', 'Sub'],
]);
const bitOrOperators = new Map<string, BinaryOperator>([['|', 'BitOr']]);
const bitXorOperators = new Map<string, BinaryOperator>([['^', 'BitXor']]);
const bitAndOperators = new Map<string, BinaryOperator>([['&', 'BitAnd']]);
const shiftOperators = new Map<string, BinaryOperator>([
  ['<<', 'LShift'],
  ['>>', 'RShift'],
]);
const unaryOperators = new Map<string, UnaryOperator>([
  ['+', 'UAdd'],
  ['-', 'USub'],
  ['~', 'Invert'],
]);
const comparisonOperators = new Map<string, CompareOperator>([
  ['==', 'Eq'],
  ['!=', 'NotEq'],
  ['<', 'Lt'],
  ['<=', 'LtE'],
  ['>', 'Gt'],
  ['>=', 'GtE'],
]);
const augmentedOperators = new Map<string, BinaryOperator>(Object.entries(augmentedAssignOperators));

const simpleStatementKeywords = new Set([
  'pass', 'break', 'continue', 'return', 'raise', 'global', 'nonlocal', 'del', 'assert', 'import', 'from',
]);

const expressionStartKeywords = new Set(['None', 'True', 'False', 'not', 'lambda', 'await', 'yield']);

/** Parse Python source into a module. Throws `TokenizeError` or `ParseError`. */
export function parse(source: string, options: ParseOptions = {}): PyModule {
  const tokens = tokenize(source, { sourceFile: options.sourceFile });
  return new Parser(tokens, { ...options, source }).parseModule();
}

/** Parse an already tokenized source. */
export function parseTokens(tokens: Token[], options: ParseTokensOptions = {}): PyModule {
  return new Parser(tokens, options).parseModule();
}

/** Parse a single expression (`eval` mode) and return it. */
export function parseExpression(source: string, options: Omit<ParseOptions, 'mode'> = {}): PyExpression {
  const module = parse(source, { ...options, mode: 'eval' });
  if (module.type !== 'Expression') {
    throw new TypeError(`unexpected module kind '${module.type}'`);
  }
  return module.body;
}

export class Parser {
  private pos = 0;
  private lastEnd: End;
  private readonly lines?: string[];

  constructor(private readonly tokens: Token[], private readonly options: ParseTokensOptions = {}) {
    const last = tokens[tokens.length - 1];
    if (!last || last.type !== 'endmarker') {
      throw new TypeError('token stream must end with an endmarker');
    }
    this.lastEnd = { line: tokens[0].line, col: tokens[0].col };
    this.lines = options.source?.split(/\r\n|\r|\n/);
  }

  parseModule(): PyModule {
    switch (this.options.mode ?? 'exec') {
      case 'eval': {
        this.skip('indent');
        const body = this.starExpressions();
        this.finishInput();
        return { type: 'Expression', body };
      }
      case 'func_type':
        return this.functionType();
      case 'single':
        return { type: 'Interactive', body: this.statementsUntilEnd() };
      default:
        return { type: 'Module', body: this.statementsUntilEnd() };
    }
  }

  // -------------------------------------------------------------------------
  // Token access

  private peek(ahead = 0): Token {
    return this.tokens[Math.min(this.pos + ahead, this.tokens.length - 1)];
  }

  private advance(): Token {
    const token = this.peek();
    if (this.pos < this.tokens.length - 1) this.pos += 1;
    if (token.type !== 'newline' && token.type !== 'indent' && token.type !== 'dedent' && token.type !== 'endmarker') {
      this.lastEnd = { line: token.endLine, col: token.endCol };
    }
    return token;
  }

  private skip(type: 'indent' | 'newline'): void {
    while (this.peek().type === type) this.advance();
  }

  private checkOp(text: string): boolean {
    return isOp(this.peek(), text);
  }

  private checkKeyword(text: string): boolean {
    return isKeyword(this.peek(), text);
  }

  private checkName(text: string, ahead = 0): boolean {
    const token = this.peek(ahead);
    return token.type === 'name' && token.text === text;
  }

  private matchOp(text: string): boolean {
    if (!this.checkOp(text)) return false;
    this.advance();
    return true;
  }

  private matchKeyword(text: string): boolean {
    if (!this.checkKeyword(text)) return false;
    this.advance();
    return true;
  }

  private expectOp(text: string): Token {
    if (this.checkOp(text)) return this.advance();
    throw this.fail(`expected '${text}'`, this.peek(), [`'${text}'`]);
  }

  private expectKeyword(text: string): Token {
    if (this.checkKeyword(text)) return this.advance();
    throw this.fail(`expected '${text}'`, this.peek(), [`'${text}'`]);
  }

  private expectName(what: string): Token {
    const token = this.peek();
    if (token.type === 'name') return this.advance();
    throw this.fail(`expected ${what}`, token, ['identifier']);
  }

  private closeBracket(opener: Token, close: string): Token {
    const token = this.peek();
    if (isOp(token, close)) return this.advance();
    const expected = [`'${close}'`];
    if (token.type === 'newline' || token.type === 'endmarker' || token.type === 'indent' || token.type === 'dedent') {
      throw this.fail(`'${opener.text}' was never closed`, opener, expected, { found: describeToken(token) });
    }
    if (token.type === 'op' && (token.text === ')' || token.text === ']' || token.text === '}')) {
      throw this.fail(
        `closing parenthesis '${token.text}' does not match opening parenthesis '${opener.text}'`,
        token,
        expected
      );
    }
    if (this.startsExpression(token)) {
      throw this.fail('invalid syntax', token, [...expected, "','"], { suggestion: 'Perhaps you forgot a comma?' });
    }
    throw this.fail(`expected '${close}'`, token, expected);
  }

  private startsExpression(token: Token): boolean {
    switch (token.type) {
      case 'name':
      case 'number':
      case 'string':
      case 'fstring':
        return true;
      case 'keyword':
        return expressionStartKeywords.has(token.text);
      case 'op':
        return ['(', '[', '{', '-', '+', '~', '...', '*'].includes(token.text);
      default:
        return false;
    }
  }

  // -------------------------------------------------------------------------
  // Positions, tracing and errors

  private mark(): Start {
    const token = this.peek();
    return { line: token.line, column: token.col };
  }

  private span(start: Start): Span {
    return { line: start.line, column: start.column, endLine: this.lastEnd.line, endColumn: this.lastEnd.col };
  }

  private tokenLocation(token: Token): Location {
    return {
      start: { line: token.line, column: token.col, offset: token.offset },
      end: { line: token.endLine, column: token.endCol, offset: token.offset + token.text.length },
    };
  }

  private trace(type: TraceEventType, rule: string, token: Token, result?: unknown): void {
    this.options.tracer?.trace({ type, rule, result, location: this.tokenLocation(token) });
  }

  private fail(
    message: string,
    token: Token,
    expected: string[],
    extra: { found?: string; suggestion?: string } = {}
  ): ParseError {
    this.trace('fail', 'syntax', token, message);
    return new ParseError(
      message,
      {
        line: token.line,
        col: token.col,
        offset: token.offset,
        endLine: token.endLine,
        endCol: token.endCol,
        endOffset: token.offset + token.text.length,
        sourceFile: this.options.sourceFile,
      },
      {
        expected,
        found: extra.found ?? describeToken(token),
        suggestion: extra.suggestion,
        contextLine: this.lines?.[token.line - 1],
        input: this.options.source,
      }
    );
  }

  /** Fail at a node that is already built, e.g. an invalid assignment target. */
  private failAt(message: string, node: PyNode, suggestion?: string): ParseError {
    const token =
      this.tokens.find((candidate) => candidate.line === node.line && candidate.col === node.column) ?? this.peek();
    return this.fail(message, token, [], { found: describeToken(token), suggestion });
  }

  /** Run `rule`; on a syntax error rewind and return null. */
  private speculate<T>(rule: string, body: () => T): T | null {
    const savedPos = this.pos;
    const savedEnd = this.lastEnd;
    const tracer = this.options.tracer;
    const startToken = this.peek();
    try {
      return body();
    } catch (err: unknown) {
      if (!(err instanceof ParseError)) throw err;
      this.pos = savedPos;
      this.lastEnd = savedEnd;
      tracer?.trace({ type: 'backtrack', rule, location: this.tokenLocation(startToken) });
      return null;
    }
  }

  // -------------------------------------------------------------------------
  // Modules and blocks

  private finishInput(): void {
    while (this.peek().type === 'newline' || this.peek().type === 'dedent') this.advance();
    const token = this.peek();
    if (token.type !== 'endmarker') {
      throw this.fail('invalid syntax', token, ['end of input']);
    }
  }

  private functionType(): PyModule {
    this.skip('indent');
    const open = this.expectOp('(');
    const argtypes: PyExpression[] = [];
    while (!this.checkOp(')')) {
      argtypes.push(this.checkOp('*') ? this.starred(() => this.expression()) : this.expression());
      if (!this.matchOp(',')) break;
    }
    this.closeBracket(open, ')');
    this.expectOp('->');
    const returns = this.expression();
    this.finishInput();
    return { type: 'FunctionType', argtypes, returns };
  }

  private statementsUntilEnd(): PyStatement[] {
    const body: PyStatement[] = [];
    while (this.peek().type !== 'endmarker') {
      body.push(...this.statement());
    }
    return body;
  }

  private block(header: Token, context: string): PyStatement[] {
    if (this.peek().type !== 'newline') {
      return this.simpleStatements();
    }
    this.advance();
    const token = this.peek();
    if (token.type !== 'indent') {
      throw this.fail(`expected an indented block after ${context} on line ${header.line}`, token, ['indent'], {
        suggestion: 'Indent the body of the block',
      });
    }
    this.advance();
    const body: PyStatement[] = [];
    while (this.peek().type !== 'dedent' && this.peek().type !== 'endmarker') {
      body.push(...this.statement());
    }
    if (this.peek().type === 'dedent') this.advance();
    return body;
  }

  private expectColon(header: Token): void {
    if (this.checkOp(':')) {
      this.advance();
      return;
    }
    const token = this.peek();
    if (isOp(token, '=')) {
      throw this.fail("invalid syntax. Maybe you meant '==' or ':=' instead of '='?", token, ["':'"]);
    }
    throw this.fail("expected ':'", token, ["':'"], { suggestion: this.colonSuggestion(header) });
  }

  private colonSuggestion(header: Token): string | undefined {
    const text = this.lines?.[this.lastEnd.line - 1];
    if (text === undefined || this.lastEnd.line !== header.line) return `Add ':' after the '${header.text}' header`;
    const at = this.lastEnd.col - 1;
    return `Did you mean: ${`${text.slice(0, at)}:${text.slice(at)}`.trim()}`;
  }

  // -------------------------------------------------------------------------
  // Statements

  private statement(): PyStatement[] {
    const token = this.peek();
    if (token.type === 'indent') {
      throw this.fail('unexpected indent', token, ['statement']);
    }
    if (token.type === 'keyword') {
      switch (token.text) {
        case 'if':
          return [this.ifStatement()];
        case 'while':
          return [this.whileStatement()];
        case 'for':
          return [this.forStatement(this.mark(), false)];
        case 'try':
          return [this.tryStatement()];
        case 'with':
          return [this.withStatement(this.mark(), false)];
        case 'def':
          return [this.functionDef([], this.mark(), false)];
        case 'class':
          return [this.classDef([])];
        case 'async':
          return [this.asyncStatement([])];
        case 'elif':
          throw this.fail("'elif' without a matching 'if'", token, ['statement']);
        case 'else':
          throw this.fail("'else' without a matching 'if', 'for', 'while' or 'try'", token, ['statement']);
        case 'except':
        case 'finally':
          throw this.fail(`'${token.text}' without a matching 'try'`, token, ['statement']);
        default:
          break;
      }
    }
    if (isOp(token, '@')) {
      return [this.decorated()];
    }
    if (this.checkName('match')) {
      const match = this.matchStatement();
      if (match) return [match];
    }
    return this.simpleStatements();
  }

  private simpleStatements(): PyStatement[] {
    const statements = [this.simpleStatement()];
    while (this.matchOp(';')) {
      if (this.peek().type === 'newline') break;
      statements.push(this.simpleStatement());
    }
    const token = this.peek();
    if (token.type === 'newline') {
      this.advance();
      return statements;
    }
    if (token.type === 'endmarker') return statements;
    const last = statements[statements.length - 1];
    if (
      last.type === 'Expr' &&
      last.value.type === 'Name' &&
      last.value.id === 'print' &&
      this.startsExpression(token)
    ) {
      throw this.fail("Missing parentheses in call to 'print'", token, ['newline', "';'"], {
        suggestion: 'Did you mean print(...)?',
      });
    }
    throw this.fail('invalid syntax', token, ['newline', "';'"]);
  }

  private simpleStatement(): PyStatement {
    const token = this.peek();
    const start = this.mark();
    if (token.type === 'keyword' && simpleStatementKeywords.has(token.text)) {
      this.trace('enter', token.text, token);
      switch (token.text) {
        case 'pass':
          this.advance();
          return { type: 'Pass', ...this.span(start) };
        case 'break':
          this.advance();
          return { type: 'Break', ...this.span(start) };
        case 'continue':
          this.advance();
          return { type: 'Continue', ...this.span(start) };
        case 'return': {
          this.advance();
          const value = this.atStatementEnd() ? null : this.starExpressions();
          return { type: 'Return', value, ...this.span(start) };
        }
        case 'raise':
          return this.raiseStatement(start);
        case 'global':
        case 'nonlocal': {
          this.advance();
          const names = [this.expectName('name').text];
          while (this.matchOp(',')) names.push(this.expectName('name').text);
          return token.text === 'global'
            ? { type: 'Global', names, ...this.span(start) }
            : { type: 'Nonlocal', names, ...this.span(start) };
        }
        case 'del':
          return this.deleteStatement(start);
        case 'assert': {
          this.advance();
          const test = this.expression();
          const msg = this.matchOp(',') ? this.expression() : null;
          return { type: 'Assert', test, msg, ...this.span(start) };
        }
        case 'import':
          return this.importStatement(start);
        default:
          return this.importFromStatement(start);
      }
    }
    if (this.checkName('type') && this.peek(1).type === 'name' && (isOp(this.peek(2), '=') || isOp(this.peek(2), '['))) {
      return this.typeAlias(start);
    }
    return this.expressionStatement(start);
  }

  private atStatementEnd(): boolean {
    const token = this.peek();
    return token.type === 'newline' || token.type === 'endmarker' || isOp(token, ';');
  }

  private raiseStatement(start: Start): PyStatement {
    this.advance();
    if (this.atStatementEnd()) return { type: 'Raise', exc: null, cause: null, ...this.span(start) };
    const exc = this.expression();
    const cause = this.matchKeyword('from') ? this.expression() : null;
    return { type: 'Raise', exc, cause, ...this.span(start) };
  }

  private deleteStatement(start: Start): PyStatement {
    this.advance();
    const targets: PyExpression[] = [];
    do {
      if (this.atStatementEnd()) break;
      targets.push(this.toTarget(this.expression(), 'Del', 'delete'));
    } while (this.matchOp(','));
    if (targets.length === 0) {
      throw this.fail('expected expression after del', this.peek(), ['expression']);
    }
    return { type: 'Delete', targets, ...this.span(start) };
  }

  private dottedName(): string {
    let name = this.expectName('module name').text;
    while (this.checkOp('.')) {
      this.advance();
      name += `.${this.expectName('module name').text}`;
    }
    return name;
  }

  private importStatement(start: Start): PyStatement {
    this.advance();
    const names: PyAlias[] = [];
    do {
      const aliasStart = this.mark();
      const name = this.dottedName();
      const asname = this.matchKeyword('as') ? this.expectName('alias').text : null;
      names.push({ type: 'alias', name, asname, ...this.span(aliasStart) });
    } while (this.matchOp(','));
    return { type: 'Import', names, ...this.span(start) };
  }

  private importFromStatement(start: Start): PyStatement {
    this.advance();
    let level = 0;
    while (this.checkOp('.') || this.checkOp('...')) {
      level += this.advance().text.length;
    }
    const module = this.checkKeyword('import') ? null : this.dottedName();
    if (module === null && level === 0) {
      throw this.fail('expected module name', this.peek(), ['identifier']);
    }
    this.expectKeyword('import');
    const names: PyAlias[] = [];
    if (this.checkOp('*')) {
      const star = this.mark();
      this.advance();
      names.push({ type: 'alias', name: '*', asname: null, ...this.span(star) });
      return { type: 'ImportFrom', module, names, level, ...this.span(start) };
    }
    const open = this.checkOp('(') ? this.advance() : null;
    do {
      if (open && this.checkOp(')')) break;
      const aliasStart = this.mark();
      const name = this.expectName('imported name').text;
      const asname = this.matchKeyword('as') ? this.expectName('alias').text : null;
      names.push({ type: 'alias', name, asname, ...this.span(aliasStart) });
    } while (this.matchOp(','));
    if (open) this.closeBracket(open, ')');
    if (names.length === 0) {
      throw this.fail('expected imported name', this.peek(), ['identifier']);
    }
    return { type: 'ImportFrom', module, names, level, ...this.span(start) };
  }

  private typeAlias(start: Start): PyStatement {
    this.trace('enter', 'type', this.advance());
    const nameStart = this.mark();
    const id = this.expectName('type alias name').text;
    const name: PyName = { type: 'Name', id, ctx: 'Store', ...this.span(nameStart) };
    const typeParams = this.checkOp('[') ? this.typeParams() : [];
    this.expectOp('=');
    const value = this.expression();
    return { type: 'TypeAlias', name, typeParams, value, ...this.span(start) };
  }

  private expressionStatement(start: Start): PyStatement {
    const parenthesized = this.checkOp('(');
    const first = this.checkKeyword('yield') ? this.yieldExpression() : this.starExpressions();
    const token = this.peek();

    if (isOp(token, ':')) {
      this.advance();
      const target = this.annotationTarget(first);
      const annotation = this.expression();
      const value = this.matchOp('=') ? this.assignmentValue() : null;
      const simple = target.type === 'Name' && !parenthesized;
      return { type: 'AnnAssign', target, annotation, value, simple, ...this.span(start) };
    }

    const augmented = token.type === 'op' ? augmentedOperators.get(token.text) : undefined;
    if (augmented) {
      this.advance();
      if (first.type !== 'Name' && first.type !== 'Attribute' && first.type !== 'Subscript') {
        throw this.failAt(`'${describeExpression(first)}' is an illegal expression for augmented assignment`, first);
      }
      const target = this.toTarget(first, 'Store', 'assign');
      const value = this.assignmentValue();
      return { type: 'AugAssign', target, op: augmented, value, ...this.span(start) };
    }

    if (isOp(token, '=')) {
      const chain = [first];
      while (this.matchOp('=')) {
        chain.push(this.assignmentValue());
      }
      const value = chain.pop() ?? first;
      const targets = chain.map((target) => this.toTarget(target, 'Store', 'assign'));
      return { type: 'Assign', targets, value, ...this.span(start) };
    }

    return { type: 'Expr', value: first, ...this.span(start) };
  }

  private assignmentValue(): PyExpression {
    return this.checkKeyword('yield') ? this.yieldExpression() : this.starExpressions();
  }

  private annotationTarget(target: PyExpression): PyExpression {
    switch (target.type) {
      case 'Name':
      case 'Attribute':
      case 'Subscript':
        return this.toTarget(target, 'Store', 'assign');
      case 'Tuple':
        throw this.failAt('only single target (not tuple) can be annotated', target);
      case 'List':
        throw this.failAt('only single target (not list) can be annotated', target);
      default:
        throw this.failAt('illegal target for annotation', target);
    }
  }

  /** Copy `expr` with the given context, rejecting anything that is not a target. */
  private toTarget(expr: PyExpression, ctx: ExprContext, action: 'assign' | 'delete'): PyExpression {
    switch (expr.type) {
      case 'Name':
      case 'Attribute':
      case 'Subscript':
        return { ...expr, ctx };
      case 'Starred':
        if (ctx === 'Del') throw this.failAt('cannot delete starred', expr);
        return { ...expr, ctx, value: this.toTarget(expr.value, ctx, action) };
      case 'Tuple':
      case 'List':
        return { ...expr, ctx, elts: expr.elts.map((elt) => this.toTarget(elt, ctx, action)) };
      default: {
        const what = describeExpression(expr);
        if (action === 'delete') throw this.failAt(`cannot delete ${what}`, expr);
        throw this.failAt(
          `cannot assign to ${what}`,
          expr,
          expr.type === 'Constant' || expr.type === 'Compare' || expr.type === 'Call' || expr.type === 'BinOp'
            ? "Maybe you meant '==' instead of '='?"
            : undefined
        );
      }
    }
  }

  // Compound statements

  private ifStatement(): PyStatement {
    const start = this.mark();
    const keyword = this.advance();
    this.trace('enter', keyword.text, keyword);
    const test = this.namedExpression();
    this.expectColon(keyword);
    const body = this.block(keyword, `'${keyword.text}' statement`);
    let orelse: PyStatement[] = [];
    if (this.checkKeyword('elif')) {
      orelse = [this.ifStatement()];
    } else if (this.checkKeyword('else')) {
      orelse = this.elseBlock();
    }
    return { type: 'If', test, body, orelse, ...this.span(start) };
  }

  private elseBlock(): PyStatement[] {
    const keyword = this.advance();
    this.expectColon(keyword);
    return this.block(keyword, "'else' statement");
  }

  private whileStatement(): PyStatement {
    const start = this.mark();
    const keyword = this.advance();
    this.trace('enter', 'while', keyword);
    const test = this.namedExpression();
    this.expectColon(keyword);
    const body = this.block(keyword, "'while' statement");
    const orelse = this.checkKeyword('else') ? this.elseBlock() : [];
    return { type: 'While', test, body, orelse, ...this.span(start) };
  }

  private forStatement(start: Start, isAsync: boolean): PyStatement {
    const keyword = this.expectKeyword('for');
    this.trace('enter', isAsync ? 'async for' : 'for', keyword);
    const target = this.targetList();
    this.expectKeyword('in');
    const iter = this.starExpressions();
    this.expectColon(keyword);
    const body = this.block(keyword, "'for' statement");
    const orelse = this.checkKeyword('else') ? this.elseBlock() : [];
    return isAsync
      ? { type: 'AsyncFor', target, iter, body, orelse, ...this.span(start) }
      : { type: 'For', target, iter, body, orelse, ...this.span(start) };
  }

  /** `a, *b` before `in` or `=`: parsed at bitwise-or level so `in` is not consumed. */
  private targetList(): PyExpression {
    const start = this.mark();
    const first = this.targetItem();
    if (!this.checkOp(',')) return this.toTarget(first, 'Store', 'assign');
    const elts = [first];
    while (this.matchOp(',')) {
      if (this.checkKeyword('in') || this.checkOp('=')) break;
      elts.push(this.targetItem());
    }
    return this.toTarget({ type: 'Tuple', elts, ctx: 'Load', ...this.span(start) }, 'Store', 'assign');
  }

  private targetItem(): PyExpression {
    return this.checkOp('*') ? this.starred(() => this.bitwiseOr()) : this.bitwiseOr();
  }

  private tryStatement(): PyStatement {
    const start = this.mark();
    const keyword = this.advance();
    this.trace('enter', 'try', keyword);
    this.expectColon(keyword);
    const body = this.block(keyword, "'try' statement");
    const handlers: PyExceptHandler[] = [];
    let star: boolean | null = null;
    while (this.checkKeyword('except')) {
      const handlerStart = this.mark();
      const except = this.advance();
      const isStar = this.matchOp('*');
      if (star !== null && star !== isStar) {
        throw this.fail("cannot have both 'except' and 'except*' on the same 'try'", except, ["'except'"]);
      }
      star = isStar;
      let exceptionType: PyExpression | null = null;
      let name: string | null = null;
      if (!this.checkOp(':')) {
        exceptionType = this.expression();
        if (this.checkOp(',')) {
          throw this.failAt('multiple exception types must be parenthesized', exceptionType);
        }
        if (this.matchKeyword('as')) name = this.expectName('exception name').text;
      } else if (isStar) {
        throw this.fail('expected one or more exception types', this.peek(), ['expression']);
      }
      this.expectColon(except);
      const handlerBody = this.block(except, `'${isStar ? 'except*' : 'except'}' statement`);
      handlers.push({ type: 'ExceptHandler', exceptionType, name, body: handlerBody, ...this.span(handlerStart) });
    }
    const orelse = handlers.length > 0 && this.checkKeyword('else') ? this.elseBlock() : [];
    let finalbody: PyStatement[] = [];
    if (this.checkKeyword('finally')) {
      const finallyToken = this.advance();
      this.expectColon(finallyToken);
      finalbody = this.block(finallyToken, "'finally' statement");
    }
    if (handlers.length === 0 && finalbody.length === 0) {
      throw this.fail("expected 'except' or 'finally' block", this.peek(), ["'except'", "'finally'"]);
    }
    return star
      ? { type: 'TryStar', body, handlers, orelse, finalbody, ...this.span(start) }
      : { type: 'Try', body, handlers, orelse, finalbody, ...this.span(start) };
  }

  private withStatement(start: Start, isAsync: boolean): PyStatement {
    const keyword = this.expectKeyword('with');
    this.trace('enter', isAsync ? 'async with' : 'with', keyword);
    let items: PyWithItem[] | null = null;
    if (this.checkOp('(')) {
      items = this.speculate('with', () => {
        const open = this.advance();
        const grouped = [this.withItem()];
        while (this.matchOp(',')) {
          if (this.checkOp(')')) break;
          grouped.push(this.withItem());
        }
        this.closeBracket(open, ')');
        if (!this.checkOp(':')) throw this.fail("expected ':'", this.peek(), ["':'"]);
        return grouped;
      });
    }
    if (!items) {
      items = [this.withItem()];
      while (this.matchOp(',')) items.push(this.withItem());
    }
    this.expectColon(keyword);
    const body = this.block(keyword, "'with' statement");
    return isAsync
      ? { type: 'AsyncWith', items, body, ...this.span(start) }
      : { type: 'With', items, body, ...this.span(start) };
  }

  private withItem(): PyWithItem {
    const contextExpr = this.expression();
    const optionalVars = this.matchKeyword('as') ? this.toTarget(this.targetItem(), 'Store', 'assign') : null;
    return { type: 'withitem', contextExpr, optionalVars };
  }

  private decorated(): PyStatement {
    const decorators: PyExpression[] = [];
    while (this.checkOp('@')) {
      this.advance();
      decorators.push(this.namedExpression());
      const token = this.peek();
      if (token.type !== 'newline') throw this.fail('invalid syntax', token, ['newline']);
      this.advance();
    }
    if (this.checkKeyword('def')) return this.functionDef(decorators, this.mark(), false);
    if (this.checkKeyword('class')) return this.classDef(decorators);
    if (this.checkKeyword('async') && isKeyword(this.peek(1), 'def')) return this.asyncStatement(decorators);
    throw this.fail('expected a function or class definition after decorators', this.peek(), [
      "'def'",
      "'class'",
      "'async'",
    ]);
  }

  private asyncStatement(decorators: PyExpression[]): PyStatement {
    const start = this.mark();
    this.advance();
    if (this.checkKeyword('def')) return this.functionDef(decorators, start, true);
    if (decorators.length === 0 && this.checkKeyword('for')) return this.forStatement(start, true);
    if (decorators.length === 0 && this.checkKeyword('with')) return this.withStatement(start, true);
    throw this.fail("expected 'def', 'for' or 'with' after 'async'", this.peek(), ["'def'", "'for'", "'with'"]);
  }

  private functionDef(decoratorList: PyExpression[], start: Start, isAsync: boolean): PyStatement {
    const keyword = this.expectKeyword('def');
    this.trace('enter', isAsync ? 'async def' : 'def', keyword);
    const name = this.expectName('function name').text;
    const typeParams = this.checkOp('[') ? this.typeParams() : [];
    const open = this.expectOp('(');
    const args = this.parameters(')', true);
    this.closeBracket(open, ')');
    const returns = this.matchOp('->') ? this.expression() : null;
    this.expectColon(keyword);
    const body = this.block(keyword, 'function definition');
    return isAsync
      ? { type: 'AsyncFunctionDef', name, args, body, decoratorList, returns, typeParams, ...this.span(start) }
      : { type: 'FunctionDef', name, args, body, decoratorList, returns, typeParams, ...this.span(start) };
  }

  private classDef(decoratorList: PyExpression[]): PyStatement {
    const start = this.mark();
    const keyword = this.advance();
    this.trace('enter', 'class', keyword);
    const name = this.expectName('class name').text;
    const typeParams = this.checkOp('[') ? this.typeParams() : [];
    let bases: PyExpression[] = [];
    let keywords: PyKeyword[] = [];
    if (this.checkOp('(')) {
      const open = this.advance();
      ({ args: bases, keywords } = this.callArguments(open));
    }
    this.expectColon(keyword);
    const body = this.block(keyword, 'class definition');
    return { type: 'ClassDef', name, bases, keywords, body, decoratorList, typeParams, ...this.span(start) };
  }

  private typeParams(): PyTypeParam[] {
    const open = this.advance();
    const params: PyTypeParam[] = [];
    do {
      if (this.checkOp(']')) break;
      const start = this.mark();
      if (this.matchOp('*')) {
        const name = this.expectName('type parameter name').text;
        const defaultValue = this.matchOp('=') ? this.targetItem() : null;
        params.push({ type: 'TypeVarTuple', name, defaultValue, ...this.span(start) });
      } else if (this.matchOp('**')) {
        const name = this.expectName('type parameter name').text;
        const defaultValue = this.matchOp('=') ? this.expression() : null;
        params.push({ type: 'ParamSpec', name, defaultValue, ...this.span(start) });
      } else {
        const name = this.expectName('type parameter name').text;
        const bound = this.matchOp(':') ? this.expression() : null;
        const defaultValue = this.matchOp('=') ? this.expression() : null;
        params.push({ type: 'TypeVar', name, bound, defaultValue, ...this.span(start) });
      }
    } while (this.matchOp(','));
    if (params.length === 0) {
      throw this.fail('type parameter list cannot be empty', this.peek(), ['identifier']);
    }
    this.closeBracket(open, ']');
    return params;
  }

  /**
   * Parameter list up to `terminator` (not consumed). Lambdas pass
   * `annotations = false`.
   */
  private parameters(terminator: string, annotations: boolean): PyArguments {
    let posonlyargs: PyArg[] = [];
    let args: PyArg[] = [];
    const defaults: PyExpression[] = [];
    let vararg: PyArg | null = null;
    const kwonlyargs: PyArg[] = [];
    const kwDefaults: Array<PyExpression | null> = [];
    let kwarg: PyArg | null = null;
    let seenSlash = false;
    let seenStar = false;
    let bareStar: Token | null = null;
    const names = new Set<string>();

    const param = (starred: boolean): PyArg => {
      const start = this.mark();
      const token = this.expectName('parameter name');
      if (names.has(token.text)) {
        throw this.fail(`duplicate argument '${token.text}' in function definition`, token, []);
      }
      names.add(token.text);
      let annotation: PyExpression | null = null;
      if (annotations && this.matchOp(':')) {
        annotation = starred && this.checkOp('*') ? this.starred(() => this.expression()) : this.expression();
      }
      return { type: 'arg', arg: token.text, annotation, ...this.span(start) };
    };

    while (!this.checkOp(terminator)) {
      const token = this.peek();
      if (kwarg) {
        throw this.fail('arguments cannot follow var-keyword argument', token, [`'${terminator}'`]);
      }
      if (isOp(token, '/')) {
        if (seenStar) throw this.fail("/ must be ahead of *", token, []);
        if (seenSlash) throw this.fail('/ may appear only once', token, []);
        if (args.length === 0) throw this.fail('at least one argument must precede /', token, []);
        this.advance();
        seenSlash = true;
        posonlyargs = args;
        args = [];
      } else if (isOp(token, '*')) {
        if (seenStar) throw this.fail('* argument may appear only once', token, []);
        this.advance();
        seenStar = true;
        if (this.checkOp(',') || this.checkOp(terminator)) {
          bareStar = token;
        } else {
          vararg = param(true);
        }
      } else if (isOp(token, '**')) {
        this.advance();
        kwarg = param(false);
        if (this.checkOp('=')) throw this.fail('var-keyword argument cannot have default value', this.peek(), []);
      } else {
        const arg = param(false);
        const defaultValue = this.matchOp('=') ? this.expression() : null;
        if (seenStar) {
          kwonlyargs.push(arg);
          kwDefaults.push(defaultValue);
        } else {
          if (defaultValue) {
            defaults.push(defaultValue);
          } else if (defaults.length > 0) {
            throw this.failAt('parameter without a default follows parameter with a default', arg);
          }
          args.push(arg);
        }
      }
      if (!this.matchOp(',')) break;
    }

    if (bareStar && kwonlyargs.length === 0) {
      throw this.fail('named arguments must follow bare *', bareStar, ['identifier']);
    }
    return { type: 'arguments', posonlyargs, args, vararg, kwonlyargs, kwDefaults, kwarg, defaults };
  }

  // Match statements

  private matchStatement(): PyStatement | null {
    const start = this.mark();
    const header = this.speculate('match', () => {
      const keyword = this.advance();
      const subject = this.matchSubject();
      this.expectOp(':');
      if (this.peek().type !== 'newline') throw this.fail('expected newline', this.peek(), ['newline']);
      this.advance();
      if (this.peek().type !== 'indent') {
        throw this.fail(`expected an indented block after 'match' statement on line ${keyword.line}`, this.peek(), [
          'indent',
        ]);
      }
      this.advance();
      return { keyword, subject };
    });
    if (!header) return null;
    this.trace('enter', 'match', header.keyword);

    const cases: PyMatchCase[] = [];
    while (this.checkName('case')) {
      cases.push(this.matchCase());
    }
    const token = this.peek();
    if (cases.length === 0 || (token.type !== 'dedent' && token.type !== 'endmarker')) {
      throw this.fail("expected 'case' block", token, ["'case'"]);
    }
    if (token.type === 'dedent') this.advance();
    return { type: 'Match', subject: header.subject, cases, ...this.span(start) };
  }

  private matchSubject(): PyExpression {
    const start = this.mark();
    const first = this.starNamedExpression();
    if (!this.checkOp(',')) {
      if (first.type === 'Starred') throw this.failAt('cannot use starred expression here', first);
      return first;
    }
    const elts = [first];
    while (this.matchOp(',')) {
      if (this.checkOp(':')) break;
      elts.push(this.starNamedExpression());
    }
    return { type: 'Tuple', elts, ctx: 'Load', ...this.span(start) };
  }

  private matchCase(): PyMatchCase {
    const keyword = this.advance();
    this.trace('enter', 'case', keyword);
    const pattern = this.openSequencePattern();
    const guard = this.matchKeyword('if') ? this.namedExpression() : null;
    this.expectColon(keyword);
    const body = this.block(keyword, "'case' statement");
    return { type: 'match_case', pattern, guard, body };
  }

  private openSequencePattern(): PyPattern {
    const start = this.mark();
    const first = this.maybeStarPattern();
    if (!this.checkOp(',')) {
      if (first.type === 'MatchStar') return { type: 'MatchSequence', patterns: [first], ...this.span(start) };
      return first;
    }
    const patterns = [first];
    while (this.matchOp(',')) {
      if (this.checkOp(':') || this.checkKeyword('if')) break;
      patterns.push(this.maybeStarPattern());
    }
    return { type: 'MatchSequence', patterns, ...this.span(start) };
  }

  private maybeStarPattern(): PyPattern {
    if (!this.checkOp('*')) return this.pattern();
    const start = this.mark();
    this.advance();
    const name = this.expectName('capture name').text;
    return { type: 'MatchStar', name: name === '_' ? null : name, ...this.span(start) };
  }

  private pattern(): PyPattern {
    const start = this.mark();
    const pattern = this.orPattern();
    if (!this.matchKeyword('as')) return pattern;
    const token = this.expectName('capture name');
    if (token.text === '_') throw this.fail("cannot use '_' as a target", token, ['identifier']);
    return { type: 'MatchAs', pattern, name: token.text, ...this.span(start) };
  }

  private orPattern(): PyPattern {
    const start = this.mark();
    const first = this.closedPattern();
    if (!this.checkOp('|')) return first;
    const patterns = [first];
    while (this.matchOp('|')) patterns.push(this.closedPattern());
    return { type: 'MatchOr', patterns, ...this.span(start) };
  }

  private closedPattern(): PyPattern {
    const start = this.mark();
    const token = this.peek();

    if (token.type === 'keyword' && (token.text === 'None' || token.text === 'True' || token.text === 'False')) {
      this.advance();
      const value = token.text === 'None' ? null : token.text === 'True';
      return { type: 'MatchSingleton', value, ...this.span(start) };
    }
    if (token.type === 'number' || isOp(token, '-')) {
      return { type: 'MatchValue', value: this.signedNumberPattern(), ...this.span(start) };
    }
    if (token.type === 'string') {
      return { type: 'MatchValue', value: this.strings(), ...this.span(start) };
    }
    if (token.type === 'fstring') {
      throw this.fail('patterns may only match literals and attribute lookups', token, ['pattern']);
    }
    if (token.type === 'name') {
      return this.namePattern(start);
    }
    if (isOp(token, '(')) {
      const open = this.advance();
      if (this.checkOp(')')) {
        this.advance();
        return { type: 'MatchSequence', patterns: [], ...this.span(start) };
      }
      const first = this.maybeStarPattern();
      if (this.checkOp(')') && first.type !== 'MatchStar') {
        this.advance();
        return first;
      }
      const patterns = [first];
      while (this.matchOp(',')) {
        if (this.checkOp(')')) break;
        patterns.push(this.maybeStarPattern());
      }
      this.closeBracket(open, ')');
      return { type: 'MatchSequence', patterns, ...this.span(start) };
    }
    if (isOp(token, '[')) {
      const open = this.advance();
      const patterns: PyPattern[] = [];
      while (!this.checkOp(']')) {
        patterns.push(this.maybeStarPattern());
        if (!this.matchOp(',')) break;
      }
      this.closeBracket(open, ']');
      return { type: 'MatchSequence', patterns, ...this.span(start) };
    }
    if (isOp(token, '{')) {
      return this.mappingPattern(start);
    }
    throw this.fail('expected pattern', token, ['pattern']);
  }

  private signedNumberPattern(): PyExpression {
    const start = this.mark();
    const negative = this.matchOp('-');
    const token = this.peek();
    if (token.type !== 'number') throw this.fail('expected number', token, ['number']);
    this.advance();
    const literal: PyExpression = { type: 'Constant', value: token.value, ...this.span({ line: token.line, column: token.col }) };
    const real: PyExpression = negative ? { type: 'UnaryOp', op: 'USub', operand: literal, ...this.span(start) } : literal;
    if (!this.checkOp('+') && !this.checkOp('-')) return real;
    const op: BinaryOperator = this.advance().text === '+' ? 'Add' : 'Sub';
    const imagToken = this.peek();
    if (imagToken.type !== 'number' || imagToken.value.kind !== 'complex') {
      throw this.fail('imaginary number required in complex literal', imagToken, ['number']);
    }
    this.advance();
    const imagStart = { line: imagToken.line, column: imagToken.col };
    const right: PyExpression = { type: 'Constant', value: imagToken.value, ...this.span(imagStart) };
    return { type: 'BinOp', left: real, op, right, ...this.span(start) };
  }

  private namePattern(start: Start): PyPattern {
    const token = this.advance();
    let value: PyExpression = { type: 'Name', id: token.text, ctx: 'Load', ...this.span(start) };
    let dotted = false;
    while (this.matchOp('.')) {
      const attr = this.expectName('attribute name').text;
      value = { type: 'Attribute', value, attr, ctx: 'Load', ...this.span(start) };
      dotted = true;
    }
    if (this.checkOp('(')) {
      return this.classPattern(value, start);
    }
    if (dotted) {
      return { type: 'MatchValue', value, ...this.span(start) };
    }
    return { type: 'MatchAs', pattern: null, name: token.text === '_' ? null : token.text, ...this.span(start) };
  }

  private classPattern(cls: PyExpression, start: Start): PyPattern {
    const open = this.advance();
    const patterns: PyPattern[] = [];
    const kwdAttrs: string[] = [];
    const kwdPatterns: PyPattern[] = [];
    while (!this.checkOp(')')) {
      if (this.peek().type === 'name' && isOp(this.peek(1), '=')) {
        kwdAttrs.push(this.advance().text);
        this.advance();
        kwdPatterns.push(this.pattern());
      } else {
        const token = this.peek();
        const pattern = this.pattern();
        if (kwdAttrs.length > 0) {
          throw this.fail('positional patterns follow keyword patterns', token, ['identifier']);
        }
        patterns.push(pattern);
      }
      if (!this.matchOp(',')) break;
    }
    this.closeBracket(open, ')');
    return { type: 'MatchClass', cls, patterns, kwdAttrs, kwdPatterns, ...this.span(start) };
  }

  private mappingPattern(start: Start): PyPattern {
    const open = this.advance();
    const keys: PyExpression[] = [];
    const patterns: PyPattern[] = [];
    let rest: string | null = null;
    while (!this.checkOp('}')) {
      if (rest !== null) {
        throw this.fail('double star pattern must be the last item of a mapping pattern', this.peek(), ["'}'"]);
      }
      if (this.matchOp('**')) {
        rest = this.expectName('capture name').text;
      } else {
        keys.push(this.mappingKey());
        this.expectOp(':');
        patterns.push(this.pattern());
      }
      if (!this.matchOp(',')) break;
    }
    this.closeBracket(open, '}');
    return { type: 'MatchMapping', keys, patterns, rest, ...this.span(start) };
  }

  private mappingKey(): PyExpression {
    const start = this.mark();
    const token = this.peek();
    if (token.type === 'keyword' && (token.text === 'None' || token.text === 'True' || token.text === 'False')) {
      this.advance();
      const value = token.text === 'None' ? { kind: 'None' as const } : { kind: 'bool' as const, value: token.text === 'True' };
      return { type: 'Constant', value, ...this.span(start) };
    }
    if (token.type === 'number' || isOp(token, '-')) return this.signedNumberPattern();
    if (token.type === 'string') return this.strings();
    if (token.type === 'name') {
      this.advance();
      let value: PyExpression = { type: 'Name', id: token.text, ctx: 'Load', ...this.span(start) };
      if (!this.checkOp('.')) {
        throw this.fail('mapping pattern keys may only match literals and attribute lookups', token, ['literal']);
      }
      while (this.matchOp('.')) {
        value = { type: 'Attribute', value, attr: this.expectName('attribute name').text, ctx: 'Load', ...this.span(start) };
      }
      return value;
    }
    throw this.fail('mapping pattern keys may only match literals and attribute lookups', token, ['literal']);
  }

  // -------------------------------------------------------------------------
  // Expressions

  /** Comma-separated expressions or starred items; two or more make a tuple. */
  private starExpressions(): PyExpression {
    const start = this.mark();
    const first = this.starExpression();
    if (!this.checkOp(',')) return first;
    const elts = [first];
    while (this.matchOp(',')) {
      if (!this.startsExpression(this.peek())) break;
      elts.push(this.starExpression());
    }
    return { type: 'Tuple', elts, ctx: 'Load', ...this.span(start) };
  }

  private starExpression(): PyExpression {
    return this.checkOp('*') ? this.starred(() => this.bitwiseOr()) : this.expression();
  }

  private starNamedExpression(): PyExpression {
    return this.checkOp('*') ? this.starred(() => this.bitwiseOr()) : this.namedExpression();
  }

  private starred(operand: () => PyExpression): PyExpression {
    const start = this.mark();
    this.advance();
    const value = operand();
    return { type: 'Starred', value, ctx: 'Load', ...this.span(start) };
  }

  private namedExpression(): PyExpression {
    if (this.peek().type === 'name' && isOp(this.peek(1), ':=')) {
      const start = this.mark();
      const token = this.advance();
      this.advance();
      const target: PyName = {
        type: 'Name',
        id: token.text,
        ctx: 'Store',
        line: token.line,
        column: token.col,
        endLine: token.endLine,
        endColumn: token.endCol,
      };
      const value = this.expression();
      return { type: 'NamedExpr', target, value, ...this.span(start) };
    }
    const expr = this.expression();
    if (this.checkOp(':=')) {
      throw this.failAt(`cannot use assignment expressions with ${describeExpression(expr)}`, expr);
    }
    return expr;
  }

  private expression(): PyExpression {
    if (this.checkKeyword('lambda')) return this.lambda();
    const start = this.mark();
    const body = this.disjunction();
    if (!this.checkKeyword('if')) return body;
    this.advance();
    const test = this.disjunction();
    if (!this.matchKeyword('else')) {
      throw this.fail("expected 'else' after 'if' expression", this.peek(), ["'else'"]);
    }
    const orelse = this.expression();
    return { type: 'IfExp', test, body, orelse, ...this.span(start) };
  }

  private lambda(): PyExpression {
    const start = this.mark();
    this.advance();
    const args = this.parameters(':', false);
    this.expectOp(':');
    const body = this.expression();
    return { type: 'Lambda', args, body, ...this.span(start) };
  }

  private disjunction(): PyExpression {
    const start = this.mark();
    const first = this.conjunction();
    if (!this.checkKeyword('or')) return first;
    const values = [first];
    while (this.matchKeyword('or')) values.push(this.conjunction());
    return { type: 'BoolOp', op: 'Or', values, ...this.span(start) };
  }

  private conjunction(): PyExpression {
    const start = this.mark();
    const first = this.inversion();
    if (!this.checkKeyword('and')) return first;
    const values = [first];
    while (this.matchKeyword('and')) values.push(this.inversion());
    return { type: 'BoolOp', op: 'And', values, ...this.span(start) };
  }

  private inversion(): PyExpression {
    if (!this.checkKeyword('not')) return this.comparison();
    const start = this.mark();
    this.advance();
    const operand = this.inversion();
    return { type: 'UnaryOp', op: 'Not', operand, ...this.span(start) };
  }

  private comparison(): PyExpression {
    const start = this.mark();
    const left = this.bitwiseOr();
    const ops: CompareOperator[] = [];
    const comparators: PyExpression[] = [];
    for (let op = this.compareOperator(); op; op = this.compareOperator()) {
      ops.push(op);
      comparators.push(this.bitwiseOr());
    }
    if (ops.length === 0) return left;
    return { type: 'Compare', left, ops, comparators, ...this.span(start) };
  }

  private compareOperator(): CompareOperator | null {
    const token = this.peek();
    if (token.type === 'op') {
      const op = comparisonOperators.get(token.text);
      if (op) this.advance();
      return op ?? null;
    }
    if (isKeyword(token, 'in')) {
      this.advance();
      return 'In';
    }
    if (isKeyword(token, 'not') && isKeyword(this.peek(1), 'in')) {
      this.advance();
      this.advance();
      return 'NotIn';
    }
    if (isKeyword(token, 'is')) {
      this.advance();
      return this.matchKeyword('not') ? 'IsNot' : 'Is';
    }
    return null;
  }

  private binaryLevel(operand: () => PyExpression, operators: Map<string, BinaryOperator>): PyExpression {
    const start = this.mark();
    let left = operand();
    for (;;) {
      const token = this.peek();
      const op = token.type === 'op' ? operators.get(token.text) : undefined;
      if (!op) return left;
      this.advance();
      const right = operand();
      left = { type: 'BinOp', left, op, right, ...this.span(start) };
    }
  }

  private bitwiseOr(): PyExpression {
    return this.binaryLevel(() => this.bitwiseXor(), bitOrOperators);
  }

  private bitwiseXor(): PyExpression {
    return this.binaryLevel(() => this.bitwiseAnd(), bitXorOperators);
  }

  private bitwiseAnd(): PyExpression {
    return this.binaryLevel(() => this.shift(), bitAndOperators);
  }

  private shift(): PyExpression {
    return this.binaryLevel(() => this.sum(), shiftOperators);
  }

  private sum(): PyExpression {
    return this.binaryLevel(() => this.term(), arithOperators);
  }

  private term(): PyExpression {
    return this.binaryLevel(() => this.factor(), termOperators);
  }

  private factor(): PyExpression {
    const token = this.peek();
    const op = token.type === 'op' ? unaryOperators.get(token.text) : undefined;
    if (!op) return this.power();
    const start = this.mark();
    this.advance();
    const operand = this.factor();
    return { type: 'UnaryOp', op, operand, ...this.span(start) };
  }

  /** `**` is right-associative and its right operand may carry a unary sign. */
  private power(): PyExpression {
    const start = this.mark();
    const left = this.awaitPrimary();
    if (!this.matchOp('**')) return left;
    const right = this.factor();
    return { type: 'BinOp', left, op: 'Pow', right, ...this.span(start) };
  }

  private awaitPrimary(): PyExpression {
    if (!this.checkKeyword('await')) return this.primary();
    const start = this.mark();
    this.advance();
    const value = this.primary();
    return { type: 'Await', value, ...this.span(start) };
  }

  private primary(): PyExpression {
    const start = this.mark();
    let node = this.atom();
    for (;;) {
      const token = this.peek();
      if (isOp(token, '.')) {
        this.advance();
        const attr = this.expectName('attribute name').text;
        node = { type: 'Attribute', value: node, attr, ctx: 'Load', ...this.span(start) };
      } else if (isOp(token, '(')) {
        const open = this.advance();
        const { args, keywords } = this.callArguments(open);
        node = { type: 'Call', func: node, args, keywords, ...this.span(start) };
      } else if (isOp(token, '[')) {
        const open = this.advance();
        const slice = this.slices();
        this.closeBracket(open, ']');
        node = { type: 'Subscript', value: node, slice, ctx: 'Load', ...this.span(start) };
      } else {
        return node;
      }
    }
  }

  /** Arguments after an already consumed `(`, through the closing `)`. */
  private callArguments(open: Token): { args: PyExpression[]; keywords: PyKeyword[] } {
    const args: PyExpression[] = [];
    const keywords: PyKeyword[] = [];
    let count = 0;
    while (!this.checkOp(')')) {
      const start = this.mark();
      const token = this.peek();
      count += 1;
      if (isOp(token, '**')) {
        this.advance();
        const value = this.expression();
        keywords.push({ type: 'keyword', arg: null, value, ...this.span(start) });
      } else if (isOp(token, '*')) {
        args.push(this.starred(() => this.expression()));
      } else if (token.type === 'name' && isOp(this.peek(1), '=')) {
        this.advance();
        this.advance();
        const value = this.expression();
        keywords.push({ type: 'keyword', arg: token.text, value, ...this.span(start) });
      } else {
        const value = this.namedExpression();
        if (this.checkOp('=')) {
          throw this.failAt('expression cannot contain assignment, perhaps you meant "=="?', value);
        }
        if (this.checkKeyword('for') || this.checkKeyword('async')) {
          const generators = this.comprehensionClauses();
          const generator: PyExpression = { type: 'GeneratorExp', elt: value, generators, ...this.span(start) };
          if (count > 1 || (this.checkOp(',') && !isOp(this.peek(1), ')'))) {
            throw this.failAt('Generator expression must be parenthesized', generator);
          }
          args.push(generator);
        } else {
          if (keywords.some((keyword) => keyword.arg === null)) {
            throw this.failAt('positional argument follows keyword argument unpacking', value);
          }
          if (keywords.length > 0) {
            throw this.failAt('positional argument follows keyword argument', value);
          }
          args.push(value);
        }
      }
      if (!this.matchOp(',')) break;
    }
    this.closeBracket(open, ')');
    return { args, keywords };
  }

  private slices(): PyExpression {
    const start = this.mark();
    const first = this.sliceItem();
    if (!this.checkOp(',')) return first;
    const elts = [first];
    while (this.matchOp(',')) {
      if (this.checkOp(']')) break;
      elts.push(this.sliceItem());
    }
    return { type: 'Tuple', elts, ctx: 'Load', ...this.span(start) };
  }

  private sliceItem(): PyExpression {
    if (this.checkOp('*')) return this.starred(() => this.bitwiseOr());
    const start = this.mark();
    const boundary = () => this.checkOp(':') || this.checkOp(']') || this.checkOp(',');
    const lower = this.checkOp(':') ? null : this.namedExpression();
    if (lower && !this.checkOp(':')) return lower;
    this.expectOp(':');
    const upper = boundary() ? null : this.expression();
    let step: PyExpression | null = null;
    if (this.matchOp(':')) {
      step = boundary() ? null : this.expression();
    }
    return { type: 'Slice', lower, upper, step, ...this.span(start) };
  }

  private comprehensionClauses(): PyComprehension[] {
    const generators: PyComprehension[] = [];
    while (this.checkKeyword('for') || (this.checkKeyword('async') && isKeyword(this.peek(1), 'for'))) {
      const isAsync = this.matchKeyword('async');
      this.advance();
      const target = this.targetList();
      this.expectKeyword('in');
      const iter = this.disjunction();
      const ifs: PyExpression[] = [];
      while (this.matchKeyword('if')) ifs.push(this.disjunction());
      generators.push({ type: 'comprehension', target, iter, ifs, isAsync });
    }
    return generators;
  }

  private yieldExpression(): PyExpression {
    const start = this.mark();
    this.advance();
    if (this.matchKeyword('from')) {
      const value = this.expression();
      return { type: 'YieldFrom', value, ...this.span(start) };
    }
    const token = this.peek();
    const value = this.startsExpression(token) ? this.starExpressions() : null;
    return { type: 'Yield', value, ...this.span(start) };
  }

  private atom(): PyExpression {
    const start = this.mark();
    const token = this.peek();
    switch (token.type) {
      case 'name':
        this.advance();
        return { type: 'Name', id: token.text, ctx: 'Load', ...this.span(start) };
      case 'number':
        this.advance();
        return { type: 'Constant', value: token.value, ...this.span(start) };
      case 'string':
      case 'fstring':
        return this.strings();
      case 'keyword':
        if (token.text === 'None' || token.text === 'True' || token.text === 'False') {
          this.advance();
          const value =
            token.text === 'None' ? { kind: 'None' as const } : { kind: 'bool' as const, value: token.text === 'True' };
          return { type: 'Constant', value, ...this.span(start) };
        }
        break;
      case 'op':
        switch (token.text) {
          case '...':
            this.advance();
            return { type: 'Constant', value: { kind: 'Ellipsis' }, ...this.span(start) };
          case '(':
            return this.parenthesized(start);
          case '[':
            return this.listDisplay(start);
          case '{':
            return this.braceDisplay(start);
          default:
            break;
        }
        break;
      default:
        break;
    }
    if (token.type === 'indent') {
      throw this.fail('unexpected indent', token, ['expression']);
    }
    throw this.fail(token.type === 'keyword' ? 'invalid syntax' : 'expected expression', token, ['expression']);
  }

  private parenthesized(start: Start): PyExpression {
    const open = this.advance();
    if (this.checkOp(')')) {
      this.advance();
      return { type: 'Tuple', elts: [], ctx: 'Load', ...this.span(start) };
    }
    if (this.checkKeyword('yield')) {
      const value = this.yieldExpression();
      this.closeBracket(open, ')');
      return value;
    }
    const first = this.starNamedExpression();
    if (this.checkKeyword('for') || this.checkKeyword('async')) {
      const generators = this.comprehensionClauses();
      this.closeBracket(open, ')');
      return { type: 'GeneratorExp', elt: first, generators, ...this.span(start) };
    }
    if (this.checkOp(')')) {
      this.advance();
      if (first.type === 'Starred') throw this.failAt('cannot use starred expression here', first);
      return first;
    }
    const elts = [first];
    while (this.matchOp(',')) {
      if (this.checkOp(')')) break;
      elts.push(this.starNamedExpression());
    }
    this.closeBracket(open, ')');
    return { type: 'Tuple', elts, ctx: 'Load', ...this.span(start) };
  }

  private listDisplay(start: Start): PyExpression {
    const open = this.advance();
    if (this.checkOp(']')) {
      this.advance();
      return { type: 'List', elts: [], ctx: 'Load', ...this.span(start) };
    }
    const first = this.starNamedExpression();
    if (this.checkKeyword('for') || this.checkKeyword('async')) {
      const generators = this.comprehensionClauses();
      this.closeBracket(open, ']');
      return { type: 'ListComp', elt: first, generators, ...this.span(start) };
    }
    const elts = [first];
    while (this.matchOp(',')) {
      if (this.checkOp(']')) break;
      elts.push(this.starNamedExpression());
    }
    this.closeBracket(open, ']');
    return { type: 'List', elts, ctx: 'Load', ...this.span(start) };
  }

  private braceDisplay(start: Start): PyExpression {
    const open = this.advance();
    if (this.checkOp('}')) {
      this.advance();
      return { type: 'Dict', keys: [], values: [], ...this.span(start) };
    }
    if (this.checkOp('**')) {
      return this.dictDisplay(open, start, null, this.doubleStarred());
    }
    const first = this.starNamedExpression();
    if (this.matchOp(':')) {
      const value = this.expression();
      if (this.checkKeyword('for') || this.checkKeyword('async')) {
        const generators = this.comprehensionClauses();
        this.closeBracket(open, '}');
        return { type: 'DictComp', key: first, value, generators, ...this.span(start) };
      }
      return this.dictDisplay(open, start, first, value);
    }
    if (this.checkKeyword('for') || this.checkKeyword('async')) {
      const generators = this.comprehensionClauses();
      this.closeBracket(open, '}');
      return { type: 'SetComp', elt: first, generators, ...this.span(start) };
    }
    const elts = [first];
    while (this.matchOp(',')) {
      if (this.checkOp('}')) break;
      elts.push(this.starNamedExpression());
    }
    this.closeBracket(open, '}');
    return { type: 'Set', elts, ...this.span(start) };
  }

  private doubleStarred(): PyExpression {
    this.advance();
    return this.bitwiseOr();
  }

  private dictDisplay(open: Token, start: Start, firstKey: PyExpression | null, firstValue: PyExpression): PyExpression {
    const keys: Array<PyExpression | null> = [firstKey];
    const values = [firstValue];
    while (this.matchOp(',')) {
      if (this.checkOp('}')) break;
      if (this.checkOp('**')) {
        keys.push(null);
        values.push(this.doubleStarred());
        continue;
      }
      keys.push(this.expression());
      this.expectOp(':');
      values.push(this.expression());
    }
    this.closeBracket(open, '}');
    return { type: 'Dict', keys, values, ...this.span(start) };
  }

  // Strings

  /** Adjacent string literals concatenate; any f-string part makes a `JoinedStr`. */
  private strings(): PyExpression {
    const start = this.mark();
    const parts: Token[] = [];
    while (this.peek().type === 'string' || this.peek().type === 'fstring') {
      parts.push(this.advance());
    }
    const span = this.span(start);

    const bytes = parts.filter((part) => part.type === 'string' && part.value.kind === 'bytes');
    if (bytes.length > 0 && bytes.length !== parts.length) {
      throw this.fail('cannot mix bytes and nonbytes literals', parts[0], ['string literal']);
    }
    if (bytes.length > 0) {
      const chunks: Uint8Array[] = [];
      for (const part of parts) {
        if (part.type === 'string' && part.value.kind === 'bytes') chunks.push(part.value.value);
      }
      const joined = new Uint8Array(chunks.reduce((total, chunk) => total + chunk.length, 0));
      let offset = 0;
      for (const chunk of chunks) {
        joined.set(chunk, offset);
        offset += chunk.length;
      }
      return { type: 'Constant', value: { kind: 'bytes', value: joined }, ...span };
    }

    if (!parts.some((part) => part.type === 'fstring')) {
      let text = '';
      for (const part of parts) {
        if (part.type === 'string' && part.value.kind === 'str') text += part.value.value;
      }
      return { type: 'Constant', value: { kind: 'str', value: text }, ...span };
    }

    const values: Array<PyConstant | PyFormattedValue> = [];
    let pending = '';
    const flush = () => {
      if (pending.length === 0) return;
      values.push({ type: 'Constant', value: { kind: 'str', value: pending }, ...span });
      pending = '';
    };
    for (const part of parts) {
      if (part.type === 'string') {
        if (part.value.kind === 'str') pending += part.value.value;
        continue;
      }
      if (part.type !== 'fstring') continue;
      for (const piece of part.parts) {
        if (piece.kind === 'literal') {
          pending += piece.value;
          continue;
        }
        if (piece.debugText !== null) pending += piece.debugText;
        flush();
        values.push(this.formattedValue(piece));
      }
    }
    flush();
    return { type: 'JoinedStr', values, ...span };
  }

  private formattedValue(field: FStringFieldPart): PyFormattedValue {
    const value = new Parser(field.tokens, this.options).fieldExpression(field);
    const conversion =
      field.conversion === -1 && field.debugText !== null && field.formatSpec === null ? 114 : field.conversion;
    const formatSpec = field.formatSpec ? this.formatSpec(field.formatSpec, field) : null;
    return {
      type: 'FormattedValue',
      value,
      conversion,
      formatSpec,
      line: field.line,
      column: field.col,
      endLine: field.endLine,
      endColumn: field.endCol,
    };
  }

  private formatSpec(parts: FStringPart[], field: FStringFieldPart): PyJoinedStr {
    const span = { line: field.line, column: field.col, endLine: field.endLine, endColumn: field.endCol };
    const values = parts.map((part): PyConstant | PyFormattedValue =>
      part.kind === 'literal'
        ? { type: 'Constant', value: { kind: 'str', value: part.value }, ...span }
        : this.formattedValue(part)
    );
    return { type: 'JoinedStr', values, ...span };
  }

  private fieldExpression(field: FStringFieldPart): PyExpression {
    const token = this.peek();
    if (token.type === 'endmarker') {
      throw this.fail("f-string: valid expression required before '}'", token, ['expression'], {
        found: `'${field.expression}'`,
      });
    }
    const value = this.checkKeyword('yield') ? this.yieldExpression() : this.starExpressions();
    const rest = this.peek();
    if (rest.type !== 'endmarker') {
      throw this.fail("f-string: expecting '}'", rest, ["'}'"]);
    }
    return value;
  }
}

/** Name of an expression kind as used in "cannot assign to …" messages. */
export function describeExpression(expr: PyExpression): string {
  switch (expr.type) {
    case 'Constant':
      switch (expr.value.kind) {
        case 'None':
          return 'None';
        case 'bool':
          return expr.value.value ? 'True' : 'False';
        case 'Ellipsis':
          return 'ellipsis';
        default:
          return 'literal';
      }
    case 'BinOp':
    case 'BoolOp':
    case 'UnaryOp':
      return 'expression';
    case 'Compare':
      return 'comparison';
    case 'Call':
      return 'function call';
    case 'Lambda':
      return 'lambda';
    case 'IfExp':
      return 'conditional expression';
    case 'NamedExpr':
      return 'named expression';
    case 'Await':
      return 'await expression';
    case 'Yield':
    case 'YieldFrom':
      return 'yield expression';
    case 'Dict':
      return 'dict literal';
    case 'Set':
      return 'set display';
    case 'ListComp':
      return 'list comprehension';
    case 'SetComp':
      return 'set comprehension';
    case 'DictComp':
      return 'dict comprehension';
    case 'GeneratorExp':
      return 'generator expression';
    case 'JoinedStr':
    case 'FormattedValue':
      return 'f-string expression';
    case 'Starred':
      return 'starred';
    case 'Slice':
      return 'slice';
    case 'Attribute':
      return 'attribute';
    case 'Subscript':
      return 'subscript';
    case 'Name':
      return 'name';
    case 'List':
      return 'list';
    case 'Tuple':
      return 'tuple';
  }
}
