import type {
  PyArg,
  PyArguments,
  PyComprehension,
  PyConstant,
  PyExceptHandler,
  PyExpression,
  PyFormattedValue,
  PyJoinedStr,
  PyKeyword,
  PyModule,
  PyPattern,
  PyStatement,
  PyTypeParam,
  PyWithItem,
} from './ast.js';
import { resolveCodegenOptions, type CodegenOptions } from './config.js';
import {
  Precedence,
  binaryOperatorPrecedence,
  binaryOperatorSymbols,
  boolOperatorSymbols,
  compareOperatorSymbols,
  unaryOperatorSymbols,
} from './operators.js';
import { expressionChildren } from './tree.js';

/** Render a module as Python source. Non-empty output ends with a newline. */
export function generate(module: PyModule, options: Partial<CodegenOptions> = {}): string {
  return new PythonGenerator(resolveCodegenOptions(options)).generate(module);
}

/** Render one statement (and its nested blocks) at indentation level zero, without a trailing newline. */
export function generateStatement(statement: PyStatement, options: Partial<CodegenOptions> = {}): string {
  return new PythonGenerator(resolveCodegenOptions(options)).statementText(statement);
}

/** Render one expression; no outer parentheses are added. */
export function generateExpression(expr: PyExpression, options: Partial<CodegenOptions> = {}): string {
  return new PythonGenerator(resolveCodegenOptions(options)).expressionText(expr);
}

const boolPrecedence = { And: Precedence.And, Or: Precedence.Or } as const;

const conversionFlags: Record<number, string> = { 115: '!s', 114: '!r', 97: '!a' };

const nonPrintable = /^[\p{Cc}\p{Cf}\p{Cs}\p{Co}\p{Cn}\p{Zl}\p{Zp}\p{Zs}]$/u;

class PythonGenerator {
  private indentLevel = 0;
  /** Quote characters of the f-strings currently being rendered, outermost first. */
  private readonly enclosingQuotes: string[] = [];
  /** The display or call to render one element per line, if any. */
  private exploded: PyExpression | null = null;
  private readonly preferredQuote: string;
  private readonly alternateQuote: string;

  constructor(private readonly options: CodegenOptions) {
    this.preferredQuote = options.quoteStyle === 'single' ? "'" : '"';
    this.alternateQuote = options.quoteStyle === 'single' ? '"' : "'";
  }

  generate(module: PyModule): string {
    switch (module.type) {
      case 'Module':
      case 'Interactive': {
        const lines = this.statements(module.body);
        return lines.length === 0 ? '' : lines.join('\n') + '\n';
      }
      case 'Expression':
        return this.expr(module.body, Precedence.Test) + '\n';
      case 'FunctionType': {
        const args = module.argtypes.map((arg) => this.expr(arg, Precedence.Test)).join(', ');
        return `(${args}) -> ${this.expr(module.returns, Precedence.Test)}\n`;
      }
    }
  }

  statementText(statement: PyStatement): string {
    return this.statement(statement).join('\n');
  }

  expressionText(expr: PyExpression): string {
    return this.expr(expr, Precedence.NamedExpr);
  }

  // -------------------------------------------------------------------------
  // Layout

  private pad(level = this.indentLevel): string {
    return ' '.repeat(level * this.options.indentWidth);
  }

  private statements(body: PyStatement[]): string[] {
    return body.flatMap((statement) => this.statement(statement));
  }

  private block(body: PyStatement[]): string[] {
    this.indentLevel++;
    try {
      return body.length === 0 ? [`${this.pad()}pass`] : this.statements(body);
    } finally {
      this.indentLevel--;
    }
  }

  /**
   * One padded line. When it overruns `maxLineLength`, the widest display or
   * call reachable from `roots` is rendered one element per line.
   */
  private line(roots: Array<PyExpression | null>, render: () => string): string {
    const flat = render();
    if (this.pad().length + flat.length <= this.options.maxLineLength) {
      return this.pad() + flat;
    }
    const target = this.widestExplodable(roots);
    if (!target) return this.pad() + flat;
    this.exploded = target;
    try {
      return this.pad() + render();
    } finally {
      this.exploded = null;
    }
  }

  private widestExplodable(roots: Array<PyExpression | null>): PyExpression | null {
    const found: PyExpression[] = [];
    const bare = new Set<PyExpression>();
    for (const root of roots) {
      if (root) this.collectExplodable(root, found, bare);
    }
    let widest: PyExpression | null = null;
    let width = -1;
    for (const candidate of found) {
      const length = this.expr(candidate, Precedence.Test).length;
      if (length > width) {
        widest = candidate;
        width = length;
      }
    }
    return widest;
  }

  private collectExplodable(expr: PyExpression, found: PyExpression[], bare: Set<PyExpression>): void {
    if (expr.type === 'JoinedStr') return;
    if (isExplodable(expr) && !bare.has(expr)) found.push(expr);
    if (expr.type === 'Subscript') bare.add(expr.slice);
    if (expr.type === 'ListComp' || expr.type === 'SetComp' || expr.type === 'GeneratorExp' || expr.type === 'DictComp') {
      for (const generator of expr.generators) bare.add(generator.target);
    }
    for (const child of expressionChildren(expr)) {
      this.collectExplodable(child, found, bare);
    }
  }

  /** Bracketed items, flat or one per line when `node` is the exploded one. */
  private bracketed(node: PyExpression, open: string, items: string[], close: string, forceComma = false): string {
    if (node !== this.exploded) {
      return `${open}${items.join(', ')}${forceComma ? ',' : ''}${close}`;
    }
    const inner = this.pad(this.indentLevel + 1);
    const last = items.length - 1;
    const lines = items.map(
      (item, index) => `${inner}${item}${index < last || this.options.trailingCommas || forceComma ? ',' : ''}`
    );
    return `${open}\n${lines.join('\n')}\n${this.pad()}${close}`;
  }

  // -------------------------------------------------------------------------
  // Statements

  private statement(node: PyStatement): string[] {
    switch (node.type) {
      case 'FunctionDef':
      case 'AsyncFunctionDef': {
        const keyword = node.type === 'AsyncFunctionDef' ? 'async def' : 'def';
        const returns = node.returns ? ` -> ${this.expr(node.returns, Precedence.Test)}` : '';
        return [
          ...this.decorators(node.decoratorList),
          `${this.pad()}${keyword} ${node.name}${this.typeParams(node.typeParams)}(${this.arguments(node.args, true)})${returns}:`,
          ...this.block(node.body),
        ];
      }
      case 'ClassDef': {
        const bases = [
          ...node.bases.map((base) => this.expr(base, Precedence.Test)),
          ...node.keywords.map((keyword) => this.keyword(keyword)),
        ];
        const parenthesized = bases.length > 0 ? `(${bases.join(', ')})` : '';
        return [
          ...this.decorators(node.decoratorList),
          `${this.pad()}class ${node.name}${this.typeParams(node.typeParams)}${parenthesized}:`,
          ...this.block(node.body),
        ];
      }
      case 'Return': {
        const { value } = node;
        return [this.line([value], () => (value ? `return ${this.expr(value, Precedence.Test)}` : 'return'))];
      }
      case 'Delete':
        return [this.line(node.targets, () => `del ${node.targets.map((target) => this.expr(target, Precedence.Test)).join(', ')}`)];
      case 'Assign':
        return [
          this.line([node.value], () => {
            const targets = node.targets.map((target) => `${this.target(target)} = `).join('');
            return `${targets}${this.expr(node.value, Precedence.Yield)}`;
          }),
        ];
      case 'AugAssign':
        return [
          this.line(
            [node.value],
            () => `${this.expr(node.target, Precedence.Test)} ${binaryOperatorSymbols[node.op]}= ${this.expr(node.value, Precedence.Yield)}`
          ),
        ];
      case 'AnnAssign':
        return [
          this.line([node.annotation, node.value], () => {
            let target = this.expr(node.target, Precedence.Test);
            if (!node.simple && node.target.type === 'Name') target = `(${target})`;
            const value = node.value ? ` = ${this.expr(node.value, Precedence.Yield)}` : '';
            return `${target}: ${this.expr(node.annotation, Precedence.Test)}${value}`;
          }),
        ];
      case 'For':
      case 'AsyncFor': {
        const keyword = node.type === 'AsyncFor' ? 'async for' : 'for';
        return [
          this.line([node.iter], () => `${keyword} ${this.target(node.target)} in ${this.expr(node.iter, Precedence.Test)}:`),
          ...this.block(node.body),
          ...this.elseClause(node.orelse),
        ];
      }
      case 'While':
        return [
          this.line([node.test], () => `while ${this.expr(node.test, Precedence.NamedExpr)}:`),
          ...this.block(node.body),
          ...this.elseClause(node.orelse),
        ];
      case 'If':
        return this.ifChain(node.test, node.body, node.orelse);
      case 'With':
      case 'AsyncWith': {
        const keyword = node.type === 'AsyncWith' ? 'async with' : 'with';
        const roots = node.items.map((item) => item.contextExpr);
        return [
          this.line(roots, () => `${keyword} ${node.items.map((item) => this.withItem(item)).join(', ')}:`),
          ...this.block(node.body),
        ];
      }
      case 'Match': {
        const lines = [this.line([node.subject], () => `match ${this.expr(node.subject, Precedence.NamedExpr)}:`)];
        this.indentLevel++;
        try {
          for (const matchCase of node.cases) {
            const guard = matchCase.guard ? ` if ${this.expr(matchCase.guard, Precedence.NamedExpr)}` : '';
            lines.push(`${this.pad()}case ${this.pattern(matchCase.pattern)}${guard}:`, ...this.block(matchCase.body));
          }
        } finally {
          this.indentLevel--;
        }
        return lines;
      }
      case 'Raise': {
        const { exc, cause } = node;
        return [
          this.line([exc, cause], () => {
            if (!exc) return 'raise';
            const from = cause ? ` from ${this.expr(cause, Precedence.Test)}` : '';
            return `raise ${this.expr(exc, Precedence.Test)}${from}`;
          }),
        ];
      }
      case 'Try':
      case 'TryStar': {
        const lines = [`${this.pad()}try:`, ...this.block(node.body)];
        for (const handler of node.handlers) {
          lines.push(...this.handler(handler, node.type === 'TryStar'));
        }
        lines.push(...this.elseClause(node.orelse));
        if (node.finalbody.length > 0) {
          lines.push(`${this.pad()}finally:`, ...this.block(node.finalbody));
        }
        return lines;
      }
      case 'Assert': {
        const { msg } = node;
        return [
          this.line([node.test, msg], () => {
            const message = msg ? `, ${this.expr(msg, Precedence.Test)}` : '';
            return `assert ${this.expr(node.test, Precedence.Test)}${message}`;
          }),
        ];
      }
      case 'Import':
        return [`${this.pad()}import ${node.names.map((alias) => aliasText(alias.name, alias.asname)).join(', ')}`];
      case 'ImportFrom': {
        const source = '.'.repeat(node.level) + (node.module ?? '');
        const names = node.names.map((alias) => aliasText(alias.name, alias.asname)).join(', ');
        return [`${this.pad()}from ${source} import ${names}`];
      }
      case 'Global':
        return [`${this.pad()}global ${node.names.join(', ')}`];
      case 'Nonlocal':
        return [`${this.pad()}nonlocal ${node.names.join(', ')}`];
      case 'Expr':
        return [this.line([node.value], () => this.expr(node.value, Precedence.Yield))];
      case 'Pass':
        return [`${this.pad()}pass`];
      case 'Break':
        return [`${this.pad()}break`];
      case 'Continue':
        return [`${this.pad()}continue`];
      case 'TypeAlias':
        return [
          this.line(
            [node.value],
            () => `type ${node.name.id}${this.typeParams(node.typeParams)} = ${this.expr(node.value, Precedence.Test)}`
          ),
        ];
      case 'Blank':
        return Array.from({ length: node.count }, () => '');
    }
  }

  private decorators(decorators: PyExpression[]): string[] {
    return decorators.map((decorator) => this.line([decorator], () => `@${this.expr(decorator, Precedence.NamedExpr)}`));
  }

  private ifChain(test: PyExpression, body: PyStatement[], orelse: PyStatement[], keyword = 'if'): string[] {
    const lines = [this.line([test], () => `${keyword} ${this.expr(test, Precedence.NamedExpr)}:`), ...this.block(body)];
    const [only] = orelse;
    if (orelse.length === 1 && only.type === 'If') {
      return [...lines, ...this.ifChain(only.test, only.body, only.orelse, 'elif')];
    }
    return [...lines, ...this.elseClause(orelse)];
  }

  private elseClause(orelse: PyStatement[]): string[] {
    return orelse.length === 0 ? [] : [`${this.pad()}else:`, ...this.block(orelse)];
  }

  private handler(handler: PyExceptHandler, star: boolean): string[] {
    const keyword = star ? 'except*' : 'except';
    const { exceptionType } = handler;
    const header = this.line([exceptionType], () => {
      if (!exceptionType) return `${keyword}:`;
      const name = handler.name ? ` as ${handler.name}` : '';
      return `${keyword} ${this.expr(exceptionType, Precedence.Test)}${name}:`;
    });
    return [header, ...this.block(handler.body)];
  }

  private withItem(item: PyWithItem): string {
    let context = this.expr(item.contextExpr, Precedence.Test);
    // A parenthesized tuple here would read as a group of items.
    if (item.contextExpr.type === 'Tuple') context = `(${context})`;
    return item.optionalVars ? `${context} as ${this.expr(item.optionalVars, Precedence.BitOr)}` : context;
  }

  /** Assignment and loop targets: a tuple is written without parentheses. */
  private target(target: PyExpression): string {
    if (target.type !== 'Tuple' || target.elts.length === 0) {
      return this.expr(target, Precedence.Test);
    }
    const elts = target.elts.map((elt) => this.expr(elt, Precedence.Test));
    return elts.length === 1 ? `${elts[0]},` : elts.join(', ');
  }

  private typeParams(params: PyTypeParam[]): string {
    if (params.length === 0) return '';
    const rendered = params.map((param) => {
      const defaultValue = param.defaultValue ? ` = ${this.expr(param.defaultValue, Precedence.Test)}` : '';
      switch (param.type) {
        case 'TypeVar': {
          const bound = param.bound ? `: ${this.expr(param.bound, Precedence.Test)}` : '';
          return `${param.name}${bound}${defaultValue}`;
        }
        case 'TypeVarTuple':
          return `*${param.name}${defaultValue}`;
        case 'ParamSpec':
          return `**${param.name}${defaultValue}`;
      }
    });
    return `[${rendered.join(', ')}]`;
  }

  private arguments(args: PyArguments, annotations: boolean): string {
    const parts: string[] = [];
    const positional = [...args.posonlyargs, ...args.args];
    const firstDefault = positional.length - args.defaults.length;
    positional.forEach((arg, index) => {
      parts.push(this.parameter(arg, annotations, index >= firstDefault ? args.defaults[index - firstDefault] : null));
      if (index === args.posonlyargs.length - 1) parts.push('/');
    });
    if (args.vararg) {
      parts.push(`*${this.parameter(args.vararg, annotations, null)}`);
    } else if (args.kwonlyargs.length > 0) {
      parts.push('*');
    }
    args.kwonlyargs.forEach((arg, index) => {
      parts.push(this.parameter(arg, annotations, args.kwDefaults[index] ?? null));
    });
    if (args.kwarg) parts.push(`**${this.parameter(args.kwarg, annotations, null)}`);
    return parts.join(', ');
  }

  private parameter(arg: PyArg, annotations: boolean, defaultValue: PyExpression | null): string {
    const annotated = annotations && arg.annotation !== null;
    let text = arg.arg;
    if (annotations && arg.annotation) text += `: ${this.expr(arg.annotation, Precedence.Test)}`;
    if (defaultValue) text += `${annotated ? ' = ' : '='}${this.expr(defaultValue, Precedence.Test)}`;
    return text;
  }

  private keyword(keyword: PyKeyword): string {
    const value = this.expr(keyword.value, Precedence.Test);
    return keyword.arg === null ? `**${value}` : `${keyword.arg}=${value}`;
  }

  // -------------------------------------------------------------------------
  // Patterns

  private pattern(node: PyPattern): string {
    switch (node.type) {
      case 'MatchValue':
        return this.expr(node.value, Precedence.Test);
      case 'MatchSingleton':
        return node.value === null ? 'None' : node.value ? 'True' : 'False';
      case 'MatchSequence':
        return `[${node.patterns.map((pattern) => this.pattern(pattern)).join(', ')}]`;
      case 'MatchMapping': {
        const entries = node.keys.map((key, index) => `${this.expr(key, Precedence.Test)}: ${this.pattern(node.patterns[index])}`);
        if (node.rest !== null) entries.push(`**${node.rest}`);
        return `{${entries.join(', ')}}`;
      }
      case 'MatchClass': {
        const args = [
          ...node.patterns.map((pattern) => this.pattern(pattern)),
          ...node.kwdAttrs.map((attr, index) => `${attr}=${this.pattern(node.kwdPatterns[index])}`),
        ];
        return `${this.expr(node.cls, Precedence.Atom)}(${args.join(', ')})`;
      }
      case 'MatchStar':
        return `*${node.name ?? '_'}`;
      case 'MatchAs':
        if (!node.pattern) return node.name ?? '_';
        return `${this.closedPattern(node.pattern, false)} as ${node.name ?? '_'}`;
      case 'MatchOr':
        return node.patterns.map((pattern) => this.closedPattern(pattern, true)).join(' | ');
    }
  }

  /** Group `as` bindings, and or-patterns when `alternative`, so they nest unchanged. */
  private closedPattern(node: PyPattern, alternative: boolean): string {
    const text = this.pattern(node);
    if ((node.type === 'MatchAs' && node.pattern) || (alternative && node.type === 'MatchOr')) {
      return `(${text})`;
    }
    return text;
  }

  // -------------------------------------------------------------------------
  // Expressions

  /** Render `node`, parenthesized when it binds looser than `required`. */
  private expr(node: PyExpression, required: Precedence): string {
    const text = this.bareExpr(node);
    return precedenceOf(node) < required ? `(${text})` : text;
  }

  private bareExpr(node: PyExpression): string {
    switch (node.type) {
      case 'BoolOp': {
        const operand = boolPrecedence[node.op] + 1;
        return node.values.map((value) => this.expr(value, operand)).join(` ${boolOperatorSymbols[node.op]} `);
      }
      case 'NamedExpr':
        return `${this.expr(node.target, Precedence.Atom)} := ${this.expr(node.value, Precedence.Test)}`;
      case 'BinOp': {
        const precedence = binaryOperatorPrecedence[node.op];
        const symbol = binaryOperatorSymbols[node.op];
        if (node.op === 'Pow') {
          return `${this.expr(node.left, Precedence.Await)} ${symbol} ${this.expr(node.right, Precedence.Factor)}`;
        }
        return `${this.expr(node.left, precedence)} ${symbol} ${this.expr(node.right, precedence + 1)}`;
      }
      case 'UnaryOp':
        if (node.op === 'Not') return `not ${this.expr(node.operand, Precedence.Not)}`;
        return `${unaryOperatorSymbols[node.op]}${this.expr(node.operand, Precedence.Factor)}`;
      case 'Lambda': {
        const args = this.arguments(node.args, false);
        return `lambda${args ? ` ${args}` : ''}: ${this.expr(node.body, Precedence.Test)}`;
      }
      case 'IfExp':
        return `${this.expr(node.body, Precedence.Or)} if ${this.expr(node.test, Precedence.Or)} else ${this.expr(node.orelse, Precedence.Test)}`;
      case 'Dict': {
        const entries = node.keys.map((key, index) => {
          const value = node.values[index];
          return key ? `${this.expr(key, Precedence.Test)}: ${this.expr(value, Precedence.Test)}` : `**${this.expr(value, Precedence.BitOr)}`;
        });
        return this.bracketed(node, '{', entries, '}');
      }
      case 'Set':
        // `{}` is a dict; an empty set has no display.
        if (node.elts.length === 0) return 'set()';
        return this.bracketed(node, '{', this.elements(node.elts), '}');
      case 'List':
        return this.bracketed(node, '[', this.elements(node.elts), ']');
      case 'Tuple':
        return this.bracketed(node, '(', this.elements(node.elts), ')', node.elts.length === 1);
      case 'ListComp':
        return `[${this.expr(node.elt, Precedence.Test)}${this.comprehensions(node.generators)}]`;
      case 'SetComp':
        return `{${this.expr(node.elt, Precedence.Test)}${this.comprehensions(node.generators)}}`;
      case 'DictComp':
        return `{${this.expr(node.key, Precedence.Test)}: ${this.expr(node.value, Precedence.Test)}${this.comprehensions(node.generators)}}`;
      case 'GeneratorExp':
        return `(${this.generatorBody(node.elt, node.generators)})`;
      case 'Await':
        return `await ${this.expr(node.value, Precedence.Atom)}`;
      case 'Yield':
        return node.value ? `yield ${this.expr(node.value, Precedence.Test)}` : 'yield';
      case 'YieldFrom':
        return `yield from ${this.expr(node.value, Precedence.Test)}`;
      case 'Compare': {
        let text = this.expr(node.left, Precedence.BitOr);
        node.ops.forEach((op, index) => {
          text += ` ${compareOperatorSymbols[op]} ${this.expr(node.comparators[index], Precedence.BitOr)}`;
        });
        return text;
      }
      case 'Call': {
        const func = this.expr(node.func, Precedence.Atom);
        const [only] = node.args;
        if (node.args.length === 1 && node.keywords.length === 0 && only.type === 'GeneratorExp') {
          return `${func}(${this.generatorBody(only.elt, only.generators)})`;
        }
        const args = [
          ...node.args.map((arg) => this.expr(arg, Precedence.Test)),
          ...node.keywords.map((keyword) => this.keyword(keyword)),
        ];
        return this.bracketed(node, `${func}(`, args, ')');
      }
      case 'FormattedValue':
        return this.joinedStr({ type: 'JoinedStr', values: [node], line: node.line, column: node.column });
      case 'JoinedStr':
        return this.joinedStr(node);
      case 'Constant':
        return this.constant(node);
      case 'Attribute': {
        let value = this.expr(node.value, Precedence.Atom);
        if (node.value.type === 'Constant' && isNumericOrEllipsis(node.value)) value = `(${value})`;
        return `${value}.${node.attr}`;
      }
      case 'Subscript':
        return `${this.expr(node.value, Precedence.Atom)}[${this.subscript(node.slice)}]`;
      case 'Starred':
        return `*${this.expr(node.value, Precedence.BitOr)}`;
      case 'Name':
        return node.id;
      case 'Slice': {
        const lower = node.lower ? this.expr(node.lower, Precedence.Test) : '';
        const upper = node.upper ? this.expr(node.upper, Precedence.Test) : '';
        const step = node.step ? `:${this.expr(node.step, Precedence.Test)}` : '';
        return `${lower}:${upper}${step}`;
      }
    }
  }

  private elements(elts: PyExpression[]): string[] {
    return elts.map((elt) => this.expr(elt, Precedence.Test));
  }

  private subscript(slice: PyExpression): string {
    if (slice.type !== 'Tuple' || slice.elts.length === 0) {
      return this.expr(slice, Precedence.Test);
    }
    const elts = this.elements(slice.elts);
    return elts.length === 1 ? `${elts[0]},` : elts.join(', ');
  }

  private generatorBody(elt: PyExpression, generators: PyComprehension[]): string {
    return `${this.expr(elt, Precedence.Test)}${this.comprehensions(generators)}`;
  }

  private comprehensions(generators: PyComprehension[]): string {
    return generators
      .map((generator) => {
        const keyword = generator.isAsync ? ' async for ' : ' for ';
        const ifs = generator.ifs.map((test) => ` if ${this.expr(test, Precedence.Or)}`).join('');
        return `${keyword}${this.target(generator.target)} in ${this.expr(generator.iter, Precedence.Or)}${ifs}`;
      })
      .join('');
  }

  // -------------------------------------------------------------------------
  // Literals

  private constant(node: PyConstant): string {
    const { value } = node;
    switch (value.kind) {
      case 'None':
        return 'None';
      case 'Ellipsis':
        return '...';
      case 'bool':
        return value.value ? 'True' : 'False';
      case 'int':
        return value.value.toString();
      case 'float':
        return floatRepr(value.value);
      case 'complex':
        return complexRepr(value.value.real, value.value.imag);
      case 'str': {
        const quote = this.chooseQuote(value.value, 1);
        return `${quote}${escapeString(value.value, this.escapedQuotes(quote))}${quote}`;
      }
      case 'bytes': {
        const quote = this.chooseQuote(Array.from(value.value, (byte) => String.fromCharCode(byte)).join(''), 1);
        return `b${quote}${escapeBytes(value.value, this.escapedQuotes(quote))}${quote}`;
      }
    }
  }

  /**
   * A quote no enclosing f-string's quote rules out, leaving room for
   * `depth - 1` more nested literals. Single quotes come before triple ones;
   * the preferred before the alternate unless only the alternate avoids escaping.
   */
  private chooseQuote(text: string, depth: number): string {
    const candidates = [this.preferredQuote, this.alternateQuote, this.preferredQuote.repeat(3), this.alternateQuote.repeat(3)];
    const usable = candidates.filter(
      (quote) =>
        quoteAllowed(quote, this.enclosingQuotes) && nestingCapacity([...this.enclosingQuotes, quote]) >= depth - 1
    );
    const [first, second] = usable;
    if (first === undefined) return this.preferredQuote;
    if (second !== undefined && text.includes(first[0]) && !text.includes(second[0])) return second;
    return first;
  }

  /** Characters to backslash-escape inside a literal delimited by `quote`. */
  private escapedQuotes(quote: string): string[] {
    return [quote, ...this.enclosingQuotes].map((delimiter) => delimiter[0]);
  }

  private joinedStr(node: PyJoinedStr): string {
    const literalText = node.values.map((part) => (part.type === 'Constant' && part.value.kind === 'str' ? part.value.value : '')).join('');
    const quote = this.chooseQuote(literalText, quoteDepth(node));
    const escaped = this.escapedQuotes(quote);
    this.enclosingQuotes.push(quote);
    try {
      const body = node.values.map((part) => this.fstringPart(part, escaped, false)).join('');
      return `f${quote}${body}${quote}`;
    } finally {
      this.enclosingQuotes.pop();
    }
  }

  private fstringPart(part: PyConstant | PyFormattedValue, escaped: string[], inSpec: boolean): string {
    if (part.type === 'FormattedValue') return this.field(part, escaped);
    if (part.value.kind !== 'str') return `{${this.constant(part)}}`;
    const text = escapeString(part.value.value, escaped);
    return inSpec ? text : text.replace(/[{}]/g, '$&$&');
  }

  private field(node: PyFormattedValue, escaped: string[]): string {
    let text = this.expr(node.value, Precedence.Or);
    if (text.startsWith('{')) text = ` ${text}`;
    const conversion = conversionFlags[node.conversion] ?? '';
    const spec = node.formatSpec ? `:${node.formatSpec.values.map((part) => this.fstringPart(part, escaped, true)).join('')}` : '';
    return `{${text}${conversion}${spec}}`;
  }
}

const quoteDelimiters = ["'", '"', "'''", '"""'];

/** A literal opened with `quote` would end an enclosing one opened with `outer`. */
function quoteAllowed(quote: string, enclosing: readonly string[]): boolean {
  return enclosing.every((outer) => quote[0] !== outer[0] || (quote.length === 1 && outer.length === 3));
}

/** How many more literals can nest inside f-strings delimited by `enclosing`. */
function nestingCapacity(enclosing: readonly string[]): number {
  let best = 0;
  for (const quote of quoteDelimiters) {
    if (quoteAllowed(quote, enclosing)) best = Math.max(best, 1 + nestingCapacity([...enclosing, quote]));
  }
  return best;
}

/** Levels of quoted literals `expr` renders as, counting itself. */
function quoteDepth(expr: PyExpression): number {
  switch (expr.type) {
    case 'Constant':
      return expr.value.kind === 'str' || expr.value.kind === 'bytes' ? 1 : 0;
    case 'JoinedStr':
      return 1 + Math.max(0, ...expr.values.map((part) => (part.type === 'FormattedValue' ? fieldDepth(part) : 0)));
    case 'FormattedValue':
      return 1 + fieldDepth(expr);
    default:
      return Math.max(0, ...expressionChildren(expr).map(quoteDepth));
  }
}

function fieldDepth(field: PyFormattedValue): number {
  const specDepths = (field.formatSpec?.values ?? []).map((part) => (part.type === 'FormattedValue' ? fieldDepth(part) : 0));
  return Math.max(quoteDepth(field.value), ...specDepths);
}

function precedenceOf(node: PyExpression): Precedence {
  switch (node.type) {
    case 'NamedExpr':
      return Precedence.NamedExpr;
    case 'Yield':
    case 'YieldFrom':
      return Precedence.Yield;
    case 'Lambda':
    case 'IfExp':
      return Precedence.Test;
    case 'BoolOp':
      return boolPrecedence[node.op];
    case 'UnaryOp':
      return node.op === 'Not' ? Precedence.Not : Precedence.Factor;
    case 'Compare':
      return Precedence.Compare;
    case 'BinOp':
      return binaryOperatorPrecedence[node.op];
    case 'Await':
      return Precedence.Await;
    case 'Constant':
      return isNegativeNumber(node) ? Precedence.Factor : Precedence.Atom;
    default:
      return Precedence.Atom;
  }
}

function isExplodable(node: PyExpression): boolean {
  switch (node.type) {
    case 'List':
    case 'Tuple':
    case 'Set':
      return node.elts.length > 0;
    case 'Dict':
      return node.keys.length > 0;
    case 'Call': {
      const [only] = node.args;
      const soleGenerator = node.args.length === 1 && node.keywords.length === 0 && only.type === 'GeneratorExp';
      return node.args.length + node.keywords.length > 0 && !soleGenerator;
    }
    default:
      return false;
  }
}

function isNegativeNumber(node: PyConstant): boolean {
  const { value } = node;
  switch (value.kind) {
    case 'int':
      return value.value < 0n;
    case 'float':
      return value.value < 0 || Object.is(value.value, -0);
    case 'complex':
      return value.value.real === 0 && (value.value.imag < 0 || Object.is(value.value.imag, -0));
    default:
      return false;
  }
}

function isNumericOrEllipsis(node: PyConstant): boolean {
  const { kind } = node.value;
  return kind === 'int' || kind === 'float' || kind === 'complex' || kind === 'Ellipsis';
}

function aliasText(name: string, asname: string | null): string {
  return asname ? `${name} as ${asname}` : name;
}

/**
 * Shortest round-tripping text of a float, laid out the way Python's `repr`
 * does: scientific below 1e-4 and from 1e16 on, otherwise fixed with at
 * least one fractional digit.
 */
export function floatRepr(value: number): string {
  if (Number.isNaN(value)) return '(1e309 - 1e309)';
  if (!Number.isFinite(value)) return value > 0 ? '1e309' : '-1e309';
  const sign = value < 0 || Object.is(value, -0) ? '-' : '';
  const [mantissa, exponentText] = Math.abs(value).toExponential().split('e');
  const exponent = Number(exponentText);
  const digits = mantissa.replace('.', '');
  if (exponent < -4 || exponent >= 16) {
    const magnitude = String(Math.abs(exponent)).padStart(2, '0');
    return `${sign}${mantissa}e${exponent < 0 ? '-' : '+'}${magnitude}`;
  }
  if (exponent < 0) return `${sign}0.${'0'.repeat(-exponent - 1)}${digits}`;
  if (digits.length <= exponent + 1) return `${sign}${digits}${'0'.repeat(exponent + 1 - digits.length)}.0`;
  return `${sign}${digits.slice(0, exponent + 1)}.${digits.slice(exponent + 1)}`;
}

function imaginaryRepr(imag: number): string {
  if (Number.isNaN(imag)) return '(1e309j - 1e309j)';
  const text = floatRepr(imag);
  return `${text.endsWith('.0') ? text.slice(0, -2) : text}j`;
}

function complexRepr(real: number, imag: number): string {
  if (real === 0 && !Object.is(real, -0)) return imaginaryRepr(imag);
  const negative = imag < 0 || Object.is(imag, -0);
  const magnitude = imaginaryRepr(negative ? -imag : imag);
  return `(${floatRepr(real)} ${negative ? '-' : '+'} ${magnitude})`;
}

function hex(code: number, width: number): string {
  return code.toString(16).padStart(width, '0');
}

/** Escape `value` for a string literal delimited by any of `quotes`. */
export function escapeString(value: string, quotes: string[]): string {
  let out = '';
  for (const ch of value) {
    if (ch === '\\') out += '\\\\';
    else if (quotes.includes(ch)) out += `\\${ch}`;
    else if (ch === '\n') out += '\\n';
    else if (ch === '\r') out += '\\r';
    else if (ch === '\t') out += '\\t';
    else if (ch !== ' ' && nonPrintable.test(ch)) {
      const code = ch.codePointAt(0) ?? 0;
      if (code < 0x100) out += `\\x${hex(code, 2)}`;
      else if (code < 0x10000) out += `\\u${hex(code, 4)}`;
      else out += `\\U${hex(code, 8)}`;
    } else out += ch;
  }
  return out;
}

function escapeBytes(value: Uint8Array, quotes: string[]): string {
  let out = '';
  for (const byte of value) {
    const ch = String.fromCharCode(byte);
    if (ch === '\\') out += '\\\\';
    else if (quotes.includes(ch)) out += `\\${ch}`;
    else if (ch === '\n') out += '\\n';
    else if (ch === '\r') out += '\\r';
    else if (ch === '\t') out += '\\t';
    else if (byte >= 0x20 && byte < 0x7f) out += ch;
    else out += `\\x${hex(byte, 2)}`;
  }
  return out;
}
