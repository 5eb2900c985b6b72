import type { Conversion, ConstantValue } from './ast.js';

export type TokenType =
  | 'name'
  | 'keyword'
  | 'number'
  | 'string'
  | 'fstring'
  | 'op'
  | 'newline'
  | 'indent'
  | 'dedent'
  | 'endmarker';

interface BaseToken {
  type: TokenType;
  text: string;
  offset: number;
  line: number;
  col: number;
  endLine: number;
  endCol: number;
}

export interface NameToken extends BaseToken {
  type: 'name';
}

export interface KeywordToken extends BaseToken {
  type: 'keyword';
}

export type NumberValue = Extract<ConstantValue, { kind: 'int' | 'float' | 'complex' }>;

export interface NumberToken extends BaseToken {
  type: 'number';
  value: NumberValue;
}

export interface StringToken extends BaseToken {
  type: 'string';
  /** Lower-cased prefix letters, e.g. `''`, `'rb'`. */
  prefix: string;
  value: Extract<ConstantValue, { kind: 'str' | 'bytes' }>;
}

export interface FStringLiteralPart {
  kind: 'literal';
  value: string;
}

export interface FStringFieldPart {
  kind: 'field';
  /** Tokens of the interpolated expression, terminated by an `endmarker`. */
  tokens: Token[];
  /** Source text of the expression, used for `{expr=}` fields. */
  expression: string;
  /** Text echoed by a self-documenting `{expr=}` field, including the `=`. */
  debugText: string | null;
  conversion: Conversion;
  formatSpec: FStringPart[] | null;
  offset: number;
  line: number;
  col: number;
  endLine: number;
  endCol: number;
}

export type FStringPart = FStringLiteralPart | FStringFieldPart;

export interface FStringToken extends BaseToken {
  type: 'fstring';
  prefix: string;
  parts: FStringPart[];
}

export interface OpToken extends BaseToken {
  type: 'op';
}

export interface NewlineToken extends BaseToken {
  type: 'newline';
}

export interface IndentToken extends BaseToken {
  type: 'indent';
}

export interface DedentToken extends BaseToken {
  type: 'dedent';
}

export interface EndMarkerToken extends BaseToken {
  type: 'endmarker';
}

export type Token =
  | NameToken
  | KeywordToken
  | NumberToken
  | StringToken
  | FStringToken
  | OpToken
  | NewlineToken
  | IndentToken
  | DedentToken
  | EndMarkerToken;

/** Reserved everywhere. `match`, `case`, `type` and `_` are deliberately absent. */
export const hardKeywords = [
  'False', 'None', 'True', 'and', 'as', 'assert', 'async', 'await',
  'break', 'class', 'continue', 'def', 'del', 'elif', 'else', 'except',
  'finally', 'for', 'from', 'global', 'if', 'import', 'in', 'is',
  'lambda', 'nonlocal', 'not', 'or', 'pass', 'raise', 'return', 'try',
  'while', 'with', 'yield',
];

export const softKeywords = ['match', 'case', 'type', '_'];

export const operators = [
  '**=', '//=', '>>=', '<<=', '...',
  '!=', '%=', '&=', '**', '*=', '+=', '-=', '->', '//', '/=', ':=',
  '<<', '<=', '==', '>=', '>>', '@=', '^=', '|=',
  '%', '&', '(', ')', '*', '+', ',', '-', '.', '/', ':', ';',
  '<', '=', '>', '@', '[', ']', '^', '{', '|', '}', '~',
];

export const openingBrackets: Record<string, string> = { '(': ')', '[': ']', '{': '}' };
export const closingBrackets: Record<string, string> = { ')': '(', ']': '[', '}': '{' };

/** Human-readable description of a token for error messages. */
export function describeToken(token: Token): string {
  switch (token.type) {
    case 'newline':
      return 'newline';
    case 'indent':
      return 'indent';
    case 'dedent':
      return 'dedent';
    case 'endmarker':
      return 'end of input';
    case 'string':
    case 'fstring':
      return 'string literal';
    case 'number':
      return `number '${token.text}'`;
    default:
      return `'${token.text}'`;
  }
}

export function isOp(token: Token, text: string): boolean {
  return token.type === 'op' && token.text === text;
}

export function isKeyword(token: Token, text: string): boolean {
  return token.type === 'keyword' && token.text === text;
}
