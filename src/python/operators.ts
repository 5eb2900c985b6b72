export type BinaryOperator =
  | 'Add'
  | 'Sub'
  | 'Mult'
  | 'MatMult'
  | 'Div'
  | 'Mod'
  | 'Pow'
  | 'LShift'
  | 'RShift'
  | 'BitOr'
  | 'BitXor'
  | 'BitAnd'
  | 'FloorDiv';

export type UnaryOperator = 'Invert' | 'Not' | 'UAdd' | 'USub';

export type BoolOperator = 'And' | 'Or';

export type CompareOperator = 'Eq' | 'NotEq' | 'Lt' | 'LtE' | 'Gt' | 'GtE' | 'Is' | 'IsNot' | 'In' | 'NotIn';

export type ExprContext = 'Load' | 'Store' | 'Del';

export const binaryOperatorSymbols: Record<BinaryOperator, string> = {
  Add: '+',
  Sub: '-',
  Mult: '*',
  MatMult: '@',
  Div: '/',
  Mod: '%',
  Pow: '**',
  LShift: '<<',
  RShift: '>>',
  BitOr: '|',
  BitXor: '^',
  BitAnd: '&',
  FloorDiv: '//',
};

export const unaryOperatorSymbols: Record<UnaryOperator, string> = {
  Invert: '~',
  Not: 'not',
  UAdd: '+',
  USub: '-',
};

export const boolOperatorSymbols: Record<BoolOperator, string> = {
  And: 'and',
  Or: 'or',
};

export const compareOperatorSymbols: Record<CompareOperator, string> = {
  Eq: '==',
  NotEq: '!=',
  Lt: '<',
  LtE: '<=',
  Gt: '>',
  GtE: '>=',
  Is: 'is',
  IsNot: 'is not',
  In: 'in',
  NotIn: 'not in',
};

/** Augmented assignment token (`+=`) to the operator it applies. */
export const augmentedAssignOperators: Record<string, BinaryOperator> = {
  '+=': 'Add',
  '-=': 'Sub',
  '*=': 'Mult',
  '@=': 'MatMult',
  '/=': 'Div',
  '%=': 'Mod',
  '**=': 'Pow',
  '<<=': 'LShift',
  '>>=': 'RShift',
  '|=': 'BitOr',
  '^=': 'BitXor',
  '&=': 'BitAnd',
  '//=': 'FloorDiv',
};

/**
 * Binding strength of each expression form, loosest first. The generator
 * compares a child's level with the level its slot requires to decide on
 * parentheses.
 */
export enum Precedence {
  NamedExpr = 1,
  Tuple,
  Yield,
  Test,
  Or,
  And,
  Not,
  Compare,
  BitOr,
  BitXor,
  BitAnd,
  Shift,
  Arith,
  Term,
  Factor,
  Power,
  Await,
  Atom,
}

export const binaryOperatorPrecedence: Record<BinaryOperator, Precedence> = {
  BitOr: Precedence.BitOr,
  BitXor: Precedence.BitXor,
  BitAnd: Precedence.BitAnd,
  LShift: Precedence.Shift,
  RShift: Precedence.Shift,
  Add: Precedence.Arith,
  Sub: Precedence.Arith,
  Mult: Precedence.Term,
  MatMult: Precedence.Term,
  Div: Precedence.Term,
  Mod: Precedence.Term,
  FloorDiv: Precedence.Term,
  Pow: Precedence.Power,
};
