// src/index.ts
// Public entry: tokenizer, parser, code generator and their error reporting.

// Tokenization
export { tokenize, normalizeNewlines, type TokenizeOptions } from './python/lexer.js';
export {
  describeToken,
  hardKeywords,
  softKeywords,
  type Token,
  type TokenType,
  type NameToken,
  type KeywordToken,
  type NumberToken,
  type NumberValue,
  type StringToken,
  type FStringToken,
  type FStringPart,
  type FStringLiteralPart,
  type FStringFieldPart,
  type OpToken,
  type NewlineToken,
  type IndentToken,
  type DedentToken,
  type EndMarkerToken,
} from './python/tokens.js';

// Parsing
export {
  parse,
  parseTokens,
  parseExpression,
  Parser,
  type ParseMode,
  type ParseOptions,
  type ParseTokensOptions,
} from './python/parser.js';
export { createConsoleTracer, type ParserTracer, type TraceEvent, type TraceEventType, type ConsoleTracerOptions } from './python/tracer.js';

// Code generation
export { generate, generateExpression, generateStatement } from './python/codegen.js';
export { defaultCodegenOptions, resolveCodegenOptions, type CodegenOptions, type QuoteStyle } from './python/config.js';
export { roundTrip, type RoundTripOptions, type RoundTripResult } from './python/round-trip.js';

// Tree
export type * from './python/ast.js';
export { Precedence } from './python/operators.js';
export { stripPositions, structurallyEqual, nodeLocation, walkStatements, expressionChildren, type PlainValue } from './python/tree.js';

// Errors and diagnostics
export {
  SourceError,
  TokenizeError,
  ParseError,
  isSourceError,
  type SourceSpan,
  type TokenizeErrorKind,
  type ParseErrorDetails,
} from './python/errors.js';
export { toDiagnostic, diagnosticCode, type Diagnostic, type DiagnosticSeverity } from './python/diagnostics.js';
export { formatSourceError, formatLocation, highlightSnippet, type FormatErrorOptions, type Location, type Position } from './utils/index.js';
