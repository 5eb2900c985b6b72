import { ParseError, TokenizeError, isSourceError } from './errors.js';
import type { Location } from '../utils/types.js';

export type DiagnosticSeverity = 'error' | 'warning' | 'info';

export interface Diagnostic {
  /** `PY-LEX-<KIND>` for tokenizer errors, `PY-SYNTAX` for parse errors, `PY-INTERNAL` otherwise. */
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  range: {
    start: { line: number; column: number };
    end: { line: number; column: number };
  };
  sourceFile: string;
  context?: string;
  suggestion?: string;
}

const fallbackLocation: Location = {
  start: { line: 1, column: 1, offset: 0 },
  end: { line: 1, column: 1, offset: 0 },
};

export function diagnosticCode(error: unknown): string {
  if (error instanceof TokenizeError) return `PY-LEX-${error.kind.toUpperCase()}`;
  if (error instanceof ParseError) return 'PY-SYNTAX';
  return 'PY-INTERNAL';
}

/**
 * Normalize anything thrown by `tokenize`/`parse` into a diagnostic record
 * with a two-line context excerpt:
 *
 * ```
 *   1 | if x > 3
 *     |         ^
 * ```
 */
export function toDiagnostic(error: unknown, source: string, sourceFile?: string): Diagnostic {
  const location = isSourceError(error) ? error.location : fallbackLocation;
  const message = error instanceof Error ? error.message : String(error);
  const file = sourceFile ?? (isSourceError(error) ? error.sourceFile : undefined) ?? 'inline';

  const { start, end } = location;
  const lines = source.split(/\r\n|\r|\n/);
  const targetLine = lines[Math.max(0, start.line - 1)] ?? '';
  const indent = ' '.repeat(Math.max(0, start.column - 1));
  const pointerWidth = end.line === start.line ? Math.max(1, end.column - start.column) : 1;
  const context = [
    `${String(start.line).padStart(3)} | ${targetLine}`,
    `    | ${indent}${'^'.repeat(pointerWidth)}`,
  ].join('\n');

  const diagnostic: Diagnostic = {
    code: diagnosticCode(error),
    severity: 'error',
    message,
    range: {
      start: { line: start.line, column: start.column },
      end: { line: end.line, column: end.column },
    },
    sourceFile: file,
    context,
  };
  if (isSourceError(error) && error.suggestion) diagnostic.suggestion = error.suggestion;
  return diagnostic;
}
