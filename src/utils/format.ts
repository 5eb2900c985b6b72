import { createColors } from 'colorette';
import type { Location } from './types.js';
import { highlightSnippet } from './highlight.js';
import { ParseError, isSourceError } from '../python/errors.js';

export interface FormatErrorOptions {
  useColors?: boolean;
  /** Source text for the snippet when the error does not carry it. */
  source?: string;
}

export function formatLocation(location: Location): string {
  const { start, end } = location;
  return start.line === end.line && start.column === end.column
    ? `Line ${start.line}, Col ${start.column}`
    : `Line ${start.line}, Col ${start.column} → Line ${end.line}, Col ${end.column}`;
}

/**
 * Multi-line report for anything thrown by `tokenize` or `parse`: message,
 * location, expected and found tokens, a source snippet and the suggestion.
 */
export function formatSourceError(err: unknown, options: FormatErrorOptions = {}): string {
  const colors = createColors({ useColor: options.useColors ?? true });

  if (!isSourceError(err)) {
    const message = err instanceof Error ? err.message : String(err);
    return `${colors.red('❌ Error:')} ${message}`;
  }

  const parts: string[] = [`${colors.red(`❌ ${err.name}:`)} ${err.message}`];
  const where = err.sourceFile ? `${err.sourceFile}, ${formatLocation(err.location)}` : formatLocation(err.location);
  parts.push(`${colors.blue('↪ at')} ${where}`);

  if (err instanceof ParseError) {
    if (err.expected.length > 0) {
      parts.push(`${colors.yellow('Expected:')} ${err.expected.join(', ')}`);
    }
    parts.push(`${colors.yellow('Found:')} "${err.found}"`);
  }

  const input = err instanceof ParseError && err.input !== undefined ? err.input : options.source;
  if (input !== undefined) {
    const snippet = highlightSnippet(input, err.location, options.useColors ?? true);
    if (snippet) parts.push(`\n${colors.dim('--- Snippet ---')}\n${snippet}`);
  }

  if (err.suggestion) {
    parts.push(`\n${colors.cyan('💡 Suggestion:')} ${err.suggestion}`);
  }
  return parts.join('\n');
}
