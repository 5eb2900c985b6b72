import type { Location } from './types.js';
import chalk from 'chalk';

/**
 * Show the line at `location` between its neighbours, with a caret under the
 * reported span:
 *
 * ```
 * 1: if x > 3
 *            ^
 * 2:     print(x)
 * ```
 */
export function highlightSnippet(input: string, location: Location, useColor = true): string {
  const lines = input.split(/\r\n|\r|\n/);
  const { start, end } = location;
  const lineNum = start.line;

  if (lineNum < 1 || lineNum > lines.length) return '';

  const first = Math.max(1, lineNum - 1);
  const last = Math.min(lines.length, lineNum + 1);
  const width = String(last).length;
  const prefix = (line: number) => `${String(line).padStart(width)}: `;

  const caretWidth = end.line === lineNum ? Math.max(1, end.column - start.column) : 1;
  const pointer = ' '.repeat(prefix(lineNum).length + start.column - 1) + '^'.repeat(caretWidth);

  const result: string[] = [];
  for (let line = first; line <= last; line++) {
    const text = lines[line - 1];
    if (line === lineNum) {
      result.push(prefix(line) + (useColor ? chalk.redBright(text) : text));
      result.push(useColor ? chalk.yellow(pointer) : pointer);
    } else {
      result.push(prefix(line) + text);
    }
  }
  return result.join('\n');
}

