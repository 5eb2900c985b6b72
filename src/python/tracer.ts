import { createColors } from 'colorette';
import type { Location } from '../utils/types.js';

export type TraceEventType = 'enter' | 'backtrack' | 'fail';

export interface TraceEvent {
  type: TraceEventType;
  rule: string;
  result?: unknown;
  location: Location;
}

export interface ParserTracer {
  trace(event: TraceEvent): void;
}

export interface ConsoleTracerOptions {
  useColors?: boolean;
  write?: (line: string) => void;
}

/**
 * Tracer that prints one line per event, e.g. `enter     if at 3:1`.
 * Failures append the error message.
 */
export function createConsoleTracer(options: ConsoleTracerOptions = {}): ParserTracer {
  const colors = createColors({ useColor: options.useColors ?? true });
  const write = options.write ?? ((line: string) => console.log(line));
  const paint: Record<TraceEventType, (text: string) => string> = {
    enter: colors.cyan,
    backtrack: colors.yellow,
    fail: colors.red,
  };

  return {
    trace(event) {
      const { line, column } = event.location.start;
      let output = `${paint[event.type](event.type.padEnd(9))} ${event.rule} ${colors.dim(`at ${line}:${column}`)}`;
      if (event.result !== undefined) {
        output += ` ${colors.gray(String(event.result))}`;
      }
      write(output);
    },
  };
}
