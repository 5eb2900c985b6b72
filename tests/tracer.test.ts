import { createConsoleTracer, parse } from '../src/index.js';
import type { TraceEvent } from '../src/index.js';

const collect = () => {
  const events: TraceEvent[] = [];
  return { events, tracer: { trace: (event: TraceEvent) => events.push(event) } };
};

describe('parser tracing', () => {
  test('reports each statement rule as it is entered', () => {
    const { events, tracer } = collect();
    parse('if x:\n    pass\n', { tracer });
    expect(events.map((event) => [event.type, event.rule, event.location.start.line, event.location.start.column])).toEqual([
      ['enter', 'if', 1, 1],
      ['enter', 'pass', 2, 5],
    ]);
  });

  test('reports the failure and backtrack of a soft keyword used as a name', () => {
    const { events, tracer } = collect();
    parse('match = 5\n', { tracer });
    expect(events.map((event) => event.type)).toEqual(['fail', 'backtrack']);
    expect(events[0]).toMatchObject({ rule: 'syntax', result: 'expected expression' });
    expect(events[1]).toMatchObject({ rule: 'match', location: { start: { line: 1, column: 1 } } });
  });

  test('is silent without a tracer', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    parse('match = 5\n');
    expect(log).not.toHaveBeenCalled();
    log.mockRestore();
  });
});

describe('createConsoleTracer', () => {
  test('writes one plain line per event', () => {
    const lines: string[] = [];
    const tracer = createConsoleTracer({ useColors: false, write: (line) => lines.push(line) });
    parse('if x:\n    pass\n', { tracer });
    parse('match = 5\n', { tracer });
    expect(lines).toEqual([
      'enter     if at 1:1',
      'enter     pass at 2:5',
      'fail      syntax at 1:7 expected expression',
      'backtrack match at 1:1',
    ]);
  });

  test('prints to the console by default', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    createConsoleTracer({ useColors: false }).trace({
      type: 'enter',
      rule: 'while',
      location: { start: { line: 3, column: 1, offset: 0 }, end: { line: 3, column: 6, offset: 5 } },
    });
    expect(log).toHaveBeenCalledWith('enter     while at 3:1');
    log.mockRestore();
  });
});
