import type { PyModule } from './ast.js';
import { generate } from './codegen.js';
import type { CodegenOptions } from './config.js';
import { parse, type ParseOptions } from './parser.js';
import { structurallyEqual } from './tree.js';

export interface RoundTripOptions extends ParseOptions, Partial<CodegenOptions> {}

export interface RoundTripResult {
  /** Source regenerated from the first parse. */
  code: string;
  /** Whether reparsing `code` gives a tree equal to the first, positions aside. */
  equivalent: boolean;
  module: PyModule;
}

/** Parse, regenerate, reparse and compare. Errors from the first parse propagate. */
export function roundTrip(source: string, options: RoundTripOptions = {}): RoundTripResult {
  const { mode, sourceFile, tracer, ...codegen } = options;
  const module = parse(source, { mode, sourceFile, tracer });
  const code = generate(module, codegen);
  const reparsed = parse(code, { mode, sourceFile });
  return { code, equivalent: structurallyEqual(module, reparsed), module };
}
