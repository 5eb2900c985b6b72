export type QuoteStyle = 'double' | 'single';

export interface CodegenOptions {
  /** Spaces per block level. */
  indentWidth: number;
  /** Add a trailing comma after the last element of an exploded display or call. */
  trailingCommas: boolean;
  /** Advisory: lines longer than this get their widest display or call exploded. */
  maxLineLength: number;
  quoteStyle: QuoteStyle;
}

export const defaultCodegenOptions: Readonly<CodegenOptions> = Object.freeze({
  indentWidth: 4,
  trailingCommas: true,
  maxLineLength: 88,
  quoteStyle: 'double',
});

/** Merge `options` over the defaults. Throws `RangeError` on invalid values. */
export function resolveCodegenOptions(options: Partial<CodegenOptions> = {}): CodegenOptions {
  const resolved: CodegenOptions = { ...defaultCodegenOptions };
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) Object.assign(resolved, { [key]: value });
  }

  if (!Number.isInteger(resolved.indentWidth) || resolved.indentWidth < 1 || resolved.indentWidth > 16) {
    throw new RangeError(`indentWidth must be an integer between 1 and 16, got ${String(resolved.indentWidth)}`);
  }
  if (!Number.isInteger(resolved.maxLineLength) || resolved.maxLineLength < 1) {
    throw new RangeError(`maxLineLength must be a positive integer, got ${String(resolved.maxLineLength)}`);
  }
  if (resolved.quoteStyle !== 'double' && resolved.quoteStyle !== 'single') {
    throw new RangeError(`quoteStyle must be 'double' or 'single', got ${String(resolved.quoteStyle)}`);
  }
  if (typeof resolved.trailingCommas !== 'boolean') {
    throw new RangeError(`trailingCommas must be a boolean, got ${String(resolved.trailingCommas)}`);
  }
  return resolved;
}
