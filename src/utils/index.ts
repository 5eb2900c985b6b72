export { formatLocation, formatSourceError, type FormatErrorOptions } from './format.js';
export { highlightSnippet } from './highlight.js';
export type { Location, Position } from './types.js';
