export { DotenvDocument, escapeValue } from './document.js';
export { parseDocument, ParseError, type ParseOptions } from './parse.js';
export { expand, Expansion, isValidName, type ExpandHooks } from './expand.js';
export { unescape } from './unescape.js';
export { loadDotenvFile, writeDotenvFile } from './file.js';
export type { Span, Definition, RawValue, ValueStyle } from './grammar.js';
