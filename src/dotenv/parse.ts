import { DotenvDocument } from './document.js';
import { expand } from './expand.js';
import { parseDefinitions, type RawValue, type Span } from './grammar.js';
import { unescape } from './unescape.js';

export { ParseError } from './grammar.js';

export interface ParseOptions {
  /** File name reported in parse errors */
  file?: string;
}

/**
 * Parses dotenv text into a document.
 *
 * Values are resolved top to bottom: a value can only expand variables
 * defined above it. When a name is defined more than once, the last
 * definition wins.
 *
 * @throws {ParseError} if the text is not a valid dotenv file
 */
export function parseDocument(source: string, options: ParseOptions = {}): DotenvDocument {
  const parameters = new Map<string, string>();
  const valueSpans = new Map<string, Span>();
  const referenced = new Set<string>();
  // Names each variable's current definition asked for before they existed
  const forwardRefs = new Map<string, Set<string>>();

  for (const definition of parseDefinitions(source, options.file)) {
    const { name } = definition;
    const missing = new Set<string>();
    const value = resolveValue(definition.value, parameters, referenced, missing);

    // A redefinition starts fresh, even when it refers to itself
    referenced.delete(name);
    missing.delete(name);
    parameters.set(name, value);
    valueSpans.set(name, definition.value.span);
    forwardRefs.set(name, missing);

    for (const [definer, names] of forwardRefs) {
      if (definer !== name && names.has(name)) {
        referenced.add(definer);
      }
    }
  }

  for (const name of referenced) {
    valueSpans.delete(name);
  }

  return new DotenvDocument(source, parameters, valueSpans, referenced);
}

function resolveValue(
  value: RawValue,
  parameters: ReadonlyMap<string, string>,
  referenced: Set<string>,
  missing: Set<string>,
): string {
  switch (value.style) {
    case 'single':
      return value.text.slice(1, -1);
    case 'double':
      return substitute(value.text.slice(1, -1), parameters, referenced, missing);
    case 'unquoted':
      return substitute(value.text, parameters, referenced, missing);
  }
}

function substitute(
  text: string,
  parameters: ReadonlyMap<string, string>,
  referenced: Set<string>,
  missing: Set<string>,
): string {
  const expanded = expand(text, parameters, {
    onExpand: name => referenced.add(name),
    onMissing: name => missing.add(name),
  });
  return [...unescape(expanded)].join('');
}
