/**
 * Line grammar for dotenv files.
 *
 * Recognizes blank lines, comments, optional `export `, and `NAME=VALUE`
 * definitions with unquoted, single-quoted or double-quoted values. Values
 * are returned raw, with their source spans; resolving them is left to the
 * document parser.
 */

/**
 * A range of the source text, in UTF-16 code units (string indices), so that
 * `source.slice(start, end)` is the spanned text.
 */
export interface Span {
  /** Offset of the first character */
  start: number;
  /** Offset one past the last character */
  end: number;
}

export type ValueStyle = 'unquoted' | 'single' | 'double';

export interface RawValue {
  style: ValueStyle;
  /** Source text of the value, including any quotes */
  text: string;
  span: Span;
}

export interface Definition {
  name: string;
  exported: boolean;
  value: RawValue;
}

export class ParseError extends Error {
  constructor(
    readonly reason: string,
    readonly line: number,
    readonly column: number,
    readonly file?: string,
  ) {
    super(`${file ? `${file}:` : ''}${line}:${column}: ${reason}`);
    this.name = 'ParseError';
  }
}

const NAME_PATTERN = /[\p{Alphabetic}_][\p{Alphabetic}_0-9]*/uy;

class Scanner {
  pos = 0;

  constructor(
    private readonly source: string,
    private readonly file?: string,
  ) {}

  get done(): boolean {
    return this.pos >= this.source.length;
  }

  peek(offset = 0): string | undefined {
    return this.source[this.pos + offset];
  }

  atEol(): boolean {
    const c = this.peek();
    return c === undefined || c === '\n' || (c === '\r' && this.peek(1) === '\n');
  }

  isLineBreak(c: string | undefined): boolean {
    return c === undefined || c === '\n' || c === '\r';
  }

  skipInlineWhitespace(): boolean {
    const start = this.pos;
    while (this.peek() === ' ' || this.peek() === '\t') {
      this.pos++;
    }
    return this.pos > start;
  }

  skipComment(): void {
    while (!this.atEol()) {
      this.pos++;
    }
  }

  consumeEol(): void {
    if (this.peek() === '\r') this.pos++;
    if (this.peek() === '\n') this.pos++;
  }

  matchName(): string | undefined {
    NAME_PATTERN.lastIndex = this.pos;
    const match = NAME_PATTERN.exec(this.source);
    if (!match) return undefined;
    this.pos += match[0].length;
    return match[0];
  }

  slice(start: number, end: number): string {
    return this.source.slice(start, end);
  }

  startsWith(text: string): boolean {
    return this.source.startsWith(text, this.pos);
  }

  error(reason: string, at = this.pos): ParseError {
    const before = this.source.slice(0, at);
    const line = before.split('\n').length;
    const column = at - (before.lastIndexOf('\n') + 1) + 1;
    return new ParseError(reason, line, column, this.file);
  }
}

/**
 * Parses `source` into its variable definitions, in source order.
 *
 * @throws {ParseError} if the text does not follow the grammar
 */
export function parseDefinitions(source: string, file?: string): Definition[] {
  const scanner = new Scanner(source, file);
  const definitions: Definition[] = [];

  while (!scanner.done) {
    scanner.skipInlineWhitespace();

    if (scanner.peek() !== '#' && !scanner.atEol()) {
      definitions.push(parseDefinition(scanner));
      scanner.skipInlineWhitespace();
    }

    if (scanner.peek() === '#') {
      scanner.skipComment();
    }

    if (!scanner.atEol()) {
      throw scanner.error(`Unexpected character ${JSON.stringify(scanner.peek())}`);
    }
    scanner.consumeEol();
  }

  return definitions;
}

function parseDefinition(scanner: Scanner): Definition {
  let exported = false;
  if (scanner.startsWith('export') && (scanner.peek(6) === ' ' || scanner.peek(6) === '\t')) {
    scanner.pos += 'export'.length;
    scanner.skipInlineWhitespace();
    exported = true;
  }

  const name = scanner.matchName();
  if (name === undefined) {
    throw scanner.error('Expected a variable name');
  }
  if (scanner.peek() !== '=') {
    throw scanner.error(`Expected '=' after ${name}`);
  }
  scanner.pos++;

  return { name, exported, value: parseValue(scanner) };
}

function parseValue(scanner: Scanner): RawValue {
  const start = scanner.pos;
  const first = scanner.peek();

  if (first === '"') {
    scanner.pos++;
    for (;;) {
      const c = scanner.peek();
      if (scanner.isLineBreak(c)) {
        throw scanner.error('Unterminated double-quoted value', start);
      }
      if (c === '"') break;
      if (c === '\\') {
        if (scanner.isLineBreak(scanner.peek(1))) {
          throw scanner.error('Unterminated double-quoted value', start);
        }
        scanner.pos++;
      }
      scanner.pos++;
    }
    scanner.pos++;
    return raw(scanner, 'double', start);
  }

  if (first === "'") {
    scanner.pos++;
    while (scanner.peek() !== "'") {
      if (scanner.isLineBreak(scanner.peek())) {
        throw scanner.error('Unterminated single-quoted value', start);
      }
      scanner.pos++;
    }
    scanner.pos++;
    return raw(scanner, 'single', start);
  }

  for (;;) {
    const c = scanner.peek();
    if (scanner.isLineBreak(c) || c === ' ' || c === '\t') break;
    if (c === '"' || c === "'") {
      throw scanner.error('Unexpected quote in unquoted value');
    }
    if (c === '\\' && !scanner.isLineBreak(scanner.peek(1))) {
      scanner.pos++;
    }
    scanner.pos++;
  }
  return raw(scanner, 'unquoted', start);
}

function raw(scanner: Scanner, style: ValueStyle, start: number): RawValue {
  const end = scanner.pos;
  return { style, text: scanner.slice(start, end), span: { start, end } };
}
