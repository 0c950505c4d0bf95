import type { Span } from './grammar.js';

const NEEDS_QUOTES = /[\\$"'\s]/;
const ESCAPED = /[\\$"']/g;

/**
 * A parsed dotenv file.
 *
 * The document itself is never modified. {@link DotenvDocument.replace}
 * returns new text that can be written back to disk.
 */
export class DotenvDocument {
  constructor(
    /** The original text of the file */
    readonly source: string,
    /** Resolved value of every variable defined in the file */
    readonly parameters: ReadonlyMap<string, string>,
    /** Where the last definition of each replaceable variable's value sits in `source` */
    readonly valueSpans: ReadonlyMap<string, Span>,
    /**
     * Variables that must not be replaced in place. Either a later definition
     * expanded them, or their own value refers to a variable defined further
     * down the file.
     */
    readonly referenced: ReadonlySet<string>,
    /** When the file was last modified, if it was loaded from disk */
    readonly lastModified?: Date,
  ) {}

  static empty(): DotenvDocument {
    return new DotenvDocument('', new Map(), new Map(), new Set());
  }

  get names(): string[] {
    return [...this.parameters.keys()];
  }

  get(name: string): string | undefined {
    return this.parameters.get(name);
  }

  withLastModified(lastModified: Date | undefined): DotenvDocument {
    return new DotenvDocument(
      this.source,
      this.parameters,
      this.valueSpans,
      this.referenced,
      lastModified,
    );
  }

  /**
   * Returns the file's text with the given variables set.
   *
   * Existing variables are replaced in place. New variables, and variables
   * that cannot be replaced in place, are appended to the end of the file.
   * Everything else is left exactly as it was.
   */
  replace(edits: ReadonlyMap<string, string> | Readonly<Record<string, string>>): string {
    const entries = edits instanceof Map ? [...edits.entries()] : Object.entries(edits);
    const replaced: Array<{ span: Span; value: string }> = [];
    const added: Array<[string, string]> = [];

    for (const [name, value] of entries) {
      if (/[\r\n]/.test(value)) {
        throw new Error(`Value of ${name} contains a line break and cannot be written to a dotenv file`);
      }
      const span = this.valueSpans.get(name);
      if (span && !this.referenced.has(name)) {
        replaced.push({ span, value });
      } else {
        added.push([name, value]);
      }
    }

    // Work from the end so earlier offsets stay valid
    replaced.sort((a, b) => b.span.start - a.span.start);
    let content = this.source;
    for (const { span, value } of replaced) {
      // A comment right after a closing quote would join a bare value
      const quote = this.source[span.end] === '#';
      content = content.slice(0, span.start) + escapeValue(value, quote) + content.slice(span.end);
    }

    if (added.length > 0) {
      if (content.length > 0 && !content.endsWith('\n')) {
        content += '\n';
      }
      for (const [name, value] of added) {
        content += `${name}=${escapeValue(value)}\n`;
      }
    }

    return content;
  }
}

/**
 * Formats a value so it reads back unchanged from a dotenv file.
 *
 * Values containing whitespace, `\`, `$`, `"` or `'` are double-quoted, with
 * the last four escaped. Anything else is written bare unless `quote` is set.
 */
export function escapeValue(value: string, quote = false): string {
  if (!quote && !NEEDS_QUOTES.test(value)) {
    return value;
  }
  return `"${value.replace(ESCAPED, '\\$&')}"`;
}
