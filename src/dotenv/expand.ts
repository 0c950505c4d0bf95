/**
 * Bash-style parameter expansion over a character stream.
 *
 * Supports `$NAME` and `${NAME}`. Undefined and malformed names expand to
 * nothing. Substituted values are emitted as-is and never re-scanned.
 */

export interface ExpandHooks {
  /** Called with each name that was substituted. */
  onExpand?: (name: string) => void;
  /** Called with each well-formed name that had no value. */
  onMissing?: (name: string) => void;
}

type State =
  | { kind: 'normal' }
  | { kind: 'escape' }
  | { kind: 'buffered'; value: string[]; index: number }
  | { kind: 'start' }
  | { kind: 'braced'; name: string; invalid: boolean }
  | { kind: 'unbraced'; name: string };

export function isNameStart(c: string): boolean {
  return c === '_' || /^\p{Alphabetic}$/u.test(c);
}

export function isNameChar(c: string): boolean {
  return isNameStart(c) || isDigit(c);
}

function isDigit(c: string): boolean {
  return c >= '0' && c <= '9';
}

/**
 * Whether `name` is a well-formed parameter name.
 */
export function isValidName(name: string): boolean {
  return /^[\p{Alphabetic}_][\p{Alphabetic}_0-9]*$/u.test(name);
}

/**
 * Iterator wrapper with one character of lookahead.
 */
class Peekable {
  private peeked: IteratorResult<string> | undefined;

  constructor(private readonly inner: Iterator<string>) {}

  next(): string | undefined {
    const result = this.peeked ?? this.inner.next();
    this.peeked = undefined;
    return result.done ? undefined : result.value;
  }

  nextIf(predicate: (c: string) => boolean): string | undefined {
    this.peeked ??= this.inner.next();
    if (this.peeked.done || !predicate(this.peeked.value)) {
      return undefined;
    }
    return this.next();
  }
}

export class Expansion implements IterableIterator<string> {
  private readonly input: Peekable;
  private state: State = { kind: 'normal' };

  constructor(
    chars: Iterable<string>,
    private readonly parameters: ReadonlyMap<string, string>,
    private readonly hooks: ExpandHooks = {},
  ) {
    this.input = new Peekable(chars[Symbol.iterator]());
  }

  [Symbol.iterator](): IterableIterator<string> {
    return this;
  }

  next(): IteratorResult<string, undefined> {
    for (;;) {
      const state = this.state;
      switch (state.kind) {
        case 'normal': {
          const c = this.input.next();
          if (c === undefined) {
            return { done: true, value: undefined };
          }
          if (c === '$') {
            this.state = { kind: 'start' };
            continue;
          }
          if (c === '\\') {
            this.state = { kind: 'escape' };
            continue;
          }
          return { done: false, value: c };
        }

        case 'escape': {
          // The backslash stays; unescaping is the caller's job
          const value = ['\\'];
          const c = this.input.next();
          if (c !== undefined) {
            value.push(c);
          }
          this.state = { kind: 'buffered', value, index: 0 };
          continue;
        }

        case 'buffered': {
          if (state.index < state.value.length) {
            return { done: false, value: state.value[state.index++] };
          }
          this.state = { kind: 'normal' };
          continue;
        }

        case 'start': {
          if (this.input.nextIf(c => c === '{') !== undefined) {
            this.state = { kind: 'braced', name: '', invalid: false };
            continue;
          }
          const c = this.input.nextIf(isNameStart);
          if (c !== undefined) {
            this.state = { kind: 'unbraced', name: c };
            continue;
          }
          // Lone '$'
          this.state = { kind: 'normal' };
          return { done: false, value: '$' };
        }

        case 'braced': {
          const c = this.input.nextIf(isNameChar);
          if (c !== undefined) {
            state.name += c;
            continue;
          }
          if (this.input.nextIf(ch => ch === '}') !== undefined) {
            this.state = state.invalid
              ? { kind: 'normal' }
              : this.substitute(state.name);
            continue;
          }
          if (this.input.next() !== undefined) {
            state.invalid = true;
            continue;
          }
          // Unterminated: give back what was matched
          this.state = { kind: 'buffered', value: ['$', '{', ...state.name], index: 0 };
          continue;
        }

        case 'unbraced': {
          const c = this.input.nextIf(isNameChar);
          if (c !== undefined) {
            state.name += c;
            continue;
          }
          this.state = this.substitute(state.name);
          continue;
        }
      }
    }
  }

  private substitute(name: string): State {
    const value = this.parameters.get(name);
    if (value === undefined) {
      if (isValidName(name)) {
        this.hooks.onMissing?.(name);
      }
      return { kind: 'normal' };
    }
    this.hooks.onExpand?.(name);
    return { kind: 'buffered', value: [...value], index: 0 };
  }
}

/**
 * Expands parameter references in `chars` using `parameters`.
 */
export function expand(
  chars: Iterable<string>,
  parameters: ReadonlyMap<string, string>,
  hooks?: ExpandHooks,
): Expansion {
  return new Expansion(chars, parameters, hooks);
}
