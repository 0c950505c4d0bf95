/**
 * Removes one layer of backslash escaping from a character stream.
 *
 * `\x` yields `x` for any character `x`. A lone trailing backslash is dropped.
 */
export function* unescape(chars: Iterable<string>): Generator<string, void, undefined> {
  let escaped = false;
  for (const c of chars) {
    if (!escaped && c === '\\') {
      escaped = true;
      continue;
    }
    escaped = false;
    yield c;
  }
}
