import { describe, it, expect } from 'vitest';
import { unescape } from './unescape.js';

const run = (text: string): string => [...unescape(text)].join('');

describe('unescape', () => {
  it('should pass plain text through', () => {
    expect(run('hello world')).toBe('hello world');
  });

  it('should drop the backslash before any character', () => {
    expect(run('a\\bc')).toBe('abc');
    expect(run('\\$HOME')).toBe('$HOME');
    expect(run('say \\"hi\\"')).toBe('say "hi"');
  });

  it('should keep an escaped backslash', () => {
    expect(run('C:\\\\dir')).toBe('C:\\dir');
  });

  it('should drop a trailing lone backslash', () => {
    expect(run('abc\\')).toBe('abc');
  });

  it('should be lazy', () => {
    const iter = unescape(['\\', 'x', 'y']);
    expect(iter.next()).toEqual({ done: false, value: 'x' });
    expect(iter.next()).toEqual({ done: false, value: 'y' });
    expect(iter.next().done).toBe(true);
  });
});
