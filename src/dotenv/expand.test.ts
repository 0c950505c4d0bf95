import { describe, it, expect, vi } from 'vitest';
import { expand, isValidName } from './expand.js';

function run(text: string, params: Record<string, string> = {}): string {
  return [...expand(text, new Map(Object.entries(params)))].join('');
}

describe('expand', () => {
  it('should substitute unbraced and braced names', () => {
    expect(run('$A/${B}', { A: 'x', B: 'y' })).toBe('x/y');
  });

  it('should substitute adjacent references', () => {
    expect(run('$A$A', { A: 'x' })).toBe('xx');
  });

  it('should end an unbraced name at the first non-name character', () => {
    expect(run('$A-$A.txt', { A: 'x' })).toBe('x-x.txt');
    expect(run('$def2 $3abc', { def2: 'b' })).toBe('b $3abc');
  });

  it('should accept unicode letters in names', () => {
    expect(run('$ñame', { ñame: 'v' })).toBe('v');
  });

  it('should expand unknown names to nothing', () => {
    expect(run('a${A}b')).toBe('ab');
    expect(run('a$Ab')).toBe('a');
  });

  it('should keep a lone dollar sign', () => {
    expect(run('$')).toBe('$');
    expect(run('cost: $5')).toBe('cost: $5');
    expect(run('$ $')).toBe('$ $');
  });

  it('should give back an unterminated brace', () => {
    expect(run('${A', { A: 'x' })).toBe('${A');
    expect(run('x${')).toBe('x${');
  });

  it('should discard a braced reference with invalid characters', () => {
    expect(run('a${A-B}c', { A: 'x' })).toBe('ac');
    expect(run('}}{abc}{{abc${abc{}}$}')).toBe('}}{abc}{{abc}$}');
  });

  it('should leave escapes in place without expanding them', () => {
    expect(run('\\$A', { A: 'x' })).toBe('\\$A');
    expect(run('\\\\$A', { A: 'x' })).toBe('\\\\x');
  });

  it('should not rescan substituted values', () => {
    expect(run('$A', { A: '$B', B: 'x' })).toBe('$B');
  });

  it('should report expanded and missing names', () => {
    const onExpand = vi.fn();
    const onMissing = vi.fn();
    const params = new Map([['A', 'x']]);

    const result = [...expand('$A ${A} $B ${C-D}', params, { onExpand, onMissing })].join('');

    expect(result).toBe('x x  ');
    expect(onExpand.mock.calls).toEqual([['A'], ['A']]);
    expect(onMissing.mock.calls).toEqual([['B']]);
  });
});

describe('isValidName', () => {
  it('should accept letters, digits and underscores not starting with a digit', () => {
    expect(isValidName('API_KEY')).toBe(true);
    expect(isValidName('_x1')).toBe(true);
    expect(isValidName('1x')).toBe(false);
    expect(isValidName('A-B')).toBe(false);
    expect(isValidName('')).toBe(false);
  });
});
