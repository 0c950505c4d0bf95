import { describe, it, expect } from 'vitest';
import { DotenvDocument, escapeValue } from './document.js';
import { parseDocument } from './parse.js';

describe('escapeValue', () => {
  it('should write plain values bare', () => {
    expect(escapeValue('plain')).toBe('plain');
    expect(escapeValue('https://example.com/a?b=c#d')).toBe('https://example.com/a?b=c#d');
    expect(escapeValue('')).toBe('');
  });

  it('should quote any value when asked to', () => {
    expect(escapeValue('plain', true)).toBe('"plain"');
    expect(escapeValue('', true)).toBe('""');
    expect(escapeValue('a$b', true)).toBe('"a\\$b"');
  });

  it('should quote values with whitespace', () => {
    expect(escapeValue('two words')).toBe('"two words"');
    expect(escapeValue(' padded')).toBe('" padded"');
  });

  it('should escape special characters inside quotes', () => {
    expect(escapeValue('a$b')).toBe('"a\\$b"');
    expect(escapeValue('say "hi"')).toBe('"say \\"hi\\""');
    expect(escapeValue("it's")).toBe('"it\\\'s"');
    expect(escapeValue('C:\\dir')).toBe('"C:\\\\dir"');
  });

  it('should read back unchanged', () => {
    const values = ['plain', 'two words', '$HOME', '${A}', 'a\\b', '"quoted"', "'single'", ' x ', '#hash', 'tab\there', ''];
    for (const value of values) {
      const doc = parseDocument(DotenvDocument.empty().replace({ V: value }));
      expect(doc.get('V')).toBe(value);
    }
  });
});

describe('DotenvDocument', () => {
  it('should replace values in place', () => {
    const doc = parseDocument('A=1\nB=2\nC=3\n');
    expect(doc.replace({ C: 'c', A: 'a' })).toBe('A=a\nB=2\nC=c\n');
  });

  it('should keep comments, spacing and export around a replaced value', () => {
    const doc = parseDocument('# config\nexport A="old"  # keep\n\nB=2\n');
    expect(doc.replace({ A: 'new value' })).toBe('# config\nexport A="new value"  # keep\n\nB=2\n');
  });

  it('should keep a comment that follows a closing quote', () => {
    const doc = parseDocument('A="x"#note\nB=\'y\'#other\nC="z" #spaced\n');
    const updated = doc.replace({ A: 'new', B: '', C: 'bare' });

    expect(updated).toBe('A="new"#note\nB=""#other\nC=bare #spaced\n');
    const reparsed = parseDocument(updated);
    expect(reparsed.get('A')).toBe('new');
    expect(reparsed.get('B')).toBe('');
    expect(reparsed.get('C')).toBe('bare');
  });

  it('should replace the last definition of a repeated name', () => {
    const doc = parseDocument('A=1\nA=2\n');
    expect(doc.replace({ A: '3' })).toBe('A=1\nA=3\n');
  });

  it('should append new variables in the order given', () => {
    const doc = parseDocument('A=1\n');
    const edits = new Map([['Z', '26'], ['Y', '25']]);
    expect(doc.replace(edits)).toBe('A=1\nZ=26\nY=25\n');
  });

  it('should add a newline before appending when the file lacks one', () => {
    const doc = parseDocument('A=1');
    expect(doc.replace({ B: '2' })).toBe('A=1\nB=2\n');
  });

  it('should append to an empty document', () => {
    expect(DotenvDocument.empty().replace({ A: '1' })).toBe('A=1\n');
  });

  it('should append referenced variables instead of replacing them', () => {
    const doc = parseDocument('A=1\nB=$A\n');
    const updated = doc.replace({ A: '2' });

    expect(updated).toBe('A=1\nB=$A\nA=2\n');
    const reparsed = parseDocument(updated);
    expect(reparsed.get('A')).toBe('2');
    expect(reparsed.get('B')).toBe('1');
  });

  it('should append variables that refer to later definitions', () => {
    const doc = parseDocument('A=$B\nB=2\n');
    expect(doc.replace({ A: 'x' })).toBe('A=$B\nB=2\nA=x\n');
  });

  it('should return the source unchanged for no edits', () => {
    const doc = parseDocument('# only a comment\nA=1');
    expect(doc.replace({})).toBe('# only a comment\nA=1');
  });

  it('should be idempotent', () => {
    const doc = parseDocument('A=1\nB=$A\n');
    const once = doc.replace({ A: '2', C: 'x y' });
    const twice = parseDocument(once).replace({ A: '2', C: 'x y' });
    expect(parseDocument(twice).parameters).toEqual(parseDocument(once).parameters);
  });

  it('should reject values with line breaks', () => {
    const doc = parseDocument('A=1\n');
    expect(() => doc.replace({ A: 'a\nb' })).toThrow('Value of A contains a line break');
  });

  it('should carry the modification time', () => {
    const modified = new Date('2024-05-01T00:00:00Z');
    const doc = parseDocument('A=1').withLastModified(modified);
    expect(doc.lastModified).toEqual(modified);
    expect(doc.get('A')).toBe('1');
  });
});
