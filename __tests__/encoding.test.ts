import { describe, expect, it } from 'vitest';
import { normalizeEncodingLabel, parseEncodingFixture } from '../src/corpus/encoding.js';

describe('parseEncodingFixture', () => {
  it('reads every block, the first one included', () => {
    const raw = '#data\n<meta charset="iso-8859-2">\n#encoding\nISO-8859-2\n\n#data\nabc\n#encoding\nwindows-1252\n';
    expect(parseEncodingFixture(raw)).toEqual([
      { index: 0, input: '<meta charset="iso-8859-2">', expectedLabel: 'ISO-8859-2' },
      { index: 1, input: 'abc', expectedLabel: 'windows-1252' },
    ]);
  });

  it('keeps multi-line input', () => {
    expect(parseEncodingFixture('#data\na\nb\n#encoding\nutf-8\n')[0].input).toBe('a\nb');
  });

  it('rejects a block without #encoding', () => {
    expect(() => parseEncodingFixture('#data\nabc\n', 'tests1.dat')).toThrow(
      'tests1.dat: block 0: malformed block: missing #encoding'
    );
  });
});

describe('normalizeEncodingLabel', () => {
  it('case-folds and collapses aliases', () => {
    expect(normalizeEncodingLabel(' UTF8 ')).toBe('utf-8');
    expect(normalizeEncodingLabel('ISO-8859-1')).toBe('windows-1252');
    expect(normalizeEncodingLabel('Shift_JIS')).toBe('shift_jis');
  });
});
