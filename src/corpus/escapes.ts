/**
 * One layer of backslash-escape decoding for `doubleEscaped` tokenizer tests
 */

import { roundTripForgiving } from '../codec/utf8.js';
import { CorpusFormatError } from '../errors.js';

const SIMPLE_ESCAPES: Record<string, string> = {
  '\\': '\\',
  "'": "'",
  '"': '"',
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
  '\n': '',
};

function isSurrogate(cp: number): boolean {
  return cp >= 0xd800 && cp <= 0xdfff;
}

const HEX_DIGITS = /^[0-9a-fA-F]+$/;
const OCTAL_DIGIT = /[0-7]/;

/**
 * Decode `\\`, `\n`, `\xhh`, `\uXXXX`, `\UXXXXXXXX`, octal and friends.
 * Unknown escapes keep their backslash.
 *
 * An escaped surrogate is written as the engine reports it back: one
 * invalid-byte code point per byte of its surrogate-pass encoding. Two
 * escaped halves therefore stay two separate code units and never join into
 * a pair. `\N{NAME}` needs the Unicode name table, which the runtime does not
 * carry, so it is a format error.
 */
export function decodeBackslashEscapes(text: string): string {
  let out = '';
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    if (ch !== '\\') {
      out += ch;
      i += 1;
      continue;
    }

    if (i + 1 >= text.length) {
      throw new CorpusFormatError('\\ at end of string');
    }

    const next = text[i + 1];
    const simple = SIMPLE_ESCAPES[next];
    if (simple !== undefined) {
      out += simple;
      i += 2;
      continue;
    }

    if (next === 'x' || next === 'u' || next === 'U') {
      const width = next === 'x' ? 2 : next === 'u' ? 4 : 8;
      const digits = text.slice(i + 2, i + 2 + width);
      if (digits.length !== width || !HEX_DIGITS.test(digits)) {
        throw new CorpusFormatError(`truncated \\${next}${'X'.repeat(width)} escape`);
      }
      const cp = Number.parseInt(digits, 16);
      if (cp > 0x10ffff) {
        throw new CorpusFormatError(`escape \\${next}${digits} is out of range`);
      }
      out += isSurrogate(cp) ? roundTripForgiving(String.fromCharCode(cp)) : String.fromCodePoint(cp);
      i += 2 + width;
      continue;
    }

    if (OCTAL_DIGIT.test(next)) {
      let j = i + 1;
      let digits = '';
      while (j < text.length && digits.length < 3 && OCTAL_DIGIT.test(text[j])) {
        digits += text[j];
        j += 1;
      }
      out += String.fromCodePoint(Number.parseInt(digits, 8));
      i = j;
      continue;
    }

    if (next === 'N') {
      throw new CorpusFormatError('\\N{...} escapes are not supported');
    }

    out += ch + next;
    i += 2;
  }

  return out;
}
