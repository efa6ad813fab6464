import { describe, expect, it } from 'vitest';
import { INVALID_BYTE_BASE, decodeForgiving, encodeSurrogatePass, roundTripForgiving } from '../src/codec/utf8.js';

const invalid = (...bytes: number[]): string => String.fromCodePoint(...bytes.map((b) => INVALID_BYTE_BASE + b));

describe('decodeForgiving', () => {
  it('decodes well-formed sequences of every length', () => {
    expect(decodeForgiving(Uint8Array.from([0x61, 0x62]))).toBe('ab');
    expect(decodeForgiving(Uint8Array.from([0xc3, 0xa9]))).toBe('é');
    expect(decodeForgiving(Uint8Array.from([0xe2, 0x82, 0xac]))).toBe('€');
    expect(decodeForgiving(Uint8Array.from([0xf0, 0x9f, 0x98, 0x80]))).toBe('😀');
  });

  it('maps a stray byte into the private-use range', () => {
    expect(decodeForgiving(Uint8Array.from([0x61, 0xff, 0x62]))).toBe('a' + invalid(0xff) + 'b');
  });

  it('remaps every byte of a truncated sequence', () => {
    expect(decodeForgiving(Uint8Array.from([0xe2, 0x82]))).toBe(invalid(0xe2, 0x82));
    expect(decodeForgiving(Uint8Array.from([0x61, 0xc2]))).toBe('a' + invalid(0xc2));
  });

  it('rejects overlong forms', () => {
    expect(decodeForgiving(Uint8Array.from([0xc0, 0xaf]))).toBe(invalid(0xc0, 0xaf));
    expect(decodeForgiving(Uint8Array.from([0xe0, 0x80, 0x80]))).toBe(invalid(0xe0, 0x80, 0x80));
    expect(decodeForgiving(Uint8Array.from([0xf0, 0x80, 0x80, 0x80]))).toBe(invalid(0xf0, 0x80, 0x80, 0x80));
  });

  it('rejects encoded surrogates and code points above U+10FFFF', () => {
    expect(decodeForgiving(Uint8Array.from([0xed, 0xa0, 0x80]))).toBe(invalid(0xed, 0xa0, 0x80));
    expect(decodeForgiving(Uint8Array.from([0xf4, 0x90, 0x80, 0x80]))).toBe(invalid(0xf4, 0x90, 0x80, 0x80));
  });

  it('accepts the last code point before each boundary', () => {
    expect(decodeForgiving(Uint8Array.from([0xed, 0x9f, 0xbf]))).toBe(String.fromCodePoint(0xd7ff));
    expect(decodeForgiving(Uint8Array.from([0xf4, 0x8f, 0xbf, 0xbf]))).toBe(String.fromCodePoint(0x10ffff));
  });
});

describe('encodeSurrogatePass', () => {
  it('encodes ordinary text as UTF-8', () => {
    expect([...encodeSurrogatePass('aé😀')]).toEqual([0x61, 0xc3, 0xa9, 0xf0, 0x9f, 0x98, 0x80]);
  });

  it('writes a lone surrogate as a three-byte sequence', () => {
    expect([...encodeSurrogatePass('\ud800')]).toEqual([0xed, 0xa0, 0x80]);
    expect([...encodeSurrogatePass('x\udfff')]).toEqual([0x78, 0xed, 0xbf, 0xbf]);
  });
});

describe('roundTripForgiving', () => {
  it('leaves valid text unchanged', () => {
    expect(roundTripForgiving('héllo <p>')).toBe('héllo <p>');
  });

  it('turns a lone surrogate into the bytes the engine would report', () => {
    expect(roundTripForgiving('a\ud800b')).toBe('a' + invalid(0xed, 0xa0, 0x80) + 'b');
  });
});
