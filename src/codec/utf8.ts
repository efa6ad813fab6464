/**
 * Forgiving UTF-8 codec
 *
 * Mirrors the engine's decoder: every byte that does not start or continue a
 * well-formed sequence decodes to its own private-use code point
 * (U+EE000 + byte) instead of failing. Inputs and expectations are
 * round-tripped through this codec so they compare equal to engine output.
 */

/** First code point of the range that invalid bytes are remapped into. */
export const INVALID_BYTE_BASE = 0xee000;

function isContinuation(byte: number): boolean {
  return byte >= 0x80 && byte <= 0xbf;
}

/**
 * Decode bytes, remapping each invalid byte into the private-use range
 */
export function decodeForgiving(bytes: Uint8Array): string {
  const codePoints: number[] = [];
  const n = bytes.length;
  let i = 0;

  while (i < n) {
    const b0 = bytes[i];

    if (b0 < 0x80) {
      codePoints.push(b0);
      i += 1;
      continue;
    }

    if (b0 >= 0xc2 && b0 <= 0xdf && i + 1 < n) {
      const b1 = bytes[i + 1];
      if (isContinuation(b1)) {
        codePoints.push(((b0 & 0x1f) << 6) | (b1 & 0x3f));
        i += 2;
        continue;
      }
    }

    if (b0 >= 0xe0 && b0 <= 0xef && i + 2 < n) {
      const b1 = bytes[i + 1];
      const b2 = bytes[i + 2];
      let ok = isContinuation(b1) && isContinuation(b2);
      if (ok && b0 === 0xe0) ok = b1 >= 0xa0;
      // 0xED 0xA0..0xBF would encode a surrogate
      if (ok && b0 === 0xed) ok = b1 <= 0x9f;
      if (ok) {
        codePoints.push(((b0 & 0x0f) << 12) | ((b1 & 0x3f) << 6) | (b2 & 0x3f));
        i += 3;
        continue;
      }
    }

    if (b0 >= 0xf0 && b0 <= 0xf4 && i + 3 < n) {
      const b1 = bytes[i + 1];
      const b2 = bytes[i + 2];
      const b3 = bytes[i + 3];
      let ok = isContinuation(b1) && isContinuation(b2) && isContinuation(b3);
      if (ok && b0 === 0xf0) ok = b1 >= 0x90;
      if (ok && b0 === 0xf4) ok = b1 <= 0x8f;
      if (ok) {
        codePoints.push(
          ((b0 & 0x07) << 18) | ((b1 & 0x3f) << 12) | ((b2 & 0x3f) << 6) | (b3 & 0x3f)
        );
        i += 4;
        continue;
      }
    }

    codePoints.push(INVALID_BYTE_BASE + b0);
    i += 1;
  }

  return codePointsToString(codePoints);
}

/**
 * Encode text as UTF-8, writing unpaired surrogates as ordinary 3-byte
 * sequences instead of replacing them.
 */
export function encodeSurrogatePass(text: string): Uint8Array {
  const out: number[] = [];
  for (const ch of text) {
    // for..of yields surrogate pairs whole and lone surrogates on their own
    const cp = ch.codePointAt(0) ?? 0;
    if (cp < 0x80) {
      out.push(cp);
    } else if (cp < 0x800) {
      out.push(0xc0 | (cp >> 6), 0x80 | (cp & 0x3f));
    } else if (cp < 0x10000) {
      out.push(0xe0 | (cp >> 12), 0x80 | ((cp >> 6) & 0x3f), 0x80 | (cp & 0x3f));
    } else {
      out.push(
        0xf0 | (cp >> 18),
        0x80 | ((cp >> 12) & 0x3f),
        0x80 | ((cp >> 6) & 0x3f),
        0x80 | (cp & 0x3f)
      );
    }
  }
  return Uint8Array.from(out);
}

/**
 * What the engine will see and echo back for `text`
 */
export function roundTripForgiving(text: string): string {
  return decodeForgiving(encodeSurrogatePass(text));
}

function codePointsToString(codePoints: number[]): string {
  // fromCodePoint has an argument limit, so build in slices
  const CHUNK = 4096;
  let out = '';
  for (let i = 0; i < codePoints.length; i += CHUNK) {
    out += String.fromCodePoint(...codePoints.slice(i, i + CHUNK));
  }
  return out;
}
