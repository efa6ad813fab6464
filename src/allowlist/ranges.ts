/**
 * Index range expressions such as `1,2,5-7`
 */

import { AllowlistError } from '../errors.js';

const INTEGER = /^\d+$/;

export function uniqSorted(indices: Iterable<number>): number[] {
  return [...new Set(indices)].sort((a, b) => a - b);
}

function parseIndex(raw: string, part: string): number {
  const trimmed = raw.trim();
  if (!INTEGER.test(trimmed)) {
    throw new AllowlistError(`Bad index '${part}'`);
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Parse comma-separated indices and inclusive ranges:
 * `"1,2,5-7"` -> `[1, 2, 5, 6, 7]`. Empty parts are ignored.
 */
export function parseRanges(expr: string): number[] {
  const out: number[] = [];
  for (const raw of expr.split(',')) {
    const part = raw.trim();
    if (!part) continue;

    const dash = part.indexOf('-');
    if (dash === -1) {
      out.push(parseIndex(part, part));
      continue;
    }
    const lo = parseIndex(part.slice(0, dash), part);
    const hi = parseIndex(part.slice(dash + 1), part);
    if (hi < lo) {
      throw new AllowlistError(`Bad range '${part}' (hi < lo)`);
    }
    for (let i = lo; i <= hi; i++) {
      out.push(i);
    }
  }
  return out;
}

/**
 * Inverse of parseRanges: runs of three or more become `lo-hi`
 */
export function formatRanges(indices: Iterable<number>): string {
  const xs = uniqSorted(indices);
  const parts: string[] = [];
  let i = 0;
  while (i < xs.length) {
    let j = i;
    while (j + 1 < xs.length && xs[j + 1] === xs[j] + 1) {
      j++;
    }
    if (j - i >= 2) {
      parts.push(`${xs[i]}-${xs[j]}`);
    } else {
      for (let k = i; k <= j; k++) {
        parts.push(String(xs[k]));
      }
    }
    i = j + 1;
  }
  return parts.join(',');
}
