/**
 * `#data` block splitting shared by the tree-construction and encoding readers
 */

export const DATA_DIRECTIVE = '#data';

export function splitLines(raw: string): string[] {
  return raw.replace(/\r\n/g, '\n').split('\n');
}

/**
 * Split fixture text into blocks. Each block starts at a line that is exactly
 * `#data` and runs to just before the next one, trailing blank lines dropped.
 * Anything before the first `#data` line is ignored.
 */
export function splitDataBlocks(raw: string): string[] {
  const lines = splitLines(raw);
  const starts: number[] = [];
  lines.forEach((line, i) => {
    if (line === DATA_DIRECTIVE) starts.push(i);
  });

  return starts.map((lo, idx) => {
    let hi = idx + 1 < starts.length ? starts[idx + 1] - 1 : lines.length - 1;
    while (hi >= lo && lines[hi] === '') {
      hi -= 1;
    }
    return lines.slice(lo, hi + 1).join('\n');
  });
}
