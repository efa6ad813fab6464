/**
 * Plain-text allowlist reports: show, stats, add and diff
 */

import { formatRanges } from '../allowlist/ranges.js';
import type { AllowlistDiff, DiffRow } from '../coverage/diff.js';
import type { CoverageReport } from '../coverage/coverage.js';
import type { SuiteKind } from '../types.js';

export function formatPercent(percent: number | null): string {
  return percent === null ? 'n/a' : `${percent.toFixed(1)}%`;
}

function formatSigned(n: number): string {
  return n >= 0 ? `+${n}` : String(n);
}

function formatPointDelta(points: number | null): string {
  if (points === null) {
    return 'n/a';
  }
  const fixed = points.toFixed(1);
  return fixed.startsWith('-') ? `${fixed}pp` : `+${fixed}pp`;
}

export interface ShowEntry {
  kind: SuiteKind;
  fixture: string;
  indices: number[];
}

export function formatShow(entries: ShowEntry[], ranges: boolean): string {
  const lines: string[] = [];
  for (const { kind, fixture, indices } of entries) {
    const shown = ranges ? formatRanges(indices) : indices.join(' ');
    lines.push(`${kind} ${fixture}  count=${indices.length}`);
    lines.push(`  ${shown}`);
  }
  return lines.join('\n');
}

export function formatStats(report: CoverageReport): string {
  const lines: string[] = [];

  lines.push('Enabled totals:');
  for (const k of report.kinds) {
    lines.push(`  ${k.kind}: ${k.enabled}`);
  }

  lines.push('');
  lines.push('Coverage totals:');
  for (const k of report.kinds) {
    lines.push(`  ${k.kind}: ${k.enabled}/${k.total} (${formatPercent(k.percent)})`);
  }

  lines.push('');
  lines.push('Per fixture:');
  for (const k of report.kinds) {
    lines.push(`${k.kind}:`);
    for (const row of k.fixtures) {
      lines.push(`  ${row.fixture}: ${row.enabled}/${row.total} (${formatPercent(row.percent)})`);
    }
  }

  return lines.join('\n');
}

export function formatAddition(kind: SuiteKind, fixture: string, before: number, after: number): string {
  return `${kind} ${fixture}: ${before} -> ${after} (+${after - before})`;
}

function formatDiffRow(label: string, row: DiffRow): string {
  return (
    `${label}: ${row.before}/${row.total} (${formatPercent(row.beforePercent)}) -> ` +
    `${row.after}/${row.total} (${formatPercent(row.afterPercent)})  ` +
    `Δ${formatSigned(row.delta)}  ${formatPointDelta(row.pointDelta)}`
  );
}

export interface DiffFormatOptions {
  /** Revision label shown in the header */
  revision: string;
  /** Allowlist path shown in the header */
  file: string;
  /** Include fixtures whose count did not change */
  all?: boolean;
}

export function formatDiff(diff: AllowlistDiff, options: DiffFormatOptions): string {
  const lines: string[] = [];

  lines.push(`Comparing allowlists: ${options.revision} -> working tree (${options.file})`);
  lines.push('');
  lines.push('Totals:');
  for (const k of diff.kinds) {
    lines.push(formatDiffRow(k.kind, k));
  }

  for (const k of diff.kinds) {
    lines.push('');
    lines.push(`Per fixture (${k.kind}):`);
    for (const row of k.fixtures) {
      if (!options.all && row.before === row.after) continue;
      lines.push(`  ${formatDiffRow(row.fixture, row)}`);
    }
  }

  return lines.join('\n');
}
