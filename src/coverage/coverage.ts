/**
 * Coverage of the corpus by the allowlist
 */

import { enabledTotals, getIndices, type AllowlistDocument } from '../allowlist/store.js';
import type { CorpusTotals } from '../corpus/discover.js';
import { SUITE_KINDS, type SuiteKind } from '../types.js';

export interface FixtureCoverage {
  fixture: string;
  enabled: number;
  total: number;
  /** null when the fixture has no cases of this kind */
  percent: number | null;
}

export interface KindCoverage {
  kind: SuiteKind;
  /** Enabled across every fixture in the allowlist, on disk or not */
  enabled: number;
  total: number;
  percent: number | null;
  fixtures: FixtureCoverage[];
}

export interface CoverageReport {
  kinds: KindCoverage[];
  /** Rows whose enabled count exceeds the true case count */
  violations: Array<FixtureCoverage & { kind: SuiteKind }>;
}

export function percentage(enabled: number, total: number): number | null {
  return total > 0 ? (enabled * 100) / total : null;
}

/**
 * Per-fixture totals for one kind, sorted by fixture name. Fragment rows only
 * include fixtures that have fragment cases.
 */
export function fixtureTotals(totals: CorpusTotals, kind: SuiteKind): Map<string, number> {
  const rows = new Map<string, number>();
  if (kind === 'tokenizer') {
    for (const fixture of [...totals.tokenizer.keys()].sort()) {
      rows.set(fixture, totals.tokenizer.get(fixture) ?? 0);
    }
    return rows;
  }
  for (const fixture of [...totals.tree.keys()].sort()) {
    const counts = totals.tree.get(fixture) ?? { doc: 0, frag: 0 };
    if (kind === 'tree-doc') {
      rows.set(fixture, counts.doc);
    } else if (counts.frag > 0) {
      rows.set(fixture, counts.frag);
    }
  }
  return rows;
}

export function kindTotal(totals: CorpusTotals, kind: SuiteKind): number {
  let sum = 0;
  for (const total of fixtureTotals(totals, kind).values()) {
    sum += total;
  }
  return sum;
}

export function computeCoverage(totals: CorpusTotals, doc: AllowlistDocument): CoverageReport {
  const enabled = enabledTotals(doc);
  const violations: CoverageReport['violations'] = [];

  const kinds = SUITE_KINDS.map((kind): KindCoverage => {
    const fixtures: FixtureCoverage[] = [];
    for (const [fixture, total] of fixtureTotals(totals, kind)) {
      const count = getIndices(doc, kind, fixture).length;
      const row = { fixture, enabled: count, total, percent: percentage(count, total) };
      fixtures.push(row);
      if (count > total) {
        violations.push({ kind, ...row });
      }
    }
    const total = kindTotal(totals, kind);
    return { kind, enabled: enabled[kind], total, percent: percentage(enabled[kind], total), fixtures };
  });

  return { kinds, violations };
}
