/**
 * Allowlist diff against a historical snapshot
 */

import { enabledTotals, getIndices, type AllowlistDocument } from '../allowlist/store.js';
import type { CorpusTotals } from '../corpus/discover.js';
import { SUITE_KINDS, type SuiteKind } from '../types.js';
import { fixtureTotals, kindTotal, percentage } from './coverage.js';

export interface DiffRow {
  before: number;
  after: number;
  total: number;
  delta: number;
  beforePercent: number | null;
  afterPercent: number | null;
  /** Percentage-point change; null when either side has no total */
  pointDelta: number | null;
  regressed: boolean;
}

export interface FixtureDiff extends DiffRow {
  fixture: string;
}

export interface KindDiff extends DiffRow {
  kind: SuiteKind;
  fixtures: FixtureDiff[];
}

export interface AllowlistDiff {
  kinds: KindDiff[];
  /** True if any count or percentage went down */
  regressed: boolean;
}

export function diffRow(before: number, after: number, total: number): DiffRow {
  const beforePercent = percentage(before, total);
  const afterPercent = percentage(after, total);
  const pointDelta =
    beforePercent === null || afterPercent === null ? null : afterPercent - beforePercent;
  const delta = after - before;
  return {
    before,
    after,
    total,
    delta,
    beforePercent,
    afterPercent,
    pointDelta,
    regressed: delta < 0 || (pointDelta !== null && pointDelta < 0),
  };
}

export function computeDiff(
  totals: CorpusTotals,
  previous: AllowlistDocument,
  current: AllowlistDocument
): AllowlistDiff {
  const before = enabledTotals(previous);
  const after = enabledTotals(current);

  const kinds = SUITE_KINDS.map((kind): KindDiff => {
    const fixtures: FixtureDiff[] = [];
    for (const [fixture, total] of fixtureTotals(totals, kind)) {
      const b = getIndices(previous, kind, fixture).length;
      const a = getIndices(current, kind, fixture).length;
      fixtures.push({ fixture, ...diffRow(b, a, total) });
    }
    return { kind, ...diffRow(before[kind], after[kind], kindTotal(totals, kind)), fixtures };
  });

  const regressed = kinds.some((k) => k.regressed || k.fixtures.some((f) => f.regressed));
  return { kinds, regressed };
}
