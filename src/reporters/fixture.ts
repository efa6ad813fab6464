/**
 * Plain-text reports for corpus scans and single-fixture runs
 */

import type { CaseVerdict, FixtureReport, ScanResult } from '../runner.js';

export const DEFAULT_MISMATCH_LIMIT = 50;

export function formatScan(result: ScanResult): string {
  const lines: string[] = [];
  for (const change of result.changes) {
    const delta = change.after - change.before;
    if (delta === 0) continue;
    const signed = delta > 0 ? `+${delta}` : String(delta);
    lines.push(`${change.kind} ${change.fixture}: Δ${signed} (now ${change.after})`);
  }
  for (const run of result.errors) {
    lines.push(`${run.family} ${run.fixture}: skipped, runner failed: ${run.error ?? 'unknown error'}`);
  }
  if (lines.length === 0) {
    lines.push('No changes.');
  }
  return lines.join('\n');
}

function mismatchLine(verdict: CaseVerdict): string[] {
  return verdict.mismatches.map((m) => {
    const state = m.state ? ` (${m.state})` : '';
    return `${verdict.kind} #${verdict.index}${state}: ${m.reason}`;
  });
}

/**
 * Pass count line plus the first mismatches
 */
export function formatFailureReport(report: FixtureReport, limit = DEFAULT_MISMATCH_LIMIT): string {
  const total = report.verdicts.length;
  const failing = report.verdicts.filter((v) => !v.passed);
  const lines = [`${report.fixture}: ${total - failing.length}/${total} passing  (${failing.length} failing)`];

  const mismatches = failing.flatMap(mismatchLine);
  if (mismatches.length > 0) {
    lines.push('');
    lines.push('First mismatches:');
    for (const line of mismatches.slice(0, limit)) {
      lines.push(`  ${line}`);
    }
  }
  return lines.join('\n');
}

export interface CaseSelector {
  index: number;
  state?: string;
}

/**
 * Parse `index` or `index#State`
 */
export function parseCaseSelector(text: string): CaseSelector | undefined {
  const match = /^(\d+)(?:#(.+))?$/.exec(text.trim());
  if (!match) {
    return undefined;
  }
  return { index: Number(match[1]), state: match[2] };
}

/**
 * Full detail for one case of a report
 */
export function formatCaseDetail(report: FixtureReport, selector: CaseSelector): string {
  const verdict = report.verdicts.find((v) => v.index === selector.index);
  const lines = [`fixture: ${report.fixture}`, `kind: ${report.kind}`, `index: ${selector.index}`];
  if (selector.state !== undefined) {
    lines.push(`state: ${selector.state}`);
  }

  const input = report.inputs.get(selector.index);
  if (input !== undefined) {
    lines.push('', 'input:', input);
  }

  if (!verdict) {
    lines.push('', 'not run');
    return lines.join('\n');
  }

  const mismatches = verdict.mismatches.filter(
    (m) => selector.state === undefined || m.state === undefined || m.state === selector.state
  );
  if (mismatches.length === 0) {
    lines.push('', 'result: pass');
    return lines.join('\n');
  }

  lines.push('', 'result: fail');
  for (const m of mismatches) {
    lines.push('', m.state ? `${m.reason} (${m.state})` : m.reason);
    if (m.expected !== undefined) lines.push('expected:', m.expected);
    if (m.actual !== undefined) lines.push('got:', m.actual);
  }
  return lines.join('\n');
}
