/**
 * JUnit XML reporter for CI integration
 * One testsuite per fixture, one testcase per allowlisted case
 */

import type { CaseVerdict, FixtureRun, RunResult } from '../runner.js';

export function formatJUnitReport(result: RunResult): string {
  const lines: string[] = [];

  lines.push('<?xml version="1.0" encoding="UTF-8"?>');

  const totalTests = result.passed + result.failed;
  const totalTime = result.duration / 1000;

  lines.push(
    `<testsuites name="HTML5 Conformance" tests="${totalTests}" failures="${result.failed}" errors="${result.errored}" skipped="0" time="${totalTime.toFixed(3)}" timestamp="${result.timestamp}">`
  );

  for (const run of result.fixtures) {
    lines.push(...formatSuite(run));
  }

  lines.push('</testsuites>');

  return lines.join('\n');
}

function formatSuite(run: FixtureRun): string[] {
  const lines: string[] = [];

  const failed = run.cases.filter((v) => !v.passed).length;
  const errors = run.error !== undefined ? 1 : 0;
  const time = run.duration / 1000;
  const suiteName = escapeXml(`${run.family} ${run.fixture}`);

  lines.push(
    `  <testsuite name="${suiteName}" tests="${run.cases.length + errors}" failures="${failed}" errors="${errors}" skipped="0" time="${time.toFixed(3)}">`
  );

  if (run.error !== undefined) {
    lines.push(`    <testcase name="${escapeXml(run.fixture)}" classname="${classNameOf(run)}" time="${time.toFixed(3)}">`);
    lines.push(`      <error message="${escapeXml(run.error)}" type="HarnessError"/>`);
    lines.push('    </testcase>');
  }

  for (const verdict of run.cases) {
    lines.push(...formatTestCase(verdict, run));
  }

  lines.push('  </testsuite>');

  return lines;
}

function formatTestCase(verdict: CaseVerdict, run: FixtureRun): string[] {
  const lines: string[] = [];
  const testName = escapeXml(`${verdict.kind} #${verdict.index}`);

  lines.push(`    <testcase name="${testName}" classname="${classNameOf(run)}" time="0.000">`);

  if (!verdict.passed) {
    const message = verdict.mismatches
      .map((m) => (m.state ? `${m.reason} (${m.state})` : m.reason))
      .join('; ');
    lines.push(`      <failure message="${escapeXml(message)}" type="AssertionError">`);
    for (const m of verdict.mismatches) {
      if (m.expected !== undefined || m.actual !== undefined) {
        lines.push(escapeXml(`expected: ${m.expected ?? ''}\nactual: ${m.actual ?? ''}`));
      }
    }
    lines.push('      </failure>');
  }

  lines.push('    </testcase>');

  return lines;
}

function classNameOf(run: FixtureRun): string {
  return escapeXml(`${run.family}.${run.fixture}`);
}

/**
 * Escape special characters for XML. Control characters XML 1.0 cannot carry,
 * even as references, are written as `\xNN`.
 */
export function escapeXml(str: string): string {
  return str
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F]/g, (ch) => `\\x${ch.charCodeAt(0).toString(16).padStart(2, '0')}`)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}
