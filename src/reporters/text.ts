/**
 * Text reporter for console output
 */

import pc from 'picocolors';
import { failureLines, type FixtureRun, type RunResult } from '../runner.js';

export type Palette = ReturnType<typeof pc.createColors>;

export const DEFAULT_FAILURE_LIMIT = 50;

export interface TextReportOptions {
  colors?: Palette;
  /** List fixtures that fully pass too */
  verbose?: boolean;
  /** Maximum number of failure lines printed */
  limit?: number;
}

/**
 * Format verification results as colored console output
 */
export function formatTextReport(result: RunResult, options: TextReportOptions = {}): string {
  const c = options.colors ?? pc;
  const limit = options.limit ?? DEFAULT_FAILURE_LIMIT;
  const lines: string[] = [];

  lines.push('');
  lines.push(c.bold('HTML5 Conformance Results'));
  lines.push(c.dim(`Engine: ${result.engine}`));
  lines.push(c.dim(`Timestamp: ${result.timestamp}`));
  lines.push('');

  for (const run of result.fixtures) {
    if (options.verbose || !fixturePassed(run)) {
      lines.push(formatFixture(run, c));
    }
  }

  const failures = failureLines(result);
  if (failures.length > 0) {
    lines.push('');
    lines.push(c.bold('Failures'));
    for (const line of failures.slice(0, limit)) {
      lines.push(c.red(`  x ${line}`));
    }
    if (failures.length > limit) {
      lines.push(c.dim(`  ... and ${failures.length - limit} more`));
    }
  }

  // Summary
  lines.push('');
  lines.push(c.bold('Summary'));
  lines.push(c.dim('─'.repeat(50)));

  if (result.passed > 0) {
    lines.push(c.green(`  ${result.passed} passed`));
  }
  if (result.failed > 0) {
    lines.push(c.red(`  ${result.failed} failed`));
  }
  if (result.errored > 0) {
    lines.push(c.yellow(`  ${result.errored} fixture(s) could not run`));
  }

  lines.push(c.dim(`  ${result.passed + result.failed} total`));
  lines.push(c.dim(`  ${formatDuration(result.duration)}`));
  lines.push('');

  if (result.failed === 0 && result.errored === 0) {
    lines.push(c.green(c.bold('All allowlisted cases passed!')));
  } else {
    lines.push(c.red(c.bold(`${result.failed} failing cases`)));
  }
  lines.push('');

  return lines.join('\n');
}

function fixturePassed(run: FixtureRun): boolean {
  return run.error === undefined && run.cases.every((v) => v.passed);
}

function formatFixture(run: FixtureRun, c: Palette): string {
  const icon = fixturePassed(run) ? c.green('✓') : c.red('x');
  const failing = run.cases.filter((v) => !v.passed).length;
  const detail =
    run.error !== undefined
      ? 'runner failed'
      : failing > 0
        ? `${failing} failing of ${run.cases.length}`
        : `${run.cases.length} cases`;
  return `${icon} ${c.bold(`${run.family} ${run.fixture}`)} ${c.dim(`(${detail}, ${formatDuration(run.duration)})`)}`;
}

/**
 * Format a duration in ms to a human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(1);
  return `${minutes}m ${seconds}s`;
}
