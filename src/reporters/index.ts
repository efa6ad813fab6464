/**
 * Reporter exports
 */

export {
  DEFAULT_FAILURE_LIMIT,
  formatDuration,
  formatTextReport,
  type Palette,
  type TextReportOptions,
} from './text.js';
export { formatJsonReport } from './json.js';
export { formatJUnitReport } from './junit.js';
export {
  formatAddition,
  formatDiff,
  formatPercent,
  formatShow,
  formatStats,
  type DiffFormatOptions,
  type ShowEntry,
} from './coverage.js';
export {
  DEFAULT_MISMATCH_LIMIT,
  formatCaseDetail,
  formatFailureReport,
  formatScan,
  parseCaseSelector,
  type CaseSelector,
} from './fixture.js';

import type { RunResult } from '../runner.js';
import { formatJsonReport } from './json.js';
import { formatJUnitReport } from './junit.js';
import { formatTextReport, type TextReportOptions } from './text.js';

export const OUTPUT_FORMATS = ['text', 'json', 'junit'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Format the results based on output format
 */
export function formatResults(result: RunResult, format: OutputFormat, options: TextReportOptions): string {
  switch (format) {
    case 'json':
      return formatJsonReport(result);
    case 'junit':
      return formatJUnitReport(result);
    case 'text':
      return formatTextReport(result, options);
  }
}
