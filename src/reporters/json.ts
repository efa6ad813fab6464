/**
 * JSON reporter for machine-readable output
 */

import type { RunResult } from '../runner.js';

export function formatJsonReport(result: RunResult): string {
  return JSON.stringify(result, null, 2);
}
