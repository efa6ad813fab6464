#!/usr/bin/env node
/**
 * CLI entry point for the conformance harness
 *
 * Usage:
 *   html5-harness stats
 *   html5-harness run --output junit --output-file results.xml
 *   html5-harness diff-prev --rev origin/main --fail-on-decrease
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import pc from 'picocolors';

import { runCli } from './cli/program.js';
import { errorMessage } from './errors.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const packageJsonPath = path.resolve(__dirname, '../package.json');
  if (!fs.existsSync(packageJsonPath)) {
    return '0.0.0';
  }
  const pkg: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

runCli(process.argv.slice(2), { version: readVersion(), env: process.env }).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(pc.red(`Error: ${errorMessage(error)}`));
    if (error instanceof Error && error.stack) {
      console.error(pc.dim(error.stack));
    }
    process.exitCode = 1;
  }
);
