/**
 * Historical allowlist snapshots from version control
 */

import { spawn } from 'child_process';
import * as path from 'path';
import { HarnessError, HistoryError } from '../errors.js';
import { parseAllowlist, type AllowlistDocument } from './store.js';

export const DEFAULT_REVISION = 'HEAD~1';

/**
 * Read-only view of repository history
 */
export interface HistorySource {
  /** Full revision id, or undefined if `rev` does not resolve */
  resolve(rev: string): Promise<string | undefined>;
  /** File content at `revision`; rejects with HistoryError if unavailable */
  show(revision: string, relPath: string): Promise<string>;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export type CommandRunner = (command: string, args: string[], cwd: string) => Promise<CommandResult>;

export const runCommand: CommandRunner = (command, args, cwd) =>
  new Promise((resolve) => {
    const proc = spawn(command, args, { cwd });

    let stdout = '';
    let stderr = '';

    proc.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('close', (code) => {
      resolve({ stdout, stderr, exitCode: code ?? 1 });
    });

    proc.on('error', (err) => {
      resolve({ stdout, stderr: err.message, exitCode: 1 });
    });
  });

/**
 * `git rev-parse` / `git show`; the working copy is never touched
 */
export class GitHistory implements HistorySource {
  constructor(
    private readonly repoRoot: string,
    private readonly run: CommandRunner = runCommand
  ) {}

  async resolve(rev: string): Promise<string | undefined> {
    const result = await this.run('git', ['rev-parse', '--verify', '--quiet', `${rev}^{commit}`], this.repoRoot);
    const sha = result.stdout.trim();
    return result.exitCode === 0 && sha ? sha : undefined;
  }

  async show(revision: string, relPath: string): Promise<string> {
    const result = await this.run('git', ['show', `${revision}:${relPath}`], this.repoRoot);
    if (result.exitCode !== 0) {
      const msg = result.stderr.trim();
      throw new HistoryError(`git show failed for ${revision}:${relPath}${msg ? `: ${msg}` : ''}`);
    }
    return result.stdout;
  }
}

/**
 * Repository-relative path with forward slashes, as git expects
 */
export function repoRelativePath(repoRoot: string, filePath: string): string {
  return path.relative(repoRoot, filePath).split(path.sep).join('/');
}

export async function loadHistoricalAllowlist(
  history: HistorySource,
  rev: string,
  relPath: string
): Promise<{ revision: string; doc: AllowlistDocument }> {
  const revision = await history.resolve(rev);
  if (revision === undefined) {
    throw new HistoryError(`cannot resolve revision ${JSON.stringify(rev)}`);
  }
  const text = await history.show(revision, relPath);
  return { revision, doc: parseAllowlist(text, `${revision}:${relPath}`) };
}

export interface Baseline {
  doc: AllowlistDocument;
  /** Resolved revision, or the requested one when falling back */
  label: string;
  warnings: string[];
}

/**
 * Historical snapshot to diff against. When the revision or the file at that
 * revision is unavailable (first commit, shallow clone), the current
 * document becomes its own baseline and a warning is returned.
 */
export async function loadBaseline(
  history: HistorySource,
  rev: string,
  relPath: string,
  current: AllowlistDocument
): Promise<Baseline> {
  try {
    const { revision, doc } = await loadHistoricalAllowlist(history, rev, relPath);
    return { doc, label: revision, warnings: [] };
  } catch (error) {
    if (!(error instanceof HarnessError)) {
      throw error;
    }
    return {
      doc: current,
      label: rev,
      warnings: [
        `warning: ${error.message}`,
        'warning: treating previous allowlists as current (no diff baseline available)',
      ],
    };
  }
}
