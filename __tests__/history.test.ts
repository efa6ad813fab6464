import { describe, expect, it } from 'vitest';
import {
  GitHistory,
  loadBaseline,
  repoRelativePath,
  type CommandResult,
  type HistorySource,
} from '../src/allowlist/history.js';
import { emptyAllowlist, serializeAllowlist, setIndices } from '../src/allowlist/store.js';
import { HistoryError } from '../src/errors.js';

function scriptedRunner(results: CommandResult[]) {
  const calls: Array<{ command: string; args: string[]; cwd: string }> = [];
  const run = async (command: string, args: string[], cwd: string): Promise<CommandResult> => {
    calls.push({ command, args, cwd });
    return results.shift() ?? { stdout: '', stderr: 'no scripted result', exitCode: 1 };
  };
  return { calls, run };
}

class FakeHistory implements HistorySource {
  constructor(private readonly files: Record<string, string>, private readonly revision?: string) {}

  async resolve(): Promise<string | undefined> {
    return this.revision;
  }

  async show(revision: string, relPath: string): Promise<string> {
    const text = this.files[`${revision}:${relPath}`];
    if (text === undefined) {
      throw new HistoryError(`git show failed for ${revision}:${relPath}`);
    }
    return text;
  }
}

describe('GitHistory', () => {
  it('resolves a revision to a commit id', async () => {
    const { calls, run } = scriptedRunner([{ stdout: 'abc123\n', stderr: '', exitCode: 0 }]);
    const history = new GitHistory('/repo', run);
    expect(await history.resolve('HEAD~1')).toBe('abc123');
    expect(calls).toEqual([
      { command: 'git', args: ['rev-parse', '--verify', '--quiet', 'HEAD~1^{commit}'], cwd: '/repo' },
    ]);
  });

  it('returns undefined for an unknown revision', async () => {
    const { run } = scriptedRunner([{ stdout: '', stderr: '', exitCode: 1 }]);
    expect(await new GitHistory('/repo', run).resolve('nope')).toBeUndefined();
  });

  it('reads a file at a revision', async () => {
    const { calls, run } = scriptedRunner([{ stdout: '{"x":1}', stderr: '', exitCode: 0 }]);
    expect(await new GitHistory('/repo', run).show('abc123', 'data/a.json')).toBe('{"x":1}');
    expect(calls[0].args).toEqual(['show', 'abc123:data/a.json']);
  });

  it('fails with the git message when the file is missing', async () => {
    const { run } = scriptedRunner([{ stdout: '', stderr: 'fatal: bad path\n', exitCode: 128 }]);
    await expect(new GitHistory('/repo', run).show('abc123', 'data/a.json')).rejects.toThrow(
      'git show failed for abc123:data/a.json: fatal: bad path'
    );
  });
});

describe('repoRelativePath', () => {
  it('gives a forward-slash path below the root', () => {
    expect(repoRelativePath('/repo', '/repo/data/a.json')).toBe('data/a.json');
  });
});

describe('loadBaseline', () => {
  const current = emptyAllowlist();
  setIndices(current, 'tokenizer', 't.test', [0, 1]);

  it('loads the document at the resolved revision', async () => {
    const previous = emptyAllowlist();
    setIndices(previous, 'tokenizer', 't.test', [0]);
    const history = new FakeHistory({ 'abc123:data/a.json': serializeAllowlist(previous) }, 'abc123');

    const baseline = await loadBaseline(history, 'HEAD~1', 'data/a.json', current);
    expect(baseline.label).toBe('abc123');
    expect(baseline.warnings).toEqual([]);
    expect(baseline.doc.tokenizer).toEqual({ 't.test': [0] });
  });

  it('falls back to the current document when the revision does not resolve', async () => {
    const baseline = await loadBaseline(new FakeHistory({}), 'HEAD~1', 'data/a.json', current);
    expect(baseline.doc).toBe(current);
    expect(baseline.label).toBe('HEAD~1');
    expect(baseline.warnings).toEqual([
      'warning: cannot resolve revision "HEAD~1"',
      'warning: treating previous allowlists as current (no diff baseline available)',
    ]);
  });

  it('falls back when the file did not exist at that revision', async () => {
    const baseline = await loadBaseline(new FakeHistory({}, 'abc123'), 'HEAD~1', 'data/a.json', current);
    expect(baseline.doc).toBe(current);
    expect(baseline.warnings[0]).toBe('warning: git show failed for abc123:data/a.json');
  });

  it('falls back when the historical document is invalid', async () => {
    const history = new FakeHistory({ 'abc123:data/a.json': '{"version": 7}' }, 'abc123');
    const baseline = await loadBaseline(history, 'HEAD~1', 'data/a.json', current);
    expect(baseline.warnings[0]).toBe('warning: Unsupported allowlists version: 7');
  });

  it('does not hide unexpected failures', async () => {
    const broken: HistorySource = {
      resolve: () => Promise.reject(new TypeError('boom')),
      show: () => Promise.resolve(''),
    };
    await expect(loadBaseline(broken, 'HEAD~1', 'data/a.json', current)).rejects.toThrow('boom');
  });
});
