import * as fs from 'fs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { EngineConfig } from '../src/config.js';
import { SubprocessEngine } from '../src/engine/engine.js';
import { encodeBatch } from '../src/engine/protocol.js';
import { EngineTimeoutError, ProtocolError } from '../src/errors.js';
import type { Batch } from '../src/types.js';
import { TempRoot } from './helpers/temp-root.js';

const tokenizerBatch: Batch = {
  mode: 'tokenizer-batch',
  cases: [
    { state: 'Data', input: 'abc' },
    { state: 'RCDATA', lastStartTag: 'title', input: 'x' },
  ],
};

describe.skipIf(process.platform === 'win32')('SubprocessEngine', () => {
  let tmp: TempRoot;

  beforeEach(() => {
    tmp = new TempRoot();
  });

  afterEach(() => {
    tmp.cleanup();
  });

  function script(name: string, body: string): string {
    const file = tmp.write(name, `#!/bin/sh\n${body}\n`);
    fs.chmodSync(file, 0o755);
    return file;
  }

  function engine(executable: string, timeoutMs = 5000): SubprocessEngine {
    const config: EngineConfig = { executable, cwd: tmp.root, timeoutMs };
    return new SubprocessEngine(config);
  }

  it('passes the mode as argument, the request on stdin and parses stdout', async () => {
    const exe = script(
      'engine.sh',
      [
        'printf \'%s\' "$1" > mode.txt',
        'cat > request.txt',
        'printf \'[[["Character","abc"]],"x"]\'',
      ].join('\n')
    );

    await expect(engine(exe).submit(tokenizerBatch)).resolves.toEqual([[['Character', 'abc']], 'x']);
    expect(tmp.read('mode.txt')).toBe('tokenizer-batch');
    expect(tmp.read('request.txt')).toBe(encodeBatch(tokenizerBatch));
  });

  it('kills an engine that runs past the timeout', async () => {
    const exe = script('slow.sh', 'exec sleep 5');
    const started = Date.now();
    await expect(engine(exe, 200).submit(tokenizerBatch)).rejects.toThrow(EngineTimeoutError);
    expect(Date.now() - started).toBeLessThan(4000);
  });

  it('fails the batch on a non-zero exit, keeping stderr', async () => {
    const exe = script('fail.sh', ['cat > /dev/null', 'echo boom >&2', 'exit 3'].join('\n'));
    const error: unknown = await engine(exe).submit(tokenizerBatch).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ProtocolError);
    if (error instanceof ProtocolError) {
      expect(error.message).toBe('engine tokenizer-batch failed with exit status 3: boom');
      expect(error.stderr).toBe('boom\n');
    }
  });

  it('fails the batch when the executable cannot be started', async () => {
    await expect(engine(tmp.path('missing')).submit(tokenizerBatch)).rejects.toThrow(
      /^failed to start engine .*missing/
    );
  });

  it('fails the batch when the engine exits without reading its input', async () => {
    const exe = script('early.sh', "printf '[]'");
    const batch: Batch = { mode: 'tokenizer-batch', cases: [{ state: 'Data', input: 'a'.repeat(1 << 20) }] };
    await expect(engine(exe).submit(batch)).rejects.toThrow(/^engine tokenizer-batch stopped reading its input/);
  });

  it('fails the batch on output that is not JSON', async () => {
    const exe = script('garbage.sh', ['cat > /dev/null', "printf 'not json'"].join('\n'));
    await expect(engine(exe).submit(tokenizerBatch)).rejects.toThrow(ProtocolError);
  });
});
