import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG_FILE, TIMEOUT_ENV_VAR, resolveConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';
import { TempRoot } from './helpers/temp-root.js';

describe('resolveConfig', () => {
  let tmp: TempRoot;

  beforeEach(() => {
    tmp = new TempRoot();
  });

  afterEach(() => {
    tmp.cleanup();
  });

  it('uses defaults relative to the root', () => {
    expect(resolveConfig({ root: tmp.root })).toEqual({
      root: tmp.root,
      allowlistPath: path.join(tmp.root, 'data', 'html5lib_allowlists.json'),
      corpus: {
        tokenizerDir: path.join(tmp.root, 'html5lib-tests', 'tokenizer'),
        treeDir: path.join(tmp.root, 'html5lib-tests', 'tree-construction'),
        encodingDir: path.join(tmp.root, 'html5lib-tests', 'encoding'),
      },
      engine: {
        executable: path.join(tmp.root, '.build', 'html5_runner'),
        cwd: tmp.root,
        timeoutMs: 30000,
        build: undefined,
      },
    });
  });

  it('reads the YAML config file', () => {
    tmp.write(
      DEFAULT_CONFIG_FILE,
      [
        'allowlist: lists/allow.json',
        'corpus:',
        '  tokenizer: fixtures/tok',
        'engine:',
        '  executable: bin/engine',
        '  timeoutSeconds: 5',
        '  build:',
        '    command: [make, engine]',
        '    sources: src',
        '    extensions: [.kk]',
        '',
      ].join('\n')
    );
    const config = resolveConfig({ root: tmp.root });
    expect(config.allowlistPath).toBe(path.join(tmp.root, 'lists', 'allow.json'));
    expect(config.corpus.tokenizerDir).toBe(path.join(tmp.root, 'fixtures', 'tok'));
    expect(config.corpus.treeDir).toBe(path.join(tmp.root, 'html5lib-tests', 'tree-construction'));
    expect(config.engine).toEqual({
      executable: path.join(tmp.root, 'bin', 'engine'),
      cwd: tmp.root,
      timeoutMs: 5000,
      build: { command: ['make', 'engine'], sources: path.join(tmp.root, 'src'), extensions: ['.kk'] },
    });
  });

  it('lets the environment and then explicit values override the file', () => {
    tmp.write(DEFAULT_CONFIG_FILE, 'engine:\n  timeoutSeconds: 5\n');
    expect(resolveConfig({ root: tmp.root, env: { [TIMEOUT_ENV_VAR]: '2.5' } }).engine.timeoutMs).toBe(2500);
    expect(
      resolveConfig({ root: tmp.root, env: { [TIMEOUT_ENV_VAR]: '2.5' }, timeoutSeconds: 1 }).engine.timeoutMs
    ).toBe(1000);
    expect(resolveConfig({ root: tmp.root, env: { [TIMEOUT_ENV_VAR]: '' } }).engine.timeoutMs).toBe(5000);
  });

  it('applies path overrides', () => {
    const config = resolveConfig({ root: tmp.root, engine: 'other/engine', allowlistPath: '/elsewhere/allow.json' });
    expect(config.engine.executable).toBe(path.join(tmp.root, 'other', 'engine'));
    expect(config.allowlistPath).toBe(path.resolve('/elsewhere/allow.json'));
  });

  it('rejects an invalid timeout from the environment', () => {
    expect(() => resolveConfig({ root: tmp.root, env: { [TIMEOUT_ENV_VAR]: 'abc' } })).toThrow(
      `${TIMEOUT_ENV_VAR}: expected a positive number of seconds, got "abc"`
    );
  });

  it('rejects a missing explicit config file', () => {
    expect(() => resolveConfig({ root: tmp.root, configFile: 'nope.yaml' })).toThrow(ConfigError);
  });

  it('rejects invalid config values', () => {
    tmp.write('bad.yaml', 'engine:\n  timeoutSeconds: -1\n');
    expect(() => resolveConfig({ root: tmp.root, configFile: 'bad.yaml' })).toThrow(
      'engine.timeoutSeconds must be a positive number'
    );
    tmp.write('list.yaml', '- a\n- b\n');
    expect(() => resolveConfig({ root: tmp.root, configFile: 'list.yaml' })).toThrow('top level must be a mapping');
    tmp.write('empty-build.yaml', 'engine:\n  build:\n    command: []\n');
    expect(() => resolveConfig({ root: tmp.root, configFile: 'empty-build.yaml' })).toThrow(
      'engine.build.command must not be empty'
    );
  });

  it('treats an empty config file as no configuration', () => {
    tmp.write(DEFAULT_CONFIG_FILE, '');
    expect(resolveConfig({ root: tmp.root }).engine.timeoutMs).toBe(30000);
  });
});
