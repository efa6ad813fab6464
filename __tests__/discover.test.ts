import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { resolveConfig } from '../src/config.js';
import { DAT_EXTENSION, TOKENIZER_EXTENSION, collectCorpusTotals, discoverFixtures, findFixture } from '../src/corpus/discover.js';
import { TempRoot, treeBlock } from './helpers/temp-root.js';

describe('fixture discovery', () => {
  let tmp: TempRoot;

  beforeEach(() => {
    tmp = new TempRoot();
  });

  afterEach(() => {
    tmp.cleanup();
  });

  it('finds fixtures recursively in sorted order', () => {
    tmp.tokenizer('b.test', { tests: [] });
    tmp.tokenizer('sub/a.test', { tests: [] });
    tmp.write('html5lib-tests/tokenizer/README.md', 'not a fixture');
    const dir = tmp.path('html5lib-tests', 'tokenizer');
    expect(discoverFixtures(dir, TOKENIZER_EXTENSION)).toEqual([path.join(dir, 'b.test'), path.join(dir, 'sub', 'a.test')]);
    expect(findFixture(dir, TOKENIZER_EXTENSION, 'a.test')).toBe(path.join(dir, 'sub', 'a.test'));
    expect(findFixture(dir, TOKENIZER_EXTENSION, 'c.test')).toBeUndefined();
  });

  it('treats a missing directory as empty', () => {
    expect(discoverFixtures(tmp.path('nowhere'), DAT_EXTENSION)).toEqual([]);
  });

  it('sums totals of fixtures sharing a basename', () => {
    tmp.tree('tests1.dat', treeBlock('a', ['| "a"']) + treeBlock('b', ['| "b"']) + treeBlock('<td>', ['| <td>'], { fragment: 'tr' }));
    tmp.tree('scripted/tests1.dat', treeBlock('c', ['| "c"']));
    tmp.tokenizer('test1.test', { tests: [{ input: 'a', output: [] }, { input: 'b', output: [] }] });

    const totals = collectCorpusTotals(resolveConfig({ root: tmp.root }).corpus);
    expect(totals.tree).toEqual(new Map([['tests1.dat', { doc: 3, frag: 1 }]]));
    expect(totals.tokenizer).toEqual(new Map([['test1.test', 2]]));
  });

  it('counts malformed tests and blocks without parsing them', () => {
    tmp.tokenizer('odd.test', {
      tests: [
        { input: '\\N{DASH}', output: [], doubleEscaped: true },
        { input: 'no output' },
      ],
    });
    tmp.tree('broken.dat', '#data\nx\n#document\n| x\n\n#data\n<td>\n#document-fragment\ntr\n#errors\n');

    const totals = collectCorpusTotals(resolveConfig({ root: tmp.root }).corpus);
    expect(totals.tokenizer).toEqual(new Map([['odd.test', 2]]));
    expect(totals.tree).toEqual(new Map([['broken.dat', { doc: 1, frag: 1 }]]));
  });
});
