import * as fs from 'fs';
import { afterEach, describe, expect, it } from 'vitest';
import {
  addIndices,
  emptyAllowlist,
  enabledTotals,
  getIndices,
  loadAllowlist,
  parseAllowlist,
  saveAllowlist,
  serializeAllowlist,
  setIndices,
  validateAllowlist,
  type AllowlistDocument,
} from '../src/allowlist/store.js';
import { AllowlistError } from '../src/errors.js';
import { TempRoot } from './helpers/temp-root.js';

function sampleDoc(): AllowlistDocument {
  return {
    version: 1,
    tree: { doc: { 'b.dat': [3, 1, 1], 'a.dat': [0] }, frag: {} },
    tokenizer: { 't.test': [2, 0] },
  };
}

describe('serializeAllowlist', () => {
  it('sorts keys and indices and ends with a newline', () => {
    const expected = [
      '{',
      '  "tokenizer": {',
      '    "t.test": [',
      '      0,',
      '      2',
      '    ]',
      '  },',
      '  "tree": {',
      '    "doc": {',
      '      "a.dat": [',
      '        0',
      '      ],',
      '      "b.dat": [',
      '        1,',
      '        3',
      '      ]',
      '    },',
      '    "frag": {}',
      '  },',
      '  "version": 1',
      '}',
      '',
    ].join('\n');
    expect(serializeAllowlist(sampleDoc())).toBe(expected);
  });

  it('is stable across a load and save', () => {
    const once = serializeAllowlist(sampleDoc());
    expect(serializeAllowlist(parseAllowlist(once))).toBe(once);
  });
});

describe('validateAllowlist', () => {
  it('accepts a well-formed document', () => {
    expect(validateAllowlist(emptyAllowlist())).toEqual({ version: 1, tree: { doc: {}, frag: {} }, tokenizer: {} });
  });

  it('rejects unsupported versions', () => {
    expect(() => validateAllowlist({ version: 2, tree: { doc: {}, frag: {} }, tokenizer: {} })).toThrow(
      'Unsupported allowlists version: 2'
    );
    expect(() => validateAllowlist({ version: '1', tree: { doc: {}, frag: {} }, tokenizer: {} })).toThrow(
      'Unsupported allowlists version: "1"'
    );
  });

  it('rejects missing sections', () => {
    expect(() => validateAllowlist({ version: 1, tree: { doc: {}, frag: {} } })).toThrow(
      'Missing required keys: tree/tokenizer'
    );
    expect(() => validateAllowlist({ version: 1, tree: { doc: {} }, tokenizer: {} })).toThrow(
      'tree must be an object with doc/frag keys'
    );
    expect(() => validateAllowlist([])).toThrow('Top-level JSON must be an object');
  });

  it('rejects anything but lists of non-negative integers', () => {
    for (const bad of [[-1], [1.5], '1', [null]]) {
      expect(() => validateAllowlist({ version: 1, tree: { doc: {}, frag: {} }, tokenizer: { 'x.test': bad } })).toThrow(
        'tokenizer.x.test must be a list of non-negative ints'
      );
    }
  });

  it('names the source of invalid JSON', () => {
    expect(() => parseAllowlist('{', 'allow.json')).toThrow(/^allow\.json: invalid JSON: /);
  });
});

describe('index operations', () => {
  it('adds indices without removing any', () => {
    const doc = emptyAllowlist();
    setIndices(doc, 'tokenizer', 't.test', [2, 1]);
    expect(addIndices(doc, 'tokenizer', 't.test', [2, 3, 4])).toEqual({ before: 2, after: 4 });
    expect(getIndices(doc, 'tokenizer', 't.test')).toEqual([1, 2, 3, 4]);
    expect(addIndices(doc, 'tree-frag', 'new.dat', [])).toEqual({ before: 0, after: 0 });
  });

  it('returns no indices for unknown fixtures', () => {
    expect(getIndices(emptyAllowlist(), 'tree-doc', 'constructor')).toEqual([]);
  });

  it('counts unique indices per kind', () => {
    expect(enabledTotals(sampleDoc())).toEqual({ 'tree-doc': 3, 'tree-frag': 0, tokenizer: 2 });
  });
});

describe('saveAllowlist / loadAllowlist', () => {
  let tmp: TempRoot | undefined;

  afterEach(() => {
    tmp?.cleanup();
    tmp = undefined;
  });

  it('writes the canonical text and reads it back', () => {
    tmp = new TempRoot();
    const file = tmp.path('nested', 'dir', 'allow.json');
    saveAllowlist(sampleDoc(), file);
    expect(fs.readFileSync(file, 'utf-8')).toBe(serializeAllowlist(sampleDoc()));
    expect(getIndices(loadAllowlist(file), 'tree-doc', 'b.dat')).toEqual([1, 3]);
  });

  it('writes nothing for an invalid document', () => {
    tmp = new TempRoot();
    const file = tmp.path('allow.json');
    const doc = sampleDoc();
    doc.tokenizer['t.test'] = [-4];
    expect(() => saveAllowlist(doc, file)).toThrow(AllowlistError);
    expect(fs.existsSync(file)).toBe(false);
  });

  it('reports a missing file as an allowlist error', () => {
    const root = new TempRoot();
    tmp = root;
    expect(() => loadAllowlist(root.path('missing.json'))).toThrow(AllowlistError);
  });
});
