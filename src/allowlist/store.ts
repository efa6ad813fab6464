/**
 * Allowlist document: which case indices pass, per suite kind and fixture
 *
 * ```json
 * {
 *   "tokenizer": { "test1.test": [0, 1, 2] },
 *   "tree": { "doc": { "tests1.dat": [0] }, "frag": {} },
 *   "version": 1
 * }
 * ```
 */

import * as fs from 'fs';
import * as path from 'path';
import { AllowlistError, errorMessage } from '../errors.js';
import type { SuiteKind } from '../types.js';
import { uniqSorted } from './ranges.js';

export const ALLOWLIST_VERSION = 1;

export type FixtureIndexMap = Record<string, number[]>;

export interface AllowlistDocument {
  version: typeof ALLOWLIST_VERSION;
  tree: {
    doc: FixtureIndexMap;
    frag: FixtureIndexMap;
  };
  tokenizer: FixtureIndexMap;
}

export function emptyAllowlist(): AllowlistDocument {
  return { version: ALLOWLIST_VERSION, tree: { doc: {}, frag: {} }, tokenizer: {} };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateSection(section: unknown, name: string): FixtureIndexMap {
  if (!isRecord(section)) {
    throw new AllowlistError(`${name} must be an object`);
  }
  const out: FixtureIndexMap = {};
  for (const [fixture, indices] of Object.entries(section)) {
    if (
      !Array.isArray(indices) ||
      !indices.every((i): i is number => typeof i === 'number' && Number.isInteger(i) && i >= 0)
    ) {
      throw new AllowlistError(`${name}.${fixture} must be a list of non-negative ints`);
    }
    out[fixture] = indices;
  }
  return out;
}

/**
 * Check the document shape. Never repairs anything.
 */
export function validateAllowlist(data: unknown): AllowlistDocument {
  if (!isRecord(data)) {
    throw new AllowlistError('Top-level JSON must be an object');
  }
  if (data.version !== ALLOWLIST_VERSION) {
    throw new AllowlistError(`Unsupported allowlists version: ${JSON.stringify(data.version)}`);
  }
  if (!('tree' in data) || !('tokenizer' in data)) {
    throw new AllowlistError('Missing required keys: tree/tokenizer');
  }
  const tree = data.tree;
  if (!isRecord(tree) || !('doc' in tree) || !('frag' in tree)) {
    throw new AllowlistError('tree must be an object with doc/frag keys');
  }
  return {
    version: ALLOWLIST_VERSION,
    tree: {
      doc: validateSection(tree.doc, 'tree.doc'),
      frag: validateSection(tree.frag, 'tree.frag'),
    },
    tokenizer: validateSection(data.tokenizer, 'tokenizer'),
  };
}

export function parseAllowlist(text: string, source = 'allowlists'): AllowlistDocument {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new AllowlistError(`${source}: invalid JSON: ${errorMessage(error)}`);
  }
  return validateAllowlist(data);
}

export function loadAllowlist(filePath: string): AllowlistDocument {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new AllowlistError(`cannot read ${filePath}: ${errorMessage(error)}`);
  }
  return parseAllowlist(text, filePath);
}

function canonicalSection(section: FixtureIndexMap): FixtureIndexMap {
  const out: FixtureIndexMap = {};
  for (const fixture of Object.keys(section).sort()) {
    out[fixture] = uniqSorted(section[fixture]);
  }
  return out;
}

/**
 * Canonical text: keys sorted at every level, index lists sorted and unique,
 * two-space indent, trailing newline.
 */
export function serializeAllowlist(doc: AllowlistDocument): string {
  const valid = validateAllowlist(doc);
  const canonical = {
    tokenizer: canonicalSection(valid.tokenizer),
    tree: {
      doc: canonicalSection(valid.tree.doc),
      frag: canonicalSection(valid.tree.frag),
    },
    version: valid.version,
  };
  return JSON.stringify(canonical, null, 2) + '\n';
}

/**
 * Write the whole document. Nothing is written if validation fails.
 */
export function saveAllowlist(doc: AllowlistDocument, filePath: string): void {
  const text = serializeAllowlist(doc);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, text, 'utf-8');
}

export function section(doc: AllowlistDocument, kind: SuiteKind): FixtureIndexMap {
  switch (kind) {
    case 'tree-doc':
      return doc.tree.doc;
    case 'tree-frag':
      return doc.tree.frag;
    case 'tokenizer':
      return doc.tokenizer;
  }
}

export function getIndices(doc: AllowlistDocument, kind: SuiteKind, fixture: string): number[] {
  const sec = section(doc, kind);
  return Object.hasOwn(sec, fixture) ? uniqSorted(sec[fixture]) : [];
}

export function setIndices(
  doc: AllowlistDocument,
  kind: SuiteKind,
  fixture: string,
  indices: Iterable<number>
): void {
  section(doc, kind)[fixture] = uniqSorted(indices);
}

/**
 * Merge indices into a fixture's entry
 */
export function addIndices(
  doc: AllowlistDocument,
  kind: SuiteKind,
  fixture: string,
  indices: Iterable<number>
): { before: number; after: number } {
  const before = getIndices(doc, kind, fixture);
  const merged = uniqSorted([...before, ...indices]);
  setIndices(doc, kind, fixture, merged);
  return { before: before.length, after: merged.length };
}

/**
 * Number of enabled cases per kind, across every fixture in the document
 */
export function enabledTotals(doc: AllowlistDocument): Record<SuiteKind, number> {
  const count = (sec: FixtureIndexMap): number =>
    Object.values(sec).reduce((sum, xs) => sum + uniqSorted(xs).length, 0);
  return {
    'tree-doc': count(doc.tree.doc),
    'tree-frag': count(doc.tree.frag),
    tokenizer: count(doc.tokenizer),
  };
}
