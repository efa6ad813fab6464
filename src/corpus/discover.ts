/**
 * Fixture discovery and true case totals
 */

import * as fs from 'fs';
import * as path from 'path';
import type { CorpusConfig } from '../config.js';
import { countTokenizerCases } from './tokenizer.js';
import { countTreeCases } from './tree.js';

export const TOKENIZER_EXTENSION = '.test';
export const DAT_EXTENSION = '.dat';

/**
 * All files under `dir` (recursively) ending in `extension`, sorted.
 * A missing directory has no fixtures.
 */
export function discoverFixtures(dir: string, extension: string): string[] {
  if (!fs.existsSync(dir)) {
    return [];
  }
  const found: string[] = [];
  const walk = (current: string): void => {
    for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        walk(full);
      } else if (entry.isFile() && entry.name.endsWith(extension)) {
        found.push(full);
      }
    }
  };
  walk(dir);
  return found.sort();
}

/**
 * First path whose basename is `fixture`, if any
 */
export function findFixture(dir: string, extension: string, fixture: string): string | undefined {
  return discoverFixtures(dir, extension).find((p) => path.basename(p) === fixture);
}

export interface TreeTotals {
  doc: number;
  frag: number;
}

/**
 * Case totals keyed by fixture basename. Basenames repeated across
 * subdirectories (e.g. `scripted/`) are summed, since the allowlist is keyed
 * by basename alone.
 */
export interface CorpusTotals {
  tree: Map<string, TreeTotals>;
  tokenizer: Map<string, number>;
}

export function collectCorpusTotals(corpus: CorpusConfig): CorpusTotals {
  const tree = new Map<string, TreeTotals>();
  for (const file of discoverFixtures(corpus.treeDir, DAT_EXTENSION)) {
    const counts = countTreeCases(file);
    const name = path.basename(file);
    const prev = tree.get(name) ?? { doc: 0, frag: 0 };
    tree.set(name, { doc: prev.doc + counts.doc, frag: prev.frag + counts.frag });
  }

  const tokenizer = new Map<string, number>();
  for (const file of discoverFixtures(corpus.tokenizerDir, TOKENIZER_EXTENSION)) {
    const name = path.basename(file);
    tokenizer.set(name, (tokenizer.get(name) ?? 0) + countTokenizerCases(file));
  }

  return { tree, tokenizer };
}
