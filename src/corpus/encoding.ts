/**
 * Encoding-sniffing `.dat` fixture reader
 */

import * as fs from 'fs';
import * as path from 'path';
import { CorpusFormatError } from '../errors.js';
import type { EncodingCase } from '../types.js';
import { DATA_DIRECTIVE, splitDataBlocks, splitLines } from './blocks.js';

const ENCODING = '#encoding';

const LABEL_ALIASES: Readonly<Record<string, string>> = {
  utf8: 'utf-8',
  'iso-8859-1': 'windows-1252',
  'iso8859-1': 'windows-1252',
  latin1: 'windows-1252',
  'latin-1': 'windows-1252',
  windows1252: 'windows-1252',
  cp1252: 'windows-1252',
  'x-cp1252': 'windows-1252',
};

/**
 * Case-fold a label and collapse the aliases the fixtures use interchangeably
 */
export function normalizeEncodingLabel(label: string): string {
  const folded = label.trim().toLowerCase();
  return Object.hasOwn(LABEL_ALIASES, folded) ? LABEL_ALIASES[folded] : folded;
}

export function parseEncodingBlock(block: string): { input: string; expectedLabel: string } {
  const lines = splitLines(block);
  if (lines[0] !== DATA_DIRECTIVE) {
    throw new CorpusFormatError('malformed block: missing #data');
  }
  const at = lines.indexOf(ENCODING);
  if (at === -1) {
    throw new CorpusFormatError('malformed block: missing #encoding');
  }
  return {
    input: lines.slice(1, at).join('\n'),
    expectedLabel: lines.slice(at + 1).join('\n').trim(),
  };
}

export function parseEncodingFixture(raw: string, fixture?: string): EncodingCase[] {
  return splitDataBlocks(raw).map((block, index) => {
    try {
      return { index, ...parseEncodingBlock(block) };
    } catch (error) {
      if (error instanceof CorpusFormatError) {
        throw new CorpusFormatError(`block ${index}: ${error.message}`, fixture);
      }
      throw error;
    }
  });
}

export function loadEncodingFixture(filePath: string): EncodingCase[] {
  return parseEncodingFixture(fs.readFileSync(filePath, 'utf-8'), path.basename(filePath));
}
