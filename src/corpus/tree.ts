/**
 * Tree-construction `.dat` fixture reader
 */

import * as fs from 'fs';
import * as path from 'path';
import { CorpusFormatError } from '../errors.js';
import type { Scripting, TreeCase, TreeFixture } from '../types.js';
import { DATA_DIRECTIVE, splitDataBlocks, splitLines } from './blocks.js';

const ERRORS = '#errors';
const NEW_ERRORS = '#new-errors';
const DOCUMENT = '#document';
const DOCUMENT_FRAGMENT = '#document-fragment';
const SCRIPT_ON = '#script-on';
const SCRIPT_OFF = '#script-off';

/** Directives that end a free-text section */
const DIRECTIVES = new Set([NEW_ERRORS, DOCUMENT_FRAGMENT, DOCUMENT, SCRIPT_OFF, SCRIPT_ON]);

/**
 * One parsed block, before document/fragment numbering
 */
export interface TreeBlock {
  input: string;
  expected: string;
  errorCount: number;
  fragmentContext?: string;
  scripting?: Scripting;
}

/**
 * Parse one `#data` block
 */
export function parseTreeBlock(block: string): TreeBlock {
  const lines = splitLines(block);
  if (lines[0] !== DATA_DIRECTIVE) {
    throw new CorpusFormatError('malformed block: missing #data');
  }

  const errorsAt = lines.indexOf(ERRORS);
  if (errorsAt === -1) {
    throw new CorpusFormatError('malformed block: missing #errors');
  }
  const input = lines.slice(1, errorsAt).join('\n');

  let idx = errorsAt + 1;
  const countErrorLines = (): number => {
    let count = 0;
    while (idx < lines.length && !DIRECTIVES.has(lines[idx])) {
      if (lines[idx] !== '') count += 1;
      idx += 1;
    }
    return count;
  };

  let errorCount = countErrorLines();
  let fragmentContext: string | undefined;
  let scripting: Scripting | undefined;

  while (idx < lines.length && lines[idx] !== DOCUMENT) {
    const line = lines[idx];
    idx += 1;
    if (line === NEW_ERRORS) {
      errorCount += countErrorLines();
    } else if (line === DOCUMENT_FRAGMENT) {
      fragmentContext = idx < lines.length ? lines[idx] : '';
      idx += 1;
    } else if (line === SCRIPT_ON || line === SCRIPT_OFF) {
      scripting = line === SCRIPT_ON ? 'on' : 'off';
    } else {
      throw new CorpusFormatError(`malformed block: unexpected line ${JSON.stringify(line)}`);
    }
  }

  if (idx >= lines.length) {
    throw new CorpusFormatError('malformed block: missing #document');
  }

  const expected = lines
    .slice(idx + 1)
    .join('\n')
    .replace(/\n+$/, '');

  return { input, expected, errorCount, fragmentContext, scripting };
}

/**
 * Parse a whole fixture, numbering documents and fragments independently
 */
export function parseTreeFixture(raw: string, fixture?: string): TreeFixture {
  const doc: TreeCase[] = [];
  const frag: TreeCase[] = [];

  splitDataBlocks(raw).forEach((block, blockIndex) => {
    let parsed: TreeBlock;
    try {
      parsed = parseTreeBlock(block);
    } catch (error) {
      if (error instanceof CorpusFormatError) {
        throw new CorpusFormatError(`block ${blockIndex}: ${error.message}`, fixture);
      }
      throw error;
    }

    const target = parsed.fragmentContext === undefined ? doc : frag;
    target.push({ index: target.length, ...parsed });
  });

  return { doc, frag };
}

export function loadTreeFixture(filePath: string): TreeFixture {
  const raw = fs.readFileSync(filePath, 'utf-8');
  return parseTreeFixture(raw, path.basename(filePath));
}

/**
 * Document and fragment totals from the block structure alone; a block that
 * would fail to parse still counts.
 */
export function countTreeCases(filePath: string): { doc: number; frag: number } {
  let doc = 0;
  let frag = 0;
  for (const block of splitDataBlocks(fs.readFileSync(filePath, 'utf-8'))) {
    const lines = splitLines(block);
    const end = lines.indexOf(DOCUMENT);
    const head = end === -1 ? lines : lines.slice(0, end);
    if (head.includes(DOCUMENT_FRAGMENT)) {
      frag += 1;
    } else {
      doc += 1;
    }
  }
  return { doc, frag };
}
