/**
 * Tokenizer `.test` fixture reader
 */

import * as fs from 'fs';
import * as path from 'path';
import { roundTripForgiving } from '../codec/utf8.js';
import { CorpusFormatError, errorMessage } from '../errors.js';
import { isJsonObject, mapJsonStrings, parseJson, type JsonValue } from '../json.js';
import type { Outcome, TokenizerCase, TokenizerFixture } from '../types.js';
import { decodeBackslashEscapes } from './escapes.js';

export const DEFAULT_INITIAL_STATE = 'Data state';

/**
 * Fixture state names and the engine arguments they map to
 */
export const TOKENIZER_STATES: Readonly<Record<string, string>> = {
  'Data state': 'Data',
  'PLAINTEXT state': 'PLAINTEXT',
  'RCDATA state': 'RCDATA',
  'RAWTEXT state': 'RAWTEXT',
  'Script data state': 'ScriptData',
  'CDATA section state': 'CDATASection',
};

/**
 * Map fixture state names to engine arguments. One unknown name makes the
 * whole case a skip: it can never pass, but later cases are unaffected.
 */
export function resolveStates(names: string[]): Outcome<string[]> {
  const states: string[] = [];
  for (const raw of names) {
    const name = raw.trim();
    const state = Object.hasOwn(TOKENIZER_STATES, name) ? TOKENIZER_STATES[name] : undefined;
    if (state === undefined) {
      return { status: 'skip', reason: `unsupported initialStates entry: ${JSON.stringify(raw)}` };
    }
    states.push(state);
  }
  return { status: 'ok', value: states };
}

/**
 * Normalise one raw test. Throws CorpusFormatError when required fields are
 * missing or an escape sequence is malformed.
 */
export function normalizeTokenizerTest(raw: JsonValue, index: number): TokenizerCase {
  if (!isJsonObject(raw)) {
    throw new CorpusFormatError(`test ${index} is not an object`);
  }
  const { input, output, initialStates, lastStartTag, doubleEscaped, description } = raw;

  if (typeof input !== 'string') {
    throw new CorpusFormatError(`test ${index} has no string 'input'`);
  }
  if (output === undefined) {
    throw new CorpusFormatError(`test ${index} has no 'output'`);
  }
  if (lastStartTag !== undefined && lastStartTag !== null && typeof lastStartTag !== 'string') {
    throw new CorpusFormatError(`test ${index} has a non-string 'lastStartTag'`);
  }

  let stateNames = [DEFAULT_INITIAL_STATE];
  if (Array.isArray(initialStates) && initialStates.length > 0) {
    stateNames = [];
    for (const name of initialStates) {
      if (typeof name !== 'string') {
        throw new CorpusFormatError(`test ${index} has a non-string 'initialStates' entry`);
      }
      stateNames.push(name);
    }
  }

  const unescape = doubleEscaped === true ? decodeBackslashEscapes : (s: string) => s;
  let decodedInput: string;
  let decodedOutput: JsonValue;
  let decodedLast: string | undefined;
  try {
    decodedInput = unescape(input);
    decodedOutput = mapJsonStrings(output, unescape);
    decodedLast = typeof lastStartTag === 'string' ? unescape(lastStartTag) : undefined;
  } catch (error) {
    throw new CorpusFormatError(`test ${index}: ${errorMessage(error)}`);
  }

  return {
    index,
    description: typeof description === 'string' ? description : undefined,
    input: roundTripForgiving(decodedInput),
    expected: mapJsonStrings(decodedOutput, roundTripForgiving),
    states: resolveStates(stateNames),
    stateNames,
    // an empty tag is sent as "-" too
    lastStartTag: decodedLast ? roundTripForgiving(decodedLast) : undefined,
  };
}

interface RawTokenizerTests {
  xmlViolation: boolean;
  tests: JsonValue[];
}

/**
 * The raw `tests` (or `xmlViolationTests`) array of a fixture document
 */
function readTokenizerTests(raw: string, fixture?: string): RawTokenizerTests {
  let root: JsonValue;
  try {
    root = parseJson(raw);
  } catch (error) {
    throw new CorpusFormatError(`invalid JSON: ${errorMessage(error)}`, fixture);
  }
  if (!isJsonObject(root)) {
    throw new CorpusFormatError('top-level JSON must be an object', fixture);
  }

  let xmlViolation = false;
  let tests = root.tests;
  if (tests === undefined) {
    tests = root.xmlViolationTests;
    xmlViolation = true;
  }
  if (!Array.isArray(tests)) {
    throw new CorpusFormatError("unexpected tokenizer test format: no 'tests' array", fixture);
  }
  return { xmlViolation, tests };
}

/**
 * Parse fixture JSON text into its ordered cases
 */
export function parseTokenizerFixture(raw: string, fixture?: string): TokenizerFixture {
  const { xmlViolation, tests } = readTokenizerTests(raw, fixture);

  const cases = tests.map((test, index) => {
    try {
      return normalizeTokenizerTest(test, index);
    } catch (error) {
      if (error instanceof CorpusFormatError) {
        throw new CorpusFormatError(error.message, fixture);
      }
      throw error;
    }
  });

  return { xmlViolation, cases };
}

export function loadTokenizerFixture(filePath: string): TokenizerFixture {
  const raw = fs.readFileSync(filePath, 'utf-8');
  return parseTokenizerFixture(raw, path.basename(filePath));
}

/**
 * Number of tests in a fixture. The tests themselves are not normalised, so a
 * malformed test still counts and only fails the fixture when it is run.
 */
export function countTokenizerCases(filePath: string): number {
  const raw = fs.readFileSync(filePath, 'utf-8');
  return readTokenizerTests(raw, path.basename(filePath)).tests.length;
}
