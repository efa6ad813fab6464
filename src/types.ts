/**
 * Type definitions shared across the harness
 */

import type { JsonValue } from './json.js';

/**
 * Allowlisted suite kinds. Encoding fixtures are run but never allowlisted.
 */
export type SuiteKind = 'tokenizer' | 'tree-doc' | 'tree-frag';

export const SUITE_KINDS: readonly SuiteKind[] = ['tree-doc', 'tree-frag', 'tokenizer'];

export function isSuiteKind(value: string): value is SuiteKind {
  return SUITE_KINDS.some((k) => k === value);
}

/**
 * Result of a per-case step that may be skipped. Errors that abort a whole
 * fixture are thrown as HarnessError instead.
 */
export type Outcome<T> = { status: 'ok'; value: T } | { status: 'skip'; reason: string };

// ============================================================================
// Cases
// ============================================================================

/**
 * One tokenizer test after double-escape decoding and UTF-8 round-tripping
 */
export interface TokenizerCase {
  index: number;
  /** Human-readable description from the fixture */
  description?: string;
  input: string;
  expected: JsonValue;
  /** Engine state arguments; unsupported names make this a skip outcome */
  states: Outcome<string[]>;
  /** Fixture state names, as written */
  stateNames: string[];
  lastStartTag?: string;
}

export interface TokenizerFixture {
  /** `xmlViolationTests` fixtures run in the engine's XML-violation mode */
  xmlViolation: boolean;
  cases: TokenizerCase[];
}

export type Scripting = 'on' | 'off';

export interface TreeCase {
  /** Index within its own numbering (documents and fragments count separately) */
  index: number;
  input: string;
  expected: string;
  errorCount: number;
  /** Context element for fragment cases; undefined for full documents */
  fragmentContext?: string;
  scripting?: Scripting;
}

export interface TreeFixture {
  doc: TreeCase[];
  frag: TreeCase[];
}

export interface EncodingCase {
  index: number;
  input: string;
  expectedLabel: string;
}

// ============================================================================
// Engine batches
// ============================================================================

export type BatchMode = 'tokenizer-batch' | 'tokenizer-batch-xml' | 'tree-batch' | 'encoding-batch';

export interface TokenizerRequest {
  state: string;
  lastStartTag?: string;
  input: string;
}

export interface TreeRequest {
  kind: 'doc' | 'frag';
  context?: string;
  scripting?: Scripting;
  input: string;
}

export interface EncodingRequest {
  transport?: string;
  bytes: Uint8Array;
}

export type Batch =
  | { mode: 'tokenizer-batch' | 'tokenizer-batch-xml'; cases: TokenizerRequest[] }
  | { mode: 'tree-batch'; cases: TreeRequest[] }
  | { mode: 'encoding-batch'; cases: EncodingRequest[] };

/**
 * Decoded tree-construction result
 */
export interface TreeResult {
  tree: string;
  errorCount: number;
}
