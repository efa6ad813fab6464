/**
 * Harness runner
 * Submits fixture cases to the engine and turns results into verdicts
 */

import * as fs from 'fs';
import * as path from 'path';
import { getIndices, section, setIndices, type AllowlistDocument } from './allowlist/store.js';
import { encodeSurrogatePass } from './codec/utf8.js';
import type { HarnessConfig } from './config.js';
import { DAT_EXTENSION, TOKENIZER_EXTENSION, discoverFixtures, findFixture } from './corpus/discover.js';
import { loadEncodingFixture, normalizeEncodingLabel } from './corpus/encoding.js';
import { loadTokenizerFixture } from './corpus/tokenizer.js';
import { loadTreeFixture } from './corpus/tree.js';
import type { Engine } from './engine/engine.js';
import { checkResultCount, decodeEncodingResult, decodeTreeResult } from './engine/protocol.js';
import { HarnessError, UsageError } from './errors.js';
import { jsonEqual } from './json.js';
import type {
  Batch,
  EncodingCase,
  SuiteKind,
  TokenizerCase,
  TokenizerFixture,
  TokenizerRequest,
  TreeCase,
  TreeFixture,
  TreeRequest,
} from './types.js';

export interface HarnessContext {
  config: HarnessConfig;
  engine: Engine;
}

export type Family = 'tokenizer' | 'tree' | 'encoding';

export type VerdictKind = SuiteKind | 'encoding';

export interface Mismatch {
  /** Tokenizer state the attempt ran in */
  state?: string;
  reason: string;
  expected?: string;
  actual?: string;
}

export interface CaseVerdict {
  kind: VerdictKind;
  index: number;
  passed: boolean;
  mismatches: Mismatch[];
}

function newVerdict(kind: VerdictKind, index: number): CaseVerdict {
  return { kind, index, passed: true, mismatches: [] };
}

function fail(verdict: CaseVerdict, mismatch: Mismatch): void {
  verdict.passed = false;
  verdict.mismatches.push(mismatch);
}

function outOfRange(verdict: CaseVerdict, count: number): void {
  fail(verdict, { reason: `index out of range (fixture has ${count} cases)` });
}

// ============================================================================
// Per-fixture evaluation
// ============================================================================

/**
 * Run tokenizer cases (all, or only `indices`) in one batch. A case runs once
 * per initial state and passes only if every state matches.
 */
export async function evaluateTokenizerFixture(
  engine: Engine,
  fixture: TokenizerFixture,
  indices?: readonly number[]
): Promise<CaseVerdict[]> {
  const selected = indices ?? fixture.cases.map((c) => c.index);
  const verdicts: CaseVerdict[] = [];
  const requests: TokenizerRequest[] = [];
  const attempts: Array<{ verdict: CaseVerdict; state: string; testCase: TokenizerCase }> = [];

  for (const index of selected) {
    const verdict = newVerdict('tokenizer', index);
    verdicts.push(verdict);
    if (index >= fixture.cases.length) {
      outOfRange(verdict, fixture.cases.length);
      continue;
    }
    const testCase = fixture.cases[index];
    const states = testCase.states;
    if (states.status === 'skip') {
      fail(verdict, { reason: states.reason });
      continue;
    }
    for (const state of states.value) {
      requests.push({ state, lastStartTag: testCase.lastStartTag, input: testCase.input });
      attempts.push({ verdict, state, testCase });
    }
  }

  if (requests.length > 0) {
    const batch: Batch = {
      mode: fixture.xmlViolation ? 'tokenizer-batch-xml' : 'tokenizer-batch',
      cases: requests,
    };
    const results = checkResultCount(batch, await engine.submit(batch));
    results.forEach((got, i) => {
      const { verdict, state, testCase } = attempts[i];
      if (!jsonEqual(got, testCase.expected)) {
        fail(verdict, {
          state,
          reason: 'mismatch',
          expected: JSON.stringify(testCase.expected),
          actual: JSON.stringify(got),
        });
      }
    });
  }

  return verdicts;
}

export interface TreeSelection {
  doc?: readonly number[];
  frag?: readonly number[];
}

/**
 * Run tree-construction cases in one batch; document and fragment cases
 * share it. Without a selection every case runs.
 */
export async function evaluateTreeFixture(
  engine: Engine,
  fixture: TreeFixture,
  selection?: TreeSelection
): Promise<CaseVerdict[]> {
  const verdicts: CaseVerdict[] = [];
  const requests: TreeRequest[] = [];
  const attempts: Array<{ verdict: CaseVerdict; testCase: TreeCase }> = [];

  const select = (kind: 'tree-doc' | 'tree-frag', cases: TreeCase[], indices?: readonly number[]): void => {
    const chosen = selection ? indices ?? [] : cases.map((c) => c.index);
    for (const index of chosen) {
      const verdict = newVerdict(kind, index);
      verdicts.push(verdict);
      if (index >= cases.length) {
        outOfRange(verdict, cases.length);
        continue;
      }
      const testCase = cases[index];
      requests.push({
        kind: kind === 'tree-doc' ? 'doc' : 'frag',
        context: testCase.fragmentContext,
        scripting: testCase.scripting,
        input: testCase.input,
      });
      attempts.push({ verdict, testCase });
    }
  };

  select('tree-doc', fixture.doc, selection?.doc);
  select('tree-frag', fixture.frag, selection?.frag);

  if (requests.length > 0) {
    const batch: Batch = { mode: 'tree-batch', cases: requests };
    const results = checkResultCount(batch, await engine.submit(batch));
    results.forEach((got, i) => {
      const { verdict, testCase } = attempts[i];
      const result = decodeTreeResult(got);
      if (!result) {
        fail(verdict, { reason: 'invalid runner output shape', actual: JSON.stringify(got) });
        return;
      }
      if (result.tree !== testCase.expected) {
        fail(verdict, { reason: 'tree mismatch', expected: testCase.expected, actual: result.tree });
      }
      if (result.errorCount !== testCase.errorCount) {
        fail(verdict, {
          reason: 'error-count mismatch',
          expected: String(testCase.errorCount),
          actual: String(result.errorCount),
        });
      }
    });
  }

  return verdicts;
}

/**
 * Run encoding cases in one batch, comparing normalised labels
 */
export async function evaluateEncodingFixture(engine: Engine, cases: EncodingCase[]): Promise<CaseVerdict[]> {
  if (cases.length === 0) {
    return [];
  }
  const batch: Batch = {
    mode: 'encoding-batch',
    cases: cases.map((c) => ({ bytes: encodeSurrogatePass(c.input) })),
  };
  const results = checkResultCount(batch, await engine.submit(batch));
  return cases.map((c, i) => {
    const verdict = newVerdict('encoding', c.index);
    const label = decodeEncodingResult(results[i]);
    if (label === undefined || normalizeEncodingLabel(label) !== normalizeEncodingLabel(c.expectedLabel)) {
      fail(verdict, {
        reason: 'label mismatch',
        expected: c.expectedLabel,
        actual: label ?? JSON.stringify(results[i]),
      });
    }
    return verdict;
  });
}

// ============================================================================
// Fixture lookup
// ============================================================================

/**
 * Allowlists are keyed by basename. Prefer the file directly in `dir`, then
 * the first match further down.
 */
export function resolveFixturePath(dir: string, extension: string, fixture: string): string | undefined {
  const direct = path.join(dir, fixture);
  if (fs.existsSync(direct)) {
    return direct;
  }
  return findFixture(dir, extension, fixture);
}

function requireFixture(dir: string, extension: string, fixture: string): string {
  const found = resolveFixturePath(dir, extension, fixture);
  if (!found) {
    throw new UsageError(`fixture not found: ${fixture} (under ${dir})`);
  }
  return found;
}

function uniqueBasenames(files: string[]): string[] {
  return [...new Set(files.map((f) => path.basename(f)))].sort();
}

// ============================================================================
// Verify
// ============================================================================

export interface FixtureRun {
  family: Family;
  fixture: string;
  cases: CaseVerdict[];
  /** Set when the whole fixture failed (format or protocol error) */
  error?: string;
  duration: number;
}

export interface RunResult {
  fixtures: FixtureRun[];
  passed: number;
  failed: number;
  /** Fixtures that failed as a whole */
  errored: number;
  duration: number;
  timestamp: string;
  engine: string;
}

async function runFixture(
  family: Family,
  fixture: string,
  evaluate: () => Promise<CaseVerdict[]>
): Promise<FixtureRun> {
  const startTime = Date.now();
  try {
    const cases = await evaluate();
    return { family, fixture, cases, duration: Date.now() - startTime };
  } catch (error) {
    if (!(error instanceof HarnessError)) {
      throw error;
    }
    return { family, fixture, cases: [], error: error.message, duration: Date.now() - startTime };
  }
}

function summarize(fixtures: FixtureRun[], startTime: number, engine: string): RunResult {
  let passed = 0;
  let failed = 0;
  let errored = 0;
  for (const run of fixtures) {
    if (run.error !== undefined) errored++;
    for (const verdict of run.cases) {
      if (verdict.passed) passed++;
      else failed++;
    }
  }
  return {
    fixtures,
    passed,
    failed,
    errored,
    duration: Date.now() - startTime,
    timestamp: new Date().toISOString(),
    engine,
  };
}

/**
 * Re-run every allowlisted case and report the ones that no longer pass.
 * A fixture-level failure is recorded and the run moves on.
 */
export async function verifyAllowlist(ctx: HarnessContext, doc: AllowlistDocument): Promise<RunResult> {
  const startTime = Date.now();
  const { corpus } = ctx.config;
  const runs: FixtureRun[] = [];

  for (const fixture of Object.keys(doc.tokenizer).sort()) {
    const enabled = getIndices(doc, 'tokenizer', fixture);
    if (enabled.length === 0) continue;
    runs.push(
      await runFixture('tokenizer', fixture, async () => {
        const file = requireFixture(corpus.tokenizerDir, TOKENIZER_EXTENSION, fixture);
        return evaluateTokenizerFixture(ctx.engine, loadTokenizerFixture(file), enabled);
      })
    );
  }

  const treeFixtures = [...new Set([...Object.keys(doc.tree.doc), ...Object.keys(doc.tree.frag)])].sort();
  for (const fixture of treeFixtures) {
    const selection = {
      doc: getIndices(doc, 'tree-doc', fixture),
      frag: getIndices(doc, 'tree-frag', fixture),
    };
    if (selection.doc.length === 0 && selection.frag.length === 0) continue;
    runs.push(
      await runFixture('tree', fixture, async () => {
        const file = requireFixture(corpus.treeDir, DAT_EXTENSION, fixture);
        return evaluateTreeFixture(ctx.engine, loadTreeFixture(file), selection);
      })
    );
  }

  return summarize(runs, startTime, ctx.config.engine.executable);
}

/**
 * One line per failing case or failed fixture, in run order
 */
export function failureLines(result: RunResult): string[] {
  const lines: string[] = [];
  for (const run of result.fixtures) {
    if (run.error !== undefined) {
      lines.push(`${run.family} ${run.fixture}: runner failed: ${run.error}`);
    }
    for (const verdict of run.cases) {
      for (const m of verdict.mismatches) {
        const state = m.state ? ` (${m.state})` : '';
        lines.push(`${verdict.kind} ${run.fixture} #${verdict.index}${state}: ${m.reason}`);
      }
    }
  }
  return lines;
}

// ============================================================================
// Scan
// ============================================================================

export interface ScanChange {
  kind: SuiteKind;
  fixture: string;
  before: number;
  after: number;
}

export interface ScanResult {
  changes: ScanChange[];
  /** Fixtures whose entries were left untouched because they failed */
  errors: FixtureRun[];
}

function applyPassing(
  doc: AllowlistDocument,
  kind: SuiteKind,
  fixture: string,
  verdicts: CaseVerdict[]
): ScanChange {
  const before = getIndices(doc, kind, fixture).length;
  const passing = verdicts.filter((v) => v.kind === kind && v.passed).map((v) => v.index);
  setIndices(doc, kind, fixture, passing);
  return { kind, fixture, before, after: passing.length };
}

/**
 * Run every case of every discovered fixture and replace the allowlist
 * entries with the passing sets. Mutates `doc`; persisting is up to the caller.
 */
export async function scanCorpus(
  ctx: HarnessContext,
  doc: AllowlistDocument,
  families: ReadonlyArray<'tokenizer' | 'tree'> = ['tokenizer', 'tree']
): Promise<ScanResult> {
  const { corpus } = ctx.config;
  const result: ScanResult = { changes: [], errors: [] };

  if (families.includes('tokenizer')) {
    for (const fixture of uniqueBasenames(discoverFixtures(corpus.tokenizerDir, TOKENIZER_EXTENSION))) {
      const run = await runFixture('tokenizer', fixture, async () => {
        const file = requireFixture(corpus.tokenizerDir, TOKENIZER_EXTENSION, fixture);
        return evaluateTokenizerFixture(ctx.engine, loadTokenizerFixture(file));
      });
      if (run.error !== undefined) {
        result.errors.push(run);
        continue;
      }
      result.changes.push(applyPassing(doc, 'tokenizer', fixture, run.cases));
    }
  }

  if (families.includes('tree')) {
    for (const fixture of uniqueBasenames(discoverFixtures(corpus.treeDir, DAT_EXTENSION))) {
      const run = await runFixture('tree', fixture, async () => {
        const file = requireFixture(corpus.treeDir, DAT_EXTENSION, fixture);
        return evaluateTreeFixture(ctx.engine, loadTreeFixture(file));
      });
      if (run.error !== undefined) {
        result.errors.push(run);
        continue;
      }
      result.changes.push(applyPassing(doc, 'tree-doc', fixture, run.cases));
      const hasFragments = run.cases.some((v) => v.kind === 'tree-frag');
      if (hasFragments || Object.hasOwn(section(doc, 'tree-frag'), fixture)) {
        result.changes.push(applyPassing(doc, 'tree-frag', fixture, run.cases));
      }
    }
  }

  return result;
}

// ============================================================================
// Single-fixture report
// ============================================================================

export interface FixtureReport {
  kind: SuiteKind;
  fixture: string;
  verdicts: CaseVerdict[];
  /** Input of each case, by index */
  inputs: Map<number, string>;
}

/**
 * Run every case of one kind in one fixture, or only `indices`
 */
export async function reportFixture(
  ctx: HarnessContext,
  kind: SuiteKind,
  fixture: string,
  indices?: readonly number[]
): Promise<FixtureReport> {
  const { corpus } = ctx.config;

  if (kind === 'tokenizer') {
    const loaded = loadTokenizerFixture(requireFixture(corpus.tokenizerDir, TOKENIZER_EXTENSION, fixture));
    const verdicts = await evaluateTokenizerFixture(ctx.engine, loaded, indices);
    const inputs = new Map(loaded.cases.map((c) => [c.index, c.input]));
    return { kind, fixture, verdicts, inputs };
  }

  const loaded = loadTreeFixture(requireFixture(corpus.treeDir, DAT_EXTENSION, fixture));
  const cases = kind === 'tree-doc' ? loaded.doc : loaded.frag;
  const chosen = indices ?? cases.map((c) => c.index);
  const selection: TreeSelection = kind === 'tree-doc' ? { doc: chosen } : { frag: chosen };
  const verdicts = await evaluateTreeFixture(ctx.engine, loaded, selection);
  const inputs = new Map(cases.map((c) => [c.index, c.input]));
  return { kind, fixture, verdicts, inputs };
}

// ============================================================================
// Encoding
// ============================================================================

export const DEFAULT_ENCODING_FIXTURES = ['tests1.dat', 'tests2.dat', 'test-yahoo-jp.dat'];

export async function runEncodingFixtures(
  ctx: HarnessContext,
  fixtures: readonly string[] = DEFAULT_ENCODING_FIXTURES
): Promise<RunResult> {
  const startTime = Date.now();
  const { encodingDir } = ctx.config.corpus;
  const runs: FixtureRun[] = [];

  for (const fixture of fixtures) {
    runs.push(
      await runFixture('encoding', fixture, async () => {
        const file = requireFixture(encodingDir, DAT_EXTENSION, fixture);
        return evaluateEncodingFixture(ctx.engine, loadEncodingFixture(file));
      })
    );
  }

  return summarize(runs, startTime, ctx.config.engine.executable);
}
