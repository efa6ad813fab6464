/**
 * html5-conformance-harness
 *
 * Tracks which html5lib conformance cases an external HTML engine passes.
 */

export {
  ErrorCode,
  ErrorCodeName,
  EXIT_FAILURE,
  EXIT_USAGE,
  HarnessError,
  CorpusFormatError,
  ProtocolError,
  EngineTimeoutError,
  EngineBuildError,
  AllowlistError,
  HistoryError,
  ConfigError,
  UsageError,
  errorMessage,
} from './errors.js';
export type { ErrorCodeType } from './errors.js';

export type {
  SuiteKind,
  Outcome,
  TokenizerCase,
  TokenizerFixture,
  TreeCase,
  TreeFixture,
  EncodingCase,
  Scripting,
  BatchMode,
  Batch,
  TokenizerRequest,
  TreeRequest,
  EncodingRequest,
  TreeResult,
} from './types.js';
export { SUITE_KINDS, isSuiteKind } from './types.js';
export type { JsonValue, JsonObject } from './json.js';
export { jsonEqual } from './json.js';

export { decodeForgiving, encodeSurrogatePass, roundTripForgiving, INVALID_BYTE_BASE } from './codec/utf8.js';

export * from './corpus/index.js';

export {
  resolveConfig,
  DEFAULT_ALLOWLIST_PATH,
  DEFAULT_CONFIG_FILE,
  DEFAULT_ENGINE_PATH,
  DEFAULT_TIMEOUT_SECONDS,
  TIMEOUT_ENV_VAR,
} from './config.js';
export type { HarnessConfig, EngineConfig, EngineBuildConfig, CorpusConfig, ConfigOverrides } from './config.js';

export { encodeBatch, parseBatchResponse, PAYLOAD_LINE_LENGTH } from './engine/protocol.js';
export { SubprocessEngine } from './engine/engine.js';
export type { Engine } from './engine/engine.js';
export { ensureEngineBuilt, isEngineStale } from './engine/build.js';

export { parseRanges, formatRanges, uniqSorted } from './allowlist/ranges.js';
export {
  ALLOWLIST_VERSION,
  emptyAllowlist,
  validateAllowlist,
  parseAllowlist,
  loadAllowlist,
  serializeAllowlist,
  saveAllowlist,
  getIndices,
  setIndices,
  addIndices,
  enabledTotals,
} from './allowlist/store.js';
export type { AllowlistDocument, FixtureIndexMap } from './allowlist/store.js';
export { GitHistory, loadBaseline, loadHistoricalAllowlist, DEFAULT_REVISION } from './allowlist/history.js';
export type { HistorySource, Baseline, CommandRunner } from './allowlist/history.js';

export { computeCoverage } from './coverage/coverage.js';
export type { CoverageReport, KindCoverage, FixtureCoverage } from './coverage/coverage.js';
export { computeDiff } from './coverage/diff.js';
export type { AllowlistDiff, KindDiff, FixtureDiff } from './coverage/diff.js';

export {
  verifyAllowlist,
  scanCorpus,
  reportFixture,
  runEncodingFixtures,
  failureLines,
} from './runner.js';
export type { HarnessContext, RunResult, FixtureRun, CaseVerdict, Mismatch, ScanResult, FixtureReport } from './runner.js';

export * from './reporters/index.js';

export { runCli, buildProgram } from './cli/program.js';
export type { CliDeps, CliIO } from './cli/program.js';
