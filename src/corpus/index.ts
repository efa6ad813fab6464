export { splitDataBlocks, splitLines } from './blocks.js';
export { decodeBackslashEscapes } from './escapes.js';
export {
  DEFAULT_INITIAL_STATE,
  TOKENIZER_STATES,
  resolveStates,
  normalizeTokenizerTest,
  parseTokenizerFixture,
  loadTokenizerFixture,
  countTokenizerCases,
} from './tokenizer.js';
export { parseTreeBlock, parseTreeFixture, loadTreeFixture, countTreeCases, type TreeBlock } from './tree.js';
export {
  normalizeEncodingLabel,
  parseEncodingBlock,
  parseEncodingFixture,
  loadEncodingFixture,
} from './encoding.js';
export {
  TOKENIZER_EXTENSION,
  DAT_EXTENSION,
  discoverFixtures,
  findFixture,
  collectCorpusTotals,
  type CorpusTotals,
  type TreeTotals,
} from './discover.js';
