import type { Engine } from '../../src/engine/engine.js';
import type { JsonValue } from '../../src/json.js';
import type { Batch } from '../../src/types.js';

export type Responder = (batch: Batch) => JsonValue[] | Promise<JsonValue[]>;

/**
 * In-process engine returning canned results; records every batch it sees
 */
export class FakeEngine implements Engine {
  readonly batches: Batch[] = [];

  constructor(private readonly respond: Responder = toyResponder) {}

  async submit(batch: Batch): Promise<JsonValue[]> {
    this.batches.push(batch);
    return this.respond(batch);
  }
}

/**
 * Deterministic stand-in for a real engine:
 * - tokenizer: the whole input as one Character token
 * - tree: `| <input>` with zero errors
 * - encoding: always windows-1252
 */
export const toyResponder: Responder = (batch) => {
  switch (batch.mode) {
    case 'tokenizer-batch':
    case 'tokenizer-batch-xml':
      return batch.cases.map((c) => [['Character', c.input]]);
    case 'tree-batch':
      return batch.cases.map((c) => [`| ${c.input}`, 0]);
    case 'encoding-batch':
      return batch.cases.map(() => 'windows-1252');
  }
};
