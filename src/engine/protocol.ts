/**
 * Batch wire protocol
 *
 * Request (stdin):
 *   <case count>
 *   <tab-separated header>\t<payload length>
 *   <base64 payload, 900 characters per line>
 *   ...
 *
 * Response (stdout): a single JSON array with one element per case.
 */

import { encodeSurrogatePass } from '../codec/utf8.js';
import { ProtocolError, errorMessage } from '../errors.js';
import { parseJson, type JsonValue } from '../json.js';
import type { Batch, TreeResult } from '../types.js';

/** The engine's line reader stops at 1023 characters. */
export const PAYLOAD_LINE_LENGTH = 900;

const NONE = '-';

export function encodePayload(bytes: Uint8Array): string[] {
  const payload = Buffer.from(bytes).toString('base64');
  const lines: string[] = [];
  for (let i = 0; i < payload.length; i += PAYLOAD_LINE_LENGTH) {
    lines.push(payload.slice(i, i + PAYLOAD_LINE_LENGTH));
  }
  return lines;
}

function pushCase(lines: string[], header: string[], bytes: Uint8Array): void {
  const chunks = encodePayload(bytes);
  const length = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  lines.push([...header, String(length)].join('\t'));
  lines.push(...chunks);
}

/**
 * Serialise a batch into the request text written to the engine's stdin
 */
export function encodeBatch(batch: Batch): string {
  const lines: string[] = [String(batch.cases.length)];

  switch (batch.mode) {
    case 'tokenizer-batch':
    case 'tokenizer-batch-xml':
      for (const c of batch.cases) {
        pushCase(lines, [c.state, c.lastStartTag || NONE], encodeSurrogatePass(c.input));
      }
      break;
    case 'tree-batch':
      for (const c of batch.cases) {
        pushCase(lines, [c.kind, c.context || NONE, c.scripting ?? NONE], encodeSurrogatePass(c.input));
      }
      break;
    case 'encoding-batch':
      for (const c of batch.cases) {
        pushCase(lines, [c.transport || NONE], c.bytes);
      }
      break;
  }

  return lines.join('\n') + '\n';
}

/**
 * Parse engine stdout. Anything other than a JSON array fails the batch.
 */
export function parseBatchResponse(stdout: string): JsonValue[] {
  let parsed: JsonValue;
  try {
    parsed = parseJson(stdout);
  } catch (error) {
    throw new ProtocolError(`engine output is not valid JSON: ${errorMessage(error)}`);
  }
  if (!Array.isArray(parsed)) {
    throw new ProtocolError(`engine output is not a JSON array (got ${typeof parsed})`);
  }
  return parsed;
}

/**
 * Enforce one result per submitted case
 */
export function checkResultCount(batch: Batch, results: JsonValue[]): JsonValue[] {
  if (results.length !== batch.cases.length) {
    throw new ProtocolError(
      `engine returned ${results.length} results for ${batch.cases.length} cases`
    );
  }
  return results;
}

/**
 * Read a `[treeDump, errorCount]` pair; undefined if the shape is wrong
 */
export function decodeTreeResult(value: JsonValue): TreeResult | undefined {
  if (!Array.isArray(value) || value.length !== 2) {
    return undefined;
  }
  const [tree, errorCount] = value;
  if (typeof tree !== 'string' || typeof errorCount !== 'number' || !Number.isInteger(errorCount)) {
    return undefined;
  }
  return { tree, errorCount };
}

export function decodeEncodingResult(value: JsonValue): string | undefined {
  return typeof value === 'string' ? value : undefined;
}
