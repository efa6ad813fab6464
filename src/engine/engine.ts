/**
 * Engine clients
 *
 * The harness only talks to the engine through the Engine interface, so the
 * runner can be exercised against canned results.
 */

import { spawn } from 'child_process';
import type { EngineConfig } from '../config.js';
import { EngineTimeoutError, ProtocolError } from '../errors.js';
import type { JsonValue } from '../json.js';
import type { Batch } from '../types.js';
import { encodeBatch, parseBatchResponse } from './protocol.js';

export interface Engine {
  /**
   * Submit every case of a batch in one call and return the results in
   * request order. Rejects with ProtocolError if the batch as a whole cannot
   * be trusted.
   */
  submit(batch: Batch): Promise<JsonValue[]>;
}

/** How much engine stderr to keep on a failed batch. */
const STDERR_SNIPPET_CHARS = 2000;

/**
 * Runs `<executable> <mode>` once per batch, writes the request on stdin and
 * parses stdout after a zero exit.
 */
export class SubprocessEngine implements Engine {
  constructor(private readonly config: EngineConfig) {}

  async submit(batch: Batch): Promise<JsonValue[]> {
    const request = encodeBatch(batch);
    const { stdout } = await this.run(batch.mode, request);
    return parseBatchResponse(stdout);
  }

  private run(mode: string, request: string): Promise<{ stdout: string; stderr: string }> {
    const { executable, cwd, timeoutMs } = this.config;

    return new Promise((resolve, reject) => {
      const proc = spawn(executable, [mode], {
        cwd,
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      let settled = false;

      const finish = (error: Error | null, result?: { stdout: string; stderr: string }): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (error) {
          reject(error);
        } else if (result) {
          resolve(result);
        }
      };

      const timer = setTimeout(() => {
        proc.kill('SIGKILL');
        finish(new EngineTimeoutError(timeoutMs));
      }, timeoutMs);

      proc.stdout.on('data', (data: Buffer) => {
        stdoutChunks.push(data);
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderrChunks.push(data);
      });

      proc.on('error', (err) => {
        finish(new ProtocolError(`failed to start engine ${executable}: ${err.message}`));
      });

      let stdinError: Error | undefined;
      proc.stdin.on('error', (err) => {
        stdinError = err;
      });

      proc.on('close', (code, signal) => {
        const stdout = Buffer.concat(stdoutChunks).toString('utf-8');
        const stderr = Buffer.concat(stderrChunks).toString('utf-8');
        if (code !== 0) {
          const status = code === null ? `signal ${signal ?? 'unknown'}` : `exit status ${code}`;
          const detail = stderr.trim().slice(0, STDERR_SNIPPET_CHARS);
          finish(
            new ProtocolError(
              `engine ${mode} failed with ${status}${detail ? `: ${detail}` : ''}`,
              stderr
            )
          );
          return;
        }
        // exited before taking the whole request
        if (stdinError || !proc.stdin.writableFinished) {
          const reason = stdinError ? `: ${stdinError.message}` : '';
          finish(new ProtocolError(`engine ${mode} stopped reading its input${reason}`, stderr));
          return;
        }
        finish(null, { stdout, stderr });
      });

      proc.stdin.end(request, 'utf-8');
    });
  }
}
