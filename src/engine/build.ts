/**
 * Optional engine build step
 */

import { spawn } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import type { EngineBuildConfig, EngineConfig } from '../config.js';
import { EngineBuildError } from '../errors.js';

function newestSourceMtime(build: EngineBuildConfig): number {
  let newest = 0;
  const walk = (dir: string): void => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        walk(full);
      } else if (
        entry.isFile() &&
        (build.extensions.length === 0 || build.extensions.some((ext) => entry.name.endsWith(ext)))
      ) {
        newest = Math.max(newest, fs.statSync(full).mtimeMs);
      }
    }
  };
  if (fs.existsSync(build.sources)) {
    walk(build.sources);
  }
  return newest;
}

/**
 * Whether the executable is missing or older than any of its sources
 */
export function isEngineStale(engine: EngineConfig): boolean {
  if (!fs.existsSync(engine.executable)) {
    return true;
  }
  if (!engine.build) {
    return false;
  }
  return fs.statSync(engine.executable).mtimeMs < newestSourceMtime(engine.build);
}

/**
 * Run the configured build command when forced or when the executable is
 * stale. Returns whether a build ran.
 */
export async function ensureEngineBuilt(engine: EngineConfig, options: { force?: boolean } = {}): Promise<boolean> {
  const build = engine.build;
  if (!build) {
    if (!fs.existsSync(engine.executable)) {
      throw new EngineBuildError(
        `engine executable not found: ${engine.executable} (no build command configured)`
      );
    }
    return false;
  }
  if (!options.force && !isEngineStale(engine)) {
    return false;
  }

  fs.mkdirSync(path.dirname(engine.executable), { recursive: true });
  const [cmd, ...args] = build.command;
  const exitCode = await new Promise<number>((resolve, reject) => {
    const proc = spawn(cmd, args, { cwd: engine.cwd, stdio: 'inherit' });
    proc.on('close', (code) => resolve(code ?? 1));
    proc.on('error', (err) => reject(new EngineBuildError(`failed to start build: ${err.message}`)));
  });

  if (exitCode !== 0) {
    throw new EngineBuildError(`build command failed with exit status ${exitCode}: ${build.command.join(' ')}`);
  }
  if (!fs.existsSync(engine.executable)) {
    throw new EngineBuildError(`build finished but ${engine.executable} does not exist`);
  }
  fs.chmodSync(engine.executable, 0o755);
  return true;
}
