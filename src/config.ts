/**
 * Harness configuration
 *
 * Resolved once at startup and passed to every component. Precedence, lowest
 * first: built-in defaults, the YAML config file, the environment snapshot
 * handed in by the caller, explicit overrides (CLI flags).
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ConfigError, errorMessage } from './errors.js';

export const DEFAULT_CONFIG_FILE = 'html5-harness.yaml';
export const DEFAULT_ALLOWLIST_PATH = 'data/html5lib_allowlists.json';
export const DEFAULT_ENGINE_PATH = '.build/html5_runner';
export const DEFAULT_TIMEOUT_SECONDS = 30;
export const TIMEOUT_ENV_VAR = 'HTML5LIB_RUNNER_TIMEOUT_S';

export interface EngineBuildConfig {
  /** Command and arguments, run in the root directory */
  command: string[];
  /** Directory whose files decide whether the executable is stale */
  sources: string;
  /** File extensions under `sources` that count, e.g. `.kk` */
  extensions: string[];
}

export interface EngineConfig {
  executable: string;
  /** Working directory of the engine process */
  cwd: string;
  timeoutMs: number;
  build?: EngineBuildConfig;
}

export interface CorpusConfig {
  tokenizerDir: string;
  treeDir: string;
  encodingDir: string;
}

export interface HarnessConfig {
  root: string;
  allowlistPath: string;
  corpus: CorpusConfig;
  engine: EngineConfig;
}

export interface ConfigOverrides {
  root?: string;
  /** Explicit config file; it is an error if it does not exist */
  configFile?: string;
  allowlistPath?: string;
  engine?: string;
  timeoutSeconds?: number;
  /** Environment snapshot; only TIMEOUT_ENV_VAR is read */
  env?: Readonly<Record<string, string | undefined>>;
}

/**
 * Shape of the optional YAML file
 */
interface ConfigFile {
  allowlist?: string;
  corpus?: {
    tokenizer?: string;
    treeConstruction?: string;
    encoding?: string;
  };
  engine?: {
    executable?: string;
    timeoutSeconds?: number;
    build?: EngineBuildConfig;
  };
}

export function resolveConfig(overrides: ConfigOverrides = {}): HarnessConfig {
  const root = path.resolve(overrides.root ?? process.cwd());
  const file = loadConfigFile(root, overrides.configFile);

  const at = (p: string): string => path.resolve(root, p);

  let timeoutSeconds = file.engine?.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
  const envTimeout = overrides.env?.[TIMEOUT_ENV_VAR];
  if (envTimeout !== undefined && envTimeout !== '') {
    timeoutSeconds = parseTimeout(envTimeout, TIMEOUT_ENV_VAR);
  }
  if (overrides.timeoutSeconds !== undefined) {
    timeoutSeconds = overrides.timeoutSeconds;
  }
  if (!(timeoutSeconds > 0)) {
    throw new ConfigError(`timeout must be a positive number of seconds, got ${timeoutSeconds}`);
  }

  const build = file.engine?.build;

  return {
    root,
    allowlistPath: at(overrides.allowlistPath ?? file.allowlist ?? DEFAULT_ALLOWLIST_PATH),
    corpus: {
      tokenizerDir: at(file.corpus?.tokenizer ?? 'html5lib-tests/tokenizer'),
      treeDir: at(file.corpus?.treeConstruction ?? 'html5lib-tests/tree-construction'),
      encodingDir: at(file.corpus?.encoding ?? 'html5lib-tests/encoding'),
    },
    engine: {
      executable: at(overrides.engine ?? file.engine?.executable ?? DEFAULT_ENGINE_PATH),
      cwd: root,
      timeoutMs: Math.round(timeoutSeconds * 1000),
      build: build ? { ...build, sources: at(build.sources) } : undefined,
    },
  };
}

export function parseTimeout(raw: string, source: string): number {
  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigError(`${source}: expected a positive number of seconds, got ${JSON.stringify(raw)}`);
  }
  return seconds;
}

function loadConfigFile(root: string, explicit: string | undefined): ConfigFile {
  const filePath = path.resolve(root, explicit ?? DEFAULT_CONFIG_FILE);
  if (!fs.existsSync(filePath)) {
    if (explicit !== undefined) {
      throw new ConfigError(`config file does not exist: ${filePath}`);
    }
    return {};
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`${filePath}: ${errorMessage(error)}`);
  }
  if (parsed === undefined || parsed === null) {
    return {};
  }
  return validateConfigFile(parsed, filePath);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(obj: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`${where}.${key} must be a string`);
  }
  return value;
}

function optionalSection(obj: Record<string, unknown>, key: string, where: string): Record<string, unknown> | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw new ConfigError(`${where}.${key} must be a mapping`);
  }
  return value;
}

function stringList(value: unknown, where: string): string[] {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ConfigError(`${where} must be a list of strings`);
  }
  return value;
}

/**
 * Validate the YAML document against the ConfigFile shape
 */
export function validateConfigFile(data: unknown, where = 'config'): ConfigFile {
  if (!isRecord(data)) {
    throw new ConfigError(`${where}: top level must be a mapping`);
  }
  const out: ConfigFile = { allowlist: optionalString(data, 'allowlist', where) };

  const corpus = optionalSection(data, 'corpus', where);
  if (corpus) {
    out.corpus = {
      tokenizer: optionalString(corpus, 'tokenizer', `${where}.corpus`),
      treeConstruction: optionalString(corpus, 'treeConstruction', `${where}.corpus`),
      encoding: optionalString(corpus, 'encoding', `${where}.corpus`),
    };
  }

  const engine = optionalSection(data, 'engine', where);
  if (engine) {
    const timeout = engine.timeoutSeconds;
    if (timeout !== undefined && (typeof timeout !== 'number' || !(timeout > 0))) {
      throw new ConfigError(`${where}.engine.timeoutSeconds must be a positive number`);
    }
    out.engine = {
      executable: optionalString(engine, 'executable', `${where}.engine`),
      timeoutSeconds: timeout,
    };

    const build = optionalSection(engine, 'build', `${where}.engine`);
    if (build) {
      const command = stringList(build.command, `${where}.engine.build.command`);
      if (command.length === 0) {
        throw new ConfigError(`${where}.engine.build.command must not be empty`);
      }
      out.engine.build = {
        command,
        sources: optionalString(build, 'sources', `${where}.engine.build`) ?? 'src',
        extensions:
          build.extensions === undefined ? [] : stringList(build.extensions, `${where}.engine.build.extensions`),
      };
    }
  }

  return out;
}
