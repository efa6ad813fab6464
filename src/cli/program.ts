/**
 * Command-line program
 *
 * Every side effect the commands need (output streams, engine process, build
 * step, version control) comes in through CliDeps, so the whole program can
 * run in process.
 */

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import pc from 'picocolors';

import { DEFAULT_REVISION, GitHistory, loadBaseline, repoRelativePath, type HistorySource } from '../allowlist/history.js';
import { parseRanges } from '../allowlist/ranges.js';
import { addIndices, getIndices, loadAllowlist, saveAllowlist, section } from '../allowlist/store.js';
import { resolveConfig, type EngineConfig, type HarnessConfig } from '../config.js';
import { collectCorpusTotals } from '../corpus/discover.js';
import { computeCoverage } from '../coverage/coverage.js';
import { computeDiff } from '../coverage/diff.js';
import { ensureEngineBuilt } from '../engine/build.js';
import { SubprocessEngine, type Engine } from '../engine/engine.js';
import { EXIT_FAILURE, EXIT_USAGE, HarnessError, UsageError } from '../errors.js';
import {
  DEFAULT_FAILURE_LIMIT,
  DEFAULT_MISMATCH_LIMIT,
  OUTPUT_FORMATS,
  formatAddition,
  formatCaseDetail,
  formatDiff,
  formatFailureReport,
  formatResults,
  formatScan,
  formatShow,
  formatStats,
  parseCaseSelector,
  type Palette,
  type ShowEntry,
} from '../reporters/index.js';
import {
  DEFAULT_ENCODING_FIXTURES,
  failureLines,
  reportFixture,
  runEncodingFixtures,
  scanCorpus,
  verifyAllowlist,
  type HarnessContext,
} from '../runner.js';
import { SUITE_KINDS, type SuiteKind } from '../types.js';

export const ENCODING_PREVIEW_LIMIT = 20;

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface CliDeps {
  io?: CliIO;
  /** Environment snapshot handed to the config resolver */
  env?: Readonly<Record<string, string | undefined>>;
  /** Default root when --root is absent */
  cwd?: string;
  /** Force colors on or off; by default picocolors decides */
  color?: boolean;
  version?: string;
  createEngine?: (config: EngineConfig) => Engine;
  /** Build the engine if needed; `force` is set by --build */
  prepareEngine?: (config: EngineConfig, force: boolean) => Promise<unknown>;
  createHistory?: (root: string) => HistorySource;
}

interface GlobalOptions {
  root?: string;
  config?: string;
  file?: string;
  engine?: string;
  timeout?: number;
  color: boolean;
}

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return n;
}

function parseSeconds(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError('Not a positive number of seconds.');
  }
  return n;
}

function kindOption(required: boolean): Option {
  const option = new Option('--kind <kind>', 'suite kind').choices(SUITE_KINDS);
  return required ? option.makeOptionMandatory() : option;
}

function requireSuiteKind(value: string): SuiteKind {
  const kind = SUITE_KINDS.find((k) => k === value);
  if (!kind) {
    throw new UsageError(`unknown kind: ${value}`);
  }
  return kind;
}

/**
 * Build the program. Actions record their exit status in `setExit`.
 */
export function buildProgram(deps: CliDeps, setExit: (code: number) => void): Command {
  const io = deps.io ?? processIO;
  const createEngine = deps.createEngine ?? ((config: EngineConfig) => new SubprocessEngine(config));
  const prepareEngine =
    deps.prepareEngine ?? ((config: EngineConfig, force: boolean) => ensureEngineBuilt(config, { force }));
  const createHistory = deps.createHistory ?? ((root: string) => new GitHistory(root));

  const out = (text: string): void => io.stdout(text + '\n');
  const err = (text: string): void => io.stderr(text + '\n');

  const program = new Command();

  program
    .name('html5-harness')
    .description('Conformance regression harness for an external HTML5 engine')
    .version(deps.version ?? '0.0.0')
    .option('--root <dir>', 'repository root (defaults to the current directory)')
    .option('--config <file>', 'YAML config file')
    .option('--file <path>', 'allowlist JSON file')
    .option('--engine <path>', 'engine executable')
    .option('--timeout <seconds>', 'engine timeout per batch', parseSeconds)
    .option('--no-color', 'disable colored output')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    });

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  const palette = (): Palette => pc.createColors(deps.color ?? (globals().color && pc.isColorSupported));

  const config = (): HarnessConfig => {
    const g = globals();
    return resolveConfig({
      root: g.root ?? deps.cwd,
      configFile: g.config,
      allowlistPath: g.file,
      engine: g.engine,
      timeoutSeconds: g.timeout,
      env: deps.env,
    });
  };

  /** First `limit` failure lines on stderr, then how many were left out */
  const previewFailures = (lines: string[], limit: number, c: Palette): void => {
    for (const line of lines.slice(0, limit)) {
      err(c.red(line));
    }
    if (lines.length > limit) {
      err(c.dim(`... and ${lines.length - limit} more`));
    }
  };

  const context = async (cfg: HarnessConfig, build: boolean | undefined): Promise<HarnessContext> => {
    await prepareEngine(cfg.engine, build ?? false);
    return { config: cfg, engine: createEngine(cfg.engine) };
  };

  // -------------------------------------------------------------------------
  // Allowlist commands
  // -------------------------------------------------------------------------

  program
    .command('show')
    .description('Show enabled indices')
    .addOption(kindOption(false))
    .option('--fixture <name>', 'restrict to one fixture')
    .option('--ranges', 'show indices as compressed ranges (e.g. 1-5,7)')
    .action((opts: { kind?: string; fixture?: string; ranges?: boolean }) => {
      const doc = loadAllowlist(config().allowlistPath);
      const kinds = opts.kind ? [requireSuiteKind(opts.kind)] : SUITE_KINDS;
      const entries: ShowEntry[] = [];
      for (const kind of kinds) {
        const fixtures = opts.fixture ? [opts.fixture] : Object.keys(section(doc, kind)).sort();
        for (const fixture of fixtures) {
          entries.push({ kind, fixture, indices: getIndices(doc, kind, fixture) });
        }
      }
      if (entries.length > 0) {
        out(formatShow(entries, opts.ranges ?? false));
      }
      setExit(0);
    });

  program
    .command('stats')
    .description('Print coverage per kind and fixture')
    .action(() => {
      const cfg = config();
      const report = computeCoverage(collectCorpusTotals(cfg.corpus), loadAllowlist(cfg.allowlistPath));
      out(formatStats(report));
      const c = palette();
      for (const v of report.violations) {
        err(c.red(`error: ${v.kind} ${v.fixture}: ${v.enabled} enabled but only ${v.total} cases`));
      }
      setExit(report.violations.length > 0 ? EXIT_FAILURE : 0);
    });

  program
    .command('add')
    .description('Add indices or ranges to a fixture (dry-run by default)')
    .addOption(kindOption(true))
    .requiredOption('--fixture <name>', 'fixture basename')
    .requiredOption('--add <ranges...>', 'indices or ranges, e.g. 12 20-30 1,2,5-7')
    .option('--write', 'persist changes')
    .action((opts: { kind: string; fixture: string; add: string[]; write?: boolean }) => {
      const cfg = config();
      const kind = requireSuiteKind(opts.kind);
      const indices = opts.add.flatMap((expr) => parseRanges(expr));
      const doc = loadAllowlist(cfg.allowlistPath);
      const { before, after } = addIndices(doc, kind, opts.fixture, indices);
      out(formatAddition(kind, opts.fixture, before, after));
      if (opts.write) {
        saveAllowlist(doc, cfg.allowlistPath);
        out(`Wrote ${cfg.allowlistPath}`);
      } else {
        out('Dry-run (pass --write to persist).');
      }
      setExit(0);
    });

  program
    .command('diff-prev')
    .description('Compare the allowlist with a previous revision')
    .option('--rev <rev>', 'revision to compare against', DEFAULT_REVISION)
    .option('--all', 'show every fixture, not only changed ones')
    .option('--fail-on-decrease', 'exit non-zero if any enabled count or percentage decreases')
    .action(async (opts: { rev: string; all?: boolean; failOnDecrease?: boolean }) => {
      const cfg = config();
      const current = loadAllowlist(cfg.allowlistPath);
      const relPath = repoRelativePath(cfg.root, cfg.allowlistPath);
      const baseline = await loadBaseline(createHistory(cfg.root), opts.rev, relPath, current);
      const c = palette();
      for (const warning of baseline.warnings) {
        err(c.yellow(warning));
      }

      const diff = computeDiff(collectCorpusTotals(cfg.corpus), baseline.doc, current);
      const fileLabel = relPath.startsWith('..') ? cfg.allowlistPath : relPath;
      out(formatDiff(diff, { revision: baseline.label, file: fileLabel, all: opts.all }));
      setExit(opts.failOnDecrease && diff.regressed ? EXIT_FAILURE : 0);
    });

  // -------------------------------------------------------------------------
  // Engine commands
  // -------------------------------------------------------------------------

  program
    .command('run')
    .description('Verify every allowlisted case against the engine')
    .option('--build', 'rebuild the engine first')
    .addOption(new Option('-o, --output <format>', 'output format').choices(OUTPUT_FORMATS).default('text'))
    .option('-f, --output-file <file>', 'write output to file instead of stdout')
    .option('--limit <n>', 'maximum failures listed', parseCount, DEFAULT_FAILURE_LIMIT)
    .option('-v, --verbose', 'list passing fixtures too')
    .action(
      async (opts: { build?: boolean; output: string; outputFile?: string; limit: number; verbose?: boolean }) => {
        const cfg = config();
        const c = palette();
        const format = OUTPUT_FORMATS.find((f) => f === opts.output);
        if (!format) {
          throw new UsageError(`invalid output format: ${opts.output}`);
        }
        const doc = loadAllowlist(cfg.allowlistPath);
        const ctx = await context(cfg, opts.build);

        err(c.dim(`Verifying ${cfg.allowlistPath}`));
        const result = await verifyAllowlist(ctx, doc);
        const output = formatResults(result, format, { colors: c, verbose: opts.verbose, limit: opts.limit });

        if (opts.outputFile) {
          const target = path.resolve(cfg.root, opts.outputFile);
          fs.mkdirSync(path.dirname(target), { recursive: true });
          fs.writeFileSync(target, output, 'utf-8');
          err(c.dim(`Results written to: ${opts.outputFile}`));
        } else {
          out(output);
        }

        const failures = failureLines(result);
        if (failures.length > 0) {
          previewFailures(failures, opts.limit, c);
          err(c.red(`${failures.length} failing cases`));
        }
        setExit(result.failed > 0 || result.errored > 0 ? EXIT_FAILURE : 0);
      }
    );

  program
    .command('update')
    .description('Run the whole corpus and rewrite allowlist entries to the passing sets')
    .addOption(new Option('--suite <family>', 'restrict to one suite family').choices(['tokenizer', 'tree']))
    .option('--write', 'persist changes')
    .option('--build', 'rebuild the engine first')
    .action(async (opts: { suite?: string; write?: boolean; build?: boolean }) => {
      const cfg = config();
      const families = (['tokenizer', 'tree'] as const).filter((f) => opts.suite === undefined || opts.suite === f);
      const doc = loadAllowlist(cfg.allowlistPath);
      const ctx = await context(cfg, opts.build);

      const result = await scanCorpus(ctx, doc, families);
      out(formatScan(result));
      if (opts.write) {
        saveAllowlist(doc, cfg.allowlistPath);
        out(`Wrote ${cfg.allowlistPath}`);
      } else {
        out('Dry-run (pass --write to persist).');
      }
      setExit(result.errors.length > 0 ? EXIT_FAILURE : 0);
    });

  program
    .command('failures')
    .description('List mismatches for one fixture')
    .addOption(kindOption(true))
    .requiredOption('--fixture <name>', 'fixture basename')
    .option('--limit <n>', 'maximum mismatches listed', parseCount, DEFAULT_MISMATCH_LIMIT)
    .option('--show <case>', 'print full details for one case: index or index#State')
    .option('--build', 'rebuild the engine first')
    .action(async (opts: { kind: string; fixture: string; limit: number; show?: string; build?: boolean }) => {
      const cfg = config();
      const kind = requireSuiteKind(opts.kind);
      const selector = opts.show === undefined ? undefined : parseCaseSelector(opts.show);
      if (opts.show !== undefined && !selector) {
        throw new UsageError(`--show expects index or index#State, got ${JSON.stringify(opts.show)}`);
      }
      const ctx = await context(cfg, opts.build);

      const report = await reportFixture(ctx, kind, opts.fixture, selector ? [selector.index] : undefined);
      if (selector) {
        out(formatCaseDetail(report, selector));
      } else {
        out(formatFailureReport(report, opts.limit));
      }
      setExit(report.verdicts.every((v) => v.passed) ? 0 : EXIT_FAILURE);
    });

  program
    .command('encoding')
    .description('Run encoding-sniffing fixtures')
    .option('--fixture <names...>', 'fixture basenames', DEFAULT_ENCODING_FIXTURES)
    .option('--build', 'rebuild the engine first')
    .action(async (opts: { fixture: string[]; build?: boolean }) => {
      const cfg = config();
      const c = palette();
      const ctx = await context(cfg, opts.build);

      const result = await runEncodingFixtures(ctx, opts.fixture);
      const failures = failureLines(result);
      previewFailures(failures, ENCODING_PREVIEW_LIMIT, c);
      out(`encoding: ${result.passed}/${result.passed + result.failed} passing`);
      if (failures.length > 0) {
        out(`${failures.length} failing cases`);
      }
      setExit(failures.length > 0 ? EXIT_FAILURE : 0);
    });

  return program;
}

/**
 * Parse `argv` (without the node and script entries), run the command and
 * return the process exit status.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? processIO;
  let exitCode = 0;
  const program = buildProgram(deps, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      // help and version exit 0; commander has already printed the message
      return error.exitCode === 0 ? 0 : EXIT_USAGE;
    }
    if (error instanceof HarnessError) {
      const c = pc.createColors(deps.color ?? pc.isColorSupported);
      io.stderr(c.red(`error: ${error.message}`) + '\n');
      return error.exitCode;
    }
    throw error;
  }
}
