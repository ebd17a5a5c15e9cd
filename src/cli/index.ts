#!/usr/bin/env node
import { Command } from 'commander';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { performance } from 'node:perf_hooks';
import { ResolvedConfig, loadConfig, parseSymbolsJson } from '../config';
import { ConfigError, TranspilerError, errorMessage } from '../core/errors';
import { unwrap } from '../core/result';
import type { MatcherStrategy } from '../matcher/types';
import { matcherRegistry } from '../matcher/registry';
import { recordTranspileMetrics, withSpan, TranspileRunMetrics } from '../observability';
import { configureLogger, getLogger, parseLogFormat, parseLogLevel } from '../common/logger';
import { SymbolTranspiler, createTranspiler } from '../transpiler/transpiler';

export interface TranspileCommandOptions {
  symbols?: string;
  config?: string;
  profile?: string;
  input?: string;
  output?: string;
  bypass?: boolean;
  strategy?: string;
  benchmark?: boolean;
  metricsJson?: string;
}

export interface InitCommandOptions {
  config: string;
}

export interface LogCommandOptions {
  logLevel?: string;
  logFormat?: string;
}

export interface CliIo {
  readInput(path?: string): Promise<string>;
  writeOutput(text: string, path?: string): Promise<void>;
  /** Human-facing report lines (benchmark results, audit findings). */
  report(line: string): void;
}

export const EXIT_FAILURE = 1;
export const EXIT_SECURITY_BLOCKED = 2;
export const DEFAULT_CONFIG_PATH = '.glyph-transpiler.yaml';

function buildSampleConfig(): string {
  return `symbols:
  "λ": lambda
  "→": return
  "≠": "!="
strategy: regex
bypassSecurity: false
threatPatterns: []
profiles:
  trusted:
    bypassSecurity: true
`;
}

async function ensureDir(filePath: string) {
  await mkdir(dirname(filePath), { recursive: true });
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

export const processIo: CliIo = {
  readInput: (path) => (path ? readFile(resolve(path), 'utf8') : readStdin()),
  async writeOutput(text, path) {
    if (!path) {
      process.stdout.write(text);
      return;
    }
    const target = resolve(path);
    await ensureDir(target);
    await writeFile(target, text);
  },
  report: (line) => {
    process.stderr.write(`${line}\n`);
  },
};

function parseStrategy(value?: string): MatcherStrategy | undefined {
  if (!value) {
    return undefined;
  }
  if (matcherRegistry.has(value)) {
    return value;
  }
  throw new ConfigError(
    `Unsupported matcher strategy "${value}". Use one of ${matcherRegistry.list().map((f) => f.id).join(',')}.`,
  );
}

export async function resolveSettings(options: TranspileCommandOptions): Promise<ResolvedConfig> {
  if (options.symbols && options.config) {
    throw new ConfigError('Use either --symbols or --config, not both');
  }
  if (options.config) {
    const config = await loadConfig(options.config, options.profile);
    return {
      ...config,
      strategy: parseStrategy(options.strategy) ?? config.strategy,
      bypassSecurity: options.bypass ? true : config.bypassSecurity,
    };
  }
  if (options.symbols) {
    return {
      symbols: parseSymbolsJson(options.symbols),
      strategy: parseStrategy(options.strategy),
      bypassSecurity: Boolean(options.bypass),
      threatPatterns: [],
    };
  }
  throw new ConfigError('A symbol mapping is required: pass --symbols <json> or --config <path>');
}

export function buildTranspiler(settings: ResolvedConfig): SymbolTranspiler {
  return unwrap(
    createTranspiler(settings.symbols, {
      strategy: settings.strategy,
      threatPatterns: settings.threatPatterns,
    }),
  );
}

function exitCodeFor(error: unknown): number {
  return error instanceof TranspilerError && error.code === 'SECURITY_BLOCKED' ? EXIT_SECURITY_BLOCKED : EXIT_FAILURE;
}

function roundMs(value: number): number {
  return Math.round(value * 100) / 100;
}

export async function executeTranspile(options: TranspileCommandOptions, io: CliIo = processIo): Promise<number> {
  const log = getLogger('cli:transpile');
  try {
    const settings = await resolveSettings(options);
    const transpiler = buildTranspiler(settings);
    const source = await io.readInput(options.input);
    const bypassSecurity = settings.bypassSecurity;

    const started = performance.now();
    const result = await withSpan(
      'glyph-transpiler.transpile',
      {
        'transpiler.strategy': transpiler.strategy,
        'transpiler.input_chars': source.length,
        'transpiler.bypass_security': bypassSecurity,
      },
      () => transpiler.transpile(source, { bypassSecurity }),
      (outcome) =>
        outcome.ok
          ? { 'transpiler.substitutions': outcome.value.substitutions }
          : { 'transpiler.error': outcome.error.code },
    );
    const durationMs = roundMs(performance.now() - started);

    const metrics: TranspileRunMetrics = {
      timestamp: new Date().toISOString(),
      strategy: transpiler.strategy,
      outcome: result.ok ? 'success' : result.error.code === 'SECURITY_BLOCKED' ? 'blocked' : 'failed',
      inputChars: source.length,
      substitutions: result.ok ? result.value.substitutions : 0,
      protectedSpans: result.ok ? result.value.protectedSpans : 0,
      skipped: result.ok ? result.value.skipped : false,
      bypassSecurity,
      durationMs,
    };
    recordTranspileMetrics(metrics);
    if (options.metricsJson) {
      const metricsPath = resolve(options.metricsJson);
      await ensureDir(metricsPath);
      await writeFile(metricsPath, JSON.stringify({ event: 'glyph-transpiler.transpile', metrics }, null, 2));
      log.info(`Metrics written to ${metricsPath}`);
    }

    if (!result.ok) {
      log.error(result.error.message, { code: result.error.code });
      return exitCodeFor(result.error);
    }

    for (const threat of result.value.bypassedThreats) {
      log.warn(`Bypassed dangerous replacement for ${JSON.stringify(threat.symbol)}`, { pattern: threat.pattern });
    }

    if (options.benchmark) {
      const benchStart = performance.now();
      transpiler.transpile(source, { bypassSecurity });
      const elapsedMs = performance.now() - benchStart;
      const charsPerSec = elapsedMs > 0 ? Math.round(source.length / (elapsedMs / 1000)) : Number.POSITIVE_INFINITY;
      io.report(`Transpiled ${source.length} chars in ${roundMs(elapsedMs)} ms`);
      io.report(`Speed: ${charsPerSec} chars/sec`);
    }

    if (bypassSecurity) {
      log.warn('Security bypass enabled - threats not blocked');
    }

    log.debug('Transpile finished', { ...metrics });
    await io.writeOutput(result.value.output, options.output);
    return 0;
  } catch (error) {
    log.error(errorMessage(error));
    return exitCodeFor(error);
  }
}

export async function executeAudit(options: TranspileCommandOptions, io: CliIo = processIo): Promise<number> {
  const log = getLogger('cli:audit');
  try {
    const settings = await resolveSettings(options);
    const transpiler = buildTranspiler(settings);
    const findings = transpiler.audit();
    for (const finding of findings) {
      io.report(`${finding.symbol} -> ${finding.replacement} (matches ${JSON.stringify(finding.pattern)})`);
    }
    log.info(`Audited ${transpiler.matcher.symbols.length} symbols, ${findings.length} dangerous`);
    return findings.length > 0 ? EXIT_SECURITY_BLOCKED : 0;
  } catch (error) {
    log.error(errorMessage(error));
    return exitCodeFor(error);
  }
}

export async function executeInit(options: InitCommandOptions, io: CliIo = processIo): Promise<number> {
  const log = getLogger('cli:init');
  const target = resolve(options.config);
  try {
    await ensureDir(target);
    await writeFile(target, buildSampleConfig(), { flag: 'wx' });
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
      log.error(`Config file already exists at ${target}`);
    } else {
      log.error(`Unable to write config ${target}: ${errorMessage(error)}`);
    }
    return EXIT_FAILURE;
  }
  io.report(`Created config at ${target}`);
  return 0;
}

/** Configures the shared logger from the global options; false when an option is invalid. */
export function applyLogOptions(options: LogCommandOptions, io: CliIo = processIo): boolean {
  try {
    const level = parseLogLevel(options.logLevel);
    const format = parseLogFormat(options.logFormat);
    configureLogger({ level, format, destination: process.stderr });
    return true;
  } catch (error) {
    io.report(errorMessage(error));
    return false;
  }
}

function addMappingOptions(command: Command): Command {
  return command
    .option('--symbols <json>', 'JSON mapping of symbols to replacements')
    .option('--config <path>', 'Config file path (yaml, toml or json)')
    .option('--profile <name>', 'Config profile')
    .option('--strategy <name>', 'Matcher strategy (regex|trie)');
}

export async function runCli(argv = process.argv, io: CliIo = processIo) {
  const program = new Command();
  program.name('glyph-transpiler').description('Symbolic source transpiler');

  program
    .option('--log-level <level>', 'Log level (silent|error|warn|info|debug)', process.env.GLYPH_TRANSPILER_LOG_LEVEL)
    .option('--log-format <format>', 'Log format (text|json)', process.env.GLYPH_TRANSPILER_LOG_FORMAT)
    .hook('preAction', (cmd) => {
      if (!applyLogOptions(cmd.optsWithGlobals<LogCommandOptions>(), io)) {
        process.exit(EXIT_FAILURE);
      }
    });

  addMappingOptions(program.command('transpile', { isDefault: true }).description('Transpile source from stdin or a file'))
    .option('--input <path>', 'Read source from file instead of stdin')
    .option('--output <path>', 'Write result to file instead of stdout')
    .option('--bypass', 'Bypass threat detection')
    .option('--benchmark', 'Show performance benchmarks')
    .option('--metrics-json <path>', 'Write run metrics to JSON file')
    .action(async (options: TranspileCommandOptions) => {
      process.exitCode = await executeTranspile(options, io);
    });

  addMappingOptions(program.command('audit').description('List symbols whose replacement would be blocked')).action(
    async (options: TranspileCommandOptions) => {
      process.exitCode = await executeAudit(options, io);
    },
  );

  program
    .command('init')
    .description('Create sample configuration file')
    .option('--config <path>', 'Config path', DEFAULT_CONFIG_PATH)
    .action(async (options: InitCommandOptions) => {
      process.exitCode = await executeInit(options, io);
    });

  await program.parseAsync(argv);
}

if (require.main === module) {
  runCli().catch((error: unknown) => {
    getLogger('cli').error(errorMessage(error));
    process.exitCode = EXIT_FAILURE;
  });
}
