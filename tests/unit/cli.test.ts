import { describe, it, expect, beforeAll } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  CliIo,
  EXIT_FAILURE,
  EXIT_SECURITY_BLOCKED,
  applyLogOptions,
  executeAudit,
  executeInit,
  executeTranspile,
} from '../../src/cli';
import { configureLogger, getLogger } from '../../src/common/logger';
import { loadConfig } from '../../src/config';

function memoryIo(input: string) {
  const written: string[] = [];
  const reports: string[] = [];
  const io: CliIo = {
    readInput: async () => input,
    writeOutput: async (text) => {
      written.push(text);
    },
    report: (line) => {
      reports.push(line);
    },
  };
  return { io, written, reports };
}

beforeAll(() => {
  configureLogger({ level: 'silent' });
});

describe('transpile command', () => {
  it('writes transpiled output', async () => {
    const { io, written } = memoryIo('λ x # λ');
    const code = await executeTranspile({ symbols: '{"λ":"lambda"}' }, io);
    expect(code).toBe(0);
    expect(written).toEqual(['lambda x # λ']);
  });

  it('exits with the security code and writes nothing when blocked', async () => {
    const { io, written } = memoryIo('⚡1)');
    const code = await executeTranspile({ symbols: '{"⚡":"eval("}' }, io);
    expect(code).toBe(EXIT_SECURITY_BLOCKED);
    expect(written).toEqual([]);
  });

  it('substitutes dangerous replacements with --bypass', async () => {
    const { io, written } = memoryIo('⚡1)');
    const code = await executeTranspile({ symbols: '{"⚡":"eval("}', bypass: true, strategy: 'trie' }, io);
    expect(code).toBe(0);
    expect(written).toEqual(['eval(1)']);
  });

  it('substitutes a __proto__ symbol', async () => {
    const { io, written } = memoryIo('__proto__ x');
    expect(await executeTranspile({ symbols: '{"__proto__":"PROTO"}' }, io)).toBe(0);
    expect(written).toEqual(['PROTO x']);
  });

  it('reports benchmark timings', async () => {
    const { io, reports } = memoryIo('λ x');
    await executeTranspile({ symbols: '{"λ":"lambda"}', benchmark: true }, io);
    expect(reports).toHaveLength(2);
    expect(reports[0]).toMatch(/^Transpiled 3 chars in [\d.]+ ms$/);
    expect(reports[1]).toMatch(/^Speed: (\d+|Infinity) chars\/sec$/);
  });

  it('fails on missing, conflicting or invalid options', async () => {
    const { io } = memoryIo('λ');
    expect(await executeTranspile({}, io)).toBe(EXIT_FAILURE);
    expect(await executeTranspile({ symbols: '{}', config: 'x.yaml' }, io)).toBe(EXIT_FAILURE);
    expect(await executeTranspile({ symbols: '{"λ":"lambda"}', strategy: 'dfa' }, io)).toBe(EXIT_FAILURE);
    expect(await executeTranspile({ symbols: 'not json' }, io)).toBe(EXIT_FAILURE);
  });

  it('reads settings from a config profile and writes metrics', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'glyph-transpiler-cli-'));
    try {
      const configPath = join(dir, 'config.yaml');
      const metricsPath = join(dir, 'metrics.json');
      await writeFile(configPath, `symbols:\n  "⚡": "eval("\nprofiles:\n  trusted:\n    bypassSecurity: true\n`);
      const { io, written } = memoryIo('⚡x)');

      const code = await executeTranspile({ config: configPath, profile: 'trusted', metricsJson: metricsPath }, io);
      expect(code).toBe(0);
      expect(written).toEqual(['eval(x)']);

      const metrics = JSON.parse(await readFile(metricsPath, 'utf8'));
      expect(metrics.event).toBe('glyph-transpiler.transpile');
      expect(metrics.metrics).toMatchObject({
        strategy: 'regex',
        outcome: 'success',
        inputChars: 3,
        substitutions: 1,
        bypassSecurity: true,
      });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe('audit command', () => {
  it('lists dangerous replacements', async () => {
    const { io, reports } = memoryIo('');
    const code = await executeAudit({ symbols: '{"⚡":"eval(","λ":"lambda"}' }, io);
    expect(code).toBe(EXIT_SECURITY_BLOCKED);
    expect(reports).toEqual(['⚡ -> eval( (matches "eval(")']);
  });

  it('passes a safe mapping', async () => {
    const { io, reports } = memoryIo('');
    expect(await executeAudit({ symbols: '{"λ":"lambda"}' }, io)).toBe(0);
    expect(reports).toEqual([]);
  });
});

describe('init command', () => {
  it('writes a sample config that loads, and refuses to overwrite it', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'glyph-transpiler-init-'));
    try {
      const configPath = join(dir, 'nested', 'glyph.yaml');
      const { io, reports } = memoryIo('');

      expect(await executeInit({ config: configPath }, io)).toBe(0);
      expect(reports).toEqual([`Created config at ${configPath}`]);

      const config = await loadConfig(configPath);
      expect(config).toEqual({
        symbols: [
          ['λ', 'lambda'],
          ['→', 'return'],
          ['≠', '!='],
        ],
        strategy: 'regex',
        bypassSecurity: false,
        threatPatterns: [],
      });
      expect((await loadConfig(configPath, 'trusted')).bypassSecurity).toBe(true);

      const before = await readFile(configPath, 'utf8');
      expect(await executeInit({ config: configPath }, io)).toBe(EXIT_FAILURE);
      expect(await readFile(configPath, 'utf8')).toBe(before);
      expect(reports).toHaveLength(1);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe('log options', () => {
  it('configures the shared logger', () => {
    const { io, reports } = memoryIo('');
    try {
      expect(applyLogOptions({ logLevel: 'ERROR', logFormat: 'json' }, io)).toBe(true);
      expect(getLogger('cli').getLevel()).toBe('error');
      expect(reports).toEqual([]);
    } finally {
      configureLogger({ level: 'silent', format: 'text' });
    }
  });

  it('reports invalid values without changing the level', () => {
    const { io, reports } = memoryIo('');
    expect(applyLogOptions({ logLevel: 'loud' }, io)).toBe(false);
    expect(applyLogOptions({ logFormat: 'xml' }, io)).toBe(false);
    expect(reports).toEqual([
      'Unsupported log level "loud". Use one of silent,error,warn,info,debug.',
      'Unsupported log format "xml". Use text or json.',
    ]);
    expect(getLogger().getLevel()).toBe('silent');
  });
});
