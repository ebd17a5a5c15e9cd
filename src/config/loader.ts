import { readFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import yaml from 'js-yaml';
import { parse as parseToml } from 'toml';
import { ConfigError, errorMessage } from '../core/errors';
import { ResolvedConfig, TranspilerConfig, symbolsSchema, transpilerConfigSchema } from './schema';

function parseContents(contents: string, ext: string, absolute: string): unknown {
  switch (ext) {
    case '.yaml':
    case '.yml':
      // json mode lets duplicate keys through, the last one wins
      return yaml.load(contents, { json: true });
    case '.toml':
      return parseToml(contents);
    case '.json':
      return JSON.parse(contents);
    default:
      throw new ConfigError(`Unsupported config format for ${absolute}`);
  }
}

export async function loadConfig(path: string, profile?: string): Promise<ResolvedConfig> {
  const absolute = resolve(path);
  let contents: string;
  try {
    contents = await readFile(absolute, 'utf8');
  } catch (error) {
    throw new ConfigError(`Unable to read config ${absolute}: ${errorMessage(error)}`, error);
  }

  let raw: unknown;
  try {
    raw = parseContents(contents, extname(absolute).toLowerCase(), absolute);
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    throw new ConfigError(`Unable to parse config ${absolute}: ${errorMessage(error)}`, error);
  }

  const parsed = transpilerConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'config';
    throw new ConfigError(`Invalid config ${absolute}: ${where}: ${issue?.message ?? 'invalid value'}`);
  }

  return resolveConfig(parsed.data, profile);
}

export function resolveConfig(config: TranspilerConfig, profile?: string): ResolvedConfig {
  const base: ResolvedConfig = {
    symbols: config.symbols,
    strategy: config.strategy,
    bypassSecurity: config.bypassSecurity ?? false,
    threatPatterns: config.threatPatterns ?? [],
  };
  if (!profile) {
    return base;
  }

  const overlay = config.profiles?.[profile];
  if (!overlay) {
    throw new ConfigError(`Profile ${profile} not found in config`);
  }
  return {
    symbols: overlay.symbols ? [...base.symbols, ...overlay.symbols] : base.symbols,
    strategy: overlay.strategy ?? base.strategy,
    bypassSecurity: overlay.bypassSecurity ?? base.bypassSecurity,
    threatPatterns: overlay.threatPatterns ? [...base.threatPatterns, ...overlay.threatPatterns] : base.threatPatterns,
  };
}

/** Parses the inline `--symbols` JSON object. Repeated keys keep the last value. */
export function parseSymbolsJson(text: string): Array<[string, string]> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Symbols must be valid JSON: ${errorMessage(error)}`, error);
  }
  const parsed = symbolsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('Symbols must be a JSON object mapping symbols to replacement strings');
  }
  return parsed.data;
}
