import { Writable } from 'node:stream';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';
export type LogFormat = 'text' | 'json';

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  destination?: Writable;
  scope?: string;
}

const LEVEL_VALUES: Record<LogLevel, number> = {
  silent: 100,
  error: 40,
  warn: 30,
  info: 20,
  debug: 10,
};

const LOG_LEVELS = Object.keys(LEVEL_VALUES);

// stdout carries transpiled output, so diagnostics always go to stderr by default
const DEFAULT_OPTIONS: Required<Omit<LoggerOptions, 'scope'>> = {
  level: 'warn',
  format: 'text',
  destination: process.stderr,
};

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.includes(value);
}

export function parseLogLevel(value?: string): LogLevel | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (isLogLevel(normalized)) {
    return normalized;
  }
  throw new Error(`Unsupported log level "${value}". Use one of ${LOG_LEVELS.join(',')}.`);
}

export function parseLogFormat(value?: string): LogFormat | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (normalized === 'json' || normalized === 'text') {
    return normalized;
  }
  throw new Error(`Unsupported log format "${value}". Use text or json.`);
}

export class Logger {
  private level: LogLevel;
  private format: LogFormat;
  private destination: Writable;
  private readonly scope?: string;
  private readonly parent?: Logger;

  constructor(options: LoggerOptions = {}, parent?: Logger) {
    this.level = options.level ?? DEFAULT_OPTIONS.level;
    this.format = options.format ?? DEFAULT_OPTIONS.format;
    this.destination = options.destination ?? DEFAULT_OPTIONS.destination;
    this.scope = options.scope;
    this.parent = parent;
  }

  /** Children follow later `configure` calls on the root they were created from. */
  child(scope: string): Logger {
    return new Logger({ scope: this.scope ? `${this.scope}:${scope}` : scope }, this.root());
  }

  configure(options: Omit<LoggerOptions, 'scope'>): void {
    const target = this.root();
    if (options.level) {
      target.level = options.level;
    }
    if (options.format) {
      target.format = options.format;
    }
    if (options.destination) {
      target.destination = options.destination;
    }
  }

  getLevel(): LogLevel {
    return this.root().level;
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_VALUES[this.getLevel()] <= LEVEL_VALUES[level];
  }

  debug(message: string, metadata: Record<string, unknown> = {}): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata: Record<string, unknown> = {}): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata: Record<string, unknown> = {}): void {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata: Record<string, unknown> = {}): void {
    this.write('error', message, metadata);
  }

  private root(): Logger {
    return this.parent ?? this;
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, metadata: Record<string, unknown>) {
    if (!this.isEnabled(level)) {
      return;
    }

    const { format, destination } = this.root();
    const timestamp = new Date().toISOString();
    if (format === 'json') {
      const payload = {
        level,
        time: timestamp,
        message,
        scope: this.scope,
        ...metadata,
      };
      destination.write(`${JSON.stringify(payload)}\n`);
      return;
    }

    const prefix = `${timestamp} ${level.toUpperCase()} `;
    const scope = this.scope ? `[${this.scope}] ` : '';
    const strMetadata = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
    destination.write(`${prefix}${scope}${message}${strMetadata}\n`);
  }
}

const globalLogger = new Logger();

export function getLogger(scope?: string): Logger {
  return scope ? globalLogger.child(scope) : globalLogger;
}

export function configureLogger(options: Omit<LoggerOptions, 'scope'>): void {
  globalLogger.configure(options);
}
