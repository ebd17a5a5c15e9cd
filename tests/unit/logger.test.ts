import { describe, it, expect, beforeEach } from 'vitest';
import { Writable } from 'node:stream';
import { Logger, parseLogFormat, parseLogLevel } from '../../src/common/logger';

class MemoryWritable extends Writable {
  chunks: string[] = [];

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
    this.chunks.push(chunk.toString());
    callback();
  }
}

describe('Logger', () => {
  let destination: MemoryWritable;
  let logger: Logger;

  beforeEach(() => {
    destination = new MemoryWritable();
    logger = new Logger({ destination, level: 'debug', format: 'text' });
  });

  it('respects log levels', () => {
    logger.configure({ level: 'warn' });
    logger.info('should be filtered');
    logger.warn('should be emitted');
    expect(destination.chunks.length).toBe(1);
    expect(destination.chunks[0]).toMatch(/ WARN should be emitted\n$/);
  });

  it('emits json payload', () => {
    logger.configure({ format: 'json' });
    logger.debug('payload', { symbol: 'λ' });
    expect(destination.chunks.length).toBe(1);
    const payload = JSON.parse(destination.chunks[0]);
    expect(payload.level).toBe('debug');
    expect(payload.message).toBe('payload');
    expect(payload.symbol).toBe('λ');
  });

  it('creates scoped children', () => {
    const child = logger.child('cli').child('transpile');
    child.info('hello');
    expect(destination.chunks[0]).toMatch(/ INFO \[cli:transpile\] hello\n$/);
  });

  it('applies later configuration to existing children', () => {
    const child = logger.child('transpiler');
    logger.configure({ level: 'error' });
    child.warn('filtered');
    expect(destination.chunks).toEqual([]);
    expect(child.getLevel()).toBe('error');
    expect(child.isEnabled('error')).toBe(true);
  });

  it('silences everything at silent level', () => {
    logger.configure({ level: 'silent' });
    logger.error('nothing');
    expect(destination.chunks).toEqual([]);
  });
});

describe('log option parsing', () => {
  it('parses levels and formats case-insensitively', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel(undefined)).toBeUndefined();
    expect(parseLogFormat('Json')).toBe('json');
  });

  it('rejects unknown values', () => {
    expect(() => parseLogLevel('trace')).toThrow('Unsupported log level "trace". Use one of silent,error,warn,info,debug.');
    expect(() => parseLogFormat('xml')).toThrow(/Use text or json/);
  });
});
