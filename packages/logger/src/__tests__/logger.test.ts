/* eslint-disable @typescript-eslint/no-empty-function -- acceptable in tests */
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { BufferedSink } from '../buffered-sink.js';
import { flushLoggers, getLogger, initLogger, isLogLevel, type LogEntry, type Sink } from '../logger.js';
import { ConsoleSink } from '../sinks/console.js';
import { FileSink } from '../sinks/file.js';

function collectingSink(entries: LogEntry[]): Sink {
  return {
    write: (entry: LogEntry) => entries.push(entry),
    flush: () => {},
  };
}

describe('Logger', () => {
  beforeEach(() => {
    initLogger({ sinks: [] });
  });

  it('should stay silent until initialized with a sink', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    getLogger('parse').info('file has 3 symbols');

    expect(consoleSpy).not.toHaveBeenCalled();
    consoleSpy.mockRestore();
  });

  it('should deliver entries with category and message', () => {
    const entries: LogEntry[] = [];
    initLogger({ level: 'info', sinks: [collectingSink(entries)] });

    getLogger('parse').info("reading file 'tmp/binance_exchange-info.json'");

    expect(entries).toHaveLength(1);
    expect(entries[0]?.level).toBe('info');
    expect(entries[0]?.category).toBe('parse');
    expect(entries[0]?.msg).toBe("reading file 'tmp/binance_exchange-info.json'");
  });

  it('should drop entries below the configured level', () => {
    const entries: LogEntry[] = [];
    initLogger({ level: 'warn', sinks: [collectingSink(entries)] });
    const logger = getLogger('parse');

    logger.debug('debug message');
    logger.info('info message');
    logger.warn('warn message');
    logger.error('error message');

    expect(entries.map((e) => e.level)).toEqual(['warn', 'error']);
  });

  it('should attach serialized context', () => {
    const entries: LogEntry[] = [];
    initLogger({ level: 'info', sinks: [collectingSink(entries)] });

    getLogger('parse').info({ venue: 'binance_usdfut', symbols: 2 }, 'segment parsed');

    expect(entries[0]?.msg).toBe('segment parsed');
    expect(entries[0]?.context).toEqual({ venue: 'binance_usdfut', symbols: 2 });
  });

  it('should serialize errors, sets and circular references in context', () => {
    const entries: LogEntry[] = [];
    initLogger({ level: 'info', sinks: [collectingSink(entries)] });

    const self: Record<string, unknown> = { name: 'loop' };
    self['self'] = self;

    getLogger('parse').error(
      { error: new Error('boom'), ignored: new Set(['ICEBERG_PARTS']), data: self },
      'operation failed'
    );

    const context = entries[0]?.context;
    expect(context?.['error']).toMatchObject({ name: 'Error', message: 'boom' });
    expect(context?.['ignored']).toEqual(['ICEBERG_PARTS']);
    expect(context?.['data']).toEqual({ name: 'loop', self: '[Circular]' });
  });

  it('should let loggers created before initLogger use the later configuration', () => {
    const entries: LogEntry[] = [];
    const logger = getLogger('early');

    logger.info('before init');
    initLogger({ level: 'info', sinks: [collectingSink(entries)] });
    logger.info('after init');

    expect(entries.map((e) => e.msg)).toEqual(['after init']);
  });

  it('should cache loggers per category until re-initialized', () => {
    const first = getLogger('cli');
    expect(getLogger('cli')).toBe(first);
    expect(getLogger('http')).not.toBe(first);

    initLogger({ level: 'info' });
    expect(getLogger('cli')).not.toBe(first);
  });

  it('should flush every sink', () => {
    const flushA = vi.fn();
    const flushB = vi.fn();
    initLogger({ sinks: [{ write: () => {}, flush: flushA }, { write: () => {}, flush: flushB }] });

    flushLoggers();

    expect(flushA).toHaveBeenCalledOnce();
    expect(flushB).toHaveBeenCalledOnce();
  });

  it('should default to info when no level is given', () => {
    const entries: LogEntry[] = [];
    initLogger({ sinks: [collectingSink(entries)] });
    const logger = getLogger('parse');

    logger.debug('debug message');
    logger.info('info message');

    expect(entries.map((e) => e.msg)).toEqual(['info message']);
  });

  it('should omit an empty context', () => {
    const entries: LogEntry[] = [];
    initLogger({ level: 'info', sinks: [collectingSink(entries)] });

    getLogger('http').info({}, 'request sent');

    expect(entries[0]).not.toHaveProperty('context');
    expect(entries[0]?.msg).toBe('request sent');
  });

  it('should recognise valid level names', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('audit')).toBe(false);
  });
});

describe('ConsoleSink', () => {
  it('should format level, category, message and context', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const sink = new ConsoleSink({ color: false });

    sink.write({
      level: 'info',
      category: 'parse',
      timestamp: new Date(2024, 0, 1, 9, 5, 7),
      msg: 'file has 2 symbols',
      context: { venue: 'binance' },
    });
    sink.flush();

    expect(consoleSpy).toHaveBeenCalledWith('[09:05:07] INFO  [parse] file has 2 symbols {venue="binance"}');
    consoleSpy.mockRestore();
  });

  it('should route warn and error to their console methods', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const sink = new ConsoleSink();

    sink.write({ level: 'warn', category: 'parse', timestamp: new Date(), msg: 'warn message' });
    sink.write({ level: 'error', category: 'parse', timestamp: new Date(), msg: 'error message' });
    sink.flush();

    expect(warnSpy).toHaveBeenCalledWith(expect.stringContaining('warn message'));
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('error message'));
    warnSpy.mockRestore();
    errorSpy.mockRestore();
  });

  it('should send every level to stderr when asked', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const sink = new ConsoleSink({ stream: 'stderr' });

    sink.write({ level: 'info', category: 'cli', timestamp: new Date(2024, 0, 1, 0, 0, 0), msg: 'started' });
    sink.flush();

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith('[00:00:00] INFO  [cli] started');
    logSpy.mockRestore();
    errorSpy.mockRestore();
  });
});

describe('FileSink', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'refdata-logger-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should append JSON lines', () => {
    const path = join(dir, 'logs', 'refdata.log');
    const sink = new FileSink({ path });

    sink.write({
      level: 'warn',
      category: 'filters',
      timestamp: new Date('2024-03-01T00:00:00.000Z'),
      msg: "ignoring binance filter 'NEW_FILTER'",
    });
    sink.flush();

    const lines = readFileSync(path, 'utf8').trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toEqual({
      timestamp: '2024-03-01T00:00:00.000Z',
      level: 'warn',
      category: 'filters',
      msg: "ignoring binance filter 'NEW_FILTER'",
    });
  });
});

describe('FileSink batching', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'refdata-logger-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should append every queued entry in order, with context', () => {
    const path = join(dir, 'refdata.log');
    const sink = new FileSink({ path, maxBuffer: 2 });
    const at = new Date('2024-03-01T00:00:00.000Z');

    sink.write({ level: 'info', category: 'parse', timestamp: at, msg: 'one' });
    sink.write({ level: 'info', category: 'parse', timestamp: at, msg: 'two', context: { added: 2 } });
    sink.write({ level: 'warn', category: 'csv', timestamp: at, msg: 'three' });
    sink.flush();

    expect(readFileSync(path, 'utf8')).toBe(
      '{"timestamp":"2024-03-01T00:00:00.000Z","level":"info","category":"parse","msg":"one"}\n' +
        '{"timestamp":"2024-03-01T00:00:00.000Z","level":"info","category":"parse","msg":"two","context":{"added":2}}\n' +
        '{"timestamp":"2024-03-01T00:00:00.000Z","level":"warn","category":"csv","msg":"three"}\n'
    );
  });
});

describe('BufferedSink', () => {
  class RecordingSink extends BufferedSink {
    public written: LogEntry[] = [];

    protected override writeEntry(entry: LogEntry): void {
      this.written.push(entry);
    }
  }

  const entry = (msg: string): LogEntry => ({ level: 'info', category: 'test', timestamp: new Date(), msg });

  it('should defer writes until the next macrotask', async () => {
    const sink = new RecordingSink();

    sink.write(entry('message 1'));
    expect(sink.written).toHaveLength(0);

    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(sink.written.map((e) => e.msg)).toEqual(['message 1']);
  });

  it('should drain synchronously when the queue is full', () => {
    const sink = new RecordingSink({ maxBuffer: 2 });

    sink.write(entry('message 1'));
    expect(sink.written).toHaveLength(0);

    sink.write(entry('message 2'));
    sink.write(entry('message 3'));
    expect(sink.written.map((e) => e.msg)).toEqual(['message 1', 'message 2']);

    sink.flush();
    expect(sink.written.map((e) => e.msg)).toEqual(['message 1', 'message 2', 'message 3']);
  });

  it('should keep every entry of a long synchronous burst', () => {
    const sink = new RecordingSink();
    initLogger({ level: 'info', sinks: [sink] });
    const logger = getLogger('csv');

    for (let i = 0; i < 2500; i++) {
      logger.warn(`ignoring duplicate row for 'K${i}'`);
    }
    flushLoggers();

    expect(sink.written).toHaveLength(2500);
    expect(sink.written[0]?.msg).toBe("ignoring duplicate row for 'K0'");
    expect(sink.written[2499]?.msg).toBe("ignoring duplicate row for 'K2499'");
  });
});
