import { beforeEach, describe, expect, it, vi } from 'vitest';

import { BufferedSink } from '../buffered-sink.js';
import { parseLoggerEnv } from '../env.schema.js';
import { flushLoggers, getLogger, initLogger, type LogEntry, type Sink } from '../logger.js';
import { ConsoleSink, formatEntry } from '../sinks/console.js';

function collectingSink(): { entries: LogEntry[]; sink: Sink } {
  const entries: LogEntry[] = [];
  return {
    entries,
    sink: {
      write: (entry: LogEntry) => entries.push(entry),
      flush: () => undefined,
    },
  };
}

describe('Logger', () => {
  beforeEach(() => {
    initLogger({ sinks: [] });
  });

  it('is silent until sinks are installed', () => {
    const { entries, sink } = collectingSink();
    const logger = getLogger('early');

    logger.info('before init');
    initLogger({ level: 'info', sinks: [sink] });
    logger.info('after init');

    expect(entries.map((e) => e.msg)).toEqual(['after init']);
  });

  it('filters entries below the configured level', () => {
    const { entries, sink } = collectingSink();
    initLogger({ level: 'warn', sinks: [sink] });
    const logger = getLogger('MainTable');

    logger.debug('debug message');
    logger.info('info message');
    logger.warn('warn message');
    logger.error('error message');

    expect(entries.map((e) => e.level)).toEqual(['warn', 'error']);
    expect(entries[0]?.category).toBe('MainTable');
  });

  it('serializes context objects', () => {
    const { entries, sink } = collectingSink();
    initLogger({ level: 'trace', sinks: [sink] });
    const logger = getLogger('test');

    const self: Record<string, unknown> = { name: 'loop' };
    self['self'] = self;
    logger.info({ count: 3, cutOver: 9223372036854775807n, self }, 'tables built');

    expect(entries[0]?.msg).toBe('tables built');
    expect(entries[0]?.context).toEqual({
      count: 3,
      cutOver: '9223372036854775807',
      self: { name: 'loop', self: '[Circular]' },
    });
  });

  it('serializes Error objects in context', () => {
    const { entries, sink } = collectingSink();
    initLogger({ level: 'info', sinks: [sink] });

    getLogger('test').error({ error: new Error('boom') }, 'failed');

    expect(entries[0]?.context?.['error']).toMatchObject({ name: 'Error', message: 'boom' });
  });

  it('caches loggers by category', () => {
    expect(getLogger('a')).toBe(getLogger('a'));
    expect(getLogger('a')).not.toBe(getLogger('b'));
  });

  it('flushes every sink', () => {
    const flush1 = vi.fn();
    const flush2 = vi.fn();
    initLogger({ sinks: [{ write: () => undefined, flush: flush1 }, { write: () => undefined, flush: flush2 }] });

    flushLoggers();

    expect(flush1).toHaveBeenCalledOnce();
    expect(flush2).toHaveBeenCalledOnce();
  });
});

describe('BufferedSink', () => {
  class TestBufferedSink extends BufferedSink {
    public entries: LogEntry[] = [];

    protected writeEntry(entry: LogEntry): void {
      this.entries.push(entry);
    }
  }

  const entry = (msg: string): LogEntry => ({ level: 'info', category: 'test', timestamp: new Date(0), msg });

  it('defers writes until the next tick', async () => {
    const sink = new TestBufferedSink();
    sink.write(entry('message 1'));

    expect(sink.entries).toHaveLength(0);
    await new Promise((resolve) => setImmediate(resolve));
    expect(sink.entries.map((e) => e.msg)).toEqual(['message 1']);
  });

  it('drops the oldest entries on overflow and reports the drop', () => {
    const sink = new TestBufferedSink({ maxBuffer: 2 });
    for (let i = 1; i <= 4; i++) {
      sink.write(entry(`message ${i}`));
    }

    sink.flush();

    expect(sink.entries.map((e) => e.msg)).toEqual([
      'Dropped 2 oldest log entries (buffer full)',
      'message 3',
      'message 4',
    ]);
    expect(sink.entries[0]?.context).toEqual({ maxBuffer: 2 });
  });

  it('keeps the earliest entries under drop-newest', () => {
    const sink = new TestBufferedSink({ maxBuffer: 2, overflow: 'drop-newest' });
    for (let i = 1; i <= 4; i++) {
      sink.write(entry(`message ${i}`));
    }

    sink.flush();

    expect(sink.entries.map((e) => e.msg)).toEqual([
      'Dropped 2 newest log entries (buffer full)',
      'message 1',
      'message 2',
    ]);
  });

  it('holds entries until flush when auto-drain is off', async () => {
    const sink = new TestBufferedSink({ autoDrain: false });
    sink.write(entry('message 1'));

    await new Promise((resolve) => setImmediate(resolve));
    expect(sink.entries).toHaveLength(0);
    expect(sink.pending).toBe(1);

    sink.flush();
    expect(sink.entries.map((e) => e.msg)).toEqual(['message 1']);
    expect(sink.pending).toBe(0);
  });
});

describe('ConsoleSink', () => {
  it('writes formatted lines to its stream', () => {
    const lines: string[] = [];
    const sink = new ConsoleSink({ stream: { write: (chunk: string) => lines.push(chunk) } });

    sink.write({
      level: 'info',
      category: 'cli',
      timestamp: new Date('2024-01-01T12:34:56Z'),
      msg: 'wrote currency data',
      context: { bytes: 3200, path: 'out.data' },
    });
    sink.flush();

    expect(lines).toEqual(['[12:34:56] INFO  [cli] wrote currency data {bytes=3200, path="out.data"}\n']);
  });

  it('colours the level when enabled', () => {
    const line = formatEntry({ level: 'error', category: 'x', timestamp: new Date('2024-01-01T00:00:00Z'), msg: 'm' }, true);

    expect(line).toBe('[00:00:00] \x1b[31mERROR\x1b[0m [x] m');
  });
});

describe('parseLoggerEnv', () => {
  it('applies defaults', () => {
    expect(parseLoggerEnv({})).toEqual({
      CURRENCY_DATA_LOG_LEVEL: 'warn',
      CURRENCY_DATA_LOG_COLOR: false,
      NODE_ENV: 'production',
    });
  });

  it('rejects unknown log levels', () => {
    expect(() => parseLoggerEnv({ CURRENCY_DATA_LOG_LEVEL: 'loud' })).toThrow(/CURRENCY_DATA_LOG_LEVEL/);
  });
});
