import type { LogEntry, Sink } from './logger.js';

/** Which entries are discarded once the buffer is full. */
export type OverflowPolicy = 'drop-oldest' | 'drop-newest';

export interface BufferedSinkOptions {
  /** Entries held before the overflow policy applies. Default 1000. */
  maxBuffer?: number;
  /** Default `drop-oldest`. */
  overflow?: OverflowPolicy;
  /**
   * Drain on the next tick after a write (default). When false, entries are
   * written only by `flush()`, e.g. from `flushLoggers()` before exit.
   */
  autoDrain?: boolean;
}

/**
 * Base class for sinks that collect entries and hand them to `writeEntry`
 * in batches. `flush()` drains synchronously and must run before the
 * process exits.
 */
export abstract class BufferedSink implements Sink {
  private buffer: LogEntry[] = [];
  private drainScheduled = false;
  private droppedCount = 0;
  private readonly maxBuffer: number;
  private readonly overflow: OverflowPolicy;
  private readonly autoDrain: boolean;

  constructor(options?: BufferedSinkOptions) {
    this.maxBuffer = Math.max(1, options?.maxBuffer ?? 1000);
    this.overflow = options?.overflow ?? 'drop-oldest';
    this.autoDrain = options?.autoDrain ?? true;
  }

  protected abstract writeEntry(entry: LogEntry): void;

  /** Entries waiting to be written. */
  get pending(): number {
    return this.buffer.length;
  }

  write(entry: LogEntry): void {
    if (this.buffer.length >= this.maxBuffer) {
      this.droppedCount++;
      if (this.overflow === 'drop-newest') {
        return;
      }
      this.buffer.shift();
    }
    this.buffer.push(entry);

    if (this.autoDrain && !this.drainScheduled) {
      this.drainScheduled = true;
      setImmediate(() => this.drain());
    }
  }

  flush(): void {
    this.drain();
  }

  private drain(): void {
    const entries = this.buffer;
    const dropped = this.droppedCount;
    this.buffer = [];
    this.drainScheduled = false;
    this.droppedCount = 0;

    if (dropped > 0) {
      const which = this.overflow === 'drop-newest' ? 'newest' : 'oldest';
      this.writeEntry({
        level: 'warn',
        category: 'logger',
        timestamp: entries[0]?.timestamp ?? new Date(),
        msg: `Dropped ${String(dropped)} ${which} log entries (buffer full)`,
        context: { maxBuffer: this.maxBuffer },
      });
    }

    for (const entry of entries) {
      this.writeEntry(entry);
    }
  }
}
