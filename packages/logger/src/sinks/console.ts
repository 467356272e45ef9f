import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry, LogLevel } from '../logger.js';

/** Minimal text stream; `process.stderr` satisfies it. */
export interface LineStream {
  write(chunk: string): unknown;
}

export interface ConsoleSinkOptions extends BufferedSinkOptions {
  color?: boolean;
  stream?: LineStream;
}

const levelColors: Record<LogLevel, string> = {
  trace: '\x1b[90m', // gray
  debug: '\x1b[36m', // cyan
  info: '\x1b[32m', // green
  warn: '\x1b[33m', // yellow
  error: '\x1b[31m', // red
};

/**
 * Line-oriented sink. Defaults to stderr so that stdout stays free for
 * command output.
 *
 * Format: [HH:MM:SS] LEVEL [category] message {key=value, ...}
 */
export class ConsoleSink extends BufferedSink {
  private readonly color: boolean;
  private readonly stream: LineStream;

  constructor(options?: ConsoleSinkOptions) {
    super(options);
    this.color = options?.color ?? false;
    this.stream = options?.stream ?? process.stderr;
  }

  protected writeEntry(entry: LogEntry): void {
    this.stream.write(`${formatEntry(entry, this.color)}\n`);
  }
}

export function formatEntry(entry: LogEntry, color: boolean): string {
  const time = formatTime(entry.timestamp);
  const level = formatLevel(entry.level, color);
  const context = entry.context ? ` ${formatContext(entry.context)}` : '';
  return `${time} ${level} [${entry.category}] ${entry.msg}${context}`;
}

function formatTime(timestamp: Date): string {
  const hours = String(timestamp.getUTCHours()).padStart(2, '0');
  const minutes = String(timestamp.getUTCMinutes()).padStart(2, '0');
  const seconds = String(timestamp.getUTCSeconds()).padStart(2, '0');
  return `[${hours}:${minutes}:${seconds}]`;
}

function formatLevel(level: LogLevel, color: boolean): string {
  const upper = level.toUpperCase().padEnd(5);
  return color ? `${levelColors[level]}${upper}\x1b[0m` : upper;
}

function formatContext(context: Record<string, unknown>): string {
  const pairs: string[] = [];
  for (const [key, value] of Object.entries(context)) {
    pairs.push(`${key}=${JSON.stringify(value)}`);
  }
  return `{${pairs.join(', ')}}`;
}
