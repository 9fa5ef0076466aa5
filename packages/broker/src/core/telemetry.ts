/**
 * Telemetry for topics and the broker.
 *
 * Log details are single line, formatted: msg key=value key2=value2 ...
 * Structured objects are never handed to the logger; fields are serialized
 * into the message string instead.
 */
import { LogChannel } from '@topicbus/logging';

export interface TopicTelemetry {
  // Counters (per topic full id)
  published(topic: string): void;
  delivered(topic: string): void;
  handlerThrew(topic: string): void;
  senderDenied(topic: string): void;
  deadLetterDropped(topic: string): void;
  customHandlerFailed(topic: string): void;
  /** An async RAISE failure arrived while the drain backlog was full. */
  raisedDropped(topic: string): void;

  // Logging
  debug(msg: string, fields?: Record<string, unknown>): void;
  warn(msg: string, fields?: Record<string, unknown>): void;
  error(msg: string, fields?: Record<string, unknown>): void;
  critical(msg: string, fields?: Record<string, unknown>): void;
}

/** Default no-op telemetry (safe if telemetry is not wired yet). */
export const NoopTelemetry: TopicTelemetry = {
  published: () => {},
  delivered: () => {},
  handlerThrew: () => {},
  senderDenied: () => {},
  deadLetterDropped: () => {},
  customHandlerFailed: () => {},
  raisedDropped: () => {},
  debug: () => {},
  warn: () => {},
  error: () => {},
  critical: () => {},
};

/**
 * Minimal shape of a channel logger from @topicbus/logging:
 * (msg, extra?) => void
 */
export interface ChannelLoggerLike {
  debug: (msg: string, extra?: Record<string, unknown>) => void;
  info?: (msg: string, extra?: Record<string, unknown>) => void;
  warn: (msg: string, extra?: Record<string, unknown>) => void;
  error: (msg: string, extra?: Record<string, unknown>) => void;
  fatal: (msg: string, extra?: Record<string, unknown>) => void;
}

/** Minimal shape of the logger bundle: { channel(ch): ChannelLoggerLike } */
export interface LoggerBundleLike {
  channel: (ch: LogChannel) => ChannelLoggerLike;
}

const COUNTER_NAMES = [
  'published',
  'delivered',
  'handlerThrew',
  'senderDenied',
  'deadLetterDropped',
  'customHandlerFailed',
  'raisedDropped',
] as const;

export type CounterName = (typeof COUNTER_NAMES)[number];

/** Per counter: topic full id -> count. */
export type TopicTelemetryCounters = Record<CounterName, Record<string, number>>;

export interface TopicTelemetryWithCounters extends TopicTelemetry {
  snapshotCounters(): TopicTelemetryCounters;
  resetCounters(): void;
}

class CounterTable {
  private readonly rows = new Map<CounterName, Map<string, number>>();

  bump(counter: CounterName, topic: string): void {
    let row = this.rows.get(counter);
    if (!row) {
      row = new Map();
      this.rows.set(counter, row);
    }
    row.set(topic, (row.get(topic) ?? 0) + 1);
  }

  snapshot(): TopicTelemetryCounters {
    const read = (counter: CounterName): Record<string, number> =>
      Object.fromEntries(this.rows.get(counter) ?? new Map<string, number>());
    return {
      published: read('published'),
      delivered: read('delivered'),
      handlerThrew: read('handlerThrew'),
      senderDenied: read('senderDenied'),
      deadLetterDropped: read('deadLetterDropped'),
      customHandlerFailed: read('customHandlerFailed'),
      raisedDropped: read('raisedDropped'),
    };
  }

  clear(): void {
    this.rows.clear();
  }
}

function needsQuoting(s: string): boolean {
  // Quote if spaces, tabs, equals, or quotes exist (keeps parsing unambiguous)
  return /[\s="]/.test(s);
}

function escapeQuoted(s: string): string {
  return s.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function quoteIfNeeded(s: string): string {
  return needsQuoting(s) ? `"${escapeQuoted(s)}"` : s;
}

function fmtValue(v: unknown): string {
  if (v === null) return 'null';
  if (v === undefined) return 'undefined';

  if (typeof v === 'string') return quoteIfNeeded(v);
  if (typeof v === 'number' || typeof v === 'boolean') return String(v);
  if (v instanceof Error) return quoteIfNeeded(v.message);

  // Objects/arrays: compact JSON if possible, otherwise String(...)
  try {
    const json = JSON.stringify(v);
    if (typeof json === 'string') return quoteIfNeeded(json);
  } catch {
    // circular or BigInt: fall back to String()
  }

  return quoteIfNeeded(String(v));
}

export function fmtKVs(fields?: Record<string, unknown>): string {
  if (!fields) return '';
  const keys = Object.keys(fields);
  if (keys.length === 0) return '';

  keys.sort(); // deterministic ordering
  return keys.map((k) => `${k}=${fmtValue(fields[k])}`).join(' ');
}

export function line(msg: string, fields?: Record<string, unknown>): string {
  const kvs = fmtKVs(fields);
  return kvs ? `${msg} ${kvs}` : msg;
}

/**
 * Create a TopicTelemetry that logs through the application logger bundle and
 * keeps in-memory per-topic counters.
 */
export function makeTopicTelemetry(
  logger: LoggerBundleLike,
  opts?: { channel?: LogChannel }
): TopicTelemetryWithCounters {
  const log = logger.channel(opts?.channel ?? LogChannel.topic);
  const counters = new CounterTable();
  const counter = (name: CounterName) => (topic: string) => counters.bump(name, topic);

  return {
    published: counter('published'),
    delivered: counter('delivered'),
    handlerThrew: counter('handlerThrew'),
    senderDenied: counter('senderDenied'),
    deadLetterDropped: counter('deadLetterDropped'),
    customHandlerFailed: counter('customHandlerFailed'),
    raisedDropped: counter('raisedDropped'),

    debug: (msg, fields) => log.debug(line(msg, fields)),
    warn: (msg, fields) => log.warn(line(msg, fields)),
    error: (msg, fields) => log.error(line(msg, fields)),
    critical: (msg, fields) => log.fatal(line(msg, fields)),

    snapshotCounters: () => counters.snapshot(),
    resetCounters: () => counters.clear(),
  };
}
