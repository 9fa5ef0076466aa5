import {
  createLogger,
  makeClientBuffer,
  type ClientLog,
  type ClientLogBuffer,
  type ClientLogLevel,
  type LoggerBundle,
} from '@topicbus/logging';

export interface LogCapture {
  logger: LoggerBundle;
  buf: ClientLogBuffer;
  entries(level?: ClientLogLevel): ClientLog[];
  messages(level?: ClientLogLevel): string[];
}

/** A real logger that prints nothing and records every line in memory. */
export function captureLogs(): LogCapture {
  const buf = makeClientBuffer(1000);
  const logger = createLogger('test', buf, { pretty: false, level: 'silent' });
  const entries = (level?: ClientLogLevel): ClientLog[] =>
    buf.getLatest(1000).filter((e) => level === undefined || e.level === level);
  return {
    logger,
    buf,
    entries,
    messages: (level) => entries(level).map((e) => e.message),
  };
}

export function expectThrown<T extends Error>(fn: () => void, type: new (...args: never[]) => T): T {
  try {
    fn();
  } catch (err) {
    if (err instanceof type) return err;
    throw err;
  }
  throw new Error(`expected ${type.name} to be thrown`);
}
