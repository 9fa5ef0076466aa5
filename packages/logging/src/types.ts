// packages/logging/src/types.ts

export enum LogChannel {
    app = 'app',
    broker = 'broker',
    topic = 'topic',
    effect = 'effect',
    config = 'config',
}

export type ChannelColor =
    | 'blue'
    | 'yellow'
    | 'green'
    | 'magenta'
    | 'cyan'
    | 'red'
    | 'white'
    | 'purple'

export type ClientLogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export interface ClientLog {
    ts: number
    channel: LogChannel
    emoji: string
    color: ChannelColor
    level: ClientLogLevel
    message: string
}

export type ClientLogListener = (log: ClientLog) => void

export interface ClientLogBuffer {
    push: (log: ClientLog) => void
    /** Up to `n` most recent entries, optionally from one channel only. */
    getLatest: (n: number, channel?: LogChannel) => ClientLog[]
    subscribe: (listener: ClientLogListener) => () => void
    size: () => number
    clear: () => void
}

export interface ChannelLogger {
    debug: (msg: string, extra?: Record<string, unknown>) => void
    info:  (msg: string, extra?: Record<string, unknown>) => void
    warn:  (msg: string, extra?: Record<string, unknown>) => void
    error: (msg: string, extra?: Record<string, unknown>) => void
    fatal: (msg: string, extra?: Record<string, unknown>) => void
}

export interface LoggerBundle {
    base: import('pino').Logger
    channel: (ch: LogChannel) => ChannelLogger
}

export interface CreateLoggerOptions {
    /** Overrides LOG_LEVEL. */
    level?: string
    /** Overrides PRETTY_LOGS. */
    pretty?: boolean
}
