import { pino, type Logger, type LoggerOptions, type LogFn } from 'pino'
import pinoPretty from 'pino-pretty'
import {
    type ClientLogLevel,
    type LoggerBundle,
    type ChannelLogger,
    type ClientLogBuffer,
    type CreateLoggerOptions,
    LogChannel
} from './types.js'
import { CHANNELS, channelPrefix } from './channels.js'

const KNOWN_CHANNELS = new Set<string>(Object.values(LogChannel))

function isLogChannel(v: unknown): v is LogChannel {
    return typeof v === 'string' && KNOWN_CHANNELS.has(v)
}

export function createLogger(
    service: string,
    clientBuf?: ClientLogBuffer,
    opts: CreateLoggerOptions = {}
): LoggerBundle {
    const PRETTY = opts.pretty ?? String(process.env.PRETTY_LOGS ?? 'true').toLowerCase() === 'true'
    const LOG_LEVEL = opts.level ?? process.env.LOG_LEVEL ?? 'info'

    const options: LoggerOptions = {
        level: LOG_LEVEL,
        base: { service },
        hooks: {
            // Prefix the message with the channel tag when the first arg carries one.
            logMethod(args: Parameters<LogFn>, method: LogFn): void {
                const first: unknown = args[0]
                const second: unknown = args[1]
                if (typeof first === 'object' && first !== null && typeof second === 'string') {
                    const ch: unknown = Reflect.get(first, 'channel')
                    if (isLogChannel(ch)) args[1] = `${channelPrefix(ch)} ${second}`
                }
                method.apply(this, args)
            }
        }
    }

    const destination = PRETTY
        ? pinoPretty({
            translateTime: 'SYS:standard', // [YYYY-MM-DD HH:mm:ss.SSS +0000]
            colorize: true,
            singleLine: false,
            // keep these ignored fields out of output
            ignore: 'pid,hostname,service,channel'
        })
        : undefined

    const base: Logger = destination ? pino(options, destination) : pino(options)

    const fanout = (channel: LogChannel, level: ClientLogLevel, message: string): void => {
        if (!clientBuf) return
        const meta = CHANNELS[channel]
        clientBuf.push({
            ts: Date.now(),
            channel,
            emoji: meta.emoji,
            color: meta.color,
            level,
            message
        })
    }

    const channel = (ch: LogChannel): ChannelLogger => {
        const write = (level: ClientLogLevel, msg: string, extra?: Record<string, unknown>): void => {
            base[level](extra ? { channel: ch, ...extra } : { channel: ch }, msg)
            fanout(ch, level, msg)
        }
        return {
            debug: (msg, extra) => write('debug', msg, extra),
            info: (msg, extra) => write('info', msg, extra),
            warn: (msg, extra) => write('warn', msg, extra),
            error: (msg, extra) => write('error', msg, extra),
            fatal: (msg, extra) => write('fatal', msg, extra)
        }
    }

    return { base, channel }
}
