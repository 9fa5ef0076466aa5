import {
    type ClientLog,
    type ClientLogBuffer,
    type ClientLogListener,
    type LogChannel
} from './types.js'

const DEFAULT_LIMIT = 500

function limitFromEnv(): number {
    const n = Number(process.env.CLIENT_LOGS_TO_KEEP ?? DEFAULT_LIMIT)
    return Number.isInteger(n) && n > 0 ? n : DEFAULT_LIMIT
}

/**
 * In-memory tail of the log stream, oldest first. Listeners see each entry as it
 * is pushed, before any trimming.
 */
export function makeClientBuffer(limit: number = limitFromEnv()): ClientLogBuffer {
    const entries: ClientLog[] = []
    const listeners = new Set<ClientLogListener>()

    return {
        push(log) {
            entries.push(log)
            const overflow = entries.length - limit
            if (overflow > 0) entries.splice(0, overflow)
            for (const listener of listeners) listener(log)
        },

        getLatest(n, channel?: LogChannel) {
            if (n <= 0) return []
            const pool = channel === undefined ? entries : entries.filter((e) => e.channel === channel)
            return pool.slice(-n)
        },

        subscribe(listener) {
            listeners.add(listener)
            return () => {
                listeners.delete(listener)
            }
        },

        size: () => entries.length,

        clear() {
            entries.length = 0
        }
    }
}
