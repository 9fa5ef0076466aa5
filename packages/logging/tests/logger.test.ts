import { describe, it, expect, vi } from 'vitest'
import {
    createLogger,
    makeClientBuffer,
    channelPrefix,
    LogChannel,
    type ClientLog
} from '../src/index.js'

describe('makeClientBuffer', () => {
    const entry = (message: string): ClientLog => ({
        ts: 1,
        channel: LogChannel.app,
        emoji: '📦',
        color: 'blue',
        level: 'info',
        message
    })

    it('keeps only the latest `limit` entries', () => {
        const buf = makeClientBuffer(2)
        buf.push(entry('a'))
        buf.push(entry('b'))
        buf.push(entry('c'))

        expect(buf.getLatest(10).map((l) => l.message)).toEqual(['b', 'c'])
        expect(buf.getLatest(1).map((l) => l.message)).toEqual(['c'])
        expect(buf.getLatest(0)).toEqual([])
        expect(buf.size()).toBe(2)
    })

    it('filters by channel', () => {
        const buf = makeClientBuffer(5)
        buf.push(entry('a'))
        buf.push({ ...entry('b'), channel: LogChannel.topic })
        buf.push(entry('c'))

        expect(buf.getLatest(5, LogChannel.topic).map((l) => l.message)).toEqual(['b'])
        expect(buf.getLatest(1, LogChannel.app).map((l) => l.message)).toEqual(['c'])
    })

    it('notifies listeners until they unsubscribe', () => {
        const buf = makeClientBuffer(5)
        const listener = vi.fn()
        const off = buf.subscribe(listener)

        buf.push(entry('first'))
        off()
        buf.push(entry('second'))

        expect(listener).toHaveBeenCalledTimes(1)
        expect(listener).toHaveBeenCalledWith(entry('first'))
    })

    it('clear empties the buffer', () => {
        const buf = makeClientBuffer(5)
        buf.push(entry('x'))
        buf.clear()
        expect(buf.getLatest(5)).toEqual([])
        expect(buf.size()).toBe(0)
    })
})

describe('createLogger', () => {
    it('fans every channel line out to the client buffer', () => {
        const buf = makeClientBuffer(10)
        const { channel } = createLogger('test', buf, { pretty: false, level: 'silent' })

        channel(LogChannel.topic).warn('handler slow')
        channel(LogChannel.broker).debug('routing', { topic: 't' })

        const [warn, debug] = buf.getLatest(2)
        expect(warn).toMatchObject({
            channel: LogChannel.topic,
            level: 'warn',
            emoji: '📨',
            color: 'green',
            message: 'handler slow'
        })
        expect(typeof warn?.ts).toBe('number')
        expect(debug).toMatchObject({ channel: LogChannel.broker, level: 'debug', message: 'routing' })
    })

    it('honours the level override on the pino instance', () => {
        const { base } = createLogger('test', undefined, { pretty: false, level: 'warn' })
        expect(base.level).toBe('warn')
        expect(base.isLevelEnabled('info')).toBe(false)
        expect(base.isLevelEnabled('error')).toBe(true)
    })
})

describe('channelPrefix', () => {
    it('wraps emoji and channel name in the channel colour', () => {
        expect(channelPrefix(LogChannel.broker)).toBe('\x1b[36m🛰️ [broker]:\x1b[0m')
    })
})
