import { type ChannelColor, LogChannel } from './types.js'

export const CHANNELS: Record<LogChannel, { emoji: string, color: ChannelColor }> = {
    [LogChannel.app]:    { emoji: '📦', color: 'blue' },
    [LogChannel.broker]: { emoji: '🛰️', color: 'cyan' },
    [LogChannel.topic]:  { emoji: '📨', color: 'green' },
    // Producers wired to UI interaction callbacks
    [LogChannel.effect]: { emoji: '🎛️', color: 'magenta' },
    [LogChannel.config]: { emoji: '🛠️', color: 'yellow' },
}

export const ANSI: Record<ChannelColor, string> = {
    blue: '\x1b[34m',
    yellow: '\x1b[33m',
    green: '\x1b[32m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
    red: '\x1b[31m',
    white: '\x1b[37m',
    purple: '\x1b[95m' // bright magenta (purple-ish)
}

export const RESET = '\x1b[0m'

export function channelPrefix(ch: LogChannel): string {
    const meta = CHANNELS[ch]
    return `${ANSI[meta.color]}${meta.emoji} [${ch}]:${RESET}`
}
