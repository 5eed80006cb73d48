import { type ChannelColor, LogChannel } from './types.js'

export const CHANNELS: Record<LogChannel, { emoji: string, color: ChannelColor }> = {
    [LogChannel.transport]:   { emoji: '🛰️', color: 'blue' },
    [LogChannel.codec]:       { emoji: '🧩', color: 'magenta' },
    [LogChannel.session]:     { emoji: '🔗', color: 'cyan' },
    [LogChannel.queue]:       { emoji: '📥', color: 'yellow' },
    [LogChannel.engine]:      { emoji: '⚙️', color: 'green' },
    // dedup hits and late responses
    [LogChannel.idempotency]: { emoji: '♻️', color: 'purple' },
    [LogChannel.metrics]:     { emoji: '📈', color: 'white' },
    [LogChannel.harness]:     { emoji: '🔌', color: 'red' },
    [LogChannel.request]:     { emoji: '📝', color: 'purple' },
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

export function isLogChannel(value: unknown): value is LogChannel {
    return typeof value === 'string' && Object.prototype.hasOwnProperty.call(CHANNELS, value)
}
