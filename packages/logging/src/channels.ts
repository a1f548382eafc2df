import { type ChannelColor, LogChannel } from './types.js'

export const CHANNELS: Record<LogChannel, { emoji: string, color: ChannelColor }> = {
    [LogChannel.monitor]:   { emoji: '🛰️', color: 'blue' },
    [LogChannel.app]:       { emoji: '📦', color: 'blue' },
    [LogChannel.request]:   { emoji: '📝', color: 'purple' },
    [LogChannel.websocket]: { emoji: '🔗', color: 'cyan' },
    [LogChannel.link]:      { emoji: '🔌', color: 'yellow' },
    [LogChannel.health]:    { emoji: '💓', color: 'magenta' },
    [LogChannel.protocol]:  { emoji: '📡', color: 'cyan' },
    [LogChannel.roster]:    { emoji: '🧑‍🎓', color: 'green' },
    [LogChannel.activity]:  { emoji: '📋', color: 'white' },
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

const KNOWN_CHANNELS = new Set<string>(Object.values(LogChannel))

export function isLogChannel(value: unknown): value is LogChannel {
    return typeof value === 'string' && KNOWN_CHANNELS.has(value)
}

export function channelPrefix(ch: LogChannel): string {
    const meta = CHANNELS[ch]
    return `${ANSI[meta.color]}${meta.emoji} [${ch}]:${RESET}`
}
