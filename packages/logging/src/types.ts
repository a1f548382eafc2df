// packages/logging/src/types.ts

export enum LogChannel {
    monitor = 'monitor',
    app = 'app',
    request = 'request',
    websocket = 'websocket',

    // serial link to the radio bridge
    link = 'link',
    health = 'health',
    protocol = 'protocol',

    // student roster + status aggregation
    roster = 'roster',

    // mirror of the teacher-facing activity log
    activity = 'activity',
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

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

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
