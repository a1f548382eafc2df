import pino, { type Logger, type LoggerOptions, type LogFn } from 'pino'
import pinoPretty from 'pino-pretty'
import {
    type ChannelLogger,
    type LoggerBundle,
    type LogLevel,
    LogChannel
} from './types.js'
import { channelPrefix, isLogChannel } from './channels.js'

export function createLogger(service: string): LoggerBundle {
    const PRETTY = String(process.env.PRETTY_LOGS ?? 'true').toLowerCase() === 'true'
    const LOG_LEVEL = process.env.LOG_LEVEL ?? 'info'

    const options: LoggerOptions = {
        level: LOG_LEVEL,
        base: { service },
        formatters: {
            level(label) { return { level: label } },
            log(obj) { return obj }
        },
        hooks: {
            logMethod(this: Logger, args: unknown[], method: LogFn): void {
                const first = args[0]
                const ch = typeof first === 'object' && first !== null && 'channel' in first
                    ? first.channel
                    : undefined

                if (isLogChannel(ch)) {
                    const prefix = channelPrefix(ch)

                    if (args.length >= 2 && typeof args[1] === 'string') {
                        args[1] = `${prefix} ${args[1]}`
                    } else if (args.length >= 1 && typeof args[0] === 'string') {
                        args[0] = `${prefix} ${args[0]}`
                    } else {
                        args.push(prefix)
                    }
                }

                Reflect.apply(method, this, args)
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

    const write = (ch: LogChannel, level: LogLevel, msg: string, extra?: Record<string, unknown>): void => {
        base[level](extra ? { channel: ch, ...extra } : { channel: ch }, msg)
    }

    const channel = (ch: LogChannel): ChannelLogger => ({
        debug: (msg, extra) => write(ch, 'debug', msg, extra),
        info: (msg, extra) => write(ch, 'info', msg, extra),
        warn: (msg, extra) => write(ch, 'warn', msg, extra),
        error: (msg, extra) => write(ch, 'error', msg, extra),
        fatal: (msg, extra) => write(ch, 'fatal', msg, extra),
    })

    return { base, channel }
}
