export { createLogger } from './pino.js'
export { CHANNELS, ANSI, RESET, channelPrefix, isLogChannel } from './channels.js'
export {
    LogChannel,
    type ChannelColor,
    type ChannelLogger,
    type LoggerBundle,
    type LogLevel
} from './types.js'
