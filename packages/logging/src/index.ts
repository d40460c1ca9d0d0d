export { createLogger, type CreateLoggerOptions } from './pino.js'
export { makeClientBuffer } from './buffer.js'
export { CHANNELS, channelPrefix } from './channels.js'
export {
    LogChannel,
    type ChannelColor,
    type ChannelLogger,
    type ClientLog,
    type ClientLogBuffer,
    type ClientLogLevel,
    type ClientLogListener,
    type LoggerBundle,
} from './types.js'
