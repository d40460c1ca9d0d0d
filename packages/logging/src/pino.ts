import pino, { type Logger, type LoggerOptions, type DestinationStream } from 'pino'
import pinoPretty from 'pino-pretty'
import {
    type ClientLogLevel,
    type LoggerBundle,
    type ChannelLogger,
    type ClientLogBuffer,
    LogChannel
} from './types.js'
import { CHANNELS, channelPrefix } from './channels.js'

export interface CreateLoggerOptions {
    /** Overrides PRETTY_LOGS. */
    pretty?: boolean
    /** Overrides LOG_LEVEL. */
    level?: string
    /** Raw destination (tests); disables pretty printing. */
    destination?: DestinationStream
}

export function createLogger(
    service: string,
    clientBuf?: ClientLogBuffer,
    opts: CreateLoggerOptions = {}
): LoggerBundle {
    const PRETTY = opts.destination
        ? false
        : opts.pretty ?? String(process.env.PRETTY_LOGS ?? 'true').toLowerCase() === 'true'
    const LOG_LEVEL = opts.level ?? process.env.LOG_LEVEL ?? 'info'

    const options: LoggerOptions = {
        level: LOG_LEVEL,
        base: { service },
    }

    const destination = opts.destination ?? (PRETTY
        ? pinoPretty({
            translateTime: 'SYS:standard', // [YYYY-MM-DD HH:mm:ss.SSS +0000]
            colorize: true,
            singleLine: false,
            ignore: 'pid,hostname,service,channel'
        })
        : undefined)

    const base: Logger = destination ? pino(options, destination) : pino(options)

    const fanout = (channel: LogChannel, level: ClientLogLevel, message: string): void => {
        if (!clientBuf) return
        // Client buffer keeps what the UI can show; debug stays in the process log
        if (level === 'debug') return
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
        const prefix = channelPrefix(ch, PRETTY)
        const write = (level: ClientLogLevel, msg: string, extra?: Record<string, unknown>): void => {
            const obj = extra ? { channel: ch, ...extra } : { channel: ch }
            base[level](obj, `${prefix} ${msg}`)
            fanout(ch, level, msg)
        }
        return {
            debug: (msg, extra) => write('debug', msg, extra),
            info: (msg, extra) => write('info', msg, extra),
            warn: (msg, extra) => write('warn', msg, extra),
            error: (msg, extra) => write('error', msg, extra),
            fatal: (msg, extra) => write('fatal', msg, extra),
        }
    }

    return { base, channel }
}
