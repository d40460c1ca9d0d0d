// packages/logging/src/types.ts
import type { Logger } from 'pino'

export enum LogChannel {
    app = 'app',
    request = 'request',
    websocket = 'websocket',
    pdu = 'pdu',
    broadcast = 'broadcast',
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

export type ClientLogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export interface ClientLog {
    ts: number
    channel: LogChannel
    emoji: string
    color: ChannelColor
    level: ClientLogLevel
    message: string
}

export type ClientLogListener = (log: ClientLog) => void

export interface ClientLogBuffer {
    push: (log: ClientLog) => void
    getLatest: (n: number) => ClientLog[]
    subscribe: (listener: ClientLogListener) => () => void
}

export interface ChannelLogger {
    debug: (msg: string, extra?: Record<string, unknown>) => void
    info:  (msg: string, extra?: Record<string, unknown>) => void
    warn:  (msg: string, extra?: Record<string, unknown>) => void
    error: (msg: string, extra?: Record<string, unknown>) => void
    fatal: (msg: string, extra?: Record<string, unknown>) => void
}

export interface LoggerBundle {
    base: Logger
    channel: (ch: LogChannel) => ChannelLogger
}
