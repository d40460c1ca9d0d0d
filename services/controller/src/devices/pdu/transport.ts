// services/controller/src/devices/pdu/transport.ts

import { Socket } from 'node:net'
import type { PduConfig } from './types.js'

/**
 * The session only sees an ordered byte stream plus lifecycle events.
 * Exactly one of closed / error / timeout ends each connection attempt.
 */
export type TransportEvent =
    | { type: 'connected' }
    | { type: 'data'; chunk: string }
    | { type: 'closed' }
    | { type: 'error'; error: string }
    | { type: 'timeout' }

export type TransportListener = (evt: TransportEvent) => void

export interface PduTransport {
    readonly isConnected: boolean
    connect(host: string, port: number): void
    /** Throws when the stream is not open. */
    write(data: string): void
    /** Closes without emitting a closed event. */
    disconnect(): void
    onEvent(listener: TransportListener): () => void
}

export type TransportFactory = (config: PduConfig) => PduTransport

export interface NetTransportOptions {
    connectTimeoutMs: number
    encoding?: BufferEncoding
}

export class NetTransport implements PduTransport {
    private socket: Socket | null = null
    private connected = false
    private connectTimer: NodeJS.Timeout | null = null
    private readonly listeners = new Set<TransportListener>()

    constructor(private readonly opts: NetTransportOptions) {}

    get isConnected(): boolean {
        return this.connected
    }

    onEvent(listener: TransportListener): () => void {
        this.listeners.add(listener)
        return () => { this.listeners.delete(listener) }
    }

    connect(host: string, port: number): void {
        if (this.socket) this.teardown()

        const socket = new Socket()
        this.socket = socket
        let ended = false

        socket.setEncoding(this.opts.encoding ?? 'utf8')
        socket.setNoDelay(true)

        this.connectTimer = setTimeout(() => {
            if (this.socket !== socket || this.connected) return
            ended = true
            this.teardown()
            this.emit({ type: 'timeout' })
        }, this.opts.connectTimeoutMs)

        socket.once('connect', () => {
            if (this.socket !== socket) return
            this.clearConnectTimer()
            this.connected = true
            this.emit({ type: 'connected' })
        })

        socket.on('data', (chunk: Buffer | string) => {
            if (this.socket !== socket) return
            this.emit({ type: 'data', chunk: typeof chunk === 'string' ? chunk : chunk.toString('utf8') })
        })

        socket.on('error', (err: Error) => {
            if (this.socket !== socket) return
            ended = true
            this.teardown()
            this.emit({ type: 'error', error: err.message })
        })

        socket.on('close', () => {
            if (this.socket !== socket) return
            this.clearConnectTimer()
            this.connected = false
            this.socket = null
            if (!ended) this.emit({ type: 'closed' })
        })

        socket.connect(port, host)
    }

    write(data: string): void {
        if (!this.socket || !this.connected) {
            throw new Error('Socket is not connected')
        }
        this.socket.write(data)
    }

    disconnect(): void {
        this.teardown()
    }

    private teardown(): void {
        this.clearConnectTimer()
        const socket = this.socket
        this.socket = null
        this.connected = false
        // Late events from this socket fail the identity checks above
        socket?.destroy()
    }

    private clearConnectTimer(): void {
        if (this.connectTimer) {
            clearTimeout(this.connectTimer)
            this.connectTimer = null
        }
    }

    private emit(evt: TransportEvent): void {
        for (const l of this.listeners) l(evt)
    }
}

export const netTransportFactory: TransportFactory = config =>
    new NetTransport({ connectTimeoutMs: config.timing.connectTimeoutMs })
