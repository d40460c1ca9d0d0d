// services/controller/src/test-support/FakeTransport.ts

import type { PduTransport, TransportEvent, TransportListener } from '../devices/pdu/transport.js'

/**
 * In-process stand-in for the TCP transport. Tests drive the device side
 * with open / receive / close and read back what the session wrote.
 */
export class FakeTransport implements PduTransport {
    readonly writes: string[] = []
    readonly connectCalls: Array<{ host: string; port: number }> = []
    failWrites = false

    private connected = false
    private readonly listeners = new Set<TransportListener>()

    get isConnected(): boolean {
        return this.connected
    }

    onEvent(listener: TransportListener): () => void {
        this.listeners.add(listener)
        return () => { this.listeners.delete(listener) }
    }

    connect(host: string, port: number): void {
        this.connectCalls.push({ host, port })
    }

    write(data: string): void {
        if (!this.connected) throw new Error('Socket is not connected')
        if (this.failWrites) throw new Error('EPIPE')
        this.writes.push(data)
    }

    disconnect(): void {
        this.connected = false
    }

    /* ---- device side ---- */

    open(): void {
        this.connected = true
        this.emit({ type: 'connected' })
    }

    receive(chunk: string): void {
        this.emit({ type: 'data', chunk })
    }

    close(): void {
        this.connected = false
        this.emit({ type: 'closed' })
    }

    fail(error: string): void {
        this.connected = false
        this.emit({ type: 'error', error })
    }

    timeout(): void {
        this.connected = false
        this.emit({ type: 'timeout' })
    }

    /** Lines written so far, without line endings. */
    get lines(): string[] {
        return this.writes.map(w => w.replace(/\r\n$/, ''))
    }

    clearWrites(): void {
        this.writes.length = 0
    }

    private emit(evt: TransportEvent): void {
        for (const l of this.listeners) l(evt)
    }
}
