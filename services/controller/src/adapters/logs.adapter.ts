// services/controller/src/adapters/logs.adapter.ts
import type {
    ClientLog,
    ClientLogBuffer,
    ClientLogListener
} from '@pdu-console/logging'

/**
 * Late-bound view of the shared ClientLogBuffer for the WebSocket plugin.
 * Retention stays inside the logging package; this only exposes history
 * for new clients and live appends for connected ones.
 */
let buf: ClientLogBuffer | null = null

export function attachClientBuffer(clientBuffer: ClientLogBuffer): void {
    buf = clientBuffer
}

/** Newest N entries, oldest first. */
export function getHistory(n: number): ClientLog[] {
    if (!buf) return []
    return buf.getLatest(n)
}

/** Subscribe to live logs; a no-op unsubscriber when nothing is attached yet. */
export function onLog(listener: ClientLogListener): () => void {
    if (!buf) return () => {}
    return buf.subscribe(listener)
}
