// services/controller/src/devices/pdu/framer.ts

/**
 * Byte-stream framing for the PDU CLI.
 *
 * The CLI has no message framing: a login challenge, a y/n question or the
 * recurring shell prompt at the end of a response are the only boundaries.
 * Everything received is accumulated in a ResponseBuffer and the whole buffer
 * is searched after every chunk, so a marker split across two chunks is only
 * recognized once its last byte has arrived.
 */

export const PROTOCOL_MARKERS = {
    confirmation: 'Do you wish to',
    username: 'Username:',
    password: 'Password:',
    welcome: 'Welcome',
    authFailed: 'Authentication failed',
} as const

export type ProtocolUnit =
    | { kind: 'confirmation-prompt' }
    | { kind: 'username-challenge' }
    | { kind: 'password-challenge' }
    | { kind: 'welcome' }
    | { kind: 'auth-failed' }
    | { kind: 'response'; text: string }

export interface RecognizeContext {
    prompt: string
    authenticated: boolean
}

export type AppendResult =
    | { kind: 'appended' }
    /** Stale content was discarded to make room; the chunk was kept. */
    | { kind: 'overflow-reset'; discarded: number }
    /** Chunk alone exceeds the cap and was not stored. */
    | { kind: 'dropped'; size: number }

export class ResponseBuffer {
    private content = ''

    constructor(private readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new Error(`ResponseBuffer capacity must be a positive integer (got ${capacity})`)
        }
    }

    append(chunk: string): AppendResult {
        if (chunk.length > this.capacity) {
            return { kind: 'dropped', size: chunk.length }
        }
        if (this.content.length + chunk.length > this.capacity) {
            const discarded = this.content.length
            this.content = chunk
            return { kind: 'overflow-reset', discarded }
        }
        this.content += chunk
        return { kind: 'appended' }
    }

    get text(): string {
        return this.content
    }

    get length(): number {
        return this.content.length
    }

    clear(): void {
        this.content = ''
    }
}

/**
 * Decide whether the accumulated buffer holds a complete logical unit.
 * Returns null while more data is needed.
 */
export function recognizeUnit(buffer: string, ctx: RecognizeContext): ProtocolUnit | null {
    if (buffer.length === 0) return null

    if (buffer.includes(PROTOCOL_MARKERS.confirmation)) {
        return { kind: 'confirmation-prompt' }
    }

    if (!ctx.authenticated) {
        // A rejected login is usually followed by a fresh Username: challenge
        if (buffer.includes(PROTOCOL_MARKERS.authFailed)) return { kind: 'auth-failed' }
        // Challenges win over a banner in the same chunk
        if (buffer.includes(PROTOCOL_MARKERS.username)) return { kind: 'username-challenge' }
        if (buffer.includes(PROTOCOL_MARKERS.password)) return { kind: 'password-challenge' }
        if (buffer.includes(PROTOCOL_MARKERS.welcome)) return { kind: 'welcome' }
        return null
    }

    if (ctx.prompt !== '' && buffer.includes(ctx.prompt)) {
        return { kind: 'response', text: buffer }
    }

    return null
}
