// services/controller/src/devices/pdu/ReconnectManager.ts

import type { TimerHandle, TimerRegistry } from './scheduler.js'
import type { PduConfig, PduLogLevel } from './types.js'
import { computeReconnectDelay } from './utils.js'

export interface ReconnectManagerDeps {
    timers: TimerRegistry
    isConnected: () => boolean
    /** Open a fresh connection. */
    connect: () => void
    onAttemptScheduled: (attempt: number, delayMs: number) => void
    /** Bounded budget used up; only a manual connect starts over. */
    onExhausted: (attempts: number) => void
    log: (level: PduLogLevel, message: string) => void
    random?: () => number
}

export type ReconnectSettings = PduConfig['reconnect']

export type ReconnectOutcome = 'scheduled' | 'already-scheduled' | 'connected' | 'disabled' | 'exhausted'

export class ReconnectManager {
    private attempts = 0
    private lastAttemptAt: number | null = null
    private timer: TimerHandle | null = null

    constructor(
        private readonly settings: ReconnectSettings,
        private readonly deps: ReconnectManagerDeps
    ) {}

    get attemptCount(): number {
        return this.attempts
    }

    get lastAttempt(): number | null {
        return this.lastAttemptAt
    }

    get isScheduled(): boolean {
        return this.timer?.isActive() ?? false
    }

    attempt(): ReconnectOutcome {
        if (!this.settings.enabled) return 'disabled'
        if (this.deps.isConnected()) return 'connected'
        if (this.isScheduled) return 'already-scheduled'

        if (this.attempts >= this.settings.maxAttempts) {
            this.deps.log(
                'warn',
                `Maximum reconnection attempts reached (${this.settings.maxAttempts}). Manual intervention required.`
            )
            this.deps.onExhausted(this.attempts)
            return 'exhausted'
        }

        const delayMs = computeReconnectDelay(
            this.settings.baseDelayMs,
            this.settings.maxDelayMs,
            this.attempts,
            this.settings.jitterMs,
            this.deps.random
        )

        this.attempts++
        this.lastAttemptAt = Date.now()
        this.deps.log('info', `Attempting reconnection #${this.attempts} in ${(delayMs / 1000).toFixed(1)} seconds...`)
        this.deps.onAttemptScheduled(this.attempts, delayMs)

        this.timer = this.deps.timers.schedule(delayMs, 'reconnect', () => {
            this.timer = null
            if (!this.deps.isConnected()) this.deps.connect()
        })
        return 'scheduled'
    }

    /** A connection succeeded. */
    reset(): void {
        this.attempts = 0
        this.lastAttemptAt = null
    }

    cancel(): void {
        this.timer?.cancel()
        this.timer = null
    }
}
