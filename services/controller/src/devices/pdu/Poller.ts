// services/controller/src/devices/pdu/Poller.ts

import { buildPollBatch } from './commands.js'
import type { TimerHandle, TimerRegistry } from './scheduler.js'
import type { PduCommand, PduLogLevel, SessionFlags } from './types.js'

export interface PollerDeps {
    flags: SessionFlags
    timers: TimerRegistry
    isBusy: () => boolean
    /** Replace the dispatcher queue with the batch and start sending. */
    submit: (batch: PduCommand[]) => void
    log: (level: PduLogLevel, message: string) => void
}

export interface PollerSettings {
    intervalMs: number
    maxConsecutiveSkips: number
}

/**
 * Fixed-interval status polling. A tick that finds the session busy is
 * skipped; after `maxConsecutiveSkips` skips in a row the chain halts until
 * `restart()` is called again.
 */
export class Poller {
    private timer: TimerHandle | null = null
    private skips = 0
    private halted = false

    constructor(
        private readonly settings: PollerSettings,
        private readonly deps: PollerDeps
    ) {}

    get isRunning(): boolean {
        return this.timer?.isActive() ?? false
    }

    get isHalted(): boolean {
        return this.halted
    }

    get consecutiveSkips(): number {
        return this.skips
    }

    /** Poll now and keep polling every interval. */
    restart(): void {
        this.stop()
        this.halted = false
        this.skips = 0
        this.tick()
    }

    stop(): void {
        this.timer?.cancel()
        this.timer = null
        this.deps.flags.pollingActive = false
    }

    private tick(): void {
        const { flags } = this.deps

        if (this.deps.isBusy()) {
            this.skips++
            if (this.skips >= this.settings.maxConsecutiveSkips) {
                this.deps.log('error', `Polling halted after ${this.skips} consecutive busy skips`)
                this.halted = true
                this.skips = 0
                this.stop()
                return
            }
            this.deps.log('debug', `Skipping poll - session busy (${this.skips}/${this.settings.maxConsecutiveSkips})`)
            this.scheduleNext()
            return
        }

        this.skips = 0
        if (!flags.pollingActive) {
            flags.pollingActive = true
            this.deps.submit(buildPollBatch(flags))
        }
        this.scheduleNext()
    }

    private scheduleNext(): void {
        this.timer = this.deps.timers.schedule(this.settings.intervalMs, 'poll', () => {
            this.timer = null
            this.deps.flags.pollingActive = false
            this.tick()
        })
    }
}
