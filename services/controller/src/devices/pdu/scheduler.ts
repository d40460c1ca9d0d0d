// services/controller/src/devices/pdu/scheduler.ts

/**
 * Every delayed action of a session goes through one TimerRegistry so that
 * a disconnect can cancel all of them at once and rapid user input cannot
 * grow the number of live timers without bound: past `maxActive`, the oldest
 * live timer is cancelled to make room.
 */

export interface TimerHandle {
    readonly label: string
    cancel(): void
    isActive(): boolean
}

interface Entry {
    id: number
    label: string
    timer: NodeJS.Timeout
}

export class TimerRegistry {
    private readonly entries = new Map<number, Entry>()
    private nextId = 1

    constructor(
        private readonly maxActive: number,
        private readonly onEvict?: (label: string) => void
    ) {}

    schedule(delayMs: number, label: string, fn: () => void): TimerHandle {
        while (this.entries.size >= this.maxActive) {
            const oldest = this.entries.values().next()
            if (oldest.done) break
            this.remove(oldest.value.id)
            this.onEvict?.(oldest.value.label)
        }

        const id = this.nextId++
        const timer = setTimeout(() => {
            this.entries.delete(id)
            fn()
        }, Math.max(0, delayMs))

        this.entries.set(id, { id, label, timer })

        return {
            label,
            cancel: () => { this.remove(id) },
            isActive: () => this.entries.has(id),
        }
    }

    cancelAll(): void {
        for (const id of [...this.entries.keys()]) {
            this.remove(id)
        }
    }

    get activeCount(): number {
        return this.entries.size
    }

    private remove(id: number): void {
        const entry = this.entries.get(id)
        if (!entry) return
        clearTimeout(entry.timer)
        this.entries.delete(id)
    }
}

/* -------------------------------------------------------------------------- */
/*  Step sequences                                                            */
/* -------------------------------------------------------------------------- */

export interface SequenceStep {
    name: string
    /** Delay after the previous step (or after start for the first). */
    delayMs: number
    /** Return false to stop the sequence after this step. */
    run: () => boolean | void
}

export type SequenceOutcome = 'completed' | 'stopped' | 'cancelled'

/**
 * A linear chain of (delay, action) steps driven by one timer at a time.
 * Cancelling the sequence cancels whichever step is pending.
 */
export class StepSequence {
    private pending: TimerHandle | null = null
    private index = 0
    private finished = false

    constructor(
        private readonly timers: TimerRegistry,
        private readonly label: string,
        private readonly steps: SequenceStep[],
        private readonly onDone?: (outcome: SequenceOutcome, lastStep: string | null) => void
    ) {}

    start(): this {
        this.scheduleNext()
        return this
    }

    cancel(): void {
        if (this.finished) return
        this.pending?.cancel()
        this.pending = null
        this.finish('cancelled')
    }

    isRunning(): boolean {
        return !this.finished
    }

    /** Name of the next step to run, null once finished. */
    get nextStep(): string | null {
        if (this.finished) return null
        return this.steps[this.index]?.name ?? null
    }

    private scheduleNext(): void {
        const step = this.steps[this.index]
        if (!step) {
            this.finish('completed')
            return
        }
        this.pending = this.timers.schedule(step.delayMs, `${this.label}:${step.name}`, () => {
            this.pending = null
            this.index++
            const keepGoing = step.run()
            if (this.finished) return
            if (keepGoing === false) {
                this.finish('stopped', step.name)
                return
            }
            this.scheduleNext()
        })
    }

    private finish(outcome: SequenceOutcome, lastStep: string | null = null): void {
        this.finished = true
        this.onDone?.(outcome, lastStep)
    }
}
