// services/controller/src/devices/pdu/CommandDispatcher.ts

import { LINE_ENDING, isSafeCommandText } from './commands.js'
import type { TimerHandle, TimerRegistry } from './scheduler.js'
import type { PduCommand, PduConfig, PduLogLevel, SessionFlags } from './types.js'

/**
 * The CLI has no correlation ids: a response belongs to whatever was sent
 * last. The dispatcher therefore keeps at most one command outstanding
 * (flags.awaitingResponse) and only writes the next one after the session
 * has acknowledged the previous response.
 */

export interface OutstandingCommand {
    command: PduCommand
    firstSentAt: number
    lastSentAt: number
    retries: number
}

export type SendFailureReason = 'not-connected' | 'write-failed' | 'rejected'

export interface CommandDispatcherDeps {
    flags: SessionFlags
    timers: TimerRegistry
    write: (data: string) => void
    isConnected: () => boolean
    onSent: (cmd: PduCommand) => void
    onSendFailure: (cmd: PduCommand, reason: SendFailureReason, detail: string) => void
    /** Called once retries for the outstanding command are exhausted. */
    onResponseTimeout: (cmd: OutstandingCommand) => void
    log: (level: PduLogLevel, message: string) => void
}

export type DispatcherSettings = Pick<PduConfig['timing'], 'responseTimeoutMs'> & {
    retry: PduConfig['retry']
}

export class CommandDispatcher {
    private queue: PduCommand[] = []
    private outstanding: OutstandingCommand | null = null
    private responseTimer: TimerHandle | null = null
    private retryTimer: TimerHandle | null = null
    private timeoutSuspended = false

    constructor(
        private readonly settings: DispatcherSettings,
        private readonly deps: CommandDispatcherDeps
    ) {}

    /* ---------------------------------------------------------------------- */
    /*  Queue                                                                 */
    /* ---------------------------------------------------------------------- */

    /** Replace the queue wholesale. */
    enqueue(commands: PduCommand[]): void {
        this.queue = [...commands]
    }

    append(commands: PduCommand[]): void {
        this.queue.push(...commands)
    }

    /** Put one command at the head of the queue. */
    prioritize(command: PduCommand): void {
        this.queue.unshift(command)
    }

    get queued(): readonly PduCommand[] {
        return this.queue
    }

    get current(): OutstandingCommand | null {
        return this.outstanding
    }

    hasPendingUserCommand(): boolean {
        return (this.outstanding?.command.userInitiated ?? false)
            || this.queue.some(c => c.userInitiated)
    }

    /**
     * Send the head of the queue unless a response is still outstanding.
     * Returns true when a command was written.
     */
    processNext(): boolean {
        const { flags } = this.deps

        while (!flags.awaitingResponse && this.queue.length > 0) {
            const cmd = this.queue.shift()
            if (!cmd) break

            if (cmd.sanitize && !isSafeCommandText(cmd.text)) {
                this.deps.log('error', `Rejected unsafe command text: ${JSON.stringify(cmd.text)}`)
                this.deps.onSendFailure(cmd, 'rejected', 'command contains characters outside the allowed set')
                continue
            }

            return this.dispatch(cmd)
        }

        return false
    }

    private dispatch(cmd: PduCommand): boolean {
        const { flags } = this.deps

        if (!this.deps.isConnected()) {
            this.queue = []
            flags.awaitingResponse = false
            this.deps.log('error', `Cannot send "${cmd.text}": not connected`)
            this.deps.onSendFailure(cmd, 'not-connected', 'transport is not connected')
            return false
        }

        try {
            this.deps.write(cmd.text + LINE_ENDING)
        } catch (err) {
            this.queue = []
            flags.awaitingResponse = false
            const detail = err instanceof Error ? err.message : String(err)
            this.deps.log('error', `Failed to send "${cmd.text}": ${detail}`)
            this.deps.onSendFailure(cmd, 'write-failed', detail)
            return false
        }

        const now = Date.now()
        this.outstanding = { command: cmd, firstSentAt: now, lastSentAt: now, retries: 0 }
        flags.awaitingResponse = true
        if (cmd.userInitiated) flags.userInitiated = true

        this.deps.log('debug', `Sent: ${cmd.text}`)
        this.deps.onSent(cmd)
        this.armResponseTimer()
        return true
    }

    /* ---------------------------------------------------------------------- */
    /*  Responses                                                             */
    /* ---------------------------------------------------------------------- */

    /** Mark the outstanding response as received and return what it answered. */
    acknowledge(): OutstandingCommand | null {
        this.clearTimers()
        const done = this.outstanding
        this.outstanding = null
        this.timeoutSuspended = false
        this.deps.flags.awaitingResponse = false
        if (done?.command.userInitiated) this.deps.flags.userInitiated = false
        return done
    }

    /** Pause the response timer while the user answers a server y/n question. */
    suspendTimeout(): void {
        this.timeoutSuspended = true
        this.responseTimer?.cancel()
        this.responseTimer = null
    }

    resumeTimeout(): void {
        if (!this.timeoutSuspended) return
        this.timeoutSuspended = false
        if (this.outstanding) this.armResponseTimer()
    }

    /** Raw y/n answer to a server question; does not touch the queue. */
    reply(answer: 'y' | 'n'): boolean {
        return this.writeRaw(answer, `reply ${answer}`)
    }

    /** Login credential; written as-is, never sanitized or queued. */
    sendCredential(value: string): boolean {
        return this.writeRaw(value, 'credential')
    }

    private writeRaw(text: string, what: string): boolean {
        if (!this.deps.isConnected()) {
            this.deps.log('warn', `Cannot send ${what}: not connected`)
            return false
        }
        try {
            this.deps.write(text + LINE_ENDING)
            return true
        } catch (err) {
            this.deps.log('error', `Failed to send ${what}: ${err instanceof Error ? err.message : String(err)}`)
            return false
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Timeouts + retries                                                    */
    /* ---------------------------------------------------------------------- */

    private armResponseTimer(): void {
        const out = this.outstanding
        if (!out || this.timeoutSuspended) return
        this.responseTimer?.cancel()
        const timeoutMs = out.command.timeoutMs ?? this.settings.responseTimeoutMs
        this.responseTimer = this.deps.timers.schedule(timeoutMs, 'response-timeout', () => {
            this.responseTimer = null
            this.onResponseTimer(out)
        })
    }

    private onResponseTimer(out: OutstandingCommand): void {
        if (this.outstanding !== out) return
        if (this.scheduleRetry(out)) return

        this.outstanding = null
        this.queue = []
        this.deps.flags.awaitingResponse = false
        this.deps.flags.userInitiated = false
        this.deps.onResponseTimeout(out)
    }

    /** Retries apply only to the command that was last dispatched. */
    private scheduleRetry(out: OutstandingCommand): boolean {
        const { attempts, delayMs, budgetMs } = this.settings.retry
        const elapsed = Date.now() - out.firstSentAt

        if (out.retries >= attempts) {
            this.deps.log('error', `Command "${out.command.text}" failed after ${attempts} retries`)
            return false
        }
        if (elapsed + delayMs > budgetMs) {
            this.deps.log('warn', `Retry budget of ${budgetMs}ms exhausted for "${out.command.text}"`)
            return false
        }

        out.retries++
        this.deps.log('info', `Retrying "${out.command.text}" (attempt ${out.retries}/${attempts})`)

        this.retryTimer = this.deps.timers.schedule(delayMs, 'command-retry', () => {
            this.retryTimer = null
            if (this.outstanding !== out) return
            if (this.deps.isConnected()) {
                try {
                    this.deps.write(out.command.text + LINE_ENDING)
                } catch (err) {
                    this.deps.log('error', `Retry write failed: ${err instanceof Error ? err.message : String(err)}`)
                }
            } else {
                this.deps.log('warn', `Retry of "${out.command.text}" skipped: not connected`)
            }
            out.lastSentAt = Date.now()
            this.armResponseTimer()
        })
        return true
    }

    /* ---------------------------------------------------------------------- */
    /*  Reset                                                                 */
    /* ---------------------------------------------------------------------- */

    reset(): void {
        this.clearTimers()
        this.queue = []
        this.outstanding = null
        this.timeoutSuspended = false
        this.deps.flags.awaitingResponse = false
        this.deps.flags.userInitiated = false
    }

    private clearTimers(): void {
        this.responseTimer?.cancel()
        this.responseTimer = null
        this.retryTimer?.cancel()
        this.retryTimer = null
    }
}
