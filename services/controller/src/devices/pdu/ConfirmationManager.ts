// services/controller/src/devices/pdu/ConfirmationManager.ts

import type { TimerHandle, TimerRegistry } from './scheduler.js'
import type {
    PduConfig,
    PduLogLevel,
    PendingClearReason,
    PendingUserCommand,
    SessionFlags,
} from './types.js'

/**
 * Two confirmation layers share the confirm/cancel controls:
 *
 * 1. user arming: a toggle or cycle press is held as the single pending
 *    command until the user confirms or cancels it;
 * 2. server questions: the CLI itself may ask "Do you wish to continue?".
 *
 * A server question that arrives while layer 1 is active is answered
 * automatically; otherwise it is surfaced on the same controls. The two
 * flags are never true together.
 */

export type ArmInput = Omit<PendingUserCommand, 'armedAt'>

export interface ConfirmationManagerDeps {
    flags: SessionFlags
    timers: TimerRegistry
    log: (level: PduLogLevel, message: string) => void
    onArmed: (pending: PendingUserCommand) => void
    onCleared: (reason: PendingClearReason) => void
    /** The server question went unanswered; the session answers "n". */
    onServerConfirmationExpired: () => void
    /** Safety net fired with nothing armed: force the session idle. */
    onSafetyTimeout: () => void
}

export type ConfirmationSettings = Pick<PduConfig['timing'], 'confirmationTimeoutMs' | 'confirmationSafetyMs'>

interface Armed {
    command: PendingUserCommand
    revert: () => void
}

export class ConfirmationManager {
    private armed: Armed | null = null
    private confirmTimer: TimerHandle | null = null
    private safetyTimer: TimerHandle | null = null
    private serverTimer: TimerHandle | null = null

    constructor(
        private readonly settings: ConfirmationSettings,
        private readonly deps: ConfirmationManagerDeps
    ) {}

    get pending(): PendingUserCommand | null {
        return this.armed?.command ?? null
    }

    hasPending(): boolean {
        return this.armed !== null
    }

    /* ---------------------------------------------------------------------- */
    /*  Layer 1: arming                                                       */
    /* ---------------------------------------------------------------------- */

    /**
     * Store a new pending command, superseding (and reverting) any previous
     * one. The caller has already checked connectivity and busy state.
     */
    arm(input: ArmInput, revert: () => void): PendingUserCommand {
        const { flags } = this.deps

        if (this.armed) {
            this.deps.log('info', `Superseding pending command: ${this.armed.command.description}`)
            this.armed.revert()
            this.deps.onCleared('superseded')
        }

        const command: PendingUserCommand = { ...input, armedAt: Date.now() }
        this.armed = { command, revert }

        flags.awaitingUserConfirmation = true
        flags.waitingIndicator = true
        flags.confirmEnabled = true

        this.confirmTimer?.cancel()
        this.confirmTimer = this.deps.timers.schedule(
            this.settings.confirmationTimeoutMs,
            'confirmation-timeout',
            () => {
                this.confirmTimer = null
                this.deps.log('info', 'User confirmation timeout - cancelling pending command')
                this.cancel('timeout')
            }
        )

        // Not restarted on re-arm: caps the total time controls stay locked
        if (!this.safetyTimer?.isActive()) {
            this.safetyTimer = this.deps.timers.schedule(
                this.settings.confirmationSafetyMs,
                'confirmation-safety',
                () => {
                    this.safetyTimer = null
                    this.onSafety()
                }
            )
        }

        this.deps.log('info', `Command prepared: ${command.description} - awaiting confirmation`)
        this.deps.onArmed(command)
        return command
    }

    /**
     * Hand the pending command over for execution. The user-confirmation flag
     * stays set until `settle()` runs on the command's response.
     */
    take(): PendingUserCommand | null {
        const armed = this.armed
        if (!armed) return null
        this.armed = null
        this.confirmTimer?.cancel()
        this.confirmTimer = null
        this.deps.flags.confirmEnabled = false
        this.deps.onCleared('executed')
        return armed.command
    }

    /** Revert and drop the pending command. Returns false when nothing was armed. */
    cancel(reason: Extract<PendingClearReason, 'cancelled' | 'timeout' | 'safety-timeout'>): boolean {
        const armed = this.armed
        if (!armed) return false

        this.armed = null
        armed.revert()
        this.stopUserTimers()
        this.clearUserFlags()

        this.deps.log('info', `Command cancelled (${reason}): ${armed.command.description}`)
        this.deps.onCleared(reason)
        return true
    }

    /** The response to the executed user command arrived. */
    settle(): void {
        if (!this.deps.flags.awaitingUserConfirmation || this.armed) return
        this.stopUserTimers()
        this.clearUserFlags()
    }

    private onSafety(): void {
        if (this.armed) {
            this.deps.log('warn', 'Safety timeout - force-cancelling pending command')
            this.cancel('safety-timeout')
            return
        }
        if (this.deps.flags.awaitingUserConfirmation) {
            this.deps.log('warn', 'Safety timeout - clearing stale confirmation state')
            this.clearUserFlags()
            this.deps.onSafetyTimeout()
        }
    }

    private stopUserTimers(): void {
        this.confirmTimer?.cancel()
        this.confirmTimer = null
        this.safetyTimer?.cancel()
        this.safetyTimer = null
    }

    private clearUserFlags(): void {
        const { flags } = this.deps
        flags.awaitingUserConfirmation = false
        flags.confirmEnabled = flags.awaitingServerConfirmation
        flags.waitingIndicator = flags.awaitingServerConfirmation
    }

    /* ---------------------------------------------------------------------- */
    /*  Layer 2: server questions                                             */
    /* ---------------------------------------------------------------------- */

    /**
     * The CLI asked for y/n. Returns 'auto-confirm' when a user confirmation
     * already covers it, 'surfaced' when the user must answer.
     */
    onServerPrompt(): 'auto-confirm' | 'surfaced' {
        const { flags } = this.deps
        if (flags.awaitingUserConfirmation) {
            this.deps.log('debug', 'Already in user confirmation mode - auto-confirming PDU prompt')
            return 'auto-confirm'
        }

        flags.awaitingServerConfirmation = true
        flags.waitingIndicator = true
        flags.confirmEnabled = true

        this.serverTimer?.cancel()
        this.serverTimer = this.deps.timers.schedule(
            this.settings.confirmationTimeoutMs,
            'server-confirmation-timeout',
            () => {
                this.serverTimer = null
                if (!this.deps.flags.awaitingServerConfirmation) return
                this.deps.log('info', 'Server confirmation timeout - answering no')
                this.resolveServerPrompt()
                this.deps.onServerConfirmationExpired()
            }
        )
        this.deps.log('info', 'PDU asks for confirmation - waiting for user input')
        return 'surfaced'
    }

    /** Clear the surfaced server question. Returns false when none was pending. */
    resolveServerPrompt(): boolean {
        const { flags } = this.deps
        if (!flags.awaitingServerConfirmation) return false
        this.serverTimer?.cancel()
        this.serverTimer = null
        flags.awaitingServerConfirmation = false
        flags.confirmEnabled = false
        flags.waitingIndicator = false
        return true
    }

    /* ---------------------------------------------------------------------- */
    /*  Reset                                                                 */
    /* ---------------------------------------------------------------------- */

    /** Drop everything without reverting; the session resets its own model. */
    reset(): void {
        const hadPending = this.armed !== null
        this.armed = null
        this.stopUserTimers()
        this.serverTimer?.cancel()
        this.serverTimer = null

        const { flags } = this.deps
        flags.awaitingUserConfirmation = false
        flags.awaitingServerConfirmation = false
        flags.confirmEnabled = false
        flags.waitingIndicator = false

        if (hadPending) this.deps.onCleared('reset')
    }
}
