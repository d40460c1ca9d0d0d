// services/controller/src/devices/pdu/BroadcastCoordinator.ts

import type { BroadcastBus, DeliveredEvent, Subscription } from '../../core/events/BroadcastBus.js'
import type { TimerHandle, TimerRegistry } from './scheduler.js'
import type { BroadcastIntent, PduConfig, PduLogLevel } from './types.js'

export const GROUP_CYCLE_TOPIC = 'pdu.broadcast.group-cycle'

export interface GroupBroadcast {
    action: 'cycle' | 'clear'
    groupName: string
    /** Session id of the initiator. */
    origin: string
}

export type GroupBroadcastBus = BroadcastBus<GroupBroadcast>

export interface BroadcastCoordinatorDeps {
    sessionId: string
    bus: GroupBroadcastBus
    timers: TimerRegistry
    /** Case-insensitive lookup of a used local group; null when absent. */
    findGroupIndex: (name: string) => number | null
    isConnected: () => boolean
    /** Issue the receiver-side command for a matched group. */
    issueReceiverCommand: (groupIndex: number, groupName: string) => void
    log: (level: PduLogLevel, message: string) => void
}

export type BroadcastSettings = Omit<PduConfig['broadcast'], 'enabled' | 'receiverAction'>

/**
 * Synchronized group cycles across independent PDU sessions.
 *
 * The initiator remembers the group it is cycling itself (pendingCycleGroup)
 * so that it never acts as a receiver for its own group. A receiver waits a
 * settle window, checking for a `clear` of the same name, before issuing
 * its own command.
 */
export class BroadcastCoordinator {
    private subscription: Subscription | null = null
    private currentIntent: BroadcastIntent | null = null
    private pendingCycleGroup: number | null = null
    private receiverGroup: number | null = null
    private processing = false
    private cancelled = false
    private lastName: string | null = null
    private lastAt = 0
    private settleTimer: TimerHandle | null = null
    private releaseTimer: TimerHandle | null = null

    constructor(
        private readonly settings: BroadcastSettings,
        private readonly deps: BroadcastCoordinatorDeps
    ) {}

    start(): void {
        if (this.subscription) return
        this.subscription = this.deps.bus.subscribe(
            GROUP_CYCLE_TOPIC,
            evt => this.onMessage(evt),
            { name: `pdu-${this.deps.sessionId}` }
        )
    }

    stop(): void {
        this.subscription?.unsubscribe()
        this.subscription = null
        this.reset()
    }

    get intent(): BroadcastIntent | null {
        return this.currentIntent
    }

    isProcessing(): boolean {
        return this.processing
    }

    isReceiver(): boolean {
        return this.receiverGroup !== null
    }

    /* ---------------------------------------------------------------------- */
    /*  Initiator                                                             */
    /* ---------------------------------------------------------------------- */

    initiate(groupIndex: number, groupName: string): void {
        this.cancelSettle()
        this.currentIntent = { groupName, initiatedLocally: true, issuedAt: Date.now() }
        this.pendingCycleGroup = groupIndex
        this.receiverGroup = null
        this.processing = true
        this.lastName = normalize(groupName)
        this.lastAt = Date.now()

        this.deps.log('info', `Broadcasting cycle for group "${groupName}"`)
        this.publish('cycle', groupName)
    }

    /** The group command's response arrived (either role). */
    complete(): void {
        if (!this.currentIntent && !this.processing) return
        this.deps.log('debug', 'Broadcast operation complete')
        this.clearState()
    }

    /** Operation cancelled or failed; peers still settling are told to stand down. */
    abort(): void {
        const intent = this.currentIntent
        if (intent?.initiatedLocally) {
            this.publish('clear', intent.groupName)
        }
        this.clearState()
    }

    reset(): void {
        this.abort()
        this.lastName = null
        this.lastAt = 0
    }

    private publish(action: GroupBroadcast['action'], groupName: string): void {
        this.deps.bus.publish({
            topic: GROUP_CYCLE_TOPIC,
            source: this.deps.sessionId,
            payload: { action, groupName, origin: this.deps.sessionId },
        })
    }

    /* ---------------------------------------------------------------------- */
    /*  Receiver                                                              */
    /* ---------------------------------------------------------------------- */

    private onMessage(evt: DeliveredEvent<GroupBroadcast>): void {
        const msg = evt.payload
        if (msg.origin === this.deps.sessionId) return

        const name = msg.groupName.trim()
        if (name === '') return
        const key = normalize(name)

        if (msg.action === 'clear') {
            if (this.settleTimer && this.lastName === key) {
                this.deps.log('info', `Broadcast for "${name}" cleared by initiator`)
                this.cancelled = true
            }
            return
        }

        const now = Date.now()
        if (this.lastName === key && now - this.lastAt < this.settings.cooldownMs) {
            this.deps.log('debug', `Ignoring duplicate broadcast for "${name}" (cooldown)`)
            return
        }
        if (this.processing) {
            this.deps.log('debug', `Ignoring broadcast for "${name}" - already processing one`)
            return
        }

        this.lastName = key
        this.lastAt = now
        this.processing = true
        this.cancelled = false

        const groupIndex = this.deps.findGroupIndex(name)
        if (groupIndex === null) {
            this.deps.log('info', `No local group matches broadcast "${name}"`)
            this.releaseTimer = this.deps.timers.schedule(this.settings.checkIntervalMs, 'broadcast-release', () => {
                this.releaseTimer = null
                this.processing = false
            })
            return
        }

        if (this.pendingCycleGroup === groupIndex) {
            this.deps.log('debug', `Group ${groupIndex} is already being cycled locally`)
            this.processing = false
            return
        }

        this.deps.log('info', `Broadcast received for group "${name}" (local group ${groupIndex}) - settling`)
        this.scheduleSettleCheck(groupIndex, name, now)
    }

    private scheduleSettleCheck(groupIndex: number, name: string, receivedAt: number): void {
        this.settleTimer = this.deps.timers.schedule(this.settings.checkIntervalMs, 'broadcast-settle', () => {
            this.settleTimer = null

            if (this.cancelled) {
                this.deps.log('info', `Broadcast for "${name}" cancelled during settle window`)
                this.clearState()
                return
            }

            if (Date.now() - receivedAt < this.settings.settleMs) {
                this.scheduleSettleCheck(groupIndex, name, receivedAt)
                return
            }

            if (!this.deps.isConnected()) {
                this.deps.log('warn', `Broadcast for "${name}" dropped - not connected`)
                this.clearState()
                return
            }

            this.receiverGroup = groupIndex
            this.currentIntent = { groupName: name, initiatedLocally: false, issuedAt: Date.now() }
            this.deps.issueReceiverCommand(groupIndex, name)
        })
    }

    /* ---------------------------------------------------------------------- */

    private cancelSettle(): void {
        this.settleTimer?.cancel()
        this.settleTimer = null
        this.releaseTimer?.cancel()
        this.releaseTimer = null
    }

    private clearState(): void {
        this.cancelSettle()
        this.currentIntent = null
        this.pendingCycleGroup = null
        this.receiverGroup = null
        this.processing = false
        this.cancelled = false
    }
}

function normalize(name: string): string {
    return name.trim().toLowerCase()
}
