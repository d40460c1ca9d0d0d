// services/controller/src/devices/pdu/PduSessionService.ts

import { BroadcastCoordinator, type GroupBroadcastBus } from './BroadcastCoordinator.js'
import { CommandDispatcher, type OutstandingCommand, type SendFailureReason } from './CommandDispatcher.js'
import { ConfirmationManager } from './ConfirmationManager.js'
import { buildRefreshBatch, groupPowerCommand, outletPowerCommand } from './commands.js'
import { ResponseBuffer, recognizeUnit } from './framer.js'
import {
    UNUSED_GROUP_NAME,
    applyParsedResponse,
    createGroupStates,
    createOutletStates,
    parseResponse,
} from './parser.js'
import { Poller } from './Poller.js'
import { ReconnectManager } from './ReconnectManager.js'
import { StepSequence, TimerRegistry, type TimerHandle } from './scheduler.js'
import type { PduTransport, TransportEvent } from './transport.js'
import type {
    BroadcastIntent,
    ConnectionStatus,
    ErrorStats,
    GroupState,
    OperationRecord,
    OutletState,
    PduCommand,
    PduConfig,
    PduErrorCategory,
    PduEventInput,
    PduEventSink,
    PduHealth,
    PduIndicators,
    PduLogLevel,
    PendingCommandKind,
    PendingUserCommand,
    PerformanceStats,
    PowerOperationMode,
    SensorReadings,
    SessionFlags,
} from './types.js'
import { errorMessage, isValidHost, isValidPort } from './utils.js'

export interface PduSessionServiceDeps {
    events: PduEventSink
    transport: PduTransport
    /** Shared channel for synchronized group cycles; omit to disable. */
    bus?: GroupBroadcastBus
    /** Jitter source for reconnect backoff. */
    random?: () => number
}

/** Delays of the refresh chain that follows a confirmed user command. */
const POST_COMMAND_STEPS = {
    settleMs: 1_000,
    refreshMs: 2_000,
    awaitRefreshMs: 3_000,
    resumePollingMs: 5_000,
} as const

const HEALTH_ERROR_WARN_THRESHOLD = 10

export function createSessionFlags(): SessionFlags {
    return {
        connected: false,
        authenticated: false,
        awaitingResponse: false,
        processing: false,
        userInitiated: false,
        awaitingUserConfirmation: false,
        awaitingServerConfirmation: false,
        groupOperationInFlight: false,
        postGroupCooldown: false,
        revertingState: false,
        pollingActive: false,
        waitingIndicator: false,
        confirmEnabled: false,
    }
}

/**
 * One PDU CLI session: connection, login, command sequencing, two-layer
 * confirmation, polling, reconnects and broadcast participation.
 *
 * The service never logs directly; everything observable leaves through
 * `deps.events` so that a plugin can fan it out to the logger and the
 * application state.
 */
export class PduSessionService {
    readonly id: string

    private readonly config: PduConfig
    private readonly events: PduEventSink
    private readonly transport: PduTransport

    private readonly flags: SessionFlags = createSessionFlags()
    private readonly timers: TimerRegistry
    private readonly buffer: ResponseBuffer
    private readonly dispatcher: CommandDispatcher
    private readonly confirmation: ConfirmationManager
    private readonly poller: Poller
    private readonly reconnect: ReconnectManager
    private readonly broadcast: BroadcastCoordinator | null

    private outlets: OutletState[]
    private groups: GroupState[]
    private sensors: SensorReadings = emptySensors()
    private mode: PowerOperationMode
    private status: ConnectionStatus = { text: 'Disconnected', severity: 'disconnected' }
    private operation: OperationRecord | null = null

    private started = false
    private keepConnected = false
    private authFailed = false

    private postCommand: StepSequence | null = null
    private processingSafety: TimerHandle | null = null
    private cooldownTimer: TimerHandle | null = null
    private revertTimer: TimerHandle | null = null
    private firstPollTimer: TimerHandle | null = null
    private credentialTimer: TimerHandle | null = null
    private healthTimer: TimerHandle | null = null
    private unsubscribeTransport: (() => void) | null = null

    private readonly perf: PerformanceStats = {
        commandsSent: 0,
        responsesReceived: 0,
        errors: 0,
        lastResponseAt: null,
        reconnectAttempts: 0,
        lastReconnectAt: null,
    }

    private readonly errors: ErrorStats = {
        connectionErrors: 0,
        authenticationErrors: 0,
        commandErrors: 0,
        timeoutErrors: 0,
        lastErrorAt: null,
        lastErrorType: null,
    }

    // Last published JSON per model slice; only changes are emitted
    private readonly published = { outlets: '', groups: '', sensors: '', indicators: '' }

    constructor(config: PduConfig, deps: PduSessionServiceDeps) {
        this.id = config.id
        this.config = config
        this.events = deps.events
        this.transport = deps.transport
        this.mode = config.defaultMode

        this.outlets = createOutletStates(config.limits.maxOutlets)
        this.groups = createGroupStates(config.limits.maxGroups)

        const log = (level: PduLogLevel, message: string) => this.log(level, message)

        this.timers = new TimerRegistry(config.limits.maxTimers, label => {
            this.log('warn', `Too many active timers (${config.limits.maxTimers}); cancelled oldest "${label}"`)
        })

        this.buffer = new ResponseBuffer(config.limits.bufferSize)

        this.dispatcher = new CommandDispatcher(
            { responseTimeoutMs: config.timing.responseTimeoutMs, retry: config.retry },
            {
                flags: this.flags,
                timers: this.timers,
                write: data => this.transport.write(data),
                isConnected: () => this.transport.isConnected,
                onSent: cmd => this.onCommandSent(cmd),
                onSendFailure: (cmd, reason, detail) => this.onSendFailure(cmd, reason, detail),
                onResponseTimeout: out => this.onCommandTimeout(out),
                log,
            }
        )

        this.confirmation = new ConfirmationManager(
            {
                confirmationTimeoutMs: config.timing.confirmationTimeoutMs,
                confirmationSafetyMs: config.timing.confirmationSafetyMs,
            },
            {
                flags: this.flags,
                timers: this.timers,
                log,
                onArmed: pending => {
                    this.emit({
                        kind: 'pdu-command-armed',
                        pending: {
                            kind: pending.kind,
                            index: pending.index,
                            description: pending.description,
                            armedAt: pending.armedAt,
                        },
                    })
                },
                onCleared: reason => this.emit({ kind: 'pdu-command-cleared', reason }),
                onServerConfirmationExpired: () => this.onServerConfirmationExpired(),
                onSafetyTimeout: () => {
                    this.setProcessing(false)
                    this.publishModel()
                },
            }
        )

        this.poller = new Poller(
            {
                intervalMs: config.timing.pollIntervalMs,
                maxConsecutiveSkips: config.polling.maxConsecutiveSkips,
            },
            {
                flags: this.flags,
                timers: this.timers,
                isBusy: () => this.isBusy(),
                submit: batch => {
                    if (!this.flags.authenticated) return
                    this.dispatcher.enqueue(batch)
                    this.dispatcher.processNext()
                    this.publishModel()
                },
                log,
            }
        )

        this.reconnect = new ReconnectManager(config.reconnect, {
            timers: this.timers,
            isConnected: () => this.transport.isConnected,
            connect: () => this.openTransport(),
            onAttemptScheduled: attempt => {
                this.perf.reconnectAttempts = attempt
                this.perf.lastReconnectAt = Date.now()
            },
            onExhausted: () => {
                this.setStatus('Max Reconnect Attempts Reached', 'fault')
                this.emit({ kind: 'fatal-error', error: 'Maximum reconnection attempts reached; manual intervention required' })
            },
            log,
            random: deps.random,
        })

        const bus = deps.bus
        this.broadcast = config.broadcast.enabled && bus
            ? new BroadcastCoordinator(
                {
                    cooldownMs: config.broadcast.cooldownMs,
                    settleMs: config.broadcast.settleMs,
                    checkIntervalMs: config.broadcast.checkIntervalMs,
                },
                {
                    sessionId: config.id,
                    bus,
                    timers: this.timers,
                    findGroupIndex: name => this.findGroupIndex(name),
                    isConnected: () => this.transport.isConnected && this.flags.authenticated,
                    issueReceiverCommand: (index, name) => this.issueReceiverCommand(index, name),
                    log,
                }
            )
            : null
    }

    /* ---------------------------------------------------------------------- */
    /*  Lifecycle                                                             */
    /* ---------------------------------------------------------------------- */

    async start(): Promise<void> {
        if (this.started) return
        this.started = true

        this.unsubscribeTransport = this.transport.onEvent(evt => this.handleTransportEvent(evt))
        this.broadcast?.start()
        this.scheduleHealthCheck()

        this.emit({ kind: 'pdu-status', status: this.status })
        this.emit({ kind: 'pdu-mode-changed', mode: this.mode })
        this.publishModel()

        if (this.config.autoConnect) this.connect()
    }

    async stop(): Promise<void> {
        if (!this.started) return
        this.disconnect()
        this.broadcast?.stop()
        this.unsubscribeTransport?.()
        this.unsubscribeTransport = null
        this.timers.cancelAll()
        this.healthTimer = null
        this.started = false
    }

    /** Open the connection and keep it up until `disconnect()`. */
    connect(): boolean {
        const { host, port } = this.config

        if (!isValidHost(host)) {
            this.log('error', `Invalid host: ${host}`)
            this.setStatus('Connection Failed', 'fault')
            return false
        }
        if (!isValidPort(port)) {
            this.log('error', `Invalid port number: ${port}`)
            this.setStatus('Connection Failed', 'fault')
            return false
        }

        this.keepConnected = true
        this.reconnect.cancel()
        this.reconnect.reset()
        this.perf.reconnectAttempts = 0

        if (this.transport.isConnected) return true
        this.openTransport()
        return true
    }

    disconnect(): void {
        this.keepConnected = false
        this.reconnect.cancel()
        this.transport.disconnect()
        this.resetSession()
        this.setStatus('Disconnected', 'disconnected')
        this.publishModel()
    }

    private openTransport(): void {
        const { host, port } = this.config
        this.log('info', `Connecting to ${host}:${port}`)
        try {
            this.transport.connect(host, port)
        } catch (err) {
            this.log('error', `Connection failed: ${errorMessage(err)}`)
            this.setStatus('Connection Failed', 'fault')
            this.recordError('connection', 'connect_failed', errorMessage(err))
            if (this.keepConnected) this.reconnect.attempt()
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Transport events                                                      */
    /* ---------------------------------------------------------------------- */

    private handleTransportEvent(evt: TransportEvent): void {
        switch (evt.type) {
            case 'connected':
                this.onConnected()
                break
            case 'data':
                this.handleData(evt.chunk)
                break
            case 'closed':
                this.onConnectionLost('Socket Closed', 'connection', 'socket_closed')
                break
            case 'error':
                this.onConnectionLost(`Socket Error: ${evt.error}`, 'connection', 'socket_error')
                break
            case 'timeout':
                this.onConnectionLost('Socket Timeout', 'timeout', 'socket_timeout')
                break
        }
        this.publishModel()
    }

    private onConnected(): void {
        this.log('info', `Socket connected to ${this.config.host}:${this.config.port}`)
        this.flags.connected = true
        this.flags.authenticated = false
        this.authFailed = false
        this.dispatcher.reset()
        this.flags.processing = false
        this.buffer.clear()
        this.reconnect.reset()
        this.perf.reconnectAttempts = 0
        this.perf.lastReconnectAt = null
        this.setStatus('Connected', 'ok')
        this.emitConnection()
    }

    private onConnectionLost(text: string, category: PduErrorCategory, type: string): void {
        this.log('error', text)
        this.setStatus(text, 'fault')
        this.recordError(category, type, text)
        this.resetSession()
        if (this.keepConnected) this.reconnect.attempt()
    }

    private handleData(chunk: string): void {
        const appended = this.buffer.append(chunk)
        if (appended.kind === 'dropped') {
            this.log('error', `Received oversized data chunk (${appended.size} bytes), discarding`)
            return
        }
        if (appended.kind === 'overflow-reset') {
            this.log('warn', `Response buffer overflow, discarded ${appended.discarded} bytes`)
        }

        const unit = recognizeUnit(this.buffer.text, {
            prompt: this.config.prompt,
            authenticated: this.flags.authenticated,
        })
        if (!unit) return

        switch (unit.kind) {
            case 'confirmation-prompt':
                this.buffer.clear()
                this.handleServerPrompt()
                return
            case 'username-challenge':
                this.buffer.clear()
                this.scheduleCredential('username')
                return
            case 'password-challenge':
                this.buffer.clear()
                this.scheduleCredential('password')
                return
            case 'welcome':
                this.buffer.clear()
                this.onLoggedIn()
                return
            case 'auth-failed':
                this.buffer.clear()
                this.onAuthFailed()
                return
            case 'response':
                this.handleResponse(unit.text)
                return
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Login                                                                 */
    /* ---------------------------------------------------------------------- */

    private scheduleCredential(which: 'username' | 'password'): void {
        if (this.authFailed) {
            this.log('warn', `Ignoring ${which} challenge after failed login; reconnect to retry`)
            return
        }
        const delay = which === 'username'
            ? this.config.timing.usernameDelayMs
            : this.config.timing.passwordDelayMs

        this.log('info', `Detected ${which} prompt, sending ${which}...`)
        this.credentialTimer?.cancel()
        this.credentialTimer = this.timers.schedule(delay, `send-${which}`, () => {
            this.credentialTimer = null
            if (!this.transport.isConnected) return
            const value = this.config.credentials[which]
            if (this.dispatcher.sendCredential(value)) {
                this.log('info', which === 'username' ? `Sent username: ${value}` : `Sent password: ${'*'.repeat(value.length)}`)
            }
        })
    }

    private onLoggedIn(): void {
        this.log('info', 'Login successful')
        this.flags.authenticated = true
        this.setStatus('Logged In', 'ok')
        this.emitConnection()

        this.firstPollTimer?.cancel()
        this.firstPollTimer = this.timers.schedule(this.config.timing.firstPollDelayMs, 'first-poll', () => {
            this.firstPollTimer = null
            this.restartPolling()
            this.publishModel()
        })
    }

    private onAuthFailed(): void {
        this.log('error', 'Login failed! Check credentials.')
        this.authFailed = true
        this.credentialTimer?.cancel()
        this.credentialTimer = null
        this.setStatus('Authentication Failed', 'fault')
        this.recordError('authentication', 'authentication_failed', 'Authentication failed')
        this.emit({ kind: 'fatal-error', error: 'Authentication failed' })
    }

    /* ---------------------------------------------------------------------- */
    /*  Responses                                                             */
    /* ---------------------------------------------------------------------- */

    private handleServerPrompt(): void {
        const outcome = this.confirmation.onServerPrompt()
        if (outcome === 'auto-confirm') {
            this.dispatcher.reply('y')
            return
        }
        this.dispatcher.suspendTimeout()
    }

    private handleResponse(text: string): void {
        const parsed = parseResponse(text)
        for (const issue of parsed.issues) {
            this.log('warn', `Failed to parse response field - ${issue}`)
            this.emit({ kind: 'recoverable-error', category: 'parse', error: issue })
        }

        if (this.flags.revertingState && (parsed.outlets.length > 0 || parsed.groups.length > 0)) {
            this.log('debug', 'Skipping outlet/group updates - state reversion in progress')
        }

        const applied = applyParsedResponse(
            { outlets: this.outlets, groups: this.groups, sensors: this.sensors },
            parsed,
            this.flags
        )
        this.outlets = applied.outlets
        this.groups = applied.groups
        this.sensors = applied.sensors

        this.perf.responsesReceived++
        this.perf.lastResponseAt = Date.now()
        this.buffer.clear()

        const acked = this.dispatcher.acknowledge()
        const cmd = acked?.command

        if (cmd?.userInitiated) {
            this.confirmation.settle()
        }
        if (cmd && (cmd.userInitiated || cmd.groupOperation)) {
            this.operation = null
        }
        if (cmd?.groupOperation) {
            this.finishGroupOperation()
        }

        const userWorkPending = this.flags.awaitingServerConfirmation || this.dispatcher.hasPendingUserCommand()
        if (!userWorkPending) this.setProcessing(false)
        this.flags.waitingIndicator = this.flags.awaitingUserConfirmation || this.flags.awaitingServerConfirmation

        this.dispatcher.processNext()
    }

    private finishGroupOperation(): void {
        if (!this.flags.groupOperationInFlight) return
        this.flags.groupOperationInFlight = false
        this.broadcast?.complete()
        this.log('debug', 'Group operation complete; entering post-group cooldown')

        this.flags.postGroupCooldown = true
        this.cooldownTimer?.cancel()
        this.cooldownTimer = this.timers.schedule(this.config.timing.postGroupCooldownMs, 'post-group-cooldown', () => {
            this.cooldownTimer = null
            this.flags.postGroupCooldown = false
            this.log('debug', 'Post-group cooldown ended')
        })
    }

    /* ---------------------------------------------------------------------- */
    /*  Dispatcher callbacks                                                  */
    /* ---------------------------------------------------------------------- */

    private onCommandSent(cmd: PduCommand): void {
        this.perf.commandsSent++
        this.emit({ kind: 'pdu-command-sent', command: cmd.text, userInitiated: cmd.userInitiated })
    }

    private onSendFailure(cmd: PduCommand, reason: SendFailureReason, detail: string): void {
        this.recordError('command', reason === 'rejected' ? 'command_rejected' : 'connection_lost', detail)
        if (reason === 'rejected') return

        // The optimistic toggle stays until a revert runs
        if (cmd.userInitiated && this.keepConnected) {
            this.log('warn', 'Connection lost during user command - attempting reconnection')
            this.reconnect.attempt()
        }
    }

    private onCommandTimeout(out: OutstandingCommand): void {
        this.log('error', `No response to "${out.command.text}" after ${out.retries} retries`)
        this.recordError('timeout', 'command_timeout', `No response to "${out.command.text}"`)

        this.revertToPreviousState()
        this.resetOperationalState()
        this.publishModel()
    }

    private onServerConfirmationExpired(): void {
        this.dispatcher.reply('n')
        this.dispatcher.resumeTimeout()
        this.revertToPreviousState()
        this.setProcessing(false)
        this.publishModel()
    }

    /* ---------------------------------------------------------------------- */
    /*  User intents                                                          */
    /* ---------------------------------------------------------------------- */

    /** Outlet toggle moved to `state`. Returns true when a command was armed. */
    toggleOutlet(index: number, state: boolean): boolean {
        const outlet = this.outlets[index - 1]
        if (!outlet) {
            this.log('warn', `Outlet ${index} does not exist`)
            return false
        }
        if (!this.requireConnection('power state toggle')) return false

        const prior = this.baselineState('outlet', index, outlet.powered)
        const armed = this.mode === 'on-off'
            ? this.prepareCommand({
                kind: 'outlet-toggle',
                index,
                commandText: outletPowerCommand(index, state ? 'on' : 'off'),
                intendedState: state,
                priorState: prior,
                description: `Turn ${outlet.name} ${state ? 'ON' : 'OFF'}`,
            })
            : this.prepareCommand({
                kind: 'outlet-cycle',
                index,
                commandText: outletPowerCommand(index, 'cycle'),
                intendedState: state,
                priorState: prior,
                description: `Power cycle ${outlet.name}`,
            })

        // Applied after arming so a superseded command's revert cannot undo it
        if (armed) outlet.powered = state
        this.publishModel()
        return armed
    }

    /** Group toggle moved to `state`. Returns true when a command was armed. */
    toggleGroup(index: number, state: boolean): boolean {
        const group = this.groups[index - 1]
        if (!group) {
            this.log('warn', `Group ${index} does not exist`)
            return false
        }
        if (group.unused) {
            this.log('warn', `Group ${index} is unused`)
            return false
        }
        if (!this.requireConnection('group toggle')) return false

        const prior = this.baselineState('group', index, group.powered)
        const armed = this.mode === 'on-off'
            ? this.prepareCommand({
                kind: 'group-toggle',
                index,
                commandText: groupPowerCommand(index, state ? 'on' : 'off'),
                intendedState: state,
                priorState: prior,
                description: `Turn ${group.name} ${state ? 'ON' : 'OFF'}`,
            })
            : this.prepareCommand({
                kind: 'group-cycle',
                index,
                commandText: groupPowerCommand(index, 'cycle'),
                intendedState: state,
                priorState: prior,
                description: `Power cycle ${group.name}`,
            })

        if (armed) group.powered = state
        this.publishModel()
        return armed
    }

    /** Momentary cycle button for an outlet. */
    cycleOutlet(index: number): boolean {
        const outlet = this.outlets[index - 1]
        if (!outlet) {
            this.log('warn', `Outlet ${index} does not exist`)
            return false
        }
        if (!this.requireConnection('power cycle')) return false

        const armed = this.prepareCommand({
            kind: 'outlet-cycle',
            index,
            commandText: outletPowerCommand(index, 'cycle'),
            intendedState: outlet.powered,
            priorState: this.baselineState('outlet', index, outlet.powered),
            description: `Power cycle ${outlet.name}`,
        })
        this.publishModel()
        return armed
    }

    /** Momentary cycle button for a group. */
    cycleGroup(index: number): boolean {
        const group = this.groups[index - 1]
        if (!group) {
            this.log('warn', `Group ${index} does not exist`)
            return false
        }
        if (group.unused) {
            this.log('warn', `Group ${index} is unused`)
            return false
        }
        if (!this.requireConnection('group cycle')) return false

        const armed = this.prepareCommand({
            kind: 'group-cycle',
            index,
            commandText: groupPowerCommand(index, 'cycle'),
            intendedState: group.powered,
            priorState: this.baselineState('group', index, group.powered),
            description: `Power cycle ${group.name}`,
        })
        this.publishModel()
        return armed
    }

    /**
     * Confirm button: executes the armed command, or answers "y" to a
     * surfaced server question.
     */
    confirm(): boolean {
        if (this.confirmation.hasPending()) {
            const ok = this.executePendingCommand()
            this.publishModel()
            return ok
        }

        if (this.flags.awaitingServerConfirmation) {
            this.log('info', 'User confirmed PDU prompt')
            this.confirmation.resolveServerPrompt()
            this.dispatcher.reply('y')
            this.dispatcher.resumeTimeout()
            this.setProcessing(true)
            this.startPostCommandSequence()
            this.publishModel()
            return true
        }

        this.log('debug', 'Confirm pressed with nothing to confirm')
        return false
    }

    /** Cancel button: drops the armed command or answers "n" to the server. */
    cancel(): boolean {
        if (this.confirmation.hasPending()) {
            const ok = this.confirmation.cancel('cancelled')
            this.publishModel()
            return ok
        }

        if (this.flags.awaitingServerConfirmation) {
            this.log('info', 'User declined PDU prompt')
            this.confirmation.resolveServerPrompt()
            this.dispatcher.reply('n')
            this.dispatcher.resumeTimeout()
            this.revertToPreviousState()
            this.setProcessing(false)
            this.publishModel()
            return true
        }

        if (this.flags.awaitingUserConfirmation) {
            this.log('warn', 'Command already sent; waiting for the PDU response')
        }
        return false
    }

    /** Mode selector; selecting the current mode again keeps it selected. */
    setMode(mode: PowerOperationMode): void {
        if (mode === this.mode) {
            this.log('debug', `Power operation mode already ${mode}`)
            return
        }
        this.mode = mode
        this.log('info', `Power operation mode changed to ${mode}`)
        this.emit({ kind: 'pdu-mode-changed', mode })
    }

    /**
     * Cycle the group with this name (case-insensitive) right away and ask
     * peers sharing the name to do the same.
     */
    triggerGroupByName(name: string): boolean {
        const trimmed = name.trim()
        if (trimmed === '') {
            this.log('warn', 'Empty group name provided for trigger')
            return false
        }
        if (!this.requireConnection('group trigger')) return false

        if (this.isCommandBlocked() || this.flags.awaitingUserConfirmation) {
            this.log('warn', `System busy - cannot process group trigger for: ${trimmed}`)
            return false
        }

        const index = this.findGroupIndex(trimmed)
        if (index === null) {
            this.log('warn', `Group not found: ${trimmed}`)
            return false
        }
        const group = this.groups[index - 1]

        this.log('info', `Group trigger: "${group.name}" (index ${index}) - power cycling`)
        this.operation = { kind: 'group-cycle', index, priorState: group.powered }
        this.flags.groupOperationInFlight = true
        this.flags.waitingIndicator = true
        this.initiateBroadcast(index, group.name)

        this.dispatcher.prioritize({
            text: groupPowerCommand(index, 'cycle'),
            sanitize: true,
            userInitiated: true,
            groupOperation: true,
            timeoutMs: this.config.timing.responseTimeoutMs * 2,
        })
        this.dispatcher.processNext()
        this.publishModel()
        return true
    }

    /* ---------------------------------------------------------------------- */
    /*  Arming + execution                                                    */
    /* ---------------------------------------------------------------------- */

    private requireConnection(what: string): boolean {
        if (this.transport.isConnected && this.flags.authenticated) return true
        this.log('error', `Connection is not available. Preventing ${what}.`)
        return false
    }

    /**
     * Device-reported value of a control: a re-arm on the same control keeps
     * the prior state of the command it supersedes.
     */
    private baselineState(target: 'outlet' | 'group', index: number, current: boolean): boolean {
        const pending = this.confirmation.pending
        if (pending && pending.index === index && targetOf(pending.kind) === target) {
            return pending.priorState
        }
        return current
    }

    /** Busy states in which a new user command may not be armed. */
    private isCommandBlocked(): boolean {
        const f = this.flags
        return f.processing
            || f.awaitingServerConfirmation
            || f.groupOperationInFlight
            || f.revertingState
            || (this.broadcast?.isProcessing() ?? false)
            || (f.awaitingUserConfirmation && !this.confirmation.hasPending())
    }

    private prepareCommand(input: Omit<PendingUserCommand, 'armedAt'>): boolean {
        if (this.isCommandBlocked()) {
            this.log('warn', `Cannot prepare "${input.description}" - another operation is in progress`)
            return false
        }
        this.confirmation.arm(input, () => this.revertControl(input.kind, input.index, input.priorState))
        return true
    }

    private executePendingCommand(): boolean {
        const pending = this.confirmation.take()
        if (!pending) return false

        if (!this.transport.isConnected) {
            this.log('error', 'Connection lost before the command could be sent')
            this.revertControl(pending.kind, pending.index, pending.priorState)
            this.confirmation.reset()
            return false
        }

        this.operation = { kind: pending.kind, index: pending.index, priorState: pending.priorState }
        const isGroup = pending.kind === 'group-toggle' || pending.kind === 'group-cycle'
        if (isGroup) this.flags.groupOperationInFlight = true

        if (pending.kind === 'group-cycle') {
            const group = this.groups[pending.index - 1]
            if (group) this.initiateBroadcast(pending.index, group.name)
        }

        this.log('info', `Executing: ${pending.description}`)
        this.flags.waitingIndicator = true
        this.setProcessing(true)

        this.dispatcher.prioritize({
            text: pending.commandText,
            sanitize: true,
            userInitiated: true,
            groupOperation: isGroup,
        })
        this.dispatcher.processNext()
        this.startPostCommandSequence()
        return true
    }

    /** Refresh listings and resume polling once a confirmed command has settled. */
    private startPostCommandSequence(): void {
        this.postCommand?.cancel()

        const connectedOrReset = (): boolean => {
            if (this.transport.isConnected && this.flags.connected) return true
            this.log('warn', 'Connection lost during command processing')
            this.resetOperationalState()
            this.publishModel()
            return false
        }

        const seq: StepSequence = new StepSequence(
            this.timers,
            'post-command',
            [
                { name: 'settle', delayMs: POST_COMMAND_STEPS.settleMs, run: connectedOrReset },
                {
                    name: 'refresh',
                    delayMs: POST_COMMAND_STEPS.refreshMs,
                    run: () => {
                        if (!connectedOrReset()) return false
                        this.dispatcher.append(buildRefreshBatch())
                        this.dispatcher.processNext()
                        this.publishModel()
                        return true
                    },
                },
                { name: 'await-refresh', delayMs: POST_COMMAND_STEPS.awaitRefreshMs, run: connectedOrReset },
                {
                    name: 'resume-polling',
                    delayMs: POST_COMMAND_STEPS.resumePollingMs,
                    run: () => {
                        if (!connectedOrReset()) return false
                        this.restartPolling()
                        this.publishModel()
                        return true
                    },
                },
            ],
            () => {
                if (this.postCommand === seq) this.postCommand = null
            }
        )
        this.postCommand = seq.start()
    }

    private setProcessing(on: boolean): void {
        this.flags.processing = on
        this.processingSafety?.cancel()
        this.processingSafety = null
        if (!on) return

        this.processingSafety = this.timers.schedule(this.config.timing.processingSafetyMs, 'processing-safety', () => {
            this.processingSafety = null
            if (!this.flags.processing) return
            this.log('warn', 'Safety timeout - forcing processing state off')
            this.flags.processing = false
            this.confirmation.settle()
            this.flags.waitingIndicator = this.flags.awaitingServerConfirmation
            this.publishModel()
        })
    }

    /* ---------------------------------------------------------------------- */
    /*  Broadcast receiver                                                    */
    /* ---------------------------------------------------------------------- */

    private initiateBroadcast(index: number, name: string): void {
        if (!this.broadcast) return
        this.broadcast.initiate(index, name)
        this.emit({ kind: 'pdu-broadcast', role: 'initiator', groupName: name, groupIndex: index, action: 'cycle' })
    }

    private issueReceiverCommand(index: number, name: string): void {
        const action = this.config.broadcast.receiverAction
        const group = this.groups[index - 1]

        this.log('info', `Broadcast receiver: ${action} group ${index} ("${name}")`)
        this.operation = {
            kind: action === 'on' ? 'group-toggle' : 'group-cycle',
            index,
            priorState: group ? group.powered : false,
        }
        this.flags.groupOperationInFlight = true
        this.emit({ kind: 'pdu-broadcast', role: 'receiver', groupName: name, groupIndex: index, action })

        this.dispatcher.prioritize({
            text: groupPowerCommand(index, action),
            sanitize: true,
            userInitiated: false,
            groupOperation: true,
            timeoutMs: this.config.timing.responseTimeoutMs * 2,
        })
        this.dispatcher.processNext()
        this.publishModel()
    }

    private findGroupIndex(name: string): number | null {
        const wanted = name.trim().toLowerCase()
        if (wanted === '' || wanted === UNUSED_GROUP_NAME.toLowerCase()) return null
        const match = this.groups.find(g => !g.unused && g.name.trim().toLowerCase() === wanted)
        return match ? match.index : null
    }

    /* ---------------------------------------------------------------------- */
    /*  Revert + reset                                                        */
    /* ---------------------------------------------------------------------- */

    private revertControl(kind: PendingCommandKind, index: number, priorState: boolean): void {
        if (targetOf(kind) === 'outlet') {
            const outlet = this.outlets[index - 1]
            if (outlet) outlet.powered = priorState
        } else {
            const group = this.groups[index - 1]
            if (group) group.powered = priorState
        }
    }

    /** Restore the control named by the current operation; cycles are not reverted. */
    private revertToPreviousState(): void {
        const op = this.operation
        this.operation = null

        if (!op) return
        if (op.kind !== 'outlet-toggle' && op.kind !== 'group-toggle') {
            this.log('debug', `No revert for ${op.kind} ${op.index}`)
            return
        }

        this.log('info', `Reverting ${op.kind} ${op.index} to ${op.priorState ? 'ON' : 'OFF'}`)
        this.revertControl(op.kind, op.index, op.priorState)
        this.flags.revertingState = true

        this.revertTimer?.cancel()
        this.revertTimer = this.timers.schedule(this.config.timing.revertGraceMs, 'revert-grace', () => {
            this.revertTimer = null
            this.flags.revertingState = false
            this.log('debug', 'State reversion window ended')
        })
    }

    /** Clear every in-flight operation; keeps the login. */
    private resetOperationalState(): void {
        this.postCommand?.cancel()
        this.postCommand = null
        this.setProcessing(false)
        this.dispatcher.reset()
        this.confirmation.reset()
        this.broadcast?.abort()
        this.flags.groupOperationInFlight = false
        this.flags.pollingActive = false
        this.buffer.clear()
    }

    /** Connection gone: forget login and device state. */
    private resetSession(): void {
        this.resetOperationalState()
        this.poller.stop()

        for (const t of [this.credentialTimer, this.firstPollTimer, this.cooldownTimer, this.revertTimer]) {
            t?.cancel()
        }
        this.credentialTimer = null
        this.firstPollTimer = null
        this.cooldownTimer = null
        this.revertTimer = null

        this.flags.connected = this.transport.isConnected
        this.flags.authenticated = false
        this.flags.postGroupCooldown = false
        this.flags.revertingState = false
        this.operation = null

        this.outlets = createOutletStates(this.config.limits.maxOutlets)
        this.groups = createGroupStates(this.config.limits.maxGroups)
        this.sensors = emptySensors()
        this.emitConnection()
    }

    /* ---------------------------------------------------------------------- */
    /*  Polling + health                                                      */
    /* ---------------------------------------------------------------------- */

    private isBusy(): boolean {
        const f = this.flags
        return f.awaitingResponse
            || f.processing
            || f.awaitingUserConfirmation
            || f.awaitingServerConfirmation
            || f.groupOperationInFlight
            || f.revertingState
    }

    private restartPolling(): void {
        if (!this.flags.connected || !this.flags.authenticated) return
        this.poller.restart()
    }

    private scheduleHealthCheck(): void {
        this.healthTimer = this.timers.schedule(this.config.timing.healthIntervalMs, 'health-check', () => {
            this.healthTimer = null
            this.runHealthCheck()
            this.scheduleHealthCheck()
        })
    }

    private runHealthCheck(): void {
        const health = this.getHealth()
        this.emit({ kind: 'pdu-health', health })

        const totalErrors = health.errors.connectionErrors
            + health.errors.authenticationErrors
            + health.errors.commandErrors
            + health.errors.timeoutErrors
        if (totalErrors > HEALTH_ERROR_WARN_THRESHOLD) {
            this.log('warn', `High error count detected: ${totalErrors} total errors`)
        }

        const f = this.flags
        if (f.processing && !f.awaitingResponse && !f.awaitingUserConfirmation && !f.awaitingServerConfirmation) {
            this.log('warn', 'Processing state stuck with nothing outstanding - clearing')
            this.setProcessing(false)
        }

        if (this.keepConnected && !this.transport.isConnected) {
            this.reconnect.attempt()
        } else if (f.authenticated && this.poller.isHalted && !this.isBusy()) {
            this.log('info', 'Resuming halted polling')
            this.restartPolling()
        }
        this.publishModel()
    }

    /* ---------------------------------------------------------------------- */
    /*  Reads                                                                 */
    /* ---------------------------------------------------------------------- */

    getFlags(): Readonly<SessionFlags> {
        return { ...this.flags }
    }

    getOutlets(): OutletState[] {
        return this.outlets.map(o => ({ ...o }))
    }

    getGroups(): GroupState[] {
        return this.groups.map(g => ({ ...g, members: [...g.members] }))
    }

    getSensors(): SensorReadings {
        return { ...this.sensors }
    }

    getStatus(): ConnectionStatus {
        return { ...this.status }
    }

    getMode(): PowerOperationMode {
        return this.mode
    }

    get pendingCommand(): PendingUserCommand | null {
        return this.confirmation.pending
    }

    get currentOperation(): OperationRecord | null {
        return this.operation
    }

    get broadcastIntent(): BroadcastIntent | null {
        return this.broadcast?.intent ?? null
    }

    getHealth(): PduHealth {
        return {
            connected: this.transport.isConnected,
            authenticated: this.flags.authenticated,
            performance: { ...this.perf },
            errors: { ...this.errors },
            activeTimers: this.timers.activeCount,
            flags: this.getFlags(),
        }
    }

    getIndicators(): PduIndicators {
        const f = this.flags
        return {
            processing: f.processing,
            waitingResponse: f.waitingIndicator,
            confirmEnabled: f.confirmEnabled,
            controlsDisabled: this.controlsDisabled(),
        }
    }

    private controlsDisabled(): boolean {
        const f = this.flags
        return !f.authenticated
            || f.processing
            || f.awaitingServerConfirmation
            || f.groupOperationInFlight
            || (f.awaitingResponse && f.userInitiated && !f.awaitingUserConfirmation)
    }

    /* ---------------------------------------------------------------------- */
    /*  Emission                                                              */
    /* ---------------------------------------------------------------------- */

    /** Recompute derived control state and emit every slice that changed. */
    private publishModel(): void {
        const disabled = this.controlsDisabled()
        for (const o of this.outlets) o.disabled = disabled
        for (const g of this.groups) g.disabled = disabled || g.unused

        const outlets = JSON.stringify(this.outlets)
        if (outlets !== this.published.outlets) {
            this.published.outlets = outlets
            this.emit({ kind: 'pdu-outlets-updated', outlets: this.getOutlets() })
        }

        const groups = JSON.stringify(this.groups)
        if (groups !== this.published.groups) {
            this.published.groups = groups
            this.emit({ kind: 'pdu-groups-updated', groups: this.getGroups() })
        }

        const sensors = JSON.stringify(this.sensors)
        if (sensors !== this.published.sensors) {
            this.published.sensors = sensors
            this.emit({ kind: 'pdu-sensors-updated', sensors: this.getSensors() })
        }

        const indicators = this.getIndicators()
        const indicatorsJson = JSON.stringify(indicators)
        if (indicatorsJson !== this.published.indicators) {
            this.published.indicators = indicatorsJson
            this.emit({ kind: 'pdu-indicators-changed', indicators })
        }
    }

    private setStatus(text: string, severity: ConnectionStatus['severity']): void {
        this.status = { text, severity }
        this.emit({ kind: 'pdu-status', status: { text, severity } })
    }

    private emitConnection(): void {
        this.emit({
            kind: 'pdu-connection-changed',
            connected: this.flags.connected,
            authenticated: this.flags.authenticated,
        })
    }

    private recordError(category: PduErrorCategory, type: string, message: string): void {
        this.perf.errors++
        this.errors.lastErrorAt = Date.now()
        this.errors.lastErrorType = type
        switch (category) {
            case 'connection': this.errors.connectionErrors++; break
            case 'authentication': this.errors.authenticationErrors++; break
            case 'command': this.errors.commandErrors++; break
            case 'timeout': this.errors.timeoutErrors++; break
            case 'parse': break
        }
        this.emit({ kind: 'recoverable-error', category, error: message })
    }

    private log(level: PduLogLevel, message: string): void {
        this.emit({ kind: 'pdu-log', level, message })
    }

    private emit(evt: PduEventInput): void {
        this.events.publish({ ...evt, at: Date.now(), pduId: this.id })
    }
}

function targetOf(kind: PendingCommandKind): 'outlet' | 'group' {
    return kind === 'outlet-toggle' || kind === 'outlet-cycle' ? 'outlet' : 'group'
}

function emptySensors(): SensorReadings {
    return { current: null, activePower: null, temperature: null, humidity: null }
}
