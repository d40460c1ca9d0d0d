// services/controller/src/devices/pdu/types.ts

export type PowerOperationMode = 'on-off' | 'cycle'

export type PendingCommandKind = 'outlet-toggle' | 'group-toggle' | 'outlet-cycle' | 'group-cycle'

export type PowerAction = 'on' | 'off' | 'cycle'

export type PduLogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface PduConfig {
    /** Stable identifier used in state, routes and logs. */
    id: string
    /** Optional display label; defaults to the id. */
    label: string
    host: string
    port: number
    credentials: {
        username: string
        password: string
    }
    /** Literal shell prompt terminating every command response. */
    prompt: string
    /** Connect automatically when the service starts. */
    autoConnect: boolean
    defaultMode: PowerOperationMode
    timing: {
        /** Max wait for a prompt-terminated response to one command. */
        responseTimeoutMs: number
        /** Max wait for the TCP connect to complete. */
        connectTimeoutMs: number
        usernameDelayMs: number
        passwordDelayMs: number
        /** Grace delay between the Welcome banner and the first poll. */
        firstPollDelayMs: number
        pollIntervalMs: number
        /** Armed command auto-cancels after this long without a confirm. */
        confirmationTimeoutMs: number
        /** Absolute cap on an armed command, not restarted by re-arming. */
        confirmationSafetyMs: number
        /** Force-clears a stuck processing indicator after an execute. */
        processingSafetyMs: number
        postGroupCooldownMs: number
        revertGraceMs: number
        healthIntervalMs: number
    }
    retry: {
        attempts: number
        delayMs: number
        /** Retries stop once this long has passed since the first send. */
        budgetMs: number
    }
    reconnect: {
        enabled: boolean
        baseDelayMs: number
        maxDelayMs: number
        jitterMs: number
        maxAttempts: number
    }
    polling: {
        maxConsecutiveSkips: number
    }
    limits: {
        bufferSize: number
        maxOutlets: number
        maxGroups: number
        maxTimers: number
    }
    broadcast: {
        enabled: boolean
        /** Same group name inside this window is treated as a duplicate. */
        cooldownMs: number
        settleMs: number
        checkIntervalMs: number
        /** Command a receiver issues: cycle, or on for the legacy string trigger. */
        receiverAction: 'cycle' | 'on'
    }
}

/* -------------------------------------------------------------------------- */
/*  Session model                                                             */
/* -------------------------------------------------------------------------- */

/**
 * Every "reason to wait" the session tracks. Several may be true at once;
 * only the user/server confirmation pair is mutually exclusive.
 */
export interface SessionFlags {
    connected: boolean
    authenticated: boolean
    awaitingResponse: boolean
    processing: boolean
    userInitiated: boolean
    awaitingUserConfirmation: boolean
    awaitingServerConfirmation: boolean
    groupOperationInFlight: boolean
    postGroupCooldown: boolean
    revertingState: boolean
    pollingActive: boolean
    waitingIndicator: boolean
    confirmEnabled: boolean
}

export interface PduCommand {
    text: string
    /** Credentials skip the character whitelist. */
    sanitize: boolean
    userInitiated: boolean
    /** Response to this command ends a group operation. */
    groupOperation: boolean
    /** Per-command response timeout; defaults to the session's. */
    timeoutMs?: number
}

export interface OutletState {
    index: number
    name: string
    powered: boolean
    disabled: boolean
    /** False until a listing has reported this outlet. */
    known: boolean
}

export interface GroupState {
    index: number
    name: string
    powered: boolean
    members: number[]
    unused: boolean
    disabled: boolean
}

export interface PendingUserCommand {
    kind: PendingCommandKind
    index: number
    commandText: string
    intendedState: boolean
    /** Control value before the user touched it. */
    priorState: boolean
    description: string
    armedAt: number
}

export interface OperationRecord {
    kind: PendingCommandKind
    index: number
    priorState: boolean
}

export interface BroadcastIntent {
    groupName: string
    initiatedLocally: boolean
    issuedAt: number
}

export interface SensorReadings {
    current: string | null
    activePower: string | null
    temperature: string | null
    humidity: string | null
}

export interface ConnectionStatus {
    text: string
    severity: 'ok' | 'fault' | 'disconnected'
}

export interface PduIndicators {
    processing: boolean
    waitingResponse: boolean
    confirmEnabled: boolean
    controlsDisabled: boolean
}

export interface PerformanceStats {
    commandsSent: number
    responsesReceived: number
    errors: number
    lastResponseAt: number | null
    reconnectAttempts: number
    lastReconnectAt: number | null
}

export type PduErrorCategory =
    | 'connection'
    | 'authentication'
    | 'command'
    | 'timeout'
    | 'parse'

export interface ErrorStats {
    connectionErrors: number
    authenticationErrors: number
    commandErrors: number
    timeoutErrors: number
    lastErrorAt: number | null
    lastErrorType: string | null
}

export interface PduHealth {
    connected: boolean
    authenticated: boolean
    performance: PerformanceStats
    errors: ErrorStats
    activeTimers: number
    flags: SessionFlags
}

export interface PendingCommandSummary {
    kind: PendingCommandKind
    index: number
    description: string
    armedAt: number
}

export type PendingClearReason =
    | 'executed'
    | 'cancelled'
    | 'timeout'
    | 'superseded'
    | 'safety-timeout'
    | 'reset'

/* -------------------------------------------------------------------------- */
/*  Event sink + event union                                                  */
/* -------------------------------------------------------------------------- */

export interface PduEventSink {
    publish(evt: PduEvent): void
}

interface PduEventBase {
    at: number
    pduId: string
}

/**
 * Events emitted by a PduSessionService.
 */
export type PduEvent = PduEventBase & (
    | {
        kind: 'pdu-log'
        level: PduLogLevel
        message: string
    }
    | {
        kind: 'pdu-status'
        status: ConnectionStatus
    }
    | {
        kind: 'pdu-connection-changed'
        connected: boolean
        authenticated: boolean
    }
    | {
        kind: 'pdu-outlets-updated'
        outlets: OutletState[]
    }
    | {
        kind: 'pdu-groups-updated'
        groups: GroupState[]
    }
    | {
        kind: 'pdu-sensors-updated'
        sensors: SensorReadings
    }
    | {
        kind: 'pdu-indicators-changed'
        indicators: PduIndicators
    }
    | {
        kind: 'pdu-mode-changed'
        mode: PowerOperationMode
    }
    | {
        kind: 'pdu-command-armed'
        pending: PendingCommandSummary
    }
    | {
        kind: 'pdu-command-cleared'
        reason: PendingClearReason
    }
    | {
        kind: 'pdu-command-sent'
        command: string
        userInitiated: boolean
    }
    | {
        kind: 'pdu-broadcast'
        role: 'initiator' | 'receiver'
        groupName: string
        groupIndex: number
        action: PowerAction
    }
    | {
        kind: 'pdu-health'
        health: PduHealth
    }
    | {
        kind: 'recoverable-error'
        category: PduErrorCategory
        error: string
    }
    | {
        kind: 'fatal-error'
        error: string
    }
)

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never

/** An event as produced inside the session, before the envelope is stamped. */
export type PduEventInput = DistributiveOmit<PduEvent, 'at' | 'pduId'>
