// services/controller/src/core/state.ts
import { EventEmitter } from 'node:events'
import jsonpatch from 'fast-json-patch'
import type { Operation } from 'fast-json-patch'
import type {
    ConnectionStatus,
    GroupState,
    OutletState,
    PduErrorCategory,
    PduHealth,
    PduIndicators,
    PendingCommandSummary,
    PowerAction,
    PowerOperationMode,
    SensorReadings,
} from '../devices/pdu/types.js'

/**
 * Client-consumable server configuration shipped inside the state snapshot.
 */
export type ServerConfig = {
    logs: {
        snapshot: number
        capacity: number
        allowedChannels: string[]
        minLevel: 'debug' | 'info' | 'warn' | 'error' | 'fatal'
    }
    ws: {
        heartbeatIntervalMs: number
        heartbeatTimeoutMs: number
    }
}

/* -------------------------------------------------------------------------- */
/*  PDU snapshot                                                              */
/* -------------------------------------------------------------------------- */

export type PduSnapshot = {
    id: string
    label: string
    host: string
    port: number

    status: ConnectionStatus
    connected: boolean
    authenticated: boolean
    mode: PowerOperationMode

    outlets: OutletState[]
    groups: GroupState[]
    sensors: SensorReadings
    indicators: PduIndicators

    // Armed command waiting for confirm / cancel
    pending: PendingCommandSummary | null

    lastCommand: { text: string; userInitiated: boolean; at: number } | null
    lastBroadcast: {
        role: 'initiator' | 'receiver'
        groupName: string
        groupIndex: number
        action: PowerAction
        at: number
    } | null
    lastError: { category: PduErrorCategory | 'fatal'; message: string; at: number } | null

    // Refreshed by the periodic health check
    health: PduHealth | null
}

export type AppState = {
    version: number
    meta: { startedAt: string; status: 'booting' | 'ready' | 'error' }
    serverConfig: ServerConfig
    pdus: Record<string, PduSnapshot>
}

export type PatchEvent = {
    from: number
    to: number
    patch: Operation[]
}

/* ENV helpers */
function num(v: unknown, def: number): number {
    const n = Number(v)
    return v !== undefined && v !== '' && Number.isFinite(n) ? n : def
}
function csv(v: unknown): string[] {
    if (typeof v !== 'string') return []
    return v.split(',').map(s => s.trim()).filter(Boolean)
}
function level(v: unknown): ServerConfig['logs']['minLevel'] {
    const s = String(v ?? 'debug').toLowerCase()
    switch (s) {
        case 'info':
        case 'warn':
        case 'error':
        case 'fatal':
            return s
        default:
            return 'debug'
    }
}

/* -------------------------------------------------------------------------- */
/*  Initial state                                                             */
/* -------------------------------------------------------------------------- */

function initialServerConfig(env: NodeJS.ProcessEnv): ServerConfig {
    return {
        logs: {
            snapshot: num(env.CLIENT_LOGS_SNAPSHOT, 200),
            capacity: num(env.CLIENT_LOGS_TO_KEEP, 500),
            allowedChannels: csv(env.LOG_CHANNEL_ALLOWLIST),
            minLevel: level(env.LOG_LEVEL_MIN),
        },
        ws: {
            heartbeatIntervalMs: num(env.WS_HEARTBEAT_INTERVAL_MS, 10_000),
            heartbeatTimeoutMs: num(env.WS_HEARTBEAT_TIMEOUT_MS, 5_000),
        },
    }
}

function initialState(): AppState {
    return {
        version: 1,
        meta: { startedAt: new Date().toISOString(), status: 'booting' },
        serverConfig: initialServerConfig(process.env),
        pdus: {},
    }
}

let state: AppState = initialState()

/** Blank snapshot for a configured PDU that has not reported anything yet. */
export function createPduSnapshot(info: { id: string; label: string; host: string; port: number; mode: PowerOperationMode }): PduSnapshot {
    return {
        ...info,
        status: { text: 'Disconnected', severity: 'disconnected' },
        connected: false,
        authenticated: false,
        outlets: [],
        groups: [],
        sensors: { current: null, activePower: null, temperature: null, humidity: null },
        indicators: { processing: false, waitingResponse: false, confirmEnabled: false, controlsDisabled: true },
        pending: null,
        lastCommand: null,
        lastBroadcast: null,
        lastError: null,
        health: null,
    }
}

/* -------------------------------------------------------------------------- */
/*  Internal event emission helpers                                           */
/* -------------------------------------------------------------------------- */

export const stateEvents = new EventEmitter()

function clone<T>(v: T): T {
    return structuredClone(v)
}

function emitChanges(prev: AppState, next: AppState) {
    const ops = jsonpatch.compare(prev, next)
    if (ops.length > 0) {
        stateEvents.emit('patch', {
            from: prev.version,
            to: next.version,
            patch: ops,
        } satisfies PatchEvent)
    }
    stateEvents.emit('snapshot', clone(next))
}

function commit(mutate: (draft: AppState) => void) {
    const prev = clone(state)
    const next = clone(state)
    mutate(next)
    next.version = state.version + 1
    state = next
    emitChanges(prev, next)
}

/* -------------------------------------------------------------------------- */
/*  Public state update wrappers                                              */
/* -------------------------------------------------------------------------- */

export function getSnapshot(): AppState {
    return clone(state)
}

export function getPduSnapshot(id: string): PduSnapshot | null {
    const snap = state.pdus[id]
    return snap ? clone(snap) : null
}

/** Back to a fresh boot state; used when an app instance is rebuilt. */
export function resetState() {
    commit(draft => {
        const fresh = initialState()
        draft.meta = fresh.meta
        draft.serverConfig = fresh.serverConfig
        draft.pdus = {}
    })
}

export function setMetaStatus(status: AppState['meta']['status']) {
    commit(draft => { draft.meta.status = status })
}

export function setServerConfig(partial: Partial<ServerConfig>) {
    commit(draft => { draft.serverConfig = { ...draft.serverConfig, ...clone(partial) } })
}

export function setPduSnapshot(next: PduSnapshot) {
    commit(draft => { draft.pdus[next.id] = clone(next) })
}

export function removePduSnapshot(id: string) {
    if (!(id in state.pdus)) return
    commit(draft => { delete draft.pdus[id] })
}

/**
 * Merge a partial update into one PDU. Unknown ids are ignored: a PDU
 * appears in state only once its plugin has registered it.
 */
export function updatePduSnapshot(id: string, partial: Partial<Omit<PduSnapshot, 'id'>>) {
    const prev = state.pdus[id]
    if (!prev) return
    commit(draft => {
        draft.pdus[id] = { ...prev, ...clone(partial), id }
    })
}
