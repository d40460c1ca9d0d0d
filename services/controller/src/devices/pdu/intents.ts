// services/controller/src/devices/pdu/intents.ts

import type { PduSessionService } from './PduSessionService.js'
import type { PowerOperationMode } from './types.js'

/**
 * A user intent addressed to one PDU session, as it arrives from a
 * WebSocket client. HTTP routes build the same shapes from path and body.
 */
export type PduIntent =
    | { action: 'connect' }
    | { action: 'disconnect' }
    | { action: 'toggle-outlet'; index: number; state: boolean }
    | { action: 'toggle-group'; index: number; state: boolean }
    | { action: 'cycle-outlet'; index: number }
    | { action: 'cycle-group'; index: number }
    | { action: 'confirm' }
    | { action: 'cancel' }
    | { action: 'set-mode'; mode: PowerOperationMode }
    | { action: 'trigger-group'; name: string }

export type ParsedIntent =
    | { ok: true; pduId: string; intent: PduIntent }
    | { ok: false; error: string }

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === 'object' && v !== null && !Array.isArray(v)
}

export function isPositiveIndex(v: unknown): v is number {
    return typeof v === 'number' && Number.isInteger(v) && v >= 1
}

export function isPowerMode(v: unknown): v is PowerOperationMode {
    return v === 'on-off' || v === 'cycle'
}

/** Validate a `pdu.command` payload: `{ pduId, action, ...args }`. */
export function parsePduIntent(payload: unknown): ParsedIntent {
    if (!isRecord(payload)) return { ok: false, error: 'payload must be an object' }

    const { pduId, action } = payload
    if (typeof pduId !== 'string' || pduId.trim() === '') return { ok: false, error: 'pduId (string) required' }
    const id = pduId.trim()

    switch (action) {
        case 'connect':
        case 'disconnect':
        case 'confirm':
        case 'cancel':
            return { ok: true, pduId: id, intent: { action } }

        case 'toggle-outlet':
        case 'toggle-group': {
            if (!isPositiveIndex(payload.index)) return { ok: false, error: 'index (integer >= 1) required' }
            if (typeof payload.state !== 'boolean') return { ok: false, error: 'state (boolean) required' }
            return { ok: true, pduId: id, intent: { action, index: payload.index, state: payload.state } }
        }

        case 'cycle-outlet':
        case 'cycle-group': {
            if (!isPositiveIndex(payload.index)) return { ok: false, error: 'index (integer >= 1) required' }
            return { ok: true, pduId: id, intent: { action, index: payload.index } }
        }

        case 'set-mode': {
            if (!isPowerMode(payload.mode)) return { ok: false, error: 'mode must be "on-off" or "cycle"' }
            return { ok: true, pduId: id, intent: { action, mode: payload.mode } }
        }

        case 'trigger-group': {
            if (typeof payload.name !== 'string' || payload.name.trim() === '') {
                return { ok: false, error: 'name (string) required' }
            }
            return { ok: true, pduId: id, intent: { action, name: payload.name } }
        }

        default:
            return { ok: false, error: `unknown action: ${String(action)}` }
    }
}

/** Hand an intent to its session; true when the session accepted it. */
export function applyPduIntent(pdu: PduSessionService, intent: PduIntent): boolean {
    switch (intent.action) {
        case 'connect':
            return pdu.connect()
        case 'disconnect':
            pdu.disconnect()
            return true
        case 'toggle-outlet':
            return pdu.toggleOutlet(intent.index, intent.state)
        case 'toggle-group':
            return pdu.toggleGroup(intent.index, intent.state)
        case 'cycle-outlet':
            return pdu.cycleOutlet(intent.index)
        case 'cycle-group':
            return pdu.cycleGroup(intent.index)
        case 'confirm':
            return pdu.confirm()
        case 'cancel':
            return pdu.cancel()
        case 'set-mode':
            pdu.setMode(intent.mode)
            return true
        case 'trigger-group':
            return pdu.triggerGroupByName(intent.name)
    }
}
