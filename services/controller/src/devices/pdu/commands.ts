// services/controller/src/devices/pdu/commands.ts

import type { PduCommand, PowerAction, SessionFlags } from './types.js'

export const LINE_ENDING = '\r\n'

export const QUERY = {
    inlets: 'show inlets',
    externalSensor1: 'show sensor externalsensor 1',
    externalSensor2: 'show sensor externalsensor 2',
    inletActivePower: 'show sensor inlet I1 activePower',
    outlets: 'show outlets',
    outletGroups: 'show outletgroups',
} as const

const SAFE_COMMAND_RE = /^[A-Za-z0-9\s\-.:]+$/

/** Whitelist applied to every non-credential line before it is written. */
export function isSafeCommandText(text: string): boolean {
    return SAFE_COMMAND_RE.test(text)
}

export function outletPowerCommand(index: number, action: PowerAction): string {
    return `power outlets ${index} ${action}`
}

export function groupPowerCommand(index: number, action: PowerAction): string {
    return `power outletgroup ${index} ${action}`
}

export function queryCommand(text: string): PduCommand {
    return { text, sanitize: true, userInitiated: false, groupOperation: false }
}

/**
 * The read-only battery issued on every poll. The outlet listing is left out
 * while a group operation or its cooldown is active: the group listing then
 * carries per-outlet state that is more current than a separate listing.
 */
export function buildPollBatch(flags: Pick<SessionFlags, 'groupOperationInFlight' | 'postGroupCooldown'>): PduCommand[] {
    const texts: string[] = [
        QUERY.inlets,
        QUERY.externalSensor1,
        QUERY.externalSensor2,
        QUERY.inletActivePower,
    ]
    if (!flags.groupOperationInFlight && !flags.postGroupCooldown) {
        texts.push(QUERY.outlets)
    }
    texts.push(QUERY.outletGroups)
    return texts.map(queryCommand)
}

/** Listing refresh queued after a confirmed user command. */
export function buildRefreshBatch(): PduCommand[] {
    return [queryCommand(QUERY.outlets), queryCommand(QUERY.outletGroups)]
}
