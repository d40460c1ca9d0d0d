// services/controller/src/test-support/pduConfig.ts

import type { PduConfig } from '../devices/pdu/types.js'
import type { FakeTransport } from './FakeTransport.js'
import { buildPduConfigsFromEnv } from '../devices/pdu/utils.js'

/** Defaults as read from an env with only the endpoint set. */
export function testPduConfig(overrides: Partial<PduConfig> = {}): PduConfig {
    const [base] = buildPduConfigsFromEnv({
        PDU_HOST: '10.0.0.5',
        PDU_ID: 'rack-a',
        PDU_USERNAME: 'admin',
        PDU_PASSWORD: 'test-secret',
        PDU_AUTO_CONNECT: 'false',
        PDU_MAX_OUTLETS: '8',
        PDU_MAX_GROUPS: '4',
        PDU_RECONNECT_JITTER_MS: '0',
    })
    if (!base) throw new Error('test config did not build')
    return { ...base, ...overrides }
}

export const PROMPT = '[My PDU] #'

export const OUTLET_LISTING = [
    'show outlets',
    'Outlet 1 - Web Server:',
    'Power state: On',
    '',
    'Outlet 2 - NAS:',
    'Power state: Off',
    '',
    PROMPT,
].join('\r\n')

export const GROUP_LISTING = [
    'show outletgroups',
    'Outlet Group 1 - Lighting',
    'State: 2 on',
    '  Outlet 1 - Web Server: On',
    '  Outlet 3: On',
    'Outlet Group 2 - Storage',
    'State: 1 on, 1 off',
    '  Outlet 2 - NAS: Off',
    '  Outlet 4: On',
    PROMPT,
].join('\r\n')

export const POLL_RESPONSES: Record<string, string> = {
    'show inlets': `show inlets\r\nRMS Current: 1.25 A\r\n${PROMPT}`,
    'show sensor externalsensor 1': `Reading: 22.5 deg C\r\n${PROMPT}`,
    'show sensor externalsensor 2': `Reading: 45 %\r\n${PROMPT}`,
    'show sensor inlet I1 activePower': `Reading: 230 W\r\n${PROMPT}`,
    'show outlets': OUTLET_LISTING,
    'show outletgroups': GROUP_LISTING,
}

/** Answer queued queries for as long as the session keeps writing known ones. */
export function drain(t: FakeTransport, responses: Record<string, string> = POLL_RESPONSES): void {
    for (let guard = 0; guard < 20; guard++) {
        const before = t.writes.length
        const last = t.lines[before - 1]
        const reply = last === undefined ? undefined : responses[last]
        if (reply === undefined) return
        t.receive(reply)
        if (t.writes.length === before) return
    }
}
