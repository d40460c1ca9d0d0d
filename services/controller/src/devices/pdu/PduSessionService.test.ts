import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { BroadcastBus } from '../../core/events/BroadcastBus.js'
import { FakeTransport } from '../../test-support/FakeTransport.js'
import { GROUP_LISTING, OUTLET_LISTING, POLL_RESPONSES, PROMPT, drain, testPduConfig } from '../../test-support/pduConfig.js'
import type { GroupBroadcast } from './BroadcastCoordinator.js'
import { PduSessionService } from './PduSessionService.js'
import type { PduConfig, PduEvent } from './types.js'

beforeEach(() => { vi.useFakeTimers() })
afterEach(() => { vi.useRealTimers() })

function setup(overrides: Partial<PduConfig> = {}, bus?: BroadcastBus<GroupBroadcast>) {
    const config = testPduConfig(overrides)
    const transport = new FakeTransport()
    const events: PduEvent[] = []
    const session = new PduSessionService(config, {
        events: { publish: evt => { events.push(evt) } },
        transport,
        bus,
    })
    return { session, transport, events, config }
}

type Ctx = ReturnType<typeof setup>

async function login({ session, transport }: Ctx): Promise<void> {
    await session.start()
    session.connect()
    transport.open()
    transport.receive('\r\nUsername: ')
    vi.advanceTimersByTime(500)
    transport.receive('Password: ')
    vi.advanceTimersByTime(1_000)
    transport.receive('\r\nWelcome to the PDU CLI\r\n')
    vi.advanceTimersByTime(5_000)
}

async function loginAndPoll(ctx: Ctx, responses: Record<string, string> = POLL_RESPONSES): Promise<void> {
    await login(ctx)
    drain(ctx.transport, responses)
    ctx.transport.clearWrites()
}

function statuses(events: PduEvent[]): string[] {
    const out: string[] = []
    for (const e of events) if (e.kind === 'pdu-status') out.push(e.status.text)
    return out
}

function logs(events: PduEvent[], level?: string): string[] {
    const out: string[] = []
    for (const e of events) {
        if (e.kind === 'pdu-log' && (level === undefined || e.level === level)) out.push(e.message)
    }
    return out
}

/* -------------------------------------------------------------------------- */

describe('PduSessionService login and polling', () => {
    it('answers the login challenges and starts polling after the welcome banner', async () => {
        const ctx = setup()
        await login(ctx)

        expect(ctx.transport.connectCalls).toEqual([{ host: '10.0.0.5', port: 23 }])
        expect(ctx.transport.lines).toEqual(['admin', 'test-secret', 'show inlets'])
        expect(statuses(ctx.events)).toEqual(['Disconnected', 'Connected', 'Logged In'])
        expect(ctx.session.getFlags()).toMatchObject({ connected: true, authenticated: true, pollingActive: true })
        expect(logs(ctx.events)).toContain('Sent password: ***********')
    })

    it('sends credentials only after their delays', async () => {
        const ctx = setup()
        await ctx.session.start()
        ctx.session.connect()
        ctx.transport.open()
        ctx.transport.receive('Username: ')
        vi.advanceTimersByTime(499)
        expect(ctx.transport.writes).toEqual([])
        vi.advanceTimersByTime(1)
        expect(ctx.transport.lines).toEqual(['admin'])
    })

    it('sends the username when a welcome banner precedes the challenge', async () => {
        const ctx = setup()
        await ctx.session.start()
        ctx.session.connect()
        ctx.transport.open()
        ctx.transport.receive('Welcome to the PDU management console\r\nUsername: ')
        vi.advanceTimersByTime(600)

        expect(ctx.transport.lines).toEqual(['admin'])
        expect(ctx.session.getFlags().authenticated).toBe(false)
        expect(statuses(ctx.events)).not.toContain('Logged In')
    })

    it('runs the poll battery and folds the answers into the model', async () => {
        const ctx = setup()
        await login(ctx)
        drain(ctx.transport)

        expect(ctx.transport.lines.slice(2)).toEqual([
            'show inlets',
            'show sensor externalsensor 1',
            'show sensor externalsensor 2',
            'show sensor inlet I1 activePower',
            'show outlets',
            'show outletgroups',
        ])
        expect(ctx.session.getSensors()).toEqual({
            current: '1.25 A',
            activePower: '230 W',
            temperature: '22.5 °C',
            humidity: '45 %',
        })
        const outlets = ctx.session.getOutlets()
        expect(outlets[0]).toMatchObject({ name: 'Web Server', powered: true, known: true, disabled: false })
        expect(outlets[1]).toMatchObject({ name: 'NAS', powered: false, known: true })
        expect(ctx.session.getGroups().map(g => [g.name, g.powered, g.unused])).toEqual([
            ['Lighting', true, false],
            ['Storage', false, false],
            ['Unused Group', false, true],
            ['Unused Group', false, true],
        ])
        expect(ctx.session.getFlags().awaitingResponse).toBe(false)
        expect(ctx.session.getHealth().performance.responsesReceived).toBe(6)
    })

    it('polls again after the interval', async () => {
        const ctx = setup()
        await loginAndPoll(ctx)
        vi.advanceTimersByTime(30_000)
        expect(ctx.transport.lines).toEqual(['show inlets'])
    })

    it('skips data until a full response prompt has arrived', async () => {
        const ctx = setup()
        await login(ctx)
        ctx.transport.receive('show inlets\r\nRMS Current: 2.5 A\r\n[My P')
        expect(ctx.session.getSensors().current).toBeNull()
        ctx.transport.receive('DU] #')
        expect(ctx.session.getSensors().current).toBe('2.5 A')
        expect(ctx.transport.lines[ctx.transport.lines.length - 1]).toBe('show sensor externalsensor 1')
    })
})

describe('PduSessionService connection faults', () => {
    it('latches an authentication failure', async () => {
        const ctx = setup()
        await ctx.session.start()
        ctx.session.connect()
        ctx.transport.open()
        ctx.transport.receive('Authentication failed\r\nUsername: ')
        vi.advanceTimersByTime(2_000)

        expect(ctx.transport.writes).toEqual([])
        expect(ctx.session.getStatus()).toEqual({ text: 'Authentication Failed', severity: 'fault' })
        expect(ctx.events.some(e => e.kind === 'fatal-error' && e.error === 'Authentication failed')).toBe(true)
        expect(ctx.session.getHealth().errors.authenticationErrors).toBe(1)
    })

    it('resets the session and schedules a reconnect on socket error', async () => {
        const ctx = setup()
        await loginAndPoll(ctx)
        ctx.transport.fail('ECONNRESET')

        expect(ctx.session.getStatus()).toEqual({ text: 'Socket Error: ECONNRESET', severity: 'fault' })
        expect(ctx.session.getFlags()).toMatchObject({ connected: false, authenticated: false, pollingActive: false })
        expect(ctx.session.getOutlets()[0]).toMatchObject({ name: 'Outlet 1', known: false, disabled: true })
        expect(ctx.session.getHealth().errors).toMatchObject({ connectionErrors: 1, lastErrorType: 'socket_error' })

        vi.advanceTimersByTime(1_999)
        expect(ctx.transport.connectCalls).toHaveLength(1)
        vi.advanceTimersByTime(1)
        expect(ctx.transport.connectCalls).toHaveLength(2)
    })

    it('gives up after the bounded number of reconnects', async () => {
        const ctx = setup()
        await ctx.session.start()
        ctx.session.connect()
        ctx.transport.open()

        const delays = [2_000, 4_000, 8_000, 16_000, 32_000]
        for (const d of delays) {
            ctx.transport.close()
            vi.advanceTimersByTime(d)
        }
        expect(ctx.transport.connectCalls).toHaveLength(6)

        ctx.transport.close()
        expect(ctx.session.getStatus()).toEqual({ text: 'Max Reconnect Attempts Reached', severity: 'fault' })
        vi.advanceTimersByTime(120_000)
        expect(ctx.transport.connectCalls).toHaveLength(6)
    })

    it('reports a socket timeout', async () => {
        const ctx = setup()
        await ctx.session.start()
        ctx.session.connect()
        ctx.transport.timeout()
        expect(ctx.session.getStatus().text).toBe('Socket Timeout')
        expect(ctx.session.getHealth().errors).toMatchObject({ timeoutErrors: 1, lastErrorType: 'socket_timeout' })
    })

    it('does not reconnect after a manual disconnect', async () => {
        const ctx = setup()
        await loginAndPoll(ctx)
        ctx.session.disconnect()
        expect(ctx.session.getStatus()).toEqual({ text: 'Disconnected', severity: 'disconnected' })
        vi.advanceTimersByTime(60_000)
        expect(ctx.transport.connectCalls).toHaveLength(1)
    })

    it('refuses an invalid endpoint', async () => {
        const ctx = setup({ host: 'bad host' })
        await ctx.session.start()
        expect(ctx.session.connect()).toBe(false)
        expect(ctx.session.getStatus()).toEqual({ text: 'Connection Failed', severity: 'fault' })
        expect(ctx.transport.connectCalls).toEqual([])
    })
})

describe('PduSessionService arming and confirmation', () => {
    it('refuses a toggle while not connected', async () => {
        const ctx = setup()
        await ctx.session.start()
        expect(ctx.session.toggleOutlet(1, true)).toBe(false)
        expect(ctx.session.getOutlets()[0]?.powered).toBe(false)
        expect(logs(ctx.events, 'error')).toContain('Connection is not available. Preventing power state toggle.')
    })

    it('arms a toggle without writing and reverts it on cancel', async () => {
        const ctx = setup()
        await loginAndPoll(ctx)
        ctx.session.setMode('on-off')

        expect(ctx.session.toggleOutlet(2, true)).toBe(true)
        expect(ctx.transport.writes).toEqual([])
        expect(ctx.session.getOutlets()[1]?.powered).toBe(true)
        expect(ctx.session.pendingCommand).toMatchObject({
            kind: 'outlet-toggle',
            commandText: 'power outlets 2 on',
            description: 'Turn NAS ON',
            priorState: false,
        })
        expect(ctx.session.getIndicators()).toMatchObject({ confirmEnabled: true, waitingResponse: true })

        expect(ctx.session.cancel()).toBe(true)
        expect(ctx.session.getOutlets()[1]?.powered).toBe(false)
        expect(ctx.session.pendingCommand).toBeNull()
        expect(ctx.session.getFlags()).toMatchObject({
            awaitingUserConfirmation: false,
            confirmEnabled: false,
            waitingIndicator: false,
        })
        expect(ctx.transport.writes).toEqual([])
    })

    it('arms a power cycle from a toggle in cycle mode', async () => {
        const ctx = setup()
        await loginAndPoll(ctx)
        expect(ctx.session.getMode()).toBe('cycle')

        ctx.session.toggleOutlet(1, false)
        expect(ctx.session.pendingCommand).toMatchObject({
            kind: 'outlet-cycle',
            commandText: 'power outlets 1 cycle',
            description: 'Power cycle Web Server',
        })
    })

    it('keeps the device value as baseline when re-arming the same control', async () => {
        const ctx = setup()
        await loginAndPoll(ctx)
        ctx.session.setMode('on-off')

        ctx.session.toggleOutlet(2, true)
        ctx.session.toggleOutlet(2, false)
        expect(ctx.session.pendingCommand).toMatchObject({ description: 'Turn NAS OFF', priorState: false })

        ctx.session.toggleOutlet(1, false)
        expect(ctx.session.getOutlets().map(o => o.powered).slice(0, 2)).toEqual([false, false])
        ctx.session.cancel()
        expect(ctx.session.getOutlets().map(o => o.powered).slice(0, 2)).toEqual([true, false])
    })

    it('auto-cancels an armed command after the confirmation timeout', async () => {
        const ctx = setup()
        await loginAndPoll(ctx)
        ctx.session.setMode('on-off')
        ctx.session.toggleOutlet(2, true)

        vi.advanceTimersByTime(10_000)
        expect(ctx.session.pendingCommand).toBeNull()
        expect(ctx.session.getOutlets()[1]?.powered).toBe(false)
        expect(ctx.events.some(e => e.kind === 'pdu-command-cleared' && e.reason === 'timeout')).toBe(true)
    })

    it('executes on confirm, auto-answers the device question and refreshes', async () => {
        const ctx = setup()
        await loginAndPoll(ctx)
        ctx.session.setMode('on-off')
        ctx.session.toggleOutlet(2, true)

        expect(ctx.session.confirm()).toBe(true)
        expect(ctx.transport.lines).toEqual(['power outlets 2 on'])
        expect(ctx.session.getFlags()).toMatchObject({
            processing: true,
            awaitingUserConfirmation: true,
            awaitingServerConfirmation: false,
            confirmEnabled: false,
        })
        expect(ctx.session.getIndicators().controlsDisabled).toBe(true)
        expect(ctx.session.currentOperation).toEqual({ kind: 'outlet-toggle', index: 2, priorState: false })

        ctx.transport.receive('power outlets 2 on\r\nDo you wish to continue? [y/n] ')
        expect(ctx.transport.lines).toEqual(['power outlets 2 on', 'y'])
        expect(ctx.session.getFlags().awaitingServerConfirmation).toBe(false)

        ctx.transport.receive(`\r\nOutlet 2 powered on\r\n${PROMPT}`)
        expect(ctx.session.getFlags()).toMatchObject({
            processing: false,
            awaitingUserConfirmation: false,
            awaitingResponse: false,
        })
        expect(ctx.session.currentOperation).toBeNull()
        expect(ctx.session.getIndicators().controlsDisabled).toBe(false)

        vi.advanceTimersByTime(3_000)
        expect(ctx.transport.lines.slice(2)).toEqual(['show outlets'])
        drain(ctx.transport, {
            'show outlets': OUTLET_LISTING.replace('Power state: Off', 'Power state: On'),
            'show outletgroups': GROUP_LISTING,
        })
        expect(ctx.transport.lines.slice(2)).toEqual(['show outlets', 'show outletgroups'])
        expect(ctx.session.getOutlets()[1]?.powered).toBe(true)

        ctx.transport.clearWrites()
        vi.advanceTimersByTime(8_000)
        expect(ctx.transport.lines).toEqual(['show inlets'])
    })

    it('refuses to arm while a confirmed command is in flight', async () => {
        const ctx = setup()
        await loginAndPoll(ctx)
        ctx.session.setMode('on-off')
        ctx.session.toggleOutlet(2, true)
        ctx.session.confirm()

        expect(ctx.session.toggleOutlet(1, false)).toBe(false)
        expect(ctx.session.getOutlets()[0]?.powered).toBe(true)
        expect(ctx.session.cancel()).toBe(false)
    })

    it('reverts a toggle whose command never gets an answer', async () => {
        const ctx = setup()
        await loginAndPoll(ctx)
        ctx.session.setMode('on-off')
        ctx.session.toggleOutlet(2, true)
        ctx.session.confirm()

        vi.advanceTimersByTime(31_999)
        expect(ctx.session.getOutlets()[1]?.powered).toBe(true)
        vi.advanceTimersByTime(1)

        expect(ctx.transport.lines.filter(l => l === 'power outlets 2 on')).toHaveLength(3)
        expect(ctx.session.getOutlets()[1]?.powered).toBe(false)
        expect(ctx.session.getFlags()).toMatchObject({ revertingState: true, processing: false, awaitingResponse: false })
        expect(ctx.session.getHealth().errors.timeoutErrors).toBe(1)

        vi.advanceTimersByTime(10_000)
        expect(ctx.session.getFlags().revertingState).toBe(false)
    })

    it('surfaces a device question that no user command covers', async () => {
        const ctx = setup()
        await login(ctx)
        ctx.transport.clearWrites()

        ctx.transport.receive('Do you wish to continue? [y/n] ')
        expect(ctx.session.getFlags()).toMatchObject({
            awaitingServerConfirmation: true,
            awaitingUserConfirmation: false,
            confirmEnabled: true,
        })
        expect(ctx.session.toggleOutlet(1, true)).toBe(false)

        expect(ctx.session.confirm()).toBe(true)
        expect(ctx.transport.lines).toEqual(['y'])
        expect(ctx.session.getFlags()).toMatchObject({ awaitingServerConfirmation: false, processing: true })
    })

    it('declines a device question on cancel', async () => {
        const ctx = setup()
        await login(ctx)
        ctx.transport.clearWrites()
        ctx.transport.receive('Do you wish to continue? [y/n] ')

        expect(ctx.session.cancel()).toBe(true)
        expect(ctx.transport.lines).toEqual(['n'])
        expect(ctx.session.getFlags()).toMatchObject({ awaitingServerConfirmation: false, confirmEnabled: false })
    })

    it('accepts a new command right after declining an unrelated device question', async () => {
        const ctx = setup()
        await loginAndPoll(ctx)
        ctx.session.setMode('on-off')
        ctx.transport.receive('Do you wish to continue? [y/n] ')

        expect(ctx.session.cancel()).toBe(true)
        expect(ctx.session.currentOperation).toBeNull()
        expect(ctx.session.getFlags().revertingState).toBe(false)

        expect(ctx.session.toggleOutlet(1, false)).toBe(true)
        expect(ctx.session.pendingCommand).toMatchObject({ kind: 'outlet-toggle', index: 1 })
    })

    it('answers no when the device question expires', async () => {
        const ctx = setup()
        await login(ctx)
        ctx.transport.clearWrites()
        ctx.transport.receive('Do you wish to continue? [y/n] ')

        vi.advanceTimersByTime(10_000)
        expect(ctx.transport.lines).toEqual(['n'])
        expect(ctx.session.getFlags().awaitingServerConfirmation).toBe(false)
    })
})

describe('PduSessionService group operations', () => {
    it('cycles a group and takes member state from the group listing', async () => {
        const ctx = setup()
        await loginAndPoll(ctx)

        expect(ctx.session.cycleGroup(2)).toBe(true)
        expect(ctx.session.pendingCommand?.description).toBe('Power cycle Storage')
        ctx.session.confirm()
        expect(ctx.transport.lines).toEqual(['power outletgroup 2 cycle'])
        expect(ctx.session.getFlags().groupOperationInFlight).toBe(true)

        ctx.transport.receive(GROUP_LISTING)
        expect(ctx.session.getFlags()).toMatchObject({ groupOperationInFlight: false, postGroupCooldown: true })
        expect(ctx.session.getOutlets()[3]).toMatchObject({ powered: true, known: true })
    })

    it('omits the outlet listing from polls during the cooldown', async () => {
        const ctx = setup()
        await loginAndPoll(ctx)
        ctx.session.cycleGroup(2)
        ctx.session.confirm()
        ctx.transport.receive(GROUP_LISTING)

        vi.advanceTimersByTime(3_000)
        drain(ctx.transport)
        ctx.transport.clearWrites()

        vi.advanceTimersByTime(8_000)
        drain(ctx.transport)
        expect(ctx.transport.lines).toEqual([
            'show inlets',
            'show sensor externalsensor 1',
            'show sensor externalsensor 2',
            'show sensor inlet I1 activePower',
            'show outletgroups',
        ])
    })

    it('rejects cycling an unused group', async () => {
        const ctx = setup()
        await loginAndPoll(ctx)
        expect(ctx.session.cycleGroup(3)).toBe(false)
        expect(ctx.session.pendingCommand).toBeNull()
    })

    it('triggers a group by name without arming', async () => {
        const ctx = setup()
        await loginAndPoll(ctx)

        expect(ctx.session.triggerGroupByName('  storage ')).toBe(true)
        expect(ctx.transport.lines).toEqual(['power outletgroup 2 cycle'])
        expect(ctx.session.pendingCommand).toBeNull()
        expect(ctx.session.triggerGroupByName('Storage')).toBe(false)
    })

    it('reports an unknown group name', async () => {
        const ctx = setup()
        await loginAndPoll(ctx)
        expect(ctx.session.triggerGroupByName('Garage')).toBe(false)
        expect(logs(ctx.events, 'warn')).toContain('Group not found: Garage')
        expect(ctx.transport.writes).toEqual([])
    })

    it('synchronizes a group cycle across sessions by group name', async () => {
        const bus = new BroadcastBus<GroupBroadcast>({ queueCapacity: 64 })
        const a = setup({ id: 'rack-a' }, bus)
        const b = setup({ id: 'rack-b', host: '10.0.0.6' }, bus)

        const bGroups = [
            'show outletgroups',
            'Outlet Group 1 - Fans',
            'State: 1 on',
            '  Outlet 5: On',
            'Outlet Group 2 - lighting',
            'State: 1 off',
            '  Outlet 6: Off',
            PROMPT,
        ].join('\r\n')

        await loginAndPoll(a)
        await loginAndPoll(b, { ...POLL_RESPONSES, 'show outletgroups': bGroups })

        a.session.cycleGroup(1)
        a.session.confirm()
        expect(a.transport.lines).toEqual(['power outletgroup 1 cycle'])
        expect(a.session.broadcastIntent).toMatchObject({ groupName: 'Lighting', initiatedLocally: true })
        await bus.idle()

        vi.advanceTimersByTime(2_999)
        expect(b.transport.lines).toEqual([])
        vi.advanceTimersByTime(1)
        expect(b.transport.lines).toEqual(['power outletgroup 2 cycle'])
        expect(b.events.some(e => e.kind === 'pdu-broadcast' && e.role === 'receiver' && e.groupIndex === 2)).toBe(true)

        b.transport.receive(bGroups)
        expect(b.session.getFlags().groupOperationInFlight).toBe(false)
        expect(b.session.broadcastIntent).toBeNull()

        await a.session.stop()
        await b.session.stop()
    })
})

describe('PduSessionService events', () => {
    it('stamps every event with the session id', async () => {
        const ctx = setup()
        await loginAndPoll(ctx)
        expect(ctx.events.length).toBeGreaterThan(0)
        expect(ctx.events.every(e => e.pduId === 'rack-a')).toBe(true)
    })

    it('emits a mode change once per actual change', async () => {
        const ctx = setup()
        await ctx.session.start()
        ctx.session.setMode('on-off')
        ctx.session.setMode('on-off')
        const modes: string[] = []
        for (const e of ctx.events) if (e.kind === 'pdu-mode-changed') modes.push(e.mode)
        expect(modes).toEqual(['cycle', 'on-off'])
    })
})
