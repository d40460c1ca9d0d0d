import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { BroadcastBus } from '../../core/events/BroadcastBus.js'
import {
    BroadcastCoordinator,
    GROUP_CYCLE_TOPIC,
    type BroadcastCoordinatorDeps,
    type GroupBroadcast,
} from './BroadcastCoordinator.js'
import { TimerRegistry } from './scheduler.js'

beforeEach(() => { vi.useFakeTimers() })
afterEach(() => { vi.useRealTimers() })

const settings = { cooldownMs: 1_000, settleMs: 3_000, checkIntervalMs: 500 }

function peer(bus: BroadcastBus<GroupBroadcast>, sessionId: string, groups: Record<string, number>) {
    const issueReceiverCommand = vi.fn<BroadcastCoordinatorDeps['issueReceiverCommand']>()
    const coordinator = new BroadcastCoordinator(settings, {
        sessionId,
        bus,
        timers: new TimerRegistry(50),
        findGroupIndex: name => groups[name.toLowerCase()] ?? null,
        isConnected: () => true,
        issueReceiverCommand,
        log: vi.fn(),
    })
    coordinator.start()
    return { coordinator, issueReceiverCommand }
}

function setup() {
    const bus = new BroadcastBus<GroupBroadcast>({ queueCapacity: 64 })
    const a = peer(bus, 'rack-a', { lighting: 1 })
    const b = peer(bus, 'rack-b', { lighting: 2 })
    return { bus, a, b }
}

describe('BroadcastCoordinator', () => {
    it('receiver issues its command after the settle window', async () => {
        const { bus, a, b } = setup()
        a.coordinator.initiate(1, 'Lighting')
        await bus.idle()

        expect(a.coordinator.isProcessing()).toBe(true)
        expect(a.coordinator.intent).toMatchObject({ groupName: 'Lighting', initiatedLocally: true })
        expect(b.coordinator.isProcessing()).toBe(true)

        vi.advanceTimersByTime(2_999)
        expect(b.issueReceiverCommand).not.toHaveBeenCalled()
        vi.advanceTimersByTime(1)
        expect(b.issueReceiverCommand).toHaveBeenCalledWith(2, 'Lighting')
        expect(b.coordinator.isReceiver()).toBe(true)
        expect(a.issueReceiverCommand).not.toHaveBeenCalled()
    })

    it('matches the group name case-insensitively', async () => {
        const { bus, b } = setup()
        bus.publish({
            topic: GROUP_CYCLE_TOPIC,
            source: 'rack-c',
            payload: { action: 'cycle', groupName: '  LIGHTING ', origin: 'rack-c' },
        })
        await bus.idle()
        vi.advanceTimersByTime(3_000)
        expect(b.issueReceiverCommand).toHaveBeenCalledWith(2, 'LIGHTING')
    })

    it('stands down when the initiator clears during the settle window', async () => {
        const { bus, a, b } = setup()
        a.coordinator.initiate(1, 'Lighting')
        await bus.idle()
        vi.advanceTimersByTime(1_000)

        a.coordinator.abort()
        await bus.idle()
        vi.advanceTimersByTime(5_000)

        expect(b.issueReceiverCommand).not.toHaveBeenCalled()
        expect(b.coordinator.isProcessing()).toBe(false)
        expect(a.coordinator.isProcessing()).toBe(false)
    })

    it('ignores a repeat of the same name inside the cooldown', async () => {
        const { bus, b } = setup()
        const cycle = (origin: string) => bus.publish({
            topic: GROUP_CYCLE_TOPIC,
            source: origin,
            payload: { action: 'cycle', groupName: 'Lighting', origin },
        })
        cycle('rack-c')
        cycle('rack-d')
        await bus.idle()
        vi.advanceTimersByTime(3_000)
        expect(b.issueReceiverCommand).toHaveBeenCalledTimes(1)
    })

    it('releases quickly when no local group matches', async () => {
        const { bus, b } = setup()
        bus.publish({
            topic: GROUP_CYCLE_TOPIC,
            source: 'rack-c',
            payload: { action: 'cycle', groupName: 'Storage', origin: 'rack-c' },
        })
        await bus.idle()
        expect(b.coordinator.isProcessing()).toBe(true)
        vi.advanceTimersByTime(500)
        expect(b.coordinator.isProcessing()).toBe(false)
        expect(b.issueReceiverCommand).not.toHaveBeenCalled()
    })

    it('an initiator does not receive while its own cycle is in flight', async () => {
        const { bus, a, b } = setup()
        b.coordinator.initiate(2, 'Lighting')
        await bus.idle()
        vi.advanceTimersByTime(2_000)

        a.coordinator.initiate(1, 'Lighting')
        await bus.idle()
        vi.advanceTimersByTime(5_000)
        expect(b.issueReceiverCommand).not.toHaveBeenCalled()
    })

    it('complete clears the intent', async () => {
        const { bus, a } = setup()
        a.coordinator.initiate(1, 'Lighting')
        await bus.idle()
        a.coordinator.complete()
        expect(a.coordinator.intent).toBeNull()
        expect(a.coordinator.isProcessing()).toBe(false)
    })
})
