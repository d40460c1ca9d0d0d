import { describe, it, expect } from 'vitest'
import {
    buildPollBatch,
    buildRefreshBatch,
    groupPowerCommand,
    isSafeCommandText,
    outletPowerCommand,
} from './commands.js'

describe('power commands', () => {
    it('formats outlet and group commands', () => {
        expect(outletPowerCommand(3, 'on')).toBe('power outlets 3 on')
        expect(outletPowerCommand(12, 'cycle')).toBe('power outlets 12 cycle')
        expect(groupPowerCommand(2, 'off')).toBe('power outletgroup 2 off')
    })
})

describe('isSafeCommandText', () => {
    it('allows the CLI command alphabet', () => {
        expect(isSafeCommandText('show sensor inlet I1 activePower')).toBe(true)
        expect(isSafeCommandText('power outlets 1 on')).toBe(true)
    })

    it('rejects shell metacharacters and empty text', () => {
        expect(isSafeCommandText('show outlets; reboot')).toBe(false)
        expect(isSafeCommandText('power outlets $(id)')).toBe(false)
        expect(isSafeCommandText('')).toBe(false)
    })
})

describe('buildPollBatch', () => {
    it('queries sensors, outlets and groups when idle', () => {
        const batch = buildPollBatch({ groupOperationInFlight: false, postGroupCooldown: false })
        expect(batch.map(c => c.text)).toEqual([
            'show inlets',
            'show sensor externalsensor 1',
            'show sensor externalsensor 2',
            'show sensor inlet I1 activePower',
            'show outlets',
            'show outletgroups',
        ])
        expect(batch.every(c => c.sanitize && !c.userInitiated && !c.groupOperation)).toBe(true)
    })

    it('omits the outlet listing during a group operation or its cooldown', () => {
        for (const flags of [
            { groupOperationInFlight: true, postGroupCooldown: false },
            { groupOperationInFlight: false, postGroupCooldown: true },
        ]) {
            const texts = buildPollBatch(flags).map(c => c.text)
            expect(texts).not.toContain('show outlets')
            expect(texts[texts.length - 1]).toBe('show outletgroups')
            expect(texts).toHaveLength(5)
        }
    })
})

describe('buildRefreshBatch', () => {
    it('lists outlets then groups', () => {
        expect(buildRefreshBatch().map(c => c.text)).toEqual(['show outlets', 'show outletgroups'])
    })
})
