import { describe, it, expect, vi } from 'vitest'
import { makeClientBuffer } from './buffer.js'
import { LogChannel, type ClientLog } from './types.js'

const entry = (message: string): ClientLog => ({
    ts: 0,
    channel: LogChannel.pdu,
    emoji: '🔌',
    color: 'yellow',
    level: 'info',
    message
})

describe('makeClientBuffer', () => {
    it('keeps only the newest entries up to the limit', () => {
        const buf = makeClientBuffer(2)
        buf.push(entry('a'))
        buf.push(entry('b'))
        buf.push(entry('c'))
        expect(buf.getLatest(10).map(l => l.message)).toEqual(['b', 'c'])
        expect(buf.getLatest(1).map(l => l.message)).toEqual(['c'])
        expect(buf.getLatest(0)).toEqual([])
    })

    it('notifies subscribers until they unsubscribe', () => {
        const buf = makeClientBuffer(5)
        const listener = vi.fn()
        const off = buf.subscribe(listener)
        buf.push(entry('first'))
        off()
        buf.push(entry('second'))
        expect(listener).toHaveBeenCalledTimes(1)
        expect(listener.mock.calls[0][0].message).toBe('first')
    })
})
