import { describe, it, expect } from 'vitest'
import {
    buildPduConfigsFromEnv,
    computeReconnectDelay,
    isValidHost,
    isValidPort,
    parseBoolSafe,
    parseIntSafe,
    parseModeSafe,
} from './utils.js'

describe('buildPduConfigsFromEnv', () => {
    it('returns no endpoints without a host', () => {
        expect(buildPduConfigsFromEnv({})).toEqual([])
    })

    it('builds a single endpoint with defaults', () => {
        const [cfg] = buildPduConfigsFromEnv({
            PDU_HOST: ' 10.0.0.5 ',
            PDU_USERNAME: 'admin',
            PDU_PASSWORD: 'test-secret',
        })
        expect(cfg).toMatchObject({
            id: 'pdu-1',
            label: 'pdu-1',
            host: '10.0.0.5',
            port: 23,
            prompt: '[My PDU] #',
            autoConnect: true,
            defaultMode: 'cycle',
            credentials: { username: 'admin', password: 'test-secret' },
        })
        expect(cfg?.timing.responseTimeoutMs).toBe(10_000)
        expect(cfg?.timing.confirmationTimeoutMs).toBe(10_000)
        expect(cfg?.timing.pollIntervalMs).toBe(30_000)
        expect(cfg?.limits.bufferSize).toBe(8192)
        expect(cfg?.reconnect).toEqual({
            enabled: true,
            baseDelayMs: 2_000,
            maxDelayMs: 60_000,
            jitterMs: 2_000,
            maxAttempts: 5,
        })
        expect(cfg?.broadcast.receiverAction).toBe('cycle')
    })

    it('reads several endpoints from JSON with shared credentials as fallback', () => {
        const configs = buildPduConfigsFromEnv({
            PDU_ENDPOINTS_JSON: JSON.stringify([
                { id: 'rack-a', host: '10.0.0.5', label: 'Rack A' },
                { host: 'pdu-b.local', port: 2323, password: 'other-secret' },
            ]),
            PDU_USERNAME: 'admin',
            PDU_PASSWORD: 'test-secret',
        })
        expect(configs.map(c => [c.id, c.label, c.host, c.port])).toEqual([
            ['rack-a', 'Rack A', '10.0.0.5', 23],
            ['pdu-2', 'pdu-2', 'pdu-b.local', 2323],
        ])
        expect(configs[1]?.credentials).toEqual({ username: 'admin', password: 'other-secret' })
    })

    it('rejects malformed endpoint lists', () => {
        expect(() => buildPduConfigsFromEnv({ PDU_ENDPOINTS_JSON: '{' })).toThrow(/not valid JSON/)
        expect(() => buildPduConfigsFromEnv({ PDU_ENDPOINTS_JSON: '{}' })).toThrow(/must be an array/)
        expect(() => buildPduConfigsFromEnv({ PDU_ENDPOINTS_JSON: '[{"id":"a"}]' })).toThrow(/needs a host/)
        expect(() => buildPduConfigsFromEnv({
            PDU_ENDPOINTS_JSON: '[{"id":"a","host":"h1"},{"id":"a","host":"h2"}]',
        })).toThrow(/duplicate id "a"/)
    })

    it('reads the legacy receiver action', () => {
        const [cfg] = buildPduConfigsFromEnv({ PDU_HOST: 'pdu.local', PDU_BROADCAST_ACTION: 'ON' })
        expect(cfg?.broadcast.receiverAction).toBe('on')
    })
})

describe('env parsing helpers', () => {
    it('parses integers with a fallback', () => {
        expect(parseIntSafe('42', 1)).toBe(42)
        expect(parseIntSafe('abc', 1)).toBe(1)
        expect(parseIntSafe(undefined, 7)).toBe(7)
    })

    it('parses booleans with a fallback', () => {
        expect(parseBoolSafe('yes', false)).toBe(true)
        expect(parseBoolSafe('0', true)).toBe(false)
        expect(parseBoolSafe('maybe', true)).toBe(true)
    })

    it('parses the power mode', () => {
        expect(parseModeSafe('ON-OFF', 'cycle')).toBe('on-off')
        expect(parseModeSafe('cycle', 'on-off')).toBe('cycle')
        expect(parseModeSafe('toggle', 'cycle')).toBe('cycle')
    })
})

describe('endpoint validation', () => {
    it('accepts IP literals and host names', () => {
        expect(isValidHost('192.168.1.20')).toBe(true)
        expect(isValidHost('::1')).toBe(true)
        expect(isValidHost('pdu-rack-a.example.net')).toBe(true)
    })

    it('rejects malformed hosts', () => {
        expect(isValidHost('')).toBe(false)
        expect(isValidHost('999.1.1.1')).toBe(false)
        expect(isValidHost('bad host')).toBe(false)
        expect(isValidHost('-leading.example')).toBe(false)
    })

    it('checks the port range', () => {
        expect(isValidPort(23)).toBe(true)
        expect(isValidPort(0)).toBe(false)
        expect(isValidPort(65536)).toBe(false)
        expect(isValidPort(22.5)).toBe(false)
    })
})

describe('computeReconnectDelay', () => {
    it('doubles per attempt up to the cap', () => {
        const delays = [0, 1, 2, 3, 4, 5].map(a => computeReconnectDelay(2_000, 60_000, a))
        expect(delays).toEqual([2_000, 4_000, 8_000, 16_000, 32_000, 60_000])
    })

    it('adds jitter scaled by the random source', () => {
        expect(computeReconnectDelay(2_000, 60_000, 1, 2_000, () => 0.5)).toBe(5_000)
    })
})
