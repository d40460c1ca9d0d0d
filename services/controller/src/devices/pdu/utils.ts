// services/controller/src/devices/pdu/utils.ts

import { isIP } from 'node:net'
import type { PduConfig, PowerOperationMode } from './types.js'

export const DEFAULT_PROMPT = '[My PDU] #'
export const DEFAULT_PORT = 23

interface EndpointInput {
    id: string
    label?: string
    host: string
    port?: number
    username?: string
    password?: string
}

/**
 * Build one config per PDU endpoint.
 *
 * A single endpoint comes from PDU_HOST / PDU_PORT / PDU_USERNAME / PDU_PASSWORD.
 * Several endpoints come from PDU_ENDPOINTS_JSON, an array of
 * `{ id, label?, host, port?, username?, password? }`; missing credentials fall
 * back to the single-endpoint variables. Every other setting is shared.
 */
export function buildPduConfigsFromEnv(env: NodeJS.ProcessEnv): PduConfig[] {
    const shared = buildSharedSettings(env)
    const endpoints = parseEndpoints(env)

    return endpoints.map(ep => ({
        ...shared,
        id: ep.id,
        label: ep.label ?? ep.id,
        host: ep.host,
        port: ep.port ?? parseIntSafe(env.PDU_PORT, DEFAULT_PORT),
        credentials: {
            username: ep.username ?? env.PDU_USERNAME ?? '',
            password: ep.password ?? env.PDU_PASSWORD ?? '',
        },
    }))
}

type SharedSettings = Omit<PduConfig, 'id' | 'label' | 'host' | 'port' | 'credentials'>

function buildSharedSettings(env: NodeJS.ProcessEnv): SharedSettings {
    const responseTimeoutMs = parseIntSafe(env.PDU_RESPONSE_TIMEOUT_MS, 10_000)

    return {
        prompt: env.PDU_PROMPT && env.PDU_PROMPT.trim() !== '' ? env.PDU_PROMPT : DEFAULT_PROMPT,
        autoConnect: parseBoolSafe(env.PDU_AUTO_CONNECT, true),
        defaultMode: parseModeSafe(env.PDU_DEFAULT_MODE, 'cycle'),
        timing: {
            responseTimeoutMs,
            connectTimeoutMs: parseIntSafe(env.PDU_CONNECT_TIMEOUT_MS, 5_000),
            usernameDelayMs: parseIntSafe(env.PDU_USERNAME_DELAY_MS, 500),
            passwordDelayMs: parseIntSafe(env.PDU_PASSWORD_DELAY_MS, 1_000),
            firstPollDelayMs: parseIntSafe(env.PDU_FIRST_POLL_DELAY_MS, 5_000),
            pollIntervalMs: parseIntSafe(env.PDU_POLL_INTERVAL_MS, 30_000),
            confirmationTimeoutMs: parseIntSafe(env.PDU_CONFIRM_TIMEOUT_MS, responseTimeoutMs),
            confirmationSafetyMs: parseIntSafe(env.PDU_CONFIRM_SAFETY_MS, 30_000),
            processingSafetyMs: parseIntSafe(env.PDU_PROCESSING_SAFETY_MS, 30_000),
            postGroupCooldownMs: parseIntSafe(env.PDU_POST_GROUP_COOLDOWN_MS, 30_000),
            revertGraceMs: parseIntSafe(env.PDU_REVERT_GRACE_MS, 10_000),
            healthIntervalMs: parseIntSafe(env.PDU_HEALTH_INTERVAL_MS, 300_000),
        },
        retry: {
            attempts: parseIntSafe(env.PDU_RETRY_ATTEMPTS, 3),
            delayMs: parseIntSafe(env.PDU_RETRY_DELAY_MS, 1_000),
            budgetMs: parseIntSafe(env.PDU_RETRY_BUDGET_MS, 30_000),
        },
        reconnect: {
            enabled: parseBoolSafe(env.PDU_RECONNECT_ENABLED, true),
            baseDelayMs: parseIntSafe(env.PDU_RECONNECT_BASE_DELAY_MS, 2_000),
            maxDelayMs: parseIntSafe(env.PDU_RECONNECT_MAX_DELAY_MS, 60_000),
            jitterMs: parseIntSafe(env.PDU_RECONNECT_JITTER_MS, 2_000),
            maxAttempts: parseIntSafe(env.PDU_RECONNECT_MAX_ATTEMPTS, 5),
        },
        polling: {
            maxConsecutiveSkips: parseIntSafe(env.PDU_MAX_POLL_SKIPS, 5),
        },
        limits: {
            bufferSize: parseIntSafe(env.PDU_BUFFER_SIZE, 8192),
            maxOutlets: parseIntSafe(env.PDU_MAX_OUTLETS, 24),
            maxGroups: parseIntSafe(env.PDU_MAX_GROUPS, 10),
            maxTimers: parseIntSafe(env.PDU_MAX_TIMERS, 50),
        },
        broadcast: {
            enabled: parseBoolSafe(env.PDU_BROADCAST_ENABLED, true),
            cooldownMs: parseIntSafe(env.PDU_BROADCAST_COOLDOWN_MS, 1_000),
            settleMs: parseIntSafe(env.PDU_BROADCAST_SETTLE_MS, 3_000),
            checkIntervalMs: parseIntSafe(env.PDU_BROADCAST_CHECK_MS, 500),
            receiverAction: env.PDU_BROADCAST_ACTION?.toLowerCase() === 'on' ? 'on' : 'cycle',
        },
    }
}

function parseEndpoints(env: NodeJS.ProcessEnv): EndpointInput[] {
    const raw = env.PDU_ENDPOINTS_JSON
    if (raw && raw.trim() !== '') {
        let parsed: unknown
        try {
            parsed = JSON.parse(raw)
        } catch (err) {
            throw new Error(`PDU_ENDPOINTS_JSON is not valid JSON: ${errorMessage(err)}`)
        }
        if (!Array.isArray(parsed)) {
            throw new Error('PDU_ENDPOINTS_JSON must be an array of endpoints')
        }
        const endpoints = parsed.map((item, i) => toEndpoint(item, i))
        const ids = new Set<string>()
        for (const ep of endpoints) {
            if (ids.has(ep.id)) throw new Error(`PDU_ENDPOINTS_JSON has duplicate id "${ep.id}"`)
            ids.add(ep.id)
        }
        return endpoints
    }

    if (!env.PDU_HOST || env.PDU_HOST.trim() === '') return []
    return [{ id: env.PDU_ID?.trim() || 'pdu-1', label: env.PDU_LABEL, host: env.PDU_HOST.trim() }]
}

function toEndpoint(item: unknown, index: number): EndpointInput {
    if (typeof item !== 'object' || item === null) {
        throw new Error(`PDU_ENDPOINTS_JSON[${index}] must be an object`)
    }
    const rec: Record<string, unknown> = Object.fromEntries(Object.entries(item))
    const id = typeof rec.id === 'string' && rec.id.trim() !== '' ? rec.id.trim() : `pdu-${index + 1}`
    if (typeof rec.host !== 'string' || rec.host.trim() === '') {
        throw new Error(`PDU_ENDPOINTS_JSON[${index}] needs a host`)
    }
    return {
        id,
        host: rec.host.trim(),
        label: typeof rec.label === 'string' ? rec.label : undefined,
        port: typeof rec.port === 'number' ? rec.port : undefined,
        username: typeof rec.username === 'string' ? rec.username : undefined,
        password: typeof rec.password === 'string' ? rec.password : undefined,
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err)
}

export function parseIntSafe(value: string | undefined, fallback: number): number {
    if (!value) return fallback
    const n = Number.parseInt(value, 10)
    return Number.isNaN(n) ? fallback : n
}

export function parseBoolSafe(value: string | undefined, fallback: boolean): boolean {
    if (value == null || value === '') return fallback
    const v = value.toLowerCase()
    if (v === 'true' || v === '1' || v === 'yes') return true
    if (v === 'false' || v === '0' || v === 'no') return false
    return fallback
}

export function parseModeSafe(value: string | undefined, fallback: PowerOperationMode): PowerOperationMode {
    const v = value?.trim().toLowerCase()
    if (v === 'on-off' || v === 'onoff') return 'on-off'
    if (v === 'cycle') return 'cycle'
    return fallback
}

const HOSTNAME_RE = /^(?=.{1,253}$)[A-Za-z0-9](?:[A-Za-z0-9-]{0,61}[A-Za-z0-9])?(?:\.[A-Za-z0-9](?:[A-Za-z0-9-]{0,61}[A-Za-z0-9])?)*$/
const DOTTED_RE = /^[\d.]+$/

/** IPv4/IPv6 literal or DNS name; dotted digits must be a real IPv4 address. */
export function isValidHost(host: string): boolean {
    if (!host) return false
    if (isIP(host) !== 0) return true
    if (DOTTED_RE.test(host)) return false
    return HOSTNAME_RE.test(host)
}

export function isValidPort(port: number): boolean {
    return Number.isInteger(port) && port > 0 && port <= 65535
}

/**
 * Exponential backoff with additive jitter:
 * `min(base * 2^attempt, max) + random() * jitter`, attempt counted from 0.
 */
export function computeReconnectDelay(
    baseDelayMs: number,
    maxDelayMs: number,
    attempt: number,
    jitterMs = 0,
    random: () => number = Math.random
): number {
    if (baseDelayMs <= 0) baseDelayMs = 1000
    if (maxDelayMs < baseDelayMs) maxDelayMs = baseDelayMs

    const exp = Math.pow(2, Math.max(0, attempt))
    const candidate = Math.min(baseDelayMs * exp, maxDelayMs)

    return candidate + Math.max(0, jitterMs) * random()
}
