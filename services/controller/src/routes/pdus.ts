// services/controller/src/routes/pdus.ts
import type { FastifyPluginAsync, FastifyReply } from 'fastify'
import { getPduSnapshot, type PduSnapshot } from '../core/state.js'
import { applyPduIntent, isPowerMode, type PduIntent } from '../devices/pdu/intents.js'
import type { PduSessionService } from '../devices/pdu/PduSessionService.js'

type IdParams = { Params: { id: string } }
type IndexParams = { Params: { id: string; index: string } }

function readBody(body: unknown): Record<string, unknown> {
    if (typeof body !== 'object' || body === null || Array.isArray(body)) return {}
    return Object.fromEntries(Object.entries(body))
}

function parseIndex(raw: string): number | null {
    if (!/^\d+$/.test(raw)) return null
    const n = Number(raw)
    return n >= 1 ? n : null
}

const pduRoutes: FastifyPluginAsync = async (app) => {
    function lookup(id: string, reply: FastifyReply): PduSessionService | null {
        const pdu = app.pdus.get(id)
        if (!pdu) {
            reply.code(404)
            return null
        }
        return pdu
    }

    function controlCount(pdu: PduSessionService, target: 'outlets' | 'groups'): number {
        return target === 'outlets' ? pdu.getOutlets().length : pdu.getGroups().length
    }

    // 202 when the session took the intent, 409 when it refused
    function answer(pdu: PduSessionService, intent: PduIntent, reply: FastifyReply) {
        const accepted = applyPduIntent(pdu, intent)
        reply.code(accepted ? 202 : 409)
        return { accepted }
    }

    /* ---- reads ---- */

    app.get('/api/pdus', async () => {
        const pdus: PduSnapshot[] = []
        for (const id of app.pdus.keys()) {
            const snap = getPduSnapshot(id)
            if (snap) pdus.push(snap)
        }
        return { pdus }
    })

    app.get<IdParams>('/api/pdus/:id', async (req, reply) => {
        const snap = app.pdus.has(req.params.id) ? getPduSnapshot(req.params.id) : null
        if (!snap) {
            reply.code(404)
            return { ok: false, error: 'unknown pdu' }
        }
        return snap
    })

    app.get<IdParams>('/api/pdus/:id/health', async (req, reply) => {
        const pdu = lookup(req.params.id, reply)
        if (!pdu) return { ok: false, error: 'unknown pdu' }
        return pdu.getHealth()
    })

    /* ---- connection ---- */

    app.post<IdParams>('/api/pdus/:id/connect', async (req, reply) => {
        const pdu = lookup(req.params.id, reply)
        if (!pdu) return { ok: false, error: 'unknown pdu' }
        return answer(pdu, { action: 'connect' }, reply)
    })

    app.post<IdParams>('/api/pdus/:id/disconnect', async (req, reply) => {
        const pdu = lookup(req.params.id, reply)
        if (!pdu) return { ok: false, error: 'unknown pdu' }
        return answer(pdu, { action: 'disconnect' }, reply)
    })

    /* ---- outlets + groups ---- */

    for (const target of ['outlets', 'groups'] as const) {
        app.post<IndexParams>(`/api/pdus/:id/${target}/:index`, async (req, reply) => {
            const pdu = lookup(req.params.id, reply)
            if (!pdu) return { ok: false, error: 'unknown pdu' }

            const index = parseIndex(req.params.index)
            const { state } = readBody(req.body)
            if (index === null || typeof state !== 'boolean') {
                reply.code(400)
                return { ok: false, error: 'index (integer >= 1) and state (boolean) required' }
            }

            if (index > controlCount(pdu, target)) {
                reply.code(404)
                return { ok: false, error: `${target === 'outlets' ? 'outlet' : 'group'} ${index} does not exist` }
            }

            const action = target === 'outlets' ? 'toggle-outlet' : 'toggle-group'
            return answer(pdu, { action, index, state }, reply)
        })

        app.post<IndexParams>(`/api/pdus/:id/${target}/:index/cycle`, async (req, reply) => {
            const pdu = lookup(req.params.id, reply)
            if (!pdu) return { ok: false, error: 'unknown pdu' }

            const index = parseIndex(req.params.index)
            if (index === null) {
                reply.code(400)
                return { ok: false, error: 'index (integer >= 1) required' }
            }

            if (index > controlCount(pdu, target)) {
                reply.code(404)
                return { ok: false, error: `${target === 'outlets' ? 'outlet' : 'group'} ${index} does not exist` }
            }

            const action = target === 'outlets' ? 'cycle-outlet' : 'cycle-group'
            return answer(pdu, { action, index }, reply)
        })
    }

    /* ---- confirmation ---- */

    app.post<IdParams>('/api/pdus/:id/confirm', async (req, reply) => {
        const pdu = lookup(req.params.id, reply)
        if (!pdu) return { ok: false, error: 'unknown pdu' }
        return answer(pdu, { action: 'confirm' }, reply)
    })

    app.post<IdParams>('/api/pdus/:id/cancel', async (req, reply) => {
        const pdu = lookup(req.params.id, reply)
        if (!pdu) return { ok: false, error: 'unknown pdu' }
        return answer(pdu, { action: 'cancel' }, reply)
    })

    /* ---- mode + broadcast ---- */

    app.put<IdParams>('/api/pdus/:id/mode', async (req, reply) => {
        const pdu = lookup(req.params.id, reply)
        if (!pdu) return { ok: false, error: 'unknown pdu' }

        const { mode } = readBody(req.body)
        if (!isPowerMode(mode)) {
            reply.code(400)
            return { ok: false, error: 'mode must be "on-off" or "cycle"' }
        }
        const accepted = applyPduIntent(pdu, { action: 'set-mode', mode })
        reply.code(202)
        return { accepted, mode: pdu.getMode() }
    })

    app.post<IdParams>('/api/pdus/:id/group-trigger', async (req, reply) => {
        const pdu = lookup(req.params.id, reply)
        if (!pdu) return { ok: false, error: 'unknown pdu' }

        const { name } = readBody(req.body)
        if (typeof name !== 'string' || name.trim() === '') {
            reply.code(400)
            return { ok: false, error: 'name (string) required' }
        }
        return answer(pdu, { action: 'trigger-group', name }, reply)
    })
}

export default pduRoutes
