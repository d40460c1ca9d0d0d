import Fastify, {
    type FastifyInstance,
    type FastifyServerOptions,
    type FastifyRequest,
    type FastifyReply
} from 'fastify'
import cors from '@fastify/cors'

import {
    createLogger,
    makeClientBuffer,
    LogChannel,
    type ClientLogBuffer
} from '@pdu-console/logging'

import wsPlugin from './plugins/ws.js'
import pduPlugin, { type PduPluginOptions } from './plugins/pdu.js'
import pduRoutes from './routes/pdus.js'
import { setMetaStatus } from './core/state.js'

declare module 'fastify' {
    interface FastifyInstance {
        clientBuf: ClientLogBuffer
    }
}

export interface BuildAppOptions extends FastifyServerOptions {
    pdu?: PduPluginOptions
}

// ---- Request logging config (env) ----
const REQUEST_VERBOSE = String(process.env.REQUEST_VERBOSE ?? 'false').toLowerCase() === 'true'
const REQUEST_SAMPLE = Math.max(1, Number(process.env.REQUEST_SAMPLE ?? '1') || 1)
// --------------------------------------

export const APP_NAME = 'pdu-console-controller'
export const APP_VERSION = '0.1.0'

export function buildApp(opts: BuildAppOptions = {}): FastifyInstance {
    const { pdu: pduOptions = {}, ...fastifyOptions } = opts

    const clientBuf: ClientLogBuffer = makeClientBuffer()
    const { channel } = createLogger('controller', clientBuf)
    const logApp = channel(LogChannel.app)
    const logReq = channel(LogChannel.request)

    const startedAt = new Map<string, number>()
    let reqCounter = 0

    const app = Fastify({ logger: false, ...fastifyOptions })
    app.decorate('clientBuf', clientBuf)

    // CORS
    const corsOrigin = process.env.CORS_ORIGIN?.trim()
    void app.register(cors, { origin: corsOrigin ? corsOrigin.split(',').map(s => s.trim()) : true })

    // PDU sessions first: the WS plugin and the routes read app.pdus
    void app.register(pduPlugin, pduOptions)
    void app.register(wsPlugin)
    void app.register(pduRoutes)

    // ---------- Request/Response logging hooks ----------
    app.addHook('onRequest', async (req: FastifyRequest) => {
        if (++reqCounter % REQUEST_SAMPLE !== 0) return

        startedAt.set(req.id, Date.now())
        logReq.info(`${req.method} ${req.url}`)

        if (REQUEST_VERBOSE) {
            logReq.debug('request detail', { id: req.id, ip: req.ip })
        }
    })

    app.addHook('onResponse', async (req: FastifyRequest, reply: FastifyReply) => {
        const start = startedAt.get(req.id)
        if (start === undefined) return
        startedAt.delete(req.id)

        const ms = Date.now() - start
        logReq.info(`${req.method} ${req.url} → ${reply.statusCode} (${ms} ms)`)
    })
    // ---------------------------------------------------

    app.addHook('onReady', async () => {
        setMetaStatus('ready')
    })

    // Health / version
    app.get('/health', async () => ({ ok: true }))
    app.get('/version', async () => ({ name: APP_NAME, version: APP_VERSION }))

    app.setNotFoundHandler((_req, reply) => {
        reply.status(404).send({ ok: false, error: 'Not found' })
    })

    logApp.info('controller app built')
    return app
}
