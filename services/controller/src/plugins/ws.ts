import fp from 'fastify-plugin'
import websocket from '@fastify/websocket'
import type { FastifyInstance, FastifyRequest } from 'fastify'
import type { RawData, WebSocket as WSSocket } from 'ws'
import {
    createLogger,
    makeClientBuffer,
    LogChannel,
    type ChannelLogger,
    type ClientLog,
    type ClientLogLevel
} from '@pdu-console/logging'
import { getSnapshot, stateEvents, type AppState, type PatchEvent } from '../core/state.js'
import {
    attachClientBuffer,
    getHistory as getLogHistory,
    onLog as onLogSubscribe
} from '../adapters/logs.adapter.js'
import { applyPduIntent, parsePduIntent } from '../devices/pdu/intents.js'
import { errorMessage } from '../devices/pdu/utils.js'

// ---------------------------
// Log filtering configuration
// ---------------------------
const LEVEL_ORDER: Record<ClientLogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    fatal: 50
}

function isLevel(v: string): v is ClientLogLevel {
    return v in LEVEL_ORDER
}

interface LogFilter {
    channels: Set<string> | null
    minLevel: number
    redact: ((s: string) => string) | null
}

function buildLogFilter(env: NodeJS.ProcessEnv, log: ChannelLogger): LogFilter {
    const allow = String(env.LOG_CHANNEL_ALLOWLIST ?? '').trim()
    const channels = allow
        ? new Set(
              allow
                  .split(',')
                  .map(s => s.trim().toLowerCase())
                  .filter(Boolean)
          )
        : null // null => every channel, subject to level

    const min = String(env.LOG_LEVEL_MIN ?? 'debug').toLowerCase()
    const minLevel = isLevel(min) ? LEVEL_ORDER[min] : LEVEL_ORDER.debug

    let redact: LogFilter['redact'] = null
    const pattern = env.LOG_REDACT_REGEX
    if (pattern) {
        try {
            const re = new RegExp(pattern, 'g')
            redact = (s: string) => s.replace(re, '██')
        } catch (e) {
            log.warn('LOG_REDACT_REGEX is not a valid pattern; redaction off', { err: errorMessage(e) })
        }
    }

    return { channels, minLevel, redact }
}

function filterAndTransform(filter: LogFilter, entries: ClientLog[]): ClientLog[] {
    const out: ClientLog[] = []
    for (const e of entries) {
        if (filter.channels && !filter.channels.has(e.channel)) continue
        if (LEVEL_ORDER[e.level] < filter.minLevel) continue
        out.push(filter.redact ? { ...e, message: filter.redact(e.message) } : e)
    }
    return out
}

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === 'object' && v !== null && !Array.isArray(v)
}

function decodeFrame(data: RawData): string {
    if (Array.isArray(data)) return Buffer.concat(data).toString('utf8')
    if (Buffer.isBuffer(data)) return data.toString('utf8')
    return Buffer.from(data).toString('utf8')
}

function snapshotFrame(snap: AppState): string {
    return JSON.stringify({
        type: 'state.snapshot',
        stateVersion: snap.version,
        data: snap
    })
}
// ---------------------------

export default fp(async function wsPlugin(app: FastifyInstance) {
    // Reuse the app's buffer so WS clients see every service log
    const clientBuf = app.hasDecorator('clientBuf') ? app.clientBuf : makeClientBuffer()

    const { channel } = createLogger('ws', clientBuf)
    const logWs = channel(LogChannel.websocket)
    const filter = buildLogFilter(process.env, logWs)
    const heartbeatLog = String(process.env.WS_HEARTBEAT_LOG ?? 'false').toLowerCase() === 'true'

    attachClientBuffer(clientBuf)

    await app.register(websocket, {
        options: {
            perMessageDeflate: true,
            clientTracking: true
        }
    })

    const sockets = new Set<WSSocket>()

    function broadcast(payload: string) {
        for (const ws of sockets) {
            if (ws.readyState !== ws.OPEN) continue
            try {
                ws.send(payload)
            } catch (e) {
                logWs.debug('send to client failed', { err: errorMessage(e) })
            }
        }
    }

    function sendLogHistory(socket: WSSocket, n: number) {
        if (n <= 0) return
        const filtered = filterAndTransform(filter, getLogHistory(n))
        if (filtered.length === 0) return
        socket.send(JSON.stringify({ type: 'logs.history', entries: filtered }))
    }

    // Live logs -> filter/transform -> broadcast
    const unsubscribeLogs = onLogSubscribe((entry: ClientLog) => {
        const filtered = filterAndTransform(filter, [entry])
        if (filtered.length === 0) return
        broadcast(JSON.stringify({ type: 'logs.append', entries: filtered }))
    })

    // pdu.command: the same intents the HTTP routes take
    function handlePduCommand(socket: WSSocket, payload: unknown) {
        const parsed = parsePduIntent(payload)
        if (!parsed.ok) {
            logWs.warn(`pdu.command rejected: ${parsed.error}`)
            socket.send(JSON.stringify({ type: 'pdu.command.result', ok: false, error: parsed.error }))
            return
        }

        const pdu = app.pdus.get(parsed.pduId)
        if (!pdu) {
            logWs.warn(`pdu.command: unknown pdu ${parsed.pduId}`)
            socket.send(JSON.stringify({ type: 'pdu.command.result', ok: false, error: 'unknown pdu' }))
            return
        }

        const accepted = applyPduIntent(pdu, parsed.intent)
        socket.send(JSON.stringify({
            type: 'pdu.command.result',
            ok: true,
            pduId: parsed.pduId,
            action: parsed.intent.action,
            accepted
        }))
    }

    // Handler signature: (socket, request)
    app.get('/ws', { websocket: true }, (socket: WSSocket, _req: FastifyRequest) => {
        sockets.add(socket)

        try {
            socket.send(
                JSON.stringify({
                    type: 'welcome',
                    serverTime: new Date().toISOString()
                })
            )

            const snap = getSnapshot()
            socket.send(snapshotFrame(snap))
            sendLogHistory(socket, snap.serverConfig.logs.snapshot)

            logWs.info('client connected')
        } catch (e) {
            logWs.error('failed to send initial frames', { err: errorMessage(e) })
        }

        socket.on('message', (data: RawData) => {
            let msg: unknown
            try {
                msg = JSON.parse(decodeFrame(data))
            } catch {
                logWs.debug('ignoring malformed client message')
                return
            }
            if (!isRecord(msg)) return

            try {
                switch (msg.type) {
                    case 'hello': {
                        socket.send(JSON.stringify({ type: 'ack', ok: true }))
                        return
                    }

                    case 'ping': {
                        socket.send(JSON.stringify({ type: 'pong', ts: Date.now() }))
                        if (heartbeatLog) logWs.debug('heartbeat pong sent')
                        return
                    }

                    // Resync after a missed patch
                    case 'subscribe': {
                        const payload = isRecord(msg.payload) ? msg.payload : {}
                        if (payload.includeSnapshot === true) {
                            socket.send(snapshotFrame(getSnapshot()))
                            sendLogHistory(socket, Number(payload.logsHistory ?? 0))
                        }
                        return
                    }

                    case 'pdu.command': {
                        handlePduCommand(socket, msg.payload)
                        return
                    }
                }
            } catch (e) {
                logWs.warn('failed to handle client message', { type: String(msg.type), err: errorMessage(e) })
            }
        })

        socket.on('close', () => {
            sockets.delete(socket)
            logWs.info('client disconnected')
        })
    })

    // --- Broadcast state changes ---
    const onPatch = (evt: PatchEvent) => {
        broadcast(
            JSON.stringify({
                type: 'state.patch',
                fromVersion: evt.from,
                toVersion: evt.to,
                patch: evt.patch
            })
        )
    }

    stateEvents.on('patch', onPatch)

    app.addHook('onClose', async () => {
        stateEvents.off('patch', onPatch)
        for (const ws of sockets) ws.terminate()
        sockets.clear()
        unsubscribeLogs()
    })
}, { name: 'ws-plugin', dependencies: ['pdu-plugin'] })
