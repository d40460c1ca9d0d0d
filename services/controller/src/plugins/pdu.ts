// services/controller/src/plugins/pdu.ts

import type { FastifyInstance, FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'

import {
    createLogger,
    LogChannel,
    type ChannelLogger,
    type ClientLogBuffer,
} from '@pdu-console/logging'

import { BroadcastBus } from '../core/events/BroadcastBus.js'
import { createPduSnapshot, removePduSnapshot, setPduSnapshot } from '../core/state.js'
import { PduStateAdapter } from '../adapters/pdu.adapter.js'
import { PduSessionService } from '../devices/pdu/PduSessionService.js'
import type { GroupBroadcast } from '../devices/pdu/BroadcastCoordinator.js'
import { netTransportFactory, type TransportFactory } from '../devices/pdu/transport.js'
import type { PduConfig, PduEvent, PduEventSink } from '../devices/pdu/types.js'
import { buildPduConfigsFromEnv, errorMessage, parseBoolSafe, parseIntSafe } from '../devices/pdu/utils.js'

export interface PduPluginOptions {
    /** Replaces the env-derived configs. */
    configs?: PduConfig[]
    /** Replaces the TCP transport, one instance per PDU. */
    transportFactory?: TransportFactory
}

// ---- Fastify decoration ----------------------------------------------------

declare module 'fastify' {
    interface FastifyInstance {
        pdus: Map<string, PduSessionService>
        clientBuf: ClientLogBuffer
    }
}

// ---- Event sink using service logging --------------------------------------

class PduLoggerEventSink implements PduEventSink {
    private readonly logPdu: ChannelLogger
    private readonly logBroadcast: ChannelLogger

    constructor(app: FastifyInstance) {
        const { channel } = createLogger('pdu', app.clientBuf)
        this.logPdu = channel(LogChannel.pdu)
        this.logBroadcast = channel(LogChannel.broadcast)
    }

    publish(evt: PduEvent): void {
        const pdu = evt.pduId

        switch (evt.kind) {
            case 'pdu-log': {
                this.logPdu[evt.level](`[${pdu}] ${evt.message}`, { pduId: pdu })
                break
            }

            case 'pdu-status': {
                const line = `kind=${evt.kind} pdu=${pdu} status="${evt.status.text}"`
                if (evt.status.severity === 'fault') this.logPdu.warn(line)
                else this.logPdu.info(line)
                break
            }

            case 'pdu-connection-changed': {
                this.logPdu.info(
                    `kind=${evt.kind} pdu=${pdu} connected=${evt.connected} authenticated=${evt.authenticated}`
                )
                break
            }

            case 'pdu-mode-changed': {
                this.logPdu.info(`kind=${evt.kind} pdu=${pdu} mode=${evt.mode}`)
                break
            }

            case 'pdu-command-armed': {
                this.logPdu.info(
                    `kind=${evt.kind} pdu=${pdu} target=${evt.pending.kind}:${evt.pending.index} desc="${evt.pending.description}"`
                )
                break
            }

            case 'pdu-command-cleared': {
                this.logPdu.debug(`kind=${evt.kind} pdu=${pdu} reason=${evt.reason}`)
                break
            }

            case 'pdu-command-sent': {
                this.logPdu.debug(
                    `kind=${evt.kind} pdu=${pdu} command=${JSON.stringify(evt.command)} user=${evt.userInitiated}`
                )
                break
            }

            case 'pdu-broadcast': {
                this.logBroadcast.info(
                    `kind=${evt.kind} pdu=${pdu} role=${evt.role} group="${evt.groupName}" index=${evt.groupIndex} action=${evt.action}`
                )
                break
            }

            // Model refreshes arrive every poll
            case 'pdu-outlets-updated':
            case 'pdu-groups-updated':
            case 'pdu-sensors-updated':
            case 'pdu-indicators-changed': {
                this.logPdu.debug(`kind=${evt.kind} pdu=${pdu}`)
                break
            }

            case 'pdu-health': {
                const { performance, errors } = evt.health
                this.logPdu.info(
                    `kind=${evt.kind} pdu=${pdu} sent=${performance.commandsSent} received=${performance.responsesReceived} errors=${performance.errors} timeouts=${errors.timeoutErrors}`
                )
                break
            }

            case 'recoverable-error': {
                this.logPdu.warn(`kind=${evt.kind} pdu=${pdu} category=${evt.category} error=${evt.error}`)
                break
            }

            case 'fatal-error': {
                this.logPdu.error(`kind=${evt.kind} pdu=${pdu} error=${evt.error}`)
                break
            }
        }
    }
}

// ---- Fanout sink: logger + state adapter -----------------------------------

class FanoutPduEventSink implements PduEventSink {
    private readonly sinks: PduEventSink[]

    constructor(private readonly log: ChannelLogger, ...sinks: PduEventSink[]) {
        this.sinks = sinks
    }

    publish(evt: PduEvent): void {
        for (const sink of this.sinks) {
            try {
                sink.publish(evt)
            } catch (err) {
                // A failing consumer must not reach the session
                this.log.error(`event sink failed kind=${evt.kind} pdu=${evt.pduId}`, {
                    err: errorMessage(err),
                })
            }
        }
    }
}

// ---- Plugin implementation -------------------------------------------------

const pduPlugin: FastifyPluginAsync<PduPluginOptions> = async (app: FastifyInstance, opts) => {
    const env = process.env
    const { channel } = createLogger('pdu-plugin', app.clientBuf)
    const logPlugin = channel(LogChannel.app)

    // 1) Build configs
    const enabled = opts.configs !== undefined || parseBoolSafe(env.PDU_ENABLED, true)
    const configs = opts.configs ?? (enabled ? buildPduConfigsFromEnv(env) : [])
    if (configs.length === 0) {
        logPlugin.warn(enabled ? 'no PDU endpoint configured (set PDU_HOST or PDU_ENDPOINTS_JSON)' : 'PDU control disabled')
    }

    // 2) Instantiate sinks and the shared broadcast channel
    const loggerSink = new PduLoggerEventSink(app)
    const stateAdapter = new PduStateAdapter()

    const pduEvents: PduEventSink = new FanoutPduEventSink(
        logPlugin,
        loggerSink,
        {
            publish(evt: PduEvent): void {
                stateAdapter.handle(evt)
            },
        }
    )

    const bus = new BroadcastBus<GroupBroadcast>({
        queueCapacity: parseIntSafe(env.PDU_BROADCAST_QUEUE, 256),
        logger: channel(LogChannel.broadcast),
    })

    // 3) Instantiate one session per PDU
    const transportFactory = opts.transportFactory ?? netTransportFactory
    const pdus = new Map<string, PduSessionService>()

    for (const config of configs) {
        setPduSnapshot(createPduSnapshot({
            id: config.id,
            label: config.label,
            host: config.host,
            port: config.port,
            mode: config.defaultMode,
        }))
        pdus.set(config.id, new PduSessionService(config, {
            events: pduEvents,
            transport: transportFactory(config),
            bus,
        }))
        logPlugin.info(`pdu registered id=${config.id} host=${config.host}:${config.port}`)
    }

    app.decorate('pdus', pdus)

    // 4) Lifecycle hooks: start/stop every session
    app.addHook('onReady', async () => {
        logPlugin.info(`starting ${pdus.size} PDU session(s)`)
        await Promise.all([...pdus.values()].map(pdu => pdu.start()))
    })

    app.addHook('onClose', async () => {
        logPlugin.info('stopping PDU sessions')
        for (const [id, pdu] of pdus) {
            await pdu.stop().catch((err: unknown) => {
                logPlugin.warn(`error stopping PDU session id=${id}`, { err: errorMessage(err) })
            })
            removePduSnapshot(id)
        }
    })
}

export default fp(pduPlugin, {
    name: 'pdu-plugin',
})
