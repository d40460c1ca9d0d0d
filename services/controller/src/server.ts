import fs from 'node:fs'
import path from 'node:path'
import { config as dotenvConfig } from 'dotenv'
import type { FastifyInstance } from 'fastify'
import {
    createLogger,
    LogChannel
} from '@pdu-console/logging'
import { errorMessage } from './devices/pdu/utils.js'

/**
 * Load environment variables with a clear precedence:
 *   1) .env
 *   2) .env.{NODE_ENV}
 *   3) .env.local
 * Later files override earlier ones.
 */
function loadEnv() {
    const cwd = process.cwd()
    const env = String(process.env.NODE_ENV || 'development')
    const files = [
        path.resolve(cwd, '.env'),
        path.resolve(cwd, `.env.${env}`),
        path.resolve(cwd, '.env.local')
    ]

    for (const file of files) {
        if (fs.existsSync(file)) {
            dotenvConfig({ path: file, override: true })
        }
    }
}

async function start() {
    loadEnv()

    // app.ts reads request-logging env at import time, so load it after dotenv
    const { buildApp } = await import('./app.js')

    const { channel } = createLogger('controller')
    const logApp = channel(LogChannel.app)

    const PORT = Number(process.env.API_PORT ?? 3000)
    const HOST = process.env.API_HOST ?? process.env.HOST ?? '0.0.0.0'

    let app: FastifyInstance | null = null

    try {
        app = buildApp()
        await app.listen({ port: PORT, host: HOST })

        const env = process.env.NODE_ENV ?? 'development'
        logApp.info(`listening host=${HOST} port=${PORT} env=${env} pdus=${app.pdus.size}`)

        // Graceful shutdown
        const running = app
        const shutdown = async (signal: NodeJS.Signals) => {
            try {
                logApp.info(`received ${signal}, shutting down`)
                await running.close()
                logApp.info('controller closed')
                process.exit(0)
            } catch (err) {
                logApp.error('error during shutdown', { err: errorMessage(err) })
                process.exit(1)
            }
        }
        process.on('SIGINT', () => void shutdown('SIGINT'))
        process.on('SIGTERM', () => void shutdown('SIGTERM'))
    } catch (err) {
        // Boot failure (bad PDU_ENDPOINTS_JSON, port in use)
        logApp.error(`failed to start err="${errorMessage(err)}"`)
        await app?.close().catch((closeErr: unknown) => {
            logApp.warn('error closing after failed start', { err: errorMessage(closeErr) })
        })
        process.exit(1)
    }
}

void start()
