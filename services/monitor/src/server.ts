import fs from 'node:fs'
import path from 'node:path'
import { config as dotenvConfig } from 'dotenv'
import type { FastifyInstance } from 'fastify'
import {
    createLogger,
    LogChannel
} from '@classroom-signal/logging'

import { errorMessage } from './devices/signal-link/utils.js'

/**
 * Load environment variables with a clear precedence:
 *   1) .env
 *   2) .env.{NODE_ENV}
 *   3) .env.local
 * Later files override earlier ones.
 */
function loadEnv(): void {
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

async function start(): Promise<void> {
    loadEnv()

    // app.ts reads env at module load, so it is imported after loadEnv()
    const { buildApp } = await import('./app.js')

    const { channel } = createLogger('monitor')
    const logMon = channel(LogChannel.monitor)

    const PORT = Number(process.env.API_PORT ?? 3000)
    const HOST = process.env.API_HOST ?? '0.0.0.0'

    let app: FastifyInstance | null = null

    try {
        app = buildApp()
        await app.listen({ port: PORT, host: HOST })

        const env = process.env.NODE_ENV ?? 'development'
        logMon.info(`listening host=${HOST} port=${PORT} env=${env}`)

        // Graceful shutdown
        const shutdown = async (signal: NodeJS.Signals, running: FastifyInstance) => {
            try {
                logMon.info(`received ${signal}, shutting down`)
                await running.close()
                logMon.info('monitor closed')
                process.exit(0)
            } catch (err) {
                logMon.error('error during shutdown', { err: errorMessage(err) })
                process.exit(1)
            }
        }
        const running = app
        process.on('SIGINT', () => void shutdown('SIGINT', running))
        process.on('SIGTERM', () => void shutdown('SIGTERM', running))
    } catch (err) {
        logMon.error(`failed to start err="${errorMessage(err)}"`)
        if (app) {
            await app.close().catch((closeErr: unknown) => {
                logMon.warn('error closing after failed start', { err: errorMessage(closeErr) })
            })
        }
        process.exit(1)
    }
}

void start()
