import Fastify, {
    type FastifyInstance,
    type FastifyServerOptions,
    type FastifyRequest,
    type FastifyReply
} from 'fastify'
import cors from '@fastify/cors'

import { createLogger, LogChannel } from '@classroom-signal/logging'

import classroomPlugin, { type ClassroomPluginOptions } from './plugins/classroom.js'
import wsPlugin from './plugins/ws.js'
import classroomRoutes from './routes/classroom.js'

// ---- Request logging config (env) ----
const REQUEST_VERBOSE = String(process.env.REQUEST_VERBOSE ?? 'false').toLowerCase() === 'true'
const REQUEST_SAMPLE = Math.max(1, Number(process.env.REQUEST_SAMPLE ?? '1') || 1)
// --------------------------------------

let reqCounter = 0

export function buildApp(
    opts: FastifyServerOptions = {},
    classroom: ClassroomPluginOptions = {}
): FastifyInstance {
    const { channel } = createLogger('monitor')
    const logApp = channel(LogChannel.app)
    const logReq = channel(LogChannel.request)

    const startedAt = new Map<string, number>()

    const app = Fastify({ logger: false, ...opts })

    // CORS
    void app.register(cors, { origin: true })

    // Monitor first: ws and routes read app.monitor
    void app.register(classroomPlugin, classroom)
    void app.register(wsPlugin)
    void app.register(classroomRoutes)

    // ---------- Request/Response logging hooks ----------
    app.addHook('onRequest', async (req: FastifyRequest) => {
        const shouldLog = ++reqCounter % REQUEST_SAMPLE === 0
        if (!shouldLog) return

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

        if (REQUEST_VERBOSE) {
            const outLen = reply.getHeader('content-length') ?? null
            logReq.debug('response detail', { id: req.id, bytesOut: outLen, ms })
        }
    })
    // ---------------------------------------------------

    // Health
    app.get('/health', async () => ({ status: 'ok' }))

    app.get('/version', async () => ({ name: 'classroom-signal-monitor', version: '0.1.0' }))

    logApp.info('monitor app built')
    return app
}
