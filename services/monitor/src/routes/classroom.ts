// services/monitor/src/routes/classroom.ts
import type { FastifyError, FastifyPluginAsync } from 'fastify'

import { createLogger, LogChannel } from '@classroom-signal/logging'
import { LOG_CATEGORIES, isLogCategory, type LogCategory } from '../core/activity/types.js'
import { parseStudentId } from '../core/protocol/codec.js'

type ConnectBody = { port?: string }
type InjectBody = { line: string }
type FilterBody = { category: LogCategory, enabled: boolean }
type LogQuery = { categories?: string }
type StudentParams = { id: string }

/** Accepts a plain-text body or `{ roster: string }`. */
function rosterText(body: unknown): string | null {
    if (typeof body === 'string') return body
    if (typeof body === 'object' && body !== null && 'roster' in body && typeof body.roster === 'string') {
        return body.roster
    }
    return null
}

/** Comma-separated category list; null if any entry is unknown. */
function parseCategories(raw: string): LogCategory[] | null {
    const out: LogCategory[] = []
    for (const part of raw.split(',')) {
        const c = part.trim().toUpperCase()
        if (!c) continue
        if (!isLogCategory(c)) return null
        out.push(c)
    }
    return out
}

const classroomRoutes: FastifyPluginAsync = async (app) => {
    const { channel } = createLogger('monitor:routes')
    const logRoster = channel(LogChannel.roster)

    // Schema failures answer in the same shape as every other rejection.
    app.setErrorHandler((err: FastifyError, _req, reply) => {
        const code = err.validation ? 400 : (err.statusCode ?? 500)
        reply.code(code).send({ ok: false, error: err.message })
    })

    /* ---------------------------------------------------------------------- */
    /*  Link                                                                  */
    /* ---------------------------------------------------------------------- */

    app.get('/api/ports', async () => {
        const ports = await app.monitor.listPorts()
        return { ok: true, ports }
    })

    app.get('/api/link', async () => ({ ok: true, link: app.monitor.linkSnapshot() }))

    app.post<{ Body: ConnectBody | undefined }>('/api/link/connect', {
        schema: {
            body: {
                type: 'object',
                properties: { port: { type: 'string', minLength: 1 } },
                additionalProperties: false,
            },
        },
    }, async (req) => {
        const connected = await app.monitor.connect(req.body?.port)
        return { ok: connected, link: app.monitor.linkSnapshot() }
    })

    app.post('/api/link/disconnect', async () => {
        await app.monitor.disconnect()
        return { ok: true, link: app.monitor.linkSnapshot() }
    })

    app.post<{ Body: InjectBody }>('/api/link/inject', {
        schema: {
            body: {
                type: 'object',
                required: ['line'],
                properties: { line: { type: 'string' } },
            },
        },
    }, async (req) => {
        app.monitor.inject(req.body.line)
        return { ok: true }
    })

    /* ---------------------------------------------------------------------- */
    /*  Roster + students                                                     */
    /* ---------------------------------------------------------------------- */

    app.get('/api/roster', async () => ({ ok: true, students: app.monitor.roster() }))

    app.put<{ Body: unknown }>('/api/roster', async (req, reply) => {
        const text = rosterText(req.body)
        if (text === null) {
            reply.code(400)
            return { ok: false, error: 'roster text (string) required' }
        }

        const result = app.monitor.updateAllowList(text)
        logRoster.info(
            `roster updated allowed=${result.allowed} removed=${result.removedStudents.length} issues=${result.issues.length}`
        )
        return { ok: true, ...result }
    })

    app.get('/api/students', async () => ({ ok: true, students: app.monitor.students() }))

    app.delete('/api/students', async () => ({ ok: true, cleared: app.monitor.clearStatuses() }))

    app.post<{ Params: StudentParams }>('/api/students/:id/resolve', async (req, reply) => {
        const studentId = parseStudentId(req.params.id)
        if (studentId === null) {
            reply.code(400)
            return { ok: false, error: 'student id must be 6 digits' }
        }

        const student = app.monitor.resolve(studentId)
        if (!student) {
            reply.code(404)
            return { ok: false, error: `no status for student ${studentId}` }
        }
        return { ok: true, student }
    })

    /* ---------------------------------------------------------------------- */
    /*  Activity log                                                          */
    /* ---------------------------------------------------------------------- */

    app.get<{ Querystring: LogQuery }>('/api/log', async (req, reply) => {
        const raw = req.query.categories
        let categories: LogCategory[] | undefined
        if (raw !== undefined) {
            const parsed = parseCategories(raw)
            if (parsed === null) {
                reply.code(400)
                return { ok: false, error: `categories must be from ${LOG_CATEGORIES.join(', ')}` }
            }
            categories = parsed
        }

        return {
            ok: true,
            filter: app.monitor.logFilter(),
            entries: app.monitor.logEntries(categories),
        }
    })

    app.put<{ Body: FilterBody }>('/api/log/filter', {
        schema: {
            body: {
                type: 'object',
                required: ['category', 'enabled'],
                properties: {
                    category: { type: 'string', enum: [...LOG_CATEGORIES] },
                    enabled: { type: 'boolean' },
                },
            },
        },
    }, async (req) => {
        app.monitor.setLogFilter(req.body.category, req.body.enabled)
        return { ok: true, filter: app.monitor.logFilter() }
    })

    app.delete('/api/log', async () => {
        app.monitor.clearLog()
        return { ok: true }
    })

    app.get('/api/log/export', async (_req, reply) => {
        reply.type('text/plain; charset=utf-8')
        return app.monitor.exportLog()
    })
}

export default classroomRoutes
