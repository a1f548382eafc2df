// services/monitor/src/plugins/ws.ts

import fp from 'fastify-plugin'
import websocket from '@fastify/websocket'
import type { FastifyInstance, FastifyRequest } from 'fastify'
import type { RawData, WebSocket as WSSocket } from 'ws'

import { createLogger, LogChannel, type ChannelLogger } from '@classroom-signal/logging'
import type { ConnectionSeverity, PresentationPort } from '../core/monitor/types.js'
import { errorMessage } from '../devices/signal-link/utils.js'

export type PresentationMessage =
    | { type: 'connection.status', text: string, severity: ConnectionSeverity }
    | { type: 'student.changed', studentId: number }
    | { type: 'log.updated' }

/** The part of a socket the broadcaster needs. */
export interface BroadcastTarget {
    readonly readyState: number
    readonly OPEN: number
    send(data: string): void
}

/**
 * PresentationPort that forwards every callback to all open sockets as a
 * small JSON frame. Clients re-read state over HTTP.
 */
export class SocketBroadcastPresentation implements PresentationPort {
    private readonly sockets: Set<BroadcastTarget>
    private readonly log: ChannelLogger

    constructor(sockets: Set<BroadcastTarget>, log: ChannelLogger) {
        this.sockets = sockets
        this.log = log
    }

    onConnectionStatus(text: string, severity: ConnectionSeverity): void {
        this.broadcast({ type: 'connection.status', text, severity })
    }

    onStudentStatusChanged(studentId: number): void {
        this.broadcast({ type: 'student.changed', studentId })
    }

    onLogUpdated(): void {
        this.broadcast({ type: 'log.updated' })
    }

    private broadcast(msg: PresentationMessage): void {
        const payload = JSON.stringify(msg)
        for (const ws of this.sockets) {
            if (ws.readyState !== ws.OPEN) continue
            try {
                ws.send(payload)
            } catch (err) {
                this.log.debug('broadcast to socket failed', { type: msg.type, err: errorMessage(err) })
            }
        }
    }
}

function parseClientMessageType(data: RawData): string | null {
    const buf = Array.isArray(data)
        ? Buffer.concat(data)
        : data instanceof ArrayBuffer ? Buffer.from(data) : data
    try {
        const parsed: unknown = JSON.parse(buf.toString('utf8'))
        if (typeof parsed !== 'object' || parsed === null || !('type' in parsed)) return null
        return typeof parsed.type === 'string' ? parsed.type : null
    } catch {
        return null
    }
}

export default fp(async function wsPlugin(app: FastifyInstance) {
    const { channel } = createLogger('monitor:ws')
    const logWs = channel(LogChannel.websocket)

    await app.register(websocket, {
        options: {
            perMessageDeflate: true,
            clientTracking: true
        }
    })

    const sockets = new Set<WSSocket>()
    const detach = app.monitor.attachPresentation(new SocketBroadcastPresentation(sockets, logWs))

    // Handler signature: (socket, request)
    app.get('/ws', { websocket: true }, (socket: WSSocket, _req: FastifyRequest) => {
        sockets.add(socket)

        try {
            const status = app.monitor.connectionStatus()
            socket.send(
                JSON.stringify({
                    type: 'welcome',
                    serverTime: new Date().toISOString()
                })
            )
            socket.send(JSON.stringify({ type: 'connection.status', ...status }))
            logWs.info('client connected')
        } catch (e) {
            logWs.error('failed to send initial frames', { err: errorMessage(e) })
        }

        socket.on('message', (data: RawData) => {
            const type = parseClientMessageType(data)
            if (type === null) {
                logWs.debug('ignoring malformed client frame')
                return
            }

            if (type === 'ping') {
                socket.send(JSON.stringify({ type: 'pong', ts: Date.now() }))
                return
            }

            logWs.debug('ignoring client frame', { type })
        })

        socket.on('close', () => {
            sockets.delete(socket)
            logWs.info('client disconnected')
        })
    })

    app.addHook('onClose', async () => {
        detach()
        for (const ws of sockets) {
            ws.terminate()
        }
        sockets.clear()
    })
}, {
    name: 'ws-plugin',
    dependencies: ['classroom-plugin']
})
