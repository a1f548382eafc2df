// services/monitor/src/plugins/classroom.ts

import type { FastifyInstance, FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'

import {
    createLogger,
    LogChannel,
    type ChannelLogger,
} from '@classroom-signal/logging'
import { ClassroomMonitor } from '../core/monitor/ClassroomMonitor.js'
import { buildClassroomMonitorConfigFromEnv } from '../core/monitor/config.js'
import type { ClassroomMonitorConfig } from '../core/monitor/types.js'
import { SerialPortTransport } from '../devices/signal-link/SerialPortTransport.js'
import type {
    LinkTransport,
    SignalLinkEvent,
    SignalLinkEventSink,
} from '../devices/signal-link/types.js'
import { describeReconnectTrigger, errorMessage } from '../devices/signal-link/utils.js'

// ---- Fastify decoration ----------------------------------------------------

declare module 'fastify' {
    interface FastifyInstance {
        monitor: ClassroomMonitor
    }
}

export interface ClassroomPluginOptions {
    /** Defaults to the real serial port transport. */
    transport?: LinkTransport
    /** Defaults to the environment. */
    config?: ClassroomMonitorConfig
}

// ---- Event sink using service logging ---------------------------------------

class SignalLinkLoggerEventSink implements SignalLinkEventSink {
    private readonly logLink: ChannelLogger
    private readonly logHealth: ChannelLogger
    private readonly logProto: ChannelLogger

    constructor() {
        const { channel } = createLogger('signal-link')
        this.logLink = channel(LogChannel.link)
        this.logHealth = channel(LogChannel.health)
        this.logProto = channel(LogChannel.protocol)
    }

    publish(evt: SignalLinkEvent): void {
        const ts = new Date(evt.at).toISOString()

        switch (evt.kind) {
            case 'link-state-changed':
                this.logLink.debug(`kind=link-state-changed ts=${ts} from=${evt.from} to=${evt.to} port=${evt.port ?? '<none>'}`)
                break

            case 'link-connected':
                this.logLink.info(`kind=link-connected ts=${ts} port=${evt.port} baudRate=${evt.baudRate} mode=${evt.mode}`)
                break

            case 'link-open-failed':
                this.logLink.warn(`kind=link-open-failed ts=${ts} port=${evt.port} mode=${evt.mode} error=${evt.error}`)
                break

            case 'link-reconnecting':
                this.logLink.info(
                    `kind=link-reconnecting ts=${ts} port=${evt.port} trigger=${evt.trigger} (${describeReconnectTrigger(evt.trigger)})`
                )
                break

            case 'link-disconnected':
                this.logLink.info(`kind=link-disconnected ts=${ts} port=${evt.port ?? '<none>'}`)
                break

            case 'link-fault':
                this.logLink.warn(`kind=link-fault ts=${ts} port=${evt.port ?? '<none>'} error=${evt.error}`)
                break

            case 'close-timeout':
                this.logLink.warn(`kind=close-timeout ts=${ts} port=${evt.port} timeoutMs=${evt.timeoutMs}`)
                break

            case 'configuration-error':
                this.logLink.warn(`kind=configuration-error ts=${ts} error=${evt.error}`)
                break

            case 'recoverable-error':
                this.logLink.warn(`kind=recoverable-error ts=${ts} error=${evt.error}`)
                break

            case 'ports-listed':
                this.logLink.debug(`kind=ports-listed ts=${ts} count=${evt.ports.length}`)
                break

            case 'heartbeat-warning':
                this.logHealth.warn(`kind=heartbeat-warning ts=${ts} port=${evt.port} silentMs=${evt.silentMs}`)
                break

            case 'self-test-passed':
                this.logHealth.debug(`kind=self-test-passed ts=${ts} port=${evt.port}`)
                break

            case 'self-test-failed':
                this.logHealth.warn(`kind=self-test-failed ts=${ts} port=${evt.port} reason=${evt.reason}`)
                break

            case 'line-received':
                // one per radio message; debug only
                this.logProto.debug(`kind=line-received ts=${ts} simulated=${evt.simulated} line=${evt.line}`)
                break

            case 'line-rejected':
                this.logProto.warn(`kind=line-rejected ts=${ts} reason=${evt.reason} detail=${evt.detail} line=${evt.line}`)
                break
        }
    }
}

// ---- Plugin implementation -------------------------------------------------

const classroomPlugin: FastifyPluginAsync<ClassroomPluginOptions> = async (
    app: FastifyInstance,
    opts: ClassroomPluginOptions
) => {
    const { channel } = createLogger('classroom-plugin')
    const logPlugin = channel(LogChannel.app)

    const config = opts.config ?? buildClassroomMonitorConfigFromEnv()
    const { link } = config

    logPlugin.info(
        `signal-link config port=${config.port ?? '<none>'} baudRate=${link.baudRate} healthIntervalMs=${link.healthIntervalMs} forcedRefreshMs=${link.forcedRefreshMs} heartbeatTimeoutMs=${link.heartbeatTimeoutMs} heartbeatReconnectMs=${link.heartbeatReconnectMs}`
    )

    const monitor = new ClassroomMonitor(config, {
        transport: opts.transport ?? new SerialPortTransport(),
        linkEvents: [new SignalLinkLoggerEventSink()],
        activityLogger: createLogger('activity').channel(LogChannel.activity),
        log: channel(LogChannel.monitor),
    })

    // Expose on Fastify instance so routes and the ws plugin can use it.
    app.decorate('monitor', monitor)

    app.addHook('onReady', async () => {
        logPlugin.info('starting classroom monitor')
        await monitor.start().catch((err: unknown) => {
            logPlugin.warn('error starting classroom monitor', { err: errorMessage(err) })
        })
    })

    app.addHook('onClose', async () => {
        logPlugin.info('stopping classroom monitor')
        await monitor.stop().catch((err: unknown) => {
            logPlugin.warn('error stopping classroom monitor', { err: errorMessage(err) })
        })
    })
}

export default fp(classroomPlugin, {
    name: 'classroom-plugin',
})
