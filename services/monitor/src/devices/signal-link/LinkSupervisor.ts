// services/monitor/src/devices/signal-link/LinkSupervisor.ts

import { decodeLine } from '../../core/protocol/codec.js'
import { TransportError } from '../../core/errors.js'
import {
    LinkState,
    type ConnectMode,
    type HealthCheckOutcome,
    type LinkHandle,
    type LinkTransport,
    type ReconnectTrigger,
    type SignalLinkConfig,
    type SignalLinkEvent,
    type SignalLinkEventSink,
    type SignalLinkStats,
    type StatusEventConsumer,
} from './types.js'
import { errorMessage, withTimeout } from './utils.js'

interface LinkSupervisorDeps {
    events: SignalLinkEventSink
    transport: LinkTransport
    statuses: StatusEventConsumer
}

/**
 * LinkSupervisor
 *
 * Owns the single connection to the radio bridge and keeps it usable for a
 * whole lesson without anyone touching it.
 *
 * - connect(port) opens the port, starts line delivery and the health loop.
 * - Every complete line counts as a heartbeat, is decoded, and valid events
 *   go to the status consumer in arrival order. Rejected lines are reported
 *   and dropped.
 * - The health loop reconnects on: forced refresh interval, closed handle,
 *   failed self-test, or prolonged silence. A failed reconnect leaves the
 *   loop running; the next tick tries again.
 * - disconnect() is the only way to stop; it suppresses auto-reconnect until
 *   the next connect().
 *
 * No I/O failure escapes: each one becomes an event plus a state change.
 */
export class LinkSupervisor {
    private readonly config: SignalLinkConfig
    private readonly deps: LinkSupervisorDeps

    private state: LinkState = LinkState.Disconnected
    private selectedPort: string | null = null

    private handle: LinkHandle | null = null
    // Listeners of a handle only act while its session is the live one.
    private sessionSeq = 0
    private liveSession = 0
    // Bumped by connect()/disconnect() so in-flight reconnects can tell they are stale.
    private epoch = 0

    private manualDisconnect = false

    private healthTimer: NodeJS.Timeout | null = null
    private healthInFlight: Promise<HealthCheckOutcome> | null = null
    private reconnecting: Promise<boolean> | null = null

    private lastHeartbeatAt = 0
    private lastSelfTestAt = 0
    private lastReconnectAt = 0

    private stats: SignalLinkStats = {
        linesReceived: 0,
        linesRejected: 0,
        reconnectAttempts: 0,
        reconnectSuccesses: 0,
        reconnectFailures: 0,
        lastHeartbeatAt: null,
        lastReconnectAt: null,
        lastSelfTestAt: null,
    }

    constructor(config: SignalLinkConfig, deps: LinkSupervisorDeps) {
        this.config = config
        this.deps = deps
    }

    /* ---------------------------------------------------------------------- */
    /*  Public API                                                            */
    /* ---------------------------------------------------------------------- */

    public getState(): LinkState {
        return this.state
    }

    public getSelectedPort(): string | null {
        return this.selectedPort
    }

    public getStats(): SignalLinkStats {
        return { ...this.stats }
    }

    public isConnected(): boolean {
        return this.state === LinkState.Connected && !!this.handle && this.handle.isOpen()
    }

    public isHealthLoopRunning(): boolean {
        return this.healthTimer !== null
    }

    public async listAvailablePorts(): Promise<string[]> {
        try {
            const ports = await this.deps.transport.list()
            this.publish({ kind: 'ports-listed', at: Date.now(), ports })
            return ports
        } catch (err) {
            this.publish({
                kind: 'recoverable-error',
                at: Date.now(),
                error: `listing ports failed: ${errorMessage(err)}`,
            })
            return []
        }
    }

    /**
     * Open `port` (or the previously selected one). Resolves false on
     * failure; never rejects.
     */
    public async connect(port?: string): Promise<boolean> {
        const target = port ?? this.selectedPort
        if (!target) {
            this.publish({ kind: 'configuration-error', at: Date.now(), error: 'No port selected' })
            return false
        }

        this.epoch += 1
        const epoch = this.epoch

        this.stopHealthLoop()
        await this.closeHandle()

        this.selectedPort = target
        this.manualDisconnect = false
        this.setState(LinkState.Connecting)

        let handle: LinkHandle
        let session: number
        try {
            ({ handle, session } = await this.openHandle(target))
        } catch (err) {
            if (epoch !== this.epoch) return false
            this.setState(LinkState.Disconnected)
            this.publishOpenFailed(target, 'connect', err)
            // keep retrying from the health loop; the refresh window starts now
            this.lastReconnectAt = Date.now()
            this.startHealthLoop()
            return false
        }

        if (epoch !== this.epoch) {
            await this.releaseHandle(handle)
            return false
        }

        this.attach(handle, session, 'connect')
        this.startHealthLoop()
        return true
    }

    /**
     * Stop everything and stay down until the next connect(). Safe to call in
     * any state; waits at most `stopTimeoutMs` for an in-flight health check
     * and again for the port close.
     */
    public async disconnect(): Promise<void> {
        this.manualDisconnect = true
        this.epoch += 1

        this.stopHealthLoop()

        const pending: Promise<unknown> | null = this.healthInFlight ?? this.reconnecting
        if (pending) {
            await withTimeout(pending, this.config.stopTimeoutMs)
        }

        const port = this.handle?.path ?? this.selectedPort
        await this.closeHandle()

        this.setState(LinkState.Disconnected)
        this.publish({ kind: 'link-disconnected', at: Date.now(), port })
    }

    /**
     * Feed a line as if it had arrived on the link. Counts as a heartbeat.
     */
    public inject(rawLine: string): void {
        this.handleLine(rawLine, true)
    }

    /**
     * One pass of the health loop. Checks run in order and the first trigger
     * wins; the heartbeat warning only applies when nothing else fired.
     */
    public async runHealthCheck(): Promise<HealthCheckOutcome> {
        if (this.manualDisconnect) return { action: 'skipped', reason: 'manual-disconnect' }
        const port = this.selectedPort
        if (!port) return { action: 'skipped', reason: 'no-port' }
        if (this.reconnecting || this.state === LinkState.Connecting) {
            return { action: 'skipped', reason: 'busy' }
        }

        const now = Date.now()
        const { forcedRefreshMs, selfTestIntervalMs, heartbeatReconnectMs, heartbeatTimeoutMs } = this.config

        if (forcedRefreshMs > 0 && now - this.lastReconnectAt > forcedRefreshMs) {
            return this.reconnectFor('forced-refresh')
        }

        if (!this.handle || !this.handle.isOpen()) {
            return this.reconnectFor('handle-closed')
        }

        if (now - this.lastSelfTestAt > selfTestIntervalMs) {
            const passed = await this.runSelfTest(this.handle, port)
            if (this.manualDisconnect) return { action: 'skipped', reason: 'manual-disconnect' }
            if (!passed) return this.reconnectFor('self-test-failed')
            this.lastSelfTestAt = now
            this.stats.lastSelfTestAt = now
        }

        const silentMs = now - this.lastHeartbeatAt
        if (silentMs > heartbeatReconnectMs) {
            return this.reconnectFor('heartbeat-lost')
        }
        if (silentMs > heartbeatTimeoutMs) {
            this.publish({ kind: 'heartbeat-warning', at: now, port, silentMs })
            return { action: 'warned', silentMs }
        }

        return { action: 'ok' }
    }

    /* ---------------------------------------------------------------------- */
    /*  Health loop                                                           */
    /* ---------------------------------------------------------------------- */

    private startHealthLoop(): void {
        if (this.healthTimer) return
        this.healthTimer = setInterval(() => {
            this.healthTick()
        }, this.config.healthIntervalMs)
    }

    private stopHealthLoop(): void {
        if (this.healthTimer) {
            clearInterval(this.healthTimer)
            this.healthTimer = null
        }
    }

    private healthTick(): void {
        // a slow self-test or reconnect must not stack ticks
        if (this.healthInFlight) return

        this.healthInFlight = this.runHealthCheck()
            .catch((err): HealthCheckOutcome => {
                this.publish({
                    kind: 'recoverable-error',
                    at: Date.now(),
                    error: `health check failed: ${errorMessage(err)}`,
                })
                return { action: 'ok' }
            })
            .finally(() => {
                this.healthInFlight = null
            })
    }

    /** Bounded by `selfTestTimeoutMs`; a check that never settles fails with "timeout". */
    private async runSelfTest(handle: LinkHandle, port: string): Promise<boolean> {
        const result = await withTimeout(this.checkLink(handle, port), this.config.selfTestTimeoutMs)
        const reason = result.settled ? result.value : 'timeout'

        if (reason !== null) {
            this.publish({ kind: 'self-test-failed', at: Date.now(), port, reason })
            return false
        }

        this.publish({ kind: 'self-test-passed', at: Date.now(), port })
        return true
    }

    /** Resolves null when the link answers, otherwise why it did not. */
    private async checkLink(handle: LinkHandle, port: string): Promise<string | null> {
        try {
            const ports = await this.deps.transport.list()
            if (!ports.includes(port)) return 'port no longer enumerated'
            await handle.write(`${this.config.selfTestLine}\n`)
            return null
        } catch (err) {
            return errorMessage(err)
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Reconnect                                                             */
    /* ---------------------------------------------------------------------- */

    private async reconnectFor(trigger: ReconnectTrigger): Promise<HealthCheckOutcome> {
        const ok = await this.reconnect(trigger)
        return ok ? { action: 'reconnected', trigger } : { action: 'reconnect-failed', trigger }
    }

    /**
     * Close whatever is open and reopen the selected port. Concurrent callers
     * share one attempt.
     */
    private reconnect(trigger: ReconnectTrigger): Promise<boolean> {
        if (this.reconnecting) return this.reconnecting

        const port = this.selectedPort
        if (!port) {
            this.publish({ kind: 'configuration-error', at: Date.now(), error: 'No port selected' })
            return Promise.resolve(false)
        }

        this.reconnecting = this.doReconnect(port, trigger).finally(() => {
            this.reconnecting = null
        })
        return this.reconnecting
    }

    private async doReconnect(port: string, trigger: ReconnectTrigger): Promise<boolean> {
        const epoch = this.epoch

        this.stats.reconnectAttempts += 1
        this.setState(LinkState.Reconnecting)
        this.publish({ kind: 'link-reconnecting', at: Date.now(), port, trigger })

        await this.closeHandle()

        let handle: LinkHandle
        let session: number
        try {
            ({ handle, session } = await this.openHandle(port))
        } catch (err) {
            if (epoch !== this.epoch) return false
            this.stats.reconnectFailures += 1
            this.setState(LinkState.Disconnected)
            this.publishOpenFailed(port, 'reconnect', err)
            return false
        }

        if (epoch !== this.epoch || this.manualDisconnect) {
            await this.releaseHandle(handle)
            return false
        }

        this.stats.reconnectSuccesses += 1
        this.attach(handle, session, 'reconnect')
        return true
    }

    /* ---------------------------------------------------------------------- */
    /*  Handle wiring                                                         */
    /* ---------------------------------------------------------------------- */

    private async openHandle(port: string): Promise<{ handle: LinkHandle, session: number }> {
        this.sessionSeq += 1
        const session = this.sessionSeq

        const handle = await this.deps.transport.open(
            port,
            { baudRate: this.config.baudRate, openTimeoutMs: this.config.openTimeoutMs },
            {
                onLine: (line) => {
                    if (this.liveSession === session) this.handleLine(line, false)
                },
                onFault: (err) => {
                    if (this.liveSession === session) this.handleFault(err)
                },
                onClose: () => {
                    if (this.liveSession === session) {
                        this.handleFault(new TransportError('read', port, 'port closed unexpectedly'))
                    }
                },
            }
        )

        return { handle, session }
    }

    private attach(handle: LinkHandle, session: number, mode: ConnectMode): void {
        this.handle = handle
        this.liveSession = session

        const now = Date.now()
        this.lastHeartbeatAt = now
        this.lastSelfTestAt = now
        this.lastReconnectAt = now
        this.stats.lastReconnectAt = now

        this.setState(LinkState.Connected)
        this.publish({
            kind: 'link-connected',
            at: now,
            port: handle.path,
            baudRate: this.config.baudRate,
            mode,
        })
    }

    /** Detach and close the live handle, if any. */
    private async closeHandle(): Promise<void> {
        const handle = this.handle
        this.handle = null
        this.liveSession = 0
        if (handle) await this.releaseHandle(handle)
    }

    private async releaseHandle(handle: LinkHandle): Promise<void> {
        if (!handle.isOpen()) return

        const closing = handle.close().then(
            () => null,
            (err: unknown) => errorMessage(err)
        )
        const result = await withTimeout(closing, this.config.stopTimeoutMs)

        if (!result.settled) {
            this.publish({
                kind: 'close-timeout',
                at: Date.now(),
                port: handle.path,
                timeoutMs: this.config.stopTimeoutMs,
            })
        } else if (result.value !== null) {
            this.publish({
                kind: 'link-fault',
                at: Date.now(),
                port: handle.path,
                error: `close failed: ${result.value}`,
            })
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Data handling                                                         */
    /* ---------------------------------------------------------------------- */

    private handleLine(raw: string, simulated: boolean): void {
        const line = raw.trim()
        if (!line) return

        const now = Date.now()
        this.lastHeartbeatAt = now
        this.stats.lastHeartbeatAt = now
        this.stats.linesReceived += 1

        this.publish({ kind: 'line-received', at: now, line, simulated })

        const result = decodeLine(line, now)
        if (!result.ok) {
            this.stats.linesRejected += 1
            this.publish({
                kind: 'line-rejected',
                at: now,
                line,
                reason: result.reason,
                detail: result.detail,
            })
            return
        }

        try {
            this.deps.statuses(result.event)
        } catch (err) {
            this.publish({
                kind: 'recoverable-error',
                at: Date.now(),
                error: `status update failed for line "${line}": ${errorMessage(err)}`,
            })
        }
    }

    private handleFault(err: Error): void {
        this.publish({
            kind: 'link-fault',
            at: Date.now(),
            port: this.handle?.path ?? this.selectedPort,
            error: err.message,
        })

        if (this.manualDisconnect) return
        void this.reconnect('read-fault')
    }

    /* ---------------------------------------------------------------------- */
    /*  Helpers                                                               */
    /* ---------------------------------------------------------------------- */

    private setState(next: LinkState): void {
        const prev = this.state
        if (prev === next) return
        this.state = next
        this.publish({
            kind: 'link-state-changed',
            at: Date.now(),
            from: prev,
            to: next,
            port: this.selectedPort,
        })
    }

    private publishOpenFailed(port: string, mode: ConnectMode, err: unknown): void {
        this.publish({
            kind: 'link-open-failed',
            at: Date.now(),
            port,
            mode,
            error: errorMessage(err),
        })
    }

    private publish(evt: SignalLinkEvent): void {
        this.deps.events.publish(evt)
    }
}
