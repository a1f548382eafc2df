// services/monitor/src/devices/signal-link/types.ts

import type { DecodedEvent, RejectionReason } from '../../core/protocol/types.js'

export enum LinkState {
    Disconnected = 'disconnected',
    Connecting = 'connecting',
    Connected = 'connected',
    Reconnecting = 'reconnecting',
}

export interface SignalLinkConfig {
    baudRate: number
    /** How often the health loop wakes up. */
    healthIntervalMs: number
    /** Minimum spacing between self-tests. */
    selfTestIntervalMs: number
    /**
     * Unconditional reconnect after this long since the last successful
     * (re)connect. 0 disables it.
     */
    forcedRefreshMs: number
    /** Silence longer than this is reported as a health warning. */
    heartbeatTimeoutMs: number
    /** Silence longer than this triggers a reconnect. */
    heartbeatReconnectMs: number
    /** Upper bound on waiting for the health loop and the port close on stop. */
    stopTimeoutMs: number
    openTimeoutMs: number
    /** Written (plus "\n") to the port by the self-test. */
    selfTestLine: string
    /** Longest a self-test (enumerate plus write) may take before it counts as failed. */
    selfTestTimeoutMs: number
}

/* -------------------------------------------------------------------------- */
/*  Transport seam                                                            */
/* -------------------------------------------------------------------------- */

export interface LinkOpenOptions {
    baudRate: number
    openTimeoutMs: number
}

export interface LinkHandleListeners {
    /** One complete line, delimiter removed. */
    onLine: (line: string) => void
    onFault: (err: Error) => void
    onClose: () => void
}

/** An open connection to one port. Only LinkSupervisor holds one. */
export interface LinkHandle {
    readonly path: string
    isOpen(): boolean
    write(data: string): Promise<void>
    close(): Promise<void>
}

export interface LinkTransport {
    /** Paths of the ports the host currently enumerates. */
    list(): Promise<string[]>
    open(path: string, opts: LinkOpenOptions, listeners: LinkHandleListeners): Promise<LinkHandle>
}

/* -------------------------------------------------------------------------- */
/*  Event sink + event union                                                  */
/* -------------------------------------------------------------------------- */

export type ReconnectTrigger =
    | 'forced-refresh'
    | 'handle-closed'
    | 'self-test-failed'
    | 'heartbeat-lost'
    | 'read-fault'

export type ConnectMode = 'connect' | 'reconnect'

export interface SignalLinkEventSink {
    publish(evt: SignalLinkEvent): void
}

/** Consumer of successfully decoded lines, called in arrival order. */
export type StatusEventConsumer = (evt: DecodedEvent) => void

export type SignalLinkEvent =
    | {
        kind: 'link-state-changed'
        at: number
        from: LinkState
        to: LinkState
        port: string | null
    }
    | {
        kind: 'link-connected'
        at: number
        port: string
        baudRate: number
        mode: ConnectMode
    }
    | {
        kind: 'link-open-failed'
        at: number
        port: string
        mode: ConnectMode
        error: string
    }
    | {
        kind: 'link-reconnecting'
        at: number
        port: string
        trigger: ReconnectTrigger
    }
    | {
        kind: 'link-disconnected'
        at: number
        port: string | null
    }
    | {
        kind: 'link-fault'
        at: number
        port: string | null
        error: string
    }
    | {
        kind: 'close-timeout'
        at: number
        port: string
        timeoutMs: number
    }
    | {
        kind: 'heartbeat-warning'
        at: number
        port: string
        silentMs: number
    }
    | {
        kind: 'self-test-passed'
        at: number
        port: string
    }
    | {
        kind: 'self-test-failed'
        at: number
        port: string
        reason: string
    }
    | {
        kind: 'line-received'
        at: number
        line: string
        simulated: boolean
    }
    | {
        kind: 'line-rejected'
        at: number
        line: string
        reason: RejectionReason
        detail: string
    }
    | {
        kind: 'ports-listed'
        at: number
        ports: string[]
    }
    | {
        kind: 'configuration-error'
        at: number
        error: string
    }
    | {
        kind: 'recoverable-error'
        at: number
        error: string
    }

export type HealthCheckOutcome =
    | { action: 'skipped', reason: 'manual-disconnect' | 'no-port' | 'busy' }
    | { action: 'ok' }
    | { action: 'warned', silentMs: number }
    | { action: 'reconnected', trigger: ReconnectTrigger }
    | { action: 'reconnect-failed', trigger: ReconnectTrigger }

export interface SignalLinkStats {
    linesReceived: number
    linesRejected: number
    reconnectAttempts: number
    reconnectSuccesses: number
    reconnectFailures: number
    lastHeartbeatAt: number | null
    lastReconnectAt: number | null
    lastSelfTestAt: number | null
}
