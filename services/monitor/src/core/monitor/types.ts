// services/monitor/src/core/monitor/types.ts

import type { EventLogConfig } from '../activity/types.js'
import type { StatusAggregatorConfig, StatusDuration, StudentStatusView } from '../students/types.js'
import type { LinkState, SignalLinkConfig, SignalLinkStats } from '../../devices/signal-link/types.js'

export type ConnectionSeverity = 'ok' | 'pending' | 'warning' | 'error' | 'idle'

export interface ConnectionStatus {
    text: string
    severity: ConnectionSeverity
}

/**
 * Whatever shows the classroom to the teacher. Callbacks carry no payload
 * beyond ids; observers read current state back through ClassroomMonitor.
 */
export interface PresentationPort {
    onConnectionStatus(text: string, severity: ConnectionSeverity): void
    onStudentStatusChanged(studentId: number): void
    onLogUpdated(): void
}

export interface ClassroomMonitorConfig {
    link: SignalLinkConfig
    statuses: StatusAggregatorConfig
    activity: EventLogConfig
    /** Port to open at startup, if any. */
    port: string | null
    /** Roster applied at startup, newline separated. */
    roster: string | null
}

export interface StudentSnapshot extends StudentStatusView {
    duration: StatusDuration | null
}

export interface LinkSnapshot {
    state: LinkState
    port: string | null
    connected: boolean
    status: ConnectionStatus
    stats: SignalLinkStats
}
