// services/monitor/src/core/monitor/ClassroomMonitor.ts

import type { ChannelLogger } from '@classroom-signal/logging'

import { SignalLinkActivityAdapter } from '../../adapters/signalLink.adapter.js'
import { LinkSupervisor } from '../../devices/signal-link/LinkSupervisor.js'
import type {
    LinkTransport,
    SignalLinkEvent,
    SignalLinkEventSink,
} from '../../devices/signal-link/types.js'
import { errorMessage } from '../../devices/signal-link/utils.js'
import { EventLog } from '../activity/EventLog.js'
import { LogCategory, type LogEntry } from '../activity/types.js'
import { FanoutEventSink } from '../events/FanoutEventSink.js'
import type { DecodedEvent } from '../protocol/types.js'
import { StatusAggregator } from '../students/StatusAggregator.js'
import type { RosterIssue, RosterUpdateResult } from '../students/types.js'
import type {
    ClassroomMonitorConfig,
    ConnectionSeverity,
    ConnectionStatus,
    LinkSnapshot,
    PresentationPort,
    StudentSnapshot,
} from './types.js'

interface ClassroomMonitorDeps {
    transport: LinkTransport
    /** Extra consumers of raw link events (structured logging). */
    linkEvents?: SignalLinkEventSink[]
    /** Receives a copy of every activity entry. */
    activityLogger?: ChannelLogger
    /** Reports presentation and sink failures. */
    log?: ChannelLogger
}

const ROSTER_ISSUE_TEXT: Record<RosterIssue['reason'], string> = {
    'invalid-format': 'not a student id',
    'out-of-range': 'student id must be 6 digits (100000-999999)',
}

/**
 * ClassroomMonitor
 *
 * Wires the link, the status aggregator and the activity log together and
 * offers the commands the teacher's screen issues. Presentation observers
 * attach and detach at runtime; none is required.
 */
export class ClassroomMonitor {
    readonly config: ClassroomMonitorConfig

    readonly activity: EventLog
    readonly statuses: StatusAggregator
    readonly link: LinkSupervisor

    private readonly deps: ClassroomMonitorDeps
    private readonly presenters = new Set<PresentationPort>()
    private status: ConnectionStatus = { text: 'Disconnected', severity: 'idle' }

    constructor(config: ClassroomMonitorConfig, deps: ClassroomMonitorDeps) {
        this.config = config
        this.deps = deps

        this.activity = new EventLog(config.activity, { mirror: deps.activityLogger })
        this.activity.subscribe(() => {
            this.present(p => p.onLogUpdated())
        })

        this.statuses = new StatusAggregator(config.statuses)

        const adapter = new SignalLinkActivityAdapter(this.activity, (text, severity) => {
            this.setConnectionStatus(text, severity)
        })

        const events = new FanoutEventSink<SignalLinkEvent>(
            [
                { publish: (evt) => adapter.handle(evt) },
                ...(deps.linkEvents ?? []),
            ],
            (err, evt) => {
                deps.log?.warn('link event sink failed', { kind: evt.kind, err: errorMessage(err) })
            }
        )

        this.link = new LinkSupervisor(config.link, {
            events,
            transport: deps.transport,
            statuses: (evt) => this.applyStatusEvent(evt),
        })
    }

    /* ---------------------------------------------------------------------- */
    /*  Presentation                                                          */
    /* ---------------------------------------------------------------------- */

    /** Returns a detach function. */
    attachPresentation(port: PresentationPort): () => void {
        this.presenters.add(port)
        return () => { this.presenters.delete(port) }
    }

    connectionStatus(): ConnectionStatus {
        return { ...this.status }
    }

    /* ---------------------------------------------------------------------- */
    /*  Lifecycle                                                             */
    /* ---------------------------------------------------------------------- */

    /**
     * Apply the configured roster and open the configured port, if any.
     */
    async start(): Promise<void> {
        if (this.config.roster !== null) {
            this.updateAllowList(this.config.roster)
        }
        if (this.config.port) {
            await this.connect(this.config.port)
        }
    }

    async stop(): Promise<void> {
        await this.disconnect()
    }

    /* ---------------------------------------------------------------------- */
    /*  Link commands                                                         */
    /* ---------------------------------------------------------------------- */

    listPorts(): Promise<string[]> {
        return this.link.listAvailablePorts()
    }

    connect(port?: string): Promise<boolean> {
        return this.link.connect(port)
    }

    disconnect(): Promise<void> {
        return this.link.disconnect()
    }

    inject(line: string): void {
        this.link.inject(line)
    }

    linkSnapshot(): LinkSnapshot {
        return {
            state: this.link.getState(),
            port: this.link.getSelectedPort(),
            connected: this.link.isConnected(),
            status: this.connectionStatus(),
            stats: this.link.getStats(),
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Students                                                              */
    /* ---------------------------------------------------------------------- */

    updateAllowList(text: string): RosterUpdateResult {
        const result = this.statuses.updateAllowList(text)

        for (const issue of result.issues) {
            this.activity.log(
                `Roster line ${issue.line} skipped ("${issue.text}"): ${ROSTER_ISSUE_TEXT[issue.reason]}`,
                LogCategory.Error
            )
        }

        const removed = result.removedStudents.length
        this.activity.log(
            `Student list updated: ${result.allowed} allowed` + (removed ? `, ${removed} removed` : ''),
            LogCategory.Info
        )

        for (const id of result.removedRecords) {
            this.present(p => p.onStudentStatusChanged(id))
        }

        return result
    }

    roster(): Array<{ studentId: number, name: string }> {
        return this.statuses.allowedStudents()
    }

    resolve(studentId: number, now: number = Date.now()): StudentSnapshot | null {
        const record = this.statuses.resolve(studentId, now)
        if (!record) return null

        this.activity.log(
            `${this.statuses.nameOf(studentId)} (${studentId}): problem resolved by teacher`,
            LogCategory.Status
        )
        this.present(p => p.onStudentStatusChanged(studentId))
        return this.student(studentId, now)
    }

    /** Drop every tracked status; the roster stays. */
    clearStatuses(): number[] {
        const cleared = this.statuses.clearStatuses()
        if (cleared.length) {
            this.activity.log(`Cleared ${cleared.length} student status(es)`, LogCategory.Info)
        }
        for (const id of cleared) {
            this.present(p => p.onStudentStatusChanged(id))
        }
        return cleared
    }

    students(now: number = Date.now()): StudentSnapshot[] {
        return this.statuses.sortedView().map(view => ({
            ...view,
            duration: this.statuses.durationOf(view.studentId, now),
        }))
    }

    student(studentId: number, now: number = Date.now()): StudentSnapshot | null {
        const record = this.statuses.getRecord(studentId)
        if (!record) return null
        return {
            ...record,
            name: this.statuses.nameOf(studentId),
            duration: this.statuses.durationOf(studentId, now),
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Activity log                                                          */
    /* ---------------------------------------------------------------------- */

    logEntries(categories?: Iterable<LogCategory>): LogEntry[] {
        return this.activity.filteredEntries(categories)
    }

    logFilter(): Record<LogCategory, boolean> {
        return this.activity.getFilter()
    }

    setLogFilter(category: LogCategory, enabled: boolean): void {
        this.activity.setFilter(category, enabled)
    }

    clearLog(): void {
        this.activity.clear()
    }

    exportLog(): string {
        return this.activity.export()
    }

    /* ---------------------------------------------------------------------- */
    /*  Internals                                                             */
    /* ---------------------------------------------------------------------- */

    private applyStatusEvent(evt: DecodedEvent): void {
        const outcome = this.statuses.apply(evt)
        if (outcome.kind !== 'changed') return

        const { record } = outcome
        this.activity.log(
            `${this.statuses.nameOf(record.studentId)} (${record.studentId}): ${record.text}`,
            LogCategory.Status
        )
        this.present(p => p.onStudentStatusChanged(record.studentId))
    }

    private setConnectionStatus(text: string, severity: ConnectionSeverity): void {
        this.status = { text, severity }
        this.present(p => p.onConnectionStatus(text, severity))
    }

    private present(call: (p: PresentationPort) => void): void {
        for (const p of this.presenters) {
            try {
                call(p)
            } catch (err) {
                this.deps.log?.warn('presentation callback failed', { err: errorMessage(err) })
            }
        }
    }
}
