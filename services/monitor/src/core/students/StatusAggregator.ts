// services/monitor/src/core/students/StatusAggregator.ts

import { StatusCode, type DecodedEvent } from '../protocol/types.js'
import {
    STATUS_DISPLAY,
    comparableCode,
    isWaiting,
    priorityOf,
} from './display.js'
import { durationTier, formatDuration } from './duration.js'
import { defaultStudentName, parseRoster } from './roster.js'
import type {
    ApplyOutcome,
    RosterUpdateResult,
    StatusAggregatorConfig,
    StatusDuration,
    StatusRecord,
    StudentStatusView,
} from './types.js'

/**
 * StatusAggregator
 *
 * Owns the allow-list and one StatusRecord per tracked student.
 *
 * - Events for students outside the allow-list are ignored.
 * - A different code is a status change: new record, new status-start.
 * - The same code inside the duplicate window is dropped. Bridges send every
 *   status twice and re-announce periodically, so this absorbs the bursts.
 * - The same code after the window only refreshes lastUpdateAt.
 *
 * Every method is synchronous; callers on the event loop never observe a
 * half-applied update.
 */
export class StatusAggregator {
    private readonly config: StatusAggregatorConfig

    private allowed = new Map<number, string>()
    private readonly records = new Map<number, StatusRecord>()

    constructor(config: StatusAggregatorConfig) {
        this.config = config
    }

    /* ---------------------------------------------------------------------- */
    /*  Events                                                                */
    /* ---------------------------------------------------------------------- */

    public apply(event: DecodedEvent): ApplyOutcome {
        const { studentId, code, receivedAt } = event

        if (!this.allowed.has(studentId)) {
            return { kind: 'ignored', studentId }
        }

        const existing = this.records.get(studentId)

        if (!existing || comparableCode(existing.code) !== code) {
            const record = makeRecord(
                studentId,
                code,
                receivedAt,
                existing ? Math.max(existing.lastUpdateAt, receivedAt) : receivedAt
            )
            this.records.set(studentId, record)
            return { kind: 'changed', record, previous: existing?.code ?? null }
        }

        const elapsed = receivedAt - existing.lastUpdateAt
        if (elapsed < this.config.duplicateWindowMs) {
            return { kind: 'duplicate', record: existing }
        }

        const refreshed: StatusRecord = {
            ...existing,
            lastUpdateAt: Math.max(existing.lastUpdateAt, receivedAt),
        }
        this.records.set(studentId, refreshed)
        return { kind: 'refreshed', record: refreshed }
    }

    /**
     * Teacher action: mark the student's request as handled. The device does
     * not need to send anything.
     */
    public resolve(studentId: number, now: number = Date.now()): StatusRecord | null {
        const existing = this.records.get(studentId)
        if (!existing) return null

        const record = makeRecord(
            studentId,
            StatusCode.Resolved,
            now,
            Math.max(existing.lastUpdateAt, now)
        )
        this.records.set(studentId, record)
        return record
    }

    /* ---------------------------------------------------------------------- */
    /*  Roster                                                                */
    /* ---------------------------------------------------------------------- */

    public updateAllowList(text: string): RosterUpdateResult {
        const { students, issues } = parseRoster(text)

        const removedStudents = [...this.allowed.keys()]
            .filter(id => !students.has(id))
            .sort((a, b) => a - b)

        const removedRecords: number[] = []
        for (const id of [...this.records.keys()].sort((a, b) => a - b)) {
            if (!students.has(id)) {
                this.records.delete(id)
                removedRecords.push(id)
            }
        }

        this.allowed = students

        return {
            allowed: students.size,
            removedStudents,
            removedRecords,
            issues,
        }
    }

    public isAllowed(studentId: number): boolean {
        return this.allowed.has(studentId)
    }

    public nameOf(studentId: number): string {
        return this.allowed.get(studentId) ?? defaultStudentName(studentId)
    }

    public allowedStudents(): Array<{ studentId: number, name: string }> {
        return [...this.allowed.entries()]
            .sort(([a], [b]) => a - b)
            .map(([studentId, name]) => ({ studentId, name }))
    }

    /* ---------------------------------------------------------------------- */
    /*  Queries                                                               */
    /* ---------------------------------------------------------------------- */

    public getRecord(studentId: number): StatusRecord | undefined {
        return this.records.get(studentId)
    }

    /**
     * Help needed first, then questions, longest waiting first within each;
     * everyone else by student id. Not cached: the waiting order depends on
     * the wall clock.
     */
    public sortedView(): StudentStatusView[] {
        return [...this.records.values()]
            .sort((a, b) => {
                const pa = priorityOf(a.code)
                const pb = priorityOf(b.code)
                if (pa !== pb) return pa - pb
                if (isWaiting(a.code) && a.statusStartedAt !== b.statusStartedAt) {
                    return a.statusStartedAt - b.statusStartedAt
                }
                return a.studentId - b.studentId
            })
            .map(record => ({ ...record, name: this.nameOf(record.studentId) }))
    }

    public durationOf(studentId: number, now: number = Date.now()): StatusDuration | null {
        const record = this.records.get(studentId)
        if (!record || !isWaiting(record.code)) return null

        const elapsedMs = Math.max(0, now - record.statusStartedAt)
        const seconds = Math.floor(elapsedMs / 1000)

        return {
            seconds,
            text: formatDuration(seconds),
            tier: durationTier(seconds * 1000, this.config),
        }
    }

    /** Students currently waiting on the teacher. */
    public activeStudents(): number[] {
        return [...this.records.values()]
            .filter(r => isWaiting(r.code))
            .map(r => r.studentId)
            .sort((a, b) => a - b)
    }

    public counts(): { allowed: number, tracked: number } {
        return { allowed: this.allowed.size, tracked: this.records.size }
    }

    public clearStatuses(): number[] {
        const cleared = [...this.records.keys()].sort((a, b) => a - b)
        this.records.clear()
        return cleared
    }
}

function makeRecord(
    studentId: number,
    code: StatusCode,
    statusStartedAt: number,
    lastUpdateAt: number
): StatusRecord {
    const { text, color } = STATUS_DISPLAY[code]
    return { studentId, code, text, color, lastUpdateAt, statusStartedAt }
}
