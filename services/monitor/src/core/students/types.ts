// services/monitor/src/core/students/types.ts

import type { StatusCode } from '../protocol/types.js'

export type StatusColor = 'green' | 'orange' | 'red' | 'blue'

export interface StatusAggregatorConfig {
    /** Repeats of the same code inside this window are dropped entirely. */
    duplicateWindowMs: number
    /** Waiting longer than this is shown as a warning. */
    warningAfterMs: number
    /** Waiting longer than this is shown as critical. */
    criticalAfterMs: number
}

export interface StatusRecord {
    readonly studentId: number
    readonly code: StatusCode
    readonly text: string
    readonly color: StatusColor
    /** Last accepted event (or teacher action) for this student. */
    readonly lastUpdateAt: number
    /** When the current code was first observed. */
    readonly statusStartedAt: number
}

export interface StudentStatusView extends StatusRecord {
    readonly name: string
}

export type ApplyOutcome =
    | { kind: 'ignored', studentId: number }
    | { kind: 'duplicate', record: StatusRecord }
    | { kind: 'refreshed', record: StatusRecord }
    | { kind: 'changed', record: StatusRecord, previous: StatusCode | null }

export type DurationTier = 'normal' | 'warning' | 'critical'

export interface StatusDuration {
    seconds: number
    text: string
    tier: DurationTier
}

export type RosterIssueReason = 'invalid-format' | 'out-of-range'

export interface RosterIssue {
    /** 1-based line number in the submitted text. */
    line: number
    text: string
    reason: RosterIssueReason
}

export interface ParsedRoster {
    students: Map<number, string>
    issues: RosterIssue[]
}

export interface RosterUpdateResult {
    allowed: number
    /** Ids that were on the previous roster but not on this one. */
    removedStudents: number[]
    /** Ids whose status record was deleted by this update. */
    removedRecords: number[]
    issues: RosterIssue[]
}
