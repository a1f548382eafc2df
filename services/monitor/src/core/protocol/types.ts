// services/monitor/src/core/protocol/types.ts

export const MIN_STUDENT_ID = 100000
export const MAX_STUDENT_ID = 999999

/**
 * Student status as tracked by the monitor.
 *
 * `Resolved` never arrives over the wire; it is set by the teacher and
 * otherwise behaves like `Available`.
 */
export enum StatusCode {
    Available = 'available',
    Question = 'question',
    HelpNeeded = 'help-needed',
    Resolved = 'resolved',
}

/** Statuses a device can report. */
export type ReportedStatus =
    | StatusCode.Available
    | StatusCode.Question
    | StatusCode.HelpNeeded

/** Single-character codes used on the wire. */
export type WireStatusCode = 'G' | 'V' | 'R'

export const WIRE_STATUS_CODES: Record<WireStatusCode, ReportedStatus> = {
    G: StatusCode.Available,
    V: StatusCode.Question,
    R: StatusCode.HelpNeeded,
}

export interface DecodedEvent {
    studentId: number
    code: ReportedStatus
    /** ms since epoch */
    receivedAt: number
}

export type RejectionReason =
    | 'MalformedLine'
    | 'UnrecognizedRole'
    | 'InvalidStudentId'
    | 'UnknownStatusCode'

export type DecodeResult =
    | { ok: true, event: DecodedEvent }
    | { ok: false, reason: RejectionReason, detail: string }
