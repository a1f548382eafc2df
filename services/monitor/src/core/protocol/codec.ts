// services/monitor/src/core/protocol/codec.ts

import {
    MAX_STUDENT_ID,
    MIN_STUDENT_ID,
    WIRE_STATUS_CODES,
    type DecodeResult,
    type RejectionReason,
    type WireStatusCode,
} from './types.js'

const FIELD_SEPARATOR = ','
const MIN_FIELDS = 3
const ROLE_PREFIX = 'L'

/**
 * Decode one line of the bridge protocol:
 *
 *     <role>,<studentId>,<statusCode>[,<ignored...>]
 *
 * Checks run in a fixed order and the first failure is returned. Roster
 * membership is not checked here; that belongs to the aggregator.
 */
export function decodeLine(raw: string, receivedAt: number = Date.now()): DecodeResult {
    const fields = raw.split(FIELD_SEPARATOR).map(f => f.trim())

    if (fields.length < MIN_FIELDS) {
        return reject('MalformedLine', `expected at least ${MIN_FIELDS} fields, got ${fields.length}`)
    }

    const [role, idField, codeField] = fields

    if (!role.startsWith(ROLE_PREFIX)) {
        return reject('UnrecognizedRole', `role "${role}" does not start with "${ROLE_PREFIX}"`)
    }

    const studentId = parseStudentId(idField)
    if (studentId === null) {
        return reject('InvalidStudentId', `student id "${idField}" is not in ${MIN_STUDENT_ID}-${MAX_STUDENT_ID}`)
    }

    if (!isWireStatusCode(codeField)) {
        return reject('UnknownStatusCode', `status code "${codeField}" is not one of G, V, R`)
    }

    return {
        ok: true,
        event: {
            studentId,
            code: WIRE_STATUS_CODES[codeField],
            receivedAt,
        },
    }
}

/**
 * Parse a base-10 student id. Returns null for anything that is not plain
 * digits or falls outside the 6-digit range.
 */
export function parseStudentId(text: string): number | null {
    const trimmed = text.trim()
    if (!/^\d+$/.test(trimmed)) return null
    const n = Number.parseInt(trimmed, 10)
    return isStudentIdInRange(n) ? n : null
}

export function isStudentIdInRange(n: number): boolean {
    return Number.isInteger(n) && n >= MIN_STUDENT_ID && n <= MAX_STUDENT_ID
}

function isWireStatusCode(value: string): value is WireStatusCode {
    return Object.prototype.hasOwnProperty.call(WIRE_STATUS_CODES, value)
}

function reject(reason: RejectionReason, detail: string): DecodeResult {
    return { ok: false, reason, detail }
}
