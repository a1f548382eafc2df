// services/monitor/src/core/students/roster.ts

import { isStudentIdInRange } from '../protocol/codec.js'
import type { ParsedRoster, RosterIssue } from './types.js'

export function defaultStudentName(studentId: number): string {
    return `Student ${studentId}`
}

/**
 * Parse a roster block, one entry per line:
 *
 *     123456:Jane Doe
 *     234567
 *
 * Bad lines are reported and skipped; they never abort the rest. A repeated
 * id keeps the last name given.
 */
export function parseRoster(text: string): ParsedRoster {
    const students = new Map<number, string>()
    const issues: RosterIssue[] = []

    const lines = text.split(/\r?\n/)
    lines.forEach((rawLine, index) => {
        const line = rawLine.trim()
        if (!line) return

        const sep = line.indexOf(':')
        const idPart = (sep >= 0 ? line.slice(0, sep) : line).trim()
        const namePart = sep >= 0 ? line.slice(sep + 1).trim() : ''

        if (!/^\d+$/.test(idPart)) {
            issues.push({ line: index + 1, text: line, reason: 'invalid-format' })
            return
        }

        const studentId = Number.parseInt(idPart, 10)
        if (!isStudentIdInRange(studentId)) {
            issues.push({ line: index + 1, text: line, reason: 'out-of-range' })
            return
        }

        students.set(studentId, namePart || defaultStudentName(studentId))
    })

    return { students, issues }
}
