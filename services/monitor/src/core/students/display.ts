// services/monitor/src/core/students/display.ts

import { StatusCode } from '../protocol/types.js'
import type { StatusColor } from './types.js'

export const STATUS_DISPLAY: Record<StatusCode, { text: string, color: StatusColor }> = {
    [StatusCode.Available]:  { text: 'Available', color: 'green' },
    [StatusCode.Question]:   { text: 'Question', color: 'orange' },
    [StatusCode.HelpNeeded]: { text: 'Help needed', color: 'red' },
    [StatusCode.Resolved]:   { text: 'Resolved', color: 'blue' },
}

/**
 * Code used when comparing an incoming report against the stored one.
 * A resolved student reporting "available" is a repeat, not a change.
 */
export function comparableCode(code: StatusCode): StatusCode {
    return code === StatusCode.Resolved ? StatusCode.Available : code
}

export function isWaiting(code: StatusCode): boolean {
    return code === StatusCode.HelpNeeded || code === StatusCode.Question
}

/** Lower sorts first. */
export function priorityOf(code: StatusCode): number {
    switch (code) {
        case StatusCode.HelpNeeded: return 0
        case StatusCode.Question: return 1
        case StatusCode.Available:
        case StatusCode.Resolved:
            return 2
    }
}
