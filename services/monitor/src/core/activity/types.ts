// services/monitor/src/core/activity/types.ts

export enum LogCategory {
    Status = 'STATUS',
    Error = 'ERROR',
    Health = 'HEALTH',
    Info = 'INFO',
}

export const LOG_CATEGORIES: readonly LogCategory[] = [
    LogCategory.Status,
    LogCategory.Error,
    LogCategory.Health,
    LogCategory.Info,
]

export const CATEGORY_COLORS: Record<LogCategory, string> = {
    [LogCategory.Status]: '#0066CC',
    [LogCategory.Error]:  '#CC0000',
    [LogCategory.Health]: '#FF6600',
    [LogCategory.Info]:   '#000000',
}

export interface LogEntry {
    /** ms since epoch */
    readonly at: number
    readonly category: LogCategory
    readonly message: string
    readonly color: string
}

export interface EventLogConfig {
    /** Entries retained; the oldest are evicted beyond this. */
    maxEntries: number
    /** Entries returned by a filtered read. */
    displayEntries: number
}

export type EventLogListener = () => void

export function isLogCategory(value: unknown): value is LogCategory {
    return typeof value === 'string' && (LOG_CATEGORIES as readonly string[]).includes(value)
}
