// services/monitor/src/core/activity/EventLog.ts

import type { ChannelLogger } from '@classroom-signal/logging'
import {
    CATEGORY_COLORS,
    LOG_CATEGORIES,
    LogCategory,
    type EventLogConfig,
    type EventLogListener,
    type LogEntry,
} from './types.js'

interface EventLogDeps {
    /** Structured log that every entry is copied to. */
    mirror?: ChannelLogger
}

/**
 * EventLog
 *
 * Bounded, append-only activity log shown to the teacher. Entries are never
 * mutated; the oldest fall off once `maxEntries` is exceeded.
 *
 * The display filter lives here too so every reader sees the same
 * selection. Errors are shown by default; everything else is opt-in.
 */
export class EventLog {
    private readonly config: EventLogConfig
    private readonly deps: EventLogDeps

    private entries: LogEntry[] = []
    private readonly listeners = new Set<EventLogListener>()
    private filter: Record<LogCategory, boolean> = {
        [LogCategory.Status]: false,
        [LogCategory.Error]: true,
        [LogCategory.Health]: false,
        [LogCategory.Info]: false,
    }

    constructor(config: EventLogConfig, deps: EventLogDeps = {}) {
        this.config = config
        this.deps = deps
    }

    public log(message: string, category: LogCategory = LogCategory.Info): LogEntry {
        const entry: LogEntry = {
            at: Date.now(),
            category,
            message,
            color: CATEGORY_COLORS[category],
        }

        this.entries.push(entry)
        if (this.entries.length > this.config.maxEntries) {
            this.entries.splice(0, this.entries.length - this.config.maxEntries)
        }

        this.mirrorEntry(entry)
        this.notify()
        return entry
    }

    /**
     * Newest `displayEntries` entries whose category is enabled, oldest first.
     * Without an explicit set, the stored filter applies.
     */
    public filteredEntries(enabled?: Iterable<LogCategory>): LogEntry[] {
        const allow = enabled
            ? new Set(enabled)
            : new Set(LOG_CATEGORIES.filter(c => this.filter[c]))

        return this.entries
            .filter(e => allow.has(e.category))
            .slice(-this.config.displayEntries)
    }

    public entriesAll(): LogEntry[] {
        return [...this.entries]
    }

    public setFilter(category: LogCategory, enabled: boolean): void {
        if (this.filter[category] === enabled) return
        this.filter = { ...this.filter, [category]: enabled }
        this.notify()
    }

    public getFilter(): Record<LogCategory, boolean> {
        return { ...this.filter }
    }

    public clear(): void {
        this.entries = []
        this.log('Activity log cleared', LogCategory.Info)
    }

    /** Every retained entry, one line each, oldest first. */
    public export(): string {
        return this.entries
            .map(e => `[${new Date(e.at).toISOString()}] ${e.category}: ${e.message}`)
            .join('\n')
    }

    public stats(): Record<LogCategory, number> {
        const out: Record<LogCategory, number> = {
            [LogCategory.Status]: 0,
            [LogCategory.Error]: 0,
            [LogCategory.Health]: 0,
            [LogCategory.Info]: 0,
        }
        for (const e of this.entries) out[e.category] += 1
        return out
    }

    public get size(): number {
        return this.entries.length
    }

    public subscribe(listener: EventLogListener): () => void {
        this.listeners.add(listener)
        return () => { this.listeners.delete(listener) }
    }

    /* ---------------------------------------------------------------------- */
    /*  Internals                                                             */
    /* ---------------------------------------------------------------------- */

    private notify(): void {
        for (const l of this.listeners) {
            try {
                l()
            } catch (err) {
                this.deps.mirror?.warn('activity log listener failed', {
                    err: err instanceof Error ? err.message : String(err),
                })
            }
        }
    }

    private mirrorEntry(entry: LogEntry): void {
        const mirror = this.deps.mirror
        if (!mirror) return

        const extra = { category: entry.category }
        try {
            switch (entry.category) {
                // activity errors are all recoverable by construction
                case LogCategory.Error:
                    mirror.warn(entry.message, extra)
                    break
                case LogCategory.Health:
                case LogCategory.Status:
                case LogCategory.Info:
                    mirror.info(entry.message, extra)
                    break
            }
        } catch (err) {
            console.warn('ACTIVITY LOG MIRROR FAILED', err instanceof Error ? err.message : String(err))
        }
    }
}
