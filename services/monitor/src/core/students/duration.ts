// services/monitor/src/core/students/duration.ts

import type { DurationTier, StatusAggregatorConfig } from './types.js'

/** `42s`, `3m 5s`, `1h 12m` */
export function formatDuration(totalSeconds: number): string {
    const s = Math.max(0, Math.floor(totalSeconds))
    if (s < 60) return `${s}s`
    if (s < 3600) return `${Math.floor(s / 60)}m ${s % 60}s`
    return `${Math.floor(s / 3600)}h ${Math.floor((s % 3600) / 60)}m`
}

export function durationTier(
    elapsedMs: number,
    thresholds: Pick<StatusAggregatorConfig, 'warningAfterMs' | 'criticalAfterMs'>
): DurationTier {
    if (elapsedMs > thresholds.criticalAfterMs) return 'critical'
    if (elapsedMs > thresholds.warningAfterMs) return 'warning'
    return 'normal'
}
