// services/monitor/src/core/monitor/config.ts

import type { ClassroomMonitorConfig } from './types.js'

type Env = Record<string, string | undefined>

/* -------------------------------------------------------------------------- */
/*  Env → config helpers                                                      */
/* -------------------------------------------------------------------------- */

function readIntEnv(env: Env, name: string, fallback: number, min = 0): number {
    const raw = env[name]
    if (raw === undefined || raw.trim() === '') return fallback
    const n = Number(raw)
    if (!Number.isFinite(n) || !Number.isInteger(n) || n < min) return fallback
    return n
}

function readStringEnv(env: Env, name: string): string | undefined {
    const raw = env[name]
    if (raw === undefined || raw.trim() === '') return undefined
    return raw.trim()
}

/** `ROSTER` accepts `;` as well as newlines between entries. */
function readRosterEnv(env: Env): string | null {
    const raw = env.ROSTER
    if (raw === undefined || raw.trim() === '') return null
    return raw.split(/;|\r?\n/).map(s => s.trim()).join('\n')
}

export function buildClassroomMonitorConfigFromEnv(env: Env = process.env): ClassroomMonitorConfig {
    return {
        link: {
            baudRate: readIntEnv(env, 'SIGNAL_BAUD_RATE', 115200, 1),
            healthIntervalMs: readIntEnv(env, 'SIGNAL_HEALTH_INTERVAL_MS', 10_000, 1),
            selfTestIntervalMs: readIntEnv(env, 'SIGNAL_SELF_TEST_INTERVAL_MS', 60_000),
            forcedRefreshMs: readIntEnv(env, 'SIGNAL_FORCED_REFRESH_MS', 180_000),
            heartbeatTimeoutMs: readIntEnv(env, 'SIGNAL_HEARTBEAT_TIMEOUT_MS', 40_000),
            heartbeatReconnectMs: readIntEnv(env, 'SIGNAL_HEARTBEAT_RECONNECT_MS', 90_000),
            stopTimeoutMs: readIntEnv(env, 'SIGNAL_STOP_TIMEOUT_MS', 2_000),
            openTimeoutMs: readIntEnv(env, 'SIGNAL_OPEN_TIMEOUT_MS', 3_000, 1),
            selfTestLine: readStringEnv(env, 'SIGNAL_SELF_TEST_LINE') ?? 'HEALTH_CHECK',
            selfTestTimeoutMs: readIntEnv(env, 'SIGNAL_SELF_TEST_TIMEOUT_MS', 3_000, 1),
        },
        statuses: {
            duplicateWindowMs: readIntEnv(env, 'STATUS_DUPLICATE_WINDOW_MS', 5_000),
            warningAfterMs: readIntEnv(env, 'STATUS_WARNING_AFTER_MS', 120_000),
            criticalAfterMs: readIntEnv(env, 'STATUS_CRITICAL_AFTER_MS', 300_000),
        },
        activity: {
            maxEntries: readIntEnv(env, 'ACTIVITY_LOG_MAX_ENTRIES', 1000, 1),
            displayEntries: readIntEnv(env, 'ACTIVITY_LOG_DISPLAY_ENTRIES', 200, 1),
        },
        port: readStringEnv(env, 'SIGNAL_PORT') ?? null,
        roster: readRosterEnv(env),
    }
}
