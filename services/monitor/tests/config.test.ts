import { describe, it, expect } from 'vitest'

import { buildClassroomMonitorConfigFromEnv } from '../src/core/monitor/config.js'

describe('buildClassroomMonitorConfigFromEnv', () => {
    it('should use the defaults for an empty environment', () => {
        expect(buildClassroomMonitorConfigFromEnv({})).toEqual({
            link: {
                baudRate: 115200,
                healthIntervalMs: 10_000,
                selfTestIntervalMs: 60_000,
                forcedRefreshMs: 180_000,
                heartbeatTimeoutMs: 40_000,
                heartbeatReconnectMs: 90_000,
                stopTimeoutMs: 2_000,
                openTimeoutMs: 3_000,
                selfTestLine: 'HEALTH_CHECK',
                selfTestTimeoutMs: 3_000,
            },
            statuses: {
                duplicateWindowMs: 5_000,
                warningAfterMs: 120_000,
                criticalAfterMs: 300_000,
            },
            activity: { maxEntries: 1000, displayEntries: 200 },
            port: null,
            roster: null,
        })
    })

    it('should read overrides', () => {
        const config = buildClassroomMonitorConfigFromEnv({
            SIGNAL_PORT: ' /dev/ttyACM0 ',
            SIGNAL_BAUD_RATE: '9600',
            SIGNAL_FORCED_REFRESH_MS: '0',
            STATUS_DUPLICATE_WINDOW_MS: '3000',
            SIGNAL_SELF_TEST_LINE: 'PING',
        })

        expect(config.port).toBe('/dev/ttyACM0')
        expect(config.link).toMatchObject({ baudRate: 9600, forcedRefreshMs: 0, selfTestLine: 'PING' })
        expect(config.statuses.duplicateWindowMs).toBe(3_000)
    })

    it('should fall back on values that are not usable', () => {
        const config = buildClassroomMonitorConfigFromEnv({
            SIGNAL_HEALTH_INTERVAL_MS: '0',
            SIGNAL_HEARTBEAT_TIMEOUT_MS: 'soon',
            STATUS_WARNING_AFTER_MS: '-5',
            ACTIVITY_LOG_MAX_ENTRIES: '12.5',
        })

        expect(config.link.healthIntervalMs).toBe(10_000)
        expect(config.link.heartbeatTimeoutMs).toBe(40_000)
        expect(config.statuses.warningAfterMs).toBe(120_000)
        expect(config.activity.maxEntries).toBe(1000)
    })

    it('should accept a semicolon separated roster', () => {
        const config = buildClassroomMonitorConfigFromEnv({ ROSTER: '123456:Ada; 234567 ;345678:Grace' })
        expect(config.roster).toBe('123456:Ada\n234567\n345678:Grace')
    })
})
