import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'

import { LogCategory } from '../src/core/activity/types.js'
import { ClassroomMonitor } from '../src/core/monitor/ClassroomMonitor.js'
import type {
    ClassroomMonitorConfig,
    ConnectionSeverity,
    PresentationPort,
} from '../src/core/monitor/types.js'
import { StatusCode } from '../src/core/protocol/types.js'
import { FakeTransport, TEST_LINK_CONFIG, TEST_PORT } from './helpers/fakeTransport.js'

const T0 = new Date('2024-03-01T09:00:00.000Z').getTime()

const BASE_CONFIG: ClassroomMonitorConfig = {
    link: TEST_LINK_CONFIG,
    statuses: { duplicateWindowMs: 5_000, warningAfterMs: 120_000, criticalAfterMs: 300_000 },
    activity: { maxEntries: 1000, displayEntries: 200 },
    port: null,
    roster: null,
}

class RecordingPresentation implements PresentationPort {
    readonly statuses: Array<[string, ConnectionSeverity]> = []
    readonly changed: number[] = []
    logUpdates = 0

    onConnectionStatus(text: string, severity: ConnectionSeverity): void {
        this.statuses.push([text, severity])
    }

    onStudentStatusChanged(studentId: number): void {
        this.changed.push(studentId)
    }

    onLogUpdated(): void {
        this.logUpdates += 1
    }
}

function fakeChannelLogger() {
    return {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        fatal: vi.fn(),
    }
}

describe('ClassroomMonitor', () => {
    let transport: FakeTransport
    let monitor: ClassroomMonitor
    let view: RecordingPresentation

    function messages(category: LogCategory): string[] {
        return monitor.logEntries([category]).map(e => e.message)
    }

    beforeEach(() => {
        vi.useFakeTimers()
        vi.setSystemTime(T0)
        transport = new FakeTransport()
        monitor = new ClassroomMonitor({ ...BASE_CONFIG, roster: '123456:Ada\n234567:Grace' }, { transport })
        view = new RecordingPresentation()
        monitor.attachPresentation(view)
    })

    afterEach(async () => {
        await monitor.stop()
        vi.useRealTimers()
    })

    describe('start', () => {
        it('should apply the configured roster and open the configured port', async () => {
            monitor = new ClassroomMonitor(
                { ...BASE_CONFIG, roster: '123456:Ada', port: TEST_PORT },
                { transport }
            )

            await monitor.start()

            expect(monitor.roster()).toEqual([{ studentId: 123456, name: 'Ada' }])
            expect(monitor.linkSnapshot()).toMatchObject({
                state: 'connected',
                port: TEST_PORT,
                connected: true,
                status: { text: `Connected to ${TEST_PORT}`, severity: 'ok' },
            })
        })
    })

    describe('status flow', () => {
        beforeEach(async () => {
            await monitor.start()
            await monitor.connect(TEST_PORT)
        })

        it('should survive 100 malformed lines and apply the next valid one', () => {
            for (let i = 0; i < 100; i++) transport.current().emitLine(`noise ${i}`)
            transport.current().emitLine('L,123456,R')

            expect(view.changed).toEqual([123456])
            expect(messages(LogCategory.Error)).toHaveLength(100)
            expect(messages(LogCategory.Status)).toEqual(['Ada (123456): Help needed'])
            expect(monitor.linkSnapshot().connected).toBe(true)
        })

        it('should notify once for a duplicated report', () => {
            transport.current().emitLine('L,234567,V')
            vi.setSystemTime(T0 + 1_000)
            transport.current().emitLine('L,234567,V')

            expect(view.changed).toEqual([234567])
            expect(messages(LogCategory.Status)).toEqual(['Grace (234567): Question'])
        })

        it('should ignore students outside the roster', () => {
            transport.current().emitLine('L,345678,R')

            expect(view.changed).toEqual([])
            expect(monitor.students()).toEqual([])
        })

        it('should report waiting time with the student list', () => {
            transport.current().emitLine('L,234567,V')

            expect(monitor.students(T0 + 130_000)).toEqual([
                {
                    studentId: 234567,
                    name: 'Grace',
                    code: StatusCode.Question,
                    text: 'Question',
                    color: 'orange',
                    lastUpdateAt: T0,
                    statusStartedAt: T0,
                    duration: { seconds: 130, text: '2m 10s', tier: 'warning' },
                },
            ])
        })
    })

    describe('resolve', () => {
        it('should resolve a waiting student and log it', async () => {
            await monitor.start()
            monitor.inject('L,123456,V')

            const student = monitor.resolve(123456, T0 + 10_000)

            expect(student).toMatchObject({ code: StatusCode.Resolved, text: 'Resolved', duration: null })
            expect(messages(LogCategory.Status)).toEqual([
                'Ada (123456): Question',
                'Ada (123456): problem resolved by teacher',
            ])
            expect(view.changed).toEqual([123456, 123456])
        })

        it('should return null for a student without a status', async () => {
            await monitor.start()
            expect(monitor.resolve(123456)).toBeNull()
            expect(view.changed).toEqual([])
        })
    })

    describe('updateAllowList', () => {
        it('should log skipped lines and a summary', () => {
            const result = monitor.updateAllowList('123456:Ada\nabc\n42')

            expect(result.allowed).toBe(1)
            expect(messages(LogCategory.Error)).toEqual([
                'Roster line 2 skipped ("abc"): not a student id',
                'Roster line 3 skipped ("42"): student id must be 6 digits (100000-999999)',
            ])
            expect(messages(LogCategory.Info)).toEqual(['Student list updated: 1 allowed'])
        })

        it('should notify for records dropped with removed students', async () => {
            await monitor.start()
            monitor.inject('L,234567,R')

            monitor.updateAllowList('123456:Ada')

            expect(view.changed).toEqual([234567, 234567])
            expect(messages(LogCategory.Info)).toContain('Student list updated: 1 allowed, 1 removed')
            expect(monitor.students()).toEqual([])
        })
    })

    describe('connection status', () => {
        it('should show progress and failure of a connect', async () => {
            await monitor.connect('/dev/ttyMISSING')

            expect(view.statuses).toEqual([
                ['Connecting to /dev/ttyMISSING...', 'pending'],
                ['Connection failed', 'error'],
            ])
            expect(monitor.connectionStatus()).toEqual({ text: 'Connection failed', severity: 'error' })
            expect(messages(LogCategory.Error)).toEqual([
                'Connection to /dev/ttyMISSING failed: cannot open /dev/ttyMISSING',
            ])
        })

        it('should show a reconnect and then the disconnect', async () => {
            await monitor.connect(TEST_PORT)
            vi.setSystemTime(T0 + 181_000)
            await monitor.link.runHealthCheck()
            await monitor.disconnect()

            expect(view.statuses).toEqual([
                [`Connecting to ${TEST_PORT}...`, 'pending'],
                [`Connected to ${TEST_PORT}`, 'ok'],
                ['Reconnecting (scheduled refresh)...', 'pending'],
                [`Reconnected to ${TEST_PORT}`, 'ok'],
                ['Disconnected', 'idle'],
            ])
            expect(messages(LogCategory.Health)).toEqual([
                `Reconnecting to ${TEST_PORT} (scheduled refresh)`,
                `Reconnected to ${TEST_PORT}`,
            ])
        })

        it('should surface a missing port as a status message', async () => {
            await monitor.connect()

            expect(monitor.connectionStatus()).toEqual({ text: 'No port selected', severity: 'error' })
        })
    })

    describe('activity log', () => {
        it('should notify the presentation on every entry', () => {
            const before = view.logUpdates
            monitor.updateAllowList('123456')
            expect(view.logUpdates).toBe(before + 1)
        })

        it('should export and clear', () => {
            monitor.updateAllowList('123456')
            expect(monitor.exportLog()).toBe('[2024-03-01T09:00:00.000Z] INFO: Student list updated: 1 allowed')

            vi.setSystemTime(T0 + 1_000)
            monitor.clearLog()
            expect(monitor.exportLog()).toBe('[2024-03-01T09:00:01.000Z] INFO: Activity log cleared')
        })

        it('should keep the display filter', () => {
            monitor.setLogFilter(LogCategory.Info, true)
            expect(monitor.logFilter()[LogCategory.Info]).toBe(true)
        })
    })

    it('should clear statuses and notify each student', async () => {
        await monitor.start()
        monitor.inject('L,123456,V')
        monitor.inject('L,234567,R')

        expect(monitor.clearStatuses()).toEqual([123456, 234567])
        expect(view.changed).toEqual([123456, 234567, 123456, 234567])
        expect(messages(LogCategory.Info)).toContain('Cleared 2 student status(es)')
    })

    it('should stop notifying a detached presentation', async () => {
        const other = new RecordingPresentation()
        const detach = monitor.attachPresentation(other)
        await monitor.start()

        detach()
        monitor.inject('L,123456,V')

        expect(other.changed).toEqual([])
        expect(view.changed).toEqual([123456])
    })

    it('should report failing observers and sinks without losing updates', async () => {
        const log = fakeChannelLogger()
        monitor = new ClassroomMonitor({ ...BASE_CONFIG, roster: '123456' }, {
            transport,
            log,
            linkEvents: [{ publish: () => { throw new Error('sink down') } }],
        })
        monitor.attachPresentation({
            onConnectionStatus: () => { throw new Error('view down') },
            onStudentStatusChanged: () => { throw new Error('view down') },
            onLogUpdated: () => undefined,
        })
        monitor.attachPresentation(view)
        await monitor.start()

        monitor.inject('L,123456,R')

        expect(view.changed).toEqual([123456])
        expect(log.warn).toHaveBeenCalledWith('presentation callback failed', { err: 'view down' })
        expect(log.warn).toHaveBeenCalledWith('link event sink failed', { kind: 'line-received', err: 'sink down' })
    })
})
