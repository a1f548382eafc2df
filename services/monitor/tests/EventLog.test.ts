import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'

import { EventLog } from '../src/core/activity/EventLog.js'
import { LogCategory } from '../src/core/activity/types.js'

function fakeChannelLogger() {
    return {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        fatal: vi.fn(),
    }
}

describe('EventLog', () => {
    let log: EventLog

    beforeEach(() => {
        log = new EventLog({ maxEntries: 1000, displayEntries: 200 })
    })

    afterEach(() => {
        vi.useRealTimers()
    })

    it('should keep the newest 1000 entries in order', () => {
        for (let i = 0; i <= 1000; i++) log.log(`entry ${i}`, LogCategory.Info)

        const all = log.entriesAll()
        expect(log.size).toBe(1000)
        expect(all[0]?.message).toBe('entry 1')
        expect(all[999]?.message).toBe('entry 1000')
    })

    it('should stamp entries with their category color', () => {
        const entry = log.log('Link error', LogCategory.Error)
        expect(entry.color).toBe('#CC0000')
        expect(log.log('note').category).toBe(LogCategory.Info)
    })

    describe('filteredEntries', () => {
        it('should show errors only by default', () => {
            log.log('connected', LogCategory.Info)
            log.log('bad line', LogCategory.Error)
            log.log('Ada (123456): Question', LogCategory.Status)

            expect(log.filteredEntries().map(e => e.message)).toEqual(['bad line'])
            expect(log.getFilter()).toEqual({
                [LogCategory.Status]: false,
                [LogCategory.Error]: true,
                [LogCategory.Health]: false,
                [LogCategory.Info]: false,
            })
        })

        it('should honour an explicit category set', () => {
            log.log('connected', LogCategory.Info)
            log.log('bad line', LogCategory.Error)
            log.log('Ada (123456): Question', LogCategory.Status)

            expect(log.filteredEntries([LogCategory.Status, LogCategory.Info]).map(e => e.message))
                .toEqual(['connected', 'Ada (123456): Question'])
        })

        it('should return at most the newest display entries, oldest first', () => {
            for (let i = 0; i < 250; i++) log.log(`error ${i}`, LogCategory.Error)

            const shown = log.filteredEntries()
            expect(shown).toHaveLength(200)
            expect(shown[0]?.message).toBe('error 50')
            expect(shown[199]?.message).toBe('error 249')
        })

        it('should follow the stored filter', () => {
            log.log('self-test passed', LogCategory.Health)
            log.setFilter(LogCategory.Health, true)
            log.setFilter(LogCategory.Error, false)
            expect(log.filteredEntries().map(e => e.message)).toEqual(['self-test passed'])
        })
    })

    it('should notify listeners on append and on filter changes only when they change', () => {
        const listener = vi.fn()
        const unsubscribe = log.subscribe(listener)

        log.log('one')
        log.setFilter(LogCategory.Error, true)
        log.setFilter(LogCategory.Info, true)
        expect(listener).toHaveBeenCalledTimes(2)

        unsubscribe()
        log.log('two')
        expect(listener).toHaveBeenCalledTimes(2)
    })

    it('should clear and record the clear', () => {
        log.log('a', LogCategory.Error)
        log.log('b', LogCategory.Status)

        log.clear()

        expect(log.entriesAll().map(e => [e.category, e.message])).toEqual([
            [LogCategory.Info, 'Activity log cleared'],
        ])
    })

    it('should export one timestamped line per entry', () => {
        vi.useFakeTimers()
        vi.setSystemTime(new Date('2024-03-01T09:00:00.000Z'))
        log.log('Connected', LogCategory.Info)
        vi.setSystemTime(new Date('2024-03-01T09:00:01.500Z'))
        log.log('Rejected line "X,1,R"', LogCategory.Error)

        expect(log.export()).toBe(
            '[2024-03-01T09:00:00.000Z] INFO: Connected\n' +
            '[2024-03-01T09:00:01.500Z] ERROR: Rejected line "X,1,R"'
        )
    })

    it('should count entries per category', () => {
        log.log('a', LogCategory.Error)
        log.log('b', LogCategory.Error)
        log.log('c', LogCategory.Health)

        expect(log.stats()).toEqual({
            [LogCategory.Status]: 0,
            [LogCategory.Error]: 2,
            [LogCategory.Health]: 1,
            [LogCategory.Info]: 0,
        })
    })

    describe('mirror', () => {
        it('should copy errors as warnings and the rest as info', () => {
            const mirror = fakeChannelLogger()
            const mirrored = new EventLog({ maxEntries: 10, displayEntries: 10 }, { mirror })

            mirrored.log('Link error: gone', LogCategory.Error)
            mirrored.log('Ada (123456): Question', LogCategory.Status)

            expect(mirror.warn).toHaveBeenCalledWith('Link error: gone', { category: 'ERROR' })
            expect(mirror.info).toHaveBeenCalledWith('Ada (123456): Question', { category: 'STATUS' })
        })

        it('should keep appending when the mirror throws', () => {
            const mirror = fakeChannelLogger()
            mirror.info.mockImplementation(() => { throw new Error('transport gone') })
            const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
            const listener = vi.fn()
            const mirrored = new EventLog({ maxEntries: 10, displayEntries: 10 }, { mirror })
            mirrored.subscribe(listener)

            expect(mirrored.log('Connected to /dev/ttyACM0').message).toBe('Connected to /dev/ttyACM0')

            expect(mirrored.size).toBe(1)
            expect(listener).toHaveBeenCalledTimes(1)
            expect(warn).toHaveBeenCalledWith('ACTIVITY LOG MIRROR FAILED', 'transport gone')
            warn.mockRestore()
        })

        it('should report a failing listener and keep appending', () => {
            const mirror = fakeChannelLogger()
            const mirrored = new EventLog({ maxEntries: 10, displayEntries: 10 }, { mirror })
            mirrored.subscribe(() => { throw new Error('boom') })

            mirrored.log('still logged')

            expect(mirrored.size).toBe(1)
            expect(mirror.warn).toHaveBeenCalledWith('activity log listener failed', { err: 'boom' })
        })
    })
})
