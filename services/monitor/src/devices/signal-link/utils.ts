// services/monitor/src/devices/signal-link/utils.ts

import type { ReconnectTrigger } from './types.js'

export function describeReconnectTrigger(trigger: ReconnectTrigger): string {
    switch (trigger) {
        case 'forced-refresh': return 'scheduled refresh'
        case 'handle-closed': return 'connection lost'
        case 'self-test-failed': return 'self-test failed'
        case 'heartbeat-lost': return 'no data received'
        case 'read-fault': return 'read error'
    }
}

export function errorMessage(err: unknown): string {
    if (err instanceof Error) return err.message
    return String(err)
}

export type TimeoutResult<T> =
    | { settled: true, value: T }
    | { settled: false }

/**
 * Wait for `promise` at most `ms`. The timer is always cleared so nothing
 * lingers after the race is decided.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number): Promise<TimeoutResult<T>> {
    let timer: NodeJS.Timeout | undefined
    const expired = new Promise<TimeoutResult<T>>((resolve) => {
        timer = setTimeout(() => resolve({ settled: false }), ms)
    })
    try {
        return await Promise.race([
            promise.then((value): TimeoutResult<T> => ({ settled: true, value })),
            expired,
        ])
    } finally {
        clearTimeout(timer)
    }
}
