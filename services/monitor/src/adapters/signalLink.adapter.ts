// services/monitor/src/adapters/signalLink.adapter.ts

import type { EventLog } from '../core/activity/EventLog.js'
import { LogCategory } from '../core/activity/types.js'
import type { ConnectionSeverity } from '../core/monitor/types.js'
import { LinkState, type SignalLinkEvent } from '../devices/signal-link/types.js'
import { describeReconnectTrigger } from '../devices/signal-link/utils.js'

export type ConnectionStatusListener = (text: string, severity: ConnectionSeverity) => void

/**
 * SignalLinkActivityAdapter
 *
 * Turns LinkSupervisor events into what the teacher sees: activity log
 * entries and the one-line connection status.
 *
 * Stateless: every event is translated on its own.
 */
export class SignalLinkActivityAdapter {
    private readonly log: EventLog
    private readonly onStatus: ConnectionStatusListener

    constructor(log: EventLog, onStatus: ConnectionStatusListener) {
        this.log = log
        this.onStatus = onStatus
    }

    handle(evt: SignalLinkEvent): void {
        switch (evt.kind) {
            /* ------------------------------------------------------------------ */
            /*  LIFECYCLE                                                         */
            /* ------------------------------------------------------------------ */

            case 'link-state-changed': {
                // Connected/Disconnected/Reconnecting carry their own event.
                if (evt.to === LinkState.Connecting) {
                    const port = evt.port ?? 'port'
                    this.log.log(`Connecting to ${port}`, LogCategory.Info)
                    this.onStatus(`Connecting to ${port}...`, 'pending')
                }
                return
            }

            case 'link-connected': {
                if (evt.mode === 'connect') {
                    this.log.log(`Connected to ${evt.port} @ ${evt.baudRate} baud`, LogCategory.Info)
                    this.onStatus(`Connected to ${evt.port}`, 'ok')
                } else {
                    this.log.log(`Reconnected to ${evt.port}`, LogCategory.Health)
                    this.onStatus(`Reconnected to ${evt.port}`, 'ok')
                }
                return
            }

            case 'link-open-failed': {
                if (evt.mode === 'connect') {
                    this.log.log(`Connection to ${evt.port} failed: ${evt.error}`, LogCategory.Error)
                    this.onStatus('Connection failed', 'error')
                } else {
                    this.log.log(`Reconnection to ${evt.port} failed: ${evt.error}`, LogCategory.Error)
                    this.onStatus('Reconnection failed, retrying', 'error')
                }
                return
            }

            case 'link-reconnecting': {
                const why = describeReconnectTrigger(evt.trigger)
                this.log.log(`Reconnecting to ${evt.port} (${why})`, LogCategory.Health)
                this.onStatus(`Reconnecting (${why})...`, 'pending')
                return
            }

            case 'link-disconnected': {
                this.log.log(evt.port ? `Disconnected from ${evt.port}` : 'Disconnected', LogCategory.Info)
                this.onStatus('Disconnected', 'idle')
                return
            }

            /* ------------------------------------------------------------------ */
            /*  FAULTS                                                            */
            /* ------------------------------------------------------------------ */

            case 'link-fault': {
                const where = evt.port ? ` on ${evt.port}` : ''
                this.log.log(`Link error${where}: ${evt.error}`, LogCategory.Error)
                return
            }

            case 'close-timeout': {
                this.log.log(`Closing ${evt.port} did not finish within ${evt.timeoutMs} ms`, LogCategory.Error)
                return
            }

            case 'configuration-error': {
                this.log.log(evt.error, LogCategory.Error)
                this.onStatus(evt.error, 'error')
                return
            }

            case 'recoverable-error': {
                this.log.log(evt.error, LogCategory.Error)
                return
            }

            /* ------------------------------------------------------------------ */
            /*  HEALTH                                                            */
            /* ------------------------------------------------------------------ */

            case 'heartbeat-warning': {
                const seconds = Math.round(evt.silentMs / 1000)
                this.log.log(`No data received for ${seconds}s on ${evt.port}`, LogCategory.Health)
                this.onStatus(`Connected to ${evt.port} (no data for ${seconds}s)`, 'warning')
                return
            }

            case 'self-test-passed': {
                this.log.log(`Self-test passed on ${evt.port}`, LogCategory.Health)
                return
            }

            case 'self-test-failed': {
                this.log.log(`Self-test failed on ${evt.port}: ${evt.reason}`, LogCategory.Health)
                return
            }

            /* ------------------------------------------------------------------ */
            /*  DATA                                                              */
            /* ------------------------------------------------------------------ */

            case 'line-received': {
                if (evt.simulated) {
                    this.log.log(`Simulated input: ${evt.line}`, LogCategory.Info)
                }
                return
            }

            case 'line-rejected': {
                this.log.log(`Rejected line "${evt.line}": ${evt.detail}`, LogCategory.Error)
                return
            }

            case 'ports-listed': {
                const text = evt.ports.length
                    ? `Found ${evt.ports.length} port(s): ${evt.ports.join(', ')}`
                    : 'No ports found'
                this.log.log(text, LogCategory.Info)
                return
            }
        }
    }
}
