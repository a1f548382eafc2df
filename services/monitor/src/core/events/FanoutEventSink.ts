// services/monitor/src/core/events/FanoutEventSink.ts

export interface EventSink<E> {
    publish(evt: E): void
}

/**
 * Delivers each event to every sink in order. A sink that throws does not
 * stop delivery to the rest; the failure goes to `onSinkError`.
 */
export class FanoutEventSink<E> implements EventSink<E> {
    private readonly sinks: EventSink<E>[]
    private readonly onSinkError: (err: unknown, evt: E) => void

    constructor(sinks: EventSink<E>[], onSinkError: (err: unknown, evt: E) => void) {
        this.sinks = sinks
        this.onSinkError = onSinkError
    }

    publish(evt: E): void {
        for (const sink of this.sinks) {
            try {
                sink.publish(evt)
            } catch (err) {
                this.onSinkError(err, evt)
            }
        }
    }
}
