// services/monitor/src/core/errors.ts

export type TransportOperation = 'open' | 'read' | 'write' | 'close' | 'list'

/**
 * Failure of the byte-stream link. Always recoverable: the supervisor turns
 * it into a reconnect and a log entry, it never reaches the caller.
 */
export class TransportError extends Error {
    public readonly kind = 'TransportError' as const
    public readonly operation: TransportOperation
    public readonly path: string | null

    constructor(operation: TransportOperation, path: string | null, message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = 'TransportError'
        this.operation = operation
        this.path = path
    }
}
