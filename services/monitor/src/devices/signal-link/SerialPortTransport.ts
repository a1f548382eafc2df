// services/monitor/src/devices/signal-link/SerialPortTransport.ts

import { SerialPort } from 'serialport'
import { ReadlineParser } from '@serialport/parser-readline'

import { TransportError } from '../../core/errors.js'
import type {
    LinkHandle,
    LinkHandleListeners,
    LinkOpenOptions,
    LinkTransport,
} from './types.js'
import { errorMessage } from './utils.js'

/**
 * LinkTransport over a real serial port (8N1, newline framed).
 *
 * Lines are decoded as UTF-8; invalid sequences become U+FFFD instead of
 * failing the read.
 */
export class SerialPortTransport implements LinkTransport {
    public async list(): Promise<string[]> {
        try {
            const ports = await SerialPort.list()
            return ports.map(p => p.path)
        } catch (err) {
            throw new TransportError('list', null, `port enumeration failed: ${errorMessage(err)}`, { cause: err })
        }
    }

    public async open(path: string, opts: LinkOpenOptions, listeners: LinkHandleListeners): Promise<LinkHandle> {
        const port = new SerialPort({
            path,
            baudRate: opts.baudRate,
            autoOpen: false,
            dataBits: 8,
            parity: 'none',
            stopBits: 1,
        })

        await new Promise<void>((resolve, reject) => {
            const timer = setTimeout(() => {
                cleanup()
                abandonPort(port)
                reject(new TransportError('open', path, `timeout opening ${path} @ ${opts.baudRate}`))
            }, opts.openTimeoutMs)
            const onOpen = () => { cleanup(); resolve() }
            const onError = (err: Error) => {
                cleanup()
                reject(new TransportError('open', path, `failed to open ${path}: ${err.message}`, { cause: err }))
            }
            const cleanup = () => { clearTimeout(timer); port.off('open', onOpen); port.off('error', onError) }

            port.on('open', onOpen)
            port.on('error', onError)
            port.open()
        })

        const parser = port.pipe(new ReadlineParser({ delimiter: '\n', encoding: 'utf8' }))

        parser.on('data', (line: string) => {
            listeners.onLine(line)
        })

        port.on('error', (err: Error) => {
            listeners.onFault(new TransportError('read', path, err.message, { cause: err }))
        })

        port.on('close', () => {
            listeners.onClose()
        })

        return new SerialPortLinkHandle(path, port)
    }
}

/**
 * Nobody owns a port whose open outlived its timeout. Close it once the open
 * lands so the OS lock is released, and absorb its late errors.
 */
function abandonPort(port: SerialPort): void {
    port.on('error', () => undefined)
    if (port.isOpen) {
        port.close()
        return
    }
    port.once('open', () => {
        port.close()
    })
}

class SerialPortLinkHandle implements LinkHandle {
    public readonly path: string
    private readonly port: SerialPort

    constructor(path: string, port: SerialPort) {
        this.path = path
        this.port = port
    }

    public isOpen(): boolean {
        return this.port.isOpen
    }

    public async write(data: string): Promise<void> {
        const port = this.port
        if (!port.isOpen) {
            throw new TransportError('write', this.path, 'write on closed port')
        }

        await new Promise<void>((resolve, reject) => {
            port.write(data, (err) => {
                if (err) {
                    reject(new TransportError('write', this.path, err.message, { cause: err }))
                } else {
                    resolve()
                }
            })
        })
        await new Promise<void>((resolve, reject) => {
            port.drain((err) => {
                if (err) {
                    reject(new TransportError('write', this.path, err.message, { cause: err }))
                } else {
                    resolve()
                }
            })
        })
    }

    public async close(): Promise<void> {
        const port = this.port
        if (!port.isOpen) return

        await new Promise<void>((resolve, reject) => {
            port.close((err) => {
                if (err) {
                    reject(new TransportError('close', this.path, err.message, { cause: err }))
                } else {
                    resolve()
                }
            })
        })
    }
}
