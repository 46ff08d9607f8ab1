// services/stage-service/src/core/bus/SerialBusTransport.ts

import { SerialPort } from 'serialport'
import { ByteLengthParser } from '@serialport/parser-byte-length'

import type { BusEventSink, BusTransport } from './types.js'
import { TransportFailureError } from '../../devices/monopack/errors.js'
import { TELEGRAM_LENGTH, formatTelegram } from '../../devices/monopack/telegram.js'

/** The part of a serialport `SerialPort` this transport drives. */
export interface SerialLine {
    readonly isOpen: boolean
    open(): void
    close(cb: (err: Error | null) => void): void
    write(data: Buffer, cb: (err: Error | null | undefined) => void): unknown
    drain(cb: (err: Error | null) => void): void
    pipe<T extends NodeJS.WritableStream>(destination: T): T
    on(event: 'error', listener: (err: Error) => void): unknown
    on(event: 'close', listener: () => void): unknown
    once(event: 'open', listener: () => void): unknown
    once(event: 'error', listener: (err: Error) => void): unknown
    off(event: 'open', listener: () => void): unknown
    off(event: 'error', listener: (err: Error) => void): unknown
}

export type SerialLineFactory = (opts: { path: string; baudRate: number }) => SerialLine

const openSerialPort: SerialLineFactory = ({ path, baudRate }) =>
    new SerialPort({
        path,
        baudRate,
        autoOpen: false,
        dataBits: 8,
        parity: 'none',
        stopBits: 1,
    })

interface PendingExchange {
    address: number
    command: number
    resolve: (frame: Buffer) => void
    reject: (err: Error) => void
    /** Armed once the telegram has left the adapter. */
    timer?: NodeJS.Timeout
}

/**
 * SerialBusTransport
 *
 * Drives the shared RS-485 line through a USB/serial adapter. Telegrams go out
 * as raw 9-byte writes; inbound bytes are re-chunked into 9-byte responses by a
 * ByteLengthParser. One exchange at a time: a response that arrives while no
 * request is pending is reported as a stray frame and dropped.
 *
 * The response timeout counts from the end of the drain, so a slow adapter
 * does not eat into the device's answer window.
 */
export class SerialBusTransport implements BusTransport {
    private readonly path: string
    private readonly baudRate: number
    private readonly defaultTimeoutMs: number
    private readonly events?: BusEventSink
    private readonly openLine: SerialLineFactory

    private port: SerialLine | null = null
    private pending: PendingExchange | null = null

    constructor(
        opts: { path: string; baudRate: number; responseTimeoutMs: number },
        deps: { events?: BusEventSink; openLine?: SerialLineFactory } = {}
    ) {
        this.path = opts.path
        this.baudRate = opts.baudRate
        this.defaultTimeoutMs = opts.responseTimeoutMs
        this.events = deps.events
        this.openLine = deps.openLine ?? openSerialPort
    }

    public isOpen(): boolean {
        return !!this.port && this.port.isOpen
    }

    public async open(): Promise<void> {
        if (this.isOpen()) return

        const path = this.path
        const baudRate = this.baudRate

        await new Promise<void>((resolve, reject) => {
            const port = this.openLine({ path, baudRate })

            const onOpen = () => {
                port.off('error', onError)
                this.port = port

                const parser = port.pipe(new ByteLengthParser({ length: TELEGRAM_LENGTH }))
                parser.on('data', (chunk: Buffer) => {
                    this.handleFrame(chunk)
                })

                port.on('error', (err: Error) => {
                    this.handlePortError(err)
                })
                port.on('close', () => {
                    this.handlePortClose()
                })

                this.events?.publish({
                    kind: 'bus-opened',
                    at: Date.now(),
                    transport: 'serial',
                    path,
                    baudRate,
                })
                resolve()
            }

            const onError = (err: Error) => {
                port.off('open', onOpen)
                reject(new TransportFailureError(`failed to open ${path}: ${err.message}`, { cause: err }))
            }

            port.once('open', onOpen)
            port.once('error', onError)
            port.open()
        })
    }

    public async close(): Promise<void> {
        const port = this.port
        this.port = null

        this.failPending(new TransportFailureError('bus closed'))

        if (port && port.isOpen) {
            await new Promise<void>((resolve) => {
                port.close(() => resolve())
            })
            this.events?.publish({
                kind: 'bus-closed',
                at: Date.now(),
                transport: 'serial',
                reason: 'explicit-close',
            })
        }
    }

    public async send(address: number, frame: Buffer): Promise<void> {
        await this.write(address, frame)
    }

    public async request(address: number, frame: Buffer, timeoutMs = this.defaultTimeoutMs): Promise<Buffer> {
        if (this.pending) {
            throw new TransportFailureError('exchange already in flight', { address })
        }

        const command = frame[1] ?? 0
        return new Promise<Buffer>((resolve, reject) => {
            const pending: PendingExchange = { address, command, resolve, reject }
            this.pending = pending

            void this.write(address, frame).then(
                () => {
                    // answered, closed or failed while draining
                    if (this.pending !== pending) return
                    pending.timer = setTimeout(() => {
                        if (this.pending !== pending) return
                        this.pending = null
                        this.events?.publish({
                            kind: 'bus-timeout',
                            at: Date.now(),
                            address,
                            command,
                            timeoutMs,
                        })
                        reject(new TransportFailureError(`no response from address ${address} within ${timeoutMs} ms`, { address }))
                    }, timeoutMs)
                },
                (err: unknown) => {
                    if (this.pending === pending) this.pending = null
                    reject(err instanceof Error ? err : new TransportFailureError(String(err), { address }))
                }
            )
        })
    }

    /* ---------------------------------------------------------------------- */
    /*  Internals                                                             */
    /* ---------------------------------------------------------------------- */

    private async write(address: number, frame: Buffer): Promise<void> {
        const port = this.port
        if (!port || !port.isOpen) {
            throw new TransportFailureError('bus not open', { address })
        }

        await new Promise<void>((resolve, reject) => {
            port.write(frame, (err) => {
                if (err) {
                    reject(new TransportFailureError(`write failed: ${err.message}`, { address, cause: err }))
                    return
                }
                port.drain((drainErr) => {
                    if (drainErr) {
                        reject(new TransportFailureError(`drain failed: ${drainErr.message}`, { address, cause: drainErr }))
                    } else {
                        resolve()
                    }
                })
            })
        })
    }

    private handleFrame(frame: Buffer): void {
        const pending = this.pending
        if (!pending) {
            this.events?.publish({
                kind: 'bus-stray-frame',
                at: Date.now(),
                frame: formatTelegram(frame),
            })
            return
        }

        this.pending = null
        clearTimeout(pending.timer)
        pending.resolve(Buffer.from(frame))
    }

    private failPending(err: Error): void {
        const pending = this.pending
        if (!pending) return
        this.pending = null
        clearTimeout(pending.timer)
        pending.reject(
            err instanceof TransportFailureError
                ? err
                : new TransportFailureError(err.message, { address: pending.address, cause: err })
        )
    }

    private handlePortError(err: Error): void {
        this.events?.publish({
            kind: 'bus-error',
            at: Date.now(),
            error: err.message,
        })
        this.failPending(new TransportFailureError(`port error: ${err.message}`, { cause: err }))
    }

    private handlePortClose(): void {
        if (this.port === null) return // explicit close already handled
        this.port = null
        this.failPending(new TransportFailureError('port closed unexpectedly'))
        this.events?.publish({
            kind: 'bus-closed',
            at: Date.now(),
            transport: 'serial',
            reason: 'io-error',
        })
    }
}
