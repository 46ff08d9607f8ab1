// services/stage-service/src/core/bus/LockedBusTransport.ts

import type { BusTransport } from './types.js'

/**
 * Serializes every exchange on a shared bus, whichever axis issues it.
 *
 * Exchanges are chained in call order. The chain is held for one
 * request/response pair only, never across a whole lifecycle operation.
 */
export class LockedBusTransport implements BusTransport {
    private readonly inner: BusTransport
    private exchangeSeq: Promise<void> = Promise.resolve()

    constructor(inner: BusTransport) {
        this.inner = inner
    }

    open(): Promise<void> {
        return this.inner.open()
    }

    /** Waits for the exchanges already queued, then closes the line. */
    close(): Promise<void> {
        return this.queueExchange(() => this.inner.close())
    }

    isOpen(): boolean {
        return this.inner.isOpen()
    }

    send(address: number, frame: Buffer): Promise<void> {
        return this.queueExchange(() => this.inner.send(address, frame))
    }

    request(address: number, frame: Buffer, timeoutMs?: number): Promise<Buffer> {
        return this.queueExchange(() => this.inner.request(address, frame, timeoutMs))
    }

    private queueExchange<T>(fn: () => Promise<T>): Promise<T> {
        const run = this.exchangeSeq.then(fn)
        // a failed exchange surfaces through `run`; the chain itself keeps going
        this.exchangeSeq = run.then(
            () => undefined,
            () => undefined
        )
        return run
    }
}
