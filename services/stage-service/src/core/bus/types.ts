// services/stage-service/src/core/bus/types.ts

/**
 * Half-duplex request/response channel shared by every driver on the bus.
 *
 * Responses carry no correlation id; they are matched by arrival order, so a
 * caller must never have two exchanges in flight at once (see LockedBusTransport).
 */
export interface BusTransport {
    open(): Promise<void>
    close(): Promise<void>
    isOpen(): boolean

    /** Fire-and-forget telegram for commands without a defined answer. */
    send(address: number, frame: Buffer): Promise<void>

    /**
     * Send one telegram and resolve with the next 9-byte response.
     * Rejects with TransportFailureError on timeout, disconnect or IO error.
     */
    request(address: number, frame: Buffer, timeoutMs?: number): Promise<Buffer>
}

export type BusEvent =
    | {
        kind: 'bus-opened'
        at: number
        transport: string
        path?: string
        baudRate?: number
    }
    | {
        kind: 'bus-closed'
        at: number
        transport: string
        reason: 'explicit-close' | 'io-error' | 'unknown'
    }
    | {
        kind: 'bus-stray-frame'
        at: number
        frame: string
    }
    | {
        kind: 'bus-timeout'
        at: number
        address: number
        command: number
        timeoutMs: number
    }
    | {
        kind: 'bus-error'
        at: number
        error: string
    }

export interface BusEventSink {
    publish(evt: BusEvent): void
}

export interface BusConfig {
    kind: 'serial' | 'sim'
    serial: {
        path: string
        baudRate: number
    }
    /** Default per-exchange response timeout. */
    responseTimeoutMs: number
}
