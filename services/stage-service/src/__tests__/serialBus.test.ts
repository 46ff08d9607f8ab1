import assert from 'node:assert/strict'
import { EventEmitter } from 'node:events'
import test from 'node:test'
import { setTimeout as delay } from 'node:timers/promises'

import { SerialBusTransport, type SerialLine } from '../core/bus/SerialBusTransport.js'
import type { BusEvent } from '../core/bus/types.js'
import { TransportFailureError } from '../devices/monopack/errors.js'
import { encodeTelegram } from '../devices/monopack/telegram.js'

/** In-memory stand-in for a USB/RS-485 adapter. */
class FakeLine extends EventEmitter implements SerialLine {
    public isOpen = false
    public readonly written: Buffer[] = []
    public drainDelayMs = 0
    public writeError: Error | null = null
    public openError: Error | null = null
    /** Bytes fed back once the next write has drained. */
    public reply: Buffer | null = null

    private sink: NodeJS.WritableStream | null = null

    open(): void {
        setImmediate(() => {
            if (this.openError) {
                this.emit('error', this.openError)
                return
            }
            this.isOpen = true
            this.emit('open')
        })
    }

    close(cb: (err: Error | null) => void): void {
        this.isOpen = false
        cb(null)
        this.emit('close')
    }

    write(data: Buffer, cb: (err: Error | null | undefined) => void): boolean {
        this.written.push(Buffer.from(data))
        cb(this.writeError)
        return true
    }

    drain(cb: (err: Error | null) => void): void {
        setTimeout(() => {
            cb(null)
            const reply = this.reply
            this.reply = null
            if (reply) setImmediate(() => this.feed(reply))
        }, this.drainDelayMs)
    }

    pipe<T extends NodeJS.WritableStream>(destination: T): T {
        this.sink = destination
        return destination
    }

    feed(bytes: Buffer): void {
        this.sink?.write(bytes)
    }
}

async function setup(timeoutMs = 200) {
    const line = new FakeLine()
    const events: BusEvent[] = []
    const bus = new SerialBusTransport(
        { path: '/dev/ttyTEST0', baudRate: 9600, responseTimeoutMs: timeoutMs },
        { events: { publish: evt => events.push(evt) }, openLine: () => line }
    )
    await bus.open()
    return { line, bus, events }
}

const query = encodeTelegram(7, 0x43, [])
const answer = encodeTelegram(7, 0x43, [209, 1, 0, 0x38, 0x01])

test('serial bus opens the line and reports it', async () => {
    const { bus, events } = await setup()

    assert.equal(bus.isOpen(), true)
    assert.deepEqual(events, [
        { kind: 'bus-opened', at: events[0].at, transport: 'serial', path: '/dev/ttyTEST0', baudRate: 9600 },
    ])
})

test('serial bus surfaces a failure to open the line', async () => {
    const line = new FakeLine()
    line.openError = new Error('ENOENT')
    const bus = new SerialBusTransport(
        { path: '/dev/ttyMISSING', baudRate: 9600, responseTimeoutMs: 50 },
        { openLine: () => line }
    )

    await assert.rejects(bus.open(), /failed to open \/dev\/ttyMISSING: ENOENT/)
    assert.equal(bus.isOpen(), false)
})

test('serial bus writes the telegram and resolves with the answer', async () => {
    const { line, bus } = await setup()
    line.reply = answer

    const frame = await bus.request(7, query)

    assert.deepEqual(line.written, [query])
    assert.deepEqual(frame, answer)
})

test('serial bus reassembles an answer that arrives in pieces', async () => {
    const { line, bus } = await setup()

    const pending = bus.request(7, query)
    await delay(5)
    line.feed(answer.subarray(0, 4))
    await delay(5)
    line.feed(answer.subarray(4))

    assert.deepEqual(await pending, answer)
})

test('serial bus reports frames nobody asked for as stray', async () => {
    const { line, bus, events } = await setup()
    line.reply = Buffer.concat([answer, encodeTelegram(1, 0x2a, [])])

    await bus.request(7, query)
    await delay(5)

    const stray = events.flatMap(e => (e.kind === 'bus-stray-frame' ? [e.frame] : []))
    assert.deepEqual(stray, ['01 2A 00 00 00 00 00 00 00'])
})

test('serial bus refuses a second exchange while one is in flight', async () => {
    const { line, bus } = await setup()
    line.reply = answer

    const first = bus.request(7, query)
    await assert.rejects(bus.request(1, query), /exchange already in flight/)
    assert.deepEqual(await first, answer)
})

test('serial bus times out a silent device', async () => {
    const { bus, events } = await setup(20)

    await assert.rejects(bus.request(7, query), (err: unknown) => {
        assert.ok(err instanceof TransportFailureError)
        assert.equal(err.message, 'no response from address 7 within 20 ms')
        assert.equal(err.address, 7)
        return true
    })
    const timeouts = events.flatMap(e => (e.kind === 'bus-timeout' ? [e.command] : []))
    assert.deepEqual(timeouts, [0x43])
})

test('serial bus starts the response timeout only after the drain', async () => {
    const { line, bus } = await setup(20)
    line.drainDelayMs = 60
    line.reply = answer

    assert.deepEqual(await bus.request(7, query), answer)

    // no answer this time: the timeout still rejects the caller's promise
    const startedAt = Date.now()
    await assert.rejects(bus.request(7, query), /no response from address 7 within 20 ms/)
    assert.ok(Date.now() - startedAt >= 60)
})

test('serial bus propagates write errors and frees the line', async () => {
    const { line, bus } = await setup()
    line.writeError = new Error('EIO')

    await assert.rejects(bus.request(7, query), /write failed: EIO/)

    line.writeError = null
    line.reply = answer
    assert.deepEqual(await bus.request(7, query), answer)
})

test('serial bus fails the pending exchange when closed', async () => {
    const { bus, events } = await setup(1000)

    const failed = assert.rejects(bus.request(7, query), /bus closed/)
    await bus.close()
    await failed

    assert.equal(bus.isOpen(), false)
    const last = events.at(-1)
    assert.ok(last?.kind === 'bus-closed' && last.reason === 'explicit-close')
    await assert.rejects(bus.request(7, query), /bus not open/)
})

test('serial bus fails the pending exchange on a port error or unexpected close', async () => {
    const { line, bus, events } = await setup(1000)

    const errored = bus.request(7, query)
    line.emit('error', new Error('EIO'))
    await assert.rejects(errored, /port error: EIO/)
    assert.ok(events.some(e => e.kind === 'bus-error' && e.error === 'EIO'))

    const dropped = bus.request(7, query)
    line.isOpen = false
    line.emit('close')
    await assert.rejects(dropped, /port closed unexpectedly/)
    assert.ok(events.some(e => e.kind === 'bus-closed' && e.reason === 'io-error'))
    assert.equal(bus.isOpen(), false)
})
