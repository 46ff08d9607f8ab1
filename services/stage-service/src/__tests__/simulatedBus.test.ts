import assert from 'node:assert/strict'
import test from 'node:test'

import { SimulatedMonopackBus } from '../core/bus/SimulatedMonopackBus.js'
import type { BusEvent } from '../core/bus/types.js'
import { MONOPACK_COMMAND as CMD } from '../devices/monopack/commands.js'
import { TransportFailureError } from '../devices/monopack/errors.js'
import { decodeTelegram, encodeTelegram, packInt32LE, readInt32LE } from '../devices/monopack/telegram.js'

async function openBus() {
    const events: BusEvent[] = []
    const bus = new SimulatedMonopackBus(
        [{ address: 7 }, { address: 1, firmware: 210 }],
        { events: { publish: e => events.push(e) } }
    )
    await bus.open()
    return { bus, events }
}

test('simulated bus refuses traffic while closed', async () => {
    const bus = new SimulatedMonopackBus([{ address: 7 }])
    await assert.rejects(bus.request(7, encodeTelegram(7, CMD.GET_VERSION)), TransportFailureError)
    assert.equal(bus.exchanges.length, 0)
})

test('simulated bus reports open and close once each', async () => {
    const { bus, events } = await openBus()
    await bus.open()
    await bus.close()
    await bus.close()
    assert.deepEqual(events.map(e => e.kind), ['bus-opened', 'bus-closed'])
})

test('simulated bus answers each address with its own firmware', async () => {
    const { bus } = await openBus()
    const x = decodeTelegram(await bus.request(7, encodeTelegram(7, CMD.GET_VERSION)))
    const y = decodeTelegram(await bus.request(1, encodeTelegram(1, CMD.GET_VERSION)))
    assert.equal(x.address, 7)
    assert.equal(x.params[0], 209)
    assert.equal(y.address, 1)
    assert.equal(y.params[0], 210)
})

test('simulated bus times out on unknown and muted addresses', async () => {
    const { bus, events } = await openBus()
    await assert.rejects(bus.request(3, encodeTelegram(3, CMD.GET_VERSION), 250), TransportFailureError)

    bus.setMuted(1, true)
    await assert.rejects(bus.request(1, encodeTelegram(1, CMD.GET_VERSION)), TransportFailureError)
    bus.setMuted(1, false)
    await bus.request(1, encodeTelegram(1, CMD.GET_VERSION))

    const timeouts = events.filter(e => e.kind === 'bus-timeout')
    assert.equal(timeouts.length, 2)
    assert.deepEqual(timeouts[0], { kind: 'bus-timeout', at: timeouts[0].at, address: 3, command: 0x43, timeoutMs: 250 })
})

test('simulated bus fails injected exchanges the given number of times', async () => {
    const { bus, events } = await openBus()
    bus.injectFault({ address: 7, command: CMD.SOFT_STOP, times: 2 })

    await bus.send(7, encodeTelegram(7, CMD.EMERGENCY_STOP))
    await assert.rejects(bus.send(7, encodeTelegram(7, CMD.SOFT_STOP)), TransportFailureError)
    await assert.rejects(bus.send(7, encodeTelegram(7, CMD.SOFT_STOP)), TransportFailureError)
    await bus.send(7, encodeTelegram(7, CMD.SOFT_STOP))

    assert.equal(events.filter(e => e.kind === 'bus-error').length, 2)
    assert.deepEqual(bus.commandsFor(7), [CMD.EMERGENCY_STOP, CMD.SOFT_STOP, CMD.SOFT_STOP, CMD.SOFT_STOP])
})

test('simulated bus zeroes the counters when a reference search completes', async () => {
    const { bus } = await openBus()
    bus.placeAt(7, 12_000)
    await bus.send(7, encodeTelegram(7, CMD.REFERENCE_SEARCH))

    const motion = () => bus.request(7, encodeTelegram(7, CMD.GET_ACTUAL_ACCELERATION_VELOCITY))
    assert.equal(decodeTelegram(await motion()).params[5], 1)
    assert.equal(decodeTelegram(await motion()).params[5], 1)
    assert.equal(decodeTelegram(await motion()).params[5], 0)

    const pos = decodeTelegram(await bus.request(7, encodeTelegram(7, CMD.GET_ACTUAL_POSITION)))
    assert.equal(readInt32LE(pos.params, 1), 0)
    assert.equal(bus.snapshot(7).referenceSearches, 1)
})

test('simulated bus aborts a running search on a drive command', async () => {
    const { bus } = await openBus()
    await bus.send(7, encodeTelegram(7, CMD.REFERENCE_SEARCH))
    await bus.send(7, encodeTelegram(7, CMD.DRIVE_RAMP, [0, ...packInt32LE(800)]))

    const snap = bus.snapshot(7)
    assert.equal(snap.searching, false)
    assert.equal(snap.searchAborts, 1)
    assert.equal(snap.moving, true)
    assert.equal(snap.target, 800)
})

test('simulated bus soft stop lands half way to the target', async () => {
    const { bus } = await openBus()
    await bus.send(7, encodeTelegram(7, CMD.DRIVE_RAMP, [0, ...packInt32LE(1000)]))
    await bus.send(7, encodeTelegram(7, CMD.SOFT_STOP))

    const snap = bus.snapshot(7)
    assert.equal(snap.moving, false)
    assert.equal(snap.position, 500)
    assert.equal(snap.encoder, 500)
})

test('simulated bus echoes commands that have no answer of their own', async () => {
    const { bus } = await openBus()
    const frame = encodeTelegram(7, CMD.SWITCH_MODE, [1, 0, 1, 0, 1, 0, 0])
    const echoed = await bus.request(7, frame)
    assert.deepEqual([...echoed], [...frame])
})
