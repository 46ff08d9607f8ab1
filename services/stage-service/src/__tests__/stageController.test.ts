import assert from 'node:assert/strict'
import test from 'node:test'
import { setTimeout as delay } from 'node:timers/promises'

import { SimulatedMonopackBus, type SimulatedAxisOptions } from '../core/bus/SimulatedMonopackBus.js'
import { MONOPACK_COMMAND as CMD } from '../devices/monopack/commands.js'
import {
    InvalidParameterError,
    StageStateError,
    StageTimeoutError,
    TransportFailureError,
} from '../devices/monopack/errors.js'
import { StageController } from '../devices/xy-stage/StageController.js'
import type { StageConfig, StageEvent, StageTransition } from '../devices/xy-stage/types.js'

const X = 7
const Y = 1

function testConfig(overrides: Partial<StageConfig> = {}): StageConfig {
    return {
        axes: {
            X: { address: X, minMm: 0, maxMm: 400 },
            Y: { address: Y, minMm: 0, maxMm: 400 },
        },
        stepMm: 0.0002,
        clockHz: 16_000_000,
        predivider: 5,
        center: { x: 200, y: 200 },
        servicePosition: { x: 200, y: 5 },
        encoderSign: 'unsigned',
        autoReference: true,
        verbose: false,
        timing: {
            pollIntervalMs: 1,
            readyMaxPolls: 50,
            readyDeadlineMs: 5000,
            settleMs: 0,
            postResetMs: 0,
            responseTimeoutMs: 100,
        },
        referenceOffsetRaw: 2500,
        ...overrides,
    }
}

function setup(overrides: Partial<StageConfig> = {}, sim: Partial<SimulatedAxisOptions> = {}) {
    const bus = new SimulatedMonopackBus([{ ...sim, address: X }, { ...sim, address: Y }])
    const events: StageEvent[] = []
    const controller = new StageController(testConfig(overrides), {
        bus,
        events: { publish: e => events.push(e) },
    })
    return { bus, events, controller }
}

async function setupReady(overrides: Partial<StageConfig> = {}) {
    const ctx = setup(overrides)
    const connected = await ctx.controller.connect()
    assert.equal(connected.ok, true)
    const result = await ctx.controller.initialize()
    assert.equal(result?.kind, 'ready')
    return ctx
}

function ofKind<K extends StageEvent['kind']>(events: StageEvent[], kind: K): Array<Extract<StageEvent, { kind: K }>> {
    return events.filter((e): e is Extract<StageEvent, { kind: K }> => e.kind === kind)
}

const near = (actual: number | null, expected: number, eps = 1e-9) => {
    assert.ok(actual !== null, 'position unknown')
    assert.ok(Math.abs(actual - expected) < eps, `${actual} !≈ ${expected}`)
}

const INIT_COMMANDS = [
    CMD.RESET_ALARM,
    CMD.SEND_ID,
    CMD.PID_FOLLOW,
    CMD.RESET_POSITION,
    CMD.ALARM_MODE,
    CMD.CURRENT_CONTROL,
    CMD.DEVIATION_ALARM,
    CMD.AUTO_CORRECTION,
    CMD.FREQUENCY_RANGE,
    CMD.MICROSTEP_RESOLUTION,
    CMD.ENCODER_CONFIGURATION,
    CMD.SWITCH_MODE,
    CMD.VELOCITY_ACCELERATION,
    CMD.CURRENT_CONTROL,
    CMD.AUTO_CORRECTION,
    CMD.STOP_SWITCH_DECELERATION,
    CMD.CURRENT_CONTROL,
    CMD.REFERENCE_SEARCH_VELOCITY,
]

const MOTION = CMD.GET_ACTUAL_ACCELERATION_VELOCITY

/* -------------------------------------------------------------------------- */
/*  Construction + connection                                                 */
/* -------------------------------------------------------------------------- */

test('stage controller refuses two axes on one address', () => {
    const bus = new SimulatedMonopackBus([{ address: X }])
    const config = testConfig({
        axes: { X: { address: X, minMm: 0, maxMm: 10 }, Y: { address: X, minMm: 0, maxMm: 10 } },
    })
    assert.throws(() => new StageController(config, { bus }), InvalidParameterError)
})

test('stage controller refuses inverted soft limits', () => {
    const bus = new SimulatedMonopackBus([{ address: X }, { address: Y }])
    const config = testConfig({
        axes: { X: { address: X, minMm: 10, maxMm: 0 }, Y: { address: Y, minMm: 0, maxMm: 10 } },
    })
    assert.throws(() => new StageController(config, { bus }), InvalidParameterError)
})

test('stage controller connects and reports both firmware versions', async () => {
    const { controller, events, bus } = setup()
    const result = await controller.connect()

    assert.deepEqual(result, {
        ok: true,
        versions: {
            X: { firmware: 2.09, resetFlag: true, temperature: 31.2 },
            Y: { firmware: 2.09, resetFlag: true, temperature: 31.2 },
        },
    })
    assert.equal(controller.getState(), 'connected')
    assert.equal(bus.isOpen(), true)
    assert.deepEqual(ofKind(events, 'stage-transition').map(t => t.to), ['connected'])
})

test('stage controller connect failure leaves it disconnected with the error recorded', async () => {
    const { controller, events, bus } = setup()
    bus.setMuted(Y, true)

    const result = await controller.connect()

    assert.equal(result.ok, false)
    if (!result.ok) assert.equal(result.error.kind, 'connection-error')
    assert.equal(controller.getState(), 'disconnected')
    assert.equal(controller.getLastError()?.kind, 'connection-error')
    assert.deepEqual(ofKind(events, 'stage-fault').map(f => f.operation), ['connect'])
})

test('stage controller disconnect closes the bus and forgets the reference', async () => {
    const { controller, bus } = await setupReady()
    await controller.disconnect()

    assert.equal(controller.getState(), 'disconnected')
    assert.equal(controller.isReferenced(), false)
    assert.deepEqual(controller.getPosition(), { x: null, y: null })
    assert.equal(bus.isOpen(), false)
})

/* -------------------------------------------------------------------------- */
/*  Initialization + referencing                                              */
/* -------------------------------------------------------------------------- */

test('stage controller initializes X fully before Y and then references both', async () => {
    const { controller, bus } = await setupReady()

    for (const address of [X, Y]) {
        const commands = bus.commandsFor(address)
        assert.deepEqual(commands.slice(0, 19), [CMD.GET_VERSION, ...INIT_COMMANDS])
        assert.deepEqual(commands.slice(19), [
            CMD.REFERENCE_SEARCH,
            MOTION, MOTION, MOTION, MOTION,
            CMD.PID_FOLLOW,
            CMD.RESET_POSITION,
            CMD.DRIVE_RAMP,
            MOTION, MOTION, MOTION,
        ])
    }

    const lastXInit = bus.exchanges.findIndex(e => e.address === X && e.command === CMD.REFERENCE_SEARCH_VELOCITY)
    const firstYInit = bus.exchanges.findIndex(e => e.address === Y && e.command === CMD.RESET_ALARM)
    assert.ok(lastXInit < firstYInit)

    assert.equal(controller.getState(), 'ready')
    assert.equal(controller.isReferenced(), true)
    near(controller.getPosition().x, 0.5)
    near(controller.getPosition().y, 0.5)
    assert.equal(bus.snapshot(X).position, 2500)
    assert.equal(bus.snapshot(Y).position, 2500)
})

test('stage controller drives to the reference offset with the apply storage byte', async () => {
    const { bus } = await setupReady()
    const drive = bus.exchanges.find(e => e.address === X && e.command === CMD.DRIVE_RAMP)
    assert.deepEqual(drive ? [...drive.frame] : [], [0x07, 0x23, 0x01, 0xc4, 0x09, 0x00, 0x00, 0x00, 0x00])
})

test('stage controller writes the operating currents of each axis', async () => {
    const { bus } = await setupReady()
    assert.deepEqual(bus.snapshot(X).currents, { standby: 0x47, active: 0xad, acceleration: 0xff })
    assert.deepEqual(bus.snapshot(Y).currents, { standby: 0x47, active: 0xad, acceleration: 0xad })
    assert.deepEqual(bus.snapshot(X).ramp, { velocity: 4915, acceleration: 245 })
    assert.equal(bus.snapshot(Y).referenceSearchVelocity, 1228)
})

test('stage controller initialize without auto reference stays connected', async () => {
    const { controller, events } = setup({ autoReference: false, verbose: true })
    await controller.connect()

    const result = await controller.initialize()

    assert.equal(result, null)
    assert.equal(controller.getState(), 'connected')
    const [initialized] = ofKind(events, 'stage-initialized')
    const readback = initialized.rampReadback
    assert.ok(readback)
    for (const axis of ['X', 'Y'] as const) {
        const { velocityMmPerS, accelerationMmPerS2, ...raw } = readback[axis]
        assert.deepEqual(raw, { acceleration: 245, referenceSearchVelocity: 1228, velocity: 4915 })
        // 2^20 / (16 MHz * 0.0002 mm) = 327.68 codes per mm/s
        near(velocityMmPerS, 4915 / 327.68)
        near(accelerationMmPerS2, 245 / 327.68)
    }
})

test('stage controller skips the search when initializing an already referenced stage', async () => {
    const { controller, bus } = await setupReady()

    const reconnected = await controller.connect()
    assert.equal(reconnected.ok, true)
    assert.equal(controller.getState(), 'connected')
    assert.equal(controller.isReferenced(), true)

    const result = await controller.initialize()

    assert.equal(result?.kind, 'ready')
    assert.equal(controller.getState(), 'ready')
    assert.equal(bus.snapshot(X).referenceSearches, 1)
})

test('stage controller references a single axis and leaves the other unknown', async () => {
    const { controller, bus } = setup()
    await controller.connect()

    const result = await controller.reference(['Y'])

    assert.equal(result.kind, 'ready')
    assert.equal(controller.getPosition().x, null)
    near(controller.getPosition().y, 0.5)
    assert.equal(bus.snapshot(X).referenceSearches, 0)
    assert.equal(bus.snapshot(Y).referenceSearches, 1)
    // follow mode and counters are reset on both axes
    assert.deepEqual(bus.commandsFor(X).slice(1), [CMD.PID_FOLLOW, CMD.RESET_POSITION])

    await assert.rejects(controller.moveRelative({ dx: 1 }), StageStateError)
})

test('stage controller rejects lifecycle calls in the wrong state without bus traffic', async () => {
    const { controller, bus } = setup()

    await assert.rejects(controller.initialize(), StageStateError)
    await assert.rejects(controller.reference(), StageStateError)
    await assert.rejects(controller.moveTo({ x: 1 }), StageStateError)
    await assert.rejects(controller.stop(), StageStateError)
    await assert.rejects(controller.emergencyStop(), StageStateError)

    assert.equal(bus.exchanges.length, 0)
    assert.equal(controller.getState(), 'disconnected')
})

test('stage controller emergency stop cuts a running reference short', async () => {
    const { controller, events, bus } = setup(
        { timing: { ...testConfig().timing, pollIntervalMs: 20 } },
        { referencePolls: 100 }
    )
    await controller.connect()

    const pending = controller.reference()
    await delay(30)
    assert.equal(controller.getState(), 'referencing')

    await controller.emergencyStop()
    const result = await pending

    assert.equal(result.kind, 'faulted')
    if (result.kind === 'faulted') assert.equal(result.reason.kind, 'timeout')
    assert.equal(controller.getState(), 'connected')
    assert.equal(controller.isReferenced(), false)
    assert.equal(bus.snapshot(X).searching, false)
    assert.equal(ofKind(events, 'stage-transition').some(t => t.to === 'faulted'), false)
})

test('stage controller refuses moves until the reference search has finished', async () => {
    const { controller, bus } = setup(
        { timing: { ...testConfig().timing, pollIntervalMs: 20 } },
        { referencePolls: 100 }
    )
    await controller.connect()

    const pending = controller.reference()
    await delay(30)
    assert.equal(controller.getState(), 'referencing')

    await assert.rejects(controller.moveTo({ x: 10 }), StageStateError)
    await assert.rejects(controller.moveToCenter(), StageStateError)
    await assert.rejects(controller.goHome(['X', 'Y']), StageStateError)
    assert.equal(bus.exchanges.some(e => e.command === CMD.DRIVE_RAMP), false)
    assert.equal(controller.getState(), 'referencing')

    await controller.emergencyStop()
    await pending
    assert.equal(bus.exchanges.some(e => e.command === CMD.DRIVE_RAMP), false)
})

/* -------------------------------------------------------------------------- */
/*  Motion                                                                    */
/* -------------------------------------------------------------------------- */

test('stage controller clamps targets to the soft limits', async () => {
    const { controller, events, bus } = await setupReady()

    const target = await controller.moveTo({ x: 500, y: -3 })

    assert.deepEqual(target, { x: 400, y: 0 })
    assert.equal(controller.getState(), 'moving')
    const [requested] = ofKind(events, 'stage-move-requested')
    assert.deepEqual(requested.requested, { x: 500, y: -3 })
    assert.deepEqual(requested.target, { x: 400, y: 0 })
    assert.equal(requested.clamped, true)

    await controller.awaitReady('X')
    assert.equal(controller.getState(), 'moving')
    await controller.awaitReady('Y')
    assert.equal(controller.getState(), 'ready')

    assert.equal(bus.snapshot(X).position, 2_000_000)
    assert.equal(bus.snapshot(Y).position, 0)
})

test('stage controller moves persist the drive target', async () => {
    const { controller, bus } = await setupReady()
    await controller.moveTo({ x: 0.5 })
    const drives = bus.exchanges.filter(e => e.address === X && e.command === CMD.DRIVE_RAMP)
    const last = drives[drives.length - 1]
    assert.deepEqual([...last.frame], [0x07, 0x23, 0x00, 0xc4, 0x09, 0x00, 0x00, 0x00, 0x00])
})

test('stage controller rejects bad targets without faulting', async () => {
    const { controller, bus } = await setupReady()
    const before = bus.exchanges.length

    await assert.rejects(controller.moveTo({ x: Number.NaN }), InvalidParameterError)
    await assert.rejects(controller.moveTo({}), InvalidParameterError)
    await assert.rejects(controller.moveRelative({ dy: Number.POSITIVE_INFINITY }), InvalidParameterError)

    assert.equal(bus.exchanges.length, before)
    assert.equal(controller.getState(), 'ready')
})

test('stage controller refuses motion while disabled', async () => {
    const { controller, events } = await setupReady()
    controller.setEnabled(false)

    await assert.rejects(controller.moveTo({ x: 10 }), /stage disabled/)

    controller.setEnabled(true)
    await controller.moveTo({ x: 10 })
    assert.deepEqual(ofKind(events, 'stage-enabled').map(e => e.enabled), [false, true])
})

test('stage controller moves relative to the cached position', async () => {
    const { controller } = await setupReady()

    const target = await controller.moveRelative({ dx: 10 })

    near(target.x, 10.5)
    near(target.y, 0.5)
})

test('stage controller moves to the configured center', async () => {
    const { controller } = await setupReady()
    assert.deepEqual(await controller.moveToCenter(), { x: 200, y: 200 })
})

test('stage controller parks at the service position', async () => {
    const { controller, bus } = await setupReady()

    assert.deepEqual(await controller.moveToServicePosition(), { x: 200, y: 5 })
    await controller.awaitReady('X')
    await controller.awaitReady('Y')
    assert.equal(bus.snapshot(X).position, 1_000_000)
    assert.equal(bus.snapshot(Y).position, 25_000)
})

test('stage controller goes home on the requested axes only', async () => {
    const { controller, bus } = await setupReady()

    const position = await controller.goHome(['X'])

    assert.equal(position.x, 0)
    near(position.y, 0.5)
    assert.equal(controller.getState(), 'ready')
    assert.equal(bus.snapshot(X).position, 0)
    assert.equal(bus.snapshot(Y).position, 2500)
})

test('stage controller soft stop reads the position back from the encoders', async () => {
    const { controller, bus } = await setupReady()
    await controller.moveTo({ x: 100 })

    const position = await controller.stop()

    // ramp from 2500 towards 500000 stops half way
    assert.equal(bus.snapshot(X).position, 251_250)
    near(position.x, 50.25)
    near(position.y, 0.5)
    assert.equal(controller.getState(), 'ready')
})

/* -------------------------------------------------------------------------- */
/*  Readiness polling                                                         */
/* -------------------------------------------------------------------------- */

test('stage controller needs two quiet reads in a row before an axis is ready', async () => {
    const { controller, events, bus } = await setupReady()
    bus.scriptVelocities(X, [0, 3, 0])

    await controller.awaitReady('X')

    const ready = ofKind(events, 'stage-axis-ready')
    assert.equal(ready[ready.length - 1].polls, 4)
})

test('stage controller gives up after the poll budget without faulting', async () => {
    const { controller, bus } = await setupReady()
    bus.scriptVelocities(X, Array.from({ length: 10 }, () => 100))

    await assert.rejects(controller.awaitReady('X', { maxPolls: 3 }), (err: unknown) => {
        assert.ok(err instanceof StageTimeoutError)
        assert.equal(err.polls, 3)
        assert.match(err.message, /poll budget exhausted/)
        return true
    })
    assert.equal(controller.getState(), 'ready')
})

test('stage controller gives up at the deadline', async () => {
    const { controller, bus } = await setupReady()
    bus.scriptVelocities(X, Array.from({ length: 50 }, () => 100))

    await assert.rejects(controller.awaitReady('X', { deadlineMs: 0 }), /deadline exceeded/)
})

test('stage controller stops polling once the signal aborts', async () => {
    const { controller } = await setupReady()
    const abort = new AbortController()
    abort.abort()

    await assert.rejects(controller.awaitReady('X', { signal: abort.signal }), (err: unknown) => {
        assert.ok(err instanceof StageTimeoutError)
        assert.equal(err.polls, 0)
        return true
    })
})

/* -------------------------------------------------------------------------- */
/*  Faults + recovery                                                         */
/* -------------------------------------------------------------------------- */

test('stage controller faults on a bus failure and recovers through connect', async () => {
    const { controller, events, bus } = await setupReady()
    bus.injectFault({ address: Y, command: CMD.DRIVE_RAMP })

    await assert.rejects(controller.moveTo({ x: 10, y: 10 }), TransportFailureError)

    assert.equal(controller.getState(), 'faulted')
    assert.equal(controller.getLastError()?.kind, 'transport-failure')
    assert.deepEqual(ofKind(events, 'stage-fault').map(f => f.operation), ['moveTo'])
    await assert.rejects(controller.moveTo({ x: 10 }), StageStateError)

    const result = await controller.connect()

    assert.equal(result.ok, true)
    assert.equal(controller.getState(), 'connected')
    assert.equal(controller.isReferenced(), false)
    assert.deepEqual(controller.getPosition(), { x: null, y: null })
    assert.equal(controller.getLastError(), null)
})

test('stage controller releases the bus from the faulted state', async () => {
    const { controller, bus } = await setupReady()
    bus.injectFault({ address: X, command: CMD.DRIVE_RAMP })
    await assert.rejects(controller.moveTo({ x: 10 }), TransportFailureError)
    assert.equal(controller.getState(), 'faulted')

    await controller.disconnect()

    assert.equal(controller.getState(), 'disconnected')
    assert.equal(bus.isOpen(), false)
    assert.equal(controller.getLastError()?.kind, 'transport-failure')
    await assert.rejects(controller.initialize(), StageStateError)
})

test('stage controller reference failure comes back as a faulted result', async () => {
    const { controller, events, bus } = setup()
    await controller.connect()
    bus.setMuted(X, true)

    const result = await controller.reference()

    assert.equal(result.kind, 'faulted')
    if (result.kind === 'faulted') assert.equal(result.reason.kind, 'transport-failure')
    assert.equal(controller.getState(), 'faulted')
    assert.equal(controller.isReferenced(), false)
    assert.deepEqual(ofKind(events, 'stage-fault').map(f => f.operation), ['reference'])
})

test('stage controller reports latched alarms of both axes', async () => {
    const { controller, events, bus } = await setupReady()
    bus.raiseAlarm(Y, { externalAlarm: true })

    const alarms = await controller.resetAlarms()

    assert.equal(alarms.Y.externalAlarm, true)
    assert.equal(alarms.X.externalAlarm, false)
    assert.equal(ofKind(events, 'stage-alarms').length, 1)
})

test('stage controller reboot of one axis requires a new connect', async () => {
    const { controller, bus } = await setupReady()

    await controller.rebootAxis('Y')

    assert.equal(controller.getState(), 'disconnected')
    assert.equal(bus.snapshot(Y).resetFlag, true)
    assert.equal(controller.isReferenced(), false)
})

test('stage controller notifies transition listeners until they unsubscribe', async () => {
    const { controller } = setup()
    const seen: StageTransition[] = []
    const unsubscribe = controller.onTransition(t => seen.push(t))

    await controller.connect()
    unsubscribe()
    await controller.disconnect()

    assert.deepEqual(seen.map(t => [t.from, t.to]), [['disconnected', 'connected']])
})
