// services/stage-service/src/devices/xy-stage/StageController.ts

import type { BusTransport } from '../../core/bus/types.js'
import { LockedBusTransport } from '../../core/bus/LockedBusTransport.js'
import { STORAGE } from '../monopack/commands.js'
import {
    InvalidParameterError,
    StageConnectionError,
    StageStateError,
    StageTimeoutError,
    isStageError,
    toErrorShape,
    type StageErrorShape,
} from '../monopack/errors.js'
import { MonopackAxisDriver } from '../monopack/MonopackAxisDriver.js'
import type { AlarmReport, MonopackEventSink, VersionInfo } from '../monopack/types.js'
import { rawToAcceleration, rawToPosition, rawToVelocity } from '../monopack/units.js'
import { sleep } from '../monopack/utils.js'
import { defaultInitSequence } from './defaults.js'
import {
    AXES,
    type AwaitReadyOptions,
    type AxisName,
    type ConnectResult,
    type RampReadback,
    type ReferenceResult,
    type StageConfig,
    type StageEvent,
    type StageEventSink,
    type StagePosition,
    type StageState,
    type StageTransitionListener,
} from './types.js'
import { clampToLimits } from './utils.js'

interface StageControllerDeps {
    /** Bus the controller owns; wrapped in a LockedBusTransport unless it already is one. */
    bus: BusTransport
    events?: StageEventSink
    axisEvents?: MonopackEventSink
}

const MOTION_STATES: readonly StageState[] = ['ready', 'moving']

/**
 * StageController
 *
 * Lifecycle owner for a two-axis stage driven by two drivers on one bus.
 *
 *   disconnected → connected → referencing → ready ⇄ moving
 *
 * Any unexpected bus failure during a lifecycle operation moves the controller
 * to `faulted`; only connect() leaves that state. Operations called outside
 * their valid states throw StageStateError without touching the bus.
 *
 * The controller never logs; everything observable goes through the event
 * sink (see plugins/xyStage.ts for the logger + state fan-out).
 */
export class StageController {
    private readonly config: StageConfig
    private readonly bus: BusTransport
    private readonly events?: StageEventSink
    private readonly drivers: Record<AxisName, MonopackAxisDriver>

    private state: StageState = 'disconnected'
    private referenced = false
    private enabled = true
    private position: StagePosition = { x: null, y: null }
    private lastError: StageErrorShape | null = null

    /** Axes commanded to move and not yet confirmed ready. */
    private readonly pendingAxes = new Set<AxisName>()
    /** Aborted by emergencyStop() to cut a running reference short. */
    private referenceAbort: AbortController | null = null

    private readonly listeners = new Set<StageTransitionListener>()

    constructor(config: StageConfig, deps: StageControllerDeps) {
        if (config.axes.X.address === config.axes.Y.address) {
            throw new InvalidParameterError('axes.Y.address', config.axes.Y.address, `anything but ${config.axes.X.address}`)
        }
        for (const axis of AXES) {
            const { minMm, maxMm } = config.axes[axis]
            if (!(Number.isFinite(minMm) && Number.isFinite(maxMm) && minMm <= maxMm)) {
                throw new InvalidParameterError(`axes.${axis}.limits`, `${minMm}..${maxMm}`, 'finite, min <= max')
            }
        }

        this.config = config
        this.bus = deps.bus instanceof LockedBusTransport ? deps.bus : new LockedBusTransport(deps.bus)
        this.events = deps.events

        const makeDriver = (axis: AxisName) =>
            new MonopackAxisDriver(
                {
                    name: axis,
                    address: config.axes[axis].address,
                    stepMm: config.stepMm,
                    clockHz: config.clockHz,
                    predivider: config.predivider,
                },
                {
                    bus: this.bus,
                    events: deps.axisEvents,
                    encoderSign: config.encoderSign,
                    responseTimeoutMs: config.timing.responseTimeoutMs,
                }
            )

        this.drivers = { X: makeDriver('X'), Y: makeDriver('Y') }
    }

    /* ---------------------------------------------------------------------- */
    /*  Getters + observer                                                    */
    /* ---------------------------------------------------------------------- */

    public getState(): StageState {
        return this.state
    }

    public getPosition(): StagePosition {
        return { ...this.position }
    }

    public getLastError(): StageErrorShape | null {
        return this.lastError
    }

    public isReferenced(): boolean {
        return this.referenced
    }

    public isEnabled(): boolean {
        return this.enabled
    }

    /** Subscribe to state changes; returns the unsubscribe function. */
    public onTransition(listener: StageTransitionListener): () => void {
        this.listeners.add(listener)
        return () => {
            this.listeners.delete(listener)
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Connection                                                            */
    /* ---------------------------------------------------------------------- */

    /**
     * Open the bus (if needed) and query the firmware version of both axes.
     * Never throws; failures come back as `{ ok: false }`.
     */
    public async connect(): Promise<ConnectResult> {
        if (this.state === 'faulted' || this.state === 'disconnected') {
            this.referenced = false
            this.clearPosition()
        }
        this.pendingAxes.clear()

        try {
            if (!this.bus.isOpen()) {
                await this.bus.open()
            }
            const versions: Record<AxisName, VersionInfo> = {
                X: await this.drivers.X.getVersion(),
                Y: await this.drivers.Y.getVersion(),
            }

            this.lastError = null
            this.transition('connected')
            this.publish({ kind: 'stage-connected', at: Date.now(), versions })
            return { ok: true, versions }
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err)
            const error = toErrorShape(new StageConnectionError(`connect failed: ${message}`, err))
            this.lastError = error
            this.referenced = false
            this.clearPosition()
            this.publish({ kind: 'stage-fault', at: Date.now(), operation: 'connect', error })
            this.transition('disconnected')
            return { ok: false, error }
        }
    }

    /**
     * Close the bus from any state. Also valid from `faulted`, so shutdown can
     * release the line; the recorded error is kept for inspection.
     */
    public async disconnect(): Promise<void> {
        this.referenceAbort?.abort(new StageStateError('reference', this.state, 'disconnected'))
        this.pendingAxes.clear()
        this.referenced = false
        this.clearPosition()
        try {
            await this.bus.close()
        } finally {
            this.transition('disconnected')
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Initialization + referencing                                          */
    /* ---------------------------------------------------------------------- */

    /**
     * Write the default parameter set to both axes, then either refresh the
     * position (already referenced) or run reference() when autoReference is on.
     * Returns the referencing outcome, or null when no reference was run.
     */
    public async initialize(): Promise<ReferenceResult | null> {
        this.requireState('initialize', ['connected'])

        await this.guarded('initialize', async () => {
            for (const axis of AXES) {
                const driver = this.drivers[axis]
                for (const step of defaultInitSequence(axis, this.config.predivider)) {
                    await step.run(driver)
                }
            }

            if (this.config.verbose) {
                const readback = {
                    X: await this.readRamp('X'),
                    Y: await this.readRamp('Y'),
                }
                this.publish({ kind: 'stage-initialized', at: Date.now(), rampReadback: readback })
            } else {
                this.publish({ kind: 'stage-initialized', at: Date.now() })
            }
        })

        if (this.referenced) {
            await this.refreshPosition()
            this.transition('ready')
            return { kind: 'ready', position: this.getPosition() }
        }

        if (this.config.autoReference) {
            return this.reference()
        }
        return null
    }

    /**
     * Run the reference search on the requested axes and park them at the
     * reference offset. Device and polling failures come back as a `faulted`
     * result instead of being thrown.
     */
    public async reference(axes: readonly AxisName[] = AXES): Promise<ReferenceResult> {
        this.requireState('reference', ['connected', 'ready'])
        const requested = normalizeAxes(axes)

        const abort = new AbortController()
        this.referenceAbort = abort
        this.pendingAxes.clear()
        this.transition('referencing')

        const { settleMs, postResetMs } = this.config.timing
        const signal = abort.signal

        try {
            for (const axis of requested) {
                await this.drivers[axis].startReferenceSearch()
            }
            for (const axis of requested) {
                await this.pollUntilReady(axis, { signal })
            }

            // the follow mode and the position counters are reset on both axes
            for (const axis of AXES) {
                await this.drivers[axis].setPidFollowMode(0, STORAGE.PERSIST)
            }
            await this.pause(settleMs, signal)
            for (const axis of AXES) {
                await this.drivers[axis].resetPosition()
            }
            await this.pause(postResetMs, signal)

            for (const axis of requested) {
                await this.drivers[axis].driveToPosition(this.config.referenceOffsetRaw, STORAGE.APPLY)
            }
            for (const axis of requested) {
                await this.pollUntilReady(axis, { signal })
            }
        } catch (err) {
            const reason = toErrorShape(err)
            if (signal.aborted) {
                // emergencyStop()/disconnect() already settled the state
                return { kind: 'faulted', reason }
            }
            this.fault('reference', err)
            return { kind: 'faulted', reason }
        } finally {
            if (this.referenceAbort === abort) this.referenceAbort = null
        }

        if (signal.aborted) {
            return { kind: 'faulted', reason: toErrorShape(signal.reason) }
        }

        const offsetMm = rawToPosition(this.config.referenceOffsetRaw, this.drivers.X.identity)
        const next = { ...this.position }
        if (requested.includes('X')) next.x = offsetMm
        if (requested.includes('Y')) next.y = offsetMm

        this.referenced = true
        this.setPosition(next, 'reference')
        this.transition('ready')
        this.publish({ kind: 'stage-referenced', at: Date.now(), axes: [...requested], position: this.getPosition() })

        return { kind: 'ready', position: this.getPosition() }
    }

    /* ---------------------------------------------------------------------- */
    /*  Motion                                                                */
    /* ---------------------------------------------------------------------- */

    /**
     * Clamp each given coordinate to its soft limits and start the ramps.
     * Returns once both telegrams are on the bus; use awaitReady() to wait
     * for the carriage to arrive.
     */
    public async moveTo(target: { x?: number; y?: number }): Promise<StagePosition> {
        this.requireMotion('moveTo')

        const requested: { x?: number; y?: number } = {}
        const clampedTarget: { x?: number; y?: number } = {}
        let clamped = false

        for (const axis of AXES) {
            const key = axisKey(axis)
            const value = target[key]
            if (value === undefined) continue
            if (typeof value !== 'number' || !Number.isFinite(value)) {
                throw new InvalidParameterError(key, value, 'finite number (mm)')
            }
            const c = clampToLimits(value, this.config.axes[axis])
            if (c !== value) clamped = true
            requested[key] = value
            clampedTarget[key] = c
        }

        if (clampedTarget.x === undefined && clampedTarget.y === undefined) {
            throw new InvalidParameterError('target', JSON.stringify(target), 'at least one of x, y')
        }

        this.publish({ kind: 'stage-move-requested', at: Date.now(), requested, target: clampedTarget, clamped })

        await this.guarded('moveTo', async () => {
            for (const axis of AXES) {
                const mm = clampedTarget[axisKey(axis)]
                if (mm === undefined) continue
                await this.drivers[axis].driveToMm(mm)
                this.pendingAxes.add(axis)
            }
        })

        this.transition('moving')
        this.setPosition({ ...this.position, ...clampedTarget }, 'command')
        return this.getPosition()
    }

    public async moveRelative(shift: { dx?: number; dy?: number }): Promise<StagePosition> {
        this.requireMotion('moveRelative')

        const target: { x?: number; y?: number } = {}
        const pairs: Array<[AxisName, number | undefined]> = [['X', shift.dx], ['Y', shift.dy]]
        for (const [axis, d] of pairs) {
            if (d === undefined) continue
            if (typeof d !== 'number' || !Number.isFinite(d)) {
                throw new InvalidParameterError(axis === 'X' ? 'dx' : 'dy', d, 'finite number (mm)')
            }
            const current = this.position[axisKey(axis)]
            if (current === null) {
                throw new StageStateError('moveRelative', this.state, `position of ${axis} unknown`)
            }
            target[axisKey(axis)] = current + d
        }

        return this.moveTo(target)
    }

    public async moveToCenter(): Promise<StagePosition> {
        return this.moveTo({ x: this.config.center.x, y: this.config.center.y })
    }

    public async moveToServicePosition(): Promise<StagePosition> {
        const { x, y } = this.config.servicePosition
        return this.moveTo({ x, y })
    }

    /** Drive the requested axes to 0 mm and wait for them to settle. */
    public async goHome(axes: readonly AxisName[] = AXES): Promise<StagePosition> {
        const requested = normalizeAxes(axes)
        const target: { x?: number; y?: number } = {}
        for (const axis of requested) target[axisKey(axis)] = 0

        await this.moveTo(target)
        for (const axis of requested) {
            await this.awaitReady(axis)
        }
        return this.getPosition()
    }

    /**
     * Poll one axis until two consecutive reads show it standing still with no
     * reference search running. Bounded by a poll budget, a wall-clock deadline
     * and an optional abort signal; exceeding any throws StageTimeoutError.
     */
    public async awaitReady(axis: AxisName, opts: AwaitReadyOptions = {}): Promise<void> {
        this.requireState('awaitReady', ['connected', 'referencing', 'ready', 'moving'])

        try {
            await this.pollUntilReady(axis, opts)
        } catch (err) {
            if (!isStageError(err, 'timeout')) this.fault('awaitReady', err)
            throw err
        }

        this.pendingAxes.delete(axis)
        if (this.state === 'moving' && this.pendingAxes.size === 0) {
            this.transition('ready')
        }
    }

    /** Soft stop both axes and re-read the position from the encoders. */
    public async stop(): Promise<StagePosition> {
        this.requireState('stop', MOTION_STATES)

        await this.guarded('stop', async () => {
            for (const axis of AXES) {
                await this.drivers[axis].softStop()
            }
        })
        this.pendingAxes.clear()
        const position = await this.refreshPosition()
        this.transition('ready')
        return position
    }

    /**
     * Halt both axes immediately. Steps may be lost, so the stage drops back
     * to `connected` and must be referenced again.
     */
    public async emergencyStop(): Promise<void> {
        this.requireState('emergencyStop', ['connected', 'referencing', 'ready', 'moving'])

        this.referenceAbort?.abort(new StageStateError('reference', this.state, 'interrupted by emergency stop'))

        await this.guarded('emergencyStop', async () => {
            for (const axis of AXES) {
                await this.drivers[axis].emergencyStop()
            }
        })

        this.pendingAxes.clear()
        this.referenced = false
        this.clearPosition()
        this.transition('connected')
    }

    /* ---------------------------------------------------------------------- */
    /*  Maintenance                                                           */
    /* ---------------------------------------------------------------------- */

    /** Read both encoder counters into the position cache. */
    public async refreshPosition(): Promise<StagePosition> {
        this.requireState('refreshPosition', ['connected', 'ready', 'moving'])
        if (!this.referenced) {
            throw new StageStateError('refreshPosition', this.state, 'stage not referenced')
        }

        const next = await this.guarded('refreshPosition', async () => ({
            x: (await this.drivers.X.getEncoderCounter()).mm,
            y: (await this.drivers.Y.getEncoderCounter()).mm,
        }))
        this.setPosition(next, 'encoder')
        return this.getPosition()
    }

    /** Clear the alarm output of both axes and report which alarms were latched. */
    public async resetAlarms(): Promise<Record<AxisName, AlarmReport>> {
        this.requireState('resetAlarms', ['connected', 'ready', 'moving'])

        const alarms = await this.guarded('resetAlarms', async () => ({
            X: await this.drivers.X.resetAlarm(),
            Y: await this.drivers.Y.resetAlarm(),
        }))
        this.publish({ kind: 'stage-alarms', at: Date.now(), alarms })
        return alarms
    }

    /** Hardware reset of one driver. The controller must connect() again afterwards. */
    public async rebootAxis(axis: AxisName): Promise<void> {
        this.requireState('rebootAxis', ['connected', 'ready', 'moving'])

        await this.guarded('rebootAxis', () => this.drivers[axis].hardwareReset())

        this.pendingAxes.clear()
        this.referenced = false
        this.clearPosition()
        this.transition('disconnected')
    }

    public setEnabled(enabled: boolean): void {
        if (this.enabled === enabled) return
        this.enabled = enabled
        this.publish({ kind: 'stage-enabled', at: Date.now(), enabled })
    }

    /* ---------------------------------------------------------------------- */
    /*  Internals                                                             */
    /* ---------------------------------------------------------------------- */

    private async readRamp(axis: AxisName): Promise<RampReadback> {
        const driver = this.drivers[axis]
        const settings = await driver.getAccelerationVelocitySettings()
        return {
            ...settings,
            velocityMmPerS: rawToVelocity(settings.velocity, driver.identity),
            accelerationMmPerS2: rawToAcceleration(settings.acceleration, driver.identity),
        }
    }

    private async pollUntilReady(axis: AxisName, opts: AwaitReadyOptions): Promise<void> {
        const { pollIntervalMs, readyMaxPolls, readyDeadlineMs } = this.config.timing
        const maxPolls = opts.maxPolls ?? readyMaxPolls
        const deadlineMs = opts.deadlineMs ?? readyDeadlineMs
        const signal = opts.signal
        const driver = this.drivers[axis]

        const started = Date.now()
        let polls = 0
        let quiet = 0

        for (;;) {
            const elapsed = Date.now() - started
            if (signal?.aborted) throw new StageTimeoutError(axis, polls, elapsed, 'aborted')
            if (polls >= maxPolls) throw new StageTimeoutError(axis, polls, elapsed, 'poll budget exhausted')
            if (elapsed > deadlineMs) throw new StageTimeoutError(axis, polls, elapsed, 'deadline exceeded')

            const motion = await driver.getActualAccelerationVelocity()
            polls += 1

            quiet = motion.velocity === 0 && !motion.referenceSearchActive ? quiet + 1 : 0
            if (quiet >= 2) {
                this.publish({ kind: 'stage-axis-ready', at: Date.now(), axis, polls, elapsedMs: Date.now() - started })
                return
            }

            try {
                await sleep(pollIntervalMs, signal)
            } catch (err) {
                throw new StageTimeoutError(axis, polls, Date.now() - started, `aborted: ${toErrorShape(err).message}`)
            }
        }
    }

    private async pause(ms: number, signal: AbortSignal): Promise<void> {
        if (ms <= 0) {
            signal.throwIfAborted()
            return
        }
        await sleep(ms, signal)
    }

    /** Run a bus operation; any failure other than bad input faults the controller. */
    private async guarded<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn()
        } catch (err) {
            if (!isStageError(err, 'invalid-parameter') && !isStageError(err, 'state-error')) {
                this.fault(operation, err)
            }
            throw err
        }
    }

    private fault(operation: string, err: unknown): void {
        const error = toErrorShape(err)
        this.lastError = error
        this.pendingAxes.clear()
        this.publish({ kind: 'stage-fault', at: Date.now(), operation, error })
        this.transition('faulted')
    }

    private requireState(operation: string, allowed: readonly StageState[]): void {
        if (!allowed.includes(this.state)) {
            throw new StageStateError(operation, this.state)
        }
    }

    private requireMotion(operation: string): void {
        this.requireState(operation, MOTION_STATES)
        if (!this.referenced) {
            throw new StageStateError(operation, this.state, 'stage not referenced')
        }
        if (!this.enabled) {
            throw new StageStateError(operation, this.state, 'stage disabled')
        }
    }

    private transition(to: StageState): void {
        const from = this.state
        if (from === to) return
        this.state = to

        const at = Date.now()
        this.publish({ kind: 'stage-transition', at, from, to })
        for (const listener of this.listeners) {
            listener({ from, to, at })
        }
    }

    private setPosition(position: StagePosition, source: 'command' | 'encoder' | 'reference'): void {
        this.position = { ...position }
        this.publish({ kind: 'stage-position', at: Date.now(), position: this.getPosition(), source })
    }

    private clearPosition(): void {
        if (this.position.x === null && this.position.y === null) return
        this.position = { x: null, y: null }
        this.publish({ kind: 'stage-position', at: Date.now(), position: this.getPosition(), source: 'cleared' })
    }

    private publish(evt: StageEvent): void {
        this.events?.publish(evt)
    }
}

/* -------------------------------------------------------------------------- */

function axisKey(axis: AxisName): 'x' | 'y' {
    return axis === 'X' ? 'x' : 'y'
}

function normalizeAxes(axes: readonly AxisName[]): AxisName[] {
    const out = AXES.filter(a => axes.includes(a))
    if (out.length === 0) {
        throw new InvalidParameterError('axes', axes.join(','), 'X, Y or XY')
    }
    return out
}
