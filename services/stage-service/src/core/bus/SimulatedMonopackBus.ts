// services/stage-service/src/core/bus/SimulatedMonopackBus.ts

import type { BusEventSink, BusTransport } from './types.js'
import { MONOPACK_COMMAND } from '../../devices/monopack/commands.js'
import { TransportFailureError } from '../../devices/monopack/errors.js'
import {
    decodeTelegram,
    encodeTelegram,
    packInt16LE,
    packInt32LE,
    readInt16LE,
    readInt32LE,
} from '../../devices/monopack/telegram.js'

/* -------------------------------------------------------------------------- */
/*  Options + observable state                                                */
/* -------------------------------------------------------------------------- */

export interface SimulatedAxisOptions {
    address: number
    /** firmware revision as transmitted (209 → V2.09) */
    firmware?: number
    /** temperature in tenths of a degree */
    temperature?: number
    /** motion queries a ramp stays active before it lands on its target */
    movePolls?: number
    /** motion queries a reference search stays active */
    referencePolls?: number
}

export interface SimulatedAlarms {
    driverError: boolean
    deviationError: boolean
    externalAlarm: boolean
    travelCheckError: boolean
    correctionError: boolean
}

export interface SimulatedAxisSnapshot {
    address: number
    position: number
    encoder: number
    target: number
    moving: boolean
    searching: boolean
    /** reference searches cut short by a motion command */
    searchAborts: number
    referenceSearches: number
    resetFlag: boolean
    pidFollow: number
    currents: { standby: number; active: number; acceleration: number }
    ramp: { velocity: number; acceleration: number }
    referenceSearchVelocity: number
    alarms: SimulatedAlarms
}

export interface SimulatedExchange {
    kind: 'send' | 'request'
    address: number
    command: number
    frame: Buffer
}

interface FaultRule {
    address?: number
    command?: number
    remaining: number
}

interface AxisModel extends SimulatedAxisSnapshot {
    firmware: number
    temperature: number
    movePolls: number
    referencePolls: number
    pollsLeft: number
    /** scripted velocity readings consumed before the model's own */
    script: number[]
    muted: boolean
    switches: { left: boolean; right: boolean; reference: boolean }
}

const NO_ALARMS: SimulatedAlarms = {
    driverError: false,
    deviationError: false,
    externalAlarm: false,
    travelCheckError: false,
    correctionError: false,
}

/**
 * SimulatedMonopackBus
 *
 * In-process stand-in for a bus with one or more drivers attached. It speaks
 * the same 9-byte telegrams as the hardware and models just enough motion to
 * exercise the controller: ramps and reference searches complete after a fixed
 * number of motion queries, and any motion command aborts a running search.
 */
export class SimulatedMonopackBus implements BusTransport {
    public readonly exchanges: SimulatedExchange[] = []

    private readonly axes = new Map<number, AxisModel>()
    private readonly faults: FaultRule[] = []
    private readonly events?: BusEventSink
    private opened = false

    constructor(axes: SimulatedAxisOptions[], deps: { events?: BusEventSink } = {}) {
        this.events = deps.events
        for (const opts of axes) {
            this.axes.set(opts.address, makeAxis(opts))
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  BusTransport                                                          */
    /* ---------------------------------------------------------------------- */

    public isOpen(): boolean {
        return this.opened
    }

    public async open(): Promise<void> {
        if (this.opened) return
        this.opened = true
        this.events?.publish({ kind: 'bus-opened', at: Date.now(), transport: 'sim' })
    }

    public async close(): Promise<void> {
        if (!this.opened) return
        this.opened = false
        this.events?.publish({ kind: 'bus-closed', at: Date.now(), transport: 'sim', reason: 'explicit-close' })
    }

    public async send(address: number, frame: Buffer): Promise<void> {
        this.admit('send', address, frame)
        const axis = this.axes.get(address)
        if (!axis || axis.muted) return
        this.handle(axis, frame)
    }

    public async request(address: number, frame: Buffer, timeoutMs = 0): Promise<Buffer> {
        this.admit('request', address, frame)
        const axis = this.axes.get(address)
        if (!axis || axis.muted) {
            this.events?.publish({
                kind: 'bus-timeout',
                at: Date.now(),
                address,
                command: frame[1] ?? 0,
                timeoutMs,
            })
            throw new TransportFailureError(`no response from address ${address}`, { address })
        }
        return this.handle(axis, frame) ?? Buffer.from(frame)
    }

    /* ---------------------------------------------------------------------- */
    /*  Test / demo controls                                                  */
    /* ---------------------------------------------------------------------- */

    public snapshot(address: number): SimulatedAxisSnapshot {
        const a = this.mustAxis(address)
        return {
            address: a.address,
            position: a.position,
            encoder: a.encoder,
            target: a.target,
            moving: a.moving,
            searching: a.searching,
            searchAborts: a.searchAborts,
            referenceSearches: a.referenceSearches,
            resetFlag: a.resetFlag,
            pidFollow: a.pidFollow,
            currents: { ...a.currents },
            ramp: { ...a.ramp },
            referenceSearchVelocity: a.referenceSearchVelocity,
            alarms: { ...a.alarms },
        }
    }

    /** Fail the next `times` exchanges matching address/command with a transport error. */
    public injectFault(rule: { address?: number; command?: number; times?: number } = {}): void {
        this.faults.push({ address: rule.address, command: rule.command, remaining: rule.times ?? 1 })
    }

    /** Stop (or resume) answering on one address, as if its cable were pulled. */
    public setMuted(address: number, muted: boolean): void {
        this.mustAxis(address).muted = muted
    }

    /** Queue velocity readings the next motion queries report, ahead of the model. */
    public scriptVelocities(address: number, velocities: number[]): void {
        this.mustAxis(address).script.push(...velocities)
    }

    public raiseAlarm(address: number, alarms: Partial<SimulatedAlarms>): void {
        const a = this.mustAxis(address)
        a.alarms = { ...a.alarms, ...alarms }
    }

    public setSwitches(address: number, switches: Partial<AxisModel['switches']>): void {
        const a = this.mustAxis(address)
        a.switches = { ...a.switches, ...switches }
    }

    /** Place the carriage somewhere without going through a ramp. */
    public placeAt(address: number, position: number): void {
        const a = this.mustAxis(address)
        a.position = position
        a.encoder = position
        a.target = position
    }

    public commandsFor(address: number): number[] {
        return this.exchanges.filter(e => e.address === address).map(e => e.command)
    }

    /* ---------------------------------------------------------------------- */
    /*  Device model                                                          */
    /* ---------------------------------------------------------------------- */

    private admit(kind: SimulatedExchange['kind'], address: number, frame: Buffer): void {
        if (!this.opened) {
            throw new TransportFailureError('bus not open', { address })
        }
        const command = frame[1] ?? 0
        this.exchanges.push({ kind, address, command, frame: Buffer.from(frame) })

        const idx = this.faults.findIndex(f =>
            (f.address === undefined || f.address === address) &&
            (f.command === undefined || f.command === command)
        )
        if (idx >= 0) {
            const rule = this.faults[idx]
            rule.remaining -= 1
            if (rule.remaining <= 0) this.faults.splice(idx, 1)
            this.events?.publish({ kind: 'bus-error', at: Date.now(), error: `injected fault on address ${address}` })
            throw new TransportFailureError(`injected fault on address ${address}`, { address })
        }
    }

    private handle(a: AxisModel, frame: Buffer): Buffer | null {
        const t = decodeTelegram(frame)
        const p = t.params
        const C = MONOPACK_COMMAND
        const answer = (params: number[]) => encodeTelegram(a.address, t.command, params)

        switch (t.command) {
            case C.CURRENT_CONTROL:
                a.currents = { standby: p[1], active: p[2], acceleration: p[3] }
                return null
            case C.GET_CURRENT_CONTROL:
                return answer([0, a.currents.standby, a.currents.active, a.currents.acceleration])

            case C.VELOCITY_ACCELERATION:
                a.ramp = { acceleration: readInt16LE(p, 1), velocity: readInt16LE(p, 3) }
                return null
            case C.REFERENCE_SEARCH_VELOCITY:
                a.referenceSearchVelocity = readInt16LE(p, 1)
                return null
            case C.GET_ACCELERATION_VELOCITY:
                return answer([
                    0,
                    ...packInt16LE(a.ramp.acceleration),
                    ...packInt16LE(a.referenceSearchVelocity),
                    ...packInt16LE(a.ramp.velocity),
                ])

            case C.GET_ACTUAL_POSITION:
                return answer([0, ...packInt32LE(a.position)])
            case C.GET_ENCODER_COUNTER:
                return answer([0, a.encoder & 0xff, (a.encoder >> 8) & 0xff, (a.encoder >> 16) & 0xff])
            case C.GET_ACTUAL_ACCELERATION_VELOCITY:
                return answer(this.motionAnswer(a))

            case C.DRIVE_RAMP:
                this.abortSearch(a)
                this.startRamp(a, readInt32LE(p, 1))
                return null
            case C.CONSTANT_ROTATION: {
                this.abortSearch(a)
                const v = readInt16LE(p, 1)
                a.moving = v !== 0
                a.pollsLeft = v !== 0 ? Number.POSITIVE_INFINITY : 0
                return null
            }
            case C.RESET_POSITION:
                a.position = 0
                a.encoder = 0
                a.target = 0
                return null
            case C.SOFT_STOP: {
                if (a.moving && Number.isFinite(a.pollsLeft)) {
                    // decelerating ramp ends roughly half way to the target
                    a.position = Math.round((a.position + a.target) / 2)
                    a.encoder = a.position
                }
                a.target = a.position
                a.moving = false
                a.pollsLeft = 0
                return null
            }
            case C.EMERGENCY_STOP:
                a.target = a.position
                a.moving = false
                a.searching = false
                a.pollsLeft = 0
                return null

            case C.REFERENCE_SEARCH:
                a.searching = true
                a.moving = false
                a.referenceSearches += 1
                a.pollsLeft = a.referencePolls
                return null
            case C.GET_SWITCH_STATES:
                return answer([0, a.switches.left ? 1 : 0, a.switches.right ? 1 : 0, a.switches.reference ? 1 : 0])

            case C.PID_FOLLOW:
                a.pidFollow = p[1]
                return null

            case C.RESET_ALARM: {
                const al = a.alarms
                a.alarms = { ...NO_ALARMS }
                return answer([
                    0,
                    al.driverError ? 1 : 0,
                    al.deviationError ? 1 : 0,
                    al.externalAlarm ? 1 : 0,
                    al.travelCheckError ? 1 : 0,
                    al.correctionError ? 1 : 0,
                ])
            }

            case C.GET_VERSION: {
                const flag = a.resetFlag
                a.resetFlag = false
                return answer([a.firmware, flag ? 1 : 0, 0, ...packInt16LE(a.temperature)])
            }
            case C.HARDWARE_RESET:
                a.resetFlag = true
                a.moving = false
                a.searching = false
                a.pollsLeft = 0
                return null

            default:
                // remaining "set" commands are accepted without a modelled effect
                return null
        }
    }

    private motionAnswer(a: AxisModel): number[] {
        this.advance(a)

        const scripted = a.script.shift()
        const velocity = scripted ?? (a.moving ? Math.sign(a.target - a.position || 1) * Math.min(a.ramp.velocity, 2047) : 0)
        const acceleration = a.moving ? Math.min(a.ramp.acceleration, 2047) : 0

        return [
            0,
            ...packInt16LE(velocity),
            ...packInt16LE(acceleration),
            a.searching ? 1 : 0,
            0,
        ]
    }

    private advance(a: AxisModel): void {
        if (a.searching) {
            a.pollsLeft -= 1
            if (a.pollsLeft <= 0) {
                a.searching = false
                a.position = 0
                a.encoder = 0
                a.target = 0
            }
            return
        }
        if (a.moving && Number.isFinite(a.pollsLeft)) {
            a.pollsLeft -= 1
            if (a.pollsLeft <= 0) {
                a.moving = false
                a.position = a.target
                a.encoder = a.target
            }
        }
    }

    private startRamp(a: AxisModel, target: number): void {
        a.target = target
        if (target === a.position) {
            a.moving = false
            a.pollsLeft = 0
            return
        }
        a.moving = true
        a.pollsLeft = a.movePolls
    }

    private abortSearch(a: AxisModel): void {
        if (!a.searching) return
        a.searching = false
        a.searchAborts += 1
        a.pollsLeft = 0
    }

    private mustAxis(address: number): AxisModel {
        const a = this.axes.get(address)
        if (!a) throw new Error(`no simulated axis at address ${address}`)
        return a
    }
}

function makeAxis(opts: SimulatedAxisOptions): AxisModel {
    return {
        address: opts.address,
        firmware: opts.firmware ?? 209,
        temperature: opts.temperature ?? 312,
        movePolls: Math.max(1, opts.movePolls ?? 2),
        referencePolls: Math.max(1, opts.referencePolls ?? 3),
        position: 0,
        encoder: 0,
        target: 0,
        moving: false,
        searching: false,
        searchAborts: 0,
        referenceSearches: 0,
        resetFlag: true,
        pidFollow: 0,
        currents: { standby: 0, active: 0, acceleration: 0 },
        ramp: { velocity: 1000, acceleration: 100 },
        referenceSearchVelocity: 500,
        alarms: { ...NO_ALARMS },
        pollsLeft: 0,
        script: [],
        muted: false,
        switches: { left: false, right: false, reference: false },
    }
}
