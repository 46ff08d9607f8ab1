// services/stage-service/src/devices/monopack/MonopackAxisDriver.ts

import type { BusTransport } from '../../core/bus/types.js'
import {
    FACTORY_RESET_KEY,
    MONOPACK_COMMAND as CMD,
    PID_REGISTER_BYTES,
    STORAGE,
    type CanBaudRateCode,
    type PidRegisterCommand,
} from './commands.js'
import {
    InvalidParameterError,
    MalformedFrameError,
    ProtocolMismatchError,
    StageError,
    TransportFailureError,
} from './errors.js'
import {
    decodeTelegram,
    encodeTelegram,
    formatTelegram,
    packInt16LE,
    packInt32LE,
    packInt8,
    packUInt16LE,
    packUInt32LE,
    readInt12LE,
    readInt16LE,
    readInt24LE,
    readInt32LE,
    readUInt24LE,
    type Telegram,
} from './telegram.js'
import type {
    AccelerationVelocitySettings,
    ActualMotion,
    AlarmMode,
    AlarmReport,
    AutoCorrection,
    AxisIdentity,
    CurrentControl,
    CurrentControlSettings,
    CurrentLimitCode,
    DeviationAlarm,
    EncoderConfiguration,
    EncoderReading,
    EncoderSignPolicy,
    MicrostepResolution,
    MonopackEventSink,
    RampSettings,
    SwitchMode,
    SwitchStates,
    VersionInfo,
} from './types.js'
import { positionToRaw, rawToPosition } from './units.js'
import { assertBool, assertIntInRange, assertOneOf, assertStorage, bit } from './utils.js'

export interface MonopackAxisDriverDeps {
    /** Shared, non-owned bus. */
    bus: BusTransport
    events?: MonopackEventSink
    encoderSign?: EncoderSignPolicy
    /** Per-exchange timeout handed to the transport; transport default when omitted. */
    responseTimeoutMs?: number
}

const RAMP_MAX = 8191
const POSITION_MIN = -8_388_608
const POSITION_MAX = 16_777_215
const ID_MAX = 2047

/**
 * MonopackAxisDriver
 *
 * One method per command of the driver's binary protocol. "Set" methods check
 * every argument before anything reaches the bus and then send exactly one
 * telegram; "get" methods perform one request/response exchange and verify the
 * echoed command and address before decoding.
 *
 * The driver never retries and keeps no state beyond its identity.
 */
export class MonopackAxisDriver {
    public readonly identity: Readonly<AxisIdentity>

    private readonly bus: BusTransport
    private readonly events?: MonopackEventSink
    private readonly encoderSign: EncoderSignPolicy
    private readonly responseTimeoutMs?: number

    constructor(identity: AxisIdentity, deps: MonopackAxisDriverDeps) {
        assertIntInRange('address', identity.address, 0, 0xff)
        assertIntInRange('predivider', identity.predivider, 0, 15)
        if (!(identity.stepMm > 0)) {
            throw new InvalidParameterError('stepMm', identity.stepMm, '> 0')
        }
        if (!(identity.clockHz > 0)) {
            throw new InvalidParameterError('clockHz', identity.clockHz, '> 0')
        }

        this.identity = Object.freeze({ ...identity })
        this.bus = deps.bus
        this.events = deps.events
        this.encoderSign = deps.encoderSign ?? 'unsigned'
        this.responseTimeoutMs = deps.responseTimeoutMs
    }

    public get name(): string {
        return this.identity.name
    }

    public get address(): number {
        return this.identity.address
    }

    /* ---------------------------------------------------------------------- */
    /*  Motor current + frequency                                             */
    /* ---------------------------------------------------------------------- */

    public async setCurrentLimit(limit: CurrentLimitCode, storage: number = STORAGE.APPLY): Promise<void> {
        const p0 = assertStorage(storage)
        const p1 = assertOneOf('limit', limit, [0, 1, 2, 3] as const)
        await this.command(CMD.CURRENT_LIMIT, [p0, p1])
    }

    public async setCurrentControl(c: CurrentControl, storage: number = STORAGE.APPLY): Promise<void> {
        const p0 = assertStorage(storage)
        const standby = assertIntInRange('standby', c.standby, 0, 255)
        const active = assertIntInRange('active', c.active, 0, 255)
        const acceleration = assertIntInRange('acceleration', c.acceleration, 0, 255)
        await this.command(CMD.CURRENT_CONTROL, [p0, standby, active, acceleration])
    }

    public async getCurrentControlSettings(): Promise<CurrentControlSettings> {
        const p = await this.query(CMD.GET_CURRENT_CONTROL)
        return { standby: p[1], active: p[2], acceleration: p[3] }
    }

    public async setFrequencyRange(predivider: number, storage: number = STORAGE.APPLY): Promise<void> {
        const p0 = assertStorage(storage)
        await this.command(CMD.FREQUENCY_RANGE, [p0, assertIntInRange('predivider', predivider, 0, 15)])
    }

    public async setMicrostepResolution(m: MicrostepResolution, storage: number = STORAGE.APPLY): Promise<void> {
        const p0 = assertStorage(storage)
        const resolution = assertIntInRange('resolution', m.resolution, 1, 67)
        const waveform = assertIntInRange('waveform', m.waveform, -127, 127)
        const mixedDecay = assertBool('mixedDecay', m.mixedDecay)
        await this.command(CMD.MICROSTEP_RESOLUTION, [p0, resolution, ...packInt8(waveform), 0, 0, bit(mixedDecay)])
    }

    /* ---------------------------------------------------------------------- */
    /*  Ramp parameters                                                       */
    /* ---------------------------------------------------------------------- */

    public async setVelocity(r: RampSettings, storage: number = STORAGE.APPLY): Promise<void> {
        const p0 = assertStorage(storage)
        const velocity = assertIntInRange('velocity', r.velocity, 1, RAMP_MAX)
        const acceleration = assertIntInRange('acceleration', r.acceleration, 1, RAMP_MAX)
        await this.command(CMD.VELOCITY_ACCELERATION, [p0, ...packInt16LE(acceleration), ...packInt16LE(velocity)])
    }

    public async setBow(bow: number, storage: number = STORAGE.APPLY): Promise<void> {
        const p0 = assertStorage(storage)
        await this.command(CMD.BOW, [p0, ...packUInt16LE(assertIntInRange('bow', bow, 1, RAMP_MAX))])
    }

    public async getAccelerationVelocitySettings(): Promise<AccelerationVelocitySettings> {
        const p = await this.query(CMD.GET_ACCELERATION_VELOCITY)
        return {
            acceleration: readInt16LE(p, 1),
            referenceSearchVelocity: readInt16LE(p, 3),
            velocity: readInt16LE(p, 5),
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Motion                                                                */
    /* ---------------------------------------------------------------------- */

    public async getActualPosition(): Promise<number> {
        const p = await this.query(CMD.GET_ACTUAL_POSITION)
        return readInt32LE(p, 1)
    }

    public async getActualAccelerationVelocity(): Promise<ActualMotion> {
        const p = await this.query(CMD.GET_ACTUAL_ACCELERATION_VELOCITY)
        return {
            velocity: readInt12LE(p, 1),
            acceleration: readInt12LE(p, 3),
            referenceSearchActive: p[5] !== 0,
            autoCorrectionActive: p[6] !== 0,
        }
    }

    public async driveToPosition(position: number, storage: number = STORAGE.PERSIST): Promise<void> {
        const p0 = assertStorage(storage)
        const target = assertIntInRange('position', position, POSITION_MIN, POSITION_MAX)
        await this.command(CMD.DRIVE_RAMP, [p0, ...packInt32LE(target)])
    }

    /** Drive to `mm` from the reference point; returns the raw target sent. */
    public async driveToMm(mm: number): Promise<number> {
        const raw = positionToRaw(mm, this.identity)
        await this.driveToPosition(raw)
        return raw
    }

    public async rotate(velocity: number): Promise<void> {
        const v = assertIntInRange('velocity', velocity, -RAMP_MAX, RAMP_MAX)
        await this.command(CMD.CONSTANT_ROTATION, [0, ...packInt16LE(v)])
    }

    public async resetPosition(): Promise<void> {
        await this.command(CMD.RESET_POSITION)
    }

    public async softStop(): Promise<void> {
        await this.command(CMD.SOFT_STOP)
    }

    public async emergencyStop(): Promise<void> {
        await this.command(CMD.EMERGENCY_STOP)
    }

    /* ---------------------------------------------------------------------- */
    /*  Stop / reference switches                                             */
    /* ---------------------------------------------------------------------- */

    public async setSwitchMode(m: SwitchMode, storage: number = STORAGE.APPLY): Promise<void> {
        const p0 = assertStorage(storage)
        await this.command(CMD.SWITCH_MODE, [
            p0,
            0,
            bit(assertBool('stopAsReference', m.stopAsReference)),
            bit(assertBool('rightSwitch', m.rightSwitch)),
            bit(assertBool('linear', m.linear)),
            0,
            bit(assertBool('travelCheck', m.travelCheck)),
        ])
    }

    public async setStopSwitchDeceleration(deceleration: number, storage: number = STORAGE.APPLY): Promise<void> {
        const p0 = assertStorage(storage)
        const d = assertIntInRange('deceleration', deceleration, 0, RAMP_MAX)
        await this.command(CMD.STOP_SWITCH_DECELERATION, [p0, ...packInt16LE(d)])
    }

    public async startReferenceSearch(): Promise<void> {
        await this.command(CMD.REFERENCE_SEARCH)
    }

    public async setReferenceSearchVelocity(velocity: number, storage: number = STORAGE.APPLY): Promise<void> {
        const p0 = assertStorage(storage)
        const v = assertIntInRange('velocity', velocity, -RAMP_MAX, RAMP_MAX)
        await this.command(CMD.REFERENCE_SEARCH_VELOCITY, [p0, ...packInt16LE(v)])
    }

    public async setTravelCheckTolerance(tolerance: number, storage: number = STORAGE.APPLY): Promise<void> {
        const p0 = assertStorage(storage)
        await this.command(CMD.TRAVEL_CHECK_TOLERANCE, [p0, assertIntInRange('tolerance', tolerance, 0, 255)])
    }

    public async setMicrostepsPerRevolution(microsteps: number, storage: number = STORAGE.APPLY): Promise<void> {
        const p0 = assertStorage(storage)
        const n = assertIntInRange('microsteps', microsteps, 0, POSITION_MAX)
        await this.command(CMD.MICROSTEPS_PER_REVOLUTION, [p0, ...packInt32LE(n)])
    }

    public async getSwitchStates(): Promise<SwitchStates> {
        const p = await this.query(CMD.GET_SWITCH_STATES)
        return { left: p[1] !== 0, right: p[2] !== 0, reference: p[3] !== 0 }
    }

    /* ---------------------------------------------------------------------- */
    /*  Encoder, deviation, auto-correction                                   */
    /* ---------------------------------------------------------------------- */

    public async configureEncoder(e: EncoderConfiguration, storage: number = STORAGE.APPLY): Promise<void> {
        const p0 = assertStorage(storage)
        const flags = assertIntInRange('flags', e.flags, 0, 127)
        const predivider = assertIntInRange('encoderPredivider', e.predivider, 0, 255)
        const maxDeviation = assertIntInRange('maxDeviation', e.maxDeviation, 0, 2047)
        const multiplier = assertIntInRange('multiplier', e.multiplier, 0, 255)
        await this.command(CMD.ENCODER_CONFIGURATION, [p0, flags, predivider, ...packUInt16LE(maxDeviation), multiplier])
    }

    public async getEncoderCounter(): Promise<EncoderReading> {
        const p = await this.query(CMD.GET_ENCODER_COUNTER)
        const raw = readUInt24LE(p, 1)
        const value = this.encoderSign === 'signed24' ? readInt24LE(p, 1) : raw
        return { raw, value, mm: rawToPosition(value, this.identity) }
    }

    public async setDeviationAlarm(d: DeviationAlarm, storage: number = STORAGE.APPLY): Promise<void> {
        const p0 = assertStorage(storage)
        const enabled = assertBool('enabled', d.enabled)
        const stopMode = assertOneOf('stopMode', d.stopMode, [0, 1, 2] as const)
        const delay = assertIntInRange('correctionDelay', d.correctionDelay, 0, 0xffff)
        await this.command(CMD.DEVIATION_ALARM, [p0, bit(enabled), stopMode, ...packUInt16LE(delay)])
    }

    public async configureAutoCorrection(c: AutoCorrection, storage: number = STORAGE.APPLY): Promise<void> {
        const p0 = assertStorage(storage)
        const retries = assertIntInRange('retries', c.retries, 0, 255)
        const tolerance = assertIntInRange('tolerance', c.tolerance, 0, 0xffff)
        await this.command(CMD.AUTO_CORRECTION, [p0, retries, 0, ...packUInt16LE(tolerance)])
    }

    /* ---------------------------------------------------------------------- */
    /*  PID passthrough                                                       */
    /* ---------------------------------------------------------------------- */

    /** Raw register write; byte meaning is firmware-defined. */
    public async writePidRegister(
        register: PidRegisterCommand,
        bytes: readonly number[],
        storage: number = STORAGE.APPLY
    ): Promise<void> {
        const p0 = assertStorage(storage)
        const width = PID_REGISTER_BYTES[register]
        if (bytes.length !== width) {
            throw new InvalidParameterError('bytes.length', bytes.length, String(width))
        }
        const payload = bytes.map((b, i) => assertIntInRange(`P${i + 1}`, b, 0, 255))
        await this.command(register, [p0, ...payload])
    }

    public async setPidFollowMode(value: number, storage: number = STORAGE.APPLY): Promise<void> {
        const p0 = assertStorage(storage)
        await this.command(CMD.PID_FOLLOW, [p0, assertIntInRange('followMode', value, 0, 255)])
    }

    /* ---------------------------------------------------------------------- */
    /*  Alarm                                                                 */
    /* ---------------------------------------------------------------------- */

    public async setAlarmMode(m: AlarmMode, storage: number = STORAGE.APPLY): Promise<void> {
        const p0 = assertStorage(storage)
        await this.command(CMD.ALARM_MODE, [
            p0,
            bit(assertBool('stopOnExternalAlarm', m.stopOnExternalAlarm)),
            bit(assertBool('stopOnDriverError', m.stopOnDriverError)),
        ])
    }

    /** Clears the alarm output and reports which conditions were latched. */
    public async resetAlarm(): Promise<AlarmReport> {
        const p = await this.query(CMD.RESET_ALARM)
        return {
            driverError: p[1] !== 0,
            deviationError: p[2] !== 0,
            externalAlarm: p[3] !== 0,
            travelCheckError: p[4] !== 0,
            correctionError: p[5] !== 0,
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Global settings                                                       */
    /* ---------------------------------------------------------------------- */

    public async enterStepDirectionMode(mode: 0 | 1): Promise<void> {
        await this.command(CMD.STEP_DIRECTION_MODE, [0, assertOneOf('mode', mode, [0, 1] as const)])
    }

    public async setReceiveId(id: number, storage: number = STORAGE.APPLY): Promise<void> {
        const p0 = assertStorage(storage)
        await this.command(CMD.RECEIVE_ID, [p0, ...packUInt32LE(assertIntInRange('receiveId', id, 0, ID_MAX))])
    }

    public async setSendId(id: number, storage: number = STORAGE.APPLY): Promise<void> {
        const p0 = assertStorage(storage)
        await this.command(CMD.SEND_ID, [p0, ...packUInt32LE(assertIntInRange('sendId', id, 0, ID_MAX))])
    }

    public async setCanBaudRate(code: CanBaudRateCode): Promise<void> {
        await this.command(CMD.CAN_BAUD_RATE, [0, assertOneOf('baudRate', code, [1, 2, 3, 4] as const)])
    }

    public async getVersion(): Promise<VersionInfo> {
        const p = await this.query(CMD.GET_VERSION)
        return {
            firmware: p[0] / 100,
            resetFlag: p[1] !== 0,
            temperature: readInt16LE(p, 3) / 10,
        }
    }

    public async hardwareReset(): Promise<void> {
        await this.command(CMD.HARDWARE_RESET)
    }

    /** Restores factory defaults; the key bytes are fixed by the firmware. */
    public async factoryReset(): Promise<void> {
        await this.command(CMD.FACTORY_DEFAULTS, [0, ...FACTORY_RESET_KEY])
    }

    /* ---------------------------------------------------------------------- */
    /*  Exchange                                                              */
    /* ---------------------------------------------------------------------- */

    private async command(command: number, params: readonly number[] = []): Promise<void> {
        const frame = encodeTelegram(this.identity.address, command, params)
        this.publishSent(command, frame, false)

        try {
            await this.bus.send(this.identity.address, frame)
        } catch (err) {
            throw this.fail(command, this.asTransportFailure(err))
        }
    }

    private async query(command: number): Promise<Buffer> {
        const address = this.identity.address
        const frame = encodeTelegram(address, command)
        this.publishSent(command, frame, true)

        let response: Buffer
        try {
            response = await this.bus.request(address, frame, this.responseTimeoutMs)
        } catch (err) {
            throw this.fail(command, this.asTransportFailure(err))
        }

        let decoded: Telegram
        try {
            decoded = decodeTelegram(response)
        } catch (err) {
            throw this.fail(command, this.asTransportFailure(err))
        }

        this.events?.publish({
            kind: 'axis-telegram-received',
            at: Date.now(),
            axis: this.identity.name,
            address,
            command: decoded.command,
            frame: formatTelegram(response),
        })

        if (decoded.command !== command) {
            throw this.fail(command, new ProtocolMismatchError(command, decoded.command, 'command'))
        }
        if (decoded.address !== address) {
            throw this.fail(command, new ProtocolMismatchError(address, decoded.address, 'address'))
        }

        return decoded.params
    }

    private asTransportFailure(err: unknown): StageError {
        if (err instanceof TransportFailureError) return err
        if (err instanceof MalformedFrameError) {
            return new TransportFailureError(`malformed response from address ${this.identity.address}`, {
                address: this.identity.address,
                cause: err,
            })
        }
        const message = err instanceof Error ? err.message : String(err)
        return new TransportFailureError(message, { address: this.identity.address, cause: err })
    }

    private fail(command: number, err: StageError): StageError {
        this.events?.publish({
            kind: 'axis-command-failed',
            at: Date.now(),
            axis: this.identity.name,
            address: this.identity.address,
            command,
            error: err.message,
        })
        return err
    }

    private publishSent(command: number, frame: Buffer, expectsAnswer: boolean): void {
        this.events?.publish({
            kind: 'axis-telegram-sent',
            at: Date.now(),
            axis: this.identity.name,
            address: this.identity.address,
            command,
            frame: formatTelegram(frame),
            expectsAnswer,
        })
    }
}
