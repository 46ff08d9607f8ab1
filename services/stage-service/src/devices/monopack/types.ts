// services/stage-service/src/devices/monopack/types.ts

import type { StorageMode } from './commands.js'
import type { UnitScale } from './units.js'

/**
 * Static identity of one driver unit. Immutable once a driver is built.
 */
export interface AxisIdentity extends UnitScale {
    /** Human label used in events and errors ("X", "Y"). */
    name: string
    /** Bus address (0..255). */
    address: number
}

/**
 * How the 24-bit encoder counter is turned into a displacement.
 *
 * - `unsigned`: the counter is taken as-is (0..16777215).
 * - `signed24`: the counter is sign-extended from bit 23.
 */
export type EncoderSignPolicy = 'unsigned' | 'signed24'

/* -------------------------------------------------------------------------- */
/*  "set" parameter shapes                                                    */
/* -------------------------------------------------------------------------- */

export type CurrentLimitCode = 0 | 1 | 2 | 3

export interface CurrentControl {
    /** motor standing still (0..255) */
    standby: number
    /** constant velocity phase (0..255) */
    active: number
    /** acceleration phase (0..255) */
    acceleration: number
}

export interface MicrostepResolution {
    /** 1..64, or 65/66/67 for the 100.8/202.125/406.5 modes */
    resolution: number
    /** -127 (triangle) .. 0 (sine) .. 127 (trapezoid) */
    waveform: number
    mixedDecay: boolean
}

export interface RampSettings {
    /** raw velocity code 1..8191 */
    velocity: number
    /** raw acceleration code 1..8191 */
    acceleration: number
}

export interface SwitchMode {
    /** stop switch doubles as reference switch */
    stopAsReference: boolean
    /** use the right stop switch for calibration (left otherwise) */
    rightSwitch: boolean
    /** linear (true) or circular (false) movement */
    linear: boolean
    /** reference switch is also a travel check switch */
    travelCheck: boolean
}

export interface EncoderConfiguration {
    /** configuration bits 0..6 */
    flags: number
    predivider: number
    /** maximum ramp/encoder deviation, 11 bits */
    maxDeviation: number
    multiplier: number
}

export type DeviationStopMode = 0 | 1 | 2

export interface DeviationAlarm {
    enabled: boolean
    /** 0: keep going, 1: soft stop, 2: hard stop */
    stopMode: DeviationStopMode
    /** start automatic correction n/200 s after a deviation; 0 disables */
    correctionDelay: number
}

export interface AutoCorrection {
    /** 0 disables, 1..255 retries after each ramp */
    retries: number
    /** end position tolerance window */
    tolerance: number
}

export interface AlarmMode {
    stopOnExternalAlarm: boolean
    stopOnDriverError: boolean
}

export interface SetOptions {
    storage?: StorageMode
}

/* -------------------------------------------------------------------------- */
/*  Answers                                                                   */
/* -------------------------------------------------------------------------- */

export type CurrentControlSettings = CurrentControl

export interface AccelerationVelocitySettings {
    acceleration: number
    referenceSearchVelocity: number
    velocity: number
}

export interface ActualMotion {
    /** signed 12-bit velocity code; invalid while searching or correcting */
    velocity: number
    /** signed 12-bit acceleration code */
    acceleration: number
    referenceSearchActive: boolean
    autoCorrectionActive: boolean
}

export interface SwitchStates {
    left: boolean
    right: boolean
    reference: boolean
}

export interface EncoderReading {
    /** counter exactly as transmitted (unsigned 24-bit) */
    raw: number
    /** counter after the configured sign policy */
    value: number
    /** value * step */
    mm: number
}

export interface AlarmReport {
    driverError: boolean
    deviationError: boolean
    externalAlarm: boolean
    travelCheckError: boolean
    correctionError: boolean
}

export interface VersionInfo {
    /** e.g. 2.09 for a transmitted 209 */
    firmware: number
    resetFlag: boolean
    /** transmitted value / 10 */
    temperature: number
}

/* -------------------------------------------------------------------------- */
/*  Event sink + event union                                                  */
/* -------------------------------------------------------------------------- */

export type MonopackEvent =
    | {
        kind: 'axis-telegram-sent'
        at: number
        axis: string
        address: number
        command: number
        frame: string
        expectsAnswer: boolean
    }
    | {
        kind: 'axis-telegram-received'
        at: number
        axis: string
        address: number
        command: number
        frame: string
    }
    | {
        kind: 'axis-command-failed'
        at: number
        axis: string
        address: number
        command: number
        error: string
    }

export interface MonopackEventSink {
    publish(evt: MonopackEvent): void
}
