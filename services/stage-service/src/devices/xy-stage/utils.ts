// services/stage-service/src/devices/xy-stage/utils.ts

import type { BusConfig } from '../../core/bus/types.js'
import type { EncoderSignPolicy } from '../monopack/types.js'
import type { AxisConfig, StageConfig } from './types.js'

/* -------------------------------------------------------------------------- */
/*  Soft limits                                                               */
/* -------------------------------------------------------------------------- */

export function clampToLimits(mm: number, axis: Pick<AxisConfig, 'minMm' | 'maxMm'>): number {
    return Math.min(axis.maxMm, Math.max(axis.minMm, mm))
}

/* -------------------------------------------------------------------------- */
/*  Config builder from environment                                           */
/* -------------------------------------------------------------------------- */

/**
 * Build a StageConfig from process.env-style input.
 *
 * Expected env vars (see .env.example):
 *   - STAGE_X_ADDRESS / STAGE_Y_ADDRESS
 *   - STAGE_STEP_MM, STAGE_CLOCK_HZ, STAGE_PREDIVIDER
 *   - STAGE_X_MIN / STAGE_X_MAX / STAGE_Y_MIN / STAGE_Y_MAX
 *   - STAGE_POLL_INTERVAL_MS, STAGE_READY_MAX_POLLS, STAGE_READY_DEADLINE_MS
 *   - STAGE_RESPONSE_TIMEOUT_MS
 *   - STAGE_SERVICE_X / STAGE_SERVICE_Y
 *   - STAGE_AUTO_REFERENCE, STAGE_ENCODER_SIGN, STAGE_VERBOSE
 */
export function buildStageConfigFromEnv(env: NodeJS.ProcessEnv): StageConfig {
    const xMin = parseFloatSafe(env.STAGE_X_MIN, 0)
    const xMax = parseFloatSafe(env.STAGE_X_MAX, 400)
    const yMin = parseFloatSafe(env.STAGE_Y_MIN, 0)
    const yMax = parseFloatSafe(env.STAGE_Y_MAX, 400)

    const x: AxisConfig = {
        address: clampInt(parseIntSafe(env.STAGE_X_ADDRESS, 7), 0, 255),
        minMm: Math.min(xMin, xMax),
        maxMm: Math.max(xMin, xMax),
    }
    const y: AxisConfig = {
        address: clampInt(parseIntSafe(env.STAGE_Y_ADDRESS, 1), 0, 255),
        minMm: Math.min(yMin, yMax),
        maxMm: Math.max(yMin, yMax),
    }

    const stepMm = parseFloatSafe(env.STAGE_STEP_MM, 0.0002)
    const clockHz = parseFloatSafe(env.STAGE_CLOCK_HZ, 16_000_000)

    return {
        axes: { X: x, Y: y },
        stepMm: stepMm > 0 ? stepMm : 0.0002,
        clockHz: clockHz > 0 ? clockHz : 16_000_000,
        predivider: clampInt(parseIntSafe(env.STAGE_PREDIVIDER, 5), 0, 15),
        center: {
            x: (x.minMm + x.maxMm) / 2,
            y: (y.minMm + y.maxMm) / 2,
        },
        servicePosition: {
            x: clampToLimits(parseFloatSafe(env.STAGE_SERVICE_X, 200), x),
            y: clampToLimits(parseFloatSafe(env.STAGE_SERVICE_Y, 5), y),
        },
        encoderSign: parseEncoderSign(env.STAGE_ENCODER_SIGN),
        autoReference: parseBoolSafe(env.STAGE_AUTO_REFERENCE, true),
        verbose: parseBoolSafe(env.STAGE_VERBOSE, false),
        timing: {
            pollIntervalMs: clampInt(parseIntSafe(env.STAGE_POLL_INTERVAL_MS, 300), 10, 10_000),
            readyMaxPolls: clampInt(parseIntSafe(env.STAGE_READY_MAX_POLLS, 400), 2, 100_000),
            readyDeadlineMs: clampInt(parseIntSafe(env.STAGE_READY_DEADLINE_MS, 120_000), 100, 3_600_000),
            settleMs: 500,
            postResetMs: 1500,
            responseTimeoutMs: clampInt(parseIntSafe(env.STAGE_RESPONSE_TIMEOUT_MS, 500), 10, 60_000),
        },
        referenceOffsetRaw: 2500,
    }
}

/**
 * Bus selection: STAGE_TRANSPORT (serial | sim), STAGE_SERIAL_PATH,
 * STAGE_SERIAL_BAUD, STAGE_RESPONSE_TIMEOUT_MS.
 */
export function buildBusConfigFromEnv(env: NodeJS.ProcessEnv): BusConfig {
    const kind = (env.STAGE_TRANSPORT ?? '').trim().toLowerCase() === 'serial' ? 'serial' : 'sim'
    return {
        kind,
        serial: {
            path: (env.STAGE_SERIAL_PATH ?? '').trim() || '/dev/ttyUSB0',
            baudRate: clampInt(parseIntSafe(env.STAGE_SERIAL_BAUD, 9600), 300, 921_600),
        },
        responseTimeoutMs: clampInt(parseIntSafe(env.STAGE_RESPONSE_TIMEOUT_MS, 500), 10, 60_000),
    }
}

function parseEncoderSign(value: string | undefined): EncoderSignPolicy {
    const v = (value ?? '').trim().toLowerCase()
    return v === 'signed24' ? 'signed24' : 'unsigned'
}

export function parseIntSafe(value: string | undefined, fallback: number): number {
    if (!value) return fallback
    const n = Number.parseInt(value, 10)
    return Number.isNaN(n) ? fallback : n
}

function parseFloatSafe(value: string | undefined, fallback: number): number {
    if (value == null || value.trim() === '') return fallback
    const n = Number(value)
    return Number.isFinite(n) ? n : fallback
}

export function parseBoolSafe(value: string | undefined, fallback: boolean): boolean {
    if (value == null || value === '') return fallback
    const v = value.toLowerCase()
    if (v === 'true' || v === '1' || v === 'yes') return true
    if (v === 'false' || v === '0' || v === 'no') return false
    return fallback
}

function clampInt(n: number, min: number, max: number): number {
    if (!Number.isFinite(n)) return min
    return Math.min(max, Math.max(min, Math.trunc(n)))
}
