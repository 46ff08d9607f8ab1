// services/stage-service/src/devices/xy-stage/types.ts

import type { StageErrorShape } from '../monopack/errors.js'
import type { AccelerationVelocitySettings, AlarmReport, EncoderSignPolicy, VersionInfo } from '../monopack/types.js'

export type AxisName = 'X' | 'Y'

export const AXES: readonly AxisName[] = ['X', 'Y']

export type StageState =
    | 'disconnected'
    | 'connected'
    | 'referencing'
    | 'ready'
    | 'moving'
    | 'faulted'

/** Stored ramp settings of one axis, raw and converted. */
export interface RampReadback extends AccelerationVelocitySettings {
    velocityMmPerS: number
    accelerationMmPerS2: number
}

export interface StagePosition {
    x: number | null
    y: number | null
}

export interface AxisConfig {
    address: number
    minMm: number
    maxMm: number
}

/**
 * Full controller configuration, normally produced by buildStageConfigFromEnv().
 */
export interface StageConfig {
    axes: Record<AxisName, AxisConfig>
    /** mm per microstep, shared by both axes */
    stepMm: number
    clockHz: number
    predivider: number
    center: { x: number; y: number }
    /** Parking spot for loading and servicing the stage. */
    servicePosition: { x: number; y: number }
    encoderSign: EncoderSignPolicy
    /** Run reference() at the end of initialize() when not yet referenced. */
    autoReference: boolean
    /** Read back ramp settings after initialize() and report them. */
    verbose: boolean
    timing: {
        pollIntervalMs: number
        readyMaxPolls: number
        readyDeadlineMs: number
        /** pause after PID follow mode is set during referencing */
        settleMs: number
        /** pause after the position counters are reset during referencing */
        postResetMs: number
        responseTimeoutMs: number
    }
    /** Raw position both axes drive to once the reference switch is found. */
    referenceOffsetRaw: number
}

export type ConnectResult =
    | { ok: true; versions: Record<AxisName, VersionInfo> }
    | { ok: false; error: StageErrorShape }

export type ReferenceResult =
    | { kind: 'ready'; position: StagePosition }
    | { kind: 'faulted'; reason: StageErrorShape }

export interface AwaitReadyOptions {
    deadlineMs?: number
    maxPolls?: number
    signal?: AbortSignal
}

export interface StageTransition {
    from: StageState
    to: StageState
    at: number
}

export type StageTransitionListener = (t: StageTransition) => void

/* -------------------------------------------------------------------------- */
/*  Event sink + event union                                                  */
/* -------------------------------------------------------------------------- */

export type StageEvent =
    | {
        kind: 'stage-transition'
        at: number
        from: StageState
        to: StageState
    }
    | {
        kind: 'stage-connected'
        at: number
        versions: Record<AxisName, VersionInfo>
    }
    | {
        kind: 'stage-initialized'
        at: number
        rampReadback?: Record<AxisName, RampReadback>
    }
    | {
        kind: 'stage-referenced'
        at: number
        axes: AxisName[]
        position: StagePosition
    }
    | {
        kind: 'stage-move-requested'
        at: number
        requested: { x?: number; y?: number }
        target: { x?: number; y?: number }
        clamped: boolean
    }
    | {
        kind: 'stage-position'
        at: number
        position: StagePosition
        source: 'command' | 'encoder' | 'reference' | 'cleared'
    }
    | {
        kind: 'stage-axis-ready'
        at: number
        axis: AxisName
        polls: number
        elapsedMs: number
    }
    | {
        kind: 'stage-alarms'
        at: number
        alarms: Record<AxisName, AlarmReport>
    }
    | {
        kind: 'stage-enabled'
        at: number
        enabled: boolean
    }
    | {
        kind: 'stage-fault'
        at: number
        operation: string
        error: StageErrorShape
    }

export interface StageEventSink {
    publish(evt: StageEvent): void
}
