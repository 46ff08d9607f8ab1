// services/stage-service/src/devices/monopack/units.ts
//
// Microstep frequency is Fstep = Fclk * v / 2^(15 + predivider), so a velocity
// of `mm/s` maps to the raw code v = mm/s / (Fclk * step) * 2^(15 + predivider).
// Acceleration codes share the same scale.

export interface UnitScale {
    /** mm per microstep */
    stepMm: number
    /** device clock, Hz */
    clockHz: number
    /** velocity pre-divider exponent (0..15) */
    predivider: number
}

function rampFactor(scale: UnitScale): number {
    return Math.pow(2, 15 + scale.predivider) / (scale.clockHz * scale.stepMm)
}

export function velocityToRaw(mmPerS: number, scale: UnitScale): number {
    return Math.round(mmPerS * rampFactor(scale))
}

export function rawToVelocity(raw: number, scale: UnitScale): number {
    return raw / rampFactor(scale)
}

export function accelerationToRaw(mmPerS2: number, scale: UnitScale): number {
    return Math.round(mmPerS2 * rampFactor(scale))
}

export function rawToAcceleration(raw: number, scale: UnitScale): number {
    return raw / rampFactor(scale)
}

export function positionToRaw(mm: number, scale: UnitScale): number {
    return Math.round(mm / scale.stepMm)
}

export function rawToPosition(raw: number, scale: UnitScale): number {
    return raw * scale.stepMm
}
