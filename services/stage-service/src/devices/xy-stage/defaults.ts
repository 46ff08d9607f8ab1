// services/stage-service/src/devices/xy-stage/defaults.ts
//
// Parameter set written to both drivers by StageController.initialize().
// Values are applied (P0 = 1) rather than persisted, so a power cycle returns
// the drivers to whatever their EEPROM holds.

import type { MonopackAxisDriver } from '../monopack/MonopackAxisDriver.js'
import type { CurrentControl } from '../monopack/types.js'
import type { AxisName } from './types.js'

const CURRENT_CONSERVATIVE: CurrentControl = { standby: 0x00, active: 0x80, acceleration: 0xc8 }
const CURRENT_INTERMEDIATE: CurrentControl = { standby: 0x47, active: 0x99, acceleration: 0xe0 }

export const OPERATING_CURRENT: Record<AxisName, CurrentControl> = {
    X: { standby: 0x47, active: 0xad, acceleration: 0xff },
    Y: { standby: 0x47, active: 0xad, acceleration: 0xad },
}

export const DEFAULT_RAMP = { velocity: 4915, acceleration: 245 } as const
export const DEFAULT_REFERENCE_SEARCH_VELOCITY = 1228

export interface InitStep {
    label: string
    run: (driver: MonopackAxisDriver) => Promise<unknown>
}

/** Ordered init steps for one axis. */
export function defaultInitSequence(axis: AxisName, predivider: number): InitStep[] {
    return [
        { label: 'reset alarm', run: d => d.resetAlarm() },
        { label: 'send id', run: d => d.setSendId(d.address) },
        { label: 'pid follow off', run: d => d.setPidFollowMode(0, 0) },
        { label: 'reset position', run: d => d.resetPosition() },
        { label: 'alarm mode', run: d => d.setAlarmMode({ stopOnExternalAlarm: true, stopOnDriverError: true }) },
        { label: 'current (conservative)', run: d => d.setCurrentControl(CURRENT_CONSERVATIVE) },
        {
            label: 'deviation alarm',
            run: d => d.setDeviationAlarm({ enabled: false, stopMode: 0, correctionDelay: 1 }),
        },
        { label: 'auto correction', run: d => d.configureAutoCorrection({ retries: 5, tolerance: 10 }) },
        { label: 'frequency range', run: d => d.setFrequencyRange(predivider) },
        {
            label: 'microstep resolution',
            run: d => d.setMicrostepResolution({ resolution: 50, waveform: 0, mixedDecay: true }),
        },
        {
            label: 'encoder',
            run: d => d.configureEncoder({ flags: 64, predivider: 3, maxDeviation: 16, multiplier: 2 }),
        },
        {
            label: 'switch mode',
            run: d => d.setSwitchMode({ stopAsReference: true, rightSwitch: false, linear: true, travelCheck: false }),
        },
        { label: 'ramp', run: d => d.setVelocity(DEFAULT_RAMP) },
        { label: 'current (intermediate)', run: d => d.setCurrentControl(CURRENT_INTERMEDIATE) },
        { label: 'auto correction (wide)', run: d => d.configureAutoCorrection({ retries: 5, tolerance: 50 }) },
        { label: 'stop switch deceleration', run: d => d.setStopSwitchDeceleration(0) },
        { label: 'current (operating)', run: d => d.setCurrentControl(OPERATING_CURRENT[axis]) },
        { label: 'reference search velocity', run: d => d.setReferenceSearchVelocity(DEFAULT_REFERENCE_SEARCH_VELOCITY) },
    ]
}
