// services/stage-service/src/devices/monopack/utils.ts

import { InvalidParameterError } from './errors.js'
import type { StorageMode } from './commands.js'

/* -------------------------------------------------------------------------- */
/*  Range validation                                                          */
/* -------------------------------------------------------------------------- */

export function assertIntInRange(name: string, value: number, min: number, max: number): number {
    if (!Number.isInteger(value) || value < min || value > max) {
        throw new InvalidParameterError(name, value, `${min}..${max}`)
    }
    return value
}

export function assertOneOf<T extends number>(name: string, value: number, allowed: readonly T[]): T {
    const hit = allowed.find(a => a === value)
    if (hit === undefined) {
        throw new InvalidParameterError(name, value, allowed.join(', '))
    }
    return hit
}

export function assertStorage(storage: number): StorageMode {
    return assertOneOf('storage', storage, [0, 1, 2, 3] as const)
}

export function assertBool(name: string, value: unknown): boolean {
    if (typeof value !== 'boolean') {
        throw new InvalidParameterError(name, value, 'true | false')
    }
    return value
}

export function bit(value: boolean): number {
    return value ? 1 : 0
}

/* -------------------------------------------------------------------------- */
/*  Timing                                                                    */
/* -------------------------------------------------------------------------- */

/**
 * Promise-based delay that settles early (rejecting) when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 && !signal) return Promise.resolve()

    return new Promise<void>((resolve, reject) => {
        if (signal?.aborted) {
            reject(signal.reason ?? new Error('aborted'))
            return
        }

        const onAbort = () => {
            clearTimeout(timer)
            reject(signal?.reason ?? new Error('aborted'))
        }
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort)
            resolve()
        }, Math.max(0, ms))

        signal?.addEventListener('abort', onAbort, { once: true })
    })
}
