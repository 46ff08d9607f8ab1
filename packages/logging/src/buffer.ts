import {
    type ClientLog,
    type ClientLogBuffer,
    type LogChannel
} from './types.js'

const DEFAULT_CAPACITY = 500

/**
 * Fixed-capacity ring of the newest log lines, read back by the HTTP log
 * endpoint. Entries are returned oldest first.
 */
export function makeClientBuffer(limit: number = Number(process.env.CLIENT_LOGS_TO_KEEP ?? DEFAULT_CAPACITY)): ClientLogBuffer {
    const capacity = Number.isFinite(limit) && limit > 0 ? Math.floor(limit) : DEFAULT_CAPACITY
    const ring: ClientLog[] = []
    let next = 0

    const push = (log: ClientLog): void => {
        if (ring.length < capacity) {
            ring.push(log)
        } else {
            ring[next] = log
        }
        next = (next + 1) % capacity
    }

    const ordered = (): ClientLog[] =>
        ring.length < capacity ? ring.slice() : [...ring.slice(next), ...ring.slice(0, next)]

    const getLatest = (n: number, channel?: LogChannel): ClientLog[] => {
        if (n <= 0) return []
        const logs = channel ? ordered().filter(l => l.channel === channel) : ordered()
        return logs.slice(-n)
    }

    return { push, getLatest, capacity }
}
