// packages/logging/src/types.ts

export enum LogChannel {
    service = 'service',
    app = 'app',
    request = 'request',
    // Shared RS-485 / simulated command bus
    bus = 'bus',
    // Dual-axis controller lifecycle
    stage = 'stage',
    // Per-axis driver telegrams
    axis = 'axis',
}

export type ChannelColor =
    | 'blue'
    | 'yellow'
    | 'green'
    | 'magenta'
    | 'cyan'
    | 'red'
    | 'white'
    | 'purple'

export type ClientLogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export interface ClientLog {
    ts: number
    channel: LogChannel
    emoji: string
    color: ChannelColor
    level: ClientLogLevel
    message: string
}

export interface ClientLogBuffer {
    push: (log: ClientLog) => void
    /** Newest `n` entries, optionally limited to one channel. */
    getLatest: (n: number, channel?: LogChannel) => ClientLog[]
    readonly capacity: number
}

export interface ChannelLogger {
    debug: (msg: string, extra?: Record<string, unknown>) => void
    info:  (msg: string, extra?: Record<string, unknown>) => void
    warn:  (msg: string, extra?: Record<string, unknown>) => void
    error: (msg: string, extra?: Record<string, unknown>) => void
    fatal: (msg: string, extra?: Record<string, unknown>) => void
}

export interface LoggerBundle {
    base: import('pino').Logger
    channel: (ch: LogChannel) => ChannelLogger
}
