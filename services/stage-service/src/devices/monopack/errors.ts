// services/stage-service/src/devices/monopack/errors.ts

export type StageErrorKind =
    | 'invalid-parameter'
    | 'malformed-frame'
    | 'protocol-mismatch'
    | 'transport-failure'
    | 'timeout'
    | 'connection-error'
    | 'state-error'

/**
 * Base class for every failure raised by the codec, the axis drivers and the
 * stage controller. `kind` is the discriminator callers switch on.
 */
export class StageError extends Error {
    public readonly kind: StageErrorKind

    constructor(kind: StageErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = 'StageError'
        this.kind = kind
    }
}

/** Caller supplied a value outside the documented range. Raised before any bus traffic. */
export class InvalidParameterError extends StageError {
    public readonly parameter: string
    public readonly value: unknown
    public readonly allowed: string

    constructor(parameter: string, value: unknown, allowed: string) {
        super('invalid-parameter', `${parameter}=${String(value)} is out of range (allowed: ${allowed})`)
        this.name = 'InvalidParameterError'
        this.parameter = parameter
        this.value = value
        this.allowed = allowed
    }
}

export class MalformedFrameError extends StageError {
    public readonly length: number

    constructor(length: number, detail?: string) {
        super('malformed-frame', `malformed telegram: expected 9 bytes, got ${length}${detail ? ` (${detail})` : ''}`)
        this.name = 'MalformedFrameError'
        this.length = length
    }
}

/** The response echoed a different command byte (or address) than the request carried. */
export class ProtocolMismatchError extends StageError {
    public readonly expected: number
    public readonly actual: number
    public readonly field: 'command' | 'address'

    constructor(expected: number, actual: number, field: 'command' | 'address' = 'command') {
        super(
            'protocol-mismatch',
            `response ${field} mismatch: expected 0x${hex(expected)}, got 0x${hex(actual)}`
        )
        this.name = 'ProtocolMismatchError'
        this.expected = expected
        this.actual = actual
        this.field = field
    }
}

export class TransportFailureError extends StageError {
    public readonly address: number | undefined

    constructor(message: string, opts: { address?: number; cause?: unknown } = {}) {
        super('transport-failure', message, { cause: opts.cause })
        this.name = 'TransportFailureError'
        this.address = opts.address
    }
}

/** Readiness polling gave up (poll budget, deadline or abort). */
export class StageTimeoutError extends StageError {
    public readonly axis: string
    public readonly polls: number
    public readonly elapsedMs: number

    constructor(axis: string, polls: number, elapsedMs: number, reason = 'deadline exceeded') {
        super('timeout', `axis ${axis} not ready after ${polls} polls / ${elapsedMs} ms: ${reason}`)
        this.name = 'StageTimeoutError'
        this.axis = axis
        this.polls = polls
        this.elapsedMs = elapsedMs
    }
}

export class StageConnectionError extends StageError {
    constructor(message: string, cause?: unknown) {
        super('connection-error', message, { cause })
        this.name = 'StageConnectionError'
    }
}

export class StageStateError extends StageError {
    public readonly operation: string
    public readonly state: string

    constructor(operation: string, state: string, detail?: string) {
        super('state-error', `${operation} not allowed in state "${state}"${detail ? `: ${detail}` : ''}`)
        this.name = 'StageStateError'
        this.operation = operation
        this.state = state
    }
}

export type StageErrorShape = {
    kind: StageErrorKind | 'unknown'
    message: string
    cause?: string
}

export function toErrorShape(err: unknown): StageErrorShape {
    if (err instanceof StageError) {
        const cause = err.cause instanceof Error ? err.cause.message : undefined
        return cause ? { kind: err.kind, message: err.message, cause } : { kind: err.kind, message: err.message }
    }
    if (err instanceof Error) {
        return { kind: 'unknown', message: err.message }
    }
    return { kind: 'unknown', message: String(err) }
}

export function isStageError(err: unknown, kind?: StageErrorKind): err is StageError {
    return err instanceof StageError && (kind === undefined || err.kind === kind)
}

function hex(n: number): string {
    return n.toString(16).toUpperCase().padStart(2, '0')
}
