// services/stage-service/src/core/state.ts
import { EventEmitter } from 'node:events'
import jsonpatch from 'fast-json-patch'
import type { Operation } from 'fast-json-patch'

import type { AlarmReport, VersionInfo } from '../devices/monopack/types.js'
import type { AxisName, StagePosition, StageState } from '../devices/xy-stage/types.js'

/**
 * Client-consumable server configuration shipped inside the state snapshot.
 */
export type ServerConfig = {
    logs: {
        snapshot: number
        capacity: number
        allowedChannels: string[]
        minLevel: 'debug' | 'info' | 'warn' | 'error' | 'fatal'
    }
}

/* -------------------------------------------------------------------------- */
/*  XY stage snapshot                                                         */
/* -------------------------------------------------------------------------- */

export type StageSnapshot = {
    phase: StageState
    message?: string
    transport: {
        kind: 'serial' | 'sim'
        path: string | null
        open: boolean
    }
    referenced: boolean
    enabled: boolean
    position: StagePosition
    /** last commanded target after clamping */
    target: { x: number | null; y: number | null }
    versions: Record<AxisName, VersionInfo | null>
    lastAlarms: Record<AxisName, AlarmReport> | null
    lastError: { kind: string; message: string; at: number } | null
    stats: {
        moves: number
        references: number
        faults: number
        lastMoveAt: number | null
    }
}

/* -------------------------------------------------------------------------- */
/*  Full AppState                                                             */
/* -------------------------------------------------------------------------- */

export type AppState = {
    version: number
    meta: { startedAt: string; status: 'booting' | 'ready' | 'error' }
    serverConfig: ServerConfig
    stage: StageSnapshot
}

/* -------------------------------------------------------------------------- */
/*  Patch event and state internals                                           */
/* -------------------------------------------------------------------------- */

export type PatchEvent = {
    from: number
    to: number
    patch: Operation[]
}

/* ENV helpers */
function num(v: unknown, def: number): number {
    const n = Number(v)
    return Number.isFinite(n) ? n : def
}
function csv(v: unknown): string[] {
    if (typeof v !== 'string') return []
    return v.split(',').map(s => s.trim()).filter(Boolean)
}

const LOG_LEVELS: ReadonlyArray<ServerConfig['logs']['minLevel']> = ['debug', 'info', 'warn', 'error', 'fatal']

function minLevel(v: unknown): ServerConfig['logs']['minLevel'] {
    const s = typeof v === 'string' ? v.trim().toLowerCase() : ''
    return LOG_LEVELS.find(l => l === s) ?? 'debug'
}

/* -------------------------------------------------------------------------- */
/*  Initial state                                                             */
/* -------------------------------------------------------------------------- */

export function initialStageSnapshot(): StageSnapshot {
    return {
        phase: 'disconnected',
        message: undefined,
        transport: { kind: 'sim', path: null, open: false },
        referenced: false,
        enabled: true,
        position: { x: null, y: null },
        target: { x: null, y: null },
        versions: { X: null, Y: null },
        lastAlarms: null,
        lastError: null,
        stats: { moves: 0, references: 0, faults: 0, lastMoveAt: null },
    }
}

function initialState(): AppState {
    return {
        version: 1,
        meta: { startedAt: new Date().toISOString(), status: 'booting' },
        serverConfig: {
            logs: {
                snapshot: num(process.env.CLIENT_LOGS_SNAPSHOT, 200),
                capacity: num(process.env.CLIENT_LOGS_CAPACITY, 500),
                allowedChannels: csv(process.env.LOG_CHANNEL_ALLOWLIST),
                minLevel: minLevel(process.env.LOG_LEVEL_MIN),
            },
        },
        stage: initialStageSnapshot(),
    }
}

let state: AppState = initialState()

/* -------------------------------------------------------------------------- */
/*  Internal event emission helpers                                           */
/* -------------------------------------------------------------------------- */

export const stateEvents = new EventEmitter()

function clone<T>(v: T): T {
    return JSON.parse(JSON.stringify(v))
}

function emitChanges(prev: AppState, next: AppState) {
    const ops = jsonpatch.compare(prev, next)
    if (ops.length > 0) {
        stateEvents.emit('patch', {
            from: prev.version,
            to: next.version,
            patch: ops,
        } satisfies PatchEvent)
    }
    stateEvents.emit('snapshot', clone(next))
}

/* -------------------------------------------------------------------------- */
/*  Public state update wrappers                                              */
/* -------------------------------------------------------------------------- */

export function getSnapshot(): AppState {
    return clone(state)
}

/** Back to a fresh boot state (tests, and a restarted plugin). */
export function resetState() {
    const prev = clone(state)
    const next = { ...initialState(), version: state.version + 1 }
    state = next
    emitChanges(prev, next)
}

export function set<K extends keyof AppState>(key: K, value: AppState[K]) {
    const prev = clone(state)
    const next: AppState = { ...state, version: state.version + 1 }
    next[key] = clone(value)
    state = next
    emitChanges(prev, next)
}

export function setStatus(status: AppState['meta']['status']) {
    set('meta', { ...state.meta, status })
}

export function setServerConfig(partial: Partial<ServerConfig>) {
    set('serverConfig', { ...state.serverConfig, ...clone(partial) })
}

/* -------------------------------------------------------------------------- */
/*  XY stage update helpers                                                   */
/* -------------------------------------------------------------------------- */

export function updateStageSnapshot(partial: {
    phase?: StageSnapshot['phase']
    message?: string
    transport?: Partial<StageSnapshot['transport']>
    referenced?: boolean
    enabled?: boolean
    position?: StageSnapshot['position']
    target?: Partial<StageSnapshot['target']>
    versions?: Partial<StageSnapshot['versions']>
    lastAlarms?: StageSnapshot['lastAlarms']
    lastError?: StageSnapshot['lastError']
    stats?: Partial<StageSnapshot['stats']>
}) {
    const prev = state.stage

    const merged: StageSnapshot = {
        phase: partial.phase ?? prev.phase,
        message: 'message' in partial ? partial.message : prev.message,
        transport: { ...prev.transport, ...(partial.transport ?? {}) },
        referenced: partial.referenced ?? prev.referenced,
        enabled: partial.enabled ?? prev.enabled,
        position: partial.position ?? prev.position,
        target: { ...prev.target, ...(partial.target ?? {}) },
        versions: { ...prev.versions, ...(partial.versions ?? {}) },
        lastAlarms: partial.lastAlarms !== undefined ? partial.lastAlarms : prev.lastAlarms,
        lastError: partial.lastError !== undefined ? partial.lastError : prev.lastError,
        stats: { ...prev.stats, ...(partial.stats ?? {}) },
    }

    set('stage', merged)
}
