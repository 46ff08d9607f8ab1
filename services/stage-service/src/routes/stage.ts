// services/stage-service/src/routes/stage.ts
import type { FastifyPluginAsync, FastifyReply } from 'fastify'

import { getSnapshot } from '../core/state.js'
import { toErrorShape, type StageErrorKind } from '../devices/monopack/errors.js'
import { AXES, type AxisName } from '../devices/xy-stage/types.js'

/* -------------------------
   Error → HTTP status
--------------------------*/
const STATUS_BY_KIND: Record<StageErrorKind | 'unknown', number> = {
    'invalid-parameter': 400,
    'state-error': 409,
    'timeout': 504,
    'transport-failure': 502,
    'connection-error': 502,
    'protocol-mismatch': 502,
    'malformed-frame': 502,
    'unknown': 500,
}

function fail(reply: FastifyReply, err: unknown) {
    const shape = toErrorShape(err)
    reply.code(STATUS_BY_KIND[shape.kind])
    return { ok: false, error: shape }
}

function badRequest(reply: FastifyReply, message: string) {
    reply.code(400)
    return { ok: false, error: { kind: 'invalid-parameter', message } }
}

/* -------------------------
   Minimal validation helpers
--------------------------*/
function isObject(x: unknown): x is Record<string, unknown> {
    return x !== null && typeof x === 'object' && !Array.isArray(x)
}

/** undefined when absent; null when present but not a finite number */
function optionalNumber(body: Record<string, unknown>, key: string): number | undefined | null {
    const v = body[key]
    if (v === undefined) return undefined
    return typeof v === 'number' && Number.isFinite(v) ? v : null
}

/** "XY", "x", ["X","Y"] → axis list; missing → both; anything else → null */
function parseAxes(raw: unknown): AxisName[] | null {
    if (raw === undefined) return [...AXES]
    const letters = typeof raw === 'string'
        ? raw.toUpperCase().split('')
        : Array.isArray(raw)
            ? raw.map(a => (typeof a === 'string' ? a.toUpperCase() : '?'))
            : []
    if (letters.length === 0 || !letters.every(l => l === 'X' || l === 'Y')) return null
    return AXES.filter(a => letters.includes(a))
}

function bodyOf(raw: unknown): Record<string, unknown> {
    return isObject(raw) ? raw : {}
}

/* -------------------------
   Routes
--------------------------*/
const stageRoutes: FastifyPluginAsync = async (app) => {
    const stage = () => app.xyStage

    app.get('/api/stage/state', async () => {
        const c = stage()
        return {
            ok: true,
            state: c.getState(),
            referenced: c.isReferenced(),
            enabled: c.isEnabled(),
            position: c.getPosition(),
            lastError: c.getLastError(),
            snapshot: getSnapshot().stage,
        }
    })

    app.get('/api/stage/position', async () => {
        const c = stage()
        return { ok: true, position: c.getPosition(), referenced: c.isReferenced() }
    })

    app.post('/api/stage/connect', async (_req, reply) => {
        const result = await stage().connect()
        if (!result.ok) reply.code(502)
        return result
    })

    app.post('/api/stage/disconnect', async (_req, reply) => {
        try {
            await stage().disconnect()
            return { ok: true }
        } catch (err) {
            return fail(reply, err)
        }
    })

    app.post('/api/stage/initialize', async (_req, reply) => {
        try {
            const result = await stage().initialize()
            if (result?.kind === 'faulted') reply.code(502)
            return { ok: result?.kind !== 'faulted', result }
        } catch (err) {
            return fail(reply, err)
        }
    })

    app.post('/api/stage/reference', async (req, reply) => {
        const axes = parseAxes(bodyOf(req.body).axes)
        if (!axes) return badRequest(reply, 'axes must be "X", "Y", "XY" or an array of those')
        try {
            const result = await stage().reference(axes)
            if (result.kind === 'faulted') reply.code(502)
            return { ok: result.kind === 'ready', result }
        } catch (err) {
            return fail(reply, err)
        }
    })

    app.post('/api/stage/move', async (req, reply) => {
        const body = bodyOf(req.body)
        const x = optionalNumber(body, 'x')
        const y = optionalNumber(body, 'y')
        if (x === null || y === null) return badRequest(reply, 'x and y must be finite numbers (mm)')
        if (x === undefined && y === undefined) return badRequest(reply, 'x and/or y (mm) required')
        try {
            const target = await stage().moveTo({ x, y })
            return { ok: true, target }
        } catch (err) {
            return fail(reply, err)
        }
    })

    app.post('/api/stage/move-relative', async (req, reply) => {
        const body = bodyOf(req.body)
        const dx = optionalNumber(body, 'dx')
        const dy = optionalNumber(body, 'dy')
        if (dx === null || dy === null) return badRequest(reply, 'dx and dy must be finite numbers (mm)')
        if (dx === undefined && dy === undefined) return badRequest(reply, 'dx and/or dy (mm) required')
        try {
            const target = await stage().moveRelative({ dx, dy })
            return { ok: true, target }
        } catch (err) {
            return fail(reply, err)
        }
    })

    app.post('/api/stage/center', async (_req, reply) => {
        try {
            const target = await stage().moveToCenter()
            return { ok: true, target }
        } catch (err) {
            return fail(reply, err)
        }
    })

    app.post('/api/stage/service-position', async (_req, reply) => {
        try {
            const target = await stage().moveToServicePosition()
            return { ok: true, target }
        } catch (err) {
            return fail(reply, err)
        }
    })

    app.post('/api/stage/home', async (req, reply) => {
        const axes = parseAxes(bodyOf(req.body).axes)
        if (!axes) return badRequest(reply, 'axes must be "X", "Y", "XY" or an array of those')
        try {
            const position = await stage().goHome(axes)
            return { ok: true, position }
        } catch (err) {
            return fail(reply, err)
        }
    })

    app.post('/api/stage/stop', async (_req, reply) => {
        try {
            const position = await stage().stop()
            return { ok: true, position }
        } catch (err) {
            return fail(reply, err)
        }
    })

    app.post('/api/stage/emergency-stop', async (_req, reply) => {
        try {
            await stage().emergencyStop()
            return { ok: true, state: stage().getState() }
        } catch (err) {
            return fail(reply, err)
        }
    })

    app.post('/api/stage/alarms/reset', async (_req, reply) => {
        try {
            const alarms = await stage().resetAlarms()
            return { ok: true, alarms }
        } catch (err) {
            return fail(reply, err)
        }
    })

    app.post<{ Params: { axis: string } }>('/api/stage/axes/:axis/reboot', async (req, reply) => {
        const axes = parseAxes(req.params.axis)
        if (!axes || axes.length !== 1) return badRequest(reply, 'axis must be "X" or "Y"')
        try {
            await stage().rebootAxis(axes[0])
            return { ok: true, state: stage().getState() }
        } catch (err) {
            return fail(reply, err)
        }
    })

    app.post('/api/stage/enabled', async (req, reply) => {
        const enabled = bodyOf(req.body).enabled
        if (typeof enabled !== 'boolean') return badRequest(reply, 'enabled (boolean) required')
        stage().setEnabled(enabled)
        return { ok: true, enabled }
    })
}

export default stageRoutes
