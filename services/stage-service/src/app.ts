import Fastify, {
    type FastifyInstance,
    type FastifyServerOptions,
    type FastifyRequest,
    type FastifyReply
} from 'fastify'
import cors from '@fastify/cors'

import {
    createLogger,
    makeClientBuffer,
    LogChannel,
    isLogChannel,
    type ClientLogBuffer,
} from '@xystage/logging'

// our state/helpers
import { getSnapshot, setServerConfig, setStatus } from './core/state.js'
import xyStagePlugin, { type XYStagePluginOptions } from './plugins/xyStage.js'
import stageRoutes from './routes/stage.js'

interface LogsQuery {
    n?: string
    channel?: string
}

export interface BuildAppOptions extends FastifyServerOptions {
    stage?: XYStagePluginOptions
    clientBuf?: ClientLogBuffer
}

// ---- Request logging config (env) ----
const REQUEST_VERBOSE = String(process.env.REQUEST_VERBOSE ?? 'false').toLowerCase() === 'true'
const REQUEST_LOG_HEADERS =
    String(process.env.REQUEST_LOG_HEADERS ?? 'false').toLowerCase() === 'true'
const REQUEST_SAMPLE = Math.max(1, Number(process.env.REQUEST_SAMPLE ?? '1') || 1)
// --------------------------------------

export function buildApp(opts: BuildAppOptions = {}): FastifyInstance {
    const { stage: stageOpts, clientBuf: injectedBuf, ...fastifyOpts } = opts
    const clientBuf: ClientLogBuffer = injectedBuf ?? makeClientBuffer()

    const { channel } = createLogger('stage-service', clientBuf)
    const logApp = channel(LogChannel.app)
    const logReq = channel(LogChannel.request)

    const startedAt = new Map<string, number>()
    const sampledIds = new Set<string>()
    let reqCounter = 0

    const app = Fastify({ logger: false, ...fastifyOpts })
    app.decorate('clientBuf', clientBuf)
    setServerConfig({ logs: { ...getSnapshot().serverConfig.logs, capacity: clientBuf.capacity } })

    // CORS
    void app.register(cors, { origin: true })

    // XY stage plugin (creates app.xyStage and the state fanout) + its routes
    void app.register(xyStagePlugin, stageOpts ?? {})
    void app.register(stageRoutes)

    // ---------- Request/Response logging hooks ----------
    app.addHook('onRequest', async (req: FastifyRequest) => {
        const shouldLog = ++reqCounter % REQUEST_SAMPLE === 0
        if (!shouldLog) return

        sampledIds.add(req.id)
        startedAt.set(req.id, Date.now())
        logReq.info(`${req.method} ${req.url}`)

        if (REQUEST_VERBOSE) {
            const detail: Record<string, unknown> = { id: req.id, ip: req.ip }
            if (REQUEST_LOG_HEADERS) {
                const { host, 'user-agent': ua, accept, referer } = req.headers
                detail.headers = { host, 'user-agent': ua, accept, referer }
            }
            logReq.debug('request detail', detail)
        }
    })

    app.addHook('onResponse', async (req: FastifyRequest, reply: FastifyReply) => {
        if (!sampledIds.has(req.id)) return
        sampledIds.delete(req.id)

        const start = startedAt.get(req.id)
        if (start !== undefined) startedAt.delete(req.id)
        const ms = start !== undefined ? Date.now() - start : undefined

        logReq.info(`${req.method} ${req.url} → ${reply.statusCode}${ms !== undefined ? ` (${ms} ms)` : ''}`)

        if (REQUEST_VERBOSE) {
            const outLen = reply.getHeader('content-length') ?? null
            logReq.debug('response detail', { id: req.id, bytesOut: outLen, ms })
        }
    })
    // ---------------------------------------------------

    app.addHook('onReady', async () => {
        setStatus('ready')
    })

    // Health / ready
    app.get('/health', async () => ({ status: 'ok' }))

    app.get('/ready', async () => {
        const stage = app.xyStage
        const state = stage.getState()
        return {
            ready: state !== 'disconnected' && state !== 'faulted',
            stage: state,
            referenced: stage.isReferenced(),
        }
    })

    app.get('/version', async () => ({ name: 'xystage-service', version: '0.1.0' }))

    // Full app state (same snapshot the state adapter feeds)
    app.get('/api/state', async () => getSnapshot())

    // Latest client logs, optionally for one channel (?channel=axis)
    app.get<{ Querystring: LogsQuery }>('/api/stage/logs', async (req, reply) => {
        const n = Number.parseInt(req.query.n ?? '', 10)
        const limit = Number.isFinite(n) && n > 0 ? Math.min(n, clientBuf.capacity) : 100
        const channel = req.query.channel
        if (channel !== undefined && !isLogChannel(channel)) {
            reply.code(400)
            return { ok: false, error: { kind: 'invalid-parameter', message: `unknown log channel: ${channel}` } }
        }
        return { ok: true, logs: clientBuf.getLatest(limit, channel) }
    })

    logApp.info('stage-service app built')
    return app
}
