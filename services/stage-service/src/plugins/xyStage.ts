// services/stage-service/src/plugins/xyStage.ts

import type { FastifyInstance, FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'

import {
    createLogger,
    LogChannel,
    type ChannelLogger,
    type ClientLogBuffer,
} from '@xystage/logging'
import type { BusConfig, BusEvent, BusEventSink, BusTransport } from '../core/bus/types.js'
import { SerialBusTransport } from '../core/bus/SerialBusTransport.js'
import { SimulatedMonopackBus } from '../core/bus/SimulatedMonopackBus.js'
import { updateStageSnapshot } from '../core/state.js'
import type { MonopackEvent, MonopackEventSink } from '../devices/monopack/types.js'
import { StageController } from '../devices/xy-stage/StageController.js'
import type { StageConfig, StageEvent, StageEventSink } from '../devices/xy-stage/types.js'
import { buildBusConfigFromEnv, buildStageConfigFromEnv, parseBoolSafe } from '../devices/xy-stage/utils.js'
import { XYStageStateAdapter } from '../adapters/xyStage.adapter.js'

// ---- Fastify decoration ----------------------------------------------------

declare module 'fastify' {
    interface FastifyInstance {
        xyStage: StageController
        clientBuf: ClientLogBuffer
    }
}

export interface XYStagePluginOptions {
    /** Use this bus instead of the one STAGE_TRANSPORT selects. */
    bus?: BusTransport
    config?: StageConfig
    /** connect() once the server is ready (STAGE_AUTO_CONNECT, default true). */
    autoConnect?: boolean
}

const hex = (n: number) => `0x${n.toString(16).toUpperCase().padStart(2, '0')}`

// ---- Event sinks using service logging -------------------------------------

class StageLoggerEventSink implements StageEventSink {
    private readonly log: ChannelLogger

    constructor(log: ChannelLogger) {
        this.log = log
    }

    publish(evt: StageEvent): void {
        const ts = new Date(evt.at).toISOString()

        switch (evt.kind) {
            case 'stage-transition':
                this.log.info(`ts=${ts} kind=${evt.kind} from=${evt.from} to=${evt.to}`)
                break

            case 'stage-connected':
                this.log.info(
                    `ts=${ts} kind=${evt.kind} x.fw=${evt.versions.X.firmware} y.fw=${evt.versions.Y.firmware} ` +
                    `x.temp=${evt.versions.X.temperature} y.temp=${evt.versions.Y.temperature}`
                )
                break

            case 'stage-initialized': {
                const rb = evt.rampReadback
                if (rb) {
                    this.log.info(
                        `ts=${ts} kind=${evt.kind} ` +
                        `x.velocity=${rb.X.velocity} (${rb.X.velocityMmPerS.toFixed(2)} mm/s) ` +
                        `x.acceleration=${rb.X.acceleration} x.refVelocity=${rb.X.referenceSearchVelocity} ` +
                        `y.velocity=${rb.Y.velocity} (${rb.Y.velocityMmPerS.toFixed(2)} mm/s) ` +
                        `y.acceleration=${rb.Y.acceleration} y.refVelocity=${rb.Y.referenceSearchVelocity}`
                    )
                } else {
                    this.log.info(`ts=${ts} kind=${evt.kind}`)
                }
                break
            }

            case 'stage-referenced':
                this.log.info(
                    `ts=${ts} kind=${evt.kind} axes=${evt.axes.join('')} x=${evt.position.x ?? 'unknown'} y=${evt.position.y ?? 'unknown'}`
                )
                break

            case 'stage-move-requested':
                this.log.info(
                    `ts=${ts} kind=${evt.kind} x=${evt.target.x ?? '-'} y=${evt.target.y ?? '-'} clamped=${evt.clamped}`
                )
                break

            case 'stage-position':
                this.log.debug(
                    `ts=${ts} kind=${evt.kind} source=${evt.source} x=${evt.position.x ?? 'unknown'} y=${evt.position.y ?? 'unknown'}`
                )
                break

            case 'stage-axis-ready':
                this.log.debug(`ts=${ts} kind=${evt.kind} axis=${evt.axis} polls=${evt.polls} ms=${evt.elapsedMs}`)
                break

            case 'stage-alarms': {
                const raised = (['X', 'Y'] as const).flatMap(axis =>
                    Object.entries(evt.alarms[axis])
                        .filter(([, on]) => on)
                        .map(([name]) => `${axis}.${name}`)
                )
                const line = `ts=${ts} kind=${evt.kind} raised=${raised.length ? raised.join(',') : 'none'}`
                if (raised.length) this.log.warn(line)
                else this.log.info(line)
                break
            }

            case 'stage-enabled':
                this.log.info(`ts=${ts} kind=${evt.kind} enabled=${evt.enabled}`)
                break

            case 'stage-fault':
                this.log.error(
                    `ts=${ts} kind=${evt.kind} op=${evt.operation} error=${evt.error.kind} message=${JSON.stringify(evt.error.message)}`
                )
                break
        }
    }
}

class AxisLoggerEventSink implements MonopackEventSink {
    private readonly log: ChannelLogger

    constructor(log: ChannelLogger) {
        this.log = log
    }

    publish(evt: MonopackEvent): void {
        switch (evt.kind) {
            case 'axis-telegram-sent':
                this.log.debug(`axis=${evt.axis} cmd=${hex(evt.command)} tx=[${evt.frame}] answer=${evt.expectsAnswer}`)
                break
            case 'axis-telegram-received':
                this.log.debug(`axis=${evt.axis} cmd=${hex(evt.command)} rx=[${evt.frame}]`)
                break
            case 'axis-command-failed':
                this.log.warn(`axis=${evt.axis} cmd=${hex(evt.command)} error=${JSON.stringify(evt.error)}`)
                break
        }
    }
}

class BusLoggerEventSink implements BusEventSink {
    private readonly log: ChannelLogger

    constructor(log: ChannelLogger) {
        this.log = log
    }

    publish(evt: BusEvent): void {
        const ts = new Date(evt.at).toISOString()
        switch (evt.kind) {
            case 'bus-opened':
                this.log.info(
                    `ts=${ts} kind=${evt.kind} transport=${evt.transport} path=${evt.path ?? '-'} baud=${evt.baudRate ?? '-'}`
                )
                break
            case 'bus-closed':
                this.log.info(`ts=${ts} kind=${evt.kind} transport=${evt.transport} reason=${evt.reason}`)
                break
            case 'bus-stray-frame':
                this.log.warn(`ts=${ts} kind=${evt.kind} frame=[${evt.frame}]`)
                break
            case 'bus-timeout':
                this.log.warn(`ts=${ts} kind=${evt.kind} address=${evt.address} cmd=${hex(evt.command)} timeoutMs=${evt.timeoutMs}`)
                break
            case 'bus-error':
                this.log.error(`ts=${ts} kind=${evt.kind} error=${JSON.stringify(evt.error)}`)
                break
        }
    }
}

// ---- Fanout sink: logger + state adapter -----------------------------------

class FanoutEventSink<E> {
    private readonly sinks: Array<{ publish(evt: E): void }>
    private readonly onError: (err: unknown) => void

    constructor(onError: (err: unknown) => void, ...sinks: Array<{ publish(evt: E): void }>) {
        this.onError = onError
        this.sinks = sinks
    }

    publish(evt: E): void {
        for (const sink of this.sinks) {
            try {
                sink.publish(evt)
            } catch (err) {
                // a failing consumer must not break the controller
                this.onError(err)
            }
        }
    }
}

// ---- Bus selection ---------------------------------------------------------

function createBus(busCfg: BusConfig, stageCfg: StageConfig, events: BusEventSink): BusTransport {
    if (busCfg.kind === 'serial') {
        return new SerialBusTransport(
            {
                path: busCfg.serial.path,
                baudRate: busCfg.serial.baudRate,
                responseTimeoutMs: busCfg.responseTimeoutMs,
            },
            { events }
        )
    }
    return new SimulatedMonopackBus(
        [{ address: stageCfg.axes.X.address }, { address: stageCfg.axes.Y.address }],
        { events }
    )
}

// ---- Plugin implementation -------------------------------------------------

const xyStagePlugin: FastifyPluginAsync<XYStagePluginOptions> = async (app: FastifyInstance, opts) => {
    const env = process.env
    const { channel } = createLogger('xy-stage', app.clientBuf)
    const logPlugin = channel(LogChannel.stage)
    const logAxis = channel(LogChannel.axis)
    const logBus = channel(LogChannel.bus)

    // 1) Build config
    const stageCfg = opts.config ?? buildStageConfigFromEnv(env)
    const busCfg = buildBusConfigFromEnv(env)
    const autoConnect = opts.autoConnect ?? parseBoolSafe(env.STAGE_AUTO_CONNECT, true)

    // 2) Instantiate sinks
    const stateAdapter = new XYStageStateAdapter()
    const sinkError = (err: unknown) => {
        logPlugin.warn(`kind=sink-error error=${JSON.stringify(err instanceof Error ? err.message : String(err))}`)
    }

    const stageEvents = new FanoutEventSink<StageEvent>(
        sinkError,
        new StageLoggerEventSink(logPlugin),
        { publish: (evt: StageEvent) => stateAdapter.handle(evt) }
    )
    const busEvents = new FanoutEventSink<BusEvent>(
        sinkError,
        new BusLoggerEventSink(logBus),
        { publish: (evt: BusEvent) => stateAdapter.handle(evt) }
    )
    const axisEvents = new FanoutEventSink<MonopackEvent>(sinkError, new AxisLoggerEventSink(logAxis))

    // 3) Instantiate bus + controller
    const bus = opts.bus ?? createBus(busCfg, stageCfg, busEvents)
    const controller = new StageController(stageCfg, { bus, events: stageEvents, axisEvents })

    updateStageSnapshot({
        transport: {
            kind: opts.bus ? 'sim' : busCfg.kind,
            path: !opts.bus && busCfg.kind === 'serial' ? busCfg.serial.path : null,
            open: bus.isOpen(),
        },
    })

    app.decorate('xyStage', controller)

    // 4) Lifecycle hooks
    app.addHook('onReady', async () => {
        if (!autoConnect) return
        logPlugin.info(`kind=auto-connect transport=${opts.bus ? 'injected' : busCfg.kind}`)
        const result = await controller.connect()
        if (!result.ok) {
            logPlugin.warn(`kind=auto-connect-failed error=${JSON.stringify(result.error.message)}`)
        }
    })

    app.addHook('onClose', async () => {
        logPlugin.info('kind=shutdown stopping xy-stage controller')
        await controller.disconnect().catch((err: unknown) => {
            logPlugin.warn('error stopping xy-stage controller', {
                err: err instanceof Error ? err.message : String(err),
            })
        })
    })
}

export default fp(xyStagePlugin, {
    name: 'xy-stage-plugin',
})
