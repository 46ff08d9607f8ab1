import fs from 'node:fs'
import path from 'node:path'
import { config as dotenvConfig } from 'dotenv'
import type { FastifyInstance } from 'fastify'
import {
    createLogger,
    LogChannel
} from '@xystage/logging'

/**
 * Load environment variables with a clear precedence:
 *   1) .env
 *   2) .env.{NODE_ENV}
 *   3) .env.local
 * Later files override earlier ones.
 */
function loadEnv() {
    const cwd = process.cwd()
    const env = String(process.env.NODE_ENV || 'development')
    const files = [
        path.resolve(cwd, '.env'),
        path.resolve(cwd, `.env.${env}`),
        path.resolve(cwd, '.env.local')
    ]

    for (const file of files) {
        if (fs.existsSync(file)) {
            dotenvConfig({ path: file, override: true })
        }
    }
}

function summarizeStageEnv() {
    return {
        transport: process.env.STAGE_TRANSPORT ?? 'sim',
        serialPath: process.env.STAGE_SERIAL_PATH ?? '(default)',
        xAddress: process.env.STAGE_X_ADDRESS ?? '7',
        yAddress: process.env.STAGE_Y_ADDRESS ?? '1',
        autoConnect: process.env.STAGE_AUTO_CONNECT ?? 'true',
        autoReference: process.env.STAGE_AUTO_REFERENCE ?? 'true',
    }
}

async function start() {
    loadEnv()

    // app.ts reads request-logging env at module load, so it loads after dotenv
    const { buildApp } = await import('./app.js')

    const { channel } = createLogger('stage-service')
    const logService = channel(LogChannel.service)

    const PORT = Number(process.env.API_PORT ?? 3000)
    const HOST = process.env.API_HOST ?? '0.0.0.0'

    let app: FastifyInstance | null = null

    try {
        app = buildApp()
        await app.listen({ port: PORT, host: HOST })

        const env = process.env.NODE_ENV ?? 'development'
        logService.info(`listening host=${HOST} port=${PORT} env=${env}`)

        const stage = summarizeStageEnv()
        logService.info(
            `stage config transport=${stage.transport} path=${stage.serialPath} ` +
            `x=${stage.xAddress} y=${stage.yAddress} autoConnect=${stage.autoConnect} autoReference=${stage.autoReference}`
        )

        // Graceful shutdown
        const shutdown = async (signal: NodeJS.Signals) => {
            if (!app) process.exit(0)
            try {
                logService.info(`received ${signal}, shutting down`)
                await app.close()
                logService.info('stage-service closed')
                process.exit(0)
            } catch (err) {
                logService.error('error during shutdown', { err: err instanceof Error ? err.message : String(err) })
                process.exit(1)
            }
        }
        process.on('SIGINT', () => void shutdown('SIGINT'))
        process.on('SIGTERM', () => void shutdown('SIGTERM'))
    } catch (err) {
        logService.error(`failed to start err="${err instanceof Error ? err.message : String(err)}"`)
        if (app) {
            await app.close().catch((closeErr: unknown) => {
                logService.warn('error closing after failed start', {
                    err: closeErr instanceof Error ? closeErr.message : String(closeErr),
                })
            })
        }
        process.exit(1)
    }
}

void start()
