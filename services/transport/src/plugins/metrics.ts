// services/transport/src/plugins/metrics.ts

import type { FastifyInstance, FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'

import { createLogger, LogChannel, type ClientLogBuffer } from '@lanctl/logging'
import type { CommandEngine } from '../core/engine/index.js'
import type { TransportMetrics } from '../metrics/index.js'

// ---- Fastify decoration ----------------------------------------------------

declare module 'fastify' {
    interface FastifyInstance {
        metrics: TransportMetrics
        engine: CommandEngine | null
        clientBuf: ClientLogBuffer
    }
}

export interface MetricsPluginOptions {
    metrics: TransportMetrics
    /** Stopped when the server closes, if given. */
    engine?: CommandEngine
}

const PROMETHEUS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8'

// ---- Plugin implementation -------------------------------------------------

const metricsPlugin: FastifyPluginAsync<MetricsPluginOptions> = async (app: FastifyInstance, opts) => {
    const { channel } = createLogger('lanctl-metrics', app.hasDecorator('clientBuf') ? app.clientBuf : undefined)
    const logPlugin = channel(LogChannel.metrics)

    app.decorate('metrics', opts.metrics)
    app.decorate('engine', opts.engine ?? null)

    app.get('/metrics', async (_req, reply) => {
        const body = await app.metrics.render()
        reply.header('content-type', PROMETHEUS_CONTENT_TYPE)
        return body
    })

    app.addHook('onReady', async () => {
        logPlugin.info('metrics exporter ready')
    })

    app.addHook('onClose', async () => {
        const engine = app.engine
        if (!engine) return
        logPlugin.info('stopping command engine')
        await engine.stop().catch((err: unknown) => {
            logPlugin.warn('error stopping command engine', {
                err: err instanceof Error ? err.message : String(err),
            })
        })
    })
}

export default fp(metricsPlugin, {
    name: 'lanctl-metrics-plugin',
})
