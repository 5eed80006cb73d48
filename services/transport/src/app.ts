import Fastify, {
    type FastifyInstance,
    type FastifyServerOptions,
    type FastifyRequest,
    type FastifyReply
} from 'fastify'

import {
    createLogger,
    makeClientBuffer,
    LogChannel,
    type ClientLogBuffer
} from '@lanctl/logging'

import metricsPlugin from './plugins/metrics.js'
import type { CommandEngine } from './core/engine/index.js'
import type { TransportMetrics } from './metrics/index.js'

interface LogsQuery {
    n?: string
}

export interface MetricsAppOptions {
    metrics: TransportMetrics
    engine?: CommandEngine
    clientBuf?: ClientLogBuffer
    /** Log every Nth request; 1 logs all. */
    requestSample?: number
    server?: FastifyServerOptions
}

const DEFAULT_LOG_LINES = 100

/**
 * HTTP exporter: /metrics for scrapes, /healthz, and the in-memory log tail.
 */
export function buildMetricsApp(opts: MetricsAppOptions): FastifyInstance {
    const clientBuf = opts.clientBuf ?? makeClientBuffer()
    const { channel } = createLogger('lanctl-exporter', clientBuf)
    const logApp = channel(LogChannel.metrics)
    const logReq = channel(LogChannel.request)

    const requestSample = Math.max(1, Math.floor(opts.requestSample ?? 1))
    const startedAt = new Map<string, number>()
    let reqCounter = 0

    const app = Fastify({ logger: false, ...opts.server })
    app.decorate('clientBuf', clientBuf)

    void app.register(metricsPlugin, { metrics: opts.metrics, engine: opts.engine })

    // ---------- Request/Response logging hooks ----------
    app.addHook('onRequest', async (req: FastifyRequest) => {
        if (++reqCounter % requestSample !== 0) return
        startedAt.set(req.id, Date.now())
        logReq.debug(`${req.method} ${req.url}`)
    })

    app.addHook('onResponse', async (req: FastifyRequest, reply: FastifyReply) => {
        const start = startedAt.get(req.id)
        if (start === undefined) return
        startedAt.delete(req.id)
        logReq.debug(`${req.method} ${req.url} → ${reply.statusCode} (${Date.now() - start} ms)`)
    })
    // ---------------------------------------------------

    app.get('/healthz', async () => {
        const engine = app.engine
        return {
            status: 'ok',
            pendingCommands: engine ? engine.pendingCount() : 0,
        }
    })

    app.get<{ Querystring: LogsQuery }>('/api/logs', async (req) => {
        const parsed = Number.parseInt(req.query.n ?? '', 10)
        const n = Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_LOG_LINES
        return { logs: clientBuf.getLatest(n) }
    })

    logApp.info('metrics exporter built')
    return app
}
